/**
 * Trial Task Engine entry point
 *
 *   tsx src/main.ts <reaction|ssaep|ssvep> [--config overrides.json]
 */

import { parseArgs } from 'node:util';
import { ConsoleApp } from '@/views/ConsoleApp';
import { PARADIGM_NAMES, isParadigmName } from '@/paradigms';
import { readConfigFile } from '@/lib/runConfig';
import { InvalidConfigurationError } from '@/lib/errors';

const EXIT_CODES = { completed: 0, failed: 1, aborted: 2 } as const;

let app: ConsoleApp | null = null;

async function bootstrap(): Promise<number> {
  const { values, positionals } = parseArgs({
    options: { config: { type: 'string', short: 'c' } },
    allowPositionals: true,
  });

  const name = positionals[0];
  if (!name || !isParadigmName(name)) {
    console.error(`Usage: main <${PARADIGM_NAMES.join('|')}> [--config overrides.json]`);
    return 64;
  }

  try {
    const overrides = values.config ? readConfigFile(values.config) : {};
    app = new ConsoleApp(name, { input: process.stdin, output: process.stdout, log: process.stderr });
    const outcome = await app.run(overrides);
    return EXIT_CODES[outcome.status];
  } catch (error) {
    if (error instanceof InvalidConfigurationError) {
      for (const issue of error.issues) console.error(`  ${issue}`);
      return 64;
    }
    throw error;
  }
}

// Global error handlers
process.on('uncaughtException', (error) => {
  console.error('Uncaught error:', error);
  process.exitCode = 1;
});

process.on('unhandledRejection', (reason) => {
  console.error('Unhandled rejection:', reason);
});

let interrupts = 0;
process.on('SIGINT', () => {
  interrupts++;
  if (app && interrupts === 1) {
    console.error('Cancelling run (Ctrl+C again to exit immediately)');
    app.cancel();
    return;
  }
  process.exit(130);
});

bootstrap()
  .then(code => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    console.error('Bootstrap failed:', error);
    process.exit(1);
  });
