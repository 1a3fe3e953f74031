/**
 * Console front end
 *
 * Runs one paradigm from a terminal. Typed commands stand in for the subject's
 * buttons and the classifier; emitted records go to the output stream as JSON
 * lines while presentation changes are echoed as short status lines.
 */

import { createInterface } from 'node:readline';
import type { Readable, Writable } from 'node:stream';
import type { DecodeMessage, PresentationState, RunConfigInput, RunOutcome, RunStatus } from '@/types';
import { TrialStream } from '@/lib/trialStream';
import { RunStatistics } from '@/lib/statistics';
import { describeError } from '@/lib/errors';
import type { RunController } from '@/lib/taskRunner';
import { createRunner } from '@/paradigms';
import type { ParadigmName } from '@/paradigms';

export type ConsoleCommand =
  | { type: 'press'; control: string }
  | { type: 'class'; label: string | null }
  | { type: 'decode'; message: DecodeMessage }
  | { type: 'cancel' }
  | { type: 'status' }
  | { type: 'help' };

export type ParsedCommand = ConsoleCommand | { type: 'invalid'; reason: string } | null;

const HELP = [
  'Commands:',
  '  press <CONTROL>          press a response control (e.g. press CENTER)',
  '  class <LABEL|none>       report the currently decoded class',
  '  decode <Hz>=<score> ...  deliver a decode, e.g. decode 10=0.1 12=0.9',
  '  status                   show run status',
  '  cancel                   stop the run',
].join('\n');

/** Parses one line of operator input. Blank lines yield null. */
export function parseCommand(line: string): ParsedCommand {
  const [verb, ...args] = line.trim().split(/\s+/).filter(Boolean);
  if (!verb) return null;

  switch (verb.toLowerCase()) {
    case 'press':
    case 'p':
      if (args.length !== 1) return { type: 'invalid', reason: 'press takes one control name' };
      return { type: 'press', control: args[0].toUpperCase() };

    case 'class':
      if (args.length !== 1) return { type: 'invalid', reason: 'class takes one label (or "none")' };
      return { type: 'class', label: args[0].toLowerCase() === 'none' ? null : args[0] };

    case 'decode': {
      if (args.length === 0) return { type: 'invalid', reason: 'decode needs at least one <Hz>=<score> pair' };
      const freqs: number[] = [];
      const scores: number[] = [];
      for (const pair of args) {
        const parts = pair.split('=');
        const [hz, score] = parts.map(part => (part === '' ? NaN : Number(part)));
        if (parts.length !== 2 || !Number.isFinite(hz) || !Number.isFinite(score)) {
          return { type: 'invalid', reason: `cannot read "${pair}" as <Hz>=<score>` };
        }
        freqs.push(hz);
        scores.push(score);
      }
      return { type: 'decode', message: { freqs, scores } };
    }

    case 'cancel':
    case 'quit':
      return { type: 'cancel' };

    case 'status':
      return { type: 'status' };

    case 'help':
    case '?':
      return { type: 'help' };

    default:
      return { type: 'invalid', reason: `unknown command "${verb}"` };
  }
}

export function formatStatus(status: RunStatus): string {
  const progress = status.totalTrials > 0 ? ` [${status.completedTrials}/${status.totalTrials}]` : '';
  return `${status.label}${progress}`;
}

export function formatPresentation(state: PresentationState): string {
  if (state.banner) return state.banner;
  const shown = state.stimuli.filter(s => s.kind === 'auditory' || s.visible).length;
  const cue = state.cue ?? '...';
  return state.presented ? `${cue} (${shown} stimulus/stimuli on)` : cue;
}

export interface ConsoleStreams {
  input: Readable;
  output: Writable;
  log: Writable;
}

export class ConsoleApp {
  private readonly stream = new TrialStream();
  private readonly runner: RunController;
  private lastPresentation = '';

  constructor(paradigm: ParadigmName, private readonly streams: ConsoleStreams) {
    this.runner = createRunner(paradigm, {
      controls: { setEnabled: enabled => this.info(enabled ? 'Settings unlocked' : 'Settings locked') },
      sink: this.stream,
    });
    this.runner.setCallbacks({
      onStateUpdate: status => this.info(formatStatus(status)),
      onPresentationUpdate: state => this.showPresentation(state),
      onFeedback: result => {
        if (result.status === 'judged') {
          this.info(`Feedback: ${result.matched ? 'correct' : 'incorrect'}`);
        }
      },
      onResponseControl: (control, enabled) => {
        if (enabled) this.info(`>> ${control} enabled`);
      },
    });
  }

  /** Runs to completion, reading commands until the run settles */
  async run(overrides: RunConfigInput = {}): Promise<RunOutcome> {
    this.info(`${this.runner.paradigm.title}: ${this.runner.describe(overrides).text}`);
    const handle = this.runner.start(overrides);
    const pump = this.pumpRecords();

    const lines = createInterface({ input: this.streams.input, terminal: false });
    lines.on('line', line => this.handleLine(line));

    try {
      const outcome = await handle.outcome;
      this.stream.close();
      await pump;
      for (const line of RunStatistics.describe(outcome.summary)) this.info(line);
      if (outcome.status === 'failed') this.info(`Run failed: ${outcome.reason}`);
      return outcome;
    } finally {
      lines.close();
    }
  }

  cancel(): void {
    this.runner.cancel();
  }

  handleLine(line: string): void {
    const command = parseCommand(line);
    if (command === null) return;

    switch (command.type) {
      case 'press':
        this.runner.press(command.control);
        break;
      case 'class':
        this.runner.deliverDecodedClass(command.label);
        break;
      case 'decode':
        this.runner.deliverDecode(command.message);
        break;
      case 'cancel':
        this.runner.cancel();
        break;
      case 'status':
        this.info(formatStatus(this.runner.getStatus()));
        break;
      case 'help':
        this.info(HELP);
        break;
      case 'invalid':
        this.info(`${command.reason} (type "help" for commands)`);
        break;
    }
  }

  private async pumpRecords(): Promise<void> {
    try {
      for await (const record of this.stream) {
        this.streams.output.write(`${JSON.stringify(record)}\n`);
      }
    } catch (error) {
      console.error('Record output stopped:', describeError(error));
    }
  }

  private showPresentation(state: PresentationState): void {
    const line = formatPresentation(state);
    if (line === this.lastPresentation) return;
    this.lastPresentation = line;
    this.info(`~ ${line}`);
  }

  private info(message: string): void {
    this.streams.log.write(`${message}\n`);
  }
}
