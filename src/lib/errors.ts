/**
 * Error taxonomy for the trial engine.
 * Timeouts are not errors; they travel as values in race and feedback results.
 */

export class InvalidConfigurationError extends Error {
  readonly issues: string[];

  constructor(issues: string[]) {
    super(`Invalid run configuration: ${issues.join('; ')}`);
    this.name = 'InvalidConfigurationError';
    this.issues = issues;
  }
}

export class CancelledError extends Error {
  constructor(message = 'Run cancelled') {
    super(message);
    this.name = 'CancelledError';
  }
}

export class SinkClosedError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'SinkClosedError';
  }
}

export class RunInProgressError extends Error {
  constructor(runId: string) {
    super(`Run ${runId} is still active`);
    this.name = 'RunInProgressError';
  }
}

export function isCancellation(error: unknown): error is CancelledError {
  return error instanceof CancelledError;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? `${error.name}: ${error.message}` : String(error);
}
