/**
 * Trigger Emitter
 * Hands each trial record to the outbound sink. A slow sink suspends the run
 * (records are never dropped); a sink that throws is treated as gone.
 */

import type { TrialRecord, TrialSink } from '@/types';
import { CancelledError, SinkClosedError, isCancellation } from './errors';

export class TriggerEmitter {
  constructor(private readonly sink: TrialSink) {}

  async emit(record: TrialRecord, abortSignal?: AbortSignal): Promise<void> {
    if (abortSignal?.aborted) {
      throw new CancelledError(`emission of trial ${record.trialIndex + 1} cancelled`);
    }
    try {
      await this.sink.write(record, abortSignal);
    } catch (error) {
      if (isCancellation(error) || error instanceof SinkClosedError) throw error;
      throw new SinkClosedError(`Trial sink rejected trial ${record.trialIndex + 1}`, { cause: error });
    }
  }
}
