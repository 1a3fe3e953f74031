/**
 * Trial Stream
 * In-process bounded channel between the emitter and a downstream recorder.
 * Writers suspend while the buffer is full. Stopping iteration early abandons
 * the stream, after which every write fails with SinkClosedError.
 */

import type { TrialRecord, TrialSink } from '@/types';
import { CancelledError, SinkClosedError } from './errors';

interface BlockedWriter {
  record: TrialRecord;
  resolve: () => void;
  reject: (error: Error) => void;
}

type Reader = (result: IteratorResult<TrialRecord, undefined>) => void;

export class TrialStream implements TrialSink, AsyncIterable<TrialRecord> {
  private buffer: TrialRecord[] = [];
  private writers: BlockedWriter[] = [];
  private readers: Reader[] = [];
  private closed = false;
  private abandoned = false;

  constructor(private readonly capacity = 8) {}

  write(record: TrialRecord, abortSignal?: AbortSignal): Promise<void> {
    if (this.abandoned || this.closed) {
      return Promise.reject(new SinkClosedError('Trial stream is no longer accepting records'));
    }
    if (abortSignal?.aborted) {
      return Promise.reject(new CancelledError());
    }

    const reader = this.readers.shift();
    if (reader) {
      reader({ value: record, done: false });
      return Promise.resolve();
    }
    if (this.buffer.length < this.capacity) {
      this.buffer.push(record);
      return Promise.resolve();
    }

    return new Promise((resolve, reject) => {
      const onAbort = () => {
        this.writers = this.writers.filter(w => w !== writer);
        reject(new CancelledError());
      };
      const writer: BlockedWriter = {
        record,
        resolve: () => {
          abortSignal?.removeEventListener('abort', onAbort);
          resolve();
        },
        reject: (error) => {
          abortSignal?.removeEventListener('abort', onAbort);
          reject(error);
        },
      };
      this.writers.push(writer);
      abortSignal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /** Ends iteration once the buffer drains */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    if (this.buffer.length === 0 && this.writers.length === 0) {
      this.flushReaders();
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<TrialRecord, undefined> {
    return {
      next: () => this.next(),
      return: async () => {
        this.abandon();
        return { value: undefined, done: true };
      },
    };
  }

  private next(): Promise<IteratorResult<TrialRecord, undefined>> {
    const buffered = this.buffer.shift();
    if (buffered) {
      this.admitWriter();
      return Promise.resolve({ value: buffered, done: false });
    }
    const writer = this.writers.shift();
    if (writer) {
      writer.resolve();
      return Promise.resolve({ value: writer.record, done: false });
    }
    if (this.closed || this.abandoned) {
      return Promise.resolve({ value: undefined, done: true });
    }
    return new Promise(resolve => this.readers.push(resolve));
  }

  private admitWriter(): void {
    const writer = this.writers.shift();
    if (!writer) return;
    this.buffer.push(writer.record);
    writer.resolve();
  }

  private abandon(): void {
    this.abandoned = true;
    this.buffer = [];
    const blocked = this.writers;
    this.writers = [];
    for (const writer of blocked) {
      writer.reject(new SinkClosedError('Trial stream consumer stopped reading'));
    }
    this.flushReaders();
  }

  private flushReaders(): void {
    const waiting = this.readers;
    this.readers = [];
    for (const reader of waiting) reader({ value: undefined, done: true });
  }
}
