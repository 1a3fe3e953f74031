/**
 * Multi-producer, single-consumer queue with a bounded take().
 * Messages that arrive while nobody is waiting stay queued until taken or
 * until reset() discards the backlog.
 */

import { CancelledError } from './errors';

export type MailboxTake<T> =
  | { status: 'received'; message: T }
  | { status: 'timeout' };

interface PendingTake<T> {
  deliver: (message: T) => void;
}

export class Mailbox<T> {
  private queue: T[] = [];
  private pending: PendingTake<T> | null = null;

  constructor(readonly name: string) {}

  put(message: T): void {
    if (this.pending) {
      const { deliver } = this.pending;
      this.pending = null;
      deliver(message);
      return;
    }
    this.queue.push(message);
  }

  /** Drops every queued message. A pending take keeps waiting. */
  reset(): number {
    const dropped = this.queue.length;
    this.queue = [];
    return dropped;
  }

  take(timeoutMs: number, abortSignal?: AbortSignal): Promise<MailboxTake<T>> {
    return new Promise((resolve, reject) => {
      if (abortSignal?.aborted) {
        reject(new CancelledError(`take from ${this.name} cancelled`));
        return;
      }
      if (this.queue.length > 0) {
        const [message, ...rest] = this.queue;
        this.queue = rest;
        resolve({ status: 'received', message });
        return;
      }
      if (this.pending) {
        reject(new Error(`Mailbox ${this.name} already has a pending consumer`));
        return;
      }

      const finish = () => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        this.pending = null;
      };
      const onAbort = () => {
        finish();
        reject(new CancelledError(`take from ${this.name} cancelled`));
      };
      const timer = setTimeout(() => {
        finish();
        resolve({ status: 'timeout' });
      }, Math.max(0, timeoutMs));

      this.pending = {
        deliver: (message) => {
          finish();
          resolve({ status: 'received', message });
        },
      };
      abortSignal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
