/**
 * Single-fire, level-triggered wait handle.
 *
 * An external source (a button press, a classifier match) calls set(); the
 * trial that owns the signal clears it. While set, every new waiter resolves
 * immediately.
 */

import { CancelledError } from './errors';

type Listener = () => void;

export class AsyncSignal {
  private isSet = false;
  private listeners = new Set<Listener>();

  constructor(readonly name: string) {}

  get fired(): boolean {
    return this.isSet;
  }

  set(): void {
    if (this.isSet) return;
    this.isSet = true;
    const pending = [...this.listeners];
    this.listeners.clear();
    for (const listener of pending) listener();
  }

  clear(): void {
    this.isSet = false;
  }

  /**
   * Registers a one-shot listener. Fires synchronously when already set.
   * Returns a detach function that is safe to call after firing.
   */
  subscribe(listener: Listener): () => void {
    if (this.isSet) {
      listener();
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  wait(abortSignal?: AbortSignal): Promise<void> {
    return new Promise((resolve, reject) => {
      if (abortSignal?.aborted) {
        reject(new CancelledError(`wait on ${this.name} cancelled`));
        return;
      }
      const onAbort = () => {
        detach();
        reject(new CancelledError(`wait on ${this.name} cancelled`));
      };
      const detach = this.subscribe(() => {
        abortSignal?.removeEventListener('abort', onAbort);
        resolve();
      });
      if (!this.isSet) {
        abortSignal?.addEventListener('abort', onAbort, { once: true });
      }
    });
  }
}
