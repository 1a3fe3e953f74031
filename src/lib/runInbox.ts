/**
 * Per-run inbound mailboxes.
 *
 * Created when a run starts and discarded when it ends, so user actions or
 * decodes addressed to one run never reach the next. The active trial owns
 * clearing; the outside world only sets signals and puts messages.
 */

import type { DecodeMessage } from '@/types';
import { AsyncSignal } from './asyncSignal';
import { Mailbox } from './mailbox';

export class RunInbox {
  readonly decodes = new Mailbox<DecodeMessage>('decodes');
  readonly decodeMatch = new AsyncSignal('decode-match');

  private actions = new Map<string, AsyncSignal>();
  private currentClass: string | null = null;

  constructor(private readonly matchClass: string | null = null) {}

  /** Signal for a named response control, created on first use */
  action(control: string): AsyncSignal {
    let signal = this.actions.get(control);
    if (!signal) {
      signal = new AsyncSignal(control);
      this.actions.set(control, signal);
    }
    return signal;
  }

  press(control: string): void {
    this.action(control).set();
  }

  /**
   * Tracks decoded-class transitions. The match signal only fires when the
   * decoded class changes to the configured match class.
   */
  receiveClass(label: string | null): void {
    if (label === this.currentClass) return;
    this.currentClass = label;
    if (this.matchClass !== null && label === this.matchClass) {
      this.decodeMatch.set();
    }
  }

  receiveDecode(message: DecodeMessage): void {
    this.decodes.put(message);
  }

  clearSignals(): void {
    for (const signal of this.actions.values()) signal.clear();
    this.decodeMatch.clear();
  }

  /** Flushes everything buffered so far; returns the number of dropped decodes */
  reset(): number {
    this.clearSignals();
    return this.decodes.reset();
  }
}
