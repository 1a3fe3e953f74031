/**
 * Event Race
 * Waits on several AsyncSignals for a bounded time and reports the first to
 * fire. Signals fired within the same tick resolve in input order. Every
 * listener, the timer and the abort hook are detached once the race settles.
 */

import type { Clock } from '@/types';
import type { AsyncSignal } from './asyncSignal';
import { CancelledError } from './errors';

export type RaceResult =
  | { outcome: 'signal'; winner: number; elapsedMs: number }
  | { outcome: 'timeout'; elapsedMs: number };

export interface RaceOptions {
  abortSignal?: AbortSignal;
  now?: Clock;
}

export class EventRace {
  static race(
    signals: readonly AsyncSignal[],
    timeoutMs: number,
    options: RaceOptions = {}
  ): Promise<RaceResult> {
    const { abortSignal, now = () => performance.now() } = options;
    const startedAt = now();

    return new Promise((resolve, reject) => {
      if (abortSignal?.aborted) {
        reject(new CancelledError('race cancelled'));
        return;
      }

      const fired = signals.map(() => false);
      const detachers: Array<() => void> = [];
      let timer: ReturnType<typeof setTimeout> | null = null;
      let settled = false;
      let resolving = false;

      const cleanup = () => {
        settled = true;
        for (const detach of detachers) detach();
        detachers.length = 0;
        if (timer !== null) clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
      };

      const onAbort = () => {
        if (settled) return;
        cleanup();
        reject(new CancelledError('race cancelled'));
      };

      const settleWinner = () => {
        if (settled) return;
        const winner = fired.indexOf(true);
        cleanup();
        resolve({ outcome: 'signal', winner, elapsedMs: now() - startedAt });
      };

      signals.forEach((signal, index) => {
        detachers.push(signal.subscribe(() => {
          fired[index] = true;
          if (!resolving) {
            resolving = true;
            queueMicrotask(settleWinner);
          }
        }));
      });

      if (Number.isFinite(timeoutMs)) {
        timer = setTimeout(() => {
          if (settled) return;
          cleanup();
          resolve({ outcome: 'timeout', elapsedMs: now() - startedAt });
        }, Math.max(0, timeoutMs));
      }

      abortSignal?.addEventListener('abort', onAbort, { once: true });
    });
  }
}
