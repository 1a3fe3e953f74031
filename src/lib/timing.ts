/**
 * Cancellable timing primitives and random helpers.
 * Every suspension point in a run goes through delay() so that an abort
 * detaches the timer instead of leaving it pending.
 */

import type { Random } from '@/types';
import { CancelledError } from './errors';

export function seconds(value: number): number {
  return value * 1000;
}

export function delay(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (abortSignal?.aborted) {
      reject(new CancelledError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new CancelledError());
    };
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, Math.max(0, ms));
    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

export function uniform(min: number, max: number, random: Random = Math.random): number {
  return min + random() * (max - min);
}

/**
 * Seeded generator (mulberry32) for reproducible trial orders and ITIs.
 */
export function createSeededRandom(seed: number): Random {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Renders seconds as H:MM:SS */
export function formatDuration(totalSeconds: number): string {
  const rounded = Math.max(0, Math.round(totalSeconds));
  const hours = Math.floor(rounded / 3600);
  const minutes = Math.floor((rounded % 3600) / 60);
  const secs = rounded % 60;
  return `${hours}:${String(minutes).padStart(2, '0')}:${String(secs).padStart(2, '0')}`;
}
