/**
 * Control Gate
 * Holds the operator control surface disabled for the lifetime of a run and
 * restores it on every exit path. Teardown runs at most once per acquisition.
 */

import type { ControlSurface } from '@/types';

type ResetPresentation = () => void;

export class ControlGate {
  private held = false;

  constructor(
    private readonly surface: ControlSurface,
    private readonly resetPresentation: ResetPresentation
  ) {}

  async run<T>(body: () => Promise<T>): Promise<T> {
    this.acquire();
    try {
      return await body();
    } finally {
      this.release();
    }
  }

  acquire(): void {
    if (this.held) return;
    this.held = true;
    this.surface.setEnabled(false);
  }

  /** Resets presentation to idle and re-enables controls. No-op when not held. */
  release(): void {
    if (!this.held) return;
    this.held = false;
    try {
      this.resetPresentation();
    } catch (error) {
      console.error('Presentation reset failed during teardown:', error);
    } finally {
      this.surface.setEnabled(true);
    }
  }
}
