/**
 * Presenter
 * Abstract presentation state pushed to the renderer collaborator. The engine
 * only describes what should be on screen (or on the speakers); drawing and
 * synthesis live outside.
 */

import type { PresentationState, StimulusDescriptor } from '@/types';

type PresentationCallback = (state: PresentationState) => void;
type CueCallback = (label: string | null) => void;

const HIGHLIGHT_BORDER = 3;

export class Presenter {
  private state: PresentationState = Presenter.idleState();

  private onUpdate: PresentationCallback | null = null;
  private onCue: CueCallback | null = null;

  static idleState(): PresentationState {
    return { cue: null, banner: null, stimuli: [], presented: false, highlight: null };
  }

  setCallbacks(callbacks: { onUpdate?: PresentationCallback; onCue?: CueCallback }): void {
    this.onUpdate = callbacks.onUpdate || null;
    this.onCue = callbacks.onCue || null;
  }

  getState(): PresentationState {
    return this.state;
  }

  /** Publishes the currently cued class; null while nothing is cued */
  cue(label: string | null): void {
    this.update({ cue: label });
    if (this.onCue) this.onCue(label);
  }

  announce(banner: string | null): void {
    this.update({ banner });
  }

  stage(stimuli: readonly StimulusDescriptor[]): void {
    this.update({ stimuli, presented: false, highlight: null });
  }

  reveal(): void {
    this.update({ presented: true });
  }

  /** Hides the stimuli and drops any borders */
  conceal(): void {
    this.update({
      presented: false,
      highlight: null,
      stimuli: this.state.stimuli.map(s => s.kind === 'auditory' ? s : { ...s, border: 0 }),
    });
  }

  highlight(index: number | null): void {
    this.update({
      highlight: index,
      stimuli: this.state.stimuli.map((s, i) =>
        s.kind === 'auditory' ? s : { ...s, border: i === index ? HIGHLIGHT_BORDER : 0 }
      ),
    });
  }

  reset(): void {
    const wasCued = this.state.cue !== null;
    this.state = Presenter.idleState();
    this.emit();
    if (wasCued && this.onCue) this.onCue(null);
  }

  private update(patch: Partial<PresentationState>): void {
    this.state = { ...this.state, ...patch };
    this.emit();
  }

  private emit(): void {
    if (this.onUpdate) this.onUpdate(this.state);
  }
}
