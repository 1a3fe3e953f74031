/**
 * Trial Task Engine Type Definitions
 *
 * Shared shapes for run configuration, trial records, inbound decode traffic,
 * presentation state and the paradigm capability set plugged into the
 * PhaseSequencer.
 */

import type { z } from 'zod';
import type { RunInbox } from '@/lib/runInbox';
import type { Presenter } from '@/lib/presenter';

// =============================================================================
// CONFIGURATION TYPES
// =============================================================================

/** Operator-tunable parameters shared by every paradigm. Durations are seconds. */
export interface BaseRunConfig {
  trialsPerClass: number;
  /** Stimulus window for fixed paradigms, response deadline for racing ones */
  trialDuration: number;
  itiMin: number;
  itiMax: number;
  preRunDuration: number;
  postRunDuration: number;
  feedback: boolean;
  feedbackWindow: number;
  multiclass: boolean;
  seed?: number;
}

/** Frozen snapshot of a run's parameters */
export type RunConfig<P> = Readonly<BaseRunConfig> & { readonly params: P };

/** Partial configuration as supplied by a preset or an operator */
export type RunConfigInput = Partial<BaseRunConfig> & { params?: Record<string, unknown> };

export interface RunInfo {
  classCount: number;
  trialCount: number;
  durationSeconds: number;
  text: string;
}

// =============================================================================
// TRIAL PLANNING
// =============================================================================

export interface ClassSpec {
  label: string;
  /** Stimulation frequencies in Hz; empty for response-only classes */
  frequencies: readonly number[];
}

/** Class indices in presentation order */
export type TrialOrder = readonly number[];

export type Random = () => number;
export type Clock = () => number;

// =============================================================================
// TRIAL RECORDS (outbound)
// =============================================================================

export type CompletionKind = 'normal' | 'timeout';

export const TIMEOUT_VALUE = 'TIMEOUT';

export type SsvepStimulusType = 'checkerboard' | 'visual-motion' | 'intermodulation';

export interface ReactionPayload {
  kind: 'reaction';
  responder: string | null;
  /** Seconds from window start to the completing response */
  responseTime: number | null;
}

export interface SsaepPayload {
  kind: 'ssaep';
  freqs: readonly number[];
  target: number;
}

export interface SsvepPayload {
  kind: 'ssvep';
  stimulusType: SsvepStimulusType;
  reversalPeriodMs: readonly number[];
  freqs: readonly number[];
  target: number;
}

export type TrialPayload = ReactionPayload | SsaepPayload | SsvepPayload;
export type FrequencyTaggedPayload = SsaepPayload | SsvepPayload;

export interface TrialRecord<T extends TrialPayload = TrialPayload> {
  readonly trialIndex: number;
  readonly classIndex: number;
  readonly label: string;
  /** Class label, or TIMEOUT_VALUE when no response arrived */
  readonly value: string;
  readonly completion: CompletionKind;
  /** [start, end] in seconds relative to the emission instant */
  readonly period: readonly [number, number];
  readonly payload: Readonly<T>;
}

export interface TrialSink {
  write(record: TrialRecord, abortSignal?: AbortSignal): Promise<void> | void;
}

// =============================================================================
// INBOUND DECODE TRAFFIC
// =============================================================================

export interface DecodeMessage {
  /** One score per candidate frequency */
  scores: readonly number[];
  freqs: readonly number[];
}

export type FeedbackResult =
  | {
    status: 'judged';
    trialIndex: number;
    matched: boolean;
    observedClassIndex: number;
    observedFrequency: number | null;
  }
  | { status: 'timeout'; trialIndex: number };

// =============================================================================
// PRESENTATION STATE
// =============================================================================

interface VisualStimulusBase {
  /** Single reversal (or half-rotation) period */
  periodMs: number;
  size: number;
  border: number;
  visible: boolean;
}

export type StimulusDescriptor =
  | ({ kind: 'checkerboard' } & VisualStimulusBase)
  | ({ kind: 'visual-motion' } & VisualStimulusBase)
  | ({ kind: 'intermodulation'; periodMs2: number } & VisualStimulusBase)
  | {
    kind: 'auditory';
    leftCarrier: number;
    leftModulation: number;
    rightCarrier: number;
    rightModulation: number;
    sampleRate: number;
    duration: number;
  };

export interface PresentationState {
  cue: string | null;
  banner: string | null;
  stimuli: readonly StimulusDescriptor[];
  presented: boolean;
  highlight: number | null;
}

// =============================================================================
// RUNTIME STATE TYPES
// =============================================================================

export type RunState =
  | 'idle'
  | 'pre-run'
  | 'iti'
  | 'action'
  | 'feedback'
  | 'post-run'
  | 'complete'
  | 'aborted'
  | 'failed';

export interface RunStatus {
  runId: string | null;
  state: RunState;
  label: string;
  completedTrials: number;
  totalTrials: number;
}

export interface RunSummary {
  trials: number;
  timeouts: number;
  perClass: Record<string, number>;
  responseTime: { mean: number; median: number; deviation: number | null } | null;
  feedback: {
    judged: number;
    matched: number;
    missing: number;
    accuracy: number | null;
  };
}

interface RunOutcomeBase {
  runId: string;
  records: readonly TrialRecord[];
  feedback: readonly FeedbackResult[];
  summary: RunSummary;
}

export type RunOutcome =
  | (RunOutcomeBase & { status: 'completed' })
  | (RunOutcomeBase & { status: 'aborted' })
  | (RunOutcomeBase & { status: 'failed'; reason: string; error: unknown });

// =============================================================================
// COLLABORATORS
// =============================================================================

/** Operator controls that edit run parameters */
export interface ControlSurface {
  setEnabled(enabled: boolean): void;
}

/** Subject-facing response controls, addressed by name */
export interface ResponseControls {
  setEnabled(control: string, enabled: boolean): void;
}

export interface RunnerCallbacks {
  onStateUpdate?: (status: RunStatus) => void;
  onPresentationUpdate?: (state: PresentationState) => void;
  onCue?: (label: string | null) => void;
  onFeedback?: (result: FeedbackResult) => void;
  onResponseControl?: (control: string, enabled: boolean) => void;
}

// =============================================================================
// PARADIGM CAPABILITIES
// =============================================================================

export interface TrialContext<P> {
  index: number;
  total: number;
  classIndex: number;
  classSpec: ClassSpec;
  classes: readonly ClassSpec[];
  config: RunConfig<P>;
}

/** Run-scoped handles a presentation strategy may touch during a trial */
export interface TrialIO {
  readonly inbox: RunInbox;
  readonly presenter: Presenter;
  readonly controls: ResponseControls;
  readonly abortSignal: AbortSignal;
  now(): number;
  delay(seconds: number): Promise<void>;
}

export interface ResponseOutcome {
  completion: CompletionKind;
  responder: string | null;
}

export interface TrialWindow {
  period: readonly [number, number];
  completion: CompletionKind;
  responder: string | null;
  responseTime: number | null;
}

/** Stimulus paradigms: passive display for the whole window, record emitted at onset */
export interface FixedPresentation<P> {
  kind: 'fixed';
  onInterval?(trial: TrialContext<P>, io: TrialIO): void;
  prepare?(trial: TrialContext<P>, io: TrialIO): Promise<void> | void;
  reveal?(trial: TrialContext<P>, io: TrialIO): void;
  conceal?(trial: TrialContext<P>, io: TrialIO): void;
}

/** Response paradigms: race completion signals, record emitted after the window */
export interface RacePresentation<P> {
  kind: 'race';
  onInterval?(trial: TrialContext<P>, io: TrialIO): void;
  respond(trial: TrialContext<P>, io: TrialIO, timeoutMs: number): Promise<ResponseOutcome>;
}

export type TrialPresentation<P> = FixedPresentation<P> | RacePresentation<P>;

export interface FeedbackStrategy {
  /** Seconds to wait after the window before asking for a decode */
  settle: number;
  /** Seconds to hold the judged highlight */
  display: number;
}

export interface Paradigm<P> {
  readonly slug: string;
  readonly title: string;
  readonly paramsSchema: z.ZodType<P, z.ZodTypeDef, unknown>;
  readonly defaults: RunConfigInput;
  readonly presentation: TrialPresentation<P>;
  readonly feedback?: FeedbackStrategy;
  classes(config: RunConfig<P>): ClassSpec[];
  trigger(trial: TrialContext<P>, window: TrialWindow): TrialPayload;
  /** Decoded class label that completes a racing trial, if any */
  decodeMatchClass?(config: RunConfig<P>): string | null;
}
