/**
 * Task Runner
 * Caller-facing lifecycle for one paradigm: resolve and validate the
 * configuration, start a run, route inbound traffic to it, cancel it, and
 * settle a terminal outcome once teardown has finished.
 */

import { randomUUID } from 'node:crypto';
import type {
  Clock, DecodeMessage, FeedbackResult, Paradigm, Random, ResponseControls,
  RunConfig, RunConfigInput, RunInfo, RunnerCallbacks, RunOutcome, RunStatus, TrialRecord, TrialSink,
  ControlSurface
} from '@/types';
import { ControlGate } from './controlGate';
import { PhaseSequencer } from './phaseSequencer';
import { Presenter } from './presenter';
import { RunInbox } from './runInbox';
import { TriggerEmitter } from './triggerEmitter';
import { TrialPlanner } from './trialPlanner';
import { RunStatistics } from './statistics';
import { BASE_DEFAULTS, mergeConfigInput, parseRunConfig } from './runConfig';
import { InvalidConfigurationError, RunInProgressError, describeError, isCancellation } from './errors';
import { createSeededRandom } from './timing';

export interface RunnerCollaborators {
  /** Operator controls, disabled for the lifetime of a run */
  controls: ControlSurface;
  sink: TrialSink;
}

export interface RunnerOptions {
  random?: Random;
  now?: Clock;
}

export interface RunHandle<P> {
  runId: string;
  config: RunConfig<P>;
  outcome: Promise<RunOutcome>;
}

/** Paradigm-agnostic view of a runner, for front ends that pick the paradigm at run time */
export interface RunController {
  readonly paradigm: { readonly slug: string; readonly title: string };
  setCallbacks(callbacks: RunnerCallbacks): void;
  describe(overrides?: RunConfigInput): RunInfo;
  start(overrides?: RunConfigInput): RunHandle<unknown>;
  cancel(): void;
  isRunning(): boolean;
  getStatus(): RunStatus;
  press(control: string): void;
  deliverDecode(message: DecodeMessage): void;
  deliverDecodedClass(label: string | null): void;
}

interface ActiveRun {
  runId: string;
  inbox: RunInbox;
  abort: AbortController;
}

export class TaskRunner<P> implements RunController {
  private readonly presenter = new Presenter();
  private readonly gate: ControlGate;
  private readonly emitter: TriggerEmitter;
  private readonly responseControls: ResponseControls;

  private active: ActiveRun | null = null;
  private lastStatus: RunStatus = {
    runId: null, state: 'idle', label: 'Idle', completedTrials: 0, totalTrials: 0,
  };

  private onStateUpdate: ((status: RunStatus) => void) | null = null;
  private onFeedback: ((result: FeedbackResult) => void) | null = null;
  private onResponseControl: ((control: string, enabled: boolean) => void) | null = null;

  constructor(
    readonly paradigm: Paradigm<P>,
    collaborators: RunnerCollaborators,
    private readonly options: RunnerOptions = {}
  ) {
    this.gate = new ControlGate(collaborators.controls, () => this.presenter.reset());
    this.emitter = new TriggerEmitter(collaborators.sink);
    this.responseControls = {
      setEnabled: (control, enabled) => {
        if (this.onResponseControl) this.onResponseControl(control, enabled);
      },
    };
  }

  setCallbacks(callbacks: RunnerCallbacks): void {
    this.onStateUpdate = callbacks.onStateUpdate || null;
    this.onFeedback = callbacks.onFeedback || null;
    this.onResponseControl = callbacks.onResponseControl || null;
    this.presenter.setCallbacks({
      onUpdate: callbacks.onPresentationUpdate,
      onCue: callbacks.onCue,
    });
  }

  // ===========================================================================
  // CONFIGURATION
  // ===========================================================================

  /** Preset defaults with overrides on top, validated and frozen */
  resolveConfig(overrides: RunConfigInput = {}): RunConfig<P> {
    const config = parseRunConfig(
      mergeConfigInput(BASE_DEFAULTS, this.paradigm.defaults, overrides),
      this.paradigm.paramsSchema
    );
    if (config.feedback && !this.paradigm.feedback) {
      throw new InvalidConfigurationError([`feedback: ${this.paradigm.title} does not support feedback`]);
    }
    // Surfaces class-level problems (duplicates, no usable class) before the run
    this.paradigm.classes(config);
    return config;
  }

  describe(overrides: RunConfigInput = {}): RunInfo {
    const config = this.resolveConfig(overrides);
    return TrialPlanner.describeRun(config, this.paradigm.classes(config).length);
  }

  // ===========================================================================
  // LIFECYCLE
  // ===========================================================================

  /**
   * Begins a run. Configuration problems throw here and the run never begins;
   * everything after that is reported through the outcome.
   */
  start(overrides: RunConfigInput = {}): RunHandle<P> {
    if (this.active) throw new RunInProgressError(this.active.runId);

    const config = this.resolveConfig(overrides);
    const runId = randomUUID();
    const abort = new AbortController();
    const inbox = new RunInbox(this.paradigm.decodeMatchClass?.(config) ?? null);
    const random = this.options.random
      ?? (config.seed !== undefined ? createSeededRandom(config.seed) : Math.random);

    const sequencer = new PhaseSequencer(this.paradigm, {
      runId,
      inbox,
      presenter: this.presenter,
      controls: this.responseControls,
      abortSignal: abort.signal,
      random,
      now: this.options.now ?? (() => performance.now()),
    });
    sequencer.setCallbacks({
      onStateUpdate: status => this.publishStatus(status),
      onFeedback: result => {
        if (this.onFeedback) this.onFeedback(result);
      },
    });

    this.active = { runId, inbox, abort };
    const info = TrialPlanner.describeRun(config, this.paradigm.classes(config).length);
    console.info(`[${this.paradigm.slug}] run ${runId} starting: ${info.text}`);

    const outcome = this.execute(runId, config, sequencer, abort.signal);
    return { runId, config, outcome };
  }

  /** Requests cancellation of the active run; a no-op when idle or already cancelling */
  cancel(): void {
    if (!this.active || this.active.abort.signal.aborted) return;
    console.info(`[${this.paradigm.slug}] cancelling run ${this.active.runId}`);
    this.active.abort.abort();
  }

  isRunning(): boolean {
    return this.active !== null;
  }

  getStatus(): RunStatus {
    return this.lastStatus;
  }

  // ===========================================================================
  // INBOUND TRAFFIC
  // ===========================================================================

  press(control: string): void {
    const inbox = this.inboxFor(`press of ${control}`);
    if (inbox) inbox.press(control);
  }

  deliverDecode(message: DecodeMessage): void {
    const inbox = this.inboxFor('decode');
    if (inbox) inbox.receiveDecode(message);
  }

  deliverDecodedClass(label: string | null): void {
    const inbox = this.inboxFor(`decoded class ${label}`);
    if (inbox) inbox.receiveClass(label);
  }

  // ===========================================================================
  // INTERNALS
  // ===========================================================================

  private async execute(
    runId: string,
    config: RunConfig<P>,
    sequencer: PhaseSequencer<P>,
    abortSignal: AbortSignal
  ): Promise<RunOutcome> {
    const records: TrialRecord[] = [];

    const settle = () => ({
      runId,
      records,
      feedback: sequencer.feedback,
      summary: RunStatistics.summarize(records, sequencer.feedback),
    });

    try {
      await this.gate.run(async () => {
        const trials = sequencer.execute(config);
        let step = await trials.next();
        while (!step.done) {
          const record = step.value;
          try {
            await this.emitter.emit(record, abortSignal);
          } catch (error) {
            // Unwinds the sequencer (conceal, state) before the error leaves
            await trials.throw(error);
            throw error;
          }
          records.push(record);
          step = await trials.next();
        }
      });

      const outcome: RunOutcome = { ...settle(), status: 'completed' };
      console.info(`[${this.paradigm.slug}] run ${runId} complete: ${RunStatistics.describe(outcome.summary).join(' | ')}`);
      return outcome;
    } catch (error) {
      if (isCancellation(error)) {
        console.info(`[${this.paradigm.slug}] run ${runId} aborted after ${records.length} trial(s)`);
        return { ...settle(), status: 'aborted' };
      }
      const reason = describeError(error);
      console.error(`[${this.paradigm.slug}] run ${runId} failed:`, reason);
      return { ...settle(), status: 'failed', reason, error };
    } finally {
      this.active = null;
      this.publishStatus(sequencer.getStatus());
    }
  }

  private publishStatus(status: RunStatus): void {
    this.lastStatus = status;
    if (this.onStateUpdate) this.onStateUpdate(status);
  }

  private inboxFor(what: string): RunInbox | null {
    if (this.active) return this.active.inbox;
    console.debug(`Dropping ${what}: no active run`);
    return null;
  }
}
