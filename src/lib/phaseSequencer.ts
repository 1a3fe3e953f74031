/**
 * Phase Sequencer
 * Drives one run through pre-run, N trials and post-run.
 *
 * The run is exposed as an async generator of trial records: the consumer
 * pulls a record, emits it, then asks for the next one. Nothing advances while
 * the consumer is busy, so a slow sink holds the run at the emission point and
 * progress only moves once a record has been handed off.
 */

import type {
  Clock, FeedbackResult, FixedPresentation, Paradigm, Random, RacePresentation, ResponseControls,
  RunConfig, RunState, RunStatus, TrialContext, TrialIO, TrialRecord, TrialWindow
} from '@/types';
import { TIMEOUT_VALUE } from '@/types';
import { TrialPlanner } from './trialPlanner';
import { FeedbackCorrelator, isFrequencyTagged } from './feedbackCorrelator';
import { isCancellation } from './errors';
import { deepFreeze } from './immutable';
import { delay, seconds, uniform } from './timing';
import type { Presenter } from './presenter';
import type { RunInbox } from './runInbox';

type StateUpdateCallback = (status: RunStatus) => void;
type FeedbackCallback = (result: FeedbackResult) => void;

export interface SequencerContext {
  runId?: string;
  inbox: RunInbox;
  presenter: Presenter;
  controls: ResponseControls;
  abortSignal: AbortSignal;
  random: Random;
  now: Clock;
}

const TERMINAL_STATES: ReadonlySet<RunState> = new Set(['complete', 'aborted', 'failed']);

export class PhaseSequencer<P> {
  private state: RunState = 'idle';
  private label = 'Idle';
  private completedTrials = 0;
  private totalTrials = 0;
  private started = false;
  private feedbackResults: FeedbackResult[] = [];

  private readonly io: TrialIO;

  // Callbacks
  private onStateUpdate: StateUpdateCallback | null = null;
  private onFeedback: FeedbackCallback | null = null;

  constructor(
    private readonly paradigm: Paradigm<P>,
    private readonly context: SequencerContext
  ) {
    this.io = {
      inbox: context.inbox,
      presenter: context.presenter,
      controls: context.controls,
      abortSignal: context.abortSignal,
      now: context.now,
      delay: (s: number) => this.sleep(s),
    };
  }

  setCallbacks(callbacks: {
    onStateUpdate?: StateUpdateCallback;
    onFeedback?: FeedbackCallback;
  }): void {
    this.onStateUpdate = callbacks.onStateUpdate || null;
    this.onFeedback = callbacks.onFeedback || null;
  }

  getStatus(): RunStatus {
    return {
      runId: this.context.runId ?? null,
      state: this.state,
      label: this.label,
      completedTrials: this.completedTrials,
      totalTrials: this.totalTrials,
    };
  }

  get feedback(): readonly FeedbackResult[] {
    return this.feedbackResults;
  }

  /**
   * Starts the run. A sequencer runs once; a second call throws before any
   * phase begins.
   */
  execute(config: RunConfig<P>): AsyncGenerator<TrialRecord, void, undefined> {
    if (this.started) {
      throw new Error('PhaseSequencer has already run; create a new one per run');
    }
    this.started = true;
    return this.drive(config);
  }

  // ===========================================================================
  // PHASES
  // ===========================================================================

  private async *drive(config: RunConfig<P>): AsyncGenerator<TrialRecord, void, undefined> {
    const { inbox, presenter, random } = this.context;
    const { presentation } = this.paradigm;

    try {
      const classes = this.paradigm.classes(config);
      const order = TrialPlanner.plan(classes, config.trialsPerClass, random);
      this.totalTrials = order.length;
      this.completedTrials = 0;

      this.setState('pre-run', 'Pre Run');
      await this.sleep(config.preRunDuration);
      const dropped = inbox.reset();
      if (dropped > 0) {
        console.debug(`Discarded ${dropped} decode(s) received before the first trial`);
      }

      for (let index = 0; index < order.length; index++) {
        const classIndex = order[index];
        const trial: TrialContext<P> = {
          index,
          total: order.length,
          classIndex,
          classSpec: classes[classIndex],
          classes,
          config,
        };
        const prefix = `Trial ${index + 1} / ${order.length}`;

        // Intertrial interval
        this.setState('iti', `${prefix}: Intertrial Interval`);
        inbox.clearSignals();
        presenter.cue(null);
        presentation.onInterval?.(trial, this.io);
        await this.sleep(uniform(config.itiMin, config.itiMax, random));

        // Action window; the record is emitted from inside it
        this.setState('action', `${prefix}: Action (${trial.classSpec.label})`);
        let record: TrialRecord;
        if (presentation.kind === 'fixed') {
          record = yield* this.presentFixed(presentation, trial);
        } else {
          record = yield* this.presentRace(presentation, trial);
        }

        if (config.feedback && isFrequencyTagged(record)) {
          this.setState('feedback', `${prefix}: Feedback`);
          await this.deliverFeedback(record, config);
        }

        this.completedTrials = index + 1;
        this.emitStateUpdate();
      }

      this.setState('post-run', 'Post Run');
      presenter.cue(null);
      presenter.stage([]);
      await this.sleep(config.postRunDuration);

      this.setState('complete', 'Run Complete');
    } catch (error) {
      if (isCancellation(error)) {
        this.setState('aborted', 'Aborted');
      } else {
        this.setState('failed', 'Failed');
      }
      throw error;
    } finally {
      // Consumer stopped pulling without an error
      if (!TERMINAL_STATES.has(this.state)) this.setState('aborted', 'Aborted');
    }
  }

  /** Record goes out at stimulus onset with period (0, trialDuration) */
  private async *presentFixed(
    presentation: FixedPresentation<P>,
    trial: TrialContext<P>
  ): AsyncGenerator<TrialRecord, TrialRecord, undefined> {
    const { config } = trial;
    try {
      await presentation.prepare?.(trial, this.io);
      presentation.reveal?.(trial, this.io);
      this.context.presenter.cue(trial.classSpec.label);

      const record = this.buildRecord(trial, {
        period: [0, config.trialDuration],
        completion: 'normal',
        responder: null,
        responseTime: null,
      });
      yield record;
      await this.sleep(config.trialDuration);
      return record;
    } finally {
      presentation.conceal?.(trial, this.io);
    }
  }

  /** Record goes out after the window with period (-elapsed, 0) */
  private async *presentRace(
    presentation: RacePresentation<P>,
    trial: TrialContext<P>
  ): AsyncGenerator<TrialRecord, TrialRecord, undefined> {
    const { now } = this.context;
    this.context.presenter.cue(trial.classSpec.label);

    const startedAt = now();
    const outcome = await presentation.respond(trial, this.io, seconds(trial.config.trialDuration));
    const elapsed = (now() - startedAt) / 1000;

    const record = this.buildRecord(trial, {
      period: [-elapsed, 0],
      completion: outcome.completion,
      responder: outcome.responder,
      responseTime: outcome.completion === 'normal' ? elapsed : null,
    });
    yield record;
    return record;
  }

  private async deliverFeedback(record: TrialRecord, config: RunConfig<P>): Promise<void> {
    const strategy = this.paradigm.feedback;
    if (!strategy || !isFrequencyTagged(record)) return;

    await this.sleep(strategy.settle);
    const result = await FeedbackCorrelator.correlate(
      record,
      this.context.inbox.decodes,
      seconds(config.feedbackWindow),
      { abortSignal: this.context.abortSignal }
    );
    this.feedbackResults.push(result);
    if (this.onFeedback) this.onFeedback(result);

    if (result.status === 'judged') {
      if (result.observedClassIndex >= 0) {
        this.context.presenter.highlight(result.observedClassIndex);
      }
      await this.sleep(strategy.display);
    }
  }

  // ===========================================================================
  // HELPERS
  // ===========================================================================

  private buildRecord(
    trial: TrialContext<P>,
    window: TrialWindow
  ): TrialRecord {
    return deepFreeze({
      trialIndex: trial.index,
      classIndex: trial.classIndex,
      label: trial.classSpec.label,
      value: window.completion === 'timeout' ? TIMEOUT_VALUE : trial.classSpec.label,
      completion: window.completion,
      period: window.period,
      payload: this.paradigm.trigger(trial, window),
    });
  }

  private sleep(durationSeconds: number): Promise<void> {
    return delay(seconds(durationSeconds), this.context.abortSignal);
  }

  private setState(state: RunState, label: string): void {
    this.state = state;
    this.label = label;
    this.emitStateUpdate();
  }

  private emitStateUpdate(): void {
    if (this.onStateUpdate) this.onStateUpdate(this.getStatus());
  }
}
