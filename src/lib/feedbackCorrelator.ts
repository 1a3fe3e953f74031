/**
 * Feedback Correlator
 * Matches the next classifier decode against the target of the trial that
 * just ended. Judgments are informational; they never steer trial selection.
 */

import * as d3 from 'd3';
import type { DecodeMessage, FeedbackResult, FrequencyTaggedPayload, TrialPayload, TrialRecord } from '@/types';
import type { Mailbox } from './mailbox';

export interface CorrelateOptions {
  abortSignal?: AbortSignal;
}

export function isFrequencyTagged(
  record: TrialRecord
): record is TrialRecord<FrequencyTaggedPayload> {
  const payload: TrialPayload = record.payload;
  return payload.kind === 'ssaep' || payload.kind === 'ssvep';
}

/** Frequencies are compared by whole-millisecond period, the unit stimuli are scheduled in */
export function periodOf(frequency: number): number {
  return Math.round(1000 / frequency);
}

export class FeedbackCorrelator {
  static async correlate(
    record: TrialRecord<FrequencyTaggedPayload>,
    inbox: Mailbox<DecodeMessage>,
    windowMs: number,
    options: CorrelateOptions = {}
  ): Promise<FeedbackResult> {
    const taken = await inbox.take(windowMs, options.abortSignal);
    if (taken.status === 'timeout') {
      console.info(`Feedback requested for trial ${record.trialIndex + 1}, but no decode received`);
      return { status: 'timeout', trialIndex: record.trialIndex };
    }
    return FeedbackCorrelator.judge(record, taken.message);
  }

  static judge(record: TrialRecord<FrequencyTaggedPayload>, decode: DecodeMessage): FeedbackResult {
    const { freqs, target } = record.payload;
    const focusIndex = decode.scores.length === decode.freqs.length ? d3.maxIndex(decode.scores) : -1;

    if (focusIndex < 0) {
      console.warn(
        `Unusable decode for trial ${record.trialIndex + 1}: ` +
        `${decode.scores.length} score(s) for ${decode.freqs.length} frequency(ies)`
      );
      return {
        status: 'judged',
        trialIndex: record.trialIndex,
        matched: false,
        observedClassIndex: -1,
        observedFrequency: null,
      };
    }

    const observedFrequency = decode.freqs[focusIndex];
    const observedPeriod = periodOf(observedFrequency);
    const matched = observedPeriod === periodOf(freqs[target]);
    const observedClassIndex = freqs.findIndex(f => periodOf(f) === observedPeriod);

    console.info(
      `Trial ${record.trialIndex + 1} (${record.label}): decoded ${observedFrequency.toFixed(2)} Hz, ` +
      `${matched ? 'correct' : 'incorrect'}`
    );

    return {
      status: 'judged',
      trialIndex: record.trialIndex,
      matched,
      observedClassIndex,
      observedFrequency,
    };
  }
}
