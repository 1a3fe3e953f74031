import { describe, expect, it } from 'vitest';
import { RunStatistics } from '@/lib/statistics';
import type { FeedbackResult, TrialRecord } from '@/types';

function reaction(trialIndex: number, label: string, responseTime: number | null): TrialRecord {
  const timedOut = responseTime === null;
  return {
    trialIndex,
    classIndex: 0,
    label,
    value: timedOut ? 'TIMEOUT' : label,
    completion: timedOut ? 'timeout' : 'normal',
    period: [-(responseTime ?? 4), 0],
    payload: { kind: 'reaction', responder: timedOut ? null : label, responseTime },
  };
}

describe('RunStatistics.summarize', () => {
  it('summarizes response times over completed trials only', () => {
    const summary = RunStatistics.summarize([
      reaction(0, 'CENTER', 0.5),
      reaction(1, 'UP', null),
      reaction(2, 'CENTER', 0.7),
    ]);

    expect(summary.trials).toBe(3);
    expect(summary.timeouts).toBe(1);
    expect(summary.perClass).toEqual({ CENTER: 2, UP: 1 });
    expect(summary.responseTime?.mean).toBeCloseTo(0.6, 10);
    expect(summary.responseTime?.median).toBeCloseTo(0.6, 10);
    expect(summary.responseTime?.deviation).toBeCloseTo(Math.SQRT2 / 10, 10);
  });

  it('has no deviation for a single response', () => {
    const summary = RunStatistics.summarize([reaction(0, 'CENTER', 0.25)]);
    expect(summary.responseTime).toEqual({ mean: 0.25, median: 0.25, deviation: null });
  });

  it('has no response times for stimulus runs', () => {
    const summary = RunStatistics.summarize([{
      trialIndex: 0,
      classIndex: 1,
      label: 'RIGHT',
      value: 'RIGHT',
      completion: 'normal',
      period: [0, 4],
      payload: { kind: 'ssaep', freqs: [9, 13], target: 1 },
    }]);
    expect(summary.responseTime).toBeNull();
    expect(summary.perClass).toEqual({ RIGHT: 1 });
  });

  it('scores feedback accuracy over judged trials', () => {
    const feedback: FeedbackResult[] = [
      { status: 'judged', trialIndex: 0, matched: true, observedClassIndex: 0, observedFrequency: 10 },
      { status: 'judged', trialIndex: 1, matched: false, observedClassIndex: 0, observedFrequency: 10 },
      { status: 'timeout', trialIndex: 2 },
    ];
    expect(RunStatistics.summarize([], feedback).feedback).toEqual({
      judged: 2, matched: 1, missing: 1, accuracy: 0.5,
    });
  });

  it('leaves accuracy empty without judgments', () => {
    expect(RunStatistics.summarize([]).feedback).toEqual({ judged: 0, matched: 0, missing: 0, accuracy: null });
  });
});

describe('RunStatistics.describe', () => {
  it('lists counts and classes in label order', () => {
    const summary = RunStatistics.summarize([reaction(0, 'UP', 0.5), reaction(1, 'DOWN', null)]);
    expect(RunStatistics.describe(summary)).toEqual([
      '2 trial(s), 1 timeout(s)',
      'Per class: DOWN=1, UP=1',
      'Response time: mean 0.500 s, median 0.500 s, sd n/a',
    ]);
  });
});
