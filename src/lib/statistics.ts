/**
 * Run Statistics
 * Post-run summary of emitted records and feedback judgments.
 *
 * Response times only exist for racing paradigms and only for trials that
 * completed; timeouts are counted separately and never enter the averages.
 */

import * as d3 from 'd3';
import type { FeedbackResult, RunSummary, TrialRecord } from '@/types';

export class RunStatistics {

  static summarize(records: readonly TrialRecord[], feedback: readonly FeedbackResult[] = []): RunSummary {
    const perClass = d3.rollup(records, group => group.length, record => record.label);

    return {
      trials: records.length,
      timeouts: records.filter(record => record.completion === 'timeout').length,
      perClass: Object.fromEntries(perClass),
      responseTime: this.responseTimes(records),
      feedback: this.feedbackAccuracy(feedback),
    };
  }

  // ===========================================================================
  // RESPONSE TIMES
  // ===========================================================================

  static responseTimes(records: readonly TrialRecord[]): RunSummary['responseTime'] {
    const times: number[] = [];
    for (const { payload } of records) {
      if (payload.kind === 'reaction' && payload.responseTime !== null) {
        times.push(payload.responseTime);
      }
    }

    const mean = d3.mean(times);
    const median = d3.median(times);
    if (mean === undefined || median === undefined) return null;

    // Sample deviation needs two observations
    return { mean, median, deviation: d3.deviation(times) ?? null };
  }

  // ===========================================================================
  // FEEDBACK
  // ===========================================================================

  static feedbackAccuracy(feedback: readonly FeedbackResult[]): RunSummary['feedback'] {
    let judged = 0;
    let matched = 0;
    let missing = 0;
    for (const result of feedback) {
      if (result.status === 'timeout') {
        missing++;
        continue;
      }
      judged++;
      if (result.matched) matched++;
    }
    return { judged, matched, missing, accuracy: judged > 0 ? matched / judged : null };
  }

  /** Human-readable lines for a console or log */
  static describe(summary: RunSummary): string[] {
    const lines = [`${summary.trials} trial(s), ${summary.timeouts} timeout(s)`];

    const classes = Object.entries(summary.perClass)
      .sort(([a], [b]) => d3.ascending(a, b))
      .map(([label, count]) => `${label}=${count}`);
    if (classes.length > 0) lines.push(`Per class: ${classes.join(', ')}`);

    if (summary.responseTime) {
      const { mean, median, deviation } = summary.responseTime;
      const sd = deviation === null ? 'n/a' : `${deviation.toFixed(3)} s`;
      lines.push(`Response time: mean ${mean.toFixed(3)} s, median ${median.toFixed(3)} s, sd ${sd}`);
    }

    const { judged, matched, missing, accuracy } = summary.feedback;
    if (judged > 0 || missing > 0) {
      const pct = accuracy === null ? 'n/a' : `${(accuracy * 100).toFixed(1)}%`;
      lines.push(`Feedback: ${matched} / ${judged} correct (${pct}), ${missing} without decode`);
    }
    return lines;
  }
}
