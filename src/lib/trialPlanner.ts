/**
 * Trial Planner
 * Block-randomized trial orders and run length estimates.
 *
 * Each block of |classes| consecutive trials holds every class exactly once;
 * blocks are shuffled independently, so the run is balanced but not i.i.d.
 */

import type { BaseRunConfig, Random, RunInfo, TrialOrder } from '@/types';
import { InvalidConfigurationError } from './errors';
import { formatDuration } from './timing';

export class TrialPlanner {
  static plan(classes: readonly unknown[], trialsPerClass: number, random: Random = Math.random): TrialOrder {
    const issues: string[] = [];
    if (classes.length === 0) issues.push('classes: at least one class is required');
    if (!Number.isInteger(trialsPerClass) || trialsPerClass < 0) {
      issues.push(`trialsPerClass: expected a non-negative integer, got ${trialsPerClass}`);
    }
    if (issues.length > 0) throw new InvalidConfigurationError(issues);

    const order: number[] = [];
    for (let block = 0; block < trialsPerClass; block++) {
      order.push(...TrialPlanner.shuffle(classes.map((_, index) => index), random));
    }
    return Object.freeze(order);
  }

  /** Fisher-Yates, in place */
  static shuffle<T>(items: T[], random: Random = Math.random): T[] {
    for (let i = items.length - 1; i > 0; i--) {
      const j = Math.floor(random() * (i + 1));
      [items[i], items[j]] = [items[j], items[i]];
    }
    return items;
  }

  static describeRun(config: Readonly<BaseRunConfig>, classCount: number): RunInfo {
    const trialCount = classCount * config.trialsPerClass;
    const averageIti = config.itiMin + (config.itiMax - config.itiMin) / 2;
    const durationSeconds =
      config.preRunDuration +
      (averageIti + config.trialDuration) * trialCount +
      config.postRunDuration;

    return {
      classCount,
      trialCount,
      durationSeconds,
      text: `${classCount} class(es), ${trialCount} trial(s), ~${formatDuration(durationSeconds)}`,
    };
  }
}
