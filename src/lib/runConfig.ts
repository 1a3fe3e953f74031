/**
 * Run configuration
 *
 * Paradigm presets supply defaults, operator overrides are merged on top, and
 * the result is validated before a run may begin. A validated config is
 * deep-frozen: nothing downstream can change it mid-run.
 */

import { readFileSync } from 'node:fs';
import { z } from 'zod';
import type { RunConfig, RunConfigInput } from '@/types';
import { InvalidConfigurationError, describeError } from './errors';
import { deepFreeze } from './immutable';

// =============================================================================
// SCHEMAS
// =============================================================================

const baseFields = z.object({
  trialsPerClass: z.number().int().min(1),
  trialDuration: z.number().positive(),
  itiMin: z.number().min(0),
  itiMax: z.number().min(0),
  preRunDuration: z.number().min(0),
  postRunDuration: z.number().min(0),
  feedback: z.boolean(),
  feedbackWindow: z.number().positive(),
  multiclass: z.boolean(),
  seed: z.number().int().optional(),
});

const baseRunSchema = baseFields.superRefine((config, ctx) => {
  if (config.itiMax < config.itiMin) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['itiMax'],
      message: `must be at least itiMin (${config.itiMin})`,
    });
  }
});

/** Shape of a partial configuration as read from a preset or a JSON file */
export const runConfigInputSchema = baseFields.partial().extend({
  params: z.record(z.unknown()).optional(),
});

/** Applied beneath every paradigm preset */
export const BASE_DEFAULTS: RunConfigInput = {
  feedback: false,
  feedbackWindow: 2.0,
  multiclass: false,
};

// =============================================================================
// MERGING & PARSING
// =============================================================================

/** Shallow merge; params are merged one level deeper */
export function mergeConfigInput(...layers: RunConfigInput[]): RunConfigInput {
  let merged: RunConfigInput = {};
  for (const layer of layers) {
    merged = {
      ...merged,
      ...layer,
      params: { ...merged.params, ...layer.params },
    };
  }
  return merged;
}

export function formatIssues(error: z.ZodError, prefix = ''): string[] {
  return error.issues.map(issue => {
    const path = prefix + issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}

/** Validates an untrusted value (typically parsed JSON) as a partial configuration */
export function readConfigInput(value: unknown): RunConfigInput {
  const result = runConfigInputSchema.safeParse(value);
  if (!result.success) throw new InvalidConfigurationError(formatIssues(result.error));
  return result.data;
}

/** Reads overrides from a JSON file; an unreadable or malformed file is a configuration error */
export function readConfigFile(path: string): RunConfigInput {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf8'));
  } catch (error) {
    throw new InvalidConfigurationError([`${path}: ${describeError(error)}`]);
  }
  return readConfigInput(parsed);
}

/**
 * Validates a merged configuration. Every failing field is reported at once,
 * base fields and paradigm params alike.
 */
export function parseRunConfig<P>(
  input: RunConfigInput,
  paramsSchema: z.ZodType<P, z.ZodTypeDef, unknown>
): RunConfig<P> {
  const { params, ...base } = input;
  const baseResult = baseRunSchema.safeParse(base);
  const paramsResult = paramsSchema.safeParse(params ?? {});

  const issues: string[] = [];
  if (!baseResult.success) issues.push(...formatIssues(baseResult.error));
  if (!paramsResult.success) issues.push(...formatIssues(paramsResult.error, 'params.'));

  if (!baseResult.success || !paramsResult.success) {
    throw new InvalidConfigurationError(issues);
  }
  return deepFreeze({ ...baseResult.data, params: paramsResult.data });
}
