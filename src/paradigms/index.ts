/**
 * Paradigm registry
 */

import { TaskRunner } from '@/lib/taskRunner';
import type { RunController, RunnerCollaborators, RunnerOptions } from '@/lib/taskRunner';
import { reactionParadigm } from './reaction';
import { ssaepParadigm } from './ssaep';
import { ssvepParadigm } from './ssvep';

export const PARADIGMS = {
  reaction: reactionParadigm,
  ssaep: ssaepParadigm,
  ssvep: ssvepParadigm,
} as const;

export type ParadigmName = keyof typeof PARADIGMS;

export const PARADIGM_NAMES = Object.keys(PARADIGMS).filter(isParadigmName);

export function isParadigmName(name: string): name is ParadigmName {
  return Object.prototype.hasOwnProperty.call(PARADIGMS, name);
}

export function createRunner(
  name: ParadigmName,
  collaborators: RunnerCollaborators,
  options?: RunnerOptions
): RunController {
  switch (name) {
    case 'reaction':
      return new TaskRunner(reactionParadigm, collaborators, options);
    case 'ssaep':
      return new TaskRunner(ssaepParadigm, collaborators, options);
    case 'ssvep':
      return new TaskRunner(ssvepParadigm, collaborators, options);
  }
}
