/**
 * Reaction Time Task (RXN)
 *
 * CENTER trials end on a CENTER press or on the decoder switching to the
 * configured decode class, whichever comes first. Center-out trials need a
 * CENTER, direction, CENTER press sequence, all inside one deadline.
 */

import { z } from 'zod';
import type { Paradigm, ResponseOutcome, TrialContext, TrialIO } from '@/types';
import { EventRace } from '@/lib/eventRace';
import { isCancellation } from '@/lib/errors';

export const CENTER = 'CENTER';
export const DIRECTIONS = ['UP', 'DOWN', 'LEFT', 'RIGHT'] as const;

/** Responder reported when the decoder, not a button, completed the trial */
export const DECODE_RESPONDER = 'decode';

export const reactionParamsSchema = z.object({
  centerOut: z.boolean().default(false),
  decodeClass: z.string().min(1).default('GO'),
});

export type ReactionParams = z.infer<typeof reactionParamsSchema>;

async function centerTrial(io: TrialIO, timeoutMs: number): Promise<ResponseOutcome> {
  const button = io.inbox.action(CENTER);
  const decode = io.inbox.decodeMatch;
  button.clear();
  decode.clear();
  io.controls.setEnabled(CENTER, true);
  try {
    const result = await EventRace.race([button, decode], timeoutMs, {
      abortSignal: io.abortSignal,
      now: io.now,
    });
    if (result.outcome === 'timeout') return { completion: 'timeout', responder: null };
    return { completion: 'normal', responder: result.winner === 0 ? CENTER : DECODE_RESPONDER };
  } catch (error) {
    if (isCancellation(error)) console.debug('center trial cancelled');
    throw error;
  } finally {
    io.controls.setEnabled(CENTER, false);
  }
}

async function directionTrial(io: TrialIO, direction: string, timeoutMs: number): Promise<ResponseOutcome> {
  const deadline = io.now() + timeoutMs;
  try {
    for (const control of [CENTER, direction, CENTER]) {
      const signal = io.inbox.action(control);
      signal.clear();
      io.controls.setEnabled(control, true);
      const result = await EventRace.race([signal], deadline - io.now(), {
        abortSignal: io.abortSignal,
        now: io.now,
      });
      io.controls.setEnabled(control, false);
      if (result.outcome === 'timeout') return { completion: 'timeout', responder: null };
    }
    return { completion: 'normal', responder: direction };
  } catch (error) {
    if (isCancellation(error)) console.debug(`${direction} trial cancelled`);
    throw error;
  } finally {
    io.controls.setEnabled(CENTER, false);
    io.controls.setEnabled(direction, false);
  }
}

export const reactionParadigm: Paradigm<ReactionParams> = {
  slug: 'RXN',
  title: 'Reaction Time Task',
  paramsSchema: reactionParamsSchema,
  defaults: {
    trialsPerClass: 10,
    trialDuration: 4.0,
    itiMin: 1.0,
    itiMax: 2.0,
    preRunDuration: 3,
    postRunDuration: 3,
  },

  classes(config) {
    const labels = config.params.centerOut ? [...DIRECTIONS] : [CENTER];
    return labels.map(label => ({ label, frequencies: [] }));
  },

  decodeMatchClass(config) {
    return config.params.decodeClass;
  },

  presentation: {
    kind: 'race',
    respond(trial: TrialContext<ReactionParams>, io: TrialIO, timeoutMs: number) {
      const { label } = trial.classSpec;
      return label === CENTER ? centerTrial(io, timeoutMs) : directionTrial(io, label, timeoutMs);
    },
  },

  trigger(_trial, window) {
    return { kind: 'reaction', responder: window.responder, responseTime: window.responseTime };
  },
};
