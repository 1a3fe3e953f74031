/**
 * Auditory Steady-State Task (SSAEP)
 * Two amplitude-modulated tones, one per ear. The cue names the side to
 * attend; the tone pair plays for the whole trial window.
 */

import { z } from 'zod';
import type { Paradigm, StimulusDescriptor } from '@/types';

export const ssaepParamsSchema = z.object({
  leftCarrier: z.number().positive().default(450),
  leftModulation: z.number().positive().default(9),
  rightCarrier: z.number().positive().default(650),
  rightModulation: z.number().positive().default(13),
  sampleRate: z.number().int().positive().default(41000),
  /** Length of the synthesized loop in seconds */
  stimulusDuration: z.number().positive().default(10),
});

export type SsaepParams = z.infer<typeof ssaepParamsSchema>;

function toneDescriptor(params: SsaepParams): StimulusDescriptor {
  return {
    kind: 'auditory',
    leftCarrier: params.leftCarrier,
    leftModulation: params.leftModulation,
    rightCarrier: params.rightCarrier,
    rightModulation: params.rightModulation,
    sampleRate: params.sampleRate,
    duration: params.stimulusDuration,
  };
}

export const ssaepParadigm: Paradigm<SsaepParams> = {
  slug: 'SSAEP',
  title: 'SSAEP Task',
  paramsSchema: ssaepParamsSchema,
  defaults: {
    trialsPerClass: 10,
    trialDuration: 4.0,
    itiMin: 4.0,
    itiMax: 7.0,
    preRunDuration: 3,
    postRunDuration: 3,
  },
  feedback: { settle: 0.5, display: 0.5 },

  classes(config) {
    return [
      { label: 'LEFT', frequencies: [config.params.leftModulation] },
      { label: 'RIGHT', frequencies: [config.params.rightModulation] },
    ];
  },

  presentation: {
    kind: 'fixed',
    // Muted between trials; the loop restarts from zero on every reveal
    onInterval(trial, io) {
      io.presenter.stage([toneDescriptor(trial.config.params)]);
    },
    reveal(_trial, io) {
      io.presenter.reveal();
    },
    conceal(_trial, io) {
      io.presenter.conceal();
    },
  },

  trigger(trial) {
    return {
      kind: 'ssaep',
      freqs: trial.classes.map(spec => spec.frequencies[0]),
      target: trial.classIndex,
    };
  },
};
