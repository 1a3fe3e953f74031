/**
 * Visual Steady-State Task (SSVEP)
 *
 * Flickering (or rotating) stimuli, one per class. Stimuli are scheduled in
 * whole milliseconds, so every frequency is snapped to the nearest frequency
 * whose reversal period is an integer number of ms before the run starts.
 */

import { z } from 'zod';
import type { Paradigm, StimulusDescriptor, SsvepStimulusType, TrialContext } from '@/types';
import { periodOf } from '@/lib/feedbackCorrelator';

const MAX_FREQUENCY = 60;
const TARGET_BORDER = 3;

const frequency = z.number().min(0).max(MAX_FREQUENCY);

const classEntrySchema = z.object({
  label: z.string().min(1).optional(),
  frequency,
  baseFrequency: frequency.optional(),
});

export interface SsvepClass {
  label: string;
  frequency: number;
  /** Second component for intermodulation stimuli, null otherwise */
  baseFrequency: number | null;
}

/** Nearest frequency with a whole-millisecond period */
export function snapFrequency(hz: number): number {
  return 1000 / periodOf(hz);
}

function snapWithWarning(hz: number, name: string): number {
  const snapped = snapFrequency(hz);
  if (snapped !== hz) {
    console.warn(`${name}: ${hz} Hz has no whole-millisecond period, using ${snapped.toFixed(2)} Hz`);
  }
  return snapped;
}

export const ssvepParamsSchema = z
  .object({
    classes: z.array(classEntrySchema).default([
      { frequency: 8 }, { frequency: 10 }, { frequency: 12.5 }, { frequency: 20 },
    ]),
    stimulusType: z.enum(['checkerboard', 'visual-motion', 'intermodulation']).default('checkerboard'),
    stimulusSize: z.number().int().min(10).default(200),
    /** Applied to every class of an intermodulation run when set */
    commonBaseFrequency: frequency.nullable().default(null),
    /** Seconds the staged target is shown before the flicker starts */
    focusCue: z.number().min(0).default(1.0),
  })
  .transform((params, ctx) => {
    const intermodulation = params.stimulusType === 'intermodulation';
    const classes: SsvepClass[] = [];
    const periods = new Map<number, string>();

    params.classes.forEach((entry, index) => {
      const label = entry.label ?? `Class ${index + 1}`;
      const base = intermodulation ? params.commonBaseFrequency ?? entry.baseFrequency ?? 0 : null;
      // Unset classes
      if (entry.frequency === 0 || base === 0) return;

      const snapped = snapWithWarning(entry.frequency, label);
      const period = periodOf(snapped);
      const clash = periods.get(period);
      if (clash !== undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['classes', index, 'frequency'],
          message: `${snapped.toFixed(2)} Hz is already used by ${clash}`,
        });
        return;
      }
      periods.set(period, label);
      classes.push({
        label,
        frequency: snapped,
        baseFrequency: base === null ? null : snapWithWarning(base, `${label} base`),
      });
    });

    if (classes.length === 0) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['classes'],
        message: intermodulation
          ? 'no usable class: every class needs a non-zero frequency and base frequency'
          : 'no usable class: every class needs a non-zero frequency',
      });
    }
    return { ...params, classes };
  });

export type SsvepParams = z.output<typeof ssvepParamsSchema>;

function buildStimulus(
  type: SsvepStimulusType,
  spec: SsvepClass,
  size: number,
  isTarget: boolean,
  visible: boolean
): StimulusDescriptor {
  const base = {
    periodMs: periodOf(spec.frequency),
    size,
    border: isTarget ? TARGET_BORDER : 0,
    visible,
  };
  if (type === 'intermodulation') {
    return { kind: 'intermodulation', periodMs2: periodOf(spec.baseFrequency ?? spec.frequency), ...base };
  }
  return { kind: type, ...base };
}

/** Every class is staged; only the target is visible unless the run is multiclass */
export function stageStimuli(trial: TrialContext<SsvepParams>): StimulusDescriptor[] {
  const { params, multiclass } = trial.config;
  return params.classes.map((spec, index) => {
    const isTarget = index === trial.classIndex;
    return buildStimulus(params.stimulusType, spec, params.stimulusSize, isTarget, multiclass || isTarget);
  });
}

export const ssvepParadigm: Paradigm<SsvepParams> = {
  slug: 'SSVEP',
  title: 'SSVEP Task',
  paramsSchema: ssvepParamsSchema,
  defaults: {
    trialsPerClass: 10,
    trialDuration: 4.0,
    itiMin: 1.0,
    itiMax: 2.0,
    preRunDuration: 3,
    postRunDuration: 3,
  },
  feedback: { settle: 0.5, display: 0.5 },

  classes(config) {
    return config.params.classes.map(spec => ({
      label: spec.label,
      frequencies: spec.baseFrequency === null ? [spec.frequency] : [spec.frequency, spec.baseFrequency],
    }));
  },

  presentation: {
    kind: 'fixed',
    onInterval(trial, io) {
      io.presenter.stage([]);
      io.presenter.announce(`Starting Trial ${trial.index + 1} / ${trial.total}`);
    },
    async prepare(trial, io) {
      io.presenter.announce(null);
      io.presenter.stage(stageStimuli(trial));
      await io.delay(trial.config.params.focusCue);
    },
    reveal(_trial, io) {
      io.presenter.reveal();
    },
    conceal(_trial, io) {
      io.presenter.conceal();
    },
  },

  trigger(trial) {
    const { classes, stimulusType } = trial.config.params;
    return {
      kind: 'ssvep',
      stimulusType,
      reversalPeriodMs: classes.map(spec => periodOf(spec.frequency)),
      freqs: classes.map(spec => spec.frequency),
      target: trial.classIndex,
    };
  },
};
