import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { PassThrough } from 'node:stream';
import { ConsoleApp, formatPresentation, formatStatus, parseCommand } from '@/views/ConsoleApp';
import { Presenter } from '@/lib/presenter';

describe('parseCommand', () => {
  it('reads presses, upper-casing the control', () => {
    expect(parseCommand('press center')).toEqual({ type: 'press', control: 'CENTER' });
    expect(parseCommand('  p   UP ')).toEqual({ type: 'press', control: 'UP' });
    expect(parseCommand('press')).toEqual({ type: 'invalid', reason: 'press takes one control name' });
  });

  it('reads decoded classes, with none clearing the class', () => {
    expect(parseCommand('class GO')).toEqual({ type: 'class', label: 'GO' });
    expect(parseCommand('class None')).toEqual({ type: 'class', label: null });
  });

  it('reads decodes as frequency and score pairs', () => {
    expect(parseCommand('decode 10=0.1 12.5=0.9')).toEqual({
      type: 'decode',
      message: { freqs: [10, 12.5], scores: [0.1, 0.9] },
    });
    expect(parseCommand('decode 10=')).toEqual({ type: 'invalid', reason: 'cannot read "10=" as <Hz>=<score>' });
    expect(parseCommand('decode 10=1=2')).toEqual({ type: 'invalid', reason: 'cannot read "10=1=2" as <Hz>=<score>' });
    expect(parseCommand('decode')).toEqual({ type: 'invalid', reason: 'decode needs at least one <Hz>=<score> pair' });
  });

  it('reads the remaining verbs', () => {
    expect(parseCommand('quit')).toEqual({ type: 'cancel' });
    expect(parseCommand('STATUS')).toEqual({ type: 'status' });
    expect(parseCommand('?')).toEqual({ type: 'help' });
    expect(parseCommand('jump')).toEqual({ type: 'invalid', reason: 'unknown command "jump"' });
    expect(parseCommand('   ')).toBeNull();
  });
});

describe('formatStatus', () => {
  it('adds progress once the run has trials', () => {
    const status = { runId: null, state: 'iti' as const, label: 'Trial 2 / 4: Intertrial Interval', completedTrials: 1, totalTrials: 4 };
    expect(formatStatus(status)).toBe('Trial 2 / 4: Intertrial Interval [1/4]');
    expect(formatStatus({ ...status, state: 'idle', label: 'Idle', totalTrials: 0 })).toBe('Idle');
  });
});

describe('formatPresentation', () => {
  it('prefers the banner, then the cue and visible stimuli', () => {
    const idle = Presenter.idleState();
    const stimulus = { kind: 'checkerboard' as const, periodMs: 100, size: 200, border: 0, visible: true };

    expect(formatPresentation(idle)).toBe('...');
    expect(formatPresentation({ ...idle, banner: 'Starting Trial 1 / 4' })).toBe('Starting Trial 1 / 4');
    expect(formatPresentation({
      ...idle,
      cue: 'Class 2',
      presented: true,
      stimuli: [stimulus, { ...stimulus, visible: false }],
    })).toBe('Class 2 (1 stimulus/stimuli on)');
  });
});

describe('ConsoleApp', () => {
  beforeEach(() => {
    vi.useFakeTimers();
    vi.spyOn(console, 'info').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
  });

  afterEach(() => {
    vi.useRealTimers();
    vi.restoreAllMocks();
  });

  it('writes records as JSON lines and reports the summary', async () => {
    const input = new PassThrough();
    const output = new PassThrough();
    const log = new PassThrough();
    const app = new ConsoleApp('reaction', { input, output, log });

    const running = app.run({
      trialsPerClass: 1,
      trialDuration: 1,
      itiMin: 0.5,
      itiMax: 0.5,
      preRunDuration: 0.5,
      postRunDuration: 0,
    });
    await vi.advanceTimersByTimeAsync(1200);
    input.write('press center\n');
    await vi.advanceTimersByTimeAsync(100);
    const outcome = await running;

    expect(outcome.status).toBe('completed');
    const lines = String(output.read()).trim().split('\n');
    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0])).toMatchObject({
      label: 'CENTER',
      value: 'CENTER',
      completion: 'normal',
      payload: { kind: 'reaction', responder: 'CENTER' },
    });

    const logged = String(log.read()).split('\n');
    expect(logged[0]).toBe('Reaction Time Task: 1 class(es), 1 trial(s), ~0:00:02');
    expect(logged).toContain('Settings locked');
    expect(logged).toContain('>> CENTER enabled');
    expect(logged).toContain('1 trial(s), 0 timeout(s)');
    expect(logged).toContain('Settings unlocked');
  });
});
