import { afterEach, describe, expect, it, vi } from 'vitest';
import { ControlGate } from '@/lib/controlGate';

function makeSurface() {
  const calls: boolean[] = [];
  return { calls, surface: { setEnabled: (enabled: boolean) => calls.push(enabled) } };
}

describe('ControlGate', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('disables the surface for the body and restores it afterwards', async () => {
    const { calls, surface } = makeSurface();
    const reset = vi.fn();
    const gate = new ControlGate(surface, reset);

    const result = await gate.run(async () => {
      expect(calls).toEqual([false]);
      return 'done';
    });

    expect(result).toBe('done');
    expect(calls).toEqual([false, true]);
    expect(reset).toHaveBeenCalledTimes(1);
  });

  it('tears down when the body throws and passes the error on', async () => {
    const { calls, surface } = makeSurface();
    const reset = vi.fn();
    const gate = new ControlGate(surface, reset);

    await expect(gate.run(async () => {
      throw new Error('trial exploded');
    })).rejects.toThrow('trial exploded');

    expect(calls).toEqual([false, true]);
    expect(reset).toHaveBeenCalledTimes(1);
  });

  it('runs teardown at most once', () => {
    const { calls, surface } = makeSurface();
    const reset = vi.fn();
    const gate = new ControlGate(surface, reset);

    gate.acquire();
    gate.release();
    gate.release();

    expect(calls).toEqual([false, true]);
    expect(reset).toHaveBeenCalledTimes(1);
  });

  it('re-enables the surface even when the presentation reset fails', async () => {
    const errorLog = vi.spyOn(console, 'error').mockImplementation(() => {});
    const { calls, surface } = makeSurface();
    const gate = new ControlGate(surface, () => {
      throw new Error('renderer gone');
    });

    await expect(gate.run(async () => {
      throw new Error('body failure');
    })).rejects.toThrow('body failure');

    expect(calls).toEqual([false, true]);
    expect(errorLog).toHaveBeenCalledTimes(1);
  });
});
