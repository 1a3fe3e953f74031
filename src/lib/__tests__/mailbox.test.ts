import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { Mailbox } from '@/lib/mailbox';
import { CancelledError } from '@/lib/errors';

describe('Mailbox', () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it('hands over a queued message without waiting', async () => {
    const box = new Mailbox<string>('test');
    box.put('first');
    box.put('second');

    await expect(box.take(100)).resolves.toEqual({ status: 'received', message: 'first' });
    await expect(box.take(100)).resolves.toEqual({ status: 'received', message: 'second' });
  });

  it('delivers straight to a waiting consumer', async () => {
    const box = new Mailbox<string>('test');
    const taking = box.take(1000);
    await vi.advanceTimersByTimeAsync(250);
    box.put('late');

    await expect(taking).resolves.toEqual({ status: 'received', message: 'late' });
    expect(box.reset()).toBe(0);
    expect(vi.getTimerCount()).toBe(0);
  });

  it('times out as a value', async () => {
    const box = new Mailbox<string>('test');
    const taking = box.take(500);
    await vi.advanceTimersByTimeAsync(500);
    await expect(taking).resolves.toEqual({ status: 'timeout' });
  });

  it('keeps a message that arrives after a timeout for the next take', async () => {
    const box = new Mailbox<string>('test');
    const taking = box.take(500);
    await vi.advanceTimersByTimeAsync(500);
    await taking;

    box.put('stale');
    await expect(box.take(500)).resolves.toEqual({ status: 'received', message: 'stale' });
  });

  it('allows a single pending consumer', async () => {
    const box = new Mailbox<string>('test');
    const first = box.take(1000);
    await expect(box.take(1000)).rejects.toThrow('Mailbox test already has a pending consumer');
    box.put('x');
    await expect(first).resolves.toEqual({ status: 'received', message: 'x' });
  });

  it('reports how many messages reset() dropped', () => {
    const box = new Mailbox<number>('test');
    box.put(1);
    box.put(2);
    expect(box.reset()).toBe(2);
    expect(box.reset()).toBe(0);
  });

  it('rejects a pending take on abort', async () => {
    const box = new Mailbox<number>('test');
    const controller = new AbortController();
    const taking = box.take(1000, controller.signal);
    controller.abort();

    await expect(taking).rejects.toBeInstanceOf(CancelledError);
    expect(vi.getTimerCount()).toBe(0);

    // The slot is free again
    box.put(7);
    await expect(box.take(10)).resolves.toEqual({ status: 'received', message: 7 });
  });
});
