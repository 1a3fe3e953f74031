import { describe, expect, it } from 'vitest';
import { TrialStream } from '@/lib/trialStream';
import { TriggerEmitter } from '@/lib/triggerEmitter';
import { CancelledError, SinkClosedError } from '@/lib/errors';
import type { TrialRecord, TrialSink } from '@/types';

function record(trialIndex: number): TrialRecord {
  return {
    trialIndex,
    classIndex: 0,
    label: 'LEFT',
    value: 'LEFT',
    completion: 'normal',
    period: [0, 4],
    payload: { kind: 'ssaep', freqs: [9, 13], target: 0 },
  };
}

/** Resolves once pending promise callbacks have run */
const settle = () => new Promise<void>(resolve => setTimeout(resolve, 0));

describe('TrialStream', () => {
  it('hands a record straight to a waiting reader', async () => {
    const stream = new TrialStream();
    const iterator = stream[Symbol.asyncIterator]();
    const reading = iterator.next();

    await stream.write(record(0));

    await expect(reading).resolves.toEqual({ value: record(0), done: false });
  });

  it('blocks writers while the buffer is full', async () => {
    const stream = new TrialStream(1);
    await stream.write(record(0));

    let admitted = false;
    const blocked = Promise.resolve(stream.write(record(1))).then(() => {
      admitted = true;
    });
    await settle();
    expect(admitted).toBe(false);

    const iterator = stream[Symbol.asyncIterator]();
    await expect(iterator.next()).resolves.toEqual({ value: record(0), done: false });
    await blocked;
    expect(admitted).toBe(true);
    await expect(iterator.next()).resolves.toEqual({ value: record(1), done: false });
  });

  it('drains buffered records before ending after close()', async () => {
    const stream = new TrialStream();
    await stream.write(record(0));
    await stream.write(record(1));
    stream.close();

    const seen: number[] = [];
    for await (const r of stream) seen.push(r.trialIndex);
    expect(seen).toEqual([0, 1]);
  });

  it('refuses writes once the reader stops early', async () => {
    const stream = new TrialStream(1);
    await stream.write(record(0));
    const admitted = stream.write(record(1));
    const blocked = stream.write(record(2)).catch((error: unknown) => error);

    for await (const r of stream) {
      expect(r.trialIndex).toBe(0);
      break;
    }

    await expect(admitted).resolves.toBeUndefined();
    expect(await blocked).toBeInstanceOf(SinkClosedError);
    await expect(stream.write(record(3))).rejects.toBeInstanceOf(SinkClosedError);
  });

  it('lets an aborted writer give up its place', async () => {
    const stream = new TrialStream(1);
    await stream.write(record(0));
    const controller = new AbortController();
    const blocked = stream.write(record(1), controller.signal);

    controller.abort();
    await expect(blocked).rejects.toBeInstanceOf(CancelledError);

    stream.close();
    const seen: number[] = [];
    for await (const r of stream) seen.push(r.trialIndex);
    expect(seen).toEqual([0]);
  });
});

describe('TriggerEmitter', () => {
  it('hands every record to the sink in order', async () => {
    const written: TrialRecord[] = [];
    const emitter = new TriggerEmitter({ write: r => { written.push(r); } });

    await emitter.emit(record(0));
    await emitter.emit(record(1));

    expect(written.map(r => r.trialIndex)).toEqual([0, 1]);
  });

  it('turns a sink failure into SinkClosedError', async () => {
    const cause = new Error('recorder offline');
    const sink: TrialSink = { write: async () => { throw cause; } };
    const emitter = new TriggerEmitter(sink);

    const failure = await emitter.emit(record(4)).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(SinkClosedError);
    expect(failure instanceof Error && failure.message).toBe('Trial sink rejected trial 5');
    expect(failure instanceof Error && failure.cause).toBe(cause);
  });

  it('passes cancellation through unchanged', async () => {
    const sink: TrialSink = { write: async () => { throw new CancelledError(); } };
    await expect(new TriggerEmitter(sink).emit(record(0))).rejects.toBeInstanceOf(CancelledError);
  });

  it('does not touch the sink once aborted', async () => {
    const written: TrialRecord[] = [];
    const emitter = new TriggerEmitter({ write: r => { written.push(r); } });
    const controller = new AbortController();
    controller.abort();

    await expect(emitter.emit(record(0), controller.signal)).rejects.toBeInstanceOf(CancelledError);
    expect(written).toEqual([]);
  });
});
