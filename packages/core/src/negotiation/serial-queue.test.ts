import { describe, expect, it } from 'vitest';
import { SerialQueue } from './serial-queue.js';

function defer(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('SerialQueue', () => {
  it('runs tasks in submission order without overlap', async () => {
    const queue = new SerialQueue();
    const log: string[] = [];
    const gate = defer();

    const first = queue.run(async () => {
      log.push('first:start');
      await gate.promise;
      log.push('first:end');
    });
    const second = queue.run(() => {
      log.push('second');
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);

    gate.resolve();
    await Promise.all([first, second]);
    expect(log).toEqual(['first:start', 'first:end', 'second']);
  });

  it('returns the task result', async () => {
    const queue = new SerialQueue();
    await expect(queue.run(() => 42)).resolves.toBe(42);
  });

  it('keeps going after a failing task', async () => {
    const queue = new SerialQueue();
    const failed = queue.run(() => {
      throw new Error('boom');
    });
    const next = queue.run(() => 'ok');

    await expect(failed).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('tracks pending tasks and drains to idle', async () => {
    const queue = new SerialQueue();
    const gate = defer();
    void queue.run(() => gate.promise);
    void queue.run(() => undefined);
    expect(queue.size).toBe(2);

    gate.resolve();
    await queue.idle();
    expect(queue.size).toBe(0);
  });
});
