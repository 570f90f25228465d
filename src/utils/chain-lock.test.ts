import { describe, it, expect } from 'vitest';
import { ChainLock } from './chain-lock.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve: () => void = () => {};
  const promise = new Promise<void>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}

describe('ChainLock', () => {
  it('runs tasks for one chain in order', async () => {
    const lock = new ChainLock();
    const order: string[] = [];
    const gate = deferred();

    const first = lock.run(1, async () => {
      await gate.promise;
      order.push('first');
    });
    const second = lock.run(1, async () => {
      order.push('second');
    });

    await Promise.resolve();
    expect(order).toEqual([]);
    gate.resolve();
    await Promise.all([first, second]);

    expect(order).toEqual(['first', 'second']);
  });

  it('lets other chains proceed while one is held', async () => {
    const lock = new ChainLock();
    const order: string[] = [];
    const gate = deferred();

    const slow = lock.run(1, async () => {
      await gate.promise;
      order.push('chain-1');
    });
    await lock.run(8453, async () => {
      order.push('chain-8453');
    });
    gate.resolve();
    await slow;

    expect(order).toEqual(['chain-8453', 'chain-1']);
  });

  it('keeps the queue alive after a failing task', async () => {
    const lock = new ChainLock();

    const failing = lock.run(1, async () => {
      throw new Error('boom');
    });
    const next = lock.run(1, async () => 'ok');

    await expect(failing).rejects.toThrow('boom');
    await expect(next).resolves.toBe('ok');
  });

  it('drains every queued task', async () => {
    const lock = new ChainLock();
    let done = 0;

    void lock.run(1, async () => {
      done += 1;
    });
    void lock.run(10, async () => {
      done += 1;
    });

    await lock.drain();
    expect(done).toBe(2);
  });
});
