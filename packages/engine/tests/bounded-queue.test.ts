import { describe, expect, it } from 'vitest';
import { BoundedQueue, pump } from '../src/index.js';

describe('BoundedQueue', () => {
  it('holds producers back while full', async () => {
    const queue = new BoundedQueue<number>(1);
    await queue.push(1);

    let secondQueued = false;
    const second = queue.push(2).then(() => {
      secondQueued = true;
    });
    await Promise.resolve();
    expect(secondQueued).toBe(false);

    const iterator = queue[Symbol.asyncIterator]();
    expect(await iterator.next()).toEqual({ value: 1, done: false });
    await second;
    expect(secondQueued).toBe(true);

    queue.close();
    expect(await iterator.next()).toEqual({ value: 2, done: false });
    expect(await iterator.next()).toEqual({ value: undefined, done: true });
  });

  it('delivers queued items before the producer error', async () => {
    async function* failing() {
      yield 1;
      throw new Error('page read failed');
    }
    const queue = new BoundedQueue<number>(2);
    const producing = pump(failing(), queue);
    const seen: number[] = [];

    await expect(
      (async () => {
        for await (const n of queue) seen.push(n);
      })()
    ).rejects.toThrow('page read failed');
    await producing;
    expect(seen).toEqual([1]);
  });

  it('stops the producer when the consumer cancels', async () => {
    let closed = false;
    async function* endless() {
      try {
        let i = 0;
        while (true) yield i++;
      } finally {
        closed = true;
      }
    }
    const queue = new BoundedQueue<number>(1);
    const producing = pump(endless(), queue);
    const seen: number[] = [];

    for await (const n of queue) {
      seen.push(n);
      if (seen.length === 2) break;
    }
    queue.cancel();
    await producing;

    expect(seen).toEqual([0, 1]);
    expect(closed).toBe(true);
  });

  it('requires a positive capacity', () => {
    expect(() => new BoundedQueue(0)).toThrow('BoundedQueue capacity must be >= 1 (got 0)');
  });
});
