/**
 * Call limiter tests.
 */

import { describe, it, expect } from 'vitest';
import { CallLimiter } from '../../src/utilities/call-limiter.js';
import { CancellationError } from '../../src/errors/index.js';

function deferred(): { promise: Promise<void>; resolve: () => void } {
  let resolve = () => {};
  const promise = new Promise<void>((r) => {
    resolve = () => r();
  });
  return { promise, resolve };
}

describe('CallLimiter', () => {
  it('should reject a non-positive bound', () => {
    expect(() => new CallLimiter(0)).toThrow(RangeError);
    expect(() => new CallLimiter(1.5)).toThrow(RangeError);
  });

  it('should grant slots up to the bound and queue the rest', async () => {
    const limiter = new CallLimiter(2);
    const first = await limiter.acquire();
    const second = await limiter.acquire();

    let thirdGranted = false;
    const third = limiter.acquire().then((release) => {
      thirdGranted = true;
      return release;
    });

    await Promise.resolve();
    expect(thirdGranted).toBe(false);
    expect(limiter.getStats()).toMatchObject({ active: 2, waiting: 1 });

    first();
    const releaseThird = await third;
    expect(thirdGranted).toBe(true);
    expect(limiter.getStats()).toMatchObject({ active: 2, waiting: 0, totalAcquires: 3, peakActive: 2 });

    second();
    releaseThird();
    expect(limiter.getStats().active).toBe(0);
  });

  it('should ignore a second release of the same slot', async () => {
    const limiter = new CallLimiter(1);
    const release = await limiter.acquire();
    release();
    release();

    expect(limiter.getStats().active).toBe(0);
  });

  it('should serve waiters in FIFO order', async () => {
    const limiter = new CallLimiter(1);
    const order: string[] = [];
    const gate = await limiter.acquire();

    const a = limiter.run(async () => { order.push('a'); });
    const b = limiter.run(async () => { order.push('b'); });
    gate();
    await Promise.all([a, b]);

    expect(order).toEqual(['a', 'b']);
  });

  it('should never exceed its bound under load', async () => {
    const limiter = new CallLimiter(3);
    const gates = Array.from({ length: 10 }, () => deferred());
    const runs = gates.map((gate) => limiter.run(() => gate.promise));

    await Promise.resolve();
    expect(limiter.getStats().active).toBe(3);

    for (const gate of gates) gate.resolve();
    await Promise.all(runs);

    expect(limiter.getStats()).toMatchObject({ active: 0, waiting: 0, totalAcquires: 10, peakActive: 3 });
  });

  it('should release the slot when the task throws', async () => {
    const limiter = new CallLimiter(1);

    await expect(limiter.run(async () => { throw new Error('boom'); })).rejects.toThrow('boom');
    expect(limiter.getStats().active).toBe(0);
  });

  it('should reject immediately when already aborted', async () => {
    const limiter = new CallLimiter(1);
    const controller = new AbortController();
    controller.abort();

    await expect(limiter.acquire(controller.signal)).rejects.toBeInstanceOf(CancellationError);
  });

  it('should drop a waiter whose signal aborts', async () => {
    const limiter = new CallLimiter(1);
    const held = await limiter.acquire();
    const controller = new AbortController();

    const waiting = limiter.acquire(controller.signal);
    controller.abort();

    await expect(waiting).rejects.toThrow('Cancelled while waiting for a model slot');
    expect(limiter.getStats().waiting).toBe(0);

    held();
    expect(limiter.getStats().active).toBe(0);
  });
});
