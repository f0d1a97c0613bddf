/**
 * Call Limiter
 *
 * Counting semaphore shared by every request in a batch. Bounds how many
 * model calls are in flight at once so concurrent requests stay inside the
 * provider's quota. Waiters are served in FIFO order.
 */

import { CancellationError } from '../errors/index.js';

export interface LimiterStats {
  maxConcurrent: number;
  active: number;
  waiting: number;
  totalAcquires: number;
  /** Highest number of simultaneously held slots seen so far */
  peakActive: number;
}

interface Waiter {
  resolve: (release: () => void) => void;
  reject: (err: Error) => void;
  signal?: AbortSignal;
  onAbort: () => void;
}

export class CallLimiter {
  private active = 0;
  private waitQueue: Waiter[] = [];
  private totalAcquires = 0;
  private peakActive = 0;

  constructor(private readonly maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`maxConcurrent must be a positive integer, got ${maxConcurrent}`);
    }
  }

  /**
   * Acquire a slot. Resolves with a release function; call it exactly once.
   * Rejects with CancellationError if the signal aborts while waiting.
   */
  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(new CancellationError('Cancelled while waiting for a model slot'));
    }

    if (this.active < this.maxConcurrent) {
      return Promise.resolve(this.grant());
    }

    return new Promise<() => void>((resolve, reject) => {
      const waiter: Waiter = {
        resolve,
        reject,
        signal,
        onAbort: () => {
          this.waitQueue = this.waitQueue.filter((w) => w !== waiter);
          reject(new CancellationError('Cancelled while waiting for a model slot'));
        },
      };
      signal?.addEventListener('abort', waiter.onAbort, { once: true });
      this.waitQueue.push(waiter);
    });
  }

  /**
   * Run `fn` while holding a slot.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  getStats(): LimiterStats {
    return {
      maxConcurrent: this.maxConcurrent,
      active: this.active,
      waiting: this.waitQueue.length,
      totalAcquires: this.totalAcquires,
      peakActive: this.peakActive,
    };
  }

  private grant(): () => void {
    this.active++;
    this.totalAcquires++;
    this.peakActive = Math.max(this.peakActive, this.active);

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.active--;
      this.dispatch();
    };
  }

  private dispatch(): void {
    const next = this.waitQueue.shift();
    if (!next) return;
    next.signal?.removeEventListener('abort', next.onAbort);
    next.resolve(this.grant());
  }
}
