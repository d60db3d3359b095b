/**
 * WorkerPool
 *
 * Fixed number of concurrent task slots fed from a FIFO queue. Tasks start in
 * submission order. onIdle() is the barrier callers join when they need every
 * submitted task to have finished, bounded by a timeout so a stuck task cannot
 * hold the caller forever.
 */

import { describeError } from '../utils/errors';
import { logger } from '../config/logger';

export type Task = () => Promise<void>;

export class WorkerPool {
  private readonly pending: Task[] = [];
  private readonly idleWaiters = new Set<() => void>();
  private active = 0;

  constructor(readonly concurrency: number) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new RangeError(`WorkerPool concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.pending.length;
  }

  get isIdle(): boolean {
    return this.active === 0 && this.pending.length === 0;
  }

  submit(task: Task): void {
    this.pending.push(task);
    this.pump();
  }

  /**
   * @returns true once everything submitted has settled, false if the timeout fired first
   */
  onIdle(timeoutMs: number): Promise<boolean> {
    if (this.isIdle) {
      return Promise.resolve(true);
    }

    return new Promise<boolean>((resolve) => {
      const waiter = () => {
        clearTimeout(timer);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.idleWaiters.delete(waiter);
        resolve(false);
      }, timeoutMs);
      this.idleWaiters.add(waiter);
    });
  }

  private pump(): void {
    while (this.active < this.concurrency) {
      const task = this.pending.shift();
      if (!task) {
        break;
      }
      this.active++;
      void this.run(task);
    }
  }

  private async run(task: Task): Promise<void> {
    try {
      await task();
    } catch (error) {
      logger.error('WorkerPool: Task failed', { error: describeError(error) });
    } finally {
      this.active--;
      this.pump();
      if (this.isIdle) {
        this.notifyIdle();
      }
    }
  }

  private notifyIdle(): void {
    const waiters = [...this.idleWaiters];
    this.idleWaiters.clear();
    for (const waiter of waiters) {
      waiter();
    }
  }
}
