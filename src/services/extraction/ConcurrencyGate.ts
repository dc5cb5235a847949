import { logger } from '../../utils/logger.js';

export interface ConcurrencyStats {
  inFlight: number;
  queued: number;
  peak: number;
}

/**
 * Counting semaphore. `run` holds one slot for the lifetime of the task and hands
 * it straight to the next waiter on release, so the cap is a ceiling rather than
 * a batch size.
 */
export class ConcurrencyGate {
  private inFlight = 0;
  private peak = 0;
  private waiters: Array<() => void> = [];

  constructor(private readonly capacity: number) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${capacity}`);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getStats(): ConcurrencyStats {
    return { inFlight: this.inFlight, queued: this.waiters.length, peak: this.peak };
  }

  private acquire(): Promise<void> {
    if (this.inFlight < this.capacity) {
      this.take();
      return Promise.resolve();
    }
    logger.trace({ queued: this.waiters.length + 1, capacity: this.capacity }, 'Waiting for a concurrency slot');
    return new Promise<void>(resolve => {
      this.waiters.push(() => {
        this.take();
        resolve();
      });
    });
  }

  private take(): void {
    this.inFlight++;
    this.peak = Math.max(this.peak, this.inFlight);
  }

  private release(): void {
    this.inFlight--;
    const next = this.waiters.shift();
    if (next) next();
  }
}
