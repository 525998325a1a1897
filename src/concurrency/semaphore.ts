import { checkInvariants } from '../invariants/checker.js';

/**
 * Bounded in-process permit pool. Waiters are served in arrival order; a
 * released permit is handed straight to the next waiter.
 */
export class InMemorySemaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];
  private currentInFlight = 0;
  private peakInFlight = 0;

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be a positive integer');
    }
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  tryAcquire(): boolean {
    if (this.permits <= 0) {
      return false;
    }
    this.permits--;
    this.markAcquired();
    return true;
  }

  acquire(): Promise<void> {
    if (this.tryAcquire()) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    this.currentInFlight--;

    const next = this.waiting.shift();
    if (next) {
      this.markAcquired();
      next();
    } else {
      this.permits++;
    }

    this.check();
  }

  async withPermit<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  getInFlight(): number {
    return this.currentInFlight;
  }

  getPeak(): number {
    return this.peakInFlight;
  }

  getAvailable(): number {
    return this.permits;
  }

  getWaiting(): number {
    return this.waiting.length;
  }

  private markAcquired(): void {
    this.currentInFlight++;
    if (this.currentInFlight > this.peakInFlight) {
      this.peakInFlight = this.currentInFlight;
    }
    this.check();
  }

  private check(): void {
    checkInvariants({
      semaphorePermits: this.permits,
      semaphoreInFlight: this.currentInFlight,
      semaphoreMaxPermits: this.maxPermits,
    }, ['SEMAPHORE_PERMITS_NON_NEGATIVE', 'SEMAPHORE_IN_FLIGHT_MATCHES_ACQUIRED']);
  }
}
