import type { InvariantMonitor } from '../invariants/checker.js';

/**
 * Counting semaphore with a FIFO wait queue. With one permit it is the
 * orchestrator's coarse lock: every mutation that spans an await runs
 * inside runExclusive so no other mutation interleaves with it.
 */
export class InMemorySemaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waiting: Array<() => void> = [];
  private currentInFlight: number = 0;
  private peakInFlight: number = 0;

  constructor(maxPermits: number, private readonly invariants?: InvariantMonitor) {
    if (maxPermits <= 0) {
      throw new Error('Semaphore maxPermits must be > 0');
    }
    this.permits = maxPermits;
    this.maxPermits = maxPermits;
  }

  tryAcquire(): boolean {
    if (this.permits > 0) {
      this.permits--;
      this.markAcquired();
      return true;
    }
    return false;
  }

  acquire(): Promise<void> {
    if (this.tryAcquire()) {
      return Promise.resolve();
    }

    return new Promise<void>(resolve => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    if (this.currentInFlight === 0) {
      throw new Error('Semaphore released more times than acquired');
    }

    this.currentInFlight--;

    const next = this.waiting.shift();
    if (next) {
      // Hand the permit straight to the next waiter.
      this.markAcquired();
      next();
    } else {
      this.permits++;
      this.checkInvariants();
    }
  }

  async runExclusive<T>(fn: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await fn();
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
    this.checkInvariants();
  }

  private checkInvariants(): void {
    this.invariants?.check({
      semaphorePermits: this.permits,
      semaphoreInFlight: this.currentInFlight,
      semaphoreMaxPermits: this.maxPermits,
    }, ['LOCK_PERMITS_NON_NEGATIVE', 'LOCK_IN_FLIGHT_MATCHES_ACQUIRED']);
  }
}

export function createLock(invariants?: InvariantMonitor): InMemorySemaphore {
  return new InMemorySemaphore(1, invariants);
}
