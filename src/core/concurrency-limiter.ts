/**
 * Counting slot pool bounding how many tasks run at once.
 *
 * Acquisition is non-blocking: the dispatcher holds the waiting work in its
 * ready queue and retries whenever a slot is released or the pool grows.
 */

export const MIN_CONCURRENCY = 1;
export const MAX_CONCURRENCY = 20;

export function clampConcurrency(value: number): number {
  if (!Number.isFinite(value)) return MIN_CONCURRENCY;
  return Math.min(MAX_CONCURRENCY, Math.max(MIN_CONCURRENCY, Math.floor(value)));
}

export class ConcurrencyLimiter {
  private capacity: number;
  private held = 0;

  constructor(capacity: number) {
    this.capacity = clampConcurrency(capacity);
  }

  tryAcquire(): boolean {
    if (this.held >= this.capacity) {
      return false;
    }
    this.held++;
    return true;
  }

  release(): void {
    if (this.held > 0) {
      this.held--;
    }
  }

  /**
   * Change the capacity. Slots already held are kept when shrinking; new
   * acquisitions wait until the count drops below the new capacity.
   */
  resize(capacity: number): number {
    this.capacity = clampConcurrency(capacity);
    return this.capacity;
  }

  get limit(): number {
    return this.capacity;
  }

  get inUse(): number {
    return this.held;
  }
}
