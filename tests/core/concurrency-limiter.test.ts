import { describe, it, expect } from 'vitest';
import {
  ConcurrencyLimiter,
  clampConcurrency,
  MAX_CONCURRENCY,
  MIN_CONCURRENCY,
} from '../../src/core/concurrency-limiter.js';

describe('clampConcurrency', () => {
  it('should clamp into the allowed range', () => {
    expect(clampConcurrency(0)).toBe(MIN_CONCURRENCY);
    expect(clampConcurrency(-3)).toBe(1);
    expect(clampConcurrency(50)).toBe(MAX_CONCURRENCY);
    expect(clampConcurrency(7)).toBe(7);
  });

  it('should floor fractions and reject non-finite values', () => {
    expect(clampConcurrency(4.9)).toBe(4);
    expect(clampConcurrency(Number.NaN)).toBe(1);
    expect(clampConcurrency(Number.POSITIVE_INFINITY)).toBe(1);
  });
});

describe('ConcurrencyLimiter', () => {
  it('should hand out at most capacity slots', () => {
    const limiter = new ConcurrencyLimiter(2);

    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(true);
    expect(limiter.tryAcquire()).toBe(false);
    expect(limiter.inUse).toBe(2);

    limiter.release();
    expect(limiter.inUse).toBe(1);
    expect(limiter.tryAcquire()).toBe(true);
  });

  it('should not go below zero on extra releases', () => {
    const limiter = new ConcurrencyLimiter(1);
    limiter.release();
    expect(limiter.inUse).toBe(0);
    expect(limiter.tryAcquire()).toBe(true);
  });

  it('should keep held slots when shrinking', () => {
    const limiter = new ConcurrencyLimiter(3);
    limiter.tryAcquire();
    limiter.tryAcquire();
    limiter.tryAcquire();

    expect(limiter.resize(1)).toBe(1);
    expect(limiter.inUse).toBe(3);

    limiter.release();
    limiter.release();
    expect(limiter.tryAcquire()).toBe(false);
    limiter.release();
    expect(limiter.tryAcquire()).toBe(true);
  });

  it('should clamp the constructor and resize arguments', () => {
    const limiter = new ConcurrencyLimiter(100);
    expect(limiter.limit).toBe(20);
    expect(limiter.resize(0)).toBe(1);
  });
});
