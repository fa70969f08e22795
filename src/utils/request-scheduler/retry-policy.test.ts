/**
 * Unit tests for the rate-limit backoff
 */

import { describe, it, expect } from 'vitest';
import {
  DEFAULT_BACKOFF,
  computeBackoffDelay,
  resolveBackoffOptions,
} from './retry-policy.js';

describe('computeBackoffDelay', () => {
  const options = { baseDelayMs: 800, maxDelayMs: 8000, jitterMs: 0 };

  it('should double the delay per retry up to the maximum', () => {
    const delays = [0, 1, 2, 3, 4, 5].map((retry) => computeBackoffDelay(retry, options));
    expect(delays).toEqual([800, 1600, 3200, 6400, 8000, 8000]);
  });

  it('should prefer the provider retry delay, clamped to the bounds', () => {
    expect(computeBackoffDelay(4, options, 2500)).toBe(2500);
    expect(computeBackoffDelay(0, options, 100)).toBe(800);
    expect(computeBackoffDelay(0, options, 60_000)).toBe(8000);
  });

  it('should add jitter below jitterMs', () => {
    const withJitter = { ...options, jitterMs: 200 };
    expect(computeBackoffDelay(0, withJitter, undefined, () => 0)).toBe(800);
    expect(computeBackoffDelay(0, withJitter, undefined, () => 0.5)).toBe(900);
    expect(computeBackoffDelay(0, withJitter, undefined, () => 0.999)).toBe(999);
  });
});

describe('resolveBackoffOptions', () => {
  it('should fill in defaults', () => {
    expect(resolveBackoffOptions()).toEqual(DEFAULT_BACKOFF);
    expect(resolveBackoffOptions({ jitterMs: 0 })).toEqual({ ...DEFAULT_BACKOFF, jitterMs: 0 });
  });

  it('should reject negative or inverted bounds', () => {
    expect(() => resolveBackoffOptions({ baseDelayMs: -1 })).toThrow(RangeError);
    expect(() => resolveBackoffOptions({ maxDelayMs: 100 })).toThrow(
      'Backoff maxDelayMs must not be lower than baseDelayMs'
    );
  });
});
