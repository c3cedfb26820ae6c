/**
 * Unit tests for exponential backoff
 */

import { describe, it, expect } from '@jest/globals';
import { calculateBackoff, DEFAULT_RETRY_POLICY, type RetryPolicy } from '@/lib/retry';

const noJitter: RetryPolicy = { ...DEFAULT_RETRY_POLICY, jitter: 0 };

describe('calculateBackoff', () => {
  it('should grow exponentially from the initial delay', () => {
    expect(calculateBackoff(0, noJitter)).toBe(1_000);
    expect(calculateBackoff(1, noJitter)).toBe(2_000);
    expect(calculateBackoff(2, noJitter)).toBe(4_000);
  });

  it('should cap the delay at maxDelayMs', () => {
    expect(calculateBackoff(10, noJitter)).toBe(30_000);
  });

  it('should apply jitter symmetrically around the delay', () => {
    const policy: RetryPolicy = { ...noJitter, jitter: 0.1 };

    expect(calculateBackoff(0, policy, () => 0)).toBe(900);
    expect(calculateBackoff(0, policy, () => 1)).toBe(1_100);
    expect(calculateBackoff(0, policy, () => 0.5)).toBe(1_000);
  });

  it('should never return a negative delay', () => {
    const policy: RetryPolicy = { ...noJitter, initialDelayMs: 0, jitter: 1 };

    expect(calculateBackoff(3, policy, () => 0)).toBe(0);
  });
});
