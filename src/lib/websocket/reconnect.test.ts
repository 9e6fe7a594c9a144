import { describe, expect, it } from 'vitest';
import { fixedDelay, linearBackoff } from './reconnect.js';

describe('fixedDelay', () => {
  it('returns the same delay for every attempt by default', () => {
    const policy = fixedDelay(2000);

    expect(policy.nextDelay(1)).toBe(2000);
    expect(policy.nextDelay(500)).toBe(2000);
  });

  it('gives up after the attempt cap', () => {
    const policy = fixedDelay(500, 3);

    expect(policy.nextDelay(3)).toBe(500);
    expect(policy.nextDelay(4)).toBeNull();
  });
});

describe('linearBackoff', () => {
  it('grows with the attempt number up to the multiplier', () => {
    const policy = linearBackoff(1000);

    expect([1, 2, 3, 5, 7, 10].map((attempt) => policy.nextDelay(attempt))).toEqual([
      1000, 2000, 3000, 5000, 5000, 5000,
    ]);
    expect(policy.nextDelay(11)).toBeNull();
  });

  it('accepts custom limits', () => {
    const policy = linearBackoff(250, { maxMultiplier: 2, maxAttempts: 3 });

    expect(policy.nextDelay(1)).toBe(250);
    expect(policy.nextDelay(3)).toBe(500);
    expect(policy.nextDelay(4)).toBeNull();
  });
});
