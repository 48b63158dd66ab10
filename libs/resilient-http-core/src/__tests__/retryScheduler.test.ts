import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { RetryScheduler } from '../retryScheduler';

describe('RetryScheduler', () => {
  it('yields the same delay for every attempt under the linear policy', () => {
    const scheduler = new RetryScheduler({ policy: 'linear', linearIntervalMs: 2000, maxRetryDurationMs: 60_000 });

    expect([0, 1, 2, 5].map((i) => scheduler.nextDelay(i))).toEqual([2000, 2000, 2000, 2000]);
  });

  it('doubles the delay under the exponential policy', () => {
    const scheduler = new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: 60_000 });

    expect([0, 1, 2, 3].map((i) => scheduler.nextDelay(i))).toEqual([500, 1000, 2000, 4000]);
  });

  it('uses a custom exponential base', () => {
    const scheduler = new RetryScheduler({ policy: 'exponential', exponentialBaseMs: 100, maxRetryDurationMs: 1000 });

    expect(scheduler.nextDelay(2)).toBe(400);
  });

  it('reports the deadline once elapsed reaches the maximum retry duration', () => {
    const scheduler = new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: 1000 });

    expect(scheduler.hasExceededDeadline(999)).toBe(false);
    expect(scheduler.hasExceededDeadline(1000)).toBe(true);
    expect(scheduler.remainingMs(400)).toBe(600);
    expect(scheduler.remainingMs(1500)).toBe(0);
  });

  it('requires an interval for the linear policy', () => {
    try {
      new RetryScheduler({ policy: 'linear', maxRetryDurationMs: 1000 });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      expect(error instanceof ConfigurationError ? error.failures : []).toEqual([
        { property: 'linearRetryInterval', message: 'Property must be set when retry policy is linear.' },
      ]);
    }
  });

  it('rejects negative durations', () => {
    expect(() => new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: -1 })).toThrow(
      'maxRetryDuration: Maximum retry duration cannot be negative.',
    );
    expect(
      () => new RetryScheduler({ policy: 'linear', linearIntervalMs: -5, maxRetryDurationMs: 10 }),
    ).toThrow('linearRetryInterval: Linear retry interval cannot be negative.');
  });
});
