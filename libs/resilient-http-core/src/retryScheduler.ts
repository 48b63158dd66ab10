import { ConfigurationError } from './errors';
import type { RetryPolicyKind } from './types';

export const DEFAULT_EXPONENTIAL_BASE_MS = 500;

export interface RetrySchedulerOptions {
  policy: RetryPolicyKind;
  /** Required for `linear`. */
  linearIntervalMs?: number;
  /** Defaults to 500 ms. */
  exponentialBaseMs?: number;
  maxRetryDurationMs: number;
}

/**
 * Delay sequence between attempts of one flush, bounded by a total retry
 * duration measured from the first attempt.
 */
export class RetryScheduler {
  readonly policy: RetryPolicyKind;
  readonly maxRetryDurationMs: number;
  private readonly intervalMs: number;

  constructor(options: RetrySchedulerOptions) {
    if (!Number.isFinite(options.maxRetryDurationMs) || options.maxRetryDurationMs < 0) {
      throw new ConfigurationError('Maximum retry duration cannot be negative.', 'maxRetryDuration');
    }
    this.policy = options.policy;
    this.maxRetryDurationMs = options.maxRetryDurationMs;

    if (options.policy === 'linear') {
      if (options.linearIntervalMs === undefined) {
        throw new ConfigurationError(
          'Property must be set when retry policy is linear.',
          'linearRetryInterval',
        );
      }
      if (options.linearIntervalMs < 0) {
        throw new ConfigurationError('Linear retry interval cannot be negative.', 'linearRetryInterval');
      }
      this.intervalMs = options.linearIntervalMs;
    } else {
      this.intervalMs = options.exponentialBaseMs ?? DEFAULT_EXPONENTIAL_BASE_MS;
    }
  }

  /**
   * Delay before retry number `attemptIndex + 1` (index 0 is the wait after the first attempt).
   */
  nextDelay(attemptIndex: number): number {
    if (this.policy === 'linear') {
      return this.intervalMs;
    }
    return this.intervalMs * 2 ** Math.max(0, attemptIndex);
  }

  hasExceededDeadline(elapsedMs: number): boolean {
    return elapsedMs >= this.maxRetryDurationMs;
  }

  remainingMs(elapsedMs: number): number {
    return Math.max(0, this.maxRetryDurationMs - elapsedMs);
  }
}
