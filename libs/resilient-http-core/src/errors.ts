export interface ConfigurationFailure {
  property?: string;
  message: string;
}

/**
 * Raised while building configuration-derived objects, before any delivery.
 * Carries every failure that was collected, not only the first.
 */
export class ConfigurationError extends Error {
  readonly failures: ConfigurationFailure[];

  constructor(failures: ConfigurationFailure[] | string, property?: string) {
    const list = typeof failures === 'string' ? [{ property, message: failures }] : failures;
    super(
      list.length === 1
        ? formatFailure(list[0])
        : `Invalid configuration:\n${list.map((f) => `  - ${formatFailure(f)}`).join('\n')}`,
    );
    this.name = 'ConfigurationError';
    this.failures = list;
  }
}

function formatFailure(failure: ConfigurationFailure): string {
  return failure.property ? `${failure.property}: ${failure.message}` : failure.message;
}

export class EncodingError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'EncodingError';
  }
}

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * One failed attempt that the engine is allowed to retry: a network failure,
 * a timeout, or a status classified as `retry`.
 */
export class TransientDeliveryError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'TransientDeliveryError';
    this.statusCode = options.statusCode;
  }
}

/**
 * The token endpoint rejected the client's request with a 4xx other than 408
 * or 429. Never retried.
 */
export class CredentialError extends Error {
  readonly statusCode?: number;

  constructor(message: string, options: { statusCode?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause });
    this.name = 'CredentialError';
    this.statusCode = options.statusCode;
  }
}

export type TerminalReason = 'fail-action' | 'retries-exhausted' | 'encoding' | 'aborted';

export class TerminalDeliveryError extends Error {
  readonly statusCode?: number;
  readonly url: string;
  readonly attempts: number;
  readonly reason: TerminalReason;
  readonly responseBody?: string;

  constructor(
    message: string,
    options: {
      url: string;
      attempts: number;
      reason: TerminalReason;
      statusCode?: number;
      responseBody?: string;
      cause?: unknown;
    },
  ) {
    super(message, { cause: options.cause });
    this.name = 'TerminalDeliveryError';
    this.url = options.url;
    this.attempts = options.attempts;
    this.reason = options.reason;
    this.statusCode = options.statusCode;
    this.responseBody = options.responseBody;
  }
}
