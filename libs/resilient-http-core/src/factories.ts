import { ErrorPolicyTable } from './errorPolicy';
import { HttpClient, type HttpClientConfig } from './HttpClient';
import { RetryScheduler } from './retryScheduler';
import { createAxiosTransport } from './transport/axiosTransport';
import type { Logger, LoggerMeta, TransportOptions } from './types';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

/**
 * Console logger implementation for use with createDefaultHttpClient.
 * Logs to console.debug, console.info, console.warn, and console.error,
 * dropping anything below `minLevel`.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  debug(message: string, meta?: LoggerMeta): void {
    if (this.enabled('debug')) console.debug(message, meta);
  }
  info(message: string, meta?: LoggerMeta): void {
    if (this.enabled('info')) console.info(message, meta);
  }
  warn(message: string, meta?: LoggerMeta): void {
    if (this.enabled('warn')) console.warn(message, meta);
  }
  error(message: string, meta?: LoggerMeta): void {
    if (this.enabled('error')) console.error(message, meta);
  }

  private enabled(level: LogLevel): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[this.minLevel];
  }
}

export const DEFAULT_TRANSPORT_OPTIONS: TransportOptions = {
  connectTimeoutMs: 60_000,
  readTimeoutMs: 60_000,
  followRedirects: true,
  disableTlsValidation: false,
};

export const DEFAULT_MAX_RETRY_DURATION_MS = 600_000;

/**
 * Creates an HttpClient with the defaults a sink starts from.
 *
 * Defaults applied:
 * - Transport: axios (60s connect and read timeouts, redirects followed, TLS verified)
 * - Error policy: 2xx success, 5xx retry, everything else fail
 * - Retries: exponential backoff from 500ms, for at most 10 minutes per delivery
 * - Logger: console logger at info level
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({
 *   clientName: 'orders-sink',
 *   errorPolicy: ErrorPolicyTable.fromString('429:retry,4..:fail'),
 * });
 *
 * await client.deliver({
 *   method: 'POST',
 *   url: 'https://ingest.example.com/orders',
 *   body: new TextEncoder().encode('[{"id":1}]'),
 * });
 * ```
 */
export function createDefaultHttpClient(
  config: Partial<HttpClientConfig> & { clientName: string },
): HttpClient {
  const transportOptions = config.transportOptions ?? DEFAULT_TRANSPORT_OPTIONS;
  return new HttpClient({
    ...config,
    transportOptions,
    transport: config.transport ?? createAxiosTransport({ ...DEFAULT_TRANSPORT_OPTIONS, ...transportOptions }),
    errorPolicy: config.errorPolicy ?? new ErrorPolicyTable(),
    retryScheduler:
      config.retryScheduler ??
      new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: DEFAULT_MAX_RETRY_DURATION_MS }),
    interceptors: config.interceptors ?? [],
    logger: config.logger ?? new ConsoleLogger(),
  });
}
