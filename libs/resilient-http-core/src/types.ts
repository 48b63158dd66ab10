export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'DELETE';

export type HttpHeaders = Record<string, string>;

export type LoggerMeta = Record<string, unknown>;

export interface Logger {
  debug(message: string, meta?: LoggerMeta): void;
  info(message: string, meta?: LoggerMeta): void;
  warn(message: string, meta?: LoggerMeta): void;
  error(message: string, meta?: LoggerMeta): void;
}

/**
 * Classification of a response status.
 *
 * - `success`: the batch is delivered.
 * - `fail`: the batch is abandoned immediately.
 * - `retry`: the batch is sent again until the retry deadline; `onExhausted`
 *   decides what an exhausted deadline means.
 */
export type RetryAction =
  | { kind: 'success' }
  | { kind: 'fail' }
  | { kind: 'retry'; onExhausted: 'fail' | 'success' };

export type RetryActionName = 'success' | 'fail' | 'retry' | 'retryAndFail' | 'retryAndSuccess';

export interface ErrorHandlingRule {
  /** Regular expression matched against the whole 3-digit status code. */
  pattern: string;
  /** One of {@link RetryActionName}, case-insensitive. */
  action: string;
}

export type RetryPolicyKind = 'linear' | 'exponential';

export interface ProxySettings {
  url: string;
  username?: string;
  password?: string;
}

/**
 * Per-attempt transport settings. Timeouts are in milliseconds, 0 means no limit.
 */
export interface TransportOptions {
  connectTimeoutMs: number;
  readTimeoutMs: number;
  followRedirects: boolean;
  disableTlsValidation: boolean;
  proxy?: ProxySettings;
}

export interface TransportRequest {
  method: HttpMethod;
  url: string;
  headers: HttpHeaders;
  body?: Uint8Array;
}

export interface RawHttpResponse {
  status: number;
  headers: HttpHeaders;
  body: Uint8Array;
}

/**
 * Sends one request. Implementations must read the response body to completion
 * before resolving so the underlying connection is released, and must apply the
 * connect and read timeouts of their {@link TransportOptions} themselves.
 */
export interface HttpTransport {
  (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse>;
}

export type DeliveryState =
  | 'IDLE'
  | 'BUILDING_REQUEST'
  | 'SENDING'
  | 'EVALUATING_RESPONSE'
  | 'RETRY_WAIT'
  | 'DONE'
  | 'FAILED';

export interface DeliveryRequest {
  method: HttpMethod;
  url: string;
  headers?: HttpHeaders;
  body?: Uint8Array;
  /** Label used in logs and metrics. */
  operation?: string;
}

/**
 * Summary of one logical delivery (all attempts of one flush).
 */
export interface RequestOutcome {
  ok: boolean;
  status?: number;
  attempts: number;
  startedAt: Date;
  finishedAt: Date;
  durationMs: number;
  statusFamily?: number; // 200, 400, 500
  errorMessage?: string;
  /** True when the batch was accepted only because retries ran out on a `retryAndSuccess` rule. */
  acceptedAfterExhaustion?: boolean;
}

export interface MetricsRequestInfo {
  operation?: string;
  method: HttpMethod;
  url: string;
  outcome: RequestOutcome;
}

export interface MetricsSink {
  recordRequest?(info: MetricsRequestInfo): void | Promise<void>;
}

export interface BeforeSendContext {
  request: DeliveryRequest & { headers: HttpHeaders };
  attempt: number;
  signal: AbortSignal;
}

export interface AfterResponseContext {
  request: DeliveryRequest;
  attempt: number;
  response: RawHttpResponse;
  action: RetryAction;
}

export interface OnErrorContext {
  request: DeliveryRequest;
  attempt: number;
  error: unknown;
}

/**
 * Cross-cutting hook run inside the retry loop, once per attempt.
 *
 * `beforeSend` runs in registration order and may mutate the request headers;
 * throwing a `TransientDeliveryError` from it counts as a failed attempt, any
 * other error abandons the delivery. `afterResponse` and `onError` run in
 * reverse registration order and are observers: their failures are logged and
 * never change the outcome.
 */
export interface HttpRequestInterceptor {
  beforeSend?(ctx: BeforeSendContext): Promise<void> | void;
  afterResponse?(ctx: AfterResponseContext): Promise<void> | void;
  onError?(ctx: OnErrorContext): Promise<void> | void;
}

export interface Clock {
  now(): number;
}

export type Sleeper = (ms: number) => Promise<void>;
