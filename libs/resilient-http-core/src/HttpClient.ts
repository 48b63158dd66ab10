import type { ErrorPolicyTable } from './errorPolicy';
import { TerminalDeliveryError, TimeoutError, TransientDeliveryError, type TerminalReason } from './errors';
import type { RetryScheduler } from './retryScheduler';
import type {
  AfterResponseContext,
  BeforeSendContext,
  Clock,
  DeliveryRequest,
  DeliveryState,
  HttpHeaders,
  HttpRequestInterceptor,
  HttpTransport,
  Logger,
  MetricsRequestInfo,
  MetricsSink,
  OnErrorContext,
  RawHttpResponse,
  RequestOutcome,
  RetryAction,
  Sleeper,
  TransportOptions,
} from './types';

export interface HttpClientConfig {
  clientName?: string;
  transport: HttpTransport;
  /** Only the timeouts are read here; the transport applies the rest. */
  transportOptions?: Pick<TransportOptions, 'connectTimeoutMs' | 'readTimeoutMs'>;
  errorPolicy: ErrorPolicyTable;
  retryScheduler: RetryScheduler;
  defaultHeaders?: HttpHeaders;
  interceptors?: HttpRequestInterceptor[];
  logger?: Logger;
  metrics?: MetricsSink;
  clock?: Clock;
  sleep?: Sleeper;
}

export interface DeliveryResult {
  status: number;
  attempts: number;
  response: RawHttpResponse;
  outcome: RequestOutcome;
}

type AttemptResult =
  | { kind: 'response'; response: RawHttpResponse; request: DeliveryRequest }
  | { kind: 'error'; error: unknown; request: DeliveryRequest; phase: 'beforeSend' | 'transport' };

interface DeliveryRun {
  request: DeliveryRequest;
  state: DeliveryState;
  attempts: number;
  startedAt: number;
}

const REDACTED_HEADERS = new Set(['authorization', 'proxy-authorization']);
const MAX_LOGGED_BODY_CHARS = 1024;

/**
 * Returns a copy of `headers` safe to log: credential-bearing values are masked.
 */
export function redactHeaders(headers: HttpHeaders): HttpHeaders {
  const redacted: HttpHeaders = {};
  for (const [name, value] of Object.entries(headers)) {
    redacted[name] = REDACTED_HEADERS.has(name.toLowerCase()) ? '[redacted]' : value;
  }
  return redacted;
}

/**
 * Retrying delivery engine. One {@link deliver} call sends a single prepared
 * request, classifies every response through the {@link ErrorPolicyTable} and
 * waits between attempts as the {@link RetryScheduler} dictates, until the
 * request is accepted, rejected, or the retry deadline runs out.
 */
export class HttpClient {
  private readonly clientName: string;
  private readonly transport: HttpTransport;
  private readonly logger?: Logger;
  private readonly interceptors: HttpRequestInterceptor[];
  private readonly clock: Clock;
  private readonly attemptTimeoutMs: number;

  constructor(private readonly config: HttpClientConfig) {
    this.clientName = config.clientName ?? 'http-sink';
    this.transport = config.transport;
    this.logger = config.logger;
    this.interceptors = [...(config.interceptors ?? [])];
    this.clock = config.clock ?? { now: () => Date.now() };

    // The transport enforces each phase. This ceiling bounds a whole attempt
    // and only exists when neither phase is unbounded.
    const connectMs = config.transportOptions?.connectTimeoutMs ?? 0;
    const readMs = config.transportOptions?.readTimeoutMs ?? 0;
    this.attemptTimeoutMs = connectMs > 0 && readMs > 0 ? connectMs + readMs : 0;
  }

  /**
   * Delivers `request`, retrying as the error policy allows.
   *
   * @throws TerminalDeliveryError when the request is rejected, retries run out
   *   on a `retryAndFail` status, or a `beforeSend` interceptor aborts it.
   */
  async deliver(request: DeliveryRequest): Promise<DeliveryResult> {
    const run: DeliveryRun = {
      request,
      state: 'IDLE',
      attempts: 0,
      startedAt: this.clock.now(),
    };

    this.transition(run, 'BUILDING_REQUEST');
    const headers = { ...(this.config.defaultHeaders ?? {}), ...(request.headers ?? {}) };

    for (let attempt = 1; ; attempt += 1) {
      run.attempts = attempt;
      this.transition(run, 'SENDING', { attempt });
      const result = await this.runAttempt(run, headers, attempt);

      this.transition(run, 'EVALUATING_RESPONSE', {
        attempt,
        status: result.kind === 'response' ? result.response.status : undefined,
      });

      let action: RetryAction;
      if (result.kind === 'response') {
        action = this.config.errorPolicy.resolve(result.response.status);
        await this.applyAfterResponseInterceptors({
          request: result.request,
          attempt,
          response: result.response,
          action,
        });
      } else {
        await this.runErrorInterceptors({ request: result.request, attempt, error: result.error });
        if (!isRetryableError(result)) {
          this.logFailure(run, result, 'error');
          return this.fail(run, result, 'aborted');
        }
        action = { kind: 'retry', onExhausted: 'fail' };
      }

      if (action.kind === 'success' && result.kind === 'response') {
        return this.succeed(run, result.response, false);
      }
      if (action.kind !== 'retry') {
        this.logFailure(run, result, 'error');
        return this.fail(run, result, 'fail-action');
      }

      const elapsed = this.clock.now() - run.startedAt;
      const scheduler = this.config.retryScheduler;
      if (scheduler.hasExceededDeadline(elapsed)) {
        if (action.onExhausted === 'success' && result.kind === 'response') {
          this.logger?.warn('http.request.accepted_after_retries', {
            ...this.baseLogMeta(run),
            status: result.response.status,
            attempts: attempt,
            elapsedMs: elapsed,
          });
          return this.succeed(run, result.response, true);
        }
        this.logFailure(run, result, 'error');
        return this.fail(run, result, 'retries-exhausted');
      }

      this.logFailure(run, result, 'warn');
      const delay = Math.min(scheduler.nextDelay(attempt - 1), scheduler.remainingMs(elapsed));
      this.transition(run, 'RETRY_WAIT', { attempt, delayMs: delay });
      await this.sleep(delay);
    }
  }

  private async runAttempt(run: DeliveryRun, headers: HttpHeaders, attempt: number): Promise<AttemptResult> {
    const controller = new AbortController();
    const attemptRequest: DeliveryRequest & { headers: HttpHeaders } = {
      ...run.request,
      headers: { ...headers },
    };

    try {
      await this.applyBeforeSendInterceptors(attemptRequest, controller.signal, attempt);
    } catch (error) {
      return { kind: 'error', error, request: attemptRequest, phase: 'beforeSend' };
    }

    this.logger?.debug('http.request.attempt', {
      ...this.baseLogMeta(run),
      attempt,
      headers: redactHeaders(attemptRequest.headers),
      bodyBytes: attemptRequest.body?.byteLength ?? 0,
    });

    let didTimeout = false;
    const timeoutHandle =
      this.attemptTimeoutMs > 0
        ? setTimeout(() => {
            didTimeout = true;
            controller.abort();
          }, this.attemptTimeoutMs)
        : undefined;

    try {
      const response = await this.transport(
        {
          method: attemptRequest.method,
          url: attemptRequest.url,
          headers: attemptRequest.headers,
          body: attemptRequest.body,
        },
        controller.signal,
      );
      return { kind: 'response', response, request: attemptRequest };
    } catch (error) {
      if (didTimeout && !(error instanceof TimeoutError)) {
        return {
          kind: 'error',
          error: new TimeoutError(`Request timed out after ${this.attemptTimeoutMs}ms`),
          request: attemptRequest,
          phase: 'transport',
        };
      }
      return { kind: 'error', error, request: attemptRequest, phase: 'transport' };
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  private async succeed(run: DeliveryRun, response: RawHttpResponse, acceptedAfterExhaustion: boolean): Promise<DeliveryResult> {
    this.transition(run, 'DONE', { attempts: run.attempts, status: response.status });
    const outcome = this.buildOutcome(run, {
      ok: true,
      status: response.status,
      acceptedAfterExhaustion: acceptedAfterExhaustion || undefined,
    });
    await this.recordMetrics({
      operation: run.request.operation,
      method: run.request.method,
      url: run.request.url,
      outcome,
    });
    this.logger?.info('http.request.success', {
      ...this.baseLogMeta(run),
      status: response.status,
      attempts: run.attempts,
      durationMs: outcome.durationMs,
    });
    return { status: response.status, attempts: run.attempts, response, outcome };
  }

  private async fail(run: DeliveryRun, result: AttemptResult, reason: TerminalReason): Promise<never> {
    this.transition(run, 'FAILED', { attempts: run.attempts, reason });
    const status = result.kind === 'response' ? result.response.status : undefined;
    const cause = result.kind === 'error' ? result.error : undefined;
    const message =
      result.kind === 'response'
        ? `${run.request.method} ${run.request.url} failed with status ${result.response.status} after ${run.attempts} attempt(s)`
        : `${run.request.method} ${run.request.url} failed after ${run.attempts} attempt(s): ${errorMessage(result.error)}`;

    const outcome = this.buildOutcome(run, { ok: false, status, errorMessage: message });
    await this.recordMetrics({
      operation: run.request.operation,
      method: run.request.method,
      url: run.request.url,
      outcome,
    });

    throw new TerminalDeliveryError(message, {
      url: run.request.url,
      attempts: run.attempts,
      reason,
      statusCode: status,
      responseBody: result.kind === 'response' ? decodeBody(result.response.body) : undefined,
      cause,
    });
  }

  private buildOutcome(
    run: DeliveryRun,
    fields: Pick<RequestOutcome, 'ok' | 'status' | 'errorMessage' | 'acceptedAfterExhaustion'>,
  ): RequestOutcome {
    const finishedAt = this.clock.now();
    return {
      ...fields,
      attempts: run.attempts,
      startedAt: new Date(run.startedAt),
      finishedAt: new Date(finishedAt),
      durationMs: finishedAt - run.startedAt,
      statusFamily: fields.status !== undefined ? Math.floor(fields.status / 100) * 100 : undefined,
    };
  }

  private transition(run: DeliveryRun, next: DeliveryState, meta: Record<string, unknown> = {}): void {
    this.logger?.debug('http.delivery.transition', {
      ...this.baseLogMeta(run),
      from: run.state,
      to: next,
      ...meta,
    });
    run.state = next;
  }

  private logFailure(run: DeliveryRun, result: AttemptResult, level: 'warn' | 'error'): void {
    const meta = {
      ...this.baseLogMeta(run),
      attempt: run.attempts,
      status: result.kind === 'response' ? result.response.status : undefined,
      error: result.kind === 'error' ? errorMessage(result.error) : undefined,
      responseBody: result.kind === 'response' ? decodeBody(result.response.body) : undefined,
    };
    if (level === 'warn') {
      this.logger?.warn('http.request.failed', meta);
    } else {
      this.logger?.error('http.request.failed', meta);
    }
  }

  private async applyBeforeSendInterceptors(
    request: DeliveryRequest & { headers: HttpHeaders },
    signal: AbortSignal,
    attempt: number,
  ): Promise<void> {
    for (const interceptor of this.interceptors) {
      if (!interceptor.beforeSend) continue;
      const ctx: BeforeSendContext = { request, signal, attempt };
      try {
        await interceptor.beforeSend(ctx);
      } catch (error) {
        this.logger?.warn('http.interceptor.beforeSend.failed', {
          client: this.clientName,
          operation: request.operation ?? '',
          error: errorMessage(error),
        });
        throw error;
      }
    }
  }

  private async applyAfterResponseInterceptors(ctx: AfterResponseContext): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.afterResponse) continue;
      try {
        await interceptor.afterResponse(ctx);
      } catch (error) {
        this.logger?.warn('http.interceptor.afterResponse.failed', {
          client: this.clientName,
          operation: ctx.request.operation ?? '',
          error: errorMessage(error),
        });
      }
    }
  }

  private async runErrorInterceptors(ctx: OnErrorContext): Promise<void> {
    for (const interceptor of [...this.interceptors].reverse()) {
      if (!interceptor.onError) continue;
      try {
        await interceptor.onError(ctx);
      } catch (hookError) {
        this.logger?.warn('http.interceptor.onError.failed', {
          client: this.clientName,
          operation: ctx.request.operation ?? '',
          error: errorMessage(hookError),
        });
      }
    }
  }

  private async recordMetrics(info: MetricsRequestInfo): Promise<void> {
    try {
      await this.config.metrics?.recordRequest?.(info);
    } catch (error) {
      this.logger?.warn('http.metrics.error', {
        client: this.clientName,
        operation: info.operation,
        error: errorMessage(error),
      });
    }
  }

  private baseLogMeta(run: DeliveryRun) {
    return {
      client: this.clientName,
      operation: run.request.operation,
      method: run.request.method,
      url: run.request.url,
    };
  }

  private sleep(ms: number): Promise<void> {
    if (this.config.sleep) {
      return this.config.sleep(ms);
    }
    return new Promise((resolve) => setTimeout(resolve, ms));
  }
}

/**
 * Network failures and timeouts are always retried. An interceptor failure is
 * retried only when it is itself transient (a token endpoint that is down);
 * anything else thrown before the request went out abandons the delivery.
 */
function isRetryableError(result: Extract<AttemptResult, { kind: 'error' }>): boolean {
  if (result.phase === 'transport') {
    return true;
  }
  return result.error instanceof TransientDeliveryError || result.error instanceof TimeoutError;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function decodeBody(body: Uint8Array): string {
  const text = new TextDecoder().decode(body);
  return text.length > MAX_LOGGED_BODY_CHARS ? `${text.slice(0, MAX_LOGGED_BODY_CHARS)}...` : text;
}
