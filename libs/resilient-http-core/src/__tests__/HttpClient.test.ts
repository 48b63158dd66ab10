import { afterEach, beforeEach, describe, expect, it, vi, type Mock } from 'vitest';
import { ErrorPolicyTable } from '../errorPolicy';
import { TerminalDeliveryError, TimeoutError, TransientDeliveryError } from '../errors';
import { HttpClient, redactHeaders } from '../HttpClient';
import { createBearerTokenInterceptor } from '../interceptors';
import { RetryScheduler } from '../retryScheduler';
import type {
  DeliveryRequest,
  HttpTransport,
  Logger,
  MetricsSink,
  RawHttpResponse,
  TransportRequest,
} from '../types';

const encoder = new TextEncoder();

const response = (status: number, body = ''): RawHttpResponse => ({
  status,
  headers: {},
  body: encoder.encode(body),
});

function scriptedTransport(...steps: Array<RawHttpResponse | Error>) {
  const calls: TransportRequest[] = [];
  const transport: HttpTransport = async (req) => {
    calls.push(req);
    const step = steps[Math.min(calls.length - 1, steps.length - 1)];
    if (step instanceof Error) throw step;
    return step;
  };
  return { transport, calls };
}

const postBatch: DeliveryRequest = {
  method: 'POST',
  url: 'https://ingest.example.com/events',
  body: encoder.encode('[{"a":1},{"a":2}]'),
  operation: 'sink.flush',
};

describe('HttpClient.deliver', () => {
  let logger: Logger;
  let metrics: MetricsSink;
  let now: number;
  let sleep: Mock<(ms: number) => Promise<void>>;

  beforeEach(() => {
    now = 0;
    logger = {
      debug: vi.fn(),
      info: vi.fn(),
      warn: vi.fn(),
      error: vi.fn(),
    };
    metrics = {
      recordRequest: vi.fn(),
    };
    sleep = vi.fn(async (ms: number) => {
      now += ms;
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  const createClient = (overrides: Partial<ConstructorParameters<typeof HttpClient>[0]> & { transport: HttpTransport }) =>
    new HttpClient({
      clientName: 'test-client',
      errorPolicy: new ErrorPolicyTable(),
      retryScheduler: new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: 10_000 }),
      logger,
      metrics,
      clock: { now: () => now },
      sleep,
      ...overrides,
    });

  it('retries a 503 and succeeds on the second attempt', async () => {
    const { transport, calls } = scriptedTransport(response(503), response(200));
    const client = createClient({ transport });

    const result = await client.deliver(postBatch);

    expect(result.status).toBe(200);
    expect(result.attempts).toBe(2);
    expect(calls).toHaveLength(2);
    expect(sleep).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledWith(500);
  });

  it('fails immediately on a status mapped to fail', async () => {
    const { transport, calls } = scriptedTransport(response(404, 'not here'));
    const client = createClient({
      transport,
      errorPolicy: ErrorPolicyTable.fromString('5\\d\\d:retry,4\\d\\d:fail'),
    });

    await expect(client.deliver(postBatch)).rejects.toMatchObject({
      name: 'TerminalDeliveryError',
      reason: 'fail-action',
      statusCode: 404,
      attempts: 1,
      url: 'https://ingest.example.com/events',
      responseBody: 'not here',
    });
    expect(calls).toHaveLength(1);
    expect(sleep).not.toHaveBeenCalled();
  });

  it('treats network failures as retryable', async () => {
    const { transport, calls } = scriptedTransport(new Error('socket hang up'), response(204));
    const client = createClient({ transport });

    const result = await client.deliver(postBatch);

    expect(result.status).toBe(204);
    expect(calls).toHaveLength(2);
    expect(logger.warn).toHaveBeenCalledWith(
      'http.request.failed',
      expect.objectContaining({ attempt: 1, error: 'socket hang up' }),
    );
  });

  it('clamps the last wait to the remaining retry budget and then gives up', async () => {
    const { transport, calls } = scriptedTransport(response(503));
    const client = createClient({
      transport,
      retryScheduler: new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: 1200 }),
    });

    const error = await client.deliver(postBatch).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TerminalDeliveryError);
    expect(error).toMatchObject({ reason: 'retries-exhausted', statusCode: 503, attempts: 3 });
    expect(calls).toHaveLength(3);
    expect(sleep.mock.calls).toEqual([[500], [700]]);
  });

  it('keeps the last transport error as the cause when retries run out', async () => {
    const networkError = new Error('connect ECONNREFUSED');
    const { transport } = scriptedTransport(networkError);
    const client = createClient({
      transport,
      retryScheduler: new RetryScheduler({ policy: 'linear', linearIntervalMs: 1000, maxRetryDurationMs: 2000 }),
    });

    const error = await client.deliver(postBatch).catch((err: unknown) => err);

    expect(error).toBeInstanceOf(TerminalDeliveryError);
    expect(error).toMatchObject({ reason: 'retries-exhausted', attempts: 3, statusCode: undefined });
    expect(error instanceof Error ? error.cause : undefined).toBe(networkError);
  });

  it('accepts the batch when retries run out on a retryAndSuccess status', async () => {
    const { transport } = scriptedTransport(response(503));
    const client = createClient({
      transport,
      errorPolicy: ErrorPolicyTable.fromString('503:retryAndSuccess'),
      retryScheduler: new RetryScheduler({ policy: 'exponential', maxRetryDurationMs: 0 }),
    });

    const result = await client.deliver(postBatch);

    expect(result.status).toBe(503);
    expect(result.attempts).toBe(1);
    expect(result.outcome.acceptedAfterExhaustion).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      'http.request.accepted_after_retries',
      expect.objectContaining({ status: 503, attempts: 1 }),
    );
  });

  it('logs every state transition at debug level', async () => {
    const { transport } = scriptedTransport(response(500), response(200));
    const client = createClient({ transport });

    await client.deliver(postBatch);

    const transitions = vi
      .mocked(logger.debug)
      .mock.calls.filter(([message]) => message === 'http.delivery.transition')
      .map(([, meta]) => meta?.to);
    expect(transitions).toEqual([
      'BUILDING_REQUEST',
      'SENDING',
      'EVALUATING_RESPONSE',
      'RETRY_WAIT',
      'SENDING',
      'EVALUATING_RESPONSE',
      'DONE',
    ]);
  });

  it('sends default headers merged under request headers and never logs credentials', async () => {
    const { transport, calls } = scriptedTransport(response(200));
    const client = createClient({
      transport,
      defaultHeaders: { 'X-Source': 'default', 'X-Trace': 'default' },
      interceptors: [createBearerTokenInterceptor(() => 'test-secret')],
    });

    await client.deliver({ ...postBatch, headers: { 'X-Trace': 'abc' } });

    expect(calls[0].headers).toEqual({
      'X-Source': 'default',
      'X-Trace': 'abc',
      Authorization: 'Bearer test-secret',
    });
    const attemptLog = vi.mocked(logger.debug).mock.calls.find(([message]) => message === 'http.request.attempt');
    expect(attemptLog?.[1]?.headers).toEqual({
      'X-Source': 'default',
      'X-Trace': 'abc',
      Authorization: '[redacted]',
    });
  });

  it('retries when a beforeSend hook reports a transient failure', async () => {
    let calls = 0;
    const { transport, calls: sent } = scriptedTransport(response(200));
    const client = createClient({
      transport,
      interceptors: [
        {
          beforeSend: () => {
            calls += 1;
            if (calls === 1) throw new TransientDeliveryError('token endpoint unavailable', { statusCode: 503 });
          },
        },
      ],
    });

    const result = await client.deliver(postBatch);

    expect(result.attempts).toBe(2);
    expect(sent).toHaveLength(1);
  });

  it('abandons the delivery when a beforeSend hook throws anything else', async () => {
    const { transport, calls } = scriptedTransport(response(200));
    const client = createClient({
      transport,
      interceptors: [
        {
          beforeSend: () => {
            throw new Error('signing key missing');
          },
        },
      ],
    });

    await expect(client.deliver(postBatch)).rejects.toMatchObject({
      name: 'TerminalDeliveryError',
      reason: 'aborted',
      attempts: 1,
    });
    expect(calls).toHaveLength(0);
  });

  it('aborts an attempt that outlives the connect and read timeouts', async () => {
    let attempt = 0;
    const transport: HttpTransport = (_req, signal) => {
      attempt += 1;
      if (attempt > 1) return Promise.resolve(response(200));
      return new Promise((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    };
    const errors: unknown[] = [];
    const client = createClient({
      transport,
      transportOptions: { connectTimeoutMs: 5, readTimeoutMs: 5 },
      interceptors: [{ onError: ({ error }) => void errors.push(error) }],
    });

    const result = await client.deliver(postBatch);

    expect(result.attempts).toBe(2);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(TimeoutError);
  });

  it('reports one metrics entry per delivery', async () => {
    const { transport } = scriptedTransport(response(502), response(201));
    const client = createClient({ transport });

    await client.deliver(postBatch);

    expect(metrics.recordRequest).toHaveBeenCalledTimes(1);
    expect(metrics.recordRequest).toHaveBeenCalledWith(
      expect.objectContaining({
        operation: 'sink.flush',
        method: 'POST',
        url: 'https://ingest.example.com/events',
        outcome: expect.objectContaining({ ok: true, status: 201, attempts: 2, statusFamily: 200 }),
      }),
    );
  });

  it('does not let a failing metrics sink change the outcome', async () => {
    const { transport } = scriptedTransport(response(200));
    const client = createClient({
      transport,
      metrics: {
        recordRequest: () => {
          throw new Error('metrics backend down');
        },
      },
    });

    await expect(client.deliver(postBatch)).resolves.toMatchObject({ status: 200 });
    expect(logger.warn).toHaveBeenCalledWith(
      'http.metrics.error',
      expect.objectContaining({ error: 'metrics backend down' }),
    );
  });
});

describe('redactHeaders', () => {
  it('masks credential headers regardless of casing', () => {
    expect(
      redactHeaders({
        authorization: 'Bearer test-secret',
        'Proxy-Authorization': 'Basic dGVzdA==',
        Accept: 'application/json',
      }),
    ).toEqual({
      authorization: '[redacted]',
      'Proxy-Authorization': '[redacted]',
      Accept: 'application/json',
    });
  });
});
