import {
  ConsoleLogger,
  CredentialProvider,
  ErrorPolicyTable,
  RetryScheduler,
  createAxiosTransport,
  createContentTypeInterceptor,
  createDefaultHttpClient,
  createCredentialInterceptor,
  createOAuth2TokenSource,
  parseRetryAction,
  unmatchedStatusPolicy,
  type Clock,
  type HttpRequestInterceptor,
  type HttpTransport,
  type Logger,
  type MetricsSink,
  type OAuth2TokenSource,
  type Sleeper,
  type TransportOptions,
} from '@batchsink/resilient-http-core';
import { loadSinkConfigFromEnv, validateSchema, type SinkConfig } from './config';
import { MessageBuffer } from './messageBuffer';
import { PlaceholderResolver } from './placeholders';
import type { RecordSchema } from './record';
import { HttpRecordWriter } from './recordWriter';

export interface HttpSinkWriterOptions {
  transport?: HttpTransport;
  /** Replaces the token source built from `config.oauth2`. */
  tokenSource?: OAuth2TokenSource;
  interceptors?: HttpRequestInterceptor[];
  logger?: Logger;
  metrics?: MetricsSink;
  clock?: Clock;
  sleep?: Sleeper;
}

export function toTransportOptions(config: SinkConfig): TransportOptions {
  return {
    connectTimeoutMs: config.connectTimeout,
    readTimeoutMs: config.readTimeout,
    followRedirects: config.followRedirects,
    disableTlsValidation: config.disableSSLValidation,
    proxy: config.proxyUrl
      ? { url: config.proxyUrl, username: config.proxyUsername, password: config.proxyPassword }
      : undefined,
  };
}

export function createErrorPolicy(config: SinkConfig): ErrorPolicyTable {
  const unmatched = config.unmatchedStatusAction
    ? unmatchedStatusPolicy(parseRetryAction(config.unmatchedStatusAction, 'unmatchedStatusAction'))
    : undefined;
  return new ErrorPolicyTable(config.httpErrorsHandling, unmatched);
}

export function createRetryScheduler(config: SinkConfig): RetryScheduler {
  return new RetryScheduler({
    policy: config.retryPolicy,
    linearIntervalMs: config.linearRetryInterval === undefined ? undefined : config.linearRetryInterval * 1000,
    maxRetryDurationMs: config.maxRetryDuration * 1000,
  });
}

/**
 * Wires a writer for one input schema: validates the schema against the
 * configuration, then builds the buffer, URL resolver, error policy, retry
 * schedule, transport and auth.
 *
 * @example
 * ```typescript
 * const writer = createHttpSinkWriter(parseSinkConfig({ url: 'https://ingest.example.com/events', batchSize: 50 }), schema);
 * for (const record of records) await writer.write(record);
 * await writer.close();
 * ```
 */
export function createHttpSinkWriter(
  config: SinkConfig,
  schema: RecordSchema,
  options: HttpSinkWriterOptions = {},
): HttpRecordWriter {
  validateSchema(config, schema);

  const logger = options.logger ?? new ConsoleLogger();
  const transportOptions = toTransportOptions(config);
  const transport = options.transport ?? createAxiosTransport(transportOptions);

  const buffer = new MessageBuffer({
    format: config.messageFormat,
    schema,
    delimiter: config.delimiterForMessages,
    writeJsonAsArray: config.writeJsonAsArray,
    jsonBatchKey: config.jsonBatchKey,
    charset: config.charset,
    bodyTemplate: config.body,
  });
  const resolver = new PlaceholderResolver(config.url, {
    method: config.method,
    charset: config.charset,
    missing: config.missingPlaceholder,
  });

  const interceptors: HttpRequestInterceptor[] = [createContentTypeInterceptor(buffer.getContentType())];
  const tokenSource = options.tokenSource ?? buildTokenSource(config, transport, options.clock);
  if (tokenSource) {
    interceptors.push(
      createCredentialInterceptor(new CredentialProvider(tokenSource, { clock: options.clock, logger })),
    );
  }
  interceptors.push(...(options.interceptors ?? []));

  const client = createDefaultHttpClient({
    clientName: 'http-sink',
    transport,
    transportOptions,
    errorPolicy: createErrorPolicy(config),
    retryScheduler: createRetryScheduler(config),
    interceptors,
    logger,
    metrics: options.metrics,
    clock: options.clock,
    sleep: options.sleep,
  });

  return new HttpRecordWriter({
    client,
    buffer,
    resolver,
    method: config.method,
    url: config.url,
    batchSize: config.batchSize,
    charset: config.charset,
    headers: config.requestHeaders,
    logger,
  });
}

/**
 * Builds a writer from `HTTP_SINK_*` environment variables.
 */
export function createHttpSinkWriterFromEnv(
  schema: RecordSchema,
  options: HttpSinkWriterOptions & { env?: NodeJS.ProcessEnv } = {},
): HttpRecordWriter {
  const { env, ...writerOptions } = options;
  return createHttpSinkWriter(loadSinkConfigFromEnv(env), schema, writerOptions);
}

function buildTokenSource(
  config: SinkConfig,
  transport: HttpTransport,
  clock: Clock | undefined,
): OAuth2TokenSource | undefined {
  const { oauth2 } = config;
  if (!oauth2.enabled || !oauth2.tokenUrl || !oauth2.clientId || !oauth2.clientSecret) {
    return undefined;
  }
  return createOAuth2TokenSource(
    {
      tokenUrl: oauth2.tokenUrl,
      clientId: oauth2.clientId,
      clientSecret: oauth2.clientSecret,
      refreshToken: oauth2.refreshToken,
      scopes: oauth2.scopes,
      grantType: oauth2.grantType,
    },
    { transport, clock },
  );
}
