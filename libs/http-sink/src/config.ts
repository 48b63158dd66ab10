import { z } from 'zod';
import {
  ConfigurationError,
  DEFAULT_MAX_RETRY_DURATION_MS,
  DEFAULT_TRANSPORT_OPTIONS,
  ErrorPolicyTable,
  parseErrorHandlingRules,
  parseRetryAction,
  type ConfigurationFailure,
  type ErrorHandlingRule,
  type HttpHeaders,
  type HttpMethod,
} from '@batchsink/resilient-http-core';
import { normalizeCharset, SUPPORTED_CHARSETS } from './charset';
import { MESSAGE_FORMATS } from './messageBuffer';
import { findPlaceholders, usesUrlPlaceholders } from './placeholders';
import { fieldNames, type RecordSchema } from './record';

const METHODS = ['GET', 'POST', 'PUT', 'DELETE'] as const satisfies readonly HttpMethod[];

// ============================================================================
// Field schemas
// ============================================================================

const booleanish = z.union([
  z.boolean(),
  z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .pipe(z.enum(['true', 'false']))
    .transform((value) => value === 'true'),
]);

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

const nonNegativeNumber = (message: string) => z.coerce.number({ invalid_type_error: message }).min(0, message);

const methodSchema = z
  .string()
  .transform((value) => value.trim().toUpperCase())
  .pipe(
    z.enum(METHODS, {
      errorMap: (_issue, ctx) => ({
        message: `Invalid request method ${String(ctx.data)}, must be one of ${METHODS.join(',')}.`,
      }),
    }),
  );

const messageFormatSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(
    z.enum(['json', 'csv', 'tsv', 'form', 'custom'], {
      errorMap: (_issue, ctx) => ({
        message: `Unsupported message format '${String(ctx.data)}'. Allowed values are: ${MESSAGE_FORMATS.join(', ')}.`,
      }),
    }),
  );

const charsetSchema = z.string().transform((value, ctx) => {
  const charset = normalizeCharset(value);
  if (!charset) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      message: `Unsupported charset '${value}'. Supported charsets: ${SUPPORTED_CHARSETS.join(', ')}.`,
    });
    return z.NEVER;
  }
  return charset;
});

const requestHeadersSchema = z
  .union([z.string(), z.record(z.string())])
  .transform((value, ctx): HttpHeaders => {
    if (typeof value !== 'string') return { ...value };
    try {
      return parseRequestHeaders(value);
    } catch (error) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: error instanceof Error ? error.message : String(error) });
      return z.NEVER;
    }
  });

const errorHandlingSchema = z
  .union([z.string(), z.array(z.object({ pattern: z.string(), action: z.string() }))])
  .transform((value, ctx): ErrorHandlingRule[] => {
    try {
      const rules = typeof value === 'string' ? parseErrorHandlingRules(value) : value;
      // Compiles every pattern and action so bad entries surface here.
      new ErrorPolicyTable(rules);
      return rules;
    } catch (error) {
      for (const message of failureMessages(error)) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message });
      }
      return z.NEVER;
    }
  });

const retryActionNameSchema = z.string().superRefine((value, ctx) => {
  try {
    parseRetryAction(value);
  } catch (error) {
    for (const message of failureMessages(error)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message });
    }
  }
});

const oauth2Schema = z
  .object({
    enabled: booleanish.default(false),
    tokenUrl: optionalString,
    clientId: optionalString,
    clientSecret: optionalString,
    refreshToken: optionalString,
    scopes: optionalString,
    grantType: z.enum(['refresh_token', 'client_credentials']).default('refresh_token'),
  })
  .superRefine((value, ctx) => {
    if (!value.enabled) return;
    const required = ['tokenUrl', 'clientId', 'clientSecret'] as const;
    for (const key of required) {
      if (!value[key]) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, path: [key], message: 'Property must be set when OAuth2 is enabled.' });
      }
    }
    if (value.grantType === 'refresh_token' && !value.refreshToken) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['refreshToken'],
        message: 'Property must be set for the refresh_token grant.',
      });
    }
  });

// ============================================================================
// Sink configuration
// ============================================================================

export const sinkConfigSchema = z
  .object({
    url: z.string({ required_error: 'URL is required.' }),
    method: methodSchema.default('POST'),
    batchSize: z.coerce.number().int().min(1, 'Batch size must be greater than 0.').default(1),
    messageFormat: messageFormatSchema.default('json'),
    body: z.string().optional(),
    writeJsonAsArray: booleanish.default(true),
    jsonBatchKey: optionalString,
    delimiterForMessages: z.string().default('\n'),
    requestHeaders: requestHeadersSchema.default({}),
    charset: charsetSchema.default('UTF-8'),
    followRedirects: booleanish.default(true),
    disableSSLValidation: booleanish.default(false),
    httpErrorsHandling: errorHandlingSchema.default([]),
    unmatchedStatusAction: retryActionNameSchema.optional(),
    retryPolicy: z
      .string()
      .transform((value) => value.trim().toLowerCase())
      .pipe(
        z.enum(['linear', 'exponential'], {
          errorMap: (_issue, ctx) => ({ message: `Unsupported value for 'retryPolicy': '${String(ctx.data)}'` }),
        }),
      )
      .default('exponential'),
    linearRetryInterval: nonNegativeNumber('Linear retry interval cannot be a negative number.').optional(),
    maxRetryDuration: nonNegativeNumber('Maximum retry duration cannot be a negative number.').default(
      DEFAULT_MAX_RETRY_DURATION_MS / 1000,
    ),
    connectTimeout: nonNegativeNumber('Connection Timeout cannot be a negative number.').default(
      DEFAULT_TRANSPORT_OPTIONS.connectTimeoutMs,
    ),
    readTimeout: nonNegativeNumber('Read Timeout cannot be a negative number.').default(
      DEFAULT_TRANSPORT_OPTIONS.readTimeoutMs,
    ),
    proxyUrl: optionalString,
    proxyUsername: optionalString,
    proxyPassword: optionalString,
    missingPlaceholder: z.enum(['keep', 'empty', 'fail']).default('keep'),
    oauth2: oauth2Schema.default({}),
  });

/**
 * Fields read by the checks that span several properties. Each one falls back
 * to undefined when it does not parse, independently of the others.
 */
const crossFieldSchema = z.object({
  url: z.string().optional().catch(undefined),
  proxyUrl: optionalString.catch(undefined),
  messageFormat: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .optional()
    .catch(undefined),
  body: z.string().optional().catch(undefined),
  retryPolicy: z
    .string()
    .transform((value) => value.trim().toLowerCase())
    .optional()
    .catch(undefined),
  linearRetryInterval: z.unknown(),
});

function crossFieldFailures(input: unknown): ConfigurationFailure[] {
  const parsed = crossFieldSchema.safeParse(input);
  if (!parsed.success) return [];
  const { url, proxyUrl, messageFormat, body, retryPolicy, linearRetryInterval } = parsed.data;

  const failures: ConfigurationFailure[] = [];
  if (url !== undefined && !isValidUrl(url)) {
    failures.push({ property: 'url', message: `URL '${url}' is malformed.` });
  }
  if (proxyUrl !== undefined && !isValidUrl(proxyUrl)) {
    failures.push({ property: 'proxyUrl', message: `Proxy URL '${proxyUrl}' is malformed.` });
  }
  if (messageFormat === 'custom' && body === undefined) {
    failures.push({ property: 'messageFormat', message: 'For Custom message format, message cannot be null.' });
  }
  if (retryPolicy === 'linear' && linearRetryInterval === undefined) {
    failures.push({ property: 'linearRetryInterval', message: 'Property must be set when retry policy is linear.' });
  }
  return failures;
}

export type SinkConfigInput = z.input<typeof sinkConfigSchema>;
export type SinkConfig = Readonly<z.output<typeof sinkConfigSchema>>;

/**
 * Validates `input` and applies defaults. Every problem found is reported in
 * one {@link ConfigurationError}.
 */
export function parseSinkConfig(input: unknown): SinkConfig {
  const result = sinkConfigSchema.safeParse(input);
  const failures: ConfigurationFailure[] = result.success
    ? []
    : result.error.issues.map((issue) => ({
        property: issue.path.length > 0 ? issue.path.join('.') : undefined,
        message: issue.message,
      }));
  failures.push(...crossFieldFailures(input));
  if (!result.success || failures.length > 0) {
    throw new ConfigurationError(failures);
  }
  return Object.freeze(result.data);
}

const ENV_PREFIX = 'HTTP_SINK_';

const ENV_KEYS: Record<string, keyof SinkConfigInput> = {
  URL: 'url',
  METHOD: 'method',
  BATCH_SIZE: 'batchSize',
  MESSAGE_FORMAT: 'messageFormat',
  BODY: 'body',
  WRITE_JSON_AS_ARRAY: 'writeJsonAsArray',
  JSON_BATCH_KEY: 'jsonBatchKey',
  DELIMITER_FOR_MESSAGES: 'delimiterForMessages',
  REQUEST_HEADERS: 'requestHeaders',
  CHARSET: 'charset',
  FOLLOW_REDIRECTS: 'followRedirects',
  DISABLE_SSL_VALIDATION: 'disableSSLValidation',
  HTTP_ERRORS_HANDLING: 'httpErrorsHandling',
  UNMATCHED_STATUS_ACTION: 'unmatchedStatusAction',
  RETRY_POLICY: 'retryPolicy',
  LINEAR_RETRY_INTERVAL: 'linearRetryInterval',
  MAX_RETRY_DURATION: 'maxRetryDuration',
  CONNECT_TIMEOUT: 'connectTimeout',
  READ_TIMEOUT: 'readTimeout',
  PROXY_URL: 'proxyUrl',
  PROXY_USERNAME: 'proxyUsername',
  PROXY_PASSWORD: 'proxyPassword',
  MISSING_PLACEHOLDER: 'missingPlaceholder',
};

const OAUTH2_ENV_KEYS: Record<string, string> = {
  ENABLED: 'enabled',
  TOKEN_URL: 'tokenUrl',
  CLIENT_ID: 'clientId',
  CLIENT_SECRET: 'clientSecret',
  REFRESH_TOKEN: 'refreshToken',
  SCOPES: 'scopes',
  GRANT_TYPE: 'grantType',
};

/**
 * Reads `HTTP_SINK_*` variables (OAuth2 settings under `HTTP_SINK_OAUTH2_*`),
 * overlays `overrides`, and validates the result like {@link parseSinkConfig}.
 */
export function loadSinkConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<SinkConfigInput> = {},
): SinkConfig {
  const input: Record<string, unknown> = {};
  for (const [suffix, key] of Object.entries(ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}${suffix}`];
    if (value !== undefined) input[key] = value;
  }
  const oauth2: Record<string, string> = {};
  for (const [suffix, key] of Object.entries(OAUTH2_ENV_KEYS)) {
    const value = env[`${ENV_PREFIX}OAUTH2_${suffix}`];
    if (value !== undefined) oauth2[key] = value;
  }
  if (Object.keys(oauth2).length > 0) input.oauth2 = oauth2;

  return parseSinkConfig({ ...input, ...overrides });
}

/**
 * Checks the input schema against the configuration: at least one field, and a
 * field for every URL placeholder (PUT/DELETE) and custom body placeholder.
 */
export function validateSchema(config: SinkConfig, schema: RecordSchema): void {
  const names = fieldNames(schema);
  if (names.length === 0) {
    throw new ConfigurationError('Schema must contain at least one field');
  }

  const failures: ConfigurationFailure[] = [];
  if (usesUrlPlaceholders(config.method)) {
    const missing = findPlaceholders(config.url)
      .map((binding) => binding.fieldName)
      .filter((name) => !names.includes(name));
    if (missing.length > 0) {
      failures.push({
        property: 'url',
        message: `Schema must contain all fields mentioned in the url. Missing: ${unique(missing).join(', ')}.`,
      });
    }
  }
  if (config.messageFormat === 'custom' && config.body !== undefined) {
    const missing = findPlaceholders(config.body)
      .map((binding) => binding.fieldName)
      .filter((name) => !names.includes(name));
    if (missing.length > 0) {
      failures.push({
        property: 'body',
        message: `Schema must contain all fields mentioned in the message body. Missing: ${unique(missing).join(', ')}.`,
      });
    }
  }
  if (failures.length > 0) {
    throw new ConfigurationError(failures);
  }
}

/**
 * Parses `name:value` pairs, one per line. Only the first colon separates, so
 * values may contain colons.
 */
export function parseRequestHeaders(value: string): HttpHeaders {
  const headers: HttpHeaders = {};
  for (const line of value.split('\n')) {
    if (!line.trim()) continue;
    const separator = line.indexOf(':');
    if (separator === -1) {
      throw new Error(`Unable to parse key-value pair '${line}'.`);
    }
    headers[line.slice(0, separator).trim()] = line.slice(separator + 1).trim();
  }
  return headers;
}

function isValidUrl(value: string): boolean {
  try {
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

function failureMessages(error: unknown): string[] {
  if (error instanceof ConfigurationError) {
    return error.failures.map((failure) => failure.message);
  }
  return [error instanceof Error ? error.message : String(error)];
}

function unique(values: string[]): string[] {
  return [...new Set(values)];
}
