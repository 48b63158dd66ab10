export * from './types';
export * from './errors';
export * from './errorPolicy';
export * from './retryScheduler';
export * from './credentials';
export * from './interceptors';
export { HttpClient, redactHeaders } from './HttpClient';
export type { DeliveryResult, HttpClientConfig } from './HttpClient';
export { ConsoleLogger, createDefaultHttpClient, DEFAULT_MAX_RETRY_DURATION_MS, DEFAULT_TRANSPORT_OPTIONS } from './factories';
export type { LogLevel } from './factories';
export * from './transport/axiosTransport';
export * from './transport/agents';
