import axios, { type AxiosInstance, type AxiosProxyConfig, type AxiosRequestConfig } from 'axios';
import { ConfigurationError, TimeoutError } from '../errors';
import { CONNECT_TIMEOUT_CODE, ConnectTimeoutHttpAgent, ConnectTimeoutHttpsAgent } from './agents';
import type { HttpHeaders, HttpTransport, ProxySettings, RawHttpResponse, TransportOptions, TransportRequest } from '../types';

const MAX_REDIRECTS = 10;

/**
 * axios-based HTTP transport.
 *
 * Statuses are never turned into exceptions here; only network failures and
 * timeouts reject. The response body is always read in full (as a buffer) so the
 * keep-alive socket goes back to the agent after every attempt. The connect
 * timeout is enforced by the agents on every new socket; axios' own `timeout`
 * carries the read timeout.
 */
export const createAxiosTransport = (
  options: TransportOptions,
  axiosInstance: Pick<AxiosInstance, 'request'> = axios.create(),
): HttpTransport => {
  const httpAgent = new ConnectTimeoutHttpAgent({ keepAlive: true }, options.connectTimeoutMs);
  const httpsAgent = new ConnectTimeoutHttpsAgent(
    { keepAlive: true, rejectUnauthorized: !options.disableTlsValidation },
    options.connectTimeoutMs,
  );
  const proxy = options.proxy ? toAxiosProxy(options.proxy) : undefined;

  return async (req: TransportRequest, signal: AbortSignal): Promise<RawHttpResponse> => {
    const config: AxiosRequestConfig = {
      url: req.url,
      method: req.method,
      headers: req.headers,
      data: req.body ? Buffer.from(req.body.buffer, req.body.byteOffset, req.body.byteLength) : undefined,
      signal,
      responseType: 'arraybuffer',
      timeout: options.readTimeoutMs,
      maxRedirects: options.followRedirects ? MAX_REDIRECTS : 0,
      validateStatus: () => true,
      httpAgent,
      httpsAgent,
      proxy,
    };

    try {
      const response = await axiosInstance.request<ArrayBuffer>(config);
      return {
        status: response.status,
        headers: normalizeHeaders(response.headers),
        body: response.data ? new Uint8Array(response.data) : new Uint8Array(),
      };
    } catch (error) {
      if (axios.isAxiosError(error)) {
        if (error.code === CONNECT_TIMEOUT_CODE) {
          throw new TimeoutError(`Connect timed out after ${options.connectTimeoutMs}ms`);
        }
        if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
          throw new TimeoutError(`Read timed out after ${options.readTimeoutMs}ms`);
        }
      }
      throw error;
    }
  };
};

function toAxiosProxy(settings: ProxySettings): AxiosProxyConfig {
  let url: URL;
  try {
    url = new URL(settings.url);
  } catch {
    throw new ConfigurationError(`Proxy URL '${settings.url}' is malformed.`, 'proxyUrl');
  }
  const protocol = url.protocol.replace(/:$/, '');
  const port = url.port ? Number(url.port) : protocol === 'https' ? 443 : 80;
  return {
    protocol,
    host: url.hostname,
    port,
    auth: settings.username
      ? { username: settings.username, password: settings.password ?? '' }
      : undefined,
  };
}

function normalizeHeaders(source: Record<string, unknown> | undefined): HttpHeaders {
  const headers: HttpHeaders = {};
  if (!source) return headers;
  for (const [key, value] of Object.entries(source)) {
    if (value === undefined || value === null) continue;
    headers[key.toLowerCase()] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return headers;
}
