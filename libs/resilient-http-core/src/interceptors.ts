import type { CredentialProvider } from './credentials';
import type { HttpHeaders, HttpRequestInterceptor } from './types';

export type TokenLookup = () => Promise<string | null> | string | null;

function hasHeader(headers: HttpHeaders, name: string): boolean {
  const wanted = name.toLowerCase();
  return Object.keys(headers).some((key) => key.toLowerCase() === wanted);
}

/**
 * Sets `Authorization: Bearer <token>` on every attempt. The token is looked
 * up per attempt, so a retry after a refresh carries the new one; a null token
 * leaves the header unset.
 *
 * @example
 * ```typescript
 * const client = createDefaultHttpClient({
 *   clientName: 'orders-sink',
 *   interceptors: [createBearerTokenInterceptor(() => process.env.SINK_API_TOKEN ?? null)],
 * });
 * ```
 */
export function createBearerTokenInterceptor(getToken: TokenLookup): HttpRequestInterceptor {
  return {
    async beforeSend({ request }) {
      const token = await getToken();
      if (token) {
        request.headers.Authorization = `Bearer ${token}`;
      }
    },
  };
}

/**
 * Bearer auth from a {@link CredentialProvider}. A 401 from the sink drops the
 * cached token, so the next attempt fetches a fresh one.
 */
export function createCredentialInterceptor(provider: CredentialProvider): HttpRequestInterceptor {
  return {
    ...createBearerTokenInterceptor(async () => (await provider.getToken()).value),
    afterResponse({ response }) {
      if (response.status === 401) {
        provider.invalidate();
      }
    },
  };
}

/** Sets Content-Type on attempts that carry a body, unless one is already set. */
export function createContentTypeInterceptor(contentType: string): HttpRequestInterceptor {
  return {
    beforeSend({ request }) {
      if (request.body !== undefined && !hasHeader(request.headers, 'Content-Type')) {
        request.headers['Content-Type'] = contentType;
      }
    },
  };
}
