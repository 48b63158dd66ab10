import { z } from 'zod';
import { CredentialError, TransientDeliveryError } from './errors';
import type { Clock, HttpTransport, Logger } from './types';

export interface AccessToken {
  value: string;
  /** Epoch millis. */
  expiresAt: number;
}

/**
 * Collaborator that knows how to obtain a fresh bearer token.
 */
export interface OAuth2TokenSource {
  getAccessToken(): Promise<AccessToken>;
}

const systemClock: Clock = { now: () => Date.now() };

export interface CredentialProviderOptions {
  clock?: Clock;
  logger?: Logger;
}

/**
 * Bearer token cache owned by one writer. The token is fetched lazily and
 * refreshed once `now >= expiresAt`; callers that arrive during a refresh
 * share the same in-flight request.
 */
export class CredentialProvider {
  private token: AccessToken | null = null;
  private refreshing: Promise<AccessToken> | null = null;
  private readonly clock: Clock;
  private readonly logger?: Logger;

  constructor(private readonly source: OAuth2TokenSource, options: CredentialProviderOptions = {}) {
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger;
  }

  async getToken(): Promise<AccessToken> {
    if (this.token && !this.isExpired(this.token)) {
      return this.token;
    }
    if (!this.refreshing) {
      this.refreshing = this.refresh().finally(() => {
        this.refreshing = null;
      });
    }
    return this.refreshing;
  }

  isExpired(token: AccessToken): boolean {
    return this.clock.now() >= token.expiresAt;
  }

  invalidate(): void {
    this.token = null;
  }

  private async refresh(): Promise<AccessToken> {
    this.logger?.debug('http.credentials.refresh', { hadToken: this.token !== null });
    const token = await this.source.getAccessToken();
    this.token = token;
    return token;
  }
}

export type OAuth2GrantType = 'refresh_token' | 'client_credentials';

export interface OAuth2Settings {
  tokenUrl: string;
  clientId: string;
  clientSecret: string;
  /** Required for the `refresh_token` grant. */
  refreshToken?: string;
  scopes?: string;
  grantType?: OAuth2GrantType;
}

export interface OAuth2TokenSourceOptions {
  transport: HttpTransport;
  clock?: Clock;
  /** Subtracted from `expires_in` so a token is renewed before the server rejects it. Default 60s. */
  expirySkewMs?: number;
  timeoutMs?: number;
}

const DEFAULT_EXPIRES_IN_SECONDS = 3600;
const DEFAULT_EXPIRY_SKEW_MS = 60_000;
const DEFAULT_TOKEN_TIMEOUT_MS = 30_000;

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.coerce.number().positive().optional(),
});

export type TokenResponse = z.infer<typeof tokenResponseSchema>;

/**
 * Token source for the `refresh_token` and `client_credentials` grants.
 */
export function createOAuth2TokenSource(
  settings: OAuth2Settings,
  options: OAuth2TokenSourceOptions,
): OAuth2TokenSource {
  const clock = options.clock ?? systemClock;
  const skewMs = options.expirySkewMs ?? DEFAULT_EXPIRY_SKEW_MS;
  const grantType = settings.grantType ?? 'refresh_token';

  return {
    async getAccessToken(): Promise<AccessToken> {
      const form = new URLSearchParams({
        grant_type: grantType,
        client_id: settings.clientId,
        client_secret: settings.clientSecret,
      });
      if (grantType === 'refresh_token' && settings.refreshToken) {
        form.set('refresh_token', settings.refreshToken);
      }
      if (settings.scopes) {
        form.set('scope', settings.scopes);
      }

      let status: number;
      let text: string;
      try {
        const response = await options.transport(
          {
            method: 'POST',
            url: settings.tokenUrl,
            headers: {
              'Content-Type': 'application/x-www-form-urlencoded',
              Accept: 'application/json',
            },
            body: new TextEncoder().encode(form.toString()),
          },
          AbortSignal.timeout(options.timeoutMs ?? DEFAULT_TOKEN_TIMEOUT_MS),
        );
        status = response.status;
        text = new TextDecoder().decode(response.body);
      } catch (error) {
        throw new TransientDeliveryError(
          `OAuth2 token request failed: ${error instanceof Error ? error.message : String(error)}`,
          { cause: error },
        );
      }

      if (isRejection(status)) {
        throw new CredentialError(`OAuth2 token request was rejected with status ${status}: ${text}`, {
          statusCode: status,
        });
      }
      if (status < 200 || status >= 300) {
        throw new TransientDeliveryError(`OAuth2 token request failed with status ${status}`, {
          statusCode: status,
        });
      }

      const parsed = tokenResponseSchema.safeParse(parseJson(text));
      if (!parsed.success) {
        throw new TransientDeliveryError(
          `OAuth2 token response is invalid: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`,
          { statusCode: status },
        );
      }

      const expiresInMs = (parsed.data.expires_in ?? DEFAULT_EXPIRES_IN_SECONDS) * 1000;
      return {
        value: parsed.data.access_token,
        expiresAt: clock.now() + Math.max(0, expiresInMs - skewMs),
      };
    },
  };
}

function isRejection(status: number): boolean {
  return status >= 400 && status < 500 && status !== 408 && status !== 429;
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}
