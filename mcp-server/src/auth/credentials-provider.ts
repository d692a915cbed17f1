import type { AxiosInstance } from 'axios';
import { z } from 'zod';
import { toTransportError } from '../clients/databricks-http.js';
import { TransportError } from '../errors/warehouse-errors.js';

/**
 * Supplies the Authorization header for workspace requests.
 */
export interface CredentialsProvider {
  readonly type: 'pat' | 'oauth-m2m';
  getAuthorizationHeader(): Promise<string>;
}

export class PersonalAccessTokenProvider implements CredentialsProvider {
  readonly type = 'pat';

  constructor(private readonly token: string) {}

  async getAuthorizationHeader(): Promise<string> {
    return `Bearer ${this.token}`;
  }
}

const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional()
});

export interface OAuthClientCredentialsOptions {
  http: AxiosInstance;
  clientId: string;
  clientSecret: string;
  scope?: string;
  now?: () => number;
}

// Refresh this long before the token expires, or at half its lifetime if shorter
const REFRESH_MARGIN_MS = 60 * 1000;
const DEFAULT_TOKEN_LIFETIME_SECONDS = 3600;

/**
 * OAuth machine-to-machine flow against the workspace's OIDC token endpoint.
 * Tokens are cached per provider; concurrent callers share one token request.
 */
export class OAuthClientCredentialsProvider implements CredentialsProvider {
  readonly type = 'oauth-m2m';

  private cached?: { header: string; refreshAt: number };
  private pending?: Promise<string>;
  private readonly now: () => number;

  constructor(private readonly options: OAuthClientCredentialsOptions) {
    this.now = options.now ?? Date.now;
  }

  async getAuthorizationHeader(): Promise<string> {
    if (this.cached && this.cached.refreshAt > this.now()) {
      return this.cached.header;
    }

    if (!this.pending) {
      this.pending = this.fetchToken().finally(() => {
        this.pending = undefined;
      });
    }
    return this.pending;
  }

  private async fetchToken(): Promise<string> {
    const target = 'POST /oidc/v1/token';
    const form = new URLSearchParams({
      grant_type: 'client_credentials',
      scope: this.options.scope ?? 'all-apis'
    });

    let data: unknown;
    try {
      const response = await this.options.http.post<unknown>('/oidc/v1/token', form.toString(), {
        auth: { username: this.options.clientId, password: this.options.clientSecret },
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' }
      });
      data = response.data;
    } catch (error) {
      throw toTransportError(error, target);
    }

    const parsed = TokenResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(`Malformed response from ${target}: missing access_token`);
    }

    const lifetimeMs = (parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS) * 1000;
    const header = `Bearer ${parsed.data.access_token}`;
    this.cached = {
      header,
      refreshAt: this.now() + lifetimeMs - Math.min(REFRESH_MARGIN_MS, lifetimeMs / 2)
    };
    return header;
  }
}
