import { z } from 'zod';
import { AuthError, errorMessage } from './errors.js';
import type { Credentials, FetchLike, HttpResponse, Token } from './types.js';
import { DEFAULT_TOKEN_LIFETIME_SEC } from './utils.js';

export type TokenManagerOptions = {
  tokenUrl: string;
  safetyMarginSec?: number;
  timeoutMs?: number;
  fetch?: FetchLike;
  clock?: () => number;
}

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
});

const REJECTED_STATUSES = new Set([400, 401, 403]);

/**
 * TokenManager exchanges client credentials for a bearer token and caches it until it
 * comes within the safety margin of expiry. Concurrent callers share a single in-flight
 * exchange; tokens are replaced, never mutated.
 */
export class TokenManager {
  private token: Token | null = null;
  private pending: Promise<Token> | null = null;
  private exchanges: number = 0;

  private readonly tokenUrl: string;
  private readonly safetyMarginMs: number;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;
  private readonly clock: () => number;

  constructor(private readonly credentials: Credentials, options: TokenManagerOptions) {
    this.tokenUrl = options.tokenUrl;
    this.safetyMarginMs = (options.safetyMarginSec ?? 300) * 1000;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.clock = options.clock ?? Date.now;
  }

  /**
   * Returns the cached token while usable, otherwise joins or starts an exchange
   * @throws AuthError, retryable unless the credentials were rejected
   */
  getValidToken = async (): Promise<Token> => {
    if (this.token && this.isUsable(this.token, this.clock())) {
      return this.token;
    }
    if (!this.pending) {
      this.pending = this.exchange().finally(() => {
        this.pending = null;
      });
    }
    return this.pending;
  };

  // Drops the cached token, e.g. after the API answered 401
  invalidate = (): void => {
    this.token = null;
  };

  exchangeCount = (): number => {
    return this.exchanges;
  };

  isUsable = (token: Token, now: number): boolean => {
    // short-lived tokens would otherwise never be usable
    const margin = Math.min(this.safetyMarginMs, (token.expiresAt - token.issuedAt) / 2);
    return now < token.expiresAt - margin;
  };

  private exchange = async (): Promise<Token> => {
    this.exchanges++;
    const body = new URLSearchParams({
      grant_type: 'client_credentials',
      client_id: this.credentials.clientId,
      client_secret: this.credentials.clientSecret,
    });

    let response: HttpResponse;
    try {
      response = await this.fetchImpl(this.tokenUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: body.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new AuthError(`Token endpoint unreachable: ${errorMessage(error)}`, true);
    }

    if (REJECTED_STATUSES.has(response.status)) {
      throw new AuthError(`Client credentials rejected (HTTP ${response.status})`, false);
    }
    if (!response.ok) {
      throw new AuthError(`Token exchange failed (HTTP ${response.status} ${response.statusText})`, true);
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch (error) {
      throw new AuthError(`Token response is not JSON: ${errorMessage(error)}`, true);
    }
    const parsed = tokenResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new AuthError('Token response is missing access_token', true);
    }

    const issuedAt = this.clock();
    const lifetimeSec = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SEC;
    this.token = {
      value: parsed.data.access_token,
      issuedAt,
      expiresAt: issuedAt + lifetimeSec * 1000,
    };
    console.log(`[TOKEN] Obtained access token, valid for ${lifetimeSec}s`);
    return this.token;
  };
}
