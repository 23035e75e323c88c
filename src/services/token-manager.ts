import { z } from "zod/v4";
import {
  DEFAULT_TOKEN_LIFETIME_SECONDS,
  OAUTH_TOKEN_URL,
  TOKEN_EXPIRY_BUFFER_MS,
} from "../config/constants.js";
import type { ApiCredentials } from "../env.js";
import { AuthError } from "../utils/errors.js";
import { createLogger } from "../utils/logger.js";
import { Mutex } from "../utils/mutex.js";

const log = createLogger("token-manager");

const TokenResponse = z.object({
  access_token: z.string().min(1),
  token_type: z.string().optional(),
  expires_in: z.number().positive().optional(),
});

export type FetchFn = typeof fetch;

/** Bearer token plus the instant (buffer already subtracted) after which it must not be used. */
export interface Credential {
  token: string;
  expiresAt: number;
}

export interface TokenManagerOptions {
  tokenUrl?: string;
  fetch?: FetchFn;
  now?: () => number;
}

/**
 * Caches a client-credentials token and refreshes it near expiry.
 *
 * Concurrent callers that find the cache empty share one in-flight exchange.
 * The exchange and the write to `credential` happen under a mutex.
 */
export class TokenManager {
  private credential: Credential | null = null;
  private inflight: Promise<Credential> | null = null;
  private readonly mutex = new Mutex();
  private readonly tokenUrl: string;
  private readonly fetchFn: FetchFn;
  private readonly now: () => number;
  private exchanges = 0;

  constructor(
    private readonly credentials: ApiCredentials,
    opts: TokenManagerOptions = {},
  ) {
    this.tokenUrl = opts.tokenUrl ?? OAUTH_TOKEN_URL;
    this.fetchFn = opts.fetch ?? fetch;
    this.now = opts.now ?? (() => Date.now());
  }

  /** Number of token exchanges performed so far. */
  get exchangeCount(): number {
    return this.exchanges;
  }

  getToken(): Promise<Credential> {
    const cached = this.current();
    if (cached) return Promise.resolve(cached);
    return this.refresh();
  }

  invalidate(): void {
    this.credential = null;
  }

  /**
   * Drop the cached token if it is still `staleToken`, then return a valid one.
   * A token already replaced by another caller is returned as is.
   */
  forceRefresh(staleToken?: string): Promise<Credential> {
    if (staleToken === undefined || this.credential?.token === staleToken) {
      this.invalidate();
    }
    return this.getToken();
  }

  private current(): Credential | null {
    if (this.credential && this.now() < this.credential.expiresAt) {
      return this.credential;
    }
    return null;
  }

  private refresh(): Promise<Credential> {
    if (this.inflight) return this.inflight;

    const pending: Promise<Credential> = this.mutex
      .runExclusive(() => this.current() ?? this.exchange())
      .finally(() => {
        if (this.inflight === pending) this.inflight = null;
      });
    this.inflight = pending;
    return pending;
  }

  private async exchange(): Promise<Credential> {
    this.exchanges++;
    const basic = Buffer.from(
      `${this.credentials.clientId}:${this.credentials.clientSecret}`,
    ).toString("base64");

    let resp: Response;
    try {
      resp = await this.fetchFn(this.tokenUrl, {
        method: "POST",
        headers: {
          Authorization: `Basic ${basic}`,
          "Content-Type": "application/x-www-form-urlencoded",
        },
        body: new URLSearchParams({ grant_type: "client_credentials" }),
      });
    } catch (err) {
      log.error("Token exchange failed", { error: String(err) });
      throw new AuthError(undefined, `Network error getting access token: ${String(err)}`);
    }

    if (!resp.ok) {
      log.error("Token endpoint rejected credentials", { status: resp.status });
      throw new AuthError(resp.status);
    }

    const body: unknown = await resp.json().catch(() => null);
    const parsed = TokenResponse.safeParse(body);
    if (!parsed.success) {
      throw new AuthError(resp.status, "Malformed token response");
    }

    const lifetime = parsed.data.expires_in ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    this.credential = {
      token: parsed.data.access_token,
      expiresAt: this.now() + lifetime * 1000 - TOKEN_EXPIRY_BUFFER_MS,
    };

    log.info("Obtained access token", { expiresInSeconds: lifetime });
    return this.credential;
  }
}
