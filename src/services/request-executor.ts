import type { z } from "zod/v4";
import {
  apiBaseUrl,
  DEFAULT_LOCALE,
  DEFAULT_RETRY_AFTER_SECONDS,
  REQUEST_TIMEOUT_MS,
} from "../config/constants.js";
import { alternateRegion, type Region } from "../config/regions.js";
import { sleep } from "../utils/datetime.js";
import {
  errorMessage,
  ForbiddenError,
  NetworkError,
  NotFoundError,
  RateLimitedError,
  ServerError,
} from "../utils/errors.js";
import { intercept, loggingHooks, type InterceptorHooks } from "../utils/interceptor.js";
import { createLogger } from "../utils/logger.js";
import type { RateLimiter } from "../utils/rate-limiter.js";
import { withRetry, type RetryOptions } from "../utils/retry.js";
import type { FetchFn, TokenManager } from "./token-manager.js";

const log = createLogger("request-executor");

export interface ApiRequest<T> {
  path: string;
  /** Explicit region override. Without one the default region is used and may fall back. */
  region?: Region;
  /** Defaults to the namespace `namespaceFor` picks for the path. */
  namespace?: string;
  params?: Record<string, string>;
  schema: z.ZodType<T>;
}

/** A response together with the region that served it. */
export interface Resolved<T> {
  data: T;
  region: Region;
}

export interface RequestExecutorOptions {
  region: Region;
  locale?: string;
  fetch?: FetchFn;
  sleep?: (ms: number) => Promise<void>;
  baseUrl?: (region: Region) => string;
  retry?: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs">;
  timeoutMs?: number;
  hooks?: InterceptorHooks;
}

const STATIC_PATH = /^\/data\/wow\/(item|media)\//;

/** Profile paths use `profile-*`, game data that never changes `static-*`, the rest `dynamic-*`. */
export function namespaceFor(path: string, region: Region): string {
  if (path.includes("/profile/")) return `profile-${region}`;
  if (STATIC_PATH.test(path)) return `static-${region}`;
  return `dynamic-${region}`;
}

/** Retry-After is seconds in practice; HTTP dates are accepted too. */
export function parseRetryAfter(header: string | null, now: number = Date.now()): number | null {
  if (!header) return null;
  const seconds = Number(header);
  if (Number.isFinite(seconds) && seconds >= 0) return seconds;
  const date = Date.parse(header);
  if (Number.isNaN(date)) return null;
  return Math.max(0, Math.ceil((date - now) / 1000));
}

/**
 * Issues authenticated GETs against the game data API.
 *
 * Every outbound request, including the single retry after a 403, first takes a
 * slot from the shared RateLimiter. Network failures and 5xx answers are retried
 * with exponential backoff; 404 and 429 are surfaced immediately.
 */
export class RequestExecutor {
  readonly region: Region;
  private readonly locale: string;
  private readonly fetchFn: FetchFn;
  private readonly sleep: (ms: number) => Promise<void>;
  private readonly baseUrl: (region: Region) => string;
  private readonly retry: Pick<RetryOptions, "maxAttempts" | "baseDelayMs" | "maxDelayMs">;
  private readonly timeoutMs: number;
  private readonly hooks: InterceptorHooks;

  constructor(
    private readonly tokens: TokenManager,
    private readonly limiter: RateLimiter,
    opts: RequestExecutorOptions,
  ) {
    this.region = opts.region;
    this.locale = opts.locale ?? DEFAULT_LOCALE;
    this.fetchFn = opts.fetch ?? fetch;
    this.sleep = opts.sleep ?? sleep;
    this.baseUrl = opts.baseUrl ?? apiBaseUrl;
    this.retry = opts.retry ?? {};
    this.timeoutMs = opts.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.hooks = opts.hooks ?? loggingHooks(log);
  }

  execute<T>(request: ApiRequest<T>): Promise<T> {
    const region = request.region ?? this.region;
    return intercept(
      `GET ${region}${request.path}`,
      () =>
        withRetry(() => this.attempt(request, region), {
          ...this.retry,
          sleep: this.sleep,
          context: { path: request.path, region },
        }),
      this.hooks,
    );
  }

  /**
   * Like `execute`, but a 403 on a request without a region override is retried
   * once against the alternate region. When that also fails the original error wins.
   */
  async executeWithRegionFallback<T>(request: ApiRequest<T>): Promise<Resolved<T>> {
    try {
      return { data: await this.execute(request), region: request.region ?? this.region };
    } catch (err) {
      if (!(err instanceof ForbiddenError) || request.region !== undefined) throw err;

      const alternate = alternateRegion(this.region);
      log.warn("403 from primary region, trying alternate region", {
        path: request.path,
        region: this.region,
        alternate,
      });

      try {
        return { data: await this.execute({ ...request, region: alternate }), region: alternate };
      } catch (altErr) {
        log.warn("Alternate region also failed", {
          path: request.path,
          alternate,
          error: errorMessage(altErr),
        });
        throw err;
      }
    }
  }

  private buildUrl<T>(request: ApiRequest<T>, region: Region): string {
    const params = new URLSearchParams({
      namespace: request.namespace ?? namespaceFor(request.path, region),
      locale: this.locale,
      ...request.params,
    });
    return `${this.baseUrl(region)}${request.path}?${params.toString()}`;
  }

  private async attempt<T>(request: ApiRequest<T>, region: Region): Promise<T> {
    const url = this.buildUrl(request, region);

    await this.limiter.acquire();
    const credential = await this.tokens.getToken();
    let resp = await this.send(url, credential.token);

    if (resp.status === 403) {
      await resp.body?.cancel();
      log.warn("Got 403 Forbidden, refreshing token", { path: request.path, region });

      const fresh = await this.tokens.forceRefresh(credential.token);
      await this.limiter.acquire();
      resp = await this.send(url, fresh.token);

      if (resp.status === 403) {
        const body = await readText(resp);
        log.error("Request still forbidden after token refresh", { path: request.path, region });
        throw new ForbiddenError(request.path, body);
      }
    }

    return this.handle(resp, request);
  }

  private async send(url: string, token: string): Promise<Response> {
    try {
      return await this.fetchFn(url, {
        headers: {
          Authorization: `Bearer ${token}`,
          Accept: "application/json",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      throw new NetworkError(errorMessage(err), { cause: err });
    }
  }

  private async handle<T>(resp: Response, request: ApiRequest<T>): Promise<T> {
    if (resp.status === 404) {
      const body = await readText(resp);
      log.info("Resource not found", { path: request.path, body });
      throw new NotFoundError(request.path);
    }

    if (resp.status === 429) {
      await resp.body?.cancel();
      const retryAfter = parseRetryAfter(resp.headers.get("Retry-After")) ?? DEFAULT_RETRY_AFTER_SECONDS;
      log.warn("Rate limited by upstream", { retryAfter, path: request.path });
      await this.sleep(retryAfter * 1000);
      throw new RateLimitedError(retryAfter);
    }

    if (!resp.ok) {
      const body = await readText(resp);
      log.error("API request failed", { status: resp.status, path: request.path, body });
      throw new ServerError(resp.status, body);
    }

    let body: unknown;
    try {
      body = await resp.json();
    } catch (err) {
      throw new ServerError(resp.status, `Invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = request.schema.safeParse(body);
    if (!parsed.success) {
      log.error("Unexpected response shape", { path: request.path, error: parsed.error.message });
      throw new ServerError(resp.status, `Unexpected response shape: ${parsed.error.message}`);
    }
    return parsed.data;
  }
}

async function readText(resp: Response): Promise<string> {
  const text = await resp.text().catch(() => "");
  return text.slice(0, 200);
}
