import {
  RATE_LIMIT_MAX_REQUESTS,
  RATE_LIMIT_MAX_WAIT_ITERATIONS,
  RATE_LIMIT_WINDOW_MS,
} from "../config/constants.js";
import { sleep } from "./datetime.js";
import { RateLimitedError } from "./errors.js";
import { createLogger } from "./logger.js";
import { Mutex } from "./mutex.js";

const log = createLogger("rate-limiter");

export interface RateLimiterOptions {
  maxRequests?: number;
  windowMs?: number;
  /** Upper bound on wait/retry rounds for a single acquire. */
  maxWaitIterations?: number;
  now?: () => number;
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Sliding-window limiter: at most `maxRequests` admissions in any `windowMs` span.
 *
 * A timestamp `t` occupies the window until `t + windowMs`. Admission and pruning
 * run under a mutex; the mutex is released while a caller sleeps, and every wake-up
 * re-checks the window from scratch so a batch of sleepers cannot burst past the quota.
 */
export class RateLimiter {
  private timestamps: number[] = [];
  private readonly mutex = new Mutex();
  private readonly maxRequests: number;
  private readonly windowMs: number;
  private readonly maxWaitIterations: number;
  private readonly now: () => number;
  private readonly sleep: (ms: number) => Promise<void>;
  private waiting = 0;

  constructor(opts: RateLimiterOptions = {}) {
    this.maxRequests = opts.maxRequests ?? RATE_LIMIT_MAX_REQUESTS;
    this.windowMs = opts.windowMs ?? RATE_LIMIT_WINDOW_MS;
    this.maxWaitIterations = opts.maxWaitIterations ?? RATE_LIMIT_MAX_WAIT_ITERATIONS;
    this.now = opts.now ?? (() => Date.now());
    this.sleep = opts.sleep ?? sleep;
  }

  /** Callers currently suspended waiting for a slot. */
  get pending(): number {
    return this.waiting;
  }

  /** Admissions still inside the trailing window. */
  inWindow(): number {
    this.prune(this.now());
    return this.timestamps.length;
  }

  async acquire(): Promise<void> {
    for (let iteration = 0; iteration < this.maxWaitIterations; iteration++) {
      const waitMs = await this.mutex.runExclusive(() => this.tryAdmit());
      if (waitMs === 0) return;

      log.debug("Rate limit window full, waiting", { waitMs, iteration });
      this.waiting++;
      try {
        await this.sleep(waitMs);
      } finally {
        this.waiting--;
      }
    }

    log.warn("Gave up waiting for a rate limit slot", {
      maxWaitIterations: this.maxWaitIterations,
    });
    throw new RateLimitedError(Math.ceil(this.windowMs / 1000));
  }

  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    return fn();
  }

  /** Returns 0 when admitted, otherwise the milliseconds until the oldest entry leaves the window. */
  private tryAdmit(): number {
    const now = this.now();
    this.prune(now);

    if (this.timestamps.length < this.maxRequests) {
      this.timestamps.push(now);
      return 0;
    }

    const oldest = this.timestamps[0] ?? now;
    return Math.max(1, oldest + this.windowMs - now);
  }

  private prune(now: number): void {
    const cutoff = now - this.windowMs;
    let expired = 0;
    while (expired < this.timestamps.length && (this.timestamps[expired] ?? now) <= cutoff) {
      expired++;
    }
    if (expired > 0) this.timestamps.splice(0, expired);
  }
}
