import { describe, it, expect, vi } from "vitest";
import { RateLimiter } from "./rate-limiter.js";
import { RateLimitedError } from "./errors.js";

/** Virtual clock whose sleep advances time instantly. */
function virtualClock() {
  let t = 0;
  const sleeps: number[] = [];
  return {
    sleeps,
    now: () => t,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      t += ms;
    },
  };
}

describe("RateLimiter", () => {
  it("admits up to the quota without waiting", async () => {
    const clock = virtualClock();
    const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, ...clock });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([]);
    expect(limiter.inWindow()).toBe(3);
  });

  it("waits until the oldest admission leaves the window", async () => {
    const clock = virtualClock();
    const limiter = new RateLimiter({ maxRequests: 2, windowMs: 1000, ...clock });

    await limiter.acquire();
    await limiter.acquire();
    await limiter.acquire();

    expect(clock.sleeps).toEqual([1000]);
    expect(clock.now()).toBe(1000);
    expect(limiter.inWindow()).toBe(1);
  });

  it("never admits more than the quota in any window under concurrency", async () => {
    const clock = virtualClock();
    const admitted: number[] = [];
    const limiter = new RateLimiter({ maxRequests: 3, windowMs: 1000, ...clock });

    await Promise.all(
      Array.from({ length: 20 }, () => limiter.run(async () => void admitted.push(clock.now()))),
    );

    expect(admitted).toHaveLength(20);
    const sorted = [...admitted].sort((a, b) => a - b);
    for (const t of sorted) {
      const inWindow = sorted.filter((u) => u > t - 1000 && u <= t).length;
      expect(inWindow).toBeLessThanOrEqual(3);
    }
  });

  it("gives up after the configured number of waits", async () => {
    const sleep = vi.fn(async () => {});
    const limiter = new RateLimiter({ maxRequests: 1, windowMs: 1000, maxWaitIterations: 3, now: () => 0, sleep });

    await limiter.acquire();
    const err = await limiter.acquire().catch((e: unknown) => e);

    expect(err).toBeInstanceOf(RateLimitedError);
    expect(err).toMatchObject({ retryAfterSeconds: 1 });
    expect(sleep).toHaveBeenCalledTimes(3);
  });

  it("reports callers suspended for a slot", async () => {
    let wake = () => {};
    let t = 0;
    const limiter = new RateLimiter({
      maxRequests: 1,
      windowMs: 1000,
      now: () => t,
      sleep: (ms) =>
        new Promise<void>((resolve) => {
          wake = () => {
            t += ms;
            resolve();
          };
        }),
    });

    await limiter.acquire();
    const second = limiter.acquire();
    await vi.waitFor(() => expect(limiter.pending).toBe(1));

    wake();
    await second;
    expect(limiter.pending).toBe(0);
  });
});
