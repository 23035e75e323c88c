import { describe, it, expect, vi } from "vitest";
import { composeHooks, intercept, loggingHooks, OperationCounter } from "./interceptor.js";
import type { Logger } from "./logger.js";

function clock(...times: number[]) {
  let i = 0;
  return () => times[Math.min(i++, times.length - 1)] ?? 0;
}

describe("intercept", () => {
  it("reports the result and duration", async () => {
    const before = vi.fn();
    const after = vi.fn();

    const result = await intercept("op", async () => 42, { before, after }, clock(100, 175));

    expect(result).toBe(42);
    expect(before).toHaveBeenCalledWith("op");
    expect(after).toHaveBeenCalledWith("op", 42, 75);
  });

  it("reports and rethrows errors", async () => {
    const onError = vi.fn();
    const boom = new Error("boom");

    await expect(
      intercept(
        "op",
        async () => {
          throw boom;
        },
        { onError },
        clock(0, 10),
      ),
    ).rejects.toBe(boom);
    expect(onError).toHaveBeenCalledWith("op", boom, 10);
  });
});

describe("composeHooks", () => {
  it("runs every hook set in order", async () => {
    const calls: string[] = [];
    const hooks = composeHooks(
      { before: () => calls.push("a:before"), after: () => calls.push("a:after") },
      { before: () => calls.push("b:before") },
    );

    await intercept("op", async () => "x", hooks);

    expect(calls).toEqual(["a:before", "b:before", "a:after"]);
  });
});

describe("loggingHooks", () => {
  it("logs failures at warn with context", async () => {
    const log: Logger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };

    await intercept(
      "GET /x",
      async () => {
        throw new Error("nope");
      },
      loggingHooks(log, { region: "us" }),
      clock(0, 5),
    ).catch(() => undefined);

    expect(log.debug).toHaveBeenCalledWith("Operation start", { region: "us", operation: "GET /x" });
    expect(log.warn).toHaveBeenCalledWith("Operation failed", {
      region: "us",
      operation: "GET /x",
      durationMs: 5,
      error: "Error: nope",
    });
  });
});

describe("OperationCounter", () => {
  it("counts calls and failures alongside other hooks", async () => {
    const counter = new OperationCounter();
    const before = vi.fn();
    const hooks = composeHooks({ before }, counter.hooks);

    await intercept("ok", async () => 1, hooks, clock(0, 10));
    await intercept(
      "bad",
      async () => {
        throw new Error("x");
      },
      hooks,
      clock(0, 21),
    ).catch(() => undefined);

    expect(before).toHaveBeenCalledTimes(2);
    expect(counter.stats()).toEqual({ calls: 2, failures: 1, avgDurationMs: 16 });
  });

  it("reports zero before any call", () => {
    expect(new OperationCounter().stats()).toEqual({ calls: 0, failures: 0, avgDurationMs: 0 });
  });
});
