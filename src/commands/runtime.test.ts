import { describe, it, expect, vi } from "vitest";
import { abortOnShutdownSignals, parsePositiveInt } from "./runtime.js";
import type { Logger } from "../utils/logger.js";

function silentLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

describe("abortOnShutdownSignals", () => {
  it("aborts on SIGTERM and removes its handlers", () => {
    const before = process.listenerCount("SIGTERM");
    const beforeInt = process.listenerCount("SIGINT");
    const controller = new AbortController();
    const log = silentLogger();

    const remove = abortOnShutdownSignals(controller, log);
    expect(process.listenerCount("SIGTERM")).toBe(before + 1);

    process.emit("SIGTERM");
    process.emit("SIGTERM");
    expect(controller.signal.aborted).toBe(true);
    expect(log.info).toHaveBeenCalledTimes(1);

    remove();
    expect(process.listenerCount("SIGTERM")).toBe(before);
    expect(process.listenerCount("SIGINT")).toBe(beforeInt);
  });
});

describe("parsePositiveInt", () => {
  it("falls back for missing, invalid and non-positive values", () => {
    expect(parsePositiveInt("15", 5)).toBe(15);
    expect(parsePositiveInt(undefined, 5)).toBe(5);
    expect(parsePositiveInt("abc", 5)).toBe(5);
    expect(parsePositiveInt("0", 5)).toBe(5);
  });
});
