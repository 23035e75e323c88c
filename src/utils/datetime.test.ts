import { describe, it, expect } from "vitest";
import { getEventListeners } from "node:events";
import { abortableSleep, isoTimeAgo } from "./datetime.js";

describe("isoTimeAgo", () => {
  it("offsets by whole hours", () => {
    expect(isoTimeAgo(2, Date.parse("2025-03-01T12:00:00.000Z"))).toBe("2025-03-01T10:00:00.000Z");
  });
});

describe("abortableSleep", () => {
  it("leaves no abort listener behind when the timer fires", async () => {
    const controller = new AbortController();

    for (let i = 0; i < 3; i++) await abortableSleep(1, controller.signal);

    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });

  it("resolves early on abort", async () => {
    const controller = new AbortController();
    const started = Date.now();

    const pending = abortableSleep(60_000, controller.signal);
    controller.abort();
    await pending;

    expect(Date.now() - started).toBeLessThan(1_000);
    expect(getEventListeners(controller.signal, "abort")).toHaveLength(0);
  });
});
