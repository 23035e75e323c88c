import { describe, it, expect } from "vitest";
import {
  ALL_US_REALMS,
  alternateRegion,
  DEFAULT_REALMS,
  detectRealmRegion,
  isRegion,
  normalizeRealm,
  POPULAR_REALMS,
} from "./regions.js";

describe("realm presets", () => {
  it("has five default realms, ten popular ones and caps all-us to the defaults", () => {
    expect(DEFAULT_REALMS).toHaveLength(5);
    expect(POPULAR_REALMS).toHaveLength(10);
    expect(ALL_US_REALMS).toEqual(DEFAULT_REALMS);
    expect(POPULAR_REALMS.every((r) => r.region === "us")).toBe(true);
  });

  it("has no duplicate popular realms", () => {
    const names = POPULAR_REALMS.map((r) => r.realm);
    expect(new Set(names).size).toBe(names.length);
  });
});

describe("isRegion", () => {
  it("accepts the four supported regions only", () => {
    expect(["us", "eu", "kr", "tw"].every(isRegion)).toBe(true);
    expect(isRegion("cn")).toBe(false);
    expect(isRegion("US")).toBe(false);
  });
});

describe("detectRealmRegion", () => {
  it("recognizes known EU realms case-insensitively", () => {
    expect(detectRealmRegion("Tarren-Mill")).toBe("eu");
    expect(detectRealmRegion("stormrage")).toBeUndefined();
  });
});

describe("alternateRegion", () => {
  it("falls back between us and eu", () => {
    expect(alternateRegion("us")).toBe("eu");
    expect(alternateRegion("eu")).toBe("us");
    expect(alternateRegion("kr")).toBe("us");
  });
});

describe("normalizeRealm", () => {
  it("trims and lowercases", () => {
    expect(normalizeRealm("  Area-52 ")).toBe("area-52");
  });
});
