import { describe, it, expect } from "vitest";
import { boundedInt, parseItemId, parseItemIds, parseRealm, parseRegion } from "./params.js";
import { ValidationError } from "../utils/errors.js";

describe("request parameters", () => {
  it("parses regions case-insensitively", () => {
    expect(parseRegion("EU")).toBe("eu");
    expect(() => parseRegion("cn")).toThrow(ValidationError);
  });

  it("validates realm slugs", () => {
    expect(parseRealm("Area-52")).toBe("area-52");
    expect(() => parseRealm("bad realm!")).toThrow(ValidationError);
  });

  it("accepts positive integer item ids only", () => {
    expect(parseItemId("19019")).toBe(19019);
    expect(() => parseItemId("0")).toThrow("Invalid item ID");
    expect(() => parseItemId("1.5")).toThrow("Invalid item ID");
  });

  it("defaults and clamps integer queries", () => {
    expect(boundedInt(undefined, 24, 1, 168)).toBe(24);
    expect(boundedInt("", 24, 1, 168)).toBe(24);
    expect(boundedInt("abc", 24, 1, 168)).toBe(24);
    expect(boundedInt("500", 24, 1, 168)).toBe(168);
    expect(boundedInt("-3", 24, 1, 168)).toBe(1);
    expect(boundedInt("12.9", 24, 1, 168)).toBe(12);
  });

  it("splits item id lists", () => {
    expect(parseItemIds("1, 2,x,3,0")).toEqual([1, 2, 3]);
    expect(parseItemIds(undefined)).toEqual([]);
  });
});
