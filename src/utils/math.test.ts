import { describe, it, expect } from "vitest";
import { average, clamp, median, sum } from "./math.js";

describe("median", () => {
  it("returns 0 for empty array", () => {
    expect(median([])).toBe(0);
  });

  it("returns the middle value for odd count", () => {
    expect(median([3, 1, 2])).toBe(2);
  });

  it("returns average of two middles for even count", () => {
    expect(median([1, 2, 3, 4])).toBe(2.5);
  });

  it("does not mutate the original array", () => {
    const arr = [3, 1, 2];
    median(arr);
    expect(arr).toEqual([3, 1, 2]);
  });
});

describe("average", () => {
  it("returns 0 for empty array", () => {
    expect(average([])).toBe(0);
  });

  it("averages mixed values", () => {
    expect(average([10, 20, 30])).toBe(20);
    expect(average([-10, 10])).toBe(0);
    expect(average([1, 2])).toBe(1.5);
  });
});

describe("sum", () => {
  it("adds values", () => {
    expect(sum([])).toBe(0);
    expect(sum([1, 2, 3.5])).toBe(6.5);
  });
});

describe("clamp", () => {
  it("bounds values to the range", () => {
    expect(clamp(5, 10, 500)).toBe(10);
    expect(clamp(750, 10, 500)).toBe(500);
    expect(clamp(42, 10, 500)).toBe(42);
  });
});
