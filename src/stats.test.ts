import { describe, expect, it } from "vitest";
import { mean, percentile, roundOrNull, roundTo, wilsonInterval } from "./stats.js";

describe("mean", () => {
  it("returns null for empty input", () => {
    expect(mean([])).toBeNull();
  });

  it("averages values", () => {
    expect(mean([500, 800])).toBe(650);
  });
});

describe("wilsonInterval", () => {
  it("returns zeros when total is zero", () => {
    expect(wilsonInterval(0, 0)).toEqual({ center: 0, low: 0, high: 0 });
  });

  it("bounds interval within [0,1]", () => {
    const { low, high } = wilsonInterval(5, 10);
    expect(low).toBeGreaterThanOrEqual(0);
    expect(high).toBeLessThanOrEqual(1);
  });

  it("centers around sample proportion", () => {
    const { center } = wilsonInterval(8, 10);
    expect(center).toBeGreaterThan(0.7);
    expect(center).toBeLessThan(0.9);
  });
});

describe("percentile", () => {
  it("returns null for no values", () => {
    expect(percentile([], 50)).toBeNull();
  });

  it("returns the only value for a single sample", () => {
    expect(percentile([3.2], 50)).toBe(3.2);
    expect(percentile([3.2], 95)).toBe(3.2);
  });

  it("interpolates linearly between ranks", () => {
    expect(percentile([1, 2, 3, 4], 50)).toBeCloseTo(2.5, 10);
    expect(percentile([1, 2, 3, 4], 95)).toBeCloseTo(3.85, 10);
  });

  it("sorts its input first", () => {
    expect(percentile([10, 1, 5], 50)).toBe(5);
    expect(percentile([10, 1, 5], 95)).toBeCloseTo(9.5, 10);
  });

  it("clamps to the extremes", () => {
    expect(percentile([10, 1, 5], 0)).toBe(1);
    expect(percentile([10, 1, 5], 100)).toBe(10);
  });

  it("does not mutate the input", () => {
    const values = [3, 1, 2];
    percentile(values, 50);
    expect(values).toEqual([3, 1, 2]);
  });
});

describe("roundTo", () => {
  it("rounds away float noise", () => {
    expect(roundTo(0.8 * 0.9, 4)).toBe(0.72);
    expect(roundTo(0.36 - 0.72, 4)).toBe(-0.36);
    expect(roundTo(1234.5678, 2)).toBe(1234.57);
  });

  it("passes null through", () => {
    expect(roundOrNull(null, 2)).toBeNull();
    expect(roundOrNull(1.005, 0)).toBe(1);
  });
});
