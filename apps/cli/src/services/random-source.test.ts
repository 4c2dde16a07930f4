import { describe, it, expect } from "vitest";
import { cryptoRandomSource } from "./random-source.js";

describe("cryptoRandomSource", () => {
  it("returns integers within [0, maxExclusive)", () => {
    for (let i = 0; i < 500; i++) {
      const value = cryptoRandomSource.randomInt(7);
      expect(Number.isInteger(value)).toBe(true);
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(7);
    }
  });

  it("always returns 0 for a range of one", () => {
    expect(cryptoRandomSource.randomInt(1)).toBe(0);
  });

  it("rejects an empty or fractional range", () => {
    expect(() => cryptoRandomSource.randomInt(0)).toThrow(RangeError);
    expect(() => cryptoRandomSource.randomInt(2.5)).toThrow(RangeError);
  });
});
