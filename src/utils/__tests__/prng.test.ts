import { describe, expect, it } from "vitest";
import { mulberry32, shuffled } from "../prng";

describe("mulberry32", () => {
  it("repeats its sequence for the same seed", () => {
    const a = mulberry32(42);
    const b = mulberry32(42);
    const seqA = Array.from({ length: 20 }, () => a());
    const seqB = Array.from({ length: 20 }, () => b());
    expect(seqA).toEqual(seqB);
  });

  it("diverges for different seeds", () => {
    expect(mulberry32(1)()).not.toBe(mulberry32(2)());
  });

  it("stays within [0, 1)", () => {
    const rng = mulberry32(7);
    for (let i = 0; i < 1000; i++) {
      const v = rng();
      expect(v).toBeGreaterThanOrEqual(0);
      expect(v).toBeLessThan(1);
    }
  });
});

describe("shuffled", () => {
  it("returns a permutation of 0..n-1", () => {
    const idx = shuffled(12, mulberry32(3));
    expect(idx).toHaveLength(12);
    expect([...idx].sort((p, q) => p - q)).toEqual(Array.from({ length: 12 }, (_, i) => i));
  });

  it("handles empty and single-element ranges", () => {
    expect(shuffled(0, mulberry32(3))).toEqual([]);
    expect(shuffled(1, mulberry32(3))).toEqual([0]);
  });
});
