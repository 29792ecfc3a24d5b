import { describe, expect, it } from "vitest";

import { createRng, deriveRng, hashSeed, randomSeed } from "../../src/core/random.js";

function draws(seed: string, count: number): number[] {
  const rng = createRng(seed);
  return Array.from({ length: count }, () => rng.next());
}

describe("createRng", () => {
  it("repeats the same stream for the same seed", () => {
    expect(draws("test-seed", 20)).toEqual(draws("test-seed", 20));
  });

  it("gives different streams for different seeds", () => {
    expect(draws("seed-a", 5)).not.toEqual(draws("seed-b", 5));
  });

  it("accepts numeric seeds", () => {
    expect(createRng(42).next()).toBe(createRng(42).next());
  });

  it("keeps next() within [0, 1)", () => {
    for (const value of draws("bounds", 1000)) {
      expect(value).toBeGreaterThanOrEqual(0);
      expect(value).toBeLessThan(1);
    }
  });

  it("keeps int() within the inclusive range", () => {
    const rng = createRng("ints");
    const seen = new Set<number>();
    for (let i = 0; i < 500; i += 1) {
      const value = rng.int(1, 4);
      expect(value).toBeGreaterThanOrEqual(1);
      expect(value).toBeLessThanOrEqual(4);
      seen.add(value);
    }
    expect([...seen].sort()).toEqual([1, 2, 3, 4]);
  });

  it("returns the only value of a single-point range", () => {
    expect(createRng("point").int(7, 7)).toBe(7);
  });

  it("throws on an empty range", () => {
    expect(() => createRng("empty").int(5, 4)).toThrow(RangeError);
  });

  it("samples distinct values", () => {
    const sample = createRng("sample").sample(["a", "b", "c", "d", "e"], 3);

    expect(sample).toHaveLength(3);
    expect(new Set(sample).size).toBe(3);
  });

  it("refuses to sample more values than exist", () => {
    expect(() => createRng("sample").sample(["a"], 2)).toThrow(RangeError);
  });

  it("never picks a zero weight", () => {
    const rng = createRng("weights");
    for (let i = 0; i < 200; i += 1) {
      expect(rng.weightedIndex([0, 1, 0])).toBe(1);
    }
  });

  it("rejects weights that sum to zero", () => {
    expect(() => createRng("weights").weightedIndex([0, 0])).toThrow(RangeError);
  });

  it("chance(0) is never true and chance(1) always is", () => {
    const rng = createRng("chance");
    for (let i = 0; i < 100; i += 1) {
      expect(rng.chance(0)).toBe(false);
      expect(rng.chance(1)).toBe(true);
    }
  });
});

describe("deriveRng", () => {
  it("is stable per (seed, repository id)", () => {
    expect(deriveRng("test-seed", 5001).next()).toBe(deriveRng("test-seed", 5001).next());
  });

  it("separates repositories under the same seed", () => {
    expect(deriveRng("test-seed", 5001).next()).not.toBe(deriveRng("test-seed", 5002).next());
  });
});

describe("seed helpers", () => {
  it("hashes strings to unsigned 32-bit integers", () => {
    const hash = hashSeed("test-seed");

    expect(Number.isInteger(hash)).toBe(true);
    expect(hash).toBeGreaterThanOrEqual(0);
    expect(hash).toBeLessThan(2 ** 32);
    expect(hashSeed("")).toBe(2166136261);
  });

  it("formats random seeds as eight hex digits", () => {
    expect(randomSeed()).toMatch(/^[0-9a-f]{8}$/);
  });
});
