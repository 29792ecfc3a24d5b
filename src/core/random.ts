/**
 * Seedable pseudo-random source. Every draw the generator makes goes through
 * an instance of this, so a corpus is reproducible from its seed.
 */
export interface Rng {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  chance(probability: number): boolean;
  pick<T>(values: readonly T[]): T;
  /** `count` distinct items, in draw order. */
  sample<T>(values: readonly T[], count: number): T[];
  /** Index drawn proportionally to `weights`; weights need not sum to 1. */
  weightedIndex(weights: readonly number[]): number;
}

export function hashSeed(input: string): number {
  let hash = 2166136261;
  for (let i = 0; i < input.length; i += 1) {
    hash ^= input.charCodeAt(i);
    hash = Math.imul(hash, 16777619);
  }
  return hash >>> 0;
}

function mulberry32(seed: number): () => number {
  let t = seed >>> 0;
  return () => {
    t += 0x6d2b79f5;
    let r = Math.imul(t ^ (t >>> 15), t | 1);
    r ^= r + Math.imul(r ^ (r >>> 7), r | 61);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRng(seed: string | number): Rng {
  const base = typeof seed === "number" ? seed : hashSeed(seed);
  const next = mulberry32(base);

  const int = (min: number, max: number): number => {
    const low = Math.ceil(min);
    const high = Math.floor(max);
    if (high < low) {
      throw new RangeError(`int() called with empty range [${min}, ${max}]`);
    }
    return Math.floor(next() * (high - low + 1)) + low;
  };

  return {
    next,
    int,
    chance: (probability: number) => next() < probability,
    pick: <T>(values: readonly T[]): T => {
      if (values.length === 0) throw new Error("pick() called with empty array");
      return values[Math.floor(next() * values.length)];
    },
    sample: <T>(values: readonly T[], count: number): T[] => {
      if (count > values.length) {
        throw new RangeError(`sample() asked for ${count} of ${values.length} values`);
      }
      // Partial Fisher-Yates: only the first `count` positions are settled.
      const copy = [...values];
      for (let i = 0; i < count; i += 1) {
        const j = i + Math.floor(next() * (copy.length - i));
        [copy[i], copy[j]] = [copy[j], copy[i]];
      }
      return copy.slice(0, count);
    },
    weightedIndex: (weights: readonly number[]): number => {
      const total = weights.reduce((sum, weight) => sum + Math.max(0, weight), 0);
      if (total <= 0) {
        throw new RangeError("weightedIndex() needs at least one positive weight");
      }

      let threshold = next() * total;
      for (let index = 0; index < weights.length; index += 1) {
        threshold -= Math.max(0, weights[index]);
        if (threshold < 0) {
          return index;
        }
      }

      // Float rounding can leave a sliver past the last bucket.
      let last = weights.length - 1;
      while (last > 0 && weights[last] <= 0) last -= 1;
      return last;
    },
  };
}

/** A fresh seed for runs that did not ask for one. */
export function randomSeed(): string {
  return Math.floor(Math.random() * 0xffffffff)
    .toString(16)
    .padStart(8, "0");
}

/** Independent stream for one repository, stable for a given run seed. */
export function deriveRng(seed: string, repoId: number): Rng {
  return createRng(`${seed}:${repoId}`);
}
