// random.ts
// Summary: Seedable pseudo random source used for obstacle layouts, patrol headings and spawn picks.
// Structure: mulberry32 generator + string seed hashing -> RandomSource wrapper with range helpers.
// Usage: const random = createRandom('seed'); random.int(1, 3); random.pick(CARDINAL_HEADINGS);
// ---------------------------------------------------------------------------

export interface RandomSource {
  /** Uniform float in [0, 1). */
  next(): number;
  /** Uniform float in [min, max). */
  between(min: number, max: number): number;
  /** Uniform integer in [min, max], both inclusive. */
  int(min: number, max: number): number;
  pick<T>(items: readonly T[]): T;
}

function mulberry32(a: number): () => number {
  return () => {
    let t = (a += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

function hashSeed(seed: string): number {
  let h = 1779033703 ^ seed.length;
  for (let i = 0; i < seed.length; i += 1) {
    h = Math.imul(h ^ seed.charCodeAt(i), 3432918353);
    h = (h << 13) | (h >>> 19);
  }
  h = Math.imul(h ^ (h >>> 16), 2246822507);
  h = Math.imul(h ^ (h >>> 13), 3266489909);
  return (h ^= h >>> 16) >>> 0;
}

/** Builds the range helpers on top of any [0, 1) generator. */
export function randomFromGenerator(generator: () => number): RandomSource {
  const next = (): number => {
    const value = generator();
    if (!Number.isFinite(value) || value < 0) return 0;
    return value >= 1 ? 1 - Number.EPSILON : value;
  };
  return {
    next,
    between(min: number, max: number): number {
      if (max <= min) return min;
      return min + next() * (max - min);
    },
    int(min: number, max: number): number {
      if (max <= min) return min;
      return Math.min(max, min + Math.floor(next() * (max - min + 1)));
    },
    pick<T>(items: readonly T[]): T {
      if (items.length === 0) {
        throw new Error('Cannot pick from an empty array.');
      }
      const index = Math.floor(next() * items.length) % items.length;
      return items[index];
    }
  };
}

/** Seeded when a non-blank seed is given; otherwise backed by Math.random. */
export function createRandom(seed?: string | null): RandomSource {
  const trimmed = seed?.trim();
  if (trimmed) {
    return randomFromGenerator(mulberry32(hashSeed(trimmed)));
  }
  return randomFromGenerator(Math.random);
}
