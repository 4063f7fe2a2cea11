/**
 * Source of randomness for candidate selection. Tests pass a seeded one.
 */
export interface Rng {
  /** Integer in [0, maxExclusive) */
  nextInt(maxExclusive: number): number;
}

function hashSeed(seed: string): number {
  let h = 2166136261;
  for (let i = 0; i < seed.length; i++) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  return h >>> 0;
}

/**
 * mulberry32 over an FNV-1a hash of the seed
 */
export function createSeededRng(seed: string): Rng {
  let state = hashSeed(seed);

  const next = (): number => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };

  return {
    nextInt(maxExclusive: number): number {
      return Math.floor(next() * maxExclusive);
    },
  };
}

export const mathRng: Rng = {
  nextInt(maxExclusive: number): number {
    return Math.floor(Math.random() * maxExclusive);
  },
};

export function createRng(seed: string | null): Rng {
  return seed ? createSeededRng(seed) : mathRng;
}
