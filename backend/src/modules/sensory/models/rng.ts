/**
 * Seeded randomness for reproducible splits and bootstraps.
 */

export type Rng = () => number;

/**
 * Mulberry32 - fast deterministic PRNG, uniform in [0, 1)
 */
export function mulberry32(seed: number): Rng {
  let state = seed >>> 0;
  return function () {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function randomInt(rng: Rng, maxExclusive: number): number {
  return Math.floor(rng() * maxExclusive);
}

/**
 * Fisher-Yates over 0..n-1
 */
export function shuffledIndices(n: number, rng: Rng): number[] {
  const idx = Array.from({ length: n }, (_, i) => i);
  for (let i = n - 1; i > 0; i--) {
    const j = randomInt(rng, i + 1);
    [idx[i], idx[j]] = [idx[j], idx[i]];
  }
  return idx;
}
