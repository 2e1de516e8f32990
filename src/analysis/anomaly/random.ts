/**
 * Seeded PRNG (mulberry32). Returns floats in [0, 1).
 * The same seed always yields the same sequence.
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Integer in [0, maxExclusive) */
export function randomInt(random: () => number, maxExclusive: number): number {
  return Math.floor(random() * maxExclusive);
}

/**
 * Draw `size` distinct indices from [0, population) with a partial
 * Fisher-Yates shuffle.
 */
export function sampleIndices(random: () => number, population: number, size: number): number[] {
  const pool = Array.from({ length: population }, (_, i) => i);
  const take = Math.min(size, population);
  for (let i = 0; i < take; i++) {
    const j = i + randomInt(random, population - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, take);
}
