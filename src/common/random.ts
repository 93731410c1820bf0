// common/random.ts
// Seedable PRNG (mulberry32) so generator draws are reproducible

export type Rng = () => number;

export function normalizeSeed(seed?: number): number {
  if (typeof seed === "number" && Number.isFinite(seed)) {
    return seed | 0;
  }
  return 0x12345678;
}

export function createRng(seed: number): Rng {
  let t = seed | 0;
  return () => {
    t |= 0;
    t = (t + 0x6d2b79f5) | 0;
    let r = Math.imul(t ^ (t >>> 15), 1 | t);
    r ^= r + Math.imul(r ^ (r >>> 7), 61 | r);
    return ((r ^ (r >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Pick an index with probability proportional to its weight.
 * Returns -1 when no weight is positive.
 */
export function pickWeightedIndex(weights: readonly number[], rng: Rng): number {
  let total = 0;
  for (const weight of weights) {
    if (weight > 0) total += weight;
  }
  if (total <= 0) return -1;

  let target = rng() * total;
  for (let i = 0; i < weights.length; i++) {
    const weight = weights[i];
    if (weight <= 0) continue;
    target -= weight;
    if (target < 0) return i;
  }
  // floating point leftovers land on the last positive weight
  for (let i = weights.length - 1; i >= 0; i--) {
    if (weights[i] > 0) return i;
  }
  return -1;
}
