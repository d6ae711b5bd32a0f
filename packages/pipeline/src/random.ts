// packages/pipeline/src/random.ts
//
// Seeded randomness. Nothing in the pipeline may read global random state.

export type Rng = () => number;

/**
 * Mulberry32: small, fast deterministic PRNG returning values in [0, 1).
 * Seeds in [0, 2^32) map straight onto the state; the high word of larger or
 * negative seeds is folded in so that seeds 2^32 apart give different streams.
 */
export function mulberry32(seed: number): Rng {
  const high = Math.floor(seed / 0x100000000);
  let state = (seed | 0) ^ Math.imul(high, 0x9e3779b1);
  return function () {
    state = (state + 0x6d2b79f5) | 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Box-Muller transform for N(0,1). Consumes exactly two draws. */
export function randn(rng: Rng): number {
  const u = 1 - rng(); // (0, 1]
  const v = rng();
  return Math.sqrt(-2 * Math.log(u)) * Math.cos(2 * Math.PI * v);
}

/** Exponential with the given mean. Consumes one draw. */
export function exponential(rng: Rng, mean: number): number {
  return -mean * Math.log(1 - rng());
}

/** Uniform in [lo, hi). Consumes one draw. */
export function uniform(rng: Rng, lo: number, hi: number): number {
  return lo + (hi - lo) * rng();
}

/** Uniform integer in [0, n). Consumes one draw. */
export function randInt(rng: Rng, n: number): number {
  return Math.floor(rng() * n);
}

/** `k` distinct indices from [0, n) via partial Fisher-Yates. */
export function sampleIndices(rng: Rng, n: number, k: number): number[] {
  const pool = Array.from({ length: n }, (_, i) => i);
  const take = Math.min(k, n);
  for (let i = 0; i < take; i++) {
    const j = i + randInt(rng, n - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, take);
}
