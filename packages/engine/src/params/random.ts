/** Source of uniformly distributed floats in [0, 1). */
export type Rng = () => number;

export const defaultRng: Rng = Math.random;

/**
 * Small deterministic generator for reproducible scripts and tests.
 */
export function createSeededRng(seed: number): Rng {
  // xorshift32 has a fixed point at zero
  let x = (seed | 0) || 0x9e3779b9;
  return () => {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 4294967296;
  };
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(min: number, max: number, rng: Rng = defaultRng): number {
  return min + Math.floor(rng() * (max - min + 1));
}
