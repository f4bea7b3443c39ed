export type RandomSource = () => number;

/**
 * Mulberry32 seeded PRNG. Returns floats in [0, 1).
 */
export function createSeededRandom(seed: number): RandomSource {
  let s = seed | 0;
  return () => {
    s = (s + 0x6d2b79f5) | 0;
    let t = Math.imul(s ^ (s >>> 15), 1 | s);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Seeded generator when a seed is given, `Math.random` otherwise.
 */
export function createRandomSource(seed?: number | null): RandomSource {
  return seed === undefined || seed === null ? Math.random : createSeededRandom(seed);
}

/**
 * Draws from N(mean, standardDeviation) with the Box-Muller transform.
 * A standard deviation of 0 returns the mean without consuming randomness.
 */
export function randomNormal(random: RandomSource, mean: number, standardDeviation: number): number {
  if (standardDeviation === 0) {
    return mean;
  }
  const u1 = random() || 1e-10;
  const u2 = random();
  const z = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2);
  return mean + z * standardDeviation;
}
