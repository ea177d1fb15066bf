/** random source, returns a float in [0, 1) */
export type Random = () => number;

/**
 * mulberry32 prng
 * seedable replacement for Math.random
 */
export const mulberry32 = (seed: number): Random => {
  let state = seed >>> 0;
  return () => {
    let t = (state = (state + 0x6d2b79f5) >>> 0);
    t = Math.imul(t ^ (t >>> 15), 1 | t);
    t ^= t + Math.imul(t ^ (t >>> 7), 61 | t);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/** uniform integer in [0, n) */
export const randomInt = (random: Random, n: number): number =>
  Math.min(n - 1, Math.floor(random() * n));

/**
 * draw k values of [from, to) uniformly without replacement
 * values come back in draw order (partial fisher-yates)
 */
export const sample = (
  random: Random,
  from: number,
  to: number,
  k: number
): number[] => {
  const values = Array.from({ length: to - from }, (_, i) => from + i);
  for (let i = 0; i < k; i++) {
    const j = i + randomInt(random, values.length - i);
    [values[i], values[j]] = [values[j], values[i]];
  }
  return values.slice(0, k);
};
