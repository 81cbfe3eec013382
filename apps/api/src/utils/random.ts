export type RandomSource = () => number;

/** FNV-1a over the seed feeding a mulberry32 stream; same seed, same sequence. */
export const createSeededRandom = (seed: string): RandomSource => {
  let h = 2166136261;
  for (let i = 0; i < seed.length; i += 1) {
    h ^= seed.charCodeAt(i);
    h = Math.imul(h, 16777619);
  }
  let state = h >>> 0;
  return () => {
    state += 0x6d2b79f5;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
};

/**
 * Partial Fisher-Yates: returns up to `count` distinct items.
 * Returns the whole pool (shuffled) when it is smaller than `count`.
 */
export const sampleWithoutReplacement = <T>(items: readonly T[], count: number, random: RandomSource) => {
  const pool = [...items];
  const take = Math.min(Math.max(0, count), pool.length);
  for (let i = 0; i < take; i += 1) {
    const j = i + Math.floor(random() * (pool.length - i));
    [pool[i], pool[j]] = [pool[j], pool[i]];
  }
  return pool.slice(0, take);
};
