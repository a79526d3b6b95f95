/** Source of uniform numbers in [0, 1) */
export type RandomSource = () => number;

/** Small seeded generator (mulberry32) for reproducible shuffles */
export function createSeededRandom(seed: number): RandomSource {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/** Uniform integer in [min, max] inclusive */
export function randomInt(random: RandomSource, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

/** `count` independent uniform picks, with replacement */
export function choices<T>(random: RandomSource, items: readonly T[], count: number): T[] {
  if (items.length === 0) throw new Error('choices() needs at least one item');
  return Array.from({ length: count }, () => items[Math.floor(random() * items.length)]);
}
