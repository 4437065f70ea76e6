import type { Random } from "./types.js";

/**
 * Seeded uniform source (mulberry32). The same seed always yields the same
 * sequence, which keeps the annotation groups reproducible across runs.
 */
export function createRandom(seed: number): Random {
  let state = seed >>> 0;
  return {
    next() {
      state = (state + 0x6d2b79f5) >>> 0;
      let t = state;
      t = Math.imul(t ^ (t >>> 15), t | 1);
      t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
      return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
    }
  };
}

export function uniform(random: Random, min: number, max: number): number {
  return min + (max - min) * random.next();
}

/**
 * In-place Fisher-Yates shuffle, walking from the back.
 */
export function shuffle<T>(items: T[], random: Random): T[] {
  for (let i = items.length - 1; i > 0; i -= 1) {
    const j = Math.floor(random.next() * (i + 1));
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}

/**
 * Flag floor(count * percent / 100) of `count` slots, spread by a shuffle.
 */
export function assignFlags(count: number, percent: number, random: Random): boolean[] {
  const flagged = Math.floor((count * percent) / 100);
  const flags = Array.from({ length: count }, (_, i) => i < flagged);
  return shuffle(flags, random);
}
