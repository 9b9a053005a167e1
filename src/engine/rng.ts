// src/engine/rng.ts
//
// Explicit random source for board generation. Nothing in the engine reads
// Math.random directly; callers pass an Rng handle (seeded in tests).

export type Rng = () => number;

export const defaultRng: Rng = () => Math.random();

/**
 * FNV-1a 32-bit hash (deterministic).
 */
export function hashStringToUint32(s: string): number {
  let h = 0x811c9dc5;
  for (let i = 0; i < s.length; i++) {
    h ^= s.charCodeAt(i);
    h = Math.imul(h, 0x01000193);
  }
  return h >>> 0;
}

/**
 * Seedable xorshift32 generator returning floats in [0, 1).
 * String seeds are hashed first, so "level-1" and 1 are different streams.
 */
export function createRng(seed: number | string): Rng {
  let x = typeof seed === "string" ? hashStringToUint32(seed) : seed >>> 0;
  if (x === 0) x = 0x6d2b79f5; // xorshift32 must not start at zero
  return function nextFloat(): number {
    x ^= x << 13;
    x ^= x >>> 17;
    x ^= x << 5;
    return (x >>> 0) / 0x100000000;
  };
}

/**
 * Pick `count` distinct items uniformly at random (partial Fisher-Yates).
 * Does not mutate `items`.
 */
export function sampleWithoutReplacement<T>(items: readonly T[], count: number, rng: Rng): T[] {
  if (count > items.length) {
    throw new Error(`Cannot sample ${count} items from a pool of ${items.length}.`);
  }
  const pool = items.slice();
  for (let i = 0; i < count; i++) {
    const j = i + Math.floor(rng() * (pool.length - i));
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  return pool.slice(0, count);
}
