/**
 * Seedable random source. Every component that draws random numbers takes a
 * `Random` so a run can be replayed from its seed.
 */

export interface Random {
  readonly seed: number;
  /** Uniform float in [0, 1). */
  next(): number;
}

function mulberry32(seed: number): () => number {
  let state = seed >>> 0;
  return function rand() {
    let t = (state += 0x6d2b79f5);
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function createRandom(seed?: number): Random {
  const effective = seed ?? Math.floor(Math.random() * 4294967296);
  const rand = mulberry32(effective);
  return { seed: effective, next: rand };
}

/** Uniform float in [min, max). Returns `min` when the range is empty. */
export function uniform(random: Random, min: number, max: number): number {
  if (max <= min) return min;
  return min + random.next() * (max - min);
}

/** Uniform integer in [min, max], both inclusive. */
export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random.next() * (max - min + 1));
}

export function pickOne<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError('pickOne: cannot pick from an empty list');
  }
  const index = Math.min(items.length - 1, Math.floor(random.next() * items.length));
  return items[index];
}
