/**
 * Random sources for maze generation.
 *
 * Every generation run receives its own source; nothing reads a shared
 * generator, so repeated or interleaved runs never affect each other.
 */

/**
 * Anything that yields uniform floats in [0, 1).
 */
export interface RandomSource {
  next(): number;
}

// Mulberry32
export class SeededRandom implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }
}

/**
 * Create a source from a seed, or from a fresh random seed when omitted.
 */
export function createRandom(seed?: number): RandomSource {
  return new SeededRandom(seed ?? Math.floor(Math.random() * 4294967296));
}

/**
 * Integer in [0, max).
 */
export function randomInt(random: RandomSource, max: number): number {
  return Math.floor(random.next() * max);
}

/**
 * Uniformly pick one element of a non-empty array.
 *
 * @throws Error on an empty array
 */
export function pick<T>(random: RandomSource, items: ReadonlyArray<T>): T {
  if (items.length === 0) {
    throw new Error('Cannot pick from an empty array');
  }
  return items[randomInt(random, items.length)];
}
