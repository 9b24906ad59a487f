/**
 * Source of randomness threaded through the battle.
 * The engine only draws integers; tests swap in FakeRng.
 */
export interface IRNG {
  nextInt(min: number, max: number): number;
  getCounter(): number;
  getSeed(): number;
}

/**
 * Simple deterministic RNG using seed and counter
 * Based on mulberry32 PRNG for better distribution
 * Seed remains constant; counter advances for seekability
 */
export class RNG implements IRNG {
  private readonly seed: number;
  private counter: number;

  constructor(seed: number, counter: number = 0) {
    this.seed = seed;
    this.counter = counter;
  }

  /**
   * Pure PRNG function that takes seed + counter and returns a value
   * Does not mutate seed, making it seekable
   */
  private mulberry32(seed: number): number {
    let t = seed + 0x6d2b79f5;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /**
   * Generates next random number in range [0, 1)
   * Increments counter but does not mutate seed
   */
  next(): number {
    const n = this.mulberry32((this.seed >>> 0) + (this.counter >>> 0));
    this.counter++;
    return n;
  }

  /**
   * Generates random integer in range [min, max] (inclusive)
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
  }

  getCounter(): number {
    return this.counter;
  }

  /**
   * Gets current seed (always returns the original seed)
   */
  getSeed(): number {
    return this.seed;
  }
}

/**
 * Draws a fresh 32-bit seed for battles started without one
 */
export function randomSeed(): number {
  return Math.floor(Math.random() * 4294967296);
}

/**
 * Rolls one six-sided die (1-6)
 */
export function rollDie(rng: IRNG): number {
  return rng.nextInt(1, 6);
}

/**
 * Sum of n independent d6 rolls
 */
export function rollDice(rng: IRNG, n: number): number {
  let total = 0;
  for (let i = 0; i < n; i++) {
    total += rollDie(rng);
  }
  return total;
}

/**
 * In-place Fisher-Yates shuffle driven by the given RNG
 */
export function shuffle<T>(rng: IRNG, items: T[]): T[] {
  for (let i = items.length - 1; i > 0; i--) {
    const j = rng.nextInt(0, i);
    const tmp = items[i];
    items[i] = items[j];
    items[j] = tmp;
  }
  return items;
}
