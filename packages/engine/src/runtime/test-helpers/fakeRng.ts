import type { IRNG } from "../rng";

/**
 * FakeRng - Test helper that returns predefined integers
 * Implements the same interface as RNG for testing purposes
 */
export class FakeRng implements IRNG {
  private rolls: number[];
  private index: number = 0;

  constructor(rolls: number[]) {
    this.rolls = [...rolls];
  }

  /**
   * Returns the next predefined value.
   * Throws if rolls are exhausted or the value is outside [min, max]
   */
  nextInt(min: number, max: number): number {
    if (this.index >= this.rolls.length) {
      throw new Error(
        `FakeRng: No more rolls available. Requested roll ${this.index + 1}, but only ${this.rolls.length} rolls provided.`
      );
    }
    const roll = this.rolls[this.index];
    if (roll < min || roll > max) {
      throw new Error(`FakeRng: roll ${this.index + 1} is ${roll}, outside requested range [${min}, ${max}]`);
    }
    this.index++;
    return roll;
  }

  getCounter(): number {
    return this.index;
  }

  /**
   * Returns seed (always 0 for FakeRng)
   */
  getSeed(): number {
    return 0;
  }

  remaining(): number {
    return this.rolls.length - this.index;
  }
}
