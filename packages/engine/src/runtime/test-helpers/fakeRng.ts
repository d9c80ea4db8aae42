import type { IRNG } from "../rng";

/**
 * Draw that makes nextInt(min, max) return `value`
 */
export function rollFor(value: number, min: number, max: number): number {
  return (value - min + 0.5) / (max - min + 1);
}

/**
 * FakeRng - Test helper that returns predefined draws in [0, 1)
 * Implements the same interface as RNG for testing purposes
 */
export class FakeRng implements IRNG {
  private rolls: number[];
  private index: number = 0;

  constructor(rolls: number[]) {
    this.rolls = [...rolls];
  }

  /**
   * Returns the next predefined draw
   * Throws if draws are exhausted
   */
  next(): number {
    if (this.index >= this.rolls.length) {
      throw new Error(
        `FakeRng: No more rolls available. Requested roll ${this.index + 1}, but only ${this.rolls.length} rolls provided.`
      );
    }
    const roll = this.rolls[this.index];
    this.index++;
    return roll;
  }

  /**
   * Same mapping as RNG.nextInt
   */
  nextInt(min: number, max: number): number {
    return Math.floor(this.next() * (max - min + 1)) + min;
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
}
