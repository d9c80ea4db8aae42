import type { GameSession } from "./types";

/**
 * Random source used by the engine.
 * Anything implementing it can drive combat (see test-helpers/fakeRng).
 */
export interface IRNG {
  /** Next number in range [0, 1) */
  next(): number;
  /** Next integer in range [min, max] (inclusive) */
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

  next(): number {
    const n = this.mulberry32((this.seed >>> 0) + (this.counter >>> 0));
    this.counter++;
    return n;
  }

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
 * Rebuilds the session's generator at the position it was left at
 */
export function rngForSession(session: GameSession): RNG {
  return new RNG(session.runtime.rngSeed, session.runtime.rngCounter);
}
