// src/core/utils/prng.ts

/**
 * Anything that yields uniformly distributed floats in [0, 1).
 *
 * The rain simulation draws every random decision from one of these so a
 * seeded source makes a run reproducible.
 */
export interface RandomSource {
  next(): number;
}

/** Unseeded source backed by `Math.random`. */
export const mathRandomSource: RandomSource = {
  next: () => Math.random(),
};

/**
 * A simple, seeded pseudo-random number generator (LCG).
 * This allows for deterministic "random" sequences, which is useful for
 * reproducing a rain layout frame for frame.
 */
export class PRNG implements RandomSource {
  private seed: number;

  constructor(seed = 1) {
    this.seed = Math.abs(Math.floor(seed)) % 2147483648;
  }

  /**
   * Generates the next pseudo-random number in the sequence.
   * @returns A floating-point number between 0 (inclusive) and 1 (exclusive).
   */
  public next(): number {
    // LCG parameters from POSIX, kept exact in 32-bit integer math
    this.seed = (Math.imul(this.seed, 1103515245) + 12345) & 0x7fffffff;
    return this.seed / 2147483648;
  }
}

/**
 * Draws a float within a range.
 * @param min The minimum value (inclusive).
 * @param max The maximum value (exclusive).
 */
export const randomRange = (
  random: RandomSource,
  min: number,
  max: number,
): number => random.next() * (max - min) + min;

/**
 * Draws an integer in `[min, max)`. Returns `min` when the range is empty.
 */
export const randomInt = (
  random: RandomSource,
  min: number,
  max: number,
): number => {
  if (max <= min) return min;
  return min + Math.floor(random.next() * (max - min));
};
