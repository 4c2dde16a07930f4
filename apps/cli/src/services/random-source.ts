import { randomInt } from "node:crypto";

/**
 * Source of uniformly distributed integers.
 *
 * Every random choice the generator makes goes through this interface, so
 * tests can substitute a deterministic implementation.
 */
export interface RandomSource {
  /**
   * Return an integer in `[0, maxExclusive)`, each value equally likely
   */
  randomInt(maxExclusive: number): number;
}

/**
 * Backed by the operating system CSPRNG. `crypto.randomInt` rejects
 * out-of-range samples internally, so there is no modulo bias.
 */
export const cryptoRandomSource: RandomSource = {
  randomInt(maxExclusive: number): number {
    if (!Number.isSafeInteger(maxExclusive) || maxExclusive < 1) {
      throw new RangeError(`maxExclusive must be a positive integer, got ${maxExclusive}`);
    }
    return randomInt(maxExclusive);
  },
};
