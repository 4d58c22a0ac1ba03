/**
 * Random sources
 *
 * Adapters from [0, 1) generators to the inclusive-integer RandomSource
 * capability used by the roller.
 */

import seedrandom from "seedrandom";
import type { RandomSource } from "./types";

/**
 * Wrap a generator returning floats in [0, 1).
 */
export function fromUnitInterval(next: () => number): RandomSource {
  return {
    nextInRange(low: number, highInclusive: number): number {
      if (!Number.isSafeInteger(low) || !Number.isSafeInteger(highInclusive) || low > highInclusive) {
        throw new RangeError(`invalid range [${low}, ${highInclusive}]`);
      }
      return low + Math.floor(next() * (highInclusive - low + 1));
    },
  };
}

export const mathRandomSource: RandomSource = fromUnitInterval(Math.random);

/**
 * Reproducible source: the same seed yields the same draws.
 */
export function seededRandomSource(seed: string): RandomSource {
  return fromUnitInterval(seedrandom(seed));
}
