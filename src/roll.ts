/**
 * Core rolling mechanics
 *
 * Pure apart from the injected random source.
 */

import type { DieDescriptor, RandomSource, RollResult } from "./types";

/**
 * Roll every die of a descriptor once.
 *
 * @param die - Validated descriptor
 * @param rng - Uniform integer source
 * @returns `die.count` results, each 1 to `die.sides` inclusive, in draw order
 */
export function rollDie(die: DieDescriptor, rng: RandomSource): RollResult {
  return Array.from({ length: die.count }, () => {
    const value = rng.nextInRange(1, die.sides);
    if (!Number.isInteger(value) || value < 1 || value > die.sides) {
      throw new RangeError(`random source returned ${value} outside [1, ${die.sides}]`);
    }
    return value;
  });
}
