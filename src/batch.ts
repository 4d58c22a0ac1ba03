/**
 * Batch rolling
 *
 * Parse every token first; roll only when the whole batch is valid. Each die
 * is then rolled and aggregated to completion before the next one starts.
 */

import { aggregate } from "./aggregate";
import { BatchParseError, isDiceError } from "./errors";
import type { DiceError } from "./errors";
import { formatDie, parseDie } from "./notation";
import { mathRandomSource } from "./random";
import { rollDie } from "./roll";
import type { DieDescriptor, RolledDie, RollOptions } from "./types";

/**
 * Parse a batch of tokens, collecting every failure.
 *
 * @throws BatchParseError listing each token that failed, in input order
 */
export function parseDice(tokens: readonly string[]): DieDescriptor[] {
  const dice: DieDescriptor[] = [];
  const failures: DiceError[] = [];

  for (const token of tokens) {
    try {
      dice.push(parseDie(token));
    } catch (error) {
      if (!isDiceError(error)) throw error;
      failures.push(error);
    }
  }

  if (failures.length > 0) {
    throw new BatchParseError(failures);
  }
  return dice;
}

export function rollAll(tokens: readonly string[], options: RollOptions = {}): RolledDie[] {
  const selector = options.aggregate ?? "none";
  const rng = options.rng ?? mathRandomSource;

  return parseDice(tokens).map((die) => {
    const rolls = rollDie(die, rng);
    return { die, rolls, result: aggregate(selector, rolls) };
  });
}

/** "<countDsides> <result>", e.g. "3d6 12". */
export function formatLine(row: RolledDie): string {
  return `${formatDie(row.die)} ${row.result}`;
}
