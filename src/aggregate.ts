/**
 * Aggregate functions
 *
 * Reduces a roll set to one summary value and renders it for output.
 */

import { EmptySequenceError, UnknownAggregateError } from "./errors";
import type { AggregateSelector, RollResult } from "./types";

export type AggregateFunction = Exclude<AggregateSelector, "none">;

export const AGGREGATE_FUNCTIONS: readonly AggregateFunction[] = ["sum", "avg", "max", "min"];

function isAggregateFunction(value: string): value is AggregateFunction {
  return AGGREGATE_FUNCTIONS.some((fn) => fn === value);
}

/**
 * Parse an aggregate name, case-insensitively ("SUM", "Avg", ...).
 */
export function parseAggregate(token: string): AggregateFunction {
  const name = token.toLowerCase();
  if (!isAggregateFunction(name)) {
    throw new UnknownAggregateError(token);
  }
  return name;
}

function exactSum(rolls: RollResult): bigint {
  return rolls.reduce((acc, v) => acc + BigInt(v), 0n);
}

/**
 * Numeric reduction. "sum" is exact (a bigint, since count * sides can pass
 * 2^53); "avg" divides that sum as a float and is never truncated.
 */
export function reduceRolls(selector: "none", rolls: RollResult): RollResult;
export function reduceRolls(selector: "sum", rolls: RollResult): bigint;
export function reduceRolls(selector: "avg" | "max" | "min", rolls: RollResult): number;
export function reduceRolls(selector: AggregateSelector, rolls: RollResult): bigint | number | RollResult;
export function reduceRolls(selector: AggregateSelector, rolls: RollResult): bigint | number | RollResult {
  switch (selector) {
    case "none":
      return rolls;
    case "sum":
      return exactSum(rolls);
    case "avg":
      if (rolls.length === 0) throw new EmptySequenceError(selector);
      return Number(exactSum(rolls)) / rolls.length;
    case "max":
      if (rolls.length === 0) throw new EmptySequenceError(selector);
      return rolls.reduce((a, b) => Math.max(a, b));
    case "min":
      if (rolls.length === 0) throw new EmptySequenceError(selector);
      return rolls.reduce((a, b) => Math.min(a, b));
  }
}

/**
 * Render the reduction: a single number, or the raw rolls space-joined in
 * draw order for "none".
 */
export function aggregate(selector: AggregateSelector, rolls: RollResult): string {
  const reduced = reduceRolls(selector, rolls);
  return Array.isArray(reduced) ? reduced.join(" ") : String(reduced);
}
