/**
 * dice-roll — dice notation parser and roller
 *
 * Public API re-exports.
 */

// Types
export type {
  DieDescriptor,
  RollResult,
  AggregateSelector,
  RandomSource,
  RollOptions,
  RolledDie,
  CliOptions,
  CliIO,
} from "./types";

// Errors
export {
  DiceError,
  MalformedTokenError,
  InvalidDescriptorError,
  UnknownAggregateError,
  EmptySequenceError,
  UsageError,
  BatchParseError,
  isDiceError,
} from "./errors";
export type { DiceErrorCode } from "./errors";

// Notation
export { MAX_FIELD, createDie, parseDie, formatDie, sameDie } from "./notation";

// Random sources
export { fromUnitInterval, mathRandomSource, seededRandomSource } from "./random";

// Roll
export { rollDie } from "./roll";

// Aggregate
export { AGGREGATE_FUNCTIONS, parseAggregate, reduceRolls, aggregate } from "./aggregate";
export type { AggregateFunction } from "./aggregate";

// Batch
export { parseDice, rollAll, formatLine } from "./batch";

// CLI
export { parseArgs, runCli, USAGE, VERSION } from "./cli";
