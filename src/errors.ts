/**
 * Error types
 *
 * Every condition reachable from user input is one of these classes, so the
 * CLI can map it to a message and exit code 1 instead of crashing.
 */

export type DiceErrorCode =
  | "MALFORMED_TOKEN"
  | "INVALID_DESCRIPTOR"
  | "UNKNOWN_AGGREGATE"
  | "EMPTY_SEQUENCE"
  | "USAGE"
  | "BATCH_PARSE";

export abstract class DiceError extends Error {
  abstract readonly code: DiceErrorCode;

  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Token does not match `<count>?d<sides>`.
 */
export class MalformedTokenError extends DiceError {
  readonly code = "MALFORMED_TOKEN";

  constructor(readonly token: string, readonly reason: string) {
    super(`invalid die "${token}": ${reason}`);
  }
}

/**
 * Token matches the grammar but describes an impossible die (count < 1 or
 * sides < 2). `token` is absent when the descriptor was built directly.
 */
export class InvalidDescriptorError extends DiceError {
  readonly code = "INVALID_DESCRIPTOR";

  constructor(readonly reason: string, readonly token?: string) {
    super(token === undefined ? reason : `invalid die "${token}": ${reason}`);
  }
}

export class UnknownAggregateError extends DiceError {
  readonly code = "UNKNOWN_AGGREGATE";

  constructor(readonly input: string) {
    super(`unknown aggregate function "${input}" (expected one of: sum, avg, max, min)`);
  }
}

/**
 * A reducer got zero rolls. Unreachable through a valid descriptor.
 */
export class EmptySequenceError extends DiceError {
  readonly code = "EMPTY_SEQUENCE";

  constructor(readonly selector: string) {
    super(`cannot apply ${selector} to an empty roll sequence`);
  }
}

export class UsageError extends DiceError {
  readonly code = "USAGE";
}

/**
 * One or more dice tokens in a batch failed to parse; nothing was rolled.
 */
export class BatchParseError extends DiceError {
  readonly code = "BATCH_PARSE";

  constructor(readonly failures: DiceError[]) {
    super(failures.map((f) => f.message).join("; "));
  }
}

export function isDiceError(value: unknown): value is DiceError {
  return value instanceof DiceError;
}
