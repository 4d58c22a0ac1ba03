/**
 * Dice notation parsing
 *
 * Grammar: <count>? "d" <sides>, both digit runs, lowercase "d", whole token.
 * Pure functions; no state, no side effects.
 */

import { InvalidDescriptorError, MalformedTokenError } from "./errors";
import type { DieDescriptor } from "./types";

const DIGITS = /^[0-9]+$/;
const SEPARATOR = "d";

/** Largest count or sides accepted: an unsigned 32-bit integer. */
export const MAX_FIELD = 0xffffffff;

/**
 * Build a validated, frozen descriptor. Out-of-range values throw; they are
 * never clamped.
 */
export function createDie(count: number, sides: number, token?: string): DieDescriptor {
  if (!Number.isSafeInteger(count) || count < 1) {
    throw new InvalidDescriptorError(`count must be at least 1, got ${count}`, token);
  }
  if (!Number.isSafeInteger(sides) || sides < 2) {
    throw new InvalidDescriptorError(`sides must be at least 2, got ${sides}`, token);
  }
  if (count > MAX_FIELD) {
    throw new InvalidDescriptorError(`count must be at most ${MAX_FIELD}, got ${count}`, token);
  }
  if (sides > MAX_FIELD) {
    throw new InvalidDescriptorError(`sides must be at most ${MAX_FIELD}, got ${sides}`, token);
  }
  return Object.freeze({ count, sides });
}

function parseField(token: string, field: "count" | "sides", raw: string): number {
  if (!DIGITS.test(raw)) {
    throw new MalformedTokenError(token, `${field} must be a run of digits, got "${raw}"`);
  }
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value > MAX_FIELD) {
    throw new MalformedTokenError(token, `${field} is too large`);
  }
  return value;
}

/**
 * Parse one dice token such as "3d6" or "d20".
 *
 * @throws MalformedTokenError when the token does not match the grammar
 * @throws InvalidDescriptorError when it matches but count < 1 or sides < 2
 */
export function parseDie(token: string): DieDescriptor {
  const at = token.indexOf(SEPARATOR);
  if (at < 0) {
    throw new MalformedTokenError(token, `missing '${SEPARATOR}' separator`);
  }

  const countPart = token.slice(0, at);
  const sidesPart = token.slice(at + SEPARATOR.length);
  if (sidesPart.length === 0) {
    throw new MalformedTokenError(token, "missing sides");
  }

  const count = countPart.length === 0 ? 1 : parseField(token, "count", countPart);
  const sides = parseField(token, "sides", sidesPart);

  return createDie(count, sides, token);
}

/** Canonical rendering, count always explicit: "1d20", never "d20". */
export function formatDie(die: DieDescriptor): string {
  return `${die.count}${SEPARATOR}${die.sides}`;
}

export function sameDie(a: DieDescriptor, b: DieDescriptor): boolean {
  return a.count === b.count && a.sides === b.sides;
}
