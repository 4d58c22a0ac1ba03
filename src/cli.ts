/**
 * Command-line front end
 *
 * Argument parsing and exit-code mapping. I/O is injected so the whole run
 * can be driven from tests; bin/dice-roll.ts wires it to the process.
 */

import { parseAggregate } from "./aggregate";
import { rollAll, formatLine } from "./batch";
import { BatchParseError, UsageError, isDiceError } from "./errors";
import { mathRandomSource, seededRandomSource } from "./random";
import type { CliIO, CliOptions, RandomSource } from "./types";

export const VERSION = "0.1.0";

export const USAGE = `Usage: dice-roll [options] <dice...>

Roll dice given in <count>d<sides> notation, e.g. "3d6", "d20", "2d4".

Options:
  -a, --aggregate <fn>         Reduce each die's rolls: sum|avg|max|min
  -s, --seed <seed>            Seed the random source for a reproducible run
  -h, --help                   Show this help
  -V, --version                Show version

Examples:
  dice-roll 3d6 d20
  dice-roll --aggregate sum 4d6 2d8`;

const VALUE_FLAGS = {
  "-a": "aggregate",
  "--aggregate": "aggregate",
  "-s": "seed",
  "--seed": "seed",
} as const;

type ValueFlag = keyof typeof VALUE_FLAGS;

function isValueFlag(flag: string): flag is ValueFlag {
  return Object.prototype.hasOwnProperty.call(VALUE_FLAGS, flag);
}

// "-5d20" is a (bad) die, "-x" and "--foo" are options
const OPTION_LIKE = /^-(-|[A-Za-z])/;

/**
 * Parse argv (without the node and script entries).
 *
 * @throws UsageError for unknown options or a missing option value
 * @throws UnknownAggregateError for an unrecognised aggregate name
 */
export function parseArgs(argv: readonly string[]): CliOptions {
  const options: CliOptions = { dice: [], aggregate: "none", help: false, version: false };
  let positionalOnly = false;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (positionalOnly || !OPTION_LIKE.test(arg)) {
      options.dice.push(arg);
      continue;
    }

    if (arg === "--") {
      positionalOnly = true;
      continue;
    }
    if (arg === "-h" || arg === "--help") {
      options.help = true;
      continue;
    }
    if (arg === "-V" || arg === "--version") {
      options.version = true;
      continue;
    }

    const eq = arg.indexOf("=");
    const flag = eq >= 0 ? arg.slice(0, eq) : arg;
    if (!isValueFlag(flag)) {
      throw new UsageError(`Unknown option: ${arg}`);
    }

    let value: string | undefined;
    if (eq >= 0) {
      value = arg.slice(eq + 1);
    } else if (i + 1 < argv.length) {
      value = argv[++i];
    }
    if (value === undefined || value.length === 0) {
      throw new UsageError(`option ${flag} requires a value`);
    }

    switch (VALUE_FLAGS[flag]) {
      case "aggregate":
        options.aggregate = parseAggregate(value);
        break;
      case "seed":
        options.seed = value;
        break;
    }
  }

  return options;
}

function resolveSource(options: CliOptions, io: CliIO): RandomSource {
  if (io.rng) return io.rng;
  if (options.seed !== undefined) return seededRandomSource(options.seed);
  return mathRandomSource;
}

/**
 * Run one CLI invocation.
 *
 * Exit codes:
 * - 0: rolled, printed help/version, or nothing to roll
 * - 1: bad arguments or at least one bad die (nothing rolled)
 *
 * Errors other than DiceError propagate to the caller.
 */
export function runCli(argv: readonly string[], io: CliIO): number {
  let options: CliOptions;
  try {
    options = parseArgs(argv);
  } catch (error) {
    if (!isDiceError(error)) throw error;
    io.stderr(`Error: ${error.message}`);
    io.stderr(`Run "dice-roll --help" for usage.`);
    return 1;
  }

  if (options.help) {
    io.stdout(USAGE);
    return 0;
  }
  if (options.version) {
    io.stdout(VERSION);
    return 0;
  }
  if (options.dice.length === 0) {
    io.stderr("Provide some dice to roll");
    return 0;
  }

  let lines: string[];
  try {
    lines = rollAll(options.dice, {
      aggregate: options.aggregate,
      rng: resolveSource(options, io),
    }).map(formatLine);
  } catch (error) {
    if (!(error instanceof BatchParseError)) throw error;
    for (const failure of error.failures) {
      io.stderr(`Error: ${failure.message}`);
    }
    return 1;
  }

  for (const line of lines) {
    io.stdout(line);
  }
  return 0;
}
