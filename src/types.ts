/**
 * dice-roll type definitions
 *
 * All interfaces and types shared by the parser, roller and CLI.
 */

export interface DieDescriptor {
  readonly count: number;                // number of dice, >= 1
  readonly sides: number;                // faces per die, >= 2
}

/** Rolls for one descriptor, in draw order. */
export type RollResult = number[];

export type AggregateSelector = "none" | "sum" | "avg" | "max" | "min";

/**
 * Uniform integer source. Injected everywhere a roll happens so tests can
 * substitute a fixed or seeded sequence.
 */
export interface RandomSource {
  nextInRange(low: number, highInclusive: number): number;
}

export interface RollOptions {
  aggregate?: AggregateSelector;         // default "none"
  rng?: RandomSource;                    // default Math.random-backed source
}

export interface RolledDie {
  die: DieDescriptor;
  rolls: RollResult;
  result: string;                        // aggregate or space-joined rolls
}

export interface CliOptions {
  dice: string[];
  aggregate: AggregateSelector;
  seed?: string;
  help: boolean;
  version: boolean;
}

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
  rng?: RandomSource;                    // overrides --seed when set
}
