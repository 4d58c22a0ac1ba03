#!/usr/bin/env node

/**
 * dice-roll CLI entrypoint
 *
 * Usage: dice-roll [options] <dice...>
 *
 *   dice-roll 3d6 d20            3d6 4 1 6 / 1d20 17
 *   dice-roll -a sum 3d6         3d6 11
 *   dice-roll -s table-1 2d4     same rolls on every run
 *
 * Exit codes: 0 ok or nothing to roll, 1 bad input, 2 internal error.
 */

import { runCli } from "../src/index";

function main(): void {
  const code = runCli(process.argv.slice(2), {
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  });
  process.exit(code);
}

try {
  main();
} catch (error) {
  console.error(`dice-roll: ${error instanceof Error ? error.message : String(error)}`);
  if (process.env.DEBUG === "1") {
    console.error("dice-roll error:", error);
  }
  process.exit(2);
}
