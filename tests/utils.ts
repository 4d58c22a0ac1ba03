import type { RandomSource } from "../src/types";

export function fixedSource(value: number): RandomSource {
  return { nextInRange: () => value };
}

/**
 * Cycles through `values`, recording every requested range.
 */
export function sequenceSource(values: number[]): RandomSource & { calls: Array<[number, number]> } {
  let i = 0;
  const calls: Array<[number, number]> = [];
  return {
    calls,
    nextInRange(low: number, highInclusive: number): number {
      calls.push([low, highInclusive]);
      const v = values[i % values.length];
      i++;
      return v;
    },
  };
}

export function captureIO(): { out: string[]; err: string[]; stdout: (l: string) => void; stderr: (l: string) => void } {
  const out: string[] = [];
  const err: string[] = [];
  return {
    out,
    err,
    stdout: (l) => out.push(l),
    stderr: (l) => err.push(l),
  };
}
