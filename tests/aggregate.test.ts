import { describe, it, expect } from "vitest";
import { aggregate, parseAggregate, reduceRolls } from "../src/aggregate";
import { EmptySequenceError, UnknownAggregateError } from "../src/errors";

describe("parseAggregate", () => {
  it("matches names case-insensitively", () => {
    expect(parseAggregate("sum")).toBe("sum");
    expect(parseAggregate("AVG")).toBe("avg");
    expect(parseAggregate("Max")).toBe("max");
    expect(parseAggregate("mIn")).toBe("min");
  });

  it.each(["median", "", "none", "sum "])("rejects %j", (input) => {
    expect(() => parseAggregate(input)).toThrow(UnknownAggregateError);
  });

  it("names the offending input", () => {
    expect(() => parseAggregate("median")).toThrow(
      'unknown aggregate function "median" (expected one of: sum, avg, max, min)'
    );
  });
});

describe("reduceRolls", () => {
  const rolls = [2, 6, 1, 5];

  it("sums", () => {
    expect(reduceRolls("sum", rolls)).toBe(14n);
  });

  it("sums exactly past 2^53", () => {
    const max = 0xffffffff;
    const big = Array.from({ length: 2 ** 21 + 1 }, () => max);
    // (2^21 + 1) * (2^32 - 1) = 9007203547611135, above MAX_SAFE_INTEGER
    expect(reduceRolls("sum", big)).toBe(9007203547611135n);
    expect(aggregate("sum", big)).toBe("9007203547611135");
  });

  it("averages without truncating", () => {
    expect(reduceRolls("avg", rolls)).toBe(3.5);
    expect(reduceRolls("avg", [1, 2])).toBe(1.5);
    expect(reduceRolls("avg", [3, 4, 4])).toBeCloseTo(11 / 3, 10);
  });

  it("finds the extremes", () => {
    expect(reduceRolls("max", rolls)).toBe(6);
    expect(reduceRolls("min", rolls)).toBe(1);
  });

  it("passes rolls through for none", () => {
    expect(reduceRolls("none", rolls)).toEqual([2, 6, 1, 5]);
  });

  it.each(["avg", "max", "min"] as const)("rejects an empty sequence for %s", (selector) => {
    expect(() => reduceRolls(selector, [])).toThrow(EmptySequenceError);
  });

  it("sums an empty sequence to zero", () => {
    expect(reduceRolls("sum", [])).toBe(0n);
  });
});

describe("aggregate", () => {
  it("renders a single number", () => {
    expect(aggregate("sum", [4, 4, 4])).toBe("12");
    expect(aggregate("avg", [4, 4, 4])).toBe("4");
    expect(aggregate("avg", [1, 2])).toBe("1.5");
    expect(aggregate("avg", [1, 2, 2])).toBe("1.6666666666666667");
    expect(aggregate("max", [3, 8, 1])).toBe("8");
  });

  it("joins raw rolls in order", () => {
    expect(aggregate("none", [2, 3])).toBe("2 3");
    expect(aggregate("none", [6])).toBe("6");
  });

  it("reports which reducer hit an empty sequence", () => {
    expect(() => aggregate("max", [])).toThrow("cannot apply max to an empty roll sequence");
  });
});
