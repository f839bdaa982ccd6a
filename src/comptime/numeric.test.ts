import { describe, test, expect } from "vitest";
import {
  ArithmeticFault,
  boolArith,
  charFromInt,
  compare,
  fitsInt,
  floatArith,
  floatToInt,
  intArith,
  intNeg,
  intNot,
  intToFloat,
  wrapInt,
} from "./numeric";

describe("integer arithmetic", () => {
  test("wraps to the width", () => {
    expect(wrapInt(256n, 8, false)).toBe(0n);
    expect(wrapInt(128n, 8, true)).toBe(-128n);
    expect(intArith("add", 255n, 1n, 8, false)).toBe(0n);
    expect(intArith("mul", 1n << 62n, 4n, 64, true)).toBe(0n);
    expect(intArith("sub", 0n, 1n, 32, false)).toBe(4294967295n);
  });

  test("division truncates toward zero", () => {
    expect(intArith("div", -7n, 2n, 64, true)).toBe(-3n);
    expect(intArith("rem", -7n, 2n, 64, true)).toBe(-1n);
  });

  test("division by zero faults", () => {
    expect(() => intArith("div", 1n, 0n, 64, true)).toThrow(ArithmeticFault);
    expect(() => intArith("div", 1n, 0n, 64, true)).toThrow("attempt to divide by zero");
    expect(() => intArith("rem", 1n, 0n, 8, false)).toThrow(
      "attempt to calculate the remainder with a divisor of zero"
    );
  });

  test("shift amounts are taken modulo the width", () => {
    expect(intArith("shl", 1n, 9n, 8, false)).toBe(2n);
    expect(intArith("shr", -8n, 1n, 64, true)).toBe(-4n);
    expect(intArith("shl", 1n, 7n, 8, true)).toBe(-128n);
  });

  test("negation and bitwise not wrap", () => {
    expect(intNeg(-128n, 8, true)).toBe(-128n);
    expect(intNot(0n, 8, false)).toBe(255n);
    expect(intNot(0n, 8, true)).toBe(-1n);
  });

  test("fitsInt checks the range of a width", () => {
    expect(fitsInt(255n, 8, false)).toBe(true);
    expect(fitsInt(256n, 8, false)).toBe(false);
    expect(fitsInt(-1n, 64, false)).toBe(false);
  });
});

describe("float arithmetic", () => {
  test("f32 results are rounded to single precision", () => {
    expect(floatArith("add", 0.1, 0.2, 32)).toBe(Math.fround(0.1 + 0.2));
    expect(floatArith("add", 0.1, 0.2, 64)).toBe(0.1 + 0.2);
  });

  test("division by zero follows IEEE", () => {
    expect(floatArith("div", 1, 0, 64)).toBe(Infinity);
    expect(Number.isNaN(floatArith("div", 0, 0, 64))).toBe(true);
  });

  test("bitwise operators are rejected", () => {
    expect(() => floatArith("bitand", 1, 2, 64)).toThrow("operator 'bitand' is not defined on floats");
  });

  test("large integers lose precision when converted", () => {
    expect(intToFloat(16777217n, 32)).toBe(16777216);
  });
});

describe("casts", () => {
  test("float to int saturates and maps NaN to zero", () => {
    expect(floatToInt(Number.NaN, 32, true)).toBe(0n);
    expect(floatToInt(1e10, 32, true)).toBe(2147483647n);
    expect(floatToInt(-1.5, 8, false)).toBe(0n);
    expect(floatToInt(Infinity, 8, true)).toBe(127n);
    expect(floatToInt(-Infinity, 16, true)).toBe(-32768n);
    expect(floatToInt(-3.9, 64, true)).toBe(-3n);
  });

  test("int to char requires a scalar value", () => {
    expect(charFromInt(65n)).toBe(65);
    expect(() => charFromInt(0xd800n)).toThrow("55296 is not a valid char");
    expect(() => charFromInt(0x110000n)).toThrow("1114112 is not a valid char");
  });
});

describe("bool and comparison", () => {
  test("bitwise operators on bools", () => {
    expect(boolArith("bitand", true, false)).toBe(false);
    expect(boolArith("bitor", true, false)).toBe(true);
    expect(boolArith("bitxor", true, true)).toBe(false);
    expect(() => boolArith("add", true, true)).toThrow("operator 'add' is not defined on bool");
  });

  test("compares scalars", () => {
    expect(compare("lt", "abc", "abd")).toBe(true);
    expect(compare("ge", 3n, 3n)).toBe(true);
    expect(compare("ne", 1.5, 1.5)).toBe(false);
    expect(compare("gt", false, true)).toBe(false);
  });
});
