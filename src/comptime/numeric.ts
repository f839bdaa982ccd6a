/**
 * Fixed-width numeric semantics.
 *
 * Shared by the comptime interpreter and by the runtime support object the
 * JavaScript backend calls into, so both evaluate a pure function identically.
 * Integers are bigints wrapped to their width; floats are JS numbers, rounded
 * through `Math.fround` for f32.
 */

import type { FloatWidth, IntWidth } from "../types/types";

export type ArithOp = "add" | "sub" | "mul" | "div" | "rem" | "bitand" | "bitor" | "bitxor" | "shl" | "shr";
export type CompareOp = "eq" | "ne" | "lt" | "le" | "gt" | "ge";

/**
 * Division by zero and friends. Callers attach the source span.
 */
export class ArithmeticFault extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ArithmeticFault";
  }
}

export function wrapInt(value: bigint, width: IntWidth, signed: boolean): bigint {
  return signed ? BigInt.asIntN(width, value) : BigInt.asUintN(width, value);
}

export function fitsInt(value: bigint, width: IntWidth, signed: boolean): boolean {
  return wrapInt(value, width, signed) === value;
}

export function intArith(op: ArithOp, a: bigint, b: bigint, width: IntWidth, signed: boolean): bigint {
  switch (op) {
    case "add":
      return wrapInt(a + b, width, signed);
    case "sub":
      return wrapInt(a - b, width, signed);
    case "mul":
      return wrapInt(a * b, width, signed);
    case "div":
      if (b === 0n) throw new ArithmeticFault("attempt to divide by zero");
      return wrapInt(a / b, width, signed);
    case "rem":
      if (b === 0n) throw new ArithmeticFault("attempt to calculate the remainder with a divisor of zero");
      return wrapInt(a % b, width, signed);
    case "bitand":
      return wrapInt(a & b, width, signed);
    case "bitor":
      return wrapInt(a | b, width, signed);
    case "bitxor":
      return wrapInt(a ^ b, width, signed);
    case "shl":
      return wrapInt(a << shiftAmount(b, width), width, signed);
    case "shr":
      return wrapInt(a >> shiftAmount(b, width), width, signed);
  }
}

// Shift amounts are taken modulo the width.
function shiftAmount(b: bigint, width: IntWidth): bigint {
  return BigInt.asUintN(32, b) % BigInt(width);
}

export function floatArith(op: ArithOp, a: number, b: number, width: FloatWidth): number {
  let result: number;
  switch (op) {
    case "add":
      result = a + b;
      break;
    case "sub":
      result = a - b;
      break;
    case "mul":
      result = a * b;
      break;
    case "div":
      result = a / b;
      break;
    case "rem":
      result = a % b;
      break;
    default:
      throw new ArithmeticFault(`operator '${op}' is not defined on floats`);
  }
  return roundFloat(result, width);
}

export function boolArith(op: ArithOp, a: boolean, b: boolean): boolean {
  switch (op) {
    case "bitand":
      return a && b;
    case "bitor":
      return a || b;
    case "bitxor":
      return a !== b;
    default:
      throw new ArithmeticFault(`operator '${op}' is not defined on bool`);
  }
}

export function compare<T extends bigint | number | string | boolean>(op: CompareOp, a: T, b: T): boolean {
  switch (op) {
    case "eq":
      return a === b;
    case "ne":
      return a !== b;
    case "lt":
      return a < b;
    case "le":
      return a <= b;
    case "gt":
      return a > b;
    case "ge":
      return a >= b;
  }
}

export function intNeg(a: bigint, width: IntWidth, signed: boolean): bigint {
  return wrapInt(-a, width, signed);
}

export function intNot(a: bigint, width: IntWidth, signed: boolean): bigint {
  return wrapInt(~a, width, signed);
}

export function roundFloat(value: number, width: FloatWidth): number {
  return width === 32 ? Math.fround(value) : value;
}

// ============================================
// Casts
// ============================================

export function intToInt(value: bigint, width: IntWidth, signed: boolean): bigint {
  return wrapInt(value, width, signed);
}

export function intToFloat(value: bigint, width: FloatWidth): number {
  return roundFloat(Number(value), width);
}

/**
 * Float to integer casts saturate; NaN becomes zero.
 */
export function floatToInt(value: number, width: IntWidth, signed: boolean): bigint {
  if (Number.isNaN(value)) return 0n;
  const min = signed ? -(1n << BigInt(width - 1)) : 0n;
  const max = signed ? (1n << BigInt(width - 1)) - 1n : (1n << BigInt(width)) - 1n;
  if (value === Infinity) return max;
  if (value === -Infinity) return min;
  const truncated = BigInt(Math.trunc(value));
  if (truncated < min) return min;
  if (truncated > max) return max;
  return truncated;
}

/**
 * Char to integer casts take the code point; integer to char requires a
 * valid scalar value (only `u8` and `u32` sources are accepted by the checker).
 */
export function charFromInt(value: bigint): number {
  const cp = Number(BigInt.asUintN(32, value));
  if (cp > 0x10ffff || (cp >= 0xd800 && cp <= 0xdfff)) {
    throw new ArithmeticFault(`${cp} is not a valid char`);
  }
  return cp;
}
