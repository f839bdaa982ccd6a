/**
 * Runtime support for generated JavaScript, and a harness that runs a
 * generated module in a `vm` context.
 *
 * Generated code reaches all Wisp semantics through the `$rt` object, built
 * on the same numeric helpers as the interpreter so a pure function gives the
 * same answer at compile time and at runtime.
 */

import * as vm from "vm";
import {
  ArithOp,
  ArithmeticFault,
  CompareOp,
  boolArith,
  charFromInt,
  compare as compareScalars,
  floatArith,
  floatToInt,
  intArith,
  intNeg,
  intNot,
  intToFloat,
  intToInt,
  roundFloat,
} from "../comptime/numeric";
import type { FloatWidth, IntWidth } from "../types/types";

// ============================================
// Values
// ============================================

export class WChar {
  constructor(readonly code: number) {
    Object.freeze(this);
  }
}

export class WUnit {
  readonly unit = true;

  private constructor() {
    Object.freeze(this);
  }
  static readonly value = new WUnit();
}

export class WStruct {
  constructor(readonly type: string, readonly fields: ReadonlyMap<string, RuntimeValue>) {
    Object.freeze(this);
  }
}

export class WVariant {
  constructor(
    readonly type: string,
    readonly tag: number,
    readonly name: string,
    readonly payload: readonly RuntimeValue[]
  ) {
    Object.freeze(this);
  }
}

export type RuntimeFunction = (...args: RuntimeValue[]) => RuntimeValue;

export type RuntimeValue =
  | bigint
  | number
  | boolean
  | string
  | WChar
  | WUnit
  | WStruct
  | WVariant
  | readonly RuntimeValue[]
  | RuntimeFunction;

/** A path step: field name or element index. */
export type PathStep = string | bigint;

export type CastTarget =
  | { kind: "int"; width: IntWidth; signed: boolean }
  | { kind: "float"; width: FloatWidth }
  | { kind: "char" }
  | { kind: "other" };

/**
 * A Wisp panic at runtime: failed assertion, arithmetic fault, out of bounds
 * index or an explicit `#panic`.
 */
export class WispPanic extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WispPanic";
  }
}

// ============================================
// The $rt object
// ============================================

export const runtime = {
  unit: WUnit.value,

  char(code: number): WChar {
    return new WChar(code);
  },

  array(elements: RuntimeValue[]): readonly RuntimeValue[] {
    return Object.freeze([...elements]);
  },

  struct(type: string, names: string[], values: RuntimeValue[]): WStruct {
    return new WStruct(type, new Map(names.map((name, i) => [name, values[i]])));
  },

  variant(type: string, tag: number, name: string, payload: RuntimeValue[]): WVariant {
    return new WVariant(type, tag, name, Object.freeze([...payload]));
  },

  get(base: RuntimeValue, path: PathStep[]): RuntimeValue {
    return path.reduce<RuntimeValue>((value, step) => child(value, step), base);
  },

  /** `base` with the value at `path` replaced; nothing is mutated. */
  set(base: RuntimeValue, path: PathStep[], value: RuntimeValue): RuntimeValue {
    return replace(base, path, 0, value);
  },

  int(op: ArithOp, a: RuntimeValue, b: RuntimeValue, width: IntWidth, signed: boolean): bigint {
    return faults(() => intArith(op, bigintOf(a), bigintOf(b), width, signed));
  },

  float(op: ArithOp, a: RuntimeValue, b: RuntimeValue, width: FloatWidth): number {
    return faults(() => floatArith(op, numberOf(a), numberOf(b), width));
  },

  bool(op: ArithOp, a: RuntimeValue, b: RuntimeValue): boolean {
    return faults(() => boolArith(op, booleanOf(a), booleanOf(b)));
  },

  concat(a: RuntimeValue, b: RuntimeValue): string {
    return stringOf(a) + stringOf(b);
  },

  compare(op: CompareOp, a: RuntimeValue, b: RuntimeValue): boolean {
    if (op === "eq") return equals(a, b);
    if (op === "ne") return !equals(a, b);
    if (a instanceof WChar && b instanceof WChar) return compareScalars(op, a.code, b.code);
    if (typeof a === "bigint" && typeof b === "bigint") return compareScalars(op, a, b);
    if (typeof a === "number" && typeof b === "number") return compareScalars(op, a, b);
    if (typeof a === "string" && typeof b === "string") return compareScalars(op, a, b);
    if (typeof a === "boolean" && typeof b === "boolean") return compareScalars(op, a, b);
    throw new WispPanic(`cannot order ${describe(a)} and ${describe(b)}`);
  },

  neg(a: RuntimeValue, width: number, signed: boolean): RuntimeValue {
    if (typeof a === "number") return -a;
    return intNeg(bigintOf(a), intWidth(width), signed);
  },

  not(a: RuntimeValue, width: number, signed: boolean): RuntimeValue {
    if (typeof a === "boolean") return !a;
    return intNot(bigintOf(a), intWidth(width), signed);
  },

  cast(value: RuntimeValue, to: CastTarget): RuntimeValue {
    return faults(() => {
      switch (to.kind) {
        case "int":
          if (typeof value === "bigint") return intToInt(value, to.width, to.signed);
          if (typeof value === "number") return floatToInt(value, to.width, to.signed);
          if (typeof value === "boolean") return value ? 1n : 0n;
          if (value instanceof WChar) return BigInt(value.code);
          break;
        case "float":
          if (typeof value === "bigint") return intToFloat(value, to.width);
          if (typeof value === "number") return roundFloat(value, to.width);
          break;
        case "char":
          if (typeof value === "bigint") return new WChar(charFromInt(value));
          if (value instanceof WChar) return value;
          break;
        case "other":
          return value;
      }
      throw new WispPanic(`cannot cast ${describe(value)}`);
    });
  },

  /** Switch key: integers as they are, `true` as 1, chars by code point. */
  key(value: RuntimeValue): bigint {
    if (typeof value === "bigint") return value;
    if (typeof value === "boolean") return value ? 1n : 0n;
    if (value instanceof WChar) return BigInt(value.code);
    throw new WispPanic(`cannot switch on ${describe(value)}`);
  },

  branch(key: bigint, cases: [bigint, number][], otherwise: number): number {
    for (const [value, target] of cases) {
      if (value === key) return target;
    }
    return otherwise;
  },

  discriminant(value: RuntimeValue): bigint {
    if (!(value instanceof WVariant)) throw new WispPanic(`discriminant of ${describe(value)}`);
    return BigInt(value.tag);
  },

  payload(value: RuntimeValue, tag: number, index: number): RuntimeValue {
    if (!(value instanceof WVariant) || value.tag !== tag) throw new WispPanic("payload of the wrong enum variant");
    const field = value.payload[index];
    if (field === undefined) throw new WispPanic("payload index out of range");
    return field;
  },

  call(callee: RuntimeValue, args: RuntimeValue[]): RuntimeValue {
    if (typeof callee !== "function") throw new WispPanic(`call of ${describe(callee)}`);
    return callee(...args);
  },

  display(value: RuntimeValue): string {
    return display(value);
  },

  len(value: RuntimeValue): bigint {
    if (typeof value === "string") return BigInt([...value].length);
    if (Array.isArray(value)) return BigInt(value.length);
    throw new WispPanic(`#len of ${describe(value)}`);
  },

  panic(message: RuntimeValue): never {
    throw new WispPanic(`evaluation panicked: ${stringOf(message)}`);
  },

  assert(condition: RuntimeValue, message: RuntimeValue): WUnit {
    if (!booleanOf(condition)) throw new WispPanic(`assertion failed: ${stringOf(message)}`);
    return WUnit.value;
  },

  unreachable(reason: string): never {
    throw new WispPanic(reason === "match" ? "no match arm matched the scrutinee" : "reached unreachable code");
  },
};

export type WispRuntime = typeof runtime;

// ============================================
// Helpers
// ============================================

function faults<T>(run: () => T): T {
  try {
    return run();
  } catch (e) {
    if (e instanceof ArithmeticFault) throw new WispPanic(e.message);
    throw e;
  }
}

function isList(value: RuntimeValue): value is readonly RuntimeValue[] {
  return Array.isArray(value);
}

function child(value: RuntimeValue, step: PathStep): RuntimeValue {
  if (typeof step === "string") {
    if (!(value instanceof WStruct)) throw new WispPanic(`no field '${step}' on ${describe(value)}`);
    const field = value.fields.get(step);
    if (field === undefined) throw new WispPanic(`no field '${step}' on ${value.type}`);
    return field;
  }
  if (!isList(value)) throw new WispPanic(`cannot index ${describe(value)}`);
  return value[checkedIndex(value, step)];
}

function replace(base: RuntimeValue, path: PathStep[], depth: number, value: RuntimeValue): RuntimeValue {
  if (depth === path.length) return value;
  const step = path[depth];
  if (typeof step === "string") {
    if (!(base instanceof WStruct)) throw new WispPanic(`no field '${step}' on ${describe(base)}`);
    const fields = new Map(base.fields);
    fields.set(step, replace(child(base, step), path, depth + 1, value));
    return new WStruct(base.type, fields);
  }
  if (!isList(base)) throw new WispPanic(`cannot index ${describe(base)}`);
  const index = checkedIndex(base, step);
  const elements = [...base];
  elements[index] = replace(base[index], path, depth + 1, value);
  return Object.freeze(elements);
}

function checkedIndex(list: readonly RuntimeValue[], index: bigint): number {
  if (index < 0n || index >= BigInt(list.length)) {
    throw new WispPanic(`index out of bounds: the length is ${list.length} but the index is ${index}`);
  }
  return Number(index);
}

function equals(a: RuntimeValue, b: RuntimeValue): boolean {
  if (a instanceof WChar) return b instanceof WChar && a.code === b.code;
  if (a instanceof WUnit) return b instanceof WUnit;
  if (a instanceof WStruct) {
    if (!(b instanceof WStruct) || a.type !== b.type || a.fields.size !== b.fields.size) return false;
    for (const [name, value] of a.fields) {
      const other = b.fields.get(name);
      if (other === undefined || !equals(value, other)) return false;
    }
    return true;
  }
  if (a instanceof WVariant) {
    return b instanceof WVariant && a.type === b.type && a.tag === b.tag && listEquals(a.payload, b.payload);
  }
  if (isList(a)) return isList(b) && listEquals(a, b);
  return a === b;
}

function listEquals(a: readonly RuntimeValue[], b: readonly RuntimeValue[]): boolean {
  return a.length === b.length && a.every((v, i) => equals(v, b[i]));
}

/** Same rendering as `#to_string` at compile time. */
function display(value: RuntimeValue): string {
  if (typeof value === "bigint") return value.toString();
  if (typeof value === "number") return Number.isInteger(value) && Number.isFinite(value) ? value.toFixed(1) : String(value);
  if (typeof value === "boolean") return String(value);
  if (typeof value === "string") return value;
  if (typeof value === "function") return `fn ${value.name}`;
  if (value instanceof WChar) return String.fromCodePoint(value.code);
  if (value instanceof WUnit) return "()";
  if (value instanceof WStruct) {
    const fields = [...value.fields].map(([name, v]) => `${name}: ${display(v)}`);
    return fields.length === 0 ? `${value.type} {}` : `${value.type} { ${fields.join(", ")} }`;
  }
  if (value instanceof WVariant) {
    const head = `${value.type}::${value.name}`;
    return value.payload.length === 0 ? head : `${head}(${value.payload.map(display).join(", ")})`;
  }
  return `[${value.map(display).join(", ")}]`;
}

function describe(value: RuntimeValue): string {
  if (value instanceof WStruct) return value.type;
  if (value instanceof WVariant) return value.type;
  if (value instanceof WChar) return "char";
  if (value instanceof WUnit) return "()";
  if (isList(value)) return "array";
  return typeof value;
}

function bigintOf(value: RuntimeValue): bigint {
  if (typeof value !== "bigint") throw new WispPanic(`expected an integer, got ${describe(value)}`);
  return value;
}

function numberOf(value: RuntimeValue): number {
  if (typeof value !== "number") throw new WispPanic(`expected a float, got ${describe(value)}`);
  return value;
}

function booleanOf(value: RuntimeValue): boolean {
  if (typeof value !== "boolean") throw new WispPanic(`expected a bool, got ${describe(value)}`);
  return value;
}

function stringOf(value: RuntimeValue): string {
  if (typeof value !== "string") throw new WispPanic(`expected a str, got ${describe(value)}`);
  return value;
}

function intWidth(width: number): IntWidth {
  if (width === 8 || width === 16 || width === 32 || width === 64 || width === 128) return width;
  throw new WispPanic(`invalid integer width ${width}`);
}

// ============================================
// Harness
// ============================================

export type LoadedModule = {
  /** Generated functions by Wisp function id. */
  functions: ReadonlyMap<string, RuntimeFunction>;
};

/**
 * Run generated code in a fresh `vm` context with `$rt` bound.
 */
export function loadModule(code: string, options: { timeoutMs?: number } = {}): LoadedModule {
  const context = vm.createContext({ $rt: runtime });
  vm.runInContext(code, context, { timeout: options.timeoutMs ?? 5000, filename: "wisp-module.js" });
  const table: unknown = vm.runInContext("$functions", context);
  const functions = new Map<string, RuntimeFunction>();
  if (typeof table === "object" && table !== null) {
    const entries: [string, unknown][] = Object.entries(table);
    for (const [id, fn] of entries) {
      if (typeof fn === "function") functions.set(id, (...args: RuntimeValue[]) => toRuntimeValue(fn(...args)));
    }
  }
  return { functions };
}

export function callFunction(module: LoadedModule, id: string, args: RuntimeValue[]): RuntimeValue {
  const fn = module.functions.get(id);
  if (!fn) throw new Error(`generated module has no function '${id}'`);
  return fn(...args);
}

function toRuntimeValue(value: unknown): RuntimeValue {
  if (
    typeof value === "bigint" ||
    typeof value === "number" ||
    typeof value === "boolean" ||
    typeof value === "string" ||
    value instanceof WChar ||
    value instanceof WUnit ||
    value instanceof WStruct ||
    value instanceof WVariant
  ) {
    return value;
  }
  if (Array.isArray(value)) return value.map(toRuntimeValue);
  throw new Error(`generated code returned an unexpected ${typeof value}`);
}
