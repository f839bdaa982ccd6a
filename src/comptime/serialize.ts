/**
 * Canonical encoding of comptime values.
 *
 * The encoding is plain JSON data. It feeds the structural argument hash of
 * cache keys (two structurally equal values encode identically) and the
 * on-disk cache store.
 */

import { createHash } from "node:crypto";
import { FloatWidth, IntWidth, Type } from "../types/types";
import {
  ComptimeValue,
  UNIT_VALUE,
  arrayValue,
  boolValue,
  charValue,
  closureValue,
  codeText,
  enumValue,
  floatValue,
  intValue,
  strValue,
  structValue,
  typeValue,
} from "./value";

export type Encoded = null | boolean | number | string | Encoded[] | { [key: string]: Encoded };

/**
 * Thrown when stored data does not decode; callers treat it as a cache miss.
 */
export class DecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DecodeError";
  }
}

// ============================================
// Hashing
// ============================================

export function contentHash(data: string | Uint8Array): string {
  return createHash("sha256").update(data).digest("hex");
}

export function valueHash(value: ComptimeValue): string {
  return contentHash(JSON.stringify(encodeValue(value)));
}

export function argumentsHash(args: readonly ComptimeValue[]): string {
  return contentHash(JSON.stringify(args.map(encodeValue)));
}

// ============================================
// Encoding
// ============================================

export function encodeValue(value: ComptimeValue): Encoded {
  switch (value.kind) {
    case "int":
      return { k: "int", w: value.width, s: value.signed, v: value.value.toString() };
    case "float":
      return { k: "float", w: value.width, v: encodeFloat(value.value) };
    case "bool":
      return { k: "bool", v: value.value };
    case "char":
      return { k: "char", v: value.value };
    case "str":
      return { k: "str", v: value.value };
    case "unit":
      return { k: "unit" };
    case "array":
      return { k: "array", e: value.elements.map(encodeValue) };
    case "struct":
      return { k: "struct", t: encodeType(value.type), f: value.fields.map((f) => [f.name, encodeValue(f.value)]) };
    case "enum":
      return { k: "enum", t: encodeType(value.type), i: value.variant, n: value.name, p: value.payload.map(encodeValue) };
    case "type":
      return { k: "type", t: encodeType(value.type) };
    case "code":
      return { k: "code", text: value.code.text };
    case "closure":
      return { k: "closure", fn: value.fn, env: value.env.map(encodeValue) };
  }
}

function encodeFloat(value: number): string {
  return Object.is(value, -0) ? "-0" : String(value);
}

export function encodeType(type: Type): Encoded {
  switch (type.kind) {
    case "int":
      return { kind: "int", width: type.width, signed: type.signed };
    case "float":
      return { kind: "float", width: type.width };
    case "array":
      return { kind: "array", element: encodeType(type.element), length: type.length };
    case "slice":
      return { kind: "slice", element: encodeType(type.element) };
    case "named":
      return { kind: "named", name: type.name, args: type.args.map(encodeType) };
    case "fn":
      return { kind: "fn", params: type.params.map(encodeType), ret: encodeType(type.ret) };
    case "param":
      return { kind: "param", name: type.name };
    default:
      return { kind: type.kind };
  }
}

// ============================================
// Decoding
// ============================================

type Obj = { [key: string]: Encoded };

function asObject(data: Encoded): Obj {
  if (data === null || typeof data !== "object" || Array.isArray(data)) {
    throw new DecodeError("expected an object");
  }
  return data;
}

function asArray(data: Encoded | undefined): Encoded[] {
  if (!Array.isArray(data)) throw new DecodeError("expected an array");
  return data;
}

function asString(data: Encoded | undefined): string {
  if (typeof data !== "string") throw new DecodeError("expected a string");
  return data;
}

function asNumber(data: Encoded | undefined): number {
  if (typeof data !== "number") throw new DecodeError("expected a number");
  return data;
}

function asBoolean(data: Encoded | undefined): boolean {
  if (typeof data !== "boolean") throw new DecodeError("expected a boolean");
  return data;
}

function asIntWidth(data: Encoded | undefined): IntWidth {
  const n = asNumber(data);
  if (n === 8 || n === 16 || n === 32 || n === 64 || n === 128) return n;
  throw new DecodeError(`invalid integer width ${n}`);
}

function asFloatWidth(data: Encoded | undefined): FloatWidth {
  const n = asNumber(data);
  if (n === 32 || n === 64) return n;
  throw new DecodeError(`invalid float width ${n}`);
}

export function decodeValue(data: Encoded): ComptimeValue {
  const obj = asObject(data);
  const kind = asString(obj.k);
  switch (kind) {
    case "int":
      return intValue(BigInt(asString(obj.v)), asIntWidth(obj.w), asBoolean(obj.s));
    case "float":
      return floatValue(Number(asString(obj.v)), asFloatWidth(obj.w));
    case "bool":
      return boolValue(asBoolean(obj.v));
    case "char":
      return charValue(asNumber(obj.v));
    case "str":
      return strValue(asString(obj.v));
    case "unit":
      return UNIT_VALUE;
    case "array":
      return arrayValue(asArray(obj.e).map(decodeValue));
    case "struct":
      return structValue(
        decodeType(obj.t),
        asArray(obj.f).map((entry) => {
          const [name, value] = asArray(entry);
          return { name: asString(name), value: decodeValue(value) };
        })
      );
    case "enum":
      return enumValue(decodeType(obj.t), asNumber(obj.i), asString(obj.n), asArray(obj.p).map(decodeValue));
    case "type":
      return typeValue(decodeType(obj.t));
    case "code":
      return codeText(asString(obj.text));
    case "closure":
      return closureValue(asString(obj.fn), asArray(obj.env).map(decodeValue));
    default:
      throw new DecodeError(`unknown value kind '${kind}'`);
  }
}

export function decodeType(data: Encoded | undefined): Type {
  if (data === undefined) throw new DecodeError("missing type");
  const obj = asObject(data);
  const kind = asString(obj.kind);
  switch (kind) {
    case "int":
      return { kind: "int", width: asIntWidth(obj.width), signed: asBoolean(obj.signed) };
    case "float":
      return { kind: "float", width: asFloatWidth(obj.width) };
    case "array":
      return { kind: "array", element: decodeType(obj.element), length: asNumber(obj.length) };
    case "slice":
      return { kind: "slice", element: decodeType(obj.element) };
    case "named":
      return { kind: "named", name: asString(obj.name), args: asArray(obj.args).map((a) => decodeType(a)) };
    case "fn":
      return { kind: "fn", params: asArray(obj.params).map((p) => decodeType(p)), ret: decodeType(obj.ret) };
    case "param":
      return { kind: "param", name: asString(obj.name) };
    case "bool":
    case "char":
    case "str":
    case "unit":
    case "never":
    case "meta":
    case "code":
      return { kind };
    default:
      throw new DecodeError(`unknown type kind '${kind}'`);
  }
}
