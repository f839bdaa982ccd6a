/**
 * ComptimeValue - the values produced and consumed by compile-time evaluation.
 *
 * Values are immutable once produced. The interpreter updates aggregates by
 * building new values (copy-on-write), never by mutating a shared instance.
 */

import { formatType } from "../types/format";
import { FloatWidth, IntWidth, Type, namedType } from "../types/types";
import { roundFloat, wrapInt } from "./numeric";

// ============================================
// Values
// ============================================

/** Generated source text, parsed into items when it is inserted. */
export type CodeFragment = { kind: "text"; text: string };

export type StructField = { readonly name: string; readonly value: ComptimeValue };

export type ComptimeValue =
  | { readonly kind: "int"; readonly width: IntWidth; readonly signed: boolean; readonly value: bigint }
  | { readonly kind: "float"; readonly width: FloatWidth; readonly value: number }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "char"; readonly value: number }
  | { readonly kind: "str"; readonly value: string }
  | { readonly kind: "unit" }
  | { readonly kind: "array"; readonly elements: readonly ComptimeValue[] }
  | { readonly kind: "struct"; readonly type: Type; readonly fields: readonly StructField[] }
  | {
      readonly kind: "enum";
      readonly type: Type;
      readonly variant: number;
      readonly name: string;
      readonly payload: readonly ComptimeValue[];
    }
  | { readonly kind: "type"; readonly type: Type }
  | { readonly kind: "code"; readonly code: CodeFragment }
  | { readonly kind: "closure"; readonly fn: string; readonly env: readonly ComptimeValue[] };

export type ValueKind = ComptimeValue["kind"];

// ============================================
// Constructors
// ============================================

export function intValue(value: bigint, width: IntWidth = 64, signed = true): ComptimeValue {
  return frozen({ kind: "int", width, signed, value: wrapInt(value, width, signed) });
}

export function floatValue(value: number, width: FloatWidth = 64): ComptimeValue {
  return frozen({ kind: "float", width, value: roundFloat(value, width) });
}

export function boolValue(value: boolean): ComptimeValue {
  return value ? TRUE : FALSE;
}

export function charValue(codePoint: number): ComptimeValue {
  return frozen({ kind: "char", value: codePoint });
}

export function strValue(value: string): ComptimeValue {
  return frozen({ kind: "str", value });
}

export function arrayValue(elements: readonly ComptimeValue[]): ComptimeValue {
  return frozen({ kind: "array", elements: Object.freeze([...elements]) });
}

export function structValue(type: Type, fields: readonly StructField[]): ComptimeValue {
  return frozen({
    kind: "struct",
    type,
    fields: Object.freeze(fields.map((f) => Object.freeze({ name: f.name, value: f.value }))),
  });
}

export function enumValue(type: Type, variant: number, name: string, payload: readonly ComptimeValue[]): ComptimeValue {
  return frozen({ kind: "enum", type, variant, name, payload: Object.freeze([...payload]) });
}

export function typeValue(type: Type): ComptimeValue {
  return frozen({ kind: "type", type });
}

export function codeText(text: string): ComptimeValue {
  return frozen({ kind: "code", code: { kind: "text", text } });
}

export function closureValue(fn: string, env: readonly ComptimeValue[] = []): ComptimeValue {
  return frozen({ kind: "closure", fn, env: Object.freeze([...env]) });
}

export const UNIT_VALUE: ComptimeValue = frozen({ kind: "unit" });
const TRUE: ComptimeValue = frozen({ kind: "bool", value: true });
const FALSE: ComptimeValue = frozen({ kind: "bool", value: false });

function frozen(value: ComptimeValue): ComptimeValue {
  return Object.freeze(value);
}

/**
 * Build a value of one of the builtin result enums (`IoResult`, ...).
 */
export function resultValue(enumName: string, ok: boolean, payload: readonly ComptimeValue[]): ComptimeValue {
  return enumValue(namedType(enumName), ok ? 0 : 1, ok ? "Ok" : "Err", payload);
}

// ============================================
// Copy-on-write updates
// ============================================

export function withField(value: ComptimeValue, name: string, fieldValue: ComptimeValue): ComptimeValue | undefined {
  if (value.kind !== "struct") return undefined;
  const index = value.fields.findIndex((f) => f.name === name);
  if (index < 0) return undefined;
  const fields = value.fields.map((f, i) => (i === index ? { name, value: fieldValue } : f));
  return structValue(value.type, fields);
}

export function withElement(value: ComptimeValue, index: number, element: ComptimeValue): ComptimeValue | undefined {
  if (value.kind !== "array" || index < 0 || index >= value.elements.length) return undefined;
  const elements = value.elements.map((e, i) => (i === index ? element : e));
  return arrayValue(elements);
}

export function getField(value: ComptimeValue, name: string): ComptimeValue | undefined {
  if (value.kind !== "struct") return undefined;
  return value.fields.find((f) => f.name === name)?.value;
}

// ============================================
// Structural equality
// ============================================

export function valueEquals(a: ComptimeValue, b: ComptimeValue): boolean {
  switch (a.kind) {
    case "int":
      return b.kind === "int" && a.width === b.width && a.signed === b.signed && a.value === b.value;
    case "float":
      return b.kind === "float" && a.width === b.width && a.value === b.value;
    case "bool":
      return b.kind === "bool" && a.value === b.value;
    case "char":
      return b.kind === "char" && a.value === b.value;
    case "str":
      return b.kind === "str" && a.value === b.value;
    case "unit":
      return b.kind === "unit";
    case "array":
      return b.kind === "array" && listEquals(a.elements, b.elements);
    case "struct":
      return (
        b.kind === "struct" &&
        formatType(a.type) === formatType(b.type) &&
        a.fields.length === b.fields.length &&
        a.fields.every((f, i) => f.name === b.fields[i].name && valueEquals(f.value, b.fields[i].value))
      );
    case "enum":
      return (
        b.kind === "enum" &&
        formatType(a.type) === formatType(b.type) &&
        a.variant === b.variant &&
        listEquals(a.payload, b.payload)
      );
    case "type":
      return b.kind === "type" && formatType(a.type) === formatType(b.type);
    case "code":
      return b.kind === "code" && a.code.text === b.code.text;
    case "closure":
      return b.kind === "closure" && a.fn === b.fn && listEquals(a.env, b.env);
  }
}

function listEquals(a: readonly ComptimeValue[], b: readonly ComptimeValue[]): boolean {
  return a.length === b.length && a.every((v, i) => valueEquals(v, b[i]));
}

// ============================================
// Display
// ============================================

/**
 * Render a value in Wisp literal syntax.
 */
export function formatValue(value: ComptimeValue): string {
  switch (value.kind) {
    case "int":
      return `${value.value}${value.signed ? "i" : "u"}${value.width}`;
    case "float": {
      const text = Number.isInteger(value.value) ? value.value.toFixed(1) : String(value.value);
      return `${text}f${value.width}`;
    }
    case "bool":
      return String(value.value);
    case "char":
      return `'${escapeText(String.fromCodePoint(value.value), "'")}'`;
    case "str":
      return `"${escapeText(value.value, '"')}"`;
    case "unit":
      return "()";
    case "array":
      return `[${value.elements.map(formatValue).join(", ")}]`;
    case "struct": {
      const fields = value.fields.map((f) => `${f.name}: ${formatValue(f.value)}`);
      return fields.length === 0 ? `${formatType(value.type)} {}` : `${formatType(value.type)} { ${fields.join(", ")} }`;
    }
    case "enum": {
      const head = `${formatType(value.type)}::${value.name}`;
      return value.payload.length === 0 ? head : `${head}(${value.payload.map(formatValue).join(", ")})`;
    }
    case "type":
      return formatType(value.type);
    case "code":
      return `#code(${JSON.stringify(value.code.text)})`;
    case "closure":
      return `fn ${value.fn}`;
  }
}

/**
 * Plain-text rendering used by `#to_string` and string interpolation.
 */
export function displayValue(value: ComptimeValue): string {
  switch (value.kind) {
    case "int":
      return value.value.toString();
    case "float":
      return Number.isInteger(value.value) && Number.isFinite(value.value) ? value.value.toFixed(1) : String(value.value);
    case "char":
      return String.fromCodePoint(value.value);
    case "str":
      return value.value;
    case "code":
      return value.code.text;
    case "array":
      return `[${value.elements.map(displayValue).join(", ")}]`;
    case "struct": {
      const fields = value.fields.map((f) => `${f.name}: ${displayValue(f.value)}`);
      return fields.length === 0 ? `${baseName(value.type)} {}` : `${baseName(value.type)} { ${fields.join(", ")} }`;
    }
    case "enum": {
      const head = `${baseName(value.type)}::${value.name}`;
      return value.payload.length === 0 ? head : `${head}(${value.payload.map(displayValue).join(", ")})`;
    }
    default:
      return formatValue(value);
  }
}

// Type arguments are not shown, so generated code can render values
// without carrying them.
function baseName(type: Type): string {
  return type.kind === "named" ? type.name : formatType(type);
}

export function escapeText(text: string, quote: string): string {
  let out = "";
  for (const ch of text) {
    switch (ch) {
      case "\\":
        out += "\\\\";
        break;
      case "\n":
        out += "\\n";
        break;
      case "\t":
        out += "\\t";
        break;
      case "\r":
        out += "\\r";
        break;
      case "\0":
        out += "\\0";
        break;
      default:
        out += ch === quote ? `\\${ch}` : ch;
    }
  }
  return out;
}
