/**
 * Type formatting. The formatted string doubles as the type's identity.
 */

import { Type } from "./types";

/**
 * Format a type as Wisp source syntax.
 */
export function formatType(t: Type): string {
  switch (t.kind) {
    case "int":
      return `${t.signed ? "i" : "u"}${t.width}`;
    case "float":
      return `f${t.width}`;
    case "bool":
    case "char":
    case "str":
      return t.kind;
    case "unit":
      return "()";
    case "never":
      return "!";
    case "array":
      return `[${formatType(t.element)}; ${t.length}]`;
    case "slice":
      return `[${formatType(t.element)}]`;
    case "named":
      return t.args.length === 0 ? t.name : `${t.name}<${t.args.map(formatType).join(", ")}>`;
    case "fn":
      return `fn(${t.params.map(formatType).join(", ")}) -> ${formatType(t.ret)}`;
    case "param":
      return t.name;
    case "meta":
      return "Type";
    case "code":
      return "Code";
  }
}

/**
 * Identity key for a type handle.
 */
export function typeId(t: Type): string {
  return formatType(t);
}
