/**
 * Type representation and the Type Table.
 *
 * Types are plain structural values; a named type refers to its declaration
 * in the TypeTable by qualified name. The canonical `formatType` string of a
 * type is its identity.
 */

import { Span, dummySpan, resolveError } from "../diagnostics/errors";

// ============================================
// Types
// ============================================

export type IntWidth = 8 | 16 | 32 | 64 | 128;
export type FloatWidth = 32 | 64;

export type Type =
  | { kind: "int"; width: IntWidth; signed: boolean }
  | { kind: "float"; width: FloatWidth }
  | { kind: "bool" }
  | { kind: "char" }
  | { kind: "str" }
  | { kind: "unit" }
  | { kind: "never" }
  | { kind: "array"; element: Type; length: number }
  | { kind: "slice"; element: Type }
  | { kind: "named"; name: string; args: Type[] }
  | { kind: "fn"; params: Type[]; ret: Type }
  | { kind: "param"; name: string }
  | { kind: "meta" } // a type handle, spelled `Type`
  | { kind: "code" }; // generated code, spelled `Code`

export function intType(width: IntWidth, signed: boolean): Type {
  return { kind: "int", width, signed };
}

export function floatType(width: FloatWidth): Type {
  return { kind: "float", width };
}

export function namedType(name: string, args: Type[] = []): Type {
  return { kind: "named", name, args };
}

export const I32: Type = intType(32, true);
export const I64: Type = intType(64, true);
export const U64: Type = intType(64, false);
export const F64: Type = floatType(64);
export const BOOL: Type = { kind: "bool" };
export const CHAR: Type = { kind: "char" };
export const STR: Type = { kind: "str" };
export const UNIT: Type = { kind: "unit" };
export const NEVER: Type = { kind: "never" };
export const META: Type = { kind: "meta" };
export const CODE: Type = { kind: "code" };

const INT_NAMES: Record<string, Type> = {
  i8: intType(8, true),
  i16: intType(16, true),
  i32: intType(32, true),
  i64: intType(64, true),
  i128: intType(128, true),
  u8: intType(8, false),
  u16: intType(16, false),
  u32: intType(32, false),
  u64: intType(64, false),
  u128: intType(128, false),
};

/**
 * Types spelled by a bare name that never resolve through the Type Table.
 */
export const PRIMITIVE_TYPES: ReadonlyMap<string, Type> = new Map<string, Type>([
  ...Object.entries(INT_NAMES),
  ["f32", floatType(32)],
  ["f64", floatType(64)],
  ["bool", BOOL],
  ["char", CHAR],
  ["str", STR],
  ["Type", META],
  ["Code", CODE],
]);

export function typeEquals(a: Type, b: Type): boolean {
  switch (a.kind) {
    case "int":
      return b.kind === "int" && a.width === b.width && a.signed === b.signed;
    case "float":
      return b.kind === "float" && a.width === b.width;
    case "array":
      return b.kind === "array" && a.length === b.length && typeEquals(a.element, b.element);
    case "slice":
      return b.kind === "slice" && typeEquals(a.element, b.element);
    case "named":
      return (
        b.kind === "named" &&
        a.name === b.name &&
        a.args.length === b.args.length &&
        a.args.every((arg, i) => typeEquals(arg, b.args[i]))
      );
    case "fn":
      return (
        b.kind === "fn" &&
        a.params.length === b.params.length &&
        a.params.every((p, i) => typeEquals(p, b.params[i])) &&
        typeEquals(a.ret, b.ret)
      );
    case "param":
      return b.kind === "param" && a.name === b.name;
    default:
      return a.kind === b.kind;
  }
}

/**
 * Replace type parameters by their bindings.
 */
export function substitute(type: Type, bindings: Map<string, Type>): Type {
  if (bindings.size === 0) return type;
  switch (type.kind) {
    case "param":
      return bindings.get(type.name) ?? type;
    case "array":
      return { ...type, element: substitute(type.element, bindings) };
    case "slice":
      return { ...type, element: substitute(type.element, bindings) };
    case "named":
      return { ...type, args: type.args.map((a) => substitute(a, bindings)) };
    case "fn":
      return {
        kind: "fn",
        params: type.params.map((p) => substitute(p, bindings)),
        ret: substitute(type.ret, bindings),
      };
    default:
      return type;
  }
}

export function isInteger(type: Type): type is { kind: "int"; width: IntWidth; signed: boolean } {
  return type.kind === "int";
}

export function isNumeric(type: Type): boolean {
  return type.kind === "int" || type.kind === "float";
}

// ============================================
// Declarations
// ============================================

export type FieldDecl = { name: string; type: Type };

export type StructDecl = {
  kind: "struct";
  name: string;
  typeParams: string[];
  fields: FieldDecl[];
  span: Span;
};

export type VariantDecl = { name: string; fields: Type[] };

export type EnumDecl = {
  kind: "enum";
  name: string;
  typeParams: string[];
  variants: VariantDecl[];
  span: Span;
};

export type MethodSig = {
  name: string;
  hasSelf: boolean;
  params: Type[]; // excluding `self`
  ret: Type;
  fnId?: string; // implementing function, absent for trait requirements
};

export type TraitDecl = {
  kind: "trait";
  name: string;
  methods: MethodSig[];
  span: Span;
};

export type TypeDecl = StructDecl | EnumDecl | TraitDecl;

// ============================================
// Type Table
// ============================================

/**
 * Declared named types and the methods attached to them by impl blocks.
 *
 * The table only grows: insertion rounds add declarations, nothing is ever
 * replaced, so snapshots taken by earlier evaluations stay valid.
 */
export class TypeTable {
  private readonly decls = new Map<string, TypeDecl>();
  private readonly methods = new Map<string, MethodSig[]>();
  private readonly traitImpls = new Map<string, string[]>();

  constructor() {
    for (const decl of BUILTIN_DECLS) {
      this.decls.set(decl.name, decl);
    }
  }

  define(decl: TypeDecl): void {
    const existing = this.decls.get(decl.name);
    if (existing) {
      throw resolveError(`Type '${decl.name}' is already defined`, decl.span).addNote(
        "previous definition here",
        existing.span
      );
    }
    this.decls.set(decl.name, decl);
  }

  lookup(name: string): TypeDecl | undefined {
    return this.decls.get(name);
  }

  has(name: string): boolean {
    return this.decls.has(name);
  }

  addMethod(typeName: string, sig: MethodSig, at: Span): void {
    const list = this.methods.get(typeName) ?? [];
    if (list.some((m) => m.name === sig.name)) {
      throw resolveError(`Method '${sig.name}' is already defined for '${typeName}'`, at);
    }
    list.push(sig);
    this.methods.set(typeName, list);
  }

  addTraitImpl(typeName: string, traitName: string): void {
    const list = this.traitImpls.get(typeName) ?? [];
    list.push(traitName);
    this.traitImpls.set(typeName, list);
  }

  methodsOf(typeName: string): MethodSig[] {
    const decl = this.decls.get(typeName);
    if (decl?.kind === "trait") return decl.methods;
    return this.methods.get(typeName) ?? [];
  }

  traitsOf(typeName: string): string[] {
    return this.traitImpls.get(typeName) ?? [];
  }

  names(): string[] {
    return [...this.decls.keys()];
  }
}

// ============================================
// Builtin declarations
// ============================================

const BUILTIN_SPAN = dummySpan();

const FIELD_INFO: StructDecl = {
  kind: "struct",
  name: "FieldInfo",
  typeParams: [],
  fields: [
    { name: "name", type: STR },
    { name: "ty", type: META },
    { name: "index", type: U64 },
    { name: "offset", type: U64 },
  ],
  span: BUILTIN_SPAN,
};

const METHOD_INFO: StructDecl = {
  kind: "struct",
  name: "MethodInfo",
  typeParams: [],
  fields: [
    { name: "name", type: STR },
    { name: "params", type: { kind: "slice", element: META } },
    { name: "ret", type: META },
  ],
  span: BUILTIN_SPAN,
};

const TYPE_INFO: StructDecl = {
  kind: "struct",
  name: "TypeInfo",
  typeParams: [],
  fields: [
    { name: "name", type: STR },
    { name: "size", type: U64 },
    { name: "align", type: U64 },
    { name: "fields", type: { kind: "slice", element: namedType("FieldInfo") } },
    { name: "methods", type: { kind: "slice", element: namedType("MethodInfo") } },
    { name: "is_struct", type: BOOL },
    { name: "is_enum", type: BOOL },
    { name: "is_trait", type: BOOL },
    { name: "is_generic", type: BOOL },
  ],
  span: BUILTIN_SPAN,
};

const IO_RESULT: EnumDecl = {
  kind: "enum",
  name: "IoResult",
  typeParams: [],
  variants: [
    { name: "Ok", fields: [STR] },
    { name: "Err", fields: [STR] },
  ],
  span: BUILTIN_SPAN,
};

const WRITE_RESULT: EnumDecl = {
  kind: "enum",
  name: "WriteResult",
  typeParams: [],
  variants: [
    { name: "Ok", fields: [U64] },
    { name: "Err", fields: [STR] },
  ],
  span: BUILTIN_SPAN,
};

const SHELL_RESULT: EnumDecl = {
  kind: "enum",
  name: "ShellResult",
  typeParams: [],
  variants: [
    { name: "Ok", fields: [I32, STR] },
    { name: "Err", fields: [STR] },
  ],
  span: BUILTIN_SPAN,
};

export const BUILTIN_DECLS: readonly TypeDecl[] = [
  FIELD_INFO,
  METHOD_INFO,
  TYPE_INFO,
  IO_RESULT,
  WRITE_RESULT,
  SHELL_RESULT,
];

/**
 * Types that only exist at compile time: handles, code, and anything
 * containing them.
 */
export function isComptimeOnlyType(type: Type, table: TypeTable, seen = new Set<string>()): boolean {
  switch (type.kind) {
    case "meta":
    case "code":
      return true;
    case "array":
    case "slice":
      return isComptimeOnlyType(type.element, table, seen);
    case "fn":
      return type.params.some((p) => isComptimeOnlyType(p, table, seen)) || isComptimeOnlyType(type.ret, table, seen);
    case "named": {
      if (seen.has(type.name)) return false;
      seen.add(type.name);
      if (type.args.some((a) => isComptimeOnlyType(a, table, seen))) return true;
      const decl = table.lookup(type.name);
      if (!decl) return false;
      if (decl.kind === "struct") return decl.fields.some((f) => isComptimeOnlyType(f.type, table, seen));
      if (decl.kind === "enum") {
        return decl.variants.some((v) => v.fields.some((f) => isComptimeOnlyType(f, table, seen)));
      }
      return false;
    }
    default:
      return false;
  }
}
