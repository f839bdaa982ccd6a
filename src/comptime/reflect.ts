/**
 * Reflection Provider - answers `#type_info`, `#size_of`, `#align_of` and
 * `#type_name` from the Type Table.
 *
 * TypeInfo values are built on first request, frozen, and shared by every
 * evaluation in the session.
 */

import { Span, CompileError } from "../diagnostics/errors";
import { formatType } from "../types/format";
import { Layout, LayoutCalculator } from "../types/layout";
import { Type, TypeTable, namedType, substitute } from "../types/types";
import { contentHash } from "./serialize";
import {
  ComptimeValue,
  arrayValue,
  boolValue,
  intValue,
  strValue,
  structValue,
  typeValue,
} from "./value";

const TYPE_INFO = namedType("TypeInfo");
const FIELD_INFO = namedType("FieldInfo");
const METHOD_INFO = namedType("MethodInfo");

export class ReflectionProvider {
  private readonly layouts: LayoutCalculator;
  private readonly infos = new Map<string, ComptimeValue>();

  constructor(private readonly types: TypeTable) {
    this.layouts = new LayoutCalculator(types);
  }

  typeName(type: Type, at: Span): string {
    this.checkKnown(type, at);
    return formatType(type);
  }

  sizeOf(type: Type, at: Span): bigint {
    return BigInt(this.layout(type, at).size);
  }

  alignOf(type: Type, at: Span): bigint {
    return BigInt(this.layout(type, at).align);
  }

  typeInfo(type: Type, at: Span): ComptimeValue {
    // Impl blocks inserted later add methods, so the method count is part
    // of the key.
    const methods = type.kind === "named" ? this.types.methodsOf(type.name) : [];
    const key = `${formatType(type)}#${methods.length}`;
    const cached = this.infos.get(key);
    if (cached) return cached;
    const info = this.buildInfo(type, at);
    this.infos.set(key, info);
    return info;
  }

  private layout(type: Type, at: Span): Layout {
    this.checkKnown(type, at);
    return this.layouts.layoutOf(type, at);
  }

  private checkKnown(type: Type, at: Span): void {
    if (type.kind === "named" && !this.types.has(type.name)) {
      throw new CompileError("UnknownType", "comptime", `Unknown type '${formatType(type)}'`, at);
    }
  }

  private buildInfo(type: Type, at: Span): ComptimeValue {
    const layout = this.layout(type, at);
    const decl = type.kind === "named" ? this.types.lookup(type.name) : undefined;

    let fields: ComptimeValue[] = [];
    let methods: ComptimeValue[] = [];
    if (type.kind === "named" && decl) {
      if (decl.kind === "struct") {
        const bindings = new Map<string, Type>();
        decl.typeParams.forEach((p, i) => {
          const arg = type.args[i];
          if (arg) bindings.set(p, arg);
        });
        fields = decl.fields.map((field, index) =>
          structValue(FIELD_INFO, [
            { name: "name", value: strValue(field.name) },
            { name: "ty", value: typeValue(substitute(field.type, bindings)) },
            { name: "index", value: intValue(BigInt(index), 64, false) },
            { name: "offset", value: intValue(BigInt(layout.fieldOffsets[index] ?? 0), 64, false) },
          ])
        );
      }
      methods = this.types.methodsOf(type.name).map((method) =>
        structValue(METHOD_INFO, [
          { name: "name", value: strValue(method.name) },
          { name: "params", value: arrayValue(method.params.map(typeValue)) },
          { name: "ret", value: typeValue(method.ret) },
        ])
      );
    }

    const generic = decl !== undefined && decl.kind !== "trait" && decl.typeParams.length > 0;
    return structValue(TYPE_INFO, [
      { name: "name", value: strValue(formatType(type)) },
      { name: "size", value: intValue(BigInt(layout.size), 64, false) },
      { name: "align", value: intValue(BigInt(layout.align), 64, false) },
      { name: "fields", value: arrayValue(fields) },
      { name: "methods", value: arrayValue(methods) },
      { name: "is_struct", value: boolValue(decl?.kind === "struct") },
      { name: "is_enum", value: boolValue(decl?.kind === "enum") },
      { name: "is_trait", value: boolValue(decl?.kind === "trait") },
      { name: "is_generic", value: boolValue(generic && type.kind === "named" && type.args.length === 0) },
    ]);
  }
}

/**
 * Hash of everything reflection can observe: declarations and the methods
 * attached to them. Part of the cache identity of reflecting functions.
 */
export function typeTableFingerprint(types: TypeTable): string {
  const lines = types
    .names()
    .sort()
    .map((name) => {
      const decl = types.lookup(name);
      const methods = types
        .methodsOf(name)
        .map((m) => `${m.name}(${m.hasSelf ? "self," : ""}${m.params.map(formatType).join(",")})->${formatType(m.ret)}`);
      switch (decl?.kind) {
        case "struct":
          return `struct ${name}<${decl.typeParams.join(",")}>{${decl.fields.map((f) => `${f.name}:${formatType(f.type)}`).join(",")}} ${methods.join(";")}`;
        case "enum":
          return `enum ${name}<${decl.typeParams.join(",")}>{${decl.variants.map((v) => `${v.name}(${v.fields.map(formatType).join(",")})`).join(",")}} ${methods.join(";")}`;
        case "trait":
        case undefined:
          return `trait ${name} ${methods.join(";")}`;
      }
    });
  return contentHash(lines.join("\n"));
}
