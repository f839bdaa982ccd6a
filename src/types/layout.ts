/**
 * Memory layout of Wisp types.
 *
 * C-like: every type has a natural alignment, struct fields are laid out in
 * declaration order with padding, and sizes are rounded up to the alignment.
 * Enums are an 8-byte tag followed by the largest variant payload.
 */

import { Span, CompileError } from "../diagnostics/errors";
import { formatType } from "./format";
import { Type, TypeTable, substitute } from "./types";

export type Layout = {
  size: number;
  align: number;
  fieldOffsets: number[]; // struct fields only
};

const POINTER: Layout = { size: 8, align: 8, fieldOffsets: [] };
const TAG_SIZE = 8;

export class LayoutCalculator {
  private readonly cache = new Map<string, Layout>();
  private readonly inProgress = new Set<string>();

  constructor(private readonly table: TypeTable) {}

  layoutOf(type: Type, at: Span): Layout {
    const key = formatType(type);
    const cached = this.cache.get(key);
    if (cached) return cached;
    const layout = this.compute(type, at);
    this.cache.set(key, layout);
    return layout;
  }

  private compute(type: Type, at: Span): Layout {
    switch (type.kind) {
      case "int": {
        const bytes = type.width / 8;
        return { size: bytes, align: bytes, fieldOffsets: [] };
      }
      case "float":
        return { size: type.width / 8, align: type.width / 8, fieldOffsets: [] };
      case "bool":
        return { size: 1, align: 1, fieldOffsets: [] };
      case "char":
        return { size: 4, align: 4, fieldOffsets: [] };
      case "unit":
      case "never":
        return { size: 0, align: 1, fieldOffsets: [] };
      case "str":
      case "fn":
      case "param":
      case "meta":
      case "code":
        return POINTER;
      case "slice":
        return { size: 16, align: 8, fieldOffsets: [] };
      case "array": {
        const element = this.layoutOf(type.element, at);
        return { size: element.size * type.length, align: element.align, fieldOffsets: [] };
      }
      case "named":
        return this.computeNamed(type, at);
    }
  }

  private computeNamed(type: Extract<Type, { kind: "named" }>, at: Span): Layout {
    const decl = this.table.lookup(type.name);
    if (!decl) {
      throw new CompileError("UnknownType", "comptime", `Unknown type '${formatType(type)}'`, at);
    }
    if (decl.kind === "trait") return POINTER;

    const key = formatType(type);
    if (this.inProgress.has(key)) {
      throw new CompileError(
        "ComptimeError",
        "comptime",
        `Type '${key}' has infinite size (it contains itself without indirection)`,
        at
      );
    }
    this.inProgress.add(key);
    try {
      const bindings = new Map<string, Type>();
      decl.typeParams.forEach((p, i) => {
        const arg = type.args[i];
        if (arg) bindings.set(p, arg);
      });

      if (decl.kind === "struct") {
        return this.record(decl.fields.map((f) => substitute(f.type, bindings)), at);
      }

      let payloadSize = 0;
      let payloadAlign = 1;
      for (const variant of decl.variants) {
        const payload = this.record(variant.fields.map((f) => substitute(f, bindings)), at);
        payloadSize = Math.max(payloadSize, payload.size);
        payloadAlign = Math.max(payloadAlign, payload.align);
      }
      const align = Math.max(TAG_SIZE, payloadAlign);
      const payloadOffset = alignTo(TAG_SIZE, payloadAlign);
      return { size: alignTo(payloadOffset + payloadSize, align), align, fieldOffsets: [] };
    } finally {
      this.inProgress.delete(key);
    }
  }

  private record(fields: Type[], at: Span): Layout {
    let offset = 0;
    let align = 1;
    const fieldOffsets: number[] = [];
    for (const field of fields) {
      const layout = this.layoutOf(field, at);
      offset = alignTo(offset, layout.align);
      fieldOffsets.push(offset);
      offset += layout.size;
      align = Math.max(align, layout.align);
    }
    return { size: alignTo(offset, align), align, fieldOffsets };
  }
}

export function alignTo(offset: number, align: number): number {
  return Math.ceil(offset / align) * align;
}
