/**
 * Tests for type layout: sizes, alignments and field offsets.
 */

import { describe, test, expect } from "vitest";
import { CompileError, dummySpan } from "../diagnostics/errors";
import { LayoutCalculator, alignTo } from "./layout";
import { BOOL, CHAR, I64, STR, Type, TypeTable, UNIT, intType, namedType } from "./types";

const at = dummySpan("test.wisp");

function tableWith(...decls: Parameters<TypeTable["define"]>[0][]): TypeTable {
  const table = new TypeTable();
  for (const decl of decls) table.define(decl);
  return table;
}

function layout(table: TypeTable, type: Type) {
  return new LayoutCalculator(table).layoutOf(type, at);
}

describe("LayoutCalculator", () => {
  describe("primitives", () => {
    const table = new TypeTable();

    test("integers are as wide as their bits", () => {
      expect(layout(table, intType(8, false))).toMatchObject({ size: 1, align: 1 });
      expect(layout(table, intType(32, true))).toMatchObject({ size: 4, align: 4 });
      expect(layout(table, I64)).toMatchObject({ size: 8, align: 8 });
    });

    test("scalars and handles", () => {
      expect(layout(table, BOOL)).toMatchObject({ size: 1, align: 1 });
      expect(layout(table, CHAR)).toMatchObject({ size: 4, align: 4 });
      expect(layout(table, UNIT)).toMatchObject({ size: 0, align: 1 });
      expect(layout(table, STR)).toMatchObject({ size: 8, align: 8 });
      expect(layout(table, { kind: "slice", element: I64 })).toMatchObject({ size: 16, align: 8 });
    });

    test("arrays repeat their element", () => {
      expect(layout(table, { kind: "array", element: intType(16, false), length: 5 })).toMatchObject({
        size: 10,
        align: 2,
      });
    });
  });

  describe("structs", () => {
    test("fields are padded to their alignment", () => {
      const table = tableWith({
        kind: "struct",
        name: "Mixed",
        typeParams: [],
        fields: [
          { name: "flag", type: BOOL },
          { name: "count", type: I64 },
          { name: "code", type: CHAR },
        ],
        span: at,
      });
      expect(layout(table, namedType("Mixed"))).toEqual({ size: 24, align: 8, fieldOffsets: [0, 8, 16] });
    });

    test("an empty struct has size zero", () => {
      const table = tableWith({ kind: "struct", name: "Empty", typeParams: [], fields: [], span: at });
      expect(layout(table, namedType("Empty"))).toEqual({ size: 0, align: 1, fieldOffsets: [] });
    });

    test("generic fields are substituted", () => {
      const table = tableWith({
        kind: "struct",
        name: "Pair",
        typeParams: ["T"],
        fields: [
          { name: "a", type: { kind: "param", name: "T" } },
          { name: "b", type: intType(8, false) },
        ],
        span: at,
      });
      expect(layout(table, namedType("Pair", [intType(32, false)]))).toEqual({
        size: 8,
        align: 4,
        fieldOffsets: [0, 4],
      });
    });
  });

  describe("enums", () => {
    test("a tag followed by the largest payload", () => {
      const table = tableWith({
        kind: "enum",
        name: "Shape",
        typeParams: [],
        variants: [
          { name: "Dot", fields: [] },
          { name: "Circle", fields: [I64] },
          { name: "Rect", fields: [I64, I64] },
        ],
        span: at,
      });
      expect(layout(table, namedType("Shape"))).toMatchObject({ size: 24, align: 8 });
    });

    test("small payloads are rounded up to the tag alignment", () => {
      const table = tableWith({
        kind: "enum",
        name: "Small",
        typeParams: [],
        variants: [{ name: "Byte", fields: [intType(8, false)] }],
        span: at,
      });
      expect(layout(table, namedType("Small"))).toMatchObject({ size: 16, align: 8 });
    });
  });

  describe("errors", () => {
    test("unknown types", () => {
      expect(() => layout(new TypeTable(), namedType("Ghost"))).toThrow("Unknown type 'Ghost'");
    });

    test("types that contain themselves", () => {
      const table = tableWith({
        kind: "struct",
        name: "Node",
        typeParams: [],
        fields: [{ name: "next", type: namedType("Node") }],
        span: at,
      });
      let error: unknown;
      try {
        layout(table, namedType("Node"));
      } catch (e) {
        error = e;
      }
      expect(error).toBeInstanceOf(CompileError);
      expect(error).toMatchObject({
        kind: "ComptimeError",
        message: "Type 'Node' has infinite size (it contains itself without indirection)",
      });
    });

    test("a slice of itself is fine", () => {
      const table = tableWith({
        kind: "struct",
        name: "Tree",
        typeParams: [],
        fields: [
          { name: "value", type: I64 },
          { name: "children", type: { kind: "slice", element: namedType("Tree") } },
        ],
        span: at,
      });
      expect(layout(table, namedType("Tree"))).toEqual({ size: 24, align: 8, fieldOffsets: [0, 8] });
    });
  });
});

describe("alignTo", () => {
  test("rounds up to a multiple", () => {
    expect(alignTo(0, 8)).toBe(0);
    expect(alignTo(9, 8)).toBe(16);
    expect(alignTo(4, 4)).toBe(4);
  });
});
