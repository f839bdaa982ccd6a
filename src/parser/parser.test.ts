/**
 * Tests for the Wisp tokenizer and recursive descent parser.
 */

import { describe, test, expect } from "vitest";
import { Expr, Item } from "../ast/ast";
import { CompileError } from "../diagnostics/errors";
import { Lexer } from "./lexer";
import { parseExpression, parseSource } from "./parser";

function expr(source: string): Expr {
  return parseExpression(source, "test.wisp");
}

function items(source: string): Item[] {
  return parseSource(source, "test.wisp");
}

function parseFailure(source: string): CompileError {
  try {
    items(source);
  } catch (e) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  throw new Error("expected a parse error");
}

describe("Lexer", () => {
  test("splits longest punctuation first", () => {
    const tokens = new Lexer("x >> 2 <= y", "t").tokenize();
    expect(tokens.map((t) => t.type)).toEqual(["identifier", ">>", "int", "<=", "identifier", "eof"]);
  });

  test("keeps literal suffixes on numbers", () => {
    const tokens = new Lexer("5u8 1.5f32 2f64", "t").tokenize();
    expect(tokens.map((t) => [t.type, t.value])).toEqual([
      ["int", "5u8"],
      ["float", "1.5f32"],
      ["float", "2f64"],
      ["eof", ""],
    ]);
  });

  test("decodes escapes in strings and chars", () => {
    const tokens = new Lexer(`"a\\tb\\u{41}" '\\n'`, "t").tokenize();
    expect(tokens[0].value).toBe("a\tbA");
    expect(tokens[1].value).toBe("\n");
  });

  test("skips line and block comments", () => {
    const tokens = new Lexer("a // one\n/* two */ b", "t").tokenize();
    expect(tokens.map((t) => t.value)).toEqual(["a", "b", ""]);
  });

  test("reports unterminated block comments", () => {
    expect(() => new Lexer("a /* open", "t").tokenize()).toThrow("Unterminated block comment");
  });
});

describe("Parser", () => {
  describe("literals", () => {
    test("parses integer literals with and without suffix", () => {
      expect(expr("42")).toMatchObject({ kind: "int", value: 42n, suffix: undefined });
      expect(expr("5u8")).toMatchObject({ kind: "int", value: 5n, suffix: "u8" });
      expect(expr("1_000")).toMatchObject({ kind: "int", value: 1000n });
      expect(expr("0xff")).toMatchObject({ kind: "int", value: 255n, suffix: undefined });
    });

    test("parses float literals", () => {
      expect(expr("3.25")).toMatchObject({ kind: "float", value: 3.25 });
      expect(expr("1.5f32")).toMatchObject({ kind: "float", value: 1.5, suffix: "f32" });
    });

    test("parses chars, strings, bools and unit", () => {
      expect(expr("'a'")).toMatchObject({ kind: "char", value: 97 });
      expect(expr('"hi"')).toMatchObject({ kind: "string", value: "hi" });
      expect(expr("true")).toMatchObject({ kind: "bool", value: true });
      expect(expr("()")).toMatchObject({ kind: "unit" });
    });
  });

  describe("operators", () => {
    test("multiplication binds tighter than addition", () => {
      expect(expr("1 + 2 * 3")).toMatchObject({
        kind: "binary",
        op: "+",
        left: { kind: "int", value: 1n },
        right: { kind: "binary", op: "*" },
      });
    });

    test("casts bind tighter than binary operators", () => {
      expect(expr("x + y as i32")).toMatchObject({
        kind: "binary",
        op: "+",
        right: { kind: "cast", expr: { kind: "path", segments: ["y"] }, type: { kind: "named", name: "i32" } },
      });
    });

    test("assignment is right associative", () => {
      expect(expr("a = b = 1")).toMatchObject({
        kind: "assign",
        target: { kind: "path", segments: ["a"] },
        value: { kind: "assign", target: { kind: "path", segments: ["b"] } },
      });
    });

    test("unary minus applies to the operand", () => {
      expect(expr("-x * 2")).toMatchObject({ kind: "binary", op: "*", left: { kind: "unary", op: "-" } });
    });
  });

  describe("expressions", () => {
    test("a brace after an if condition starts the body", () => {
      expect(expr("if p { 1 } else { 2 }")).toMatchObject({
        kind: "if",
        cond: { kind: "path", segments: ["p"] },
        then: { tail: { kind: "int", value: 1n } },
        else: { kind: "block" },
      });
    });

    test("parses struct literals outside conditions", () => {
      expect(expr("Point { x: 1, y: 2 }")).toMatchObject({
        kind: "struct",
        name: "Point",
        fields: [{ name: "x" }, { name: "y" }],
      });
    });

    test("parses calls, methods, fields and indexing", () => {
      expect(expr("f(1)(2)")).toMatchObject({ kind: "call", callee: { kind: "call" }, comptime: false });
      expect(expr("p.len()")).toMatchObject({ kind: "method", name: "len", args: [] });
      expect(expr("p.x")).toMatchObject({ kind: "field", name: "x" });
      expect(expr("xs[0]")).toMatchObject({ kind: "index", index: { kind: "int", value: 0n } });
    });

    test("parses comptime calls and intrinsics", () => {
      expect(expr("comptime fib(10)")).toMatchObject({
        kind: "call",
        comptime: true,
        callee: { kind: "path", segments: ["fib"] },
      });
      expect(expr("#size_of(i64)")).toMatchObject({
        kind: "intrinsic",
        name: "size_of",
        args: [{ kind: "path", segments: ["i64"] }],
      });
    });

    test("parses match arms with variant, binding and wildcard patterns", () => {
      const match = expr("match v { E::A => 1, E::B(x) => x, n => n, _ => 0 }");
      expect(match).toMatchObject({
        kind: "match",
        arms: [
          { pattern: { kind: "variant", path: ["E", "A"], fields: [] } },
          { pattern: { kind: "variant", path: ["E", "B"], fields: [{ kind: "binding", name: "x" }] } },
          { pattern: { kind: "binding", name: "n" } },
          { pattern: { kind: "wildcard" } },
        ],
      });
    });

    test("parses negative literal patterns", () => {
      const match = expr("match n { -1 => true, _ => false }");
      expect(match).toMatchObject({
        arms: [{ pattern: { kind: "literal", value: { kind: "unary", op: "-" } } }, { pattern: { kind: "wildcard" } }],
      });
    });

    test("block-like statements need no semicolon", () => {
      const [fn] = items("fn f() { while true { break; } let x = 1; }");
      expect(fn).toMatchObject({
        kind: "fn",
        body: { stmts: [{ kind: "expr", expr: { kind: "while" } }, { kind: "let", name: "x" }], tail: undefined },
      });
    });
  });

  describe("items", () => {
    test("parses functions with spans", () => {
      const [fn] = items("pub fn add(a: i64, b: i64) -> i64 { a + b }");
      expect(fn).toMatchObject({
        kind: "fn",
        name: "add",
        pub: true,
        hasSelf: false,
        params: [{ name: "a" }, { name: "b" }],
        ret: { kind: "named", name: "i64" },
        nameSpan: { file: "test.wisp", from: 7, to: 10 },
      });
    });

    test("parses structs, generic enums and nested type arguments", () => {
      const parsed = items("struct W { v: Box<Box<i64>> } enum Opt<T> { None, Some(T) }");
      expect(parsed[0]).toMatchObject({
        kind: "struct",
        fields: [{ name: "v", type: { name: "Box", args: [{ name: "Box", args: [{ name: "i64" }] }] } }],
      });
      expect(parsed[1]).toMatchObject({
        kind: "enum",
        name: "Opt",
        typeParams: ["T"],
        variants: [
          { name: "None", fields: [] },
          { name: "Some", fields: [{ kind: "named", name: "T" }] },
        ],
      });
    });

    test("parses traits and trait impls", () => {
      const parsed = items(`
        trait Shape { fn area(self) -> f64; }
        impl Shape for Square { fn area(self) -> f64 { self.side * self.side } }
      `);
      expect(parsed[0]).toMatchObject({ kind: "trait", name: "Shape", methods: [{ name: "area", hasSelf: true }] });
      expect(parsed[1]).toMatchObject({ kind: "impl", trait: "Shape", target: "Square", methods: [{ name: "area" }] });
    });

    test("parses consts and comptime items", () => {
      const parsed = items("const N: u64 = comptime count(3); comptime gen();");
      expect(parsed[0]).toMatchObject({
        kind: "const",
        name: "N",
        type: { name: "u64" },
        value: { kind: "call", comptime: true },
      });
      expect(parsed[1]).toMatchObject({ kind: "comptime", call: { kind: "call", comptime: true } });
    });

    test("parses array and slice types", () => {
      const [fn] = items("fn f(a: [u8; 4], b: [str]) {}");
      expect(fn).toMatchObject({
        params: [
          { type: { kind: "array", length: 4, element: { name: "u8" } } },
          { type: { kind: "slice", element: { name: "str" } } },
        ],
      });
    });
  });

  describe("errors", () => {
    test("reports the unexpected token with its span", () => {
      const error = parseFailure("fn f( {");
      expect(error.kind).toBe("ParseError");
      expect(error.message).toBe("Expected parameter name, found '{'");
      expect(error.span).toEqual({ file: "test.wisp", from: 6, to: 7 });
    });

    test("comptime must be followed by a call", () => {
      expect(parseFailure("comptime 5;").message).toBe("'comptime' must be followed by a function call");
    });

    test("reports a missing item", () => {
      expect(parseFailure("let x = 1;").message).toBe(
        "Expected an item (fn, struct, enum, trait, impl, const or comptime), found 'let'"
      );
    });

    test("reports end of input", () => {
      expect(parseFailure("fn f() {").message).toBe("Expected an expression, found end of input");
    });
  });
});
