/**
 * Tests for compile-time evaluation through the whole pipeline: call sites,
 * consts, reflection and the errors evaluation can raise.
 */

import { describe, it, expect } from "vitest";
import { CompileFailure, CompileResult, SessionConfig, compile, formatValue } from "../src/index";

async function build(text: string, config: Partial<SessionConfig> = {}): Promise<CompileResult> {
  return compile([{ file: "main.wisp", text }], config);
}

async function failure(text: string, config: Partial<SessionConfig> = {}): Promise<CompileFailure> {
  try {
    await build(text, config);
  } catch (e) {
    if (e instanceof CompileFailure) return e;
    throw e;
  }
  throw new Error("expected compilation to fail");
}

function siteValue(result: CompileResult, site: string): string {
  const value = result.siteValues.get(site);
  if (!value) throw new Error(`no value for ${site}`);
  return formatValue(value);
}

function constValue(result: CompileResult, name: string): string {
  const info = result.program.consts.get(name);
  if (!info) throw new Error(`no const '${name}'`);
  return siteValue(result, info.site);
}

const FACT = `
pub fn fact(n: u64) -> u64 {
    if n == 0 { 1 } else { n * fact(n - 1) }
}
`;

describe("Compile-time evaluation", () => {
  describe("call sites", () => {
    it("evaluates a recursive function", async () => {
      const result = await build(FACT + "const F: u64 = comptime fact(10);");
      expect(constValue(result, "F")).toBe("3628800u64");
      expect(result.siteValues.size).toBe(1);
    });

    it("evaluates loops over mutable locals", async () => {
      const result = await build(`
        pub fn fib(n: u64) -> u64 {
            let mut a: u64 = 0;
            let mut b: u64 = 1;
            let mut i: u64 = 0;
            while i < n {
                let t = a + b;
                a = b;
                b = t;
                i = i + 1;
            }
            a
        }
        const FIB: u64 = comptime fib(20);
      `);
      expect(constValue(result, "FIB")).toBe("6765u64");
    });

    it("evaluates arrays passed as arguments", async () => {
      const result = await build(`
        pub fn sum(xs: [i64; 4]) -> i64 {
            let mut total = 0;
            let mut i: u64 = 0;
            while i < 4 {
                total = total + xs[i];
                i = i + 1;
            }
            total
        }
        const S: i64 = comptime sum([1, 2, 3, 4]);
      `);
      expect(constValue(result, "S")).toBe("10i64");
    });

    it("evaluates structs, enums and matches", async () => {
      const result = await build(`
        struct Point { x: i64, y: i64 }
        enum Shape { Circle(i64), Rect(Point) }
        pub fn area(s: Shape) -> i64 {
            match s {
                Shape::Circle(r) => 3 * r * r,
                Shape::Rect(p) => p.x * p.y,
            }
        }
        pub fn total() -> i64 {
            area(Shape::Rect(Point { x: 3, y: 4 })) + area(Shape::Circle(2))
        }
        const AREA: i64 = comptime total();
      `);
      expect(constValue(result, "AREA")).toBe("24i64");
    });

    it("evaluates nested call sites first", async () => {
      const result = await build(FACT + "const N: u64 = comptime fact(comptime fact(3));");
      expect(constValue(result, "N")).toBe("720u64");
      expect(siteValue(result, "site#1")).toBe("6u64");
    });

    it("orders consts that read other consts", async () => {
      const result = await build(`
        pub fn sq(n: i64) -> i64 { n * n }
        const B: i64 = comptime sq(A);
        const A: i64 = comptime sq(3);
      `);
      expect(constValue(result, "A")).toBe("9i64");
      expect(constValue(result, "B")).toBe("81i64");
    });

    it("evaluates plain const initializers", async () => {
      const result = await build("const K: i64 = 6 * 7;");
      expect(constValue(result, "K")).toBe("42i64");
    });

    it("wraps fixed-width arithmetic", async () => {
      const result = await build(`
        pub fn wrap(x: u8) -> u8 { x + 200 }
        const W: u8 = comptime wrap(100);
      `);
      expect(constValue(result, "W")).toBe("44u8");
    });

    it("renders values with #to_string", async () => {
      const result = await build(`
        fn label(n: i64) -> str { "n=" + #to_string(n) }
        const L: str = comptime label(42);
      `);
      expect(constValue(result, "L")).toBe('"n=42"');
    });

    it("gives the same results with any number of workers", async () => {
      const text = `
        pub fn sq(n: i64) -> i64 { n * n }
        const A: i64 = comptime sq(2);
        const B: i64 = comptime sq(3);
        const C: i64 = comptime sq(4);
        fn main() -> i64 { A + B + C }
      `;
      const one = await build(text, { workers: 1 });
      const four = await build(text, { workers: 4 });
      expect(four.code).toBe(one.code);
      expect([...four.siteValues].map(([id, v]) => `${id}=${formatValue(v)}`)).toEqual(
        [...one.siteValues].map(([id, v]) => `${id}=${formatValue(v)}`)
      );
      expect(constValue(four, "C")).toBe("16i64");
    });

    it("walks through the session phases", async () => {
      const result = await build(FACT + "const F: u64 = comptime fact(3);");
      expect(result.phases).toEqual([
        "Parsed",
        "Resolved",
        "TypeChecked(1)",
        "ComptimeExecuting",
        "TypeChecked(final)",
        "MIRLowered",
        "CodeGenerated",
      ]);
    });

    it("can stop after type checking", async () => {
      const result = await compile([{ file: "main.wisp", text: FACT }], {}, { stopAfter: "typecheck" });
      expect(result.code).toBeUndefined();
      expect(result.phases[result.phases.length - 1]).toBe("TypeChecked(final)");
    });
  });

  describe("reflection", () => {
    const TYPES = `
      struct Point { x: i32, y: i32 }
      enum Shape { Dot, Circle(f64) }
    `;

    it("names types", async () => {
      const result = await build(TYPES + "fn name() -> str { #type_name(Point) } const NAME: str = comptime name();");
      expect(constValue(result, "NAME")).toBe('"Point"');
    });

    it("reports sizes and alignments", async () => {
      const result = await build(
        TYPES +
          `
          fn point_size() -> u64 { #size_of(Point) }
          fn shape_size() -> u64 { #size_of(Shape) }
          fn shape_align() -> u64 { #align_of(Shape) }
          const P: u64 = comptime point_size();
          const S: u64 = comptime shape_size();
          const A: u64 = comptime shape_align();
        `
      );
      expect(constValue(result, "P")).toBe("8u64");
      expect(constValue(result, "S")).toBe("16u64");
      expect(constValue(result, "A")).toBe("8u64");
    });

    it("describes fields", async () => {
      const result = await build(
        TYPES +
          `
          fn field_count() -> u64 { let info = #type_info(Point); #len(info.fields) }
          fn second() -> str { let info = #type_info(Point); info.fields[1].name }
          fn offset() -> u64 { let info = #type_info(Point); info.fields[1].offset }
          const COUNT: u64 = comptime field_count();
          const SECOND: str = comptime second();
          const OFFSET: u64 = comptime offset();
        `
      );
      expect(constValue(result, "COUNT")).toBe("2u64");
      expect(constValue(result, "SECOND")).toBe('"y"');
      expect(constValue(result, "OFFSET")).toBe("4u64");
    });

    it("reports unknown types", async () => {
      const error = await failure("fn f() -> u64 { #size_of(Ghost) } const X: u64 = comptime f();");
      expect(error.errors.map((e) => e.message)).toContain("Unknown type 'Ghost'");
    });
  });

  describe("failures", () => {
    it("reports panics", async () => {
      const error = await failure(`fn boom() -> i64 { #panic("no") } const X: i64 = comptime boom();`);
      expect(error.errors).toHaveLength(1);
      expect(error.errors[0].kind).toBe("ComptimeError");
      expect(error.errors[0].message).toBe("evaluation panicked: no");
    });

    it("reports failed assertions", async () => {
      const error = await failure(`fn check() { #assert(1 == 2, "math"); } comptime check();`);
      expect(error.errors[0].message).toBe("assertion failed: math");
    });

    it("stops endless loops at the step budget", async () => {
      const error = await failure("fn spin() -> i64 { loop { } } const X: i64 = comptime spin();", { maxSteps: 100 });
      expect(error.errors[0].kind).toBe("ComptimeBudgetExceeded");
      expect(error.errors[0].message).toBe("compile-time evaluation exceeded the step budget of 100");
      expect(error.errors[0].span).toEqual({ file: "main.wisp", from: 24, to: 27 });
    });

    it("stops long evaluations at the time budget", async () => {
      const error = await failure("fn spin() -> i64 { loop { } } const X: i64 = comptime spin();", {
        timeBudgetMs: 20,
        maxSteps: Number.MAX_SAFE_INTEGER,
      });
      expect(error.errors).toHaveLength(1);
      expect(error.errors[0].kind).toBe("ComptimeBudgetExceeded");
      expect(error.errors[0].message).toBe("compile-time evaluation exceeded the time budget of 20ms");
    });

    it("notes the call chain of a fault", async () => {
      const error = await failure(`
        fn div(a: i64, b: i64) -> i64 { a / b }
        fn outer() -> i64 { div(1, 0) }
        const X: i64 = comptime outer();
      `);
      expect(error.errors[0].message).toBe("attempt to divide by zero");
      expect(error.errors[0].notes.map((n) => n.message)).toEqual(["in 'div', called from 'outer'"]);
    });

    it("collects errors from independent call sites", async () => {
      const error = await failure(`
        fn fail(msg: str) -> i64 { #panic(msg) }
        const A: i64 = comptime fail("first");
        const B: i64 = comptime fail("second");
      `);
      expect(error.errors.map((e) => e.message)).toEqual(["evaluation panicked: first", "evaluation panicked: second"]);
    });

    it("rejects a value that depends on itself", async () => {
      const error = await failure(`
        fn get() -> i64 { B }
        const B: i64 = comptime get();
      `);
      expect(error.errors).toHaveLength(1);
      expect(error.errors[0].kind).toBe("ComptimeError");
      expect(error.errors[0].message).toBe("compile-time value depends on its own result");
    });
  });

  describe("eligibility", () => {
    it("rejects runtime calls of compile-time-only functions", async () => {
      const error = await failure(`
        fn name_of() -> str { #type_name(i64) }
        fn main() -> str { name_of() }
      `);
      expect(error.errors).toHaveLength(1);
      const [first] = error.errors;
      expect(first.kind).toBe("ComptimeRequired");
      expect(first.message).toBe("call to compile-time-only function 'name_of' from runtime code in 'main'");
      expect(first.notes.map((n) => n.message)).toEqual([
        "'name_of' uses '#type_name' here",
        "mark the call 'comptime' to evaluate it at compile time",
      ]);
    });

    it("names the path to the intrinsic", async () => {
      const error = await failure(`
        fn a() -> u64 { #size_of(i64) }
        fn b() -> u64 { a() }
        fn main() -> u64 { b() }
      `);
      expect(error.errors[0].message).toBe("call to compile-time-only function 'b' from runtime code in 'main'");
      expect(error.errors[0].notes.map((n) => n.message)).toEqual([
        "'a' uses '#size_of' here",
        "through b -> a",
        "mark the call 'comptime' to evaluate it at compile time",
      ]);
    });

    it("accepts the call when marked comptime", async () => {
      const result = await build(`
        fn name_of() -> str { #type_name(i64) }
        fn main() -> str { comptime name_of() }
      `);
      expect(siteValue(result, "site#0")).toBe('"i64"');
    });

    it("does not treat compile-time-only pub functions as runtime roots", async () => {
      const result = await build(`pub fn describe() -> str { #type_name(bool) }`);
      expect(result.code).toBeDefined();
    });
  });
});
