/**
 * Tests for code insertion: generated items join the program, failures in
 * generated code point back at the call site that produced it.
 */

import { describe, it, expect } from "vitest";
import {
  CompileFailure,
  CompileResult,
  ComptimeCache,
  SessionConfig,
  callFunction,
  compile,
  formatDiagnostic,
  loadModule,
  runtime,
} from "../src/index";

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

describe("Code insertion", () => {
  it("adds generated functions that runtime code can call", async () => {
    const result = await build(`
fn gen() { #insert("pub fn answer() -> i64 { 42 }"); }
comptime gen();
fn main() -> i64 { answer() }
`);
    expect(result.insertedFiles).toEqual(["<insert 1.0>"]);
    expect(result.phases).toEqual([
      "Parsed",
      "Resolved",
      "TypeChecked(1)",
      "ComptimeExecuting",
      "Reinjecting",
      "TypeChecked(2)",
      "ComptimeExecuting",
      "TypeChecked(final)",
      "MIRLowered",
      "CodeGenerated",
    ]);
    const module = loadModule(result.code ?? "");
    expect(callFunction(module, "main", [])).toBe(42n);
    expect(module.functions.has("gen")).toBe(false);
  });

  it("adds code to the scope of the function whose call site inserted it", async () => {
    const result = await build(`
fn gen() { #insert("fn helper() -> i64 { 9 }"); }
fn main() -> i64 { comptime gen(); helper() }
`);
    expect(result.insertedFiles).toEqual(["<insert 1.0>"]);
    expect(result.program.functions.has("main::helper")).toBe(true);
    const module = loadModule(result.code ?? "");
    expect(callFunction(module, "main", [])).toBe(9n);
  });

  it("keeps code inserted into a function out of the module scope", async () => {
    const error = await failure(`
fn gen() { #insert("fn helper() -> i64 { 9 }"); }
fn main() -> i64 { comptime gen(); helper() }
fn other() -> i64 { helper() }
`);
    expect(error.errors.map((e) => e.message)).toEqual(["Unknown name 'helper'"]);
  });

  it("runs call sites found in inserted code", async () => {
    const result = await build(`
fn inner() { #insert("pub fn deep() -> i64 { 5 }"); }
fn outer() { #insert("comptime inner();"); }
comptime outer();
fn main() -> i64 { deep() }
`);
    expect(result.insertedFiles).toEqual(["<insert 1.0>", "<insert 2.0>"]);
    expect(result.sources.origin("<insert 2.0>")?.file).toBe("<insert 1.0>");
    expect(result.phases).toEqual([
      "Parsed",
      "Resolved",
      "TypeChecked(1)",
      "ComptimeExecuting",
      "Reinjecting",
      "TypeChecked(2)",
      "ComptimeExecuting",
      "Reinjecting",
      "TypeChecked(3)",
      "ComptimeExecuting",
      "TypeChecked(final)",
      "MIRLowered",
      "CodeGenerated",
    ]);
    const module = loadModule(result.code ?? "");
    expect(callFunction(module, "main", [])).toBe(5n);
  });

  it("inserts the same code with any number of workers", async () => {
    const text = `
fn gen_a() { #insert("pub fn a() -> i64 { 1 }"); }
fn gen_b() { #insert("pub fn b() -> i64 { 2 }"); }
fn gen_c() { #insert("pub fn c() -> i64 { 3 }"); }
comptime gen_a();
comptime gen_b();
comptime gen_c();
fn main() -> i64 { a() + b() + c() }
`;
    const one = await build(text, { workers: 1 });
    const four = await build(text, { workers: 4 });
    expect(four.code).toBe(one.code);
    expect(four.insertedFiles).toEqual(["<insert 1.0>", "<insert 1.1>", "<insert 1.2>"]);
    expect(four.sources.text("<insert 1.1>")).toBe("pub fn b() -> i64 { 2 }");
    expect(callFunction(loadModule(four.code ?? ""), "main", [])).toBe(6n);
  });

  it("keeps the text of inserted files", async () => {
    const result = await build(`fn gen() { #insert(#code("pub fn seven() -> i64 { 7 }")); }\ncomptime gen();`);
    expect(result.sources.text("<insert 1.0>")).toBe("pub fn seven() -> i64 { 7 }");
    expect(result.sources.origin("<insert 1.0>")?.file).toBe("main.wisp");
  });

  it("generates code from reflection", async () => {
    const result = await build(`
struct Point { x: i64, y: i64 }

fn derive_sum() {
    let info = #type_info(Point);
    let mut code = "pub fn point_sum(p: Point) -> i64 { 0";
    let mut i: u64 = 0;
    while i < #len(info.fields) {
        code = code + " + p." + info.fields[i].name;
        i = i + 1;
    }
    #insert(code + " }");
}

comptime derive_sum();
`);
    expect(result.sources.text("<insert 1.0>")).toBe("pub fn point_sum(p: Point) -> i64 { 0 + p.x + p.y }");
    const module = loadModule(result.code ?? "");
    expect(callFunction(module, "point_sum", [runtime.struct("Point", ["x", "y"], [3n, 4n])])).toBe(7n);
  });

  describe("failures", () => {
    it("reports generated code that does not parse", async () => {
      const error = await failure(`fn gen() { #insert("fn broken( {"); }\ncomptime gen();`);
      expect(error.errors).toHaveLength(1);
      const [first] = error.errors;
      expect(first.kind).toBe("InsertionParseError");
      expect(first.message).toBe("generated code does not parse: Expected parameter name, found '{'");
      expect(first.span.file).toBe("<insert 1.0>");
      expect(first.notes.map((n) => n.message)).toEqual(["code produced by this #insert"]);
      expect(first.generatedFrom.map((s) => s.file)).toEqual(["main.wisp"]);
    });

    it("maps errors in generated code to the inserting call site", async () => {
      const error = await failure(`fn gen() { #insert("fn broken() -> i64 { true }"); }\ncomptime gen();`);
      expect(error.errors).toHaveLength(1);
      expect(formatDiagnostic(error.errors[0], error.sources)).toBe(
        [
          "<insert 1.0>:1:22: TypeError: Mismatched types: expected 'i64', found 'bool'",
          "  = in code inserted at main.wisp:2:1",
        ].join("\n")
      );
    });

    it("stops insertion that never settles", async () => {
      const text = `fn gen() { #insert("comptime gen();"); }\ncomptime gen();`;
      let caught: unknown;
      const cache = new ComptimeCache();
      try {
        await compile([{ file: "main.wisp", text }], { maxInsertionPasses: 3 }, { cache });
      } catch (e) {
        caught = e;
      }
      expect(caught).toBeInstanceOf(CompileFailure);
      if (!(caught instanceof CompileFailure)) return;
      const [first] = caught.errors;
      expect(first.kind).toBe("InsertionDivergence");
      expect(first.message).toBe("code insertion did not reach a fixpoint within 3 passes");
      expect(first.span.file).toBe("<insert 3.0>");
      expect(first.generatedFrom.map((s) => s.file)).toEqual(["<insert 2.0>", "<insert 1.0>", "main.wisp"]);
      expect(first.notes[first.notes.length - 1].message).toBe("1 insertion(s) still pending");
      expect(cache.stats).toEqual({ hits: 3, misses: 1, stale: 0, stores: 1 });
    });
  });
});
