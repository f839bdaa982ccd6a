/**
 * Interpreter tests over hand-built MIR.
 *
 * Most interpreter behavior is covered through `compile` in test/; these
 * tests reach states the type checker never lets through, like a match
 * that falls off its arms.
 */

import { describe, test, expect } from "vitest";
import { Span, span } from "../diagnostics/errors";
import { BasicBlock, MirFunction, Operand, Place, Rvalue, Terminator, copy, place } from "../mir/mir";
import { BOOL, I64, STR, Type, TypeTable, U64, UNIT } from "../types/types";
import { CapabilityContext, Mode } from "./capability";
import { HostOperations, HostResult, ShellOutput } from "./host";
import { Budget, EvaluationOutcome, Interpreter } from "./interpreter";
import { ReflectionProvider } from "./reflect";
import { ComptimeValue, UNIT_VALUE, arrayValue, closureValue, formatValue, intValue, strValue } from "./value";

const at: Span = span("test.wisp", 10, 20);

class StubHost implements HostOperations {
  readonly files = new Map<string, string>([["notes.txt", "hello"]]);
  readonly written: string[] = [];

  readFile(file: string): HostResult<string> {
    const text = this.files.get(file);
    return text === undefined ? { ok: false, error: "not found" } : { ok: true, value: text };
  }

  writeFile(file: string, text: string): HostResult<number> {
    this.written.push(file);
    return { ok: true, value: text.length };
  }

  httpGet(): HostResult<string> {
    return { ok: false, error: "offline" };
  }

  shell(): HostResult<ShellOutput> {
    return { ok: true, value: { status: 0, output: "ran" } };
  }
}

// ============================================
// MIR builders
// ============================================

type FnDef = {
  id: string;
  params?: Type[];
  ret?: Type;
  /** Locals after the parameters, by name. */
  locals?: [string, Type][];
  blocks: [Statement[], Terminator][];
};

type Statement = [Place, Rvalue];

function mirFunction(def: FnDef): MirFunction {
  const params = def.params ?? [];
  const locals = [
    { id: 0, name: "_0", type: def.ret ?? I64 },
    ...params.map((type, i) => ({ id: i + 1, name: `p${i + 1}`, type })),
    ...(def.locals ?? []).map(([name, type], i) => ({ id: params.length + 1 + i, name, type })),
  ];
  const blocks: BasicBlock[] = def.blocks.map(([statements, terminator], id) => ({
    id,
    statements: statements.map(([p, rvalue]) => ({ kind: "assign" as const, place: p, rvalue, span: at })),
    terminator,
  }));
  return {
    id: def.id,
    name: def.id,
    kind: "fn",
    pub: false,
    params: params.map((_, i) => i + 1),
    returnType: def.ret ?? I64,
    locals,
    blocks,
    scope: { kind: "module" },
    span: at,
  };
}

function konst(value: ComptimeValue): Operand {
  return { kind: "const", value };
}

function use(operand: Operand): Rvalue {
  return { kind: "use", operand };
}

const RETURN: Terminator = { kind: "return", span: at };

function evaluate(
  functions: MirFunction[],
  fnId: string,
  args: ComptimeValue[] = [],
  options: { budget?: Budget; mode?: Mode; host?: HostOperations } = {}
): EvaluationOutcome {
  const types = new TypeTable();
  const interpreter = new Interpreter({
    functions: new Map(functions.map((fn) => [fn.id, fn])),
    reflection: new ReflectionProvider(types),
    capabilities: CapabilityContext.forMode(options.mode ?? "build"),
    host: options.host ?? new StubHost(),
    siteValue: () => intValue(0n),
    constValue: () => intValue(0n),
  });
  return interpreter.evaluate(fnId, args, { id: "site#0", span: at, scope: { kind: "module" } }, options.budget ?? {
    maxSteps: 100_000,
  });
}

function value(outcome: EvaluationOutcome): string {
  if (!outcome.result.ok) throw outcome.result.error;
  return formatValue(outcome.result.value);
}

function failure(outcome: EvaluationOutcome) {
  if (outcome.result.ok) throw new Error(`expected a failure, got ${formatValue(outcome.result.value)}`);
  return outcome.result.error;
}

// ============================================
// Tests
// ============================================

describe("Interpreter", () => {
  describe("execution", () => {
    test("returns the value of local 0 and counts steps", () => {
      const five = mirFunction({ id: "five", blocks: [[[[place(0), use(konst(intValue(5n)))]], RETURN]] });
      const outcome = evaluate([five], "five");
      expect(value(outcome)).toBe("5i64");
      expect(outcome.steps).toBe(2);
    });

    test("recursion runs on its own stack", () => {
      // countdown(n) = if n == 0 { 0 } else { countdown(n - 1) + 1 }
      const countdown = mirFunction({
        id: "countdown",
        params: [I64],
        locals: [
          ["is_zero", BOOL],
          ["next", I64],
          ["rest", I64],
        ],
        blocks: [
          [
            [[place(2), { kind: "binary", op: "eq", left: copy(place(1)), right: konst(intValue(0n)), type: BOOL }]],
            { kind: "switch", discr: copy(place(2)), cases: [{ value: 1n, target: 1 }], otherwise: 2, span: at },
          ],
          [[[place(0), use(konst(intValue(0n)))]], RETURN],
          [
            [[place(3), { kind: "binary", op: "sub", left: copy(place(1)), right: konst(intValue(1n)), type: I64 }]],
            {
              kind: "call",
              callee: konst(closureValue("countdown")),
              args: [copy(place(3))],
              destination: place(4),
              target: 3,
              comptime: false,
              span: at,
            },
          ],
          [[[place(0), { kind: "binary", op: "add", left: copy(place(4)), right: konst(intValue(1n)), type: I64 }]], RETURN],
        ],
      });
      expect(value(evaluate([countdown], "countdown", [intValue(20_000n)], { budget: { maxSteps: 1_000_000 } }))).toBe(
        "20000i64"
      );
    });

    test("updates array elements in place of the local", () => {
      const bump = mirFunction({
        id: "bump",
        ret: { kind: "array", element: I64, length: 2 },
        params: [{ kind: "array", element: I64, length: 2 }],
        blocks: [
          [
            [
              [place(1, [{ kind: "index", index: konst(intValue(1n)) }]), use(konst(intValue(9n)))],
              [place(0), use(copy(place(1)))],
            ],
            RETURN,
          ],
        ],
      });
      const input = arrayValue([intValue(1n), intValue(2n)]);
      expect(value(evaluate([bump], "bump", [input]))).toBe("[1i64, 9i64]");
      expect(formatValue(input)).toBe("[1i64, 2i64]");
    });
  });

  describe("failures", () => {
    test("a match that falls off its arms", () => {
      const stuck = mirFunction({ id: "stuck", blocks: [[[], { kind: "unreachable", reason: "match", span: at }]] });
      const error = failure(evaluate([stuck], "stuck"));
      expect(error.kind).toBe("MatchExhaustionFailure");
      expect(error.message).toBe("no match arm matched the scrutinee");
      expect(error.span).toEqual(at);
    });

    test("the step budget stops an endless loop", () => {
      const backEdge = span("test.wisp", 3, 8);
      const spin = mirFunction({ id: "spin", blocks: [[[], { kind: "goto", target: 0, span: backEdge }]] });
      const outcome = evaluate([spin], "spin", [], { budget: { maxSteps: 10 } });
      const error = failure(outcome);
      expect(error.kind).toBe("ComptimeBudgetExceeded");
      expect(error.message).toBe("compile-time evaluation exceeded the step budget of 10");
      expect(error.span).toEqual(backEdge);
      expect(outcome.steps).toBe(11);
    });

    test("reading an unassigned local", () => {
      const early = mirFunction({
        id: "early",
        locals: [["x", I64]],
        blocks: [[[[place(0), use(copy(place(1)))]], RETURN]],
      });
      expect(failure(evaluate([early], "early")).message).toBe("use of uninitialized variable 'x'");
    });

    test("indexing past the end", () => {
      const pick = mirFunction({
        id: "pick",
        params: [{ kind: "array", element: I64, length: 2 }],
        blocks: [[[[place(0), use(copy(place(1, [{ kind: "index", index: konst(intValue(3n)) }])))]], RETURN]],
      });
      const error = failure(evaluate([pick], "pick", [arrayValue([intValue(1n), intValue(2n)])]));
      expect(error.kind).toBe("ComptimeError");
      expect(error.message).toBe("index out of bounds: the length is 2 but the index is 3");
    });

    test("arithmetic faults become compile errors", () => {
      const divide = mirFunction({
        id: "divide",
        blocks: [
          [
            [[place(0), { kind: "binary", op: "div", left: konst(intValue(1n)), right: konst(intValue(0n)), type: I64 }]],
            RETURN,
          ],
        ],
      });
      const error = failure(evaluate([divide], "divide"));
      expect(error.kind).toBe("ComptimeError");
      expect(error.message).toBe("attempt to divide by zero");
    });

    test("panics carry the call chain", () => {
      const inner = mirFunction({
        id: "inner",
        ret: UNIT,
        blocks: [
          [
            [],
            { kind: "intrinsic", name: "panic", args: [konst(strValue("boom"))], destination: place(0), target: 1, span: at },
          ],
          [[], RETURN],
        ],
      });
      const callSpan = span("test.wisp", 30, 37);
      const outer = mirFunction({
        id: "outer",
        ret: UNIT,
        blocks: [
          [
            [],
            {
              kind: "call",
              callee: konst(closureValue("inner")),
              args: [],
              destination: place(0),
              target: 1,
              comptime: false,
              span: callSpan,
            },
          ],
          [[], RETURN],
        ],
      });
      const error = failure(evaluate([inner, outer], "outer"));
      expect(error.message).toBe("evaluation panicked: boom");
      expect(error.notes).toEqual([{ message: "in 'inner', called from 'outer'", span: callSpan }]);
    });
  });

  describe("intrinsics", () => {
    function effectFn(name: "read_file" | "write_file" | "shell", args: ComptimeValue[], ret: Type): MirFunction {
      return mirFunction({
        id: name,
        ret,
        blocks: [
          [[], { kind: "intrinsic", name, args: args.map(konst), destination: place(0), target: 1, span: at }],
          [[], RETURN],
        ],
      });
    }

    test("reads are recorded with a content hash", () => {
      const outcome = evaluate([effectFn("read_file", [strValue("notes.txt")], STR)], "read_file");
      expect(value(outcome)).toBe('IoResult::Ok("hello")');
      expect(outcome.reads).toHaveLength(1);
      expect(outcome.reads[0].path).toBe("notes.txt");
      expect(outcome.effects).toEqual([{ effect: "Read", decision: "Execute", target: "notes.txt" }]);
    });

    test("the sandbox skips writes but reports their size", () => {
      const host = new StubHost();
      const outcome = evaluate([effectFn("write_file", [strValue("out.txt"), strValue("héllo")], U64)], "write_file", [], {
        mode: "lsp-sandbox",
        host,
      });
      expect(value(outcome)).toBe("WriteResult::Ok(6u64)");
      expect(host.written).toEqual([]);
      expect(outcome.effects).toEqual([{ effect: "Write", decision: "NoOpSucceed", target: "out.txt" }]);
    });

    test("the sandbox denies shell commands", () => {
      const error = failure(evaluate([effectFn("shell", [strValue("ls")], STR)], "shell", [], { mode: "lsp-sandbox" }));
      expect(error.kind).toBe("CapabilityDenied");
      expect(error.message).toBe("Shell effect denied in lsp-sandbox mode");
    });

    test("#insert records the code for the call site", () => {
      const gen = mirFunction({
        id: "gen",
        ret: UNIT,
        blocks: [
          [
            [],
            {
              kind: "intrinsic",
              name: "insert",
              args: [konst(strValue("fn a() {}"))],
              destination: place(0),
              target: 1,
              span: at,
            },
          ],
          [[], RETURN],
        ],
      });
      const outcome = evaluate([gen], "gen");
      expect(outcome.result).toEqual({ ok: true, value: UNIT_VALUE });
      expect(outcome.insertions).toEqual([
        {
          code: { kind: "text", text: "fn a() {}" },
          site: "site#0",
          siteSpan: at,
          insertSpan: at,
          scope: { kind: "module" },
        },
      ]);
    });
  });
});
