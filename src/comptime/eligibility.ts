/**
 * Comptime-Eligibility Analyzer.
 *
 * A function is comptime-only ("tainted") when it uses a reflection,
 * injection or effect intrinsic, or reaches a tainted function through an
 * ordinary call or a function reference. Calls marked `comptime` run at
 * compile time and do not taint their caller.
 */

import { CompileError, Span } from "../diagnostics/errors";
import { IntrinsicName, MirFunction, Operand, forEachOperand, operandFunctions } from "../mir/mir";

export const TAINTING_INTRINSICS: ReadonlySet<IntrinsicName> = new Set<IntrinsicName>([
  "type_info",
  "type_name",
  "size_of",
  "align_of",
  "type_of",
  "insert",
  "code",
  "read_file",
  "write_file",
  "http_get",
  "shell",
]);

export type TaintReason = {
  intrinsic: IntrinsicName;
  span: Span; // the tainting intrinsic
  /** Functions between this one and the one using the intrinsic. */
  via: string[];
};

export type Edge = { from: string; to: string; kind: "call" | "reference"; span: Span };

export type EligibilityTable = {
  tainted: ReadonlyMap<string, TaintReason>;
  edges: readonly Edge[];
};

/**
 * Compute the least fixpoint of taint over all functions.
 */
export function analyzeEligibility(functions: ReadonlyMap<string, MirFunction>): EligibilityTable {
  const ids = [...functions.keys()].sort();
  const tainted = new Map<string, TaintReason>();
  const edges: Edge[] = [];
  const callers = new Map<string, Edge[]>();

  for (const id of ids) {
    const fn = functions.get(id);
    if (!fn) continue;
    const direct = directTaint(fn);
    if (direct) tainted.set(id, direct);
    for (const edge of functionEdges(fn)) {
      edges.push(edge);
      const list = callers.get(edge.to) ?? [];
      list.push(edge);
      callers.set(edge.to, list);
    }
  }

  const worklist = [...tainted.keys()];
  while (worklist.length > 0) {
    const callee = worklist.shift();
    if (callee === undefined) break;
    const reason = tainted.get(callee);
    if (!reason) continue;
    for (const edge of callers.get(callee) ?? []) {
      if (tainted.has(edge.from)) continue;
      tainted.set(edge.from, { intrinsic: reason.intrinsic, span: reason.span, via: [callee, ...reason.via] });
      worklist.push(edge.from);
    }
  }

  return { tainted, edges };
}

function directTaint(fn: MirFunction): TaintReason | undefined {
  for (const block of fn.blocks) {
    const term = block.terminator;
    if (term.kind === "intrinsic" && TAINTING_INTRINSICS.has(term.name)) {
      return { intrinsic: term.name, span: term.span, via: [] };
    }
  }
  return undefined;
}

/**
 * Ordinary call edges and function-reference edges out of `fn`, in block
 * order. Comptime call sites are not calls at this level.
 */
function functionEdges(fn: MirFunction): Edge[] {
  const edges: Edge[] = [];
  const calleeOperands = new Set<Operand>();
  for (const block of fn.blocks) {
    const term = block.terminator;
    if (term.kind === "call" && !term.comptime) {
      calleeOperands.add(term.callee);
      for (const to of operandFunctions(term.callee)) {
        edges.push({ from: fn.id, to, kind: "call", span: term.span });
      }
    }
  }
  forEachOperand(fn, (operand) => {
    if (calleeOperands.has(operand)) return;
    for (const to of operandFunctions(operand)) {
      edges.push({ from: fn.id, to, kind: "reference", span: fn.span });
    }
  });
  return edges;
}

/**
 * `main`, which must exist in the generated program.
 */
export function isEntryPoint(fn: MirFunction): boolean {
  return fn.kind === "fn" && fn.name === "main" && fn.scope.kind === "module";
}

/**
 * Functions that must exist at runtime regardless of callers, by id.
 */
export function runtimeRoots(functions: ReadonlyMap<string, MirFunction>, table: EligibilityTable): MirFunction[] {
  return [...functions.values()]
    .filter((fn) => isEntryPoint(fn) || (fn.pub && fn.kind !== "thunk" && !table.tainted.has(fn.id)))
    .sort((a, b) => a.id.localeCompare(b.id));
}

/**
 * Report `ComptimeRequired` for each ordinary use of a tainted function from
 * code that must exist at runtime: `main`, untainted `pub` functions and
 * everything they reach through ordinary calls. A tainted `pub` function is a
 * compile-time library function, not a runtime root.
 */
export function checkRuntimeCalls(functions: ReadonlyMap<string, MirFunction>, table: EligibilityTable): CompileError[] {
  const errors: CompileError[] = [];
  const outgoing = new Map<string, Edge[]>();
  for (const edge of table.edges) {
    const list = outgoing.get(edge.from) ?? [];
    list.push(edge);
    outgoing.set(edge.from, list);
  }

  const roots = runtimeRoots(functions, table);
  const visited = new Set<string>();
  const queue: string[] = [];
  for (const root of roots) {
    visited.add(root.id);
    queue.push(root.id);
    const reason = table.tainted.get(root.id);
    if (reason && reason.via.length === 0) {
      errors.push(
        new CompileError(
          "ComptimeRequired",
          "typecheck",
          `'${root.id}' must be available at runtime but uses the compile-time-only intrinsic '#${reason.intrinsic}'`,
          reason.span
        )
      );
    }
  }

  while (queue.length > 0) {
    const current = queue.shift();
    if (current === undefined) break;
    for (const edge of outgoing.get(current) ?? []) {
      const reason = table.tainted.get(edge.to);
      if (reason) {
        errors.push(comptimeRequired(edge, reason));
        continue;
      }
      if (!visited.has(edge.to)) {
        visited.add(edge.to);
        queue.push(edge.to);
      }
    }
  }
  return errors;
}

function comptimeRequired(edge: Edge, reason: TaintReason): CompileError {
  const use = edge.kind === "call" ? "call to" : "reference to";
  const error = new CompileError(
    "ComptimeRequired",
    "typecheck",
    `${use} compile-time-only function '${edge.to}' from runtime code in '${edge.from}'`,
    edge.span
  );
  const chain = [edge.to, ...reason.via];
  error.addNote(`'${chain[chain.length - 1]}' uses '#${reason.intrinsic}' here`, reason.span);
  if (chain.length > 1) error.addNote(`through ${chain.join(" -> ")}`);
  if (edge.kind === "call") error.addNote("mark the call 'comptime' to evaluate it at compile time");
  return error;
}
