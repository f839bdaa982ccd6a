/**
 * MIR - the typed mid-level IR the comptime interpreter executes and the
 * JavaScript backend emits.
 *
 * A function is a list of basic blocks over numbered locals. Local 0 holds
 * the return value, locals 1..n the parameters.
 */

import { Span } from "../diagnostics/errors";
import type { ComptimeValue } from "../comptime/value";
import { Type } from "../types/types";

export type LocalId = number;
export type BlockId = number;

export type Local = {
  id: LocalId;
  name: string;
  type: Type;
};

export type Projection = { kind: "field"; name: string } | { kind: "index"; index: Operand };

export type Place = {
  local: LocalId;
  projections: Projection[];
};

export type Operand =
  | { kind: "copy"; place: Place }
  | { kind: "const"; value: ComptimeValue }
  // Value of a `const` item, computed at compile time.
  | { kind: "global"; name: string; type: Type }
  // Result of an inline `comptime f(...)` call site.
  | { kind: "site"; site: string; type: Type };

export type BinOp =
  | "add"
  | "sub"
  | "mul"
  | "div"
  | "rem"
  | "bitand"
  | "bitor"
  | "bitxor"
  | "shl"
  | "shr"
  | "eq"
  | "ne"
  | "lt"
  | "le"
  | "gt"
  | "ge";

export type UnOp = "neg" | "not";

export type Aggregate =
  | { kind: "struct"; type: Type; fields: string[] }
  | { kind: "enum"; type: Type; variant: number; name: string }
  | { kind: "array" };

export type Rvalue =
  | { kind: "use"; operand: Operand }
  | { kind: "binary"; op: BinOp; left: Operand; right: Operand; type: Type }
  | { kind: "unary"; op: UnOp; operand: Operand; type: Type }
  | { kind: "aggregate"; aggregate: Aggregate; operands: Operand[] }
  | { kind: "discriminant"; place: Place }
  | { kind: "payload"; place: Place; variant: number; index: number }
  | { kind: "cast"; operand: Operand; from: Type; to: Type };

export type Statement = {
  kind: "assign";
  place: Place;
  rvalue: Rvalue;
  span: Span;
};

export type IntrinsicName =
  | "type_info"
  | "type_name"
  | "size_of"
  | "align_of"
  | "type_of"
  | "insert"
  | "code"
  | "read_file"
  | "write_file"
  | "http_get"
  | "shell"
  | "panic"
  | "assert"
  | "to_string"
  | "len";

export type SwitchCase = { value: bigint; target: BlockId };

export type Terminator =
  | { kind: "goto"; target: BlockId; span: Span }
  // Integer, char and bool scrutinees; `false` is 0 and `true` is 1.
  | { kind: "switch"; discr: Operand; cases: SwitchCase[]; otherwise: BlockId; span: Span }
  | { kind: "return"; span: Span }
  | {
      kind: "call";
      callee: Operand;
      args: Operand[];
      destination: Place;
      target: BlockId;
      comptime: boolean;
      span: Span;
    }
  | {
      kind: "intrinsic";
      name: IntrinsicName;
      args: Operand[];
      destination: Place;
      target: BlockId;
      span: Span;
    }
  | { kind: "unreachable"; reason: "match" | "diverge"; span: Span };

export type BasicBlock = {
  id: BlockId;
  statements: Statement[];
  terminator: Terminator;
};

export type Scope = { kind: "module" } | { kind: "function"; fn: string };

export type MirFunction = {
  id: string; // qualified name, unique in the program
  name: string;
  kind: "fn" | "method" | "thunk";
  pub: boolean;
  params: LocalId[];
  returnType: Type;
  locals: Local[];
  blocks: BasicBlock[];
  scope: Scope;
  span: Span;
};

export function place(local: LocalId, projections: Projection[] = []): Place {
  return { local, projections };
}

export function copy(p: Place): Operand {
  return { kind: "copy", place: p };
}

export const RETURN_LOCAL: LocalId = 0;

/**
 * Every function id an operand refers to directly.
 */
export function operandFunctions(operand: Operand): string[] {
  if (operand.kind === "const" && operand.value.kind === "closure") return [operand.value.fn];
  return [];
}

/**
 * Visit every operand in a function body, including nested index operands.
 */
export function forEachOperand(fn: MirFunction, visit: (operand: Operand) => void): void {
  const visitPlace = (p: Place) => {
    for (const proj of p.projections) {
      if (proj.kind === "index") visitOperand(proj.index);
    }
  };
  const visitOperand = (op: Operand) => {
    visit(op);
    if (op.kind === "copy") visitPlace(op.place);
  };
  for (const block of fn.blocks) {
    for (const stmt of block.statements) {
      visitPlace(stmt.place);
      const rv = stmt.rvalue;
      switch (rv.kind) {
        case "use":
        case "unary":
        case "cast":
          visitOperand(rv.operand);
          break;
        case "binary":
          visitOperand(rv.left);
          visitOperand(rv.right);
          break;
        case "aggregate":
          rv.operands.forEach(visitOperand);
          break;
        case "discriminant":
        case "payload":
          visitPlace(rv.place);
          break;
      }
    }
    const term = block.terminator;
    switch (term.kind) {
      case "switch":
        visitOperand(term.discr);
        break;
      case "call":
        visitOperand(term.callee);
        term.args.forEach(visitOperand);
        visitPlace(term.destination);
        break;
      case "intrinsic":
        term.args.forEach(visitOperand);
        visitPlace(term.destination);
        break;
      default:
        break;
    }
  }
}
