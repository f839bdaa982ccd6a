/**
 * JavaScript backend - emits the runtime part of a program.
 *
 * Each MIR function becomes a JavaScript function running its basic blocks
 * as a `for (;;) switch ($bb)` state machine. Values of comptime call sites
 * and consts are folded in as literals. All Wisp semantics go through the
 * `$rt` object from `./runtime`.
 *
 * Functions tainted by compile-time-only intrinsics and argument thunks are
 * not emitted. Functions whose locals have compile-time-only types are
 * skipped, or rejected with a `TypeError` when runtime code needs them.
 */

import ts from "typescript";
import { ComptimeValue } from "../comptime/value";
import { EligibilityTable, runtimeRoots } from "../comptime/eligibility";
import { CompileError, CompileErrors, Span, internalError } from "../diagnostics/errors";
import { Program } from "../frontend/program";
import { Aggregate, BasicBlock, MirFunction, Operand, Place, Rvalue, Statement, Terminator } from "../mir/mir";
import { formatType } from "../types/format";
import { Type, isComptimeOnlyType } from "../types/types";

const f = ts.factory;

export function generateModule(
  program: Program,
  siteValues: ReadonlyMap<string, ComptimeValue>,
  eligibility: EligibilityTable
): string {
  const emitted = selectFunctions(program, eligibility);
  const statements: ts.Statement[] = [];
  for (const fn of emitted) {
    statements.push(new FunctionEmitter(fn, program, siteValues).emit());
  }
  statements.push(
    f.createVariableStatement(
      undefined,
      f.createVariableDeclarationList(
        [
          f.createVariableDeclaration(
            "$functions",
            undefined,
            undefined,
            f.createObjectLiteralExpression(
              emitted.map((fn) => f.createPropertyAssignment(f.createStringLiteral(fn.id), f.createIdentifier(mangle(fn.id)))),
              true
            )
          ),
        ],
        ts.NodeFlags.None
      )
    )
  );
  const first = statements[0];
  ts.addSyntheticLeadingComment(first, ts.SyntaxKind.SingleLineCommentTrivia, " Generated by wispc. Expects the Wisp runtime as $rt.", true);

  const printer = ts.createPrinter({ newLine: ts.NewLineKind.LineFeed });
  const file = ts.createSourceFile("wisp-module.js", "", ts.ScriptTarget.ES2020, false, ts.ScriptKind.JS);
  return printer.printList(ts.ListFormat.MultiLine, f.createNodeArray(statements), file);
}

export function mangle(id: string): string {
  return "w_" + id.replace(/::/g, "$");
}

// ============================================
// Selection
// ============================================

/**
 * Untainted, non-thunk functions whose locals all exist at runtime, minus
 * anything that calls a function left out. Sorted by id.
 */
function selectFunctions(program: Program, eligibility: EligibilityTable): MirFunction[] {
  const required = reachableFromRoots(program, eligibility);
  const errors: CompileError[] = [];
  const candidates = new Set<string>();

  for (const fn of program.functions.values()) {
    if (fn.kind === "thunk" || eligibility.tainted.has(fn.id)) continue;
    const comptimeLocal = fn.locals.find((l) => isComptimeOnlyType(l.type, program.types));
    if (comptimeLocal) {
      if (required.has(fn.id)) {
        errors.push(
          runtimeTypeError(
            `'${fn.id}' is needed at runtime but holds a value of the compile-time-only type '${formatType(comptimeLocal.type)}'`,
            fn.span
          ).addNote(`in '${comptimeLocal.name}'`)
        );
      }
      continue;
    }
    candidates.add(fn.id);
  }
  if (errors.length > 0) throw new CompileErrors(errors);

  let changed = true;
  while (changed) {
    changed = false;
    for (const edge of eligibility.edges) {
      if (candidates.has(edge.from) && !candidates.has(edge.to)) {
        candidates.delete(edge.from);
        changed = true;
      }
    }
  }

  return [...candidates]
    .sort()
    .map((id) => program.functions.get(id))
    .filter((fn): fn is MirFunction => fn !== undefined);
}

function reachableFromRoots(program: Program, eligibility: EligibilityTable): Set<string> {
  const seen = new Set(runtimeRoots(program.functions, eligibility).map((fn) => fn.id));
  const queue = [...seen];
  while (queue.length > 0) {
    const id = queue.shift();
    for (const edge of eligibility.edges) {
      if (edge.from === id && !seen.has(edge.to)) {
        seen.add(edge.to);
        queue.push(edge.to);
      }
    }
  }
  return seen;
}

// ============================================
// Functions
// ============================================

class FunctionEmitter {
  constructor(
    private readonly fn: MirFunction,
    private readonly program: Program,
    private readonly siteValues: ReadonlyMap<string, ComptimeValue>
  ) {}

  emit(): ts.FunctionDeclaration {
    const fn = this.fn;
    const params = fn.params.map((id) => f.createParameterDeclaration(undefined, undefined, local(id)));
    const declared = fn.locals.filter((l) => !fn.params.includes(l.id));

    const body: ts.Statement[] = [];
    if (declared.length > 0) {
      body.push(letStatement(declared.map((l) => f.createVariableDeclaration(local(l.id)))));
    }
    body.push(letStatement([f.createVariableDeclaration("$bb", undefined, undefined, f.createNumericLiteral(0))]));
    const cases = fn.blocks.map((block) => f.createCaseClause(f.createNumericLiteral(block.id), [this.block(block)]));
    const dispatch = f.createSwitchStatement(f.createIdentifier("$bb"), f.createCaseBlock(cases));
    body.push(f.createForStatement(undefined, undefined, undefined, f.createBlock([dispatch], true)));

    return f.createFunctionDeclaration(undefined, undefined, mangle(fn.id), undefined, params, undefined, f.createBlock(body, true));
  }

  private block(block: BasicBlock): ts.Block {
    const out = block.statements.map((stmt) => this.statement(stmt));
    out.push(...this.terminator(block.terminator));
    return f.createBlock(out, true);
  }

  private statement(stmt: Statement): ts.Statement {
    return this.assign(stmt.place, this.rvalue(stmt.rvalue, stmt));
  }

  private terminator(term: Terminator): ts.Statement[] {
    switch (term.kind) {
      case "goto":
        return jump(term.target);
      case "switch": {
        const cases = f.createArrayLiteralExpression(
          term.cases.map((c) => f.createArrayLiteralExpression([bigint(c.value), f.createNumericLiteral(c.target)]))
        );
        const target = rt("branch", [rt("key", [this.operand(term.discr)]), cases, f.createNumericLiteral(term.otherwise)]);
        return [f.createExpressionStatement(f.createAssignment(f.createIdentifier("$bb"), target)), f.createContinueStatement()];
      }
      case "return":
        return [f.createReturnStatement(f.createIdentifier(local(0)))];
      case "call": {
        const args = term.args.map((a) => this.operand(a));
        const callee = term.callee;
        let call: ts.Expression;
        if (callee.kind === "const" && callee.value.kind === "closure") {
          const env = callee.value.env.map((v) => this.literal(v));
          call = f.createCallExpression(f.createIdentifier(mangle(callee.value.fn)), undefined, [...env, ...args]);
        } else {
          call = rt("call", [this.operand(callee), f.createArrayLiteralExpression(args)]);
        }
        return [this.assign(term.destination, call), ...jump(term.target)];
      }
      case "intrinsic": {
        const args = term.args.map((a) => this.operand(a));
        let value: ts.Expression;
        switch (term.name) {
          case "to_string":
            value = rt("display", args);
            break;
          case "len":
          case "panic":
          case "assert":
            value = rt(term.name, args);
            break;
          default:
            throw internalError(`#${term.name} cannot run in generated code`, term.span);
        }
        return [this.assign(term.destination, value), ...jump(term.target)];
      }
      case "unreachable":
        return [f.createExpressionStatement(rt("unreachable", [f.createStringLiteral(term.reason)])), f.createBreakStatement()];
    }
  }

  private rvalue(rv: Rvalue, stmt: Statement): ts.Expression {
    switch (rv.kind) {
      case "use":
        return this.operand(rv.operand);
      case "binary": {
        const left = this.operand(rv.left);
        const right = this.operand(rv.right);
        const op = f.createStringLiteral(rv.op);
        switch (rv.op) {
          case "eq":
          case "ne":
          case "lt":
          case "le":
          case "gt":
          case "ge":
            return rt("compare", [op, left, right]);
          default:
            break;
        }
        switch (rv.type.kind) {
          case "int":
            return rt("int", [op, left, right, f.createNumericLiteral(rv.type.width), bool(rv.type.signed)]);
          case "float":
            return rt("float", [op, left, right, f.createNumericLiteral(rv.type.width)]);
          case "bool":
            return rt("bool", [op, left, right]);
          case "str":
            if (rv.op === "add") return rt("concat", [left, right]);
            break;
          default:
            break;
        }
        throw internalError(`operator '${rv.op}' on '${formatType(rv.type)}'`, stmt.span);
      }
      case "unary": {
        const width = rv.type.kind === "int" ? rv.type.width : 64;
        const signed = rv.type.kind === "int" ? rv.type.signed : true;
        return rt(rv.op, [this.operand(rv.operand), f.createNumericLiteral(width), bool(signed)]);
      }
      case "aggregate":
        return this.aggregate(rv.aggregate, rv.operands);
      case "discriminant":
        return rt("discriminant", [this.read(rv.place)]);
      case "payload":
        return rt("payload", [this.read(rv.place), f.createNumericLiteral(rv.variant), f.createNumericLiteral(rv.index)]);
      case "cast":
        return rt("cast", [this.operand(rv.operand), castTarget(rv.to)]);
    }
  }

  private aggregate(aggregate: Aggregate, operands: Operand[]): ts.Expression {
    const values = f.createArrayLiteralExpression(operands.map((o) => this.operand(o)));
    switch (aggregate.kind) {
      case "struct":
        return rt("struct", [
          f.createStringLiteral(runtimeName(aggregate.type)),
          f.createArrayLiteralExpression(aggregate.fields.map((name) => f.createStringLiteral(name))),
          values,
        ]);
      case "enum":
        return rt("variant", [
          f.createStringLiteral(runtimeName(aggregate.type)),
          f.createNumericLiteral(aggregate.variant),
          f.createStringLiteral(aggregate.name),
          values,
        ]);
      case "array":
        return rt("array", [values]);
    }
  }

  // ============================================
  // Operands and places
  // ============================================

  private operand(op: Operand): ts.Expression {
    switch (op.kind) {
      case "copy":
        return this.read(op.place);
      case "const":
        return this.literal(op.value);
      case "site":
        return this.literal(this.siteValue(op.site));
      case "global": {
        const info = this.program.consts.get(op.name);
        if (!info) throw internalError(`unknown const '${op.name}'`, this.fn.span);
        return this.literal(this.siteValue(info.site));
      }
    }
  }

  private siteValue(site: string): ComptimeValue {
    const value = this.siteValues.get(site);
    if (!value) throw internalError(`call site ${site} has no value`, this.fn.span);
    return value;
  }

  private path(p: Place): ts.Expression {
    return f.createArrayLiteralExpression(
      p.projections.map((proj) => (proj.kind === "field" ? f.createStringLiteral(proj.name) : this.operand(proj.index)))
    );
  }

  private read(p: Place): ts.Expression {
    const base = f.createIdentifier(local(p.local));
    if (p.projections.length === 0) return base;
    return rt("get", [base, this.path(p)]);
  }

  private assign(p: Place, value: ts.Expression): ts.Statement {
    const target = f.createIdentifier(local(p.local));
    const updated = p.projections.length === 0 ? value : rt("set", [target, this.path(p), value]);
    return f.createExpressionStatement(f.createAssignment(target, updated));
  }

  private literal(value: ComptimeValue): ts.Expression {
    switch (value.kind) {
      case "int":
        return bigint(value.value);
      case "float":
        return number(value.value);
      case "bool":
        return bool(value.value);
      case "char":
        return rt("char", [f.createNumericLiteral(value.value)]);
      case "str":
        return f.createStringLiteral(value.value);
      case "unit":
        return f.createPropertyAccessExpression(f.createIdentifier("$rt"), "unit");
      case "array":
        return rt("array", [f.createArrayLiteralExpression(value.elements.map((e) => this.literal(e)))]);
      case "struct":
        return rt("struct", [
          f.createStringLiteral(runtimeName(value.type)),
          f.createArrayLiteralExpression(value.fields.map((field) => f.createStringLiteral(field.name))),
          f.createArrayLiteralExpression(value.fields.map((field) => this.literal(field.value))),
        ]);
      case "enum":
        return rt("variant", [
          f.createStringLiteral(runtimeName(value.type)),
          f.createNumericLiteral(value.variant),
          f.createStringLiteral(value.name),
          f.createArrayLiteralExpression(value.payload.map((p) => this.literal(p))),
        ]);
      case "closure":
        if (value.env.length > 0) throw internalError("captured closures cannot be folded into generated code", this.fn.span);
        return f.createIdentifier(mangle(value.fn));
      case "type":
      case "code":
        throw runtimeTypeError(`a compile-time-only ${value.kind} value cannot be used in runtime code`, this.fn.span);
    }
  }
}

// ============================================
// Helpers
// ============================================

function local(id: number): string {
  return `_${id}`;
}

function rt(name: string, args: ts.Expression[]): ts.Expression {
  return f.createCallExpression(f.createPropertyAccessExpression(f.createIdentifier("$rt"), name), undefined, args);
}

function jump(target: number): ts.Statement[] {
  return [
    f.createExpressionStatement(f.createAssignment(f.createIdentifier("$bb"), f.createNumericLiteral(target))),
    f.createContinueStatement(),
  ];
}

function letStatement(declarations: ts.VariableDeclaration[]): ts.Statement {
  return f.createVariableStatement(undefined, f.createVariableDeclarationList(declarations, ts.NodeFlags.Let));
}

function bool(value: boolean): ts.Expression {
  return value ? f.createTrue() : f.createFalse();
}

function bigint(value: bigint): ts.Expression {
  const literal = f.createBigIntLiteral(`${value < 0n ? -value : value}n`);
  return value < 0n ? f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, literal) : literal;
}

function number(value: number): ts.Expression {
  if (Number.isNaN(value)) return f.createIdentifier("NaN");
  if (value === Infinity) return f.createIdentifier("Infinity");
  if (value === -Infinity) return f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, f.createIdentifier("Infinity"));
  if (value < 0 || Object.is(value, -0)) {
    return f.createPrefixUnaryExpression(ts.SyntaxKind.MinusToken, f.createNumericLiteral(String(-value)));
  }
  return f.createNumericLiteral(String(value));
}

function castTarget(to: Type): ts.Expression {
  const props: ts.ObjectLiteralElementLike[] = [];
  switch (to.kind) {
    case "int":
      props.push(
        f.createPropertyAssignment("kind", f.createStringLiteral("int")),
        f.createPropertyAssignment("width", f.createNumericLiteral(to.width)),
        f.createPropertyAssignment("signed", bool(to.signed))
      );
      break;
    case "float":
      props.push(
        f.createPropertyAssignment("kind", f.createStringLiteral("float")),
        f.createPropertyAssignment("width", f.createNumericLiteral(to.width))
      );
      break;
    case "char":
      props.push(f.createPropertyAssignment("kind", f.createStringLiteral("char")));
      break;
    default:
      props.push(f.createPropertyAssignment("kind", f.createStringLiteral("other")));
  }
  return f.createObjectLiteralExpression(props, false);
}

function runtimeName(type: Type): string {
  return type.kind === "named" ? type.name : formatType(type);
}

function runtimeTypeError(message: string, at: Span): CompileError {
  return new CompileError("TypeError", "codegen", message, at);
}
