/**
 * MIR Interpreter - evaluates functions at compile time.
 *
 * Execution keeps an explicit stack of frames, each with its own local
 * slots, so deep recursion in user code cannot overflow the host stack.
 * Locals are the only mutable state: aggregate updates build new values.
 */

import { CompileError, Span, comptimeError, internalError } from "../diagnostics/errors";
import { Aggregate, BlockId, MirFunction, Operand, Place, Rvalue, Scope, Statement } from "../mir/mir";
import { Type } from "../types/types";
import { CapabilityContext } from "./capability";
import { HostOperations } from "./host";
import { EffectRecord, ReadRecord, callIntrinsic } from "./intrinsics";
import {
  ArithOp,
  ArithmeticFault,
  CompareOp,
  boolArith,
  charFromInt,
  compare,
  floatArith,
  floatToInt,
  intArith,
  intNeg,
  intNot,
  intToFloat,
  intToInt,
  roundFloat,
} from "./numeric";
import { ReflectionProvider } from "./reflect";
import {
  CodeFragment,
  ComptimeValue,
  arrayValue,
  boolValue,
  charValue,
  enumValue,
  floatValue,
  getField,
  intValue,
  strValue,
  structValue,
  valueEquals,
  withElement,
  withField,
} from "./value";

/**
 * Code handed to the insertion pipeline: produced by `#insert`, consumed once.
 */
export type PendingInsertion = {
  code: CodeFragment;
  site: string; // comptime call site whose evaluation inserted it
  siteSpan: Span;
  insertSpan: Span; // the `#insert` intrinsic itself
  scope: Scope;
};

export type EvaluationResult = { ok: true; value: ComptimeValue } | { ok: false; error: CompileError };

/**
 * What one evaluation produced. Reads and effects are kept on failure too,
 * so a cached error is invalidated like a cached value.
 */
export type EvaluationOutcome = {
  result: EvaluationResult;
  insertions: PendingInsertion[];
  reads: ReadRecord[];
  effects: EffectRecord[];
  steps: number;
};

export type Budget = {
  maxSteps: number;
  timeBudgetMs?: number;
};

export interface InterpreterHost {
  readonly functions: ReadonlyMap<string, MirFunction>;
  readonly reflection: ReflectionProvider;
  readonly capabilities: CapabilityContext;
  readonly host: HostOperations;
  /** Value of an already evaluated call site or const. */
  siteValue(site: string, at: Span): ComptimeValue;
  constValue(name: string, at: Span): ComptimeValue;
}

/** The call site an evaluation runs for. */
export type SiteContext = { id: string; span: Span; scope: Scope };

type Frame = {
  fn: MirFunction;
  locals: (ComptimeValue | undefined)[];
  block: BlockId;
  statement: number;
  /** Where the caller wants the result, absent for the outermost frame. */
  resume?: { destination: Place; target: BlockId; span: Span };
};

const TIME_CHECK_INTERVAL = 1024;

export class Interpreter {
  constructor(private readonly env: InterpreterHost) {}

  evaluate(fnId: string, args: readonly ComptimeValue[], site: SiteContext, budget: Budget): EvaluationOutcome {
    return new Evaluation(this.env, site, budget).run(fnId, args);
  }
}

/**
 * State of one evaluation: frames, step counter and everything recorded for
 * the cache and the insertion pipeline.
 */
class Evaluation {
  private readonly frames: Frame[] = [];
  private readonly insertions: PendingInsertion[] = [];
  private readonly reads: ReadRecord[] = [];
  private readonly effects: EffectRecord[] = [];
  private steps = 0;
  private readonly deadline?: number;

  constructor(private readonly env: InterpreterHost, private readonly site: SiteContext, private readonly budget: Budget) {
    if (budget.timeBudgetMs !== undefined) this.deadline = Date.now() + budget.timeBudgetMs;
  }

  run(fnId: string, args: readonly ComptimeValue[]): EvaluationOutcome {
    let result: EvaluationResult;
    try {
      this.push(this.lookup(fnId, this.site.span), args);
      result = { ok: true, value: this.loop() };
    } catch (e) {
      if (!(e instanceof CompileError)) throw e;
      result = { ok: false, error: this.withBacktrace(e) };
    }
    return { result, insertions: this.insertions, reads: this.reads, effects: this.effects, steps: this.steps };
  }

  // ============================================
  // Frames
  // ============================================

  private lookup(fnId: string, at: Span): MirFunction {
    const fn = this.env.functions.get(fnId);
    if (!fn) throw internalError(`unknown function '${fnId}'`, at);
    return fn;
  }

  private push(fn: MirFunction, args: readonly ComptimeValue[], resume?: Frame["resume"]): void {
    if (args.length !== fn.params.length) {
      throw internalError(`'${fn.id}' expects ${fn.params.length} argument(s), got ${args.length}`, resume?.span ?? fn.span);
    }
    const locals = Array.from<unknown, ComptimeValue | undefined>({ length: fn.locals.length }, () => undefined);
    fn.params.forEach((local, i) => {
      locals[local] = args[i];
    });
    this.frames.push({ fn, locals, block: 0, statement: 0, resume });
  }

  private top(): Frame {
    const frame = this.frames[this.frames.length - 1];
    if (!frame) throw internalError("empty frame stack", this.site.span);
    return frame;
  }

  private tick(at: Span): void {
    this.steps++;
    if (this.steps > this.budget.maxSteps) {
      throw new CompileError(
        "ComptimeBudgetExceeded",
        "comptime",
        `compile-time evaluation exceeded the step budget of ${this.budget.maxSteps}`,
        at
      );
    }
    if (this.deadline !== undefined && this.steps % TIME_CHECK_INTERVAL === 0 && Date.now() > this.deadline) {
      throw new CompileError(
        "ComptimeBudgetExceeded",
        "comptime",
        `compile-time evaluation exceeded the time budget of ${this.budget.timeBudgetMs}ms`,
        at
      );
    }
  }

  // ============================================
  // Main loop
  // ============================================

  private loop(): ComptimeValue {
    for (;;) {
      const frame = this.top();
      const block = frame.fn.blocks[frame.block];
      if (!block) throw internalError(`'${frame.fn.id}' has no block ${frame.block}`, frame.fn.span);

      if (frame.statement < block.statements.length) {
        const stmt = block.statements[frame.statement];
        this.tick(stmt.span);
        this.execute(frame, stmt);
        frame.statement++;
        continue;
      }

      const term = block.terminator;
      this.tick(term.span);
      switch (term.kind) {
        case "goto":
          this.jump(frame, term.target);
          break;
        case "switch": {
          const discr = this.switchValue(this.operand(frame, term.discr, term.span), term.span);
          const target = term.cases.find((c) => c.value === discr)?.target ?? term.otherwise;
          this.jump(frame, target);
          break;
        }
        case "return": {
          const result = frame.locals[0];
          if (!result) throw internalError(`'${frame.fn.id}' returned without a value`, frame.fn.span);
          this.frames.pop();
          if (!frame.resume) return result;
          const caller = this.top();
          this.write(caller, frame.resume.destination, result, frame.resume.span);
          this.jump(caller, frame.resume.target);
          break;
        }
        case "call": {
          const callee = this.operand(frame, term.callee, term.span);
          if (callee.kind !== "closure") throw internalError("call of a non-function value", term.span);
          const args = [...callee.env, ...term.args.map((a) => this.operand(frame, a, term.span))];
          this.push(this.lookup(callee.fn, term.span), args, {
            destination: term.destination,
            target: term.target,
            span: term.span,
          });
          break;
        }
        case "intrinsic": {
          const args = term.args.map((a) => this.operand(frame, a, term.span));
          const value = callIntrinsic(term.name, args, this.intrinsicEnv(), term.span);
          this.write(frame, term.destination, value, term.span);
          this.jump(frame, term.target);
          break;
        }
        case "unreachable":
          if (term.reason === "match") {
            throw new CompileError(
              "MatchExhaustionFailure",
              "comptime",
              "no match arm matched the scrutinee",
              term.span
            );
          }
          throw internalError(`reached unreachable code in '${frame.fn.id}'`, term.span);
      }
    }
  }

  private jump(frame: Frame, target: BlockId): void {
    frame.block = target;
    frame.statement = 0;
  }

  private intrinsicEnv() {
    return {
      reflection: this.env.reflection,
      capabilities: this.env.capabilities,
      host: this.env.host,
      onRead: (record: ReadRecord) => this.reads.push(record),
      onEffect: (record: EffectRecord) => this.effects.push(record),
      onInsert: (code: CodeFragment, at: Span) =>
        this.insertions.push({ code, site: this.site.id, siteSpan: this.site.span, insertSpan: at, scope: this.site.scope }),
    };
  }

  private switchValue(value: ComptimeValue, at: Span): bigint {
    switch (value.kind) {
      case "int":
        return value.value;
      case "bool":
        return value.value ? 1n : 0n;
      case "char":
        return BigInt(value.value);
      default:
        throw internalError(`cannot switch on a ${value.kind} value`, at);
    }
  }

  /**
   * Note the active call chain on errors, innermost call first.
   */
  private withBacktrace(e: CompileError): CompileError {
    for (let i = this.frames.length - 1; i > 0; i--) {
      const frame = this.frames[i];
      if (frame.resume) e.addNote(`in '${frame.fn.id}', called from '${this.frames[i - 1].fn.id}'`, frame.resume.span);
    }
    return e;
  }

  // ============================================
  // Statements
  // ============================================

  private execute(frame: Frame, stmt: Statement): void {
    const value = this.rvalue(frame, stmt.rvalue, stmt.span);
    this.write(frame, stmt.place, value, stmt.span);
  }

  private rvalue(frame: Frame, rv: Rvalue, at: Span): ComptimeValue {
    switch (rv.kind) {
      case "use":
        return this.operand(frame, rv.operand, at);
      case "binary":
        return this.binary(rv.op, this.operand(frame, rv.left, at), this.operand(frame, rv.right, at), at);
      case "unary":
        return this.unary(rv.op, this.operand(frame, rv.operand, at), at);
      case "aggregate":
        return buildAggregate(rv.aggregate, rv.operands.map((op) => this.operand(frame, op, at)));
      case "discriminant": {
        const value = this.read(frame, rv.place, at);
        if (value.kind !== "enum") throw internalError("discriminant of a non-enum value", at);
        return intValue(BigInt(value.variant), 64, false);
      }
      case "payload": {
        const value = this.read(frame, rv.place, at);
        if (value.kind !== "enum" || value.variant !== rv.variant) {
          throw internalError("payload of the wrong enum variant", at);
        }
        const field = value.payload[rv.index];
        if (!field) throw internalError("payload index out of range", at);
        return field;
      }
      case "cast":
        return this.cast(this.operand(frame, rv.operand, at), rv.to, at);
    }
  }

  private operand(frame: Frame, op: Operand, at: Span): ComptimeValue {
    switch (op.kind) {
      case "copy":
        return this.read(frame, op.place, at);
      case "const":
        return op.value;
      case "global":
        return this.env.constValue(op.name, at);
      case "site":
        return this.env.siteValue(op.site, at);
    }
  }

  // ============================================
  // Places
  // ============================================

  private read(frame: Frame, p: Place, at: Span): ComptimeValue {
    let value = frame.locals[p.local];
    if (!value) {
      const name = frame.fn.locals[p.local]?.name ?? `_${p.local}`;
      throw comptimeError(`use of uninitialized variable '${name}'`, at);
    }
    for (const proj of p.projections) {
      if (proj.kind === "field") {
        const field = getField(value, proj.name);
        if (!field) throw internalError(`no field '${proj.name}' on a ${value.kind} value`, at);
        value = field;
      } else {
        const index = this.index(frame, value, proj.index, at);
        if (value.kind !== "array") throw internalError(`cannot index a ${value.kind} value`, at);
        value = value.elements[index];
      }
    }
    return value;
  }

  private write(frame: Frame, p: Place, value: ComptimeValue, at: Span): void {
    if (p.projections.length === 0) {
      frame.locals[p.local] = value;
      return;
    }
    const root = this.read(frame, { local: p.local, projections: [] }, at);
    frame.locals[p.local] = this.update(frame, root, p.projections, 0, value, at);
  }

  /** Rebuild `base` with the value at `projections[depth..]` replaced. */
  private update(
    frame: Frame,
    base: ComptimeValue,
    projections: Place["projections"],
    depth: number,
    value: ComptimeValue,
    at: Span
  ): ComptimeValue {
    if (depth === projections.length) return value;
    const proj = projections[depth];
    if (proj.kind === "field") {
      const current = getField(base, proj.name);
      if (!current) throw internalError(`no field '${proj.name}' on a ${base.kind} value`, at);
      const updated = withField(base, proj.name, this.update(frame, current, projections, depth + 1, value, at));
      if (!updated) throw internalError(`cannot update field '${proj.name}'`, at);
      return updated;
    }
    const index = this.index(frame, base, proj.index, at);
    if (base.kind !== "array") throw internalError(`cannot index a ${base.kind} value`, at);
    const updated = withElement(base, index, this.update(frame, base.elements[index], projections, depth + 1, value, at));
    if (!updated) throw internalError("cannot update array element", at);
    return updated;
  }

  private index(frame: Frame, array: ComptimeValue, indexOperand: Operand, at: Span): number {
    const index = this.operand(frame, indexOperand, at);
    if (index.kind !== "int") throw internalError("array index is not an integer", at);
    const length = array.kind === "array" ? array.elements.length : 0;
    if (index.value < 0n || index.value >= BigInt(length)) {
      throw comptimeError(`index out of bounds: the length is ${length} but the index is ${index.value}`, at);
    }
    return Number(index.value);
  }

  // ============================================
  // Operators
  // ============================================

  private binary(op: Extract<Rvalue, { kind: "binary" }>["op"], left: ComptimeValue, right: ComptimeValue, at: Span): ComptimeValue {
    try {
      if (isCompare(op)) return boolValue(this.compareValues(op, left, right, at));
      if (left.kind === "int" && right.kind === "int") {
        return intValue(intArith(op, left.value, right.value, left.width, left.signed), left.width, left.signed);
      }
      if (left.kind === "float" && right.kind === "float") {
        return floatValue(floatArith(op, left.value, right.value, left.width), left.width);
      }
      if (left.kind === "bool" && right.kind === "bool") return boolValue(boolArith(op, left.value, right.value));
      if (left.kind === "str" && right.kind === "str" && op === "add") return strValue(left.value + right.value);
    } catch (e) {
      if (e instanceof ArithmeticFault) throw comptimeError(e.message, at);
      throw e;
    }
    throw internalError(`operator '${op}' on ${left.kind} and ${right.kind}`, at);
  }

  private compareValues(op: CompareOp, left: ComptimeValue, right: ComptimeValue, at: Span): boolean {
    if (op === "eq") return valueEquals(left, right);
    if (op === "ne") return !valueEquals(left, right);
    if ((left.kind === "int" && right.kind === "int") || (left.kind === "char" && right.kind === "char")) {
      return compare<bigint>(op, BigInt(left.value), BigInt(right.value));
    }
    if (left.kind === "float" && right.kind === "float") return compare(op, left.value, right.value);
    if (left.kind === "str" && right.kind === "str") return compare(op, left.value, right.value);
    if (left.kind === "bool" && right.kind === "bool") return compare(op, left.value, right.value);
    throw internalError(`cannot order ${left.kind} and ${right.kind}`, at);
  }

  private unary(op: "neg" | "not", value: ComptimeValue, at: Span): ComptimeValue {
    switch (value.kind) {
      case "int":
        return intValue(
          op === "neg" ? intNeg(value.value, value.width, value.signed) : intNot(value.value, value.width, value.signed),
          value.width,
          value.signed
        );
      case "float":
        if (op === "neg") return floatValue(-value.value, value.width);
        break;
      case "bool":
        if (op === "not") return boolValue(!value.value);
        break;
      default:
        break;
    }
    throw internalError(`operator '${op}' on ${value.kind}`, at);
  }

  private cast(value: ComptimeValue, to: Type, at: Span): ComptimeValue {
    try {
      switch (to.kind) {
        case "int": {
          if (value.kind === "int") return intValue(intToInt(value.value, to.width, to.signed), to.width, to.signed);
          if (value.kind === "float") return intValue(floatToInt(value.value, to.width, to.signed), to.width, to.signed);
          if (value.kind === "bool") return intValue(value.value ? 1n : 0n, to.width, to.signed);
          if (value.kind === "char") return intValue(BigInt(value.value), to.width, to.signed);
          break;
        }
        case "float":
          if (value.kind === "int") return floatValue(intToFloat(value.value, to.width), to.width);
          if (value.kind === "float") return floatValue(roundFloat(value.value, to.width), to.width);
          break;
        case "char":
          if (value.kind === "int") return charValue(charFromInt(value.value));
          if (value.kind === "char") return value;
          break;
        default:
          return value;
      }
    } catch (e) {
      if (e instanceof ArithmeticFault) throw comptimeError(e.message, at);
      throw e;
    }
    throw internalError(`cannot cast a ${value.kind} value`, at);
  }
}

function buildAggregate(aggregate: Aggregate, values: ComptimeValue[]): ComptimeValue {
  switch (aggregate.kind) {
    case "struct":
      return structValue(
        aggregate.type,
        aggregate.fields.map((name, i) => ({ name, value: values[i] }))
      );
    case "enum":
      return enumValue(aggregate.type, aggregate.variant, aggregate.name, values);
    case "array":
      return arrayValue(values);
  }
}

function isCompare(op: ArithOp | CompareOp): op is CompareOp {
  return op === "eq" || op === "ne" || op === "lt" || op === "le" || op === "gt" || op === "ge";
}
