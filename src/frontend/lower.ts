/**
 * Type checking and lowering of function bodies to MIR.
 *
 * One FunctionLowerer handles one body. It checks types as it goes and
 * emits basic blocks; a `comptime f(args)` call inside the body becomes a
 * call site whose arguments are lowered into separate thunk functions.
 */

import { Block, Expr, MatchArm, Pattern, Stmt, TypeExpr } from "../ast/ast";
import { CompileError, Span, resolveError, typeError } from "../diagnostics/errors";
import { formatType } from "../types/format";
import {
  BOOL,
  CHAR,
  CODE,
  I64,
  META,
  NEVER,
  PRIMITIVE_TYPES,
  STR,
  Type,
  U64,
  UNIT,
  EnumDecl,
  StructDecl,
  F64,
  namedType,
  substitute,
  typeEquals,
} from "../types/types";
import {
  ComptimeValue,
  UNIT_VALUE,
  boolValue,
  charValue,
  closureValue,
  floatValue,
  intValue,
  strValue,
  typeValue,
} from "../comptime/value";
import {
  BasicBlock,
  BinOp,
  BlockId,
  IntrinsicName,
  Local,
  LocalId,
  MirFunction,
  Operand,
  Place,
  Rvalue,
  Scope,
  Statement,
  Terminator,
  copy,
  place,
} from "../mir/mir";
import { CallSite, LowerContext, UnresolvedNameError, ValueBinding } from "./symbols";

// ============================================
// Type expressions
// ============================================

export function primitiveType(name: string): Type | undefined {
  return PRIMITIVE_TYPES.get(name);
}

/**
 * Resolve a written type in `scope`. `typeParams` are the generic parameters
 * in scope (of the enclosing struct or enum declaration).
 */
export function resolveTypeExpr(ctx: LowerContext, te: TypeExpr, scope: Scope, typeParams: readonly string[] = []): Type {
  switch (te.kind) {
    case "unit":
      return UNIT;
    case "array":
      return { kind: "array", element: resolveTypeExpr(ctx, te.element, scope, typeParams), length: te.length };
    case "slice":
      return { kind: "slice", element: resolveTypeExpr(ctx, te.element, scope, typeParams) };
    case "fn":
      return {
        kind: "fn",
        params: te.params.map((p) => resolveTypeExpr(ctx, p, scope, typeParams)),
        ret: resolveTypeExpr(ctx, te.ret, scope, typeParams),
      };
    case "named": {
      if (te.args.length === 0 && typeParams.includes(te.name)) {
        return { kind: "param", name: te.name };
      }
      const primitive = primitiveType(te.name);
      if (primitive) {
        if (te.args.length > 0) throw typeError(`Type '${te.name}' takes no type arguments`, te.span);
        return primitive;
      }
      const qualified = ctx.lookupType(te.name, scope);
      if (qualified === undefined) {
        throw new UnresolvedNameError(te.name, `Unknown type '${te.name}'`, te.span);
      }
      // Undefined while its own declaration batch is being processed.
      const decl = ctx.types.lookup(qualified);
      const expected = !decl ? te.args.length : decl.kind === "trait" ? 0 : decl.typeParams.length;
      if (te.args.length !== expected) {
        throw typeError(
          `Type '${te.name}' expects ${expected} type argument(s), found ${te.args.length}`,
          te.span
        );
      }
      return namedType(
        qualified,
        te.args.map((a) => resolveTypeExpr(ctx, a, scope, typeParams))
      );
    }
  }
}

// ============================================
// Type relations
// ============================================

/**
 * Whether a value of type `from` may be used where `to` is expected.
 * Fixed-size arrays coerce to slices; `never` coerces to anything.
 */
export function assignable(from: Type, to: Type): boolean {
  if (from.kind === "never") return true;
  if (from.kind === "array" && to.kind === "slice") return typeEquals(from.element, to.element);
  return typeEquals(from, to);
}

/**
 * Bind type parameters in `pattern` so that it matches `actual`.
 */
export function unify(pattern: Type, actual: Type, bindings: Map<string, Type>): boolean {
  switch (pattern.kind) {
    case "param": {
      const bound = bindings.get(pattern.name);
      if (bound) return assignable(actual, bound);
      bindings.set(pattern.name, actual);
      return true;
    }
    case "array":
      return actual.kind === "array" && actual.length === pattern.length && unify(pattern.element, actual.element, bindings);
    case "slice":
      return (actual.kind === "slice" || actual.kind === "array") && unify(pattern.element, actual.element, bindings);
    case "named":
      return (
        actual.kind === "named" &&
        actual.name === pattern.name &&
        actual.args.length === pattern.args.length &&
        pattern.args.every((a, i) => unify(a, actual.args[i], bindings))
      );
    case "fn":
      return (
        actual.kind === "fn" &&
        actual.params.length === pattern.params.length &&
        pattern.params.every((p, i) => unify(p, actual.params[i], bindings)) &&
        unify(pattern.ret, actual.ret, bindings)
      );
    default:
      return assignable(actual, pattern);
  }
}

function containsParam(type: Type): boolean {
  switch (type.kind) {
    case "param":
      return true;
    case "array":
    case "slice":
      return containsParam(type.element);
    case "named":
      return type.args.some(containsParam);
    case "fn":
      return type.params.some(containsParam) || containsParam(type.ret);
    default:
      return false;
  }
}

function bindingsFor(typeParams: readonly string[], args: readonly Type[]): Map<string, Type> {
  const bindings = new Map<string, Type>();
  typeParams.forEach((p, i) => {
    const arg = args[i];
    if (arg) bindings.set(p, arg);
  });
  return bindings;
}

function mismatch(expected: Type, found: Type, at: Span): CompileError {
  return typeError(`Mismatched types: expected '${formatType(expected)}', found '${formatType(found)}'`, at);
}

const INTRINSICS: readonly IntrinsicName[] = [
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
  "panic",
  "assert",
  "to_string",
  "len",
];

const REFLECTION_INTRINSICS: readonly IntrinsicName[] = ["type_info", "type_name", "size_of", "align_of", "type_of"];

const ARITHMETIC: Partial<Record<string, BinOp>> = {
  "+": "add",
  "-": "sub",
  "*": "mul",
  "/": "div",
  "%": "rem",
};

const BITWISE: Partial<Record<string, BinOp>> = {
  "&": "bitand",
  "|": "bitor",
  "^": "bitxor",
};

const SHIFTS: Partial<Record<string, BinOp>> = {
  "<<": "shl",
  ">>": "shr",
};

const COMPARISONS: Partial<Record<string, BinOp>> = {
  "==": "eq",
  "!=": "ne",
  "<": "lt",
  "<=": "le",
  ">": "gt",
  ">=": "ge",
};

function isUntypedLiteral(expr: Expr): boolean {
  if (expr.kind === "int" || expr.kind === "float") return expr.suffix === undefined;
  if (expr.kind === "unary" && expr.op === "-") return isUntypedLiteral(expr.operand);
  return false;
}

function isIrrefutable(pattern: Pattern): boolean {
  return pattern.kind === "wildcard" || pattern.kind === "binding";
}

// ============================================
// Function lowering
// ============================================

export type LowerTarget = {
  id: string;
  name: string;
  kind: MirFunction["kind"];
  pub: boolean;
  /** Scope whose items the body sees first. */
  lexical: Scope;
  /** Scope the function is declared in. */
  declScope: Scope;
  span: Span;
  /** Absent for const initializers, whose type is inferred. */
  returnType?: Type;
  /** Names of enclosing locals, which thunk bodies may not capture. */
  outerLocals?: ReadonlySet<string>;
};

export type LoweredUnit = {
  fn: MirFunction;
  /** Thunks created for comptime call sites inside the body. */
  thunks: MirFunction[];
  sites: CallSite[];
};

type Typed = { operand: Operand; type: Type };

type LocalBinding = { local: LocalId; type: Type; mutable: boolean };

type PlaceRef = { place: Place; type: Type; mutable: boolean; root: string };

type PendingBlock = { id: BlockId; statements: Statement[]; terminator?: Terminator };

type LoopFrame = { breakTarget: BlockId; continueTarget: BlockId; hasBreak: boolean };

export type CallExpr = Extract<Expr, { kind: "call" }>;

export class FunctionLowerer {
  private readonly locals: Local[] = [];
  private readonly blocks: PendingBlock[] = [];
  private current: PendingBlock;
  private reachable = true;
  private readonly scopes: Map<string, LocalBinding>[] = [];
  private readonly loops: LoopFrame[] = [];
  private readonly userLocals = new Set<LocalId>();
  private readonly thunks: MirFunction[] = [];
  private readonly sites: CallSite[] = [];
  private returnType: Type | undefined;

  constructor(private readonly ctx: LowerContext, private readonly target: LowerTarget) {
    this.returnType = target.returnType;
    this.newLocal("return", target.returnType ?? UNIT);
    this.current = this.newBlock();
  }

  /**
   * Lower a function body over its (already resolved) parameters.
   */
  lowerBody(params: { name: string; type: Type }[], body: Block): LoweredUnit {
    const returnType = this.returnType ?? UNIT;
    this.scopes.push(new Map());
    const paramIds = params.map((p) => this.declare(p.name, p.type, false));
    const result = this.lowerBlock(body, returnType);
    if (this.reachable) {
      this.expectAssignable(result.type, returnType, body.tail?.span ?? body.span);
      this.assign(place(0), { kind: "use", operand: result.operand }, body.span);
      this.terminate({ kind: "return", span: body.span });
    }
    this.scopes.pop();
    return this.finish(paramIds);
  }

  /**
   * Lower a single expression as a zero-parameter function returning it.
   */
  lowerThunk(expr: Expr): LoweredUnit {
    this.scopes.push(new Map());
    const result = this.lowerExpr(expr, this.returnType);
    if (this.returnType) {
      this.expectAssignable(result.type, this.returnType, expr.span);
    } else {
      this.returnType = result.type;
      this.locals[0] = { ...this.locals[0], type: result.type };
    }
    if (this.reachable) {
      this.assign(place(0), { kind: "use", operand: result.operand }, expr.span);
      this.terminate({ kind: "return", span: expr.span });
    }
    this.scopes.pop();
    return this.finish([]);
  }

  private finish(params: LocalId[]): LoweredUnit {
    const blocks: BasicBlock[] = this.blocks.map((b) => ({
      id: b.id,
      statements: b.statements,
      terminator: b.terminator ?? { kind: "unreachable", reason: "diverge", span: this.target.span },
    }));
    const fn: MirFunction = {
      id: this.target.id,
      name: this.target.name,
      kind: this.target.kind,
      pub: this.target.pub,
      params,
      returnType: this.returnType ?? UNIT,
      locals: this.locals,
      blocks,
      scope: this.target.declScope,
      span: this.target.span,
    };
    return { fn, thunks: this.thunks, sites: this.sites };
  }

  // ============================================
  // Blocks, locals and scopes
  // ============================================

  private newLocal(name: string, type: Type): LocalId {
    const id = this.locals.length;
    this.locals.push({ id, name, type });
    return id;
  }

  private setLocalType(id: LocalId, type: Type): void {
    this.locals[id] = { ...this.locals[id], type };
  }

  private temp(type: Type): LocalId {
    return this.newLocal("tmp", type);
  }

  private declare(name: string, type: Type, mutable: boolean): LocalId {
    const local = this.newLocal(name, type);
    this.userLocals.add(local);
    const scope = this.scopes[this.scopes.length - 1];
    scope.set(name, { local, type, mutable });
    return local;
  }

  private lookupLocal(name: string): LocalBinding | undefined {
    for (let i = this.scopes.length - 1; i >= 0; i--) {
      const binding = this.scopes[i].get(name);
      if (binding) return binding;
    }
    return undefined;
  }

  private localNames(): Set<string> {
    const names = new Set(this.target.outerLocals ?? []);
    for (const scope of this.scopes) {
      for (const name of scope.keys()) names.add(name);
    }
    return names;
  }

  private newBlock(): PendingBlock {
    const block: PendingBlock = { id: this.blocks.length, statements: [] };
    this.blocks.push(block);
    return block;
  }

  private enter(block: PendingBlock, reachable = true): void {
    this.current = block;
    this.reachable = reachable;
  }

  private terminate(term: Terminator): void {
    if (!this.current.terminator) this.current.terminator = term;
  }

  /** End the current block with `term`; what follows is dead code. */
  private diverge(term: Terminator): void {
    this.terminate(term);
    this.enter(this.newBlock(), false);
  }

  private jump(target: PendingBlock, at: Span): void {
    this.terminate({ kind: "goto", target: target.id, span: at });
  }

  private assign(target: Place, rvalue: Rvalue, at: Span): void {
    this.current.statements.push({ kind: "assign", place: target, rvalue, span: at });
  }

  /** Evaluate into a fresh local so later code can project into it. */
  private materialize(value: Typed, at: Span): Place {
    if (value.operand.kind === "copy") return value.operand.place;
    const local = this.temp(value.type);
    this.assign(place(local), { kind: "use", operand: value.operand }, at);
    return place(local);
  }

  private expectAssignable(found: Type, expected: Type, at: Span): void {
    if (!assignable(found, expected)) throw mismatch(expected, found, at);
  }

  private lowerExpected(expr: Expr, expected: Type): Operand {
    const result = this.lowerExpr(expr, expected);
    this.expectAssignable(result.type, expected, expr.span);
    return result.operand;
  }

  private resolveType(te: TypeExpr): Type {
    return resolveTypeExpr(this.ctx, te, this.target.lexical);
  }

  // ============================================
  // Statements and blocks
  // ============================================

  private lowerBlock(block: Block, expected: Type | undefined): Typed {
    this.scopes.push(new Map());
    for (const stmt of block.stmts) {
      this.lowerStmt(stmt);
    }
    let result: Typed;
    if (block.tail) {
      result = this.lowerExpr(block.tail, expected);
    } else {
      result = { operand: { kind: "const", value: UNIT_VALUE }, type: this.reachable ? UNIT : NEVER };
    }
    this.scopes.pop();
    return result;
  }

  private lowerStmt(stmt: Stmt): void {
    if (stmt.kind === "expr") {
      this.lowerExpr(stmt.expr, undefined);
      return;
    }
    const annotated = stmt.type ? this.resolveType(stmt.type) : undefined;
    if (!stmt.value) {
      if (!annotated) throw typeError(`Type annotation needed for '${stmt.name}'`, stmt.span);
      this.declare(stmt.name, annotated, stmt.mutable);
      return;
    }
    const value = this.lowerExpr(stmt.value, annotated);
    if (annotated) this.expectAssignable(value.type, annotated, stmt.value.span);
    const type = annotated ?? value.type;
    // Declared after the initializer so `let x = x + 1` reads the outer `x`.
    const local = this.declare(stmt.name, type, stmt.mutable);
    this.assign(place(local), { kind: "use", operand: value.operand }, stmt.span);
  }

  // ============================================
  // Expressions
  // ============================================

  lowerExpr(expr: Expr, expected: Type | undefined): Typed {
    switch (expr.kind) {
      case "int":
        return this.lowerIntLiteral(expr.value, expr.suffix, expected, expr.span);
      case "float": {
        const type = expr.suffix ? this.suffixType(expr.suffix, expr.span) : expected?.kind === "float" ? expected : F64;
        if (type.kind !== "float") throw typeError(`Invalid suffix '${expr.suffix}' for a float literal`, expr.span);
        return { operand: constant(floatValue(expr.value, type.width)), type };
      }
      case "string":
        return { operand: constant(strValue(expr.value)), type: STR };
      case "char":
        return { operand: constant(charValue(expr.value)), type: CHAR };
      case "bool":
        return { operand: constant(boolValue(expr.value)), type: BOOL };
      case "unit":
        return { operand: constant(UNIT_VALUE), type: UNIT };
      case "path":
        return this.lowerPath(expr.segments, expected, expr.span);
      case "call":
        return expr.comptime ? this.lowerInlineSite(expr) : this.lowerCall(expr, expected);
      case "method":
        return this.lowerMethodCall(expr);
      case "field":
      case "index": {
        const ref = this.lowerPlace(expr);
        return { operand: copy(ref.place), type: ref.type };
      }
      case "struct":
        return this.lowerStructLiteral(expr, expected);
      case "array":
        return this.lowerArrayLiteral(expr, expected);
      case "unary":
        return this.lowerUnary(expr, expected);
      case "binary":
        return this.lowerBinary(expr, expected);
      case "cast":
        return this.lowerCast(expr);
      case "block":
        return this.lowerBlock(expr.block, expected);
      case "if":
        return this.lowerIf(expr, expected);
      case "while":
        return this.lowerWhile(expr);
      case "loop":
        return this.lowerLoop(expr);
      case "break":
      case "continue": {
        const frame = this.loops[this.loops.length - 1];
        if (!frame) throw typeError(`'${expr.kind}' outside of a loop`, expr.span);
        if (expr.kind === "break") frame.hasBreak = true;
        this.diverge({ kind: "goto", target: expr.kind === "break" ? frame.breakTarget : frame.continueTarget, span: expr.span });
        return { operand: constant(UNIT_VALUE), type: NEVER };
      }
      case "return": {
        if (!this.returnType) throw typeError("'return' is not allowed in a constant initializer", expr.span);
        const operand = expr.value ? this.lowerExpected(expr.value, this.returnType) : constant(UNIT_VALUE);
        if (!expr.value) this.expectAssignable(UNIT, this.returnType, expr.span);
        this.assign(place(0), { kind: "use", operand }, expr.span);
        this.diverge({ kind: "return", span: expr.span });
        return { operand: constant(UNIT_VALUE), type: NEVER };
      }
      case "assign": {
        const target = this.lowerPlace(expr.target);
        if (!target.mutable) {
          throw typeError(`Cannot assign to immutable binding '${target.root}'`, expr.target.span);
        }
        const value = this.lowerExpected(expr.value, target.type);
        this.assign(target.place, { kind: "use", operand: value }, expr.span);
        return { operand: constant(UNIT_VALUE), type: UNIT };
      }
      case "match":
        return this.lowerMatch(expr, expected);
      case "intrinsic":
        return this.lowerIntrinsic(expr);
    }
  }

  private suffixType(suffix: string, at: Span): Type {
    const type = primitiveType(suffix);
    if (!type || (type.kind !== "int" && type.kind !== "float")) {
      throw typeError(`Invalid literal suffix '${suffix}'`, at);
    }
    return type;
  }

  private lowerIntLiteral(value: bigint, suffix: string | undefined, expected: Type | undefined, at: Span): Typed {
    let type: Type = I64;
    if (suffix) type = this.suffixType(suffix, at);
    else if (expected?.kind === "int" || expected?.kind === "float") type = expected;
    if (type.kind === "float") return { operand: constant(floatValue(Number(value), type.width)), type };
    if (type.kind !== "int") return { operand: constant(intValue(value)), type: I64 };
    const magnitude = value < 0n ? -value : value;
    if (magnitude >= 1n << BigInt(type.width)) {
      throw typeError(`Literal out of range for '${formatType(type)}'`, at);
    }
    return { operand: constant(intValue(value, type.width, type.signed)), type };
  }

  // ============================================
  // Names
  // ============================================

  private lowerPath(segments: string[], expected: Type | undefined, at: Span): Typed {
    if (segments.length === 1) {
      const local = this.lookupLocal(segments[0]);
      if (local) return { operand: copy(place(local.local)), type: local.type };
    }
    if (segments.length >= 2) {
      const member = this.lowerTypeMember(segments, expected, at);
      if (member) return member;
    }
    const binding = this.lookupValue(segments.join("::"), at);
    return this.bindingOperand(binding);
  }

  private lookupValue(name: string, at: Span): ValueBinding {
    const binding = this.ctx.lookupValue(name, this.target.lexical);
    if (binding) return binding;
    if (this.target.outerLocals?.has(name)) {
      throw typeError(
        `Cannot use local '${name}' in a comptime call argument: arguments are evaluated at compile time`,
        at
      );
    }
    throw new UnresolvedNameError(name, `Unknown name '${name}'`, at);
  }

  private bindingOperand(binding: ValueBinding): Typed {
    if (binding.kind === "fn") {
      return { operand: constant(closureValue(binding.id)), type: binding.type };
    }
    return { operand: { kind: "global", name: binding.name, type: binding.type }, type: binding.type };
  }

  /**
   * `Enum::Variant` or `Type::method` used as a value.
   */
  private lowerTypeMember(segments: string[], expected: Type | undefined, at: Span): Typed | undefined {
    const head = segments.slice(0, -1).join("::");
    const member = segments[segments.length - 1];
    const typeName = this.ctx.lookupType(head, this.target.lexical);
    if (typeName === undefined) return undefined;
    const decl = this.ctx.types.lookup(typeName);
    if (decl?.kind === "enum") {
      return this.constructVariant(decl, member, [], expected, at);
    }
    const method = this.ctx.lookupMethod(typeName, member);
    if (!method) {
      throw new UnresolvedNameError(`${head}::${member}`, `No function '${member}' on type '${head}'`, at);
    }
    const sig = this.ctx.signature(method.id);
    if (!sig) throw new UnresolvedNameError(method.id, `Unknown function '${method.id}'`, at);
    return { operand: constant(closureValue(method.id)), type: { kind: "fn", params: sig.params, ret: sig.ret } };
  }

  private constructVariant(decl: EnumDecl, name: string, args: Expr[], expected: Type | undefined, at: Span): Typed {
    const index = decl.variants.findIndex((v) => v.name === name);
    if (index < 0) throw typeError(`Enum '${decl.name}' has no variant '${name}'`, at);
    const variant = decl.variants[index];
    if (variant.fields.length !== args.length) {
      throw typeError(
        `Variant '${decl.name}::${name}' expects ${variant.fields.length} field(s), found ${args.length}`,
        at
      );
    }
    const bindings =
      expected?.kind === "named" && expected.name === decl.name
        ? bindingsFor(decl.typeParams, expected.args)
        : new Map<string, Type>();
    const operands = args.map((arg, i) => this.lowerGenericField(arg, variant.fields[i], bindings));
    const type = this.instantiate(decl, bindings, at);
    return this.aggregate({ kind: "enum", type, variant: index, name }, operands, type, at);
  }

  private lowerGenericField(arg: Expr, declared: Type, bindings: Map<string, Type>): Operand {
    const expected = substitute(declared, bindings);
    if (!containsParam(expected)) return this.lowerExpected(arg, expected);
    const value = this.lowerExpr(arg, undefined);
    if (!unify(expected, value.type, bindings)) throw mismatch(expected, value.type, arg.span);
    return value.operand;
  }

  private instantiate(decl: StructDecl | EnumDecl, bindings: Map<string, Type>, at: Span): Type {
    const args = decl.typeParams.map((p) => {
      const bound = bindings.get(p);
      if (!bound) throw typeError(`Cannot infer type parameter '${p}' of '${decl.name}'`, at);
      return bound;
    });
    return namedType(decl.name, args);
  }

  private aggregate(aggregate: Extract<Rvalue, { kind: "aggregate" }>["aggregate"], operands: Operand[], type: Type, at: Span): Typed {
    const local = this.temp(type);
    this.assign(place(local), { kind: "aggregate", aggregate, operands }, at);
    return { operand: copy(place(local)), type };
  }

  // ============================================
  // Calls
  // ============================================

  private lowerCall(expr: CallExpr, expected: Type | undefined): Typed {
    const callee = expr.callee;
    if (callee.kind === "path") {
      const segments = callee.segments;
      const local = segments.length === 1 ? this.lookupLocal(segments[0]) : undefined;
      if (!local && segments.length >= 2) {
        const head = segments.slice(0, -1).join("::");
        const typeName = this.ctx.lookupType(head, this.target.lexical);
        const decl = typeName === undefined ? undefined : this.ctx.types.lookup(typeName);
        if (decl?.kind === "enum") {
          return this.constructVariant(decl, segments[segments.length - 1], expr.args, expected, expr.span);
        }
      }
    }
    const fn = this.lowerExpr(callee, undefined);
    if (fn.type.kind !== "fn") {
      throw typeError(`Expected a function, found '${formatType(fn.type)}'`, callee.span);
    }
    return this.emitCall(fn.operand, fn.type.params, fn.type.ret, expr.args, [], expr.span);
  }

  private emitCall(callee: Operand, params: Type[], ret: Type, args: Expr[], leading: Operand[], at: Span): Typed {
    const expectedArgs = params.length - leading.length;
    if (args.length !== expectedArgs) {
      throw typeError(`Expected ${expectedArgs} argument(s), found ${args.length}`, at);
    }
    const operands = [...leading, ...args.map((arg, i) => this.lowerExpected(arg, params[i + leading.length]))];
    const destination = place(this.temp(ret));
    const next = this.newBlock();
    this.terminate({ kind: "call", callee, args: operands, destination, target: next.id, comptime: false, span: at });
    this.enter(next, ret.kind !== "never");
    return { operand: copy(destination), type: ret };
  }

  private lowerMethodCall(expr: Extract<Expr, { kind: "method" }>): Typed {
    const receiver = this.lowerExpr(expr.receiver, undefined);
    if (receiver.type.kind !== "named") {
      throw typeError(`No method '${expr.name}' on type '${formatType(receiver.type)}'`, expr.span);
    }
    const typeName = receiver.type.name;
    const method = this.ctx.lookupMethod(typeName, expr.name);
    if (!method) {
      throw new UnresolvedNameError(
        `${typeName}::${expr.name}`,
        `No method '${expr.name}' on type '${typeName}'`,
        expr.span
      );
    }
    if (!method.sig.hasSelf) {
      throw typeError(`'${typeName}::${expr.name}' is not a method; call it as '${typeName}::${expr.name}(..)'`, expr.span);
    }
    const sig = this.ctx.signature(method.id);
    if (!sig) throw new UnresolvedNameError(method.id, `Unknown function '${method.id}'`, expr.span);
    const decl = this.ctx.types.lookup(typeName);
    const bindings =
      decl && decl.kind !== "trait" ? bindingsFor(decl.typeParams, receiver.type.args) : new Map<string, Type>();
    const params = sig.params.map((p) => substitute(p, bindings));
    const ret = substitute(sig.ret, bindings);
    return this.emitCall(constant(closureValue(method.id)), params, ret, expr.args, [receiver.operand], expr.span);
  }

  private lowerInlineSite(expr: CallExpr): Typed {
    const registered = this.ctx.registeredSite(expr.span);
    if (registered) {
      return { operand: { kind: "site", site: registered.id, type: registered.resultType }, type: registered.resultType };
    }
    const lowered = lowerCallSite(this.ctx, expr, this.target.lexical, { kind: "inline", fn: this.target.id }, this.localNames());
    this.thunks.push(...lowered.thunks);
    this.sites.push(...lowered.sites);
    const type = lowered.site.resultType;
    return { operand: { kind: "site", site: lowered.site.id, type }, type };
  }

  // ============================================
  // Places
  // ============================================

  private lowerPlace(expr: Expr): PlaceRef {
    if (expr.kind === "path" && expr.segments.length === 1) {
      const local = this.lookupLocal(expr.segments[0]);
      if (local) {
        return { place: place(local.local), type: local.type, mutable: local.mutable, root: expr.segments[0] };
      }
    }
    if (expr.kind === "field") {
      const base = this.lowerPlace(expr.object);
      const type = this.fieldType(base.type, expr.name, expr.span);
      return { ...base, place: project(base.place, { kind: "field", name: expr.name }), type };
    }
    if (expr.kind === "index") {
      const base = this.lowerPlace(expr.object);
      if (base.type.kind !== "array" && base.type.kind !== "slice") {
        throw typeError(`Cannot index into a value of type '${formatType(base.type)}'`, expr.span);
      }
      const index = this.lowerExpr(expr.index, U64);
      if (index.type.kind !== "int") {
        throw typeError(`Array index must be an integer, found '${formatType(index.type)}'`, expr.index.span);
      }
      return { ...base, place: project(base.place, { kind: "index", index: index.operand }), type: base.type.element };
    }
    const value = this.lowerExpr(expr, undefined);
    return { place: this.materialize(value, expr.span), type: value.type, mutable: false, root: "temporary" };
  }

  private fieldType(type: Type, name: string, at: Span): Type {
    const decl = type.kind === "named" ? this.ctx.types.lookup(type.name) : undefined;
    if (type.kind !== "named" || decl?.kind !== "struct") {
      throw typeError(`No field '${name}' on type '${formatType(type)}'`, at);
    }
    const field = decl.fields.find((f) => f.name === name);
    if (!field) throw typeError(`Struct '${decl.name}' has no field '${name}'`, at);
    return substitute(field.type, bindingsFor(decl.typeParams, type.args));
  }

  // ============================================
  // Literals
  // ============================================

  private lowerStructLiteral(expr: Extract<Expr, { kind: "struct" }>, expected: Type | undefined): Typed {
    const typeName = this.ctx.lookupType(expr.name, this.target.lexical);
    if (typeName === undefined) throw new UnresolvedNameError(expr.name, `Unknown type '${expr.name}'`, expr.span);
    const decl = this.ctx.types.lookup(typeName);
    if (decl?.kind !== "struct") throw typeError(`'${expr.name}' is not a struct`, expr.span);

    for (const init of expr.fields) {
      if (!decl.fields.some((f) => f.name === init.name)) {
        throw typeError(`Struct '${expr.name}' has no field '${init.name}'`, init.span);
      }
      if (expr.fields.filter((f) => f.name === init.name).length > 1) {
        throw typeError(`Field '${init.name}' specified more than once`, init.span);
      }
    }
    const missing = decl.fields.filter((f) => !expr.fields.some((init) => init.name === f.name));
    if (missing.length > 0) {
      throw typeError(`Missing field(s) ${missing.map((f) => `'${f.name}'`).join(", ")} in '${expr.name}'`, expr.span);
    }

    const bindings =
      expected?.kind === "named" && expected.name === typeName
        ? bindingsFor(decl.typeParams, expected.args)
        : new Map<string, Type>();
    // Evaluated in source order, stored in declaration order.
    const values = new Map<string, Operand>();
    for (const init of expr.fields) {
      const declared = decl.fields.find((f) => f.name === init.name);
      if (!declared) continue;
      const operand = this.lowerGenericField(init.value, declared.type, bindings);
      values.set(init.name, this.pin(operand, substitute(declared.type, bindings), init.span));
    }
    const type = this.instantiate(decl, bindings, expr.span);
    const operands = decl.fields.map((f) => values.get(f.name) ?? constant(UNIT_VALUE));
    return this.aggregate({ kind: "struct", type, fields: decl.fields.map((f) => f.name) }, operands, type, expr.span);
  }

  /**
   * Keep an operand's value fixed while later expressions run: a copy of a
   * named local would observe later assignments to it.
   */
  private pin(operand: Operand, type: Type, at: Span): Operand {
    if (operand.kind !== "copy" || !this.userLocals.has(operand.place.local)) return operand;
    const local = this.temp(type);
    this.assign(place(local), { kind: "use", operand }, at);
    return copy(place(local));
  }

  private lowerArrayLiteral(expr: Extract<Expr, { kind: "array" }>, expected: Type | undefined): Typed {
    let element: Type | undefined =
      expected?.kind === "array" || expected?.kind === "slice" ? expected.element : undefined;
    const operands: Operand[] = [];
    for (const item of expr.elements) {
      const value = this.lowerExpr(item, element);
      if (element) this.expectAssignable(value.type, element, item.span);
      else element = value.type;
      operands.push(this.pin(value.operand, value.type, item.span));
    }
    if (!element) throw typeError("Cannot infer the element type of an empty array", expr.span);
    const type: Type = { kind: "array", element, length: expr.elements.length };
    return this.aggregate({ kind: "array" }, operands, type, expr.span);
  }

  // ============================================
  // Operators
  // ============================================

  private lowerUnary(expr: Extract<Expr, { kind: "unary" }>, expected: Type | undefined): Typed {
    if (expr.op === "-" && expr.operand.kind === "int") {
      return this.lowerIntLiteral(-expr.operand.value, expr.operand.suffix, expected, expr.span);
    }
    const value = this.lowerExpr(expr.operand, expected);
    const type = value.type;
    if (expr.op === "-" && type.kind !== "int" && type.kind !== "float") {
      throw typeError(`Cannot negate a value of type '${formatType(type)}'`, expr.span);
    }
    if (expr.op === "!" && type.kind !== "int" && type.kind !== "bool") {
      throw typeError(`Cannot apply '!' to a value of type '${formatType(type)}'`, expr.span);
    }
    const local = this.temp(type);
    this.assign(
      place(local),
      { kind: "unary", op: expr.op === "-" ? "neg" : "not", operand: value.operand, type },
      expr.span
    );
    return { operand: copy(place(local)), type };
  }

  /**
   * Lower both operands; an untyped literal on the left takes its type from
   * the right operand.
   */
  private lowerOperands(left: Expr, right: Expr, expected: Type | undefined): [Typed, Typed] {
    if (isUntypedLiteral(left) && !isUntypedLiteral(right)) {
      const r = this.lowerExpr(right, expected);
      const l = this.lowerExpr(left, r.type);
      return [l, r];
    }
    const l = this.lowerExpr(left, expected);
    return [{ ...l, operand: this.pin(l.operand, l.type, left.span) }, this.lowerExpr(right, l.type)];
  }

  private lowerBinary(expr: Extract<Expr, { kind: "binary" }>, expected: Type | undefined): Typed {
    if (expr.op === "&&" || expr.op === "||") return this.lowerShortCircuit(expr);

    const shift = SHIFTS[expr.op];
    if (shift) {
      const left = this.lowerExpr(expr.left, expected);
      const leftOperand = this.pin(left.operand, left.type, expr.left.span);
      const right = this.lowerExpr(expr.right, undefined);
      if (left.type.kind !== "int" || right.type.kind !== "int") {
        throw typeError(`Shifts need integer operands, found '${formatType(left.type)}' and '${formatType(right.type)}'`, expr.span);
      }
      return this.binary(shift, leftOperand, right.operand, left.type, left.type, expr.span);
    }

    const comparison = COMPARISONS[expr.op];
    const [left, right] = this.lowerOperands(expr.left, expr.right, comparison ? undefined : expected);
    if (!typeEquals(left.type, right.type) && left.type.kind !== "never" && right.type.kind !== "never") {
      throw typeError(
        `Mismatched operand types for '${expr.op}': '${formatType(left.type)}' and '${formatType(right.type)}'`,
        expr.span
      );
    }
    const type = left.type;

    if (comparison) {
      const ordered = comparison !== "eq" && comparison !== "ne";
      const comparable = ordered
        ? ["int", "float", "char", "str", "bool"].includes(type.kind)
        : type.kind !== "fn" && type.kind !== "code";
      if (!comparable) {
        throw typeError(`Cannot compare values of type '${formatType(type)}' with '${expr.op}'`, expr.span);
      }
      return this.binary(comparison, left.operand, right.operand, type, BOOL, expr.span);
    }

    const arithmetic = ARITHMETIC[expr.op];
    if (arithmetic) {
      const concat = arithmetic === "add" && type.kind === "str";
      if (!concat && type.kind !== "int" && type.kind !== "float") {
        throw typeError(`Cannot apply '${expr.op}' to values of type '${formatType(type)}'`, expr.span);
      }
      return this.binary(arithmetic, left.operand, right.operand, type, type, expr.span);
    }

    const bitwise = BITWISE[expr.op];
    if (bitwise && (type.kind === "int" || type.kind === "bool")) {
      return this.binary(bitwise, left.operand, right.operand, type, type, expr.span);
    }
    throw typeError(`Cannot apply '${expr.op}' to values of type '${formatType(type)}'`, expr.span);
  }

  private binary(op: BinOp, left: Operand, right: Operand, operandType: Type, resultType: Type, at: Span): Typed {
    const local = this.temp(resultType);
    this.assign(place(local), { kind: "binary", op, left, right, type: operandType }, at);
    return { operand: copy(place(local)), type: resultType };
  }

  private lowerShortCircuit(expr: Extract<Expr, { kind: "binary" }>): Typed {
    const result = this.temp(BOOL);
    const left = this.lowerExpected(expr.left, BOOL);
    const rhs = this.newBlock();
    const short = this.newBlock();
    const join = this.newBlock();
    const and = expr.op === "&&";
    this.terminate({
      kind: "switch",
      discr: left,
      cases: [{ value: 0n, target: and ? short.id : rhs.id }],
      otherwise: and ? rhs.id : short.id,
      span: expr.span,
    });

    this.enter(short);
    this.assign(place(result), { kind: "use", operand: constant(boolValue(!and)) }, expr.span);
    this.jump(join, expr.span);

    this.enter(rhs);
    const right = this.lowerExpected(expr.right, BOOL);
    this.assign(place(result), { kind: "use", operand: right }, expr.span);
    this.jump(join, expr.right.span);

    this.enter(join);
    return { operand: copy(place(result)), type: BOOL };
  }

  private lowerCast(expr: Extract<Expr, { kind: "cast" }>): Typed {
    const to = this.resolveType(expr.type);
    const value = this.lowerExpr(expr.expr, isUntypedLiteral(expr.expr) && to.kind === "float" ? to : undefined);
    const from = value.type;
    const ok =
      typeEquals(from, to) ||
      ((from.kind === "int" || from.kind === "float") && (to.kind === "int" || to.kind === "float")) ||
      ((from.kind === "bool" || from.kind === "char") && to.kind === "int") ||
      (from.kind === "int" && to.kind === "char" && !from.signed && (from.width === 8 || from.width === 32));
    if (!ok) {
      throw typeError(`Cannot cast '${formatType(from)}' to '${formatType(to)}'`, expr.span);
    }
    const local = this.temp(to);
    this.assign(place(local), { kind: "cast", operand: value.operand, from, to }, expr.span);
    return { operand: copy(place(local)), type: to };
  }

  // ============================================
  // Control flow
  // ============================================

  private lowerIf(expr: Extract<Expr, { kind: "if" }>, expected: Type | undefined): Typed {
    const cond = this.lowerExpected(expr.cond, BOOL);
    const thenBlock = this.newBlock();
    const elseBlock = this.newBlock();
    const join = this.newBlock();
    this.terminate({
      kind: "switch",
      discr: cond,
      cases: [{ value: 0n, target: elseBlock.id }],
      otherwise: thenBlock.id,
      span: expr.cond.span,
    });
    const result = this.temp(expected ?? UNIT);

    this.enter(thenBlock);
    const thenValue = this.lowerBlock(expr.then, expr.else ? expected : UNIT);
    const thenReachable = this.reachable;
    if (thenReachable) {
      this.assign(place(result), { kind: "use", operand: thenValue.operand }, expr.then.span);
      this.jump(join, expr.then.span);
    }

    this.enter(elseBlock);
    let type: Type;
    if (expr.else) {
      const elseExpected = thenValue.type.kind === "never" ? expected : thenValue.type;
      const elseValue = this.lowerExpr(expr.else, elseExpected);
      if (thenValue.type.kind === "never") {
        type = elseValue.type;
      } else {
        this.expectAssignable(elseValue.type, thenValue.type, expr.else.span);
        type = thenValue.type;
      }
      if (this.reachable) {
        this.assign(place(result), { kind: "use", operand: elseValue.operand }, expr.else.span);
        this.jump(join, expr.else.span);
      }
    } else {
      this.expectAssignable(thenValue.type, UNIT, expr.then.span);
      type = UNIT;
      this.jump(join, expr.then.span);
    }
    const joinReachable = thenReachable || this.reachable;
    this.setLocalType(result, type);
    this.enter(join, joinReachable);
    if (!joinReachable) return { operand: constant(UNIT_VALUE), type: NEVER };
    return { operand: copy(place(result)), type };
  }

  private lowerWhile(expr: Extract<Expr, { kind: "while" }>): Typed {
    const head = this.newBlock();
    const body = this.newBlock();
    const exit = this.newBlock();
    this.jump(head, expr.span);

    this.enter(head);
    const cond = this.lowerExpected(expr.cond, BOOL);
    this.terminate({
      kind: "switch",
      discr: cond,
      cases: [{ value: 0n, target: exit.id }],
      otherwise: body.id,
      span: expr.cond.span,
    });

    this.enter(body);
    this.loops.push({ breakTarget: exit.id, continueTarget: head.id, hasBreak: true });
    this.lowerBlock(expr.body, undefined);
    this.loops.pop();
    this.jump(head, expr.body.span);

    this.enter(exit);
    return { operand: constant(UNIT_VALUE), type: UNIT };
  }

  private lowerLoop(expr: Extract<Expr, { kind: "loop" }>): Typed {
    const body = this.newBlock();
    const exit = this.newBlock();
    this.jump(body, expr.span);

    this.enter(body);
    const frame: LoopFrame = { breakTarget: exit.id, continueTarget: body.id, hasBreak: false };
    this.loops.push(frame);
    this.lowerBlock(expr.body, undefined);
    this.loops.pop();
    this.jump(body, expr.body.span);

    this.enter(exit, frame.hasBreak);
    if (!frame.hasBreak) return { operand: constant(UNIT_VALUE), type: NEVER };
    return { operand: constant(UNIT_VALUE), type: UNIT };
  }

  // ============================================
  // Match
  // ============================================

  private lowerMatch(expr: Extract<Expr, { kind: "match" }>, expected: Type | undefined): Typed {
    const scrutinee = this.lowerExpr(expr.scrutinee, undefined);
    const subject = this.materialize(scrutinee, expr.scrutinee.span);
    this.checkExhaustive(expr.arms, scrutinee.type, expr.span);

    const result = this.temp(expected ?? UNIT);
    const join = this.newBlock();
    let resultType: Type | undefined = expected;
    let joinReachable = false;

    for (const arm of expr.arms) {
      const next = this.newBlock();
      this.scopes.push(new Map());
      this.lowerPattern(arm.pattern, subject, scrutinee.type, next);
      const body = this.lowerExpr(arm.body, resultType);
      if (resultType) {
        this.expectAssignable(body.type, resultType, arm.body.span);
      } else if (body.type.kind !== "never") {
        resultType = body.type;
      }
      if (this.reachable) {
        this.assign(place(result), { kind: "use", operand: body.operand }, arm.span);
        this.jump(join, arm.span);
        joinReachable = true;
      }
      this.scopes.pop();
      this.enter(next);
    }
    // Statically unreachable after the exhaustiveness check; guarded at run time.
    this.terminate({ kind: "unreachable", reason: "match", span: expr.span });

    const type = resultType ?? NEVER;
    this.setLocalType(result, type);
    this.enter(join, joinReachable);
    if (!joinReachable) return { operand: constant(UNIT_VALUE), type: NEVER };
    return { operand: copy(place(result)), type };
  }

  private checkExhaustive(arms: MatchArm[], type: Type, at: Span): void {
    if (arms.some((arm) => isIrrefutable(arm.pattern))) return;
    if (type.kind === "bool") {
      const covered = (value: boolean) =>
        arms.some((arm) => arm.pattern.kind === "literal" && arm.pattern.value.kind === "bool" && arm.pattern.value.value === value);
      if (covered(true) && covered(false)) return;
    }
    const decl = type.kind === "named" ? this.ctx.types.lookup(type.name) : undefined;
    if (decl?.kind === "enum") {
      const missing = decl.variants.filter(
        (variant) =>
          !arms.some(
            (arm) =>
              arm.pattern.kind === "variant" &&
              arm.pattern.path[arm.pattern.path.length - 1] === variant.name &&
              arm.pattern.fields.every(isIrrefutable)
          )
      );
      if (missing.length === 0) return;
      throw typeError(
        `Non-exhaustive match: ${missing.map((v) => `'${decl.name}::${v.name}'`).join(", ")} not covered`,
        at
      );
    }
    throw typeError(`Non-exhaustive match on '${formatType(type)}': add a '_' arm`, at);
  }

  /**
   * Test `pattern` against the value at `subject`, jumping to `fail` on a
   * mismatch and binding names in the current scope otherwise.
   */
  private lowerPattern(pattern: Pattern, subject: Place, type: Type, fail: PendingBlock): void {
    switch (pattern.kind) {
      case "wildcard":
        return;
      case "binding": {
        const local = this.declare(pattern.name, type, false);
        this.assign(place(local), { kind: "use", operand: copy(subject) }, pattern.span);
        return;
      }
      case "literal": {
        const literal = this.lowerExpected(pattern.value, type);
        const test = this.binary("eq", copy(subject), literal, type, BOOL, pattern.span);
        this.branch(test.operand, fail, pattern.span);
        return;
      }
      case "variant": {
        const decl = type.kind === "named" ? this.ctx.types.lookup(type.name) : undefined;
        if (type.kind !== "named" || decl?.kind !== "enum") {
          throw typeError(`Variant pattern on a value of type '${formatType(type)}'`, pattern.span);
        }
        if (pattern.path.length > 1) {
          const head = pattern.path.slice(0, -1).join("::");
          if (this.ctx.lookupType(head, this.target.lexical) !== decl.name) {
            throw typeError(`Pattern '${pattern.path.join("::")}' does not match type '${decl.name}'`, pattern.span);
          }
        }
        const name = pattern.path[pattern.path.length - 1];
        const index = decl.variants.findIndex((v) => v.name === name);
        if (index < 0) throw typeError(`Enum '${decl.name}' has no variant '${name}'`, pattern.span);
        const variant = decl.variants[index];
        if (variant.fields.length !== pattern.fields.length) {
          throw typeError(
            `Variant '${decl.name}::${name}' has ${variant.fields.length} field(s), pattern has ${pattern.fields.length}`,
            pattern.span
          );
        }
        const discr = this.temp(U64);
        this.assign(place(discr), { kind: "discriminant", place: subject }, pattern.span);
        const matched = this.newBlock();
        this.terminate({
          kind: "switch",
          discr: copy(place(discr)),
          cases: [{ value: BigInt(index), target: matched.id }],
          otherwise: fail.id,
          span: pattern.span,
        });
        this.enter(matched);
        const bindings = bindingsFor(decl.typeParams, type.args);
        pattern.fields.forEach((sub, i) => {
          if (sub.kind === "wildcard") return;
          const fieldType = substitute(variant.fields[i], bindings);
          const field = this.temp(fieldType);
          this.assign(place(field), { kind: "payload", place: subject, variant: index, index: i }, sub.span);
          this.lowerPattern(sub, place(field), fieldType, fail);
        });
        return;
      }
    }
  }

  /** Continue in a fresh block when `cond` holds, else go to `fail`. */
  private branch(cond: Operand, fail: PendingBlock, at: Span): void {
    const pass = this.newBlock();
    this.terminate({ kind: "switch", discr: cond, cases: [{ value: 0n, target: fail.id }], otherwise: pass.id, span: at });
    this.enter(pass);
  }

  // ============================================
  // Intrinsics
  // ============================================

  private lowerIntrinsic(expr: Extract<Expr, { kind: "intrinsic" }>): Typed {
    const name = INTRINSICS.find((n) => n === expr.name);
    if (!name) throw resolveUnknownIntrinsic(expr.name, expr.span);

    const arity = (min: number, max = min) => {
      if (expr.args.length < min || expr.args.length > max) {
        const count = min === max ? `${min}` : `${min} to ${max}`;
        throw typeError(`#${name} expects ${count} argument(s), found ${expr.args.length}`, expr.span);
      }
    };

    let args: Operand[];
    let ret: Type;
    if (REFLECTION_INTRINSICS.includes(name)) {
      arity(1);
      args = [this.lowerTypeArgument(expr.args[0], name === "type_of")];
      ret = reflectionResult(name);
    } else {
      switch (name) {
        case "insert": {
          arity(1);
          const code = this.lowerExpr(expr.args[0], CODE);
          if (code.type.kind !== "code" && code.type.kind !== "str") {
            throw typeError(`#insert expects 'Code' or 'str', found '${formatType(code.type)}'`, expr.args[0].span);
          }
          args = [code.operand];
          ret = UNIT;
          break;
        }
        case "code":
          arity(1);
          args = [this.lowerExpected(expr.args[0], STR)];
          ret = CODE;
          break;
        case "read_file":
        case "http_get":
          arity(1);
          args = [this.lowerExpected(expr.args[0], STR)];
          ret = namedType("IoResult");
          break;
        case "write_file":
          arity(2);
          args = [this.lowerExpected(expr.args[0], STR), this.lowerExpected(expr.args[1], STR)];
          ret = namedType("WriteResult");
          break;
        case "shell":
          arity(1);
          args = [this.lowerExpected(expr.args[0], STR)];
          ret = namedType("ShellResult");
          break;
        case "panic":
          arity(1);
          args = [this.lowerExpected(expr.args[0], STR)];
          ret = NEVER;
          break;
        case "assert":
          arity(1, 2);
          args = [this.lowerExpected(expr.args[0], BOOL)];
          args.push(expr.args[1] ? this.lowerExpected(expr.args[1], STR) : constant(strValue("assertion failed")));
          ret = UNIT;
          break;
        case "to_string":
          arity(1);
          args = [this.lowerExpr(expr.args[0], undefined).operand];
          ret = STR;
          break;
        default: {
          arity(1);
          const value = this.lowerExpr(expr.args[0], undefined);
          if (value.type.kind !== "array" && value.type.kind !== "slice" && value.type.kind !== "str") {
            throw typeError(`#len expects an array, slice or str, found '${formatType(value.type)}'`, expr.args[0].span);
          }
          args = [value.operand];
          ret = U64;
        }
      }
    }

    const destination = place(this.temp(ret));
    const next = this.newBlock();
    this.terminate({ kind: "intrinsic", name, args, destination, target: next.id, span: expr.span });
    this.enter(next, ret.kind !== "never");
    return { operand: copy(destination), type: ret };
  }

  /**
   * A reflection argument: a type name, or any expression of type `Type`.
   * For `#type_of`, any other expression stands for its static type.
   */
  private lowerTypeArgument(arg: Expr, staticType: boolean): Operand {
    if (arg.kind === "path" && !(arg.segments.length === 1 && this.lookupLocal(arg.segments[0]))) {
      const name = arg.segments.join("::");
      const primitive = primitiveType(name);
      if (primitive) return constant(typeValue(primitive));
      const typeName = this.ctx.lookupType(name, this.target.lexical);
      if (typeName !== undefined) return constant(typeValue(namedType(typeName)));
      if (!this.ctx.lookupValue(name, this.target.lexical)) {
        throw new UnresolvedNameError(name, `Unknown type '${name}'`, arg.span);
      }
    }
    const value = this.lowerExpr(arg, staticType ? undefined : META);
    if (value.type.kind === "meta") return value.operand;
    if (staticType) return constant(typeValue(value.type));
    throw mismatch(META, value.type, arg.span);
  }
}

function resolveUnknownIntrinsic(name: string, at: Span): CompileError {
  return resolveError(`Unknown intrinsic '#${name}'`, at).addNote(
    `available intrinsics: ${INTRINSICS.map((n) => `#${n}`).join(", ")}`
  );
}

function reflectionResult(name: IntrinsicName): Type {
  switch (name) {
    case "type_info":
      return namedType("TypeInfo");
    case "type_name":
      return STR;
    case "size_of":
    case "align_of":
      return U64;
    default:
      return META;
  }
}

function constant(value: ComptimeValue): Operand {
  return { kind: "const", value };
}

function project(base: Place, projection: Place["projections"][number]): Place {
  return { local: base.local, projections: [...base.projections, projection] };
}

// ============================================
// Call sites
// ============================================

export type LoweredSite = {
  site: CallSite;
  thunks: MirFunction[];
  /** The site itself followed by sites nested in its arguments. */
  sites: CallSite[];
};

/**
 * Lower `comptime f(args)`: resolve the callee and lower each argument
 * into a zero-parameter thunk that runs at compile time.
 */
export function lowerCallSite(
  ctx: LowerContext,
  call: Expr,
  scope: Scope,
  owner: CallSite["owner"],
  outerLocals: ReadonlySet<string> = new Set()
): LoweredSite {
  if (call.kind !== "call") throw typeError("Expected a call after 'comptime'", call.span);
  const calleeExpr = call.callee;
  if (calleeExpr.kind !== "path") {
    throw typeError("The callee of a comptime call must be a function name", calleeExpr.span);
  }
  const calleeName = calleeExpr.segments.join("::");
  const callee = resolveCallee(ctx, calleeExpr.segments, scope, calleeExpr.span);
  const sig = ctx.signature(callee);
  if (!sig) throw new UnresolvedNameError(callee, `Unknown function '${calleeName}'`, calleeExpr.span);
  if (sig.params.length !== call.args.length) {
    throw typeError(`'${calleeName}' expects ${sig.params.length} argument(s), found ${call.args.length}`, call.span);
  }

  const { id, order } = ctx.reserveSiteId();
  const thunks: MirFunction[] = [];
  const nested: CallSite[] = [];
  const args = call.args.map((arg, i) => {
    const lowerer = new FunctionLowerer(ctx, {
      id: `${id}::arg${i}`,
      name: `arg${i}`,
      kind: "thunk",
      pub: false,
      lexical: scope,
      declScope: scope,
      span: arg.span,
      returnType: sig.params[i],
      outerLocals,
    });
    const unit = lowerer.lowerThunk(arg);
    thunks.push(unit.fn, ...unit.thunks);
    nested.push(...unit.sites);
    return unit.fn.id;
  });

  const site: CallSite = { id, order, span: call.span, scope, callee, args, resultType: sig.ret, owner };
  return { site, thunks, sites: [site, ...nested] };
}

/**
 * The `comptime` calls of a body that are not nested in another one, and
 * every name the body binds locally.
 */
export function comptimeCallsOf(params: readonly string[], body: Block): { calls: CallExpr[]; locals: Set<string> } {
  const calls: CallExpr[] = [];
  const locals = new Set(params);

  const pattern = (p: Pattern): void => {
    if (p.kind === "binding") locals.add(p.name);
    if (p.kind === "variant") p.fields.forEach(pattern);
  };
  const block = (b: Block): void => {
    for (const stmt of b.stmts) {
      if (stmt.kind === "let") {
        locals.add(stmt.name);
        if (stmt.value) expr(stmt.value);
      } else {
        expr(stmt.expr);
      }
    }
    if (b.tail) expr(b.tail);
  };
  const expr = (e: Expr): void => {
    switch (e.kind) {
      case "call":
        if (e.comptime) {
          calls.push(e);
          return;
        }
        expr(e.callee);
        e.args.forEach(expr);
        return;
      case "method":
        expr(e.receiver);
        e.args.forEach(expr);
        return;
      case "field":
        return expr(e.object);
      case "index":
        expr(e.object);
        return expr(e.index);
      case "struct":
        return e.fields.forEach((f) => expr(f.value));
      case "array":
        return e.elements.forEach(expr);
      case "unary":
        return expr(e.operand);
      case "binary":
        expr(e.left);
        return expr(e.right);
      case "cast":
        return expr(e.expr);
      case "block":
        return block(e.block);
      case "if":
        expr(e.cond);
        block(e.then);
        if (e.else) expr(e.else);
        return;
      case "while":
        expr(e.cond);
        return block(e.body);
      case "loop":
        return block(e.body);
      case "return":
        if (e.value) expr(e.value);
        return;
      case "assign":
        expr(e.target);
        return expr(e.value);
      case "match":
        expr(e.scrutinee);
        for (const arm of e.arms) {
          pattern(arm.pattern);
          expr(arm.body);
        }
        return;
      case "intrinsic":
        return e.args.forEach(expr);
      case "int":
      case "float":
      case "string":
      case "char":
      case "bool":
      case "unit":
      case "path":
      case "break":
      case "continue":
        return;
    }
  };

  block(body);
  return { calls, locals };
}

function resolveCallee(ctx: LowerContext, segments: string[], scope: Scope, at: Span): string {
  if (segments.length >= 2) {
    const head = segments.slice(0, -1).join("::");
    const typeName = ctx.lookupType(head, scope);
    if (typeName !== undefined) {
      const method = ctx.lookupMethod(typeName, segments[segments.length - 1]);
      if (method) return method.id;
    }
  }
  const name = segments.join("::");
  const binding = ctx.lookupValue(name, scope);
  if (!binding) throw new UnresolvedNameError(name, `Unknown function '${name}'`, at);
  if (binding.kind !== "fn") throw typeError(`'${name}' is not a function`, at);
  return binding.id;
}
