/**
 * Program - the growing set of declarations, MIR functions and comptime
 * call sites.
 *
 * Items arrive in batches: the hand-written sources first, then every chunk
 * of inserted code. Names resolve through a chain of scopes (function scope,
 * then the scope the function was declared in, up to the module). Items that
 * mention a name nothing defines yet are deferred and retried after each
 * insertion round; whatever is still unresolved at the end is reported.
 */

import { ConstItem, EnumItem, FnItem, ImplItem, Item, StructItem, TraitItem } from "../ast/ast";
import { CompileError, Span, collectErrors, resolveError, typeError } from "../diagnostics/errors";
import { MirFunction, Scope } from "../mir/mir";
import { formatType } from "../types/format";
import { MethodSig, Type, TypeTable, UNIT, namedType } from "../types/types";
import { FunctionLowerer, LoweredSite, assignable, comptimeCallsOf, lowerCallSite, resolveTypeExpr } from "./lower";
import { CallSite, FnSignature, LowerContext, UnresolvedNameError, ValueBinding, qualify, spanKey } from "./symbols";

type Task =
  | { kind: "types"; items: (StructItem | EnumItem | TraitItem)[]; scope: Scope }
  | { kind: "signature"; item: FnItem; scope: Scope }
  | { kind: "impl"; item: ImplItem; scope: Scope }
  | { kind: "const"; item: ConstItem; scope: Scope }
  | { kind: "body"; item: FnItem; id: string; method: boolean; scope: Scope }
  | { kind: "comptime"; item: Extract<Item, { kind: "comptime" }>; scope: Scope };

type Deferred = { task: Task; error: UnresolvedNameError };

export type ConstInfo = { name: string; type: Type; site: string; span: Span };

export class Program implements LowerContext {
  readonly types = new TypeTable();
  readonly functions = new Map<string, MirFunction>();
  readonly sites = new Map<string, CallSite>();
  readonly consts = new Map<string, ConstInfo>();

  private readonly signatures = new Map<string, FnSignature>();
  private readonly values = new Map<string, ValueBinding & { span: Span }>();
  private readonly parents = new Map<string, Scope>();
  private readonly pendingTypes = new Set<string>();
  private readonly early = new Map<string, CallSite>();
  private deferred: Deferred[] = [];
  private fresh: CallSite[] = [];
  private siteCounter = 0;

  // ============================================
  // Adding items
  // ============================================

  /**
   * Declare, check and lower a batch of items in `scope`. Returns the errors
   * that cannot be fixed by later insertions.
   */
  addItems(items: Item[], scope: Scope): CompileError[] {
    const types: (StructItem | EnumItem | TraitItem)[] = [];
    const tasks: Task[] = [];
    for (const item of items) {
      switch (item.kind) {
        case "struct":
        case "enum":
        case "trait":
          types.push(item);
          break;
        case "fn":
          tasks.push({ kind: "signature", item, scope });
          break;
        case "impl":
          tasks.push({ kind: "impl", item, scope });
          break;
        case "const":
          tasks.push({ kind: "const", item, scope });
          break;
        case "comptime":
          tasks.push({ kind: "comptime", item, scope });
          break;
      }
    }
    if (types.length > 0) tasks.unshift({ kind: "types", items: types, scope });
    tasks.sort((a, b) => TASK_ORDER[a.kind] - TASK_ORDER[b.kind]);

    const errors: CompileError[] = [];
    for (const task of tasks) {
      this.attempt(task, errors);
    }
    return errors;
  }

  /**
   * Retry deferred items until none of them makes progress.
   */
  recheckDeferred(): CompileError[] {
    const errors: CompileError[] = [];
    let progress = true;
    while (progress && this.deferred.length > 0) {
      const waiting = [...this.deferred].sort((a, b) => TASK_ORDER[a.task.kind] - TASK_ORDER[b.task.kind]);
      this.deferred = [];
      for (const entry of waiting) {
        this.attempt(entry.task, errors);
      }
      progress = this.deferred.length < waiting.length;
    }
    return errors;
  }

  /**
   * No more code can arrive: every deferred item is an error now.
   */
  finalize(): CompileError[] {
    const errors = this.deferred.map((d) => d.error);
    this.deferred = [];
    return errors;
  }

  hasDeferred(): boolean {
    return this.deferred.length > 0;
  }

  /** Call sites registered since the last call, in registration order. */
  takeNewSites(): CallSite[] {
    const sites = this.fresh;
    this.fresh = [];
    return sites;
  }

  private attempt(task: Task, errors: CompileError[]): void {
    try {
      this.run(task, errors);
    } catch (e) {
      if (e instanceof UnresolvedNameError) {
        this.deferred.push({ task, error: e });
        if (task.kind === "body") this.registerEarlySites(task);
        return;
      }
      errors.push(...collectErrors(e, taskSpan(task)));
    }
  }

  /**
   * A deferred body may be waiting on names its own `comptime` calls insert.
   * Register every such call whose callee and arguments already resolve, so
   * it runs before the body is retried. The retried body reuses the site.
   */
  private registerEarlySites(task: Extract<Task, { kind: "body" }>): void {
    const params = task.item.hasSelf ? ["self", ...task.item.params.map((p) => p.name)] : task.item.params.map((p) => p.name);
    const { calls, locals } = comptimeCallsOf(params, task.item.body);
    const scope: Scope = { kind: "function", fn: task.id };
    for (const call of calls) {
      const key = spanKey(call.span);
      if (this.early.has(key)) continue;
      let lowered: LoweredSite;
      try {
        lowered = lowerCallSite(this, call, scope, { kind: "inline", fn: task.id }, locals);
      } catch (e) {
        // Reported when the body itself is lowered.
        if (e instanceof CompileError) continue;
        throw e;
      }
      this.early.set(key, lowered.site);
      this.commit(lowered.thunks, lowered.sites);
    }
  }

  private run(task: Task, errors: CompileError[]): void {
    switch (task.kind) {
      case "types":
        return this.declareTypes(task.items, task.scope, errors);
      case "signature":
        return this.declareFunction(task.item, task.scope, errors);
      case "impl":
        return this.declareImpl(task.item, task.scope, errors);
      case "const":
        return this.declareConst(task.item, task.scope);
      case "body":
        return this.lowerBody(task);
      case "comptime": {
        const lowered = lowerCallSite(this, task.item.call, task.scope, { kind: "statement" });
        this.commit(lowered.thunks, lowered.sites);
        return;
      }
    }
  }

  // ============================================
  // Declarations
  // ============================================

  private declareTypes(items: (StructItem | EnumItem | TraitItem)[], scope: Scope, errors: CompileError[]): void {
    for (const item of items) {
      this.pendingTypes.add(qualify(scope, item.name));
    }
    // Types of one batch may refer to each other in any order.
    const failed: Deferred[] = [];
    try {
      for (const item of items) {
        try {
          this.declareType(item, scope);
        } catch (e) {
          if (e instanceof UnresolvedNameError) {
            failed.push({ task: { kind: "types", items: [item], scope }, error: e });
          } else {
            errors.push(...collectErrors(e, item.span));
          }
        }
      }
    } finally {
      this.pendingTypes.clear();
    }
    this.deferred.push(...failed);
  }

  private declareType(item: StructItem | EnumItem | TraitItem, scope: Scope): void {
    const name = qualify(scope, item.name);
    switch (item.kind) {
      case "struct": {
        const seen = new Set<string>();
        const fields = item.fields.map((f) => {
          if (seen.has(f.name)) throw resolveError(`Field '${f.name}' is declared twice in '${item.name}'`, f.span);
          seen.add(f.name);
          return { name: f.name, type: resolveTypeExpr(this, f.type, scope, item.typeParams) };
        });
        this.types.define({ kind: "struct", name, typeParams: item.typeParams, fields, span: item.span });
        return;
      }
      case "enum": {
        const seen = new Set<string>();
        const variants = item.variants.map((v) => {
          if (seen.has(v.name)) throw resolveError(`Variant '${v.name}' is declared twice in '${item.name}'`, v.span);
          seen.add(v.name);
          return { name: v.name, fields: v.fields.map((f) => resolveTypeExpr(this, f, scope, item.typeParams)) };
        });
        this.types.define({ kind: "enum", name, typeParams: item.typeParams, variants, span: item.span });
        return;
      }
      case "trait": {
        const methods: MethodSig[] = item.methods.map((m) => ({
          name: m.name,
          hasSelf: m.hasSelf,
          params: m.params.map((p) => resolveTypeExpr(this, p.type, scope)),
          ret: m.ret ? resolveTypeExpr(this, m.ret, scope) : UNIT,
        }));
        this.types.define({ kind: "trait", name, methods, span: item.span });
        return;
      }
    }
  }

  private declareFunction(item: FnItem, scope: Scope, errors: CompileError[]): void {
    const id = qualify(scope, item.name);
    this.checkFreeValue(id, item.nameSpan);
    const params = item.params.map((p) => resolveTypeExpr(this, p.type, scope));
    const ret = item.ret ? resolveTypeExpr(this, item.ret, scope) : UNIT;
    if (item.hasSelf) throw typeError(`'self' parameter outside of an impl block`, item.nameSpan);
    this.registerFunction({ id, params, ret, pub: item.pub, span: item.span, nameSpan: item.nameSpan }, scope);
    this.values.set(id, { kind: "fn", id, type: { kind: "fn", params, ret }, span: item.nameSpan });
    this.attempt({ kind: "body", item, id, method: false, scope }, errors);
  }

  private declareImpl(item: ImplItem, scope: Scope, errors: CompileError[]): void {
    const target = this.lookupType(item.target, scope);
    const decl = target === undefined ? undefined : this.types.lookup(target);
    if (target === undefined || !decl) {
      throw new UnresolvedNameError(item.target, `Unknown type '${item.target}'`, item.span);
    }
    if (decl.kind === "trait") throw typeError(`Cannot implement methods on trait '${item.target}'`, item.span);
    const typeParams = decl.typeParams;
    const selfType = namedType(target, typeParams.map((p) => ({ kind: "param", name: p })));

    let requirements: MethodSig[] = [];
    if (item.trait !== undefined) {
      const traitName = this.lookupType(item.trait, scope);
      const trait = traitName === undefined ? undefined : this.types.lookup(traitName);
      if (traitName === undefined || !trait) {
        throw new UnresolvedNameError(item.trait, `Unknown trait '${item.trait}'`, item.span);
      }
      if (trait.kind !== "trait") throw typeError(`'${item.trait}' is not a trait`, item.span);
      requirements = trait.methods;
      const missing = requirements.filter((r) => !item.methods.some((m) => m.name === r.name));
      if (missing.length > 0) {
        throw typeError(
          `Missing trait method(s) ${missing.map((m) => `'${m.name}'`).join(", ")} in impl of '${item.trait}' for '${item.target}'`,
          item.span
        );
      }
    }

    const resolved = item.methods.map((m) => {
      const params = m.params.map((p) => resolveTypeExpr(this, p.type, scope, typeParams));
      const ret = m.ret ? resolveTypeExpr(this, m.ret, scope, typeParams) : UNIT;
      const requirement = requirements.find((r) => r.name === m.name);
      if (item.trait !== undefined && !requirement) {
        throw typeError(`'${m.name}' is not a member of trait '${item.trait}'`, m.nameSpan);
      }
      if (requirement && !sameSignature(requirement, m.hasSelf, params, ret)) {
        throw typeError(`Method '${m.name}' does not match its declaration in trait '${item.trait}'`, m.nameSpan);
      }
      return { item: m, params, ret };
    });

    for (const { item: m, params, ret } of resolved) {
      const id = `${target}::${m.name}`;
      this.types.addMethod(target, { name: m.name, hasSelf: m.hasSelf, params, ret, fnId: id }, m.nameSpan);
      const allParams = m.hasSelf ? [selfType, ...params] : params;
      this.registerFunction({ id, params: allParams, ret, pub: m.pub, span: m.span, nameSpan: m.nameSpan }, scope);
    }
    if (item.trait !== undefined) {
      this.types.addTraitImpl(target, this.lookupType(item.trait, scope) ?? item.trait);
    }
    for (const { item: m } of resolved) {
      this.attempt({ kind: "body", item: m, id: `${target}::${m.name}`, method: true, scope }, errors);
    }
  }

  private declareConst(item: ConstItem, scope: Scope): void {
    const name = qualify(scope, item.name);
    this.checkFreeValue(name, item.span);
    const annotated = item.type ? resolveTypeExpr(this, item.type, scope) : undefined;

    let siteId: string;
    let type: Type;
    if (item.value.kind === "call" && item.value.comptime) {
      const lowered = lowerCallSite(this, item.value, scope, { kind: "const", name });
      type = annotated ?? lowered.site.resultType;
      if (!assignable(lowered.site.resultType, type)) {
        throw typeError(
          `Mismatched types: expected '${formatType(type)}', found '${formatType(lowered.site.resultType)}'`,
          item.value.span
        );
      }
      this.commit(lowered.thunks, lowered.sites);
      siteId = lowered.site.id;
    } else {
      const lowerer = new FunctionLowerer(this, {
        id: `${name}::init`,
        name: `${item.name}::init`,
        kind: "thunk",
        pub: false,
        lexical: scope,
        declScope: scope,
        span: item.value.span,
        returnType: annotated,
      });
      const unit = lowerer.lowerThunk(item.value);
      type = unit.fn.returnType;
      const { id, order } = this.reserveSiteId();
      const site: CallSite = {
        id,
        order,
        span: item.value.span,
        scope,
        callee: unit.fn.id,
        args: [],
        resultType: type,
        owner: { kind: "const", name },
      };
      this.commit([unit.fn, ...unit.thunks], [site, ...unit.sites]);
      siteId = id;
    }
    this.values.set(name, { kind: "const", name, type, span: item.span });
    this.consts.set(name, { name, type, site: siteId, span: item.span });
  }

  private lowerBody(task: Extract<Task, { kind: "body" }>): void {
    const sig = this.signatures.get(task.id);
    if (!sig) throw new UnresolvedNameError(task.id, `Unknown function '${task.id}'`, task.item.nameSpan);
    const item = task.item;
    const lowerer = new FunctionLowerer(this, {
      id: task.id,
      name: item.name,
      kind: task.method ? "method" : "fn",
      pub: item.pub,
      lexical: { kind: "function", fn: task.id },
      declScope: task.scope,
      span: item.span,
      returnType: sig.ret,
    });
    const offset = item.hasSelf ? 1 : 0;
    const params = item.params.map((p, i) => ({ name: p.name, type: sig.params[i + offset] }));
    if (item.hasSelf) params.unshift({ name: "self", type: sig.params[0] });
    const unit = lowerer.lowerBody(params, item.body);
    this.commit([unit.fn, ...unit.thunks], unit.sites);
  }

  private registerFunction(sig: FnSignature, scope: Scope): void {
    this.signatures.set(sig.id, sig);
    this.parents.set(sig.id, scope);
  }

  private checkFreeValue(name: string, at: Span): void {
    const existing = this.values.get(name);
    if (existing) {
      throw resolveError(`'${name}' is already defined`, at).addNote("previous definition here", existing.span);
    }
  }

  private commit(functions: MirFunction[], sites: CallSite[]): void {
    for (const fn of functions) {
      this.functions.set(fn.id, fn);
    }
    for (const site of sites) {
      this.sites.set(site.id, site);
      this.fresh.push(site);
    }
  }

  // ============================================
  // LowerContext
  // ============================================

  lookupType(name: string, scope: Scope): string | undefined {
    for (const s of this.chain(scope)) {
      const qualified = qualify(s, name);
      if (this.types.has(qualified) || this.pendingTypes.has(qualified)) return qualified;
    }
    return undefined;
  }

  lookupValue(name: string, scope: Scope): ValueBinding | undefined {
    for (const s of this.chain(scope)) {
      const binding = this.values.get(qualify(s, name));
      if (binding) return binding;
    }
    return undefined;
  }

  lookupMethod(typeName: string, method: string): { id: string; sig: MethodSig } | undefined {
    const sig = this.types.methodsOf(typeName).find((m) => m.name === method);
    if (!sig?.fnId) return undefined;
    return { id: sig.fnId, sig };
  }

  signature(fnId: string): FnSignature | undefined {
    return this.signatures.get(fnId);
  }

  reserveSiteId(): { id: string; order: number } {
    const order = this.siteCounter++;
    return { id: `site#${order}`, order };
  }

  registeredSite(at: Span): CallSite | undefined {
    return this.early.get(spanKey(at));
  }

  /** `scope`, then each enclosing declaration scope out to the module. */
  chain(scope: Scope): Scope[] {
    const out: Scope[] = [scope];
    let current = scope;
    while (current.kind === "function") {
      current = this.parents.get(current.fn) ?? { kind: "module" };
      out.push(current);
    }
    return out;
  }

  /** Sites in registration order. */
  siteList(): CallSite[] {
    return [...this.sites.values()].sort((a, b) => a.order - b.order);
  }
}

const TASK_ORDER: Record<Task["kind"], number> = {
  types: 0,
  signature: 1,
  impl: 2,
  const: 3,
  body: 4,
  comptime: 5,
};

function taskSpan(task: Task): Span {
  switch (task.kind) {
    case "types":
      return task.items[0].span;
    case "body":
    case "signature":
    case "impl":
    case "const":
    case "comptime":
      return task.item.span;
  }
}

function sameSignature(requirement: MethodSig, hasSelf: boolean, params: Type[], ret: Type): boolean {
  return (
    requirement.hasSelf === hasSelf &&
    requirement.params.length === params.length &&
    requirement.params.every((p, i) => formatType(p) === formatType(params[i])) &&
    formatType(requirement.ret) === formatType(ret)
  );
}
