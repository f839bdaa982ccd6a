/**
 * Symbols shared between the program tables and function lowering.
 */

import { CompileError, Span } from "../diagnostics/errors";
import { Scope } from "../mir/mir";
import { MethodSig, Type, TypeTable } from "../types/types";

export type FnSignature = {
  id: string;
  params: Type[]; // including `self` for methods
  ret: Type;
  pub: boolean;
  span: Span;
  nameSpan: Span;
};

export type ValueBinding =
  | { kind: "fn"; id: string; type: Type }
  | { kind: "const"; name: string; type: Type };

/**
 * A comptime call site: `comptime f(args)` in an expression, a
 * `comptime f(args);` item, or a `const` initializer.
 *
 * Arguments are lowered into zero-parameter thunk functions so they can be
 * evaluated before the call itself is looked up in the cache.
 */
export type CallSite = {
  id: string;
  order: number; // registration order, the deterministic sort key
  span: Span;
  scope: Scope; // where insertions produced by this site are attached
  callee: string;
  args: string[]; // thunk function ids, one per argument
  resultType: Type;
  owner: { kind: "const"; name: string } | { kind: "statement" } | { kind: "inline"; fn: string };
};

export interface LowerContext {
  readonly types: TypeTable;
  /** Qualified name of the declared type `name` visible from `scope`. */
  lookupType(name: string, scope: Scope): string | undefined;
  lookupValue(name: string, scope: Scope): ValueBinding | undefined;
  lookupMethod(typeName: string, method: string): { id: string; sig: MethodSig } | undefined;
  signature(fnId: string): FnSignature | undefined;
  reserveSiteId(): { id: string; order: number };
  /** A site registered for the call at `at` before its body could be lowered. */
  registeredSite(at: Span): CallSite | undefined;
}

/**
 * A name that does not resolve yet. Bodies failing with this error are
 * deferred while insertions may still define the name.
 */
export class UnresolvedNameError extends CompileError {
  readonly missing: string;

  constructor(missing: string, message: string, at: Span) {
    super("ResolveError", "resolve", message, at);
    this.missing = missing;
  }
}

export function qualify(scope: Scope, name: string): string {
  return scope.kind === "module" ? name : `${scope.fn}::${name}`;
}

export function spanKey(at: Span): string {
  return `${at.file}:${at.from}:${at.to}`;
}

export function scopeKey(scope: Scope): string {
  return scope.kind === "module" ? "<module>" : scope.fn;
}
