/**
 * Diagnostics - structured compile errors shared by the front end and the
 * comptime engine.
 *
 * Every error carries a primary span. Errors raised inside code produced by
 * `#insert` also carry the chain of insertion call sites the span was
 * generated from, so user-facing messages stay traceable to real source.
 */

// ============================================
// Source spans
// ============================================

export type Span = {
  file: string; // Source file name, or a synthetic `<insert r.i>` name
  from: number; // Start offset in source
  to: number; // End offset in source
};

export function span(file: string, from: number, to: number): Span {
  return { file, from, to };
}

export function joinSpans(a: Span, b: Span): Span {
  return { file: a.file, from: Math.min(a.from, b.from), to: Math.max(a.to, b.to) };
}

export function dummySpan(file = "<builtin>"): Span {
  return { file, from: 0, to: 0 };
}

// ============================================
// Error kinds
// ============================================

export type DiagnosticKind =
  | "ParseError"
  | "ResolveError"
  | "TypeError"
  | "ComptimeRequired"
  | "ComptimeError"
  | "MatchExhaustionFailure"
  | "CapabilityDenied"
  | "ComptimeBudgetExceeded"
  | "InsertionParseError"
  | "InsertionDivergence"
  | "UnknownType"
  | "InternalError";

export type CompileStage =
  | "parse"
  | "resolve"
  | "typecheck"
  | "comptime"
  | "insertion"
  | "codegen";

export type CompilerNote = {
  message: string;
  span?: Span;
};

export class CompileError extends Error {
  kind: DiagnosticKind;
  stage: CompileStage;
  span: Span;
  generatedFrom: Span[];
  notes: CompilerNote[];

  constructor(kind: DiagnosticKind, stage: CompileStage, message: string, span: Span) {
    super(message);
    this.name = "CompileError";
    this.kind = kind;
    this.stage = stage;
    this.span = span;
    this.generatedFrom = [];
    this.notes = [];
  }

  addNote(message: string, span?: Span): this {
    this.notes.push({ message, span });
    return this;
  }

  /**
   * Attach the insertion call sites that produced the primary span.
   */
  withOrigin(chain: Span[]): this {
    if (this.generatedFrom.length === 0) {
      this.generatedFrom = [...chain];
    }
    return this;
  }

  /**
   * A copy of the error that can be replayed from a cache entry.
   */
  toRecord(): ErrorRecord {
    return {
      kind: this.kind,
      stage: this.stage,
      message: this.message,
      span: this.span,
      generatedFrom: this.generatedFrom,
      notes: this.notes,
    };
  }

  static fromRecord(record: ErrorRecord): CompileError {
    const error = new CompileError(record.kind, record.stage, record.message, record.span);
    error.generatedFrom = [...record.generatedFrom];
    error.notes = record.notes.map((n) => ({ ...n }));
    return error;
  }
}

export type ErrorRecord = {
  kind: DiagnosticKind;
  stage: CompileStage;
  message: string;
  span: Span;
  generatedFrom: Span[];
  notes: CompilerNote[];
};

/**
 * Several errors from independent call sites, reported together.
 */
export class CompileErrors extends Error {
  readonly errors: CompileError[];

  constructor(errors: CompileError[]) {
    super(
      errors.length === 1
        ? errors[0].message
        : `${errors.length} errors:\n` + errors.map((e) => `  ${e.kind}: ${e.message}`).join("\n")
    );
    this.name = "CompileErrors";
    this.errors = errors;
  }
}

/**
 * Flatten a thrown value into the list of compile errors it carries.
 * Anything that is not a compile error is an internal failure.
 */
export function collectErrors(error: unknown, at: Span): CompileError[] {
  if (error instanceof CompileErrors) return error.errors;
  if (error instanceof CompileError) return [error];
  const message = error instanceof Error ? error.message : String(error);
  return [new CompileError("InternalError", "comptime", `internal error: ${message}`, at)];
}

// ============================================
// Constructors for common kinds
// ============================================

export function parseError(message: string, at: Span): CompileError {
  return new CompileError("ParseError", "parse", message, at);
}

export function resolveError(message: string, at: Span): CompileError {
  return new CompileError("ResolveError", "resolve", message, at);
}

export function typeError(message: string, at: Span): CompileError {
  return new CompileError("TypeError", "typecheck", message, at);
}

export function comptimeError(message: string, at: Span): CompileError {
  return new CompileError("ComptimeError", "comptime", message, at);
}

export function internalError(message: string, at: Span): CompileError {
  return new CompileError("InternalError", "comptime", message, at);
}
