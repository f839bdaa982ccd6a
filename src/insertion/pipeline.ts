/**
 * Code-Insertion Pipeline - splices code produced by `#insert` back into the
 * program.
 *
 * Each chunk becomes a synthetic source file named `<insert round.index>`
 * whose origin is the comptime call site that produced it. Diagnostics in a
 * chunk follow those origins back to hand-written source.
 */

import { Item } from "../ast/ast";
import { CompileError, Span } from "../diagnostics/errors";
import { SourceMap } from "../diagnostics/format";
import { Program } from "../frontend/program";
import { CallSite } from "../frontend/symbols";
import { PendingInsertion } from "../comptime/interpreter";
import { parseSource } from "../parser/parser";

export type InsertionResult = {
  /** Comptime call sites discovered in the inserted code or in bodies it unblocked. */
  sites: CallSite[];
  errors: CompileError[];
  files: string[];
};

export class InsertionPipeline {
  constructor(
    private readonly program: Program,
    private readonly sources: SourceMap,
    private readonly maxPasses: number
  ) {}

  /**
   * Parse and add one round of insertions, in the order given.
   */
  apply(round: number, insertions: readonly PendingInsertion[]): InsertionResult {
    const errors: CompileError[] = [];
    const files: string[] = [];

    insertions.forEach((insertion, index) => {
      const file = `<insert ${round}.${index}>`;
      const items = this.chunkItems(file, insertion, errors);
      files.push(file);
      if (!items) return;
      errors.push(...this.program.addItems(items, insertion.scope).map((e) => this.mapped(e)));
    });

    errors.push(...this.program.recheckDeferred().map((e) => this.mapped(e)));
    return { sites: this.program.takeNewSites(), errors, files };
  }

  /**
   * `InsertionDivergence` when insertions are still pending after the last
   * allowed pass.
   */
  checkPassLimit(round: number, pending: readonly PendingInsertion[]): CompileError | undefined {
    if (round <= this.maxPasses || pending.length === 0) return undefined;
    const first = pending[0];
    const error = new CompileError(
      "InsertionDivergence",
      "insertion",
      `code insertion did not reach a fixpoint within ${this.maxPasses} passes`,
      first.siteSpan
    );
    for (const origin of this.sources.originChain(first.siteSpan)) {
      error.addNote("which was inserted by the call site here", origin);
    }
    error.addNote(`${pending.length} insertion(s) still pending`);
    return error;
  }

  /**
   * Attach the chain of insertion sites that generated the error's span.
   */
  mapped(error: CompileError): CompileError {
    return error.withOrigin(this.sources.originChain(error.span));
  }

  private chunkItems(file: string, insertion: PendingInsertion, errors: CompileError[]): Item[] | undefined {
    const text = insertion.code.text;
    this.sources.add(file, text, insertion.siteSpan);
    try {
      return parseSource(text, file);
    } catch (e) {
      if (!(e instanceof CompileError)) throw e;
      errors.push(this.insertionError(e.message, e.span, insertion));
      return undefined;
    }
  }

  private insertionError(message: string, at: Span, insertion: PendingInsertion): CompileError {
    const error = new CompileError("InsertionParseError", "insertion", `generated code does not parse: ${message}`, at);
    error.addNote("code produced by this #insert", insertion.insertSpan);
    return this.mapped(error);
  }
}
