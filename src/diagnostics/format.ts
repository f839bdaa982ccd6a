/**
 * Rendering diagnostics as `file:line:col` text.
 */

import { CompileError, CompileErrors, Span } from "./errors";

/**
 * Source texts by file name, including synthetic `<insert r.i>` files.
 */
export class SourceMap {
  private readonly files = new Map<string, string>();
  private readonly origins = new Map<string, Span>();

  add(file: string, text: string, origin?: Span): void {
    this.files.set(file, text);
    if (origin) this.origins.set(file, origin);
  }

  text(file: string): string | undefined {
    return this.files.get(file);
  }

  /**
   * The `#insert` call site a synthetic file was generated at.
   */
  origin(file: string): Span | undefined {
    return this.origins.get(file);
  }

  /**
   * Chain of insertion sites leading to `at`, innermost first.
   */
  originChain(at: Span): Span[] {
    const chain: Span[] = [];
    const seen = new Set<string>();
    let current = this.origins.get(at.file);
    while (current && !seen.has(current.file)) {
      chain.push(current);
      seen.add(current.file);
      current = this.origins.get(current.file);
    }
    return chain;
  }

  fileNames(): string[] {
    return [...this.files.keys()];
  }

  lineCol(at: Span): { line: number; col: number } {
    const text = this.files.get(at.file);
    if (text === undefined) return { line: 1, col: at.from + 1 };
    let line = 1;
    let lineStart = 0;
    const end = Math.min(at.from, text.length);
    for (let i = 0; i < end; i++) {
      if (text[i] === "\n") {
        line++;
        lineStart = i + 1;
      }
    }
    return { line, col: at.from - lineStart + 1 };
  }
}

export function formatSpan(at: Span, sources: SourceMap): string {
  const { line, col } = sources.lineCol(at);
  return `${at.file}:${line}:${col}`;
}

export function formatDiagnostic(error: CompileError, sources: SourceMap): string {
  const lines = [`${formatSpan(error.span, sources)}: ${error.kind}: ${error.message}`];
  for (const note of error.notes) {
    lines.push(note.span ? `  = note: ${note.message} (${formatSpan(note.span, sources)})` : `  = note: ${note.message}`);
  }
  for (const origin of error.generatedFrom) {
    lines.push(`  = in code inserted at ${formatSpan(origin, sources)}`);
  }
  return lines.join("\n");
}

export function formatErrors(error: CompileError | CompileErrors, sources: SourceMap): string {
  const errors = error instanceof CompileErrors ? error.errors : [error];
  return errors.map((e) => formatDiagnostic(e, sources)).join("\n");
}
