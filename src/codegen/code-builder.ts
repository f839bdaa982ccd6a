/**
 * CodeBuilder - line-oriented text builder with indentation.
 *
 * Used for MIR listings and the CLI's textual reports.
 */

export class CodeBuilder {
  private lines: string[] = [];
  private indentLevel = 0;

  constructor(private readonly indentStr: string = "  ") {}

  /**
   * Add a line at the current indentation. Embedded newlines start new
   * lines at the same indentation.
   */
  line(content: string = ""): this {
    for (const part of content.split("\n")) {
      this.lines.push(part.length === 0 ? "" : this.indentStr.repeat(this.indentLevel) + part);
    }
    return this;
  }

  indent(): this {
    this.indentLevel++;
    return this;
  }

  dedent(): this {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
    return this;
  }

  /**
   * Write `header`, the indented body, then `footer`.
   */
  block(header: string, body: () => void, footer = "}"): this {
    this.line(header);
    this.indent();
    body();
    this.dedent();
    if (footer) this.line(footer);
    return this;
  }

  build(): string {
    return this.lines.join("\n") + (this.lines.length > 0 ? "\n" : "");
  }
}
