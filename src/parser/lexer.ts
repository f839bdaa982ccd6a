/**
 * Tokenizer for Wisp source text.
 */

import { parseError, span } from "../diagnostics/errors";

export type TokenType =
  | "identifier"
  | "int"
  | "float"
  | "string"
  | "char"
  // Keywords
  | "fn"
  | "pub"
  | "struct"
  | "enum"
  | "trait"
  | "impl"
  | "for"
  | "const"
  | "let"
  | "mut"
  | "if"
  | "else"
  | "while"
  | "loop"
  | "break"
  | "continue"
  | "return"
  | "match"
  | "comptime"
  | "true"
  | "false"
  | "as"
  | "self"
  // Punctuation
  | "("
  | ")"
  | "["
  | "]"
  | "{"
  | "}"
  | ","
  | ";"
  | ":"
  | "::"
  | "."
  | "->"
  | "=>"
  | "="
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "&"
  | "&&"
  | "|"
  | "||"
  | "^"
  | "<<"
  | ">>"
  | "!"
  | "#"
  | "eof";

export interface Token {
  type: TokenType;
  value: string;
  from: number;
  to: number;
}

const KEYWORDS = new Map<string, TokenType>([
  ["fn", "fn"],
  ["pub", "pub"],
  ["struct", "struct"],
  ["enum", "enum"],
  ["trait", "trait"],
  ["impl", "impl"],
  ["for", "for"],
  ["const", "const"],
  ["let", "let"],
  ["mut", "mut"],
  ["if", "if"],
  ["else", "else"],
  ["while", "while"],
  ["loop", "loop"],
  ["break", "break"],
  ["continue", "continue"],
  ["return", "return"],
  ["match", "match"],
  ["comptime", "comptime"],
  ["true", "true"],
  ["false", "false"],
  ["as", "as"],
  ["self", "self"],
]);

// Longest first so that `<<` wins over `<`.
const PUNCTUATION: TokenType[] = [
  "::",
  "->",
  "=>",
  "==",
  "!=",
  "<=",
  ">=",
  "&&",
  "||",
  "<<",
  ">>",
  "(",
  ")",
  "[",
  "]",
  "{",
  "}",
  ",",
  ";",
  ":",
  ".",
  "=",
  "<",
  ">",
  "+",
  "-",
  "*",
  "/",
  "%",
  "&",
  "|",
  "^",
  "!",
  "#",
];

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  '"': '"',
  "'": "'",
};

export class Lexer {
  private pos = 0;
  private readonly source: string;
  private readonly file: string;

  constructor(source: string, file: string) {
    this.source = source;
    this.file = file;
  }

  tokenize(): Token[] {
    const tokens: Token[] = [];
    for (;;) {
      const token = this.next();
      tokens.push(token);
      if (token.type === "eof") return tokens;
    }
  }

  private peek(offset = 0): string {
    return this.source[this.pos + offset] ?? "";
  }

  private skipTrivia(): void {
    while (this.pos < this.source.length) {
      const ch = this.peek();
      if (ch === " " || ch === "\t" || ch === "\n" || ch === "\r") {
        this.pos++;
      } else if (ch === "/" && this.peek(1) === "/") {
        while (this.pos < this.source.length && this.peek() !== "\n") this.pos++;
      } else if (ch === "/" && this.peek(1) === "*") {
        const start = this.pos;
        this.pos += 2;
        while (!(this.peek() === "*" && this.peek(1) === "/")) {
          if (this.pos >= this.source.length) {
            throw parseError("Unterminated block comment", span(this.file, start, this.pos));
          }
          this.pos++;
        }
        this.pos += 2;
      } else {
        return;
      }
    }
  }

  private next(): Token {
    this.skipTrivia();
    const from = this.pos;
    if (this.pos >= this.source.length) {
      return { type: "eof", value: "", from, to: from };
    }

    const ch = this.peek();

    if (isDigit(ch)) return this.number();
    if (ch === '"') return this.string();
    if (ch === "'") return this.char();

    if (isIdentStart(ch)) {
      while (isIdentPart(this.peek())) this.pos++;
      const value = this.source.slice(from, this.pos);
      const keyword = KEYWORDS.get(value);
      return { type: keyword ?? "identifier", value, from, to: this.pos };
    }

    for (const punct of PUNCTUATION) {
      if (this.source.startsWith(punct, this.pos)) {
        this.pos += punct.length;
        return { type: punct, value: punct, from, to: this.pos };
      }
    }

    throw parseError(`Unexpected character '${ch}'`, span(this.file, from, from + 1));
  }

  private number(): Token {
    const from = this.pos;
    let isFloat = false;

    if (this.peek() === "0" && (this.peek(1) === "x" || this.peek(1) === "b")) {
      this.pos += 2;
      while (isHexDigit(this.peek()) || this.peek() === "_") this.pos++;
    } else {
      while (isDigit(this.peek()) || this.peek() === "_") this.pos++;
      // `1..` is not a float, and `x.0` field access never starts here
      if (this.peek() === "." && isDigit(this.peek(1))) {
        isFloat = true;
        this.pos++;
        while (isDigit(this.peek()) || this.peek() === "_") this.pos++;
      }
      if (this.peek() === "e" || this.peek() === "E") {
        const sign = this.peek(1) === "+" || this.peek(1) === "-" ? 1 : 0;
        if (isDigit(this.peek(1 + sign))) {
          isFloat = true;
          this.pos += 1 + sign;
          while (isDigit(this.peek())) this.pos++;
        }
      }
    }

    // Optional type suffix: 42i32, 1.5f32
    const suffixStart = this.pos;
    if ((this.peek() === "i" || this.peek() === "u" || this.peek() === "f") && isDigit(this.peek(1))) {
      this.pos++;
      while (isDigit(this.peek())) this.pos++;
      if (this.source[suffixStart] === "f") isFloat = true;
    }

    return {
      type: isFloat ? "float" : "int",
      value: this.source.slice(from, this.pos),
      from,
      to: this.pos,
    };
  }

  private string(): Token {
    const from = this.pos;
    this.pos++;
    let value = "";
    while (this.peek() !== '"') {
      if (this.pos >= this.source.length) {
        throw parseError("Unterminated string literal", span(this.file, from, this.pos));
      }
      value += this.escapedChar();
    }
    this.pos++;
    return { type: "string", value, from, to: this.pos };
  }

  private char(): Token {
    const from = this.pos;
    this.pos++;
    if (this.peek() === "'" || this.pos >= this.source.length) {
      throw parseError("Empty character literal", span(this.file, from, this.pos));
    }
    const value = this.escapedChar();
    if (this.peek() !== "'") {
      throw parseError("Unterminated character literal", span(this.file, from, this.pos));
    }
    this.pos++;
    return { type: "char", value, from, to: this.pos };
  }

  private escapedChar(): string {
    const ch = this.peek();
    if (ch !== "\\") {
      const cp = this.source.codePointAt(this.pos) ?? 0;
      const text = String.fromCodePoint(cp);
      this.pos += text.length;
      return text;
    }
    const esc = this.peek(1);
    if (esc === "u" && this.peek(2) === "{") {
      const close = this.source.indexOf("}", this.pos);
      const hex = close < 0 ? "" : this.source.slice(this.pos + 3, close);
      if (!/^[0-9a-fA-F]{1,6}$/.test(hex)) {
        throw parseError("Invalid unicode escape", span(this.file, this.pos, this.pos + 2));
      }
      this.pos = close + 1;
      return String.fromCodePoint(parseInt(hex, 16));
    }
    const mapped = ESCAPES[esc];
    if (mapped === undefined) {
      throw parseError(`Unknown escape sequence '\\${esc}'`, span(this.file, this.pos, this.pos + 2));
    }
    this.pos += 2;
    return mapped;
  }
}

function isDigit(ch: string): boolean {
  return ch >= "0" && ch <= "9";
}

function isHexDigit(ch: string): boolean {
  return isDigit(ch) || (ch >= "a" && ch <= "f") || (ch >= "A" && ch <= "F");
}

function isIdentStart(ch: string): boolean {
  return (ch >= "a" && ch <= "z") || (ch >= "A" && ch <= "Z") || ch === "_";
}

function isIdentPart(ch: string): boolean {
  return isIdentStart(ch) || isDigit(ch);
}
