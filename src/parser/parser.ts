/**
 * Recursive descent parser for the Wisp item language.
 *
 * Used both for hand-written sources and for the text of generated code
 * returned through `#insert`.
 */

import {
  Block,
  BinaryOp,
  EnumItem,
  Expr,
  ExprBase,
  FieldInit,
  FnItem,
  FnSig,
  ImplItem,
  Item,
  MatchArm,
  Param,
  Pattern,
  Stmt,
  StructItem,
  TraitItem,
  TypeExpr,
} from "../ast/ast";
import { Span, parseError, span } from "../diagnostics/errors";
import { Lexer, Token, TokenType } from "./lexer";

/**
 * Parse a whole source file into items.
 */
export function parseSource(source: string, file: string): Item[] {
  const parser = new Parser(new Lexer(source, file).tokenize(), file);
  return parser.parseItems();
}

/**
 * Parse a single expression (used by tests and the REPL-style CLI command).
 */
export function parseExpression(source: string, file: string): Expr {
  const parser = new Parser(new Lexer(source, file).tokenize(), file);
  return parser.parseStandaloneExpr();
}

// Binary operators with their precedence, higher binds tighter.
const BINARY_OPERATORS: Partial<Record<TokenType, { op: BinaryOp; prec: number }>> = {
  "||": { op: "||", prec: 1 },
  "&&": { op: "&&", prec: 2 },
  "==": { op: "==", prec: 3 },
  "!=": { op: "!=", prec: 3 },
  "<": { op: "<", prec: 3 },
  "<=": { op: "<=", prec: 3 },
  ">": { op: ">", prec: 3 },
  ">=": { op: ">=", prec: 3 },
  "|": { op: "|", prec: 4 },
  "^": { op: "^", prec: 5 },
  "&": { op: "&", prec: 6 },
  "<<": { op: "<<", prec: 7 },
  ">>": { op: ">>", prec: 7 },
  "+": { op: "+", prec: 8 },
  "-": { op: "-", prec: 8 },
  "*": { op: "*", prec: 9 },
  "/": { op: "/", prec: 9 },
  "%": { op: "%", prec: 9 },
};

const CAST_PRECEDENCE = 10;

type ExprContext = {
  // Inside `if`/`while`/`match` heads a `{` starts the body, not a struct literal.
  noStruct: boolean;
};

class Parser {
  private pos = 0;

  constructor(
    private readonly tokens: Token[],
    private readonly file: string
  ) {}

  // ============================================
  // Token helpers
  // ============================================

  private get current(): Token {
    return this.tokens[this.pos];
  }

  private peekType(offset = 0): TokenType {
    const token = this.tokens[Math.min(this.pos + offset, this.tokens.length - 1)];
    return token.type;
  }

  private at(type: TokenType): boolean {
    return this.current.type === type;
  }

  private advance(): Token {
    const token = this.current;
    if (token.type !== "eof") this.pos++;
    return token;
  }

  private eat(type: TokenType): boolean {
    if (this.at(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType, what?: string): Token {
    if (!this.at(type)) {
      throw this.unexpected(what ?? `'${type}'`);
    }
    return this.advance();
  }

  private expectIdent(what = "identifier"): Token {
    return this.expect("identifier", what);
  }

  /**
   * Consume a `>` that closes a type argument list, splitting `>>`.
   */
  private expectCloseAngle(): void {
    if (this.at(">>")) {
      const token = this.current;
      this.tokens[this.pos] = { type: ">", value: ">", from: token.from + 1, to: token.to };
      return;
    }
    this.expect(">");
  }

  private unexpected(expected: string) {
    const token = this.current;
    const found = token.type === "eof" ? "end of input" : `'${token.value}'`;
    return parseError(`Expected ${expected}, found ${found}`, this.spanOf(token));
  }

  private spanOf(token: Token): Span {
    return span(this.file, token.from, token.to);
  }

  private spanFrom(start: Token): Span {
    const last = this.tokens[Math.max(this.pos - 1, 0)];
    return span(this.file, start.from, Math.max(last.to, start.from));
  }

  // ============================================
  // Items
  // ============================================

  parseItems(): Item[] {
    const items: Item[] = [];
    while (!this.at("eof")) {
      items.push(this.parseItem());
    }
    return items;
  }

  parseStandaloneExpr(): Expr {
    const expr = this.parseExpr({ noStruct: false });
    if (!this.at("eof")) throw this.unexpected("end of input");
    return expr;
  }

  private parseItem(): Item {
    const start = this.current;
    switch (this.current.type) {
      case "pub":
      case "fn":
        return this.parseFn();
      case "struct":
        return this.parseStruct();
      case "enum":
        return this.parseEnum();
      case "trait":
        return this.parseTrait();
      case "impl":
        return this.parseImpl();
      case "const": {
        this.advance();
        const name = this.expectIdent("constant name").value;
        const type = this.eat(":") ? this.parseType() : undefined;
        this.expect("=");
        const value = this.parseExpr({ noStruct: false });
        this.expect(";");
        return { kind: "const", name, type, value, span: this.spanFrom(start) };
      }
      case "comptime": {
        const call = this.parseExpr({ noStruct: false });
        if (call.kind !== "call" || !call.comptime) {
          throw parseError("Expected a call after 'comptime'", call.span);
        }
        this.expect(";");
        return { kind: "comptime", call, span: this.spanFrom(start) };
      }
      default:
        throw this.unexpected("an item (fn, struct, enum, trait, impl, const or comptime)");
    }
  }

  private parseFnSig(): FnSig {
    const start = this.current;
    this.expect("fn");
    const nameToken = this.expectIdent("function name");
    this.expect("(");
    let hasSelf = false;
    const params: Param[] = [];
    while (!this.at(")")) {
      if (params.length === 0 && !hasSelf && this.at("self")) {
        this.advance();
        hasSelf = true;
      } else {
        const paramStart = this.current;
        const name = this.expectIdent("parameter name").value;
        this.expect(":");
        const type = this.parseType();
        params.push({ name, type, span: this.spanFrom(paramStart) });
      }
      if (!this.eat(",")) break;
    }
    this.expect(")");
    const ret = this.eat("->") ? this.parseType() : undefined;
    return {
      name: nameToken.value,
      nameSpan: this.spanOf(nameToken),
      hasSelf,
      params,
      ret,
      span: this.spanFrom(start),
    };
  }

  private parseFn(): FnItem {
    const start = this.current;
    const pub = this.eat("pub");
    const sig = this.parseFnSig();
    const body = this.parseBlock();
    return { ...sig, kind: "fn", pub, body, span: this.spanFrom(start) };
  }

  private parseTypeParams(): string[] {
    const params: string[] = [];
    if (this.eat("<")) {
      while (!this.at(">")) {
        params.push(this.expectIdent("type parameter").value);
        if (!this.eat(",")) break;
      }
      this.expectCloseAngle();
    }
    return params;
  }

  private parseStruct(): StructItem {
    const start = this.expect("struct");
    const name = this.expectIdent("struct name").value;
    const typeParams = this.parseTypeParams();
    this.expect("{");
    const fields: StructItem["fields"] = [];
    while (!this.at("}")) {
      const fieldStart = this.current;
      const fieldName = this.expectIdent("field name").value;
      this.expect(":");
      const type = this.parseType();
      fields.push({ name: fieldName, type, span: this.spanFrom(fieldStart) });
      if (!this.eat(",")) break;
    }
    this.expect("}");
    return { kind: "struct", name, typeParams, fields, span: this.spanFrom(start) };
  }

  private parseEnum(): EnumItem {
    const start = this.expect("enum");
    const name = this.expectIdent("enum name").value;
    const typeParams = this.parseTypeParams();
    this.expect("{");
    const variants: EnumItem["variants"] = [];
    while (!this.at("}")) {
      const variantStart = this.current;
      const variantName = this.expectIdent("variant name").value;
      const fields: TypeExpr[] = [];
      if (this.eat("(")) {
        while (!this.at(")")) {
          fields.push(this.parseType());
          if (!this.eat(",")) break;
        }
        this.expect(")");
      }
      variants.push({ name: variantName, fields, span: this.spanFrom(variantStart) });
      if (!this.eat(",")) break;
    }
    this.expect("}");
    return { kind: "enum", name, typeParams, variants, span: this.spanFrom(start) };
  }

  private parseTrait(): TraitItem {
    const start = this.expect("trait");
    const name = this.expectIdent("trait name").value;
    this.expect("{");
    const methods: FnSig[] = [];
    while (!this.at("}")) {
      methods.push(this.parseFnSig());
      this.expect(";");
    }
    this.expect("}");
    return { kind: "trait", name, methods, span: this.spanFrom(start) };
  }

  private parseImpl(): ImplItem {
    const start = this.expect("impl");
    let target = this.expectIdent("type name").value;
    let trait: string | undefined;
    if (this.eat("for")) {
      trait = target;
      target = this.expectIdent("type name").value;
    }
    this.expect("{");
    const methods: FnItem[] = [];
    while (!this.at("}")) {
      methods.push(this.parseFn());
    }
    this.expect("}");
    return { kind: "impl", trait, target, methods, span: this.spanFrom(start) };
  }

  // ============================================
  // Types
  // ============================================

  private parseType(): TypeExpr {
    const start = this.current;
    if (this.eat("(")) {
      this.expect(")");
      return { kind: "unit", span: this.spanFrom(start) };
    }
    if (this.eat("[")) {
      const element = this.parseType();
      if (this.eat(";")) {
        const lengthToken = this.expect("int", "array length");
        this.expect("]");
        const length = Number(stripNumber(lengthToken.value));
        return { kind: "array", element, length, span: this.spanFrom(start) };
      }
      this.expect("]");
      return { kind: "slice", element, span: this.spanFrom(start) };
    }
    if (this.eat("fn")) {
      this.expect("(");
      const params: TypeExpr[] = [];
      while (!this.at(")")) {
        params.push(this.parseType());
        if (!this.eat(",")) break;
      }
      this.expect(")");
      const ret: TypeExpr = this.eat("->")
        ? this.parseType()
        : { kind: "unit", span: this.spanFrom(start) };
      return { kind: "fn", params, ret, span: this.spanFrom(start) };
    }
    const name = this.expectIdent("type").value;
    const args: TypeExpr[] = [];
    if (this.eat("<")) {
      while (!this.at(">") && !this.at(">>")) {
        args.push(this.parseType());
        if (!this.eat(",")) break;
      }
      this.expectCloseAngle();
    }
    return { kind: "named", name, args, span: this.spanFrom(start) };
  }

  // ============================================
  // Blocks and statements
  // ============================================

  private parseBlock(): Block {
    const start = this.expect("{");
    const stmts: Stmt[] = [];
    let tail: Expr | undefined;

    while (!this.at("}")) {
      const stmtStart = this.current;
      if (this.eat("let")) {
        const mutable = this.eat("mut");
        const name = this.expectIdent("variable name").value;
        const type = this.eat(":") ? this.parseType() : undefined;
        const value = this.eat("=") ? this.parseExpr({ noStruct: false }) : undefined;
        this.expect(";");
        stmts.push({ kind: "let", name, mutable, type, value, span: this.spanFrom(stmtStart) });
        continue;
      }

      const expr = this.parseExpr({ noStruct: false });
      if (this.eat(";")) {
        stmts.push({ kind: "expr", expr, span: this.spanFrom(stmtStart) });
      } else if (this.at("}")) {
        tail = expr;
      } else if (endsWithBlock(expr)) {
        stmts.push({ kind: "expr", expr, span: this.spanFrom(stmtStart) });
      } else {
        throw this.unexpected("';' or '}'");
      }
    }
    this.expect("}");
    return { stmts, tail, span: this.spanFrom(start) };
  }

  // ============================================
  // Expressions
  // ============================================

  private parseExpr(ctx: ExprContext): Expr {
    const start = this.current;
    const target = this.parseBinary(0, ctx);
    if (this.eat("=")) {
      const value = this.parseExpr(ctx);
      return { kind: "assign", target, value, span: this.spanFrom(start) };
    }
    return target;
  }

  private parseBinary(minPrec: number, ctx: ExprContext): Expr {
    const start = this.current;
    let left = this.parseUnary(ctx);

    for (;;) {
      if (this.at("as") && CAST_PRECEDENCE > minPrec) {
        this.advance();
        const type = this.parseType();
        left = { kind: "cast", expr: left, type, span: this.spanFrom(start) };
        continue;
      }
      const operator = BINARY_OPERATORS[this.current.type];
      if (operator === undefined || operator.prec <= minPrec) return left;
      this.advance();
      const right = this.parseBinary(operator.prec, ctx);
      left = { kind: "binary", op: operator.op, left, right, span: this.spanFrom(start) };
    }
  }

  private parseUnary(ctx: ExprContext): Expr {
    const start = this.current;
    if (this.at("-") || this.at("!")) {
      const op = this.advance().type === "-" ? "-" : "!";
      const operand = this.parseUnary(ctx);
      return { kind: "unary", op, operand, span: this.spanFrom(start) };
    }
    return this.parsePostfix(ctx);
  }

  private parsePostfix(ctx: ExprContext): Expr {
    const start = this.current;
    let expr = this.parsePrimary(ctx);

    for (;;) {
      if (this.at("(")) {
        const args = this.parseArgs();
        expr = { kind: "call", callee: expr, args, comptime: false, span: this.spanFrom(start) };
      } else if (this.eat(".")) {
        const name = this.expectIdent("field or method name").value;
        if (this.at("(")) {
          const args = this.parseArgs();
          expr = { kind: "method", receiver: expr, name, args, span: this.spanFrom(start) };
        } else {
          expr = { kind: "field", object: expr, name, span: this.spanFrom(start) };
        }
      } else if (this.eat("[")) {
        const index = this.parseExpr({ noStruct: false });
        this.expect("]");
        expr = { kind: "index", object: expr, index, span: this.spanFrom(start) };
      } else {
        return expr;
      }
    }
  }

  private parseArgs(): Expr[] {
    this.expect("(");
    const args: Expr[] = [];
    while (!this.at(")")) {
      args.push(this.parseExpr({ noStruct: false }));
      if (!this.eat(",")) break;
    }
    this.expect(")");
    return args;
  }

  private parsePrimary(ctx: ExprContext): Expr {
    const start = this.current;
    const done = (base: ExprBase): Expr => ({ ...base, span: this.spanFrom(start) });

    switch (start.type) {
      case "int": {
        this.advance();
        const { digits, suffix } = splitSuffix(start.value);
        return done({ kind: "int", value: BigInt(stripNumber(digits)), suffix });
      }
      case "float": {
        this.advance();
        const { digits, suffix } = splitSuffix(start.value);
        return done({ kind: "float", value: Number(stripNumber(digits)), suffix });
      }
      case "string":
        this.advance();
        return done({ kind: "string", value: start.value });
      case "char":
        this.advance();
        return done({ kind: "char", value: start.value.codePointAt(0) ?? 0 });
      case "true":
      case "false":
        this.advance();
        return done({ kind: "bool", value: start.type === "true" });
      case "self":
        this.advance();
        return done({ kind: "path", segments: ["self"] });

      case "(": {
        this.advance();
        if (this.eat(")")) return done({ kind: "unit" });
        const inner = this.parseExpr({ noStruct: false });
        this.expect(")");
        return inner;
      }

      case "[": {
        this.advance();
        const elements: Expr[] = [];
        while (!this.at("]")) {
          elements.push(this.parseExpr({ noStruct: false }));
          if (!this.eat(",")) break;
        }
        this.expect("]");
        return done({ kind: "array", elements });
      }

      case "{":
        return done({ kind: "block", block: this.parseBlock() });

      case "if":
        return this.parseIf();

      case "while": {
        this.advance();
        const cond = this.parseExpr({ noStruct: true });
        const body = this.parseBlock();
        return done({ kind: "while", cond, body });
      }

      case "loop":
        this.advance();
        return done({ kind: "loop", body: this.parseBlock() });

      case "break":
        this.advance();
        return done({ kind: "break" });

      case "continue":
        this.advance();
        return done({ kind: "continue" });

      case "return": {
        this.advance();
        const value = this.at(";") || this.at("}") ? undefined : this.parseExpr(ctx);
        return done({ kind: "return", value });
      }

      case "match":
        return this.parseMatch();

      case "comptime": {
        this.advance();
        const call = this.parsePostfix(ctx);
        if (call.kind !== "call") {
          throw parseError("'comptime' must be followed by a function call", call.span);
        }
        return { ...call, comptime: true, span: this.spanFrom(start) };
      }

      case "#": {
        this.advance();
        const name = this.expectIdent("intrinsic name").value;
        const args = this.parseArgs();
        return done({ kind: "intrinsic", name, args });
      }

      case "identifier": {
        const segments = [this.advance().value];
        while (this.at("::")) {
          this.advance();
          segments.push(this.expectIdent("path segment").value);
        }
        if (segments.length === 1 && !ctx.noStruct && this.looksLikeStructLiteral()) {
          return done({ kind: "struct", name: segments[0], fields: this.parseFieldInits() });
        }
        return done({ kind: "path", segments });
      }

      default:
        throw this.unexpected("an expression");
    }
  }

  private looksLikeStructLiteral(): boolean {
    if (!this.at("{")) return false;
    const next = this.peekType(1);
    return next === "}" || (next === "identifier" && this.peekType(2) === ":");
  }

  private parseFieldInits(): FieldInit[] {
    this.expect("{");
    const fields: FieldInit[] = [];
    while (!this.at("}")) {
      const start = this.current;
      const name = this.expectIdent("field name").value;
      this.expect(":");
      const value = this.parseExpr({ noStruct: false });
      fields.push({ name, value, span: this.spanFrom(start) });
      if (!this.eat(",")) break;
    }
    this.expect("}");
    return fields;
  }

  private parseIf(): Expr {
    const start = this.expect("if");
    const cond = this.parseExpr({ noStruct: true });
    const then = this.parseBlock();
    let elseExpr: Expr | undefined;
    if (this.eat("else")) {
      if (this.at("if")) {
        elseExpr = this.parseIf();
      } else {
        const elseStart = this.current;
        const block = this.parseBlock();
        elseExpr = { kind: "block", block, span: this.spanFrom(elseStart) };
      }
    }
    return { kind: "if", cond, then, else: elseExpr, span: this.spanFrom(start) };
  }

  private parseMatch(): Expr {
    const start = this.expect("match");
    const scrutinee = this.parseExpr({ noStruct: true });
    this.expect("{");
    const arms: MatchArm[] = [];
    while (!this.at("}")) {
      const armStart = this.current;
      const pattern = this.parsePattern();
      this.expect("=>");
      const body = this.parseExpr({ noStruct: false });
      arms.push({ pattern, body, span: this.spanFrom(armStart) });
      if (!this.eat(",") && !endsWithBlock(body)) break;
    }
    this.expect("}");
    return { kind: "match", scrutinee, arms, span: this.spanFrom(start) };
  }

  private parsePattern(): Pattern {
    const start = this.current;
    switch (start.type) {
      case "int":
      case "float":
      case "string":
      case "char":
      case "true":
      case "false":
        return { kind: "literal", value: this.parsePrimary({ noStruct: true }), span: this.spanOf(start) };
      case "-": {
        const value = this.parseUnary({ noStruct: true });
        return { kind: "literal", value, span: this.spanFrom(start) };
      }
      case "identifier": {
        const segments = [this.advance().value];
        while (this.eat("::")) {
          segments.push(this.expectIdent("variant name").value);
        }
        if (segments.length === 1 && segments[0] === "_") {
          return { kind: "wildcard", span: this.spanOf(start) };
        }
        if (segments.length === 1 && !this.at("(")) {
          return { kind: "binding", name: segments[0], span: this.spanOf(start) };
        }
        const fields: Pattern[] = [];
        if (this.eat("(")) {
          while (!this.at(")")) {
            fields.push(this.parsePattern());
            if (!this.eat(",")) break;
          }
          this.expect(")");
        }
        return { kind: "variant", path: segments, fields, span: this.spanFrom(start) };
      }
      default:
        throw this.unexpected("a pattern");
    }
  }
}

// ============================================
// Helpers
// ============================================

function endsWithBlock(expr: Expr): boolean {
  switch (expr.kind) {
    case "block":
    case "if":
    case "while":
    case "loop":
    case "match":
      return true;
    default:
      return false;
  }
}

function stripNumber(text: string): string {
  return text.replace(/_/g, "");
}

function splitSuffix(text: string): { digits: string; suffix?: string } {
  if (text.startsWith("0x") || text.startsWith("0b")) {
    const match = /^(0[xb][0-9a-fA-F_]+?)([iu]\d+)?$/.exec(text);
    if (match) return { digits: match[1], suffix: match[2] };
  }
  const match = /^(.*?)([iuf]\d+)?$/.exec(text);
  if (!match) return { digits: text };
  return { digits: match[1], suffix: match[2] };
}
