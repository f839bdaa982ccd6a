/**
 * Surface AST for the Wisp item language.
 *
 * This is what the parser produces for hand-written sources and for text
 * returned by `#insert`.
 */

import { Span } from "../diagnostics/errors";

export type Spanned<T> = T & { span: Span };

// ============================================
// Types
// ============================================

export type TypeExpr = Spanned<TypeExprBase>;

export type TypeExprBase =
  | { kind: "named"; name: string; args: TypeExpr[] }
  | { kind: "array"; element: TypeExpr; length: number }
  | { kind: "slice"; element: TypeExpr }
  | { kind: "fn"; params: TypeExpr[]; ret: TypeExpr }
  | { kind: "unit" };

// ============================================
// Expressions
// ============================================

export type Expr = Spanned<ExprBase>;

export type ExprBase =
  | { kind: "int"; value: bigint; suffix?: string }
  | { kind: "float"; value: number; suffix?: string }
  | { kind: "string"; value: string }
  | { kind: "char"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "unit" }
  | { kind: "path"; segments: string[] }
  | { kind: "call"; callee: Expr; args: Expr[]; comptime: boolean }
  | { kind: "method"; receiver: Expr; name: string; args: Expr[] }
  | { kind: "field"; object: Expr; name: string }
  | { kind: "index"; object: Expr; index: Expr }
  | { kind: "struct"; name: string; fields: FieldInit[] }
  | { kind: "array"; elements: Expr[] }
  | { kind: "unary"; op: UnaryOp; operand: Expr }
  | { kind: "binary"; op: BinaryOp; left: Expr; right: Expr }
  | { kind: "cast"; expr: Expr; type: TypeExpr }
  | { kind: "block"; block: Block }
  | { kind: "if"; cond: Expr; then: Block; else?: Expr }
  | { kind: "while"; cond: Expr; body: Block }
  | { kind: "loop"; body: Block }
  | { kind: "break" }
  | { kind: "continue" }
  | { kind: "return"; value?: Expr }
  | { kind: "assign"; target: Expr; value: Expr }
  | { kind: "match"; scrutinee: Expr; arms: MatchArm[] }
  | { kind: "intrinsic"; name: string; args: Expr[] };

export type FieldInit = { name: string; value: Expr; span: Span };

export type UnaryOp = "-" | "!";

export type BinaryOp =
  | "+"
  | "-"
  | "*"
  | "/"
  | "%"
  | "=="
  | "!="
  | "<"
  | "<="
  | ">"
  | ">="
  | "&&"
  | "||"
  | "&"
  | "|"
  | "^"
  | "<<"
  | ">>";

export type Block = {
  stmts: Stmt[];
  tail?: Expr;
  span: Span;
};

export type Stmt =
  | { kind: "let"; name: string; mutable: boolean; type?: TypeExpr; value?: Expr; span: Span }
  | { kind: "expr"; expr: Expr; span: Span };

export type MatchArm = {
  pattern: Pattern;
  body: Expr;
  span: Span;
};

export type Pattern = Spanned<PatternBase>;

export type PatternBase =
  | { kind: "wildcard" }
  | { kind: "binding"; name: string }
  | { kind: "literal"; value: Expr }
  | { kind: "variant"; path: string[]; fields: Pattern[] };

// ============================================
// Items
// ============================================

export type Param = { name: string; type: TypeExpr; span: Span };

export type FnSig = {
  name: string;
  nameSpan: Span;
  hasSelf: boolean;
  params: Param[];
  ret?: TypeExpr;
  span: Span;
};

export type FnItem = FnSig & {
  kind: "fn";
  pub: boolean;
  body: Block;
};

export type StructItem = {
  kind: "struct";
  name: string;
  typeParams: string[];
  fields: { name: string; type: TypeExpr; span: Span }[];
  span: Span;
};

export type EnumItem = {
  kind: "enum";
  name: string;
  typeParams: string[];
  variants: { name: string; fields: TypeExpr[]; span: Span }[];
  span: Span;
};

export type TraitItem = {
  kind: "trait";
  name: string;
  methods: FnSig[];
  span: Span;
};

export type ImplItem = {
  kind: "impl";
  trait?: string;
  target: string;
  methods: FnItem[];
  span: Span;
};

export type ConstItem = {
  kind: "const";
  name: string;
  type?: TypeExpr;
  value: Expr;
  span: Span;
};

/**
 * `comptime f(args);` at item level: a call site evaluated only for its
 * effects and insertions.
 */
export type ComptimeItem = {
  kind: "comptime";
  call: Expr;
  span: Span;
};

export type Item = FnItem | StructItem | EnumItem | TraitItem | ImplItem | ConstItem | ComptimeItem;

export function itemName(item: Item): string | undefined {
  switch (item.kind) {
    case "fn":
    case "struct":
    case "enum":
    case "trait":
    case "const":
      return item.name;
    case "impl":
    case "comptime":
      return undefined;
  }
}
