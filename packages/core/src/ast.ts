/**
 * Quilt AST node definitions.
 */

export interface Span {
  file: string;
  startLine: number;
  startCol: number;
  endLine: number;
  endCol: number;
}

// Base node with span
export interface BaseNode {
  kind: string;
  span: Span;
}

// --- Literals ---
export interface NumLiteral extends BaseNode {
  kind: "NumLiteral";
  /** Decimal source text, parsed exactly at evaluation time. */
  text: string;
}

export interface StrLiteral extends BaseNode {
  kind: "StrLiteral";
  value: string;
}

export interface BoolLiteral extends BaseNode {
  kind: "BoolLiteral";
  value: boolean;
}

export interface NullLiteral extends BaseNode {
  kind: "NullLiteral";
}

export type Literal = NumLiteral | StrLiteral | BoolLiteral | NullLiteral;

// --- Names ---
export interface Var extends BaseNode {
  kind: "Var";
  name: string;
}

export interface EnumTagExpr extends BaseNode {
  kind: "EnumTagExpr";
  tag: string;
}

export interface EnumVariantExpr extends BaseNode {
  kind: "EnumVariantExpr";
  tag: string;
  payload: Expr;
}

/** `%record/freeze%` and friends. */
export interface PrimOpExpr extends BaseNode {
  kind: "PrimOpExpr";
  name: string;
}

// --- Records ---
export type PriorityAnnot =
  | { kind: "default" }
  | { kind: "force" }
  | { kind: "numeral"; value: number };

export interface FieldAnnotations {
  priority?: PriorityAnnot;
  optional: boolean;
  notExported: boolean;
  doc?: string;
  contracts: Expr[];
}

export interface FieldDef extends BaseNode {
  kind: "FieldDef";
  name: string;
  annotations: FieldAnnotations;
  value?: Expr;
}

export interface RecordExpr extends BaseNode {
  kind: "RecordExpr";
  fields: FieldDef[];
  open: boolean;
}

export interface ArrayExpr extends BaseNode {
  kind: "ArrayExpr";
  elements: Expr[];
}

export interface AccessExpr extends BaseNode {
  kind: "AccessExpr";
  target: Expr;
  field: string;
}

// --- Binding forms ---
export interface LetExpr extends BaseNode {
  kind: "LetExpr";
  rec: boolean;
  pattern: Pattern;
  value: Expr;
  body: Expr;
}

export interface FunExpr extends BaseNode {
  kind: "FunExpr";
  params: Pattern[];
  body: Expr;
}

export interface AppExpr extends BaseNode {
  kind: "AppExpr";
  fn: Expr;
  arg: Expr;
}

export interface IfExpr extends BaseNode {
  kind: "IfExpr";
  cond: Expr;
  then: Expr;
  else: Expr;
}

export interface MatchArm extends BaseNode {
  kind: "MatchArm";
  pattern: Pattern;
  body: Expr;
}

/** `match { ... }` evaluates to a function of the scrutinee. */
export interface MatchExpr extends BaseNode {
  kind: "MatchExpr";
  arms: MatchArm[];
}

// --- Operators ---
export type BinaryOp =
  | "&" | "|>"
  | "||" | "&&"
  | "==" | "!="
  | "<" | "<=" | ">" | ">="
  | "++" | "@"
  | "+" | "-" | "*" | "/" | "%";

export interface BinaryExpr extends BaseNode {
  kind: "BinaryExpr";
  op: BinaryOp;
  left: Expr;
  right: Expr;
}

export type UnaryOp = "-" | "!";

export interface UnaryExpr extends BaseNode {
  kind: "UnaryExpr";
  op: UnaryOp;
  operand: Expr;
}

// --- Contracts ---
/** `e | C1 | C2`: contracts applied eagerly, in order. */
export interface AnnotExpr extends BaseNode {
  kind: "AnnotExpr";
  expr: Expr;
  contracts: Expr[];
}

/** `Domain -> Codomain` function contract. */
export interface ArrowExpr extends BaseNode {
  kind: "ArrowExpr";
  domain: Expr;
  codomain: Expr;
}

/** `[| 'a, 'b |]` enum contract. */
export interface EnumContractExpr extends BaseNode {
  kind: "EnumContractExpr";
  tags: string[];
}

export type Expr =
  | Literal
  | Var
  | EnumTagExpr
  | EnumVariantExpr
  | PrimOpExpr
  | RecordExpr
  | ArrayExpr
  | AccessExpr
  | LetExpr
  | FunExpr
  | AppExpr
  | IfExpr
  | MatchExpr
  | BinaryExpr
  | UnaryExpr
  | AnnotExpr
  | ArrowExpr
  | EnumContractExpr;

// --- Patterns ---
export interface IdentPattern extends BaseNode {
  kind: "IdentPattern";
  name: string;
}

export interface WildcardPattern extends BaseNode {
  kind: "WildcardPattern";
}

export interface ConstPattern extends BaseNode {
  kind: "ConstPattern";
  value: Literal;
}

export interface EnumPattern extends BaseNode {
  kind: "EnumPattern";
  tag: string;
  payload?: Pattern;
}

export interface RecordPatternField extends BaseNode {
  kind: "RecordPatternField";
  name: string;
  pattern?: Pattern;
}

export interface RecordPattern extends BaseNode {
  kind: "RecordPattern";
  fields: RecordPatternField[];
  open: boolean;
}

export interface OrPattern extends BaseNode {
  kind: "OrPattern";
  alternatives: Pattern[];
}

export type Pattern =
  | IdentPattern
  | WildcardPattern
  | ConstPattern
  | EnumPattern
  | RecordPattern
  | OrPattern;

/** Names bound by a pattern, in source order. */
export function patternBindings(p: Pattern): string[] {
  switch (p.kind) {
    case "IdentPattern":
      return [p.name];
    case "WildcardPattern":
    case "ConstPattern":
      return [];
    case "EnumPattern":
      return p.payload ? patternBindings(p.payload) : [];
    case "RecordPattern":
      return p.fields.flatMap((f) => (f.pattern ? patternBindings(f.pattern) : [f.name]));
    case "OrPattern":
      return p.alternatives.length > 0 ? patternBindings(p.alternatives[0]) : [];
  }
}

/**
 * Free variables of an expression. Record literals are recursive scopes: their
 * field names are bound inside every field value and annotation.
 */
export function freeVars(expr: Expr): Set<string> {
  const out = new Set<string>();
  collectFree(expr, new Set(), out);
  return out;
}

function collectFree(expr: Expr, bound: ReadonlySet<string>, out: Set<string>): void {
  const visit = (e: Expr, b: ReadonlySet<string> = bound) => collectFree(e, b, out);
  const extend = (names: Iterable<string>): Set<string> => {
    const next = new Set(bound);
    for (const n of names) next.add(n);
    return next;
  };

  switch (expr.kind) {
    case "NumLiteral":
    case "StrLiteral":
    case "BoolLiteral":
    case "NullLiteral":
    case "EnumTagExpr":
    case "PrimOpExpr":
    case "EnumContractExpr":
      return;
    case "Var":
      if (!bound.has(expr.name)) out.add(expr.name);
      return;
    case "EnumVariantExpr":
      visit(expr.payload);
      return;
    case "RecordExpr": {
      const inner = extend(expr.fields.map((f) => f.name));
      for (const f of expr.fields) {
        for (const c of f.annotations.contracts) visit(c, inner);
        if (f.value) visit(f.value, inner);
      }
      return;
    }
    case "ArrayExpr":
      for (const e of expr.elements) visit(e);
      return;
    case "AccessExpr":
      visit(expr.target);
      return;
    case "LetExpr": {
      const inner = extend(patternBindings(expr.pattern));
      visit(expr.value, expr.rec ? inner : bound);
      visit(expr.body, inner);
      return;
    }
    case "FunExpr":
      visit(expr.body, extend(expr.params.flatMap(patternBindings)));
      return;
    case "AppExpr":
      visit(expr.fn);
      visit(expr.arg);
      return;
    case "IfExpr":
      visit(expr.cond);
      visit(expr.then);
      visit(expr.else);
      return;
    case "MatchExpr":
      for (const arm of expr.arms) visit(arm.body, extend(patternBindings(arm.pattern)));
      return;
    case "BinaryExpr":
      visit(expr.left);
      visit(expr.right);
      return;
    case "UnaryExpr":
      visit(expr.operand);
      return;
    case "AnnotExpr":
      visit(expr.expr);
      for (const c of expr.contracts) visit(c);
      return;
    case "ArrowExpr":
      visit(expr.domain);
      visit(expr.codomain);
      return;
  }
}
