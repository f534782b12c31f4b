/**
 * Quilt parser using Chevrotain.
 * Produces a Quilt AST (a single expression) from tokens.
 */
import { CstParser, type IToken, type CstNode } from "chevrotain";
import {
  allTokens,
  Let,
  Rec,
  In,
  Fun,
  If,
  Then,
  Else,
  Match,
  Or,
  True,
  False,
  Null,
  Default,
  Force,
  Priority,
  Optional,
  NotExported,
  Doc,
  Ident,
  NumLit,
  StringLit,
  EnumTag,
  PrimOp,
  EnumOpen,
  EnumClose,
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Comma,
  DotDot,
  Dot,
  FatArrow,
  Arrow,
  EqEq,
  BangEq,
  Equals,
  PipeGt,
  OrOr,
  Pipe,
  AndAnd,
  Amp,
  GtEq,
  LtEq,
  Gt,
  Lt,
  Bang,
  PlusPlus,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  At,
} from "./lexer.js";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { Diagnostic } from "./diagnostics.js";
import { QuiltLexer } from "./lexer.js";
import { makeDiag } from "./diagnostics.js";
import { Rational } from "./rational.js";

class QuiltCstParser extends CstParser {
  constructor() {
    super(allTokens, { recoveryEnabled: false, nodeLocationTracking: "full" });
    this.performSelfAnalysis();
  }

  program = this.RULE("program", () => {
    this.SUBRULE(this.expr);
  });

  expr = this.RULE("expr", () => {
    this.OR([
      { ALT: () => this.SUBRULE(this.letExpr) },
      { ALT: () => this.SUBRULE(this.funExpr) },
      { ALT: () => this.SUBRULE(this.ifExpr) },
      { ALT: () => this.SUBRULE(this.annotExpr) },
    ]);
  });

  letExpr = this.RULE("letExpr", () => {
    this.CONSUME(Let);
    this.OPTION(() => this.CONSUME(Rec));
    this.SUBRULE(this.pattern);
    this.CONSUME(Equals);
    this.SUBRULE(this.expr);
    this.CONSUME(In);
    this.SUBRULE2(this.expr);
  });

  funExpr = this.RULE("funExpr", () => {
    this.CONSUME(Fun);
    this.AT_LEAST_ONE(() => this.SUBRULE(this.patternAtom));
    this.CONSUME(FatArrow);
    this.SUBRULE(this.expr);
  });

  ifExpr = this.RULE("ifExpr", () => {
    this.CONSUME(If);
    this.SUBRULE(this.expr);
    this.CONSUME(Then);
    this.SUBRULE2(this.expr);
    this.CONSUME(Else);
    this.SUBRULE3(this.expr);
  });

  // e | C1 | C2
  annotExpr = this.RULE("annotExpr", () => {
    this.SUBRULE(this.arrowExpr);
    this.MANY(() => {
      this.CONSUME(Pipe);
      this.SUBRULE2(this.arrowExpr);
    });
  });

  // Right-associative
  arrowExpr = this.RULE("arrowExpr", () => {
    this.SUBRULE(this.pipeExpr);
    this.OPTION(() => {
      this.CONSUME(Arrow);
      this.SUBRULE(this.arrowExpr);
    });
  });

  pipeExpr = this.RULE("pipeExpr", () => {
    this.SUBRULE(this.mergeExpr);
    this.MANY(() => {
      this.CONSUME(PipeGt);
      this.SUBRULE2(this.mergeExpr);
    });
  });

  mergeExpr = this.RULE("mergeExpr", () => {
    this.SUBRULE(this.orExpr);
    this.MANY(() => {
      this.CONSUME(Amp);
      this.SUBRULE2(this.orExpr);
    });
  });

  orExpr = this.RULE("orExpr", () => {
    this.SUBRULE(this.andExpr);
    this.MANY(() => {
      this.CONSUME(OrOr);
      this.SUBRULE2(this.andExpr);
    });
  });

  andExpr = this.RULE("andExpr", () => {
    this.SUBRULE(this.eqExpr);
    this.MANY(() => {
      this.CONSUME(AndAnd);
      this.SUBRULE2(this.eqExpr);
    });
  });

  eqExpr = this.RULE("eqExpr", () => {
    this.SUBRULE(this.cmpExpr);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(EqEq) },
        { ALT: () => this.CONSUME(BangEq) },
      ]);
      this.SUBRULE2(this.cmpExpr);
    });
  });

  cmpExpr = this.RULE("cmpExpr", () => {
    this.SUBRULE(this.concatExpr);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(LtEq) },
        { ALT: () => this.CONSUME(GtEq) },
        { ALT: () => this.CONSUME(Lt) },
        { ALT: () => this.CONSUME(Gt) },
      ]);
      this.SUBRULE2(this.concatExpr);
    });
  });

  concatExpr = this.RULE("concatExpr", () => {
    this.SUBRULE(this.addExpr);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(PlusPlus) },
        { ALT: () => this.CONSUME(At) },
      ]);
      this.SUBRULE2(this.addExpr);
    });
  });

  addExpr = this.RULE("addExpr", () => {
    this.SUBRULE(this.mulExpr);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Plus) },
        { ALT: () => this.CONSUME(Minus) },
      ]);
      this.SUBRULE2(this.mulExpr);
    });
  });

  mulExpr = this.RULE("mulExpr", () => {
    this.SUBRULE(this.unaryExpr);
    this.MANY(() => {
      this.OR([
        { ALT: () => this.CONSUME(Star) },
        { ALT: () => this.CONSUME(Slash) },
        { ALT: () => this.CONSUME(Percent) },
      ]);
      this.SUBRULE2(this.unaryExpr);
    });
  });

  unaryExpr = this.RULE("unaryExpr", () => {
    this.OR([
      {
        ALT: () => {
          this.CONSUME(Minus);
          this.SUBRULE(this.unaryExpr);
        },
      },
      {
        ALT: () => {
          this.CONSUME(Bang);
          this.SUBRULE2(this.unaryExpr);
        },
      },
      { ALT: () => this.SUBRULE(this.appExpr) },
    ]);
  });

  // Application by juxtaposition: f x y
  appExpr = this.RULE("appExpr", () => {
    this.SUBRULE(this.accessExpr);
    this.MANY(() => this.SUBRULE2(this.accessExpr));
  });

  accessExpr = this.RULE("accessExpr", () => {
    this.SUBRULE(this.atom);
    this.MANY(() => {
      this.CONSUME(Dot);
      this.SUBRULE(this.fieldName);
    });
  });

  atom = this.RULE("atom", () => {
    this.OR([
      { ALT: () => this.CONSUME(NumLit) },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.CONSUME(EnumTag) },
      { ALT: () => this.CONSUME(PrimOp) },
      { ALT: () => this.SUBRULE(this.parenExpr) },
      { ALT: () => this.SUBRULE(this.record) },
      { ALT: () => this.SUBRULE(this.array) },
      { ALT: () => this.SUBRULE(this.enumContract) },
      { ALT: () => this.SUBRULE(this.matchExpr) },
    ]);
  });

  parenExpr = this.RULE("parenExpr", () => {
    this.CONSUME(LParen);
    this.SUBRULE(this.expr);
    this.CONSUME(RParen);
  });

  record = this.RULE("record", () => {
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.recordEntry);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.recordEntry);
      });
      this.OPTION2(() => this.CONSUME2(Comma));
    });
    this.CONSUME(RBrace);
  });

  recordEntry = this.RULE("recordEntry", () => {
    this.OR([
      { ALT: () => this.CONSUME(DotDot) },
      { ALT: () => this.SUBRULE(this.fieldDef) },
    ]);
  });

  // a.b.c | annot ... = value
  fieldDef = this.RULE("fieldDef", () => {
    this.SUBRULE(this.fieldName);
    this.MANY(() => {
      this.CONSUME(Dot);
      this.SUBRULE2(this.fieldName);
    });
    this.MANY2(() => this.SUBRULE(this.fieldAnnot));
    this.OPTION(() => {
      this.CONSUME(Equals);
      this.SUBRULE(this.expr);
    });
  });

  fieldName = this.RULE("fieldName", () => {
    this.OR([
      { ALT: () => this.CONSUME(Ident) },
      { ALT: () => this.CONSUME(StringLit) },
    ]);
  });

  fieldAnnot = this.RULE("fieldAnnot", () => {
    this.CONSUME(Pipe);
    // Soft keywords are also identifiers; the keyword reading wins.
    this.OR({
      IGNORE_AMBIGUITIES: true,
      DEF: [
        { ALT: () => this.CONSUME(Default) },
        { ALT: () => this.CONSUME(Force) },
        {
          ALT: () => {
            this.CONSUME(Priority);
            this.OPTION(() => this.CONSUME(Minus));
            this.CONSUME(NumLit);
          },
        },
        { ALT: () => this.CONSUME(Optional) },
        { ALT: () => this.CONSUME(NotExported) },
        {
          ALT: () => {
            this.CONSUME(Doc);
            this.CONSUME(StringLit);
          },
        },
        { ALT: () => this.SUBRULE(this.arrowExpr) },
      ],
    });
  });

  array = this.RULE("array", () => {
    this.CONSUME(LBracket);
    this.OPTION(() => {
      this.SUBRULE(this.expr);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.expr);
      });
      this.OPTION2(() => this.CONSUME2(Comma));
    });
    this.CONSUME(RBracket);
  });

  enumContract = this.RULE("enumContract", () => {
    this.CONSUME(EnumOpen);
    this.OPTION(() => {
      this.CONSUME(EnumTag);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.CONSUME2(EnumTag);
      });
      this.OPTION2(() => this.CONSUME2(Comma));
    });
    this.CONSUME(EnumClose);
  });

  matchExpr = this.RULE("matchExpr", () => {
    this.CONSUME(Match);
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.matchArm);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.matchArm);
      });
      this.OPTION2(() => this.CONSUME2(Comma));
    });
    this.CONSUME(RBrace);
  });

  matchArm = this.RULE("matchArm", () => {
    this.SUBRULE(this.pattern);
    this.CONSUME(FatArrow);
    this.SUBRULE(this.expr);
  });

  // --- Patterns ---
  pattern = this.RULE("pattern", () => {
    this.SUBRULE(this.patternAtom);
    this.MANY(() => {
      this.CONSUME(Or);
      this.SUBRULE2(this.patternAtom);
    });
  });

  patternAtom = this.RULE("patternAtom", () => {
    this.OR([
      { ALT: () => this.CONSUME(Ident) },
      {
        ALT: () => {
          this.CONSUME(EnumTag);
          this.OPTION(() => this.SUBRULE(this.patternAtom));
        },
      },
      {
        ALT: () => {
          this.OPTION2(() => this.CONSUME(Minus));
          this.CONSUME(NumLit);
        },
      },
      { ALT: () => this.CONSUME(StringLit) },
      { ALT: () => this.CONSUME(True) },
      { ALT: () => this.CONSUME(False) },
      { ALT: () => this.CONSUME(Null) },
      { ALT: () => this.SUBRULE(this.recordPattern) },
      {
        ALT: () => {
          this.CONSUME(LParen);
          this.SUBRULE(this.pattern);
          this.CONSUME(RParen);
        },
      },
    ]);
  });

  recordPattern = this.RULE("recordPattern", () => {
    this.CONSUME(LBrace);
    this.OPTION(() => {
      this.SUBRULE(this.recordPatternEntry);
      this.MANY(() => {
        this.CONSUME(Comma);
        this.SUBRULE2(this.recordPatternEntry);
      });
      this.OPTION2(() => this.CONSUME2(Comma));
    });
    this.CONSUME(RBrace);
  });

  recordPatternEntry = this.RULE("recordPatternEntry", () => {
    this.OR([
      { ALT: () => this.CONSUME(DotDot) },
      {
        ALT: () => {
          this.SUBRULE(this.fieldName);
          this.OPTION(() => {
            this.CONSUME(Equals);
            this.SUBRULE(this.pattern);
          });
        },
      },
    ]);
  });
}

// Singleton parser instance
const cstParser = new QuiltCstParser();

// --- CST to AST visitor ---

/** Raised while building the AST from a well-formed CST. */
class AstBuildError extends Error {
  span: Span;

  constructor(message: string, span: Span) {
    super(message);
    this.span = span;
  }
}

function tokenSpan(token: IToken, file: string): Span {
  return {
    file,
    startLine: token.startLine ?? 1,
    startCol: token.startColumn ?? 1,
    endLine: token.endLine ?? 1,
    endCol: (token.endColumn ?? 1) + 1,
  };
}

function cstSpan(node: CstNode, file: string): Span {
  const loc = node.location;
  if (loc) {
    return {
      file,
      startLine: loc.startLine ?? 1,
      startCol: loc.startColumn ?? 1,
      endLine: loc.endLine ?? 1,
      endCol: (loc.endColumn ?? 1) + 1,
    };
  }
  return { file, startLine: 1, startCol: 1, endLine: 1, endCol: 1 };
}

function joinSpans(a: Span, b: Span): Span {
  return { file: a.file, startLine: a.startLine, startCol: a.startCol, endLine: b.endLine, endCol: b.endCol };
}

function nodes(cst: CstNode, key: string): CstNode[] {
  return (cst.children[key] as CstNode[] | undefined) ?? [];
}

function tokens(cst: CstNode, key: string): IToken[] {
  return (cst.children[key] as IToken[] | undefined) ?? [];
}

function firstNode(cst: CstNode, key: string): CstNode {
  const n = nodes(cst, key)[0];
  if (!n) throw new Error(`Expected '${key}' in '${cst.name}'`);
  return n;
}

function firstToken(cst: CstNode, key: string): IToken | undefined {
  return tokens(cst, key)[0];
}

function parseString(t: IToken): string {
  return JSON.parse(t.image);
}

function visitExpr(cst: CstNode, file: string): AST.Expr {
  const children = cst.children;
  if (children["letExpr"]) return visitLetExpr(firstNode(cst, "letExpr"), file);
  if (children["funExpr"]) return visitFunExpr(firstNode(cst, "funExpr"), file);
  if (children["ifExpr"]) return visitIfExpr(firstNode(cst, "ifExpr"), file);
  return visitAnnotExpr(firstNode(cst, "annotExpr"), file);
}

function visitLetExpr(cst: CstNode, file: string): AST.LetExpr {
  const rec = tokens(cst, "Rec").length > 0;
  const pattern = visitPattern(firstNode(cst, "pattern"), file);
  if (rec && pattern.kind !== "IdentPattern") {
    throw new AstBuildError("'let rec' binds a single identifier.", pattern.span);
  }
  const [value, body] = nodes(cst, "expr");
  return {
    kind: "LetExpr",
    span: cstSpan(cst, file),
    rec,
    pattern,
    value: visitExpr(value, file),
    body: visitExpr(body, file),
  };
}

function visitFunExpr(cst: CstNode, file: string): AST.FunExpr {
  return {
    kind: "FunExpr",
    span: cstSpan(cst, file),
    params: nodes(cst, "patternAtom").map((p) => visitPatternAtom(p, file)),
    body: visitExpr(firstNode(cst, "expr"), file),
  };
}

function visitIfExpr(cst: CstNode, file: string): AST.IfExpr {
  const [cond, then, els] = nodes(cst, "expr").map((e) => visitExpr(e, file));
  return { kind: "IfExpr", span: cstSpan(cst, file), cond, then, else: els };
}

function visitAnnotExpr(cst: CstNode, file: string): AST.Expr {
  const [head, ...contracts] = nodes(cst, "arrowExpr").map((e) => visitArrowExpr(e, file));
  if (contracts.length === 0) return head;
  return { kind: "AnnotExpr", span: cstSpan(cst, file), expr: head, contracts };
}

function visitArrowExpr(cst: CstNode, file: string): AST.Expr {
  const domain = visitChain(firstNode(cst, "pipeExpr"), file);
  const codomain = nodes(cst, "arrowExpr")[0];
  if (!codomain) return domain;
  return {
    kind: "ArrowExpr",
    span: cstSpan(cst, file),
    domain,
    codomain: visitArrowExpr(codomain, file),
  };
}

// Binary precedence levels: rule name -> operand rule and operator tokens.
const CHAINS: Record<string, { operand: string; ops: Record<string, AST.BinaryOp> }> = {
  pipeExpr: { operand: "mergeExpr", ops: { PipeGt: "|>" } },
  mergeExpr: { operand: "orExpr", ops: { Amp: "&" } },
  orExpr: { operand: "andExpr", ops: { OrOr: "||" } },
  andExpr: { operand: "eqExpr", ops: { AndAnd: "&&" } },
  eqExpr: { operand: "cmpExpr", ops: { EqEq: "==", BangEq: "!=" } },
  cmpExpr: { operand: "concatExpr", ops: { Lt: "<", LtEq: "<=", Gt: ">", GtEq: ">=" } },
  concatExpr: { operand: "addExpr", ops: { PlusPlus: "++", At: "@" } },
  addExpr: { operand: "mulExpr", ops: { Plus: "+", Minus: "-" } },
  mulExpr: { operand: "unaryExpr", ops: { Star: "*", Slash: "/", Percent: "%" } },
};

/** Left-fold one precedence level; operators are ordered by source offset. */
function visitChain(cst: CstNode, file: string): AST.Expr {
  const level = CHAINS[cst.name];
  if (!level) return visitUnaryExpr(cst, file);

  const operands = nodes(cst, level.operand).map((n) => visitChain(n, file));
  const ops = Object.entries(level.ops)
    .flatMap(([key, op]) => tokens(cst, key).map((t) => ({ op, offset: t.startOffset })))
    .sort((a, b) => a.offset - b.offset);

  let result = operands[0];
  for (let i = 0; i < ops.length; i++) {
    const right = operands[i + 1];
    result = {
      kind: "BinaryExpr",
      span: joinSpans(result.span, right.span),
      op: ops[i].op,
      left: result,
      right,
    };
  }
  return result;
}

function visitUnaryExpr(cst: CstNode, file: string): AST.Expr {
  const app = nodes(cst, "appExpr")[0];
  if (app) return visitAppExpr(app, file);
  const op: AST.UnaryOp = tokens(cst, "Minus").length > 0 ? "-" : "!";
  return {
    kind: "UnaryExpr",
    span: cstSpan(cst, file),
    op,
    operand: visitUnaryExpr(firstNode(cst, "unaryExpr"), file),
  };
}

function visitAppExpr(cst: CstNode, file: string): AST.Expr {
  const [head, ...args] = nodes(cst, "accessExpr").map((n) => visitAccessExpr(n, file));
  let result = head;
  for (const arg of args) {
    const span = joinSpans(result.span, arg.span);
    // 'Tag payload
    if (result.kind === "EnumTagExpr") {
      result = { kind: "EnumVariantExpr", span, tag: result.tag, payload: arg };
    } else {
      result = { kind: "AppExpr", span, fn: result, arg };
    }
  }
  return result;
}

function visitAccessExpr(cst: CstNode, file: string): AST.Expr {
  let result = visitAtom(firstNode(cst, "atom"), file);
  for (const name of nodes(cst, "fieldName")) {
    result = {
      kind: "AccessExpr",
      span: joinSpans(result.span, cstSpan(name, file)),
      target: result,
      field: visitFieldName(name),
    };
  }
  return result;
}

function visitAtom(cst: CstNode, file: string): AST.Expr {
  const children = cst.children;
  const num = firstToken(cst, "NumLit");
  if (num) return { kind: "NumLiteral", span: tokenSpan(num, file), text: num.image };
  const str = firstToken(cst, "StringLit");
  if (str) return { kind: "StrLiteral", span: tokenSpan(str, file), value: parseString(str) };
  const t = firstToken(cst, "True");
  if (t) return { kind: "BoolLiteral", span: tokenSpan(t, file), value: true };
  const f = firstToken(cst, "False");
  if (f) return { kind: "BoolLiteral", span: tokenSpan(f, file), value: false };
  const n = firstToken(cst, "Null");
  if (n) return { kind: "NullLiteral", span: tokenSpan(n, file) };
  const id = firstToken(cst, "Ident");
  if (id) return { kind: "Var", span: tokenSpan(id, file), name: id.image };
  const tag = firstToken(cst, "EnumTag");
  if (tag) return { kind: "EnumTagExpr", span: tokenSpan(tag, file), tag: tag.image.slice(1) };
  const prim = firstToken(cst, "PrimOp");
  if (prim) return { kind: "PrimOpExpr", span: tokenSpan(prim, file), name: prim.image.slice(1, -1) };

  if (children["parenExpr"]) return visitExpr(firstNode(firstNode(cst, "parenExpr"), "expr"), file);
  if (children["record"]) return visitRecord(firstNode(cst, "record"), file);
  if (children["array"]) {
    const arr = firstNode(cst, "array");
    return {
      kind: "ArrayExpr",
      span: cstSpan(arr, file),
      elements: nodes(arr, "expr").map((e) => visitExpr(e, file)),
    };
  }
  if (children["enumContract"]) {
    const ec = firstNode(cst, "enumContract");
    return {
      kind: "EnumContractExpr",
      span: cstSpan(ec, file),
      tags: tokens(ec, "EnumTag").map((tk) => tk.image.slice(1)),
    };
  }
  if (children["matchExpr"]) {
    const m = firstNode(cst, "matchExpr");
    return {
      kind: "MatchExpr",
      span: cstSpan(m, file),
      arms: nodes(m, "matchArm").map((arm) => ({
        kind: "MatchArm",
        span: cstSpan(arm, file),
        pattern: visitPattern(firstNode(arm, "pattern"), file),
        body: visitExpr(firstNode(arm, "expr"), file),
      })),
    };
  }
  throw new Error("Unknown atom");
}

function visitFieldName(cst: CstNode): string {
  const id = firstToken(cst, "Ident");
  if (id) return id.image;
  const str = firstToken(cst, "StringLit");
  if (str) return parseString(str);
  throw new Error("Unknown field name");
}

function visitRecord(cst: CstNode, file: string): AST.RecordExpr {
  const fields: AST.FieldDef[] = [];
  let open = false;
  for (const entry of nodes(cst, "recordEntry")) {
    if (tokens(entry, "DotDot").length > 0) {
      open = true;
    } else {
      fields.push(visitFieldDef(firstNode(entry, "fieldDef"), file));
    }
  }
  return { kind: "RecordExpr", span: cstSpan(cst, file), fields, open };
}

/** `a.b.c | A = v` becomes `a = { b = { c | A = v } }`. */
function visitFieldDef(cst: CstNode, file: string): AST.FieldDef {
  const span = cstSpan(cst, file);
  const path = nodes(cst, "fieldName").map(visitFieldName);
  const annotations: AST.FieldAnnotations = { optional: false, notExported: false, contracts: [] };

  for (const annot of nodes(cst, "fieldAnnot")) {
    if (tokens(annot, "Default").length > 0) {
      annotations.priority = { kind: "default" };
    } else if (tokens(annot, "Force").length > 0) {
      annotations.priority = { kind: "force" };
    } else if (tokens(annot, "Priority").length > 0) {
      const digits = firstToken(annot, "NumLit");
      const level = digits ? Rational.parse(digits.image) : Rational.fromInt(0);
      if (level === null || !level.isInteger()) {
        throw new AstBuildError("Priority must be an integer.", cstSpan(annot, file));
      }
      const sign = tokens(annot, "Minus").length > 0 ? -1 : 1;
      annotations.priority = { kind: "numeral", value: sign * level.toNumber() };
    } else if (tokens(annot, "Optional").length > 0) {
      annotations.optional = true;
    } else if (tokens(annot, "NotExported").length > 0) {
      annotations.notExported = true;
    } else if (tokens(annot, "Doc").length > 0) {
      const doc = firstToken(annot, "StringLit");
      if (doc) annotations.doc = parseString(doc);
    } else {
      annotations.contracts.push(visitArrowExpr(firstNode(annot, "arrowExpr"), file));
    }
  }

  const valueNode = nodes(cst, "expr")[0];
  let def: AST.FieldDef = {
    kind: "FieldDef",
    span,
    name: path[path.length - 1],
    annotations,
    value: valueNode ? visitExpr(valueNode, file) : undefined,
  };
  for (let i = path.length - 2; i >= 0; i--) {
    def = {
      kind: "FieldDef",
      span,
      name: path[i],
      annotations: { optional: false, notExported: false, contracts: [] },
      value: { kind: "RecordExpr", span, fields: [def], open: false },
    };
  }
  return def;
}

// --- Patterns ---

function visitPattern(cst: CstNode, file: string): AST.Pattern {
  const alternatives = nodes(cst, "patternAtom").map((p) => visitPatternAtom(p, file));
  if (alternatives.length === 1) return alternatives[0];
  return { kind: "OrPattern", span: cstSpan(cst, file), alternatives };
}

function visitPatternAtom(cst: CstNode, file: string): AST.Pattern {
  const span = cstSpan(cst, file);
  const id = firstToken(cst, "Ident");
  if (id) {
    return id.image === "_"
      ? { kind: "WildcardPattern", span }
      : { kind: "IdentPattern", span, name: id.image };
  }
  const tag = firstToken(cst, "EnumTag");
  if (tag) {
    const payload = nodes(cst, "patternAtom")[0];
    return {
      kind: "EnumPattern",
      span,
      tag: tag.image.slice(1),
      payload: payload ? visitPatternAtom(payload, file) : undefined,
    };
  }
  const num = firstToken(cst, "NumLit");
  if (num) {
    const text = tokens(cst, "Minus").length > 0 ? `-${num.image}` : num.image;
    return { kind: "ConstPattern", span, value: { kind: "NumLiteral", span, text } };
  }
  const str = firstToken(cst, "StringLit");
  if (str) {
    return { kind: "ConstPattern", span, value: { kind: "StrLiteral", span, value: parseString(str) } };
  }
  if (tokens(cst, "True").length > 0) {
    return { kind: "ConstPattern", span, value: { kind: "BoolLiteral", span, value: true } };
  }
  if (tokens(cst, "False").length > 0) {
    return { kind: "ConstPattern", span, value: { kind: "BoolLiteral", span, value: false } };
  }
  if (tokens(cst, "Null").length > 0) {
    return { kind: "ConstPattern", span, value: { kind: "NullLiteral", span } };
  }
  const rec = nodes(cst, "recordPattern")[0];
  if (rec) return visitRecordPattern(rec, file);
  return visitPattern(firstNode(cst, "pattern"), file);
}

function visitRecordPattern(cst: CstNode, file: string): AST.RecordPattern {
  const fields: AST.RecordPatternField[] = [];
  let open = false;
  for (const entry of nodes(cst, "recordPatternEntry")) {
    if (tokens(entry, "DotDot").length > 0) {
      open = true;
      continue;
    }
    const sub = nodes(entry, "pattern")[0];
    fields.push({
      kind: "RecordPatternField",
      span: cstSpan(entry, file),
      name: visitFieldName(firstNode(entry, "fieldName")),
      pattern: sub ? visitPattern(sub, file) : undefined,
    });
  }
  return { kind: "RecordPattern", span: cstSpan(cst, file), fields, open };
}

// --- Public API ---

export interface ParseResult {
  program?: AST.Expr;
  diagnostics: Diagnostic[];
}

export function parse(source: string, file: string = "<stdin>"): ParseResult {
  const lexResult = QuiltLexer.tokenize(source);
  const diagnostics: Diagnostic[] = [];

  for (const err of lexResult.errors) {
    diagnostics.push(
      makeDiag(
        "E_LEX",
        err.message,
        {
          file,
          startLine: err.line ?? 1,
          startCol: err.column ?? 1,
          endLine: err.line ?? 1,
          endCol: (err.column ?? 1) + (err.length ?? 1),
        },
        "Check for invalid characters or unclosed strings."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  cstParser.input = lexResult.tokens;
  const cst = cstParser.program();

  for (const err of cstParser.errors) {
    const token = err.token;
    diagnostics.push(
      makeDiag(
        "E_PARSE",
        err.message,
        {
          file,
          startLine: token.startLine ?? 1,
          startCol: token.startColumn ?? 1,
          endLine: token.endLine ?? 1,
          endCol: (token.endColumn ?? 1) + 1,
        },
        "Check syntax near this location."
      )
    );
  }

  if (diagnostics.length > 0) {
    return { diagnostics };
  }

  try {
    const program = visitExpr(firstNode(cst, "expr"), file);
    return { program, diagnostics: [] };
  } catch (e) {
    diagnostics.push(
      makeDiag("E_AST", (e as Error).message, e instanceof AstBuildError ? e.span : undefined)
    );
    return { diagnostics };
  }
}
