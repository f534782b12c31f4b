/**
 * Quilt lexer using Chevrotain.
 */
import { createToken, Lexer } from "chevrotain";

// Identifiers. Soft keywords below are categorized as Ident so they stay
// usable as field names and variables.
export const Ident = createToken({ name: "Ident", pattern: /[A-Za-z_][A-Za-z0-9_]*/ });

// Hard keywords
export const Let = createToken({ name: "Let", pattern: /let/, longer_alt: Ident });
export const Rec = createToken({ name: "Rec", pattern: /rec/, longer_alt: Ident });
export const In = createToken({ name: "In", pattern: /in/, longer_alt: Ident });
export const Fun = createToken({ name: "Fun", pattern: /fun/, longer_alt: Ident });
export const If = createToken({ name: "If", pattern: /if/, longer_alt: Ident });
export const Then = createToken({ name: "Then", pattern: /then/, longer_alt: Ident });
export const Else = createToken({ name: "Else", pattern: /else/, longer_alt: Ident });
export const Match = createToken({ name: "Match", pattern: /match/, longer_alt: Ident });
export const Or = createToken({ name: "Or", pattern: /or/, longer_alt: Ident });
export const True = createToken({ name: "True", pattern: /true/, longer_alt: Ident });
export const False = createToken({ name: "False", pattern: /false/, longer_alt: Ident });
export const Null = createToken({ name: "Null", pattern: /null/, longer_alt: Ident });

// Soft keywords (field annotations)
export const Default = createToken({ name: "Default", pattern: /default/, longer_alt: Ident, categories: [Ident] });
export const Force = createToken({ name: "Force", pattern: /force/, longer_alt: Ident, categories: [Ident] });
export const Priority = createToken({ name: "Priority", pattern: /priority/, longer_alt: Ident, categories: [Ident] });
export const Optional = createToken({ name: "Optional", pattern: /optional/, longer_alt: Ident, categories: [Ident] });
export const NotExported = createToken({ name: "NotExported", pattern: /not_exported/, longer_alt: Ident, categories: [Ident] });
export const Doc = createToken({ name: "Doc", pattern: /doc/, longer_alt: Ident, categories: [Ident] });

// Literals
export const NumLit = createToken({
  name: "NumLit",
  pattern: /(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/,
});
export const StringLit = createToken({
  name: "StringLit",
  pattern: /"(?:[^"\\]|\\["\\\/bfnrt]|\\u[0-9a-fA-F]{4})*"/,
});
export const EnumTag = createToken({ name: "EnumTag", pattern: /'[A-Za-z_][A-Za-z0-9_]*/ });
export const PrimOp = createToken({ name: "PrimOp", pattern: /%[a-z_]+(?:\/[a-z_]+)*%/ });

// Punctuation
export const EnumOpen = createToken({ name: "EnumOpen", pattern: /\[\|/ });
export const EnumClose = createToken({ name: "EnumClose", pattern: /\|\]/ });
export const LBrace = createToken({ name: "LBrace", pattern: /\{/ });
export const RBrace = createToken({ name: "RBrace", pattern: /\}/ });
export const LBracket = createToken({ name: "LBracket", pattern: /\[/ });
export const RBracket = createToken({ name: "RBracket", pattern: /\]/ });
export const LParen = createToken({ name: "LParen", pattern: /\(/ });
export const RParen = createToken({ name: "RParen", pattern: /\)/ });
export const Comma = createToken({ name: "Comma", pattern: /,/ });
export const DotDot = createToken({ name: "DotDot", pattern: /\.\./ });
export const Dot = createToken({ name: "Dot", pattern: /\./ });
export const FatArrow = createToken({ name: "FatArrow", pattern: /=>/ });
export const Arrow = createToken({ name: "Arrow", pattern: /->/ });
export const EqEq = createToken({ name: "EqEq", pattern: /==/ });
export const BangEq = createToken({ name: "BangEq", pattern: /!=/ });
export const Equals = createToken({ name: "Equals", pattern: /=/ });
export const PipeGt = createToken({ name: "PipeGt", pattern: /\|>/ });
export const OrOr = createToken({ name: "OrOr", pattern: /\|\|/ });
export const Pipe = createToken({ name: "Pipe", pattern: /\|/ });
export const AndAnd = createToken({ name: "AndAnd", pattern: /&&/ });
export const Amp = createToken({ name: "Amp", pattern: /&/ });
export const GtEq = createToken({ name: "GtEq", pattern: />=/ });
export const LtEq = createToken({ name: "LtEq", pattern: /<=/ });
export const Gt = createToken({ name: "Gt", pattern: />/ });
export const Lt = createToken({ name: "Lt", pattern: /</ });
export const Bang = createToken({ name: "Bang", pattern: /!/ });
export const PlusPlus = createToken({ name: "PlusPlus", pattern: /\+\+/ });
export const Plus = createToken({ name: "Plus", pattern: /\+/ });
export const Minus = createToken({ name: "Minus", pattern: /-/ });
export const Star = createToken({ name: "Star", pattern: /\*/ });
export const Slash = createToken({ name: "Slash", pattern: /\// });
export const Percent = createToken({ name: "Percent", pattern: /%/ });
export const At = createToken({ name: "At", pattern: /@/ });

// Whitespace and comments
export const WhiteSpace = createToken({
  name: "WhiteSpace",
  pattern: /[ \t]+/,
  group: Lexer.SKIPPED,
});
export const Newline = createToken({
  name: "Newline",
  pattern: /\r?\n/,
  group: Lexer.SKIPPED,
});
export const Comment = createToken({
  name: "Comment",
  pattern: /#[^\n\r]*/,
  group: Lexer.SKIPPED,
});

// Token order matters: longer/more specific tokens first
export const allTokens = [
  WhiteSpace,
  Newline,
  Comment,
  // Literals that start with punctuation
  StringLit,
  EnumTag,
  PrimOp,
  // Multi-char punctuation before its prefixes
  EnumOpen,   // [| before [
  EnumClose,  // |] before | and ||
  PipeGt,
  OrOr,
  FatArrow,   // => before ==, =
  Arrow,      // -> before -
  EqEq,
  BangEq,
  GtEq,
  LtEq,
  AndAnd,
  PlusPlus,
  DotDot,
  // Keywords before Ident
  Let,
  Rec,
  Fun,
  Then,
  Else,
  Match,
  True,
  False,
  Null,
  Default,
  Force,
  Priority,
  Optional,
  NotExported,
  Doc,
  In,
  If,
  Or,
  Ident,
  NumLit,
  // Single-char punctuation
  LBrace,
  RBrace,
  LBracket,
  RBracket,
  LParen,
  RParen,
  Comma,
  Dot,
  Equals,
  Pipe,
  Amp,
  Gt,
  Lt,
  Bang,
  Plus,
  Minus,
  Star,
  Slash,
  Percent,
  At,
];

export const QuiltLexer = new Lexer(allTokens);
