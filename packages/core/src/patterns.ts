/**
 * Pattern matching for `let`, function parameters and `match` arms.
 * Identifier and wildcard patterns never force; everything else forces the
 * scrutinee to weak head normal form.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import { formatSpan } from "./diagnostics.js";
import { EvalError } from "./errors.js";
import { force } from "./evaluator.js";
import { Rational } from "./rational.js";
import type { Thunk } from "./thunk.js";
import { typeName } from "./value.js";
import type { Value } from "./value.js";

export type Bindings = Map<string, Thunk>;

/** Bindings on success, null when the value does not have the pattern's shape. */
export function matchPattern(p: AST.Pattern, t: Thunk, ctx: EvalContext): Bindings | null {
  const out: Bindings = new Map();
  return bind(p, t, ctx, out) ? out : null;
}

/** Like matchPattern, but a mismatch is an error. */
export function destructure(p: AST.Pattern, t: Thunk, ctx: EvalContext, span: Span): Bindings {
  const bindings = matchPattern(p, t, ctx);
  if (bindings === null) {
    throw new EvalError(
      "E_DESTRUCTURE",
      `Value of type ${typeName(force(t, ctx))} does not match the pattern.`,
      p.span,
      { at: formatSpan(span) }
    );
  }
  return bindings;
}

function bind(p: AST.Pattern, t: Thunk, ctx: EvalContext, out: Bindings): boolean {
  switch (p.kind) {
    case "IdentPattern":
      out.set(p.name, t);
      return true;
    case "WildcardPattern":
      return true;
    case "ConstPattern":
      return literalMatches(p.value, force(t, ctx));
    case "EnumPattern": {
      const v = force(t, ctx);
      if (p.payload === undefined) {
        return v.tag === "EnumTag" && v.name === p.tag;
      }
      return v.tag === "EnumVariant" && v.name === p.tag && bind(p.payload, v.payload, ctx, out);
    }
    case "RecordPattern": {
      const v = force(t, ctx);
      if (v.tag !== "Record") return false;
      const rec = v.record;
      const wanted = new Set<string>();
      for (const f of p.fields) {
        wanted.add(f.name);
        const field = rec.get(f.name);
        const self = rec.self.get(f.name);
        if (!field || !self) return false;
        if (field.value === undefined && field.metadata.optional) return false;
        if (f.pattern) {
          if (!bind(f.pattern, self, ctx, out)) return false;
        } else {
          out.set(f.name, self);
        }
      }
      if (!p.open && rec.visibleNames().some((name) => !wanted.has(name))) return false;
      return true;
    }
    case "OrPattern": {
      for (const alt of p.alternatives) {
        const attempt: Bindings = new Map();
        if (bind(alt, t, ctx, attempt)) {
          for (const [name, thunk] of attempt) out.set(name, thunk);
          return true;
        }
      }
      return false;
    }
  }
}

function literalMatches(lit: AST.Literal, v: Value): boolean {
  switch (lit.kind) {
    case "NumLiteral": {
      const n = Rational.parse(lit.text);
      return v.tag === "Number" && n !== null && v.value.equals(n);
    }
    case "StrLiteral":
      return v.tag === "String" && v.value === lit.value;
    case "BoolLiteral":
      return v.tag === "Bool" && v.value === lit.value;
    case "NullLiteral":
      return v.tag === "Null";
  }
}
