/**
 * Quilt evaluator: call-by-need evaluation of expressions to weak head
 * normal form.
 *
 * Every deferred computation is a Thunk. `force` drives a thunk through
 * Unforced -> InProgress -> Forced; re-entering a thunk that is still in
 * progress is reported as infinite recursion. A failed force leaves the
 * thunk Unforced, so a later attempt re-runs it.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { EvalContext, TraceEvent } from "./context.js";
import { createContext, emitTrace } from "./context.js";
import { formatSpan } from "./diagnostics.js";
import { applyContract, applyContracts } from "./contracts.js";
import { valuesEqual } from "./equality.js";
import { EvalError } from "./errors.js";
import type { JsonValue } from "./export.js";
import { exportValue } from "./export.js";
import { makeLabel } from "./label.js";
import { mergeValues } from "./merge.js";
import { destructure, matchPattern } from "./patterns.js";
import { builtinBindings, lookupPrim } from "./prims.js";
import { Rational } from "./rational.js";
import { accessField, closeRecord, evalRecordLiteral, readField } from "./record.js";
import { Env, Thunk } from "./thunk.js";
import type { Suspension } from "./thunk.js";
import {
  EMPTY_METADATA,
  NULL,
  PRIORITY_NORMAL,
  mkBool,
  mkNative,
  mkNum,
  mkRecord,
  mkStr,
  typeName,
} from "./value.js";
import type { Field, NativeFn, RecordValue, Value } from "./value.js";

// --- Depth accounting ---

function enterFrame(ctx: EvalContext, span?: Span): void {
  if (ctx.depth >= ctx.maxDepth) {
    throw new EvalError(
      "E_STACK_DEPTH",
      `Evaluation exceeded the maximum depth of ${ctx.maxDepth}.`,
      span,
      { maxDepth: ctx.maxDepth }
    );
  }
  ctx.depth++;
}

// --- Forcing ---

export function force(t: Thunk, ctx: EvalContext): Value {
  const ready = t.peek();
  if (ready !== undefined) return ready;
  if (t.status === "InProgress") {
    emitTrace(ctx, "force_error", t.span, { code: "E_INFINITE_RECURSION" });
    throw new EvalError(
      "E_INFINITE_RECURSION",
      "Infinite recursion: this value depends on itself.",
      t.span
    );
  }
  enterFrame(ctx, t.span);
  const susp = t.enter();
  try {
    return t.resolve(runSuspension(susp, ctx));
  } catch (e) {
    t.abort();
    throw e;
  } finally {
    ctx.depth--;
  }
}

function runSuspension(s: Suspension, ctx: EvalContext): Value {
  switch (s.kind) {
    case "Expr":
      return evalExpr(s.expr, s.env, ctx);
    case "Merge":
      return mergeValues(force(s.left, ctx), force(s.right, ctx), ctx, {
        op: s.span,
        left: s.left.span,
        right: s.right.span,
      });
    case "Field":
      return readField(s.record, s.name, ctx);
    case "Checked":
      return applyContracts(force(s.inner, ctx), s.contracts, ctx);
    case "Native":
      return s.run(ctx);
  }
}

/** Force a value all the way down: record fields, array elements, payloads. */
export function deepForce(v: Value, ctx: EvalContext): Value {
  enterFrame(ctx);
  try {
    switch (v.tag) {
      case "Record":
        for (const name of v.record.visibleNames()) {
          const t = v.record.self.get(name);
          if (t) deepForce(force(t, ctx), ctx);
        }
        break;
      case "Array":
        for (const item of v.items) deepForce(force(item, ctx), ctx);
        break;
      case "EnumVariant":
        deepForce(force(v.payload, ctx), ctx);
        break;
      default:
        break;
    }
    return v;
  } finally {
    ctx.depth--;
  }
}

/** Suspend an expression. Variables reuse the bound thunk, so work is shared. */
export function thunkOf(expr: AST.Expr, env: Env): Thunk {
  if (expr.kind === "Var") {
    const bound = env.lookup(expr.name);
    if (bound) return bound;
  }
  return Thunk.suspend({ kind: "Expr", expr, env });
}

// --- Expressions ---

export function evalExpr(expr: AST.Expr, env: Env, ctx: EvalContext): Value {
  enterFrame(ctx, expr.span);
  try {
    return evalNode(expr, env, ctx);
  } finally {
    ctx.depth--;
  }
}

function evalNode(expr: AST.Expr, env: Env, ctx: EvalContext): Value {
  switch (expr.kind) {
    case "NumLiteral": {
      const n = Rational.parse(expr.text);
      if (n === null) {
        throw new EvalError("E_TYPE", `Invalid number literal '${expr.text}'.`, expr.span);
      }
      return mkNum(n);
    }
    case "StrLiteral":
      return mkStr(expr.value);
    case "BoolLiteral":
      return mkBool(expr.value);
    case "NullLiteral":
      return NULL;

    case "Var": {
      const t = env.lookup(expr.name);
      if (!t) {
        throw new EvalError("E_UNBOUND", `Unbound identifier '${expr.name}'.`, expr.span);
      }
      return force(t, ctx);
    }

    case "EnumTagExpr":
      return { tag: "EnumTag", name: expr.tag };
    case "EnumVariantExpr":
      return { tag: "EnumVariant", name: expr.tag, payload: thunkOf(expr.payload, env) };

    case "PrimOpExpr": {
      const prim = lookupPrim(expr.name);
      if (!prim) {
        throw new EvalError("E_UNBOUND", `Unknown primitive operator '%${expr.name}%'.`, expr.span);
      }
      return mkNative(prim);
    }

    case "RecordExpr":
      return mkRecord(evalRecordLiteral(expr, env, ctx));

    case "ArrayExpr":
      return { tag: "Array", items: expr.elements.map((e) => thunkOf(e, env)) };

    case "AccessExpr": {
      const target = evalExpr(expr.target, env, ctx);
      if (target.tag !== "Record") {
        throw new EvalError(
          "E_TYPE",
          `Cannot access field '${expr.field}' of a value of type ${typeName(target)}.`,
          expr.span
        );
      }
      return accessField(target.record, expr.field, ctx, expr.span);
    }

    case "LetExpr":
      return evalLet(expr, env, ctx);

    case "FunExpr":
      return { tag: "Function", fn: { kind: "Closure", params: expr.params, body: expr.body, env } };

    case "AppExpr": {
      const fn = evalExpr(expr.fn, env, ctx);
      return applyFunction(fn, thunkOf(expr.arg, env), ctx, expr.span);
    }

    case "IfExpr": {
      const cond = evalExpr(expr.cond, env, ctx);
      if (cond.tag !== "Bool") {
        throw new EvalError(
          "E_TYPE",
          `'if' condition must be a Bool, got a ${typeName(cond)}.`,
          expr.cond.span
        );
      }
      return evalExpr(cond.value ? expr.then : expr.else, env, ctx);
    }

    case "MatchExpr":
      return { tag: "Function", fn: { kind: "Match", arms: expr.arms, env, span: expr.span } };

    case "BinaryExpr":
      return evalBinary(expr, env, ctx);

    case "UnaryExpr": {
      const v = evalExpr(expr.operand, env, ctx);
      if (expr.op === "-") {
        if (v.tag !== "Number") {
          throw new EvalError("E_TYPE", `Unary '-' expects a Number, got a ${typeName(v)}.`, expr.span);
        }
        return mkNum(v.value.neg());
      }
      if (v.tag !== "Bool") {
        throw new EvalError("E_TYPE", `'!' expects a Bool, got a ${typeName(v)}.`, expr.span);
      }
      return mkBool(!v.value);
    }

    case "AnnotExpr": {
      let v = evalExpr(expr.expr, env, ctx);
      for (const c of expr.contracts) {
        const label = { ...makeLabel(c.span), valueSpan: expr.expr.span };
        v = applyContract(evalExpr(c, env, ctx), label, v, ctx);
      }
      return v;
    }

    case "ArrowExpr":
      return {
        tag: "Contract",
        contract: { kind: "Arrow", domain: thunkOf(expr.domain, env), codomain: thunkOf(expr.codomain, env) },
      };

    case "EnumContractExpr":
      return { tag: "Contract", contract: { kind: "Enum", tags: expr.tags } };
  }
}

function evalLet(expr: AST.LetExpr, env: Env, ctx: EvalContext): Value {
  if (expr.rec && expr.pattern.kind === "IdentPattern") {
    const name = expr.pattern.name;
    const self = Thunk.fix((t) => ({ kind: "Expr", expr: expr.value, env: env.extend(name, t) }));
    return evalExpr(expr.body, env.extend(name, self), ctx);
  }
  const bindings = destructure(expr.pattern, thunkOf(expr.value, env), ctx, expr.span);
  return evalExpr(expr.body, env.extendAll(bindings), ctx);
}

// --- Operators ---

function numbers(op: AST.BinaryOp, l: Value, r: Value, span: Span): [Rational, Rational] {
  if (l.tag !== "Number" || r.tag !== "Number") {
    throw new EvalError(
      "E_TYPE",
      `Operator '${op}' expects Numbers, got ${typeName(l)} and ${typeName(r)}.`,
      span
    );
  }
  return [l.value, r.value];
}

function bool(op: AST.BinaryOp, v: Value, span: Span): boolean {
  if (v.tag !== "Bool") {
    throw new EvalError("E_TYPE", `Operator '${op}' expects Bools, got a ${typeName(v)}.`, span);
  }
  return v.value;
}

function evalBinary(expr: AST.BinaryExpr, env: Env, ctx: EvalContext): Value {
  const { op, span } = expr;

  switch (op) {
    case "&":
      return mergeValues(evalExpr(expr.left, env, ctx), evalExpr(expr.right, env, ctx), ctx, {
        op: span,
        left: expr.left.span,
        right: expr.right.span,
      });
    case "|>":
      return applyFunction(evalExpr(expr.right, env, ctx), thunkOf(expr.left, env), ctx, span);
    case "&&":
      return bool(op, evalExpr(expr.left, env, ctx), span)
        ? mkBool(bool(op, evalExpr(expr.right, env, ctx), span))
        : mkBool(false);
    case "||":
      return bool(op, evalExpr(expr.left, env, ctx), span)
        ? mkBool(true)
        : mkBool(bool(op, evalExpr(expr.right, env, ctx), span));
    default:
      break;
  }

  const l = evalExpr(expr.left, env, ctx);
  const r = evalExpr(expr.right, env, ctx);

  switch (op) {
    case "==":
      return mkBool(valuesEqual(l, r, ctx, span));
    case "!=":
      return mkBool(!valuesEqual(l, r, ctx, span));
    case "<":
    case "<=":
    case ">":
    case ">=": {
      let order: number;
      if (l.tag === "String" && r.tag === "String") {
        order = l.value < r.value ? -1 : l.value > r.value ? 1 : 0;
      } else {
        const [a, b] = numbers(op, l, r, span);
        order = a.compare(b);
      }
      if (op === "<") return mkBool(order < 0);
      if (op === "<=") return mkBool(order <= 0);
      if (op === ">") return mkBool(order > 0);
      return mkBool(order >= 0);
    }
    case "++":
      if (l.tag !== "String" || r.tag !== "String") {
        throw new EvalError(
          "E_TYPE",
          `Operator '++' expects Strings, got ${typeName(l)} and ${typeName(r)}.`,
          span
        );
      }
      return mkStr(l.value + r.value);
    case "@":
      if (l.tag !== "Array" || r.tag !== "Array") {
        throw new EvalError(
          "E_TYPE",
          `Operator '@' expects Arrays, got ${typeName(l)} and ${typeName(r)}.`,
          span
        );
      }
      return { tag: "Array", items: [...l.items, ...r.items] };
    case "+": {
      const [a, b] = numbers(op, l, r, span);
      return mkNum(a.add(b));
    }
    case "-": {
      const [a, b] = numbers(op, l, r, span);
      return mkNum(a.sub(b));
    }
    case "*": {
      const [a, b] = numbers(op, l, r, span);
      return mkNum(a.mul(b));
    }
    case "/":
    case "%": {
      const [a, b] = numbers(op, l, r, span);
      if (b.isZero()) {
        throw new EvalError("E_DIVISION_BY_ZERO", "Division by zero.", span);
      }
      return mkNum(op === "/" ? a.div(b) : a.mod(b));
    }
  }
  throw new EvalError("E_TYPE", `Unknown operator '${op}'.`, span);
}

// --- Application ---

export function applyFunction(fv: Value, arg: Thunk, ctx: EvalContext, span: Span): Value {
  if (fv.tag !== "Function") {
    throw new EvalError(
      "E_NOT_A_FUNCTION",
      `A value of type ${typeName(fv)} cannot be applied.`,
      span
    );
  }
  const fn = fv.fn;
  switch (fn.kind) {
    case "Closure": {
      const [param, ...rest] = fn.params;
      const scope = fn.env.extendAll(destructure(param, arg, ctx, span));
      if (rest.length > 0) {
        return { tag: "Function", fn: { kind: "Closure", params: rest, body: fn.body, env: scope } };
      }
      return evalExpr(fn.body, scope, ctx);
    }
    case "Match": {
      for (const arm of fn.arms) {
        const bindings = matchPattern(arm.pattern, arg, ctx);
        if (bindings !== null) {
          return evalExpr(arm.body, fn.env.extendAll(bindings), ctx);
        }
      }
      throw new EvalError(
        "E_NO_MATCH",
        `No match arm accepts a value of type ${typeName(force(arg, ctx))}.`,
        fn.span,
        { at: formatSpan(span) }
      );
    }
    case "Native": {
      const args = [...fn.args, arg];
      if (args.length < fn.native.arity) {
        return { tag: "Function", fn: { kind: "Native", native: fn.native, args } };
      }
      return fn.native.execute(args, ctx, span);
    }
  }
}

// --- Root environment ---

function constField(v: Value): Field {
  return { value: Thunk.of(v), priority: PRIORITY_NORMAL, pendingContracts: [], metadata: EMPTY_METADATA };
}

/** Nest dotted stdlib names (`record.insert`) into records. */
function namespaceRecord(entries: ReadonlyArray<[string[], NativeFn]>): RecordValue {
  const fields = new Map<string, Field>();
  const groups = new Map<string, Array<[string[], NativeFn]>>();
  for (const [path, fn] of entries) {
    const [head, ...rest] = path;
    if (rest.length === 0) {
      fields.set(head, constField(mkNative(fn)));
    } else {
      const group = groups.get(head) ?? [];
      group.push([rest, fn]);
      groups.set(head, group);
    }
  }
  for (const [name, group] of groups) {
    fields.set(name, constField(mkRecord(namespaceRecord(group))));
  }
  return closeRecord(fields, false);
}

export function rootEnv(ctx: EvalContext): Env {
  const bindings = builtinBindings();
  if (ctx.stdlib.size > 0) {
    const entries: Array<[string[], NativeFn]> = [...ctx.stdlib].map(([name, fn]) => [name.split("."), fn]);
    bindings.set("std", Thunk.of(mkRecord(namespaceRecord(entries))));
  }
  return Env.empty.extendAll(bindings);
}

// --- Top-level execution ---

export interface ExecOptions {
  runId?: string;
  maxDepth?: number;
  trace?: (event: TraceEvent) => void;
  stdlib?: ReadonlyMap<string, NativeFn>;
  /** Deep-force and serialize the result inside the traced run. */
  export?: boolean;
}

export interface ExecResult {
  value: Value;
  json?: JsonValue;
}

/** Native stack overflows surface as E_STACK_DEPTH; other errors pass through. */
export function normalizeError(e: unknown): unknown {
  if (e instanceof RangeError && /call stack/i.test(e.message)) {
    return new EvalError("E_STACK_DEPTH", "Evaluation exceeded the native call stack.");
  }
  return e;
}

export function execute(program: AST.Expr, options: ExecOptions = {}): ExecResult {
  const ctx = createContext(options);
  emitTrace(ctx, "run_start", program.span, { file: program.span.file });

  try {
    const value = evalExpr(program, rootEnv(ctx), ctx);
    const json = options.export ? exportValue(value, ctx) : undefined;
    emitTrace(ctx, "run_end", program.span, { ok: true, result: typeName(value) });
    return json === undefined ? { value } : { value, json };
  } catch (e) {
    const err = normalizeError(e);
    emitTrace(ctx, "run_end", program.span, {
      ok: false,
      code: err instanceof EvalError ? err.code : "E_INTERNAL",
    });
    throw err;
  }
}
