/**
 * Primitive operators (`%record/insert%`, `%contract/blame%`, ...) and the
 * builtin contract bindings of the root environment.
 */
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import { applyContract, blame } from "./contracts.js";
import { EvalError } from "./errors.js";
import { deepForce, force } from "./evaluator.js";
import { withMessage, withNotes } from "./label.js";
import type { Label } from "./label.js";
import {
  fieldNames,
  fieldValues,
  freezeRecord,
  hasField,
  insertField,
  removeField,
  updateField,
  accessField,
} from "./record.js";
import type { InsertOptions } from "./record.js";
import { Thunk } from "./thunk.js";
import { PRIORITY_BOTTOM, PRIORITY_DEFAULT, PRIORITY_TOP, mkArray, mkBool, mkRecord, mkStr, mkTag, typeName } from "./value.js";
import type { NativeFn, RecordValue, Value, ValueTag } from "./value.js";

// --- Argument helpers (shared with @quilt/std) ---

export function isTag<T extends ValueTag>(v: Value, tag: T): v is Extract<Value, { tag: T }> {
  return v.tag === tag;
}

/** Force an argument and check its type. */
export function forceArg<T extends ValueTag>(
  t: Thunk,
  tag: T,
  who: string,
  ctx: EvalContext,
  span: Span
): Extract<Value, { tag: T }> {
  const v = force(t, ctx);
  if (isTag(v, tag)) return v;
  throw new EvalError("E_TYPE", `${who}: expected a ${tag}, got a ${typeName(v)}.`, span);
}

/** Define a native of fixed arity; arguments arrive as thunks. */
export function native(
  name: string,
  arity: number,
  execute: (args: Thunk[], ctx: EvalContext, span: Span) => Value
): NativeFn {
  return { name, arity, execute };
}

// --- Option records ---

function optionField(rec: RecordValue, name: string, ctx: EvalContext): Value | undefined {
  return rec.has(name) ? accessField(rec, name, ctx) : undefined;
}

function checkOptionNames(rec: RecordValue, allowed: readonly string[], who: string, span: Span): void {
  for (const name of rec.visibleNames()) {
    if (!allowed.includes(name)) {
      throw new EvalError("E_TYPE", `${who}: unknown option '${name}'.`, span, { allowed: [...allowed] });
    }
  }
}

export function parseInsertOptions(rec: RecordValue, ctx: EvalContext, span: Span): InsertOptions {
  const who = "record/insert_with_opts";
  checkOptionNames(rec, ["priority", "optional", "not_exported", "doc"], who, span);
  const opts: InsertOptions = {};

  const priority = optionField(rec, "priority", ctx);
  if (priority !== undefined) {
    if (priority.tag === "EnumTag" && priority.name === "default") opts.priority = PRIORITY_DEFAULT;
    else if (priority.tag === "EnumTag" && priority.name === "force") opts.priority = PRIORITY_TOP;
    else if (priority.tag === "EnumTag" && priority.name === "bottom") opts.priority = PRIORITY_BOTTOM;
    else if (priority.tag === "Number") {
      if (!priority.value.isInteger()) {
        throw new EvalError("E_TYPE", `${who}: a numeric priority must be an integer, got ${priority.value.toString()}.`, span);
      }
      opts.priority = { kind: "numeral", value: priority.value.toNumber() };
    }
    else {
      throw new EvalError("E_TYPE", `${who}: priority must be 'default, 'force, 'bottom or a Number.`, span);
    }
  }
  for (const [key, prop] of [["optional", "optional"], ["not_exported", "notExported"]] as const) {
    const v = optionField(rec, key, ctx);
    if (v === undefined) continue;
    if (v.tag !== "Bool") throw new EvalError("E_TYPE", `${who}: ${key} must be a Bool.`, span);
    opts[prop] = v.value;
  }
  const doc = optionField(rec, "doc", ctx);
  if (doc !== undefined) {
    if (doc.tag !== "String") throw new EvalError("E_TYPE", `${who}: doc must be a String.`, span);
    opts.doc = doc.value;
  }
  return opts;
}

export function parseRemoveOptions(rec: RecordValue, ctx: EvalContext, span: Span): { strict: boolean } {
  const who = "record/remove_with_opts";
  checkOptionNames(rec, ["strict"], who, span);
  const strict = optionField(rec, "strict", ctx);
  if (strict === undefined) return { strict: true };
  if (strict.tag !== "Bool") throw new EvalError("E_TYPE", `${who}: strict must be a Bool.`, span);
  return { strict: strict.value };
}

function labelArg(t: Thunk, who: string, ctx: EvalContext, span: Span): Label {
  return forceArg(t, "Label", who, ctx, span).label;
}

// --- Primitive table ---

const PRIMS: NativeFn[] = [
  native("record/freeze", 1, ([r], ctx, span) =>
    mkRecord(freezeRecord(forceArg(r, "Record", "record/freeze", ctx, span).record, ctx, span))
  ),
  native("record/insert", 3, ([name, value, r], ctx, span) => {
    const who = "record/insert";
    const field = forceArg(name, "String", who, ctx, span).value;
    return mkRecord(insertField(forceArg(r, "Record", who, ctx, span).record, field, value));
  }),
  native("record/insert_with_opts", 4, ([opts, name, value, r], ctx, span) => {
    const who = "record/insert_with_opts";
    const options = parseInsertOptions(forceArg(opts, "Record", who, ctx, span).record, ctx, span);
    const field = forceArg(name, "String", who, ctx, span).value;
    return mkRecord(insertField(forceArg(r, "Record", who, ctx, span).record, field, value, options));
  }),
  native("record/remove", 2, ([name, r], ctx, span) => {
    const who = "record/remove";
    const field = forceArg(name, "String", who, ctx, span).value;
    return mkRecord(removeField(forceArg(r, "Record", who, ctx, span).record, field, { strict: true }, span));
  }),
  native("record/remove_with_opts", 3, ([opts, name, r], ctx, span) => {
    const who = "record/remove_with_opts";
    const options = parseRemoveOptions(forceArg(opts, "Record", who, ctx, span).record, ctx, span);
    const field = forceArg(name, "String", who, ctx, span).value;
    return mkRecord(removeField(forceArg(r, "Record", who, ctx, span).record, field, options, span));
  }),
  native("record/update", 3, ([name, value, r], ctx, span) => {
    const who = "record/update";
    const field = forceArg(name, "String", who, ctx, span).value;
    return mkRecord(updateField(forceArg(r, "Record", who, ctx, span).record, field, value));
  }),
  native("record/has_field", 2, ([name, r], ctx, span) => {
    const who = "record/has_field";
    const field = forceArg(name, "String", who, ctx, span).value;
    return mkBool(hasField(forceArg(r, "Record", who, ctx, span).record, field));
  }),
  native("record/fields", 1, ([r], ctx, span) =>
    mkArray(fieldNames(forceArg(r, "Record", "record/fields", ctx, span).record).map((n) => Thunk.of(mkStr(n))))
  ),
  native("record/values", 1, ([r], ctx, span) =>
    mkArray(fieldValues(forceArg(r, "Record", "record/values", ctx, span).record))
  ),
  native("record/get", 2, ([name, r], ctx, span) => {
    const who = "record/get";
    const field = forceArg(name, "String", who, ctx, span).value;
    return accessField(forceArg(r, "Record", who, ctx, span).record, field, ctx, span);
  }),

  native("contract/apply", 3, ([contract, label, value], ctx, span) =>
    applyContract(force(contract, ctx), labelArg(label, "contract/apply", ctx, span), force(value, ctx), ctx)
  ),
  native("contract/blame", 1, ([label], ctx, span) => blame(labelArg(label, "contract/blame", ctx, span), ctx)),
  native("contract/blame_with_message", 2, ([message, label], ctx, span) => {
    const who = "contract/blame_with_message";
    const text = forceArg(message, "String", who, ctx, span).value;
    return blame(withMessage(labelArg(label, who, ctx, span), text), ctx);
  }),
  native("contract/from_predicate", 1, ([predicate]) => ({
    tag: "Contract",
    contract: { kind: "Predicate", predicate },
  })),
  native("contract/from_validator", 1, ([validator]) => ({
    tag: "Contract",
    contract: { kind: "Validator", validator },
  })),
  native("contract/any_of", 1, ([alternatives], ctx, span) => ({
    tag: "Contract",
    contract: { kind: "AnyOf", alternatives: forceArg(alternatives, "Array", "contract/any_of", ctx, span).items },
  })),
  native("label/with_message", 2, ([message, label], ctx, span) => {
    const who = "label/with_message";
    const text = forceArg(message, "String", who, ctx, span).value;
    return { tag: "Label", label: withMessage(labelArg(label, who, ctx, span), text) };
  }),
  native("label/with_notes", 2, ([notes, label], ctx, span) => {
    const who = "label/with_notes";
    const texts = forceArg(notes, "Array", who, ctx, span).items.map(
      (n) => forceArg(n, "String", who, ctx, span).value
    );
    return { tag: "Label", label: withNotes(labelArg(label, who, ctx, span), texts) };
  }),

  native("typeof", 1, ([v], ctx) => mkTag(typeName(force(v, ctx)))),
  native("seq", 2, ([a, b], ctx) => {
    force(a, ctx);
    return force(b, ctx);
  }),
  native("deep_seq", 2, ([a, b], ctx) => {
    deepForce(force(a, ctx), ctx);
    return force(b, ctx);
  }),
  native("fail_with", 1, ([message], ctx, span) => {
    throw new EvalError("E_USER", forceArg(message, "String", "fail_with", ctx, span).value, span);
  }),
];

const PRIM_TABLE = new Map(PRIMS.map((p) => [p.name, p]));

export function lookupPrim(name: string): NativeFn | undefined {
  return PRIM_TABLE.get(name);
}

// --- Builtin bindings ---

const ARRAY_CONTRACT = native("Array", 1, ([element]) => ({
  tag: "Contract",
  contract: { kind: "Array", element },
}));

/** Names bound in every root environment. */
export function builtinBindings(): Map<string, Thunk> {
  return new Map<string, Thunk>([
    ["Number", Thunk.of({ tag: "Contract", contract: { kind: "Number" } })],
    ["String", Thunk.of({ tag: "Contract", contract: { kind: "String" } })],
    ["Bool", Thunk.of({ tag: "Contract", contract: { kind: "Bool" } })],
    ["Dyn", Thunk.of({ tag: "Contract", contract: { kind: "Dyn" } })],
    ["Array", Thunk.of({ tag: "Function", fn: { kind: "Native", native: ARRAY_CONTRACT, args: [] } })],
  ]);
}
