/**
 * Quilt stdlib: record operations
 * record.insert, record.remove, record.update, record.freeze, record.map, ...
 */
import {
  EMPTY_METADATA,
  EvalError,
  PRIORITY_NORMAL,
  Thunk,
  applyFunction,
  closeRecord,
  forceArg,
  mkArray,
  mkBool,
  mkRecord,
  mkStr,
  native,
} from "@quilt/core";
import type { Field, NativeFn, RecordValue } from "@quilt/core";
import { fromPrim } from "./prim-alias.js";

export const recordInsertFn = fromPrim("record.insert", "record/insert");
export const recordInsertWithOptsFn = fromPrim("record.insert_with_opts", "record/insert_with_opts");
export const recordRemoveFn = fromPrim("record.remove", "record/remove");
export const recordRemoveWithOptsFn = fromPrim("record.remove_with_opts", "record/remove_with_opts");
export const recordUpdateFn = fromPrim("record.update", "record/update");
export const recordFreezeFn = fromPrim("record.freeze", "record/freeze");
export const recordHasFieldFn = fromPrim("record.has_field", "record/has_field");
export const recordFieldsFn = fromPrim("record.fields", "record/fields");
export const recordValuesFn = fromPrim("record.values", "record/values");
export const recordGetFn = fromPrim("record.get", "record/get");

function plainField(value: Thunk): Field {
  return { value, priority: PRIORITY_NORMAL, pendingContracts: [], metadata: EMPTY_METADATA, span: value.span };
}

/**
 * record.map (fun name value => ...) rec -> rec
 * Each result is computed when its field is read.
 */
export const recordMapFn: NativeFn = native("record.map", 2, ([f, r], ctx, span) => {
  const fn = forceArg(f, "Function", "record.map", ctx, span);
  const rec = forceArg(r, "Record", "record.map", ctx, span).record;
  const fields = new Map<string, Field>();
  for (const name of rec.visibleNames()) {
    const self = rec.self.get(name);
    if (!self) continue;
    fields.set(
      name,
      plainField(
        Thunk.suspend({
          kind: "Native",
          run: (c) => applyFunction(applyFunction(fn, Thunk.of(mkStr(name)), c, span), self, c, span),
        })
      )
    );
  }
  return mkRecord(closeRecord(fields, false));
});

function entryRecord(name: string, value: Thunk): RecordValue {
  return closeRecord(
    new Map([
      ["field", plainField(Thunk.of(mkStr(name)))],
      ["value", plainField(value)],
    ]),
    false
  );
}

/**
 * record.to_array rec -> [{ field, value }]
 * Entries come out in field-name order.
 */
export const recordToArrayFn: NativeFn = native("record.to_array", 1, ([r], ctx, span) => {
  const rec = forceArg(r, "Record", "record.to_array", ctx, span).record;
  const items: Thunk[] = [];
  for (const name of rec.visibleNames()) {
    const self = rec.self.get(name);
    if (self) items.push(Thunk.of(mkRecord(entryRecord(name, self))));
  }
  return mkArray(items);
});

/**
 * record.from_array [{ field, value }] -> rec
 * A field name may appear only once.
 */
export const recordFromArrayFn: NativeFn = native("record.from_array", 1, ([a], ctx, span) => {
  const who = "record.from_array";
  const items = forceArg(a, "Array", who, ctx, span).items;
  const fields = new Map<string, Field>();
  for (const item of items) {
    const entry = forceArg(item, "Record", who, ctx, span).record;
    const nameThunk = entry.has("field") ? entry.self.get("field") : undefined;
    const valueThunk = entry.has("value") ? entry.self.get("value") : undefined;
    if (!nameThunk || !valueThunk) {
      throw new EvalError("E_TYPE", `${who}: entries must have 'field' and 'value'.`, span);
    }
    const name = forceArg(nameThunk, "String", who, ctx, span).value;
    if (fields.has(name)) {
      throw new EvalError("E_TYPE", `${who}: duplicate field '${name}'.`, span, { field: name });
    }
    fields.set(name, plainField(valueThunk));
  }
  return mkRecord(closeRecord(fields, false));
});

/**
 * record.is_empty rec -> Bool
 */
export const recordIsEmptyFn: NativeFn = native("record.is_empty", 1, ([r], ctx, span) =>
  mkBool(forceArg(r, "Record", "record.is_empty", ctx, span).record.visibleNames().length === 0)
);
