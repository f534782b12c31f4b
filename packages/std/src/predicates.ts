/**
 * Quilt stdlib: type predicates and evaluation control
 * typeof, is_number, is_string, ..., seq, deep_seq, fail_with
 */
import { force, mkBool, native } from "@quilt/core";
import type { NativeFn, ValueTag } from "@quilt/core";
import { fromPrim } from "./prim-alias.js";

export const typeofFn = fromPrim("typeof", "typeof");
export const seqFn = fromPrim("seq", "seq");
export const deepSeqFn = fromPrim("deep_seq", "deep_seq");
export const failWithFn = fromPrim("fail_with", "fail_with");

function isA(name: string, tags: readonly ValueTag[]): NativeFn {
  return native(name, 1, ([x], ctx) => mkBool(tags.includes(force(x, ctx).tag)));
}

export const isNumberFn = isA("is_number", ["Number"]);
export const isStringFn = isA("is_string", ["String"]);
export const isBoolFn = isA("is_bool", ["Bool"]);
export const isRecordFn = isA("is_record", ["Record"]);
export const isArrayFn = isA("is_array", ["Array"]);
export const isFunctionFn = isA("is_function", ["Function"]);
export const isEnumFn = isA("is_enum", ["EnumTag", "EnumVariant"]);
