/**
 * Quilt stdlib: array operations
 * array.length, array.at, array.map, array.filter, array.fold_left, ...
 */
import {
  EvalError,
  Thunk,
  applyFunction,
  force,
  forceArg,
  mkArray,
  mkBool,
  mkNum,
  mkStr,
  native,
  typeName,
  valuesEqual,
} from "@quilt/core";
import type { EvalContext, NativeFn, Span, Value } from "@quilt/core";

function call(fn: Value, args: Thunk[], ctx: EvalContext, span: Span): Value {
  let result = fn;
  for (const arg of args) result = applyFunction(result, arg, ctx, span);
  return result;
}

function predicate(fn: Value, item: Thunk, who: string, ctx: EvalContext, span: Span): boolean {
  const v = call(fn, [item], ctx, span);
  if (v.tag !== "Bool") {
    throw new EvalError("E_TYPE", `${who}: the predicate must return a Bool, got a ${typeName(v)}.`, span);
  }
  return v.value;
}

function intArg(t: Thunk, who: string, ctx: EvalContext, span: Span): number {
  const n = forceArg(t, "Number", who, ctx, span).value;
  if (!n.isInteger()) {
    throw new EvalError("E_TYPE", `${who}: expected an integer, got ${n.toString()}.`, span);
  }
  return n.toNumber();
}

/**
 * array.length arr -> Number
 */
export const arrayLengthFn: NativeFn = native("array.length", 1, ([a], ctx, span) =>
  mkNum(forceArg(a, "Array", "array.length", ctx, span).items.length)
);

/**
 * array.at index arr -> value
 * Zero-based; an index outside the array is an error.
 */
export const arrayAtFn: NativeFn = native("array.at", 2, ([i, a], ctx, span) => {
  const who = "array.at";
  const index = intArg(i, who, ctx, span);
  const items = forceArg(a, "Array", who, ctx, span).items;
  const item = index >= 0 ? items[index] : undefined;
  if (!item) {
    throw new EvalError("E_TYPE", `${who}: index ${index} out of bounds for an array of length ${items.length}.`, span);
  }
  return force(item, ctx);
});

/** array.first arr -> value */
export const arrayFirstFn: NativeFn = native("array.first", 1, ([a], ctx, span) => {
  const items = forceArg(a, "Array", "array.first", ctx, span).items;
  if (items.length === 0) throw new EvalError("E_TYPE", "array.first: empty array.", span);
  return force(items[0], ctx);
});

/** array.last arr -> value */
export const arrayLastFn: NativeFn = native("array.last", 1, ([a], ctx, span) => {
  const items = forceArg(a, "Array", "array.last", ctx, span).items;
  if (items.length === 0) throw new EvalError("E_TYPE", "array.last: empty array.", span);
  return force(items[items.length - 1], ctx);
});

/**
 * array.map f arr -> arr
 * Elements are mapped lazily.
 */
export const arrayMapFn: NativeFn = native("array.map", 2, ([f, a], ctx, span) => {
  const fn = forceArg(f, "Function", "array.map", ctx, span);
  const items = forceArg(a, "Array", "array.map", ctx, span).items;
  return mkArray(items.map((item) => Thunk.suspend({ kind: "Native", run: (c) => call(fn, [item], c, span) })));
});

/** array.filter pred arr -> arr */
export const arrayFilterFn: NativeFn = native("array.filter", 2, ([f, a], ctx, span) => {
  const fn = forceArg(f, "Function", "array.filter", ctx, span);
  const items = forceArg(a, "Array", "array.filter", ctx, span).items;
  return mkArray(items.filter((item) => predicate(fn, item, "array.filter", ctx, span)));
});

/**
 * array.fold_left (fun acc x => ...) init arr -> value
 */
export const arrayFoldLeftFn: NativeFn = native("array.fold_left", 3, ([f, init, a], ctx, span) => {
  const fn = forceArg(f, "Function", "array.fold_left", ctx, span);
  const items = forceArg(a, "Array", "array.fold_left", ctx, span).items;
  let acc = init;
  for (const item of items) {
    acc = Thunk.of(call(fn, [acc, item], ctx, span));
  }
  return force(acc, ctx);
});

/** array.concat xs ys -> arr */
export const arrayConcatFn: NativeFn = native("array.concat", 2, ([a, b], ctx, span) =>
  mkArray([
    ...forceArg(a, "Array", "array.concat", ctx, span).items,
    ...forceArg(b, "Array", "array.concat", ctx, span).items,
  ])
);

/** array.all pred arr -> Bool */
export const arrayAllFn: NativeFn = native("array.all", 2, ([f, a], ctx, span) => {
  const fn = forceArg(f, "Function", "array.all", ctx, span);
  const items = forceArg(a, "Array", "array.all", ctx, span).items;
  return mkBool(items.every((item) => predicate(fn, item, "array.all", ctx, span)));
});

/** array.any pred arr -> Bool */
export const arrayAnyFn: NativeFn = native("array.any", 2, ([f, a], ctx, span) => {
  const fn = forceArg(f, "Function", "array.any", ctx, span);
  const items = forceArg(a, "Array", "array.any", ctx, span).items;
  return mkBool(items.some((item) => predicate(fn, item, "array.any", ctx, span)));
});

/** array.elem x arr -> Bool */
export const arrayElemFn: NativeFn = native("array.elem", 2, ([x, a], ctx, span) => {
  const needle = force(x, ctx);
  const items = forceArg(a, "Array", "array.elem", ctx, span).items;
  return mkBool(items.some((item) => valuesEqual(needle, force(item, ctx), ctx, span)));
});

/**
 * array.generate f n -> [f 0, ..., f (n - 1)]
 */
export const arrayGenerateFn: NativeFn = native("array.generate", 2, ([f, n], ctx, span) => {
  const fn = forceArg(f, "Function", "array.generate", ctx, span);
  const count = intArg(n, "array.generate", ctx, span);
  if (count < 0) throw new EvalError("E_TYPE", "array.generate: the length must not be negative.", span);
  const items: Thunk[] = [];
  for (let i = 0; i < count; i++) {
    const index = Thunk.of(mkNum(i));
    items.push(Thunk.suspend({ kind: "Native", run: (c) => call(fn, [index], c, span) }));
  }
  return mkArray(items);
});

/**
 * array.range start end -> [start, ..., end - 1]
 */
export const arrayRangeFn: NativeFn = native("array.range", 2, ([s, e], ctx, span) => {
  const start = intArg(s, "array.range", ctx, span);
  const end = intArg(e, "array.range", ctx, span);
  const items: Thunk[] = [];
  for (let i = start; i < end; i++) items.push(Thunk.of(mkNum(i)));
  return mkArray(items);
});

/**
 * array.sort arr -> arr
 * Sorts an array of Numbers or an array of Strings in ascending order.
 */
export const arraySortFn: NativeFn = native("array.sort", 1, ([a], ctx, span) => {
  const who = "array.sort";
  const values = forceArg(a, "Array", who, ctx, span).items.map((item) => force(item, ctx));
  if (values.every((v) => v.tag === "Number")) {
    const nums = values.flatMap((v) => (v.tag === "Number" ? [v.value] : []));
    return mkArray(nums.sort((x, y) => x.compare(y)).map((n) => Thunk.of(mkNum(n))));
  }
  if (values.every((v) => v.tag === "String")) {
    const strs = values.flatMap((v) => (v.tag === "String" ? [v.value] : []));
    return mkArray(strs.sort((x, y) => (x < y ? -1 : x > y ? 1 : 0)).map((s) => Thunk.of(mkStr(s))));
  }
  throw new EvalError("E_TYPE", `${who}: expected an array of Numbers or of Strings.`, span);
});
