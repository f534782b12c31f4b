/**
 * Quilt stdlib: number operations
 * number.abs, number.floor, number.ceil, number.max, number.min, number.is_integer
 */
import { forceArg, mkBool, mkNum, native } from "@quilt/core";
import type { NativeFn } from "@quilt/core";

export const numberAbsFn: NativeFn = native("number.abs", 1, ([x], ctx, span) =>
  mkNum(forceArg(x, "Number", "number.abs", ctx, span).value.abs())
);

export const numberFloorFn: NativeFn = native("number.floor", 1, ([x], ctx, span) =>
  mkNum(forceArg(x, "Number", "number.floor", ctx, span).value.floor())
);

export const numberCeilFn: NativeFn = native("number.ceil", 1, ([x], ctx, span) =>
  mkNum(forceArg(x, "Number", "number.ceil", ctx, span).value.ceil())
);

/** number.max a b -> Number */
export const numberMaxFn: NativeFn = native("number.max", 2, ([a, b], ctx, span) => {
  const x = forceArg(a, "Number", "number.max", ctx, span).value;
  const y = forceArg(b, "Number", "number.max", ctx, span).value;
  return mkNum(x.compare(y) >= 0 ? x : y);
});

/** number.min a b -> Number */
export const numberMinFn: NativeFn = native("number.min", 2, ([a, b], ctx, span) => {
  const x = forceArg(a, "Number", "number.min", ctx, span).value;
  const y = forceArg(b, "Number", "number.min", ctx, span).value;
  return mkNum(x.compare(y) <= 0 ? x : y);
});

export const numberIsIntegerFn: NativeFn = native("number.is_integer", 1, ([x], ctx, span) =>
  mkBool(forceArg(x, "Number", "number.is_integer", ctx, span).value.isInteger())
);
