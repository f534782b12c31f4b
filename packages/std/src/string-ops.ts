/**
 * Quilt stdlib: string operations
 * string.length, string.split, string.join, string.from, string.to_number, ...
 *
 * Lengths, indices and `characters` count grapheme clusters, not UTF-16
 * code units.
 */
import { EvalError, Rational, Thunk, force, forceArg, mkArray, mkBool, mkNum, mkStr, native, typeName } from "@quilt/core";
import type { NativeFn } from "@quilt/core";

const segmenter = new Intl.Segmenter(undefined, { granularity: "grapheme" });

function graphemes(s: string): string[] {
  return Array.from(segmenter.segment(s), (seg) => seg.segment);
}

/** string.length s -> Number */
export const stringLengthFn: NativeFn = native("string.length", 1, ([s], ctx, span) =>
  mkNum(graphemes(forceArg(s, "String", "string.length", ctx, span).value).length)
);

/** string.characters s -> [String] */
export const stringCharactersFn: NativeFn = native("string.characters", 1, ([s], ctx, span) =>
  mkArray(graphemes(forceArg(s, "String", "string.characters", ctx, span).value).map((g) => Thunk.of(mkStr(g))))
);

/**
 * string.substring start end s -> String
 * `end` is exclusive; both must lie within the string.
 */
export const stringSubstringFn: NativeFn = native("string.substring", 3, ([a, b, s], ctx, span) => {
  const who = "string.substring";
  const start = forceArg(a, "Number", who, ctx, span).value;
  const end = forceArg(b, "Number", who, ctx, span).value;
  const chars = graphemes(forceArg(s, "String", who, ctx, span).value);
  if (!start.isInteger() || !end.isInteger()) {
    throw new EvalError("E_TYPE", `${who}: indices must be integers.`, span);
  }
  const from = start.toNumber();
  const to = end.toNumber();
  if (from < 0 || to > chars.length || from > to) {
    throw new EvalError("E_TYPE", `${who}: range ${from}..${to} is invalid for a string of length ${chars.length}.`, span);
  }
  return mkStr(chars.slice(from, to).join(""));
});

/** string.uppercase s -> String */
export const stringUppercaseFn: NativeFn = native("string.uppercase", 1, ([s], ctx, span) =>
  mkStr(forceArg(s, "String", "string.uppercase", ctx, span).value.toUpperCase())
);

/** string.lowercase s -> String */
export const stringLowercaseFn: NativeFn = native("string.lowercase", 1, ([s], ctx, span) =>
  mkStr(forceArg(s, "String", "string.lowercase", ctx, span).value.toLowerCase())
);

/** string.split sep s -> [String] */
export const stringSplitFn: NativeFn = native("string.split", 2, ([sep, s], ctx, span) => {
  const separator = forceArg(sep, "String", "string.split", ctx, span).value;
  const input = forceArg(s, "String", "string.split", ctx, span).value;
  return mkArray(input.split(separator).map((part) => Thunk.of(mkStr(part))));
});

/** string.join sep [String] -> String */
export const stringJoinFn: NativeFn = native("string.join", 2, ([sep, a], ctx, span) => {
  const who = "string.join";
  const separator = forceArg(sep, "String", who, ctx, span).value;
  const parts = forceArg(a, "Array", who, ctx, span).items.map((item) => forceArg(item, "String", who, ctx, span).value);
  return mkStr(parts.join(separator));
});

/** string.trim s -> String */
export const stringTrimFn: NativeFn = native("string.trim", 1, ([s], ctx, span) =>
  mkStr(forceArg(s, "String", "string.trim", ctx, span).value.trim())
);

/** string.contains sub s -> Bool */
export const stringContainsFn: NativeFn = native("string.contains", 2, ([sub, s], ctx, span) => {
  const needle = forceArg(sub, "String", "string.contains", ctx, span).value;
  return mkBool(forceArg(s, "String", "string.contains", ctx, span).value.includes(needle));
});

/**
 * string.from value -> String
 * Numbers, Bools, Strings, enum tags and null.
 */
export const stringFromFn: NativeFn = native("string.from", 1, ([x], ctx, span) => {
  const v = force(x, ctx);
  switch (v.tag) {
    case "String":
      return v;
    case "Number":
      return mkStr(v.value.toString());
    case "Bool":
      return mkStr(String(v.value));
    case "EnumTag":
      return mkStr(v.name);
    case "Null":
      return mkStr("null");
    default:
      throw new EvalError("E_TYPE", `string.from: cannot convert a ${typeName(v)} to a String.`, span);
  }
});

/** string.to_number s -> Number */
export const stringToNumberFn: NativeFn = native("string.to_number", 1, ([s], ctx, span) => {
  const text = forceArg(s, "String", "string.to_number", ctx, span).value;
  const n = Rational.parse(text);
  if (n === null) {
    throw new EvalError("E_TYPE", `string.to_number: '${text}' is not a number.`, span);
  }
  return mkNum(n);
});
