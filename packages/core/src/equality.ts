/**
 * Structural equality over values, forcing as deep as needed.
 */
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import { EvalError } from "./errors.js";
import { force } from "./evaluator.js";
import type { Value } from "./value.js";

export function valuesEqual(a: Value, b: Value, ctx: EvalContext, span?: Span): boolean {
  if (a.tag === "Function" || b.tag === "Function") {
    throw new EvalError("E_TYPE", "Functions cannot be compared for equality.", span);
  }
  switch (a.tag) {
    case "Null":
      return b.tag === "Null";
    case "Bool":
      return b.tag === "Bool" && a.value === b.value;
    case "Number":
      return b.tag === "Number" && a.value.equals(b.value);
    case "String":
      return b.tag === "String" && a.value === b.value;
    case "EnumTag":
      return b.tag === "EnumTag" && a.name === b.name;
    case "EnumVariant":
      return (
        b.tag === "EnumVariant" &&
        a.name === b.name &&
        valuesEqual(force(a.payload, ctx), force(b.payload, ctx), ctx, span)
      );
    case "Array": {
      if (b.tag !== "Array" || a.items.length !== b.items.length) return false;
      for (let i = 0; i < a.items.length; i++) {
        if (!valuesEqual(force(a.items[i], ctx), force(b.items[i], ctx), ctx, span)) return false;
      }
      return true;
    }
    case "Record": {
      if (b.tag !== "Record") return false;
      const left = a.record.visibleNames();
      const right = b.record.visibleNames();
      if (left.length !== right.length || left.some((name, i) => name !== right[i])) return false;
      for (const name of left) {
        const lt = a.record.self.get(name);
        const rt = b.record.self.get(name);
        if (!lt || !rt) return false;
        if (!valuesEqual(force(lt, ctx), force(rt, ctx), ctx, span)) return false;
      }
      return true;
    }
    case "Contract":
    case "Label":
    case "Foreign":
      return a === b;
  }
}
