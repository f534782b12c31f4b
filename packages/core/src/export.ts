/**
 * Serialization of fully evaluated values to JSON.
 */
import type { EvalContext } from "./context.js";
import { EvalError } from "./errors.js";
import { force } from "./evaluator.js";
import { formatPath } from "./label.js";
import type { PathElem } from "./label.js";
import { typeName } from "./value.js";
import type { Value } from "./value.js";

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

/**
 * Deep-force `v` and convert it. Record keys come out sorted; hidden fields
 * and optional fields without a value are skipped.
 */
export function exportValue(v: Value, ctx: EvalContext, path: PathElem[] = []): JsonValue {
  switch (v.tag) {
    case "Null":
      return null;
    case "Bool":
      return v.value;
    case "Number": {
      const n = v.value.toNumber();
      if (!Number.isFinite(n)) {
        throw new EvalError(
          "E_NOT_EXPORTABLE",
          `Number at ${formatPath(path)} is outside the range of JSON numbers.`,
          undefined,
          { path: formatPath(path), type: "Number" }
        );
      }
      return n;
    }
    case "String":
      return v.value;
    case "EnumTag":
      return v.name;
    case "Array":
      return v.items.map((item) => exportValue(force(item, ctx), ctx, [...path, { kind: "element" }]));
    case "Record": {
      const out: { [key: string]: JsonValue } = {};
      for (const name of v.record.visibleNames()) {
        const field = v.record.get(name);
        const self = v.record.self.get(name);
        if (!field || !self || field.metadata.notExported) continue;
        const fieldPath: PathElem[] = [...path, { kind: "field", name }];
        if (field.value === undefined) {
          throw new EvalError(
            "E_MISSING_DEFINITION",
            `Missing definition for field '${formatPath(fieldPath)}'.`,
            field.span,
            { path: formatPath(fieldPath) }
          );
        }
        out[name] = exportValue(force(self, ctx), ctx, fieldPath);
      }
      return out;
    }
    case "EnumVariant":
    case "Function":
    case "Contract":
    case "Label":
    case "Foreign":
      throw new EvalError(
        "E_NOT_EXPORTABLE",
        `Cannot export a value of type ${v.tag === "EnumVariant" ? "Enum variant" : typeName(v)} at ${formatPath(path)}.`,
        undefined,
        { path: formatPath(path), type: typeName(v) }
      );
  }
}

export function exportJson(v: Value, ctx: EvalContext, indent = 2): string {
  return JSON.stringify(exportValue(v, ctx), null, indent);
}
