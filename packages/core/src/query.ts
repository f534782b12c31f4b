/**
 * Field metadata lookup for `quilt query`. Walks a path of record fields and
 * reports what is known about the last one without forcing its value.
 */
import type { EvalContext } from "./context.js";
import { formatSpan } from "./diagnostics.js";
import { EvalError } from "./errors.js";
import { accessField } from "./record.js";
import { formatPriority, typeName } from "./value.js";
import type { Value } from "./value.js";

export interface FieldInfo {
  path: string[];
  defined: boolean;
  priority: string;
  optional: boolean;
  notExported: boolean;
  doc?: string;
  /** Source locations of the contract annotations still attached. */
  contracts: string[];
  /** Type of the value, when it has already been computed. */
  type?: string;
  span?: string;
}

export function queryField(root: Value, path: readonly string[], ctx: EvalContext): FieldInfo {
  if (path.length === 0) {
    throw new EvalError("E_FIELD_MISSING", "A query needs at least one field name.");
  }
  let current = root;
  for (let i = 0; i < path.length; i++) {
    const name = path[i];
    if (current.tag !== "Record") {
      throw new EvalError(
        "E_TYPE",
        `Cannot query field '${name}' of a value of type ${typeName(current)}.`,
        undefined,
        { path: path.slice(0, i).join(".") }
      );
    }
    const rec = current.record;
    if (i < path.length - 1) {
      current = accessField(rec, name, ctx);
      continue;
    }
    const field = rec.get(name);
    if (!field) {
      throw new EvalError("E_FIELD_MISSING", `Field '${name}' not found in record.`, undefined, {
        field: name,
        available: rec.visibleNames(),
      });
    }
    const computed = rec.self.get(name)?.peek();
    return {
      path: [...path],
      defined: field.value !== undefined,
      priority: formatPriority(field.priority),
      optional: field.metadata.optional,
      notExported: field.metadata.notExported,
      ...(field.metadata.doc !== undefined ? { doc: field.metadata.doc } : {}),
      contracts: field.pendingContracts.map((pc) => formatSpan(pc.label.span)),
      ...(computed !== undefined ? { type: typeName(computed) } : {}),
      ...(field.span !== undefined ? { span: formatSpan(field.span) } : {}),
    };
  }
  throw new EvalError("E_FIELD_MISSING", `Field '${path.join(".")}' not found.`);
}
