/**
 * The merge operator `&`.
 *
 * Records merge field by field, recursively and lazily: a field defined on
 * both sides with equal priority becomes a deferred merge of the two
 * values, and nothing is forced until that field is read. Other values merge
 * only with an equal value.
 */
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import { emitTrace } from "./context.js";
import { formatSpan } from "./diagnostics.js";
import { valuesEqual } from "./equality.js";
import { BlameError, EvalError } from "./errors.js";
import type { Label } from "./label.js";
import { withFieldPrefix, withMessage, withNotes } from "./label.js";
import { closeRecord } from "./record.js";
import { Thunk } from "./thunk.js";
import { comparePriority, maxPriority, mkRecord, typeName } from "./value.js";
import type { Field, FieldMetadata, PendingContract, RecordValue, Value } from "./value.js";

export interface MergeSites {
  /** The `&` (or repeated field definition) that triggered the merge. */
  op?: Span;
  left?: Span;
  right?: Span;
}

/**
 * Standard merges combine two data values. Contract merges check a value
 * (left) against a record contract (right): extra fields on a closed
 * contract are blamed, and the contract's field contracts are relabelled.
 */
export type MergeMode = { kind: "standard" } | { kind: "contract"; label: Label };

const STANDARD: MergeMode = { kind: "standard" };

export function mergeValues(
  left: Value,
  right: Value,
  ctx: EvalContext,
  sites: MergeSites = {},
  mode: MergeMode = STANDARD
): Value {
  if (left.tag === "Record" && right.tag === "Record") {
    return mkRecord(mergeRecords(left.record, right.record, ctx, sites, mode));
  }
  if (mode.kind === "contract") {
    throw new BlameError(withMessage(mode.label, `expected a record, got a value of type ${typeName(left)}`));
  }
  if (comparable(left) && comparable(right) && valuesEqual(left, right, ctx, sites.op)) {
    return left;
  }
  throw incompatible(left, right, sites);
}

function comparable(v: Value): boolean {
  return v.tag !== "Function" && v.tag !== "Record";
}

function incompatible(left: Value, right: Value, sites: MergeSites): EvalError {
  const what =
    left.tag === right.tag
      ? `two different values of type ${typeName(left)}`
      : `a value of type ${typeName(left)} with a value of type ${typeName(right)}`;
  return new EvalError("E_MERGE_INCOMPATIBLE", `Cannot merge ${what}.`, sites.op ?? sites.left, {
    left: formatSpan(sites.left),
    right: formatSpan(sites.right),
  });
}

export function mergeRecords(
  r1: RecordValue,
  r2: RecordValue,
  ctx: EvalContext,
  sites: MergeSites = {},
  mode: MergeMode = STANDARD
): RecordValue {
  if (mode.kind === "contract" && !r2.open) {
    const extra = r1.visibleNames().filter((name) => !r2.has(name));
    if (extra.length > 0) {
      const label = withNotes(
        withMessage(mode.label, `extra field${extra.length > 1 ? "s" : ""} ${extra.map((n) => `'${n}'`).join(", ")}`),
        ["The record contract is closed; add `..` to accept other fields."]
      );
      emitTrace(ctx, "blame", label.span, { fields: extra });
      throw new BlameError(label, "E_MERGE_UNEXPECTED_FIELD", { fields: extra });
    }
  }

  emitTrace(ctx, "merge", sites.op, {
    mode: mode.kind,
    left: r1.fields.size,
    right: r2.fields.size,
  });

  const fields = new Map<string, Field>();
  for (const [name, f1] of r1.fields) {
    const f2 = r2.get(name);
    if (!f2) {
      fields.set(name, f1);
    } else {
      const right = mode.kind === "contract" ? relabel(f2, mode.label) : f2;
      fields.set(name, mergeFields(f1, right, { op: sites.op, left: f1.span, right: f2.span }));
    }
  }
  for (const [name, f2] of r2.fields) {
    if (!r1.has(name)) {
      fields.set(name, mode.kind === "contract" ? relabel(f2, mode.label) : f2);
    }
  }

  const hidden = new Map<string, Field>(r2.hidden);
  for (const [name, field] of r1.hidden) hidden.set(name, field);

  return closeRecord(fields, r1.open || r2.open, hidden);
}

/** Field contracts of a record contract blame at the outer label's path. */
function relabel(field: Field, outer: Label): Field {
  if (field.pendingContracts.length === 0) return field;
  return {
    ...field,
    pendingContracts: field.pendingContracts.map(
      (pc): PendingContract => ({
        contract: pc.contract,
        label: { ...withFieldPrefix(pc.label, outer.path), polarity: outer.polarity },
      })
    ),
  };
}

/**
 * Combine two definitions of the same field. The higher priority wins
 * without its rival being forced; equal priorities merge the values lazily.
 * A definition always beats a contract-only declaration.
 */
export function mergeFields(f1: Field, f2: Field, sites: MergeSites = {}): Field {
  const pendingContracts = [...f1.pendingContracts, ...f2.pendingContracts];

  let value: Thunk | undefined;
  let winner: Field | null = null;
  let loser: Field | null = null;

  if (f1.value && f2.value) {
    const order = comparePriority(f1.priority, f2.priority);
    if (order > 0) {
      [winner, loser] = [f1, f2];
      value = f1.value;
    } else if (order < 0) {
      [winner, loser] = [f2, f1];
      value = f2.value;
    } else {
      value = Thunk.suspend({
        kind: "Merge",
        left: f1.value,
        right: f2.value,
        span: sites.op ?? f1.span ?? f2.span,
      });
    }
  } else if (f1.value) {
    [winner, loser] = [f1, f2];
    value = f1.value;
  } else if (f2.value) {
    [winner, loser] = [f2, f1];
    value = f2.value;
  }

  const priority = winner ? winner.priority : maxPriority(f1.priority, f2.priority);
  // optional is the conjunction of both sides; doc and not_exported follow an overriding winner.
  const metadata: FieldMetadata =
    winner && loser && loser.value
      ? { ...winner.metadata, optional: f1.metadata.optional && f2.metadata.optional }
      : unionMetadata(winner ?? f1, winner === f2 ? f1 : f2);

  return {
    value,
    priority,
    pendingContracts,
    metadata,
    span: winner?.span ?? f1.span ?? f2.span,
  };
}

function unionMetadata(primary: Field, other: Field): FieldMetadata {
  const doc = primary.metadata.doc ?? other.metadata.doc;
  return {
    ...(doc !== undefined ? { doc } : {}),
    optional: primary.metadata.optional && other.metadata.optional,
    notExported: primary.metadata.notExported || other.metadata.notExported,
  };
}

