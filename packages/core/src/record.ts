/**
 * Recursive records: building them from literals, re-closing field values
 * over a new self-environment, and the record primitives.
 *
 * Every record-producing operation goes through `closeRecord`, which
 * allocates one self thunk per field and rebinds each field value that
 * refers to a sibling so it reads from the new record. A field with no
 * sibling dependencies keeps its thunk, and therefore its memoized value.
 */
import type * as AST from "./ast.js";
import { freeVars } from "./ast.js";
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import { emitTrace } from "./context.js";
import { applyContracts } from "./contracts.js";
import { EvalError } from "./errors.js";
import { force } from "./evaluator.js";
import { makeLabel } from "./label.js";
import { mergeFields } from "./merge.js";
import { Thunk } from "./thunk.js";
import type { Env, RecursiveOrigin } from "./thunk.js";
import {
  PRIORITY_BOTTOM,
  PRIORITY_DEFAULT,
  PRIORITY_NORMAL,
  PRIORITY_TOP,
  RecordValue,
  compareFieldNames,
} from "./value.js";
import type { Field, PendingContract, Priority, Value } from "./value.js";

// --- Closing ---

/**
 * Build a record whose self-environment is its own field set. `hidden`
 * holds bindings for removed fields: reachable from siblings, never listed.
 */
export function closeRecord(
  fields: ReadonlyMap<string, Field>,
  open: boolean,
  hidden: ReadonlyMap<string, Field> = new Map()
): RecordValue {
  const rec = new RecordValue(open);
  for (const name of fields.keys()) {
    rec.self.set(name, Thunk.suspend({ kind: "Field", record: rec, name }));
  }
  for (const name of hidden.keys()) {
    if (!rec.self.has(name)) {
      rec.self.set(name, Thunk.suspend({ kind: "Field", record: rec, name }));
    }
  }
  for (const [name, field] of fields) {
    rec.fields.set(name, rebindField(field, rec.self));
  }
  for (const [name, field] of hidden) {
    if (!fields.has(name)) {
      rec.hidden.set(name, rebindField(field, rec.self));
    }
  }
  return rec;
}

function rebindField(field: Field, self: ReadonlyMap<string, Thunk>): Field {
  const value = field.value && rebind(field.value, self);
  let changed = value !== field.value;
  const pendingContracts = field.pendingContracts.map((pc) => {
    const contract = rebind(pc.contract, self);
    if (contract !== pc.contract) changed = true;
    return contract === pc.contract ? pc : { ...pc, contract };
  });
  return changed ? { ...field, value, pendingContracts } : field;
}

/**
 * Re-close a suspended field value over a new self-environment. Returns the
 * same thunk when nothing in it refers to a sibling field.
 */
export function rebind(t: Thunk, self: ReadonlyMap<string, Thunk>): Thunk {
  const s = t.suspension;
  if (s === null) return t;
  switch (s.kind) {
    case "Expr": {
      const origin = s.recursive;
      if (!origin || origin.deps.size === 0) return t;
      const scope = new Map<string, Thunk>();
      for (const dep of origin.deps) {
        const target = self.get(dep);
        if (target) scope.set(dep, target);
      }
      return Thunk.suspend({ kind: "Expr", expr: s.expr, env: origin.outer.extendAll(scope), recursive: origin });
    }
    case "Merge": {
      const left = rebind(s.left, self);
      const right = rebind(s.right, self);
      if (left === s.left && right === s.right) return t;
      return Thunk.suspend({ kind: "Merge", left, right, span: s.span });
    }
    case "Checked": {
      const inner = rebind(s.inner, self);
      let changed = inner !== s.inner;
      const contracts = s.contracts.map((pc) => {
        const contract = rebind(pc.contract, self);
        if (contract !== pc.contract) changed = true;
        return { ...pc, contract };
      });
      if (!changed) return t;
      return Thunk.suspend({ kind: "Checked", inner, contracts });
    }
    case "Field":
    case "Native":
      return t;
  }
}

// --- Literals ---

function priorityOf(annot: AST.PriorityAnnot | undefined): Priority {
  if (!annot) return PRIORITY_NORMAL;
  switch (annot.kind) {
    case "default":
      return PRIORITY_DEFAULT;
    case "force":
      return PRIORITY_TOP;
    case "numeral":
      return { kind: "numeral", value: annot.value };
  }
}

/** Evaluate a record literal. Repeated field names are combined by merge. */
export function evalRecordLiteral(expr: AST.RecordExpr, env: Env, ctx: EvalContext): RecordValue {
  const names = new Set(expr.fields.map((f) => f.name));
  const origin = (e: AST.Expr): RecursiveOrigin => {
    const deps = new Set<string>();
    for (const v of freeVars(e)) {
      if (names.has(v)) deps.add(v);
    }
    return { outer: env, deps };
  };
  const suspend = (e: AST.Expr): Thunk =>
    Thunk.suspend({ kind: "Expr", expr: e, env, recursive: origin(e) });

  const drafts = new Map<string, Field>();
  for (const def of expr.fields) {
    const pendingContracts: PendingContract[] = def.annotations.contracts.map((c) => ({
      contract: suspend(c),
      label: { ...makeLabel(c.span, [{ kind: "field", name: def.name }]), valueSpan: def.value?.span },
    }));
    const field: Field = {
      value: def.value && suspend(def.value),
      priority: priorityOf(def.annotations.priority),
      pendingContracts,
      metadata: {
        doc: def.annotations.doc,
        optional: def.annotations.optional,
        notExported: def.annotations.notExported,
      },
      span: def.span,
    };
    const prev = drafts.get(def.name);
    drafts.set(def.name, prev ? mergeFields(prev, field, { op: def.span, left: prev.span, right: def.span }) : field);
  }
  return closeRecord(drafts, expr.open);
}

// --- Access ---

/** `record.name`: force the field through its self thunk. */
export function accessField(rec: RecordValue, name: string, ctx: EvalContext, span?: Span): Value {
  const self = rec.has(name) ? rec.self.get(name) : undefined;
  if (!self) {
    throw new EvalError("E_FIELD_MISSING", `Field '${name}' not found in record.`, span, {
      field: name,
      available: rec.visibleNames(),
    });
  }
  return force(self, ctx);
}

/** Body of a field's self thunk: the value with pending contracts applied. */
export function readField(rec: RecordValue, name: string, ctx: EvalContext): Value {
  const field = rec.fields.get(name) ?? rec.hidden.get(name);
  if (!field) {
    throw new EvalError("E_FIELD_MISSING", `Field '${name}' not found in record.`, undefined, { field: name });
  }
  if (!field.value) {
    throw new EvalError("E_MISSING_DEFINITION", `Field '${name}' is declared but has no definition.`, field.span, {
      field: name,
    });
  }
  return applyContracts(force(field.value, ctx), field.pendingContracts, ctx);
}

// --- Primitives ---

export interface InsertOptions {
  priority?: Priority;
  optional?: boolean;
  notExported?: boolean;
  doc?: string;
}

function withoutName(fields: ReadonlyMap<string, Field>, name: string): Map<string, Field> {
  const out = new Map(fields);
  out.delete(name);
  return out;
}

/**
 * Add or replace a field. The new field has normal priority (unless given),
 * no contracts and the given metadata; any field of that name is discarded.
 */
export function insertField(rec: RecordValue, name: string, value: Thunk, opts: InsertOptions = {}): RecordValue {
  const fields = new Map(rec.fields);
  fields.set(name, {
    value,
    priority: opts.priority ?? PRIORITY_NORMAL,
    pendingContracts: [],
    metadata: {
      doc: opts.doc,
      optional: opts.optional ?? false,
      notExported: opts.notExported ?? false,
    },
    span: value.span,
  });
  return closeRecord(fields, rec.open, withoutName(rec.hidden, name));
}

/**
 * Drop a field. Siblings that refer to it keep seeing its definition through
 * a bottom-priority hidden binding, which any later definition overrides.
 */
export function removeField(
  rec: RecordValue,
  name: string,
  opts: { strict?: boolean } = {},
  span?: Span
): RecordValue {
  const field = rec.get(name);
  if (!field) {
    if (opts.strict ?? true) {
      throw new EvalError("E_FIELD_MISSING", `Cannot remove field '${name}': not found in record.`, span, {
        field: name,
        available: rec.visibleNames(),
      });
    }
    return rec;
  }
  const hidden = new Map(rec.hidden);
  hidden.set(name, { ...field, priority: PRIORITY_BOTTOM });
  return closeRecord(withoutName(rec.fields, name), rec.open, hidden);
}

/**
 * Replace a field's value, keeping its priority, metadata and pending
 * contracts. Inserts a plain field when the name is absent.
 */
export function updateField(rec: RecordValue, name: string, value: Thunk): RecordValue {
  const existing = rec.get(name);
  if (!existing) return insertField(rec, name, value);
  const fields = new Map(rec.fields);
  fields.set(name, { ...existing, value });
  return closeRecord(fields, rec.open, rec.hidden);
}

function frozenPriority(p: Priority): Priority {
  // Keeps the frozen value ahead of later defaults: freeze({x | default = 1}) & {x | default = 2}
  // resolves to 1, while explicit definitions still override it.
  return p.kind === "default" ? { kind: "numeral", value: -1 } : p;
}

/**
 * Force every field (applying its contracts) and store the results as
 * constants, so later merges can override fields but no longer reach the
 * siblings that depended on them.
 */
export function freezeRecord(rec: RecordValue, ctx: EvalContext, span?: Span): RecordValue {
  emitTrace(ctx, "freeze", span, { fields: [...rec.fields.keys()].sort(compareFieldNames) });
  const fields = new Map<string, Field>();
  for (const [name, field] of rec.fields) {
    if (field.value === undefined && field.metadata.optional) {
      // Nothing to force yet; the contracts apply once a value is merged in.
      fields.set(name, field);
      continue;
    }
    const self = rec.self.get(name);
    if (!self) continue;
    const value = force(self, ctx);
    fields.set(name, {
      value: Thunk.of(value),
      priority: frozenPriority(field.priority),
      pendingContracts: [],
      metadata: field.metadata,
      span: field.span,
    });
  }
  return closeRecord(fields, rec.open);
}

export function hasField(rec: RecordValue, name: string): boolean {
  return rec.visibleNames().includes(name);
}

export function fieldNames(rec: RecordValue): string[] {
  return rec.visibleNames();
}

export function fieldValues(rec: RecordValue): Thunk[] {
  const out: Thunk[] = [];
  for (const name of rec.visibleNames()) {
    const t = rec.self.get(name);
    if (t) out.push(t);
  }
  return out;
}
