/**
 * Contract application and blame.
 *
 * A contract is one of: a builtin (`Number`, `Array C`, `A -> B`, ...), a
 * record used as a contract (checked by contract-mode merge), or a function
 * `fun label value => ...` that returns the value, possibly wrapped, or
 * blames the label. Checks on the inside of arrays, records and functions
 * are deferred until those parts are used.
 */
import type { EvalContext } from "./context.js";
import { emitTrace } from "./context.js";
import { BlameError, EvalError, isBlame } from "./errors.js";
import { applyFunction, deepForce, force } from "./evaluator.js";
import type { Label } from "./label.js";
import { flipPolarity, formatPath, withMessage, withNotes, withPath } from "./label.js";
import { mergeRecords } from "./merge.js";
import { Thunk } from "./thunk.js";
import { mkRecord, typeName } from "./value.js";
import type { BuiltinContract, NativeFn, PendingContract, RecordValue, Value } from "./value.js";

/** Raise blame against a label. */
export function blame(label: Label, ctx: EvalContext): never {
  emitTrace(ctx, "blame", label.span, {
    path: formatPath(label.path),
    polarity: label.polarity,
    message: label.message ?? null,
  });
  throw new BlameError(label);
}

export function applyContract(contract: Value, label: Label, value: Value, ctx: EvalContext): Value {
  emitTrace(ctx, "contract_check", label.span, {
    path: formatPath(label.path),
    contract: describeContract(contract),
  });
  switch (contract.tag) {
    case "Contract":
      return applyBuiltin(contract.contract, label, value, ctx);
    case "Record":
      return applyRecordContract(contract.record, label, value, ctx);
    case "Function": {
      const partial = applyFunction(contract, Thunk.of({ tag: "Label", label }), ctx, label.span);
      return applyFunction(partial, Thunk.of(value), ctx, label.span);
    }
    default:
      throw new EvalError(
        "E_TYPE",
        `A value of type ${typeName(contract)} cannot be used as a contract.`,
        label.span
      );
  }
}

/** Apply pending contracts in order. */
export function applyContracts(value: Value, contracts: readonly PendingContract[], ctx: EvalContext): Value {
  let v = value;
  for (const pc of contracts) {
    v = applyContract(force(pc.contract, ctx), pc.label, v, ctx);
  }
  return v;
}

function describeContract(c: Value): string {
  if (c.tag === "Contract") return c.contract.kind;
  return typeName(c);
}

function expectTag(tag: "Number" | "String" | "Bool", label: Label, value: Value, ctx: EvalContext): Value {
  if (value.tag === tag) return value;
  return blame(label.message === undefined ? withMessage(label, `expected a ${tag}, got a ${typeName(value)}`) : label, ctx);
}

function applyBuiltin(c: BuiltinContract, label: Label, value: Value, ctx: EvalContext): Value {
  switch (c.kind) {
    case "Number":
    case "String":
    case "Bool":
      return expectTag(c.kind, label, value, ctx);
    case "Dyn":
      return value;
    case "Array": {
      if (value.tag !== "Array") {
        return blame(withMessage(label, `expected an Array, got a ${typeName(value)}`), ctx);
      }
      const elementLabel = withPath(label, { kind: "element" });
      return {
        tag: "Array",
        items: value.items.map((item) =>
          Thunk.suspend({ kind: "Checked", inner: item, contracts: [{ contract: c.element, label: elementLabel }] })
        ),
      };
    }
    case "Arrow":
      return applyArrow(c.domain, c.codomain, label, value, ctx);
    case "Enum": {
      if (value.tag === "EnumTag" && c.tags.includes(value.name)) return value;
      return blame(
        withMessage(label, `expected one of ${c.tags.map((t) => `'${t}`).join(", ")}`),
        ctx
      );
    }
    case "Predicate": {
      const ok = applyFunction(force(c.predicate, ctx), Thunk.of(value), ctx, label.span);
      if (ok.tag !== "Bool") {
        throw new EvalError("E_TYPE", `A predicate must return a Bool, got a ${typeName(ok)}.`, label.span);
      }
      return ok.value ? value : blame(label, ctx);
    }
    case "Validator":
      return applyValidator(force(c.validator, ctx), label, value, ctx);
    case "AnyOf":
      return applyAnyOf(c.alternatives, label, value, ctx);
  }
}

/**
 * Wrap a function: arguments are checked against the domain with the
 * polarity flipped (the caller is to blame), results against the codomain.
 */
function applyArrow(domain: Thunk, codomain: Thunk, label: Label, value: Value, ctx: EvalContext): Value {
  if (value.tag !== "Function") {
    return blame(withMessage(label, `expected a Function, got a ${typeName(value)}`), ctx);
  }
  const domainLabel = withPath(flipPolarity(label), { kind: "domain" });
  const codomainLabel = withPath(label, { kind: "codomain" });
  const wrapper: NativeFn = {
    name: "<contract>",
    arity: 1,
    execute(args, callCtx, span) {
      const checked = args.map((arg) =>
        Thunk.suspend({ kind: "Checked", inner: arg, contracts: [{ contract: domain, label: domainLabel }] })
      );
      let result: Value = value;
      for (const arg of checked) result = applyFunction(result, arg, callCtx, span);
      return applyContract(force(codomain, callCtx), codomainLabel, result, callCtx);
    },
  };
  return { tag: "Function", fn: { kind: "Native", native: wrapper, args: [] } };
}

function applyRecordContract(contract: RecordValue, label: Label, value: Value, ctx: EvalContext): Value {
  if (value.tag !== "Record") {
    return blame(withMessage(label, `expected a Record, got a ${typeName(value)}`), ctx);
  }
  return mkRecord(
    mergeRecords(value.record, contract, ctx, { op: label.span, right: label.span }, { kind: "contract", label })
  );
}

/** A validator returns `'Ok` or `'Error { message, notes }`. */
function applyValidator(validator: Value, label: Label, value: Value, ctx: EvalContext): Value {
  const result = applyFunction(validator, Thunk.of(value), ctx, label.span);
  if ((result.tag === "EnumTag" || result.tag === "EnumVariant") && result.name === "Ok") {
    return value;
  }
  if (result.tag === "EnumTag" && result.name === "Error") {
    return blame(label, ctx);
  }
  if (result.tag === "EnumVariant" && result.name === "Error") {
    const payload = force(result.payload, ctx);
    let failed = label;
    if (payload.tag === "Record") {
      const message = optionalString(payload.record, "message", ctx);
      if (message !== undefined) failed = withMessage(failed, message);
      const notes = payload.record.self.get("notes");
      if (payload.record.has("notes") && notes) {
        const arr = force(notes, ctx);
        if (arr.tag === "Array") {
          const texts: string[] = [];
          for (const item of arr.items) {
            const note = force(item, ctx);
            if (note.tag === "String") texts.push(note.value);
          }
          failed = withNotes(failed, texts);
        }
      }
    } else if (payload.tag === "String") {
      failed = withMessage(failed, payload.value);
    }
    return blame(failed, ctx);
  }
  throw new EvalError(
    "E_TYPE",
    `A validator must return 'Ok or 'Error, got a ${typeName(result)}.`,
    label.span
  );
}

function optionalString(rec: RecordValue, name: string, ctx: EvalContext): string | undefined {
  const t = rec.has(name) ? rec.self.get(name) : undefined;
  if (!t) return undefined;
  const v = force(t, ctx);
  return v.tag === "String" ? v.value : undefined;
}

/**
 * The first alternative that fully accepts the value wins. Each candidate
 * result is forced deeply so that deferred checks fail here, not later.
 */
function applyAnyOf(alternatives: readonly Thunk[], label: Label, value: Value, ctx: EvalContext): Value {
  let last: BlameError | undefined;
  for (const alt of alternatives) {
    try {
      const checked = applyContract(force(alt, ctx), label, value, ctx);
      deepForce(checked, ctx);
      return checked;
    } catch (e) {
      if (!isBlame(e)) throw e;
      last = e;
    }
  }
  const message = last?.label.message;
  return blame(
    withMessage(label, message !== undefined ? `no alternative matched (last: ${message})` : "no alternative matched"),
    ctx
  );
}
