/**
 * Quilt runtime values. A closed tagged union; every consumer switches on
 * `tag` exhaustively.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import type { Label } from "./label.js";
import { Rational } from "./rational.js";
import type { Env, Thunk } from "./thunk.js";

// --- Priorities ---
export type Priority =
  | { kind: "bottom" }
  | { kind: "default" }
  | { kind: "numeral"; value: number }
  | { kind: "top" };

export const PRIORITY_BOTTOM: Priority = { kind: "bottom" };
export const PRIORITY_DEFAULT: Priority = { kind: "default" };
export const PRIORITY_NORMAL: Priority = { kind: "numeral", value: 0 };
export const PRIORITY_TOP: Priority = { kind: "top" };

const PRIORITY_RANK: Record<Priority["kind"], number> = {
  bottom: 0,
  default: 1,
  numeral: 2,
  top: 3,
};

export function comparePriority(a: Priority, b: Priority): number {
  const rank = PRIORITY_RANK[a.kind] - PRIORITY_RANK[b.kind];
  if (rank !== 0) return Math.sign(rank);
  if (a.kind === "numeral" && b.kind === "numeral") {
    return Math.sign(a.value - b.value);
  }
  return 0;
}

export function maxPriority(a: Priority, b: Priority): Priority {
  return comparePriority(a, b) >= 0 ? a : b;
}

export function formatPriority(p: Priority): string {
  switch (p.kind) {
    case "bottom":
      return "bottom";
    case "default":
      return "default";
    case "numeral":
      return `priority ${p.value}`;
    case "top":
      return "force";
  }
}

// --- Fields and records ---
export interface PendingContract {
  contract: Thunk;
  label: Label;
}

export interface FieldMetadata {
  doc?: string;
  optional: boolean;
  notExported: boolean;
}

export const EMPTY_METADATA: FieldMetadata = { optional: false, notExported: false };

export interface Field {
  /** Absent for declared-but-undefined fields. */
  value?: Thunk;
  priority: Priority;
  pendingContracts: readonly PendingContract[];
  metadata: FieldMetadata;
  /** Where the field was defined, for error messages and queries. */
  span?: Span;
}

/**
 * A record: fields plus the recursive self-environment their values close
 * over. `hidden` keeps bottom-priority bindings of removed fields so that
 * siblings referencing them still resolve; they are never enumerated.
 */
export class RecordValue {
  readonly fields = new Map<string, Field>();
  readonly hidden = new Map<string, Field>();
  readonly self = new Map<string, Thunk>();
  readonly open: boolean;

  constructor(open: boolean) {
    this.open = open;
  }

  get(name: string): Field | undefined {
    return this.fields.get(name);
  }

  has(name: string): boolean {
    return this.fields.has(name);
  }

  /** Fields that exist for enumeration: optional fields without a value are left out. */
  visibleNames(): string[] {
    const names: string[] = [];
    for (const [name, field] of this.fields) {
      if (field.value === undefined && field.metadata.optional) continue;
      names.push(name);
    }
    return names.sort(compareFieldNames);
  }
}

/** Lexicographic by UTF-16 code units, the order used for output. */
export function compareFieldNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

// --- Functions and contracts ---
export interface NativeFn {
  name: string;
  arity: number;
  execute(args: Thunk[], ctx: EvalContext, span: Span): Value;
}

export type FunctionImpl =
  | { kind: "Closure"; params: readonly AST.Pattern[]; body: AST.Expr; env: Env }
  | { kind: "Match"; arms: readonly AST.MatchArm[]; env: Env; span: Span }
  | { kind: "Native"; native: NativeFn; args: readonly Thunk[] };

export type BuiltinContract =
  | { kind: "Number" }
  | { kind: "String" }
  | { kind: "Bool" }
  | { kind: "Dyn" }
  | { kind: "Array"; element: Thunk }
  | { kind: "Arrow"; domain: Thunk; codomain: Thunk }
  | { kind: "Enum"; tags: readonly string[] }
  | { kind: "Predicate"; predicate: Thunk }
  | { kind: "Validator"; validator: Thunk }
  | { kind: "AnyOf"; alternatives: readonly Thunk[] };

// --- Values ---
export type Value =
  | { tag: "Null" }
  | { tag: "Bool"; value: boolean }
  | { tag: "Number"; value: Rational }
  | { tag: "String"; value: string }
  | { tag: "EnumTag"; name: string }
  | { tag: "EnumVariant"; name: string; payload: Thunk }
  | { tag: "Array"; items: readonly Thunk[] }
  | { tag: "Record"; record: RecordValue }
  | { tag: "Function"; fn: FunctionImpl }
  | { tag: "Contract"; contract: BuiltinContract }
  | { tag: "Label"; label: Label }
  | { tag: "Foreign"; name: string; value: unknown };

export type ValueTag = Value["tag"];

export const NULL: Value = { tag: "Null" };
export const TRUE: Value = { tag: "Bool", value: true };
export const FALSE: Value = { tag: "Bool", value: false };

export function mkBool(b: boolean): Value {
  return b ? TRUE : FALSE;
}

export function mkNum(n: Rational | number | bigint): Value {
  return { tag: "Number", value: n instanceof Rational ? n : Rational.fromInt(n) };
}

export function mkStr(s: string): Value {
  return { tag: "String", value: s };
}

export function mkTag(name: string): Value {
  return { tag: "EnumTag", name };
}

export function mkRecord(record: RecordValue): Value {
  return { tag: "Record", record };
}

export function mkArray(items: readonly Thunk[]): Value {
  return { tag: "Array", items };
}

export function mkNative(native: NativeFn): Value {
  return { tag: "Function", fn: { kind: "Native", native, args: [] } };
}

/** The name reported by `typeof` and in type errors. */
export function typeName(v: Value): string {
  switch (v.tag) {
    case "Null":
      return "Null";
    case "Bool":
      return "Bool";
    case "Number":
      return "Number";
    case "String":
      return "String";
    case "EnumTag":
    case "EnumVariant":
      return "Enum";
    case "Array":
      return "Array";
    case "Record":
      return "Record";
    case "Function":
      return "Function";
    case "Contract":
      return "Contract";
    case "Label":
      return "Label";
    case "Foreign":
      return "Foreign";
  }
}
