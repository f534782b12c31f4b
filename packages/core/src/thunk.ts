/**
 * The lazy evaluation substrate: thunks, their suspensions, and immutable
 * environments.
 *
 * A thunk moves through `Unforced -> InProgress -> Forced` exactly once.
 * Forcing a thunk that is `InProgress` is a black hole (infinite recursion).
 * The evaluator drives the transitions; this module only guards them.
 */
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import type { EvalContext } from "./context.js";
import type { PendingContract, RecordValue, Value } from "./value.js";

/**
 * Origin of a field value defined inside a recursive record: the expression,
 * the scope outside the record, and which sibling names it refers to. Enough
 * to re-close the value over a different record after a merge.
 */
export interface RecursiveOrigin {
  outer: Env;
  deps: ReadonlySet<string>;
}

export type Suspension =
  /** Evaluate an expression in an environment. */
  | { kind: "Expr"; expr: AST.Expr; env: Env; recursive?: RecursiveOrigin }
  /** Merge two field values of equal priority. */
  | { kind: "Merge"; left: Thunk; right: Thunk; span?: Span }
  /** Read a record field and apply its pending contracts. */
  | { kind: "Field"; record: RecordValue; name: string }
  /** Apply contracts, in order, to the inner value. */
  | { kind: "Checked"; inner: Thunk; contracts: readonly PendingContract[] }
  /** Host computation; never re-closed. */
  | { kind: "Native"; run: (ctx: EvalContext) => Value };

type ThunkState =
  | { kind: "Unforced" }
  | { kind: "InProgress" }
  | { kind: "Forced"; value: Value };

export type ThunkStatus = ThunkState["kind"];

export class Thunk {
  private state: ThunkState;
  private susp: Suspension | null;

  private constructor(susp: Suspension | null, state: ThunkState) {
    this.susp = susp;
    this.state = state;
  }

  static suspend(susp: Suspension): Thunk {
    return new Thunk(susp, { kind: "Unforced" });
  }

  static of(value: Value): Thunk {
    return new Thunk(null, { kind: "Forced", value });
  }

  /**
   * Allocate a thunk first and build its suspension second, so the suspension
   * can capture an environment that already contains the thunk itself.
   */
  static fix(build: (self: Thunk) => Suspension): Thunk {
    const t = new Thunk(null, { kind: "Unforced" });
    t.susp = build(t);
    return t;
  }

  get status(): ThunkStatus {
    return this.state.kind;
  }

  /** The original computation; null for thunks created from a value. */
  get suspension(): Suspension | null {
    return this.susp;
  }

  peek(): Value | undefined {
    return this.state.kind === "Forced" ? this.state.value : undefined;
  }

  /** Source location of the defining expression, when there is one. */
  get span(): Span | undefined {
    const s = this.susp;
    if (s === null) return undefined;
    switch (s.kind) {
      case "Expr":
        return s.expr.span;
      case "Merge":
        return s.span;
      case "Checked":
        return s.inner.span;
      case "Field": {
        const field = s.record.get(s.name);
        return field?.span ?? field?.value?.span;
      }
      case "Native":
        return undefined;
    }
  }

  /** Unforced -> InProgress. Only legal from Unforced with a suspension. */
  enter(): Suspension {
    if (this.state.kind !== "Unforced" || this.susp === null) {
      throw new Error(`Thunk.enter called in state ${this.state.kind}`);
    }
    this.state = { kind: "InProgress" };
    return this.susp;
  }

  /** InProgress -> Forced. */
  resolve(value: Value): Value {
    this.state = { kind: "Forced", value };
    return value;
  }

  /** InProgress -> Unforced, when the computation failed. */
  abort(): void {
    if (this.state.kind === "InProgress") {
      this.state = { kind: "Unforced" };
    }
  }
}

/**
 * Immutable environment. Extending returns a new scope chained to this one;
 * the bindings of an existing scope never change.
 */
export class Env {
  static readonly empty = new Env(new Map(), null);

  private readonly bindings: ReadonlyMap<string, Thunk>;
  private readonly parent: Env | null;

  private constructor(bindings: ReadonlyMap<string, Thunk>, parent: Env | null) {
    this.bindings = bindings;
    this.parent = parent;
  }

  extend(name: string, thunk: Thunk): Env {
    return new Env(new Map([[name, thunk]]), this);
  }

  extendAll(bindings: ReadonlyMap<string, Thunk>): Env {
    if (bindings.size === 0) return this;
    return new Env(new Map(bindings), this);
  }

  lookup(name: string): Thunk | undefined {
    let env: Env | null = this;
    while (env !== null) {
      const t = env.bindings.get(name);
      if (t !== undefined) return t;
      env = env.parent;
    }
    return undefined;
  }

  has(name: string): boolean {
    return this.lookup(name) !== undefined;
  }
}
