import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createContext } from "./context.js";
import { EvalError } from "./errors.js";
import { force } from "./evaluator.js";
import { Env, Thunk } from "./thunk.js";
import { mkNum, mkStr } from "./value.js";

describe("Thunk", () => {
  it("starts forced when built from a value", () => {
    const t = Thunk.of(mkStr("x"));
    assert.equal(t.status, "Forced");
    assert.deepEqual(t.peek(), { tag: "String", value: "x" });
  });

  it("memoizes the first successful result", () => {
    let calls = 0;
    const t = Thunk.suspend({
      kind: "Native",
      run: () => {
        calls++;
        return mkNum(calls);
      },
    });
    const ctx = createContext();
    assert.equal(t.status, "Unforced");
    force(t, ctx);
    force(t, ctx);
    assert.equal(calls, 1);
    assert.equal(t.status, "Forced");
  });

  it("returns to unforced after a failure and can be retried", () => {
    let calls = 0;
    const t = Thunk.suspend({
      kind: "Native",
      run: () => {
        calls++;
        if (calls === 1) throw new EvalError("E_USER", "first attempt fails");
        return mkNum(7);
      },
    });
    const ctx = createContext();
    assert.throws(() => force(t, ctx), (e: unknown) => e instanceof EvalError && e.code === "E_USER");
    assert.equal(t.status, "Unforced");
    assert.equal(ctx.depth, 0);

    const v = force(t, ctx);
    assert.equal(v.tag, "Number");
    assert.equal(calls, 2);
  });

  it("reports a thunk that needs its own value", () => {
    const t = Thunk.fix((self) => ({ kind: "Native", run: (ctx) => force(self, ctx) }));
    const ctx = createContext();
    assert.throws(
      () => force(t, ctx),
      (e: unknown) => e instanceof EvalError && e.code === "E_INFINITE_RECURSION"
    );
    assert.equal(t.status, "Unforced");
  });

  it("refuses to enter a thunk twice", () => {
    const t = Thunk.suspend({ kind: "Native", run: () => mkNum(1) });
    t.enter();
    assert.equal(t.status, "InProgress");
    assert.throws(() => t.enter());
  });

  it("stops at the depth limit", () => {
    const ctx = createContext({ maxDepth: 5 });
    const chain = (n: number): Thunk =>
      n === 0
        ? Thunk.of(mkNum(0))
        : Thunk.suspend({ kind: "Native", run: (c) => force(chain(n - 1), c) });
    assert.throws(
      () => force(chain(10), ctx),
      (e: unknown) => e instanceof EvalError && e.code === "E_STACK_DEPTH"
    );
    assert.equal(ctx.depth, 0);
  });
});

describe("Env", () => {
  it("shadows outer bindings without changing them", () => {
    const one = Thunk.of(mkNum(1));
    const two = Thunk.of(mkNum(2));
    const outer = Env.empty.extend("x", one);
    const inner = outer.extend("x", two);
    assert.equal(inner.lookup("x"), two);
    assert.equal(outer.lookup("x"), one);
    assert.equal(inner.has("y"), false);
  });

  it("returns the same scope when extended with nothing", () => {
    const env = Env.empty.extend("a", Thunk.of(mkNum(1)));
    assert.equal(env.extendAll(new Map()), env);
  });
});
