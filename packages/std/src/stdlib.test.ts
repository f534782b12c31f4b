/**
 * Tests for the Quilt standard library, run through the evaluator.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { EvalError, execute, parse } from "@quilt/core";
import type { JsonValue } from "@quilt/core";
import { getStdlibFns } from "./index.js";

const stdlib = getStdlibFns();

function run(src: string): JsonValue | undefined {
  const pr = parse(src, "std-test.quilt");
  assert.deepEqual(pr.diagnostics, []);
  assert.ok(pr.program);
  return execute(pr.program, { stdlib, export: true }).json;
}

function errorCode(src: string): string {
  try {
    run(src);
  } catch (e) {
    if (e instanceof EvalError) return e.code;
    throw e;
  }
  assert.fail("expected an evaluation error");
}

describe("getStdlibFns", () => {
  it("registers functions under dotted names", () => {
    assert.ok(stdlib.has("record.insert"));
    assert.ok(stdlib.has("array.fold_left"));
    assert.ok(stdlib.has("typeof"));
    assert.equal(stdlib.get("record.insert")?.arity, 3);
  });

  it("is only reachable through std", () => {
    assert.equal(errorCode("record"), "E_UNBOUND");
    assert.equal(run("std.typeof 1"), "Number");
  });
});

describe("std.record", () => {
  it("wraps the record primitives", () => {
    assert.deepEqual(run('std.record.insert "b" 2 { a = 1 }'), { a: 1, b: 2 });
    assert.deepEqual(run('std.record.remove "a" { a = 1, b = 2 }'), { b: 2 });
    assert.deepEqual(run("std.record.fields { z = 1, y = 2 }"), ["y", "z"]);
    assert.equal(run('std.record.get "a" { a = 5 }'), 5);
  });

  it("maps over fields", () => {
    assert.deepEqual(run("std.record.map (fun name value => value * 10) { a = 1, b = 2 }"), { a: 10, b: 20 });
    assert.deepEqual(run('std.record.map (fun name value => name) { a = 1 }'), { a: "a" });
  });

  it("converts to and from arrays of entries", () => {
    assert.deepEqual(run("std.record.to_array { b = 2, a = 1 }"), [
      { field: "a", value: 1 },
      { field: "b", value: 2 },
    ]);
    assert.deepEqual(run('std.record.from_array [{ field = "x", value = true }]'), { x: true });
    assert.equal(
      errorCode('std.record.from_array [{ field = "x", value = 1 }, { field = "x", value = 2 }]'),
      "E_TYPE"
    );
  });

  it("checks for emptiness", () => {
    assert.equal(run("std.record.is_empty {}"), true);
    assert.equal(run("std.record.is_empty { a | optional | Number }"), true);
    assert.equal(run("std.record.is_empty { a = 1 }"), false);
  });
});

describe("std.array", () => {
  it("measures and indexes", () => {
    assert.equal(run("std.array.length [1, 2, 3]"), 3);
    assert.equal(run("std.array.at 1 [10, 20, 30]"), 20);
    assert.equal(run("std.array.first [10, 20]"), 10);
    assert.equal(run("std.array.last [10, 20]"), 20);
    assert.equal(errorCode("std.array.at 3 [1]"), "E_TYPE");
    assert.equal(errorCode("std.array.first []"), "E_TYPE");
  });

  it("maps lazily", () => {
    assert.equal(run("std.array.length (std.array.map (fun x => 1 / 0) [1, 2])"), 2);
    assert.deepEqual(run("std.array.map (fun x => x + 1) [1, 2]"), [2, 3]);
  });

  it("filters, folds and tests elements", () => {
    assert.deepEqual(run("std.array.filter (fun x => x > 1) [1, 2, 3]"), [2, 3]);
    assert.equal(run("std.array.fold_left (fun acc x => acc + x) 0 [1, 2, 3, 4]"), 10);
    assert.equal(run("std.array.all (fun x => x > 0) [1, 2]"), true);
    assert.equal(run("std.array.any (fun x => x > 5) [1, 2]"), false);
    assert.equal(run("std.array.elem { a = 1 } [{ a = 2 }, { a = 1 }]"), true);
  });

  it("builds arrays", () => {
    assert.deepEqual(run("std.array.range 2 5"), [2, 3, 4]);
    assert.deepEqual(run("std.array.generate (fun i => i * i) 4"), [0, 1, 4, 9]);
    assert.deepEqual(run("std.array.concat [1] [2, 3]"), [1, 2, 3]);
  });

  it("sorts numbers and strings", () => {
    assert.deepEqual(run("std.array.sort [3, 1.5, -2]"), [-2, 1.5, 3]);
    assert.deepEqual(run('std.array.sort ["pear", "apple", "fig"]'), ["apple", "fig", "pear"]);
    assert.equal(errorCode('std.array.sort [1, "a"]'), "E_TYPE");
  });
});

describe("std.string", () => {
  it("counts grapheme clusters", () => {
    assert.equal(run('std.string.length "abc"'), 3);
    assert.equal(run('std.string.length "e\\u0301"'), 1);
    assert.deepEqual(run('std.string.characters "ab"'), ["a", "b"]);
  });

  it("slices and changes case", () => {
    assert.equal(run('std.string.substring 1 3 "hello"'), "el");
    assert.equal(run('std.string.uppercase "abc"'), "ABC");
    assert.equal(run('std.string.lowercase "ABC"'), "abc");
    assert.equal(run('std.string.trim "  x "'), "x");
    assert.equal(errorCode('std.string.substring 2 9 "abc"'), "E_TYPE");
  });

  it("splits and joins", () => {
    assert.deepEqual(run('std.string.split "," "a,b,c"'), ["a", "b", "c"]);
    assert.equal(run('std.string.join "-" ["a", "b"]'), "a-b");
    assert.equal(run('std.string.contains "ell" "hello"'), true);
  });

  it("converts values", () => {
    assert.equal(run("std.string.from 0.5"), "0.5");
    assert.equal(run("std.string.from 'on"), "on");
    assert.equal(run('std.string.to_number "12.5"'), 12.5);
    assert.equal(errorCode('std.string.to_number "twelve"'), "E_TYPE");
  });
});

describe("std.number", () => {
  it("rounds and compares", () => {
    assert.equal(run("std.number.abs (-3)"), 3);
    assert.equal(run("std.number.floor 2.7"), 2);
    assert.equal(run("std.number.ceil 2.1"), 3);
    assert.equal(run("std.number.max 2 7"), 7);
    assert.equal(run("std.number.min 2 7"), 2);
    assert.equal(run("std.number.is_integer 4"), true);
    assert.equal(run("std.number.is_integer 4.5"), false);
  });
});

describe("std predicates and contracts", () => {
  it("tests value types", () => {
    assert.equal(run("std.is_number 1"), true);
    assert.equal(run('std.is_string 1'), false);
    assert.equal(run("std.is_enum 'a"), true);
    assert.equal(run("std.is_function (fun x => x)"), true);
    assert.equal(run("std.is_record {}"), true);
  });

  it("fails with a user message", () => {
    assert.equal(errorCode('std.fail_with "nope"'), "E_USER");
  });

  it("forces values in sequence", () => {
    assert.equal(errorCode("std.seq (1 / 0) 2"), "E_DIVISION_BY_ZERO");
    assert.equal(run("std.seq 1 2"), 2);
    assert.equal(errorCode("std.deep_seq { a = 1 / 0 } 2"), "E_DIVISION_BY_ZERO");
  });

  it("builds contracts", () => {
    const src = `
      let Small = std.contract.from_predicate (fun x => x < 10) in
      { a | Small = 3 }`;
    assert.deepEqual(run(src), { a: 3 });
    assert.equal(errorCode("{ a | std.contract.from_predicate (fun x => x < 10) = 30 }"), "E_BLAME");
  });

  it("applies contracts with custom labels", () => {
    const src = `
      let Tagged = fun label value =>
        std.contract.apply Number (std.contract.label_with_message "needs a number" label) value
      in { a | Tagged = "x" }`;
    try {
      run(src);
      assert.fail("expected blame");
    } catch (e) {
      assert.ok(e instanceof EvalError);
      assert.equal(e.code, "E_BLAME");
      assert.equal(e.details?.["contractMessage"], "needs a number");
    }
  });
});
