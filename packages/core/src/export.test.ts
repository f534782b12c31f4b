/**
 * Tests for JSON export and field queries.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { createContext } from "./context.js";
import { EvalError } from "./errors.js";
import { execute } from "./evaluator.js";
import { exportJson } from "./export.js";
import { parse } from "./parser.js";
import { queryField } from "./query.js";
import type { Value } from "./value.js";

function evalSource(src: string): Value {
  const pr = parse(src, "q.quilt");
  assert.ok(pr.program);
  return execute(pr.program).value;
}

function codeOf(fn: () => unknown): string {
  try {
    fn();
  } catch (e) {
    if (e instanceof EvalError) return e.code;
    throw e;
  }
  assert.fail("expected an evaluation error");
}

describe("exportJson", () => {
  it("pretty-prints with sorted keys", () => {
    const v = evalSource('{ b = [1, 2], a = { y = null, x = "s" } }');
    assert.equal(
      exportJson(v, createContext(), 2),
      '{\n  "a": {\n    "x": "s",\n    "y": null\n  },\n  "b": [\n    1,\n    2\n  ]\n}'
    );
  });

  it("prints compactly with indent 0", () => {
    const v = evalSource("{ n = 1.5, ok = true }");
    assert.equal(exportJson(v, createContext(), 0), '{"n":1.5,"ok":true}');
  });

  it("names the full path of a missing definition", () => {
    const v = evalSource("{ a = { b | Number } }");
    try {
      exportJson(v, createContext());
      assert.fail("expected an error");
    } catch (e) {
      assert.ok(e instanceof EvalError);
      assert.equal(e.code, "E_MISSING_DEFINITION");
      assert.equal(e.message, "Missing definition for field 'a.b'.");
    }
  });

  it("quotes field names that are not identifiers in paths", () => {
    const v = evalSource('{ "content-type" = fun x => x }');
    try {
      exportJson(v, createContext());
      assert.fail("expected an error");
    } catch (e) {
      assert.ok(e instanceof EvalError);
      assert.equal(e.code, "E_NOT_EXPORTABLE");
      assert.equal(e.details?.["path"], '"content-type"');
    }
  });

  it("refuses numbers beyond the range of JSON numbers", () => {
    try {
      exportJson(evalSource("{ a = 1e400 }"), createContext());
      assert.fail("expected an error");
    } catch (e) {
      assert.ok(e instanceof EvalError);
      assert.equal(e.code, "E_NOT_EXPORTABLE");
      assert.equal(e.message, "Number at a is outside the range of JSON numbers.");
    }
    assert.equal(codeOf(() => exportJson(evalSource("{ b = [2 * 1e308] }"), createContext())), "E_NOT_EXPORTABLE");
    assert.equal(exportJson(evalSource("{ c = 1e400 / 1e399 }"), createContext(), 0), '{"c":10}');
  });

  it("refuses enum variants", () => {
    assert.equal(codeOf(() => exportJson(evalSource("{ x = 'Some 1 }"), createContext())), "E_NOT_EXPORTABLE");
  });
});

describe("queryField", () => {
  it("reports metadata without forcing the field", () => {
    const root = evalSource('{ server = { port | Number | doc "listen port" | default = 80 } }');
    const info = queryField(root, ["server", "port"], createContext());
    assert.deepEqual(info.path, ["server", "port"]);
    assert.equal(info.defined, true);
    assert.equal(info.priority, "default");
    assert.equal(info.optional, false);
    assert.equal(info.notExported, false);
    assert.equal(info.doc, "listen port");
    assert.deepEqual(info.contracts, ["q.quilt:1:21"]);
    assert.equal(info.type, undefined);
  });

  it("reports declared fields without a value", () => {
    const root = evalSource("{ name | optional | String }");
    const info = queryField(root, ["name"], createContext());
    assert.equal(info.defined, false);
    assert.equal(info.optional, true);
    assert.equal(info.priority, "priority 0");
  });

  it("combines optional flags of merged definitions", () => {
    const overridden = evalSource("{ a | optional | priority 1 = 1 } & { a = 2 }");
    assert.equal(queryField(overridden, ["a"], createContext()).optional, false);
    const both = evalSource("{ a | optional | priority 1 = 1 } & { a | optional = 2 }");
    assert.equal(queryField(both, ["a"], createContext()).optional, true);
    const docs = evalSource('{ a | doc "kept" | priority 1 = 1 } & { a | doc "dropped" = 2 }');
    assert.equal(queryField(docs, ["a"], createContext()).doc, "kept");
  });

  it("fails on missing fields and non-records", () => {
    const root = evalSource("{ a = 1 }");
    assert.equal(codeOf(() => queryField(root, ["b"], createContext())), "E_FIELD_MISSING");
    assert.equal(codeOf(() => queryField(root, ["a", "b"], createContext())), "E_TYPE");
    assert.equal(codeOf(() => queryField(root, [], createContext())), "E_FIELD_MISSING");
  });
});
