/**
 * Tests for the Quilt evaluator.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { execute, normalizeError } from "./evaluator.js";
import type { ExecOptions, ExecResult } from "./evaluator.js";
import type { TraceEvent } from "./context.js";
import { BlameError, EvalError } from "./errors.js";
import type { JsonValue } from "./export.js";

function run(src: string, opts: ExecOptions = {}): ExecResult {
  const pr = parse(src, "test.quilt");
  assert.deepEqual(pr.diagnostics, []);
  assert.ok(pr.program);
  return execute(pr.program, { runId: "test-run", ...opts });
}

function exportOf(src: string, opts: ExecOptions = {}): JsonValue | undefined {
  return run(src, { ...opts, export: true }).json;
}

function errorOf(src: string, opts: ExecOptions = {}): EvalError {
  try {
    run(src, { ...opts, export: true });
  } catch (e) {
    if (e instanceof EvalError) return e;
    throw e;
  }
  assert.fail("expected an evaluation error");
}

describe("Quilt Evaluator", () => {
  it("evaluates arithmetic with precedence", () => {
    assert.equal(exportOf("1 + 2 * 3"), 7);
  });

  it("uses exact rational arithmetic", () => {
    assert.equal(exportOf("0.1 + 0.2 == 0.3"), true);
    assert.deepEqual(exportOf("{ x = 1 / 4 }"), { x: 0.25 });
  });

  it("evaluates let bindings", () => {
    assert.deepEqual(exportOf("let x = 10 in let y = x * 2 in { x = x, y = y }"), { x: 10, y: 20 });
  });

  it("does not evaluate unused bindings", () => {
    assert.deepEqual(exportOf("let boom = 1 / 0 in { ok = true }"), { ok: true });
  });

  it("reports division by zero when the value is needed", () => {
    assert.equal(errorOf("{ x = 1 / 0 }").code, "E_DIVISION_BY_ZERO");
  });

  it("concatenates strings and arrays", () => {
    assert.equal(exportOf('"a" ++ "b"'), "ab");
    assert.deepEqual(exportOf("[1, 2] @ [3]"), [1, 2, 3]);
  });

  it("lets record fields refer to each other", () => {
    assert.deepEqual(exportOf("{ a = 1, b = a + 1 }"), { a: 1, b: 2 });
  });

  it("sorts exported record keys", () => {
    const json = exportOf("{ zeta = 1, alpha = 2, mid = 3 }");
    assert.equal(JSON.stringify(json), '{"alpha":2,"mid":3,"zeta":1}');
  });

  it("detects infinite recursion", () => {
    const err = errorOf("{ a = b, b = a }.a");
    assert.equal(err.code, "E_INFINITE_RECURSION");
  });

  it("detects a let rec binding that is its own definition", () => {
    assert.equal(errorOf("let rec f = f in f").code, "E_INFINITE_RECURSION");
  });

  it("supports let rec", () => {
    assert.equal(exportOf("let rec fact = fun n => if n == 0 then 1 else n * fact (n - 1) in fact 5"), 120);
  });

  it("enforces the depth limit", () => {
    const err = errorOf("let rec loop = fun n => loop (n + 1) in loop 0", { maxDepth: 100 });
    assert.equal(err.code, "E_STACK_DEPTH");
  });

  it("converts a native stack overflow to E_STACK_DEPTH", () => {
    const err = normalizeError(new RangeError("Maximum call stack size exceeded"));
    assert.ok(err instanceof EvalError);
    assert.equal(err.code, "E_STACK_DEPTH");
    const other = new RangeError("Invalid array length");
    assert.equal(normalizeError(other), other);
  });

  it("destructures records in let", () => {
    assert.equal(exportOf("let { a, b = { c } } = { a = 1, b = { c = 2 } } in a + c"), 3);
  });

  it("matches enum variants", () => {
    assert.equal(exportOf("let f = match { 'Ok x => x, 'Error _ => 0 } in f ('Ok 5)"), 5);
    assert.equal(exportOf("let f = match { 'Ok x => x, 'Error _ => 0 } in f ('Error 5)"), 0);
  });

  it("fails when no match arm applies", () => {
    assert.equal(errorOf("(match { 'A => 1 }) 'B").code, "E_NO_MATCH");
  });

  it("exports enum tags as strings", () => {
    assert.deepEqual(exportOf("{ mode = 'fast }"), { mode: "fast" });
  });

  it("curries multi-parameter functions", () => {
    assert.equal(exportOf("let add = fun a b => a + b in let inc = add 1 in inc 41"), 42);
  });

  it("applies functions with the pipe operator", () => {
    assert.equal(exportOf("3 |> (fun x => x * 2)"), 6);
  });

  it("reports unbound identifiers", () => {
    assert.equal(errorOf("missing + 1").code, "E_UNBOUND");
  });

  it("reports applying a non-function", () => {
    assert.equal(errorOf("1 2").code, "E_NOT_A_FUNCTION");
  });

  it("reports missing fields on access", () => {
    const err = errorOf("{ a = 1 }.b");
    assert.equal(err.code, "E_FIELD_MISSING");
    assert.deepEqual(err.details?.["available"], ["a"]);
  });

  it("refuses to export functions", () => {
    assert.equal(errorOf("{ f = fun x => x }").code, "E_NOT_EXPORTABLE");
  });

  it("reports the type of a value", () => {
    assert.equal(exportOf("%typeof% 1"), "Number");
    assert.equal(exportOf("%typeof% { a = 1 }"), "Record");
  });

  it("only forces the scrutinee as far as needed", () => {
    const result = run("let r = { port | Number = \"x\", name = \"ok\" } in r.name");
    assert.deepEqual(result.value, { tag: "String", value: "ok" });
  });
});

describe("Quilt Evaluator: merge", () => {
  it("merges disjoint records", () => {
    assert.deepEqual(exportOf("{ a = 1 } & { b = 2 }"), { a: 1, b: 2 });
  });

  it("merges nested records recursively", () => {
    assert.deepEqual(exportOf("{ s = { a = 1 } } & { s = { b = 2 } }"), { s: { a: 1, b: 2 } });
  });

  it("accepts equal values and rejects different ones", () => {
    assert.deepEqual(exportOf("{ a = 1 } & { a = 1 }"), { a: 1 });
    assert.equal(errorOf("{ a = 1 } & { a = 2 }").code, "E_MERGE_INCOMPATIBLE");
  });

  it("merges conflicting fields only when they are read", () => {
    const result = run("let r = { a = 1, b = 0 } & { a = 2, b = 0 } in r.b");
    assert.equal(result.value.tag, "Number");
    if (result.value.tag === "Number") assert.equal(result.value.value.toNumber(), 0);
  });

  it("lets a higher priority win", () => {
    assert.deepEqual(exportOf("{ a | priority 10 = 1 } & { a | priority 5 = 2 }"), { a: 1 });
    assert.deepEqual(exportOf("{ a | force = 1 } & { a | priority 100 = 2 }"), { a: 1 });
    assert.deepEqual(exportOf("{ a | default = 1 } & { a = 2 }"), { a: 2 });
  });

  it("never forces a losing definition", () => {
    assert.deepEqual(exportOf("{ a | default = (1 / 0) } & { a = 5 }"), { a: 5 });
    assert.deepEqual(exportOf("{ a = 5 } & { a | default = (1 / 0) }"), { a: 5 });
  });

  it("gives the same result in either operand order", () => {
    const left = "{ a = 1, s = { x = 1 }, c | Number }";
    const right = "{ b | default = 2, s = { y = 2 }, c = 3 }";
    const expected = { a: 1, b: 2, c: 3, s: { x: 1, y: 2 } };
    assert.deepEqual(exportOf(`${left} & ${right}`), expected);
    assert.deepEqual(exportOf(`${right} & ${left}`), expected);
    assert.equal(errorOf("{ a = 1 } & { a = 2 }").code, "E_MERGE_INCOMPATIBLE");
    assert.equal(errorOf("{ a = 2 } & { a = 1 }").code, "E_MERGE_INCOMPATIBLE");
  });

  it("keeps a forced value against any later lower definition", () => {
    assert.deepEqual(exportOf("({ f | default = 1 } & { f | force = 2 }) & { f = 3 }"), { f: 2 });
    assert.deepEqual(exportOf("{ f = 3 } & ({ f | force = 2 } & { f | default = 1 })"), { f: 2 });
  });

  it("overrides a field seen by its siblings", () => {
    assert.deepEqual(exportOf("{ base | default = 1, double = base * 2 } & { base = 5 }"), {
      base: 5,
      double: 10,
    });
  });

  it("fills in contract-only fields", () => {
    assert.deepEqual(exportOf("{ a | Number } & { a = 3 }"), { a: 3 });
  });

  it("keeps the contracts of both sides", () => {
    const err = errorOf('{ a | Number } & { a = "x" }');
    assert.ok(err instanceof BlameError);
    assert.equal(err.details?.["path"], "a");
  });

  it("requires a definition on export", () => {
    assert.equal(errorOf("{ a | Number }").code, "E_MISSING_DEFINITION");
  });

  it("skips optional fields without a value", () => {
    assert.deepEqual(exportOf("{ a | optional | Number, b = 1 }"), { b: 1 });
  });

  it("skips fields marked not_exported", () => {
    assert.deepEqual(exportOf('{ secret | not_exported = "s", shown = secret }'), { shown: "s" });
  });

  it("emits merge trace events", () => {
    const events: TraceEvent[] = [];
    run("{ a = 1 } & { b = 2 }", { trace: (ev) => events.push(ev) });
    assert.equal(events[0].event, "run_start");
    assert.equal(events[events.length - 1].event, "run_end");
    assert.equal(events[events.length - 1].data?.["ok"], true);
    assert.ok(events.some((ev) => ev.event === "merge"));
  });

  it("records failures in the run_end event", () => {
    const events: TraceEvent[] = [];
    assert.throws(() => run("missing", { trace: (ev) => events.push(ev) }));
    const end = events[events.length - 1];
    assert.equal(end.event, "run_end");
    assert.equal(end.data?.["ok"], false);
    assert.equal(end.data?.["code"], "E_UNBOUND");
  });
});

describe("Quilt Evaluator: contracts", () => {
  it("blames a field that breaks its contract", () => {
    const err = errorOf('{ port | Number = "x" }');
    assert.ok(err instanceof BlameError);
    assert.equal(err.code, "E_BLAME");
    assert.equal(err.details?.["path"], "port");
    assert.equal(err.label.message, "expected a Number, got a String");
  });

  it("checks function contracts on both sides", () => {
    assert.equal(exportOf("let f = (fun x => x + 1) | Number -> Number in f 2"), 3);

    const err = errorOf('let f = (fun x => x) | Number -> Number in f "a"');
    assert.ok(err instanceof BlameError);
    assert.equal(err.details?.["polarity"], "negative");
    assert.equal(err.details?.["path"], "(argument)");
  });

  it("blames the function for a bad result", () => {
    const err = errorOf('let f = (fun x => "no") | Number -> Number in f 1');
    assert.ok(err instanceof BlameError);
    assert.equal(err.details?.["polarity"], "positive");
    assert.equal(err.details?.["path"], "(result)");
  });

  it("runs user-defined contracts", () => {
    const src = `
      let Pos = fun label value =>
        if value > 0 then value else %contract/blame_with_message% "not positive" label
      in { n | Pos = -3 }`;
    const err = errorOf(src);
    assert.ok(err instanceof BlameError);
    assert.equal(err.label.message, "not positive");
  });

  it("checks array elements lazily", () => {
    const err = errorOf('[1, "a"] | Array Number');
    assert.ok(err instanceof BlameError);
    assert.equal(err.details?.["path"], "[_]");
    assert.equal(exportOf('([1, "a"] | Array Number) |> (fun xs => 0)'), 0);
  });

  it("checks enum contracts", () => {
    assert.deepEqual(exportOf("{ mode | [| 'fast, 'slow |] = 'fast }"), { mode: "fast" });
    const err = errorOf("{ mode | [| 'fast, 'slow |] = 'medium }");
    assert.ok(err instanceof BlameError);
    assert.equal(err.label.message, "expected one of 'fast, 'slow");
  });

  it("rejects extra fields against a closed record contract", () => {
    const err = errorOf("{ a = 1, b = 2 } | { a | Number }");
    assert.equal(err.code, "E_MERGE_UNEXPECTED_FIELD");
    assert.deepEqual(err.details?.["fields"], ["b"]);
  });

  it("accepts extra fields against an open record contract", () => {
    assert.deepEqual(exportOf("{ a = 1, b = 2 } | { a | Number, .. }"), { a: 1, b: 2 });
  });

  it("takes openness of a merged contract from either side", () => {
    const err = errorOf("({ a = 1 } & { b = 2 }) | { a | Number }");
    assert.equal(err.code, "E_MERGE_UNEXPECTED_FIELD");
    assert.deepEqual(exportOf("{ a = 1, b = 2 } | ({ a | Number } & { .. })"), { a: 1, b: 2 });
  });

  it("fills defaults from a record contract", () => {
    assert.deepEqual(exportOf("{ a = 1 } | { a | Number, b | default = 5 }"), { a: 1, b: 5 });
  });

  it("reports nested paths through record contracts", () => {
    const err = errorOf('{ server = { port = "x" } } | { server | { port | Number } }');
    assert.ok(err instanceof BlameError);
    assert.equal(err.details?.["path"], "server.port");
  });

  it("picks the first matching alternative", () => {
    assert.deepEqual(exportOf('{ v | %contract/any_of% [Number, String] = "s" }'), { v: "s" });
    const err = errorOf("{ v | %contract/any_of% [Number, String] = true }");
    assert.ok(err instanceof BlameError);
    assert.equal(err.label.message, "no alternative matched (last: expected a String, got a Bool)");
  });

  it("runs validators", () => {
    const src = `
      let V = %contract/from_validator% (fun x =>
        if x > 0 then 'Ok else 'Error { message = "must be positive" })
      in { n | V = 0 }`;
    const err = errorOf(src);
    assert.ok(err instanceof BlameError);
    assert.equal(err.label.message, "must be positive");
  });

  it("runs predicates", () => {
    const src = "let Even = %contract/from_predicate% (fun x => x % 2 == 0) in { a | Even = 4, b | Even = 3 }";
    const err = errorOf(src);
    assert.ok(err instanceof BlameError);
    assert.equal(err.details?.["path"], "b");
  });
});

describe("Quilt Evaluator: record primitives", () => {
  it("freezes a record against later overrides of its dependencies", () => {
    assert.deepEqual(exportOf("%record/freeze% { x | default = 1, y = x } & { x = 2 }"), { x: 2, y: 1 });
    assert.deepEqual(exportOf("{ x | default = 1, y = x } & { x = 2 }"), { x: 2, y: 2 });
  });

  it("keeps frozen defaults ahead of later defaults", () => {
    assert.deepEqual(exportOf("%record/freeze% { x | default = 1 } & { x | default = 2 }"), { x: 1 });
  });

  it("removes fields", () => {
    assert.deepEqual(exportOf('%record/remove% "b" { a = 1, b = 2 }'), { a: 1 });
    assert.equal(errorOf('%record/remove% "z" { a = 1 }').code, "E_FIELD_MISSING");
    assert.deepEqual(exportOf('%record/remove_with_opts% { strict = false } "z" { a = 1 }'), { a: 1 });
  });

  it("keeps removed fields visible to their siblings", () => {
    assert.deepEqual(exportOf('%record/remove% "a" { a = 1, b = a + 1 }'), { b: 2 });
    assert.deepEqual(exportOf('(%record/remove% "a" { a = 1, b = a + 1 }) & { a = 10 }'), { a: 10, b: 11 });
  });

  it("inserts fields without contracts", () => {
    assert.deepEqual(exportOf('%record/insert% "c" 3 { a = 1 }'), { a: 1, c: 3 });
    assert.deepEqual(exportOf('%record/insert% "a" "x" { a | Number = 1 }'), { a: "x" });
  });

  it("inserts fields with options", () => {
    assert.deepEqual(exportOf("(%record/insert_with_opts% { priority = 'default } \"a\" 1 { b = 2 }) & { a = 5 }"), {
      a: 5,
      b: 2,
    });
    assert.deepEqual(exportOf("%record/insert_with_opts% { not_exported = true } \"a\" 1 { b = 2 }"), { b: 2 });
  });

  it("requires integer numeric priorities in insert options", () => {
    assert.deepEqual(exportOf("(%record/insert_with_opts% { priority = -2 } \"a\" 1 {}) & { a | default = 9 }"), {
      a: 1,
    });
    const err = errorOf("%record/insert_with_opts% { priority = 1 / 3 } \"a\" 1 {}");
    assert.equal(err.code, "E_TYPE");
    assert.equal(err.message, "record/insert_with_opts: a numeric priority must be an integer, got 1/3.");
  });

  it("updates a field but keeps its contracts", () => {
    assert.deepEqual(exportOf('%record/update% "a" 2 { a | Number = 1 }'), { a: 2 });
    assert.equal(errorOf('%record/update% "a" "x" { a | Number = 1 }').code, "E_BLAME");
  });

  it("lists fields in order and skips empty optional fields", () => {
    assert.deepEqual(exportOf("%record/fields% { b = 1, a = 2, c | optional | Number }"), ["a", "b"]);
    assert.equal(exportOf('%record/has_field% "c" { c | optional | Number }'), false);
    assert.equal(exportOf('%record/has_field% "b" { b = 1 }'), true);
  });

  it("lists field values", () => {
    assert.deepEqual(exportOf("%record/values% { b = 1, a = 2 }"), [2, 1]);
  });
});
