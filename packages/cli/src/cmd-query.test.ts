/**
 * Tests for quilt query command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runQuery } from "./cmd-query.js";

async function captureQuery(
  source: string,
  fieldPath: string,
  opts: { json?: boolean; pretty?: boolean }
): Promise<{ code: number; stdout: string; stderr: string; file: string }> {
  const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "quilt-cli-query-test-"));
  const file = path.join(tmpDir, "main.quilt");
  fs.writeFileSync(file, source, "utf-8");

  const out: string[] = [];
  const err: string[] = [];
  const origLog = console.log;
  const origError = console.error;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  console.error = (...args: unknown[]) => err.push(args.map(String).join(" "));

  try {
    const code = await runQuery(file, fieldPath, { ...opts, cwd: tmpDir, homeDir: tmpDir });
    return { code, stdout: out.join("\n"), stderr: err.join("\n"), file };
  } finally {
    console.log = origLog;
    console.error = origError;
    fs.rmSync(tmpDir, { recursive: true, force: true });
  }
}

const SERVER = '{ server = { port | Number | doc "listen port" | default = 80 } }\n';

describe("quilt query", () => {
  it("prints field metadata", async () => {
    const result = await captureQuery(SERVER, "server.port", {});
    assert.equal(result.code, 0);
    const lines = result.stdout.split("\n");
    assert.deepEqual(lines.slice(0, 8), [
      "Field server.port",
      "  Defined:      yes",
      "  Priority:     default",
      "  Optional:     no",
      "  Not exported: no",
      "  Doc:          listen port",
      `  Contracts:    ${result.file}:1:21`,
      "  Type:         (not evaluated)",
    ]);
  });

  it("prints field metadata as JSON with --json", async () => {
    const result = await captureQuery("{ name | optional | String }\n", "name", { json: true });
    assert.equal(result.code, 0);
    const info: unknown = JSON.parse(result.stdout);
    assert.ok(typeof info === "object" && info !== null);
    assert.ok("defined" in info && "optional" in info && "priority" in info && "contracts" in info);
    assert.equal(info.defined, false);
    assert.equal(info.optional, true);
    assert.equal(info.priority, "priority 0");
    assert.equal(Array.isArray(info.contracts) ? info.contracts.length : -1, 1);
  });

  it("does not force the queried field", async () => {
    const result = await captureQuery("{ a | doc \"broken\" = 1 / 0 }\n", "a", {});
    assert.equal(result.code, 0);
    assert.ok(result.stdout.startsWith("Field a\n  Defined:      yes\n"));
  });

  it("exits 4 on missing fields", async () => {
    const result = await captureQuery("{ a = 1 }\n", "b", {});
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith('{"code":"E_FIELD_MISSING","message":"Field \'b\' not found in record."'));
  });

  it("reports runaway recursion on the query path as E_STACK_DEPTH", async () => {
    const source = "{ x = let rec loop = fun n => loop (n + 1) in loop 0 }\n";
    const result = await captureQuery(source, "x.y", {});
    assert.equal(result.code, 4);
    assert.ok(result.stderr.startsWith('{"code":"E_STACK_DEPTH"'));
  });

  it("exits 2 on parse errors", async () => {
    const result = await captureQuery("{ a = \n", "a", {});
    assert.equal(result.code, 2);
  });
});
