/**
 * Tests for quilt config command behavior.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { runConfig } from "./cmd-config.js";

async function captureConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<{ code: number; stdout: string }> {
  const out: string[] = [];
  const origLog = console.log;
  console.log = (...args: unknown[]) => out.push(args.map(String).join(" "));
  try {
    const code = await runConfig(opts);
    return { code, stdout: out.join("\n") };
  } finally {
    console.log = origLog;
  }
}

describe("quilt config", () => {
  it("reports defaults when no config file exists", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "quilt-cli-config-test-"));
    try {
      const result = await captureConfig({ cwd: tmpDir, homeDir: tmpDir });
      assert.equal(result.code, 0);
      assert.equal(
        result.stdout,
        [
          "Effective quilt configuration",
          "  Source:     default",
          "  Path:       (none)",
          "  Max depth:  1000",
          "  Indent:     2",
          "  Stdlib:     enabled",
        ].join("\n")
      );
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });

  it("reports the project file as JSON with --json", async () => {
    const tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "quilt-cli-config-test-"));
    const rcPath = path.join(tmpDir, ".quiltrc.json");
    fs.writeFileSync(rcPath, '{ "version": 1, "maxDepth": 50, "std": false }', "utf-8");
    try {
      const result = await captureConfig({ json: true, cwd: tmpDir, homeDir: tmpDir });
      assert.equal(result.code, 0);
      assert.deepEqual(JSON.parse(result.stdout), {
        source: "project",
        path: rcPath,
        config: { version: 1, maxDepth: 50, indent: 2, std: false },
      });
    } finally {
      fs.rmSync(tmpDir, { recursive: true, force: true });
    }
  });
});
