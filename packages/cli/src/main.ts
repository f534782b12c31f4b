#!/usr/bin/env -S node --import tsx
/**
 * quilt - configuration language CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { runExport } from "./cmd-export.js";
import { runCheck } from "./cmd-check.js";
import { runQuery } from "./cmd-query.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";

const require = createRequire(import.meta.url);
const pkg = require("../package.json") as { version: string };

const program = new Command();

program
  .name("quilt")
  .description("Quilt: a lazy configuration language with contracts and merging")
  .version(pkg.version);

program
  .command("export")
  .description("Evaluate a configuration and print it as JSON")
  .argument("<file>", "Quilt source file (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .option("--field <path>", "Export only the sub-value at a dotted field path")
  .option("--freeze", "Freeze the top-level record before exporting", false)
  .action(async (file: string, opts: { trace?: string; pretty?: boolean; field?: string; freeze?: boolean }) => {
    const code = await runExport(file, opts);
    process.exit(code);
  });

program
  .command("check")
  .description("Parse without evaluating")
  .argument("<file>", "Quilt source file to check")
  .option("--pretty", "Human-readable output", false)
  .option("--stable-json", "Stable machine-readable success output", false)
  .action(async (file: string, opts: { pretty?: boolean; stableJson?: boolean }) => {
    const code = await runCheck(file, opts);
    process.exit(code);
  });

program
  .command("query")
  .description("Show metadata of a field: contracts, priority, documentation")
  .argument("<file>", "Quilt source file")
  .argument("<path>", "Dotted field path")
  .option("--json", "Output as JSON", false)
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, fieldPath: string, opts: { json?: boolean; pretty?: boolean }) => {
    const code = await runQuery(file, fieldPath, opts);
    process.exit(code);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    const code = await runTrace(file, opts);
    process.exit(code);
  });

program
  .command("config")
  .description("Display effective configuration and resolution source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    const code = await runConfig(opts);
    process.exit(code);
  });

// Reject unknown commands before Commander parses (keeps --help from masking the exit code)
const knownCommands = new Set(["export", "check", "query", "trace", "config", "help"]);
const userArgs = process.argv.slice(2);
const firstPositional = userArgs.find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

program.parseAsync().catch((e: unknown) => {
  console.error(e instanceof Error ? e.message : String(e));
  process.exit(4);
});
