/**
 * quilt export - evaluate a configuration and print it as JSON
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import { execute, loadConfig } from "@quilt/core";
import type { Expr, NativeFn, TraceEvent } from "@quilt/core";
import { getStdlibFns } from "@quilt/std";
import { CliIoError, emitCliError, loadProgram, reportError } from "./report.js";

export interface ExportOptions {
  trace?: string;
  pretty?: boolean;
  /** Dotted path of the sub-value to export. */
  field?: string;
  freeze?: boolean;
  cwd?: string;
  homeDir?: string;
}

/** `%record/freeze% program`, then `.a.b` for each `--field` segment. */
function selectTarget(program: Expr, opts: ExportOptions): Expr {
  const span = program.span;
  let target: Expr = program;
  if (opts.freeze) {
    target = { kind: "AppExpr", span, fn: { kind: "PrimOpExpr", span, name: "record/freeze" }, arg: target };
  }
  for (const field of opts.field ? opts.field.split(".") : []) {
    target = { kind: "AccessExpr", span, target, field };
  }
  return target;
}

export async function runExport(file: string, opts: ExportOptions): Promise<number> {
  const pretty = !!opts.pretty;

  const loaded = loadProgram(file, pretty);
  if (!loaded.ok) return loaded.code;

  const config = loadConfig(opts.cwd, opts.homeDir);
  const stdlib = config.std ? getStdlibFns() : new Map<string, NativeFn>();
  const runId = crypto.randomUUID();

  // Trace setup
  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      const msg = e instanceof Error ? e.message : String(e);
      emitCliError("E_IO", `Error opening trace file: ${msg}`, pretty);
      return 4;
    }
  }
  const fd = traceFd;
  const traceHandler =
    fd !== null
      ? (event: TraceEvent) => {
          try {
            fs.writeSync(fd, JSON.stringify(event) + "\n");
          } catch (e) {
            const msg = e instanceof Error ? e.message : String(e);
            throw new CliIoError(`Error writing trace file: ${msg}`);
          }
        }
      : undefined;

  try {
    const result = execute(selectTarget(loaded.program, opts), {
      runId,
      maxDepth: config.maxDepth,
      trace: traceHandler,
      stdlib,
      export: true,
    });
    console.log(JSON.stringify(result.json ?? null, null, config.indent));
    return 0;
  } catch (e) {
    return reportError(e, pretty);
  } finally {
    if (fd !== null) {
      fs.closeSync(fd);
    }
  }
}
