/**
 * Shared source loading and error reporting for quilt commands.
 */
import * as fs from "node:fs";
import { BlameError, EvalError, formatDiagnostic, formatDiagnostics, parse } from "@quilt/core";
import type { Expr } from "@quilt/core";

export class CliIoError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliIoError";
  }
}

export function emitCliError(code: string, message: string, pretty: boolean): void {
  console.error(formatDiagnostic({ code, message }, pretty));
}

/** Read a source file (`-` for stdin). */
export function readSource(file: string): string {
  try {
    return fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new CliIoError(`Error reading file: ${msg}`);
  }
}

export type LoadResult = { ok: true; program: Expr } | { ok: false; code: number };

/** Read and parse; diagnostics are printed and mapped to an exit code. */
export function loadProgram(file: string, pretty: boolean): LoadResult {
  let source: string;
  try {
    source = readSource(file);
  } catch (e) {
    emitCliError("E_IO", e instanceof Error ? e.message : String(e), pretty);
    return { ok: false, code: 4 };
  }

  const parseResult = parse(source, file);
  if (parseResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty));
    return { ok: false, code: 2 };
  }
  if (!parseResult.program) {
    emitCliError("E_PARSE", "Parse produced no program.", pretty);
    return { ok: false, code: 2 };
  }
  return { ok: true, program: parseResult.program };
}

/**
 * Print an evaluation failure and return the exit code:
 * 5 for contract blame, 4 for every other runtime or I/O error.
 */
export function reportError(e: unknown, pretty: boolean): number {
  if (e instanceof CliIoError) {
    emitCliError("E_IO", e.message, pretty);
    return 4;
  }
  if (e instanceof EvalError) {
    if (pretty) {
      const hint = e instanceof BlameError && e.label.notes.length > 0 ? e.label.notes.join(" ") : undefined;
      console.error(formatDiagnostic({ code: e.code, message: e.message, span: e.span, hint }, true));
    } else {
      console.error(JSON.stringify({ code: e.code, message: e.message, span: e.span, details: e.details }));
    }
    return e instanceof BlameError ? 5 : 4;
  }
  const msg = e instanceof Error ? e.message : String(e);
  emitCliError("E_RUNTIME", msg, pretty);
  return 4;
}
