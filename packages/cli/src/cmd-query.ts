/**
 * quilt query - show what is known about one field
 */
import { createContext, evalExpr, loadConfig, normalizeError, queryField, rootEnv } from "@quilt/core";
import type { NativeFn } from "@quilt/core";
import { getStdlibFns } from "@quilt/std";
import { loadProgram, reportError } from "./report.js";

const yesNo = (b: boolean): string => (b ? "yes" : "no");

export async function runQuery(
  file: string,
  fieldPath: string,
  opts: { json?: boolean; pretty?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const pretty = !!opts.pretty;
  const loaded = loadProgram(file, pretty);
  if (!loaded.ok) return loaded.code;

  const config = loadConfig(opts.cwd, opts.homeDir);
  const ctx = createContext({
    maxDepth: config.maxDepth,
    stdlib: config.std ? getStdlibFns() : new Map<string, NativeFn>(),
  });

  try {
    const root = evalExpr(loaded.program, rootEnv(ctx), ctx);
    const info = queryField(root, fieldPath.split("."), ctx);

    if (opts.json) {
      console.log(JSON.stringify(info, null, 2));
      return 0;
    }

    console.log(`Field ${info.path.join(".")}`);
    console.log(`  Defined:      ${yesNo(info.defined)}`);
    console.log(`  Priority:     ${info.priority}`);
    console.log(`  Optional:     ${yesNo(info.optional)}`);
    console.log(`  Not exported: ${yesNo(info.notExported)}`);
    if (info.doc !== undefined) {
      console.log(`  Doc:          ${info.doc}`);
    }
    console.log(`  Contracts:    ${info.contracts.length > 0 ? info.contracts.join(", ") : "(none)"}`);
    console.log(`  Type:         ${info.type ?? "(not evaluated)"}`);
    if (info.span !== undefined) {
      console.log(`  Defined at:   ${info.span}`);
    }
    return 0;
  } catch (e) {
    return reportError(normalizeError(e), pretty);
  }
}
