/**
 * quilt check - parse without evaluating
 */
import { loadProgram } from "./report.js";

export async function runCheck(
  file: string,
  opts: { pretty?: boolean; stableJson?: boolean }
): Promise<number> {
  const loaded = loadProgram(file, !!opts.pretty);
  if (!loaded.ok) return loaded.code;

  if (opts.pretty) {
    console.log("No errors found.");
  } else if (opts.stableJson) {
    console.log("{\"ok\":true,\"errors\":[]}");
  } else {
    console.log("[]");
  }
  return 0;
}
