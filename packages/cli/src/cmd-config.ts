/**
 * quilt config - effective configuration summary command
 */
import { resolveConfig } from "@quilt/core";

export async function runConfig(
  opts: { json?: boolean; cwd?: string; homeDir?: string }
): Promise<number> {
  const resolved = resolveConfig(opts.cwd, opts.homeDir);
  const { config } = resolved;

  if (opts.json) {
    console.log(JSON.stringify({ source: resolved.source, path: resolved.path, config }, null, 2));
    return 0;
  }

  console.log("Effective quilt configuration");
  console.log(`  Source:     ${resolved.source}`);
  console.log(`  Path:       ${resolved.path ?? "(none)"}`);
  console.log(`  Max depth:  ${config.maxDepth}`);
  console.log(`  Indent:     ${config.indent}`);
  console.log(`  Stdlib:     ${config.std ? "enabled" : "disabled"}`);
  return 0;
}
