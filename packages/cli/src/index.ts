/**
 * @quilt/cli - command re-exports
 */
export { runExport } from "./cmd-export.js";
export type { ExportOptions } from "./cmd-export.js";
export { runCheck } from "./cmd-check.js";
export { runQuery } from "./cmd-query.js";
export { runTrace } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
