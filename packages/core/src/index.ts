/**
 * @quilt/core - Quilt language core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { Rational } from "./rational.js";
export * from "./label.js";
export { EvalError, BlameError, isBlame } from "./errors.js";
export type { ErrorCode, ErrorDetails } from "./errors.js";
export { createContext, emitTrace, DEFAULT_MAX_DEPTH, MAX_DEPTH_LIMIT } from "./context.js";
export type { EvalContext, TraceEvent, TraceEventType, TraceData } from "./context.js";
export * from "./value.js";
export { Thunk, Env } from "./thunk.js";
export type { Suspension, ThunkStatus, RecursiveOrigin } from "./thunk.js";
export {
  execute,
  evalExpr,
  force,
  deepForce,
  applyFunction,
  thunkOf,
  rootEnv,
  normalizeError,
} from "./evaluator.js";
export type { ExecOptions, ExecResult } from "./evaluator.js";
export { mergeValues, mergeRecords, mergeFields } from "./merge.js";
export type { MergeMode, MergeSites } from "./merge.js";
export { applyContract, applyContracts, blame } from "./contracts.js";
export {
  closeRecord,
  rebind,
  accessField,
  insertField,
  removeField,
  updateField,
  freezeRecord,
  hasField,
  fieldNames,
  fieldValues,
} from "./record.js";
export type { InsertOptions } from "./record.js";
export { valuesEqual } from "./equality.js";
export { matchPattern, destructure } from "./patterns.js";
export { lookupPrim, forceArg, isTag, native, builtinBindings } from "./prims.js";
export { exportValue, exportJson } from "./export.js";
export type { JsonValue } from "./export.js";
export { queryField } from "./query.js";
export type { FieldInfo } from "./query.js";
export { resolveConfig, loadConfig, parseConfig, ConfigSchema, DEFAULT_CONFIG } from "./config.js";
export type { Config, ResolvedConfig } from "./config.js";
