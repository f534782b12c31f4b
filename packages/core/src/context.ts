/**
 * Per-evaluation context: trace sink, depth accounting and the stdlib table.
 * Nothing here is process-wide; each evaluation builds its own.
 */
import type { Span } from "./ast.js";
import type { NativeFn } from "./value.js";

export type TraceEventType =
  | "run_start"
  | "run_end"
  | "merge"
  | "contract_check"
  | "blame"
  | "freeze"
  | "force_error";

export type TraceData = { [key: string]: string | number | boolean | null | string[] };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

// Each level is an expression or a force, two or three native frames; the
// ceiling stays inside Node's default stack.
export const DEFAULT_MAX_DEPTH = 1000;
export const MAX_DEPTH_LIMIT = 2000;

export interface EvalContext {
  runId: string;
  maxDepth: number;
  depth: number;
  trace?: (event: TraceEvent) => void;
  stdlib: ReadonlyMap<string, NativeFn>;
}

export function createContext(opts: {
  runId?: string;
  maxDepth?: number;
  trace?: (event: TraceEvent) => void;
  stdlib?: ReadonlyMap<string, NativeFn>;
} = {}): EvalContext {
  return {
    runId: opts.runId ?? "local",
    maxDepth: opts.maxDepth ?? DEFAULT_MAX_DEPTH,
    depth: 0,
    trace: opts.trace,
    stdlib: opts.stdlib ?? new Map(),
  };
}

export function emitTrace(
  ctx: EvalContext,
  event: TraceEventType,
  span?: Span,
  data?: TraceData
): void {
  if (ctx.trace) {
    ctx.trace({
      ts: new Date().toISOString(),
      runId: ctx.runId,
      event,
      span,
      data,
    });
  }
}
