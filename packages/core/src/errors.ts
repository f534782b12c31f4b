/**
 * Quilt evaluation errors. Every failure unwinds to the caller of the
 * top-level evaluation; recovery is a language feature, not an engine one.
 */
import type { Span } from "./ast.js";
import type { Label } from "./label.js";
import { describeBlame, formatPath } from "./label.js";

export type ErrorCode =
  | "E_INFINITE_RECURSION"
  | "E_FIELD_MISSING"
  | "E_MISSING_DEFINITION"
  | "E_MERGE_INCOMPATIBLE"
  | "E_MERGE_UNEXPECTED_FIELD"
  | "E_BLAME"
  | "E_UNBOUND"
  | "E_NOT_A_FUNCTION"
  | "E_DESTRUCTURE"
  | "E_NO_MATCH"
  | "E_TYPE"
  | "E_DIVISION_BY_ZERO"
  | "E_NOT_EXPORTABLE"
  | "E_STACK_DEPTH"
  | "E_USER";

export type ErrorDetails = { [key: string]: string | number | boolean | null | string[] };

export class EvalError extends Error {
  code: ErrorCode;
  span?: Span;
  details?: ErrorDetails;

  constructor(code: ErrorCode, message: string, span?: Span, details?: ErrorDetails) {
    super(message);
    this.name = "EvalError";
    this.code = code;
    this.span = span;
    this.details = details;
  }
}

/**
 * A contract violation. Carries the label so catching composites can read the
 * message, and so reporting can point at both the contract and the path.
 */
export class BlameError extends EvalError {
  label: Label;

  constructor(label: Label, code: "E_BLAME" | "E_MERGE_UNEXPECTED_FIELD" = "E_BLAME", extra?: ErrorDetails) {
    super(code, describeBlame(label), label.valueSpan ?? label.span, {
      path: formatPath(label.path),
      polarity: label.polarity,
      ...(label.message !== undefined ? { contractMessage: label.message } : {}),
      ...(label.notes.length > 0 ? { notes: [...label.notes] } : {}),
      ...extra,
    });
    this.name = "BlameError";
    this.label = label;
  }
}

export function isBlame(e: unknown): e is BlameError {
  return e instanceof BlameError;
}
