/**
 * Blame labels: where a contract was attached, which part of the value is
 * being checked, and which side of the boundary gets blamed.
 */
import type { Span } from "./ast.js";
import { formatSpan } from "./diagnostics.js";

export type Polarity = "positive" | "negative";

export type PathElem =
  | { kind: "field"; name: string }
  | { kind: "element" }
  | { kind: "domain" }
  | { kind: "codomain" };

export interface Label {
  /** Location of the contract annotation. */
  span: Span;
  path: readonly PathElem[];
  message?: string;
  notes: readonly string[];
  polarity: Polarity;
  /** Location of the checked value, when known. */
  valueSpan?: Span;
}

export function makeLabel(span: Span, path: readonly PathElem[] = []): Label {
  return { span, path, notes: [], polarity: "positive" };
}

export function withPath(label: Label, elem: PathElem): Label {
  return { ...label, path: [...label.path, elem] };
}

export function withFieldPrefix(label: Label, prefix: readonly PathElem[]): Label {
  return { ...label, path: [...prefix, ...label.path] };
}

export function withMessage(label: Label, message: string): Label {
  return { ...label, message };
}

export function withNotes(label: Label, notes: readonly string[]): Label {
  return { ...label, notes: [...label.notes, ...notes] };
}

export function flipPolarity(label: Label): Label {
  return { ...label, polarity: label.polarity === "positive" ? "negative" : "positive" };
}

export function formatPath(path: readonly PathElem[]): string {
  if (path.length === 0) return "(root)";
  const parts: string[] = [];
  for (const elem of path) {
    switch (elem.kind) {
      case "field":
        parts.push(/^[A-Za-z_][A-Za-z0-9_]*$/.test(elem.name) ? elem.name : JSON.stringify(elem.name));
        break;
      case "element":
        parts.push("[_]");
        break;
      case "domain":
        parts.push("(argument)");
        break;
      case "codomain":
        parts.push("(result)");
        break;
    }
  }
  return parts.join(".");
}

/** One-line blame summary used as the error message. */
export function describeBlame(label: Label): string {
  const culprit = label.polarity === "positive" ? "the value" : "the caller";
  const head = label.message ?? "contract broken";
  return `${head} (blame ${culprit} at ${formatPath(label.path)}, contract at ${formatSpan(label.span)})`;
}
