/**
 * Tests for Quilt diagnostics.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { formatDiagnostic, formatDiagnostics, formatSpan, makeDiag } from "./diagnostics.js";

describe("Quilt Diagnostics", () => {
  it("creates a diagnostic with all fields", () => {
    const d = makeDiag(
      "E_TEST",
      "Something went wrong",
      { file: "test.quilt", startLine: 1, startCol: 5, endLine: 1, endCol: 10 },
      "Try fixing it"
    );
    assert.equal(d.code, "E_TEST");
    assert.equal(d.span?.startCol, 5);
    assert.equal(d.hint, "Try fixing it");
  });

  it("formats spans", () => {
    assert.equal(formatSpan({ file: "a.quilt", startLine: 3, startCol: 7, endLine: 3, endCol: 9 }), "a.quilt:3:7");
    assert.equal(formatSpan(undefined), "<unknown>");
  });

  it("formats diagnostic as JSON", () => {
    const out = formatDiagnostic(makeDiag("E_PARSE", "Unexpected token"), false);
    assert.deepEqual(JSON.parse(out), { code: "E_PARSE", message: "Unexpected token" });
  });

  it("formats diagnostic in pretty mode", () => {
    const d = makeDiag(
      "E_PARSE",
      "Unexpected token",
      { file: "test.quilt", startLine: 3, startCol: 7, endLine: 3, endCol: 12 },
      "Check syntax"
    );
    assert.equal(
      formatDiagnostic(d, true),
      "error[E_PARSE]: Unexpected token\n  --> test.quilt:3:7\n  hint: Check syntax"
    );
  });

  it("omits the hint line when there is no hint", () => {
    assert.equal(formatDiagnostic(makeDiag("E_PARSE", "Oops"), true), "error[E_PARSE]: Oops\n  --> <unknown>");
  });

  it("formats multiple diagnostics", () => {
    const diags = [makeDiag("E_1", "First"), makeDiag("E_2", "Second")];
    const json = JSON.parse(formatDiagnostics(diags, false));
    assert.equal(json.length, 2);
    assert.equal(json[1].code, "E_2");
    assert.equal(
      formatDiagnostics(diags, true),
      "error[E_1]: First\n  --> <unknown>\n\nerror[E_2]: Second\n  --> <unknown>"
    );
  });
});
