/**
 * Tests for Flo diagnostics.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  compareDiagnostics,
  diagFromRuntimeError,
  formatDiagnostic,
  formatDiagnostics,
  makeDiag,
} from "./diagnostics.js";
import { FloRuntimeError } from "./errors.js";

const span = { file: "test.flo", startLine: 3, startCol: 5, endLine: 3, endCol: 10 };

describe("Flo Diagnostics", () => {
  it("creates a diagnostic without span or hint", () => {
    const d = makeDiag("E_TEST", "Error message");
    assert.equal(d.code, "E_TEST");
    assert.equal(d.span, undefined);
    assert.equal(d.hint, undefined);
  });

  it("formats a diagnostic as JSON", () => {
    const parsed: unknown = JSON.parse(formatDiagnostic(makeDiag("E_PARSE", "Unexpected token"), false));
    assert.deepEqual(parsed, { code: "E_PARSE", message: "Unexpected token" });
  });

  it("formats a diagnostic in pretty mode", () => {
    const out = formatDiagnostic(makeDiag("E_PARSE", "Unexpected token", span, "Close the block"), true);
    assert.equal(out, "error[E_PARSE]: Unexpected token\n  --> test.flo:3:5\n  hint: Close the block");
  });

  it("quotes the source line under the location", () => {
    const out = formatDiagnostic(makeDiag("E_PARSE", "Unexpected token", span), true, "a\nb\nlet xyz := 1\n");
    assert.deepEqual(out.split("\n"), [
      "error[E_PARSE]: Unexpected token",
      "  --> test.flo:3:5",
      "    |",
      "  3 | let xyz := 1",
      "    |     ^^^^^",
    ]);
  });

  it("skips the excerpt when the line is out of range", () => {
    assert.equal(
      formatDiagnostic(makeDiag("E_X", "m", span), true, "only one line"),
      "error[E_X]: m\n  --> test.flo:3:5"
    );
  });

  it("sorts by position with unplaced diagnostics last", () => {
    const later = makeDiag("E_B", "b", { ...span, startLine: 7 });
    const earlier = makeDiag("E_A", "a", { ...span, startLine: 2 });
    const sorted = [makeDiag("E_C", "c"), later, earlier].sort(compareDiagnostics);
    assert.deepEqual(sorted.map((d) => d.code), ["E_A", "E_B", "E_C"]);
  });

  it("marks a missing location", () => {
    assert.equal(formatDiagnostic(makeDiag("E_X", "m"), true), "error[E_X]: m\n  --> <unknown>");
  });

  it("joins several diagnostics", () => {
    const diags = [makeDiag("E_A", "a"), makeDiag("E_B", "b")];
    assert.equal(formatDiagnostics(diags, true), "error[E_A]: a\n  --> <unknown>\n\nerror[E_B]: b\n  --> <unknown>");
    assert.equal(formatDiagnostics([], false), "[]");
  });

  it("reports runtime errors under their kind", () => {
    const d = diagFromRuntimeError(new FloRuntimeError("KeyNotFound", "Key 'k' not found.", span));
    assert.deepEqual(d, { code: "KeyNotFound", message: "Key 'k' not found.", span, hint: undefined });
  });

  it("names the strand cause in the hint", () => {
    const err = new FloRuntimeError("StrandPropagatedError", "Strand #1 failed with DivisionByZero: Division by zero.");
    err.propagated = new FloRuntimeError("DivisionByZero", "Division by zero.");
    assert.equal(diagFromRuntimeError(err).hint, "strand failed with DivisionByZero: Division by zero.");
  });
});
