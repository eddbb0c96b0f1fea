/**
 * Tests for match patterns.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { matchPattern, patternNames } from "./patterns.js";
import type * as AST from "./ast.js";
import type { FloValue } from "./values.js";
import { NIL, NONE, formatValue, mkErr, mkFloat, mkInt, mkList, mkOk, mkSome, mkString } from "./values.js";

/** Parse the first arm pattern of `match v do <pattern> => nil end`. */
function pattern(src: string): AST.Pattern {
  const pr = parse(`match v do\n  ${src} => nil\nend`, "test.flo");
  assert.ok(pr.program);
  const stmt = pr.program.statements[0];
  if (stmt.kind !== "ExprStmt" || stmt.expr.kind !== "MatchExpr") assert.fail("expected a match expression");
  return stmt.expr.arms[0].pattern;
}

function bound(src: string, value: FloValue): Record<string, string> | null {
  const bindings = matchPattern(pattern(src), value);
  if (bindings === null) return null;
  const out: Record<string, string> = {};
  for (const [name, v] of bindings) out[name] = formatValue(v, true);
  return out;
}

describe("Pattern matching", () => {
  it("matches literals by value", () => {
    assert.deepEqual(bound("1", mkInt(1)), {});
    assert.deepEqual(bound("1", mkFloat(1)), {});
    assert.equal(bound("1", mkString("1")), null);
    assert.deepEqual(bound('"a"', mkString("a")), {});
    assert.deepEqual(bound("nil", NIL), {});
    assert.deepEqual(bound("-2.5", mkFloat(-2.5)), {});
  });

  it("binds variables and ignores wildcards", () => {
    assert.deepEqual(bound("x", mkInt(3)), { x: "3" });
    assert.deepEqual(bound("_", mkInt(3)), {});
  });

  it("checks Option and Result tags", () => {
    assert.deepEqual(bound("None", NONE), {});
    assert.equal(bound("None", mkSome(NIL)), null);
    assert.deepEqual(bound("Some", mkSome(mkInt(1))), {});
    assert.equal(bound("Ok", mkErr(mkInt(1))), null);
  });

  it("destructures Option and Result payloads", () => {
    assert.deepEqual(bound("Some(x)", mkSome(mkInt(1))), { x: "1" });
    assert.deepEqual(bound("Err(e)", mkErr(mkString("bad"))), { e: '"bad"' });
    assert.equal(bound("Ok(1)", mkOk(mkInt(2))), null);
  });

  it("requires list patterns to match in length", () => {
    const xs = mkList([mkInt(1), mkInt(2)]);
    assert.deepEqual(bound("[a, b]", xs), { a: "1", b: "2" });
    assert.equal(bound("[a]", xs), null);
    assert.equal(bound("[a, b, c]", xs), null);
    assert.deepEqual(bound("[]", mkList([])), {});
  });

  it("returns no partial bindings when a later element fails", () => {
    assert.equal(bound("[a, 5]", mkList([mkInt(1), mkInt(2)])), null);
  });

  it("lists the names a pattern binds", () => {
    assert.deepEqual(patternNames(pattern("[a, Some(b), _, [c, a]]")), ["a", "b", "c", "a"]);
  });
});
