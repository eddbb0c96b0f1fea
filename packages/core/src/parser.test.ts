/**
 * Tests for the Flo parser.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import type * as AST from "./ast.js";

function program(src: string): AST.Module {
  const result = parse(src, "test.flo");
  assert.deepEqual(result.diagnostics, []);
  assert.ok(result.program);
  return result.program;
}

function exprOf(src: string): AST.Expr {
  const stmt = program(src).statements[0];
  assert.equal(stmt.kind, "ExprStmt");
  if (stmt.kind !== "ExprStmt") assert.fail("not an expression statement");
  return stmt.expr;
}

/** Compact prefix rendering of an expression tree. */
function shape(e: AST.Expr): string {
  switch (e.kind) {
    case "BinaryExpr":
      return `(${e.op} ${shape(e.left)} ${shape(e.right)})`;
    case "UnaryExpr":
      return `(${e.op} ${shape(e.operand)})`;
    case "AwaitExpr":
      return `(await ${shape(e.operand)})`;
    case "Assignment":
      return `(= ${e.name} ${shape(e.value)})`;
    case "CallExpr":
      return `(call ${shape(e.callee)}${e.args.map((a) => " " + shape(a)).join("")})`;
    case "IndexExpr":
      return `(index ${shape(e.target)} ${shape(e.index)})`;
    case "AttrExpr":
      return `(. ${shape(e.target)} ${e.name})`;
    case "OptionalChainExpr":
      return `(?. ${shape(e.target)} ${e.name})`;
    case "VarRef":
      return e.name;
    case "IntLiteral":
      return e.value.toString();
    default:
      return e.kind;
  }
}

describe("Flo Parser", () => {
  it("parses declarations", () => {
    const stmts = program("let x := 1\nvar y: int := 2\nconst Z !:= 3\nconst W := 4").statements;
    assert.deepEqual(
      stmts.map((s) => s.kind),
      ["LetDecl", "VarDecl", "ConstDecl", "ConstDecl"]
    );
    const y = stmts[1];
    if (y.kind !== "VarDecl") assert.fail("expected VarDecl");
    assert.equal(y.type?.kind, "SimpleType");
  });

  it("parses function declarations with types", () => {
    const [stmt] = program("fn add(a: int, b: List[int]) -> fn(int) -> int do\n  return a\nend").statements;
    if (stmt.kind !== "FnDecl") assert.fail("expected FnDecl");
    assert.equal(stmt.name, "add");
    assert.deepEqual(stmt.params.map((p) => p.name), ["a", "b"]);
    assert.equal(stmt.params[1].type?.kind, "GenericType");
    assert.equal(stmt.returnType?.kind, "FunctionType");
    assert.equal(stmt.body[0].kind, "ReturnStmt");
  });

  it("applies operator precedence", () => {
    assert.equal(shape(exprOf("1 + 2 * 3")), "(+ 1 (* 2 3))");
    assert.equal(shape(exprOf("a || b && c == d < e")), "(|| a (&& b (== c (< d e))))");
    assert.equal(shape(exprOf("-a * b")), "(* (- a) b)");
    assert.equal(shape(exprOf("await s + 1")), "(+ (await s) 1)");
  });

  it("folds pipelines to the left", () => {
    assert.equal(shape(exprOf("x |> f |> g")), "(|> (|> x f) g)");
    assert.equal(shape(exprOf("f <| a || b")), "(<| f (|| a b))");
  });

  it("parses right-associative assignment", () => {
    assert.equal(shape(exprOf("a = b = 1")), "(= a (= b 1))");
  });

  it("rejects assignment to a non-name", () => {
    const result = parse("a.b = 1", "test.flo");
    assert.equal(result.program, undefined);
    assert.equal(result.diagnostics[0].code, "E_AST");
    assert.equal(result.diagnostics[0].message, "Invalid assignment target: only a name can be assigned.");
  });

  it("parses postfix chains", () => {
    assert.equal(shape(exprOf("m.a?.b[0](1, 2)")), "(call (index (?. (. m a) b) 0) 1 2)");
  });

  it("starts a new statement at a line-leading paren, bracket or sign", () => {
    const stmts = program("f\n(1)\nxs\n[0]\na\n-1").statements;
    assert.equal(stmts.length, 6);
    const one = program("a +\n  1").statements;
    assert.equal(one.length, 1);
  });

  it("keeps a return value on the return line", () => {
    const [stmt] = program("fn f() do\n  return\nend").statements;
    if (stmt.kind !== "FnDecl") assert.fail("expected FnDecl");
    const ret = stmt.body[0];
    assert.equal(ret.kind, "ReturnStmt");
    assert.equal(ret.kind === "ReturnStmt" ? ret.value : "missing", undefined);
  });

  it("parses if / elif / else with an optional do", () => {
    for (const src of ["if a do 1 elif b do 2 else do 3 end", "if a do 1 elif b do 2 else 3 end"]) {
      const e = exprOf(src);
      if (e.kind !== "IfExpr") assert.fail("expected IfExpr");
      assert.equal(e.elifs.length, 1);
      assert.equal(e.else?.length, 1);
    }
  });

  it("parses match arms over every pattern kind", () => {
    const src = `match v do
  1 => "one"
  -2 => "minus two"
  "s" => "string"
  Some(x) => x
  None => 0
  Err(_) => 1
  [a, b] => a
  _ => nil
end`;
    const e = exprOf(src);
    if (e.kind !== "MatchExpr") assert.fail("expected MatchExpr");
    assert.deepEqual(
      e.arms.map((a) => a.pattern.kind),
      [
        "LiteralPattern",
        "LiteralPattern",
        "LiteralPattern",
        "OptionPattern",
        "OptionPattern",
        "ResultPattern",
        "ListPattern",
        "WildcardPattern",
      ]
    );
    const minus = e.arms[1].pattern;
    assert.equal(minus.kind === "LiteralPattern" ? minus.literal.kind : "", "IntLiteral");
    const some = e.arms[3].pattern;
    assert.equal(some.kind === "OptionPattern" ? some.inner?.kind : "", "VarPattern");
  });

  it("parses loops, attempt, lambdas and strands", () => {
    const kinds = program(`for i in xs do
  i
end
while x do
  x = false
end
attempt do
  f()
rescue err do
  nil
finally do
  g()
end
let inc := fn(x) do x + 1 end
let s := strand do
  1
end
await s`).statements.map((s) => (s.kind === "ExprStmt" ? s.expr.kind : s.kind));
    assert.deepEqual(kinds, ["ForExpr", "WhileExpr", "AttemptExpr", "LetDecl", "LetDecl", "AwaitExpr"]);
  });

  it("parses collections with string keys and trailing commas", () => {
    const e = exprOf('{name: "a", "two words": 2,}');
    if (e.kind !== "MapExpr") assert.fail("expected MapExpr");
    assert.deepEqual(e.entries.map((m) => m.key), ["name", "two words"]);
    const list = exprOf("[1, 2, 3,]");
    assert.equal(list.kind === "ListExpr" ? list.elements.length : 0, 3);
  });

  it("decodes string escapes", () => {
    const e = exprOf('"tab\\there \\u00e9"');
    assert.equal(e.kind === "StringLiteral" ? e.value : "", "tab\there é");
  });

  it("parses imports and capability requests", () => {
    const [imp, cap] = program("bind http ::: std/http@^1.0 as web\nrequest cap db as DBCap").statements;
    assert.deepEqual(
      imp.kind === "ImportDecl" ? [imp.name, imp.path, imp.version, imp.alias] : [],
      ["http", "std/http", "^1.0", "web"]
    );
    assert.deepEqual(cap.kind === "CapabilityRequest" ? [cap.capability, cap.typeName] : [], ["db", "DBCap"]);
  });

  it("rejects integer literals beyond 64 bits", () => {
    const result = parse("9223372036854775808", "test.flo");
    assert.equal(result.diagnostics[0].code, "E_AST");
    assert.equal(result.diagnostics[0].message, "Integer literal 9223372036854775808 does not fit in 64 bits.");
  });

  it("records spans", () => {
    const [, second] = program("let a := 1\n  let b := 2").statements;
    assert.deepEqual(second.span, { file: "test.flo", startLine: 2, startCol: 3, endLine: 2, endCol: 13 });
  });

  it("reports parse errors with a position", () => {
    const result = parse("let x := \nlet", "test.flo");
    assert.equal(result.program, undefined);
    assert.equal(result.diagnostics[0].code, "E_PARSE");
    assert.equal(result.diagnostics[0].span?.startLine, 2);
  });

  it("reports lexer errors", () => {
    const result = parse("let x := $", "test.flo");
    assert.equal(result.diagnostics[0].code, "E_LEX");
    assert.equal(result.diagnostics[0].span?.startCol, 10);
  });
});
