/**
 * Tests for the Flo formatter.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { parse } from "./parser.js";
import { format } from "./formatter.js";

function fmt(src: string): string {
  const result = parse(src, "test.flo");
  assert.deepEqual(result.diagnostics, []);
  assert.ok(result.program);
  return format(result.program);
}

describe("Flo Formatter", () => {
  it("normalizes spacing in declarations", () => {
    assert.equal(fmt("let x:=42\nvar  y :int:=1\nconst Z := 3"), "let x := 42\nvar y: int := 1\nconst Z !:= 3\n");
  });

  it("indents blocks by two spaces", () => {
    const src = "fn add(a:int,b:int)->int do return a+b end";
    assert.equal(fmt(src), "fn add(a: int, b: int) -> int do\n  return a + b\nend\n");
  });

  it("drops redundant parentheses and keeps required ones", () => {
    assert.equal(fmt("(1 + (2 * 3))"), "1 + 2 * 3\n");
    assert.equal(fmt("(1 + 2) * 3"), "(1 + 2) * 3\n");
    assert.equal(fmt("1 - (2 - 3)"), "1 - (2 - 3)\n");
    assert.equal(fmt("-(a + b)"), "-(a + b)\n");
    assert.equal(fmt("(a + b).c"), "(a + b).c\n");
  });

  it("formats control flow", () => {
    const src = `if a do x elif b do y else z end`;
    assert.equal(fmt(src), "if a do\n  x\nelif b do\n  y\nelse do\n  z\nend\n");
  });

  it("formats match arms one per line", () => {
    const src = "match v do\nSome(x)=>x\n    None => 0\n[a,_] => a\n -1 => 1\nend";
    assert.equal(fmt(src), "match v do\n  Some(x) => x\n  None => 0\n  [a, _] => a\n  -1 => 1\nend\n");
  });

  it("formats attempt, strands and lambdas", () => {
    const src = `let s := strand do attempt do f() rescue e do nil finally do g() end end
let inc := fn(x) do x + 1 end`;
    const expected = `let s := strand do
  attempt do
    f()
  rescue e do
    nil
  finally do
    g()
  end
end
let inc := fn(x) do
  x + 1
end
`;
    assert.equal(fmt(src), expected);
  });

  it("quotes map keys that are not plain names", () => {
    assert.equal(fmt('{a: 1, "b c": 2, "end": 3}'), '{ a: 1, "b c": 2, "end": 3 }\n');
  });

  it("renders floats with a fractional part", () => {
    assert.equal(fmt("let f := 2.0\nlet g := 1e3"), "let f := 2.0\nlet g := 1000.0\n");
  });

  it("formats imports and capability requests", () => {
    assert.equal(
      fmt("bind http ::: std/http@^1.0 as web\nrequest cap db as DBCap"),
      "bind http ::: std/http@^1.0 as web\nrequest cap db as DBCap\n"
    );
  });

  it("is idempotent", () => {
    const src = `fn fib(n) do if n < 2 do return n end
return fib(n - 1) + fib(n - 2) end
let xs := [1, 2, 3] |> map
var m := {k: Some(1), e: Err("x")}
while m?.k != None do m = {} end
for i in range(0, 3) do print(-i, !true, await i) end`;
    const once = fmt(src);
    assert.equal(fmt(once), once);
  });

  it("keeps empty blocks", () => {
    assert.equal(fmt("fn noop() do end"), "fn noop() do\nend\n");
  });
});
