/**
 * Tests for the Flo evaluator.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import { setTimeout as delay } from "node:timers/promises";
import { parse } from "./parser.js";
import { evaluate, execute } from "./evaluator.js";
import type { ExecOptions, ExecResult } from "./evaluator.js";
import { Environment } from "./environment.js";
import { FloRuntimeError } from "./errors.js";
import { parseConfig } from "./config.js";
import type { TraceEvent } from "./trace.js";
import type { BuiltinFn, BuiltinTable, FloValue } from "./values.js";
import { NIL, formatValue, mkBuiltin, mkInt, mkRange } from "./values.js";

function builtin(name: string, call: BuiltinFn["call"]): [string, FloValue] {
  return [name, mkBuiltin({ name, call })];
}

function intArg(args: readonly FloValue[], i: number): bigint {
  const v = args[i];
  if (v === undefined || v.kind !== "int") {
    throw new FloRuntimeError("TypeMismatch", `argument ${i + 1} must be an int`);
  }
  return v.value;
}

function makeBuiltins(log: string[]): BuiltinTable {
  return new Map([
    builtin("range", (args) => mkRange(intArg(args, 0), intArg(args, 1))),
    builtin("record", (args) => {
      log.push(args.map((a) => formatValue(a)).join(" "));
      return NIL;
    }),
    builtin("sleep", async (args, ctx) => {
      await delay(Number(intArg(args, 0)), undefined, { signal: ctx.signal });
      return NIL;
    }),
    builtin("boom", () => {
      throw new Error("kaput");
    }),
  ]);
}

async function run(src: string, options: Partial<ExecOptions> = {}): Promise<{ result: ExecResult; log: string[] }> {
  const log: string[] = [];
  const pr = parse(src, "test.flo");
  assert.deepEqual(pr.diagnostics, []);
  assert.ok(pr.program);
  const result = await execute(pr.program, { builtins: makeBuiltins(log), runId: "test-run", ...options });
  return { result, log };
}

function valueOf(result: ExecResult): FloValue {
  if (!result.ok) assert.fail(`${result.error.kind}: ${result.error.message}`);
  return result.value;
}

function errorOf(result: ExecResult): FloRuntimeError {
  if (result.ok) assert.fail(`expected an error, got ${formatValue(result.value)}`);
  return result.error;
}

async function show(src: string, options: Partial<ExecOptions> = {}): Promise<string> {
  const { result } = await run(src, options);
  return formatValue(valueOf(result));
}

async function failure(src: string, options: Partial<ExecOptions> = {}): Promise<FloRuntimeError> {
  const { result } = await run(src, options);
  return errorOf(result);
}

describe("Flo Evaluator", () => {
  describe("bindings", () => {
    it("rejects a second definition in the same scope", async () => {
      const err = await failure("let x := 1\nlet x := 2");
      assert.equal(err.kind, "DuplicateDefinition");
      assert.equal(err.message, "'x' is already defined in this scope.");
      assert.equal(err.span?.startLine, 2);
    });

    it("allows shadowing in a function scope", async () => {
      const src = `let x := 1
fn f() do
  let x := 2
  x
end
f() + x`;
      assert.equal(await show(src), "3");
    });

    it("rejects reassigning let and const", async () => {
      assert.equal((await failure("let x := 1\nx = 2")).kind, "ImmutableReassignment");
      assert.equal((await failure("const x !:= 1\nx = 2")).kind, "ImmutableReassignment");
    });

    it("reassigns var and observes the new value", async () => {
      assert.equal(await show("var x := 1\nx = 5\nx"), "5");
    });

    it("rejects assigning a builtin name", async () => {
      const err = await failure("range = 1");
      assert.equal(err.kind, "ImmutableReassignment");
    });

    it("reports undefined variables with their position", async () => {
      const err = await failure("let a := 1\n  missing");
      assert.equal(err.kind, "UndefinedVariable");
      assert.equal(err.message, "Undefined variable 'missing'.");
      assert.equal(err.span?.startLine, 2);
      assert.equal(err.span?.startCol, 3);
    });

    it("shares the enclosing scope inside if blocks", async () => {
      assert.equal(await show("if true do\n  let y := 2\nend\ny"), "2");
    });

    it("evaluates against a caller-provided environment", async () => {
      const log: string[] = [];
      const builtins = makeBuiltins(log);
      const env = Environment.root(builtins);
      env.define("seed", mkInt(41), false);
      const pr = parse("seed + 1", "test.flo");
      assert.ok(pr.program);
      const result = await evaluate(pr.program, env, { builtins });
      assert.equal(formatValue(valueOf(result)), "42");
    });
  });

  describe("operators", () => {
    it("never evaluates the right side of a decided && or ||", async () => {
      const a = await run("false && record(1)");
      assert.equal(formatValue(valueOf(a.result)), "false");
      assert.deepEqual(a.log, []);

      const b = await run("true || record(1)");
      assert.equal(formatValue(valueOf(b.result)), "true");
      assert.deepEqual(b.log, []);
    });

    it("returns the deciding operand", async () => {
      assert.equal(await show("nil || 5"), "5");
      assert.equal(await show("1 && 2"), "2");
    });

    it("always divides to a float", async () => {
      const { result } = await run("10 / 2");
      const v = valueOf(result);
      assert.equal(v.kind, "float");
      assert.equal(formatValue(v), "5.0");
      assert.equal(await show("7 / 2"), "3.5");
    });

    it("keeps int arithmetic in 64 bits", async () => {
      assert.equal(await show("9223372036854775807 + 1"), "-9223372036854775808");
      assert.equal(await show("2 * 3 - 1"), "5");
      assert.equal(await show("2 + 0.5"), "2.5");
    });

    it("uses floored modulo", async () => {
      assert.equal(await show("-7 % 3"), "2");
      assert.equal(await show("7 % -3"), "-2");
    });

    it("fails on division by zero", async () => {
      assert.equal((await failure("1 / 0")).message, "Division by zero.");
      assert.equal((await failure("1 % 0")).message, "Modulo by zero.");
    });

    it("fails on incompatible operands with the operator's line", async () => {
      const err = await failure('let x := 1\nx + "a"');
      assert.equal(err.kind, "TypeMismatch");
      assert.equal(err.message, "Operator '+' cannot combine int and string.");
      assert.equal(err.span?.startLine, 2);
    });

    it("concatenates strings and lists", async () => {
      assert.equal(await show('"ab" + "cd"'), "abcd");
      assert.equal(await show("[1] + [2, 3]"), "[1, 2, 3]");
    });

    it("compares structurally", async () => {
      assert.equal(await show("[1, {a: 2}] == [1, {a: 2}]"), "true");
      assert.equal(await show("1 == 1.0"), "true");
      assert.equal(await show('"a" < "b"'), "true");
      assert.equal((await failure('1 < "b"')).kind, "TypeMismatch");
    });

    it("treats only false and nil as falsy", async () => {
      assert.equal(await show('if 0 do "t" else do "f" end'), "t");
      assert.equal(await show('if "" do "t" else do "f" end'), "t");
      assert.equal(await show('if [] do "t" else do "f" end'), "t");
      assert.equal(await show('if nil do "t" else do "f" end'), "f");
      assert.equal(await show("!0"), "false");
    });

    it("pipes values forward and backward", async () => {
      const src = `fn double(x) do
  x * 2
end
`;
      assert.equal(await show(src + "5 |> double"), "10");
      assert.equal(await show(src + "double <| 4"), "8");
      const err = await failure("5 |> 3");
      assert.equal(err.kind, "NotCallable");
      assert.equal(err.message, "Value of type int is not callable.");
    });
  });

  describe("collections", () => {
    it("indexes lists from either end", async () => {
      assert.equal(await show("let xs := [1, 2, 3]\nxs[-1]"), "3");
      const err = await failure("let xs := [1]\nxs[5]");
      assert.equal(err.kind, "IndexOutOfRange");
      assert.equal(err.message, "Index 5 out of range for length 1.");
    });

    it("indexes strings by character", async () => {
      assert.equal(await show('"héllo"[1]'), "é");
    });

    it("reports missing map keys", async () => {
      const err = await failure('let m := {a: 1}\nm["b"]');
      assert.equal(err.kind, "KeyNotFound");
      assert.equal(err.message, "Key 'b' not found.");
      assert.equal((await failure("let m := {a: 1}\nm.b")).kind, "KeyNotFound");
    });

    it("keeps the last value of a repeated map key", async () => {
      assert.equal(await show("{a: 1, b: 2, a: 3}"), "{a: 3, b: 2}");
    });

    it("returns nil through optional chains", async () => {
      assert.equal(await show("let m := {a: {b: 2}}\nm?.c"), "nil");
      assert.equal(await show("let m := {a: {b: 2}}\nm.a?.b"), "2");
      assert.equal(await show("nil?.x"), "nil");
    });
  });

  describe("control flow", () => {
    it("sums a range in a for loop", async () => {
      const src = `var sum := 0
for i in range(1, 6) do
  sum = sum + i
end
sum`;
      assert.equal(await show(src), "15");
    });

    it("gives each loop iteration its own binding", async () => {
      const src = `var fs := []
for i in [1, 2, 3] do
  fs = fs + [fn() do i end]
end
fs[0]() + fs[2]()`;
      assert.equal(await show(src), "4");
    });

    it("iterates map keys and string characters", async () => {
      assert.equal(await show('var out := ""\nfor k in {x: 1, y: 2} do\n  out = out + k\nend\nout'), "xy");
      assert.equal(await show('var n := 0\nfor c in "abc" do\n  n = n + 1\nend\nn'), "3");
      assert.equal((await failure("for i in 5 do\n  i\nend")).kind, "TypeMismatch");
    });

    it("yields the last body value of a while loop", async () => {
      assert.equal(await show("var i := 0\nwhile i < 3 do\n  i = i + 1\nend"), "3");
      assert.equal(await show("while false do\n  1\nend"), "nil");
    });

    it("takes the first true branch", async () => {
      const src = `let n := 5
if n < 0 do
  "neg"
elif n < 10 do
  "small"
else do
  "big"
end`;
      assert.equal(await show(src), "small");
      assert.equal(await show("if false do\n  1\nend"), "nil");
    });

    it("computes factorial recursively", async () => {
      const src = `fn factorial(n) do
  if n <= 1 do
    return 1
  end
  return n * factorial(n - 1)
end
factorial(5)`;
      assert.equal(await show(src), "120");
    });

    it("captures outer bindings by reference", async () => {
      assert.equal(await show("var n := 1\nfn get() do\n  n\nend\nn = 7\nget()"), "7");
    });

    it("ends the program at a top-level return", async () => {
      assert.equal(await show("return 3\n4"), "3");
    });

    it("checks call arity", async () => {
      const err = await failure("fn f(a) do\n  a\nend\nf(1, 2)");
      assert.equal(err.kind, "ArityMismatch");
      assert.equal(err.message, "Function 'f' expects 1 argument, got 2.");
    });

    it("stops runaway recursion at the configured depth", async () => {
      const err = await failure("fn f(n) do\n  f(n + 1)\nend\nf(0)", {
        config: parseConfig({ limits: { maxCallDepth: 50 } }),
      });
      assert.equal(err.kind, "RecursionLimit");
      assert.equal(err.message, "Maximum call depth of 50 exceeded in 'f'.");
    });

    it("wraps non-Flo builtin failures", async () => {
      const err = await failure("boom()");
      assert.equal(err.kind, "HostError");
      assert.equal(err.message, "Builtin 'boom' failed: kaput");
    });
  });

  describe("match", () => {
    it("picks the first matching arm", async () => {
      const src = `match 5 do
  x => "first"
  5 => "second"
end`;
      assert.equal(await show(src), "first");
    });

    it("destructures Option and Result payloads", async () => {
      assert.equal(await show("match Some(4) do\n  None => 0\n  Some(x) => x + 1\nend"), "5");
      assert.equal(await show('match Err("bad") do\n  Ok(v) => v\n  Err(e) => "failed: " + e\nend'), "failed: bad");
    });

    it("requires list patterns to match in length", async () => {
      assert.equal(await show("match [1, 2] do\n  [a] => a\n  [a, b] => a + b\nend"), "3");
    });

    it("matches negative literals", async () => {
      assert.equal(await show('match -1 do\n  -1 => "minus one"\n  _ => "other"\nend'), "minus one");
    });

    it("fails when no arm matches", async () => {
      const err = await failure('match 3 do\n  1 => "one"\nend');
      assert.equal(err.kind, "NoMatchError");
      assert.equal(err.message, "No match arm matched value 3.");
    });
  });

  describe("attempt / rescue / finally", () => {
    it("returns the body value and runs finally once", async () => {
      const src = `attempt do
  1
rescue e do
  2
finally do
  record("f")
end`;
      const { result, log } = await run(src);
      assert.equal(formatValue(valueOf(result)), "1");
      assert.deepEqual(log, ["f"]);
    });

    it("returns the rescue value when the body fails", async () => {
      const src = `attempt do
  1 / 0
rescue e do
  e.kind
finally do
  record("f")
end`;
      const { result, log } = await run(src);
      assert.equal(formatValue(valueOf(result)), "DivisionByZero");
      assert.deepEqual(log, ["f"]);
    });

    it("re-raises without rescue after running finally", async () => {
      const { result, log } = await run('attempt do\n  1 / 0\nfinally do\n  record("f")\nend');
      assert.equal(errorOf(result).kind, "DivisionByZero");
      assert.deepEqual(log, ["f"]);
    });

    it("lets an error in finally replace the propagating one", async () => {
      const err = await failure("attempt do\n  1 / 0\nfinally do\n  missing\nend");
      assert.equal(err.kind, "UndefinedVariable");
    });

    it("runs finally when the body returns", async () => {
      const src = `fn f() do
  attempt do
    return 1
  finally do
    record("f")
  end
  2
end
f()`;
      const { result, log } = await run(src);
      assert.equal(formatValue(valueOf(result)), "1");
      assert.deepEqual(log, ["f"]);
    });

    it("binds the error as a map with its position", async () => {
      const src = `attempt do
  missing
rescue e do
  [e.kind, e.line, e.column]
end`;
      assert.equal(await show(src), '["UndefinedVariable", 2, 3]');
    });
  });

  describe("strands", () => {
    it("awaits two strands and sums their results", async () => {
      const src = `fn double(x) do
  x * 2
end
let a := strand do
  double(5)
end
let b := strand do
  double(10)
end
await a + await b`;
      assert.equal(await show(src), "30");
    });

    it("treats await on a plain value as identity", async () => {
      assert.equal(await show("await 5"), "5");
    });

    it("keeps a return inside the strand body", async () => {
      const src = `fn f() do
  let s := strand do
    return 1
  end
  let v := await s
  v + 10
end
f()`;
      assert.equal(await show(src), "11");
    });

    it("propagates a strand failure to the awaiting task", async () => {
      const err = await failure("let s := strand do\n  1 / 0\nend\nawait s");
      assert.equal(err.kind, "StrandPropagatedError");
      assert.equal(err.message, "Strand #1 failed with DivisionByZero: Division by zero.");
      assert.equal(err.propagated?.kind, "DivisionByZero");
    });

    it("exposes the strand error as the rescue cause", async () => {
      const src = `let s := strand do
  1 / 0
end
attempt do
  await s
rescue e do
  e.cause.kind
end`;
      assert.equal(await show(src), "DivisionByZero");
    });

    it("times out long strands without letting rescue catch it", async () => {
      const src = `let s := strand do
  attempt do
    sleep(1000)
  rescue e do
    "rescued"
  finally do
    record("cleanup")
  end
end
await s`;
      const { result, log } = await run(src, { config: parseConfig({ strands: { timeoutMs: 20 } }) });
      const err = errorOf(result);
      assert.equal(err.kind, "StrandPropagatedError");
      assert.equal(err.propagated?.kind, "StrandTimeout");
      assert.equal(err.propagated?.message, "Strand #1 exceeded 20ms.");
      assert.deepEqual(log, ["cleanup"]);
    });

    it("queues strands beyond the concurrency cap", async () => {
      const events: TraceEvent[] = [];
      const src = `let a := strand do
  sleep(5)
  1
end
let b := strand do
  2
end
await a + await b`;
      const { result } = await run(src, {
        config: parseConfig({ strands: { maxConcurrent: 1 } }),
        trace: (e) => events.push(e),
      });
      assert.equal(formatValue(valueOf(result)), "3");
      const order = events
        .filter((e) => e.event.startsWith("strand_"))
        .map((e) => `${e.event}:${String(e.data?.strand)}`);
      assert.deepEqual(order, [
        "strand_spawn:1",
        "strand_start:1",
        "strand_spawn:2",
        "strand_end:1",
        "strand_start:2",
        "strand_end:2",
      ]);
    });

    it("starts a queued strand as soon as it is awaited", async () => {
      const src = `let a := strand do
  sleep(50)
  1
end
let b := strand do
  2
end
await b`;
      assert.equal(await show(src, { config: parseConfig({ strands: { maxConcurrent: 1 } }) }), "2");
    });

    it("detects strands awaiting each other", async () => {
      const src = `var h := nil
let a := strand do
  sleep(10)
  await h
end
h = strand do
  await a
end
await a`;
      const err = await failure(src);
      assert.equal(err.kind, "StrandPropagatedError");
      assert.equal(err.propagated?.kind, "Deadlock");
    });

    it("cancels outstanding strands when the main program fails", async () => {
      const events: TraceEvent[] = [];
      const src = `let s := strand do
  sleep(1000)
  record("late")
end
1 / 0`;
      const { result, log } = await run(src, { trace: (e) => events.push(e) });
      assert.equal(errorOf(result).kind, "DivisionByZero");
      assert.deepEqual(log, []);
      const end = events.find((e) => e.event === "strand_end");
      assert.deepEqual(end?.data, {
        strand: 1,
        outcome: "err",
        error: "Cancelled",
        message: "Main program failed.",
      });
    });

    it("stops when the caller's signal is aborted", async () => {
      const controller = new AbortController();
      controller.abort();
      const err = await failure("1", { signal: controller.signal });
      assert.equal(err.kind, "Cancelled");
      assert.equal(err.message, "Run was cancelled.");
    });

    it("cancels outstanding strands when aborted after the main program ends", async () => {
      const controller = new AbortController();
      const events: TraceEvent[] = [];
      setTimeout(() => controller.abort(), 20);
      const started = Date.now();
      const err = await failure("let s := strand do\n  sleep(3000)\nend\n1", {
        signal: controller.signal,
        trace: (e) => events.push(e),
      });
      assert.ok(Date.now() - started < 1000);
      assert.equal(err.kind, "Cancelled");
      assert.equal(err.message, "Run was cancelled.");
      const cancel = events.find((e) => e.event === "strand_cancel");
      assert.deepEqual(cancel?.data, { strand: 1, reason: "Cancelled" });
    });
  });

  describe("trace", () => {
    it("emits run and call events in order", async () => {
      const events: TraceEvent[] = [];
      await run("fn f() do\n  1\nend\nf()", { trace: (e) => events.push(e) });
      assert.deepEqual(
        events.map((e) => e.event),
        ["run_start", "fn_call_start", "fn_call_end", "run_end"]
      );
      assert.equal(events[0].runId, "test-run");
      assert.deepEqual(events[2].data, { fn: "f", outcome: "ok" });
      assert.equal(events[3].data?.outcome, "ok");
    });

    it("reports rescued errors", async () => {
      const events: TraceEvent[] = [];
      await run("attempt do\n  1 / 0\nrescue e do\n  0\nend", { trace: (e) => events.push(e) });
      const rescue = events.find((e) => e.event === "rescue");
      assert.deepEqual(rescue?.data, { error: "DivisionByZero", message: "Division by zero." });
    });
  });
});
