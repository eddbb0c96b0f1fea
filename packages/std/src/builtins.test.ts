/**
 * Tests for Flo builtin functions.
 */
import { describe, it } from "node:test";
import * as assert from "node:assert/strict";
import {
  FloRuntimeError,
  NIL,
  NONE,
  TRUE,
  execute,
  formatValue,
  mkFloat,
  mkInt,
  mkList,
  mkMap,
  mkString,
  parse,
  parseConfig,
} from "@flo/core";
import type { BuiltinFn, ExecOptions, FloValue, HostContext } from "@flo/core";
import { getBuiltins } from "./index.js";
import { printFn, sleepFn } from "./io-ops.js";
import { appendFn, joinFn, keysFn, lenFn, rangeFn, valuesFn } from "./list-ops.js";
import { floatFn, intFn, strFn, typeOfFn } from "./convert-ops.js";

function host(out: string[] = [], signal = new AbortController().signal): HostContext {
  return { write: (text) => out.push(text), signal };
}

async function call(fn: BuiltinFn, ...args: FloValue[]): Promise<string> {
  return formatValue(await fn.call(args, host()));
}

async function raises(fn: BuiltinFn, args: FloValue[], kind: string, message?: string): Promise<void> {
  await assert.rejects(
    async () => fn.call(args, host()),
    (e: unknown) => e instanceof FloRuntimeError && e.kind === kind && (message === undefined || e.message === message)
  );
}

const pair = mkMap(new Map([["a", mkInt(1)], ["b", mkInt(2)]]));

describe("print", () => {
  it("writes rendered values separated by spaces", async () => {
    const out: string[] = [];
    const result = await printFn.call([mkString("hi"), mkInt(1), mkList([mkString("a")]), NIL], host(out));
    assert.equal(result, NIL);
    assert.deepEqual(out, ['hi 1 ["a"] nil\n']);
  });

  it("writes a bare newline with no arguments", async () => {
    const out: string[] = [];
    await printFn.call([], host(out));
    assert.deepEqual(out, ["\n"]);
  });
});

describe("range", () => {
  it("starts at zero with one argument", async () => {
    assert.equal(await call(rangeFn, mkInt(3)), "range(0, 3)");
    assert.equal(await call(rangeFn, mkInt(1), mkInt(4)), "range(1, 4)");
  });

  it("rejects non-int bounds and bad arity", async () => {
    await raises(rangeFn, [mkFloat(1.5)], "TypeMismatch", "range: expected int, got float.");
    await raises(rangeFn, [], "ArityMismatch", "Function 'range' expects 1 or 2 arguments, got 0.");
  });
});

describe("len", () => {
  it("measures collections, strings and ranges", async () => {
    assert.equal(await call(lenFn, mkString("héllo")), "5");
    assert.equal(await call(lenFn, mkList([NIL, NIL])), "2");
    assert.equal(await call(lenFn, pair), "2");
    assert.equal(await call(lenFn, await rangeFn.call([mkInt(2), mkInt(7)], host())), "5");
    assert.equal(await call(lenFn, await rangeFn.call([mkInt(5), mkInt(1)], host())), "0");
  });

  it("rejects other values", async () => {
    await raises(lenFn, [mkInt(1)], "TypeMismatch", "len: unsupported type int.");
    await raises(lenFn, [], "ArityMismatch", "Function 'len' expects 1 argument, got 0.");
  });
});

describe("collections", () => {
  it("appends without touching the input", async () => {
    const xs = mkList([mkInt(1)]);
    assert.equal(await call(appendFn, xs, mkInt(2)), "[1, 2]");
    assert.equal(formatValue(xs), "[1]");
  });

  it("joins rendered elements", async () => {
    assert.equal(await call(joinFn, mkList([mkInt(1), mkString("a"), NIL]), mkString("-")), "1-a-nil");
    await raises(joinFn, [mkList([]), mkInt(0)], "TypeMismatch");
  });

  it("lists map keys and values in order", async () => {
    assert.equal(await call(keysFn, pair), '["a", "b"]');
    assert.equal(await call(valuesFn, pair), "[1, 2]");
    await raises(keysFn, [mkList([])], "TypeMismatch", "keys: expected map, got list.");
  });
});

describe("conversions", () => {
  it("renders with str", async () => {
    assert.equal(await call(strFn, mkFloat(5)), "5.0");
    assert.equal(await call(strFn, mkList([mkString("a")])), '["a"]');
  });

  it("converts to int", async () => {
    assert.equal(await call(intFn, mkString("  42 ")), "42");
    assert.equal(await call(intFn, mkString("-7")), "-7");
    assert.equal(await call(intFn, mkFloat(-3.9)), "-3");
    assert.equal(await call(intFn, TRUE), "1");
    await raises(intFn, [mkString("4.5")], "ValueError", "int: invalid literal '4.5'.");
    await raises(intFn, [mkFloat(Infinity)], "ValueError");
    await raises(intFn, [NIL], "TypeMismatch", "int: cannot convert nil to int.");
  });

  it("rejects ints outside the 64-bit range", async () => {
    assert.equal(await call(intFn, mkString("9223372036854775807")), "9223372036854775807");
    assert.equal(await call(intFn, mkString("-9223372036854775808")), "-9223372036854775808");
    await raises(
      intFn,
      [mkString("99999999999999999999")],
      "ValueError",
      "int: 99999999999999999999 is out of the 64-bit range."
    );
    await raises(intFn, [mkString("9223372036854775808")], "ValueError");
    await raises(intFn, [mkFloat(1e20)], "ValueError", "int: 100000000000000000000 is out of the 64-bit range.");
  });

  it("converts to float", async () => {
    assert.equal(await call(floatFn, mkInt(2)), "2.0");
    assert.equal(await call(floatFn, mkString("1e3")), "1000.0");
    assert.equal(await call(floatFn, mkString("-inf")), "-inf");
    await raises(floatFn, [mkString("abc")], "ValueError", "float: invalid literal 'abc'.");
    await raises(floatFn, [TRUE], "TypeMismatch");
  });

  it("names value kinds", async () => {
    assert.equal(await call(typeOfFn, mkInt(1)), "int");
    assert.equal(await call(typeOfFn, NONE), "None");
  });
});

describe("sleep", () => {
  it("resolves to nil", async () => {
    assert.equal(await call(sleepFn, mkInt(1)), "nil");
  });

  it("rejects once the task is cancelled", async () => {
    const controller = new AbortController();
    controller.abort();
    await assert.rejects(async () => sleepFn.call([mkInt(1000)], host([], controller.signal)));
  });

  it("requires a number", async () => {
    await raises(sleepFn, [mkString("1")], "TypeMismatch");
  });
});

describe("getBuiltins", () => {
  it("builds one frozen table", () => {
    const table = getBuiltins();
    assert.equal(getBuiltins(), table);
    assert.deepEqual(
      [...table.keys()],
      ["print", "range", "len", "str", "int", "float", "type_of", "keys", "values", "append", "join", "sleep"]
    );
    assert.ok(Object.isFrozen(table.get("print")));
  });

  it("runs programs against the table", async () => {
    const out: string[] = [];
    const src = 'for i in range(1, 4) do\n  print("n", i)\nend\nlen(keys({a: 1, b: 2}))';
    const pr = parse(src, "test.flo");
    assert.ok(pr.program);
    const options: ExecOptions = { builtins: getBuiltins(), write: (text) => out.push(text) };
    const result = await execute(pr.program, options);
    assert.equal(result.ok ? formatValue(result.value) : result.error.kind, "2");
    assert.deepEqual(out, ["n 1\n", "n 2\n", "n 3\n"]);
  });

  it("cancels a sleeping strand on timeout", async () => {
    const src = "let s := strand do\n  sleep(1000)\nend\nawait s";
    const pr = parse(src, "test.flo");
    assert.ok(pr.program);
    const result = await execute(pr.program, {
      builtins: getBuiltins(),
      config: parseConfig({ strands: { timeoutMs: 20 } }),
    });
    assert.equal(result.ok ? "" : result.error.propagated?.kind, "StrandTimeout");
  });
});
