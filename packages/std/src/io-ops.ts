/**
 * Flo builtins: output and timing
 * print, sleep
 */
import { setTimeout as delay } from "node:timers/promises";
import { NIL, formatValue, typeMismatch, typeName } from "@flo/core";
import type { BuiltinFn } from "@flo/core";
import { expectArity } from "./args.js";

/**
 * print(values...) -> nil
 * Writes the rendered values separated by spaces, then a newline.
 */
export const printFn: BuiltinFn = {
  name: "print",
  call(args, ctx) {
    ctx.write(args.map((v) => formatValue(v)).join(" ") + "\n");
    return NIL;
  },
};

/**
 * sleep(ms) -> nil
 * Suspends the calling task. Rejects once the task is cancelled.
 */
export const sleepFn: BuiltinFn = {
  name: "sleep",
  async call(args, ctx) {
    expectArity("sleep", args, 1);
    const ms = args[0];
    if (ms.kind !== "int" && ms.kind !== "float") {
      throw typeMismatch(`sleep: expected a number of milliseconds, got ${typeName(ms)}.`);
    }
    await delay(Math.max(0, Number(ms.value)), undefined, { signal: ctx.signal });
    return NIL;
  },
};
