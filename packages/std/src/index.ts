/**
 * @flo/std - Flo builtin functions
 */
import { mkBuiltin } from "@flo/core";
import type { BuiltinFn, BuiltinTable, FloValue } from "@flo/core";
import { printFn, sleepFn } from "./io-ops.js";
import { rangeFn, lenFn, appendFn, joinFn, keysFn, valuesFn } from "./list-ops.js";
import { strFn, intFn, floatFn, typeOfFn } from "./convert-ops.js";

export { printFn, sleepFn } from "./io-ops.js";
export { rangeFn, lenFn, appendFn, joinFn, keysFn, valuesFn } from "./list-ops.js";
export { strFn, intFn, floatFn, typeOfFn } from "./convert-ops.js";

const ALL_FNS: readonly BuiltinFn[] = [
  printFn, rangeFn, lenFn, strFn, intFn, floatFn,
  typeOfFn, keysFn, valuesFn, appendFn, joinFn, sleepFn,
];

let table: BuiltinTable | undefined;

/**
 * The builtin table. Built once and shared by every run.
 */
export function getBuiltins(): BuiltinTable {
  if (!table) {
    const fns = new Map<string, FloValue>();
    for (const fn of ALL_FNS) {
      fns.set(fn.name, Object.freeze(mkBuiltin(Object.freeze(fn))));
    }
    table = fns;
  }
  return table;
}
