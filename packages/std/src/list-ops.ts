/**
 * Flo builtins: collections
 * range, len, append, join, keys, values
 */
import { formatValue, mkInt, mkList, mkRange, mkString, rangeLength, typeMismatch, typeName } from "@flo/core";
import type { BuiltinFn, FloValue } from "@flo/core";
import { expectArity, expectInt, expectList, expectMap } from "./args.js";

/**
 * range(end) | range(start, end) -> range
 * Lazy half-open interval of ints.
 */
export const rangeFn: BuiltinFn = {
  name: "range",
  call(args) {
    expectArity("range", args, 1, 2);
    if (args.length === 1) {
      return mkRange(0n, expectInt("range", args[0]));
    }
    return mkRange(expectInt("range", args[0]), expectInt("range", args[1]));
  },
};

/**
 * len(list|map|string|range) -> int
 * Strings count code points.
 */
export const lenFn: BuiltinFn = {
  name: "len",
  call(args) {
    expectArity("len", args, 1);
    const v = args[0];
    switch (v.kind) {
      case "list":
        return mkInt(v.elements.length);
      case "map":
        return mkInt(v.entries.size);
      case "string":
        return mkInt([...v.value].length);
      case "range":
        return mkInt(rangeLength(v.start, v.end));
      default:
        throw typeMismatch(`len: unsupported type ${typeName(v)}.`);
    }
  },
};

/**
 * append(list, value) -> list
 * Returns a new list; the input is left as it was.
 */
export const appendFn: BuiltinFn = {
  name: "append",
  call(args) {
    expectArity("append", args, 2);
    return mkList([...expectList("append", args[0]), args[1]]);
  },
};

export const joinFn: BuiltinFn = {
  name: "join",
  call(args) {
    expectArity("join", args, 2);
    const items = expectList("join", args[0]);
    const sep = args[1];
    if (sep.kind !== "string") {
      throw typeMismatch(`join: separator must be a string, got ${typeName(sep)}.`);
    }
    return mkString(items.map((item) => formatValue(item)).join(sep.value));
  },
};

/** keys(map) -> list of strings, in insertion order. */
export const keysFn: BuiltinFn = {
  name: "keys",
  call(args) {
    expectArity("keys", args, 1);
    return mkList([...expectMap("keys", args[0]).keys()].map(mkString));
  },
};

export const valuesFn: BuiltinFn = {
  name: "values",
  call(args) {
    expectArity("values", args, 1);
    const values: FloValue[] = [...expectMap("values", args[0]).values()];
    return mkList(values);
  },
};
