/**
 * Flo builtins: conversions
 * str, int, float, type_of
 */
import { FloRuntimeError, fitsInt64, formatValue, mkFloat, mkInt, mkString, typeMismatch, typeName } from "@flo/core";
import type { BuiltinFn, FloValue } from "@flo/core";
import { expectArity } from "./args.js";

const INT_LITERAL = /^[+-]?\d+$/;
const FLOAT_LITERAL = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;
const FLOAT_SPECIALS: ReadonlyMap<string, number> = new Map([
  ["inf", Infinity],
  ["+inf", Infinity],
  ["-inf", -Infinity],
  ["nan", NaN],
]);

function valueError(message: string, input: string): FloRuntimeError {
  return new FloRuntimeError("ValueError", message, undefined, { input });
}

export const strFn: BuiltinFn = {
  name: "str",
  call(args) {
    expectArity("str", args, 1);
    return mkString(formatValue(args[0]));
  },
};

/**
 * int(x) -> int
 * Floats truncate toward zero; strings must be decimal literals.
 */
export const intFn: BuiltinFn = {
  name: "int",
  call(args) {
    expectArity("int", args, 1);
    return toInt(args[0]);
  },
};

function checkedInt(n: bigint, input: string): FloValue {
  if (!fitsInt64(n)) {
    throw valueError(`int: ${input} is out of the 64-bit range.`, input);
  }
  return mkInt(n);
}

function toInt(v: FloValue): FloValue {
  switch (v.kind) {
    case "int":
      return v;
    case "float":
      if (!Number.isFinite(v.value)) {
        throw valueError(`int: cannot convert ${formatValue(v)} to int.`, formatValue(v));
      }
      return checkedInt(BigInt(Math.trunc(v.value)), formatValue(v));
    case "bool":
      return mkInt(v.value ? 1 : 0);
    case "string": {
      const text = v.value.trim();
      if (!INT_LITERAL.test(text)) {
        throw valueError(`int: invalid literal '${v.value}'.`, v.value);
      }
      return checkedInt(BigInt(text), v.value);
    }
    default:
      throw typeMismatch(`int: cannot convert ${typeName(v)} to int.`);
  }
}

export const floatFn: BuiltinFn = {
  name: "float",
  call(args) {
    expectArity("float", args, 1);
    const v = args[0];
    switch (v.kind) {
      case "int":
        return mkFloat(Number(v.value));
      case "float":
        return v;
      case "string": {
        const text = v.value.trim();
        const special = FLOAT_SPECIALS.get(text.toLowerCase());
        if (special !== undefined) return mkFloat(special);
        if (!FLOAT_LITERAL.test(text)) {
          throw valueError(`float: invalid literal '${v.value}'.`, v.value);
        }
        return mkFloat(Number(text));
      }
      default:
        throw typeMismatch(`float: cannot convert ${typeName(v)} to float.`);
    }
  },
};

/** type_of(x) -> string naming the value kind, or the Option/Result tag. */
export const typeOfFn: BuiltinFn = {
  name: "type_of",
  call(args) {
    expectArity("type_of", args, 1);
    return mkString(typeName(args[0]));
  },
};
