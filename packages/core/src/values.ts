/**
 * Flo run-time value model.
 */
import type * as AST from "./ast.js";
import type { Environment } from "./environment.js";
import type { Strand } from "./strands.js";

export type FloValue =
  | { kind: "int"; value: bigint }
  | { kind: "float"; value: number }
  | { kind: "bool"; value: boolean }
  | { kind: "string"; value: string }
  | { kind: "nil" }
  | { kind: "list"; elements: readonly FloValue[] }
  | { kind: "map"; entries: ReadonlyMap<string, FloValue> }
  | FloFunction
  | { kind: "builtin"; fn: BuiltinFn }
  | { kind: "range"; start: bigint; end: bigint }
  | { kind: "strand"; strand: Strand }
  | { kind: "option"; tag: "Some"; value: FloValue }
  | { kind: "option"; tag: "None" }
  | { kind: "result"; tag: "Ok" | "Err"; value: FloValue };

export interface FloFunction {
  kind: "function";
  name: string;
  params: readonly AST.Param[];
  body: readonly AST.Stmt[];
  closure: Environment;
}

// --- Host functions ---
export interface HostContext {
  /** Output sink used by print. */
  write(text: string): void;
  /** Aborted when the calling task is cancelled. */
  signal: AbortSignal;
}

export interface BuiltinFn {
  name: string;
  call(args: readonly FloValue[], ctx: HostContext): FloValue | Promise<FloValue>;
}

export type BuiltinTable = ReadonlyMap<string, FloValue>;

// --- Constructors ---
const INT64_MIN = -(2n ** 63n);
const INT64_MAX = 2n ** 63n - 1n;

export const NIL: FloValue = { kind: "nil" };
export const TRUE: FloValue = { kind: "bool", value: true };
export const FALSE: FloValue = { kind: "bool", value: false };
export const NONE: FloValue = { kind: "option", tag: "None" };

export function mkInt(value: bigint | number): FloValue {
  const n = typeof value === "number" ? BigInt(Math.trunc(value)) : value;
  return { kind: "int", value: BigInt.asIntN(64, n) };
}

export function fitsInt64(value: bigint): boolean {
  return value >= INT64_MIN && value <= INT64_MAX;
}

export function mkFloat(value: number): FloValue {
  return { kind: "float", value };
}

export function mkBool(value: boolean): FloValue {
  return value ? TRUE : FALSE;
}

export function mkString(value: string): FloValue {
  return { kind: "string", value };
}

export function mkList(elements: readonly FloValue[]): FloValue {
  return { kind: "list", elements };
}

export function mkMap(entries: ReadonlyMap<string, FloValue>): FloValue {
  return { kind: "map", entries };
}

export function mkBuiltin(fn: BuiltinFn): FloValue {
  return { kind: "builtin", fn };
}

export function mkRange(start: bigint, end: bigint): FloValue {
  return { kind: "range", start, end };
}

export function mkSome(value: FloValue): FloValue {
  return { kind: "option", tag: "Some", value };
}

export function mkOk(value: FloValue): FloValue {
  return { kind: "result", tag: "Ok", value };
}

export function mkErr(value: FloValue): FloValue {
  return { kind: "result", tag: "Err", value };
}

// --- Inspection ---

/** Only `false` and `nil` are falsy. */
export function isTruthy(v: FloValue): boolean {
  if (v.kind === "nil") return false;
  if (v.kind === "bool") return v.value;
  return true;
}

export function typeName(v: FloValue): string {
  if (v.kind === "option" || v.kind === "result") return v.tag;
  return v.kind;
}

export function rangeLength(start: bigint, end: bigint): bigint {
  return end > start ? end - start : 0n;
}

export function valuesEqual(a: FloValue, b: FloValue): boolean {
  if (a === b) return true;

  if ((a.kind === "int" || a.kind === "float") && (b.kind === "int" || b.kind === "float")) {
    if (a.kind === "int" && b.kind === "int") return a.value === b.value;
    return Number(a.value) === Number(b.value);
  }

  switch (a.kind) {
    case "bool":
      return b.kind === "bool" && b.value === a.value;
    case "string":
      return b.kind === "string" && b.value === a.value;
    case "nil":
      return b.kind === "nil";
    case "list": {
      if (b.kind !== "list" || a.elements.length !== b.elements.length) return false;
      for (let i = 0; i < a.elements.length; i++) {
        if (!valuesEqual(a.elements[i], b.elements[i])) return false;
      }
      return true;
    }
    case "map": {
      if (b.kind !== "map" || a.entries.size !== b.entries.size) return false;
      for (const [key, value] of a.entries) {
        const other = b.entries.get(key);
        if (other === undefined || !valuesEqual(value, other)) return false;
      }
      return true;
    }
    case "range":
      return b.kind === "range" && a.start === b.start && a.end === b.end;
    case "option":
      if (b.kind !== "option" || a.tag !== b.tag) return false;
      if (a.tag === "Some" && b.tag === "Some") return valuesEqual(a.value, b.value);
      return true;
    case "result":
      return b.kind === "result" && a.tag === b.tag && valuesEqual(a.value, b.value);
    case "function":
    case "builtin":
    case "strand":
    case "int":
    case "float":
      return false;
  }
}

// --- Rendering ---

export function formatFloat(n: number): string {
  if (Number.isNaN(n)) return "nan";
  if (n === Infinity) return "inf";
  if (n === -Infinity) return "-inf";
  if (Number.isInteger(n) && Math.abs(n) < 1e16) return n.toFixed(1);
  return String(n);
}

/**
 * Render a value the way `print` and `str` show it. Strings are raw at the
 * top level and quoted when nested inside a collection.
 */
export function formatValue(v: FloValue, nested = false): string {
  switch (v.kind) {
    case "int":
      return v.value.toString();
    case "float":
      return formatFloat(v.value);
    case "bool":
      return v.value ? "true" : "false";
    case "string":
      return nested ? JSON.stringify(v.value) : v.value;
    case "nil":
      return "nil";
    case "list":
      return `[${v.elements.map((e) => formatValue(e, true)).join(", ")}]`;
    case "map": {
      const parts: string[] = [];
      for (const [key, value] of v.entries) {
        parts.push(`${key}: ${formatValue(value, true)}`);
      }
      return `{${parts.join(", ")}}`;
    }
    case "function":
      return `<fn ${v.name}>`;
    case "builtin":
      return `<builtin ${v.fn.name}>`;
    case "range":
      return `range(${v.start}, ${v.end})`;
    case "strand":
      return `<strand #${v.strand.id}>`;
    case "option":
      return v.tag === "Some" ? `Some(${formatValue(v.value, true)})` : "None";
    case "result":
      return `${v.tag}(${formatValue(v.value, true)})`;
  }
}
