/**
 * Argument checks shared by the builtins.
 */
import { arityMismatch, typeMismatch, typeName } from "@flo/core";
import type { FloValue } from "@flo/core";

export function expectArity(fn: string, args: readonly FloValue[], min: number, max = min): void {
  if (args.length >= min && args.length <= max) return;
  const expected = min === max ? String(min) : `${min} or ${max}`;
  throw arityMismatch(fn, expected, args.length);
}

export function expectInt(fn: string, v: FloValue): bigint {
  if (v.kind !== "int") {
    throw typeMismatch(`${fn}: expected int, got ${typeName(v)}.`);
  }
  return v.value;
}

export function expectList(fn: string, v: FloValue): readonly FloValue[] {
  if (v.kind !== "list") {
    throw typeMismatch(`${fn}: expected list, got ${typeName(v)}.`);
  }
  return v.elements;
}

export function expectMap(fn: string, v: FloValue): ReadonlyMap<string, FloValue> {
  if (v.kind !== "map") {
    throw typeMismatch(`${fn}: expected map, got ${typeName(v)}.`);
  }
  return v.entries;
}
