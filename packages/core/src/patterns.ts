/**
 * Structural pattern matching for `match` arms.
 *
 * Matching is pure: it returns the bindings a pattern would introduce, or
 * null when the value does not match. Committing the bindings is left to the
 * evaluator so a failed arm never leaves partial bindings behind.
 */
import type * as AST from "./ast.js";
import type { FloValue } from "./values.js";
import { mkBool, mkFloat, mkInt, mkString, NIL, valuesEqual } from "./values.js";

export type Bindings = Map<string, FloValue>;

export function literalValue(lit: AST.Literal): FloValue {
  switch (lit.kind) {
    case "IntLiteral":
      return mkInt(lit.value);
    case "FloatLiteral":
      return mkFloat(lit.value);
    case "StringLiteral":
      return mkString(lit.value);
    case "BoolLiteral":
      return mkBool(lit.value);
    case "NilLiteral":
      return NIL;
  }
}

export function matchPattern(pattern: AST.Pattern, value: FloValue): Bindings | null {
  const bindings: Bindings = new Map();
  return collect(pattern, value, bindings) ? bindings : null;
}

function collect(pattern: AST.Pattern, value: FloValue, out: Bindings): boolean {
  switch (pattern.kind) {
    case "WildcardPattern":
      return true;

    case "VarPattern":
      out.set(pattern.name, value);
      return true;

    case "LiteralPattern":
      return valuesEqual(literalValue(pattern.literal), value);

    case "OptionPattern": {
      if (value.kind !== "option" || value.tag !== pattern.variant) return false;
      if (pattern.inner === undefined || value.tag === "None") return true;
      return collect(pattern.inner, value.value, out);
    }

    case "ResultPattern": {
      if (value.kind !== "result" || value.tag !== pattern.variant) return false;
      if (pattern.inner === undefined) return true;
      return collect(pattern.inner, value.value, out);
    }

    case "ListPattern": {
      if (value.kind !== "list" || value.elements.length !== pattern.elements.length) return false;
      for (let i = 0; i < pattern.elements.length; i++) {
        if (!collect(pattern.elements[i], value.elements[i], out)) return false;
      }
      return true;
    }
  }
}

/** Names a pattern binds, in source order (duplicates included). */
export function patternNames(pattern: AST.Pattern): string[] {
  switch (pattern.kind) {
    case "VarPattern":
      return [pattern.name];
    case "OptionPattern":
    case "ResultPattern":
      return pattern.inner ? patternNames(pattern.inner) : [];
    case "ListPattern":
      return pattern.elements.flatMap(patternNames);
    case "WildcardPattern":
    case "LiteralPattern":
      return [];
  }
}
