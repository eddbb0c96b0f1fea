/**
 * Flo runtime error taxonomy.
 */
import type { Span } from "./ast.js";

export type ErrorKind =
  | "UndefinedVariable"
  | "DuplicateDefinition"
  | "ImmutableReassignment"
  | "ArityMismatch"
  | "TypeMismatch"
  | "NotCallable"
  | "NoMatchError"
  | "IndexOutOfRange"
  | "KeyNotFound"
  | "StrandPropagatedError"
  | "DivisionByZero"
  | "ValueError"
  | "HostError"
  | "RecursionLimit"
  | "StrandTimeout"
  | "Cancelled"
  | "Deadlock";

export type ErrorDetails = { [key: string]: string | number | boolean | null };

export class FloRuntimeError extends Error {
  kind: ErrorKind;
  span?: Span;
  details?: ErrorDetails;
  /** The strand error wrapped by a StrandPropagatedError. */
  propagated?: FloRuntimeError;

  constructor(kind: ErrorKind, message: string, span?: Span, details?: ErrorDetails) {
    super(message);
    this.name = "FloRuntimeError";
    this.kind = kind;
    this.span = span;
    this.details = details;
  }
}

// Cancellation unwinds the task; rescue never sees it.
export function isCancellation(err: FloRuntimeError): boolean {
  return err.kind === "Cancelled" || err.kind === "StrandTimeout";
}

export function undefinedVariable(name: string): FloRuntimeError {
  return new FloRuntimeError("UndefinedVariable", `Undefined variable '${name}'.`, undefined, { name });
}

export function duplicateDefinition(name: string): FloRuntimeError {
  return new FloRuntimeError(
    "DuplicateDefinition",
    `'${name}' is already defined in this scope.`,
    undefined,
    { name }
  );
}

export function immutableReassignment(name: string): FloRuntimeError {
  return new FloRuntimeError(
    "ImmutableReassignment",
    `Cannot reassign immutable binding '${name}'.`,
    undefined,
    { name }
  );
}

export function arityMismatch(fn: string, expected: string, actual: number): FloRuntimeError {
  return new FloRuntimeError(
    "ArityMismatch",
    `Function '${fn}' expects ${expected} argument${expected === "1" ? "" : "s"}, got ${actual}.`,
    undefined,
    { fn, expected, actual }
  );
}

export function typeMismatch(message: string): FloRuntimeError {
  return new FloRuntimeError("TypeMismatch", message);
}

/** Wrap anything a host function threw. */
export function toFloError(e: unknown): FloRuntimeError {
  if (e instanceof FloRuntimeError) return e;
  return new FloRuntimeError("HostError", e instanceof Error ? e.message : String(e));
}
