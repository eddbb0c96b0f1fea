/**
 * Flo Evaluator - tree-walking interpreter over the Flo AST.
 *
 * Every node evaluates to an Outcome. A `return` or a raised error is an
 * ordinary value flowing back up the tree, never a thrown exception.
 */
import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type * as AST from "./ast.js";
import type { Span } from "./ast.js";
import { Environment } from "./environment.js";
import { FloRuntimeError, arityMismatch, isCancellation, typeMismatch } from "./errors.js";
import { literalValue, matchPattern } from "./patterns.js";
import { StrandScheduler, cancellationError } from "./strands.js";
import type { Strand, StrandSettlement } from "./strands.js";
import { makeEmitter } from "./trace.js";
import type { EmitTrace, TraceSink } from "./trace.js";
import { DEFAULT_CONFIG } from "./config.js";
import type { RuntimeConfig } from "./config.js";
import type { BuiltinTable, FloFunction, FloValue } from "./values.js";
import {
  NIL,
  NONE,
  formatValue,
  isTruthy,
  mkBool,
  mkErr,
  mkFloat,
  mkInt,
  mkList,
  mkMap,
  mkOk,
  mkSome,
  mkString,
  rangeLength,
  typeName,
  valuesEqual,
} from "./values.js";

// --- Execution options & results ---
export interface ExecOptions {
  builtins: BuiltinTable;
  runId?: string;
  trace?: TraceSink;
  /** Aborting it cancels the main task and, through it, every strand. */
  signal?: AbortSignal;
  /** Output sink for `print`. Defaults to stdout. */
  write?: (text: string) => void;
  config?: RuntimeConfig;
}

export type ExecResult =
  | { ok: true; value: FloValue }
  | { ok: false; error: FloRuntimeError };

export type Outcome =
  | { tag: "value"; value: FloValue }
  | { tag: "return"; value: FloValue }
  | { tag: "raise"; error: FloRuntimeError };

interface EvalContext {
  scheduler: StrandScheduler;
  emit: EmitTrace;
  write: (text: string) => void;
  /** The task (main program or strand) this evaluation runs on. */
  task: Strand;
  /** The task's signal, or one that never aborts inside `finally`. */
  signal: AbortSignal;
  depth: number;
  maxCallDepth: number;
}

const NEVER_ABORTED = new AbortController().signal;

function done(value: FloValue): Outcome {
  return { tag: "value", value };
}

function fail(error: FloRuntimeError, span?: Span): Outcome {
  if (span && !error.span) error.span = span;
  return { tag: "raise", error };
}

/** Run an operation that signals failure by throwing a FloRuntimeError. */
function guard(op: () => FloValue, span: Span): Outcome {
  try {
    return done(op());
  } catch (e) {
    if (e instanceof FloRuntimeError) return fail(e, span);
    throw e;
  }
}

// --- Entry points ---

export async function execute(program: AST.Module, options: ExecOptions): Promise<ExecResult> {
  return evaluate(program, Environment.root(options.builtins), options);
}

export async function evaluate(
  program: AST.Module,
  env: Environment,
  options: ExecOptions
): Promise<ExecResult> {
  const config = options.config ?? DEFAULT_CONFIG;
  const emit = makeEmitter(options.runId ?? "local", options.trace);
  const scheduler = new StrandScheduler({ ...config.strands, emit });
  const main = scheduler.main;

  const onAbort = (): void => {
    main.controller.abort(new FloRuntimeError("Cancelled", "Run was cancelled."));
    scheduler.cancelAll("Run was cancelled.");
  };
  if (options.signal) {
    if (options.signal.aborted) onAbort();
    else options.signal.addEventListener("abort", onAbort, { once: true });
  }

  const runStartMs = Date.now();
  emit("run_start", program.span, { file: program.span.file });

  const ctx: EvalContext = {
    scheduler,
    emit,
    write: options.write ?? ((text) => process.stdout.write(text)),
    task: main,
    signal: main.signal,
    depth: 0,
    maxCallDepth: config.limits.maxCallDepth,
  };

  let result: ExecResult;
  try {
    const outcome = await execBlock(program.statements, env, ctx);
    if (outcome.tag === "raise") {
      scheduler.cancelAll("Main program failed.");
      result = { ok: false, error: outcome.error };
    } else {
      result = { ok: true, value: outcome.value };
    }
    await scheduler.drain();
    // An abort that lands while strands drain still fails the run.
    if (result.ok && options.signal?.aborted) {
      result = { ok: false, error: new FloRuntimeError("Cancelled", "Run was cancelled.") };
    }
  } finally {
    options.signal?.removeEventListener("abort", onAbort);
  }

  emit(
    "run_end",
    program.span,
    result.ok
      ? { durationMs: Date.now() - runStartMs, outcome: "ok" }
      : { durationMs: Date.now() - runStartMs, outcome: "err", error: result.error.kind, message: result.error.message }
  );
  return result;
}

// --- Statements ---

async function execBlock(stmts: readonly AST.Stmt[], env: Environment, ctx: EvalContext): Promise<Outcome> {
  let last: FloValue = NIL;
  for (const stmt of stmts) {
    if (ctx.signal.aborted) {
      return fail(cancellationError(ctx.signal), stmt.span);
    }
    if (ctx.scheduler.tick()) {
      await yieldToEventLoop();
    }
    const out = await execStmt(stmt, env, ctx);
    if (out.tag !== "value") {
      if (out.tag === "raise" && !out.error.span) out.error.span = stmt.span;
      return out;
    }
    last = out.value;
  }
  return done(last);
}

async function execStmt(stmt: AST.Stmt, env: Environment, ctx: EvalContext): Promise<Outcome> {
  switch (stmt.kind) {
    case "LetDecl":
    case "VarDecl":
    case "ConstDecl": {
      const out = await evalExpr(stmt.value, env, ctx);
      if (out.tag !== "value") return out;
      const name = stmt.name;
      const mutable = stmt.kind === "VarDecl";
      return guard(() => {
        env.define(name, out.value, mutable);
        return NIL;
      }, stmt.span);
    }

    case "FnDecl": {
      const fn: FloFunction = {
        kind: "function",
        name: stmt.name,
        params: stmt.params,
        body: stmt.body,
        closure: env,
      };
      return guard(() => {
        env.define(fn.name, fn, false);
        return NIL;
      }, stmt.span);
    }

    case "ReturnStmt": {
      if (!stmt.value) return { tag: "return", value: NIL };
      const out = await evalExpr(stmt.value, env, ctx);
      if (out.tag !== "value") return out;
      return { tag: "return", value: out.value };
    }

    case "ExprStmt":
      return evalExpr(stmt.expr, env, ctx);

    // Module resolution and capability enforcement belong to the host.
    case "ImportDecl":
    case "CapabilityRequest":
      return done(NIL);
  }
}

// --- Expressions ---

async function evalExpr(expr: AST.Expr, env: Environment, ctx: EvalContext): Promise<Outcome> {
  const out = await evalNode(expr, env, ctx);
  if (out.tag === "raise" && !out.error.span) out.error.span = expr.span;
  return out;
}

async function evalList(exprs: readonly AST.Expr[], env: Environment, ctx: EvalContext): Promise<FloValue[] | Outcome> {
  const values: FloValue[] = [];
  for (const e of exprs) {
    const out = await evalExpr(e, env, ctx);
    if (out.tag !== "value") return out;
    values.push(out.value);
  }
  return values;
}

async function evalNode(expr: AST.Expr, env: Environment, ctx: EvalContext): Promise<Outcome> {
  switch (expr.kind) {
    case "IntLiteral":
    case "FloatLiteral":
    case "StringLiteral":
    case "BoolLiteral":
    case "NilLiteral":
      return done(literalValue(expr));

    case "VarRef": {
      const name = expr.name;
      return guard(() => env.get(name), expr.span);
    }

    case "Assignment": {
      const out = await evalExpr(expr.value, env, ctx);
      if (out.tag !== "value") return out;
      const name = expr.name;
      return guard(() => {
        env.set(name, out.value);
        return out.value;
      }, expr.span);
    }

    case "BinaryExpr": {
      const left = await evalExpr(expr.left, env, ctx);
      if (left.tag !== "value") return left;

      // Short-circuit: the deciding operand is the result.
      if (expr.op === "&&" && !isTruthy(left.value)) return left;
      if (expr.op === "||" && isTruthy(left.value)) return left;

      const right = await evalExpr(expr.right, env, ctx);
      if (right.tag !== "value") return right;

      switch (expr.op) {
        case "&&":
        case "||":
          return right;
        case "|>":
          return callValue(right.value, [left.value], expr.span, ctx);
        case "<|":
          return callValue(left.value, [right.value], expr.span, ctx);
        default: {
          const op = expr.op;
          return guard(() => evalBinaryOp(op, left.value, right.value), expr.span);
        }
      }
    }

    case "UnaryExpr": {
      const out = await evalExpr(expr.operand, env, ctx);
      if (out.tag !== "value") return out;
      const v = out.value;
      if (expr.op === "!") return done(mkBool(!isTruthy(v)));
      if (v.kind === "int") return done(expr.op === "-" ? mkInt(-v.value) : v);
      if (v.kind === "float") return done(expr.op === "-" ? mkFloat(-v.value) : v);
      return fail(typeMismatch(`Unary '${expr.op}' requires a number, got ${typeName(v)}.`), expr.span);
    }

    case "CallExpr": {
      const callee = await evalExpr(expr.callee, env, ctx);
      if (callee.tag !== "value") return callee;
      const args = await evalList(expr.args, env, ctx);
      if (!Array.isArray(args)) return args;
      return callValue(callee.value, args, expr.span, ctx);
    }

    case "IndexExpr": {
      const target = await evalExpr(expr.target, env, ctx);
      if (target.tag !== "value") return target;
      const index = await evalExpr(expr.index, env, ctx);
      if (index.tag !== "value") return index;
      return guard(() => indexValue(target.value, index.value), expr.span);
    }

    case "AttrExpr":
    case "OptionalChainExpr": {
      const out = await evalExpr(expr.target, env, ctx);
      if (out.tag !== "value") return out;
      const target = out.value;
      const optional = expr.kind === "OptionalChainExpr";
      if (optional && (target.kind === "nil" || (target.kind === "option" && target.tag === "None"))) {
        return done(NIL);
      }
      if (target.kind !== "map") {
        return fail(typeMismatch(`Cannot read attribute '${expr.name}' of ${typeName(target)}.`), expr.span);
      }
      const value = target.entries.get(expr.name);
      if (value !== undefined) return done(value);
      if (optional) return done(NIL);
      return fail(
        new FloRuntimeError("KeyNotFound", `Key '${expr.name}' not found.`, expr.span, { key: expr.name }),
        expr.span
      );
    }

    case "ListExpr": {
      const elements = await evalList(expr.elements, env, ctx);
      if (!Array.isArray(elements)) return elements;
      return done(mkList(elements));
    }

    case "MapExpr": {
      // A repeated key keeps its first position and takes the last value.
      const entries = new Map<string, FloValue>();
      for (const entry of expr.entries) {
        const out = await evalExpr(entry.value, env, ctx);
        if (out.tag !== "value") return out;
        entries.set(entry.key, out.value);
      }
      return done(mkMap(entries));
    }

    case "IfExpr": {
      const cond = await evalExpr(expr.cond, env, ctx);
      if (cond.tag !== "value") return cond;
      if (isTruthy(cond.value)) return execBlock(expr.then, env, ctx);
      for (const elif of expr.elifs) {
        const c = await evalExpr(elif.cond, env, ctx);
        if (c.tag !== "value") return c;
        if (isTruthy(c.value)) return execBlock(elif.body, env, ctx);
      }
      if (expr.else) return execBlock(expr.else, env, ctx);
      return done(NIL);
    }

    case "MatchExpr": {
      const subject = await evalExpr(expr.subject, env, ctx);
      if (subject.tag !== "value") return subject;
      for (const arm of expr.arms) {
        const bindings = matchPattern(arm.pattern, subject.value);
        if (bindings === null) continue;
        for (const [name, value] of bindings) {
          const bound = guard(() => {
            env.define(name, value, false);
            return NIL;
          }, arm.pattern.span);
          if (bound.tag !== "value") return bound;
        }
        return evalExpr(arm.body, env, ctx);
      }
      return fail(
        new FloRuntimeError("NoMatchError", `No match arm matched value ${formatValue(subject.value, true)}.`),
        expr.span
      );
    }

    case "ForExpr": {
      const iterable = await evalExpr(expr.iterable, env, ctx);
      if (iterable.tag !== "value") return iterable;
      const items = iterate(iterable.value);
      if (items === null) {
        return fail(typeMismatch(`Cannot iterate over ${typeName(iterable.value)}.`), expr.iterable.span);
      }
      let last: FloValue = NIL;
      for (const item of items) {
        const iterEnv = env.child();
        iterEnv.define(expr.binding, item, false);
        const out = await execBlock(expr.body, iterEnv, ctx);
        if (out.tag !== "value") return out;
        last = out.value;
      }
      return done(last);
    }

    case "WhileExpr": {
      let last: FloValue = NIL;
      for (;;) {
        if (ctx.signal.aborted) return fail(cancellationError(ctx.signal), expr.span);
        const cond = await evalExpr(expr.cond, env, ctx);
        if (cond.tag !== "value") return cond;
        if (!isTruthy(cond.value)) break;
        const out = await execBlock(expr.body, env, ctx);
        if (out.tag !== "value") return out;
        last = out.value;
      }
      return done(last);
    }

    case "AttemptExpr":
      return evalAttempt(expr, env, ctx);

    case "FnExpr":
      return done({ kind: "function", name: "lambda", params: expr.params, body: expr.body, closure: env });

    case "StrandExpr": {
      const strandEnv = env.child();
      const body = expr.body;
      const strand = ctx.scheduler.spawn(async (task): Promise<StrandSettlement> => {
        const out = await execBlock(body, strandEnv, {
          ...ctx,
          task,
          signal: task.signal,
          depth: 0,
        });
        return out.tag === "raise" ? { ok: false, error: out.error } : { ok: true, value: out.value };
      }, expr.span);
      return done({ kind: "strand", strand });
    }

    case "AwaitExpr": {
      const out = await evalExpr(expr.operand, env, ctx);
      if (out.tag !== "value") return out;
      const handle = out.value;
      if (handle.kind !== "strand") return out;

      let settlement: StrandSettlement;
      try {
        settlement = await ctx.scheduler.join(ctx.task, handle.strand, ctx.signal);
      } catch (e) {
        if (e instanceof FloRuntimeError) return fail(e, expr.span);
        throw e;
      }
      if (settlement.ok) return done(settlement.value);

      const cause = settlement.error;
      const err = new FloRuntimeError(
        "StrandPropagatedError",
        `Strand #${handle.strand.id} failed with ${cause.kind}: ${cause.message}`,
        expr.span,
        { strand: handle.strand.id, cause: cause.kind }
      );
      err.propagated = cause;
      return fail(err);
    }

    case "SomeExpr": {
      const out = await evalExpr(expr.value, env, ctx);
      return out.tag === "value" ? done(mkSome(out.value)) : out;
    }
    case "NoneExpr":
      return done(NONE);
    case "OkExpr": {
      const out = await evalExpr(expr.value, env, ctx);
      return out.tag === "value" ? done(mkOk(out.value)) : out;
    }
    case "ErrExpr": {
      const out = await evalExpr(expr.value, env, ctx);
      return out.tag === "value" ? done(mkErr(out.value)) : out;
    }
  }
}

async function evalAttempt(expr: AST.AttemptExpr, env: Environment, ctx: EvalContext): Promise<Outcome> {
  let out = await execBlock(expr.body, env, ctx);

  if (out.tag === "raise" && expr.rescue && !isCancellation(out.error)) {
    const err = out.error;
    ctx.emit("rescue", expr.rescue.span, { error: err.kind, message: err.message });
    const rescueEnv = env.child();
    rescueEnv.define(expr.rescue.binding, errorToValue(err), false);
    out = await execBlock(expr.rescue.body, rescueEnv, ctx);
  }

  if (expr.finally) {
    // Runs to completion even when the task is being cancelled.
    const fin = await execBlock(expr.finally, env, { ...ctx, signal: NEVER_ABORTED });
    if (fin.tag === "raise") return fin;
  }
  return out;
}

/** The map a `rescue` binding receives. */
export function errorToValue(err: FloRuntimeError): FloValue {
  const entries = new Map<string, FloValue>([
    ["kind", mkString(err.kind)],
    ["message", mkString(err.message)],
  ]);
  if (err.span) {
    entries.set("line", mkInt(err.span.startLine));
    entries.set("column", mkInt(err.span.startCol));
  }
  if (err.propagated) {
    entries.set("cause", errorToValue(err.propagated));
  }
  return mkMap(entries);
}

// --- Calls ---

async function callValue(callee: FloValue, args: FloValue[], span: Span, ctx: EvalContext): Promise<Outcome> {
  if (callee.kind === "function") {
    return callFunction(callee, args, span, ctx);
  }

  if (callee.kind === "builtin") {
    const fn = callee.fn;
    try {
      return done(await fn.call(args, { write: ctx.write, signal: ctx.signal }));
    } catch (e) {
      if (ctx.signal.aborted) return fail(cancellationError(ctx.signal), span);
      if (e instanceof FloRuntimeError) return fail(e, span);
      const msg = e instanceof Error ? e.message : String(e);
      return fail(
        new FloRuntimeError("HostError", `Builtin '${fn.name}' failed: ${msg}`, span, { fn: fn.name })
      );
    }
  }

  return fail(
    new FloRuntimeError("NotCallable", `Value of type ${typeName(callee)} is not callable.`, span, {
      type: typeName(callee),
    })
  );
}

async function callFunction(fn: FloFunction, args: FloValue[], span: Span, ctx: EvalContext): Promise<Outcome> {
  if (args.length !== fn.params.length) {
    return fail(arityMismatch(fn.name, String(fn.params.length), args.length), span);
  }
  if (ctx.depth >= ctx.maxCallDepth) {
    return fail(
      new FloRuntimeError(
        "RecursionLimit",
        `Maximum call depth of ${ctx.maxCallDepth} exceeded in '${fn.name}'.`,
        span,
        { fn: fn.name, limit: ctx.maxCallDepth }
      )
    );
  }

  const fnEnv = fn.closure.child();
  for (let i = 0; i < fn.params.length; i++) {
    const param = fn.params[i];
    const bound = guard(() => {
      fnEnv.define(param.name, args[i], false);
      return NIL;
    }, param.span);
    if (bound.tag !== "value") return bound;
  }

  ctx.emit("fn_call_start", span, { fn: fn.name });
  const out = await execBlock(fn.body, fnEnv, { ...ctx, depth: ctx.depth + 1 });
  ctx.emit("fn_call_end", span, { fn: fn.name, outcome: out.tag === "raise" ? "err" : "ok" });

  if (out.tag === "return") return done(out.value);
  return out;
}

// --- Operators ---

function isNumber(v: FloValue): v is Extract<FloValue, { kind: "int" | "float" }> {
  return v.kind === "int" || v.kind === "float";
}

export function evalBinaryOp(
  op: Exclude<AST.BinaryOp, "&&" | "||" | "|>" | "<|">,
  left: FloValue,
  right: FloValue
): FloValue {
  switch (op) {
    case "==":
      return mkBool(valuesEqual(left, right));
    case "!=":
      return mkBool(!valuesEqual(left, right));

    case "<":
    case ">":
    case "<=":
    case ">=": {
      let cmp: number;
      if (left.kind === "int" && right.kind === "int") {
        cmp = left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
      } else if (isNumber(left) && isNumber(right)) {
        const a = Number(left.value);
        const b = Number(right.value);
        if (Number.isNaN(a) || Number.isNaN(b)) return mkBool(false);
        cmp = a < b ? -1 : a > b ? 1 : 0;
      } else if (left.kind === "string" && right.kind === "string") {
        cmp = left.value < right.value ? -1 : left.value > right.value ? 1 : 0;
      } else {
        throw typeMismatch(
          `Operator '${op}' requires two numbers or two strings, got ${typeName(left)} and ${typeName(right)}.`
        );
      }
      switch (op) {
        case "<": return mkBool(cmp < 0);
        case ">": return mkBool(cmp > 0);
        case "<=": return mkBool(cmp <= 0);
        case ">=": return mkBool(cmp >= 0);
      }
    }
  }

  if (op === "+") {
    if (left.kind === "string" && right.kind === "string") return mkString(left.value + right.value);
    if (left.kind === "list" && right.kind === "list") return mkList([...left.elements, ...right.elements]);
  }

  if (left.kind === "int" && right.kind === "int") {
    const a = left.value;
    const b = right.value;
    switch (op) {
      case "+": return mkInt(a + b);
      case "-": return mkInt(a - b);
      case "*": return mkInt(a * b);
      case "/":
        if (b === 0n) throw divisionByZero(op);
        return mkFloat(Number(a) / Number(b));
      case "%": {
        if (b === 0n) throw divisionByZero(op);
        const m = a % b;
        return mkInt(m !== 0n && (m < 0n) !== (b < 0n) ? m + b : m);
      }
    }
  }

  if (isNumber(left) && isNumber(right)) {
    const a = Number(left.value);
    const b = Number(right.value);
    switch (op) {
      case "+": return mkFloat(a + b);
      case "-": return mkFloat(a - b);
      case "*": return mkFloat(a * b);
      case "/":
        if (b === 0) throw divisionByZero(op);
        return mkFloat(a / b);
      case "%": {
        if (b === 0) throw divisionByZero(op);
        const m = a % b;
        return mkFloat(m !== 0 && (m < 0) !== (b < 0) ? m + b : m);
      }
    }
  }

  throw typeMismatch(`Operator '${op}' cannot combine ${typeName(left)} and ${typeName(right)}.`);
}

function divisionByZero(op: string): FloRuntimeError {
  return new FloRuntimeError("DivisionByZero", op === "%" ? "Modulo by zero." : "Division by zero.");
}

// --- Indexing & iteration ---

function normalizeIndex(index: bigint, length: number): number | null {
  const len = BigInt(length);
  const i = index < 0n ? index + len : index;
  if (i < 0n || i >= len) return null;
  return Number(i);
}

function outOfRange(index: bigint, length: number): FloRuntimeError {
  return new FloRuntimeError(
    "IndexOutOfRange",
    `Index ${index} out of range for length ${length}.`,
    undefined,
    { index: index.toString(), length }
  );
}

export function indexValue(target: FloValue, index: FloValue): FloValue {
  switch (target.kind) {
    case "list": {
      if (index.kind !== "int") throw typeMismatch(`List index must be int, got ${typeName(index)}.`);
      const i = normalizeIndex(index.value, target.elements.length);
      if (i === null) throw outOfRange(index.value, target.elements.length);
      return target.elements[i];
    }
    case "string": {
      if (index.kind !== "int") throw typeMismatch(`String index must be int, got ${typeName(index)}.`);
      const chars = Array.from(target.value);
      const i = normalizeIndex(index.value, chars.length);
      if (i === null) throw outOfRange(index.value, chars.length);
      return mkString(chars[i]);
    }
    case "range": {
      if (index.kind !== "int") throw typeMismatch(`Range index must be int, got ${typeName(index)}.`);
      const length = Number(rangeLength(target.start, target.end));
      const i = normalizeIndex(index.value, length);
      if (i === null) throw outOfRange(index.value, length);
      return mkInt(target.start + BigInt(i));
    }
    case "map": {
      if (index.kind !== "string") throw typeMismatch(`Map key must be string, got ${typeName(index)}.`);
      const value = target.entries.get(index.value);
      if (value === undefined) {
        throw new FloRuntimeError("KeyNotFound", `Key '${index.value}' not found.`, undefined, { key: index.value });
      }
      return value;
    }
    default:
      throw typeMismatch(`Cannot index ${typeName(target)}.`);
  }
}

function* rangeItems(start: bigint, end: bigint): Generator<FloValue> {
  for (let i = start; i < end; i++) yield mkInt(i);
}

export function iterate(v: FloValue): Iterable<FloValue> | null {
  switch (v.kind) {
    case "list":
      return v.elements;
    case "range":
      return rangeItems(v.start, v.end);
    case "map":
      return Array.from(v.entries.keys(), mkString);
    case "string":
      return Array.from(v.value, mkString);
    default:
      return null;
  }
}
