/**
 * @flo/core - Flo Language Core
 */
export * from "./ast.js";
export * from "./diagnostics.js";
export * from "./values.js";
export * from "./errors.js";
export { parse } from "./parser.js";
export type { ParseResult } from "./parser.js";
export { validate } from "./validator.js";
export { format, formatExpr, formatPattern, formatType } from "./formatter.js";
export { Environment } from "./environment.js";
export { matchPattern, patternNames } from "./patterns.js";
export type { Bindings } from "./patterns.js";
export { execute, evaluate, errorToValue } from "./evaluator.js";
export type { ExecOptions, ExecResult, Outcome } from "./evaluator.js";
export { Strand, StrandScheduler } from "./strands.js";
export type { StrandSettlement, StrandState, SchedulerOptions } from "./strands.js";
export { TRACE_EVENT_TYPES, isTraceEventType, makeEmitter } from "./trace.js";
export type { TraceEvent, TraceEventType, TraceData, TraceSink, EmitTrace } from "./trace.js";
export {
  ConfigError,
  DEFAULT_CONFIG,
  parseConfig,
  resolveConfig,
  runtimeConfigSchema,
} from "./config.js";
export type { RuntimeConfig, ResolvedConfig } from "./config.js";
