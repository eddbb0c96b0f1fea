/**
 * Structured run trace events, written as JSONL by `flo run --trace`.
 */
import type { Span } from "./ast.js";

export type TraceEventType =
  | "run_start"
  | "run_end"
  | "fn_call_start"
  | "fn_call_end"
  | "strand_spawn"
  | "strand_start"
  | "strand_end"
  | "strand_cancel"
  | "rescue";

export const TRACE_EVENT_TYPES: readonly TraceEventType[] = [
  "run_start",
  "run_end",
  "fn_call_start",
  "fn_call_end",
  "strand_spawn",
  "strand_start",
  "strand_end",
  "strand_cancel",
  "rescue",
];

export type TraceData = { [key: string]: string | number | boolean | null };

export interface TraceEvent {
  ts: string;
  runId: string;
  event: TraceEventType;
  span?: Span;
  data?: TraceData;
}

export type TraceSink = (event: TraceEvent) => void;

export type EmitTrace = (event: TraceEventType, span?: Span, data?: TraceData) => void;

export function makeEmitter(runId: string, sink?: TraceSink): EmitTrace {
  return (event, span, data) => {
    if (sink) {
      sink({
        ts: new Date().toISOString(),
        runId,
        event,
        span,
        data,
      });
    }
  };
}

export function isTraceEventType(value: unknown): value is TraceEventType {
  return typeof value === "string" && TRACE_EVENT_TYPES.some((t) => t === value);
}
