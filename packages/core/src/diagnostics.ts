/**
 * Flo diagnostics for parse, validation and runtime errors.
 *
 * Front-end codes are `E_*` (E_LEX, E_PARSE, E_AST, validator codes, and the
 * CLI's E_IO / E_CONFIG); runtime errors use their error kind as the code.
 */
import type { Span } from "./ast.js";
import type { FloRuntimeError } from "./errors.js";

export interface Diagnostic {
  code: string;
  message: string;
  span?: Span;
  hint?: string;
}

export function makeDiag(code: string, message: string, span?: Span, hint?: string): Diagnostic {
  return { code, message, span, hint };
}

/** Runtime errors are reported under their kind. */
export function diagFromRuntimeError(err: FloRuntimeError): Diagnostic {
  const cause = err.propagated;
  return makeDiag(
    err.kind,
    err.message,
    err.span,
    cause ? `strand failed with ${cause.kind}: ${cause.message}` : undefined
  );
}

/** Order by file, then position. Diagnostics without a span sort last. */
export function compareDiagnostics(a: Diagnostic, b: Diagnostic): number {
  if (!a.span || !b.span) return (a.span ? 0 : 1) - (b.span ? 0 : 1);
  return (
    a.span.file.localeCompare(b.span.file) ||
    a.span.startLine - b.span.startLine ||
    a.span.startCol - b.span.startCol
  );
}

function location(span: Span | undefined): string {
  return span ? `${span.file}:${span.startLine}:${span.startCol}` : "<unknown>";
}

/**
 * The offending source line with a caret underline. Multi-line spans are
 * underlined to the end of their first line.
 */
function excerpt(span: Span, source: string): string[] {
  const text = source.split(/\r?\n/)[span.startLine - 1];
  if (text === undefined) return [];
  const gutter = String(span.startLine);
  const pad = " ".repeat(gutter.length);
  const lastCol = span.endLine === span.startLine ? span.endCol : text.length + 1;
  const width = Math.max(1, lastCol - span.startCol);
  return [
    `  ${pad} |`,
    `  ${gutter} | ${text}`,
    `  ${pad} | ${" ".repeat(Math.max(0, span.startCol - 1))}${"^".repeat(width)}`,
  ];
}

/**
 * JSON (one line) for machines, or the `error[CODE]` block for people.
 * With `source`, the pretty form also quotes the offending line.
 */
export function formatDiagnostic(d: Diagnostic, pretty: boolean, source?: string): string {
  if (!pretty) return JSON.stringify(d);

  const lines = [`error[${d.code}]: ${d.message}`, `  --> ${location(d.span)}`];
  if (d.span && source !== undefined) lines.push(...excerpt(d.span, source));
  if (d.hint) lines.push(`  hint: ${d.hint}`);
  return lines.join("\n");
}

export function formatDiagnostics(diags: readonly Diagnostic[], pretty: boolean, source?: string): string {
  if (!pretty) return JSON.stringify(diags);
  return diags.map((d) => formatDiagnostic(d, true, source)).join("\n\n");
}
