/**
 * Shared source loading for the flo commands.
 */
import * as fs from "node:fs";
import { compareDiagnostics, formatDiagnostic, formatDiagnostics, parse, validate } from "@flo/core";
import type { Module } from "@flo/core";

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

export function reportError(code: string, message: string, pretty: boolean): void {
  console.error(formatDiagnostic({ code, message }, pretty));
}

/** Read a file, or stdin for "-". Returns null after reporting E_IO. */
export function readSource(file: string, pretty: boolean): string | null {
  try {
    return fs.readFileSync(file === "-" ? 0 : file, "utf-8");
  } catch (e) {
    reportError("E_IO", `Error reading file: ${errorMessage(e)}`, pretty);
    return null;
  }
}

/**
 * Parse and optionally validate. Reports diagnostics to stderr and
 * returns null when there are any.
 */
export function loadModule(source: string, file: string, pretty: boolean, check = true): Module | null {
  const parseResult = parse(source, file);
  if (parseResult.diagnostics.length > 0) {
    console.error(formatDiagnostics(parseResult.diagnostics, pretty, source));
    return null;
  }
  if (!parseResult.program) {
    reportError("E_PARSE", "Parse produced no program.", pretty);
    return null;
  }
  if (check) {
    const diags = validate(parseResult.program);
    if (diags.length > 0) {
      console.error(formatDiagnostics([...diags].sort(compareDiagnostics), pretty, source));
      return null;
    }
  }
  return parseResult.program;
}
