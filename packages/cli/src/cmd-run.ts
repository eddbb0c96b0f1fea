/**
 * flo run - execute Flo programs
 */
import * as fs from "node:fs";
import * as crypto from "node:crypto";
import {
  ConfigError,
  diagFromRuntimeError,
  execute,
  formatDiagnostic,
  formatValue,
  resolveConfig,
} from "@flo/core";
import type { RuntimeConfig, TraceEvent } from "@flo/core";
import { getBuiltins } from "@flo/std";
import { errorMessage, loadModule, readSource, reportError } from "./source.js";

export interface RunOptions {
  trace?: string;
  pretty?: boolean;
  showResult?: boolean;
  cwd?: string;
  homeDir?: string;
}

export async function runRun(file: string, opts: RunOptions): Promise<number> {
  const pretty = !!opts.pretty;

  const source = readSource(file, pretty);
  if (source === null) return 4;

  const program = loadModule(source, file, pretty);
  if (!program) return 2;

  let config: RuntimeConfig;
  try {
    config = resolveConfig(opts.cwd, opts.homeDir).config;
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    reportError("E_CONFIG", e.message, pretty);
    return 4;
  }

  let traceFd: number | null = null;
  if (opts.trace) {
    try {
      traceFd = fs.openSync(opts.trace, "w");
    } catch (e) {
      reportError("E_IO", `Error opening trace file: ${errorMessage(e)}`, pretty);
      return 4;
    }
  }

  // A failed write stops tracing; the run itself carries on.
  const traceState: { error: string | null } = { error: null };
  const traceHandler = (fd: number) => (event: TraceEvent) => {
    if (traceState.error !== null) return;
    try {
      fs.writeSync(fd, JSON.stringify(event) + "\n");
    } catch (e) {
      traceState.error = `Error writing trace file: ${errorMessage(e)}`;
    }
  };

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once("SIGINT", onInterrupt);

  try {
    const result = await execute(program, {
      builtins: getBuiltins(),
      config,
      runId: crypto.randomUUID(),
      trace: traceFd !== null ? traceHandler(traceFd) : undefined,
      signal: controller.signal,
    });

    if (traceState.error !== null) {
      reportError("E_IO", traceState.error, pretty);
      return 4;
    }

    if (!result.ok) {
      console.error(formatDiagnostic(diagFromRuntimeError(result.error), pretty, source));
      return 4;
    }

    if (opts.showResult) {
      console.log(formatValue(result.value));
    }
    return 0;
  } finally {
    process.removeListener("SIGINT", onInterrupt);
    if (traceFd !== null) {
      fs.closeSync(traceFd);
    }
  }
}
