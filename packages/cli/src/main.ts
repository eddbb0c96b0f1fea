#!/usr/bin/env -S node --import tsx
/**
 * flo - Flo language CLI
 */
import { createRequire } from "node:module";
import { Command } from "commander";
import { z } from "zod";
import { runCheck } from "./cmd-check.js";
import { runRun } from "./cmd-run.js";
import { runFmt } from "./cmd-fmt.js";
import type { FmtOptions } from "./cmd-fmt.js";
import { runAst } from "./cmd-ast.js";
import { runTrace } from "./cmd-trace.js";
import { runConfig } from "./cmd-config.js";

const require = createRequire(import.meta.url);
const pkg = z.object({ version: z.string() }).parse(require("../package.json"));

const program = new Command();

program
  .name("flo")
  .description("Flo: a small scripting language with structured concurrency")
  .version(pkg.version);

program
  .command("run")
  .description("Run a Flo program")
  .argument("<file>", "Flo source file to run (or - for stdin)")
  .option("--trace <path>", "Write JSONL trace to file")
  .option("--pretty", "Human-readable error output", false)
  .option("--show-result", "Print the value of the last statement", false)
  .action(async (file: string, opts: { trace?: string; pretty?: boolean; showResult?: boolean }) => {
    process.exitCode = await runRun(file, opts);
  });

program
  .command("check")
  .description("Parse and validate without running")
  .argument("<file>", "Flo source file to check")
  .option("--pretty", "Human-readable output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runCheck(file, opts);
  });

program
  .command("fmt")
  .description("Canonical formatter")
  .argument("<file>", "Flo source file to format")
  .option("--write", "Overwrite file in place", false)
  .option("--check", "Exit 1 when the file is not already formatted", false)
  .action(async (file: string, opts: FmtOptions) => {
    process.exitCode = await runFmt(file, opts);
  });

program
  .command("ast")
  .description("Print the syntax tree as JSON")
  .argument("<file>", "Flo source file to parse")
  .option("--pretty", "Human-readable error output", false)
  .action(async (file: string, opts: { pretty?: boolean }) => {
    process.exitCode = await runAst(file, opts);
  });

program
  .command("trace")
  .description("Display trace summary")
  .argument("<file>", "JSONL trace file")
  .option("--json", "Output as JSON", false)
  .action(async (file: string, opts: { json?: boolean }) => {
    process.exitCode = await runTrace(file, opts);
  });

program
  .command("config")
  .description("Display the effective runtime configuration and its source")
  .option("--json", "Output as JSON", false)
  .action(async (opts: { json?: boolean }) => {
    process.exitCode = await runConfig(opts);
  });

// Reject unknown commands before commander parses, so --help cannot mask the exit code.
const knownCommands = new Set(["run", "check", "fmt", "ast", "trace", "config", "help"]);
const firstPositional = process.argv.slice(2).find((a) => !a.startsWith("-"));
if (firstPositional && !knownCommands.has(firstPositional)) {
  console.error(`Unknown command: ${firstPositional}`);
  process.exit(1);
}

await program.parseAsync(process.argv);
