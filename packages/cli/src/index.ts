/**
 * @flo/cli - command entry points
 */
export { runCheck } from "./cmd-check.js";
export { runRun } from "./cmd-run.js";
export type { RunOptions } from "./cmd-run.js";
export { runFmt, hasComments } from "./cmd-fmt.js";
export type { FmtOptions } from "./cmd-fmt.js";
export { runAst, astToJson } from "./cmd-ast.js";
export { runTrace, summarize } from "./cmd-trace.js";
export type { TraceSummary } from "./cmd-trace.js";
export { runConfig } from "./cmd-config.js";
