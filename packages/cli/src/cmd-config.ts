/**
 * flo config - effective runtime configuration
 */
import { ConfigError, resolveConfig } from "@flo/core";
import type { ResolvedConfig } from "@flo/core";
import { reportError } from "./source.js";

function limitLabel(n: number): string {
  return n === 0 ? "unlimited" : String(n);
}

export async function runConfig(opts: { json?: boolean; cwd?: string; homeDir?: string }): Promise<number> {
  let resolved: ResolvedConfig;
  try {
    resolved = resolveConfig(opts.cwd, opts.homeDir);
  } catch (e) {
    if (!(e instanceof ConfigError)) throw e;
    reportError("E_CONFIG", e.message, !opts.json);
    return 4;
  }

  if (opts.json) {
    console.log(JSON.stringify(resolved, null, 2));
    return 0;
  }

  const { strands, limits } = resolved.config;
  console.log("Effective Flo configuration");
  console.log(`  Source:           ${resolved.source}`);
  console.log(`  Path:             ${resolved.path ?? "(none)"}`);
  console.log(`  Max strands:      ${limitLabel(strands.maxConcurrent)}`);
  console.log(`  Strand timeout:   ${strands.timeoutMs === 0 ? "none" : `${strands.timeoutMs}ms`}`);
  console.log(`  Max call depth:   ${limits.maxCallDepth}`);
  return 0;
}
