/**
 * flo ast - dump the syntax tree as JSON
 */
import { loadModule, readSource } from "./source.js";

/** JSON has no 64-bit ints; they are written as decimal strings. */
function bigintAsString(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function astToJson(value: unknown): string {
  return JSON.stringify(value, bigintAsString, 2);
}

export async function runAst(file: string, opts: { pretty?: boolean }): Promise<number> {
  const pretty = !!opts.pretty;
  const source = readSource(file, pretty);
  if (source === null) return 4;

  const program = loadModule(source, file, pretty, false);
  if (!program) return 2;

  console.log(astToJson(program));
  return 0;
}
