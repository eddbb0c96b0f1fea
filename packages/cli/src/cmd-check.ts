/**
 * flo check - static validation command
 */
import { loadModule, readSource } from "./source.js";

export async function runCheck(file: string, opts: { pretty?: boolean }): Promise<number> {
  const pretty = !!opts.pretty;
  const source = readSource(file, pretty);
  if (source === null) return 4;

  if (!loadModule(source, file, pretty)) return 2;

  console.log(pretty ? "No errors found." : "[]");
  return 0;
}
