/**
 * flo fmt - canonical formatter command
 */
import * as fs from "node:fs";
import { format } from "@flo/core";
import { errorMessage, loadModule, readSource, reportError } from "./source.js";

export interface FmtOptions {
  write?: boolean;
  /** Report whether the file is already canonical; never writes. */
  check?: boolean;
}

const STRING_LITERAL = /"(?:[^"\\]|\\.)*"/g;

/** True when a line holds a `#` outside string literals. */
export function hasComments(source: string): boolean {
  return source.split("\n").some((line) => line.replace(STRING_LITERAL, '""').includes("#"));
}

export async function runFmt(file: string, opts: FmtOptions): Promise<number> {
  const source = readSource(file, true);
  if (source === null) return 4;

  const program = loadModule(source, file, true, false);
  if (!program) return 2;

  const formatted = format(program);

  if (opts.check) {
    if (formatted === source) return 0;
    console.error(`${file}: not formatted`);
    return 1;
  }

  if (hasComments(source)) {
    console.error("warning: formatting will remove comments from the output.");
  }

  try {
    if (!opts.write) {
      process.stdout.write(formatted);
    } else if (formatted !== source) {
      fs.writeFileSync(file, formatted, "utf-8");
    }
  } catch (e) {
    reportError("E_IO", `Error writing file: ${errorMessage(e)}`, true);
    return 4;
  }
  return 0;
}
