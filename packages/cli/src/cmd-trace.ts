/**
 * flo trace - trace summary command
 */
import * as fs from "node:fs";
import { z } from "zod";
import { errorMessage } from "./source.js";

const traceLineSchema = z.object({
  ts: z.string(),
  runId: z.string(),
  event: z.string(),
  span: z.unknown().optional(),
  data: z.record(z.union([z.string(), z.number(), z.boolean(), z.null()])).optional(),
});

type TraceLine = z.infer<typeof traceLineSchema>;

export interface TraceSummary {
  runId: string;
  totalEvents: number;
  skippedLines: number;
  fnCalls: number;
  fnsByName: Record<string, number>;
  strandsSpawned: number;
  strandsCancelled: number;
  rescues: number;
  failures: number;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function parseLine(line: string): TraceLine | null {
  let raw: unknown;
  try {
    raw = JSON.parse(line);
  } catch {
    return null;
  }
  const result = traceLineSchema.safeParse(raw);
  return result.success ? result.data : null;
}

export function summarize(events: readonly TraceLine[], skippedLines = 0): TraceSummary {
  const summary: TraceSummary = {
    runId: events.length > 0 ? events[0].runId : "",
    totalEvents: events.length,
    skippedLines,
    fnCalls: 0,
    fnsByName: {},
    strandsSpawned: 0,
    strandsCancelled: 0,
    rescues: 0,
    failures: 0,
  };
  let strandFailed = false;
  let runFailed = false;

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end":
        summary.endTime = ev.ts;
        if (ev.data?.["outcome"] === "err") runFailed = true;
        break;
      case "fn_call_start": {
        const fn = ev.data?.["fn"];
        const name = typeof fn === "string" ? fn : "unknown";
        summary.fnCalls++;
        summary.fnsByName[name] = (summary.fnsByName[name] ?? 0) + 1;
        break;
      }
      case "strand_spawn":
        summary.strandsSpawned++;
        break;
      case "strand_cancel":
        summary.strandsCancelled++;
        break;
      case "strand_end":
        if (ev.data?.["outcome"] === "err") {
          summary.failures++;
          strandFailed = true;
        }
        break;
      case "rescue":
        summary.rescues++;
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs = new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  // A failed run is usually a strand failure surfacing; count it once.
  if (runFailed && !strandFailed) {
    summary.failures++;
  }

  return summary;
}

export async function runTrace(file: string, opts: { json?: boolean }): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    console.error(`Error reading trace file: ${errorMessage(e)}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  for (const line of lines) {
    const ev = parseLine(line);
    if (ev) events.push(ev);
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary = summarize(events, lines.length - events.length);

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
    return 0;
  }

  console.log(`Trace Summary`);
  console.log(`  Run ID:            ${summary.runId}`);
  console.log(`  Total events:      ${summary.totalEvents}`);
  if (summary.skippedLines > 0) {
    console.log(`  Skipped lines:     ${summary.skippedLines}`);
  }
  console.log(`  Function calls:    ${summary.fnCalls}`);
  for (const [name, count] of Object.entries(summary.fnsByName)) {
    console.log(`    ${name}: ${count}`);
  }
  console.log(`  Strands spawned:   ${summary.strandsSpawned}`);
  console.log(`  Strands cancelled: ${summary.strandsCancelled}`);
  console.log(`  Rescues:           ${summary.rescues}`);
  console.log(`  Failures:          ${summary.failures}`);
  if (summary.durationMs !== undefined) {
    console.log(`  Duration:          ${summary.durationMs}ms`);
  }
  return 0;
}
