/**
 * quilt trace - trace summary command
 */
import * as fs from "node:fs";

interface TraceLine {
  ts: string;
  runId: string;
  event: string;
  span?: unknown;
  data?: Record<string, unknown>;
}

interface TraceSummary {
  runId: string;
  totalEvents: number;
  merges: number;
  contractChecks: number;
  blames: number;
  freezes: number;
  forceErrors: number;
  failures: number;
  errorCode?: string;
  startTime?: string;
  endTime?: string;
  durationMs?: number;
}

function isTraceLine(v: unknown): v is TraceLine {
  if (typeof v !== "object" || v === null) return false;
  const rec: Record<string, unknown> = { ...v };
  return typeof rec["ts"] === "string" && typeof rec["runId"] === "string" && typeof rec["event"] === "string";
}

export async function runTrace(
  file: string,
  opts: { json?: boolean }
): Promise<number> {
  let content: string;
  try {
    content = fs.readFileSync(file, "utf-8");
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    console.error(`Error reading trace file: ${msg}`);
    return 4;
  }

  const lines = content.split("\n").filter((l) => l.trim());
  const events: TraceLine[] = [];
  let skipped = 0;

  for (const line of lines) {
    try {
      const parsed: unknown = JSON.parse(line);
      if (isTraceLine(parsed)) events.push(parsed);
      else skipped++;
    } catch {
      skipped++;
    }
  }

  if (events.length === 0) {
    console.error("No valid trace events found.");
    return 4;
  }

  const summary: TraceSummary = {
    runId: events[0].runId,
    totalEvents: events.length,
    merges: 0,
    contractChecks: 0,
    blames: 0,
    freezes: 0,
    forceErrors: 0,
    failures: 0,
  };

  for (const ev of events) {
    switch (ev.event) {
      case "run_start":
        summary.startTime = ev.ts;
        break;
      case "run_end": {
        summary.endTime = ev.ts;
        if (ev.data?.["ok"] === false) {
          summary.failures++;
          const code = ev.data["code"];
          if (typeof code === "string") summary.errorCode = code;
        }
        break;
      }
      case "merge":
        summary.merges++;
        break;
      case "contract_check":
        summary.contractChecks++;
        break;
      case "blame":
        summary.blames++;
        break;
      case "freeze":
        summary.freezes++;
        break;
      case "force_error":
        summary.forceErrors++;
        break;
      default:
        break;
    }
  }

  if (summary.startTime && summary.endTime) {
    summary.durationMs =
      new Date(summary.endTime).getTime() - new Date(summary.startTime).getTime();
  }

  if (skipped > 0) {
    console.error(`Skipped ${skipped} malformed line${skipped === 1 ? "" : "s"}.`);
  }

  if (opts.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(`Trace Summary`);
    console.log(`  Run ID:           ${summary.runId}`);
    console.log(`  Total events:     ${summary.totalEvents}`);
    console.log(`  Merges:           ${summary.merges}`);
    console.log(`  Contract checks:  ${summary.contractChecks}`);
    console.log(`  Blame events:     ${summary.blames}`);
    console.log(`  Freezes:          ${summary.freezes}`);
    console.log(`  Force errors:     ${summary.forceErrors}`);
    console.log(`  Failures:         ${summary.failures}`);
    if (summary.errorCode !== undefined) {
      console.log(`  Error code:       ${summary.errorCode}`);
    }
    if (summary.durationMs !== undefined) {
      console.log(`  Duration:         ${summary.durationMs}ms`);
    }
  }

  return 0;
}
