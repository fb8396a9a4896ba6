import type { DiscoveredTraceFile, RuntimeEvent, StackSample } from "@perfscope/contracts";
import { InMemoryTraceSource } from "../traceSource.js";
import { asString } from "../utils.js";
import { parseJsonLines, toRuntimeEvent, toStackSample, toTraceMeta, type TraceMeta } from "./common.js";
import type { ParseOutput, TraceParser } from "./types.js";

const RECORD_TYPES = new Set(["meta", "event", "sample"]);

/** One JSON object per line: `meta`, `event` and `sample` records. */
export class JsonLinesTraceParser implements TraceParser {
  name = "jsonl";

  canParse(file: DiscoveredTraceFile, headText: string): number {
    if (file.path.toLowerCase().endsWith(".trace.jsonl")) return 1;
    const firstLine = headText.split(/\r?\n/).find((line) => line.trim().length > 0) ?? "";
    const match = /"type"\s*:\s*"(\w+)"/.exec(firstLine);
    if (match && RECORD_TYPES.has(match[1] ?? "")) return 0.8;
    return file.format === "jsonl" ? 0.3 : 0;
  }

  parse(file: DiscoveredTraceFile, text: string): ParseOutput {
    const { rows, skipped } = parseJsonLines(text);
    const events: RuntimeEvent[] = [];
    const samples: StackSample[] = [];
    let meta: TraceMeta = { processes: [] };
    let skippedRecords = skipped;

    for (const row of rows) {
      const type = asString(row.type);
      if (type === "meta") {
        meta = toTraceMeta(row);
        continue;
      }
      const record = type === "event" ? toRuntimeEvent(row) : type === "sample" ? toStackSample(row) : null;
      if (!record) {
        skippedRecords += 1;
      } else if ("frames" in record) {
        samples.push(record);
      } else {
        events.push(record);
      }
    }

    return {
      parser: this.name,
      source: new InMemoryTraceSource({
        format: this.name,
        durationMs: meta.durationMs,
        events,
        samples,
        processes: meta.processes,
      }),
      skippedRecords,
      parseError: rows.length === 0 && text.trim().length > 0 ? `no trace records in ${file.path}` : "",
    };
  }
}
