import type { DiscoveredTraceFile, RuntimeEvent, StackSample } from "@perfscope/contracts";
import { InMemoryTraceSource } from "../traceSource.js";
import { asArray, asRecord } from "../utils.js";
import { toRuntimeEvent, toStackSample, toTraceMeta } from "./common.js";
import type { ParseOutput, TraceParser } from "./types.js";

/** A single document: `{ "meta": {...}, "events": [...], "samples": [...] }`. */
export class JsonDocumentTraceParser implements TraceParser {
  name = "json";

  canParse(file: DiscoveredTraceFile, headText: string): number {
    if (file.path.toLowerCase().endsWith(".trace.json")) return 1;
    const head = headText.trimStart();
    if (head.startsWith("{") && /"(events|samples)"\s*:\s*\[/.test(head)) return 0.6;
    return file.format === "json" ? 0.3 : 0;
  }

  parse(file: DiscoveredTraceFile, text: string): ParseOutput {
    let document: Record<string, unknown>;
    try {
      const parsed: unknown = JSON.parse(text);
      document = asRecord(parsed);
    } catch (error) {
      return {
        parser: this.name,
        source: new InMemoryTraceSource({ format: this.name }),
        skippedRecords: 0,
        parseError: `invalid JSON in ${file.path}: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    let skippedRecords = 0;
    const events: RuntimeEvent[] = [];
    for (const item of asArray(document.events)) {
      const event = toRuntimeEvent(asRecord(item));
      if (event) events.push(event);
      else skippedRecords += 1;
    }
    const samples: StackSample[] = [];
    for (const item of asArray(document.samples)) {
      const sample = toStackSample(asRecord(item));
      if (sample) samples.push(sample);
      else skippedRecords += 1;
    }
    const meta = toTraceMeta(asRecord(document.meta));

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
      parseError: "",
    };
  }
}
