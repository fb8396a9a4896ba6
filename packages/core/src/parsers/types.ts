import type { DiscoveredTraceFile } from "@perfscope/contracts";
import type { InMemoryTraceSource } from "../traceSource.js";

export interface ParseOutput {
  parser: string;
  source: InMemoryTraceSource;
  skippedRecords: number;
  parseError: string;
}

export interface TraceParser {
  name: string;
  canParse(file: DiscoveredTraceFile, headText: string): number;
  parse(file: DiscoveredTraceFile, text: string): ParseOutput;
}
