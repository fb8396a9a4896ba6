import { readFile } from "node:fs/promises";
import type { DiscoveredTraceFile } from "@perfscope/contracts";
import { JsonDocumentTraceParser } from "./json.js";
import { JsonLinesTraceParser } from "./jsonl.js";
import type { ParseOutput, TraceParser } from "./types.js";

const HEAD_BYTES = 8192;

/**
 * Picks a trace parser by scoring the head of the file. A parser named in
 * `format` wins a tie; JSON lines is the last resort.
 */
export class ParserRegistry {
  private readonly parsers: readonly TraceParser[];

  constructor(parsers: readonly TraceParser[] = [new JsonLinesTraceParser(), new JsonDocumentTraceParser()]) {
    this.parsers = parsers;
  }

  get names(): string[] {
    return this.parsers.map((parser) => parser.name);
  }

  select(file: DiscoveredTraceFile, headText: string, format: string = file.format): TraceParser {
    const forced = this.parsers.find((parser) => parser.name === format);
    let best: TraceParser | undefined;
    let bestScore = 0;
    for (const parser of this.parsers) {
      const score = parser.canParse(file, headText);
      if (score > bestScore || (score === bestScore && score > 0 && parser === forced)) {
        best = parser;
        bestScore = score;
      }
    }
    return best ?? forced ?? new JsonLinesTraceParser();
  }

  parseText(file: DiscoveredTraceFile, text: string, format?: string): ParseOutput {
    const named = format ? this.parsers.find((parser) => parser.name === format) : undefined;
    const parser = named ?? this.select(file, text.slice(0, HEAD_BYTES));
    return parser.parse(file, text);
  }

  async parseFile(file: DiscoveredTraceFile): Promise<ParseOutput> {
    return this.parseText(file, await readFile(file.path, "utf8"));
  }
}

export { JsonDocumentTraceParser, JsonLinesTraceParser };
export type { ParseOutput, TraceParser };
