import type { ProcessInfo, RuntimeEvent, StackSample, TimeWindow } from "@perfscope/contracts";

/**
 * Decoded view of one trace file. Both sequences can be iterated any number
 * of times; `samples` may pre-filter to an inclusive time window.
 */
export interface TraceSource {
  readonly format: string;
  readonly durationMs: number;
  events(): Iterable<RuntimeEvent>;
  samples(window?: TimeWindow): Iterable<StackSample>;
  processes(): ProcessInfo[];
  eventCount(): number;
  sampleCount(): number;
}

export interface InMemoryTraceInput {
  format?: string;
  durationMs?: number;
  events?: RuntimeEvent[];
  samples?: StackSample[];
  processes?: Array<{ processId: number; name: string }>;
}

function latestTimestamp(events: RuntimeEvent[], samples: StackSample[]): number {
  let latest = 0;
  for (const event of events) {
    if (event.timeMs > latest) latest = event.timeMs;
  }
  for (const sample of samples) {
    if (sample.timeMs > latest) latest = sample.timeMs;
  }
  return latest;
}

export class InMemoryTraceSource implements TraceSource {
  readonly format: string;
  readonly durationMs: number;
  private readonly eventList: RuntimeEvent[];
  private readonly sampleList: StackSample[];
  private readonly processNames: Map<number, string>;

  constructor(input: InMemoryTraceInput = {}) {
    this.format = input.format ?? "memory";
    this.eventList = input.events ?? [];
    this.sampleList = input.samples ?? [];
    this.durationMs =
      input.durationMs !== undefined && input.durationMs > 0
        ? input.durationMs
        : latestTimestamp(this.eventList, this.sampleList);
    this.processNames = new Map((input.processes ?? []).map((process) => [process.processId, process.name]));
  }

  events(): Iterable<RuntimeEvent> {
    return this.eventList;
  }

  *samples(window?: TimeWindow): Iterable<StackSample> {
    for (const sample of this.sampleList) {
      if (window && (sample.timeMs < window.from || sample.timeMs > window.to)) continue;
      yield sample;
    }
  }

  processes(): ProcessInfo[] {
    const ids = new Set<number>(this.processNames.keys());
    const cpuByProcess = new Map<number, number>();
    for (const event of this.eventList) ids.add(event.processId);
    for (const sample of this.sampleList) {
      if (sample.processId === undefined) continue;
      ids.add(sample.processId);
      cpuByProcess.set(sample.processId, (cpuByProcess.get(sample.processId) ?? 0) + sample.metric);
    }
    return Array.from(ids)
      .map((processId) => ({
        processId,
        name: this.processName(processId),
        cpuMs: cpuByProcess.get(processId) ?? 0,
      }))
      .sort((a, b) => b.cpuMs - a.cpuMs || a.processId - b.processId);
  }

  processName(processId: number): string {
    return this.processNames.get(processId) ?? `Process(${processId})`;
  }

  eventCount(): number {
    return this.eventList.length;
  }

  sampleCount(): number {
    return this.sampleList.length;
  }
}

export function processNameOf(source: TraceSource, processId: number): string {
  const match = source.processes().find((process) => process.processId === processId);
  return match?.name ?? `Process(${processId})`;
}
