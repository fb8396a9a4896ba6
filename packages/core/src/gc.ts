import type { GcProcessStats, GcRecord, GcStatsResponse, PayloadValue, RuntimeEvent } from "@perfscope/contracts";
import { payloadField, payloadNumber, payloadNumberValue, payloadText } from "./runtimeEvents.js";
import type { TraceSource } from "./traceSource.js";
import { bytesToMB, containsIgnoreCase, round } from "./utils.js";

const GC_REASONS = [
  "AllocSmall",
  "Induced",
  "LowMemory",
  "Empty",
  "AllocLarge",
  "OutOfSpaceSOH",
  "OutOfSpaceLOH",
  "InducedNotForced",
  "Internal",
  "InducedLowMemory",
  "InducedCompacting",
  "LowMemoryHost",
  "PMFullGC",
  "LowMemoryHostBlocking",
];

const GC_TYPES = ["NonConcurrentGC", "BackgroundGC", "ForegroundGC"];

function enumName(value: PayloadValue | undefined, names: string[]): string {
  const code = payloadNumberValue(value);
  if (code !== null) return names[code] ?? String(code);
  return payloadText(value) || "Unknown";
}

export const gcReasonName = (event: RuntimeEvent): string => enumName(payloadField(event, "Reason"), GC_REASONS);
export const gcTypeName = (event: RuntimeEvent): string => enumName(payloadField(event, "Type"), GC_TYPES);

function sumFields(event: RuntimeEvent, prefix: string, count: number): number {
  let total = 0;
  for (let i = 0; i < count; i += 1) {
    total += payloadNumber(event, `${prefix}${i}`) ?? 0;
  }
  return total;
}

interface GcBuilder {
  record: GcRecord;
  suspendStartMs: number | null;
  stopMs: number | null;
  restartEndMs: number | null;
}

interface ProcessGcState {
  suspendStartMs: number | null;
  current: GcBuilder | null;
}

function finish(builder: GcBuilder): GcRecord {
  const { record, suspendStartMs, stopMs, restartEndMs } = builder;
  let pause = 0;
  if (suspendStartMs !== null && restartEndMs !== null && restartEndMs >= suspendStartMs) {
    pause = restartEndMs - suspendStartMs;
  } else if (stopMs !== null && stopMs >= record.startTimeMs) {
    pause = stopMs - record.startTimeMs;
  }
  return { ...record, pauseDurationMs: pause };
}

/**
 * Rebuilds one record per collection from the GC lifecycle events of each
 * process. Pause runs from the execution-engine suspension to the end of the
 * restart; without those events it falls back to GC start to stop.
 */
export function reconstructGcs(source: TraceSource): GcRecord[] {
  const processNames = new Map(source.processes().map((process) => [process.processId, process.name]));
  const states = new Map<number, ProcessGcState>();
  const builders: GcBuilder[] = [];
  const counters = new Map<number, number>();

  const stateOf = (processId: number): ProcessGcState => {
    let state = states.get(processId);
    if (!state) {
      state = { suspendStartMs: null, current: null };
      states.set(processId, state);
    }
    return state;
  };

  for (const event of source.events()) {
    const state = stateOf(event.processId);
    switch (event.eventName) {
      case "GC/SuspendEEStart":
        state.suspendStartMs = event.timeMs;
        break;
      case "GC/Start": {
        const sequence = (counters.get(event.processId) ?? 0) + 1;
        counters.set(event.processId, sequence);
        const builder: GcBuilder = {
          record: {
            processId: event.processId,
            processName: processNames.get(event.processId) ?? `Process(${event.processId})`,
            gcNumber: payloadNumber(event, "Count") ?? sequence,
            generation: payloadNumber(event, "Depth") ?? 0,
            type: gcTypeName(event),
            reason: gcReasonName(event),
            startTimeMs: event.timeMs,
            pauseDurationMs: 0,
            heapSizeAfterMB: 0,
            promotedMB: 0,
          },
          suspendStartMs: state.suspendStartMs,
          stopMs: null,
          restartEndMs: null,
        };
        state.suspendStartMs = null;
        state.current = builder;
        builders.push(builder);
        break;
      }
      case "GC/Stop":
        if (state.current && state.current.stopMs === null) state.current.stopMs = event.timeMs;
        break;
      case "GC/HeapStats":
        if (state.current) {
          state.current.record.heapSizeAfterMB = bytesToMB(sumFields(event, "GenerationSize", 5));
          state.current.record.promotedMB = bytesToMB(sumFields(event, "TotalPromotedSize", 4));
        }
        break;
      case "GC/RestartEEStop":
        if (state.current && state.current.restartEndMs === null) state.current.restartEndMs = event.timeMs;
        break;
      default:
        break;
    }
  }

  return builders.map(finish);
}

export interface GcStatsOptions {
  process?: string;
  timeline?: boolean;
  longest?: number;
  from?: number;
  to?: number;
}

function allocatedMBByProcess(source: TraceSource): Map<number, number> {
  const totals = new Map<number, number>();
  for (const event of source.events()) {
    if (event.eventName !== "GC/AllocationTick") continue;
    const amount = payloadNumber(event, "AllocationAmount64") ?? payloadNumber(event, "AllocationAmount") ?? 0;
    if (amount > 0) totals.set(event.processId, (totals.get(event.processId) ?? 0) + amount);
  }
  return new Map(Array.from(totals.entries()).map(([processId, bytes]) => [processId, bytesToMB(bytes)]));
}

export function roundGcRecord(record: GcRecord): GcRecord {
  return {
    ...record,
    startTimeMs: round(record.startTimeMs, 3),
    pauseDurationMs: round(record.pauseDurationMs, 3),
    heapSizeAfterMB: round(record.heapSizeAfterMB, 2),
    promotedMB: round(record.promotedMB, 2),
  };
}

export function getGcStats(source: TraceSource, options: GcStatsOptions = {}): GcStatsResponse {
  const records = reconstructGcs(source);
  const allocated = allocatedMBByProcess(source);
  const byProcess = new Map<number, GcRecord[]>();
  for (const record of records) {
    const list = byProcess.get(record.processId) ?? [];
    list.push(record);
    byProcess.set(record.processId, list);
  }

  const selected: GcRecord[] = [];
  const processes: GcProcessStats[] = [];

  for (const [processId, all] of byProcess) {
    const processName = all[0]?.processName ?? `Process(${processId})`;
    if (options.process && !containsIgnoreCase(processName, options.process)) continue;

    const inRange = all.filter(
      (record) =>
        (options.from === undefined || record.startTimeMs >= options.from) &&
        (options.to === undefined || record.startTimeMs <= options.to),
    );
    if (inRange.length === 0) continue;
    selected.push(...inRange);

    const totalPause = inRange.reduce((sum, record) => sum + record.pauseDurationMs, 0);
    const wholeTracePause = all.reduce((sum, record) => sum + record.pauseDurationMs, 0);
    processes.push({
      processId,
      processName,
      totalGCs: inRange.length,
      totalAllocatedMB: round(allocated.get(processId) ?? 0, 2),
      totalPauseTimeMs: round(totalPause, 2),
      maxPauseMs: round(Math.max(...inRange.map((record) => record.pauseDurationMs)), 2),
      maxHeapSizeMB: round(Math.max(...all.map((record) => record.heapSizeAfterMB)), 2),
      pauseTimePercent: source.durationMs > 0 ? round((wholeTracePause / source.durationMs) * 100, 2) : 0,
      gen0Count: inRange.filter((record) => record.generation === 0).length,
      gen1Count: inRange.filter((record) => record.generation === 1).length,
      gen2Count: inRange.filter((record) => record.generation === 2).length,
    });
  }

  processes.sort((a, b) => b.totalPauseTimeMs - a.totalPauseTimeMs);

  let timeline: GcRecord[] | null = null;
  if (options.timeline || options.longest !== undefined) {
    const ordered =
      options.longest !== undefined
        ? [...selected].sort((a, b) => b.pauseDurationMs - a.pauseDurationMs).slice(0, Math.max(0, options.longest))
        : [...selected].sort((a, b) => a.startTimeMs - b.startTimeMs);
    timeline = ordered.map(roundGcRecord);
  }

  return { processes, timeline };
}
