import type { JitProcessStats, JitStatsResponse, RuntimeEvent } from "@perfscope/contracts";
import { JIT_LOAD_EVENT, isJitStart, payloadNumber, payloadText, payloadField } from "./runtimeEvents.js";
import { processNameOf, type TraceSource } from "./traceSource.js";
import { containsIgnoreCase, round } from "./utils.js";

export interface JitCompilation {
  processId: number;
  methodId: string | null;
  startTimeMs: number;
  /** Null until a matching load event closes the compilation. */
  durationMs: number | null;
  ilSize: number;
  nativeSize: number;
}

/**
 * Pairs each compilation start with the next method load of the same
 * process and method id.
 */
export function jitCompilations(events: Iterable<RuntimeEvent>): JitCompilation[] {
  const compilations: JitCompilation[] = [];
  const open = new Map<string, JitCompilation>();

  for (const event of events) {
    if (isJitStart(event)) {
      const methodId = payloadText(payloadField(event, "MethodID")) || null;
      const compilation: JitCompilation = {
        processId: event.processId,
        methodId,
        startTimeMs: event.timeMs,
        durationMs: null,
        ilSize: payloadNumber(event, "MethodILSize") ?? 0,
        nativeSize: 0,
      };
      compilations.push(compilation);
      if (methodId !== null) open.set(`${event.processId}:${methodId}`, compilation);
      continue;
    }
    if (event.eventName !== JIT_LOAD_EVENT) continue;
    const methodId = payloadText(payloadField(event, "MethodID"));
    const key = `${event.processId}:${methodId}`;
    const compilation = open.get(key);
    if (!compilation) continue;
    open.delete(key);
    compilation.durationMs = Math.max(0, event.timeMs - compilation.startTimeMs);
    compilation.nativeSize = payloadNumber(event, "MethodSize") ?? 0;
  }

  return compilations;
}

export interface JitStatsOptions {
  process?: string;
}

export function getJitStats(source: TraceSource, options: JitStatsOptions = {}): JitStatsResponse {
  const totals = new Map<number, JitProcessStats>();
  for (const compilation of jitCompilations(source.events())) {
    let entry = totals.get(compilation.processId);
    if (!entry) {
      entry = {
        processId: compilation.processId,
        processName: processNameOf(source, compilation.processId),
        totalMethodsJitted: 0,
        totalJitTimeMs: 0,
        totalILSize: 0,
        totalNativeSize: 0,
      };
      totals.set(compilation.processId, entry);
    }
    entry.totalMethodsJitted += 1;
    entry.totalJitTimeMs += compilation.durationMs ?? 0;
    entry.totalILSize += compilation.ilSize;
    entry.totalNativeSize += compilation.nativeSize;
  }

  const processes = Array.from(totals.values())
    .filter((entry) => !options.process || containsIgnoreCase(entry.processName, options.process))
    .map((entry) => ({ ...entry, totalJitTimeMs: round(entry.totalJitTimeMs, 2) }))
    .sort((a, b) => b.totalJitTimeMs - a.totalJitTimeMs);

  return { processes };
}
