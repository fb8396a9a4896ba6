import type { SnapshotResponse } from "@perfscope/contracts";
import { getEventTypes } from "./events.js";
import { getExceptions } from "./exceptions.js";
import { getGcStats } from "./gc.js";
import { flatTop } from "./stackAggregator.js";
import type { TraceSource } from "./traceSource.js";
import { round } from "./utils.js";

export const SNAPSHOT_CPU_TOP = 5;
export const SNAPSHOT_EXCEPTION_LIMIT = 10;
export const SNAPSHOT_EVENT_TYPES = 15;

/**
 * Point-in-time view of `[at - window, at + window]`, clipped to the trace.
 * Each part is computed independently and left out when it has no data.
 */
export function getSnapshot(source: TraceSource, at: number, window: number): SnapshotResponse {
  const from = Math.max(0, at - window);
  const to = Math.min(source.durationMs, at + window);
  const snapshot: SnapshotResponse = { at: round(at, 1), windowFrom: round(from, 1), windowTo: round(to, 1) };

  const gc = getGcStats(source, { timeline: true, from, to });
  if (gc.timeline && gc.timeline.length > 0) {
    snapshot.gc = { count: gc.timeline.length, gcEvents: gc.timeline };
  }

  const cpu = flatTop(source.samples({ from, to }), {
    top: SNAPSHOT_CPU_TOP,
    groupBy: "method",
    sortByInclusive: false,
    from,
    to,
    traceDurationMs: source.durationMs,
  });
  if (cpu.totalSamples > 0) {
    snapshot.cpu = {
      sampleCount: cpu.totalSamples,
      topMethods: cpu.items.map((item) => ({
        name: item.name,
        exclusiveMs: item.exclusiveMs,
        percent: item.exclusivePercent,
      })),
    };
  }

  const exceptions = getExceptions(source.events(), { from, to, limit: SNAPSHOT_EXCEPTION_LIMIT });
  if (exceptions.exceptions.length > 0) {
    snapshot.exceptions = {
      count: Object.values(exceptions.summary).reduce((sum, count) => sum + count, 0),
      exceptions: exceptions.exceptions,
    };
  }

  const events = getEventTypes(source.events(), { from, to });
  if (events.eventTypes.length > 0) {
    snapshot.events = {
      totalCount: events.eventTypes.reduce((sum, entry) => sum + entry.count, 0),
      byType: events.eventTypes.slice(0, SNAPSHOT_EVENT_TYPES),
    };
  }

  return snapshot;
}
