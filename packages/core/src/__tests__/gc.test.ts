import { describe, expect, it } from "vitest";
import { getGcStats, reconstructGcs } from "../gc.js";
import { InMemoryTraceSource } from "../traceSource.js";
import { event } from "./helpers.js";

const MB = 1024 * 1024;

function gcTrace(): InMemoryTraceSource {
  return new InMemoryTraceSource({
    durationMs: 100,
    processes: [
      { processId: 1, name: "app" },
      { processId: 2, name: "worker" },
    ],
    events: [
      event(5, "GC/AllocationTick", { TypeName: "X", AllocationAmount64: 2 * MB }),
      event(10, "GC/SuspendEEStart"),
      event(11, "GC/Start", { Count: 1, Depth: 0, Reason: 0, Type: 0 }),
      event(14, "GC/Stop"),
      event(14.5, "GC/HeapStats", { GenerationSize0: MB, GenerationSize1: MB, TotalPromotedSize0: MB / 2 }),
      event(15, "GC/RestartEEStop"),
      event(30, "GC/Start", { Depth: 1, Reason: "Custom" }, { processId: 2 }),
      event(31, "GC/Stop", {}, { processId: 2 }),
      event(50, "GC/Start", { Count: 2, Depth: 2, Reason: 1, Type: 1 }),
      event(58, "GC/Stop"),
    ],
  });
}

describe("reconstructGcs", () => {
  it("rebuilds one record per collection with pause, heap and names", () => {
    const records = reconstructGcs(gcTrace());
    expect(records).toHaveLength(3);
    expect(records[0]).toEqual({
      processId: 1,
      processName: "app",
      gcNumber: 1,
      generation: 0,
      type: "NonConcurrentGC",
      reason: "AllocSmall",
      startTimeMs: 11,
      pauseDurationMs: 5,
      heapSizeAfterMB: 2,
      promotedMB: 0.5,
    });
    expect(records[1]).toMatchObject({ processId: 2, gcNumber: 1, generation: 1, reason: "Custom", type: "Unknown" });
    expect(records[1]?.pauseDurationMs).toBe(1);
    expect(records[2]).toMatchObject({ gcNumber: 2, generation: 2, reason: "Induced", type: "BackgroundGC" });
    expect(records[2]?.pauseDurationMs).toBe(8);
  });

  it("returns nothing for a trace without GC events", () => {
    expect(reconstructGcs(new InMemoryTraceSource({ events: [event(1, "Other/Event")] }))).toEqual([]);
  });
});

describe("getGcStats", () => {
  it("summarises each process sorted by total pause", () => {
    const stats = getGcStats(gcTrace());
    expect(stats.timeline).toBeNull();
    expect(stats.processes.map((process) => process.processName)).toEqual(["app", "worker"]);
    expect(stats.processes[0]).toEqual({
      processId: 1,
      processName: "app",
      totalGCs: 2,
      totalAllocatedMB: 2,
      totalPauseTimeMs: 13,
      maxPauseMs: 8,
      maxHeapSizeMB: 2,
      pauseTimePercent: 13,
      gen0Count: 1,
      gen1Count: 0,
      gen2Count: 1,
    });
    expect(stats.processes[1]).toMatchObject({ totalGCs: 1, totalAllocatedMB: 0, pauseTimePercent: 1, gen1Count: 1 });
  });

  it("lists the timeline chronologically or the longest pauses first", () => {
    const chronological = getGcStats(gcTrace(), { timeline: true });
    expect(chronological.timeline?.map((record) => record.startTimeMs)).toEqual([11, 30, 50]);

    const longest = getGcStats(gcTrace(), { longest: 1 });
    expect(longest.timeline?.map((record) => record.pauseDurationMs)).toEqual([8]);
  });

  it("filters by process name and time window", () => {
    expect(getGcStats(gcTrace(), { process: "WORK" }).processes.map((process) => process.processId)).toEqual([2]);

    const windowed = getGcStats(gcTrace(), { from: 20, to: 60 });
    const app = windowed.processes.find((process) => process.processId === 1);
    expect(app).toMatchObject({ totalGCs: 1, totalPauseTimeMs: 8, maxHeapSizeMB: 2, pauseTimePercent: 13 });
  });
});
