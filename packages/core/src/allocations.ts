import type { AllocationEntry, AllocationGroupBy, AllocationsResponse, RuntimeEvent } from "@perfscope/contracts";
import { typeGroupKey } from "./frames.js";
import { DEFAULT_LARGE_OBJECT_THRESHOLD_BYTES, allocationOf, inWindow, isAllocation } from "./runtimeEvents.js";
import { round } from "./utils.js";

export interface AllocationsOptions {
  top?: number;
  groupBy?: AllocationGroupBy;
  from?: number;
  to?: number;
  largeObjectThresholdBytes?: number;
}

export const DEFAULT_ALLOCATION_TOP = 20;

export function getAllocations(events: Iterable<RuntimeEvent>, options: AllocationsOptions = {}): AllocationsResponse {
  const groupBy = options.groupBy ?? "type";
  const threshold = options.largeObjectThresholdBytes ?? DEFAULT_LARGE_OBJECT_THRESHOLD_BYTES;
  const groups = new Map<string, Omit<AllocationEntry, "name" | "averageBytes">>();
  let totalAllocations = 0;
  let totalBytes = 0;

  for (const event of events) {
    if (!isAllocation(event) || !inWindow(event.timeMs, options)) continue;
    const record = allocationOf(event, threshold);
    if (!record) continue;

    const key = typeGroupKey(record.typeName, groupBy);
    const entry = groups.get(key) ?? { count: 0, totalBytes: 0, largeObjectCount: 0, largeObjectBytes: 0 };
    entry.count += 1;
    entry.totalBytes += record.sizeBytes;
    if (record.isLargeObject) {
      entry.largeObjectCount += 1;
      entry.largeObjectBytes += record.sizeBytes;
    }
    groups.set(key, entry);
    totalAllocations += 1;
    totalBytes += record.sizeBytes;
  }

  const allocations = Array.from(groups.entries())
    .sort(([, a], [, b]) => b.totalBytes - a.totalBytes)
    .slice(0, Math.max(0, options.top ?? DEFAULT_ALLOCATION_TOP))
    .map(([name, entry]) => ({
      name,
      count: entry.count,
      totalBytes: entry.totalBytes,
      averageBytes: entry.count > 0 ? round(entry.totalBytes / entry.count, 2) : 0,
      largeObjectCount: entry.largeObjectCount,
      largeObjectBytes: entry.largeObjectBytes,
    }));

  return { totalAllocations, totalBytes, groupBy, allocations };
}
