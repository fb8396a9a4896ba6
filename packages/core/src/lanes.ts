import type {
  AllocBucket,
  CpuBucket,
  EventBucket,
  ExceptionBucket,
  GcBucket,
  GcRecord,
  JitBucket,
  RuntimeEvent,
  StackSample,
} from "@perfscope/contracts";
import { isPseudoFrame } from "./frames.js";
import type { JitCompilation } from "./jit.js";
import { allocationSizeOf, exceptionType, isAllocation, isExceptionThrow } from "./runtimeEvents.js";
import { clamp, round } from "./utils.js";

/** Shared bucket grid of one timeline request. Both window ends are inclusive. */
export interface BucketGrid {
  from: number;
  to: number;
  bucketCount: number;
  bucketSize: number;
}

export function createGrid(from: number, to: number, bucketCount: number): BucketGrid {
  return { from, to, bucketCount, bucketSize: (to - from) / bucketCount };
}

export function bucketIndex(grid: BucketGrid, timeMs: number): number | null {
  if (timeMs < grid.from || timeMs > grid.to) return null;
  if (grid.bucketSize <= 0) return 0;
  return clamp(Math.trunc((timeMs - grid.from) / grid.bucketSize), 0, grid.bucketCount - 1);
}

function topKey(counts: Map<string, number> | undefined): string | null {
  let best: string | null = null;
  let bestCount = 0;
  for (const [key, count] of counts ?? []) {
    if (count > bestCount) {
      best = key;
      bestCount = count;
    }
  }
  return best;
}

function frequencyMaps(count: number): Array<Map<string, number>> {
  return Array.from({ length: count }, () => new Map<string, number>());
}

function increment(counts: Map<string, number> | undefined, key: string): void {
  counts?.set(key, (counts.get(key) ?? 0) + 1);
}

/** A pause is attributed to the bucket holding the start of its collection. */
export function buildGcLane(grid: BucketGrid, gcs: Iterable<GcRecord>): GcBucket[] {
  const buckets: GcBucket[] = Array.from({ length: grid.bucketCount }, () => ({
    gcCount: 0,
    totalPauseMs: 0,
    maxPauseMs: 0,
    hasGen2: false,
  }));
  for (const gc of gcs) {
    const bucket = buckets[bucketIndex(grid, gc.startTimeMs) ?? -1];
    if (!bucket) continue;
    bucket.gcCount += 1;
    bucket.totalPauseMs = round(bucket.totalPauseMs + gc.pauseDurationMs, 2);
    bucket.maxPauseMs = round(Math.max(bucket.maxPauseMs, gc.pauseDurationMs), 2);
    bucket.hasGen2 = bucket.hasGen2 || gc.generation >= 2;
  }
  return buckets;
}

export function buildCpuLane(grid: BucketGrid, samples: Iterable<StackSample>): CpuBucket[] {
  const counts = new Array<number>(grid.bucketCount).fill(0);
  const leaves = frequencyMaps(grid.bucketCount);
  for (const sample of samples) {
    const index = bucketIndex(grid, sample.timeMs);
    if (index === null) continue;
    counts[index] = (counts[index] ?? 0) + 1;
    const leaf = sample.frames.find((frame) => !isPseudoFrame(frame));
    if (leaf !== undefined) increment(leaves[index], leaf);
  }
  return counts.map((sampleCount, index) => ({
    sampleCount,
    topMethod: topKey(leaves[index]),
  }));
}

export function buildExceptionLane(grid: BucketGrid, events: Iterable<RuntimeEvent>): ExceptionBucket[] {
  const counts = new Array<number>(grid.bucketCount).fill(0);
  const types = frequencyMaps(grid.bucketCount);
  for (const event of events) {
    if (!isExceptionThrow(event)) continue;
    const index = bucketIndex(grid, event.timeMs);
    if (index === null) continue;
    counts[index] = (counts[index] ?? 0) + 1;
    increment(types[index], exceptionType(event));
  }
  return counts.map((count, index) => ({ count, topType: topKey(types[index]) }));
}

/**
 * Every allocation event in the window counts; its bytes are added when the
 * size field converts. An event whose size field is present but not numeric
 * is skipped.
 */
export function buildAllocLane(grid: BucketGrid, events: Iterable<RuntimeEvent>): AllocBucket[] {
  const buckets: AllocBucket[] = Array.from({ length: grid.bucketCount }, () => ({ count: 0, totalBytes: 0 }));
  for (const event of events) {
    if (!isAllocation(event)) continue;
    const bucket = buckets[bucketIndex(grid, event.timeMs) ?? -1];
    if (!bucket) continue;
    const size = allocationSizeOf(event);
    if (size === "malformed") continue;
    bucket.count += 1;
    bucket.totalBytes += size ?? 0;
  }
  return buckets;
}

export function buildJitLane(grid: BucketGrid, compilations: Iterable<JitCompilation>): JitBucket[] {
  const buckets: JitBucket[] = Array.from({ length: grid.bucketCount }, () => ({ methodCount: 0, totalMs: 0 }));
  for (const compilation of compilations) {
    const bucket = buckets[bucketIndex(grid, compilation.startTimeMs) ?? -1];
    if (!bucket) continue;
    bucket.methodCount += 1;
    bucket.totalMs += compilation.durationMs ?? 0;
  }
  return buckets.map((bucket) => ({ ...bucket, totalMs: round(bucket.totalMs, 2) }));
}

export function buildEventLane(grid: BucketGrid, events: Iterable<RuntimeEvent>): EventBucket[] {
  const buckets: EventBucket[] = Array.from({ length: grid.bucketCount }, () => ({ count: 0 }));
  for (const event of events) {
    const bucket = buckets[bucketIndex(grid, event.timeMs) ?? -1];
    if (bucket) bucket.count += 1;
  }
  return buckets;
}
