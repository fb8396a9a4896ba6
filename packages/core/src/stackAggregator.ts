import type { CpuStackEntry, CpuStacksResponse, GroupByMode, StackSample } from "@perfscope/contracts";
import { UNKNOWN_GROUP, groupKey, isPseudoFrame } from "./frames.js";
import { inWindow } from "./runtimeEvents.js";
import { clamp, round } from "./utils.js";

export interface FlatTopOptions {
  top: number;
  groupBy: GroupByMode;
  sortByInclusive: boolean;
  from?: number;
  to?: number;
  traceDurationMs: number;
}

interface KeyTotals {
  exclusive: number;
  inclusive: number;
  buckets: number[];
}

export const MIN_FLAT_BUCKETS = 20;
export const MAX_FLAT_BUCKETS = 100;

export function flatBucketCount(windowMs: number): number {
  return clamp(Math.trunc(windowMs / 100), MIN_FLAT_BUCKETS, MAX_FLAT_BUCKETS);
}

export function flatBucketIndex(timeMs: number, startMs: number, windowMs: number, bucketCount: number): number {
  if (windowMs <= 0) return 0;
  return clamp(Math.trunc(((timeMs - startMs) / windowMs) * bucketCount), 0, bucketCount - 1);
}

/**
 * Flat per-key aggregation over the samples inside `from`..`to`. Every
 * sample charges exactly one exclusive key (its first real frame, or
 * `[Unknown]` when the stack has none) and each distinct real key on its
 * stack once for inclusive time and bucket counts.
 */
export function flatTop(samples: Iterable<StackSample>, options: FlatTopOptions): CpuStacksResponse {
  const startMs = options.from ?? 0;
  const endMs = options.to ?? options.traceDurationMs;
  const windowMs = endMs - startMs;
  const windowed = options.from !== undefined || options.to !== undefined;
  const bucketCount = flatBucketCount(windowMs);

  const totals = new Map<string, KeyTotals>();
  const totalsFor = (key: string): KeyTotals => {
    let entry = totals.get(key);
    if (!entry) {
      entry = { exclusive: 0, inclusive: 0, buckets: new Array<number>(bucketCount).fill(0) };
      totals.set(key, entry);
    }
    return entry;
  };

  let totalMetric = 0;
  let totalSamples = 0;

  for (const sample of samples) {
    if (windowed && !inWindow(sample.timeMs, { from: options.from, to: options.to })) continue;
    totalSamples += 1;
    totalMetric += sample.metric;
    const bucket = flatBucketIndex(sample.timeMs, startMs, windowMs, bucketCount);
    const seen = new Set<string>();
    let leafCharged = false;

    const charge = (key: string): void => {
      const entry = totalsFor(key);
      if (!leafCharged) {
        entry.exclusive += sample.metric;
        leafCharged = true;
      }
      if (!seen.has(key)) {
        seen.add(key);
        entry.inclusive += sample.metric;
        entry.buckets[bucket] = (entry.buckets[bucket] ?? 0) + 1;
      }
    };

    for (const frame of sample.frames) {
      // pseudo frames are skipped; the next real frame may still be the leaf
      if (isPseudoFrame(frame)) continue;
      charge(groupKey(frame, options.groupBy));
    }
    if (!leafCharged) charge(UNKNOWN_GROUP);
  }

  const items: CpuStackEntry[] = Array.from(totals.entries())
    .sort(([, a], [, b]) =>
      options.sortByInclusive ? b.inclusive - a.inclusive : b.exclusive - a.exclusive,
    )
    .slice(0, Math.max(0, options.top))
    .map(([name, entry]) => ({
      name,
      exclusiveMs: round(entry.exclusive, 2),
      inclusiveMs: round(entry.inclusive, 2),
      exclusivePercent: totalMetric > 0 ? round((entry.exclusive / totalMetric) * 100, 2) : 0,
      sampleBuckets: entry.buckets,
    }));

  return {
    totalSamples,
    totalMetricMs: round(totalMetric, 2),
    groupedBy: options.groupBy,
    items,
    traceDurationMs: round(windowMs, 2),
    bucketCount,
  };
}
