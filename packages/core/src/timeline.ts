import type { LaneName, TimelineLanes, TimelineResponse } from "@perfscope/contracts";
import { reconstructGcs } from "./gc.js";
import { jitCompilations } from "./jit.js";
import {
  buildAllocLane,
  buildCpuLane,
  buildEventLane,
  buildExceptionLane,
  buildGcLane,
  buildJitLane,
  createGrid,
} from "./lanes.js";
import type { TraceSource } from "./traceSource.js";
import { clamp, round } from "./utils.js";

export const LANE_NAMES: readonly LaneName[] = ["gc", "cpu", "exceptions", "alloc", "jit", "events"];
export const DEFAULT_LANES: readonly LaneName[] = ["gc", "cpu", "exceptions"];
export const MIN_TIMELINE_BUCKETS = 5;
export const MAX_TIMELINE_BUCKETS = 200;
export const DEFAULT_TIMELINE_BUCKETS = 100;

export function isLaneName(value: string): value is LaneName {
  return LANE_NAMES.some((lane) => lane === value);
}

/** Parses a comma list or array of lane names, dropping unknown ones. */
export function parseLanes(value: string | readonly string[] | undefined, fallback: readonly LaneName[] = DEFAULT_LANES): LaneName[] {
  if (value === undefined) return [...fallback];
  const items = typeof value === "string" ? value.split(",") : value;
  const lanes = new Set<LaneName>();
  for (const item of items) {
    const name = item.trim().toLowerCase();
    if (isLaneName(name)) lanes.add(name);
  }
  return Array.from(lanes);
}

export function clampBucketCount(requested: number | undefined): number {
  const value = requested !== undefined && Number.isFinite(requested) ? Math.trunc(requested) : DEFAULT_TIMELINE_BUCKETS;
  return clamp(value, MIN_TIMELINE_BUCKETS, MAX_TIMELINE_BUCKETS);
}

export interface TimelineOptions {
  from?: number;
  to?: number;
  bucketCount?: number;
  lanes?: Iterable<string>;
}

/** Builds only the requested lanes, all on one grid. */
export function getTimeline(source: TraceSource, options: TimelineOptions = {}): TimelineResponse {
  const from = options.from ?? 0;
  const to = options.to ?? source.durationMs;
  const grid = createGrid(from, to, clampBucketCount(options.bucketCount));
  const requested = new Set(parseLanes(options.lanes ? Array.from(options.lanes) : undefined));
  const lanes: TimelineLanes = {};

  if (requested.has("gc")) lanes.gc = buildGcLane(grid, reconstructGcs(source));
  if (requested.has("cpu")) lanes.cpu = buildCpuLane(grid, source.samples({ from, to }));
  if (requested.has("exceptions")) lanes.exceptions = buildExceptionLane(grid, source.events());
  if (requested.has("alloc")) lanes.alloc = buildAllocLane(grid, source.events());
  if (requested.has("jit")) lanes.jit = buildJitLane(grid, jitCompilations(source.events()));
  if (requested.has("events")) lanes.events = buildEventLane(grid, source.events());

  return {
    from: round(from, 1),
    to: round(to, 1),
    bucketSizeMs: round(grid.bucketSize, 1),
    bucketCount: grid.bucketCount,
    lanes,
  };
}
