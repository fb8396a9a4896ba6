import type {
  AggregateGroupResult,
  AggregateQuery,
  AggregateResponse,
  QueryErrorResponse,
  QueryRequest,
  QueryResponse,
  RuntimeEvent,
  SeriesDefinition,
  SeriesFilter,
  TimeSeriesQuery,
  TimeSeriesResponse,
} from "@perfscope/contracts";
import { reconstructGcs } from "./gc.js";
import { exceptionType, inWindow, isExceptionThrow, payloadField, payloadNumberValue } from "./runtimeEvents.js";
import type { TraceSource } from "./traceSource.js";
import { asArray, asRecord, containsIgnoreCase, round, toFiniteNumber } from "./utils.js";

export const DEFAULT_QUERY_BUCKET_MS = 100;
export const MAX_QUERY_BUCKETS = 10_000;

function optionalNumber(value: unknown): number | undefined {
  return toFiniteNumber(value) ?? undefined;
}

function optionalText(value: unknown): string | undefined {
  return typeof value === "string" && value.length > 0 ? value : undefined;
}

function parseSeriesFilter(value: unknown): SeriesFilter {
  const raw = asRecord(value);
  const filter: SeriesFilter = {};
  const generation = optionalNumber(raw.generation);
  if (generation !== undefined) filter.generation = Math.trunc(generation);
  const provider = optionalText(raw.provider);
  if (provider !== undefined) filter.provider = provider;
  const type = optionalText(raw.type);
  if (type !== undefined) filter.type = type;
  return filter;
}

function parseSeries(value: unknown, index: number): SeriesDefinition {
  const raw = asRecord(value);
  return {
    name: optionalText(raw.name) ?? `series${index + 1}`,
    source: optionalText(raw.source) ?? "events",
    field: optionalText(raw.field) ?? "count",
    filter: parseSeriesFilter(raw.filter),
  };
}

/** Turns a loosely typed request body into a query, or an error for an unknown type. */
export function parseQueryRequest(input: unknown): QueryRequest | QueryErrorResponse {
  const raw = asRecord(input);
  const query = raw.query;
  const from = optionalNumber(raw.from);
  const to = optionalNumber(raw.to);
  const window = { ...(from !== undefined ? { from } : {}), ...(to !== undefined ? { to } : {}) };

  if (query === "timeseries" || query === "correlate") {
    const bucketMs = optionalNumber(raw.bucketMs);
    return {
      query,
      bucketMs: bucketMs !== undefined && bucketMs > 0 ? bucketMs : DEFAULT_QUERY_BUCKET_MS,
      ...window,
      series: asArray(raw.series).map(parseSeries),
    };
  }
  if (query === "aggregate") {
    const filter = asRecord(raw.filter);
    const provider = optionalText(filter.provider);
    return {
      query,
      source: optionalText(raw.source) ?? "events",
      groupBy: optionalText(raw.groupBy) ?? "",
      ...window,
      filter: provider !== undefined ? { provider } : {},
    };
  }
  return { error: `Unknown query type: ${typeof query === "string" ? query : String(query)}` };
}

function fillGcSeries(source: TraceSource, series: SeriesDefinition, addAt: (timeMs: number, value: number) => void): void {
  for (const gc of reconstructGcs(source)) {
    if (series.filter.generation !== undefined && gc.generation !== series.filter.generation) continue;
    switch (series.field) {
      case "pauseDurationMs":
        addAt(gc.startTimeMs, gc.pauseDurationMs);
        break;
      case "heapSizeAfterMB":
        addAt(gc.startTimeMs, gc.heapSizeAfterMB);
        break;
      case "promotedMB":
        addAt(gc.startTimeMs, gc.promotedMB);
        break;
      default:
        addAt(gc.startTimeMs, 1);
        break;
    }
  }
}

function fillEventSeries(
  events: Iterable<RuntimeEvent>,
  series: SeriesDefinition,
  addAt: (timeMs: number, value: number) => void,
): void {
  const { provider, type } = series.filter;
  for (const event of events) {
    if (provider && !containsIgnoreCase(event.provider, provider)) continue;
    if (type && !containsIgnoreCase(event.eventName, type)) continue;
    if (series.field === "count") {
      addAt(event.timeMs, 1);
      continue;
    }
    const value = payloadNumberValue(payloadField(event, series.field));
    if (value !== null) addAt(event.timeMs, value);
  }
}

function fillExceptionSeries(
  events: Iterable<RuntimeEvent>,
  series: SeriesDefinition,
  addAt: (timeMs: number, value: number) => void,
): void {
  for (const event of events) {
    if (!isExceptionThrow(event)) continue;
    if (series.filter.type && !containsIgnoreCase(exceptionType(event), series.filter.type)) continue;
    addAt(event.timeMs, 1);
  }
}

export function executeTimeSeries(source: TraceSource, query: TimeSeriesQuery): TimeSeriesResponse {
  const bucketMs = query.bucketMs > 0 ? query.bucketMs : DEFAULT_QUERY_BUCKET_MS;
  const fromMs = query.from ?? 0;
  const toMs = query.to ?? source.durationMs;
  const bucketCount = Math.max(0, Math.min(MAX_QUERY_BUCKETS, Math.ceil((toMs - fromMs) / bucketMs)));

  const series = query.series.map((definition) => {
    const buckets = new Array<number>(bucketCount).fill(0);
    const addAt = (timeMs: number, value: number): void => {
      const index = Math.trunc((timeMs - fromMs) / bucketMs);
      if (timeMs < fromMs || index >= bucketCount) return;
      buckets[index] = (buckets[index] ?? 0) + value;
    };

    if (definition.source === "gc") fillGcSeries(source, definition, addAt);
    else if (definition.source === "events") fillEventSeries(source.events(), definition, addAt);
    else if (definition.source === "exceptions") fillExceptionSeries(source.events(), definition, addAt);

    return {
      name: definition.name,
      source: definition.source,
      field: definition.field,
      data: buckets.map((value, index) => ({ timeMs: round(fromMs + index * bucketMs, 1), value: round(value, 4) })),
    };
  });

  return { type: "timeseries", bucketMs, fromMs: round(fromMs, 1), toMs: round(toMs, 1), series };
}

class AggregateGroup {
  count = 0;
  sum = 0;
  min = Number.POSITIVE_INFINITY;
  max = Number.NEGATIVE_INFINITY;

  add(value: number): void {
    this.count += 1;
    this.sum += value;
    this.min = Math.min(this.min, value);
    this.max = Math.max(this.max, value);
  }

  toResult(key: string): AggregateGroupResult {
    return {
      key,
      count: this.count,
      sum: round(this.sum, 2),
      avg: this.count > 0 ? round(this.sum / this.count, 2) : 0,
      min: round(this.min, 2),
      max: round(this.max, 2),
    };
  }
}

export function executeAggregate(source: TraceSource, query: AggregateQuery): AggregateResponse {
  const groups = new Map<string, AggregateGroup>();
  const add = (key: string, value: number): void => {
    let group = groups.get(key);
    if (!group) {
      group = new AggregateGroup();
      groups.set(key, group);
    }
    group.add(value);
  };

  if (query.source === "gc") {
    for (const gc of reconstructGcs(source)) {
      if (!inWindow(gc.startTimeMs, query)) continue;
      const key =
        query.groupBy === "type" ? gc.type : query.groupBy === "reason" ? gc.reason : `Gen ${gc.generation}`;
      add(key, gc.pauseDurationMs);
    }
  } else if (query.source === "events") {
    for (const event of source.events()) {
      if (!inWindow(event.timeMs, query)) continue;
      if (query.filter.provider && !containsIgnoreCase(event.provider, query.filter.provider)) continue;
      const key =
        query.groupBy === "provider"
          ? event.provider
          : query.groupBy === "process"
            ? String(event.processId)
            : event.eventName;
      add(key, 1);
    }
  }

  return {
    type: "aggregate",
    groupBy: query.groupBy,
    groups: Array.from(groups.entries())
      .sort(([, a], [, b]) => b.count - a.count)
      .map(([key, group]) => group.toResult(key)),
  };
}

/** Dispatches `timeseries`, `correlate` (same shape) and `aggregate` queries. */
export function executeQuery(source: TraceSource, input: unknown): QueryResponse {
  const request = parseQueryRequest(input);
  if ("error" in request) return request;
  if (request.query === "aggregate") return executeAggregate(source, request);
  return executeTimeSeries(source, request);
}
