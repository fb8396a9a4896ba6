export type GroupByMode = "method" | "module" | "namespace";
export type AllocationGroupBy = "type" | "module" | "namespace";
export type LaneName = "gc" | "cpu" | "exceptions" | "alloc" | "jit" | "events";
export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export type PayloadValue = string | number | boolean | null;

export interface RuntimeEvent {
  timeMs: number;
  provider: string;
  eventName: string;
  processId: number;
  threadId: number;
  payload: Record<string, PayloadValue>;
}

export interface StackSample {
  timeMs: number;
  metric: number;
  frames: string[];
  processId?: number;
  threadId?: number;
}

export interface TimeWindow {
  from: number;
  to: number;
}

export interface ServerConfig {
  host: string;
  port: number;
  logLevel: LogLevel;
}

export interface AnalysisConfig {
  hotPathMaxDepth: number;
  callTreeDepth: number;
  timelineBuckets: number;
  timelineLanes: LaneName[];
  snapshotWindowMs: number;
  flatTop: number;
  largeObjectThresholdBytes: number;
}

export interface DiscoveryConfig {
  roots: string[];
  includeGlobs: string[];
  excludeGlobs: string[];
  maxDepth: number;
}

export interface AppConfig {
  server: ServerConfig;
  analysis: AnalysisConfig;
  discovery: DiscoveryConfig;
}

export interface ProcessInfo {
  processId: number;
  name: string;
  cpuMs: number;
}

export interface TraceInfo {
  id: string;
  filePath: string;
  format: string;
  durationMs: number;
  eventCount: number;
  sampleCount: number;
  processes: ProcessInfo[];
}

export interface TraceSessionInfo {
  id: string;
  filePath: string;
  openedAtMs: number;
}

export interface DiscoveredTraceFile {
  id: string;
  path: string;
  format: string;
  sizeBytes: number;
  mtimeMs: number;
}

// GC

export interface GcRecord {
  processId: number;
  processName: string;
  gcNumber: number;
  generation: number;
  type: string;
  reason: string;
  startTimeMs: number;
  pauseDurationMs: number;
  heapSizeAfterMB: number;
  promotedMB: number;
}

export interface GcProcessStats {
  processId: number;
  processName: string;
  totalGCs: number;
  totalAllocatedMB: number;
  totalPauseTimeMs: number;
  maxPauseMs: number;
  maxHeapSizeMB: number;
  pauseTimePercent: number;
  gen0Count: number;
  gen1Count: number;
  gen2Count: number;
}

export interface GcStatsResponse {
  processes: GcProcessStats[];
  timeline: GcRecord[] | null;
}

// JIT

export interface JitProcessStats {
  processId: number;
  processName: string;
  totalMethodsJitted: number;
  totalJitTimeMs: number;
  totalILSize: number;
  totalNativeSize: number;
}

export interface JitStatsResponse {
  processes: JitProcessStats[];
}

// CPU stacks

export interface CpuStackEntry {
  name: string;
  exclusiveMs: number;
  inclusiveMs: number;
  exclusivePercent: number;
  sampleBuckets: number[];
}

export interface CpuStacksResponse {
  totalSamples: number;
  totalMetricMs: number;
  groupedBy: GroupByMode;
  items: CpuStackEntry[];
  traceDurationMs: number;
  bucketCount: number;
}

// Events

export interface EventTypeEntry {
  provider: string;
  eventName: string;
  count: number;
}

export interface EventsListResponse {
  eventTypes: EventTypeEntry[];
}

export interface TraceEventEntry {
  timestampMs: number;
  provider: string;
  eventName: string;
  processId: number;
  threadId: number;
  message: string;
  payload: Record<string, string> | null;
}

export interface EventsResponse {
  events: TraceEventEntry[];
}

// Exceptions

export interface ExceptionEntry {
  timestampMs: number;
  type: string;
  message: string;
  processId: number;
  threadId: number;
}

export interface ExceptionsResponse {
  exceptions: ExceptionEntry[];
  summary: Record<string, number>;
}

// Allocations

export interface AllocationEntry {
  name: string;
  count: number;
  totalBytes: number;
  averageBytes: number;
  largeObjectCount: number;
  largeObjectBytes: number;
}

export interface AllocationsResponse {
  totalAllocations: number;
  totalBytes: number;
  groupBy: AllocationGroupBy;
  allocations: AllocationEntry[];
}

// Call tree

export interface CallTreeNodeDto {
  name: string;
  inclusiveMs: number;
  exclusiveMs: number;
  inclusivePercent: number;
  exclusivePercent: number;
  childCount: number;
  children?: CallTreeNodeDto[];
}

export interface CallTreeResponse {
  totalMetricMs: number;
  totalSamples: number;
  nodes: CallTreeNodeDto[];
}

export interface CallerCalleeResponse {
  focus: CallTreeNodeDto;
  callers: CallTreeNodeDto[];
  callees: CallTreeNodeDto[];
}

// Timeline

export interface GcBucket {
  gcCount: number;
  totalPauseMs: number;
  maxPauseMs: number;
  hasGen2: boolean;
}

export interface CpuBucket {
  sampleCount: number;
  topMethod: string | null;
}

export interface ExceptionBucket {
  count: number;
  topType: string | null;
}

export interface AllocBucket {
  count: number;
  totalBytes: number;
}

export interface JitBucket {
  methodCount: number;
  totalMs: number;
}

export interface EventBucket {
  count: number;
}

export interface TimelineLanes {
  gc?: GcBucket[];
  cpu?: CpuBucket[];
  exceptions?: ExceptionBucket[];
  alloc?: AllocBucket[];
  jit?: JitBucket[];
  events?: EventBucket[];
}

export interface TimelineResponse {
  from: number;
  to: number;
  bucketSizeMs: number;
  bucketCount: number;
  lanes: TimelineLanes;
}

// Snapshot

export interface SnapshotGc {
  count: number;
  gcEvents: GcRecord[];
}

export interface SnapshotCpuMethod {
  name: string;
  exclusiveMs: number;
  percent: number;
}

export interface SnapshotCpu {
  sampleCount: number;
  topMethods: SnapshotCpuMethod[];
}

export interface SnapshotExceptions {
  count: number;
  exceptions: ExceptionEntry[];
}

export interface SnapshotEvents {
  totalCount: number;
  byType: EventTypeEntry[];
}

export interface SnapshotResponse {
  at: number;
  windowFrom: number;
  windowTo: number;
  gc?: SnapshotGc;
  cpu?: SnapshotCpu;
  exceptions?: SnapshotExceptions;
  events?: SnapshotEvents;
}

// Ad hoc queries

export type SeriesSource = "gc" | "events" | "exceptions";

export interface SeriesFilter {
  generation?: number;
  provider?: string;
  type?: string;
}

export interface SeriesDefinition {
  name: string;
  // one of SeriesSource; other values produce an all-zero series
  source: string;
  field: string;
  filter: SeriesFilter;
}

export interface TimeSeriesQuery {
  query: "timeseries" | "correlate";
  bucketMs: number;
  from?: number;
  to?: number;
  series: SeriesDefinition[];
}

export interface AggregateQuery {
  query: "aggregate";
  source: string;
  groupBy: string;
  from?: number;
  to?: number;
  filter: { provider?: string };
}

export type QueryRequest = TimeSeriesQuery | AggregateQuery;

export interface SeriesPoint {
  timeMs: number;
  value: number;
}

export interface SeriesResult {
  name: string;
  source: string;
  field: string;
  data: SeriesPoint[];
}

export interface TimeSeriesResponse {
  type: "timeseries";
  bucketMs: number;
  fromMs: number;
  toMs: number;
  series: SeriesResult[];
}

export interface AggregateGroupResult {
  key: string;
  count: number;
  sum: number;
  avg: number;
  min: number;
  max: number;
}

export interface AggregateResponse {
  type: "aggregate";
  groupBy: string;
  groups: AggregateGroupResult[];
}

export interface QueryErrorResponse {
  error: string;
}

export type QueryResponse = TimeSeriesResponse | AggregateResponse | QueryErrorResponse;

// Streaming

export interface StreamedEvent {
  timestampMs: number;
  provider: string;
  eventName: string;
  processId: number;
  threadId: number;
}

export interface StreamEnvelope {
  type: "subscribed" | "event" | "progress" | "stream_end" | "query_result" | "error";
  [key: string]: unknown;
}
