import { randomBytes } from "node:crypto";
import type {
  AllocationsResponse,
  AnalysisConfig,
  CallTreeResponse,
  CallerCalleeResponse,
  CpuStacksResponse,
  EventsListResponse,
  EventsResponse,
  ExceptionsResponse,
  GcStatsResponse,
  GroupByMode,
  JitStatsResponse,
  QueryResponse,
  SnapshotResponse,
  TimelineResponse,
  TraceInfo,
  TraceSessionInfo,
} from "@perfscope/contracts";
import { getAllocations, type AllocationsOptions } from "./allocations.js";
import { buildCallTree, type CallTree } from "./callTree.js";
import { getCallTree, getCallTreeChildren, getCallerCallee, getHotPath } from "./callTreeNavigator.js";
import { DEFAULT_CONFIG } from "./defaults.js";
import { describeTraceFile } from "./discovery.js";
import {
  exportEvents,
  getEventTypes,
  getEvents,
  type EventFilter,
  type EventTypesOptions,
  type EventsOptions,
  type ExportResult,
  type ExportSink,
} from "./events.js";
import { getExceptions, type ExceptionsOptions } from "./exceptions.js";
import { getGcStats, type GcStatsOptions } from "./gc.js";
import { getJitStats, type JitStatsOptions } from "./jit.js";
import { ParserRegistry } from "./parsers/index.js";
import { executeQuery } from "./queryEngine.js";
import { getSnapshot } from "./snapshot.js";
import { flatTop } from "./stackAggregator.js";
import { getTimeline, type TimelineOptions } from "./timeline.js";
import type { TraceSource } from "./traceSource.js";
import { nowMs, round } from "./utils.js";

export const UNKNOWN_SESSION_PREFIX = "unknown trace session:";
export const FILE_NOT_FOUND_PREFIX = "file not found:";
export const INVALID_TRACE_PREFIX = "invalid trace file:";

export interface FlatTopRequest {
  top?: number;
  groupBy?: GroupByMode;
  sortByInclusive?: boolean;
  from?: number;
  to?: number;
}

/**
 * One open trace. Every analysis reads the source afresh except the call
 * tree, which is built once on first use and kept until the session closes.
 */
export class TraceSession {
  private callTree: CallTree | null = null;
  private building = false;

  constructor(
    readonly id: string,
    readonly filePath: string,
    readonly source: TraceSource,
    private readonly analysis: AnalysisConfig = DEFAULT_CONFIG.analysis,
    readonly openedAtMs: number = nowMs(),
  ) {}

  describe(): TraceSessionInfo {
    return { id: this.id, filePath: this.filePath, openedAtMs: this.openedAtMs };
  }

  getInfo(): TraceInfo {
    return {
      id: this.id,
      filePath: this.filePath,
      format: this.source.format,
      durationMs: round(this.source.durationMs, 1),
      eventCount: this.source.eventCount(),
      sampleCount: this.source.sampleCount(),
      processes: this.source
        .processes()
        .map((process) => ({ ...process, cpuMs: round(process.cpuMs, 1) })),
    };
  }

  get callTreeBuilt(): boolean {
    return this.callTree !== null;
  }

  buildCallTree(): CallTree {
    if (this.callTree) return this.callTree;
    if (this.building) {
      throw new Error(`call tree build already running for session ${this.id}`);
    }
    this.building = true;
    try {
      if (!this.callTree) {
        this.callTree = buildCallTree(this.source.samples());
      }
      return this.callTree;
    } finally {
      this.building = false;
    }
  }

  getFlatTop(request: FlatTopRequest = {}): CpuStacksResponse {
    const windowed = request.from !== undefined || request.to !== undefined;
    const samples = windowed
      ? this.source.samples({ from: request.from ?? 0, to: request.to ?? this.source.durationMs })
      : this.source.samples();
    return flatTop(samples, {
      top: request.top ?? this.analysis.flatTop,
      groupBy: request.groupBy ?? "method",
      sortByInclusive: request.sortByInclusive ?? false,
      from: request.from,
      to: request.to,
      traceDurationMs: this.source.durationMs,
    });
  }

  getCallTree(depth: number = this.analysis.callTreeDepth): CallTreeResponse {
    return getCallTree(this.buildCallTree(), depth);
  }

  getCallTreeChildren(path: readonly number[], depth: number = this.analysis.callTreeDepth): CallTreeResponse {
    return getCallTreeChildren(this.buildCallTree(), path, depth);
  }

  getHotPath(path: readonly number[] = []): CallTreeResponse {
    return getHotPath(this.buildCallTree(), path, { maxDepth: this.analysis.hotPathMaxDepth });
  }

  getCallerCallee(method: string): CallerCalleeResponse {
    return getCallerCallee(this.buildCallTree(), method);
  }

  getTimeline(options: TimelineOptions = {}): TimelineResponse {
    return getTimeline(this.source, {
      ...options,
      bucketCount: options.bucketCount ?? this.analysis.timelineBuckets,
      lanes: options.lanes ?? this.analysis.timelineLanes,
    });
  }

  getSnapshot(at: number, window: number = this.analysis.snapshotWindowMs): SnapshotResponse {
    return getSnapshot(this.source, at, window);
  }

  executeQuery(input: unknown): QueryResponse {
    return executeQuery(this.source, input);
  }

  getGcStats(options: GcStatsOptions = {}): GcStatsResponse {
    return getGcStats(this.source, options);
  }

  getJitStats(options: JitStatsOptions = {}): JitStatsResponse {
    return getJitStats(this.source, options);
  }

  getEventTypes(options: EventTypesOptions = {}): EventsListResponse {
    return getEventTypes(this.source.events(), options);
  }

  getEvents(options: EventsOptions = {}): EventsResponse {
    return getEvents(this.source.events(), options);
  }

  getExceptions(options: ExceptionsOptions = {}): ExceptionsResponse {
    return getExceptions(this.source.events(), options);
  }

  getAllocations(options: AllocationsOptions = {}): AllocationsResponse {
    return getAllocations(this.source.events(), {
      ...options,
      largeObjectThresholdBytes: options.largeObjectThresholdBytes ?? this.analysis.largeObjectThresholdBytes,
    });
  }

  exportEvents(filter: EventFilter, sink: ExportSink, signal?: AbortSignal): Promise<ExportResult> {
    return exportEvents(this.source.events(), filter, sink, signal);
  }
}

export interface TraceSessionManagerOptions {
  analysis?: AnalysisConfig;
  registry?: ParserRegistry;
}

export function newSessionId(): string {
  return randomBytes(6).toString("hex");
}

export class TraceSessionManager {
  private readonly sessions = new Map<string, TraceSession>();
  private readonly registry: ParserRegistry;
  private readonly analysis: AnalysisConfig;

  constructor(options: TraceSessionManagerOptions = {}) {
    this.registry = options.registry ?? new ParserRegistry();
    this.analysis = options.analysis ?? DEFAULT_CONFIG.analysis;
  }

  async openTrace(filePath: string): Promise<TraceSession> {
    const file = await describeTraceFile(filePath);
    if (!file) {
      throw new Error(`${FILE_NOT_FOUND_PREFIX} ${filePath}`);
    }
    const output = await this.registry.parseFile(file);
    if (output.parseError) {
      throw new Error(`${INVALID_TRACE_PREFIX} ${output.parseError}`);
    }
    return this.addSession(file.path, output.source);
  }

  addSession(filePath: string, source: TraceSource): TraceSession {
    let id = newSessionId();
    while (this.sessions.has(id)) id = newSessionId();
    const session = new TraceSession(id, filePath, source, this.analysis);
    this.sessions.set(id, session);
    return session;
  }

  findSession(id: string): TraceSession | undefined {
    return this.sessions.get(id);
  }

  getSession(id: string): TraceSession {
    const session = this.sessions.get(id);
    if (!session) {
      throw new Error(`${UNKNOWN_SESSION_PREFIX} ${id}`);
    }
    return session;
  }

  closeSession(id: string): boolean {
    return this.sessions.delete(id);
  }

  listSessions(): TraceSessionInfo[] {
    return Array.from(this.sessions.values())
      .map((session) => session.describe())
      .sort((a, b) => a.openedAtMs - b.openedAtMs);
  }

  closeAll(): void {
    this.sessions.clear();
  }
}
