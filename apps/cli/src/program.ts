import { Command, InvalidArgumentError } from "commander";
import type {
  AllocationsResponse,
  CallTreeNodeDto,
  CallerCalleeResponse,
  CpuStacksResponse,
  DiscoveredTraceFile,
  ExceptionsResponse,
  GcStatsResponse,
  JitStatsResponse,
  SnapshotResponse,
  TimelineResponse,
  TraceEventEntry,
  TraceInfo,
} from "@perfscope/contracts";
import {
  DEFAULT_CONFIG_PATH,
  TraceSessionManager,
  discoverTraceFiles,
  getConfigValue,
  loadConfig,
  parseAllocationGroupBy,
  parseGroupByMode,
  parseLanes,
  saveConfig,
  setConfigValue,
  type TraceSession,
} from "@perfscope/core";
import { runServer } from "@perfscope/server";

export interface CliOutput {
  log(line: string): void;
  error(line: string): void;
}

export const consoleOutput: CliOutput = {
  log: (line) => console.log(line),
  error: (line) => console.error(line),
};

interface WindowOptions {
  from?: number;
  to?: number;
}

interface JsonOption {
  json?: boolean;
}

function parseNumber(value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || !Number.isFinite(parsed)) {
    throw new InvalidArgumentError("Not a number.");
  }
  return parsed;
}

function parseInteger(value: string): number {
  const parsed = parseNumber(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError("Not an integer.");
  }
  return parsed;
}

function fmtMs(value: number): string {
  return value.toFixed(2);
}

function fmtPct(value: number): string {
  return `${value.toFixed(2)}%`;
}

function tableLines(rows: string[][]): string[] {
  const header = rows[0];
  if (!header) return [];
  const widths = header.map((_, col) => Math.max(...rows.map((row) => (row[col] ?? "").length)));
  const lines: string[] = [];
  for (const [idx, row] of rows.entries()) {
    lines.push(
      row
        .map((cell, col) => (cell ?? "").padEnd(widths[col] ?? 0))
        .join(idx === 0 ? " | " : "   ")
        .trimEnd(),
    );
    if (idx === 0) {
      lines.push(widths.map((width) => "-".repeat(width)).join("-+-"));
    }
  }
  return lines;
}

function callTreeLines(nodes: CallTreeNodeDto[], minPercent: number, level = 0): string[] {
  const lines: string[] = [];
  for (const node of nodes) {
    if (node.inclusivePercent < minPercent) continue;
    lines.push(
      `${"  ".repeat(level)}${node.name}  incl ${fmtMs(node.inclusiveMs)} ms (${fmtPct(node.inclusivePercent)})  excl ${fmtMs(node.exclusiveMs)} ms`,
    );
    lines.push(...callTreeLines(node.children ?? [], minPercent, level + 1));
  }
  return lines;
}

export function renderInfo(info: TraceInfo): string[] {
  return [
    `File:     ${info.filePath}`,
    `Format:   ${info.format}`,
    `Duration: ${info.durationMs.toFixed(1)} ms`,
    `Events:   ${info.eventCount}`,
    `Samples:  ${info.sampleCount}`,
    "",
    ...tableLines([
      ["PID", "Process", "CPU ms"],
      ...info.processes.map((process) => [String(process.processId), process.name, fmtMs(process.cpuMs)]),
    ]),
  ];
}

export function renderGcStats(stats: GcStatsResponse): string[] {
  if (stats.processes.length === 0) return ["No GC events found."];
  const lines = tableLines([
    ["Process", "PID", "GCs", "Gen0", "Gen1", "Gen2", "Pause ms", "Max pause ms", "Pause %", "Max heap MB", "Alloc MB"],
    ...stats.processes.map((process) => [
      process.processName,
      String(process.processId),
      String(process.totalGCs),
      String(process.gen0Count),
      String(process.gen1Count),
      String(process.gen2Count),
      fmtMs(process.totalPauseTimeMs),
      fmtMs(process.maxPauseMs),
      fmtPct(process.pauseTimePercent),
      fmtMs(process.maxHeapSizeMB),
      fmtMs(process.totalAllocatedMB),
    ]),
  ]);
  if (stats.timeline) {
    lines.push(
      "",
      ...tableLines([
        ["GC#", "Gen", "Start ms", "Pause ms", "Reason", "Type", "Heap MB", "Promoted MB"],
        ...stats.timeline.map((gc) => [
          String(gc.gcNumber),
          String(gc.generation),
          gc.startTimeMs.toFixed(3),
          gc.pauseDurationMs.toFixed(3),
          gc.reason,
          gc.type,
          fmtMs(gc.heapSizeAfterMB),
          fmtMs(gc.promotedMB),
        ]),
      ]),
    );
  }
  return lines;
}

export function renderJitStats(stats: JitStatsResponse): string[] {
  if (stats.processes.length === 0) return ["No JIT events found."];
  return tableLines([
    ["Process", "PID", "Methods", "JIT ms", "IL bytes", "Native bytes"],
    ...stats.processes.map((process) => [
      process.processName,
      String(process.processId),
      String(process.totalMethodsJitted),
      fmtMs(process.totalJitTimeMs),
      String(process.totalILSize),
      String(process.totalNativeSize),
    ]),
  ]);
}

export function renderCpuStacks(result: CpuStacksResponse): string[] {
  return [
    `Samples: ${result.totalSamples}  Total: ${fmtMs(result.totalMetricMs)} ms  Grouped by: ${result.groupedBy}`,
    "",
    ...tableLines([
      ["Name", "Excl ms", "Incl ms", "Excl %"],
      ...result.items.map((item) => [item.name, fmtMs(item.exclusiveMs), fmtMs(item.inclusiveMs), fmtPct(item.exclusivePercent)]),
    ]),
  ];
}

function eventLine(event: TraceEventEntry): string {
  const message = event.message ? `  ${event.message}` : "";
  return `${event.timestampMs.toFixed(3)}  ${event.provider}/${event.eventName}  pid=${event.processId} tid=${event.threadId}${message}`;
}

export function renderExceptions(result: ExceptionsResponse): string[] {
  if (result.exceptions.length === 0) return ["No exceptions found."];
  const summary = Object.entries(result.summary).sort(([, a], [, b]) => b - a);
  return [
    ...tableLines([
      ["Time ms", "Type", "Message", "PID", "TID"],
      ...result.exceptions.map((entry) => [
        entry.timestampMs.toFixed(3),
        entry.type,
        entry.message,
        String(entry.processId),
        String(entry.threadId),
      ]),
    ]),
    "",
    ...tableLines([["Type", "Count"], ...summary.map(([type, count]) => [type, String(count)])]),
  ];
}

export function renderAllocations(result: AllocationsResponse): string[] {
  return [
    `Allocations: ${result.totalAllocations}  Bytes: ${result.totalBytes}  Grouped by: ${result.groupBy}`,
    "",
    ...tableLines([
      ["Name", "Count", "Bytes", "Avg bytes", "Large count", "Large bytes"],
      ...result.allocations.map((entry) => [
        entry.name,
        String(entry.count),
        String(entry.totalBytes),
        fmtMs(entry.averageBytes),
        String(entry.largeObjectCount),
        String(entry.largeObjectBytes),
      ]),
    ]),
  ];
}

export function renderCallerCallee(result: CallerCalleeResponse): string[] {
  const rows = (nodes: CallTreeNodeDto[]) => [
    ["Name", "Incl ms", "Excl ms", "Incl %"],
    ...nodes.map((node) => [node.name, fmtMs(node.inclusiveMs), fmtMs(node.exclusiveMs), fmtPct(node.inclusivePercent)]),
  ];
  return [
    `Focus: ${result.focus.name}  incl ${fmtMs(result.focus.inclusiveMs)} ms  excl ${fmtMs(result.focus.exclusiveMs)} ms`,
    "",
    "Callers:",
    ...tableLines(rows(result.callers)),
    "",
    "Callees:",
    ...tableLines(rows(result.callees)),
  ];
}

export function renderTimeline(timeline: TimelineResponse): string[] {
  const { lanes } = timeline;
  const header = ["Start ms"];
  if (lanes.gc) header.push("GC");
  if (lanes.cpu) header.push("CPU");
  if (lanes.exceptions) header.push("Exceptions");
  if (lanes.alloc) header.push("Alloc");
  if (lanes.jit) header.push("JIT");
  if (lanes.events) header.push("Events");

  const rows: string[][] = [header];
  for (let index = 0; index < timeline.bucketCount; index += 1) {
    const row = [(timeline.from + index * timeline.bucketSizeMs).toFixed(1)];
    const gc = lanes.gc?.[index];
    if (gc) row.push(gc.gcCount > 0 ? `${gc.gcCount} (${fmtMs(gc.totalPauseMs)} ms${gc.hasGen2 ? ", gen2" : ""})` : "");
    const cpu = lanes.cpu?.[index];
    if (cpu) row.push(cpu.sampleCount > 0 ? `${cpu.sampleCount} ${cpu.topMethod ?? ""}`.trimEnd() : "");
    const exceptions = lanes.exceptions?.[index];
    if (exceptions) row.push(exceptions.count > 0 ? `${exceptions.count} ${exceptions.topType ?? ""}`.trimEnd() : "");
    const alloc = lanes.alloc?.[index];
    if (alloc) row.push(alloc.count > 0 ? `${alloc.count} (${alloc.totalBytes} B)` : "");
    const jit = lanes.jit?.[index];
    if (jit) row.push(jit.methodCount > 0 ? `${jit.methodCount} (${fmtMs(jit.totalMs)} ms)` : "");
    const events = lanes.events?.[index];
    if (events) row.push(events.count > 0 ? String(events.count) : "");
    rows.push(row);
  }
  return tableLines(rows);
}

export function renderSnapshot(snapshot: SnapshotResponse): string[] {
  const lines = [`Window: ${snapshot.windowFrom.toFixed(1)} - ${snapshot.windowTo.toFixed(1)} ms (at ${snapshot.at.toFixed(1)})`];
  if (snapshot.gc) {
    lines.push("", `GC: ${snapshot.gc.count}`);
    for (const gc of snapshot.gc.gcEvents) {
      lines.push(`  #${gc.gcNumber} gen${gc.generation} at ${gc.startTimeMs.toFixed(3)} ms, pause ${gc.pauseDurationMs.toFixed(3)} ms (${gc.reason})`);
    }
  }
  if (snapshot.cpu) {
    lines.push("", `CPU: ${snapshot.cpu.sampleCount} samples`);
    for (const method of snapshot.cpu.topMethods) {
      lines.push(`  ${method.name}  ${fmtMs(method.exclusiveMs)} ms (${fmtPct(method.percent)})`);
    }
  }
  if (snapshot.exceptions) {
    lines.push("", `Exceptions: ${snapshot.exceptions.count}`);
    for (const entry of snapshot.exceptions.exceptions) {
      lines.push(`  ${entry.timestampMs.toFixed(3)} ms  ${entry.type}${entry.message ? `: ${entry.message}` : ""}`);
    }
  }
  if (snapshot.events) {
    lines.push("", `Events: ${snapshot.events.totalCount}`);
    for (const entry of snapshot.events.byType) {
      lines.push(`  ${entry.provider}/${entry.eventName}  ${entry.count}`);
    }
  }
  return lines;
}

export function renderFiles(files: DiscoveredTraceFile[]): string[] {
  if (files.length === 0) return ["No trace files found."];
  return tableLines([
    ["Path", "Format", "Bytes", "Modified"],
    ...files.map((file) => [file.path, file.format, String(file.sizeBytes), new Date(file.mtimeMs).toISOString()]),
  ]);
}

/** Builds the `perfscope` command tree writing through `output`. */
export function buildProgram(output: CliOutput = consoleOutput): Command {
  const program = new Command();
  program
    .name("perfscope")
    .description("Aggregate and correlate CPU stacks and runtime events from trace files")
    .option("--config <path>", "Config path", process.env.PERFSCOPE_CONFIG ?? DEFAULT_CONFIG_PATH)
    .configureOutput({
      writeOut: (text) => output.log(text.trimEnd()),
      writeErr: (text) => output.error(text.trimEnd()),
    })
    .exitOverride();

  const configPath = (): string => program.opts<{ config: string }>().config;

  const print = (value: unknown, json: boolean | undefined, render: () => string[]): void => {
    if (json) {
      output.log(JSON.stringify(value, null, 2));
      return;
    }
    for (const line of render()) output.log(line);
  };

  async function openSession(tracePath: string): Promise<TraceSession> {
    const config = await loadConfig(configPath());
    const manager = new TraceSessionManager({ analysis: config.analysis });
    return manager.openTrace(tracePath);
  }

  program
    .command("info <trace>")
    .description("Display basic trace information")
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: JsonOption) => {
      const info = (await openSession(tracePath)).getInfo();
      print(info, opts.json, () => renderInfo(info));
    });

  program
    .command("gcstats <trace>")
    .description("Display GC statistics")
    .option("--process <name>", "Filter by process name")
    .option("--timeline", "Show the per-GC timeline")
    .option("--longest <n>", "Show the N longest GC pauses", parseInteger)
    .option("--from <ms>", "Start time in milliseconds", parseNumber)
    .option("--to <ms>", "End time in milliseconds", parseNumber)
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: WindowOptions & JsonOption & { process?: string; timeline?: boolean; longest?: number }) => {
      const stats = (await openSession(tracePath)).getGcStats({
        process: opts.process,
        timeline: opts.timeline ?? false,
        longest: opts.longest,
        from: opts.from,
        to: opts.to,
      });
      print(stats, opts.json, () => renderGcStats(stats));
    });

  program
    .command("jitstats <trace>")
    .description("Display JIT compilation statistics")
    .option("--process <name>", "Filter by process name")
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: JsonOption & { process?: string }) => {
      const stats = (await openSession(tracePath)).getJitStats({ process: opts.process });
      print(stats, opts.json, () => renderJitStats(stats));
    });

  program
    .command("cpustacks <trace>")
    .description("Top methods by CPU time")
    .option("--top <n>", "Number of entries", parseInteger)
    .option("--group-by <mode>", "method, module or namespace", "method")
    .option("--inclusive", "Sort by inclusive time")
    .option("--from <ms>", "Start time in milliseconds", parseNumber)
    .option("--to <ms>", "End time in milliseconds", parseNumber)
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: WindowOptions & JsonOption & { top?: number; groupBy: string; inclusive?: boolean }) => {
      const result = (await openSession(tracePath)).getFlatTop({
        top: opts.top,
        groupBy: parseGroupByMode(opts.groupBy),
        sortByInclusive: opts.inclusive ?? false,
        from: opts.from,
        to: opts.to,
      });
      print(result, opts.json, () => renderCpuStacks(result));
    });

  program
    .command("events <trace>")
    .description("List and filter events")
    .option("--type <name>", "Event name substring")
    .option("--provider <name>", "Provider substring")
    .option("--list", "List event types with counts")
    .option("--limit <n>", "Maximum events", parseInteger, 100)
    .option("--from <ms>", "Start time in milliseconds", parseNumber)
    .option("--to <ms>", "End time in milliseconds", parseNumber)
    .option("--pid <id>", "Process id", parseInteger)
    .option("--tid <id>", "Thread id", parseInteger)
    .option("--payload <text>", "Payload substring")
    .option("--json", "JSON output")
    .action(
      async (
        tracePath: string,
        opts: WindowOptions &
          JsonOption & { type?: string; provider?: string; list?: boolean; limit: number; pid?: number; tid?: number; payload?: string },
      ) => {
        const session = await openSession(tracePath);
        if (opts.list) {
          const types = session.getEventTypes({ provider: opts.provider, from: opts.from, to: opts.to });
          print(types, opts.json, () =>
            tableLines([
              ["Provider", "Event", "Count"],
              ...types.eventTypes.map((entry) => [entry.provider, entry.eventName, String(entry.count)]),
            ]),
          );
          return;
        }
        const result = session.getEvents({
          type: opts.type,
          provider: opts.provider,
          limit: opts.limit,
          from: opts.from,
          to: opts.to,
          pid: opts.pid,
          tid: opts.tid,
          payload: opts.payload,
        });
        print(result, opts.json, () => result.events.map(eventLine));
      },
    );

  program
    .command("exceptions <trace>")
    .description("List thrown exceptions")
    .option("--type <name>", "Exception type substring")
    .option("--from <ms>", "Start time in milliseconds", parseNumber)
    .option("--to <ms>", "End time in milliseconds", parseNumber)
    .option("--limit <n>", "Maximum exceptions", parseInteger, 100)
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: WindowOptions & JsonOption & { type?: string; limit: number }) => {
      const result = (await openSession(tracePath)).getExceptions({
        type: opts.type,
        from: opts.from,
        to: opts.to,
        limit: opts.limit,
      });
      print(result, opts.json, () => renderExceptions(result));
    });

  program
    .command("calltree <trace>")
    .description("Weighted call tree with hot path and caller/callee views")
    .option("--depth <n>", "Levels to expand", parseInteger)
    .option("--hot-path", "Follow the dominant call chain")
    .option("--caller-callee <method>", "Callers and callees of a method")
    .option("--min-percent <pct>", "Hide nodes below this inclusive percentage", parseNumber, 1)
    .option("--json", "JSON output")
    .action(
      async (
        tracePath: string,
        opts: JsonOption & { depth?: number; hotPath?: boolean; callerCallee?: string; minPercent: number },
      ) => {
        const session = await openSession(tracePath);
        if (opts.callerCallee) {
          const result = session.getCallerCallee(opts.callerCallee);
          print(result, opts.json, () => renderCallerCallee(result));
          return;
        }
        const tree = opts.hotPath ? session.getHotPath() : session.getCallTree(opts.depth);
        print(tree, opts.json, () => [
          `Total: ${fmtMs(tree.totalMetricMs)} ms over ${tree.totalSamples} samples`,
          "",
          ...callTreeLines(tree.nodes, opts.minPercent),
        ]);
      },
    );

  program
    .command("alloc <trace>")
    .description("Allocations grouped by type, namespace or module")
    .option("--top <n>", "Number of entries", parseInteger, 20)
    .option("--group-by <mode>", "type, namespace or module", "type")
    .option("--from <ms>", "Start time in milliseconds", parseNumber)
    .option("--to <ms>", "End time in milliseconds", parseNumber)
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: WindowOptions & JsonOption & { top: number; groupBy: string }) => {
      const result = (await openSession(tracePath)).getAllocations({
        top: opts.top,
        groupBy: parseAllocationGroupBy(opts.groupBy),
        from: opts.from,
        to: opts.to,
      });
      print(result, opts.json, () => renderAllocations(result));
    });

  program
    .command("timeline <trace>")
    .description("Time-bucketed lanes on one shared grid")
    .option("--lanes <list>", "Comma-separated lanes: gc,cpu,exceptions,alloc,jit,events")
    .option("--buckets <n>", "Number of buckets", parseInteger)
    .option("--from <ms>", "Start time in milliseconds", parseNumber)
    .option("--to <ms>", "End time in milliseconds", parseNumber)
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: WindowOptions & JsonOption & { lanes?: string; buckets?: number }) => {
      const timeline = (await openSession(tracePath)).getTimeline({
        from: opts.from,
        to: opts.to,
        bucketCount: opts.buckets,
        lanes: opts.lanes !== undefined ? parseLanes(opts.lanes) : undefined,
      });
      print(timeline, opts.json, () => renderTimeline(timeline));
    });

  program
    .command("snapshot <trace>")
    .description("What was happening around one instant")
    .requiredOption("--at <ms>", "Instant in milliseconds", parseNumber)
    .option("--window <ms>", "Half-window in milliseconds", parseNumber)
    .option("--json", "JSON output")
    .action(async (tracePath: string, opts: JsonOption & { at: number; window?: number }) => {
      const snapshot = (await openSession(tracePath)).getSnapshot(opts.at, opts.window);
      print(snapshot, opts.json, () => renderSnapshot(snapshot));
    });

  program
    .command("files")
    .description("Trace files under the configured discovery roots")
    .option("--json", "JSON output")
    .action(async (opts: JsonOption) => {
      const config = await loadConfig(configPath());
      const files = await discoverTraceFiles(config.discovery);
      print(files, opts.json, () => renderFiles(files));
    });

  program
    .command("serve")
    .description("Start the HTTP and WebSocket server")
    .option("--host <host>", "Server host", process.env.PERFSCOPE_HOST)
    .option("--port <port>", "Server port", parseInteger)
    .action(async (opts: { host?: string; port?: number }) => {
      await runServer({ host: opts.host, port: opts.port, configPath: configPath() });
    });

  const configCmd = program.command("config").description("Configuration");

  configCmd
    .command("get [key]")
    .description("Print the configuration or one section.field value")
    .action(async (key: string | undefined) => {
      const config = await loadConfig(configPath());
      output.log(JSON.stringify(key ? getConfigValue(config, key) : config, null, 2));
    });

  configCmd
    .command("set <key> <value>")
    .description("Set one section.field value")
    .action(async (key: string, value: string) => {
      const config = setConfigValue(await loadConfig(configPath()), key, value);
      await saveConfig(config, configPath());
      output.log(`updated ${key}`);
    });

  return program;
}
