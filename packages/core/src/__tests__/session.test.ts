import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { CallTreeNodeDto } from "@perfscope/contracts";
import { describe, expect, it } from "vitest";
import { mergeConfig } from "../config.js";
import { TraceSessionManager } from "../session.js";
import { InMemoryTraceSource } from "../traceSource.js";

function levels(nodes: CallTreeNodeDto[]): number {
  if (nodes.length === 0) return 0;
  return 1 + Math.max(...nodes.map((node) => levels(node.children ?? [])));
}

const traceLines = [
  { type: "meta", durationMs: 100, processes: [{ processId: 1, name: "app" }] },
  { type: "sample", timeMs: 10, metric: 3, frames: ["m!Leaf()", "m!Mid()", "m!Root()"], processId: 1 },
  { type: "sample", timeMs: 20, metric: 1, frames: ["m!Other()", "m!Mid()", "m!Root()"], processId: 1 },
  { type: "event", timeMs: 30, provider: "Runtime", eventName: "GC/Start", processId: 1, threadId: 1, payload: { Depth: 0 } },
  { type: "event", timeMs: 32, provider: "Runtime", eventName: "GC/Stop", processId: 1, threadId: 1, payload: {} },
  {
    type: "event",
    timeMs: 40,
    provider: "Runtime",
    eventName: "Exception/Start",
    processId: 1,
    threadId: 2,
    payload: { ExceptionType: "TimeoutError" },
  },
];

async function writeTrace(name: string, content: string): Promise<string> {
  const root = await mkdtemp(path.join(os.tmpdir(), "perfscope-session-"));
  const filePath = path.join(root, name);
  await writeFile(filePath, content, "utf8");
  return filePath;
}

async function openSample(manager = new TraceSessionManager()) {
  const filePath = await writeTrace("run.trace.jsonl", traceLines.map((line) => JSON.stringify(line)).join("\n"));
  return { manager, filePath, session: await manager.openTrace(filePath) };
}

describe("TraceSessionManager", () => {
  it("opens a trace and reports its info", async () => {
    const { session, filePath } = await openSample();
    expect(session.id).toMatch(/^[0-9a-f]{12}$/);
    expect(session.getInfo()).toEqual({
      id: session.id,
      filePath,
      format: "jsonl",
      durationMs: 100,
      eventCount: 3,
      sampleCount: 2,
      processes: [{ processId: 1, name: "app", cpuMs: 4 }],
    });
  });

  it("lists, finds and closes sessions", async () => {
    const { manager, session } = await openSample();
    expect(manager.listSessions().map((info) => info.id)).toEqual([session.id]);
    expect(manager.getSession(session.id)).toBe(session);
    expect(manager.closeSession(session.id)).toBe(true);
    expect(manager.closeSession(session.id)).toBe(false);
    expect(manager.findSession(session.id)).toBeUndefined();
    expect(() => manager.getSession(session.id)).toThrow(`unknown trace session: ${session.id}`);
  });

  it("closes every session at once", () => {
    const manager = new TraceSessionManager();
    manager.addSession("/a", new InMemoryTraceSource());
    manager.addSession("/b", new InMemoryTraceSource());
    manager.closeAll();
    expect(manager.listSessions()).toEqual([]);
  });

  it("rejects missing and unreadable trace files", async () => {
    const manager = new TraceSessionManager();
    await expect(manager.openTrace("/no/such/run.trace.jsonl")).rejects.toThrow(
      "file not found: /no/such/run.trace.jsonl",
    );
    const broken = await writeTrace("broken.trace.jsonl", "not a trace\n");
    await expect(manager.openTrace(broken)).rejects.toThrow(`invalid trace file: no trace records in ${broken}`);
  });
});

describe("TraceSession", () => {
  it("builds the call tree once and reuses it", async () => {
    const { session } = await openSample();
    expect(session.callTreeBuilt).toBe(false);
    const tree = session.buildCallTree();
    expect(session.callTreeBuilt).toBe(true);
    expect(session.buildCallTree()).toBe(tree);
  });

  it("answers every analysis from the same source", async () => {
    const { session } = await openSample();

    const flat = session.getFlatTop({ top: 1 });
    expect(flat.totalMetricMs).toBe(4);
    expect(flat.items.map((item) => item.name)).toEqual(["m!Leaf()"]);

    const tree = session.getCallTree(2);
    expect(tree.nodes[0]?.name).toBe("m!Root()");
    expect(tree.nodes[0]?.children?.map((node) => node.name)).toEqual(["m!Mid()"]);
    expect(session.getCallTreeChildren([0, 0], 1).nodes.map((node) => node.inclusiveMs)).toEqual([3, 1]);
    expect(session.getCallerCallee("Mid").focus.inclusiveMs).toBe(4);

    const timeline = session.getTimeline();
    expect(timeline.bucketCount).toBe(100);
    expect(Object.keys(timeline.lanes).sort()).toEqual(["cpu", "exceptions", "gc"]);

    expect(session.getSnapshot(35).gc?.count).toBe(1);
    expect(session.getGcStats().processes[0]?.totalPauseTimeMs).toBe(2);
    expect(session.getJitStats().processes).toEqual([]);
    expect(session.getEventTypes().eventTypes).toHaveLength(3);
    expect(session.getEvents({ type: "gc" }).events).toHaveLength(2);
    expect(session.getExceptions().summary).toEqual({ TimeoutError: 1 });
    expect(session.getAllocations().totalAllocations).toBe(0);
    expect(session.executeQuery({ query: "nope" })).toEqual({ error: "Unknown query type: nope" });
  });

  it("limits the flat view to a time window", async () => {
    const { session } = await openSample();
    const flat = session.getFlatTop({ from: 15, to: 100 });
    expect(flat.totalSamples).toBe(1);
    expect(flat.totalMetricMs).toBe(1);
    expect(flat.traceDurationMs).toBe(85);
    expect(flat.items.map((item) => item.name)).toEqual(["m!Other()", "m!Mid()", "m!Root()"]);
    expect(flat.items[0]?.sampleBuckets[1]).toBe(1);
  });

  it("applies the configured analysis defaults", async () => {
    const analysis = mergeConfig({ analysis: { hotPathMaxDepth: 1, timelineBuckets: 10, timelineLanes: ["events"] } }).analysis;
    const { session } = await openSample(new TraceSessionManager({ analysis }));
    expect(levels(session.getHotPath().nodes)).toBe(2);
    const timeline = session.getTimeline();
    expect(timeline.bucketCount).toBe(10);
    expect(Object.keys(timeline.lanes)).toEqual(["events"]);

    const { session: defaultSession } = await openSample();
    expect(levels(defaultSession.getHotPath().nodes)).toBe(3);
  });

  it("exports matching events", async () => {
    const { session } = await openSample();
    const names: string[] = [];
    const result = await session.exportEvents({ provider: "runtime" }, { event: (streamed) => names.push(streamed.eventName), progress: () => undefined });
    expect(result).toEqual({ sent: 3, cancelled: false });
    expect(names).toEqual(["GC/Start", "GC/Stop", "Exception/Start"]);
  });
});
