import { mkdtemp, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { WebSocket } from "ws";
import { afterEach, describe, expect, it } from "vitest";
import type { FastifyInstance } from "fastify";
import type { TraceInfo } from "@perfscope/contracts";
import { asRecord, mergeConfig } from "@perfscope/core";
import { createServer } from "./app.js";

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

let server: FastifyInstance | null = null;

afterEach(async () => {
  await server?.close();
  server = null;
});

async function buildFixture(): Promise<{ server: FastifyInstance; tracePath: string; traceId: string }> {
  const root = await mkdtemp(path.join(os.tmpdir(), "perfscope-server-"));
  const tracePath = path.join(root, "run.trace.jsonl");
  await writeFile(tracePath, traceLines.map((line) => JSON.stringify(line)).join("\n"), "utf8");

  const config = mergeConfig({ server: { logLevel: "silent" }, discovery: { roots: [root] } });
  const created = await createServer({ config });
  server = created;

  const opened = await created.inject({ method: "POST", url: "/api/traces/open", payload: { filePath: tracePath } });
  expect(opened.statusCode).toBe(200);
  const body = opened.json<{ id: string; filePath: string; info: TraceInfo }>();
  return { server: created, tracePath, traceId: body.id };
}

function collectUntil(ws: WebSocket, done: (message: Record<string, unknown>) => boolean): Promise<Array<Record<string, unknown>>> {
  return new Promise((resolve) => {
    const messages: Array<Record<string, unknown>> = [];
    ws.on("message", (data) => {
      const parsed: unknown = JSON.parse(data.toString());
      const message = asRecord(parsed);
      messages.push(message);
      if (done(message)) resolve(messages);
    });
  });
}

describe("server api", () => {
  it("reports health", async () => {
    const created = await createServer({ config: mergeConfig({ server: { logLevel: "silent" } }) });
    server = created;
    const response = await created.inject({ method: "GET", url: "/api/health" });
    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: "ok" });
  });

  it("opens, lists and closes trace sessions", async () => {
    const { server: app, tracePath, traceId } = await buildFixture();

    const list = await app.inject({ method: "GET", url: "/api/traces" });
    expect(list.json<{ traces: Array<{ id: string; filePath: string }> }>().traces).toMatchObject([
      { id: traceId, filePath: tracePath },
    ]);

    const info = await app.inject({ method: "GET", url: `/api/traces/${traceId}/info` });
    expect(info.json<TraceInfo>()).toMatchObject({ durationMs: 100, eventCount: 3, sampleCount: 2 });

    const closed = await app.inject({ method: "DELETE", url: `/api/traces/${traceId}` });
    expect(closed.json()).toEqual({ message: "session closed" });

    const again = await app.inject({ method: "DELETE", url: `/api/traces/${traceId}` });
    expect(again.statusCode).toBe(404);
    expect(again.json()).toEqual({ error: `unknown trace session: ${traceId}` });
  });

  it("rejects bad open requests", async () => {
    const created = await createServer({ config: mergeConfig({ server: { logLevel: "silent" } }) });
    server = created;

    const missing = await created.inject({ method: "POST", url: "/api/traces/open", payload: {} });
    expect(missing.statusCode).toBe(400);
    expect(missing.json()).toEqual({ error: "filePath is required" });

    const absent = await created.inject({
      method: "POST",
      url: "/api/traces/open",
      payload: { filePath: "/no/such/run.trace.jsonl" },
    });
    expect(absent.statusCode).toBe(400);
    expect(absent.json()).toEqual({ error: "file not found: /no/such/run.trace.jsonl" });
  });

  it("returns 404 for an unknown session", async () => {
    const { server: app } = await buildFixture();
    const response = await app.inject({ method: "GET", url: "/api/traces/missing/cpustacks" });
    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: "unknown trace session: missing" });
  });

  it("lists discovered trace files", async () => {
    const { server: app, tracePath } = await buildFixture();
    const response = await app.inject({ method: "GET", url: "/api/files" });
    expect(response.json<{ files: Array<{ path: string }> }>().files.map((file) => file.path)).toEqual([tracePath]);
  });

  it("serves CPU, event, GC and exception analyses", async () => {
    const { server: app, traceId } = await buildFixture();
    const base = `/api/traces/${traceId}`;

    const cpu = await app.inject({ method: "GET", url: `${base}/cpustacks?top=1` });
    expect(cpu.json<{ items: Array<{ name: string }> }>().items.map((item) => item.name)).toEqual(["m!Leaf()"]);

    const types = await app.inject({ method: "GET", url: `${base}/events?list=true` });
    expect(types.json<{ eventTypes: unknown[] }>().eventTypes).toHaveLength(3);

    const events = await app.inject({ method: "GET", url: `${base}/events?type=gc&limit=1` });
    expect(events.json<{ events: Array<{ eventName: string }> }>().events.map((event) => event.eventName)).toEqual([
      "GC/Start",
    ]);

    const gc = await app.inject({ method: "GET", url: `${base}/gcstats?timeline=true` });
    expect(gc.json<{ timeline: Array<{ startTimeMs: number }> }>().timeline.map((record) => record.startTimeMs)).toEqual([
      30,
    ]);

    const exceptions = await app.inject({ method: "GET", url: `${base}/exceptions` });
    expect(exceptions.json<{ summary: Record<string, number> }>().summary).toEqual({ TimeoutError: 1 });

    const badNumber = await app.inject({ method: "GET", url: `${base}/events?from=soon` });
    expect(badNumber.statusCode).toBe(400);
    expect(badNumber.json()).toEqual({ error: "invalid parameter: from must be a number" });
  });

  it("navigates the call tree", async () => {
    const { server: app, traceId } = await buildFixture();
    const base = `/api/traces/${traceId}/calltree`;

    const children = await app.inject({ method: "GET", url: `${base}/children?path=0,0` });
    expect(children.json<{ nodes: Array<{ inclusiveMs: number }> }>().nodes.map((node) => node.inclusiveMs)).toEqual([
      3, 1,
    ]);

    const hot = await app.inject({ method: "GET", url: `${base}/hotpath` });
    expect(hot.json<{ nodes: Array<{ name: string }> }>().nodes.map((node) => node.name)).toEqual(["m!Root()"]);

    const callers = await app.inject({ method: "GET", url: `${base}/callercallee?method=Mid` });
    expect(callers.json<{ focus: { name: string } }>().focus.name).toBe("m!Mid()");

    const noMethod = await app.inject({ method: "GET", url: `${base}/callercallee` });
    expect(noMethod.statusCode).toBe(400);
    expect(noMethod.json()).toEqual({ error: "invalid parameter: method is required" });

    const badPath = await app.inject({ method: "GET", url: `${base}/children?path=a` });
    expect(badPath.statusCode).toBe(400);
  });

  it("builds timelines and snapshots", async () => {
    const { server: app, traceId } = await buildFixture();
    const base = `/api/traces/${traceId}`;

    const timeline = await app.inject({ method: "GET", url: `${base}/timeline?buckets=10&lanes=events` });
    const body = timeline.json<{ bucketCount: number; lanes: Record<string, Array<{ count: number }>> }>();
    expect(body.bucketCount).toBe(10);
    expect(Object.keys(body.lanes)).toEqual(["events"]);
    expect(body.lanes.events?.[3]).toEqual({ count: 2 });

    const snapshot = await app.inject({ method: "GET", url: `${base}/snapshot?at=35&window=10` });
    expect(snapshot.json()).toMatchObject({ at: 35, windowFrom: 25, windowTo: 45, gc: { count: 1 } });

    const noInstant = await app.inject({ method: "GET", url: `${base}/snapshot` });
    expect(noInstant.statusCode).toBe(400);
  });

  it("executes ad hoc queries", async () => {
    const { server: app, traceId } = await buildFixture();
    const url = `/api/traces/${traceId}/query`;

    const aggregate = await app.inject({
      method: "POST",
      url,
      payload: { query: "aggregate", source: "events", groupBy: "eventName" },
    });
    expect(aggregate.statusCode).toBe(200);
    expect(aggregate.json<{ groups: Array<{ key: string }> }>().groups.map((group) => group.key)).toEqual([
      "GC/Start",
      "GC/Stop",
      "Exception/Start",
    ]);

    const unknown = await app.inject({ method: "POST", url, payload: { query: "bogus" } });
    expect(unknown.statusCode).toBe(400);
    expect(unknown.json()).toEqual({ error: "Unknown query type: bogus" });
  });
});

describe("server websocket", () => {
  it("streams subscribed events and ends the stream", async () => {
    const { server: app, traceId } = await buildFixture();
    await app.ready();
    const ws = await app.injectWS("/ws");
    const received = collectUntil(ws, (message) => message.type === "stream_end");
    ws.send(JSON.stringify({ type: "subscribe", traceId, channel: "events", filter: { type: "gc" } }));

    const messages = await received;
    ws.terminate();
    expect(messages.map((message) => message.type)).toEqual(["subscribed", "event", "event", "stream_end"]);
    expect(messages[1]?.data).toEqual({
      timestampMs: 30,
      provider: "Runtime",
      eventName: "GC/Start",
      processId: 1,
      threadId: 1,
    });
    expect(messages[3]).toEqual({ type: "stream_end", channel: "events" });
  });

  it("answers queries and reports unknown sessions", async () => {
    const { server: app, traceId } = await buildFixture();
    await app.ready();
    const ws = await app.injectWS("/ws");
    const received = collectUntil(ws, (message) => message.type === "error");
    ws.send(JSON.stringify({ type: "query", traceId, query: "aggregate", source: "gc", groupBy: "generation" }));
    ws.send(JSON.stringify({ type: "query", traceId: "missing", query: "aggregate" }));

    const messages = await received;
    ws.terminate();
    expect(messages[0]?.type).toBe("query_result");
    expect(asRecord(messages[0]?.data).groups).toEqual([{ key: "Gen 0", count: 1, sum: 2, avg: 2, min: 2, max: 2 }]);
    expect(messages[1]).toEqual({ type: "error", message: "unknown trace session: missing" });
  });
});
