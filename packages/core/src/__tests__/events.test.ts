import type { StreamedEvent } from "@perfscope/contracts";
import { describe, expect, it } from "vitest";
import { EXPORT_CHUNK_SIZE, exportEvents, getEventTypes, getEvents } from "../events.js";
import { event } from "./helpers.js";

const events = [
  event(1, "GC/Start", { Count: 1, Reason: "AllocSmall" }, { provider: "Runtime" }),
  event(2, "GC/Stop", {}, { provider: "Runtime" }),
  event(3, "GC/Start", { Count: 2, Note: null }, { provider: "Runtime", threadId: 7 }),
  event(4, "Request/Begin", { Url: "/orders" }, { provider: "App", processId: 2 }),
];

describe("getEventTypes", () => {
  it("counts provider and event name pairs, most frequent first", () => {
    expect(getEventTypes(events).eventTypes).toEqual([
      { provider: "Runtime", eventName: "GC/Start", count: 2 },
      { provider: "Runtime", eventName: "GC/Stop", count: 1 },
      { provider: "App", eventName: "Request/Begin", count: 1 },
    ]);
  });

  it("applies provider and window filters", () => {
    expect(getEventTypes(events, { provider: "app" }).eventTypes).toEqual([
      { provider: "App", eventName: "Request/Begin", count: 1 },
    ]);
    expect(getEventTypes(events, { from: 2, to: 3 }).eventTypes.map((entry) => entry.count)).toEqual([1, 1]);
  });
});

describe("getEvents", () => {
  it("builds the message from non-empty payload values", () => {
    const [first, , third] = getEvents(events).events;
    expect(first).toEqual({
      timestampMs: 1,
      provider: "Runtime",
      eventName: "GC/Start",
      processId: 1,
      threadId: 1,
      message: "Count=1, Reason=AllocSmall",
      payload: { Count: "1", Reason: "AllocSmall" },
    });
    expect(third?.message).toBe("Count=2");
    expect(third?.payload).toEqual({ Count: "2" });
  });

  it("reports a null payload when the event has no values", () => {
    expect(getEvents(events, { type: "stop" }).events[0]?.payload).toBeNull();
  });

  it("filters by type, pid, tid and payload text and honours the limit", () => {
    expect(getEvents(events, { type: "gc/start" }).events).toHaveLength(2);
    expect(getEvents(events, { pid: 2 }).events.map((entry) => entry.eventName)).toEqual(["Request/Begin"]);
    expect(getEvents(events, { tid: 7 }).events.map((entry) => entry.timestampMs)).toEqual([3]);
    expect(getEvents(events, { payload: "ORDERS" }).events.map((entry) => entry.timestampMs)).toEqual([4]);
    expect(getEvents(events, { limit: 1 }).events).toHaveLength(1);
    expect(getEvents(events, { limit: 0 }).events).toEqual([]);
  });
});

describe("exportEvents", () => {
  const many = Array.from({ length: 2500 }, (_, index) => event(index, "Tick"));

  it("streams every match and reports progress after each full chunk", async () => {
    const received: StreamedEvent[] = [];
    const progress: number[] = [];
    const result = await exportEvents(many, {}, {
      event: (streamed) => received.push(streamed),
      progress: (sent) => progress.push(sent),
    });

    expect(result).toEqual({ sent: 2500, cancelled: false });
    expect(received).toHaveLength(2500);
    expect(received[0]).toEqual({ timestampMs: 0, provider: "Test-Runtime", eventName: "Tick", processId: 1, threadId: 1 });
    expect(progress).toEqual([EXPORT_CHUNK_SIZE, 2 * EXPORT_CHUNK_SIZE]);
  });

  it("stops at the next chunk boundary once aborted", async () => {
    const controller = new AbortController();
    let received = 0;
    const result = await exportEvents(
      many,
      {},
      {
        event: () => {
          received += 1;
        },
        progress: () => controller.abort(),
      },
      controller.signal,
    );

    expect(result).toEqual({ sent: 1000, cancelled: true });
    expect(received).toBe(1000);
  });

  it("sends nothing when already aborted", async () => {
    const controller = new AbortController();
    controller.abort();
    const result = await exportEvents(many, {}, { event: () => undefined, progress: () => undefined }, controller.signal);
    expect(result).toEqual({ sent: 0, cancelled: true });
  });
});
