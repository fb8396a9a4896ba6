import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import type {
  EventTypeEntry,
  EventsListResponse,
  EventsResponse,
  RuntimeEvent,
  StreamedEvent,
  TraceEventEntry,
} from "@perfscope/contracts";
import { eventMessage, inWindow, payloadStrings } from "./runtimeEvents.js";
import { containsIgnoreCase, round } from "./utils.js";

export interface EventTypesOptions {
  provider?: string;
  from?: number;
  to?: number;
}

export function getEventTypes(events: Iterable<RuntimeEvent>, options: EventTypesOptions = {}): EventsListResponse {
  const counts = new Map<string, EventTypeEntry>();
  for (const event of events) {
    if (!inWindow(event.timeMs, options)) continue;
    if (options.provider && !containsIgnoreCase(event.provider, options.provider)) continue;
    const key = `${event.provider}/${event.eventName}`;
    const entry = counts.get(key);
    if (entry) {
      entry.count += 1;
    } else {
      counts.set(key, { provider: event.provider, eventName: event.eventName, count: 1 });
    }
  }
  return { eventTypes: Array.from(counts.values()).sort((a, b) => b.count - a.count) };
}

export interface EventFilter {
  type?: string;
  provider?: string;
  from?: number;
  to?: number;
  pid?: number;
  tid?: number;
  payload?: string;
}

export interface EventsOptions extends EventFilter {
  limit?: number;
}

export const DEFAULT_EVENT_LIMIT = 100;

export function matchesEventFilter(event: RuntimeEvent, filter: EventFilter): boolean {
  if (!inWindow(event.timeMs, filter)) return false;
  if (filter.type && !containsIgnoreCase(event.eventName, filter.type)) return false;
  if (filter.provider && !containsIgnoreCase(event.provider, filter.provider)) return false;
  if (filter.pid !== undefined && event.processId !== filter.pid) return false;
  if (filter.tid !== undefined && event.threadId !== filter.tid) return false;
  if (filter.payload) {
    const needle = filter.payload;
    const inMessage = containsIgnoreCase(eventMessage(event), needle);
    const inValues = Object.values(event.payload).some(
      (value) => value !== null && containsIgnoreCase(String(value), needle),
    );
    if (!inMessage && !inValues) return false;
  }
  return true;
}

export function toEventEntry(event: RuntimeEvent): TraceEventEntry {
  return {
    timestampMs: round(event.timeMs, 3),
    provider: event.provider,
    eventName: event.eventName,
    processId: event.processId,
    threadId: event.threadId,
    message: eventMessage(event),
    payload: payloadStrings(event),
  };
}

export function getEvents(events: Iterable<RuntimeEvent>, options: EventsOptions = {}): EventsResponse {
  const limit = options.limit ?? DEFAULT_EVENT_LIMIT;
  const result: TraceEventEntry[] = [];
  if (limit <= 0) return { events: result };
  for (const event of events) {
    if (!matchesEventFilter(event, options)) continue;
    result.push(toEventEntry(event));
    if (result.length >= limit) break;
  }
  return { events: result };
}

export const EXPORT_CHUNK_SIZE = 1000;

export interface ExportSink {
  event(event: StreamedEvent): void;
  progress(sent: number): void;
}

export interface ExportResult {
  sent: number;
  cancelled: boolean;
}

/**
 * Streams every matching event to `sink`. After each chunk it reports
 * progress, yields to the event loop and stops quietly once `signal` aborts.
 */
export async function exportEvents(
  events: Iterable<RuntimeEvent>,
  filter: EventFilter,
  sink: ExportSink,
  signal?: AbortSignal,
): Promise<ExportResult> {
  let sent = 0;
  for (const event of events) {
    if (signal?.aborted) return { sent, cancelled: true };
    if (!matchesEventFilter(event, filter)) continue;
    sink.event({
      timestampMs: round(event.timeMs, 3),
      provider: event.provider,
      eventName: event.eventName,
      processId: event.processId,
      threadId: event.threadId,
    });
    sent += 1;
    if (sent % EXPORT_CHUNK_SIZE === 0) {
      sink.progress(sent);
      await yieldToEventLoop();
    }
  }
  return { sent, cancelled: signal?.aborted ?? false };
}
