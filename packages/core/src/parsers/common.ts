import type { PayloadValue, RuntimeEvent, StackSample } from "@perfscope/contracts";
import { asArray, asPayloadValue, asRecord, asString, toFiniteNumber } from "../utils.js";

export interface TraceMeta {
  durationMs?: number;
  processes: Array<{ processId: number; name: string }>;
}

export function parseJsonLines(text: string): { rows: Array<Record<string, unknown>>; skipped: number } {
  const rows: Array<Record<string, unknown>> = [];
  let skipped = 0;
  for (const line of text.split(/\r?\n/)) {
    const trimmed = line.trim();
    if (!trimmed) continue;
    try {
      const parsed: unknown = JSON.parse(trimmed);
      if (parsed && typeof parsed === "object" && !Array.isArray(parsed)) {
        rows.push(asRecord(parsed));
      } else {
        skipped += 1;
      }
    } catch {
      // skip invalid line
      skipped += 1;
    }
  }
  return { rows, skipped };
}

function toInteger(value: unknown, fallback: number): number {
  const parsed = toFiniteNumber(value);
  return parsed === null ? fallback : Math.trunc(parsed);
}

export function toRuntimeEvent(value: Record<string, unknown>): RuntimeEvent | null {
  const timeMs = toFiniteNumber(value.timeMs);
  const eventName = asString(value.eventName);
  if (timeMs === null || !eventName) return null;

  const payload: Record<string, PayloadValue> = {};
  for (const [key, field] of Object.entries(asRecord(value.payload))) {
    payload[key] = asPayloadValue(field);
  }

  return {
    timeMs,
    provider: asString(value.provider),
    eventName,
    processId: toInteger(value.processId, 0),
    threadId: toInteger(value.threadId, 0),
    payload,
  };
}

export function toStackSample(value: Record<string, unknown>): StackSample | null {
  const timeMs = toFiniteNumber(value.timeMs);
  if (timeMs === null || !Array.isArray(value.frames)) return null;
  const sample: StackSample = {
    timeMs,
    metric: toFiniteNumber(value.metric) ?? 1,
    frames: asArray(value.frames).map((frame) => (typeof frame === "string" ? frame : asString(frame))),
  };
  const processId = toFiniteNumber(value.processId);
  if (processId !== null) sample.processId = Math.trunc(processId);
  const threadId = toFiniteNumber(value.threadId);
  if (threadId !== null) sample.threadId = Math.trunc(threadId);
  return sample;
}

export function toTraceMeta(value: Record<string, unknown>): TraceMeta {
  const processes = asArray(value.processes)
    .map((item) => asRecord(item))
    .filter((item) => toFiniteNumber(item.processId) !== null)
    .map((item) => ({
      processId: toInteger(item.processId, 0),
      name: asString(item.name) || `Process(${toInteger(item.processId, 0)})`,
    }));
  const durationMs = toFiniteNumber(value.durationMs);
  return durationMs !== null ? { durationMs, processes } : { processes };
}
