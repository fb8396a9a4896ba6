import type { PayloadValue, RuntimeEvent, TimeWindow } from "@perfscope/contracts";

export const EXCEPTION_THROW_EVENTS: ReadonlySet<string> = new Set([
  "Exception/Start",
  "ExceptionThrown_V1",
  "FirstChanceException",
]);
export const ALLOCATION_TICK_EVENT = "GC/AllocationTick";
export const SAMPLED_ALLOCATION_EVENT = "GC/SampledObjectAllocation";
export const JIT_START_EVENTS: ReadonlySet<string> = new Set(["Method/JittingStarted", "MethodJittingStarted"]);
export const JIT_LOAD_EVENT = "Method/LoadVerbose";
export const DEFAULT_LARGE_OBJECT_THRESHOLD_BYTES = 85_000;

export const isExceptionThrow = (event: RuntimeEvent): boolean => EXCEPTION_THROW_EVENTS.has(event.eventName);

export const isAllocation = (event: RuntimeEvent): boolean =>
  event.eventName === ALLOCATION_TICK_EVENT || event.eventName === SAMPLED_ALLOCATION_EVENT;

export const isJitStart = (event: RuntimeEvent): boolean => JIT_START_EVENTS.has(event.eventName);

export function inWindow(timeMs: number, window: Partial<TimeWindow>): boolean {
  if (window.from !== undefined && timeMs < window.from) return false;
  if (window.to !== undefined && timeMs > window.to) return false;
  return true;
}

export function payloadField(event: RuntimeEvent, name: string): PayloadValue | undefined {
  if (name in event.payload) return event.payload[name];
  const lowered = name.toLowerCase();
  for (const [key, value] of Object.entries(event.payload)) {
    if (key.toLowerCase() === lowered) return value;
  }
  return undefined;
}

/** Numbers and numeric strings; anything else is not a number. */
export function payloadNumberValue(value: PayloadValue | undefined): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value === "string" && value.trim() !== "") {
    const parsed = Number(value.trim());
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function payloadNumber(event: RuntimeEvent, name: string): number | null {
  return payloadNumberValue(payloadField(event, name));
}

export function payloadText(value: PayloadValue | undefined): string {
  if (value === null || value === undefined) return "";
  return String(value);
}

export function exceptionType(event: RuntimeEvent): string {
  const exact = payloadText(payloadField(event, "ExceptionType"));
  if (exact) return exact;
  for (const [key, value] of Object.entries(event.payload)) {
    const lowered = key.toLowerCase();
    if (!lowered.includes("type") && !lowered.includes("name")) continue;
    const text = payloadText(value);
    if (text) return text;
  }
  return "Unknown";
}

export function exceptionMessage(event: RuntimeEvent): string {
  for (const [key, value] of Object.entries(event.payload)) {
    if (key.toLowerCase().includes("message")) return payloadText(value);
  }
  return "";
}

export interface AllocationRecord {
  typeName: string;
  sizeBytes: number;
  isLargeObject: boolean;
}

function present(value: PayloadValue | undefined): value is PayloadValue {
  return value !== undefined && value !== null;
}

function sizeFieldOf(event: RuntimeEvent): PayloadValue | undefined {
  if (event.eventName === ALLOCATION_TICK_EVENT) {
    const amount64 = payloadField(event, "AllocationAmount64");
    return present(amount64) ? amount64 : payloadField(event, "AllocationAmount");
  }
  if (event.eventName === SAMPLED_ALLOCATION_EVENT) return payloadField(event, "TotalSizeForTypeSample");
  return undefined;
}

/**
 * Byte size carried by an allocation event: null when no size field is
 * present, "malformed" when one is present but is not a number.
 */
export function allocationSizeOf(event: RuntimeEvent): number | null | "malformed" {
  const field = sizeFieldOf(event);
  if (!present(field)) return null;
  return payloadNumberValue(field) ?? "malformed";
}

/**
 * Reads one allocation event. Returns null when the type name is missing
 * or the size is absent, unparseable or not positive.
 */
export function allocationOf(
  event: RuntimeEvent,
  largeObjectThresholdBytes: number = DEFAULT_LARGE_OBJECT_THRESHOLD_BYTES,
): AllocationRecord | null {
  if (!isAllocation(event)) return null;
  const typeName = payloadText(payloadField(event, "TypeName"));
  const size = allocationSizeOf(event);
  if (!typeName || typeof size !== "number" || size <= 0) return null;

  const kind = event.eventName === ALLOCATION_TICK_EVENT ? payloadField(event, "AllocationKind") : undefined;
  const isLargeObject = present(kind) ? payloadNumberValue(kind) === 1 : size > largeObjectThresholdBytes;
  return { typeName, sizeBytes: size, isLargeObject };
}

/** `name=value` pairs joined with ", ", skipping empty values. */
export function eventMessage(event: RuntimeEvent): string {
  const parts: string[] = [];
  for (const [key, value] of Object.entries(event.payload)) {
    const text = payloadText(value);
    if (text) parts.push(`${key}=${text}`);
  }
  return parts.join(", ");
}

export function payloadStrings(event: RuntimeEvent): Record<string, string> | null {
  const result: Record<string, string> = {};
  let count = 0;
  for (const [key, value] of Object.entries(event.payload)) {
    if (value === null) continue;
    result[key] = String(value);
    count += 1;
  }
  return count > 0 ? result : null;
}
