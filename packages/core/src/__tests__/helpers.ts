import type { PayloadValue, RuntimeEvent, StackSample } from "@perfscope/contracts";

export function event(
  timeMs: number,
  eventName: string,
  payload: Record<string, PayloadValue> = {},
  overrides: Partial<Omit<RuntimeEvent, "timeMs" | "eventName" | "payload">> = {},
): RuntimeEvent {
  return {
    timeMs,
    provider: overrides.provider ?? "Test-Runtime",
    eventName,
    processId: overrides.processId ?? 1,
    threadId: overrides.threadId ?? 1,
    payload,
  };
}

export function sample(timeMs: number, frames: string[], metric = 1, processId?: number): StackSample {
  return processId === undefined ? { timeMs, metric, frames } : { timeMs, metric, frames, processId };
}
