import type { ExceptionEntry, ExceptionsResponse, RuntimeEvent } from "@perfscope/contracts";
import { exceptionMessage, exceptionType, inWindow, isExceptionThrow } from "./runtimeEvents.js";
import { containsIgnoreCase, round } from "./utils.js";

export interface ExceptionsOptions {
  type?: string;
  from?: number;
  to?: number;
  limit?: number;
}

export const DEFAULT_EXCEPTION_LIMIT = 100;

/** Throw events only; the summary counts every match, the list stops at `limit`. */
export function getExceptions(events: Iterable<RuntimeEvent>, options: ExceptionsOptions = {}): ExceptionsResponse {
  const limit = options.limit ?? DEFAULT_EXCEPTION_LIMIT;
  const exceptions: ExceptionEntry[] = [];
  const summary: Record<string, number> = {};

  for (const event of events) {
    if (!inWindow(event.timeMs, options) || !isExceptionThrow(event)) continue;
    const type = exceptionType(event);
    if (options.type && !containsIgnoreCase(type, options.type)) continue;

    summary[type] = (summary[type] ?? 0) + 1;
    if (exceptions.length < limit) {
      exceptions.push({
        timestampMs: round(event.timeMs, 3),
        type,
        message: exceptionMessage(event),
        processId: event.processId,
        threadId: event.threadId,
      });
    }
  }

  return { exceptions, summary };
}
