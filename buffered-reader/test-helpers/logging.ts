import type { Operation } from "effection";
import { loggerApi } from "../logger.ts";

export interface LogEvent {
  level: "info" | "debug" | "warn" | "error";
  message: string;
  args: unknown[];
}

/**
 * Record every message logged in the current scope instead of printing it.
 */
export function* captureLogs(): Operation<LogEvent[]> {
  const events: LogEvent[] = [];

  yield* loggerApi.around({
    *info([message, ...args]) {
      events.push({ level: "info", message, args });
    },
    *debug([message, ...args]) {
      events.push({ level: "debug", message, args });
    },
    *warn([message, ...args]) {
      events.push({ level: "warn", message, args });
    },
    *error([message, ...args]) {
      events.push({ level: "error", message, args });
    },
  });

  return events;
}
