import type { Operation } from "effection";
import { createApi } from "@effectionx/context-api";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type Logger = Record<
  LogLevel,
  (message: string, ...args: unknown[]) => Operation<void>
>;

const labels: Record<LogLevel, string> = {
  debug: "\x1b[90m[DEBUG]\x1b[0m",
  info: "\x1b[34m[INFO]\x1b[0m",
  warn: "\x1b[33m[WARN]\x1b[0m",
  error: "\x1b[31m[ERROR]\x1b[0m",
};

function print(level: LogLevel, message: string, args: unknown[]): void {
  const write = level === "info" || level === "debug"
    ? console.log
    : console.error;
  write(`${labels[level]} ${message}`, ...args);
}

// the pipeline reports progress at debug and discarded chunks at warn;
// both are dropped unless verboseLogging(true) is in effect
const consoleLogger: Logger = {
  *debug() {},
  *info(message, ...args) {
    print("info", message, args);
  },
  *warn() {},
  *error(message, ...args) {
    print("error", message, args);
  },
};

export const loggerApi = createApi("logger", consoleLogger);
export const log = loggerApi.operations;

/**
 * Print the pipeline's `debug` and `warn` messages in the current scope.
 */
export function* verboseLogging(verbose: boolean): Operation<void> {
  if (!verbose) {
    return;
  }
  yield* loggerApi.around({
    *debug([message, ...args]) {
      print("debug", message, args);
    },
    *info(args, next) {
      yield* next(...args);
    },
    *warn([message, ...args]) {
      print("warn", message, args);
    },
    *error(args, next) {
      yield* next(...args);
    },
  });
}

/**
 * Label every message logged in the current scope with `[name]`. Each
 * reader labels its own messages `[buffered-reader]`.
 */
export function* namespace(name: string): Operation<void> {
  const label = (message: string) => `[${name}] ${message}`;
  yield* loggerApi.around({
    *debug([message, ...args], next) {
      yield* next(label(message), ...args);
    },
    *info([message, ...args], next) {
      yield* next(label(message), ...args);
    },
    *warn([message, ...args], next) {
      yield* next(label(message), ...args);
    },
    *error([message, ...args], next) {
      yield* next(label(message), ...args);
    },
  });
}
