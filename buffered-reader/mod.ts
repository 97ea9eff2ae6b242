export * from "./types.ts";
export * from "./errors.ts";
export * from "./transform.ts";
export * from "./config.ts";
export * from "./queue.ts";
export * from "./cancellation.ts";
export * from "./state.ts";
export * from "./task-buffer.ts";
export * from "./chunker.ts";
export * from "./transform-pool.ts";
export * from "./reorderer.ts";
export * from "./buffered-reader.ts";
export {
  log,
  type Logger,
  loggerApi,
  type LogLevel,
  namespace,
  verboseLogging,
} from "./logger.ts";
