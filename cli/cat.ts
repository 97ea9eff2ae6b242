import { each, type Operation, scoped } from "effection";
import {
  isCancellation,
  keep,
  log,
  type Outcome,
  readFile,
  skip,
  type Transform,
} from "@ordered-lines/buffered-reader";
import type { CatOptions } from "./parse-args.ts";

export interface CatResult {
  /** lines written */
  lines: number;
  /** chunks received from the reader */
  chunks: number;
  /** the error that ended reading early, other than a cancellation */
  error?: Error;
}

export function lineTransform(
  options: Pick<CatOptions, "raw" | "strip">,
): Transform<string> {
  return function* (line): Operation<Outcome<string>> {
    const text = line.replace(/\n+$/, "");
    if (options.strip && (text.trim() === "" || text.startsWith("#"))) {
      return skip();
    }
    return keep(options.raw ? line : `${text}\n`);
  };
}

/**
 * Read `options.file` through the pipeline and pass every resulting line to
 * `write`, in file order. With a limit, the reader is cancelled as soon as
 * that many lines have been written.
 */
export function cat(
  options: CatOptions,
  write: (text: string) => void,
): Operation<CatResult> {
  return scoped(function* () {
    const reader = yield* readFile(options.file, lineTransform(options), {
      bufferSize: options.bufferSize,
      chunkSize: options.chunkSize,
    });
    const { limit } = options;
    const result: CatResult = { lines: 0, chunks: 0 };

    for (const chunk of yield* each(reader)) {
      result.chunks++;
      for (const text of chunk.data) {
        if (limit !== undefined && result.lines >= limit) {
          break;
        }
        write(text);
        result.lines++;
      }
      if (limit !== undefined && result.lines >= limit) {
        reader.cancel();
      }
      if (chunk.error && !isCancellation(chunk.error)) {
        result.error = chunk.error;
      }
      yield* each.next();
    }

    yield* log.debug(
      `wrote ${result.lines} line(s) from ${result.chunks} chunk(s)`,
    );
    return result;
  });
}
