import {
  each,
  type Operation,
  resource,
  scoped,
  spawn,
  type Stream,
} from "effection";
import { readLines } from "@ordered-lines/line-source";
import { createCancellation } from "./cancellation.ts";
import { chunkLines } from "./chunker.ts";
import {
  type ReaderOptions,
  resolveOptions,
  type ResolvedReaderOptions,
} from "./config.ts";
import { log, namespace } from "./logger.ts";
import { createBoundedQueue } from "./queue.ts";
import { collectInOrder } from "./reorderer.ts";
import { createPipelineState } from "./state.ts";
import { transformChunks } from "./transform-pool.ts";
import type {
  LineChunk,
  PipelineStatus,
  ResultChunk,
  Transform,
} from "./types.ts";

/**
 * The consumer's side of a running pipeline. Iterating it (with `each()`,
 * `next()` or `poll()`) yields result chunks in the order their lines were
 * read; the sequence ends when the pipeline has finished.
 */
export interface BufferedReader<T> extends Stream<ResultChunk<T>, void> {
  readonly options: ResolvedReaderOptions;
  readonly status: PipelineStatus;
  /**
   * Resolves once the last chunk has been handed to the output.
   */
  readonly finished: Operation<void>;
  /**
   * Wait for the next chunk.
   */
  next(): Operation<IteratorResult<ResultChunk<T>, void>>;
  /**
   * Take the next chunk if one is ready. Returns `undefined` when none is,
   * and the done result once the pipeline has finished and every chunk has
   * been taken.
   */
  poll(): IteratorResult<ResultChunk<T>, void> | undefined;
  /**
   * Stop reading. Lines already read are still transformed and delivered,
   * ending with a chunk that carries `ErrorCancelled`. Transforms in
   * progress are not interrupted, so a transform that never returns holds
   * up the end of the pipeline. Calling it again, or after the pipeline has
   * finished, does nothing.
   */
  cancel(): void;
}

/**
 * Start a pipeline that reads `source`, applies `transform` to every line
 * with up to `bufferSize` chunks in flight, and delivers the results in
 * order.
 *
 * The pipeline runs for as long as the scope that created the reader. When
 * that scope exits, every stage is halted and the source is released.
 *
 * @example
 * ```ts
 * import { each } from "effection";
 * import { linesOf } from "@ordered-lines/line-source";
 * import { trimNewline, useBufferedReader } from "@ordered-lines/buffered-reader";
 *
 * const reader = yield* useBufferedReader(linesOf(["a\n", "b\n"]), trimNewline);
 * for (const chunk of yield* each(reader)) {
 *   if (chunk.error) throw chunk.error;
 *   console.log(chunk.data);
 *   yield* each.next();
 * }
 * ```
 */
export function useBufferedReader<T>(
  source: Stream<string, void>,
  transform: Transform<T>,
  options: ReaderOptions = {},
): Operation<BufferedReader<T>> {
  return resource<BufferedReader<T>>(function* (provide) {
    const resolved = resolveOptions(options);
    yield* namespace("buffered-reader");
    const { bufferSize, chunkSize, errorDelivery } = resolved;

    const state = yield* createPipelineState();
    const cancellation = createCancellation();
    const lineChunks = createBoundedQueue<LineChunk>(bufferSize);
    const results = createBoundedQueue<ResultChunk<T>>(bufferSize);
    const output = createBoundedQueue<ResultChunk<T>>(bufferSize);

    yield* log.debug(
      `starting with chunk size ${chunkSize} and buffer size ${bufferSize}`,
    );

    yield* spawn(() =>
      chunkLines(source, {
        chunkSize,
        cancellation,
        state,
        output: lineChunks,
      })
    );
    yield* spawn(() =>
      transformChunks(lineChunks, results, {
        concurrency: bufferSize,
        transform,
        state,
      })
    );
    yield* spawn(() =>
      collectInOrder(results, output, { state, delivery: errorDelivery })
    );

    yield* provide({
      options: resolved,
      get status() {
        return state.status;
      },
      finished: state.finished,
      next: () => output.next(),
      poll: () => output.poll(),
      cancel() {
        if (state.status !== "finished") {
          cancellation.cancel();
        }
      },
      *[Symbol.iterator]() {
        return output;
      },
    });
  });
}

/**
 * Open `path` with `readLines()` and start a pipeline over its lines.
 */
export function readFile<T>(
  path: string,
  transform: Transform<T>,
  options: ReaderOptions = {},
): Operation<BufferedReader<T>> {
  return useBufferedReader(readLines(path), transform, options);
}

/**
 * Run a pipeline to the end and return every chunk it delivered, the
 * terminal chunk included.
 */
export function readChunks<T>(
  source: Stream<string, void>,
  transform: Transform<T>,
  options: ReaderOptions = {},
): Operation<ResultChunk<T>[]> {
  return scoped(function* () {
    const reader = yield* useBufferedReader(source, transform, options);
    const chunks: ResultChunk<T>[] = [];
    for (const chunk of yield* each(reader)) {
      chunks.push(chunk);
      yield* each.next();
    }
    return chunks;
  });
}
