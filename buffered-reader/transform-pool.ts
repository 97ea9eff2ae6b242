import type { Operation } from "effection";
import { toError, TransformError } from "./errors.ts";
import { log } from "./logger.ts";
import type { BoundedQueue } from "./queue.ts";
import type { PipelineState } from "./state.ts";
import { useTaskBuffer } from "./task-buffer.ts";
import type {
  LineChunk,
  Outcome,
  ResultChunk,
  Transform,
} from "./types.ts";

export interface TransformPoolOptions<T> {
  /**
   * The most chunks transformed at the same time.
   */
  concurrency: number;
  transform: Transform<T>;
  state: PipelineState;
}

/**
 * Apply `transform` to every line of a chunk, in order, and produce the
 * chunk's result.
 *
 * The first line that fails ends the chunk: the values kept before it are
 * returned together with a {@link TransformError}. Otherwise the result
 * carries whatever error the line chunk carried.
 */
export function* transformChunk<T>(
  chunk: LineChunk,
  transform: Transform<T>,
): Operation<ResultChunk<T>> {
  const { sequence } = chunk;
  const data: T[] = [];

  for (const [index, line] of chunk.lines.entries()) {
    let outcome: Outcome<T>;
    try {
      outcome = yield* transform(line);
    } catch (error) {
      outcome = { type: "fail", error: toError(error) };
    }

    switch (outcome.type) {
      case "keep":
        data.push(outcome.value);
        break;
      case "skip":
        break;
      case "fail":
        return {
          sequence,
          data,
          error: new TransformError(outcome.error, sequence, index),
        };
    }
  }

  return chunk.error ? { sequence, data, error: chunk.error } : { sequence, data };
}

/**
 * Pull line chunks from `input` and transform each one in its own task,
 * never more than `concurrency` at once, sending one result per chunk to
 * `output` in whatever order they complete.
 *
 * The first chunk whose result carries an error fails the pipeline. From
 * then on no further chunks are pulled, and `input` is closed so that the
 * reader stops. Chunks already being transformed still complete. `output`
 * is closed once every admitted chunk has been sent.
 */
export function* transformChunks<T>(
  input: BoundedQueue<LineChunk>,
  output: BoundedQueue<ResultChunk<T>>,
  options: TransformPoolOptions<T>,
): Operation<void> {
  const { transform, state } = options;

  try {
    const pool = yield* useTaskBuffer(options.concurrency);

    while (!state.error) {
      const next = yield* input.next();
      if (next.done) {
        break;
      }
      const chunk = next.value;

      yield* pool.spawn(function* () {
        const result = yield* transformChunk(chunk, transform);
        if (result.error && state.fail(result.error)) {
          yield* log.debug(
            `chunk ${result.sequence} ended the pipeline: ${result.error.message}`,
          );
          input.close();
        }
        if (!(yield* output.send(result))) {
          yield* log.warn(
            `result of chunk ${result.sequence} discarded after the collector stopped`,
          );
        }
      });
    }

    yield* pool;
  } finally {
    input.close();
    output.close();
  }
}
