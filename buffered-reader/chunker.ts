import {
  type Operation,
  scoped,
  type Stream,
  type Subscription,
} from "effection";
import type { Cancellation } from "./cancellation.ts";
import { ErrorCancelled, SourceReadError } from "./errors.ts";
import { log } from "./logger.ts";
import type { BoundedQueue } from "./queue.ts";
import type { PipelineState } from "./state.ts";
import type { LineChunk } from "./types.ts";

export interface ChunkerOptions {
  chunkSize: number;
  cancellation: Cancellation;
  state: PipelineState;
  output: BoundedQueue<LineChunk>;
}

/**
 * Read `source` one line at a time and send it to `output` in chunks of
 * `chunkSize` lines, numbered from 0.
 *
 * The last chunk holds whatever was read after the last full chunk, which
 * may be nothing. It carries a {@link SourceReadError} when the source
 * failed, or the cancellation error when the reader was cancelled before a
 * read. Reading also stops, without a final chunk, as soon as `output` no
 * longer accepts chunks.
 *
 * The source is subscribed to inside this operation and released before it
 * returns, on every path. `output` is closed when it returns.
 *
 * @returns the number of chunks sent
 */
export function* chunkLines(
  source: Stream<string, void>,
  options: ChunkerOptions,
): Operation<number> {
  const { cancellation, state, output } = options;
  const chunkSize = Math.max(1, Math.floor(options.chunkSize));
  let sequence = 0;
  let sent = 0;
  let buffer: string[] = [];

  function* emit(error?: Error): Operation<boolean> {
    const chunk: LineChunk = error
      ? { sequence, lines: buffer, error }
      : { sequence, lines: buffer };
    sequence++;
    buffer = [];
    const accepted = yield* output.send(chunk);
    if (accepted) {
      sent++;
      yield* log.debug(
        `chunker emitted chunk ${chunk.sequence} (${chunk.lines.length} lines)`,
      );
    } else {
      yield* log.debug(
        `chunker stopped: chunk ${chunk.sequence} was refused downstream`,
      );
    }
    return accepted;
  }

  try {
    return yield* scoped(function* () {
      let subscription: Subscription<string, void>;
      try {
        subscription = yield* source;
      } catch (error) {
        yield* emit(new SourceReadError(error));
        return sent;
      }

      while (true) {
        if (cancellation.isCancelled()) {
          yield* log.debug(`chunker observed cancellation at chunk ${sequence}`);
          yield* emit(ErrorCancelled);
          return sent;
        }

        let next: IteratorResult<string, void>;
        try {
          next = yield* subscription.next();
        } catch (error) {
          yield* emit(new SourceReadError(error));
          return sent;
        }

        if (next.done) {
          yield* emit();
          return sent;
        }

        buffer.push(next.value);
        if (buffer.length >= chunkSize && !(yield* emit())) {
          return sent;
        }
      }
    });
  } finally {
    state.drain();
    output.close();
  }
}
