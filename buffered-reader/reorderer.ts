import { Map } from "immutable";
import type { Operation } from "effection";
import { isCancellation } from "./errors.ts";
import { log } from "./logger.ts";
import type { BoundedQueue } from "./queue.ts";
import type { PipelineState } from "./state.ts";
import type { ErrorDelivery, ResultChunk } from "./types.ts";

export interface CollectorOptions {
  state: PipelineState;
  delivery: ErrorDelivery;
}

/**
 * Receive results in completion order and send them to `output` in sequence
 * order, starting at 0, with no gaps.
 *
 * Results that arrive ahead of their turn wait in a side buffer. A result
 * that carries an error ends collection: it is delivered according to
 * `delivery`, results numbered after it are discarded, and `results` is
 * closed so that nothing more is sent to it. A cancellation is always
 * delivered in order, after every result before it, since those hold lines
 * that were already read. Without an error, collection
 * ends when `results` closes; anything left in the side buffer is then sent
 * in ascending order.
 *
 * The collector owns `output`: it closes it exactly once, and then marks
 * the pipeline finished.
 */
export function* collectInOrder<T>(
  results: BoundedQueue<ResultChunk<T>>,
  output: BoundedQueue<ResultChunk<T>>,
  options: CollectorOptions,
): Operation<void> {
  const { state, delivery } = options;
  let expected = 0;
  let pending = Map<number, ResultChunk<T>>();
  let terminal: ResultChunk<T> | undefined;

  function* forward(chunk: ResultChunk<T>): Operation<void> {
    yield* output.send(chunk);
    expected = chunk.sequence + 1;
    let next = pending.get(expected);
    while (next) {
      pending = pending.delete(expected);
      yield* output.send(next);
      expected = next.sequence + 1;
      next = pending.get(expected);
    }
  }

  try {
    while (!terminal || expected < terminal.sequence) {
      const next = yield* results.next();
      if (next.done) {
        break;
      }
      const chunk = next.value;

      if (chunk.error) {
        if (delivery === "immediate" && !isCancellation(chunk.error)) {
          terminal = chunk;
          break;
        }
        if (!terminal || chunk.sequence < terminal.sequence) {
          terminal = chunk;
          const limit = chunk.sequence;
          pending = pending.filter((_, sequence) => sequence < limit);
        }
      } else if (terminal && chunk.sequence > terminal.sequence) {
        yield* log.debug(`discarding chunk ${chunk.sequence} after the error`);
      } else if (chunk.sequence === expected) {
        yield* forward(chunk);
      } else {
        pending = pending.set(chunk.sequence, chunk);
      }
    }

    state.drain();
    results.close();

    if (terminal) {
      if (pending.size > 0) {
        yield* log.warn(
          `discarding ${pending.size} chunk(s) that arrived ahead of chunk ${terminal.sequence}`,
        );
      }
      yield* log.debug(
        `collector delivering terminal chunk ${terminal.sequence}: ${terminal.error?.message}`,
      );
      yield* output.send(terminal);
    } else {
      if (pending.size > 0) {
        yield* log.warn(
          `flushing ${pending.size} chunk(s) left waiting for chunk ${expected}`,
        );
      }
      for (const chunk of pending.sortBy((_, sequence) => sequence).values()) {
        yield* output.send(chunk);
      }
      yield* log.debug(`collector reached the end after chunk ${expected - 1}`);
    }
  } finally {
    output.close();
    state.finish();
  }
}
