import type { Operation } from "effection";

/**
 * A run of consecutive lines read from the source, numbered in the order it
 * was read. Sequence numbers start at 0 and have no gaps.
 */
export interface LineChunk {
  readonly sequence: number;
  readonly lines: readonly string[];
  /**
   * Set on the final chunk when reading stopped because the source failed or
   * because the reader was cancelled.
   */
  readonly error?: Error;
}

/**
 * The transformed values of one {@link LineChunk}. Values appear in the
 * order of the lines they came from; skipped lines contribute nothing.
 */
export interface ResultChunk<T> {
  readonly sequence: number;
  readonly data: readonly T[];
  /**
   * The terminal condition of the pipeline, if this chunk reports one.
   * Consumers must check it on every chunk.
   */
  readonly error?: Error;
}

/**
 * What the transform decided for a single line.
 */
export type Outcome<T> =
  | { readonly type: "keep"; readonly value: T }
  | { readonly type: "skip" }
  | { readonly type: "fail"; readonly error: Error };

/**
 * Applied to every line, in order within a chunk. Throwing is the same as
 * returning a `fail` outcome.
 */
export type Transform<T> = (line: string) => Operation<Outcome<T>>;

export type PipelineStatus = "running" | "draining" | "finished";

/**
 * How the collector delivers a chunk that carries an error.
 *
 * - `immediate`: as soon as it arrives, after the ordered prefix delivered
 *   so far.
 * - `ordered`: after every lower-numbered chunk has been delivered.
 *
 * A cancellation is delivered as `ordered` in both modes.
 */
export type ErrorDelivery = "immediate" | "ordered";
