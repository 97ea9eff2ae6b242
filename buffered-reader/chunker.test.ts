import { sleep, spawn, type Stream } from "effection";
import { expect } from "expect";
import { beforeEach, describe, it } from "@ordered-lines/bdd";
import { type Cancellation, createCancellation } from "./cancellation.ts";
import { chunkLines } from "./chunker.ts";
import { ErrorCancelled, SourceReadError } from "./errors.ts";
import { type BoundedQueue, createBoundedQueue } from "./queue.ts";
import { createPipelineState, type PipelineState } from "./state.ts";
import { captureLogs } from "./test-helpers/logging.ts";
import { trackedSource } from "./test-helpers/sources.ts";
import type { LineChunk } from "./types.ts";

function drain<T>(queue: BoundedQueue<T>): T[] {
  const items: T[] = [];
  for (let next = queue.poll(); next && !next.done; next = queue.poll()) {
    items.push(next.value);
  }
  return items;
}

describe("chunkLines", () => {
  let state: PipelineState;
  let cancellation: Cancellation;
  let output: BoundedQueue<LineChunk>;

  beforeEach(function* () {
    state = yield* createPipelineState();
    cancellation = createCancellation();
    output = createBoundedQueue<LineChunk>(10);
  });

  it("groups lines into numbered chunks", function* () {
    const source = trackedSource(["a\n", "b\n", "c\n"]);

    const sent = yield* chunkLines(source, {
      chunkSize: 2,
      cancellation,
      state,
      output,
    });

    expect(sent).toEqual(2);
    expect(drain(output)).toEqual([
      { sequence: 0, lines: ["a\n", "b\n"] },
      { sequence: 1, lines: ["c\n"] },
    ]);
    expect(output.closed).toEqual(true);
    expect(state.status).toEqual("draining");
    expect(source.closed).toEqual(1);
  });

  it("ends with an empty chunk when the lines divide evenly", function* () {
    const source = trackedSource(["a\n", "b\n", "c\n", "d\n"]);

    yield* chunkLines(source, { chunkSize: 2, cancellation, state, output });

    expect(drain(output)).toEqual([
      { sequence: 0, lines: ["a\n", "b\n"] },
      { sequence: 1, lines: ["c\n", "d\n"] },
      { sequence: 2, lines: [] },
    ]);
  });

  it("sends a single empty chunk for an empty source", function* () {
    yield* chunkLines(trackedSource([]), {
      chunkSize: 3,
      cancellation,
      state,
      output,
    });

    expect(drain(output)).toEqual([{ sequence: 0, lines: [] }]);
  });

  it("reads nothing once cancelled", function* () {
    const source = trackedSource(["a\n", "b\n"]);
    cancellation.cancel();

    yield* chunkLines(source, { chunkSize: 2, cancellation, state, output });

    const [chunk] = drain(output);
    expect(chunk).toEqual({ sequence: 0, lines: [], error: ErrorCancelled });
    expect(source.reads).toEqual(0);
    expect(source.opened).toEqual(1);
    expect(source.closed).toEqual(1);
  });

  it("sends the lines read before a cancellation", function* () {
    const source = trackedSource(["a\n", "b\n", "c\n"], { delay: 5 });

    const task = yield* spawn(() =>
      chunkLines(source, { chunkSize: 10, cancellation, state, output })
    );
    yield* sleep(7);
    cancellation.cancel();
    yield* task;

    const chunks = drain(output);
    expect(chunks).toHaveLength(1);
    expect(chunks[0]?.error).toBe(ErrorCancelled);
    expect(chunks[0]?.lines.length).toBeLessThan(3);
    expect(source.closed).toEqual(1);
  });

  it("reports a failed read on the last chunk", function* () {
    const cause = new Error("disk gone");
    const source = trackedSource(["a\n", "b\n", "c\n"], {
      failAt: 2,
      error: cause,
    });

    yield* chunkLines(source, { chunkSize: 5, cancellation, state, output });

    const [chunk] = drain(output);
    expect(chunk?.lines).toEqual(["a\n", "b\n"]);
    expect(chunk?.error).toBeInstanceOf(SourceReadError);
    expect(chunk?.error?.message).toEqual("failed to read line: disk gone");
    expect(chunk?.error?.cause).toBe(cause);
    expect(source.closed).toEqual(1);
  });

  it("reports a source that cannot be opened", function* () {
    const source: Stream<string, void> = {
      *[Symbol.iterator]() {
        throw new Error("no such file");
      },
    };

    const sent = yield* chunkLines(source, {
      chunkSize: 5,
      cancellation,
      state,
      output,
    });

    expect(sent).toEqual(1);
    const [chunk] = drain(output);
    expect(chunk?.sequence).toEqual(0);
    expect(chunk?.lines).toEqual([]);
    expect(chunk?.error?.message).toEqual("failed to read line: no such file");
  });

  it("stops once the output refuses chunks", function* () {
    const source = trackedSource(["a\n", "b\n", "c\n", "d\n"]);
    const narrow = createBoundedQueue<LineChunk>(1);

    const task = yield* spawn(() =>
      chunkLines(source, { chunkSize: 1, cancellation, state, output: narrow })
    );
    yield* sleep(1);
    narrow.close();

    expect(yield* task).toEqual(1);
    expect(narrow.poll()).toEqual({
      done: false,
      value: { sequence: 0, lines: ["a\n"] },
    });
    expect(source.reads).toEqual(2);
    expect(source.closed).toEqual(1);
  });

  it("logs each chunk it emits", function* () {
    const logs = yield* captureLogs();

    yield* chunkLines(trackedSource(["a\n", "b\n", "c\n"]), {
      chunkSize: 2,
      cancellation,
      state,
      output,
    });

    expect(logs.map((event) => event.message)).toEqual([
      "chunker emitted chunk 0 (2 lines)",
      "chunker emitted chunk 1 (1 lines)",
    ]);
  });
});
