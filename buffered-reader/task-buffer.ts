import { type Operation, resource, spawn, type Task } from "effection";
import { createValueSignal, is } from "./signals.ts";

/**
 * Admits at most `max` tasks at a time. Yielding the buffer itself waits
 * until every admitted task has finished.
 */
export interface TaskBuffer extends Operation<void> {
  readonly max: number;
  /**
   * The number of admitted tasks that are still running.
   */
  readonly active: number;
  /**
   * Wait for a free slot, then spawn `op` in the caller's scope. The slot is
   * released when the task settles.
   */
  spawn<T>(op: () => Operation<T>): Operation<Task<T>>;
}

export function useTaskBuffer(max: number): Operation<TaskBuffer> {
  return resource<TaskBuffer>(function* (provide) {
    const limit = Math.max(1, Math.floor(max));
    const active = yield* createValueSignal(0);

    yield* provide({
      max: limit,
      get active() {
        return active.valueOf();
      },
      *[Symbol.iterator]() {
        yield* is(active, (count) => count === 0);
      },
      *spawn<T>(op: () => Operation<T>): Operation<Task<T>> {
        yield* is(active, (count) => count < limit);
        active.update((count) => count + 1);
        return yield* spawn(function* () {
          try {
            return yield* op();
          } finally {
            active.update((count) => count - 1);
          }
        });
      },
    });
  });
}
