import { type Operation, resource } from "effection";
import { createValueSignal, is } from "./signals.ts";
import type { PipelineStatus } from "./types.ts";

/**
 * The single owner of a pipeline's termination state. Each transition
 * happens at most once and reports whether this call made it.
 */
export interface PipelineState {
  readonly status: PipelineStatus;
  /**
   * The first error reported through `fail()`.
   */
  readonly error: Error | undefined;
  /**
   * Resolves once the status is `finished`.
   */
  readonly finished: Operation<void>;
  /**
   * `running` to `draining`.
   */
  drain(): boolean;
  /**
   * Any status to `finished`. Finished is terminal.
   */
  finish(): boolean;
  /**
   * Record the error that ends the pipeline and start draining. Only the
   * first call has any effect.
   */
  fail(error: Error): boolean;
}

export function createPipelineState(): Operation<PipelineState> {
  return resource<PipelineState>(function* (provide) {
    const status = yield* createValueSignal<PipelineStatus>("running");
    let error: Error | undefined;

    function drain(): boolean {
      if (status.valueOf() !== "running") {
        return false;
      }
      status.set("draining");
      return true;
    }

    yield* provide({
      get status() {
        return status.valueOf();
      },
      get error() {
        return error;
      },
      finished: {
        *[Symbol.iterator]() {
          yield* is(status, (current) => current === "finished");
        },
      },
      drain,
      finish() {
        if (status.valueOf() === "finished") {
          return false;
        }
        status.set("finished");
        return true;
      },
      fail(cause) {
        if (error) {
          return false;
        }
        error = cause;
        drain();
        return true;
      },
    });
  });
}
