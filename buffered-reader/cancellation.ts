/**
 * A one-shot stop request. Readers check it before every read; nothing is
 * interrupted.
 */
export interface Cancellation {
  /**
   * Request the stop. Calling it again has no further effect.
   */
  cancel(): void;
  isCancelled(): boolean;
}

export function createCancellation(): Cancellation {
  let requested = false;

  return {
    cancel() {
      requested = true;
    },
    isCancelled() {
      return requested;
    },
  };
}
