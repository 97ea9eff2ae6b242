export class ReadCancelledError extends Error {
  override name = "ReadCancelledError";

  constructor() {
    super("reading cancelled");
  }
}

/**
 * Reported on the final chunk of a reader that was cancelled.
 */
export const ErrorCancelled: ReadCancelledError = new ReadCancelledError();

export function isCancellation(error: unknown): error is ReadCancelledError {
  return error instanceof ReadCancelledError;
}

export class SourceReadError extends Error {
  override name = "SourceReadError";

  constructor(cause: unknown) {
    super(`failed to read line: ${describe(cause)}`, { cause });
  }
}

export class TransformError extends Error {
  override name = "TransformError";
  /** sequence number of the chunk that failed */
  readonly sequence: number;
  /** index of the failing line within its chunk */
  readonly line: number;

  constructor(cause: unknown, sequence: number, line: number) {
    super(
      `transform failed on line ${line} of chunk ${sequence}: ${
        describe(cause)
      }`,
      { cause },
    );
    this.sequence = sequence;
    this.line = line;
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(describe(value));
}

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}
