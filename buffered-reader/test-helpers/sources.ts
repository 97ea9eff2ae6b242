import {
  type Operation,
  resource,
  sleep,
  type Stream,
  type Subscription,
} from "effection";

export interface TrackedSourceOptions {
  /**
   * Index of the read that throws `error` instead of returning a line.
   */
  failAt?: number;
  error?: Error;
  /**
   * Milliseconds each read takes.
   */
  delay?: number;
}

/**
 * A line source that counts how often it was opened, read and released.
 */
export interface TrackedSource extends Stream<string, void> {
  readonly opened: number;
  readonly closed: number;
  readonly reads: number;
}

export function trackedSource(
  lines: string[],
  options: TrackedSourceOptions = {},
): TrackedSource {
  const { failAt, error = new Error("read failed"), delay } = options;
  let opened = 0;
  let closed = 0;
  let reads = 0;

  function subscribe(): Operation<Subscription<string, void>> {
    return resource<Subscription<string, void>>(function* (provide) {
      opened++;
      let index = 0;
      try {
        yield* provide({
          *next() {
            reads++;
            if (delay !== undefined) {
              yield* sleep(delay);
            }
            if (index === failAt) {
              throw error;
            }
            const line = lines[index++];
            if (line === undefined) {
              return { done: true, value: undefined };
            }
            return { done: false, value: line };
          },
        });
      } finally {
        closed++;
      }
    });
  }

  return {
    get opened() {
      return opened;
    },
    get closed() {
      return closed;
    },
    get reads() {
      return reads;
    },
    *[Symbol.iterator]() {
      return yield* subscribe();
    },
  };
}

/**
 * `count` numbered lines, `"1\n"` through `"<count>\n"`.
 */
export function numberedLines(count: number): string[] {
  return Array.from({ length: count }, (_, index) => `${index + 1}\n`);
}
