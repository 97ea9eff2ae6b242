import type { Stream } from "effection";

/**
 * Present an in-memory list of lines as a line source.
 *
 * @param lines - the lines to yield, terminators included
 */
export function linesOf(lines: Iterable<string>): Stream<string, void> {
  return {
    *[Symbol.iterator]() {
      const iterator = lines[Symbol.iterator]();
      return {
        *next() {
          const next = iterator.next();
          if (next.done) {
            return { done: true, value: undefined };
          }
          return { done: false, value: next.value };
        },
      };
    },
  };
}
