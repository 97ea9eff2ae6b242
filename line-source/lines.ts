import type { Stream } from "effection";

/**
 * Stream helper that turns a stream of binary chunks into a stream of lines.
 *
 * Lines are split on `\n` and keep their terminator, so joining the emitted
 * lines reproduces the decoded input exactly. Content after the last newline
 * is emitted as a final, unterminated line when it is not empty. The stream
 * closes with the close value of the source.
 *
 * @example
 * ```ts
 * import { each } from "effection";
 * import { lines } from "@ordered-lines/line-source";
 *
 * for (const line of yield* each(lines()(bytes))) {
 *   process.stdout.write(line);
 *   yield* each.next();
 * }
 * ```
 */
export function lines(): <TClose>(
  stream: Stream<Uint8Array, TClose>,
) => Stream<string, TClose> {
  return <TClose>(stream: Stream<Uint8Array, TClose>): Stream<string, TClose> => ({
    *[Symbol.iterator]() {
      const decoder = new TextDecoder();
      const subscription = yield* stream;
      const buffer: string[] = [];
      let remainder = "";
      let closed: { value: TClose } | undefined;

      return {
        *next() {
          while (buffer.length === 0) {
            if (closed) {
              return { done: true, value: closed.value };
            }
            const next = yield* subscription.next();
            if (next.done) {
              const tail = remainder + decoder.decode();
              remainder = "";
              closed = { value: next.value };
              if (tail.length > 0) {
                buffer.push(tail);
              }
            } else {
              const parts = (remainder +
                decoder.decode(next.value, { stream: true })).split("\n");
              remainder = parts.pop() ?? "";
              buffer.push(...parts.map((line) => `${line}\n`));
            }
          }
          const value = buffer.shift();
          if (value === undefined) {
            throw new Error("Unexpected empty buffer");
          }
          return { done: false, value };
        },
      };
    },
  });
}
