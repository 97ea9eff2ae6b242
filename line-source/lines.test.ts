import { each, type Operation, type Stream } from "effection";
import { expect } from "expect";
import { describe, it } from "@ordered-lines/bdd";
import { lines } from "./lines.ts";
import { linesOf } from "./lines-of.ts";

function bytesOf<TClose>(
  chunks: Uint8Array[],
  close: TClose,
): Stream<Uint8Array, TClose> {
  return {
    *[Symbol.iterator]() {
      const pending = [...chunks];
      return {
        *next() {
          const value = pending.shift();
          if (value === undefined) {
            return { done: true, value: close };
          }
          return { done: false, value };
        },
      };
    },
  };
}

function* collect<T>(stream: Stream<T, unknown>): Operation<T[]> {
  const items: T[] = [];
  for (const item of yield* each(stream)) {
    items.push(item);
    yield* each.next();
  }
  return items;
}

const encode = (text: string) => new TextEncoder().encode(text);

describe("lines", () => {
  it("splits chunks on newlines and keeps the terminator", function* () {
    const stream = lines()(bytesOf([encode("ab\ncd"), encode("\nef")], "eof"));

    expect(yield* collect(stream)).toEqual(["ab\n", "cd\n", "ef"]);
  });

  it("closes with the close value of the source", function* () {
    const subscription = yield* lines()(bytesOf([encode("x\n")], "eof"));

    expect(yield* subscription.next()).toEqual({ done: false, value: "x\n" });
    expect(yield* subscription.next()).toEqual({ done: true, value: "eof" });
  });

  it("does not emit an empty final line", function* () {
    const stream = lines()(bytesOf([encode("a\n"), encode("b\n")], undefined));

    expect(yield* collect(stream)).toEqual(["a\n", "b\n"]);
  });

  it("decodes characters that straddle two chunks", function* () {
    const stream = lines()(
      bytesOf([
        new Uint8Array([0x61, 0xc3]),
        new Uint8Array([0xa9, 0x0a]),
      ], undefined),
    );

    expect(yield* collect(stream)).toEqual(["aé\n"]);
  });

  it("yields nothing for empty input", function* () {
    expect(yield* collect(lines()(bytesOf([], undefined)))).toEqual([]);
  });
});

describe("linesOf", () => {
  it("yields the given lines in order", function* () {
    expect(yield* collect(linesOf(["a\n", "b\n"]))).toEqual(["a\n", "b\n"]);
  });
});
