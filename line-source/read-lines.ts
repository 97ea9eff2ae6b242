import { createReadStream } from "node:fs";
import process from "node:process";
import type { Readable } from "node:stream";
import { createGunzip } from "node:zlib";
import { resource, type Stream, type Subscription, until } from "effection";
import { lines } from "./lines.ts";

/**
 * Open `path` and stream its lines. `-` reads standard input, and files
 * ending in `.gz` are decompressed on the fly.
 *
 * Nothing is opened until the stream is subscribed to. The file is released
 * when the subscription's scope exits, whether the file was read to the end
 * or not. Failures to open or read the file are raised from the
 * subscription's `next()`.
 */
export function readLines(path: string): Stream<string, void> {
  return lines()(readBytes(path));
}

/**
 * Stream the raw bytes of `path`, with the same conventions as
 * {@link readLines}.
 */
export function readBytes(path: string): Stream<Uint8Array, void> {
  return resource<Subscription<Uint8Array, void>>(function* (provide) {
    const input = open(path);
    const iterator: AsyncIterator<unknown> = input[Symbol.asyncIterator]();

    try {
      yield* provide({
        *next() {
          const next = yield* until(iterator.next());
          if (next.done) {
            return { done: true, value: undefined };
          }
          return { done: false, value: toBytes(next.value) };
        },
      });
    } finally {
      if (input !== process.stdin) {
        input.destroy();
      }
    }
  });
}

function open(path: string): Readable {
  if (path === "-") {
    return process.stdin;
  }
  const file = createReadStream(path);
  if (!path.endsWith(".gz")) {
    return file;
  }
  const gunzip = createGunzip();
  file.on("error", (error) => gunzip.destroy(error));
  gunzip.on("close", () => file.destroy());
  return file.pipe(gunzip);
}

function toBytes(chunk: unknown): Uint8Array {
  if (chunk instanceof Uint8Array) {
    return chunk;
  }
  if (typeof chunk === "string") {
    return new TextEncoder().encode(chunk);
  }
  throw new TypeError(`unexpected chunk of type ${typeof chunk}`);
}
