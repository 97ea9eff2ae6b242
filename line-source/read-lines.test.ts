import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { after } from "node:test";
import { gzipSync } from "node:zlib";
import { each, type Operation, type Stream } from "effection";
import { expect } from "expect";
import { describe, it } from "@ordered-lines/bdd";
import { readLines } from "./read-lines.ts";

const dir = mkdtempSync(join(tmpdir(), "ordered-lines-"));

after(() => rmSync(dir, { recursive: true, force: true }));

function* collect<T>(stream: Stream<T, unknown>): Operation<T[]> {
  const items: T[] = [];
  for (const item of yield* each(stream)) {
    items.push(item);
    yield* each.next();
  }
  return items;
}

describe("readLines", () => {
  it("reads the lines of a plain file", function* () {
    const path = join(dir, "plain.txt");
    writeFileSync(path, "one\ntwo\nthree");

    expect(yield* collect(readLines(path))).toEqual([
      "one\n",
      "two\n",
      "three",
    ]);
  });

  it("decompresses files ending in .gz", function* () {
    const path = join(dir, "compressed.txt.gz");
    writeFileSync(path, gzipSync("alpha\nbeta\n"));

    expect(yield* collect(readLines(path))).toEqual(["alpha\n", "beta\n"]);
  });

  it("raises open failures from next()", function* () {
    const subscription = yield* readLines(join(dir, "missing.txt"));

    let error: unknown;
    try {
      yield* subscription.next();
    } catch (e) {
      error = e;
    }

    expect(error).toMatchObject({ code: "ENOENT" });
  });
});
