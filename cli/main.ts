#!/usr/bin/env -S node --import tsx
import process from "node:process";
import { exit, main } from "effection";
import { verboseLogging } from "@ordered-lines/buffered-reader";
import { cat } from "./cat.ts";
import { parseArgs } from "./parse-args.ts";

main(function* (argv) {
  const options = parseArgs(argv);

  yield* verboseLogging(options.verbose);

  const result = yield* cat(options, (text) => {
    process.stdout.write(text);
  });

  if (result.error) {
    yield* exit(1, result.error.message);
  }
});
