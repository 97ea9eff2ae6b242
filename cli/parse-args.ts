import { z } from "zod";
import { parser } from "zod-opts";
import packageJson from "./package.json" with { type: "json" };

export interface CatOptions {
  file: string;
  bufferSize?: number;
  chunkSize?: number;
  /** write lines with their newlines as read */
  raw: boolean;
  /** leave out blank lines and lines starting with `#` */
  strip: boolean;
  /** stop reading once this many lines have been written */
  limit?: number;
  verbose: boolean;
}

/**
 * Parse the command line. Without a file, or with `-`, standard input is
 * read.
 */
export function parseArgs(argv: string[]): CatOptions {
  // zod-opts does not take a bare `-` as an argument
  const args = argv.filter((arg) => arg !== "-");
  const parsed = parser()
    .name("ordered-lines")
    .description(
      "print the lines of a file, transformed concurrently and written in order",
    )
    .options({
      buffer: {
        type: z.number().int().optional(),
        alias: "b",
        description: "Chunks transformed at once (default: number of CPUs)",
      },
      chunk: {
        type: z.number().int().optional(),
        alias: "c",
        description: "Lines per chunk (default: 1000000)",
      },
      raw: {
        type: z.boolean().default(false),
        description: "Keep the newline at the end of each line",
      },
      strip: {
        type: z.boolean().default(false),
        description: "Leave out blank lines and lines starting with #",
      },
      limit: {
        type: z.number().int().positive().optional(),
        alias: "n",
        description: "Stop after writing this many lines",
      },
      verbose: {
        type: z.boolean().default(false),
        alias: "v",
        description: "Print debugging output",
      },
    })
    .args([
      {
        name: "file",
        type: z.string().optional(),
        description:
          "File to read, .gz files are decompressed (default: -, standard input)",
      },
    ])
    .version(packageJson.version)
    .parse(args);

  return {
    file: parsed.file ?? "-",
    bufferSize: parsed.buffer,
    chunkSize: parsed.chunk,
    raw: parsed.raw,
    strip: parsed.strip,
    limit: parsed.limit,
    verbose: parsed.verbose,
  };
}
