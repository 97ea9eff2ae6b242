import { availableParallelism } from "node:os";
import { z } from "zod";

/**
 * Lines per chunk when none is given.
 */
export const DEFAULT_CHUNK_SIZE = 1_000_000;

/**
 * Chunks transformed at once, and results held for the consumer, when no
 * buffer size is given.
 */
export const DEFAULT_BUFFER_SIZE: number = availableParallelism();

// whole numbers below 1 are raised to 1
const Count = z.number().int().transform((count) => Math.max(1, count));

export const ReaderOptionsSchema = z.object({
  bufferSize: Count.default(DEFAULT_BUFFER_SIZE),
  chunkSize: Count.default(DEFAULT_CHUNK_SIZE),
  errorDelivery: z.enum(["immediate", "ordered"]).default("immediate"),
});

export type ReaderOptions = z.input<typeof ReaderOptionsSchema>;
export type ResolvedReaderOptions = z.output<typeof ReaderOptionsSchema>;

/**
 * Apply defaults and clamp sizes to at least 1.
 *
 * @throws {z.ZodError} when a size is not a whole number
 */
export function resolveOptions(
  options: ReaderOptions = {},
): ResolvedReaderOptions {
  return ReaderOptionsSchema.parse(options);
}
