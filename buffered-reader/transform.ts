import type { Outcome, Transform } from "./types.ts";

export function keep<T>(value: T): Outcome<T> {
  return { type: "keep", value };
}

export function skip(): Outcome<never> {
  return { type: "skip" };
}

export function fail(error: Error): Outcome<never> {
  return { type: "fail", error };
}

/**
 * Keeps every line with its trailing newlines removed.
 */
export const trimNewline: Transform<string> = function* (line) {
  return keep(line.replace(/\n+$/, ""));
};
