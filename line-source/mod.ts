export * from "./lines.ts";
export * from "./lines-of.ts";
export * from "./read-lines.ts";
