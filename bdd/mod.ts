import { createBDD } from "./bdd.ts";

export type { BDD, TestOperation } from "./bdd.ts";

export const { describe, it, beforeEach } = createBDD();
