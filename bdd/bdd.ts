import { describe as $describe, it as $it } from "node:test";
import { type Operation, run } from "effection";

export interface TestOperation {
  (): Operation<void>;
}

/**
 * A suite groups the setup operations declared by `beforeEach()` inside one
 * `describe()` block. Tests run the setup of every enclosing suite, outermost
 * first, before their own body.
 */
interface Suite {
  readonly name: string;
  readonly parent?: Suite;
  readonly setup: TestOperation[];
}

export interface BDD {
  describe(name: string, body: () => void): void;
  it(desc: string, body?: TestOperation): void;
  beforeEach(body: TestOperation): void;
}

function lineage(suite: Suite | undefined): Suite[] {
  const suites: Suite[] = [];
  for (let current = suite; current; current = current.parent) {
    suites.unshift(current);
  }
  return suites;
}

/**
 * Creates a BDD interface on top of `node:test` whose test bodies are
 * Effection operations. Every test runs in its own root task, so anything it
 * spawns is halted when the test completes.
 */
export function createBDD(): BDD {
  let current: Suite | undefined;

  function describe(name: string, body: () => void): void {
    const parent = current;
    const suite: Suite = { name, parent, setup: [] };
    try {
      current = suite;
      $describe(name, () => {
        const outer = current;
        current = suite;
        try {
          body();
        } finally {
          current = outer;
        }
      });
    } finally {
      current = parent;
    }
  }

  function beforeEach(body: TestOperation): void {
    if (!current) {
      throw new Error("beforeEach() must be called inside describe()");
    }
    current.setup.push(body);
  }

  function it(desc: string, body?: TestOperation): void {
    if (!body) {
      $it.skip(desc);
      return;
    }
    const suite = current;
    $it(desc, async () => {
      const setups = lineage(suite).flatMap(({ setup }) => setup);
      await run(function* () {
        for (const setup of setups) {
          yield* setup();
        }
        yield* body();
      });
    });
  }

  return { describe, it, beforeEach };
}
