import {
  createSignal,
  each,
  type Operation,
  resource,
  type Stream,
} from "effection";

/**
 * A value that can be read synchronously and watched as a stream of
 * changes. Subscribing yields every value set after the subscription
 * starts.
 */
export interface ValueSignal<T> extends Stream<T, void> {
  set(value: T): T;
  update(updater: (value: T) => T): T;
  valueOf(): T;
}

export function createValueSignal<T>(initial: T): Operation<ValueSignal<T>> {
  return resource<ValueSignal<T>>(function* (provide) {
    const signal = createSignal<T, void>();
    const ref = { current: initial };

    function set(value: T): T {
      if (value !== ref.current) {
        ref.current = value;
        signal.send(ref.current);
      }
      return ref.current;
    }

    try {
      yield* provide({
        [Symbol.iterator]: signal[Symbol.iterator],
        set,
        update(updater) {
          return set(updater(ref.current));
        },
        valueOf() {
          return ref.current;
        },
      });
    } finally {
      signal.close();
    }
  });
}

/**
 * Wait until the value of the signal matches the predicate.
 */
export function* is<T>(
  signal: ValueSignal<T>,
  predicate: (value: T) => boolean,
): Operation<void> {
  if (predicate(signal.valueOf())) {
    return;
  }
  for (const value of yield* each(signal)) {
    if (predicate(value)) {
      return;
    }
    yield* each.next();
  }
}
