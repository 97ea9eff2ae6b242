import { List } from "immutable";
import {
  type Operation,
  type Stream,
  type Subscription,
  withResolvers,
} from "effection";

/**
 * A first-in first-out queue with a fixed capacity. It is both a
 * {@link Subscription}, for consumers that pull items one at a time, and a
 * {@link Stream}, so it can be consumed with `each()`. Every subscriber pulls
 * from the same items.
 */
export interface BoundedQueue<T, TClose = void>
  extends Stream<T, TClose>, Subscription<T, TClose> {
  /**
   * The most items the queue holds before `send()` waits.
   */
  readonly capacity: number;
  /**
   * The number of items waiting to be pulled.
   */
  readonly size: number;
  /**
   * True once `close()` has been called.
   */
  readonly closed: boolean;
  /**
   * Add an item, waiting while the queue is full.
   * @returns false if the queue was closed before the item could be added,
   * in which case the item is dropped.
   */
  send(item: T): Operation<boolean>;
  /**
   * Close the queue. Items already in it can still be pulled, after which
   * `next()` returns the close value.
   * @returns true for the call that closed the queue, false for every call
   * after it.
   */
  close(value: TClose): boolean;
  /**
   * Take the next item without waiting.
   * @returns the next item, the close result once the queue is closed and
   * empty, or `undefined` when nothing is available yet.
   */
  poll(): IteratorResult<T, TClose> | undefined;
}

export function createBoundedQueue<T, TClose = void>(
  capacity: number,
): BoundedQueue<T, TClose> {
  const limit = Math.max(1, Math.floor(capacity));
  const waiters = new Set<() => void>();
  let items = List<{ value: T }>();
  let terminal: { value: TClose } | undefined;

  function notify(): void {
    const pending = [...waiters];
    waiters.clear();
    for (const resolve of pending) {
      resolve();
    }
  }

  function* changed(): Operation<void> {
    const { operation, resolve } = withResolvers<void>();
    waiters.add(resolve);
    try {
      yield* operation;
    } finally {
      waiters.delete(resolve);
    }
  }

  function poll(): IteratorResult<T, TClose> | undefined {
    const head = items.first();
    if (head) {
      items = items.shift();
      notify();
      return { done: false, value: head.value };
    }
    if (terminal) {
      return { done: true, value: terminal.value };
    }
    return undefined;
  }

  const queue: BoundedQueue<T, TClose> = {
    capacity: limit,
    get size() {
      return items.size;
    },
    get closed() {
      return terminal !== undefined;
    },
    *send(item) {
      while (!terminal && items.size >= limit) {
        yield* changed();
      }
      if (terminal) {
        return false;
      }
      items = items.push({ value: item });
      notify();
      return true;
    },
    close(value) {
      if (terminal) {
        return false;
      }
      terminal = { value };
      notify();
      return true;
    },
    poll,
    *next() {
      while (true) {
        const result = poll();
        if (result) {
          return result;
        }
        yield* changed();
      }
    },
    *[Symbol.iterator]() {
      return queue;
    },
  };

  return queue;
}
