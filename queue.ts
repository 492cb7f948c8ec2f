/** FIFO capability. */
export interface Queue<T> {
  /** Oldest item, left in place. */
  getFirst(): T | undefined;
  /**
   * Adds an item at the back. Implementations may throw when they cannot take
   * it, e.g. a bounded queue at capacity.
   */
  enqueue(item: T): void;
  /** Removes and returns the oldest item, undefined when empty. */
  dequeue(): T | undefined;
}

/** Dequeues until the queue reports empty. An undefined item also ends the drain. */
export function* drain<T>(queue: Queue<T>): Generator<T> {
  for (let item = queue.dequeue(); item !== undefined; item = queue.dequeue()) yield item;
}
