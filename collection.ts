import { PreconditionError } from './errors';
import type { Comparable } from './types';

/**
 * Ordered collection walked through opaque indices. `endIndex` is one past the
 * last element and must never be read through `at`.
 */
export interface IndexedCollection<T, I extends Comparable<I>> {
  readonly startIndex: I;
  readonly endIndex: I;
  indexAfter(index: I): I;
  at(index: I): T;
}

export function* indices<T, I extends Comparable<I>>(collection: IndexedCollection<T, I>): Generator<I> {
  const end = collection.endIndex;
  for (let i = collection.startIndex; !i.equals(end); i = collection.indexAfter(i)) yield i;
}

export function* valuesOf<T, I extends Comparable<I>>(collection: IndexedCollection<T, I>): Generator<T> {
  for (const i of indices(collection)) yield collection.at(i);
}

/** Steps needed to walk from `from` to `to`; `from` must not order after `to`. */
export function distance<T, I extends Comparable<I>>(collection: IndexedCollection<T, I>, from: I, to: I): number {
  if (from.compareTo(to) > 0) throw new PreconditionError('distance: start index orders after end index');
  let steps = 0;
  for (let i = from; !i.equals(to); i = collection.indexAfter(i)) steps++;
  return steps;
}

export function firstIndex<T, I extends Comparable<I>>(
  collection: IndexedCollection<T, I>,
  predicate: (value: T) => boolean,
): I | undefined {
  for (const i of indices(collection)) {
    if (predicate(collection.at(i))) return i;
  }
  return undefined;
}
