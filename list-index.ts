import type { ListNode } from './list-node';
import type { Comparable } from './types';

/**
 * Forward iterator over a node chain. Single pass: once consumed, ask the list
 * for a fresh one. Never ends on a cyclic chain.
 */
export class ListIterator<T> implements IterableIterator<T> {
  private current: ListNode<T> | undefined;

  constructor(head: ListNode<T> | undefined) {
    this.current = head;
  }

  next(): IteratorResult<T> {
    const node = this.current;
    if (!node) return { done: true, value: undefined };
    this.current = node.next;
    return { done: false, value: node.value };
  }

  [Symbol.iterator](): this { return this; }
}

/**
 * Position in a list: the node it points at and its ordinal. Ordering and
 * equality look at the ordinal only, so indices taken from two copies of a list
 * compare equal at the same ordinal even after the copies diverge.
 */
export class ListIndex<T> implements Comparable<ListIndex<T>> {
  readonly node: ListNode<T> | undefined;
  readonly tag: number;

  constructor(node: ListNode<T> | undefined, tag: number) {
    this.node = node;
    this.tag = tag;
  }

  equals(other: ListIndex<T>): boolean { return this.tag === other.tag; }
  lessThan(other: ListIndex<T>): boolean { return this.tag < other.tag; }
  compareTo(other: ListIndex<T>): number { return this.tag - other.tag; }
}
