import { ListNode, containsLoop, findTail, measureChain, nodeAt } from './list-node';
import type { ChainShape } from './list-node';
import { ListStorage } from './list-storage';
import { ListIndex, ListIterator } from './list-index';
import { PreconditionError } from './errors';
import { strictEquals } from './types';
import type { Equality } from './types';
import type { IndexedCollection } from './collection';
import type { Queue } from './queue';

// Hands a collected list's reference back to its storage, so the survivors can write in place again.
const registry = new FinalizationRegistry<ListStorage<unknown>>((storage) => storage.release());

/**
 * Singly linked list with value semantics. `copy()` is O(1) and shares the node
 * chain; the first write through either handle duplicates the chain, so no list
 * ever observes another's later mutations. Plain assignment aliases the handle
 * like any object: copy explicitly where a value copy is meant.
 *
 * Values themselves are not cloned; object values stay shared between copies.
 */
export class LinkedList<T> implements Iterable<T>, Queue<T>, IndexedCollection<T, ListIndex<T>> {
  private storage: ListStorage<T>;

  /** @param storage internal; defaults to fresh empty storage */
  constructor(storage: ListStorage<T> = new ListStorage<T>()) {
    this.storage = storage.retain();
    registry.register(this, storage, this);
  }

  /**
   * Adopts `node` and whatever it already links to, cyclic or not. The chain is
   * not copied: anyone still holding those nodes can mutate this list behind its back.
   *
   * @internal exported so callers can wrap a chain they built, cycles included
   */
  static fromNode<T>(node: ListNode<T>): LinkedList<T> {
    const list = new LinkedList<T>();
    list.appendChain(node);
    return list;
  }

  static single<T>(value: T): LinkedList<T> {
    return LinkedList.fromNode(new ListNode(value));
  }

  static of<T>(...values: T[]): LinkedList<T> {
    return LinkedList.from(values);
  }

  /** Links the values straight into fresh storage, in order. */
  static from<T>(values: Iterable<T>): LinkedList<T> {
    let head: ListNode<T> | undefined;
    let tail: ListNode<T> | undefined;
    for (const value of values) {
      const node = new ListNode(value);
      if (tail) tail.next = node;
      else head = node;
      tail = node;
    }
    return new LinkedList(new ListStorage(head, tail));
  }

  copy(): LinkedList<T> {
    return new LinkedList(this.storage);
  }

  get isUniquelyReferenced(): boolean { return this.storage.isUnique; }

  private rebind(storage: ListStorage<T>): void {
    registry.unregister(this);
    this.storage.release();
    this.storage = storage.retain();
    registry.register(this, storage, this);
  }

  // Every write goes through here first.
  private ensureUnique(): ListStorage<T> {
    if (!this.storage.isUnique) this.rebind(this.storage.duplicate());
    return this.storage;
  }

  /** Node count, walked on every call. A cyclic chain reports its distinct nodes. */
  get count(): number { return measureChain(this.storage.head).count; }
  get isEmpty(): boolean { return this.storage.head === undefined; }
  get first(): T | undefined { return this.storage.head?.value; }
  /** Undefined when empty and when the chain is cyclic. */
  get last(): T | undefined { return this.storage.tail?.value; }

  containsLoop(): boolean {
    return containsLoop(this.storage.head);
  }

  append(value: T): void {
    this.appendChain(new ListNode(value));
  }

  // `node` may carry a chain of its own, possibly cyclic; the tail is re-derived from the result.
  // Without a cached tail (empty or cyclic list) the chain becomes the head.
  private appendChain(node: ListNode<T>): void {
    const storage = this.ensureUnique();
    if (storage.tail) storage.tail.next = node;
    else storage.head = node;
    storage.tail = containsLoop(storage.head) ? undefined : findTail(node).tail;
  }

  prepend(value: T): void {
    const node = new ListNode(value);
    const storage = this.ensureUnique();
    const previousHead = storage.head;
    const { tail } = findTail(node);
    tail.next = previousHead;
    storage.head = node;
    if (!previousHead) storage.tail = tail;
  }

  /** Removes and returns the element at `index`; throws unless 0 <= index < count. */
  deleteItem(index: number): T {
    const shape = measureChain(this.storage.head);
    if (!Number.isInteger(index) || index < 0 || index >= shape.count) {
      throw new PreconditionError(`index ${index} is out of bounds [0, ${shape.count})`);
    }
    return this.removeAt(index, shape);
  }

  /** Removes the first element equal to `value`. Returns false, copying nothing, when there is none. */
  deleteNode(value: T, equals: Equality<T> = strictEquals): boolean {
    const shape = measureChain(this.storage.head);
    let node = this.storage.head;
    for (let i = 0; i < shape.count && node; i++) {
      if (equals(node.value, value)) {
        this.removeAt(i, shape);
        return true;
      }
      node = node.next;
    }
    return false;
  }

  /** Keeps the first occurrence of every value using pointer surgery only. O(N²), no hashing. */
  deleteDuplicatesInPlace(equals: Equality<T> = strictEquals): void {
    this.assertAcyclic('deleteDuplicatesInPlace');
    const storage = this.ensureUnique();
    for (let current = storage.head; current; current = current.next) {
      let previous = current;
      let candidate = current.next;
      while (candidate) {
        const following = candidate.next;
        if (equals(current.value, candidate.value)) this.detach(storage, previous, candidate);
        else previous = candidate;
        candidate = following;
      }
    }
  }

  /** Same result as deleteDuplicatesInPlace, in O(N) through a Set (SameValueZero equality). */
  deleteDuplicates(): void {
    this.assertAcyclic('deleteDuplicates');
    const storage = this.ensureUnique();
    const seen = new Set<T>();
    let previous: ListNode<T> | undefined;
    let current = storage.head;
    while (current) {
      const following = current.next;
      if (seen.has(current.value)) {
        this.detach(storage, previous, current);
      } else {
        seen.add(current.value);
        previous = current;
      }
      current = following;
    }
  }

  private assertAcyclic(operation: string): void {
    if (this.containsLoop()) throw new PreconditionError(`${operation}: list contains a loop`);
  }

  private removeAt(index: number, shape: ChainShape): T {
    const storage = this.ensureUnique();
    let previous: ListNode<T> | undefined;
    let node = storage.head;
    for (let i = 0; i < index && node; i++) {
      previous = node;
      node = node.next;
    }
    if (!node) throw new PreconditionError(`index ${index} is out of bounds [0, ${shape.count})`);

    // In a cycle the entry node has a second predecessor: the node closing the loop.
    const closer = shape.loopStart === undefined ? undefined : nodeAt(storage.head, shape.count - 1);
    const successor = this.detach(storage, previous, node);
    if (closer) {
      if (closer !== node && closer.next === node) closer.next = successor;
      storage.tail = storage.head && !containsLoop(storage.head) ? findTail(storage.head).tail : undefined;
    }
    return node.value;
  }

  // Unlinks `node` from `previous`, fixes the endpoints and severs the node's own link.
  private detach(storage: ListStorage<T>, previous: ListNode<T> | undefined, node: ListNode<T>): ListNode<T> | undefined {
    const successor = node.next === node ? undefined : node.next;
    if (storage.head === node) storage.head = successor;
    if (storage.tail === node) storage.tail = previous;
    if (previous) previous.next = successor;
    node.next = undefined;
    return successor;
  }

  /**
   * Node `kthToLast` positions before the end: 1 is the last node, `count` the
   * first. Undefined outside that range. The node is live: writing to it writes
   * to every list sharing this storage.
   */
  find(kthToLast: number): ListNode<T> | undefined {
    const count = this.count;
    if (!Number.isInteger(kthToLast) || kthToLast < 1 || kthToLast > count) return undefined;
    let node = this.storage.head;
    for (let remaining = count; node && remaining > kthToLast; remaining--) node = node.next;
    return node;
  }

  [Symbol.iterator](): ListIterator<T> {
    return new ListIterator(this.storage.head);
  }

  forEach(fn: (value: T, index: number) => void): void {
    this.assertAcyclic('forEach');
    let i = 0;
    for (const value of this) fn(value, i++);
  }

  toArray(): T[] {
    this.assertAcyclic('toArray');
    return [...this];
  }

  elementsEqual(other: LinkedList<T>, equals: Equality<T> = strictEquals): boolean {
    const count = this.count;
    if (count !== other.count) return false;
    let a = this.storage.head;
    let b = other.storage.head;
    for (let i = 0; i < count && a && b; i++) {
      if (!equals(a.value, b.value)) return false;
      a = a.next;
      b = b.next;
    }
    return true;
  }

  // Collection

  get startIndex(): ListIndex<T> { return new ListIndex(this.storage.head, 0); }

  /** One past the last element. Its node is the head; never read through it. */
  get endIndex(): ListIndex<T> {
    const head = this.storage.head;
    return new ListIndex(head, head ? this.count : 0);
  }

  indexAfter(index: ListIndex<T>): ListIndex<T> {
    return new ListIndex(index.node?.next, index.tag + 1);
  }

  at(index: ListIndex<T>): T {
    if (!index.node) throw new PreconditionError(`no element at index ${index.tag}`);
    return index.node.value;
  }

  // Queue

  getFirst(): T | undefined { return this.first; }

  enqueue(item: T): void {
    this.append(item);
  }

  dequeue(): T | undefined {
    if (this.isEmpty) return undefined;
    return this.deleteItem(0);
  }
}
