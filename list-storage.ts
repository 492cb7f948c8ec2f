import { ListNode, measureChain } from './list-node';

/**
 * Head/tail pair shared by every LinkedList handle bound to it. `refCount` counts
 * those handles; a list writes in place only while it is the sole holder.
 */
export class ListStorage<T> {
  head: ListNode<T> | undefined;
  tail: ListNode<T> | undefined;
  refCount = 0;

  constructor(head?: ListNode<T>, tail?: ListNode<T>) {
    this.head = head;
    this.tail = tail;
  }

  retain(): this {
    this.refCount++;
    return this;
  }

  release(): void {
    if (this.refCount > 0) this.refCount--;
  }

  get isUnique(): boolean { return this.refCount <= 1; }

  /**
   * Deep copy of the node chain into unretained storage. Values are copied by
   * reference. Empty storage yields a new empty storage, never a shared one.
   * A cyclic chain is copied up to its distinct nodes and closed again at the
   * same ordinal, leaving the copy without a tail.
   */
  duplicate(): ListStorage<T> {
    const source = this.head;
    if (!source) return new ListStorage<T>();

    const { count, loopStart } = measureChain(source);
    const copiedHead = new ListNode(source.value);
    let copied = copiedHead;
    let loopTarget = loopStart === 0 ? copiedHead : undefined;
    let current = source.next;

    for (let i = 1; i < count && current; i++) {
      const node = new ListNode(current.value);
      copied.next = node;
      copied = node;
      if (i === loopStart) loopTarget = node;
      current = current.next;
    }

    if (loopTarget) {
      copied.next = loopTarget;
      return new ListStorage(copiedHead, undefined);
    }
    return new ListStorage(copiedHead, copied);
  }
}
