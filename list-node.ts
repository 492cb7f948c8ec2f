// Node layer: a singly linked cell plus forward-only walks over raw chains.
// A raw chain may be cyclic, so only containsLoop, measureChain and nodeAt are
// safe to call before acyclicity is known.

export class ListNode<T> {
  value: T;
  next: ListNode<T> | undefined;

  constructor(value: T, next?: ListNode<T>) {
    this.value = value;
    this.next = next;
  }
}

export interface ChainShape {
  /** Distinct nodes reachable from the head. */
  count: number;
  /** Ordinal of the node a cycle re-enters, undefined for an acyclic chain. */
  loopStart: number | undefined;
}

// Floyd: slow advances one node per step, fast two. They meet inside the cycle if there is one.
function meetingPoint<T>(head: ListNode<T> | undefined): ListNode<T> | undefined {
  let slow = head;
  let fast = head;
  while (slow && fast && fast.next) {
    slow = slow.next;
    fast = fast.next.next;
    if (slow && slow === fast) return slow;
  }
  return undefined;
}

export function containsLoop<T>(head: ListNode<T> | undefined): boolean {
  return meetingPoint(head) !== undefined;
}

/**
 * Last node of the chain starting at `node`, and the number of nodes walked.
 * The chain must be acyclic; `node` may already link to further nodes.
 */
export function findTail<T>(node: ListNode<T>): { tail: ListNode<T>; count: number } {
  let tail = node;
  let count = 1;
  while (tail.next) {
    tail = tail.next;
    count++;
  }
  return { tail, count };
}

export function measureChain<T>(head: ListNode<T> | undefined): ChainShape {
  if (!head) return { count: 0, loopStart: undefined };
  const meeting = meetingPoint(head);
  if (!meeting) return { count: findTail(head).count, loopStart: undefined };

  // Distance head -> entry equals distance meeting -> entry along the cycle.
  let entry: ListNode<T> | undefined = head;
  let cursor: ListNode<T> | undefined = meeting;
  let loopStart = 0;
  while (entry && cursor && entry !== cursor) {
    entry = entry.next;
    cursor = cursor.next;
    loopStart++;
  }

  let length = 1;
  let probe = entry?.next;
  while (probe && probe !== entry) {
    probe = probe.next;
    length++;
  }
  return { count: loopStart + length, loopStart };
}

export function nodeAt<T>(head: ListNode<T> | undefined, ordinal: number): ListNode<T> | undefined {
  let node = head;
  for (let i = 0; i < ordinal && node; i++) node = node.next;
  return node;
}
