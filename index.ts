/**
 * Copy-on-write singly linked list with queue and indexed-collection views
 */
export { LinkedList } from './linked-list';
export { ListNode, containsLoop, findTail, measureChain } from './list-node';
export type { ChainShape } from './list-node';
export { ListIndex, ListIterator } from './list-index';
export { indices, valuesOf, distance, firstIndex } from './collection';
export type { IndexedCollection } from './collection';
export { drain } from './queue';
export type { Queue } from './queue';
export { PreconditionError } from './errors';
export { strictEquals } from './types';
export type { Equality, Comparable } from './types';
