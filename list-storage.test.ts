import { describe, test, expect } from 'vitest';
import { ListNode, measureChain, nodeAt } from './list-node';
import { ListStorage } from './list-storage';

function chain<T>(...values: T[]): ListNode<T>[] {
  const nodes = values.map(v => new ListNode(v));
  for (let i = 0; i < nodes.length - 1; i++) nodes[i].next = nodes[i + 1];
  return nodes;
}

function walk<T>(head: ListNode<T> | undefined, steps: number): T[] {
  const out: T[] = [];
  for (let node = head, i = 0; node && i < steps; node = node.next, i++) out.push(node.value);
  return out;
}

describe('ListStorage', () => {
  test('defaults to an empty pair', () => {
    const s = new ListStorage<number>();
    expect(s.head).toBeUndefined();
    expect(s.tail).toBeUndefined();
    expect(s.refCount).toBe(0);
    expect(s.isUnique).toBe(true);
  });

  test('takes an explicit pair', () => {
    const nodes = chain(1, 2);
    const s = new ListStorage(nodes[0], nodes[1]);
    expect(s.head).toBe(nodes[0]);
    expect(s.tail).toBe(nodes[1]);
  });

  describe('reference counting', () => {
    test('retain and release', () => {
      const s = new ListStorage<number>();
      expect(s.retain()).toBe(s);
      expect(s.isUnique).toBe(true);
      s.retain();
      expect(s.refCount).toBe(2);
      expect(s.isUnique).toBe(false);
      s.release();
      expect(s.isUnique).toBe(true);
    });

    test('release never goes negative', () => {
      const s = new ListStorage<number>();
      s.release();
      s.release();
      expect(s.refCount).toBe(0);
    });
  });

  describe('duplicate', () => {
    test('empty storage yields a new empty storage', () => {
      const s = new ListStorage<number>().retain();
      const copy = s.duplicate();
      expect(copy).not.toBe(s);
      expect(copy.head).toBeUndefined();
      expect(copy.tail).toBeUndefined();
      expect(copy.refCount).toBe(0);
    });

    test('copies every node of an acyclic chain', () => {
      const nodes = chain(1, 2, 3);
      const s = new ListStorage(nodes[0], nodes[2]);
      const copy = s.duplicate();
      expect(walk(copy.head, 10)).toEqual([1, 2, 3]);
      expect(copy.head).not.toBe(nodes[0]);
      expect(copy.tail).toBe(nodeAt(copy.head, 2));
      expect(copy.tail?.next).toBeUndefined();
    });

    test('original chain is left alone', () => {
      const nodes = chain(1, 2, 3);
      const s = new ListStorage(nodes[0], nodes[2]);
      const copy = s.duplicate();
      if (copy.tail) copy.tail.next = new ListNode(4);
      expect(walk(s.head, 10)).toEqual([1, 2, 3]);
      expect(nodes[2].next).toBeUndefined();
    });

    test('re-closes a cycle at the same ordinal', () => {
      const nodes = chain(1, 2, 3, 4, 5);
      nodes[4].next = nodes[2];
      const copy = new ListStorage(nodes[0], undefined).duplicate();
      expect(copy.tail).toBeUndefined();
      expect(copy.head).not.toBe(nodes[0]);
      expect(measureChain(copy.head)).toEqual({ count: 5, loopStart: 2 });
      expect(walk(copy.head, 7)).toEqual([1, 2, 3, 4, 5, 3, 4]);
      for (let i = 0; i < 5; i++) expect(nodeAt(copy.head, i)).not.toBe(nodes[i]);
    });

    test('copies a self loop', () => {
      const node = new ListNode('x');
      node.next = node;
      const copy = new ListStorage(node, undefined).duplicate();
      expect(copy.head).not.toBe(node);
      expect(copy.head?.next).toBe(copy.head);
      expect(copy.tail).toBeUndefined();
    });

    test('values are shared, not cloned', () => {
      const value = { n: 1 };
      const node = new ListNode(value);
      const copy = new ListStorage(node, node).duplicate();
      expect(copy.head?.value).toBe(value);
    });
  });
});
