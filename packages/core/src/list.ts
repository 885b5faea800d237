/**
 * Append-ordered singly-linked lists
 *
 * Lists never change once built. `listTail` shares the suffix of its input;
 * `listAppend` copies the chain it extends, so no list can observe another
 * list's append.
 */

import {
  EMPTY,
  allocNode,
  allocSlots,
  appendNode,
  copyChain,
  normalizeCount,
  type Empty,
  type FixedArray,
  type List,
  type ListNode,
  type Maybe,
} from './internal';

// =====================================================
// Construction
// =====================================================

function fromFirst<T>(first: ListNode<T> | null): List<T> {
  return { first };
}

export function listEmpty<T = unknown>(): List<T> {
  return fromFirst<T>(null);
}

export function listSingleton<T>(value: T): List<T> {
  return fromFirst(allocNode(value));
}

export function listReplicate<T>(value: T, count: number): List<T> {
  const nodes = normalizeCount(count);
  let first: ListNode<T> | null = null;
  for (let i = 0; i < nodes; i++) {
    const node = allocNode(value);
    node.next = first;
    first = node;
  }
  return fromFirst(first);
}

/**
 * New list: the input's values followed by `value`.
 * O(n) per call; the copy is walked to its end to link the new node.
 */
export function listAppend<T>(list: Maybe<List<T>>, value: T): List<T> {
  if (list == null) return listSingleton(value);
  return fromFirst(appendNode(copyChain(list.first), allocNode(value)));
}

// =====================================================
// Access
// =====================================================

export function listHead<T>(list: Maybe<List<T>>): T | Empty {
  if (list == null || list.first === null) return EMPTY;
  return list.first.value;
}

/**
 * View of everything after the first node; nodes are shared with `list`
 */
export function listTail<T>(list: Maybe<List<T>>): List<T> {
  if (list == null || list.first === null) return listEmpty();
  return fromFirst(list.first.next);
}

export function* listIter<T>(list: Maybe<List<T>>): IterableIterator<T> {
  if (list == null) return;
  for (let node = list.first; node !== null; node = node.next) {
    yield node.value;
  }
}

export function listLength<T>(list: Maybe<List<T>>): number {
  let count = 0;
  for (let node = list?.first ?? null; node !== null; node = node.next) count++;
  return count;
}

// =====================================================
// Conversion
// =====================================================

export function listToArray<T>(list: Maybe<List<T>>): FixedArray<T> {
  const count = listLength(list);
  const data = allocSlots<T>(count);
  let i = 0;
  for (const value of listIter(list)) {
    data[i++] = value;
  }
  return { length: count, data };
}
