/**
 * Allocation and node primitives shared by arrays and lists
 */

import { EMPTY, FAULT_ALLOCATION_FAILED, MAX_ALLOCATION_SLOTS } from './constants';
import { raiseFault } from './fault';
import type { Empty, ListNode } from './types';

/**
 * Count argument from generated code as an int32 slot count.
 * NaN and negatives clamp to zero, fractions truncate; above the cap is fatal.
 */
export function normalizeCount(count: number): number {
  if (!(count > 0)) return 0;
  const slots = Math.trunc(count);
  if (slots > MAX_ALLOCATION_SLOTS) {
    raiseFault({ code: FAULT_ALLOCATION_FAILED, requested: slots });
  }
  return slots;
}

/**
 * Dense storage of `count` empty slots.
 * Fatal when the host cannot hold `count` references.
 */
export function allocSlots<T>(count: number): (T | Empty)[] {
  if (count > MAX_ALLOCATION_SLOTS) {
    raiseFault({ code: FAULT_ALLOCATION_FAILED, requested: count });
  }
  try {
    return new Array<T | Empty>(count).fill(EMPTY);
  } catch (err) {
    if (err instanceof RangeError) {
      raiseFault({ code: FAULT_ALLOCATION_FAILED, requested: count });
    }
    throw err;
  }
}

export function allocNode<T>(value: T): ListNode<T> {
  return { value, next: null };
}

/**
 * Link `node` after the last node reachable from `first`.
 * Walks the whole chain on every call.
 */
export function appendNode<T>(first: ListNode<T> | null, node: ListNode<T>): ListNode<T> {
  if (first === null) return node;
  let last = first;
  while (last.next !== null) {
    last = last.next;
  }
  last.next = node;
  return first;
}

/**
 * Fresh copy of the chain starting at `first`; values are shared, nodes are not
 */
export function copyChain<T>(first: ListNode<T> | null): ListNode<T> | null {
  if (first === null) return null;
  const head = allocNode(first.value);
  let last = head;
  for (let node = first.next; node !== null; node = node.next) {
    last.next = allocNode(node.value);
    last = last.next;
  }
  return head;
}
