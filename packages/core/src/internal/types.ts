/**
 * Core type definitions
 */

import type { EMPTY } from './constants';

// Values are passed through without interpretation
export type Opaque = unknown;

export type Empty = typeof EMPTY;

// Fixed-length array; `data.length === length` for its whole life
export interface FixedArray<T = Opaque> {
  readonly length: number;
  readonly data: (T | Empty)[];
}

// Singly-linked node; `next` is shared by every list that reaches it
export interface ListNode<T = Opaque> {
  readonly value: T;
  next: ListNode<T> | null;
}

export interface List<T = Opaque> {
  readonly first: ListNode<T> | null;
}

// Absent handles from generated code
export type Maybe<T> = T | null | undefined;
