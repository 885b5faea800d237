/**
 * Fixed-length arrays with enforced bounds
 *
 * - arrayNew(n)        → n empty slots, negatives clamp to 0
 * - arrayLength(a)     → 0 for a null array
 * - arrayGet/arraySet  → abort on a null array or an index outside [0, length)
 */

import { allocSlots, ensureBounds, normalizeCount, type Empty, type FixedArray, type Maybe } from './internal';

export function arrayNew<T = unknown>(length: number): FixedArray<T> {
  const count = normalizeCount(length);
  return { length: count, data: allocSlots<T>(count) };
}

/**
 * Wrap existing values; the array takes their order and count
 */
export function arrayOf<T>(values: readonly T[]): FixedArray<T> {
  const array = arrayNew<T>(values.length);
  for (let i = 0; i < values.length; i++) {
    array.data[i] = values[i];
  }
  return array;
}

export function arrayLength<T>(array: Maybe<FixedArray<T>>): number {
  if (array == null) return 0;
  return array.length;
}

export function arrayGet<T>(array: Maybe<FixedArray<T>>, index: number): T | Empty {
  ensureBounds(array, index);
  return array.data[index];
}

/**
 * Overwrite the slot at `index`. The displaced value is left to the caller.
 */
export function arraySet<T>(array: Maybe<FixedArray<T>>, index: number, value: T): void {
  ensureBounds(array, index);
  array.data[index] = value;
}

export function* arrayIter<T>(array: Maybe<FixedArray<T>>): IterableIterator<T | Empty> {
  if (array == null) return;
  for (let i = 0; i < array.length; i++) {
    yield array.data[i];
  }
}
