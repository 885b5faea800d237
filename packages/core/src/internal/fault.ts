/**
 * Fail-fast path shared by every fatal check
 */

import { FAULT_INDEX_OUT_OF_BOUNDS, FAULT_NULL_ARRAY } from './constants';
import { getRuntimeOptions } from './config';
import { RuntimeFault, type FaultType } from './errors';
import type { FixedArray, Maybe } from './types';

export function raiseFault(type: FaultType): never {
  const fault = new RuntimeFault(type);
  getRuntimeOptions().onFault(fault);
  return process.abort();
}

/**
 * Abort unless `index` is an integer in `[0, array.length)`
 */
export function ensureBounds<T>(array: Maybe<FixedArray<T>>, index: number): asserts array is FixedArray<T> {
  if (array == null) {
    raiseFault({ code: FAULT_NULL_ARRAY, index });
  }
  if (!Number.isInteger(index) || index < 0 || index >= array.length) {
    raiseFault({ code: FAULT_INDEX_OUT_OF_BOUNDS, index, length: array.length });
  }
}
