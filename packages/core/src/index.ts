/**
 * o-runtime – Array + List support for generated O code
 *
 * - arrayNew(n)       → fixed-length array, bounds checked, abort on misuse
 * - list*(...)        → append-ordered lists, head/tail never fail
 * - listToArray(l)    → the one bridge from lists to arrays
 * - RUNTIME_SYMBOLS   → link names the compiler emits calls to
 */

export { arrayNew, arrayOf, arrayLength, arrayGet, arraySet, arrayIter } from './array';

export {
  listEmpty,
  listSingleton,
  listReplicate,
  listAppend,
  listHead,
  listTail,
  listIter,
  listLength,
  listToArray,
} from './list';

export {
  RUNTIME_SYMBOLS,
  isRuntimeSymbol,
  resolveSymbol,
  type RuntimeSymbol,
  type RuntimeFunction,
} from './symbols';

export {
  EMPTY,
  MAX_ALLOCATION_SLOTS,
  FAULT_ALLOCATION_FAILED,
  FAULT_INDEX_OUT_OF_BOUNDS,
  FAULT_NULL_ARRAY,
  RuntimeFault,
  configureRuntime,
  getRuntimeOptions,
  resetRuntime,
  type FaultType,
  type FaultCode,
  type FaultHandler,
  type RuntimeOptions,
  type LogLevel,
  type LogFormat,
  type Opaque,
  type Empty,
  type FixedArray,
  type List,
  type ListNode,
  type Maybe,
} from './internal';
