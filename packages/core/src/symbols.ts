/**
 * Link names used by generated code for each runtime operation
 */

import { arrayGet, arrayLength, arrayNew, arraySet } from './array';
import {
  listAppend,
  listEmpty,
  listHead,
  listReplicate,
  listSingleton,
  listTail,
  listToArray,
} from './list';

export const RUNTIME_SYMBOLS = {
  o_array_new: arrayNew,
  o_array_length: arrayLength,
  o_array_get: arrayGet,
  o_array_set: arraySet,
  o_list_empty: listEmpty,
  o_list_singleton: listSingleton,
  o_list_replicate: listReplicate,
  o_list_append: listAppend,
  o_list_head: listHead,
  o_list_tail: listTail,
  o_list_to_array: listToArray,
} as const satisfies Record<string, (...args: never[]) => unknown>;

export type RuntimeSymbol = keyof typeof RUNTIME_SYMBOLS;
export type RuntimeFunction = (typeof RUNTIME_SYMBOLS)[RuntimeSymbol];

export function isRuntimeSymbol(name: string): name is RuntimeSymbol {
  return Object.prototype.hasOwnProperty.call(RUNTIME_SYMBOLS, name);
}

export function resolveSymbol<K extends RuntimeSymbol>(name: K): (typeof RUNTIME_SYMBOLS)[K];
export function resolveSymbol(name: string): RuntimeFunction | undefined;
export function resolveSymbol(name: string): RuntimeFunction | undefined {
  return isRuntimeSymbol(name) ? RUNTIME_SYMBOLS[name] : undefined;
}
