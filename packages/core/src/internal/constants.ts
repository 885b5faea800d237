/**
 * Core constants for the O runtime data structures
 */

// No-value marker: fresh array slots and head of an empty list
export const EMPTY = null;

// Lengths and indices cross the generated-code boundary as int32
export const MAX_ALLOCATION_SLOTS = 0x7fffffff; // 2^31 - 1

// Fault codes
export const FAULT_ALLOCATION_FAILED = 'ALLOCATION_FAILED';
export const FAULT_INDEX_OUT_OF_BOUNDS = 'INDEX_OUT_OF_BOUNDS';
export const FAULT_NULL_ARRAY = 'NULL_ARRAY';

// Environment keys read once when the runtime loads
export const ENV_LOG_LEVEL = 'O_RUNTIME_LOG_LEVEL';
export const ENV_LOG_FORMAT = 'O_RUNTIME_LOG_FORMAT';

export const LOG_MODULE = 'o-runtime';
