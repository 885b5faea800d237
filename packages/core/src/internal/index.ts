/**
 * Internal modules barrel export
 */

// Constants
export {
  EMPTY,
  MAX_ALLOCATION_SLOTS,
  FAULT_ALLOCATION_FAILED,
  FAULT_INDEX_OUT_OF_BOUNDS,
  FAULT_NULL_ARRAY,
  ENV_LOG_LEVEL,
  ENV_LOG_FORMAT,
  LOG_MODULE,
} from './constants';

// Allocation & nodes
export { normalizeCount, allocSlots, allocNode, appendNode, copyChain } from './alloc';

// Faults
export { RuntimeFault, type FaultType, type FaultCode } from './errors';
export { raiseFault, ensureBounds } from './fault';

// Logging
export {
  RuntimeLogger,
  LOG_LEVELS,
  LOG_FORMATS,
  isLogLevel,
  isLogFormat,
  type LogLevel,
  type LogFormat,
  type Context,
  type LoggerOptions,
} from './logger';

// Configuration
export {
  configureRuntime,
  getRuntimeOptions,
  getLogger,
  resetRuntime,
  optionsFromEnv,
  logFault,
  defaultLogLevel,
  defaultLogFormat,
  type FaultHandler,
  type RuntimeOptions,
} from './config';

// Types
export type { Opaque, Empty, FixedArray, ListNode, List, Maybe } from './types';
