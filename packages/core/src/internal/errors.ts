/**
 * Runtime faults - fatal contract violations raised by generated code
 */

import {
  FAULT_ALLOCATION_FAILED,
  FAULT_INDEX_OUT_OF_BOUNDS,
  FAULT_NULL_ARRAY,
} from './constants';

export type FaultType =
  | { code: typeof FAULT_ALLOCATION_FAILED; requested: number }
  | { code: typeof FAULT_INDEX_OUT_OF_BOUNDS; index: number; length: number }
  | { code: typeof FAULT_NULL_ARRAY; index: number };

export type FaultCode = FaultType['code'];

function describeFault(type: FaultType): string {
  switch (type.code) {
    case FAULT_ALLOCATION_FAILED:
      return `cannot allocate ${type.requested} slots`;
    case FAULT_INDEX_OUT_OF_BOUNDS:
      return `index ${type.index} out of bounds for length ${type.length}`;
    case FAULT_NULL_ARRAY:
      return `index ${type.index} on a null array`;
  }
}

/**
 * Fatal runtime fault with attached metadata.
 * Built by `raiseFault` and handed to the configured fault handler; the
 * operation that raised it never returns.
 */
export class RuntimeFault extends Error {
  readonly type: FaultType;

  constructor(type: FaultType) {
    super(`${type.code}: ${describeFault(type)}`);
    this.name = 'RuntimeFault';
    this.type = type;
  }

  get code(): FaultCode {
    return this.type.code;
  }

  /**
   * Metadata plus the stack, for the fault log record
   */
  toObject(): Record<string, string | number> {
    return {
      ...this.type,
      stack: this.stack ?? '',
    };
  }
}
