/**
 * Tests for fault reporting and runtime configuration
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  FAULT_INDEX_OUT_OF_BOUNDS,
  FAULT_NULL_ARRAY,
  RuntimeFault,
  arrayGet,
  arrayNew,
  configureRuntime,
  getRuntimeOptions,
  resetRuntime,
} from './index';
import { RuntimeLogger, getLogger, logFault, optionsFromEnv } from './internal';

class AbortCalled extends Error {}

function stubAbort() {
  return vi.spyOn(process, 'abort').mockImplementation(() => {
    throw new AbortCalled('process.abort');
  });
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('default fault handler', () => {
  it('should log the fault and abort', () => {
    resetRuntime();
    const abort = stubAbort();
    const error = vi.spyOn(RuntimeLogger.prototype, 'error').mockImplementation(() => {});

    expect(() => arrayGet(null, 2)).toThrow(AbortCalled);
    expect(abort).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      'NULL_ARRAY: index 2 on a null array',
      expect.objectContaining({ code: FAULT_NULL_ARRAY, index: 2 })
    );
  });

  it('should be the configured handler after a reset', () => {
    resetRuntime();
    expect(getRuntimeOptions().onFault).toBe(logFault);
  });
});

describe('custom fault handler', () => {
  it('should receive the fault before the abort', () => {
    const abort = stubAbort();
    const seen: RuntimeFault[] = [];
    configureRuntime({ onFault: (fault) => seen.push(fault) });

    expect(() => arrayGet(arrayNew(2), 5)).toThrow(AbortCalled);
    expect(abort).toHaveBeenCalledTimes(1);
    expect(seen).toHaveLength(1);
    expect(seen[0].type).toEqual({ code: FAULT_INDEX_OUT_OF_BOUNDS, index: 5, length: 2 });
  });

  it('should unwind the faulting call when the handler throws', () => {
    const abort = stubAbort();
    configureRuntime({
      onFault: (fault) => {
        throw fault;
      },
    });

    expect(() => arrayGet(arrayNew(1), 1)).toThrow(RuntimeFault);
    expect(abort).not.toHaveBeenCalled();
  });
});

describe('RuntimeFault', () => {
  it('should expose its metadata and stack', () => {
    const fault = new RuntimeFault({ code: FAULT_INDEX_OUT_OF_BOUNDS, index: -1, length: 4 });

    expect(fault).toBeInstanceOf(Error);
    expect(fault.name).toBe('RuntimeFault');
    expect(fault.code).toBe(FAULT_INDEX_OUT_OF_BOUNDS);
    expect(fault.toObject()).toEqual({
      code: FAULT_INDEX_OUT_OF_BOUNDS,
      index: -1,
      length: 4,
      stack: fault.stack,
    });
  });
});

describe('configuration', () => {
  it('should merge partial options', () => {
    const handler = (): void => {};
    configureRuntime({ onFault: handler });
    const options = configureRuntime({ logFormat: 'json' });

    expect(options.onFault).toBe(handler);
    expect(options.logFormat).toBe('json');
    expect(options.logLevel).toBe('error');
  });

  it('should keep the current handler when given undefined', () => {
    resetRuntime();
    const options = configureRuntime({ onFault: undefined, logLevel: undefined });

    expect(options.onFault).toBe(logFault);
    expect(options.logLevel).toBe('error');
  });

  it('should still abort after a handler was set to undefined', () => {
    resetRuntime();
    configureRuntime({ onFault: undefined });
    const abort = stubAbort();
    vi.spyOn(RuntimeLogger.prototype, 'error').mockImplementation(() => {});

    expect(() => arrayGet(null, 0)).toThrow(AbortCalled);
    expect(abort).toHaveBeenCalledTimes(1);
  });

  it('should rebuild the logger when the level changes', () => {
    const before = getLogger();
    configureRuntime({ logLevel: 'warn' });

    expect(getLogger()).not.toBe(before);
    expect(getLogger().level).toBe('warn');
  });

  it('should keep the logger when only the handler changes', () => {
    const before = getLogger();
    configureRuntime({ onFault: () => {} });

    expect(getLogger()).toBe(before);
  });

  it('should read log settings from the environment', () => {
    expect(optionsFromEnv({ O_RUNTIME_LOG_LEVEL: 'debug', O_RUNTIME_LOG_FORMAT: 'json' })).toEqual({
      logLevel: 'debug',
      logFormat: 'json',
    });
  });

  it('should fall back to defaults for unknown environment values', () => {
    expect(optionsFromEnv({ O_RUNTIME_LOG_LEVEL: 'loud', O_RUNTIME_LOG_FORMAT: 'xml' })).toEqual({
      logLevel: 'error',
      logFormat: 'human',
    });
    expect(optionsFromEnv({})).toEqual({ logLevel: 'error', logFormat: 'human' });
  });
});
