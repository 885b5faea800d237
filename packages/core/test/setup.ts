/**
 * Test setup: faults throw instead of aborting the worker.
 */

import { afterEach, beforeEach } from 'vitest';
import { configureRuntime, resetRuntime } from '../src';

beforeEach(() => {
  configureRuntime({
    onFault: (fault) => {
      throw fault;
    },
  });
});

afterEach(() => {
  resetRuntime();
});
