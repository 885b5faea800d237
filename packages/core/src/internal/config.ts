/**
 * Runtime configuration: log settings and the fault handler
 */

import { ENV_LOG_FORMAT, ENV_LOG_LEVEL } from './constants';
import type { RuntimeFault } from './errors';
import {
  RuntimeLogger,
  isLogFormat,
  isLogLevel,
  type LogFormat,
  type LogLevel,
} from './logger';

/**
 * Called with every fault before the process aborts.
 * A handler that throws unwinds the faulting call instead; the runtime never
 * returns to it.
 */
export type FaultHandler = (fault: RuntimeFault) => void;

export interface RuntimeOptions {
  logLevel: LogLevel;
  logFormat: LogFormat;
  onFault: FaultHandler;
}

export const defaultLogLevel: LogLevel = 'error';
export const defaultLogFormat: LogFormat = 'human';

/** Default handler: one `error` record per fault */
export function logFault(fault: RuntimeFault): void {
  logger.error(fault.message, fault.toObject());
}

export function optionsFromEnv(
  env: Record<string, string | undefined>
): Pick<RuntimeOptions, 'logLevel' | 'logFormat'> {
  const level = env[ENV_LOG_LEVEL];
  const logFormat = env[ENV_LOG_FORMAT];
  return {
    logLevel: isLogLevel(level) ? level : defaultLogLevel,
    logFormat: isLogFormat(logFormat) ? logFormat : defaultLogFormat,
  };
}

function defaultOptions(): RuntimeOptions {
  return { ...optionsFromEnv(process.env), onFault: logFault };
}

let options: RuntimeOptions = defaultOptions();
let logger = new RuntimeLogger({ level: options.logLevel, format: options.logFormat });

function rebuildLogger(): void {
  logger.close();
  logger = new RuntimeLogger({ level: options.logLevel, format: options.logFormat });
}

export function getRuntimeOptions(): Readonly<RuntimeOptions> {
  return options;
}

export function getLogger(): RuntimeLogger {
  return logger;
}

/**
 * Merge options into the current configuration; `undefined` entries keep the
 * current value. The logger is rebuilt only when a log setting changes.
 */
export function configureRuntime(partial: Partial<RuntimeOptions>): Readonly<RuntimeOptions> {
  const next: RuntimeOptions = {
    logLevel: partial.logLevel ?? options.logLevel,
    logFormat: partial.logFormat ?? options.logFormat,
    onFault: partial.onFault ?? options.onFault,
  };
  const logChanged = next.logLevel !== options.logLevel || next.logFormat !== options.logFormat;
  options = next;
  if (logChanged) rebuildLogger();
  logger.debug('runtime configured', { logLevel: options.logLevel, logFormat: options.logFormat });
  return options;
}

export function resetRuntime(): void {
  options = defaultOptions();
  rebuildLogger();
}
