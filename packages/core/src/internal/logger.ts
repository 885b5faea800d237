/**
 * Winston-backed logger for runtime faults and configuration changes
 */

import winston from 'winston';
import { LOG_MODULE } from './constants';

export const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const LOG_FORMATS = ['human', 'json'] as const;
export type LogFormat = (typeof LOG_FORMATS)[number];

export type Context =
  | string
  | number
  | boolean
  | null
  | { [property: string]: Context }
  | Context[];

export interface LoggerOptions {
  level: LogLevel;
  format: LogFormat;
  module?: string;
}

const { createLogger, format, transports } = winston;

type Format = ReturnType<typeof format.combine>;

function contextToString(context: unknown): string {
  if (context === undefined) return '';
  if (typeof context === 'object' && context !== null) {
    return Object.entries(context)
      .filter(([key]) => key !== 'stack')
      .map(([key, value]) => `${key}=${String(value)}`)
      .join(', ');
  }
  return String(context);
}

function humanReadableFormat(): Format {
  return format.combine(
    format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
    format.printf((info) => {
      const module = typeof info.module === 'string' ? info.module : LOG_MODULE;
      const context = contextToString(info.context);
      const line = `${String(info.timestamp)} [${module}] ${info.level}: ${String(info.message)}`;
      return context ? `${line} ${context}` : line;
    })
  );
}

function getFormat(opts: LoggerOptions): Format {
  switch (opts.format) {
    case 'json':
      return format.combine(format.timestamp(), format.json());
    case 'human':
    default:
      return humanReadableFormat();
  }
}

export class RuntimeLogger {
  private winston: winston.Logger;

  constructor(options: LoggerOptions) {
    this.winston = createLogger({
      level: options.level,
      defaultMeta: { module: options.module ?? LOG_MODULE },
      format: getFormat(options),
      // every level goes to stderr
      transports: [new transports.Console({ stderrLevels: [...LOG_LEVELS] })],
      exitOnError: false,
    });
  }

  get level(): LogLevel {
    return isLogLevel(this.winston.level) ? this.winston.level : 'error';
  }

  error(message: string, context?: Context): void {
    this.winston.log('error', message, { context });
  }

  warn(message: string, context?: Context): void {
    this.winston.log('warn', message, { context });
  }

  info(message: string, context?: Context): void {
    this.winston.log('info', message, { context });
  }

  debug(message: string, context?: Context): void {
    this.winston.log('debug', message, { context });
  }

  close(): void {
    this.winston.close();
  }
}

export function isLogLevel(value: unknown): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export function isLogFormat(value: unknown): value is LogFormat {
  return LOG_FORMATS.some((logFormat) => logFormat === value);
}
