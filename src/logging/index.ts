/**
 * @fileoverview Structured logging for the store
 *
 * Thin category/component facade over pino so storage code logs with the
 * same call shape everywhere: `logger.debug(category, component, message, context)`.
 */

import pino, { Logger as PinoLogger } from 'pino';

export enum LogCategory {
  STORAGE = 'storage',
  CONFIG = 'config'
}

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LOG_LEVELS: readonly LogLevel[] = [
  'debug',
  'info',
  'warn',
  'error',
  'silent'
];

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Resolve the initial level from the environment, falling back to `info`
 */
export function resolveLogLevel(
  env: NodeJS.ProcessEnv = process.env
): LogLevel {
  const raw = (env.TTL_SQLITE_MAP_LOG_LEVEL ?? env.LOG_LEVEL ?? '')
    .trim()
    .toLowerCase();
  return isLogLevel(raw) ? raw : 'info';
}

export type LogContext = Record<string, unknown>;

export class Logger {
  private readonly base: PinoLogger;

  constructor(base?: PinoLogger) {
    this.base =
      base ?? pino({ name: 'ttl-sqlite-map', level: resolveLogLevel() });
  }

  get level(): string {
    return this.base.level;
  }

  setLevel(level: LogLevel): void {
    this.base.level = level;
  }

  debug(
    category: LogCategory,
    component: string,
    message: string,
    context?: LogContext
  ): void {
    this.base.debug({ category, component, ...context }, message);
  }

  info(
    category: LogCategory,
    component: string,
    message: string,
    context?: LogContext
  ): void {
    this.base.info({ category, component, ...context }, message);
  }

  warn(
    category: LogCategory,
    component: string,
    message: string,
    context?: LogContext
  ): void {
    this.base.warn({ category, component, ...context }, message);
  }

  error(
    category: LogCategory,
    component: string,
    message: string,
    context?: LogContext
  ): void {
    this.base.error({ category, component, ...context }, message);
  }
}

export const logger = new Logger();
