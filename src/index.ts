/**
 * @fileoverview Persistent expiring key-value mapping on SQLite
 *
 * Entries are stamped with an expiry time on every write. Expired rows are
 * deleted by triggers whenever a value is inserted or updated.
 */

export * from './storage';
export * from './config';
export { LogCategory, Logger, logger, resolveLogLevel } from './logging';
export type { LogContext, LogLevel } from './logging';
