/**
 * Common storage utilities
 * @module storage/utils
 */

export * from './serialization';
export * from './error-handling';
export * from './transactions';
export * from './validation';
export * from './base-connection-manager';
export * from './sql-utils';
