/**
 * @fileoverview Storage module exports
 */

export * from './utils';
export * from './adapters/sqlite';
export { StoreOptionsSchema, parseStoreOptions } from './schemas/options';
export type { ValidatedStoreOptions } from './schemas/options';
