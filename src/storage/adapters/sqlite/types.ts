/**
 * @fileoverview SQLite-specific types and interfaces
 */

import Database from 'better-sqlite3';

import { Serializer } from '../../utils/serialization';
import { Identifier } from '../../utils/sql-utils';
import { TransactionMode } from '../../utils/transactions';
import { EngineCapabilities } from './capabilities';

/** One week, in seconds */
export const DEFAULT_LIFESPAN = 7 * 24 * 60 * 60;

/** Default SQLite busy timeout, in milliseconds */
export const DEFAULT_BUSY_TIMEOUT = 5000;

/**
 * Configuration options for the SQLite expiring store
 */
export interface SQLiteStoreOptions<V> {
  /**
   * Path to SQLite database file
   * Use ':memory:' for in-memory database
   */
  path: string;

  /**
   * Table holding the entries. Several tables may share one file.
   * Default: 'expiring_store'
   */
  table?: string | Identifier;

  /**
   * Seconds added to the current time to stamp each write and postponement
   * Default: one week
   */
  lifespan?: number;

  /**
   * BEGIN mode for scoped sessions
   * Default: 'IMMEDIATE', which takes the write lock up front
   */
  transaction?: TransactionMode;

  /**
   * Value codec. Default: zlib-compressed JSON
   */
  serializer?: Serializer<V>;

  /**
   * Open the file read-only; every mutation fails
   */
  readonly?: boolean;

  /**
   * Milliseconds to wait on a locked database before failing
   * Default: 5000
   */
  timeout?: number;

  /**
   * Enable WAL mode for better performance
   * Default: true
   */
  walMode?: boolean;

  /**
   * Log every executed statement at debug level
   */
  verbose?: boolean;
}

/**
 * Everything an `ExpiringConnection` is constructed from
 */
export interface ExpiringConnectionOptions<V> {
  db: Database.Database;
  table: Identifier;
  serializer: Serializer<V>;
  lifespan: number;
  capabilities: EngineCapabilities;
  readonly?: boolean;
}
