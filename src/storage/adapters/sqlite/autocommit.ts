/**
 * @fileoverview Long-lived, non-scoped access to an expiring table
 *
 * Statements commit as they run unless a transaction is opened by hand with
 * `begin()`. Call `close()` when done; a mapping that is garbage collected
 * while its handle is still open gets closed as a last resort.
 */

import Database from 'better-sqlite3';

import { LogCategory, logger } from '../../../logging';
import { parseStoreOptions } from '../../schemas/options';
import {
  ConnectionError,
  ErrorMapper,
  ReentrancyError,
  StorageError,
  toError
} from '../../utils/error-handling';
import { createZlibJsonSerializer } from '../../utils/serialization';
import { Identifier, toIdentifier } from '../../utils/sql-utils';
import { TransactionMode } from '../../utils/transactions';
import { resolveCapabilities } from './capabilities';
import { openDatabase, optimizeAndClose } from './connection';
import { ExpiringConnection } from './operations/kv';
import { SQLiteStoreOptions } from './types';

export type SQLiteAutocommitOptions<V> = Omit<
  SQLiteStoreOptions<V>,
  'transaction'
>;

export interface OpenHandle {
  db: Database.Database;
  path: string;
  readonly: boolean;
}

/**
 * Last-resort cleanup for a mapping that became unreachable while its
 * handle was still open
 */
export function closeUnreferenced(handle: OpenHandle): void {
  if (!handle.db.open) {
    return;
  }
  logger.warn(
    LogCategory.STORAGE,
    'SQLiteAutocommitStore',
    'Store was garbage collected without close()',
    { path: handle.path }
  );
  try {
    optimizeAndClose(handle.db, handle.readonly);
  } catch (error) {
    logger.warn(
      LogCategory.STORAGE,
      'SQLiteAutocommitStore',
      'Failed to close unreferenced store',
      { path: handle.path, error: toError(error).message }
    );
  }
}

// Keyed on the mapping, not the store: callers may keep only `store.map`
const unclosed = new FinalizationRegistry<OpenHandle>(closeUnreferenced);

export class SQLiteAutocommitStore<V = unknown> {
  private readonly db: Database.Database;
  private closed = false;

  readonly map: ExpiringConnection<V>;
  readonly path: string;
  readonly table: Identifier;
  readonly readonly: boolean;

  constructor(options: SQLiteAutocommitOptions<V>) {
    const validated = parseStoreOptions(options);

    this.path = validated.path;
    this.table = toIdentifier(validated.table);
    this.readonly = validated.readonly;

    let db: Database.Database;
    try {
      db = openDatabase(validated);
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      throw new ConnectionError(
        `Failed to establish connection: ${toError(error).message}`,
        toError(error)
      );
    }

    try {
      const capabilities = resolveCapabilities(db);
      const prepare = db.transaction(
        () =>
          new ExpiringConnection<V>({
            db,
            table: this.table,
            serializer: options.serializer ?? createZlibJsonSerializer<V>(),
            lifespan: validated.lifespan,
            capabilities,
            readonly: validated.readonly
          })
      );
      this.map = validated.readonly ? prepare.deferred() : prepare.immediate();
    } catch (error) {
      db.close();
      throw error;
    }

    this.db = db;
    unclosed.register(
      this.map,
      { db, path: this.path, readonly: this.readonly },
      this.map
    );

    logger.debug(LogCategory.STORAGE, 'SQLiteAutocommitStore', 'Opened', {
      path: this.path,
      table: this.table.value
    });
  }

  get lifespan(): number {
    return this.map.lifespan;
  }

  set lifespan(value: number) {
    this.map.lifespan = value;
  }

  get inTransaction(): boolean {
    return this.db.inTransaction;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Open a manual transaction; statements then commit together
   * @throws {ReentrancyError} If one is already open
   */
  begin(mode: TransactionMode = 'DEFERRED'): void {
    if (this.db.inTransaction) {
      throw new ReentrancyError('SQLiteAutocommitStore transaction');
    }
    this.exec(`BEGIN ${mode} TRANSACTION`, 'begin');
  }

  commit(): void {
    this.assertInTransaction('commit');
    this.exec('COMMIT', 'commit');
  }

  rollback(): void {
    this.assertInTransaction('rollback');
    this.exec('ROLLBACK', 'rollback');
  }

  /**
   * Optimize and close the database. An open manual transaction is rolled
   * back. Calling this again does nothing.
   */
  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    unclosed.unregister(this.map);

    if (this.db.inTransaction) {
      logger.warn(
        LogCategory.STORAGE,
        'SQLiteAutocommitStore',
        'Closing with an open transaction; rolling back',
        { path: this.path }
      );
      try {
        this.exec('ROLLBACK', 'close');
      } finally {
        optimizeAndClose(this.db, this.readonly);
      }
    } else {
      optimizeAndClose(this.db, this.readonly);
    }
    logger.debug(LogCategory.STORAGE, 'SQLiteAutocommitStore', 'Closed', {
      path: this.path
    });
  }

  private assertInTransaction(operation: string): void {
    if (!this.db.inTransaction) {
      throw new StorageError(
        `Cannot ${operation}: no transaction is open`,
        'NO_TRANSACTION',
        'sqlite',
        operation
      );
    }
  }

  private exec(sql: string, operation: string): void {
    try {
      this.db.exec(sql);
    } catch (error) {
      throw ErrorMapper.withContext(error, 'sqlite', operation);
    }
  }
}
