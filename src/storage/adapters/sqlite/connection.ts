/**
 * @fileoverview SQLite connection management
 */

import { existsSync } from 'fs';
import { dirname, resolve } from 'path';

import Database from 'better-sqlite3';

import { LogCategory, logger } from '../../../logging';
import { BaseConnectionManager } from '../../utils/base-connection-manager';
import {
  DirectoryNotFoundError,
  StorageError,
  toError
} from '../../utils/error-handling';
import { Serializer } from '../../utils/serialization';
import { Identifier } from '../../utils/sql-utils';
import {
  Scope,
  TransactionManager,
  TransactionMode
} from '../../utils/transactions';
import { validateLifespan } from '../../utils/validation';
import { EngineCapabilities, resolveCapabilities } from './capabilities';
import { ExpiringConnection } from './operations/kv';

/**
 * Fully resolved settings the connection manager works from
 */
export interface SQLiteConnectionConfig<V> {
  path: string;
  table: Identifier;
  lifespan: number;
  transaction: TransactionMode;
  serializer: Serializer<V>;
  readonly: boolean;
  timeout: number;
  walMode: boolean;
  verbose: boolean;
}

export interface SQLiteConnection {
  db: Database.Database;
  capabilities: EngineCapabilities;
}

function isMemoryPath(path: string): boolean {
  return path === ':memory:' || path === '';
}

/**
 * Fail early when the database file's directory is missing
 */
export function assertDirectoryExists(path: string): void {
  if (isMemoryPath(path) || path.startsWith('file:')) {
    return;
  }
  const directory = dirname(resolve(path));
  if (!existsSync(directory)) {
    throw new DirectoryNotFoundError(directory);
  }
}

/**
 * Open a handle with the store's pragmas applied
 */
export function openDatabase(
  config: Pick<
    SQLiteConnectionConfig<unknown>,
    'path' | 'readonly' | 'timeout' | 'walMode' | 'verbose'
  >
): Database.Database {
  assertDirectoryExists(config.path);

  const db = new Database(config.path, {
    readonly: config.readonly,
    fileMustExist: config.readonly,
    timeout: config.timeout,
    verbose: config.verbose
      ? (message?: unknown) =>
          logger.debug(LogCategory.STORAGE, 'SQLiteConnection', 'SQL', {
            sql: message
          })
      : undefined
  });

  try {
    if (config.walMode && !config.readonly && !isMemoryPath(config.path)) {
      db.pragma('journal_mode = WAL');
    }
    if (!config.readonly) {
      db.pragma('synchronous = NORMAL');
    }
  } catch (error) {
    db.close();
    throw error;
  }

  return db;
}

/**
 * Refresh query planner statistics, then close. Optimizing is advisory,
 * so its failure is logged; a failing close is not.
 */
export function optimizeAndClose(
  db: Database.Database,
  readonly: boolean
): void {
  if (!readonly && db.open) {
    try {
      db.pragma('analysis_limit = 8192');
      db.pragma('optimize');
    } catch (error) {
      logger.warn(LogCategory.STORAGE, 'SQLiteConnection', 'Optimize failed', {
        error: toError(error).message
      });
    }
  }
  db.close();
}

/**
 * Opens a database on `enter()` and hands back a `TransactionManager`;
 * closes it on `exit()`. Each enter opens a new handle.
 */
export class SQLiteConnectionManager<V>
  extends BaseConnectionManager<SQLiteConnectionConfig<V>, SQLiteConnection>
  implements Scope<TransactionManager<ExpiringConnection<V>>>
{
  /**
   * Lifespan handed to connections created from the next transaction on
   */
  get lifespan(): number {
    return this.config.lifespan;
  }

  set lifespan(value: number) {
    validateLifespan(value);
    this.config.lifespan = value;
  }

  enter(): TransactionManager<ExpiringConnection<V>> {
    const connection = this.open();
    const { db, capabilities } = connection;
    const readonly = this.config.readonly;
    const lifespan = this.config.lifespan;

    return new TransactionManager(
      db,
      () =>
        new ExpiringConnection<V>({
          db,
          table: this.config.table,
          serializer: this.config.serializer,
          lifespan,
          capabilities,
          readonly
        }),
      // IMMEDIATE and EXCLUSIVE take a write lock a read-only handle cannot get
      readonly ? 'DEFERRED' : this.config.transaction
    );
  }

  exit(_error?: unknown): void {
    if (!this.connection) {
      throw new StorageError(
        'SQLiteConnectionManager exited without being entered',
        'NOT_ENTERED'
      );
    }
    this.close();
  }

  protected createConnection(): SQLiteConnection {
    const db = openDatabase(this.config);

    let capabilities: EngineCapabilities;
    try {
      capabilities = resolveCapabilities(db);
    } catch (error) {
      db.close();
      throw error;
    }

    logger.debug(
      LogCategory.STORAGE,
      'SQLiteConnection',
      'Connection established',
      {
        path: this.config.path,
        table: this.config.table.value,
        sqlite: capabilities.version,
        readonly: this.config.readonly
      }
    );

    return { db, capabilities };
  }

  protected closeConnection(connection: SQLiteConnection): void {
    optimizeAndClose(connection.db, this.config.readonly);
    logger.debug(LogCategory.STORAGE, 'SQLiteConnection', 'Connection closed', {
      path: this.config.path
    });
  }
}
