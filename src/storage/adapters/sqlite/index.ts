/**
 * @fileoverview SQLite expiring store
 *
 * Each session opens the database, begins a transaction and hands back an
 * `ExpiringConnection`; ending the session commits (or rolls back) and
 * closes the handle.
 *
 * @example
 * ```typescript
 * const store = new SQLiteExpiringStore<string>({ path: './cache.db' });
 * store.run((map) => {
 *   map.set('greeting', 'hello');
 * });
 * ```
 */

import { LogCategory, logger } from '../../../logging';
import { parseStoreOptions } from '../../schemas/options';
import { ReentrancyError, StorageError } from '../../utils/error-handling';
import { createZlibJsonSerializer } from '../../utils/serialization';
import { Identifier, toIdentifier } from '../../utils/sql-utils';
import { Scope, TransactionManager, withScope } from '../../utils/transactions';
import { SQLiteConnectionManager } from './connection';
import { ExpiringConnection } from './operations/kv';
import { SQLiteStoreOptions } from './types';

// Export types
export type { SQLiteStoreOptions, ExpiringConnectionOptions } from './types';
export type { SQLiteConnectionConfig } from './connection';
export type { EntrySource } from './operations/kv';

/**
 * Scoped, transactional access to one expiring table
 */
export class SQLiteExpiringStore<V = unknown>
  implements Scope<ExpiringConnection<V>>
{
  private readonly connectionManager: SQLiteConnectionManager<V>;
  private transactionManager?: TransactionManager<ExpiringConnection<V>>;

  readonly path: string;
  readonly table: Identifier;
  readonly readonly: boolean;

  constructor(options: SQLiteStoreOptions<V>) {
    const validated = parseStoreOptions(options);

    this.path = validated.path;
    this.table = toIdentifier(validated.table);
    this.readonly = validated.readonly;

    this.connectionManager = new SQLiteConnectionManager<V>({
      path: validated.path,
      table: this.table,
      lifespan: validated.lifespan,
      transaction: validated.transaction,
      serializer: options.serializer ?? createZlibJsonSerializer<V>(),
      readonly: validated.readonly,
      timeout: validated.timeout,
      walMode: validated.walMode,
      verbose: validated.verbose
    });
  }

  /**
   * Seconds each write or postponement adds to the current time.
   * Applies to sessions entered after the change.
   */
  get lifespan(): number {
    return this.connectionManager.lifespan;
  }

  set lifespan(value: number) {
    this.connectionManager.lifespan = value;
  }

  /**
   * Whether a session is currently open
   */
  get active(): boolean {
    return this.transactionManager !== undefined;
  }

  /**
   * Open the database and begin a transaction
   * @throws {ReentrancyError} If a session is already open
   */
  enter(): ExpiringConnection<V> {
    if (this.transactionManager) {
      throw new ReentrancyError('SQLiteExpiringStore');
    }

    const transactions = this.connectionManager.enter();
    let connection: ExpiringConnection<V>;
    try {
      connection = transactions.enter();
    } catch (error) {
      this.connectionManager.exit(error);
      throw error;
    }

    this.transactionManager = transactions;
    logger.debug(
      LogCategory.STORAGE,
      'SQLiteExpiringStore',
      'Session opened',
      {
        path: this.path,
        table: this.table.value,
        transaction: transactions.current?.id
      }
    );
    return connection;
  }

  /**
   * Commit, or roll back when `error` is given, then close the database.
   * The handle is closed even if the commit fails.
   */
  exit(error?: unknown): void {
    const transactions = this.transactionManager;
    if (!transactions) {
      throw new StorageError(
        'SQLiteExpiringStore exited without being entered',
        'NOT_ENTERED'
      );
    }
    this.transactionManager = undefined;

    try {
      transactions.exit(error);
    } finally {
      this.connectionManager.exit(error);
    }
  }

  /**
   * Run `fn` in a session: committed when it returns, rolled back when it
   * throws. `fn` must be synchronous.
   */
  run<R>(fn: (map: ExpiringConnection<V>) => R): R {
    return withScope(this, fn);
  }
}

export { SQLiteAutocommitStore } from './autocommit';
export type { SQLiteAutocommitOptions } from './autocommit';
export {
  SQLiteConnectionManager,
  assertDirectoryExists,
  openDatabase,
  optimizeAndClose
} from './connection';
export { ExpiringConnection } from './operations/kv';
export {
  ItemsView,
  KeysView,
  OrderedView,
  ValuesView,
  decodeValue
} from './operations/views';
export {
  APPLICATION_ID,
  SCHEMA_VERSION,
  detectLayout,
  migrateSchema
} from './schema';
export type { MigrationOptions, MigrationReport, TableLayout } from './schema';
export {
  capabilitiesFor,
  nowExpression,
  parseSqliteVersion,
  resolveCapabilities
} from './capabilities';
export type { EngineCapabilities } from './capabilities';
export { DEFAULT_BUSY_TIMEOUT, DEFAULT_LIFESPAN } from './types';
