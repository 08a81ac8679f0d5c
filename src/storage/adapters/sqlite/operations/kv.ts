/**
 * @fileoverview SQLite key-value operations: the expiring mapping
 */

import Database from 'better-sqlite3';

import { LogCategory, logger } from '../../../../logging';
import {
  ErrorMapper,
  NotFoundError,
  ReadOnlyViolationError,
  toError
} from '../../../utils/error-handling';
import { Serializer } from '../../../utils/serialization';
import { Identifier } from '../../../utils/sql-utils';
import {
  lifespanToSeconds,
  Order,
  validateKey,
  validateLifespan
} from '../../../utils/validation';
import { EngineCapabilities, nowExpression } from '../capabilities';
import { migrateSchema, MigrationReport } from '../schema';
import { ExpiringConnectionOptions } from '../types';
import { decodeValue, ItemsView, KeysView, ValuesView } from './views';

export type EntrySource<V> =
  | Iterable<readonly [string, V]>
  | Record<string, V>;

function isEntryIterable<V>(
  entries: EntrySource<V>
): entries is Iterable<readonly [string, V]> {
  return typeof Reflect.get(entries, Symbol.iterator) === 'function';
}

/**
 * A mapping over one table whose entries expire.
 *
 * Expired rows are removed by triggers when a value is inserted or
 * updated. Reads, deletion and postponement never remove other rows, so
 * `size` and lookups may still see rows that expired since the last write.
 *
 * Constructing a connection migrates the table; do it inside a transaction
 * (`SQLiteExpiringStore` does) so a failed migration leaves no trace.
 */
export class ExpiringConnection<V> implements Iterable<string> {
  private readonly db: Database.Database;
  private readonly serializer: Serializer<V>;
  private readonly capabilities: EngineCapabilities;
  private readonly now: string;
  private lifespanSeconds: number;

  readonly table: Identifier;
  readonly readonly: boolean;
  readonly migration: MigrationReport;

  constructor(options: ExpiringConnectionOptions<V>) {
    validateLifespan(options.lifespan);

    this.db = options.db;
    this.table = options.table;
    this.serializer = options.serializer;
    this.capabilities = options.capabilities;
    this.readonly = options.readonly ?? false;
    this.lifespanSeconds = options.lifespan;
    this.now = nowExpression(options.capabilities);

    this.migration = this.guard('migrate', () =>
      migrateSchema(this.db, this.table, {
        capabilities: this.capabilities,
        readonly: this.readonly
      })
    );
  }

  /**
   * The underlying better-sqlite3 handle
   */
  get connection(): Database.Database {
    return this.db;
  }

  /**
   * Seconds added to the current time on each write or postponement.
   *
   * Changing this only affects future writes; stored expiry stamps stay as
   * they are until the entries are set or postponed again.
   */
  get lifespan(): number {
    return this.lifespanSeconds;
  }

  set lifespan(value: number) {
    validateLifespan(value);
    this.lifespanSeconds = value;
  }

  /**
   * Count of rows in the table
   */
  get size(): number {
    return this.guard('size', () => {
      const count: unknown = this.db
        .prepare(`SELECT COUNT(*) FROM ${this.table}`)
        .pluck()
        .get();
      return typeof count === 'number' ? count : Number(count ?? 0);
    });
  }

  len(): number {
    return this.size;
  }

  isEmpty(): boolean {
    return this.size === 0;
  }

  has(key: string): boolean {
    validateKey(key);
    return this.guard(
      'has',
      () =>
        this.db
          .prepare(`SELECT 1 FROM ${this.table} WHERE key = ?`)
          .get(key) !== undefined
    );
  }

  /**
   * Fetch and decode the value stored under `key`
   * @throws {NotFoundError} If the key is absent
   */
  get(key: string): V {
    validateKey(key);
    const found = this.lookup(key);
    if (!found.present) {
      throw new NotFoundError(key);
    }
    return found.value;
  }

  getOr<F>(key: string, fallback: F): V | F {
    validateKey(key);
    const found = this.lookup(key);
    return found.present ? found.value : fallback;
  }

  /**
   * Insert or replace `key`, stamping it to expire after the lifespan.
   * This is what evicts expired rows.
   */
  set(key: string, value: V): void {
    validateKey(key);
    this.assertWritable('set');
    const encoded = this.serializer.dumps(value);
    const offset = lifespanToSeconds(this.lifespanSeconds);

    this.guard('set', () => {
      if (this.capabilities.atomicUpsert) {
        this.db
          .prepare(
            `INSERT INTO ${this.table} (key, expire, value)
               VALUES (?, ${this.now} + ?, ?)
               ON CONFLICT (key) DO UPDATE
               SET value = excluded.value, expire = excluded.expire`
          )
          .run(key, offset, encoded);
        return;
      }

      // Check-then-write: racy between processes, only used on engines
      // without upsert support
      if (this.has(key)) {
        this.db
          .prepare(
            `UPDATE ${this.table}
               SET expire = ${this.now} + ?, value = ?
               WHERE key = ?`
          )
          .run(offset, encoded, key);
      } else {
        this.db
          .prepare(
            `INSERT INTO ${this.table} (key, expire, value)
               VALUES (?, ${this.now} + ?, ?)`
          )
          .run(key, offset, encoded);
      }
    });
  }

  /**
   * Remove `key`. Does not evict other expired rows.
   * @throws {NotFoundError} If the key is absent
   */
  delete(key: string): void {
    validateKey(key);
    this.assertWritable('delete');
    const result = this.guard('delete', () =>
      this.db.prepare(`DELETE FROM ${this.table} WHERE key = ?`).run(key)
    );
    if (result.changes !== 1) {
      throw new NotFoundError(key);
    }
  }

  /**
   * Remove `key` and return its value
   * @throws {NotFoundError} If the key is absent and no fallback is given
   */
  pop(key: string): V;
  pop<F>(key: string, fallback: F): V | F;
  pop<F>(key: string, ...fallback: [F] | []): V | F {
    validateKey(key);
    this.assertWritable('pop');
    const found = this.lookup(key);
    if (!found.present) {
      if (fallback.length === 1) {
        return fallback[0];
      }
      throw new NotFoundError(key);
    }
    this.delete(key);
    return found.value;
  }

  /**
   * Return the stored value, or store and return `value` when absent
   */
  setDefault(key: string, value: V): V {
    validateKey(key);
    const found = this.lookup(key);
    if (found.present) {
      return found.value;
    }
    this.set(key, value);
    return value;
  }

  update(entries: EntrySource<V>): void {
    const pairs = isEntryIterable(entries) ? entries : Object.entries(entries);
    for (const [key, value] of pairs) {
      this.set(key, value);
    }
  }

  clear(): void {
    this.assertWritable('clear');
    this.guard('clear', () => {
      this.db.prepare(`DELETE FROM ${this.table}`).run();
    });
  }

  /**
   * Push back the expiry of `key`, if present, without touching its value.
   * Does not fire the eviction triggers.
   */
  postpone(key: string): void {
    validateKey(key);
    this.assertWritable('postpone');
    this.guard('postpone', () => {
      this.db
        .prepare(
          `UPDATE ${this.table} SET expire = ${this.now} + ? WHERE key = ?`
        )
        .run(lifespanToSeconds(this.lifespanSeconds), key);
    });
  }

  /**
   * Push back the expiry of every entry at once
   */
  postponeAll(): void {
    this.assertWritable('postpone');
    this.guard('postponeAll', () => {
      this.db
        .prepare(`UPDATE ${this.table} SET expire = ${this.now} + ?`)
        .run(lifespanToSeconds(this.lifespanSeconds));
    });
  }

  keys(order: Order = Order.ID): KeysView {
    return new KeysView(this.db, this.table, order);
  }

  values(order: Order = Order.ID): ValuesView<V> {
    return new ValuesView(this.db, this.table, this.serializer, order);
  }

  items(order: Order = Order.ID): ItemsView<V> {
    return new ItemsView(this.db, this.table, this.serializer, order);
  }

  /**
   * Keys in insertion order
   */
  [Symbol.iterator](): IterableIterator<string> {
    return this.keys()[Symbol.iterator]();
  }

  /**
   * Keys in reverse insertion order
   */
  reversed(): IterableIterator<string> {
    return this.keys().reversed();
  }

  private lookup(
    key: string
  ): { present: true; value: V } | { present: false } {
    const stored: unknown = this.guard('get', () =>
      this.db
        .prepare(`SELECT value FROM ${this.table} WHERE key = ?`)
        .pluck()
        .get(key)
    );
    if (stored === undefined) {
      return { present: false };
    }
    return { present: true, value: decodeValue(this.serializer, key, stored) };
  }

  private assertWritable(operation: string): void {
    if (this.readonly) {
      throw new ReadOnlyViolationError(operation);
    }
  }

  /**
   * Run an engine call, mapping driver errors to storage errors
   */
  private guard<R>(operation: string, fn: () => R): R {
    try {
      return fn();
    } catch (error) {
      const mapped = ErrorMapper.withContext(error, 'sqlite', operation);
      if (mapped.cause !== undefined) {
        logger.debug(
          LogCategory.STORAGE,
          'ExpiringConnection',
          'Engine error',
          {
            operation,
            table: this.table.value,
            code: mapped.code,
            error: toError(error).message
          }
        );
      }
      throw mapped;
    }
  }
}
