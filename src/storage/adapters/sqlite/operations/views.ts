/**
 * @fileoverview Lazy, reversible key/value/item views
 *
 * Each iteration prepares and runs its own query, so a view can be walked
 * any number of times, in either direction, independently of other views.
 * Rows are streamed. Other reads may run between rows, but the handle
 * refuses writes until the iterator finishes or is returned early.
 */

import Database from 'better-sqlite3';

import {
  ErrorMapper,
  SerializationError,
  StorageError,
  toError
} from '../../../utils/error-handling';
import { Serializer, toStoredBytes } from '../../../utils/serialization';
import { Identifier } from '../../../utils/sql-utils';
import { Order, validateOrder } from '../../../utils/validation';

type Direction = 'ASC' | 'DESC';

function readColumn(row: unknown, column: string): unknown {
  if (typeof row !== 'object' || row === null || !(column in row)) {
    throw new StorageError(
      `Row is missing column "${column}"`,
      'CORRUPT_ROW',
      'sqlite',
      'iterate'
    );
  }
  return Object.getOwnPropertyDescriptor(row, column)?.value;
}

function readKey(row: unknown): string {
  const key = readColumn(row, 'key');
  if (typeof key !== 'string') {
    throw new StorageError(
      `Expected a TEXT key, got ${typeof key}`,
      'CORRUPT_ROW',
      'sqlite',
      'iterate'
    );
  }
  return key;
}

/**
 * Decode a stored value, tagging failures with the key they belong to
 */
export function decodeValue<V>(
  serializer: Serializer<V>,
  key: string,
  stored: unknown
): V {
  try {
    return serializer.loads(toStoredBytes(stored));
  } catch (error) {
    if (error instanceof SerializationError) {
      error.message = `${error.message} (key: ${key})`;
      throw error;
    }
    throw new SerializationError(
      `Failed to decode value for key ${key}: ${toError(error).message}`,
      toError(error)
    );
  }
}

function engine<R>(fn: () => R): R {
  try {
    return fn();
  } catch (error) {
    throw ErrorMapper.withContext(error, 'sqlite', 'iterate');
  }
}

export abstract class OrderedView<T> implements Iterable<T> {
  readonly order: Order;

  constructor(
    protected readonly db: Database.Database,
    protected readonly table: Identifier,
    order: Order,
    private readonly columns: string
  ) {
    validateOrder(order);
    this.order = order;
  }

  protected abstract decode(row: unknown): T;

  /**
   * Ascending by the view's order
   */
  [Symbol.iterator](): IterableIterator<T> {
    return this.iterate('ASC');
  }

  /**
   * Strictly descending by the view's order
   */
  reversed(): IterableIterator<T> {
    return this.iterate('DESC');
  }

  toArray(): T[] {
    return Array.from(this);
  }

  private *iterate(direction: Direction): IterableIterator<T> {
    const rows = engine(() =>
      this.db
        .prepare(
          `SELECT ${this.columns} FROM ${this.table} ORDER BY ${this.order} ${direction}`
        )
        .iterate()
    );
    try {
      for (;;) {
        const next = engine(() => rows.next());
        if (next.done) {
          return;
        }
        yield this.decode(next.value);
      }
    } finally {
      rows.return?.();
    }
  }
}

export class KeysView extends OrderedView<string> {
  constructor(db: Database.Database, table: Identifier, order: Order) {
    super(db, table, order, 'key');
  }

  protected decode(row: unknown): string {
    return readKey(row);
  }
}

export class ValuesView<V> extends OrderedView<V> {
  constructor(
    db: Database.Database,
    table: Identifier,
    private readonly serializer: Serializer<V>,
    order: Order
  ) {
    super(db, table, order, 'key, value');
  }

  protected decode(row: unknown): V {
    return decodeValue(this.serializer, readKey(row), readColumn(row, 'value'));
  }
}

export class ItemsView<V> extends OrderedView<[string, V]> {
  constructor(
    db: Database.Database,
    table: Identifier,
    private readonly serializer: Serializer<V>,
    order: Order
  ) {
    super(db, table, order, 'key, value');
  }

  protected decode(row: unknown): [string, V] {
    const key = readKey(row);
    return [key, decodeValue(this.serializer, key, readColumn(row, 'value'))];
  }
}
