/**
 * @fileoverview SQLite schema creation and migration
 *
 * Runs inside the caller's transaction, so a failure part way through
 * leaves the file as it was.
 */

import Database from 'better-sqlite3';

import { LogCategory, logger } from '../../../logging';
import {
  IncompatibleFileError,
  ReadOnlyViolationError,
  UnsupportedSchemaError
} from '../../utils/error-handling';
import { Identifier, schemaObjectNames } from '../../utils/sql-utils';
import { EngineCapabilities, nowExpression } from './capabilities';

/** Stamped into `PRAGMA application_id` of every file this library owns */
export const APPLICATION_ID = 1820903862;

/** Layout version stamped into `PRAGMA user_version` */
export const SCHEMA_VERSION = 1;

export type TableLayout = 'missing' | 'legacy' | 'current';

export interface MigrationOptions {
  capabilities: EngineCapabilities;
  readonly?: boolean;
}

export interface MigrationReport {
  table: string;
  layout: TableLayout;
  /** Rows carried over from a legacy table */
  migratedRows: number;
  version: number;
}

function readPragmaNumber(db: Database.Database, pragma: string): number {
  const value: unknown = db.pragma(pragma, { simple: true });
  if (typeof value === 'number') {
    return value;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  return 0;
}

/**
 * Tell a missing table from an unversioned one and from the current layout.
 * Unversioned tables have no `id` column.
 */
export function detectLayout(
  db: Database.Database,
  table: Identifier
): TableLayout {
  const exists = db
    .prepare("SELECT 1 FROM sqlite_master WHERE type = 'table' AND name = ?")
    .get(table.value);

  if (exists === undefined) {
    return 'missing';
  }

  const columns: unknown = db.pragma(`table_info(${table})`);
  const hasId =
    Array.isArray(columns) &&
    columns.some(
      (column: unknown) =>
        typeof column === 'object' &&
        column !== null &&
        'name' in column &&
        column.name === 'id'
    );

  return hasId ? 'current' : 'legacy';
}

function createTable(
  db: Database.Database,
  table: Identifier,
  capabilities: EngineCapabilities
): void {
  const names = schemaObjectNames(table);
  const valueType = capabilities.strictTables ? 'ANY' : 'BLOB';
  const trailer = capabilities.strictTables ? ' STRICT' : '';
  const now = nowExpression(capabilities);

  // AUTOINCREMENT keeps ids monotonic, so id order is insertion order
  db.exec(`
    CREATE TABLE ${table} (
      id INTEGER PRIMARY KEY AUTOINCREMENT NOT NULL,
      key TEXT UNIQUE NOT NULL,
      expire INTEGER NOT NULL,
      value ${valueType} NOT NULL
    )${trailer};

    CREATE INDEX ${names.expireIndex} ON ${table} (expire);

    CREATE TRIGGER ${names.insertTrigger}
      AFTER INSERT ON ${table}
    BEGIN
      DELETE FROM ${table} WHERE expire <= ${now};
    END;

    CREATE TRIGGER ${names.updateTrigger}
      AFTER UPDATE OF value ON ${table}
    BEGIN
      DELETE FROM ${table} WHERE expire <= ${now};
    END;
  `);
}

/**
 * Bring `table` to the current layout and stamp the file.
 *
 * - foreign `application_id` → `IncompatibleFileError`
 * - `user_version` above {@link SCHEMA_VERSION} → `UnsupportedSchemaError`
 * - legacy table → indexes and triggers dropped, table renamed aside,
 *   current table created, rows copied forward, old table dropped
 */
export function migrateSchema(
  db: Database.Database,
  table: Identifier,
  options: MigrationOptions
): MigrationReport {
  const { capabilities, readonly = false } = options;

  const applicationId = readPragmaNumber(db, 'application_id');
  if (applicationId !== 0 && applicationId !== APPLICATION_ID) {
    throw new IncompatibleFileError(applicationId);
  }

  const version = readPragmaNumber(db, 'user_version');
  if (version > SCHEMA_VERSION) {
    throw new UnsupportedSchemaError(version, SCHEMA_VERSION);
  }

  const layout = detectLayout(db, table);
  const report: MigrationReport = {
    table: table.value,
    layout,
    migratedRows: 0,
    version: Math.max(version, SCHEMA_VERSION)
  };

  const needsWrite =
    applicationId === 0 || version < SCHEMA_VERSION || layout !== 'current';
  if (!needsWrite) {
    return report;
  }
  if (readonly) {
    throw new ReadOnlyViolationError(`migrate table ${table.value}`);
  }

  if (applicationId === 0) {
    db.pragma(`application_id = ${APPLICATION_ID}`);
  }

  if (layout !== 'current') {
    const names = schemaObjectNames(table);

    if (layout === 'legacy') {
      db.exec(`
        DROP INDEX IF EXISTS ${names.expireIndex};
        DROP TRIGGER IF EXISTS ${names.insertTrigger};
        DROP TRIGGER IF EXISTS ${names.updateTrigger};
        ALTER TABLE ${table} RENAME TO ${names.legacyTable};
      `);
    }

    createTable(db, table, capabilities);

    if (layout === 'legacy') {
      const copied = db
        .prepare(
          `INSERT INTO ${table} (key, expire, value)
             SELECT key, expire, value FROM ${names.legacyTable}`
        )
        .run();
      report.migratedRows = copied.changes;
      db.exec(`DROP TABLE ${names.legacyTable}`);
    }
  }

  if (version < SCHEMA_VERSION) {
    db.pragma(`user_version = ${SCHEMA_VERSION}`);
  }

  logger.debug(LogCategory.STORAGE, 'SQLiteSchema', 'Schema prepared', {
    ...report
  });

  return report;
}
