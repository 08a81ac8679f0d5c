/**
 * @fileoverview Engine feature table, resolved once per opened handle
 */

import Database from 'better-sqlite3';

import { StorageError } from '../../utils/error-handling';

export interface EngineCapabilities {
  /** SQLite library version, e.g. `3.46.1` */
  version: string;
  /** `INSERT ... ON CONFLICT DO UPDATE` (3.24) */
  atomicUpsert: boolean;
  /** `STRICT` tables and the `ANY` column type (3.37) */
  strictTables: boolean;
  /** `UNIXEPOCH()` (3.38) */
  unixEpoch: boolean;
}

type VersionTuple = readonly [number, number, number];

export function parseSqliteVersion(version: string): VersionTuple {
  const match = /^(\d+)\.(\d+)(?:\.(\d+))?/.exec(version.trim());
  if (!match) {
    throw new StorageError(
      `Unrecognized SQLite version: ${version}`,
      'UNKNOWN_ENGINE_VERSION'
    );
  }
  return [Number(match[1]), Number(match[2]), Number(match[3] ?? 0)];
}

function atLeast(
  version: VersionTuple,
  major: number,
  minor: number
): boolean {
  return version[0] > major || (version[0] === major && version[1] >= minor);
}

/**
 * Build the capability table for a given SQLite version string
 */
export function capabilitiesFor(version: string): EngineCapabilities {
  const parsed = parseSqliteVersion(version);
  return {
    version,
    atomicUpsert: atLeast(parsed, 3, 24),
    strictTables: atLeast(parsed, 3, 37),
    unixEpoch: atLeast(parsed, 3, 38)
  };
}

/**
 * Query the engine behind `db` for its version and build the table
 */
export function resolveCapabilities(db: Database.Database): EngineCapabilities {
  const version: unknown = db
    .prepare('SELECT sqlite_version()')
    .pluck()
    .get();

  if (typeof version !== 'string') {
    throw new StorageError(
      'SQLite did not report its version',
      'UNKNOWN_ENGINE_VERSION'
    );
  }

  return capabilitiesFor(version);
}

/**
 * SQL expression for the current time in epoch seconds
 */
export function nowExpression(capabilities: EngineCapabilities): string {
  return capabilities.unixEpoch
    ? 'UNIXEPOCH()'
    : "CAST(strftime('%s', 'now') AS INTEGER)";
}
