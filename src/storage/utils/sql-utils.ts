/**
 * @fileoverview SQL identifier handling
 * Table names are user supplied, so every one that reaches generated SQL goes
 * through `Identifier`. Values never do: they are always bound parameters.
 */

import { InvalidIdentifierError } from './error-handling';

/**
 * An auto-quoting SQL identifier.
 *
 * `toString()` yields the double-quoted form with embedded quotes doubled,
 * so instances can be interpolated directly into statement text.
 *
 * @example
 * const table = new Identifier('my "cache"');
 * `SELECT * FROM ${table}`; // SELECT * FROM "my ""cache"""
 */
export class Identifier {
  readonly value: string;

  /**
   * @throws {InvalidIdentifierError} If the name contains a NUL character,
   * which SQLite cannot represent in an identifier.
   */
  constructor(value: string) {
    if (value.includes('\u0000')) {
      throw new InvalidIdentifierError(
        'SQLite identifiers must not contain null bytes'
      );
    }
    this.value = value;
  }

  /**
   * Derive a new identifier by appending to the raw name
   */
  concat(suffix: string | Identifier): Identifier {
    const raw = suffix instanceof Identifier ? suffix.value : suffix;
    return new Identifier(this.value + raw);
  }

  quote(): string {
    return `"${this.value.replace(/"/g, '""')}"`;
  }

  equals(other: string | Identifier): boolean {
    return (other instanceof Identifier ? other.value : other) === this.value;
  }

  toString(): string {
    return this.quote();
  }
}

/**
 * Accept a raw name or an existing identifier
 */
export function toIdentifier(name: string | Identifier): Identifier {
  return name instanceof Identifier ? name : new Identifier(name);
}

/**
 * Auxiliary schema object names derived from a table name
 */
export function schemaObjectNames(table: Identifier): {
  expireIndex: Identifier;
  insertTrigger: Identifier;
  updateTrigger: Identifier;
  legacyTable: Identifier;
} {
  return {
    expireIndex: table.concat('_expire_index'),
    insertTrigger: table.concat('_insert_trigger'),
    updateTrigger: table.concat('_update_trigger'),
    legacyTable: table.concat('_v0')
  };
}

/**
 * Default table name used when none is configured
 */
export const DEFAULT_TABLE_NAME = 'expiring_store';
