/**
 * @fileoverview Tests for store option validation
 */

import { describe, expect, it } from '@jest/globals';

import { ValidationError } from '../../utils/error-handling';
import { createJsonSerializer } from '../../utils/serialization';
import { Identifier } from '../../utils/sql-utils';
import { parseStoreOptions } from '../options';

describe('parseStoreOptions', () => {
  it('should fill in defaults', () => {
    expect(parseStoreOptions({ path: 'cache.db' })).toEqual({
      path: 'cache.db',
      table: 'expiring_store',
      lifespan: 604800,
      transaction: 'IMMEDIATE',
      readonly: false,
      timeout: 5000,
      walMode: true,
      verbose: false
    });
  });

  it('should keep given values', () => {
    const serializer = createJsonSerializer();
    const table = new Identifier('sessions');
    const options = parseStoreOptions({
      path: ':memory:',
      table,
      lifespan: -1,
      transaction: 'EXCLUSIVE',
      serializer,
      timeout: 0
    });

    expect(options.table).toBe(table);
    expect(options.serializer).toBe(serializer);
    expect(options.lifespan).toBe(-1);
    expect(options.transaction).toBe('EXCLUSIVE');
    expect(options.timeout).toBe(0);
  });

  it('should list every invalid field', () => {
    expect(() =>
      parseStoreOptions({
        path: 'cache.db',
        transaction: 'LAZY',
        serializer: { dumps: () => Buffer.alloc(0) }
      })
    ).toThrow(
      'Invalid store options: transaction: Expected one of DEFERRED, IMMEDIATE, EXCLUSIVE; serializer: Serializer must provide dumps() and loads()'
    );
  });

  it('should require a path', () => {
    expect(() => parseStoreOptions({})).toThrow(ValidationError);
    expect(() => parseStoreOptions({})).toThrow(
      'Invalid store options: path: Required'
    );
  });

  it('should reject non-finite lifespans', () => {
    expect(() =>
      parseStoreOptions({ path: 'cache.db', lifespan: Infinity })
    ).toThrow(ValidationError);
  });
});
