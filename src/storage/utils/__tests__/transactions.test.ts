/**
 * @fileoverview Tests for transaction scoping
 */

import { beforeEach, describe, expect, it } from '@jest/globals';

import { ReentrancyError, StorageError } from '../error-handling';
import {
  Scope,
  TransactionalEngine,
  TransactionManager,
  withScope
} from '../transactions';

class FakeEngine implements TransactionalEngine {
  statements: string[] = [];
  inTransaction = false;
  failOn?: string;

  exec(sql: string): this {
    this.statements.push(sql);
    if (sql === this.failOn) {
      throw new Error(`${sql} failed`);
    }
    if (sql.startsWith('BEGIN')) {
      this.inTransaction = true;
    } else if (sql === 'COMMIT' || sql === 'ROLLBACK') {
      this.inTransaction = false;
    }
    return this;
  }
}

describe('TransactionManager', () => {
  let engine: FakeEngine;
  let manager: TransactionManager<string>;

  beforeEach(() => {
    engine = new FakeEngine();
    manager = new TransactionManager(engine, () => 'handle');
  });

  it('should begin immediately by default and commit on success', () => {
    expect(manager.enter()).toBe('handle');
    expect(manager.current?.state).toBe('active');
    manager.exit();

    expect(engine.statements).toEqual([
      'BEGIN IMMEDIATE TRANSACTION',
      'COMMIT'
    ]);
    expect(manager.current).toBeUndefined();
  });

  it('should honor the configured mode', () => {
    const deferred = new TransactionManager(engine, () => 1, 'DEFERRED');
    deferred.enter();
    deferred.exit();
    expect(engine.statements[0]).toBe('BEGIN DEFERRED TRANSACTION');
  });

  it('should roll back when exited with an error', () => {
    manager.enter();
    manager.exit(new Error('body failed'));
    expect(engine.statements).toEqual([
      'BEGIN IMMEDIATE TRANSACTION',
      'ROLLBACK'
    ]);
  });

  it('should skip the rollback when the engine already aborted', () => {
    manager.enter();
    engine.inTransaction = false;
    manager.exit(new Error('disk full'));
    expect(engine.statements).toEqual(['BEGIN IMMEDIATE TRANSACTION']);
  });

  it('should report a failing rollback with its cause', () => {
    manager.enter();
    engine.failOn = 'ROLLBACK';

    let caught: unknown;
    try {
      manager.exit(new Error('body failed'));
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(StorageError);
    if (caught instanceof StorageError) {
      expect(caught.code).toBe('ROLLBACK_FAILED');
      expect(caught.message).toBe('Rollback failed after: body failed');
      expect(caught.cause?.message).toBe('ROLLBACK failed');
    }
  });

  it('should roll back and rethrow when commit fails', () => {
    manager.enter();
    engine.failOn = 'COMMIT';
    expect(() => manager.exit()).toThrow('COMMIT failed');
    expect(engine.statements).toEqual([
      'BEGIN IMMEDIATE TRANSACTION',
      'COMMIT',
      'ROLLBACK'
    ]);
  });

  it('should roll back when the factory throws', () => {
    const failing = new TransactionManager<string>(engine, () => {
      throw new Error('migration failed');
    });
    expect(() => failing.enter()).toThrow('migration failed');
    expect(engine.statements).toEqual([
      'BEGIN IMMEDIATE TRANSACTION',
      'ROLLBACK'
    ]);
    expect(failing.current).toBeUndefined();
  });

  it('should refuse to be entered twice', () => {
    manager.enter();
    expect(() => manager.enter()).toThrow(ReentrancyError);
    manager.exit();
    expect(manager.enter()).toBe('handle');
    manager.exit();
  });

  it('should refuse to exit without entering', () => {
    expect(() => manager.exit()).toThrow(
      'TransactionManager exited without being entered'
    );
  });
});

describe('withScope', () => {
  function recordingScope(): Scope<number> & { exits: unknown[] } {
    const exits: unknown[] = [];
    return {
      exits,
      enter: () => 42,
      exit: (error?: unknown) => {
        exits.push(error);
      }
    };
  }

  it('should exit cleanly after the body returns', () => {
    const scope = recordingScope();
    expect(withScope(scope, (value) => value + 1)).toBe(43);
    expect(scope.exits).toEqual([undefined]);
  });

  it('should exit with the error and rethrow it', () => {
    const scope = recordingScope();
    const failure = new Error('nope');
    expect(() =>
      withScope(scope, () => {
        throw failure;
      })
    ).toThrow(failure);
    expect(scope.exits).toEqual([failure]);
  });

  it('should reject asynchronous bodies', () => {
    const scope = recordingScope();
    expect(() => withScope(scope, async () => 1)).toThrow(
      'Scoped callbacks must be synchronous; the transaction was rolled back'
    );
    expect(scope.exits).toHaveLength(1);
    expect(scope.exits[0]).toBeInstanceOf(StorageError);
  });
});
