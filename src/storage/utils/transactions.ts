/**
 * Transaction utilities for the SQLite engine
 */

import { LogCategory, logger } from '../../logging';
import { ReentrancyError, StorageError, toError } from './error-handling';

/**
 * Something acquired on `enter()` and released on `exit()`.
 * `exit(error)` is the failure path; `exit()` the success path.
 */
export interface Scope<T> {
  enter(): T;
  exit(error?: unknown): void;
}

export type TransactionMode = 'DEFERRED' | 'IMMEDIATE' | 'EXCLUSIVE';

export const TRANSACTION_MODES: readonly TransactionMode[] = [
  'DEFERRED',
  'IMMEDIATE',
  'EXCLUSIVE'
] as const;

/**
 * The slice of a database handle transactions need
 */
export interface TransactionalEngine {
  exec(sql: string): unknown;
  readonly inTransaction: boolean;
}

export interface Transaction {
  id: string;
  mode: TransactionMode;
  startTime: number;
  state: 'active' | 'committed' | 'aborted';
}

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    'then' in value &&
    typeof value.then === 'function'
  );
}

/**
 * Run `body` inside a scope, releasing it on every exit path.
 *
 * A failing body rolls back through `exit(error)` and the original error is
 * rethrown. Bodies must be synchronous: a returned promise would outlive
 * the transaction, so it is rejected and the scope rolled back.
 */
export function withScope<T, R>(scope: Scope<T>, body: (value: T) => R): R {
  const value = scope.enter();
  let result: R;

  try {
    result = body(value);
  } catch (error) {
    scope.exit(error);
    throw error;
  }

  if (isPromiseLike(result)) {
    const error = new StorageError(
      'Scoped callbacks must be synchronous; the transaction was rolled back',
      'ASYNC_SCOPE'
    );
    scope.exit(error);
    throw error;
  }

  scope.exit();
  return result;
}

let transactionCounter = 0;

/**
 * Issues BEGIN / COMMIT / ROLLBACK around a handle built by `factory`.
 *
 * One transaction at a time; the manager can be entered again once the
 * previous transaction has been exited.
 */
export class TransactionManager<T> implements Scope<T> {
  private transaction?: Transaction;

  constructor(
    private readonly engine: TransactionalEngine,
    private readonly factory: () => T,
    private readonly mode: TransactionMode = 'IMMEDIATE'
  ) {}

  /**
   * Get the transaction currently open through this manager
   */
  get current(): Transaction | undefined {
    return this.transaction;
  }

  enter(): T {
    if (this.transaction) {
      throw new ReentrancyError('TransactionManager');
    }

    this.engine.exec(`BEGIN ${this.mode} TRANSACTION`);
    const transaction: Transaction = {
      id: `txn-${++transactionCounter}`,
      mode: this.mode,
      startTime: Date.now(),
      state: 'active'
    };
    this.transaction = transaction;

    try {
      return this.factory();
    } catch (error) {
      this.exit(error);
      throw error;
    }
  }

  exit(error?: unknown): void {
    const transaction = this.transaction;
    if (!transaction) {
      throw new StorageError(
        'TransactionManager exited without being entered',
        'NOT_ENTERED'
      );
    }
    this.transaction = undefined;

    if (error === undefined) {
      this.commit(transaction);
    } else {
      this.rollback(transaction, error);
    }
  }

  private commit(transaction: Transaction): void {
    try {
      this.engine.exec('COMMIT');
      transaction.state = 'committed';
    } catch (commitError) {
      transaction.state = 'aborted';
      // A failed COMMIT can leave the transaction open
      if (this.engine.inTransaction) {
        try {
          this.engine.exec('ROLLBACK');
        } catch (rollbackError) {
          logger.warn(
            LogCategory.STORAGE,
            'TransactionManager',
            'Rollback after failed commit also failed',
            { id: transaction.id, error: toError(rollbackError).message }
          );
        }
      }
      throw commitError;
    }

    logger.debug(LogCategory.STORAGE, 'TransactionManager', 'Committed', {
      id: transaction.id,
      mode: transaction.mode,
      durationMs: Date.now() - transaction.startTime
    });
  }

  private rollback(transaction: Transaction, reason: unknown): void {
    transaction.state = 'aborted';

    // SQLite rolls back on its own after some errors (SQLITE_FULL, ...)
    if (!this.engine.inTransaction) {
      return;
    }

    try {
      this.engine.exec('ROLLBACK');
    } catch (rollbackError) {
      throw new StorageError(
        `Rollback failed after: ${toError(reason).message}`,
        'ROLLBACK_FAILED',
        undefined,
        'rollback',
        toError(rollbackError)
      );
    }

    logger.debug(LogCategory.STORAGE, 'TransactionManager', 'Rolled back', {
      id: transaction.id,
      reason: toError(reason).message
    });
  }
}
