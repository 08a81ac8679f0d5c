/**
 * Validation utilities for storage operations
 */

import { ValidationError } from './error-handling';

/**
 * Iteration order for keys, values and items
 */
export enum Order {
  /** Insertion order */
  ID = 'id',
  /** Lexical key order */
  KEY = 'key',
  /** Expiry order */
  EXPIRE = 'expire'
}

const ORDERS: readonly string[] = Object.values(Order);

/**
 * Validate key format
 */
export function validateKey(key: unknown): asserts key is string {
  if (typeof key !== 'string') {
    throw new ValidationError(`Key must be a string, got ${typeof key}`);
  }
}

/**
 * Largest lifespan, either sign, whose expiry stamp stays a safe integer
 * for any clock reading before 2106
 */
export const MAX_LIFESPAN = Number.MAX_SAFE_INTEGER - 2 ** 32;

/**
 * Validate a lifespan in seconds. Negative values are allowed: they stamp
 * entries as already expired.
 */
export function validateLifespan(
  lifespan: unknown
): asserts lifespan is number {
  if (typeof lifespan !== 'number' || !Number.isFinite(lifespan)) {
    throw new ValidationError(
      `Lifespan must be a finite number of seconds, got ${String(lifespan)}`
    );
  }
  if (Math.abs(lifespan) > MAX_LIFESPAN) {
    throw new ValidationError(
      `Lifespan must be at most ${MAX_LIFESPAN} seconds either way, got ${lifespan}`
    );
  }
}

/**
 * Validate an iteration order. The value is interpolated as a column name,
 * so anything outside the enum is rejected.
 */
export function validateOrder(order: unknown): asserts order is Order {
  if (typeof order !== 'string' || !ORDERS.includes(order)) {
    throw new ValidationError(
      `Invalid order: ${String(order)}. Valid orders are: ${ORDERS.join(', ')}`
    );
  }
}

/**
 * Expiry offsets are bound into an INTEGER column
 */
export function lifespanToSeconds(lifespan: number): number {
  return Math.trunc(lifespan);
}
