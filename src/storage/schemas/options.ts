/**
 * @fileoverview Zod validation schemas for store options
 */

import { z } from 'zod';

import {
  DEFAULT_BUSY_TIMEOUT,
  DEFAULT_LIFESPAN
} from '../adapters/sqlite/types';
import { ValidationError } from '../utils/error-handling';
import { isSerializer, Serializer } from '../utils/serialization';
import { DEFAULT_TABLE_NAME, Identifier } from '../utils/sql-utils';
import { TRANSACTION_MODES, TransactionMode } from '../utils/transactions';
import { MAX_LIFESPAN } from '../utils/validation';

function isTransactionMode(value: unknown): value is TransactionMode {
  return TRANSACTION_MODES.some((mode) => mode === value);
}

export const StoreOptionsSchema = z.object({
  path: z.string(),
  table: z
    .union([z.string(), z.instanceof(Identifier)])
    .default(DEFAULT_TABLE_NAME),
  lifespan: z
    .number()
    .finite()
    .min(-MAX_LIFESPAN)
    .max(MAX_LIFESPAN)
    .default(DEFAULT_LIFESPAN),
  transaction: z
    .custom<TransactionMode>(isTransactionMode, {
      message: `Expected one of ${TRANSACTION_MODES.join(', ')}`
    })
    .default('IMMEDIATE'),
  serializer: z
    .custom<Serializer<unknown>>(isSerializer, {
      message: 'Serializer must provide dumps() and loads()'
    })
    .optional(),
  readonly: z.boolean().default(false),
  timeout: z.number().int().min(0).default(DEFAULT_BUSY_TIMEOUT),
  walMode: z.boolean().default(true),
  verbose: z.boolean().default(false)
});

/**
 * Options with every default filled in
 */
export type ValidatedStoreOptions = z.infer<typeof StoreOptionsSchema>;

/**
 * Validate store options
 * @throws {ValidationError} Listing every failing field
 */
export function parseStoreOptions(options: unknown): ValidatedStoreOptions {
  const result = StoreOptionsSchema.safeParse(options);

  if (!result.success) {
    throw new ValidationError(
      `Invalid store options: ${result.error.errors
        .map((err) => `${err.path.join('.')}: ${err.message}`)
        .join('; ')}`
    );
  }

  return result.data;
}
