/**
 * @fileoverview Configuration management for the expiring store
 *
 * Provides configuration factory functions for different deployment scenarios.
 * No auto-detection - the application explicitly chooses configuration.
 * Every result can be passed straight to a store constructor.
 */

import { z } from 'zod';

import { LogCategory, logger } from '../logging';
import { ValidationError } from '../storage/utils/error-handling';
import { localPreset } from './presets/local';
import { productionPreset } from './presets/production';
import type { ExpiringStoreConfig } from './types';

export type { ExpiringStoreConfig } from './types';
export { localPreset } from './presets/local';
export { productionPreset } from './presets/production';

function merge(
  base: ExpiringStoreConfig,
  overrides: Partial<ExpiringStoreConfig> = {}
): ExpiringStoreConfig {
  return {
    path: overrides.path ?? base.path,
    table: overrides.table ?? base.table,
    lifespan: overrides.lifespan ?? base.lifespan,
    transaction: overrides.transaction ?? base.transaction,
    timeout: overrides.timeout ?? base.timeout,
    walMode: overrides.walMode ?? base.walMode,
    verbose: overrides.verbose ?? base.verbose
  };
}

/**
 * Creates local development configuration
 *
 * @example
 * ```typescript
 * const store = new SQLiteExpiringStore(
 *   createLocalConfig({ path: './sessions.db', lifespan: 3600 })
 * );
 * ```
 */
export function createLocalConfig(
  overrides?: Partial<ExpiringStoreConfig>
): ExpiringStoreConfig {
  return merge(localPreset, overrides);
}

/**
 * Creates production configuration
 *
 * @throws {ValidationError} If neither `overrides.path` nor
 * `TTL_SQLITE_MAP_PATH` names the database file
 */
export function createProductionConfig(
  overrides?: Partial<ExpiringStoreConfig>,
  env: NodeJS.ProcessEnv = process.env
): ExpiringStoreConfig {
  const path = overrides?.path ?? env.TTL_SQLITE_MAP_PATH;
  if (!path) {
    throw new ValidationError(
      'Production configuration needs a database path (TTL_SQLITE_MAP_PATH)'
    );
  }
  return merge({ ...productionPreset, path }, overrides);
}

const EnvSchema = z.object({
  TTL_SQLITE_MAP_PATH: z.string().min(1).optional(),
  TTL_SQLITE_MAP_TABLE: z.string().min(1).optional(),
  TTL_SQLITE_MAP_LIFESPAN: z.coerce.number().finite().optional(),
  TTL_SQLITE_MAP_TRANSACTION: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(['DEFERRED', 'IMMEDIATE', 'EXCLUSIVE']))
    .optional(),
  TTL_SQLITE_MAP_TIMEOUT: z.coerce.number().int().min(0).optional()
});

/**
 * Read overrides from `TTL_SQLITE_MAP_*` variables on top of `base`
 * @throws {ValidationError} If a variable is set to an unusable value
 */
export function loadConfigFromEnv(
  env: NodeJS.ProcessEnv = process.env,
  base: ExpiringStoreConfig = localPreset
): ExpiringStoreConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ValidationError(
      `Invalid environment configuration: ${result.error.errors
        .map((err) => `${err.path.join('.')}: ${err.message}`)
        .join('; ')}`
    );
  }

  const vars = result.data;
  const config = merge(base, {
    path: vars.TTL_SQLITE_MAP_PATH,
    table: vars.TTL_SQLITE_MAP_TABLE,
    lifespan: vars.TTL_SQLITE_MAP_LIFESPAN,
    transaction: vars.TTL_SQLITE_MAP_TRANSACTION,
    timeout: vars.TTL_SQLITE_MAP_TIMEOUT
  });

  logger.debug(LogCategory.CONFIG, 'Config', 'Loaded from environment', {
    path: config.path,
    table: config.table,
    lifespan: config.lifespan
  });

  return config;
}
