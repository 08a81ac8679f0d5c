/**
 * @fileoverview Production configuration preset
 *
 * Longer busy timeout for files shared by several processes. There is no
 * sensible default location, so the path must come from the caller or
 * `TTL_SQLITE_MAP_PATH`.
 */

import { DEFAULT_LIFESPAN } from '../../storage/adapters/sqlite/types';
import { DEFAULT_TABLE_NAME } from '../../storage/utils/sql-utils';
import type { ExpiringStoreConfig } from '../types';

export const productionPreset: Omit<ExpiringStoreConfig, 'path'> = {
  table: DEFAULT_TABLE_NAME,
  lifespan: DEFAULT_LIFESPAN,
  transaction: 'IMMEDIATE',
  timeout: 30000,
  walMode: true,
  verbose: false
};
