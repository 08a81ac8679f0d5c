/**
 * @fileoverview Local development configuration preset
 *
 * A file in the working directory, WAL journaling and the default one week
 * lifespan.
 */

import {
  DEFAULT_BUSY_TIMEOUT,
  DEFAULT_LIFESPAN
} from '../../storage/adapters/sqlite/types';
import { DEFAULT_TABLE_NAME } from '../../storage/utils/sql-utils';
import type { ExpiringStoreConfig } from '../types';

export const localPreset: ExpiringStoreConfig = {
  path: './ttl-sqlite-map.db',
  table: DEFAULT_TABLE_NAME,
  lifespan: DEFAULT_LIFESPAN,
  transaction: 'IMMEDIATE',
  timeout: DEFAULT_BUSY_TIMEOUT,
  walMode: true,
  verbose: false
};
