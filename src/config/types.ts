import type { TransactionMode } from '../storage/utils/transactions';

/**
 * Plain, serializable store settings. Everything but the serializer.
 */
export interface ExpiringStoreConfig {
  path: string;
  table: string;
  lifespan: number;
  transaction: TransactionMode;
  timeout: number;
  walMode: boolean;
  verbose: boolean;
}
