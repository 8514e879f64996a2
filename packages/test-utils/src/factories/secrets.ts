/**
 * Secret Record Factories
 */

import type { SecretRecord } from '@pgrotate/rotation';

export const PRIMARY_HOST = 'orders-db.c1a2b3.us-east-1.rds.amazonaws.com';
export const REPLICA_HOST = 'orders-db-replica.c1a2b3.us-east-1.rds.amazonaws.com';
export const OTHER_HOST = 'billing-db.c1a2b3.us-east-1.rds.amazonaws.com';

/**
 * Create a valid secret record, overriding any field
 */
export function createSecretRecord(overrides: Partial<SecretRecord> = {}): SecretRecord {
  return {
    engine: 'postgres',
    host: PRIMARY_HOST,
    username: 'app_user',
    password: 'test-password',
    dbname: 'orders',
    port: 5432,
    ...overrides,
  };
}

/**
 * Create a master secret; master secrets carry only what they need
 */
export function createMasterSecret(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    username: 'master_user',
    password: 'test-master-password',
    ...overrides,
  };
}
