/**
 * @pgrotate/test-utils
 *
 * In-process stand-ins for the rotation collaborators:
 * - InMemorySecretVault with stage-label semantics
 * - InMemoryPostgres with transactional role changes
 * - FakeInstanceDirectory for replica lookups
 * - A recording ServiceLogger
 *
 * @example
 * ```typescript
 * import { InMemoryPostgres, createSecretRecord } from '@pgrotate/test-utils';
 *
 * const postgres = new InMemoryPostgres({ hosts: [PRIMARY_HOST], roles: { app_user: 'test-password' } });
 * const negotiator = new ConnectionNegotiator({ sessionFactory: postgres.sessionFactory });
 * const session = await negotiator.connect(createSecretRecord());
 * ```
 */

export * from './mocks/index.js';
export * from './fakes/index.js';
export * from './factories/index.js';
export * from './harness.js';
