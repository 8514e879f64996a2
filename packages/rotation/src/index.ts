/**
 * @pgrotate/rotation
 *
 * Single-user PostgreSQL credential rotation: the rotation steps, the
 * components they use and the AWS / pg adapters.
 */

// Types
export * from './types.js';

// Secret records
export * from './secretRecord.js';

// Components
export { tryInOrder } from './fallback.js';
export { resolveSslPolicy, sslAttemptOrder, type SslPolicy } from './sslPolicy.js';
export * from './sql.js';
export * from './secretAccessor.js';
export * from './connectionNegotiator.js';
export * from './replicaVerifier.js';
export * from './userProvisioner.js';
export * from './rotationStateMachine.js';

// Adapters
export * from './adapters/secretsManagerVault.js';
export * from './adapters/rdsInstanceDirectory.js';
export * from './adapters/pgSessionFactory.js';

// Wiring and entry point
export * from './service.js';
export * from './handler.js';
