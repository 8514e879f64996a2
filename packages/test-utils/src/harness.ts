/**
 * Rotation Harness
 *
 * The rotation components wired to in-process fakes and one recording
 * logger.
 */

import {
  ConnectionNegotiator,
  ReplicaVerifier,
  RotationStateMachine,
  SecretAccessor,
  UserProvisioner,
  type RotationRuntime,
} from '@pgrotate/rotation';
import { FakeInstanceDirectory } from './fakes/instanceDirectory.js';
import type { InMemoryPostgres } from './fakes/postgres.js';
import { InMemorySecretVault } from './fakes/secretVault.js';
import { createMockServiceLogger, type MockServiceLogger } from './mocks/logger.js';

export interface RotationHarnessOptions {
  postgres: InMemoryPostgres;
  vault?: InMemorySecretVault;
  directory?: FakeInstanceDirectory;
  excludeCharacters?: string;
}

export interface RotationHarness extends RotationRuntime {
  vault: InMemorySecretVault;
  postgres: InMemoryPostgres;
  directory: FakeInstanceDirectory;
  logger: MockServiceLogger;
  negotiator: ConnectionNegotiator;
  replicas: ReplicaVerifier;
  provisioner: UserProvisioner;
}

export function createRotationHarness(options: RotationHarnessOptions): RotationHarness {
  const { postgres } = options;
  const vault = options.vault ?? new InMemorySecretVault();
  const directory = options.directory ?? new FakeInstanceDirectory();
  const logger = createMockServiceLogger();

  const secrets = new SecretAccessor(vault);
  const negotiator = new ConnectionNegotiator({ sessionFactory: postgres.sessionFactory, logger });
  const replicas = new ReplicaVerifier(directory, logger);
  const provisioner = new UserProvisioner({ secrets, negotiator, replicas, logger });
  const stateMachine = new RotationStateMachine({
    vault,
    secrets,
    negotiator,
    provisioner,
    excludeCharacters: options.excludeCharacters,
    logger,
  });

  return {
    vault,
    postgres,
    directory,
    logger,
    secrets,
    negotiator,
    replicas,
    provisioner,
    stateMachine,
  };
}
