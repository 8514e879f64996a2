/**
 * Rotation Runtime
 *
 * Wires the rotation components to their collaborators. The AWS and pg
 * adapters are used unless an override is given.
 */

import {
  createServiceLogger,
  type RotationConfig,
  type ServiceLoggerOptions,
} from '@pgrotate/core';
import { createRdsClient, RdsInstanceDirectory } from './adapters/rdsInstanceDirectory.js';
import { createPgSessionFactory } from './adapters/pgSessionFactory.js';
import {
  createSecretsManagerClient,
  SecretsManagerVault,
} from './adapters/secretsManagerVault.js';
import { ConnectionNegotiator } from './connectionNegotiator.js';
import { ReplicaVerifier } from './replicaVerifier.js';
import { RotationStateMachine } from './rotationStateMachine.js';
import { SecretAccessor } from './secretAccessor.js';
import type { InstanceDirectory, SecretVault, SessionFactory } from './types.js';
import { UserProvisioner } from './userProvisioner.js';

export interface RotationRuntimeOverrides {
  vault?: SecretVault;
  directory?: InstanceDirectory;
  sessionFactory?: SessionFactory;
  /** Target logger and context shared by every component */
  logging?: ServiceLoggerOptions;
}

export interface RotationRuntime {
  vault: SecretVault;
  secrets: SecretAccessor;
  stateMachine: RotationStateMachine;
}

export function createRotationRuntime(
  config: RotationConfig,
  overrides: RotationRuntimeOverrides = {}
): RotationRuntime {
  const logging = overrides.logging ?? {};

  const vault =
    overrides.vault ??
    new SecretsManagerVault(
      createSecretsManagerClient({ endpoint: config.secretsManagerEndpoint, region: config.region })
    );
  const directory = overrides.directory ?? new RdsInstanceDirectory(createRdsClient(config.region));
  const sessionFactory =
    overrides.sessionFactory ??
    createPgSessionFactory({
      sslRootCertPath: config.sslRootCertPath,
      logger: createServiceLogger('pg-session', logging),
    });

  const secrets = new SecretAccessor(vault);
  const negotiator = new ConnectionNegotiator({
    sessionFactory,
    connectTimeoutMs: config.connectTimeoutSeconds * 1000,
    logger: createServiceLogger('connection-negotiator', logging),
  });
  const replicas = new ReplicaVerifier(directory, createServiceLogger('replica-verifier', logging));
  const provisioner = new UserProvisioner({
    secrets,
    negotiator,
    replicas,
    logger: createServiceLogger('user-provisioner', logging),
  });

  const stateMachine = new RotationStateMachine({
    vault,
    secrets,
    negotiator,
    provisioner,
    excludeCharacters: config.excludeCharacters,
    logger: createServiceLogger('rotation', logging),
  });

  return { vault, secrets, stateMachine };
}
