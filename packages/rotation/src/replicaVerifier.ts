/**
 * Replica Verifier
 *
 * Decides whether one database host is a managed read replica of another.
 * Lookup failures count as "not a replica".
 */

import { createServiceLogger, describeError, type ServiceLogger } from '@pgrotate/core';
import type { InstanceDescription, InstanceDirectory } from './types.js';

/**
 * Instance identifier of an endpoint: its leading DNS label
 */
export function instanceIdentifier(host: string): string {
  return host.split('.')[0];
}

export class ReplicaVerifier {
  private readonly logger: ServiceLogger;

  constructor(
    private readonly directory: InstanceDirectory,
    logger?: ServiceLogger
  ) {
    this.logger = logger ?? createServiceLogger('replica-verifier');
  }

  async isReplica(candidate: { host: string }, master: { host: string }): Promise<boolean> {
    const replicaId = instanceIdentifier(candidate.host);
    const masterId = instanceIdentifier(master.host);

    let instances: InstanceDescription[];
    try {
      instances = await this.directory.describeInstances(replicaId);
    } catch (error) {
      this.logger.warn('Encountered error while verifying RDS replica status', {
        instanceIdentifier: replicaId,
        error: describeError(error),
      });
      return false;
    }

    // Instance identifiers are unique, so there is at most one result
    const [instance] = instances;
    if (!instance) {
      this.logger.info(
        `Cannot verify replica status - no RDS instance found with identifier: ${replicaId}`
      );
      return false;
    }

    return instance.readReplicaSourceIdentifier === masterId;
  }
}
