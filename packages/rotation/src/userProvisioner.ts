/**
 * User Provisioner
 *
 * Creates the rotated role on first rotation when the secret names a
 * master secret (`masterarn`) whose credential may create roles.
 */

import {
  AuthFailureError,
  createServiceLogger,
  DEFAULT_DATABASE_NAME,
  PolicyViolationError,
  type ServiceLogger,
} from '@pgrotate/core';
import type { ConnectionNegotiator } from './connectionNegotiator.js';
import type { ReplicaVerifier } from './replicaVerifier.js';
import type { SecretAccessor } from './secretAccessor.js';
import { validateSecretRecord, type RawSecret, type SecretRecord } from './secretRecord.js';
import {
  createRoleStatement,
  quoteIdentifier,
  quoteLiteral,
  roleExists,
  withSession,
  withTransaction,
} from './sql.js';

export interface UserProvisionerOptions {
  secrets: SecretAccessor;
  negotiator: ConnectionNegotiator;
  replicas: ReplicaVerifier;
  logger?: ServiceLogger;
}

/**
 * Complete a master secret from the child it provisions for.
 *
 * Two phases, in this order: every field the master lacks (missing or
 * falsy) is copied from the child, then `dbname` is taken from the child
 * unconditionally.
 */
export function inheritFromChild(
  master: RawSecret,
  child: SecretRecord,
  masterArn: string
): SecretRecord {
  const merged: RawSecret = { ...master };

  for (const [key, value] of Object.entries(child)) {
    if (!merged[key]) {
      merged[key] = value;
    }
  }

  merged.dbname = child.dbname;

  return validateSecretRecord(merged, `master secret ${masterArn}`);
}

export class UserProvisioner {
  private readonly secrets: SecretAccessor;
  private readonly negotiator: ConnectionNegotiator;
  private readonly replicas: ReplicaVerifier;
  private readonly logger: ServiceLogger;

  constructor(options: UserProvisionerOptions) {
    this.secrets = options.secrets;
    this.negotiator = options.negotiator;
    this.replicas = options.replicas;
    this.logger = options.logger ?? createServiceLogger('user-provisioner');
  }

  /**
   * Ensure the record's role exists, creating it with the master credential.
   * Resolves true when the role was created by this call.
   */
  async ensureUser(record: SecretRecord): Promise<boolean> {
    const masterArn = record.masterarn;
    if (!masterArn) {
      return false;
    }

    const master = inheritFromChild(await this.secrets.fetchMaster(masterArn), record, masterArn);

    if (record.host !== master.host && !(await this.replicas.isReplica(record, master))) {
      const message = `Current database host ${record.host} is not the same host as/rds replica of master ${master.host}`;
      this.logger.error(`ensureUser: ${message}`, { masterArn });
      throw new PolicyViolationError(message);
    }

    const session = await this.negotiator.connect(master);
    if (!session) {
      const message = `Unable to log into database using credentials in master secret ${masterArn}`;
      this.logger.error(`ensureUser: ${message}`);
      throw new AuthFailureError(message);
    }

    const created = await withSession(session, (connection) =>
      withTransaction(connection, async (tx) => {
        const identifier = await quoteIdentifier(tx, record.username);
        if (await roleExists(tx, record.username)) {
          return false;
        }
        const passwordLiteral = await quoteLiteral(tx, record.password);
        await tx.query(createRoleStatement(identifier, passwordLiteral));
        return true;
      })
    );

    if (created) {
      this.logger.info(
        `ensureUser: Successfully created user ${record.username} in PostgreSQL DB ${record.dbname || DEFAULT_DATABASE_NAME}`
      );
    } else {
      this.logger.debug(`ensureUser: User ${record.username} already exists on ${record.host}`);
    }
    return created;
  }
}
