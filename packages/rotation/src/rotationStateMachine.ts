/**
 * Rotation State Machine
 *
 * Drives the four rotation steps for a single-user PostgreSQL secret. All
 * state lives in the vault's stage labels; every step can be repeated.
 */

import {
  AuthFailureError,
  createServiceLogger,
  DEFAULT_EXCLUDE_CHARACTERS,
  InvalidStateError,
  isNotFoundError,
  NotFoundError,
  PolicyViolationError,
  SchemaError,
  type ServiceLogger,
} from '@pgrotate/core';
import type { ConnectionNegotiator } from './connectionNegotiator.js';
import { tryInOrder } from './fallback.js';
import type { SecretAccessor } from './secretAccessor.js';
import type { SecretRecord } from './secretRecord.js';
import {
  alterPasswordStatement,
  quoteIdentifier,
  quoteLiteral,
  VALIDATION_SQL,
  withSession,
  withTransaction,
} from './sql.js';
import {
  VersionStage,
  type RotationRequest,
  type RotationStep,
  type SecretVault,
  type StepOutcome,
} from './types.js';
import type { UserProvisioner } from './userProvisioner.js';

export interface RotationStateMachineOptions {
  vault: SecretVault;
  secrets: SecretAccessor;
  negotiator: ConnectionNegotiator;
  provisioner: UserProvisioner;
  excludeCharacters?: string;
  logger?: ServiceLogger;
}

type StepHandler = (secretId: string, token: string) => Promise<StepOutcome>;

type Staging = 'pending' | 'already-current';

type FallbackCandidate = { label: 'current' | 'previous'; record: SecretRecord };

/**
 * Find the version holding `stage` in a version → stages map
 */
export function findVersionWithStage(
  versionStages: Record<string, string[]>,
  stage: VersionStage
): string | undefined {
  return Object.keys(versionStages).find((versionId) => versionStages[versionId].includes(stage));
}

/**
 * PREVIOUS with CURRENT's ssl setting; PREVIOUS's own setting may be stale
 */
export function withSslOf(previous: SecretRecord, current: SecretRecord): SecretRecord {
  const { ssl: _staleSsl, ...rest } = previous;
  return current.ssl === undefined ? rest : { ...rest, ssl: current.ssl };
}

/**
 * Refuse to apply a pending password to any account other than the one the
 * reference credential belongs to.
 */
function assertSameAccount(
  pending: SecretRecord,
  reference: SecretRecord,
  referenceLabel: 'current' | 'previous valid'
): void {
  if (pending.username !== reference.username) {
    throw new PolicyViolationError(
      `Attempting to modify user ${pending.username} other than ${referenceLabel} user ${reference.username}`
    );
  }
  if (pending.host !== reference.host) {
    throw new PolicyViolationError(
      `Attempting to modify user for host ${pending.host} other than ${referenceLabel} host ${reference.host}`
    );
  }
}

export class RotationStateMachine {
  private readonly vault: SecretVault;
  private readonly secrets: SecretAccessor;
  private readonly negotiator: ConnectionNegotiator;
  private readonly provisioner: UserProvisioner;
  private readonly excludeCharacters: string;
  private readonly logger: ServiceLogger;
  private readonly steps: Record<RotationStep, StepHandler>;

  constructor(options: RotationStateMachineOptions) {
    this.vault = options.vault;
    this.secrets = options.secrets;
    this.negotiator = options.negotiator;
    this.provisioner = options.provisioner;
    this.excludeCharacters = options.excludeCharacters ?? DEFAULT_EXCLUDE_CHARACTERS;
    this.logger = options.logger ?? createServiceLogger('rotation');
    this.steps = {
      createSecret: (secretId, token) => this.createSecret(secretId, token),
      setSecret: (secretId, token) => this.setSecret(secretId, token),
      testSecret: (secretId, token) => this.testSecret(secretId, token),
      finishSecret: (secretId, token) => this.finishSecret(secretId, token),
    };
  }

  /**
   * Validate the version's staging, then run the requested step
   */
  async run(request: RotationRequest): Promise<StepOutcome> {
    const { secretId, token, step } = request;
    const operation = this.logger.startOperation(step, { secretArn: secretId, versionId: token });

    try {
      const staging = await this.checkStaging(secretId, token);
      if (staging === 'already-current') {
        const detail = `Secret version ${token} already set as ${VersionStage.Current} for secret ${secretId}`;
        operation.success(`${step}: ${detail}`);
        return { step, changed: false, detail };
      }

      const outcome = await this.steps[step](secretId, token);
      operation.success(`${step}: ${outcome.detail}`, { changed: outcome.changed });
      return outcome;
    } catch (error) {
      operation.failure(error);
      throw error;
    }
  }

  /**
   * Store a freshly generated password as the pending version, unless a
   * pending version already exists for this token.
   */
  async createSecret(secretId: string, token: string): Promise<StepOutcome> {
    const current = await this.secrets.fetch(secretId, VersionStage.Current);

    try {
      await this.secrets.fetch(secretId, VersionStage.Pending, { token });
      return {
        step: 'createSecret',
        changed: false,
        detail: `Successfully retrieved secret for ${secretId}`,
      };
    } catch (error) {
      if (!isNotFoundError(error)) {
        throw error;
      }
    }

    const password = await this.vault.getRandomPassword({
      excludeCharacters: this.excludeCharacters,
    });

    await this.vault.putSecretValue({
      secretId,
      versionId: token,
      secretString: JSON.stringify({ ...current, password }),
      stages: [VersionStage.Pending],
    });

    return {
      step: 'createSecret',
      changed: true,
      detail: `Successfully put secret for ARN ${secretId} and version ${token}`,
    };
  }

  /**
   * Make the pending password the role's password in the database
   */
  async setSecret(secretId: string, token: string): Promise<StepOutcome> {
    const previous = await this.fetchOptional(secretId, VersionStage.Previous);
    const current = await this.secrets.fetch(secretId, VersionStage.Current);
    const pending = await this.secrets.fetch(secretId, VersionStage.Pending, { token });

    await this.provisioner.ensureUser(current);

    const pendingSession = await this.negotiator.connect(pending);
    if (pendingSession) {
      await pendingSession.end();
      return {
        step: 'setSecret',
        changed: false,
        detail: `${VersionStage.Pending} secret is already set as password in PostgreSQL DB for secret arn ${secretId}`,
      };
    }

    assertSameAccount(pending, current, 'current');

    const candidates: FallbackCandidate[] = [{ label: 'current', record: current }];
    if (previous) {
      candidates.push({ label: 'previous', record: withSslOf(previous, current) });
    }

    const session = await tryInOrder(candidates, async (candidate) => {
      if (candidate.label === 'previous') {
        assertSameAccount(pending, candidate.record, 'previous valid');
      }
      return this.negotiator.connect(candidate.record);
    });

    if (!session) {
      throw new AuthFailureError(
        `Unable to log into database with previous, current, or pending secret of secret arn ${secretId}`
      );
    }

    await withSession(session, (connection) =>
      withTransaction(connection, async (tx) => {
        const identifier = await quoteIdentifier(tx, pending.username);
        const passwordLiteral = await quoteLiteral(tx, pending.password);
        await tx.query(alterPasswordStatement(identifier, passwordLiteral));
      })
    );

    return {
      step: 'setSecret',
      changed: true,
      detail: `Successfully set password for user ${pending.username} in PostgreSQL DB for secret arn ${secretId}`,
    };
  }

  /**
   * Sign in with the pending secret and run the validation query
   */
  async testSecret(secretId: string, token: string): Promise<StepOutcome> {
    const pending = await this.secrets.fetch(secretId, VersionStage.Pending, { token });

    const session = await this.negotiator.connect(pending);
    if (!session) {
      throw new AuthFailureError(
        `Unable to log into database with pending secret of secret ARN ${secretId}`
      );
    }

    // Permission checks for the rotated role belong here
    await withSession(session, (connection) =>
      withTransaction(connection, (tx) => tx.query(VALIDATION_SQL))
    );

    return {
      step: 'testSecret',
      changed: false,
      detail: `Successfully signed into PostgreSQL DB with ${VersionStage.Pending} secret in ${secretId}`,
    };
  }

  /**
   * Move the current stage label onto the rotated version
   */
  async finishSecret(secretId: string, token: string): Promise<StepOutcome> {
    const description = await this.vault.describeSecret(secretId);
    const currentVersion = findVersionWithStage(description.versionStages, VersionStage.Current);

    if (currentVersion === token) {
      return {
        step: 'finishSecret',
        changed: false,
        detail: `Version ${token} already marked as ${VersionStage.Current} for ${secretId}`,
      };
    }

    await this.vault.updateSecretVersionStage({
      secretId,
      stage: VersionStage.Current,
      moveToVersionId: token,
      removeFromVersionId: currentVersion,
    });

    return {
      step: 'finishSecret',
      changed: true,
      detail: `Successfully set ${VersionStage.Current} stage to version ${token} for secret ${secretId}`,
    };
  }

  private async checkStaging(secretId: string, token: string): Promise<Staging> {
    const description = await this.vault.describeSecret(secretId);

    if (description.rotationEnabled === false) {
      throw new PolicyViolationError(`Secret ${secretId} is not enabled for rotation`);
    }

    const stages = Object.hasOwn(description.versionStages, token)
      ? description.versionStages[token]
      : undefined;
    if (stages === undefined) {
      throw new InvalidStateError(
        `Secret version ${token} has no stage for rotation of secret ${secretId}`
      );
    }
    if (stages.includes(VersionStage.Current)) {
      return 'already-current';
    }
    if (!stages.includes(VersionStage.Pending)) {
      throw new InvalidStateError(
        `Secret version ${token} not set as ${VersionStage.Pending} for rotation of secret ${secretId}`
      );
    }
    return 'pending';
  }

  /**
   * Fetch a stage that may legitimately be absent or unusable
   */
  private async fetchOptional(
    secretId: string,
    stage: VersionStage
  ): Promise<SecretRecord | null> {
    try {
      return await this.secrets.fetch(secretId, stage);
    } catch (error) {
      if (error instanceof NotFoundError || error instanceof SchemaError) {
        this.logger.debug(`No usable ${stage} version for ${secretId}`, { reason: error.kind });
        return null;
      }
      throw error;
    }
  }
}
