/**
 * In-memory Secret Vault
 *
 * Versions, stage labels and the rotation flag of any number of secrets,
 * with the staging rules of AWS Secrets Manager: each label sits on at most
 * one version, and moving AWSCURRENT leaves AWSPREVIOUS on the version it
 * came from.
 */

import { NotFoundError } from '@pgrotate/core';
import {
  VersionStage,
  type GetSecretValueRequest,
  type PutSecretValueRequest,
  type SecretDescription,
  type SecretVault,
  type UpdateVersionStageRequest,
} from '@pgrotate/rotation';

interface StoredVersion {
  secretString?: string;
  stages: Set<string>;
}

interface StoredSecret {
  rotationEnabled?: boolean;
  versions: Map<string, StoredVersion>;
}

export interface SeedVersion {
  versionId: string;
  /** Objects are stored as JSON; omit to reserve a version without a value */
  value?: object | string;
  stages?: string[];
}

export type VaultMutation =
  | { kind: 'put'; secretId: string; versionId: string; stages: string[] }
  | {
      kind: 'updateStage';
      secretId: string;
      stage: string;
      moveToVersionId: string;
      removeFromVersionId?: string;
    };

export interface InMemorySecretVaultOptions {
  /** Defaults to generated-password-1, generated-password-2, ... */
  generatePassword?: (excludeCharacters: string) => string;
}

export class InMemorySecretVault implements SecretVault {
  readonly mutations: VaultMutation[] = [];
  /** excludeCharacters of every password request */
  readonly passwordRequests: string[] = [];

  private readonly secrets = new Map<string, StoredSecret>();
  private readonly generatePassword: (excludeCharacters: string) => string;
  private generated = 0;

  constructor(options: InMemorySecretVaultOptions = {}) {
    this.generatePassword =
      options.generatePassword ??
      (() => {
        this.generated += 1;
        return `generated-password-${this.generated}`;
      });
  }

  seed(secretId: string, ...versions: SeedVersion[]): this {
    const secret = this.secretOrCreate(secretId);
    for (const version of versions) {
      const stored = secret.versions.get(version.versionId) ?? { stages: new Set<string>() };
      if (version.value !== undefined) {
        stored.secretString =
          typeof version.value === 'string' ? version.value : JSON.stringify(version.value);
      }
      secret.versions.set(version.versionId, stored);
      for (const stage of version.stages ?? []) {
        this.attachStage(secret, stage, version.versionId);
      }
    }
    return this;
  }

  setRotationEnabled(secretId: string, enabled: boolean | undefined): this {
    this.secretOrCreate(secretId).rotationEnabled = enabled;
    return this;
  }

  /** Parsed JSON value of a version */
  secretValue(secretId: string, versionId: string): unknown {
    const secretString = this.secrets.get(secretId)?.versions.get(versionId)?.secretString;
    return secretString === undefined ? undefined : JSON.parse(secretString);
  }

  stagesOf(secretId: string, versionId: string): string[] {
    return [...(this.secrets.get(secretId)?.versions.get(versionId)?.stages ?? [])].sort();
  }

  versionWithStage(secretId: string, stage: string): string | undefined {
    const secret = this.secrets.get(secretId);
    if (!secret) return undefined;
    for (const [versionId, version] of secret.versions) {
      if (version.stages.has(stage)) return versionId;
    }
    return undefined;
  }

  async describeSecret(secretId: string): Promise<SecretDescription> {
    const secret = this.secretOrThrow(secretId);
    const versionStages: Record<string, string[]> = {};
    for (const [versionId, version] of secret.versions) {
      if (version.stages.size > 0) {
        versionStages[versionId] = [...version.stages];
      }
    }
    return { arn: secretId, name: secretId, rotationEnabled: secret.rotationEnabled, versionStages };
  }

  async getSecretValue(request: GetSecretValueRequest): Promise<string> {
    const { secretId, stage, versionId } = request;
    const secret = this.secretOrThrow(secretId);
    const holder = this.versionWithStage(secretId, stage);

    if (holder === undefined || (versionId !== undefined && holder !== versionId)) {
      throw new NotFoundError(
        `Secret ${secretId} has no version${versionId ? ` ${versionId}` : ''} with stage ${stage}`
      );
    }

    const secretString = secret.versions.get(holder)?.secretString;
    if (secretString === undefined) {
      throw new NotFoundError(`Secret ${secretId} version ${holder} has no string value`);
    }
    return secretString;
  }

  async putSecretValue(request: PutSecretValueRequest): Promise<void> {
    const secret = this.secretOrThrow(request.secretId);
    const existing = secret.versions.get(request.versionId);

    if (existing?.secretString !== undefined && existing.secretString !== request.secretString) {
      throw new Error(
        `ResourceExistsException: version ${request.versionId} of ${request.secretId} already has a different value`
      );
    }

    secret.versions.set(request.versionId, {
      secretString: request.secretString,
      stages: existing?.stages ?? new Set<string>(),
    });
    for (const stage of request.stages) {
      this.attachStage(secret, stage, request.versionId);
    }

    this.mutations.push({
      kind: 'put',
      secretId: request.secretId,
      versionId: request.versionId,
      stages: [...request.stages],
    });
  }

  async updateSecretVersionStage(request: UpdateVersionStageRequest): Promise<void> {
    const { secretId, stage, moveToVersionId, removeFromVersionId } = request;
    const secret = this.secretOrThrow(secretId);

    if (!secret.versions.has(moveToVersionId)) {
      throw new NotFoundError(`Secret ${secretId} has no version ${moveToVersionId}`);
    }
    const holder = this.versionWithStage(secretId, stage);
    if (holder !== undefined && holder !== moveToVersionId && holder !== removeFromVersionId) {
      throw new Error(
        `InvalidParameterException: stage ${stage} is attached to ${holder}, not ${String(removeFromVersionId)}`
      );
    }

    this.attachStage(secret, stage, moveToVersionId);
    if (stage === VersionStage.Current && holder !== undefined && holder !== moveToVersionId) {
      this.attachStage(secret, VersionStage.Previous, holder);
    }

    this.mutations.push({ kind: 'updateStage', secretId, stage, moveToVersionId, removeFromVersionId });
  }

  async getRandomPassword(options: { excludeCharacters: string }): Promise<string> {
    this.passwordRequests.push(options.excludeCharacters);
    return this.generatePassword(options.excludeCharacters);
  }

  private attachStage(secret: StoredSecret, stage: string, versionId: string): void {
    for (const version of secret.versions.values()) {
      version.stages.delete(stage);
    }
    secret.versions.get(versionId)?.stages.add(stage);
  }

  private secretOrCreate(secretId: string): StoredSecret {
    let secret = this.secrets.get(secretId);
    if (!secret) {
      secret = { rotationEnabled: true, versions: new Map() };
      this.secrets.set(secretId, secret);
    }
    return secret;
  }

  private secretOrThrow(secretId: string): StoredSecret {
    const secret = this.secrets.get(secretId);
    if (!secret) {
      throw new NotFoundError(`Secret ${secretId} not found`);
    }
    return secret;
  }
}
