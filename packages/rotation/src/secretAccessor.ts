/**
 * Secret Accessor
 *
 * Reads a staged secret version from the vault and validates it.
 */

import {
  parseSecretJson,
  validateSecretRecord,
  type RawSecret,
  type SecretRecord,
} from './secretRecord.js';
import { VersionStage, type SecretVault } from './types.js';

export interface FetchOptions {
  /** Require the version carrying the stage to be this version */
  token?: string;
}

export class SecretAccessor {
  constructor(private readonly vault: SecretVault) {}

  /**
   * Fetch the version staged `stage` and validate it as a rotation secret.
   * Rejects with NotFoundError or SchemaError.
   */
  async fetch(secretId: string, stage: VersionStage, options: FetchOptions = {}): Promise<SecretRecord> {
    const raw = await this.read(secretId, stage, options.token);
    return validateSecretRecord(raw, describeSource(secretId, stage, options.token));
  }

  /**
   * Fetch the current master secret without schema checks; master secrets
   * may omit fields (host, port, engine) that are inherited from the child.
   */
  async fetchMaster(secretId: string): Promise<RawSecret> {
    return this.read(secretId, VersionStage.Current);
  }

  private async read(secretId: string, stage: VersionStage, token?: string): Promise<RawSecret> {
    const plaintext = await this.vault.getSecretValue({ secretId, stage, versionId: token });
    return parseSecretJson(plaintext, describeSource(secretId, stage, token));
  }
}

function describeSource(secretId: string, stage: VersionStage, token?: string): string {
  return token ? `${secretId} (${stage}, version ${token})` : `${secretId} (${stage})`;
}
