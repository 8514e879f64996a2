/**
 * Secrets Manager Vault
 *
 * SecretVault backed by AWS Secrets Manager.
 */

import {
  DescribeSecretCommand,
  GetRandomPasswordCommand,
  GetSecretValueCommand,
  PutSecretValueCommand,
  SecretsManagerClient,
  UpdateSecretVersionStageCommand,
  type SecretsManagerClientConfig,
} from '@aws-sdk/client-secrets-manager';
import { NotFoundError } from '@pgrotate/core';
import type {
  GetSecretValueRequest,
  PutSecretValueRequest,
  SecretDescription,
  SecretVault,
  UpdateVersionStageRequest,
} from '../types.js';

export interface SecretsManagerClientOptions {
  /** Endpoint override, e.g. a VPC interface endpoint */
  endpoint?: string;
  region?: string;
}

export function createSecretsManagerClient(options: SecretsManagerClientOptions = {}): SecretsManagerClient {
  const config: SecretsManagerClientConfig = {};
  if (options.endpoint) config.endpoint = options.endpoint;
  if (options.region) config.region = options.region;
  return new SecretsManagerClient(config);
}

function isResourceNotFound(error: unknown): error is Error {
  return error instanceof Error && error.name === 'ResourceNotFoundException';
}

export class SecretsManagerVault implements SecretVault {
  constructor(private readonly client: SecretsManagerClient) {}

  async describeSecret(secretId: string): Promise<SecretDescription> {
    const output = await this.call(`Secret ${secretId}`, () =>
      this.client.send(new DescribeSecretCommand({ SecretId: secretId }))
    );

    return {
      arn: output.ARN,
      name: output.Name,
      rotationEnabled: output.RotationEnabled,
      versionStages: output.VersionIdsToStages ?? {},
    };
  }

  async getSecretValue(request: GetSecretValueRequest): Promise<string> {
    const { secretId, stage, versionId } = request;
    const target = versionId
      ? `Secret ${secretId} version ${versionId} with stage ${stage}`
      : `Secret ${secretId} with stage ${stage}`;

    const output = await this.call(target, () =>
      this.client.send(
        new GetSecretValueCommand({ SecretId: secretId, VersionStage: stage, VersionId: versionId })
      )
    );

    if (output.SecretString === undefined) {
      throw new NotFoundError(`${target} has no string value`);
    }
    return output.SecretString;
  }

  async putSecretValue(request: PutSecretValueRequest): Promise<void> {
    await this.call(`Secret ${request.secretId}`, () =>
      this.client.send(
        new PutSecretValueCommand({
          SecretId: request.secretId,
          ClientRequestToken: request.versionId,
          SecretString: request.secretString,
          VersionStages: request.stages,
        })
      )
    );
  }

  async updateSecretVersionStage(request: UpdateVersionStageRequest): Promise<void> {
    await this.call(`Secret ${request.secretId}`, () =>
      this.client.send(
        new UpdateSecretVersionStageCommand({
          SecretId: request.secretId,
          VersionStage: request.stage,
          MoveToVersionId: request.moveToVersionId,
          RemoveFromVersionId: request.removeFromVersionId,
        })
      )
    );
  }

  async getRandomPassword(options: { excludeCharacters: string }): Promise<string> {
    const output = await this.client.send(
      new GetRandomPasswordCommand({ ExcludeCharacters: options.excludeCharacters || undefined })
    );

    if (!output.RandomPassword) {
      throw new Error('Secrets Manager returned no random password');
    }
    return output.RandomPassword;
  }

  /**
   * Map the service's not-found error onto NotFoundError
   */
  private async call<T>(target: string, send: () => Promise<T>): Promise<T> {
    try {
      return await send();
    } catch (error) {
      if (isResourceNotFound(error)) {
        throw new NotFoundError(`${target} not found: ${error.message}`, { cause: error });
      }
      throw error;
    }
  }
}
