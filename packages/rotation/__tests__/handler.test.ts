/**
 * Rotation Handler Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { Writable } from 'stream';
import winston from 'winston';
import { createLogger, loadConfig, SchemaError } from '@pgrotate/core';
import {
  createSecretRecord,
  FakeInstanceDirectory,
  InMemoryPostgres,
  InMemorySecretVault,
  PRIMARY_HOST,
} from '@pgrotate/test-utils';
import { createHandler, parseRotationEvent } from '../src/handler.js';
import { VersionStage } from '../src/types.js';

const SECRET = 'test-secret';

describe('parseRotationEvent', () => {
  it('should map the event onto a rotation request', () => {
    expect(
      parseRotationEvent({ SecretId: SECRET, ClientRequestToken: 'token-2', Step: 'testSecret' })
    ).toEqual({ secretId: SECRET, token: 'token-2', step: 'testSecret' });
  });

  it('should reject an unknown step', () => {
    expect(() =>
      parseRotationEvent({ SecretId: SECRET, ClientRequestToken: 'token-2', Step: 'rotateSecret' })
    ).toThrow(SchemaError);
  });

  it('should name the missing field', () => {
    expect(() => parseRotationEvent({ SecretId: SECRET, Step: 'setSecret' })).toThrow(
      /^Invalid rotation event: ClientRequestToken: /
    );
  });

  it('should reject an event that is not an object', () => {
    expect(() => parseRotationEvent(null)).toThrow(/^Invalid rotation event: \(event\): /);
  });
});

describe('createHandler', () => {
  let lines: string[];
  let logger: winston.Logger;
  let vault: InMemorySecretVault;

  const flush = async () => {
    await new Promise((resolve) => setImmediate(resolve));
    await new Promise((resolve) => setImmediate(resolve));
  };

  beforeEach(() => {
    lines = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        lines.push(...chunk.toString().split('\n').filter((line) => line.length > 0));
        callback();
      },
    });
    logger = createLogger({ level: 'info', transports: [new winston.transports.Stream({ stream })] });

    vault = new InMemorySecretVault().seed(
      SECRET,
      { versionId: 'v1', value: createSecretRecord(), stages: [VersionStage.Current] },
      { versionId: 'token-2', stages: [VersionStage.Pending] }
    );
  });

  const buildHandler = () =>
    createHandler({
      config: loadConfig({}),
      overrides: {
        vault,
        directory: new FakeInstanceDirectory(),
        sessionFactory: new InMemoryPostgres({ hosts: [PRIMARY_HOST] }).sessionFactory,
        logging: { logger },
      },
    });

  it('should run the requested step', async () => {
    const outcome = await buildHandler()({
      SecretId: SECRET,
      ClientRequestToken: 'token-2',
      Step: 'createSecret',
    });

    expect(outcome.changed).toBe(true);
    expect(vault.stagesOf(SECRET, 'token-2')).toEqual(['AWSPENDING']);
    expect(vault.secretValue(SECRET, 'token-2')).toMatchObject({ password: 'generated-password-1' });
  });

  it('should log the redacted event and tag step entries with the version token', async () => {
    await buildHandler()({ SecretId: SECRET, ClientRequestToken: 'token-2', Step: 'createSecret' });
    await flush();

    const entries = lines.map((line) => JSON.parse(line));
    expect(entries[0]).toMatchObject({
      message: 'Received rotation event',
      service: 'handler',
      meta: {
        event: { SecretId: SECRET, ClientRequestToken: '[REDACTED]', Step: 'createSecret' },
      },
    });
    expect(entries[1]).toMatchObject({
      level: 'INFO',
      service: 'rotation',
      correlationId: 'token-2',
      operation: 'createSecret',
      message: `createSecret: Successfully put secret for ARN ${SECRET} and version token-2`,
    });
  });

  it('should reject a malformed event before touching the vault', async () => {
    await expect(buildHandler()({ SecretId: SECRET, Step: 'createSecret' })).rejects.toThrow(
      SchemaError
    );
    await flush();

    expect(vault.mutations).toEqual([]);
    expect(JSON.parse(lines[1])).toMatchObject({ level: 'ERROR', message: 'Rejected rotation event' });
  });

  it('should propagate step failures', async () => {
    await expect(
      buildHandler()({ SecretId: SECRET, ClientRequestToken: 'token-9', Step: 'setSecret' })
    ).rejects.toThrow('Secret version token-9 has no stage for rotation of secret test-secret');
  });
});
