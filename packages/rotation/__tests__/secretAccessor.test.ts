/**
 * Secret Accessor Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { NotFoundError, SchemaError } from '@pgrotate/core';
import { createMasterSecret, createSecretRecord, InMemorySecretVault } from '@pgrotate/test-utils';
import { SecretAccessor } from '../src/secretAccessor.js';
import { VersionStage } from '../src/types.js';

const SECRET = 'test-secret';

describe('SecretAccessor', () => {
  let vault: InMemorySecretVault;
  let accessor: SecretAccessor;

  beforeEach(() => {
    vault = new InMemorySecretVault();
    accessor = new SecretAccessor(vault);
  });

  const seedCurrent = (value: object | string) =>
    vault.seed(SECRET, { versionId: 'v1', value, stages: [VersionStage.Current] });

  describe('fetch', () => {
    it('should return the validated record with unknown fields kept', async () => {
      const stored = { ...createSecretRecord(), replicaRegion: 'us-west-2' };
      seedCurrent(stored);

      await expect(accessor.fetch(SECRET, VersionStage.Current)).resolves.toEqual(stored);
    });

    it.each(['host', 'username', 'password', 'engine'])(
      'should reject a record without %s',
      async (field) => {
        const record: Record<string, unknown> = { ...createSecretRecord() };
        delete record[field];
        seedCurrent(record);

        const attempt = accessor.fetch(SECRET, VersionStage.Current);
        await expect(attempt).rejects.toThrow(SchemaError);
        await expect(attempt).rejects.toThrow(
          `${field} key is missing from secret JSON of ${SECRET} (AWSCURRENT)`
        );
      }
    );

    it('should reject an unsupported engine', async () => {
      seedCurrent({ ...createSecretRecord(), engine: 'mysql' });

      await expect(accessor.fetch(SECRET, VersionStage.Current)).rejects.toThrow(
        `Database engine of ${SECRET} (AWSCURRENT) must be one of postgres, aurora-postgresql in order to use this rotation function`
      );
    });

    it('should accept aurora-postgresql', async () => {
      seedCurrent(createSecretRecord({ engine: 'aurora-postgresql' }));

      const record = await accessor.fetch(SECRET, VersionStage.Current);
      expect(record.engine).toBe('aurora-postgresql');
    });

    it('should reject a field of the wrong type', async () => {
      seedCurrent({ ...createSecretRecord(), password: 42 });

      await expect(accessor.fetch(SECRET, VersionStage.Current)).rejects.toThrow(
        /^Secret JSON of test-secret \(AWSCURRENT\) is malformed \(password: /
      );
    });

    it('should reject a secret string that is not JSON', async () => {
      seedCurrent('host=db;user=app_user');

      await expect(accessor.fetch(SECRET, VersionStage.Current)).rejects.toThrow(
        `Secret string of ${SECRET} (AWSCURRENT) is not valid JSON`
      );
    });

    it('should reject JSON that is not an object', async () => {
      seedCurrent('["postgres"]');

      await expect(accessor.fetch(SECRET, VersionStage.Current)).rejects.toThrow(
        `Secret string of ${SECRET} (AWSCURRENT) is not a JSON object`
      );
    });

    it('should fetch the pending version for a token', async () => {
      seedCurrent(createSecretRecord());
      vault.seed(SECRET, {
        versionId: 'token-2',
        value: createSecretRecord({ password: 'test-new-password' }),
        stages: [VersionStage.Pending],
      });

      const pending = await accessor.fetch(SECRET, VersionStage.Pending, { token: 'token-2' });
      expect(pending.password).toBe('test-new-password');
    });

    it('should report NotFound when the stage sits on another version', async () => {
      vault.seed(SECRET, {
        versionId: 'token-1',
        value: createSecretRecord(),
        stages: [VersionStage.Pending],
      });

      await expect(
        accessor.fetch(SECRET, VersionStage.Pending, { token: 'token-2' })
      ).rejects.toThrow(NotFoundError);
    });

    it('should report NotFound for a reserved version without a value', async () => {
      vault.seed(SECRET, { versionId: 'token-2', stages: [VersionStage.Pending] });

      await expect(
        accessor.fetch(SECRET, VersionStage.Pending, { token: 'token-2' })
      ).rejects.toThrow(NotFoundError);
    });

    it('should report NotFound for a missing stage', async () => {
      seedCurrent(createSecretRecord());

      await expect(accessor.fetch(SECRET, VersionStage.Previous)).rejects.toThrow(NotFoundError);
    });
  });

  describe('fetchMaster', () => {
    it('should return the master secret without schema checks', async () => {
      vault.seed('master-secret', {
        versionId: 'm1',
        value: createMasterSecret(),
        stages: [VersionStage.Current],
      });

      await expect(accessor.fetchMaster('master-secret')).resolves.toEqual({
        username: 'master_user',
        password: 'test-master-password',
      });
    });

    it('should still require a JSON object', async () => {
      vault.seed('master-secret', { versionId: 'm1', value: '42', stages: [VersionStage.Current] });

      await expect(accessor.fetchMaster('master-secret')).rejects.toThrow(
        'Secret string of master-secret (AWSCURRENT) is not a JSON object'
      );
    });
  });
});
