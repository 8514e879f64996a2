/**
 * User Provisioner Tests
 */

import { describe, it, expect, beforeEach } from 'vitest';
import {
  AuthFailureError,
  NotFoundError,
  PolicyViolationError,
  SchemaError,
} from '@pgrotate/core';
import {
  createMasterSecret,
  createRotationHarness,
  createSecretRecord,
  FakeInstanceDirectory,
  InMemoryPostgres,
  OTHER_HOST,
  PRIMARY_HOST,
  REPLICA_HOST,
  type RotationHarness,
} from '@pgrotate/test-utils';
import { QUOTE_IDENT_SQL, QUOTE_LITERAL_SQL, ROLE_EXISTS_SQL } from '../src/sql.js';
import { VersionStage } from '../src/types.js';
import { inheritFromChild } from '../src/userProvisioner.js';

const MASTER = 'master-secret';

describe('inheritFromChild', () => {
  const child = createSecretRecord({ masterarn: MASTER });

  it('should fill missing and falsy master fields from the child', () => {
    const merged = inheritFromChild(createMasterSecret({ host: '', port: 0 }), child, MASTER);

    expect(merged).toEqual({
      engine: 'postgres',
      host: PRIMARY_HOST,
      username: 'master_user',
      password: 'test-master-password',
      dbname: 'orders',
      port: 5432,
      masterarn: MASTER,
    });
  });

  it('should keep master values that are set', () => {
    const merged = inheritFromChild(
      createMasterSecret({ host: OTHER_HOST, port: 6543 }),
      child,
      MASTER
    );

    expect(merged.host).toBe(OTHER_HOST);
    expect(merged.port).toBe(6543);
  });

  it('should always take dbname from the child', () => {
    expect(inheritFromChild(createMasterSecret({ dbname: 'admin' }), child, MASTER).dbname).toBe(
      'orders'
    );

    const withoutDbname = createSecretRecord({ masterarn: MASTER, dbname: undefined });
    expect(
      inheritFromChild(createMasterSecret({ dbname: 'admin' }), withoutDbname, MASTER).dbname
    ).toBeUndefined();
  });

  it('should validate the merged master', () => {
    expect(() =>
      inheritFromChild(createMasterSecret({ engine: 'mysql' }), child, MASTER)
    ).toThrow(
      new SchemaError(
        `Database engine of master secret ${MASTER} must be one of postgres, aurora-postgresql in order to use this rotation function`
      )
    );
  });
});

describe('UserProvisioner', () => {
  let postgres: InMemoryPostgres;
  let harness: RotationHarness;

  const seedMaster = (overrides: Record<string, unknown> = {}) =>
    harness.vault.seed(MASTER, {
      versionId: 'm1',
      value: createMasterSecret(overrides),
      stages: [VersionStage.Current],
    });

  beforeEach(() => {
    postgres = new InMemoryPostgres({
      hosts: [PRIMARY_HOST, REPLICA_HOST],
      roles: { master_user: 'test-master-password' },
    });
    harness = createRotationHarness({ postgres });
  });

  it('should do nothing without a master secret', async () => {
    await expect(harness.provisioner.ensureUser(createSecretRecord())).resolves.toBe(false);
    expect(postgres.attempts).toHaveLength(0);
  });

  it('should create the role with the master credential', async () => {
    seedMaster();

    const created = await harness.provisioner.ensureUser(createSecretRecord({ masterarn: MASTER }));

    expect(created).toBe(true);
    expect(postgres.roles.get('app_user')).toBe('test-password');
    expect(postgres.attempts[0]).toMatchObject({
      host: PRIMARY_HOST,
      user: 'master_user',
      database: 'orders',
    });
    expect(postgres.executed()).toEqual([
      QUOTE_IDENT_SQL,
      ROLE_EXISTS_SQL,
      QUOTE_LITERAL_SQL,
      "CREATE ROLE app_user WITH LOGIN PASSWORD 'test-password'",
    ]);
    expect(postgres.openSessions).toBe(0);
    expect(harness.logger.messages('info')).toContain(
      'ensureUser: Successfully created user app_user in PostgreSQL DB orders'
    );
  });

  it('should quote role names and passwords', async () => {
    seedMaster();

    await harness.provisioner.ensureUser(
      createSecretRecord({ masterarn: MASTER, username: 'Orders-App', password: "it's-a-test" })
    );

    expect(postgres.executed()).toContain(
      `CREATE ROLE "Orders-App" WITH LOGIN PASSWORD 'it''s-a-test'`
    );
    expect(postgres.roles.get('Orders-App')).toBe("it's-a-test");
  });

  it('should leave an existing role untouched', async () => {
    postgres.roles.set('app_user', 'test-old-password');
    seedMaster();

    const created = await harness.provisioner.ensureUser(createSecretRecord({ masterarn: MASTER }));

    expect(created).toBe(false);
    expect(postgres.roles.get('app_user')).toBe('test-old-password');
    expect(postgres.executed()).toEqual([QUOTE_IDENT_SQL, ROLE_EXISTS_SQL]);
    expect(postgres.openSessions).toBe(0);
  });

  it('should refuse a master on an unrelated host without connecting', async () => {
    seedMaster({ host: OTHER_HOST });

    const attempt = harness.provisioner.ensureUser(createSecretRecord({ masterarn: MASTER }));

    await expect(attempt).rejects.toThrow(PolicyViolationError);
    await expect(attempt).rejects.toThrow(
      `Current database host ${PRIMARY_HOST} is not the same host as/rds replica of master ${OTHER_HOST}`
    );
    expect(postgres.attempts).toHaveLength(0);
    expect(harness.directory.lookups).toEqual(['orders-db']);
  });

  it('should provision through the master when the child host is its replica', async () => {
    harness = createRotationHarness({
      postgres,
      directory: new FakeInstanceDirectory([
        { identifier: 'orders-db-replica', readReplicaSourceIdentifier: 'orders-db' },
      ]),
    });
    seedMaster({ host: PRIMARY_HOST });

    const created = await harness.provisioner.ensureUser(
      createSecretRecord({ masterarn: MASTER, host: REPLICA_HOST })
    );

    expect(created).toBe(true);
    expect(postgres.attempts.map((attempt) => attempt.host)).toEqual([PRIMARY_HOST]);
  });

  it('should fail when the master credential cannot log in', async () => {
    seedMaster({ password: 'test-stale-master-password' });

    await expect(
      harness.provisioner.ensureUser(createSecretRecord({ masterarn: MASTER }))
    ).rejects.toThrow(
      new AuthFailureError(`Unable to log into database using credentials in master secret ${MASTER}`)
    );
  });

  it('should fail when the master secret does not exist', async () => {
    await expect(
      harness.provisioner.ensureUser(createSecretRecord({ masterarn: MASTER }))
    ).rejects.toThrow(NotFoundError);
  });

  it('should roll back and close the session when creation fails', async () => {
    seedMaster();
    postgres.failStatements(/^CREATE ROLE/);

    await expect(
      harness.provisioner.ensureUser(createSecretRecord({ masterarn: MASTER }))
    ).rejects.toThrow("Statement failed: CREATE ROLE app_user WITH LOGIN PASSWORD 'test-password'");

    expect(postgres.roles.has('app_user')).toBe(false);
    expect(postgres.statements.map((statement) => statement.sql).at(-1)).toBe('ROLLBACK');
    expect(postgres.openSessions).toBe(0);
  });
});
