/**
 * SQL Helper Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { withSession, withTransaction } from '../src/sql.js';
import type { DatabaseSession, QueryRow } from '../src/types.js';

function createSession(
  failures: Record<string, string> = {}
): DatabaseSession & { statements: string[] } {
  const statements: string[] = [];
  return {
    statements,
    query: vi.fn(async (text: string): Promise<QueryRow[]> => {
      statements.push(text);
      const failure = failures[text];
      if (failure) throw new Error(failure);
      return [];
    }),
    end: vi.fn(async () => undefined),
  };
}

describe('withTransaction', () => {
  it('should commit when the work succeeds', async () => {
    const session = createSession();

    await expect(
      withTransaction(session, async (tx) => {
        await tx.query('ALTER USER app_user WITH PASSWORD x');
        return 'done';
      })
    ).resolves.toBe('done');
    expect(session.statements).toEqual(['BEGIN', 'ALTER USER app_user WITH PASSWORD x', 'COMMIT']);
  });

  it('should roll back and rethrow when the work fails', async () => {
    const session = createSession({ 'ALTER USER app_user': 'permission denied to alter role' });

    await expect(
      withTransaction(session, (tx) => tx.query('ALTER USER app_user'))
    ).rejects.toThrow('permission denied to alter role');
    expect(session.statements).toEqual(['BEGIN', 'ALTER USER app_user', 'ROLLBACK']);
  });

  it('should surface the statement error when the rollback also fails', async () => {
    const session = createSession({
      'ALTER USER app_user': 'permission denied to alter role',
      ROLLBACK: 'Connection terminated',
    });

    const error = await withTransaction(session, (tx) => tx.query('ALTER USER app_user')).catch(
      (caught: unknown) => caught
    );

    expect(error).toBeInstanceOf(Error);
    expect(error).toMatchObject({
      message: 'permission denied to alter role',
      cause: expect.objectContaining({ message: 'Connection terminated' }),
    });
  });
});

describe('withSession', () => {
  it('should close the session when the work throws', async () => {
    const session = createSession();

    await expect(
      withSession(session, async () => {
        throw new Error('query failed');
      })
    ).rejects.toThrow('query failed');
    expect(session.end).toHaveBeenCalledTimes(1);
  });
});
