/**
 * SQL helpers shared by the provisioning and rotation steps.
 *
 * PostgreSQL accepts no bind parameters in CREATE ROLE / ALTER ROLE, so the
 * role name and password are quoted server-side with quote_ident and
 * quote_literal (each receiving the raw value as a bind parameter) and the
 * quoted results are embedded in the statement.
 */

import type { DatabaseSession } from './types.js';

export const QUOTE_IDENT_SQL = 'SELECT quote_ident($1) AS identifier';
export const QUOTE_LITERAL_SQL = 'SELECT quote_literal($1) AS literal';
export const ROLE_EXISTS_SQL = 'SELECT 1 FROM pg_roles WHERE rolname = $1';
export const VALIDATION_SQL = 'SELECT NOW()';

export function createRoleStatement(identifier: string, passwordLiteral: string): string {
  return `CREATE ROLE ${identifier} WITH LOGIN PASSWORD ${passwordLiteral}`;
}

export function alterPasswordStatement(identifier: string, passwordLiteral: string): string {
  return `ALTER USER ${identifier} WITH PASSWORD ${passwordLiteral}`;
}

/**
 * Run `work` and close the session on every exit path
 */
export async function withSession<T>(
  session: DatabaseSession,
  work: (session: DatabaseSession) => Promise<T>
): Promise<T> {
  try {
    return await work(session);
  } finally {
    await session.end();
  }
}

/**
 * Run `work` inside BEGIN/COMMIT, rolling back when it throws. The error
 * from `work` is rethrown even when the rollback fails.
 */
export async function withTransaction<T>(
  session: DatabaseSession,
  work: (session: DatabaseSession) => Promise<T>
): Promise<T> {
  await session.query('BEGIN');
  try {
    const result = await work(session);
    await session.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await session.query('ROLLBACK');
    } catch (rollbackError) {
      // The statement's failure is the one to report
      if (error instanceof Error && error.cause === undefined) {
        error.cause = rollbackError;
      }
    }
    throw error;
  }
}

async function selectString(
  session: DatabaseSession,
  sql: string,
  column: string,
  value: string
): Promise<string> {
  const rows = await session.query(sql, [value]);
  const quoted = rows[0]?.[column];
  if (typeof quoted !== 'string') {
    throw new Error(`Query "${sql}" returned no ${column}`);
  }
  return quoted;
}

export function quoteIdentifier(session: DatabaseSession, name: string): Promise<string> {
  return selectString(session, QUOTE_IDENT_SQL, 'identifier', name);
}

export function quoteLiteral(session: DatabaseSession, value: string): Promise<string> {
  return selectString(session, QUOTE_LITERAL_SQL, 'literal', value);
}

export async function roleExists(session: DatabaseSession, roleName: string): Promise<boolean> {
  const rows = await session.query(ROLE_EXISTS_SQL, [roleName]);
  return rows.length > 0;
}
