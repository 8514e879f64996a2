/**
 * In-memory PostgreSQL
 *
 * One database cluster reachable under one or more host names. Understands
 * exactly the statements the rotation code issues; role changes made in a
 * transaction become visible on COMMIT and are discarded on ROLLBACK.
 */

import {
  QUOTE_IDENT_SQL,
  QUOTE_LITERAL_SQL,
  ROLE_EXISTS_SQL,
  VALIDATION_SQL,
  type ConnectionParams,
  type DatabaseSession,
  type QueryRow,
  type SessionFactory,
} from '@pgrotate/rotation';

/**
 * - `optional`: accepts TLS and plaintext
 * - `required`: rejects plaintext (pg_hba.conf hostssl)
 * - `unsupported`: TLS disabled on the server
 */
export type FakeSslMode = 'optional' | 'required' | 'unsupported';

export interface InMemoryPostgresOptions {
  hosts: string[];
  ssl?: FakeSslMode;
  /** role → password */
  roles?: Record<string, string>;
}

export interface ConnectAttempt {
  host: string;
  port: number;
  user: string;
  database: string;
  ssl: boolean;
  connectTimeoutMs: number;
  succeeded: boolean;
}

export interface ExecutedStatement {
  session: number;
  sql: string;
  params?: unknown[];
}

type RoleChange = { kind: 'create' | 'alter'; role: string; password: string };

const CREATE_ROLE = /^CREATE ROLE (.+) WITH LOGIN PASSWORD (.+)$/;
const ALTER_USER = /^ALTER USER (.+) WITH PASSWORD (.+)$/;

export function quoteIdent(name: string): string {
  return /^[a-z_][a-z0-9_$]*$/.test(name) ? name : `"${name.replace(/"/g, '""')}"`;
}

export function quoteLiteral(value: string): string {
  const quoted = `'${value.replace(/'/g, "''")}'`;
  return value.includes('\\') ? `E${quoted.replace(/\\/g, '\\\\')}` : quoted;
}

function unquoteIdent(identifier: string): string {
  return identifier.startsWith('"') ? identifier.slice(1, -1).replace(/""/g, '"') : identifier;
}

function unquoteLiteral(literal: string): string {
  const escaped = literal.startsWith('E');
  const body = (escaped ? literal.slice(1) : literal).slice(1, -1).replace(/''/g, "'");
  return escaped ? body.replace(/\\\\/g, '\\') : body;
}

export class InMemoryPostgres {
  readonly roles: Map<string, string>;
  readonly attempts: ConnectAttempt[] = [];
  readonly statements: ExecutedStatement[] = [];
  ssl: FakeSslMode;
  openSessions = 0;

  private readonly hosts: Set<string>;
  private readonly failures: RegExp[] = [];
  private sessionCount = 0;

  constructor(options: InMemoryPostgresOptions) {
    this.hosts = new Set(options.hosts);
    this.ssl = options.ssl ?? 'optional';
    this.roles = new Map(Object.entries(options.roles ?? {}));
  }

  /** Make every later statement matching `pattern` fail */
  failStatements(pattern: RegExp): this {
    this.failures.push(pattern);
    return this;
  }

  /** Statements issued outside BEGIN/COMMIT/ROLLBACK */
  executed(): string[] {
    return this.statements
      .map((statement) => statement.sql)
      .filter((sql) => !['BEGIN', 'COMMIT', 'ROLLBACK'].includes(sql));
  }

  readonly sessionFactory: SessionFactory = async (params) => {
    const attempt: ConnectAttempt = {
      host: params.host,
      port: params.port,
      user: params.user,
      database: params.database,
      ssl: params.ssl,
      connectTimeoutMs: params.connectTimeoutMs,
      succeeded: false,
    };
    this.attempts.push(attempt);

    this.authenticate(params);

    attempt.succeeded = true;
    this.openSessions += 1;
    this.sessionCount += 1;
    return new FakeSession(this, this.sessionCount);
  };

  private authenticate(params: ConnectionParams): void {
    if (!this.hosts.has(params.host)) {
      throw new Error(`getaddrinfo ENOTFOUND ${params.host}`);
    }
    if (params.ssl && this.ssl === 'unsupported') {
      throw new Error('The server does not support SSL connections');
    }
    if (!params.ssl && this.ssl === 'required') {
      throw new Error(
        `no pg_hba.conf entry for host "10.0.0.1", user "${params.user}", database "${params.database}", no encryption`
      );
    }
    if (this.roles.get(params.user) !== params.password) {
      throw new Error(`password authentication failed for user "${params.user}"`);
    }
  }

  /** @internal */
  execute(session: number, sql: string, params: unknown[] | undefined, pending: RoleChange[]): QueryRow[] {
    this.statements.push({ session, sql, params });

    if (this.failures.some((pattern) => pattern.test(sql))) {
      throw new Error(`Statement failed: ${sql}`);
    }

    const [value] = params ?? [];
    const visibleRole = (role: string): boolean =>
      this.roles.has(role) || pending.some((change) => change.role === role);

    if (sql === QUOTE_IDENT_SQL) {
      return [{ identifier: quoteIdent(String(value)) }];
    }
    if (sql === QUOTE_LITERAL_SQL) {
      return [{ literal: quoteLiteral(String(value)) }];
    }
    if (sql === ROLE_EXISTS_SQL) {
      return visibleRole(String(value)) ? [{ '?column?': 1 }] : [];
    }
    if (sql === VALIDATION_SQL) {
      return [{ now: new Date() }];
    }

    const create = CREATE_ROLE.exec(sql);
    if (create) {
      const role = unquoteIdent(create[1]);
      if (visibleRole(role)) {
        throw new Error(`role "${role}" already exists`);
      }
      pending.push({ kind: 'create', role, password: unquoteLiteral(create[2]) });
      return [];
    }

    const alter = ALTER_USER.exec(sql);
    if (alter) {
      const role = unquoteIdent(alter[1]);
      if (!visibleRole(role)) {
        throw new Error(`role "${role}" does not exist`);
      }
      pending.push({ kind: 'alter', role, password: unquoteLiteral(alter[2]) });
      return [];
    }

    throw new Error(`Unsupported statement: ${sql}`);
  }

  /** @internal */
  apply(changes: RoleChange[]): void {
    for (const change of changes) {
      this.roles.set(change.role, change.password);
    }
  }
}

class FakeSession implements DatabaseSession {
  private ended = false;
  private inTransaction = false;
  private pending: RoleChange[] = [];

  constructor(
    private readonly server: InMemoryPostgres,
    private readonly id: number
  ) {}

  async query(text: string, params?: unknown[]): Promise<QueryRow[]> {
    if (this.ended) {
      throw new Error('Client was closed and is not queryable');
    }

    switch (text) {
      case 'BEGIN':
        this.server.statements.push({ session: this.id, sql: text });
        this.inTransaction = true;
        this.pending = [];
        return [];
      case 'COMMIT':
        this.server.statements.push({ session: this.id, sql: text });
        this.server.apply(this.pending);
        this.inTransaction = false;
        this.pending = [];
        return [];
      case 'ROLLBACK':
        this.server.statements.push({ session: this.id, sql: text });
        this.inTransaction = false;
        this.pending = [];
        return [];
    }

    const rows = this.server.execute(this.id, text, params, this.pending);
    if (!this.inTransaction) {
      this.server.apply(this.pending);
      this.pending = [];
    }
    return rows;
  }

  async end(): Promise<void> {
    if (this.ended) return;
    this.ended = true;
    this.server.openSessions -= 1;
  }
}
