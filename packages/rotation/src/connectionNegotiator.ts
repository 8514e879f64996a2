/**
 * Connection Negotiator
 *
 * Opens an authenticated PostgreSQL session for a secret record, preferring
 * TLS and falling back to plaintext only when the record's ssl policy allows
 * it. Authentication and network failures are reported as `null` so callers
 * can walk a chain of candidate credentials.
 */

import {
  createServiceLogger,
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
  DEFAULT_DATABASE_NAME,
  DEFAULT_DATABASE_PORT,
  describeError,
  SchemaError,
  type ServiceLogger,
} from '@pgrotate/core';
import { tryInOrder } from './fallback.js';
import type { SecretRecord } from './secretRecord.js';
import { resolveSslPolicy, sslAttemptOrder } from './sslPolicy.js';
import type { ConnectionParams, DatabaseSession, SessionFactory } from './types.js';

export interface ConnectionNegotiatorOptions {
  sessionFactory: SessionFactory;
  connectTimeoutMs?: number;
  logger?: ServiceLogger;
}

/**
 * Resolve the port of a record. Numeric strings are accepted; anything
 * else is malformed input and raises.
 */
export function resolvePort(port: SecretRecord['port']): number {
  if (port === undefined) return DEFAULT_DATABASE_PORT;

  const value = typeof port === 'number' ? port : /^\d+$/.test(port) ? Number(port) : NaN;
  if (!Number.isInteger(value) || value < 1 || value > 65535) {
    throw new SchemaError(`Invalid database port in secret JSON: ${String(port)}`);
  }
  return value;
}

/**
 * Turn a driver error into the operator-facing reason for a failed attempt
 */
export function classifyConnectionFailure(error: unknown, host: string): string {
  const message = describeError(error);

  if (/server does not support SSL/i.test(message)) {
    return `Unable to establish SSL/TLS handshake, SSL/TLS is not enabled on the host: ${host}`;
  }
  if (
    /server common name ".+" does not match host name ".+"/.test(message) ||
    /does not match certificate's altnames/.test(message)
  ) {
    return `Hostname verification failed when establishing SSL/TLS handshake with host: ${host}`;
  }
  if (/no pg_hba\.conf entry for host ".+", .*(SSL off|no encryption)/.test(message)) {
    return `Unable to establish SSL/TLS handshake, SSL/TLS is enforced on the host: ${host}`;
  }
  return `Unable to connect to host: ${host}`;
}

export class ConnectionNegotiator {
  private readonly sessionFactory: SessionFactory;
  private readonly connectTimeoutMs: number;
  private readonly logger: ServiceLogger;

  constructor(options: ConnectionNegotiatorOptions) {
    this.sessionFactory = options.sessionFactory;
    this.connectTimeoutMs = options.connectTimeoutMs ?? DEFAULT_CONNECT_TIMEOUT_SECONDS * 1000;
    this.logger = options.logger ?? createServiceLogger('connection-negotiator');
  }

  async connect(record: SecretRecord): Promise<DatabaseSession | null> {
    const port = resolvePort(record.port);
    const database = record.dbname || DEFAULT_DATABASE_NAME;
    const policy = resolveSslPolicy(record.ssl);

    return tryInOrder(sslAttemptOrder(policy), (ssl) =>
      this.attempt({
        host: record.host,
        port,
        user: record.username,
        password: record.password,
        database,
        ssl,
        connectTimeoutMs: this.connectTimeoutMs,
      })
    );
  }

  private async attempt(params: ConnectionParams): Promise<DatabaseSession | null> {
    const transport = params.ssl ? 'SSL/TLS' : 'non SSL/TLS';

    try {
      const session = await this.sessionFactory(params);
      this.logger.info(
        `Successfully established ${transport} connection as user '${params.user}' with host: '${params.host}'`
      );
      return session;
    } catch (error) {
      this.logger.error(classifyConnectionFailure(error, params.host), {
        host: params.host,
        port: params.port,
        user: params.user,
        database: params.database,
        ssl: params.ssl,
        error: describeError(error),
      });
      return null;
    }
  }
}
