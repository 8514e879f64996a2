/**
 * pg Session Factory
 *
 * One pg.Client per connection attempt. TLS attempts verify the server
 * certificate chain and hostname (the equivalent of sslmode=verify-full).
 */

import { existsSync, readFileSync } from 'fs';
import pg from 'pg';
import { createServiceLogger, type ServiceLogger } from '@pgrotate/core';
import type { ConnectionParams, DatabaseSession, QueryRow, SessionFactory } from '../types.js';

export interface PgSessionFactoryOptions {
  /** CA bundle; the runtime trust store is used when the file does not exist */
  sslRootCertPath?: string;
  logger?: ServiceLogger;
}

class PgSession implements DatabaseSession {
  constructor(private readonly client: pg.Client) {}

  async query(text: string, params?: unknown[]): Promise<QueryRow[]> {
    const result = await this.client.query(text, params);
    return result.rows;
  }

  async end(): Promise<void> {
    await this.client.end();
  }
}

function loadCertificateBundle(path: string | undefined): string | undefined {
  if (!path || !existsSync(path)) return undefined;
  return readFileSync(path, 'utf-8');
}

export function toClientConfig(params: ConnectionParams, ca?: string): pg.ClientConfig {
  return {
    host: params.host,
    port: params.port,
    user: params.user,
    password: params.password,
    database: params.database,
    connectionTimeoutMillis: params.connectTimeoutMs,
    ssl: params.ssl ? { rejectUnauthorized: true, ca } : false,
  };
}

export function createPgSessionFactory(options: PgSessionFactoryOptions = {}): SessionFactory {
  const ca = loadCertificateBundle(options.sslRootCertPath);
  const logger = options.logger ?? createServiceLogger('pg-session');

  return async (params) => {
    const client = new pg.Client(toClientConfig(params, ca));
    // A dropped connection is reported here; the pending query rejects on its own
    client.on('error', (err: Error) => {
      logger.error('Unexpected database connection error', {
        host: params.host,
        user: params.user,
        error: err.message,
      });
    });
    await client.connect();
    return new PgSession(client);
  };
}
