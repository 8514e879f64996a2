/**
 * Configuration Schema Definitions
 *
 * Zod schema for the rotation runtime. The loader maps environment
 * variables onto these fields; the schema supplies defaults and runtime
 * validation, and the inferred type is what the rest of the code sees.
 */

import { z } from 'zod';
import {
  DEFAULT_CONNECT_TIMEOUT_SECONDS,
  DEFAULT_EXCLUDE_CHARACTERS,
  DEFAULT_SSL_ROOT_CERT_PATH,
} from './defaults.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export type LogLevel = z.infer<typeof LogLevelSchema>;

export const LogFormatSchema = z.enum(['json', 'pretty']);

export type LogFormat = z.infer<typeof LogFormatSchema>;

export const RotationConfigSchema = z.object({
  /** Endpoint override for the Secrets Manager client (VPC endpoint, localstack) */
  secretsManagerEndpoint: z.url('SECRETS_MANAGER_ENDPOINT must be a URL').optional(),
  /** AWS region; the SDK default chain applies when unset */
  region: z.string().min(1).optional(),
  /** Characters the generated password must not contain. Empty means no exclusions. */
  excludeCharacters: z.string().default(DEFAULT_EXCLUDE_CHARACTERS),
  /** CA bundle used to verify the database server certificate */
  sslRootCertPath: z.string().min(1).default(DEFAULT_SSL_ROOT_CERT_PATH),
  /** Upper bound for each individual connection attempt */
  connectTimeoutSeconds: z.coerce
    .number()
    .int()
    .positive('DB_CONNECT_TIMEOUT_SECONDS must be a positive integer')
    .default(DEFAULT_CONNECT_TIMEOUT_SECONDS),
  logLevel: LogLevelSchema.default('info'),
  logFormat: LogFormatSchema.default('json'),
});

export type RotationConfig = z.infer<typeof RotationConfigSchema>;
