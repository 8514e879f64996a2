/**
 * Secret Record Schema
 *
 * The JSON document stored in each secret version. Unknown fields are kept
 * so that copying a record into a new version preserves them.
 */

import { z } from 'zod';
import { SchemaError } from '@pgrotate/core';

export const SUPPORTED_ENGINES = ['postgres', 'aurora-postgresql'] as const;

const REQUIRED_FIELDS = ['host', 'username', 'password', 'engine'] as const;

const EngineSchema = z.enum(SUPPORTED_ENGINES);

export const SecretRecordSchema = z.looseObject({
  engine: EngineSchema,
  host: z.string().min(1),
  username: z.string().min(1),
  password: z.string(),
  dbname: z.string().nullish(),
  port: z.union([z.number(), z.string()]).optional(),
  /** Tri-state, see resolveSslPolicy */
  ssl: z.unknown().optional(),
  masterarn: z.string().nullish(),
});

export type SecretRecord = z.infer<typeof SecretRecordSchema>;

/** A secret document that has not been schema-checked (master secrets) */
export type RawSecret = Record<string, unknown>;

const RawSecretSchema = z.record(z.string(), z.unknown());

export function parseSecretJson(plaintext: string, source: string): RawSecret {
  let parsed: unknown;
  try {
    parsed = JSON.parse(plaintext);
  } catch (error) {
    throw new SchemaError(`Secret string of ${source} is not valid JSON`, { cause: error });
  }

  const result = RawSecretSchema.safeParse(parsed);
  if (!result.success || Array.isArray(parsed)) {
    throw new SchemaError(`Secret string of ${source} is not a JSON object`);
  }
  return result.data;
}

export function validateSecretRecord(raw: RawSecret, source: string): SecretRecord {
  for (const field of REQUIRED_FIELDS) {
    if (!(field in raw)) {
      throw new SchemaError(`${field} key is missing from secret JSON of ${source}`);
    }
  }

  if (!EngineSchema.safeParse(raw.engine).success) {
    throw new SchemaError(
      `Database engine of ${source} must be one of ${SUPPORTED_ENGINES.join(', ')} in order to use this rotation function`
    );
  }

  const result = SecretRecordSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new SchemaError(`Secret JSON of ${source} is malformed (${details})`);
  }
  return result.data;
}
