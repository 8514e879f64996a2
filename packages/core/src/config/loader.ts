/**
 * Configuration Loader
 *
 * Reads environment-style inputs (optionally from a .env file), validates
 * them with Zod and caches the result for the lifetime of the process.
 */

import dotenv from 'dotenv';
import { RotationConfigSchema, type RotationConfig } from './schema.js';

// Load environment variables
dotenv.config();

type Env = Record<string, string | undefined>;

/**
 * Environment variable → config field
 */
const ENV_MAPPING = {
  SECRETS_MANAGER_ENDPOINT: 'secretsManagerEndpoint',
  AWS_REGION: 'region',
  EXCLUDE_CHARACTERS: 'excludeCharacters',
  SSL_ROOT_CERT_PATH: 'sslRootCertPath',
  DB_CONNECT_TIMEOUT_SECONDS: 'connectTimeoutSeconds',
  LOG_LEVEL: 'logLevel',
  LOG_FORMAT: 'logFormat',
} as const satisfies Record<string, keyof RotationConfig>;

/**
 * Build the raw (unvalidated) config object from environment variables.
 * Unset variables are left out so schema defaults apply; an empty
 * EXCLUDE_CHARACTERS is kept because it means "exclude nothing".
 */
function buildConfigFromEnv(env: Env): Record<string, string> {
  const raw: Record<string, string> = {};

  for (const [variable, field] of Object.entries(ENV_MAPPING)) {
    const value = env[variable];
    if (value === undefined) continue;
    if (value === '' && field !== 'excludeCharacters') continue;
    raw[field] = value;
  }

  return raw;
}

/**
 * Validate configuration from the given environment
 */
export function loadConfig(env: Env = process.env): RotationConfig {
  const result = RotationConfigSchema.safeParse(buildConfigFromEnv(env));

  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid configuration:\n${details}`);
  }

  return result.data;
}

let cachedConfig: RotationConfig | null = null;

/**
 * Get the process-wide configuration, loading it on first use
 */
export function getConfig(): RotationConfig {
  if (!cachedConfig) {
    cachedConfig = loadConfig();
  }
  return cachedConfig;
}

/**
 * Clear the cached configuration
 * Useful for testing or reloading config
 */
export function clearConfigCache(): void {
  cachedConfig = null;
}
