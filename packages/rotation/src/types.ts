/**
 * Rotation Types
 *
 * Shared shapes for the rotation steps and the collaborator surfaces they
 * drive: the secrets vault, the managed-database directory and PostgreSQL
 * sessions.
 */

/** Stage labels attached to secret versions */
export const VersionStage = {
  Current: 'AWSCURRENT',
  Pending: 'AWSPENDING',
  Previous: 'AWSPREVIOUS',
} as const;

export type VersionStage = (typeof VersionStage)[keyof typeof VersionStage];

export const ROTATION_STEPS = ['createSecret', 'setSecret', 'testSecret', 'finishSecret'] as const;

export type RotationStep = (typeof ROTATION_STEPS)[number];

export interface RotationRequest {
  secretId: string;
  /** ClientRequestToken, which doubles as the id of the version being rotated in */
  token: string;
  step: RotationStep;
}

export interface StepOutcome {
  step: RotationStep;
  /** Whether the vault or the database was mutated */
  changed: boolean;
  detail: string;
}

// =============================================================================
// Secrets vault
// =============================================================================

export interface SecretDescription {
  arn?: string;
  name?: string;
  /** Absent when the vault does not report it */
  rotationEnabled?: boolean;
  /** version id → stage labels */
  versionStages: Record<string, string[]>;
}

export interface GetSecretValueRequest {
  secretId: string;
  stage: VersionStage;
  /** When given, the version carrying `stage` must also be this version */
  versionId?: string;
}

export interface PutSecretValueRequest {
  secretId: string;
  versionId: string;
  secretString: string;
  stages: VersionStage[];
}

export interface UpdateVersionStageRequest {
  secretId: string;
  stage: VersionStage;
  moveToVersionId: string;
  removeFromVersionId?: string;
}

export interface SecretVault {
  describeSecret(secretId: string): Promise<SecretDescription>;
  /** Rejects with NotFoundError when no matching version holds a string value */
  getSecretValue(request: GetSecretValueRequest): Promise<string>;
  putSecretValue(request: PutSecretValueRequest): Promise<void>;
  /** Moves a stage label between versions in one call */
  updateSecretVersionStage(request: UpdateVersionStageRequest): Promise<void>;
  getRandomPassword(options: { excludeCharacters: string }): Promise<string>;
}

// =============================================================================
// Managed-database directory
// =============================================================================

export interface InstanceDescription {
  identifier: string;
  readReplicaSourceIdentifier?: string;
}

export interface InstanceDirectory {
  describeInstances(identifier: string): Promise<InstanceDescription[]>;
}

// =============================================================================
// Database sessions
// =============================================================================

export interface ConnectionParams {
  host: string;
  port: number;
  user: string;
  password: string;
  database: string;
  ssl: boolean;
  connectTimeoutMs: number;
}

export type QueryRow = Record<string, unknown>;

export interface DatabaseSession {
  query(text: string, params?: unknown[]): Promise<QueryRow[]>;
  end(): Promise<void>;
}

/** Opens an authenticated session or rejects */
export type SessionFactory = (params: ConnectionParams) => Promise<DatabaseSession>;
