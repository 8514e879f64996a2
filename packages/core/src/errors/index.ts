/**
 * Error Taxonomy
 *
 * Every failure that reaches the invocation boundary is one of these kinds.
 * Messages carry identifiers (secret ARNs, usernames, hosts) but never
 * credential material.
 */

export type RotationErrorKind =
  | 'NotFound'
  | 'SchemaError'
  | 'PolicyViolation'
  | 'AuthFailure'
  | 'InvalidState';

export abstract class RotationError extends Error {
  abstract readonly kind: RotationErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A referenced secret, version or stage does not exist. */
export class NotFoundError extends RotationError {
  readonly kind = 'NotFound';
}

/** Secret JSON (or an invocation event) is malformed or missing required fields. */
export class SchemaError extends RotationError {
  readonly kind = 'SchemaError';
}

/** Cross-user / cross-host mismatch, unverified replica, rotation disabled. */
export class PolicyViolationError extends RotationError {
  readonly kind = 'PolicyViolation';
}

/** No credential in the fallback chain could open a database session. */
export class AuthFailureError extends RotationError {
  readonly kind = 'AuthFailure';
}

/** The version is not staged the way the requested step requires. */
export class InvalidStateError extends RotationError {
  readonly kind = 'InvalidState';
}

export function isRotationError(error: unknown): error is RotationError {
  return error instanceof RotationError;
}

export function isNotFoundError(error: unknown): error is NotFoundError {
  return error instanceof NotFoundError;
}

/**
 * Render any thrown value as a single-line description for logs and CLI output
 */
export function describeError(error: unknown): string {
  if (isRotationError(error)) {
    return `${error.kind}: ${error.message}`;
  }
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
