/**
 * SSL Policy
 *
 * Maps the tri-state `ssl` field of a secret onto connection behaviour:
 * - absent, wrong type or unrecognised string: try TLS, fall back to plaintext
 * - boolean: exactly that, no fallback
 * - "true" / "false" (any case): exactly that, no fallback
 */

export interface SslPolicy {
  useSsl: boolean;
  fallBack: boolean;
}

const DEFAULT_POLICY: SslPolicy = { useSsl: true, fallBack: true };

export function resolveSslPolicy(ssl: unknown): SslPolicy {
  if (typeof ssl === 'boolean') {
    return { useSsl: ssl, fallBack: false };
  }

  if (typeof ssl === 'string') {
    const normalized = ssl.toLowerCase();
    if (normalized === 'true') return { useSsl: true, fallBack: false };
    if (normalized === 'false') return { useSsl: false, fallBack: false };
  }

  return { ...DEFAULT_POLICY };
}

/**
 * The ordered transport modes to attempt (true = TLS)
 */
export function sslAttemptOrder(policy: SslPolicy): boolean[] {
  if (!policy.useSsl) return [false];
  return policy.fallBack ? [true, false] : [true];
}
