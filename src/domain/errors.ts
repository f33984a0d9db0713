/**
 * Typed error model for release reconciliation.
 *
 * Every failure that reaches a track boundary is normalised to a TypedError
 * so the batch runner can log it, classify it, and keep going with the next
 * track. Thrown errors are ReleaseError subclasses that carry the record.
 */

/** Top-level error domain namespaces. */
export type ErrorDomain =
  | 'REGISTRY'
  | 'TEST_SERVICE'
  | 'INVARIANT'
  | 'PROMOTION'
  | 'CONFIG'
  | 'UPSTREAM'
  | 'STATE'
  | 'TRACK';

/** Typed suggested fix an operator can apply. */
export interface SuggestedFix {
  type: string;
  params: Record<string, unknown>;
  description?: string;
}

/** The core typed error structure written to logs and reports. */
export interface TypedError {
  /** Namespaced error code (e.g., "REGISTRY.HTTP.TIMEOUT"). */
  code: string;
  /** Human-readable error message. */
  message: string;
  /** Track being processed when the error occurred. */
  track?: string;
  /** Whether a later pass is expected to succeed without changes. */
  retryable: boolean;
  /** Structured detail payload. */
  details?: Record<string, unknown>;
  /** Remediation suggestions. */
  suggestedFixes: SuggestedFix[];
}

/** Create a typed error with defaults. */
export function createTypedError(params: {
  code: string;
  message: string;
  track?: string;
  retryable?: boolean;
  details?: Record<string, unknown>;
  suggestedFixes?: SuggestedFix[];
}): TypedError {
  return {
    code: params.code,
    message: params.message,
    track: params.track,
    retryable: params.retryable ?? false,
    details: params.details,
    suggestedFixes: params.suggestedFixes ?? [],
  };
}

/** Domain of a namespaced error code. */
export function errorDomain(error: TypedError): ErrorDomain | undefined {
  const prefix = error.code.split('.')[0];
  const domains: ErrorDomain[] = [
    'REGISTRY',
    'TEST_SERVICE',
    'INVARIANT',
    'PROMOTION',
    'CONFIG',
    'UPSTREAM',
    'STATE',
    'TRACK',
  ];
  return domains.find((domain) => domain === prefix);
}

// --- Thrown error classes ---

/** Base class for every error this project throws on purpose. */
export class ReleaseError extends Error {
  constructor(public readonly typedError: TypedError) {
    super(typedError.message);
    this.name = 'ReleaseError';
  }
}

/** An external query failed: unreachable, non-2xx, timeout or malformed transport. */
export class QueryError extends ReleaseError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'QueryError';
  }
}

/** A test-service command exited non-zero or timed out. */
export class TestServiceError extends ReleaseError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'TestServiceError';
  }
}

/** An external response or internal structure broke an expected invariant. */
export class InvariantError extends ReleaseError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'InvariantError';
  }
}

/** A promotion command failed after the gating decision was made. */
export class PromotionError extends ReleaseError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'PromotionError';
  }
}

/** Configuration could not be loaded or validated. */
export class ConfigError extends ReleaseError {
  constructor(typedError: TypedError) {
    super(typedError);
    this.name = 'ConfigError';
  }
}

// --- Common error factory functions ---

/**
 * Create a typed error for an HTTP query failure, with retryability
 * determined by status code.
 *
 * - 429 and 5xx: transient, retryable.
 * - Other 4xx: non-retryable (bad request, auth, unknown resource).
 * - No status: the request never completed (network error or timeout).
 */
export function httpQueryError(
  domain: 'REGISTRY' | 'UPSTREAM',
  message: string,
  statusCode?: number,
  details?: Record<string, unknown>,
): TypedError {
  if (statusCode === undefined) {
    return createTypedError({
      code: `${domain}.HTTP.UNREACHABLE`,
      message,
      retryable: true,
      details,
      suggestedFixes: [{ type: 'WAIT_AND_RETRY', params: {}, description: 'Re-run on the next schedule.' }],
    });
  }

  const retryable = statusCode === 429 || statusCode >= 500;
  const fixes: SuggestedFix[] = [];
  if (statusCode === 401 || statusCode === 403) {
    fixes.push({ type: 'CHECK_CREDENTIALS', params: { statusCode }, description: 'Verify the credential has the required permissions.' });
  } else if (retryable) {
    fixes.push({ type: 'WAIT_AND_RETRY', params: { statusCode }, description: 'Transient server error. Re-run on the next schedule.' });
  }

  return createTypedError({
    code: retryable ? `${domain}.HTTP.TRANSIENT` : `${domain}.HTTP.REJECTED`,
    message,
    retryable,
    details: { statusCode, ...details },
    suggestedFixes: fixes,
  });
}

export function httpTimeoutError(domain: 'REGISTRY' | 'UPSTREAM', url: string, timeoutMs: number): TypedError {
  return createTypedError({
    code: `${domain}.HTTP.TIMEOUT`,
    message: `Request to ${url} timed out after ${timeoutMs}ms`,
    retryable: true,
    details: { url, timeoutMs },
    suggestedFixes: [{ type: 'INCREASE_TIMEOUT', params: { timeoutMs: timeoutMs * 2 } }],
  });
}

export function commandFailedError(
  command: string,
  args: string[],
  exitCode: number | undefined,
  stderr: string,
  timedOut: boolean,
): TypedError {
  return createTypedError({
    code: timedOut ? 'TEST_SERVICE.COMMAND.TIMEOUT' : 'TEST_SERVICE.COMMAND.FAILED',
    message: timedOut
      ? `${command} ${args[0] ?? ''} timed out`
      : `${command} ${args[0] ?? ''} exited with code ${exitCode ?? 'unknown'}`,
    retryable: timedOut,
    details: { command, args, exitCode, stderr: stderr.slice(0, 2000) },
  });
}

export function malformedResponseError(source: string, issues: string[]): TypedError {
  return createTypedError({
    code: 'INVARIANT.MALFORMED_RESPONSE',
    message: `Malformed response from ${source}: ${issues.join('; ')}`,
    retryable: false,
    details: { source, issues },
  });
}

export function ambiguousRecordsError(kind: string, count: number, details?: Record<string, unknown>): TypedError {
  return createTypedError({
    code: 'INVARIANT.AMBIGUOUS_RECORDS',
    message: `Expected exactly one ${kind}, found ${count}`,
    retryable: false,
    details: { kind, count, ...details },
    suggestedFixes: [
      { type: 'CLEAN_UP_RECORDS', params: { kind }, description: `Remove duplicate ${kind} records in the test service.` },
    ],
  });
}

export function promotionFailedError(component: string, from: string, to: string, cause: TypedError): TypedError {
  return createTypedError({
    code: 'PROMOTION.COMMAND_FAILED',
    message: `Promoting ${component} from ${from} to ${to} failed: ${cause.message}`,
    retryable: true,
    details: { component, from, to, cause: cause.code },
    suggestedFixes: [
      { type: 'PROMOTE_MANUALLY', params: { component, from, to }, description: 'Tests passed; retry the promotion or promote by hand.' },
    ],
  });
}

export function configInvalidError(issues: string[]): TypedError {
  return createTypedError({
    code: 'CONFIG.INVALID',
    message: `Invalid configuration: ${issues.join('; ')}`,
    retryable: false,
    details: { issues },
  });
}

/** Normalise anything caught at a track boundary into a TypedError. */
export function toTypedError(err: unknown, track?: string): TypedError {
  if (err instanceof ReleaseError) {
    return track && !err.typedError.track ? { ...err.typedError, track } : err.typedError;
  }
  return createTypedError({
    code: 'TRACK.UNEXPECTED',
    message: err instanceof Error ? err.message : String(err),
    track,
    retryable: false,
    details: err instanceof Error ? { name: err.name } : undefined,
  });
}
