/**
 * Error taxonomy for the credential and configuration caches.
 *
 * Every failure surfaced by this package is one of these classes, carried as
 * the error side of a neverthrow `Result`. Messages hold metadata only
 * (provider, subject, error code) and never a token value.
 *
 * @packageDocumentation
 */

/**
 * Machine-readable error codes.
 */
export type CredentialCacheErrorCode =
  | 'config_load_failed'
  | 'no_credential'
  | 'refresh_failed'
  | 'exchange_failed'
  | 'reauthentication_required'
  | 'store_unavailable'
  | 'lock_timeout'
  | 'operation_cancelled'
  | 'unknown_provider'
  | 'invalid_configuration';

/**
 * Base class for all errors raised by this package.
 */
export abstract class CredentialCacheError extends Error {
  /** Error code */
  abstract readonly code: CredentialCacheErrorCode;

  /**
   * Whether the boundary layer must answer with a "re-authenticate" signal
   * rather than a generic failure.
   */
  abstract readonly requiresReauthentication: boolean;

  constructor(message: string, cause?: unknown) {
    super(message, cause === undefined ? undefined : { cause });
    this.name = new.target.name;
  }
}

/**
 * The config loader failed. Nothing was cached; the next call retries.
 */
export class ConfigLoadError extends CredentialCacheError {
  readonly code = 'config_load_failed' as const;
  readonly requiresReauthentication = false;

  constructor(cause: unknown) {
    super(
      `Failed to load configuration: ${cause instanceof Error ? cause.message : String(cause)}`,
      cause
    );
  }
}

/**
 * No token record exists for the key. The caller must start a fresh login.
 */
export class NoCredentialError extends CredentialCacheError {
  readonly code = 'no_credential' as const;
  readonly requiresReauthentication = true;
  readonly provider: string;
  readonly referringSubject: string;

  constructor(provider: string, referringSubject: string) {
    super(`No stored credential for provider "${provider}" and subject "${referringSubject}"`);
    this.provider = provider;
    this.referringSubject = referringSubject;
  }
}

/**
 * The refresh grant failed.
 *
 * When `rejected` is true the provider refused the refresh token and the
 * stored record has been invalidated; otherwise the endpoint could not be
 * reached and the record is untouched.
 */
export class RefreshFailedError extends CredentialCacheError {
  readonly code = 'refresh_failed' as const;
  readonly provider: string;
  readonly referringSubject: string;
  readonly rejected: boolean;
  readonly requiresReauthentication: boolean;

  constructor(provider: string, referringSubject: string, rejected: boolean, cause?: unknown) {
    super(
      rejected
        ? `Refresh token for provider "${provider}" and subject "${referringSubject}" was rejected`
        : `Refresh for provider "${provider}" and subject "${referringSubject}" could not complete`,
      cause
    );
    this.provider = provider;
    this.referringSubject = referringSubject;
    this.rejected = rejected;
    this.requiresReauthentication = rejected;
  }
}

/**
 * The token exchange endpoint could not be reached or answered with a server
 * error. The stored record is untouched and a later call may succeed.
 */
export class ExchangeFailedError extends CredentialCacheError {
  readonly code = 'exchange_failed' as const;
  readonly requiresReauthentication = false;
  readonly provider: string;
  readonly referringSubject: string;
  readonly audience: string;

  constructor(provider: string, referringSubject: string, audience: string, cause?: unknown) {
    super(
      `Token exchange for provider "${provider}", subject "${referringSubject}" and audience "${audience}" could not complete`,
      cause
    );
    this.provider = provider;
    this.referringSubject = referringSubject;
    this.audience = audience;
  }
}

/**
 * The record exists but no usable token, refresh or exchange path remains.
 */
export class ReAuthenticationRequiredError extends CredentialCacheError {
  readonly code = 'reauthentication_required' as const;
  readonly requiresReauthentication = true;
  readonly provider: string;
  readonly referringSubject: string;

  constructor(provider: string, referringSubject: string, reason: string, cause?: unknown) {
    super(
      `Re-authentication required for provider "${provider}" and subject "${referringSubject}": ${reason}`,
      cause
    );
    this.provider = provider;
    this.referringSubject = referringSubject;
  }
}

/**
 * The durable token store could not be reached.
 */
export class StoreUnavailableError extends CredentialCacheError {
  readonly code = 'store_unavailable' as const;
  readonly requiresReauthentication = false;
  readonly operation: 'find' | 'upsert' | 'delete';

  constructor(operation: 'find' | 'upsert' | 'delete', cause: unknown) {
    super(`Token store ${operation} failed`, cause);
    this.operation = operation;
  }
}

/**
 * A caller gave up waiting for an in-flight load or refresh.
 * The shared operation itself keeps running.
 */
export class LockTimeoutError extends CredentialCacheError {
  readonly code = 'lock_timeout' as const;
  readonly requiresReauthentication = false;
  readonly timeoutMs: number;

  constructor(lockName: string, timeoutMs: number) {
    super(`Timed out after ${String(timeoutMs)}ms waiting for "${lockName}"`);
    this.timeoutMs = timeoutMs;
  }
}

/**
 * A caller cancelled its wait. The shared operation itself keeps running.
 */
export class OperationCancelledError extends CredentialCacheError {
  readonly code = 'operation_cancelled' as const;
  readonly requiresReauthentication = false;

  constructor(lockName: string, cause?: unknown) {
    super(`Wait for "${lockName}" was cancelled`, cause);
  }
}

/**
 * No token endpoint client is registered for the provider.
 */
export class UnknownProviderError extends CredentialCacheError {
  readonly code = 'unknown_provider' as const;
  readonly requiresReauthentication = false;
  readonly provider: string;

  constructor(provider: string) {
    super(`No token endpoint configured for provider "${provider}"`);
    this.provider = provider;
  }
}

/**
 * Operator configuration is missing or malformed.
 */
export class ConfigurationError extends CredentialCacheError {
  readonly code = 'invalid_configuration' as const;
  readonly requiresReauthentication = false;
  readonly issues: readonly string[];

  constructor(issues: readonly string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.issues = issues;
  }
}

/**
 * Errors that mean "send the user back through login".
 */
export const isReauthenticationRequired = (error: unknown): boolean =>
  error instanceof CredentialCacheError && error.requiresReauthentication;
