/**
 * Credential and configuration caching for an LLM gateway.
 *
 * @packageDocumentation
 */

// ============================================================================
// Composition
// ============================================================================

export { createCredentialCacheSystem } from './system.js';
export type { CredentialCacheSystem, CredentialCacheSystemOptions } from './system.js';

// ============================================================================
// Tokens
// ============================================================================

export * from './tokens/index.js';

// ============================================================================
// Token Storage
// ============================================================================

export * from './storage/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Caching Primitives
// ============================================================================

export * from './cache/index.js';

// ============================================================================
// Errors, Logging, HTTP
// ============================================================================

export {
  CredentialCacheError,
  ConfigLoadError,
  NoCredentialError,
  RefreshFailedError,
  ExchangeFailedError,
  ReAuthenticationRequiredError,
  StoreUnavailableError,
  LockTimeoutError,
  OperationCancelledError,
  UnknownProviderError,
  ConfigurationError,
  isReauthenticationRequired,
} from './errors.js';
export type { CredentialCacheErrorCode } from './errors.js';
export * from './logging/index.js';
export * from './http/index.js';
