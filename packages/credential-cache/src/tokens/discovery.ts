import type { Result } from 'neverthrow';
import type { Logger } from 'pino';
import { z } from 'zod';
import { createExpiringCache } from '../cache/expiring-cache.js';
import { createLoadingCache } from '../cache/loading-cache.js';
import { LockTimeoutError, OperationCancelledError } from '../errors.js';
import type { HttpClient } from '../http/types.js';
import { createSilentLogger } from '../logging/logger.js';
import type { TokenEndpointError } from './types.js';

/** Default discovery cache TTL: 1 hour */
const DEFAULT_DISCOVERY_CACHE_TTL_SECONDS = 3600;

const discoveryDocumentSchema = z.object({
  issuer: z.string(),
  token_endpoint: z.string().url(),
});

/**
 * Builds the standard OIDC discovery URL for an issuer.
 *
 * @example
 * ```typescript
 * buildDiscoveryUrl('https://idp.example.com/tenant1/');
 * // 'https://idp.example.com/tenant1/.well-known/openid-configuration'
 * ```
 */
export const buildDiscoveryUrl = (issuer: string): string => {
  const base = issuer.endsWith('/') ? issuer.slice(0, -1) : issuer;
  return `${base}/.well-known/openid-configuration`;
};

/**
 * Options for a token endpoint resolver.
 */
export interface TokenEndpointResolverOptions {
  readonly httpClient: HttpClient;
  readonly issuer: string;
  readonly ttlSeconds?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Resolves a provider's token endpoint from its discovery document.
 */
export interface TokenEndpointResolver {
  readonly resolve: () => Promise<Result<string, TokenEndpointError>>;
  /** Drops the cached endpoint */
  readonly invalidate: () => void;
}

/**
 * Creates a resolver that fetches the discovery document once per TTL.
 *
 * Concurrent callers on a cold cache share one fetch; failures are not cached.
 */
export const createTokenEndpointResolver = (
  options: TokenEndpointResolverOptions
): TokenEndpointResolver => {
  const {
    httpClient,
    issuer,
    ttlSeconds = DEFAULT_DISCOVERY_CACHE_TTL_SECONDS,
    logger = createSilentLogger(),
  } = options;
  const url = buildDiscoveryUrl(issuer);

  const fetchTokenEndpoint = async (): Promise<string> => {
    const response = await httpClient.json({ url, method: 'GET' });

    if (response.isErr()) {
      throw new Error(`Failed to fetch discovery document: ${response.error.message}`, {
        cause: response.error,
      });
    }

    const { status, body } = response.value;
    if (status !== 200) {
      throw new Error(`Discovery document request returned HTTP ${String(status)}`);
    }

    const parsed = discoveryDocumentSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Discovery document missing "token_endpoint"', { cause: parsed.error });
    }

    return parsed.data.token_endpoint;
  };

  const toDiscoveryError = (cause: unknown): TokenEndpointError => ({
    code: 'discovery_error',
    message: cause instanceof Error ? cause.message : String(cause),
    cause,
  });

  const endpoint = createLoadingCache<string, TokenEndpointError>({
    cache: createExpiringCache<string>({ ttlSeconds, name: 'oidc-discovery', logger }),
    load: fetchTokenEndpoint,
    toError: toDiscoveryError,
    name: 'oidc-discovery',
    logger,
  });

  const resolve = async (): Promise<Result<string, TokenEndpointError>> =>
    (await endpoint.get()).mapErr((error) =>
      error instanceof LockTimeoutError || error instanceof OperationCancelledError
        ? toDiscoveryError(error)
        : error
    );

  return { resolve, invalidate: endpoint.invalidate };
};
