/**
 * OAuth token endpoint client for the refresh and token exchange grants.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { createFetchClient } from '../http/fetch-client.js';
import type { HttpClient } from '../http/types.js';
import { createSilentLogger } from '../logging/logger.js';
import { createTokenEndpointResolver } from './discovery.js';
import {
  OAUTH_ERROR_CODES,
  oauthErrorResponseSchema,
  tokenEndpointResponseSchema,
  type ProviderConfig,
  type TokenEndpointError,
  type TokenEndpointResponse,
  type TokenExchangeRequest,
} from './types.js';

/** Token exchange grant type per RFC 8693 */
export const TOKEN_EXCHANGE_GRANT_TYPE = 'urn:ietf:params:oauth:grant-type:token-exchange';

/** Default subject token type for exchange */
const ACCESS_TOKEN_TYPE = 'urn:ietf:params:oauth:token-type:access_token';

/**
 * Result of a token endpoint call.
 */
export type TokenEndpointResult = Result<TokenEndpointResponse, TokenEndpointError>;

/**
 * Token endpoint operations for one provider.
 */
export interface TokenClient {
  readonly provider: string;

  /**
   * Runs the refresh_token grant.
   */
  readonly refresh: (refreshToken: string) => Promise<TokenEndpointResult>;

  /**
   * Runs the RFC 8693 token exchange grant.
   */
  readonly exchange: (request: TokenExchangeRequest) => Promise<TokenEndpointResult>;
}

/**
 * Options for creating a token client.
 */
export interface TokenClientOptions {
  /** HTTP client (default: fetch) */
  readonly httpClient?: HttpClient | undefined;
  /** TTL for a discovered token endpoint (default: 1 hour) */
  readonly discoveryTtlSeconds?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Whether the call never produced an answer about the grant: the endpoint
 * was unreachable, unresolvable, or failed on its side.
 */
export const isTransportFailure = (error: TokenEndpointError): boolean => {
  switch (error.code) {
    case 'network_error':
    case 'invalid_response':
    case 'discovery_error':
    case 'server_error':
    case 'temporarily_unavailable':
      return true;
    default:
      return false;
  }
};

/**
 * Whether the provider refused the presented grant itself. Only this
 * invalidates stored credentials; client misconfiguration such as
 * `invalid_client` does not.
 */
export const isGrantRejection = (error: TokenEndpointError): boolean =>
  error.code === 'invalid_grant';

/**
 * Creates Basic Auth header for confidential clients.
 */
const createBasicAuthHeader = (clientId: string, clientSecret: string): string => {
  const credentials = `${clientId}:${clientSecret}`;
  return `Basic ${btoa(credentials)}`;
};

/**
 * Where token requests are sent.
 */
interface EndpointSource {
  readonly resolve: () => Promise<Result<string, TokenEndpointError>>;
  /** Forgets a discovered endpoint; no-op for a configured one */
  readonly invalidate: () => void;
}

const staticEndpoint = (url: string): EndpointSource => ({
  resolve: () => Promise.resolve(ok(url)),
  invalidate: () => undefined,
});

/**
 * Parses an OAuth error response.
 */
const parseOAuthError = (status: number, body: unknown): TokenEndpointError => {
  const parsed = oauthErrorResponseSchema.safeParse(body);
  if (!parsed.success) {
    return {
      code: 'invalid_response',
      message: `Token endpoint returned HTTP ${String(status)} without an OAuth error`,
      status,
    };
  }

  const { error, error_description: errorDescription } = parsed.data;
  const known = OAUTH_ERROR_CODES.find((code) => code === error);

  return {
    code: known ?? (status >= 500 ? 'server_error' : 'invalid_grant'),
    message: errorDescription ?? `Token error: ${error}`,
    errorDescription,
    status,
  };
};

/**
 * Creates a token client for one provider.
 *
 * @example
 * ```typescript
 * const client = createTokenClient({
 *   provider: 'example',
 *   issuer: 'https://idp.example.com',
 *   clientId: 'gateway',
 *   clientSecret: 'test-secret',
 * });
 *
 * const result = await client.refresh(storedRefreshToken);
 * if (result.isOk()) {
 *   store(result.value.access_token);
 * }
 * ```
 */
export const createTokenClient = (
  config: ProviderConfig,
  options: TokenClientOptions = {}
): TokenClient => {
  const {
    httpClient = createFetchClient(),
    discoveryTtlSeconds,
    logger = createSilentLogger(),
  } = options;
  const { provider } = config;

  const endpointSource: EndpointSource =
    'tokenEndpoint' in config
      ? staticEndpoint(config.tokenEndpoint)
      : createTokenEndpointResolver({
          httpClient,
          issuer: config.issuer,
          ttlSeconds: discoveryTtlSeconds,
          logger,
        });

  /**
   * Makes a token request to the token endpoint.
   */
  const makeTokenRequest = async (
    grantType: string,
    params: Record<string, string>
  ): Promise<TokenEndpointResult> => {
    const endpoint = await endpointSource.resolve();
    if (endpoint.isErr()) {
      logger.error({ provider, grantType, code: endpoint.error.code }, 'token endpoint unresolved');
      return err(endpoint.error);
    }

    const body: Record<string, string> = { grant_type: grantType, ...params };
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
    };

    if (config.clientSecret !== undefined) {
      headers['Authorization'] = createBasicAuthHeader(config.clientId, config.clientSecret);
    } else {
      // Public client includes client_id in body
      body['client_id'] = config.clientId;
    }

    logger.info({ provider, grantType }, 'calling token endpoint');

    const response = await httpClient.json({
      url: endpoint.value,
      method: 'POST',
      headers,
      body: new URLSearchParams(body).toString(),
    });

    if (response.isErr()) {
      logger.error({ provider, grantType, type: response.error.type }, 'token request failed');
      if (response.error.type !== 'parse') {
        endpointSource.invalidate();
      }
      return err({
        code: response.error.type === 'parse' ? 'invalid_response' : 'network_error',
        message: `Token request failed: ${response.error.message}`,
        status: response.error.status,
        cause: response.error,
      });
    }

    const { status, body: responseBody } = response.value;

    if (status === 404) {
      // A moved endpoint; discover it again on the next request
      endpointSource.invalidate();
    }

    if (status < 200 || status >= 300) {
      const error = parseOAuthError(status, responseBody);
      logger.warn({ provider, grantType, status, code: error.code }, 'token request refused');
      return err(error);
    }

    const parsed = tokenEndpointResponseSchema.safeParse(responseBody);
    if (!parsed.success) {
      logger.error({ provider, grantType }, 'token response missing required fields');
      return err({
        code: 'invalid_response',
        message: 'Invalid token response: missing required fields',
        status,
        cause: parsed.error,
      });
    }

    return ok(parsed.data);
  };

  const refresh = (refreshToken: string): Promise<TokenEndpointResult> =>
    makeTokenRequest('refresh_token', {
      refresh_token: refreshToken,
      ...(config.scopes !== undefined && config.scopes.length > 0
        ? { scope: config.scopes.join(' ') }
        : {}),
    });

  const exchange = (request: TokenExchangeRequest): Promise<TokenEndpointResult> =>
    makeTokenRequest(TOKEN_EXCHANGE_GRANT_TYPE, {
      subject_token: request.subjectToken,
      subject_token_type: request.subjectTokenType ?? ACCESS_TOKEN_TYPE,
      audience: request.audience,
      ...(request.scope !== undefined ? { scope: request.scope } : {}),
    });

  return { provider, refresh, exchange };
};
