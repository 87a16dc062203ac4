import { z } from 'zod';

/**
 * A single credential with its lifetime. Times are epoch milliseconds.
 */
export interface Token {
  readonly value: string;
  /** Absent for opaque tokens whose lifetime is unknown */
  readonly expiresAt?: number | undefined;
  readonly issuedAt?: number | undefined;
}

/**
 * Stored credentials for one user of one provider.
 *
 * Keyed by `(provider, referringSubject)`. Tokens obtained by exchange live
 * under `exchanged`, keyed by audience, so they never replace the record's own
 * tokens.
 */
export interface TokenRecord {
  readonly provider: string;
  /** Subject at the provider */
  readonly subject: string;
  /** Subject of the calling user in the gateway */
  readonly referringSubject: string;
  readonly referringEmail?: string | undefined;
  readonly email?: string | undefined;
  readonly issuer?: string | undefined;
  /** Audience the record's own access token was issued for */
  readonly audience: string;
  readonly accessToken?: Token | undefined;
  readonly idToken?: Token | undefined;
  readonly refreshToken?: Token | undefined;
  readonly exchanged?: Readonly<Record<string, Token>> | undefined;
  readonly created: number;
  readonly updated?: number | undefined;
  readonly refreshed?: number | undefined;
}

/**
 * Successful token endpoint response (RFC 6749 section 5.1, RFC 8693 section 2.2.1).
 */
export const tokenEndpointResponseSchema = z.object({
  access_token: z.string().min(1),
  token_type: z.string(),
  expires_in: z.number().nonnegative().optional(),
  refresh_token: z.string().min(1).optional(),
  id_token: z.string().min(1).optional(),
  issued_token_type: z.string().optional(),
  scope: z.string().optional(),
});

export type TokenEndpointResponse = z.infer<typeof tokenEndpointResponseSchema>;

/**
 * OAuth error response body (RFC 6749 section 5.2).
 */
export const oauthErrorResponseSchema = z.object({
  error: z.string(),
  error_description: z.string().optional(),
  error_uri: z.string().optional(),
});

/**
 * OAuth error codes a token endpoint may return.
 */
export const OAUTH_ERROR_CODES = [
  'invalid_request',
  'invalid_client',
  'invalid_grant',
  'unauthorized_client',
  'unsupported_grant_type',
  'invalid_scope',
  'access_denied',
  'server_error',
  'temporarily_unavailable',
  'unsupported_token_type',
  'invalid_target',
] as const;

export type OAuthErrorCode = (typeof OAUTH_ERROR_CODES)[number];

/**
 * Token endpoint error codes.
 */
export type TokenEndpointErrorCode =
  | OAuthErrorCode
  | 'network_error'
  | 'invalid_response'
  | 'discovery_error';

/**
 * Token endpoint failure.
 */
export interface TokenEndpointError {
  readonly code: TokenEndpointErrorCode;
  readonly message: string;
  readonly errorDescription?: string | undefined;
  /** HTTP status, when a response arrived */
  readonly status?: number | undefined;
  readonly cause?: unknown;
}

/**
 * Where a provider's token endpoint comes from: configured directly, or read
 * from the issuer's OIDC discovery document.
 */
export type TokenEndpointSource =
  | { readonly tokenEndpoint: string }
  | { readonly issuer: string };

/**
 * OAuth client registration for one provider.
 */
export type ProviderConfig = TokenEndpointSource & {
  /** Provider name, as stored in token records */
  readonly provider: string;
  readonly clientId: string;
  /** Confidential clients authenticate with HTTP Basic; public clients send client_id */
  readonly clientSecret?: string | undefined;
  /** Scopes requested on refresh */
  readonly scopes?: readonly string[] | undefined;
};

/**
 * Token types per RFC 8693 section 3.
 */
export type TokenTypeIdentifier =
  | 'urn:ietf:params:oauth:token-type:access_token'
  | 'urn:ietf:params:oauth:token-type:refresh_token'
  | 'urn:ietf:params:oauth:token-type:id_token'
  | 'urn:ietf:params:oauth:token-type:jwt';

/**
 * On-behalf-of exchange request.
 */
export interface TokenExchangeRequest {
  readonly subjectToken: string;
  readonly subjectTokenType?: TokenTypeIdentifier | undefined;
  readonly audience: string;
  readonly scope?: string | undefined;
}
