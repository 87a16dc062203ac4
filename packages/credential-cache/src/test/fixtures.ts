/**
 * Shared test fixtures and constants.
 */

import { UnsecuredJWT, type JWTPayload } from 'jose';
import type { ProviderConfig, TokenEndpointResponse, TokenRecord } from '../tokens/types.js';

// ============================================================================
// Time Constants
// ============================================================================

export const ONE_SECOND_MS = 1000;
export const ONE_HOUR_MS = 60 * 60 * ONE_SECOND_MS;

// ============================================================================
// Provider Configuration
// ============================================================================

export const TEST_PROVIDER = 'example';
export const TEST_ISSUER = 'https://idp.example.com/tenant1';
export const TEST_TOKEN_ENDPOINT = `${TEST_ISSUER}/oauth2/token`;
export const TEST_CLIENT_ID = 'gateway-client';
export const TEST_CLIENT_SECRET = 'test-secret';

export const TEST_PROVIDER_CONFIG: ProviderConfig = {
  provider: TEST_PROVIDER,
  tokenEndpoint: TEST_TOKEN_ENDPOINT,
  clientId: TEST_CLIENT_ID,
  clientSecret: TEST_CLIENT_SECRET,
};

// ============================================================================
// Users and Audiences
// ============================================================================

export const TEST_REFERRING_SUBJECT = 'user-1';
export const TEST_SUBJECT = 'provider-user-1';
export const TEST_AUDIENCE = 'gateway';
export const TEST_OTHER_AUDIENCE = 'billing-api';

// ============================================================================
// Factories
// ============================================================================

/**
 * Creates a token record with a live access token and an opaque refresh token.
 */
export const createTestRecord = (overrides: Partial<TokenRecord> = {}): TokenRecord => {
  const now = Date.now();
  return {
    provider: TEST_PROVIDER,
    subject: TEST_SUBJECT,
    referringSubject: TEST_REFERRING_SUBJECT,
    audience: TEST_AUDIENCE,
    accessToken: { value: 'access-token-1', issuedAt: now, expiresAt: now + ONE_HOUR_MS },
    refreshToken: { value: 'refresh-token-1' },
    created: now,
    ...overrides,
  };
};

/**
 * Creates a record whose access token expired ten seconds ago.
 */
export const createExpiredRecord = (overrides: Partial<TokenRecord> = {}): TokenRecord => {
  const now = Date.now();
  return createTestRecord({
    accessToken: { value: 'expired-access-token', expiresAt: now - 10 * ONE_SECOND_MS },
    refreshToken: { value: 'refresh-token-1', expiresAt: now + ONE_HOUR_MS },
    ...overrides,
  });
};

/**
 * Creates an unsigned JWT carrying the given claims.
 */
export const createTestJwt = (claims: JWTPayload): string => new UnsecuredJWT(claims).encode();

/**
 * Creates a token endpoint success body.
 */
export const createTokenResponse = (
  overrides: Partial<TokenEndpointResponse> = {}
): TokenEndpointResponse => ({
  access_token: 'new-access-token',
  token_type: 'Bearer',
  expires_in: 3600,
  ...overrides,
});
