/**
 * Token lifetime helpers.
 *
 * @packageDocumentation
 */

import { decodeJwt } from 'jose';
import type { Token } from './types.js';

/**
 * Identity claims read from a JWT.
 */
export interface TokenClaims {
  readonly subject?: string | undefined;
  readonly email?: string | undefined;
  readonly issuer?: string | undefined;
  readonly expiresAt?: number | undefined;
  readonly issuedAt?: number | undefined;
}

/**
 * Reads claims from a JWT without verifying it.
 *
 * The token came straight from the provider's token endpoint over TLS, so
 * only its contents are of interest here.
 *
 * @returns The claims, or undefined for opaque (non-JWT) tokens
 */
export const readClaims = (value: string): TokenClaims | undefined => {
  let payload: ReturnType<typeof decodeJwt>;
  try {
    payload = decodeJwt(value);
  } catch {
    return undefined;
  }

  const email = payload['email'];
  return {
    subject: payload.sub,
    email: typeof email === 'string' ? email : undefined,
    issuer: payload.iss,
    expiresAt: payload.exp === undefined ? undefined : payload.exp * 1000,
    issuedAt: payload.iat === undefined ? undefined : payload.iat * 1000,
  };
};

/**
 * Builds a token from an endpoint value.
 *
 * The lifetime comes from `expires_in` when the endpoint sent one, otherwise
 * from the JWT `exp` claim; opaque tokens with neither have no expiry.
 *
 * @param value - Token string
 * @param expiresInSeconds - `expires_in` from the response
 * @param now - Issue time (default: Date.now())
 */
export const createToken = (value: string, expiresInSeconds?: number, now = Date.now()): Token => {
  if (expiresInSeconds !== undefined) {
    return { value, issuedAt: now, expiresAt: now + expiresInSeconds * 1000 };
  }

  const claims = readClaims(value);
  return {
    value,
    issuedAt: claims?.issuedAt ?? now,
    expiresAt: claims?.expiresAt,
  };
};

/**
 * Whether an access or ID token can still be used.
 *
 * A token without an expiry cannot be proven live and is treated as expired.
 *
 * @param clockSkewMs - Margin subtracted from the expiry
 */
export const isTokenLive = (
  token: Token | undefined,
  clockSkewMs: number,
  now = Date.now()
): token is Token =>
  token !== undefined && token.expiresAt !== undefined && token.expiresAt - clockSkewMs > now;

/**
 * Whether a refresh token can still be presented.
 *
 * Refresh tokens are usually opaque; without an expiry the provider decides.
 */
export const isRefreshTokenUsable = (token: Token | undefined, now = Date.now()): token is Token =>
  token !== undefined && (token.expiresAt === undefined || token.expiresAt > now);
