/**
 * Keeps a valid access token available for each (provider, user, audience).
 *
 * Tokens come from the token record store when still live; otherwise the
 * manager refreshes them, or exchanges the user's token for one issued to the
 * required audience. Renewals for the same record are single-flight, so a
 * refresh token is never presented twice concurrently.
 *
 * @packageDocumentation
 */

import { ok, err, type Result } from 'neverthrow';
import type { Logger } from 'pino';
import { createSingleFlight } from '../cache/single-flight.js';
import type { WaitOptions } from '../cache/types.js';
import {
  ExchangeFailedError,
  LockTimeoutError,
  NoCredentialError,
  OperationCancelledError,
  ReAuthenticationRequiredError,
  RefreshFailedError,
  StoreUnavailableError,
  UnknownProviderError,
} from '../errors.js';
import { createSilentLogger } from '../logging/logger.js';
import type { TokenRecordStore } from '../storage/types.js';
import { isGrantRejection, isTransportFailure, type TokenClient } from './token-client.js';
import { createToken, isRefreshTokenUsable, isTokenLive, readClaims } from './token.js';
import type { Token, TokenEndpointResponse, TokenRecord } from './types.js';

/** Default safety margin on access token expiry */
export const DEFAULT_CLOCK_SKEW_SECONDS = 30;

/** Renewals a caller runs before giving up on its audience */
const MAX_RENEWALS = 3;

/**
 * Errors returned by `getValidToken`.
 */
export type TokenManagerError =
  | NoCredentialError
  | RefreshFailedError
  | ExchangeFailedError
  | ReAuthenticationRequiredError
  | StoreUnavailableError
  | UnknownProviderError
  | LockTimeoutError
  | OperationCancelledError;

/**
 * Options for creating a token exchange manager.
 */
export interface TokenExchangeManagerOptions {
  readonly store: TokenRecordStore;
  /** One client per provider, matched on `TokenClient.provider` */
  readonly tokenClients: readonly TokenClient[];
  /** Margin subtracted from access token expiry (default: 30) */
  readonly clockSkewSeconds?: number | undefined;
  /** Default wait limit for callers blocked behind a renewal */
  readonly lockTimeoutMs?: number | undefined;
  readonly logger?: Logger | undefined;
}

/**
 * Tokens from a completed login, to be stored for later use.
 */
export interface SaveTokensRequest {
  readonly provider: string;
  readonly referringSubject: string;
  readonly referringEmail?: string | undefined;
  /** Audience the access token was issued for */
  readonly audience: string;
  /** Token endpoint response from the authorization code grant */
  readonly tokens: TokenEndpointResponse;
}

/**
 * Token exchange manager interface.
 */
export interface TokenExchangeManager {
  /**
   * Returns a live access token for the audience, refreshing or exchanging
   * as needed.
   *
   * Never starts a login: when no usable credential remains the error says
   * so (see `isReauthenticationRequired`).
   */
  readonly getValidToken: (
    provider: string,
    referringSubject: string,
    requiredAudience: string,
    options?: WaitOptions
  ) => Promise<Result<Token, TokenManagerError>>;

  /**
   * Creates or replaces the record after a login.
   *
   * The provider subject, email and issuer are read from the ID token, or
   * from the access token when it is a JWT.
   */
  readonly saveTokens: (
    request: SaveTokensRequest
  ) => Promise<Result<TokenRecord, StoreUnavailableError | ReAuthenticationRequiredError>>;

  /**
   * Whether a live token for the audience is stored. Makes no network call.
   */
  readonly hasValidToken: (
    provider: string,
    referringSubject: string,
    audience: string
  ) => Promise<Result<boolean, StoreUnavailableError>>;

  /**
   * Forgets the user's credentials for a provider.
   * @returns true if a record existed
   */
  readonly revoke: (
    provider: string,
    referringSubject: string
  ) => Promise<Result<boolean, StoreUnavailableError>>;

  readonly getRecord: (
    provider: string,
    referringSubject: string
  ) => Promise<Result<TokenRecord | undefined, StoreUnavailableError>>;
}

/**
 * Outcome of one renewal: the stored record and the token it produced.
 */
interface Renewal {
  readonly record: TokenRecord;
  readonly audience: string;
  readonly token: Token;
}

/**
 * A failed renewal, tagged with the audience it was run for.
 */
interface RenewalFailure {
  readonly audience: string;
  readonly error: TokenManagerError;
}

/**
 * Creates a token exchange manager.
 *
 * @example
 * ```typescript
 * const manager = createTokenExchangeManager({
 *   store: createMemoryTokenRecordStore(),
 *   tokenClients: [createTokenClient(providerConfig)],
 * });
 *
 * const result = await manager.getValidToken('example', userId, 'billing-api');
 * if (result.isErr() && isReauthenticationRequired(result.error)) {
 *   redirectToLogin();
 * }
 * ```
 */
export const createTokenExchangeManager = (
  options: TokenExchangeManagerOptions
): TokenExchangeManager => {
  const {
    store,
    tokenClients,
    clockSkewSeconds = DEFAULT_CLOCK_SKEW_SECONDS,
    lockTimeoutMs,
    logger = createSilentLogger(),
  } = options;
  const clockSkewMs = clockSkewSeconds * 1000;
  const clients = new Map(tokenClients.map((client) => [client.provider, client]));
  const flight = createSingleFlight<string, Result<Renewal, RenewalFailure>>({
    name: 'token-renewal',
    logger,
  });

  /** Refresh tokens refused by the provider whose invalidation is not yet stored */
  const unsavedRejections = new Set<string>();

  /**
   * The live token the record holds for the audience, if any.
   */
  const selectToken = (record: TokenRecord, audience: string): Token | undefined => {
    const candidate =
      audience === record.audience ? record.accessToken : record.exchanged?.[audience];
    return isTokenLive(candidate, clockSkewMs) ? candidate : undefined;
  };

  const save = async (record: TokenRecord): Promise<Result<TokenRecord, StoreUnavailableError>> => {
    const saved = await store.upsert(record);
    return saved.map(() => record);
  };

  /**
   * Clears a record whose refresh token the provider refused. Until the
   * cleared record is stored, the token stays in `unsavedRejections` so it is
   * never presented again.
   */
  const invalidate = async (
    record: TokenRecord,
    cause: unknown
  ): Promise<Result<TokenRecord, TokenManagerError>> => {
    const { provider, referringSubject, refreshToken } = record;
    const saved = await store.upsert({
      ...record,
      accessToken: undefined,
      idToken: undefined,
      refreshToken: undefined,
      exchanged: undefined,
      updated: Date.now(),
    });

    if (refreshToken !== undefined) {
      if (saved.isErr()) {
        unsavedRejections.add(refreshToken.value);
      } else {
        unsavedRejections.delete(refreshToken.value);
      }
    }
    if (saved.isErr()) {
      logger.error({ provider, referringSubject }, 'could not store invalidated record');
      return err(saved.error);
    }
    return err(new RefreshFailedError(provider, referringSubject, true, cause));
  };

  /**
   * Runs the refresh grant and stores the outcome.
   */
  const refresh = async (
    client: TokenClient,
    record: TokenRecord
  ): Promise<Result<TokenRecord, TokenManagerError>> => {
    const { provider, referringSubject } = record;

    if (!isRefreshTokenUsable(record.refreshToken)) {
      logger.info({ provider, referringSubject }, 'no usable refresh token');
      return err(
        new ReAuthenticationRequiredError(
          provider,
          referringSubject,
          'access token expired and no usable refresh token'
        )
      );
    }

    const refreshToken = record.refreshToken.value;
    if (unsavedRejections.has(refreshToken)) {
      // Already refused; only the write clearing it is outstanding
      return invalidate(record, undefined);
    }

    logger.info({ provider, referringSubject }, 'refreshing access token');
    const response = await client.refresh(refreshToken);

    if (response.isErr()) {
      if (!isGrantRejection(response.error)) {
        logger.warn(
          { provider, referringSubject, code: response.error.code },
          'refresh did not complete'
        );
        return err(new RefreshFailedError(provider, referringSubject, false, response.error));
      }

      logger.warn(
        { provider, referringSubject, code: response.error.code },
        'refresh token rejected; clearing stored tokens'
      );
      return invalidate(record, response.error);
    }

    const now = Date.now();
    const tokens = response.value;
    return save({
      ...record,
      accessToken: createToken(tokens.access_token, tokens.expires_in, now),
      idToken:
        tokens.id_token !== undefined ? createToken(tokens.id_token, undefined, now) : record.idToken,
      // The provider may or may not rotate the refresh token
      refreshToken:
        tokens.refresh_token !== undefined
          ? createToken(tokens.refresh_token, undefined, now)
          : record.refreshToken,
      refreshed: now,
      updated: now,
    });
  };

  /**
   * Exchanges the record's access token for one issued to `audience`.
   */
  const exchange = async (
    client: TokenClient,
    record: TokenRecord,
    audience: string
  ): Promise<Result<Renewal, TokenManagerError>> => {
    const { provider, referringSubject } = record;
    const source = record.accessToken;

    if (source === undefined) {
      return err(
        new ReAuthenticationRequiredError(provider, referringSubject, 'no access token to exchange')
      );
    }

    logger.info({ provider, referringSubject, audience }, 'exchanging token for audience');
    const response = await client.exchange({ subjectToken: source.value, audience });

    if (response.isErr()) {
      if (isTransportFailure(response.error)) {
        logger.warn(
          { provider, referringSubject, audience, code: response.error.code },
          'token exchange did not complete'
        );
        return err(new ExchangeFailedError(provider, referringSubject, audience, response.error));
      }
      return err(
        new ReAuthenticationRequiredError(
          provider,
          referringSubject,
          `token exchange for audience "${audience}" failed (${response.error.code})`,
          response.error
        )
      );
    }

    const now = Date.now();
    const token = createToken(response.value.access_token, response.value.expires_in, now);
    const saved = await save({
      ...record,
      exchanged: { ...record.exchanged, [audience]: token },
      updated: now,
    });
    return saved.map((stored) => ({ record: stored, audience, token }));
  };

  /**
   * Brings the record up to date for `audience`. Runs inside the
   * single-flight for the record's key.
   */
  const renew = async (
    provider: string,
    referringSubject: string,
    audience: string
  ): Promise<Result<Renewal, TokenManagerError>> => {
    // Re-read: a renewal that finished while this one queued may have done the work
    const found = await store.find(provider, referringSubject);
    if (found.isErr()) {
      return err(found.error);
    }
    const record = found.value;
    if (record === undefined) {
      return err(new NoCredentialError(provider, referringSubject));
    }

    const cached = selectToken(record, audience);
    if (cached !== undefined) {
      return ok({ record, audience, token: cached });
    }

    const client = clients.get(provider);
    if (client === undefined) {
      return err(new UnknownProviderError(provider));
    }

    let current = record;
    if (!isTokenLive(current.accessToken, clockSkewMs)) {
      const refreshed = await refresh(client, current);
      if (refreshed.isErr()) {
        return err(refreshed.error);
      }
      current = refreshed.value;
    }

    if (audience === current.audience) {
      const { accessToken } = current;
      return accessToken === undefined
        ? err(new ReAuthenticationRequiredError(provider, referringSubject, 'no access token'))
        : ok({ record: current, audience, token: accessToken });
    }

    return exchange(client, current, audience);
  };

  const getValidToken = async (
    provider: string,
    referringSubject: string,
    requiredAudience: string,
    waitOptions: WaitOptions = {}
  ): Promise<Result<Token, TokenManagerError>> => {
    const found = await store.find(provider, referringSubject);
    if (found.isErr()) {
      return err(found.error);
    }
    if (found.value === undefined) {
      logger.info({ provider, referringSubject }, 'no stored credential');
      return err(new NoCredentialError(provider, referringSubject));
    }

    const key = JSON.stringify([provider, referringSubject]);
    let record = found.value;

    for (let renewals = 0; ; renewals += 1) {
      const cached = selectToken(record, requiredAudience);
      if (cached !== undefined) {
        return ok(cached);
      }
      if (renewals === MAX_RENEWALS) {
        return err(
          new ReAuthenticationRequiredError(
            provider,
            referringSubject,
            `no live token for audience "${requiredAudience}" after ${String(MAX_RENEWALS)} renewals`
          )
        );
      }

      let renewal: Result<Renewal, RenewalFailure>;
      try {
        renewal = await flight.run(
          key,
          async () =>
            (await renew(provider, referringSubject, requiredAudience)).mapErr((error) => ({
              audience: requiredAudience,
              error,
            })),
          {
            signal: waitOptions.signal,
            timeoutMs: waitOptions.timeoutMs ?? lockTimeoutMs,
          }
        );
      } catch (error) {
        if (error instanceof LockTimeoutError || error instanceof OperationCancelledError) {
          return err(error);
        }
        throw error;
      }

      // A renewal started by another caller may have been for a different audience
      if (renewal.isErr()) {
        if (renewal.error.audience === requiredAudience) {
          return err(renewal.error.error);
        }
        // Its failure may have come after work that serves this audience
        const reread = await store.find(provider, referringSubject);
        if (reread.isErr()) {
          return err(reread.error);
        }
        if (reread.value === undefined) {
          return err(new NoCredentialError(provider, referringSubject));
        }
        record = reread.value;
        continue;
      }
      if (renewal.value.audience === requiredAudience) {
        return ok(renewal.value.token);
      }
      record = renewal.value.record;
    }
  };

  const saveTokens = async (
    request: SaveTokensRequest
  ): Promise<Result<TokenRecord, StoreUnavailableError | ReAuthenticationRequiredError>> => {
    const { provider, referringSubject, tokens } = request;
    const idClaims = tokens.id_token !== undefined ? readClaims(tokens.id_token) : undefined;
    const accessClaims = readClaims(tokens.access_token);

    const subject = idClaims?.subject ?? accessClaims?.subject;
    if (subject === undefined) {
      return err(
        new ReAuthenticationRequiredError(
          provider,
          referringSubject,
          'login tokens carry no subject claim'
        )
      );
    }

    const now = Date.now();
    const record: TokenRecord = {
      provider,
      subject,
      referringSubject,
      referringEmail: request.referringEmail,
      email: idClaims?.email ?? accessClaims?.email,
      issuer: idClaims?.issuer ?? accessClaims?.issuer,
      audience: request.audience,
      accessToken: createToken(tokens.access_token, tokens.expires_in, now),
      idToken: tokens.id_token !== undefined ? createToken(tokens.id_token, undefined, now) : undefined,
      refreshToken:
        tokens.refresh_token !== undefined
          ? createToken(tokens.refresh_token, undefined, now)
          : undefined,
      created: now,
      updated: now,
    };

    logger.info({ provider, referringSubject, audience: request.audience }, 'storing login tokens');
    return save(record);
  };

  const hasValidToken = async (
    provider: string,
    referringSubject: string,
    audience: string
  ): Promise<Result<boolean, StoreUnavailableError>> => {
    const found = await store.find(provider, referringSubject);
    return found.map((record) => record !== undefined && selectToken(record, audience) !== undefined);
  };

  const revoke = async (
    provider: string,
    referringSubject: string
  ): Promise<Result<boolean, StoreUnavailableError>> => {
    logger.info({ provider, referringSubject }, 'revoking stored credential');
    return store.delete(provider, referringSubject);
  };

  const getRecord = (
    provider: string,
    referringSubject: string
  ): Promise<Result<TokenRecord | undefined, StoreUnavailableError>> =>
    store.find(provider, referringSubject);

  return { getValidToken, saveTokens, hasValidToken, revoke, getRecord };
};
