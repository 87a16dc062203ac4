export { createTokenExchangeManager, DEFAULT_CLOCK_SKEW_SECONDS } from './token-exchange-manager.js';
export type {
  SaveTokensRequest,
  TokenExchangeManager,
  TokenExchangeManagerOptions,
  TokenManagerError,
} from './token-exchange-manager.js';
export {
  createTokenClient,
  isGrantRejection,
  isTransportFailure,
  TOKEN_EXCHANGE_GRANT_TYPE,
} from './token-client.js';
export type { TokenClient, TokenClientOptions, TokenEndpointResult } from './token-client.js';
export { buildDiscoveryUrl, createTokenEndpointResolver } from './discovery.js';
export type { TokenEndpointResolver, TokenEndpointResolverOptions } from './discovery.js';
export { createToken, isRefreshTokenUsable, isTokenLive, readClaims } from './token.js';
export type { TokenClaims } from './token.js';
export {
  OAUTH_ERROR_CODES,
  oauthErrorResponseSchema,
  tokenEndpointResponseSchema,
} from './types.js';
export type {
  OAuthErrorCode,
  ProviderConfig,
  Token,
  TokenEndpointError,
  TokenEndpointErrorCode,
  TokenEndpointResponse,
  TokenEndpointSource,
  TokenExchangeRequest,
  TokenRecord,
  TokenTypeIdentifier,
} from './types.js';
