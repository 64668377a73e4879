export { StravaApiClient, createStravaClient, type StravaClientOptions } from './modules/strava/api-client';
export { ServiceError, StravaOAuthError } from './modules/strava/errors';
export {
  StravaAccessToken,
  createStravaOAuthClient,
  type AuthorizeUrlInput,
  type CodeExchangeInput,
  type StravaAthleteProfile,
  type StravaOAuthClient
} from './modules/strava/oauth-client';
export { buildQuery } from './modules/strava/query';
export { decodeBody, isSuccessStatus, shapeResponse } from './modules/strava/response-shaper';
export { createFetchTransport, type StravaTransport } from './modules/strava/transport';
export { resolveAccessToken, toTokenSource, type AccessTokenInput, type AccessTokenProvider, type TokenSource } from './modules/strava/token';
export { createLogger, type Logger } from './observability/logger';
export type * from './modules/strava/types';
