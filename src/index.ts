// src/index.ts

export { SavedHub } from './hub';
export type { HubOptions } from './hub';
export { createApp, SESSION_COOKIE } from './server/createApp';
export { RouteController } from './server/RouteController';
export type { RouteResult, RouteResponse } from './server/types';
export { loadConfig, parseClientSecret } from './config/loadConfig';
export { validateConfig, validateConfigSafe } from './config/ConfigValidator';
export type { AppConfig } from './config/ConfigValidator';
export { SyncGate, systemClock } from './core/sync/SyncGate';
export type { Clock, SyncConnectors } from './core/sync/SyncGate';
export { SessionStore, createDefaultState } from './core/session/SessionStore';
export type { SessionState } from './core/session/types';
export type { ProviderName, NormalizedRecord } from './core/normalizer/types';
export type { Credential } from './core/token/types';
export type { Connector, SyncOutcome } from './connectors/types';
export type { CallbackParams, OAuth2ProviderConfig } from './core/auth/types';

// Export error classes for error handling
export {
  AppError,
  ConfigError,
  OAuthError,
  OAuthConfigError,
  MissingParameterError,
  AuthStateMismatchError,
  AuthExchangeFailedError,
  OAuthDeniedError,
  TokenRefreshError,
  FetchFailedError,
  ApiError,
  ApiClientError,
  ApiServerError,
  NetworkError,
  NetworkTimeoutError,
} from './utils/errors';
