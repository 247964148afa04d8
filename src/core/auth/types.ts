// src/core/auth/types.ts

export interface OAuth2ProviderConfig {
  clientId: string;
  clientSecret: string;
  authorizationEndpoint: string;
  tokenEndpoint: string;
  scopes: string[];
  redirectUri: string;
  tokenEndpointAuthMethod?: 'client_secret_basic' | 'client_secret_post';
  userAgent?: string; // Sent on token requests (Reddit rejects generic agents)
}

export interface AuthUrlOptions {
  state: string;
  extraParams?: Record<string, string>;
}

/**
 * Query parameters an OAuth provider redirects back with.
 */
export interface CallbackParams {
  code?: string;
  state?: string;
  error?: string;
}

export interface AuthorizationRequest {
  url: string;
  state: string | null; // Anti-forgery state the caller must keep, if any
}
