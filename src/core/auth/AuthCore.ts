// src/core/auth/AuthCore.ts

import { Issuer, BaseClient, ClientMetadata, TokenSet, custom, generators } from 'openid-client';
import type { OAuth2ProviderConfig, AuthUrlOptions } from './types';
import { PROVIDERS, type ProviderName } from '../normalizer/types';
import type { Credential } from '../token/types';
import type { Logger } from '../../observability/Logger';
import {
  AuthExchangeFailedError,
  OAuthConfigError,
  TokenRefreshError,
  errorMessage,
} from '../../utils/errors';
import { withOAuthSpan } from '../../observability/tracing';

export class AuthCore {
  private oauth2Clients: Map<ProviderName, BaseClient> = new Map();
  private logger: Logger;

  constructor(
    private config: Partial<Record<ProviderName, OAuth2ProviderConfig>>,
    logger: Logger
  ) {
    this.logger = logger;

    for (const provider of PROVIDERS) {
      const cfg = this.config[provider];
      if (cfg) {
        this.oauth2Clients.set(provider, this.createOAuth2Client(provider, cfg));
      }
    }
    this.logger.debug('AuthCore initialized', { providers: Array.from(this.oauth2Clients.keys()) });
  }

  /**
   * Fresh anti-forgery state value
   */
  generateState(): string {
    return generators.state();
  }

  /**
   * Build the provider consent-screen URL
   */
  createAuthUrl(provider: ProviderName, opts: AuthUrlOptions): string {
    const client = this.getClient(provider);

    const authUrl = client.authorizationUrl({
      scope: this.getProviderConfig(provider).scopes.join(' '),
      state: opts.state,
      ...opts.extraParams,
    });

    this.logger.debug('Created auth URL', { provider });
    return authUrl;
  }

  /**
   * Exchange an authorization code for a credential.
   *
   * When `expectedState` is given the library re-checks it against the
   * callback; otherwise no state check happens here.
   */
  async exchangeCode(
    provider: ProviderName,
    code: string,
    expectedState?: string
  ): Promise<Credential> {
    return withOAuthSpan('exchangeCode', provider, async () => {
      const client = this.getClient(provider);
      const { redirectUri } = this.getProviderConfig(provider);

      try {
        const tokenSet = expectedState
          ? await client.oauthCallback(
              redirectUri,
              { code, state: expectedState },
              { state: expectedState }
            )
          : await client.oauthCallback(redirectUri, { code });

        const credential = this.toCredential(tokenSet);

        this.logger.debug('Token exchange successful', {
          provider,
          hasRefreshToken: credential.refreshToken !== undefined,
          tokenType: credential.tokenType,
          expiresAt: credential.expiresAt,
        });

        return credential;
      } catch (error) {
        this.logger.error('Token exchange failed', { provider, error });
        throw new AuthExchangeFailedError(errorMessage(error), { provider, cause: error });
      }
    });
  }

  /**
   * Refresh access token, keeping the old refresh token if none is returned
   */
  async refreshToken(provider: ProviderName, refreshToken: string): Promise<Credential> {
    return withOAuthSpan('refreshToken', provider, async () => {
      const client = this.getClient(provider);

      try {
        const tokenSet = await client.refresh(refreshToken);
        const credential = this.toCredential(tokenSet);
        return { ...credential, refreshToken: credential.refreshToken ?? refreshToken };
      } catch (error) {
        this.logger.error('Token refresh failed', { provider, error });
        throw new TokenRefreshError('Failed to refresh token', { provider, cause: error });
      }
    });
  }

  getProviderConfig(provider: ProviderName): OAuth2ProviderConfig {
    const config = this.config[provider];
    if (!config) {
      throw new OAuthConfigError(`Provider ${provider} not configured`);
    }
    return config;
  }

  private getClient(provider: ProviderName): BaseClient {
    const client = this.oauth2Clients.get(provider);
    if (!client) throw new OAuthConfigError(`Provider ${provider} not configured`);
    return client;
  }

  private createOAuth2Client(provider: string, cfg: OAuth2ProviderConfig): BaseClient {
    const authMethod = cfg.tokenEndpointAuthMethod ?? 'client_secret_post';

    const issuer = new Issuer({
      issuer: provider,
      authorization_endpoint: cfg.authorizationEndpoint,
      token_endpoint: cfg.tokenEndpoint,
      token_endpoint_auth_methods_supported: [authMethod],
    });

    const metadata: ClientMetadata = {
      client_id: cfg.clientId,
      client_secret: cfg.clientSecret,
      redirect_uris: [cfg.redirectUri],
      response_types: ['code'],
      token_endpoint_auth_method: authMethod,
    };

    const client = new issuer.Client(metadata);

    const userAgent = cfg.userAgent;
    if (userAgent) {
      client[custom.http_options] = (_url, options) => ({
        ...options,
        headers: { ...options.headers, 'User-Agent': userAgent },
      });
    }

    return client;
  }

  private toCredential(tokenSet: TokenSet): Credential {
    if (!tokenSet.access_token) {
      throw new Error('Token response did not include an access_token');
    }

    return {
      accessToken: tokenSet.access_token,
      refreshToken: tokenSet.refresh_token,
      expiresAt: tokenSet.expires_at !== undefined ? tokenSet.expires_at * 1000 : undefined,
      scope: tokenSet.scope,
      tokenType: tokenSet.token_type,
    };
  }
}
