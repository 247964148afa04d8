// src/connectors/youtube/YouTubeConnector.ts

import { BaseConnector } from '../BaseConnector';
import { SAVED_ITEMS_LIMIT } from '../types';
import type { Credential } from '../../core/token/types';
import type { AuthorizationRequest, CallbackParams } from '../../core/auth/types';
import { YouTubeApiClient, type YouTubeClient } from './YouTubeClient';
import { AuthStateMismatchError, MissingParameterError } from '../../utils/errors';

/**
 * YouTube connector: liked videos, behind a state-checked OAuth flow.
 */
export class YouTubeConnector extends BaseConnector<YouTubeClient> {
  readonly name = 'youtube' as const;

  /**
   * Consent URL plus the anti-forgery state the caller must store
   */
  buildAuthorizationUrl(): AuthorizationRequest {
    const state = this.deps.auth.generateState();
    const url = this.deps.auth.createAuthUrl(this.name, {
      state,
      extraParams: {
        access_type: 'offline', // Required for refresh tokens
        include_granted_scopes: 'true',
      },
    });

    this.deps.logger.info('Connect initiated', { provider: this.name });
    return { url, state };
  }

  async exchangeCode(params: CallbackParams, expectedState?: string | null): Promise<Credential> {
    this.assertNotDenied(params);

    if (!params.code || !params.state) {
      throw new MissingParameterError('Missing code or state parameter', { provider: this.name });
    }
    if (!expectedState || expectedState !== params.state) {
      throw new AuthStateMismatchError('OAuth state mismatch', { provider: this.name });
    }

    return this.deps.auth.exchangeCode(this.name, params.code, params.state);
  }

  buildClient(credential: Credential): YouTubeClient {
    return new YouTubeApiClient(this.deps.http, credential.accessToken);
  }

  protected async fetchRaw(client: YouTubeClient): Promise<unknown[]> {
    return client.listLikedVideos(SAVED_ITEMS_LIMIT);
  }
}
