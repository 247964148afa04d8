import { BaseConnector } from '../BaseConnector';
import { SAVED_ITEMS_LIMIT } from '../types';
import type { Credential } from '../../core/token/types';
import type { AuthorizationRequest, CallbackParams } from '../../core/auth/types';
import { RedditApiClient, type RedditClient } from './RedditClient';
import { REDDIT_AUTH_STATE } from './types';
import { MissingParameterError, OAuthConfigError } from '../../utils/errors';

/**
 * Reddit OAuth connector
 *
 * Fetches the user's saved submissions; saved comments are skipped.
 * Tokens are requested with `duration=temporary`, so there is no refresh
 * token and the user reconnects once the hour-long access token lapses.
 */
export class RedditConnector extends BaseConnector<RedditClient> {
  readonly name = 'reddit' as const;

  buildAuthorizationUrl(): AuthorizationRequest {
    const url = this.deps.auth.createAuthUrl(this.name, {
      state: REDDIT_AUTH_STATE,
      extraParams: { duration: 'temporary' },
    });

    this.deps.logger.info('Connect initiated', { provider: this.name });
    return { url, state: null };
  }

  async exchangeCode(params: CallbackParams): Promise<Credential> {
    this.assertNotDenied(params);

    if (!params.code) {
      throw new MissingParameterError('Missing code parameter', { provider: this.name });
    }

    return this.deps.auth.exchangeCode(this.name, params.code);
  }

  buildClient(credential: Credential): RedditClient {
    return new RedditApiClient(this.deps.http, credential.accessToken, this.getUserAgent());
  }

  protected async fetchRaw(client: RedditClient): Promise<unknown[]> {
    const username = await client.getUsername();
    this.deps.logger.debug('Reddit username retrieved', { redditUsername: username });
    return client.listSaved(username, SAVED_ITEMS_LIMIT);
  }

  // Reddit requires a descriptive User-Agent: platform:app_id:version (by /u/username)
  private getUserAgent(): string {
    const { userAgent } = this.deps.auth.getProviderConfig(this.name);
    if (!userAgent) {
      throw new OAuthConfigError('No userAgent configured for reddit');
    }
    return userAgent;
  }
}
