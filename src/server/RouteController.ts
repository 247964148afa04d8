// src/server/RouteController.ts

import type { SessionState } from '../core/session/types';
import type { CallbackParams } from '../core/auth/types';
import type { ProviderName } from '../core/normalizer/types';
import type { SyncConnectors, SyncGate } from '../core/sync/SyncGate';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';
import { redirect, render, text, type RouteResult } from './types';
import {
  AuthExchangeFailedError,
  AuthStateMismatchError,
  MissingParameterError,
  OAuthDeniedError,
} from '../utils/errors';

const PROVIDER_LABELS: Record<ProviderName, string> = {
  youtube: 'YouTube',
  reddit: 'Reddit',
};

export function isAuthenticated(state: SessionState): boolean {
  return state.youtubeCredentials !== null || state.redditCredentials !== null;
}

export function formatSyncTime(epochSeconds: number): string {
  return new Date(epochSeconds * 1000).toUTCString();
}

/**
 * Request handlers. Each takes the session state (and query) and returns
 * the next state plus a response; none touches the transport.
 */
export class RouteController {
  constructor(
    private connectors: SyncConnectors,
    private syncGate: SyncGate,
    private logger: Logger,
    private metrics: MetricsCollector
  ) {}

  /**
   * GET /
   */
  async index(state: SessionState): Promise<RouteResult> {
    const synced = await this.syncGate.sync(state);

    if (!isAuthenticated(synced)) {
      return { state: synced, response: redirect('/login') };
    }

    return {
      state: synced,
      response: render('content', {
        youtubeVideos: synced.youtubeItems,
        redditPosts: synced.redditItems,
        youtubeConnected: synced.youtubeCredentials !== null,
        redditConnected: synced.redditCredentials !== null,
        lastSyncTime: formatSyncTime(synced.lastSyncTime),
      }),
    };
  }

  /**
   * GET /login
   */
  async login(state: SessionState): Promise<RouteResult> {
    return {
      state,
      response: render('login', {
        youtubeConnected: state.youtubeCredentials !== null,
        redditConnected: state.redditCredentials !== null,
      }),
    };
  }

  /**
   * GET /youtube-login
   */
  async youtubeLogin(state: SessionState): Promise<RouteResult> {
    const request = this.connectors.youtube.buildAuthorizationUrl();
    return {
      state: { ...state, pendingAuthState: request.state },
      response: redirect(request.url),
    };
  }

  /**
   * GET /reddit-login
   */
  async redditLogin(state: SessionState): Promise<RouteResult> {
    const request = this.connectors.reddit.buildAuthorizationUrl();
    return { state, response: redirect(request.url) };
  }

  /**
   * GET /youtube-callback?code&state
   */
  async youtubeCallback(state: SessionState, params: CallbackParams): Promise<RouteResult> {
    try {
      const credential = await this.connectors.youtube.exchangeCode(
        params,
        state.pendingAuthState
      );
      this.metrics.incrementCounter('oauth_callbacks_total', {
        provider: 'youtube',
        status: 'success',
      });

      const synced = await this.syncGate.sync({
        ...state,
        pendingAuthState: null,
        youtubeCredentials: credential,
      });
      return { state: synced, response: redirect('/') };
    } catch (error) {
      return this.callbackFailure('youtube', state, error);
    }
  }

  /**
   * GET /reddit-callback?code
   */
  async redditCallback(state: SessionState, params: CallbackParams): Promise<RouteResult> {
    try {
      const credential = await this.connectors.reddit.exchangeCode(params);
      this.metrics.incrementCounter('oauth_callbacks_total', {
        provider: 'reddit',
        status: 'success',
      });

      const synced = await this.syncGate.sync({ ...state, redditCredentials: credential });
      return { state: synced, response: redirect('/') };
    } catch (error) {
      return this.callbackFailure('reddit', state, error);
    }
  }

  /**
   * GET /logout-youtube
   */
  async logoutYoutube(state: SessionState): Promise<RouteResult> {
    this.logger.info('Disconnected', { provider: 'youtube' });
    return {
      state: { ...state, youtubeCredentials: null, youtubeItems: [] },
      response: redirect('/'),
    };
  }

  /**
   * GET /logout-reddit
   */
  async logoutReddit(state: SessionState): Promise<RouteResult> {
    this.logger.info('Disconnected', { provider: 'reddit' });
    return {
      state: { ...state, redditCredentials: null, redditItems: [] },
      response: redirect('/'),
    };
  }

  /**
   * GET /sync
   */
  async sync(state: SessionState): Promise<RouteResult> {
    const synced = await this.syncGate.forceSync(state);
    return { state: synced, response: redirect('/') };
  }

  // OAuth failures become plain-text 400s; the session is left as it was
  private callbackFailure(provider: ProviderName, state: SessionState, error: unknown): RouteResult {
    this.metrics.incrementCounter('oauth_callbacks_total', { provider, status: 'failed' });

    if (error instanceof MissingParameterError || error instanceof AuthStateMismatchError) {
      this.logger.warn('OAuth callback rejected', { provider, errorCode: error.code, error });
      return { state, response: text(400, `Error: ${error.message}`) };
    }

    if (error instanceof AuthExchangeFailedError || error instanceof OAuthDeniedError) {
      this.logger.warn('OAuth login failed', { provider, error });
      return {
        state,
        response: text(400, `${PROVIDER_LABELS[provider]} login failed: ${error.message}`),
      };
    }

    throw error;
  }
}
