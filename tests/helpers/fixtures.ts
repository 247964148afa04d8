// tests/helpers/fixtures.ts

import { vi } from 'vitest';
import type { AppConfig } from '../../src/config/ConfigValidator';
import type { Connector, CoreDeps } from '../../src/connectors/types';
import type { ProviderName, NormalizedRecord } from '../../src/core/normalizer/types';
import type { Credential } from '../../src/core/token/types';
import { YOUTUBE_READONLY_SCOPE } from '../../src/connectors/youtube/types';
import { REDDIT_SCOPES } from '../../src/connectors/reddit/types';
import { AuthCore } from '../../src/core/auth/AuthCore';
import { HttpCore } from '../../src/core/http/HttpCore';
import { Normalizer } from '../../src/core/normalizer/Normalizer';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';

export const REDDIT_USER_AGENT = 'test:saved-hub:1.0 (by /u/tester)';

export function testConfig(): AppConfig {
  return {
    port: 3000,
    baseUrl: 'http://localhost:3000',
    session: {
      secret: 'test-secret',
      ttlSeconds: 3600,
      syncIntervalSeconds: 60,
      maxSessions: 10000,
    },
    http: { timeout: 5000 },
    providers: {
      youtube: {
        clientId: 'test-youtube-client',
        clientSecret: 'test-youtube-secret',
        authorizationEndpoint: 'https://accounts.google.com/o/oauth2/auth',
        tokenEndpoint: 'https://oauth2.googleapis.com/token',
        scopes: [YOUTUBE_READONLY_SCOPE],
        redirectUri: 'http://localhost:3000/youtube-callback',
        tokenEndpointAuthMethod: 'client_secret_post',
      },
      reddit: {
        clientId: 'test-reddit-client',
        clientSecret: 'test-reddit-secret',
        authorizationEndpoint: 'https://www.reddit.com/api/v1/authorize',
        tokenEndpoint: 'https://www.reddit.com/api/v1/access_token',
        scopes: REDDIT_SCOPES,
        redirectUri: 'http://localhost:3000/reddit-callback',
        tokenEndpointAuthMethod: 'client_secret_basic',
        userAgent: REDDIT_USER_AGENT,
      },
    },
    logging: { level: 'error' },
  };
}

export function createDeps(config: AppConfig = testConfig()): CoreDeps {
  const logger = new Logger({ level: 'error' });
  const metrics = new MetricsCollector();
  return {
    logger,
    metrics,
    normalizer: new Normalizer(),
    auth: new AuthCore(config.providers, logger),
    http: new HttpCore({ timeout: config.http.timeout }, metrics, logger),
  };
}

export function record(title: string, suffix = title): NormalizedRecord {
  return { title, url: `https://example.com/${suffix}`, subtitle: `sub-${suffix}` };
}

export function youtubeVideo(id: string, title = `Video ${id}`): Record<string, unknown> {
  return {
    kind: 'youtube#video',
    id,
    snippet: {
      title,
      thumbnails: { default: { url: `https://i.ytimg.com/vi/${id}/default.jpg` } },
    },
  };
}

export function redditPost(id: string, subreddit = 'typescript'): Record<string, unknown> {
  return {
    kind: 't3',
    data: {
      id,
      title: `Post ${id}`,
      permalink: `/r/${subreddit}/comments/${id}/post_${id}/`,
      subreddit,
    },
  };
}

export function redditComment(id: string, subreddit = 'typescript'): Record<string, unknown> {
  return {
    kind: 't1',
    data: {
      id,
      body: 'A saved comment',
      permalink: `/r/${subreddit}/comments/abc/post/${id}/`,
      subreddit,
    },
  };
}

/**
 * Connector stand-in whose sync hands back the given items with the
 * credential untouched
 */
export function fakeConnector(name: ProviderName, items: NormalizedRecord[] = []) {
  const connector = {
    name,
    buildAuthorizationUrl: vi.fn(() => ({
      url: `https://auth.example.com/${name}`,
      state: name === 'youtube' ? 'generated-state' : null,
    })),
    exchangeCode: vi.fn(async (): Promise<Credential> => ({ accessToken: `${name}-token` })),
    refreshIfNeeded: vi.fn(async (credential: Credential) => credential),
    syncSaved: vi.fn(async (credential: Credential) => ({ credential, items })),
  };
  return connector satisfies Connector;
}
