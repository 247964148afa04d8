// tests/unit/loadConfig.test.ts

import { describe, it, expect } from 'vitest';
import { loadConfig, parseClientSecret } from '../../src/config/loadConfig';
import { ConfigError } from '../../src/utils/errors';

const CLIENT_SECRET_JSON = JSON.stringify({
  web: {
    client_id: 'test-youtube-client',
    client_secret: 'test-youtube-secret',
    auth_uri: 'https://accounts.google.com/o/oauth2/auth',
    token_uri: 'https://oauth2.googleapis.com/token',
  },
});

function baseEnv(): NodeJS.ProcessEnv {
  return {
    SESSION_SECRET: 'test-secret',
    YOUTUBE_CLIENT_SECRET_JSON: CLIENT_SECRET_JSON,
    REDDIT_CLIENT_ID: 'test-reddit-client',
    REDDIT_CLIENT_SECRET: 'test-reddit-secret',
    REDDIT_USER_AGENT: 'test:saved-hub:1.0 (by /u/tester)',
  };
}

function configErrorOf(fn: () => unknown): ConfigError {
  try {
    fn();
  } catch (error) {
    if (error instanceof ConfigError) return error;
    throw error;
  }
  throw new Error('expected a ConfigError');
}

describe('parseClientSecret', () => {
  it('should read the web section', () => {
    expect(parseClientSecret(CLIENT_SECRET_JSON)).toEqual({
      client_id: 'test-youtube-client',
      client_secret: 'test-youtube-secret',
      auth_uri: 'https://accounts.google.com/o/oauth2/auth',
      token_uri: 'https://oauth2.googleapis.com/token',
    });
  });

  it('should read an installed section and default the endpoints', () => {
    const json = JSON.stringify({
      installed: { client_id: 'desktop-client', client_secret: 'test-secret' },
    });

    expect(parseClientSecret(json)).toEqual({
      client_id: 'desktop-client',
      client_secret: 'test-secret',
      auth_uri: 'https://accounts.google.com/o/oauth2/auth',
      token_uri: 'https://oauth2.googleapis.com/token',
    });
  });

  it('should reject text that is not JSON', () => {
    expect(() => parseClientSecret('{not json')).toThrow(
      'YOUTUBE_CLIENT_SECRET_JSON is not valid JSON'
    );
  });

  it('should reject a document without a client section', () => {
    expect(() => parseClientSecret('{"other": {}}')).toThrow(
      'YOUTUBE_CLIENT_SECRET_JSON is malformed'
    );
  });
});

describe('loadConfig', () => {
  it('should apply defaults', () => {
    const config = loadConfig(baseEnv());

    expect(config.port).toBe(3000);
    expect(config.baseUrl).toBe('http://localhost:3000');
    expect(config.session).toEqual({
      secret: 'test-secret',
      ttlSeconds: 86400,
      syncIntervalSeconds: 60,
      maxSessions: 10000,
    });
    expect(config.http.timeout).toBe(30000);
    expect(config.logging).toEqual({ level: 'info', format: 'json' });
  });

  it('should derive redirect URIs from BASE_URL', () => {
    const config = loadConfig({ ...baseEnv(), BASE_URL: 'https://hub.example.com/' });

    expect(config.baseUrl).toBe('https://hub.example.com');
    expect(config.providers.youtube.redirectUri).toBe('https://hub.example.com/youtube-callback');
    expect(config.providers.reddit.redirectUri).toBe('https://hub.example.com/reddit-callback');
  });

  it('should prefer explicit redirect URIs', () => {
    const config = loadConfig({
      ...baseEnv(),
      YOUTUBE_REDIRECT_URI: 'http://127.0.0.1:5000/youtube-callback',
    });

    expect(config.providers.youtube.redirectUri).toBe('http://127.0.0.1:5000/youtube-callback');
  });

  it('should configure each provider', () => {
    const { youtube, reddit } = loadConfig(baseEnv()).providers;

    expect(youtube.clientId).toBe('test-youtube-client');
    expect(youtube.scopes).toEqual(['https://www.googleapis.com/auth/youtube.readonly']);
    expect(youtube.tokenEndpointAuthMethod).toBe('client_secret_post');
    expect(reddit.tokenEndpoint).toBe('https://www.reddit.com/api/v1/access_token');
    expect(reddit.scopes).toEqual(['identity', 'read', 'save']);
    expect(reddit.tokenEndpointAuthMethod).toBe('client_secret_basic');
    expect(reddit.userAgent).toBe('test:saved-hub:1.0 (by /u/tester)');
  });

  it('should coerce numeric variables', () => {
    const config = loadConfig({ ...baseEnv(), PORT: '8080', SYNC_INTERVAL_SECONDS: '300' });

    expect(config.port).toBe(8080);
    expect(config.session.syncIntervalSeconds).toBe(300);
  });

  it('should report every missing variable', () => {
    const error = configErrorOf(() => loadConfig({}));

    expect(error.message).toBe('Invalid environment configuration');
    expect(error.details?.errors).toEqual(
      expect.arrayContaining([
        'SESSION_SECRET: SESSION_SECRET is required',
        'YOUTUBE_CLIENT_SECRET_JSON: YOUTUBE_CLIENT_SECRET_JSON is required',
        'REDDIT_CLIENT_ID: REDDIT_CLIENT_ID is required',
        'REDDIT_CLIENT_SECRET: REDDIT_CLIENT_SECRET is required',
        'REDDIT_USER_AGENT: REDDIT_USER_AGENT is required',
      ])
    );
  });

  it('should reject an invalid BASE_URL', () => {
    const error = configErrorOf(() => loadConfig({ ...baseEnv(), BASE_URL: 'localhost' }));

    expect(error.message).toBe('Invalid configuration');
  });
});
