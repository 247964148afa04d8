// src/config/loadConfig.ts

import { z } from 'zod';
import { validateConfigSafe, type AppConfig } from './ConfigValidator';
import { ConfigError } from '../utils/errors';
import { YOUTUBE_READONLY_SCOPE } from '../connectors/youtube/types';
import { REDDIT_SCOPES } from '../connectors/reddit/types';

const REDDIT_AUTHORIZATION_ENDPOINT = 'https://www.reddit.com/api/v1/authorize';
const REDDIT_TOKEN_ENDPOINT = 'https://www.reddit.com/api/v1/access_token';

const EnvSchema = z.object({
  PORT: z.coerce.number().int().default(3000),
  BASE_URL: z.string().default('http://localhost:3000'),
  SESSION_SECRET: z.string({ required_error: 'SESSION_SECRET is required' }).min(1),
  SESSION_TTL_SECONDS: z.coerce.number().int().default(86400),
  SYNC_INTERVAL_SECONDS: z.coerce.number().int().default(60),
  SESSION_MAX_ENTRIES: z.coerce.number().int().default(10000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().default(30000),
  YOUTUBE_CLIENT_SECRET_JSON: z.string({
    required_error: 'YOUTUBE_CLIENT_SECRET_JSON is required',
  }),
  YOUTUBE_REDIRECT_URI: z.string().optional(),
  REDDIT_CLIENT_ID: z.string({ required_error: 'REDDIT_CLIENT_ID is required' }),
  REDDIT_CLIENT_SECRET: z.string({ required_error: 'REDDIT_CLIENT_SECRET is required' }),
  REDDIT_USER_AGENT: z.string({ required_error: 'REDDIT_USER_AGENT is required' }),
  REDDIT_REDIRECT_URI: z.string().optional(),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
  LOG_FORMAT: z.enum(['json', 'pretty']).default('json'),
});

// Google Cloud console "OAuth client" download; web apps use `web`, desktop apps `installed`
const ClientSecretSectionSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  auth_uri: z.string().url().default('https://accounts.google.com/o/oauth2/auth'),
  token_uri: z.string().url().default('https://oauth2.googleapis.com/token'),
});

const ClientSecretDocumentSchema = z
  .object({
    web: ClientSecretSectionSchema.optional(),
    installed: ClientSecretSectionSchema.optional(),
  })
  .refine((doc) => doc.web !== undefined || doc.installed !== undefined, {
    message: "Client secret JSON needs a 'web' or 'installed' section",
  });

export type ClientSecretSection = z.infer<typeof ClientSecretSectionSchema>;

/**
 * Parse the YouTube client-secret document held in the environment
 */
export function parseClientSecret(json: string): ClientSecretSection {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new ConfigError('YOUTUBE_CLIENT_SECRET_JSON is not valid JSON', { cause: error });
  }

  const result = ClientSecretDocumentSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError('YOUTUBE_CLIENT_SECRET_JSON is malformed', {
      errors: formatIssues(result.error),
    });
  }

  const section = result.data.web ?? result.data.installed;
  if (!section) {
    throw new ConfigError("Client secret JSON needs a 'web' or 'installed' section");
  }
  return section;
}

/**
 * Build the application configuration from environment variables.
 * Called once at startup; the result is passed explicitly from there on.
 *
 * @throws {ConfigError} With every problem found, not just the first
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsedEnv = EnvSchema.safeParse(env);
  if (!parsedEnv.success) {
    throw new ConfigError('Invalid environment configuration', {
      errors: formatIssues(parsedEnv.error),
    });
  }
  const vars = parsedEnv.data;
  const baseUrl = vars.BASE_URL.replace(/\/+$/, '');
  const youtubeSecret = parseClientSecret(vars.YOUTUBE_CLIENT_SECRET_JSON);

  const result = validateConfigSafe({
    port: vars.PORT,
    baseUrl,
    session: {
      secret: vars.SESSION_SECRET,
      ttlSeconds: vars.SESSION_TTL_SECONDS,
      syncIntervalSeconds: vars.SYNC_INTERVAL_SECONDS,
      maxSessions: vars.SESSION_MAX_ENTRIES,
    },
    http: { timeout: vars.HTTP_TIMEOUT_MS },
    providers: {
      youtube: {
        clientId: youtubeSecret.client_id,
        clientSecret: youtubeSecret.client_secret,
        authorizationEndpoint: youtubeSecret.auth_uri,
        tokenEndpoint: youtubeSecret.token_uri,
        scopes: [YOUTUBE_READONLY_SCOPE],
        redirectUri: vars.YOUTUBE_REDIRECT_URI ?? `${baseUrl}/youtube-callback`,
        tokenEndpointAuthMethod: 'client_secret_post',
      },
      reddit: {
        clientId: vars.REDDIT_CLIENT_ID,
        clientSecret: vars.REDDIT_CLIENT_SECRET,
        authorizationEndpoint: REDDIT_AUTHORIZATION_ENDPOINT,
        tokenEndpoint: REDDIT_TOKEN_ENDPOINT,
        scopes: REDDIT_SCOPES,
        redirectUri: vars.REDDIT_REDIRECT_URI ?? `${baseUrl}/reddit-callback`,
        tokenEndpointAuthMethod: 'client_secret_basic', // Reddit only takes HTTP Basic
        userAgent: vars.REDDIT_USER_AGENT,
      },
    },
    logging: { level: vars.LOG_LEVEL, format: vars.LOG_FORMAT },
  });

  if (!result.success) {
    throw new ConfigError('Invalid configuration', { errors: result.errors });
  }
  return result.data;
}

function formatIssues(error: z.ZodError): string[] {
  return error.errors.map((err) => `${err.path.join('.') || '(root)'}: ${err.message}`);
}
