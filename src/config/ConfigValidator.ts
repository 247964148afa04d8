// src/config/ConfigValidator.ts

import { z } from 'zod';

// OAuth2 provider configuration
const OAuth2ProviderConfigSchema = z.object({
  clientId: z.string().min(1),
  clientSecret: z.string().min(1),
  authorizationEndpoint: z.string().url(),
  tokenEndpoint: z.string().url(),
  scopes: z.array(z.string().min(1)).min(1),
  redirectUri: z.string().url(),
  tokenEndpointAuthMethod: z.enum(['client_secret_basic', 'client_secret_post']).optional(),
  userAgent: z.string().min(1).optional(),
});

const LoggerConfigSchema = z.object({
  level: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  format: z.enum(['json', 'pretty']).optional(),
});

export const AppConfigSchema = z.object({
  port: z.number().int().min(1).max(65535),
  baseUrl: z.string().url(),
  session: z.object({
    secret: z.string().min(1, 'Session secret is required'),
    ttlSeconds: z.number().int().positive(),
    syncIntervalSeconds: z.number().int().nonnegative(),
    maxSessions: z.number().int().positive(),
  }),
  http: z.object({
    timeout: z.number().int().positive(),
  }),
  providers: z.object({
    youtube: OAuth2ProviderConfigSchema,
    reddit: OAuth2ProviderConfigSchema.refine((cfg) => cfg.userAgent !== undefined, {
      message: 'Reddit requires a userAgent',
      path: ['userAgent'],
    }),
  }),
  logging: LoggerConfigSchema,
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Validate application configuration
 *
 * @returns Validated configuration
 * @throws {z.ZodError} If configuration is invalid with detailed error messages
 */
export function validateConfig(config: unknown): AppConfig {
  return AppConfigSchema.parse(config);
}

/**
 * Validate configuration and return user-friendly errors
 */
export function validateConfigSafe(
  config: unknown
): { success: true; data: AppConfig } | { success: false; errors: string[] } {
  const result = AppConfigSchema.safeParse(config);

  if (result.success) {
    return { success: true, data: result.data };
  }

  return {
    success: false,
    errors: result.error.errors.map((err) => `${err.path.join('.')}: ${err.message}`),
  };
}
