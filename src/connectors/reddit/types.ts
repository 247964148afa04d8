import { z } from 'zod';

export const REDDIT_API_BASE = 'https://oauth.reddit.com';

// Fixed state literal sent with the consent URL; Reddit callbacks are not state-checked
export const REDDIT_AUTH_STATE = 'uniqueKey';

export const REDDIT_SCOPES = ['identity', 'read', 'save'];

/**
 * `/api/v1/me` response (only the username is used)
 */
export const RedditIdentitySchema = z.object({
  name: z.string(),
});

/**
 * Listing envelope. Children mix submissions (t3) and comments (t1);
 * their `data` is mapped by the normalizer.
 */
export const RedditListingSchema = z.object({
  kind: z.literal('Listing'),
  data: z.object({
    after: z.string().nullable().optional(),
    children: z.array(
      z.object({
        kind: z.string(),
        data: z.unknown(),
      })
    ),
  }),
});
