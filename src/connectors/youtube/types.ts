// src/connectors/youtube/types.ts

import { z } from 'zod';

export const YOUTUBE_API_BASE = 'https://www.googleapis.com/youtube/v3';
export const YOUTUBE_READONLY_SCOPE = 'https://www.googleapis.com/auth/youtube.readonly';

/**
 * `videos.list` response; items are validated one by one by the normalizer
 */
export const VideoListResponseSchema = z.object({
  items: z.array(z.unknown()).default([]),
});
