// src/core/normalizer/ProviderMappers.ts

import { z } from 'zod';
import type { NormalizedRecord, ProviderName } from './types';

/**
 * Maps one raw provider item to a record, or to null when the item is
 * legitimately skipped. Throws (via zod) when a required field is missing.
 */
export type ProviderMapper = (raw: unknown) => NormalizedRecord | null;

// YouTube Data API v3 `videos` resource, snippet part
const YouTubeVideoSchema = z.object({
  id: z.string(),
  snippet: z.object({
    title: z.string(),
    thumbnails: z.object({
      default: z.object({ url: z.string() }),
    }),
  }),
});

// Reddit listing child `data`; comments carry no title
const RedditSavedSchema = z.object({
  title: z.string().optional(),
  permalink: z.string(),
  subreddit: z.string(),
});

export class ProviderMappers {
  private mappers: Map<ProviderName, ProviderMapper>;

  constructor() {
    this.mappers = new Map<ProviderName, ProviderMapper>([
      ['youtube', this.mapYouTube],
      ['reddit', this.mapReddit],
    ]);
  }

  get(provider: ProviderName): ProviderMapper | undefined {
    return this.mappers.get(provider);
  }

  // Liked video
  private mapYouTube(raw: unknown): NormalizedRecord {
    const video = YouTubeVideoSchema.parse(raw);
    return {
      title: video.snippet.title,
      url: `https://www.youtube.com/watch?v=${video.id}`,
      subtitle: video.snippet.thumbnails.default.url,
    };
  }

  // Saved submission; saved comments are skipped
  private mapReddit(raw: unknown): NormalizedRecord | null {
    const saved = RedditSavedSchema.parse(raw);
    if (saved.title === undefined) {
      return null;
    }
    return {
      title: saved.title,
      url: `https://reddit.com${saved.permalink}`,
      subtitle: saved.subreddit,
    };
  }
}
