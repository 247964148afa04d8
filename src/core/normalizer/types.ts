// src/core/normalizer/types.ts

export interface NormalizedRecord {
  title: string;
  url: string;
  subtitle: string; // Thumbnail URL (youtube) or subreddit name (reddit)
}

export type ProviderName = 'youtube' | 'reddit';

export const PROVIDERS: readonly ProviderName[] = ['youtube', 'reddit'];
