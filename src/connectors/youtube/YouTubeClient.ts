// src/connectors/youtube/YouTubeClient.ts

import type { HttpCore } from '../../core/http/HttpCore';
import { YOUTUBE_API_BASE, VideoListResponseSchema } from './types';

/**
 * The slice of the YouTube Data API the saved-content fetch needs
 */
export interface YouTubeClient {
  listLikedVideos(maxResults: number): Promise<unknown[]>;
}

export class YouTubeApiClient implements YouTubeClient {
  constructor(
    private http: HttpCore,
    private accessToken: string
  ) {}

  async listLikedVideos(maxResults: number): Promise<unknown[]> {
    const response = await this.http.get(`${YOUTUBE_API_BASE}/videos`, {
      headers: { Authorization: `Bearer ${this.accessToken}` },
      query: { part: 'snippet', myRating: 'like', maxResults },
    });

    return VideoListResponseSchema.parse(response.data).items;
  }
}
