import type { HttpCore } from '../../core/http/HttpCore';
import { REDDIT_API_BASE, RedditIdentitySchema, RedditListingSchema } from './types';

/**
 * The slice of the Reddit API the saved-content fetch needs
 */
export interface RedditClient {
  getUsername(): Promise<string>;
  listSaved(username: string, limit: number): Promise<unknown[]>;
}

export class RedditApiClient implements RedditClient {
  constructor(
    private http: HttpCore,
    private accessToken: string,
    private userAgent: string
  ) {}

  // Reddit has no /user/me/*; user listings need the real username
  async getUsername(): Promise<string> {
    const response = await this.http.get(`${REDDIT_API_BASE}/api/v1/me`, {
      headers: this.headers(),
    });
    return RedditIdentitySchema.parse(response.data).name;
  }

  async listSaved(username: string, limit: number): Promise<unknown[]> {
    const response = await this.http.get(
      `${REDDIT_API_BASE}/user/${encodeURIComponent(username)}/saved`,
      {
        headers: this.headers(),
        query: { limit, raw_json: 1 }, // raw_json avoids HTML entity encoding
      }
    );

    const listing = RedditListingSchema.parse(response.data);
    return listing.data.children.map((child) => child.data);
  }

  private headers(): Record<string, string> {
    return {
      Authorization: `Bearer ${this.accessToken}`,
      'User-Agent': this.userAgent,
    };
  }
}
