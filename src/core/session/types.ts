// src/core/session/types.ts

import type { Credential } from '../token/types';
import type { NormalizedRecord } from '../normalizer/types';

/**
 * Everything kept for one browser session. Plain JSON: client handles are
 * rebuilt from the credentials on each request and never stored.
 */
export interface SessionState {
  youtubeCredentials: Credential | null;
  redditCredentials: Credential | null;
  youtubeItems: NormalizedRecord[];
  redditItems: NormalizedRecord[];
  lastSyncTime: number; // Epoch seconds
  syncIntervalSeconds: number;
  pendingAuthState: string | null; // Issued by /youtube-login, consumed by /youtube-callback
}

export interface SessionStoreConfig {
  ttlSeconds?: number;
  syncIntervalSeconds?: number;
  maxSessions?: number;
}
