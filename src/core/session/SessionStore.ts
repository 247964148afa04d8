// src/core/session/SessionStore.ts

import Keyv from 'keyv';
import type { SessionState, SessionStoreConfig } from './types';
import type { Logger } from '../../observability/Logger';

export const DEFAULT_SYNC_INTERVAL_SECONDS = 60;
export const DEFAULT_MAX_SESSIONS = 10000;

export function createDefaultState(
  syncIntervalSeconds: number = DEFAULT_SYNC_INTERVAL_SECONDS
): SessionState {
  return {
    youtubeCredentials: null,
    redditCredentials: null,
    youtubeItems: [],
    redditItems: [],
    lastSyncTime: 0,
    syncIntervalSeconds,
    pendingAuthState: null,
  };
}

/**
 * Opaque persistence for SessionState, keyed by session id.
 *
 * Entries expire with the session TTL. Keyv only drops an expired entry
 * when that key is read again, so saves also sweep expired sessions and
 * evict the oldest ones beyond `maxSessions`.
 */
export class SessionStore {
  private store: Keyv<SessionState>;
  private logger: Logger;
  private ttlMs: number;
  private syncIntervalSeconds: number;
  private maxSessions: number;
  // Session id -> expiry (epoch ms), oldest first
  private expiries: Map<string, number> = new Map();

  constructor(config: SessionStoreConfig, logger: Logger) {
    this.logger = logger;
    this.ttlMs = (config.ttlSeconds ?? 24 * 60 * 60) * 1000;
    this.syncIntervalSeconds = config.syncIntervalSeconds ?? DEFAULT_SYNC_INTERVAL_SECONDS;
    this.maxSessions = config.maxSessions ?? DEFAULT_MAX_SESSIONS;
    this.store = new Keyv<SessionState>({ namespace: 'session' });
  }

  /**
   * Load state for a session, applying defaults on first touch
   */
  async load(sessionId: string): Promise<SessionState> {
    const stored = await this.store.get(this.createKey(sessionId));
    const defaults = createDefaultState(this.syncIntervalSeconds);

    if (!stored) {
      this.logger.debug('Session initialized', { sessionId });
      return defaults;
    }

    return { ...defaults, ...stored };
  }

  async save(sessionId: string, state: SessionState): Promise<void> {
    const now = Date.now();
    await this.sweepExpired(now);

    await this.store.set(this.createKey(sessionId), state, this.ttlMs);
    this.expiries.delete(sessionId); // Re-insert at the newest end
    this.expiries.set(sessionId, now + this.ttlMs);

    await this.evictOverflow();
  }

  /**
   * Sessions currently held
   */
  get size(): number {
    return this.expiries.size;
  }

  private async sweepExpired(now: number): Promise<void> {
    let swept = 0;
    for (const [sessionId, expiresAt] of this.expiries) {
      if (expiresAt > now) break; // Constant TTL keeps the map in expiry order
      await this.forget(sessionId);
      swept++;
    }

    if (swept > 0) {
      this.logger.debug('Expired sessions swept', { swept, remaining: this.expiries.size });
    }
  }

  private async evictOverflow(): Promise<void> {
    for (const sessionId of this.expiries.keys()) {
      if (this.expiries.size <= this.maxSessions) break;
      this.logger.warn('Session limit reached, evicting oldest session', {
        maxSessions: this.maxSessions,
      });
      await this.forget(sessionId);
    }
  }

  private async forget(sessionId: string): Promise<void> {
    this.expiries.delete(sessionId);
    await this.store.delete(this.createKey(sessionId));
  }

  private createKey(sessionId: string): string {
    return `state:${sessionId}`;
  }
}
