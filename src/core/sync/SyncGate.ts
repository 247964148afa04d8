// src/core/sync/SyncGate.ts

import type { Connector } from '../../connectors/types';
import type { SessionState } from '../session/types';
import type { Logger } from '../../observability/Logger';
import type { MetricsCollector } from '../../observability/MetricsCollector';
import { withSyncSpan } from '../../observability/tracing';

export type Clock = () => number; // Epoch seconds

export const systemClock: Clock = () => Date.now() / 1000;

export interface SyncConnectors {
  youtube: Connector;
  reddit: Connector;
}

/**
 * Time-based throttle over the content fetchers.
 *
 * Stale when `now - lastSyncTime >= syncIntervalSeconds`. A stale sync
 * fetches every provider that has a credential, independently, and stamps
 * `lastSyncTime`; a fresh one returns the state untouched.
 */
export class SyncGate {
  constructor(
    private connectors: SyncConnectors,
    private logger: Logger,
    private metrics: MetricsCollector,
    private clock: Clock = systemClock
  ) {}

  isStale(state: SessionState, now: number = this.clock()): boolean {
    return now - state.lastSyncTime >= state.syncIntervalSeconds;
  }

  async sync(state: SessionState): Promise<SessionState> {
    return this.run(state, false);
  }

  /**
   * Sync regardless of elapsed time
   */
  async forceSync(state: SessionState): Promise<SessionState> {
    return this.run({ ...state, lastSyncTime: 0 }, true);
  }

  private async run(state: SessionState, forced: boolean): Promise<SessionState> {
    const now = this.clock();
    if (!this.isStale(state, now)) {
      this.logger.debug('Sync skipped, content fresh', {
        elapsedSeconds: now - state.lastSyncTime,
        syncIntervalSeconds: state.syncIntervalSeconds,
      });
      return state;
    }

    const providers = [
      state.youtubeCredentials ? 'youtube' : null,
      state.redditCredentials ? 'reddit' : null,
    ].filter((p): p is string => p !== null);

    return withSyncSpan(providers, async () => {
      let next: SessionState = { ...state };

      if (state.youtubeCredentials) {
        const outcome = await this.connectors.youtube.syncSaved(state.youtubeCredentials);
        next = { ...next, youtubeCredentials: outcome.credential, youtubeItems: outcome.items };
      }

      if (state.redditCredentials) {
        const outcome = await this.connectors.reddit.syncSaved(state.redditCredentials);
        next = { ...next, redditCredentials: outcome.credential, redditItems: outcome.items };
      }

      this.metrics.incrementCounter('sync_runs_total', { forced: String(forced) });
      this.logger.info('Content synced', { providers, forced });

      return { ...next, lastSyncTime: now };
    });
  }
}
