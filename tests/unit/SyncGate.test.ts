// tests/unit/SyncGate.test.ts

import { describe, it, expect, beforeEach } from 'vitest';
import { SyncGate } from '../../src/core/sync/SyncGate';
import { createDefaultState } from '../../src/core/session/SessionStore';
import type { SessionState } from '../../src/core/session/types';
import { Logger } from '../../src/observability/Logger';
import { MetricsCollector } from '../../src/observability/MetricsCollector';
import { fakeConnector, record } from '../helpers/fixtures';

describe('SyncGate', () => {
  const NOW = 1_700_000_000;
  let now: number;
  let youtube: ReturnType<typeof fakeConnector>;
  let reddit: ReturnType<typeof fakeConnector>;
  let gate: SyncGate;

  function signedIn(overrides: Partial<SessionState> = {}): SessionState {
    return {
      ...createDefaultState(60),
      youtubeCredentials: { accessToken: 'yt-token' },
      redditCredentials: { accessToken: 'rd-token' },
      ...overrides,
    };
  }

  beforeEach(() => {
    now = NOW;
    youtube = fakeConnector('youtube', [record('video')]);
    reddit = fakeConnector('reddit', [record('post')]);
    gate = new SyncGate(
      { youtube, reddit },
      new Logger({ level: 'error' }),
      new MetricsCollector(),
      () => now
    );
  });

  describe('isStale', () => {
    it('should be stale once the interval has fully elapsed', () => {
      const state = signedIn({ lastSyncTime: NOW - 60 });

      expect(gate.isStale(state)).toBe(true);
    });

    it('should be fresh just inside the interval', () => {
      const state = signedIn({ lastSyncTime: NOW - 59 });

      expect(gate.isStale(state)).toBe(false);
    });
  });

  describe('sync', () => {
    it('should leave fresh state untouched', async () => {
      const state = signedIn({ lastSyncTime: NOW - 30, youtubeItems: [record('cached')] });

      const result = await gate.sync(state);

      expect(result).toBe(state);
      expect(youtube.syncSaved).not.toHaveBeenCalled();
      expect(reddit.syncSaved).not.toHaveBeenCalled();
    });

    it('should fetch each authenticated provider exactly once when stale', async () => {
      const result = await gate.sync(signedIn({ lastSyncTime: NOW - 61 }));

      expect(youtube.syncSaved).toHaveBeenCalledTimes(1);
      expect(youtube.syncSaved).toHaveBeenCalledWith({ accessToken: 'yt-token' });
      expect(reddit.syncSaved).toHaveBeenCalledTimes(1);
      expect(result.youtubeItems).toEqual([record('video')]);
      expect(result.redditItems).toEqual([record('post')]);
      expect(result.lastSyncTime).toBe(NOW);
    });

    it('should sync a brand-new session straight away', async () => {
      const result = await gate.sync(signedIn());

      expect(result.lastSyncTime).toBe(NOW);
      expect(youtube.syncSaved).toHaveBeenCalledTimes(1);
    });

    it('should skip providers without credentials', async () => {
      const state = signedIn({ redditCredentials: null, redditItems: [record('old')] });

      const result = await gate.sync(state);

      expect(reddit.syncSaved).not.toHaveBeenCalled();
      expect(result.redditItems).toEqual([record('old')]);
      expect(result.youtubeItems).toEqual([record('video')]);
    });

    it('should still stamp the time with nobody signed in', async () => {
      const result = await gate.sync(createDefaultState(60));

      expect(result.lastSyncTime).toBe(NOW);
      expect(youtube.syncSaved).not.toHaveBeenCalled();
    });

    it('should store a refreshed credential', async () => {
      youtube.syncSaved.mockResolvedValueOnce({
        credential: { accessToken: 'refreshed', refreshToken: 'r' },
        items: [],
      });

      const result = await gate.sync(signedIn());

      expect(result.youtubeCredentials).toEqual({ accessToken: 'refreshed', refreshToken: 'r' });
      expect(result.youtubeItems).toEqual([]);
    });

    it('should keep one provider when the other returns nothing', async () => {
      reddit.syncSaved.mockResolvedValueOnce({ credential: { accessToken: 'rd-token' }, items: [] });

      const result = await gate.sync(signedIn());

      expect(result.redditItems).toEqual([]);
      expect(result.youtubeItems).toEqual([record('video')]);
    });

    it('should not mutate the input state', async () => {
      const state = signedIn();

      await gate.sync(state);

      expect(state.lastSyncTime).toBe(0);
      expect(state.youtubeItems).toEqual([]);
    });
  });

  describe('forceSync', () => {
    it('should fetch even when no time has elapsed', async () => {
      const state = signedIn({ lastSyncTime: NOW });

      const result = await gate.forceSync(state);

      expect(youtube.syncSaved).toHaveBeenCalledTimes(1);
      expect(reddit.syncSaved).toHaveBeenCalledTimes(1);
      expect(result.lastSyncTime).toBe(NOW);
    });

    it('should stamp the current time', async () => {
      now = NOW + 5;

      const result = await gate.forceSync(signedIn({ lastSyncTime: NOW }));

      expect(result.lastSyncTime).toBe(NOW + 5);
    });
  });
});
