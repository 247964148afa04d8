// src/connectors/BaseConnector.ts

import { SAVED_ITEMS_LIMIT } from './types';
import type { Connector, CoreDeps, SyncOutcome } from './types';
import type { ProviderName, NormalizedRecord } from '../core/normalizer/types';
import type { Credential } from '../core/token/types';
import type { AuthorizationRequest, CallbackParams } from '../core/auth/types';
import { needsRefresh } from '../core/token/expiry';
import { FetchFailedError, OAuthDeniedError, errorMessage } from '../utils/errors';

export abstract class BaseConnector<TClient> implements Connector {
  abstract readonly name: ProviderName;

  constructor(protected deps: CoreDeps) {}

  abstract buildAuthorizationUrl(): AuthorizationRequest;

  abstract exchangeCode(params: CallbackParams, expectedState?: string | null): Promise<Credential>;

  /**
   * Wrap a credential into an API client handle
   */
  abstract buildClient(credential: Credential): TClient;

  /**
   * Raw saved items, in provider order
   */
  protected abstract fetchRaw(client: TClient): Promise<unknown[]>;

  /**
   * Saved items for the client, capped at SAVED_ITEMS_LIMIT.
   *
   * Never throws: any provider or mapping failure yields an empty list.
   */
  async fetchSaved(client: TClient): Promise<NormalizedRecord[]> {
    const startTime = Date.now();

    try {
      const raw = await this.fetchRaw(client);
      const items = this.deps.normalizer.normalize(this.name, raw).slice(0, SAVED_ITEMS_LIMIT);

      this.deps.metrics.recordLatency('fetch_duration', Date.now() - startTime, {
        provider: this.name,
      });
      this.deps.metrics.incrementCounter('fetch_total', { provider: this.name, status: 'success' });
      this.deps.metrics.recordGauge('items_fetched', items.length, { provider: this.name });
      this.deps.logger.info('Fetch completed', { provider: this.name, itemCount: items.length });

      return items;
    } catch (error: unknown) {
      const failure =
        error instanceof FetchFailedError
          ? error
          : new FetchFailedError(`${this.name} fetch failed: ${errorMessage(error)}`, {
              provider: this.name,
            });

      this.deps.metrics.incrementCounter('fetch_total', { provider: this.name, status: 'failed' });
      this.deps.logger.warn('Fetch failed, returning no items', {
        provider: this.name,
        error: failure,
        details: failure.details,
      });

      return [];
    }
  }

  /**
   * Refresh the credential when it is about to expire and can be refreshed
   */
  async refreshIfNeeded(credential: Credential): Promise<Credential> {
    const { refreshToken } = credential;
    if (!refreshToken || !needsRefresh(credential)) {
      return credential;
    }

    this.deps.logger.info('Auto-refreshing token', {
      provider: this.name,
      expiresAt: credential.expiresAt,
    });

    try {
      const refreshed = await this.deps.auth.refreshToken(this.name, refreshToken);
      this.deps.metrics.incrementCounter('token_refresh_total', {
        provider: this.name,
        status: 'success',
      });
      return refreshed;
    } catch (error) {
      this.deps.metrics.incrementCounter('token_refresh_total', {
        provider: this.name,
        status: 'failed',
      });
      throw error;
    }
  }

  /**
   * One sync step for this provider: refresh if due, then fetch
   */
  async syncSaved(credential: Credential): Promise<SyncOutcome> {
    let current = credential;
    try {
      current = await this.refreshIfNeeded(credential);
    } catch (error) {
      this.deps.logger.warn('Keeping stored credential after refresh failure', {
        provider: this.name,
        error,
      });
    }

    const items = await this.fetchSaved(this.buildClient(current));
    return { credential: current, items };
  }

  /**
   * Providers redirect back with `error` (e.g. access_denied) instead of a code
   */
  protected assertNotDenied(params: CallbackParams): void {
    if (params.error) {
      throw new OAuthDeniedError(params.error, { provider: this.name });
    }
  }
}
