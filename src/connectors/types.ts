// src/connectors/types.ts

import type { ProviderName, NormalizedRecord } from '../core/normalizer/types';
import type { Credential } from '../core/token/types';
import type { AuthorizationRequest, CallbackParams } from '../core/auth/types';
import type { AuthCore } from '../core/auth/AuthCore';
import type { HttpCore } from '../core/http/HttpCore';
import type { Normalizer } from '../core/normalizer/Normalizer';
import type { Logger } from '../observability/Logger';
import type { MetricsCollector } from '../observability/MetricsCollector';

// Saved items kept per provider per fetch
export const SAVED_ITEMS_LIMIT = 10;

/**
 * Provider surface the controller and sync gate work against. The client
 * handle type stays inside each connector.
 */
export interface Connector {
  readonly name: ProviderName;

  buildAuthorizationUrl(): AuthorizationRequest;
  exchangeCode(params: CallbackParams, expectedState?: string | null): Promise<Credential>;
  refreshIfNeeded(credential: Credential): Promise<Credential>;
  syncSaved(credential: Credential): Promise<SyncOutcome>;
}

export interface SyncOutcome {
  credential: Credential; // Possibly refreshed
  items: NormalizedRecord[];
}

export interface CoreDeps {
  auth: AuthCore;
  http: HttpCore;
  normalizer: Normalizer;
  logger: Logger;
  metrics: MetricsCollector;
}
