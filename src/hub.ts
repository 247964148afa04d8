// src/hub.ts

import type { AppConfig } from './config/ConfigValidator';
import type { CoreDeps } from './connectors/types';
import { AuthCore } from './core/auth/AuthCore';
import { HttpCore } from './core/http/HttpCore';
import { Normalizer } from './core/normalizer/Normalizer';
import { SessionStore } from './core/session/SessionStore';
import { SyncGate, systemClock, type Clock, type SyncConnectors } from './core/sync/SyncGate';
import { Logger } from './observability/Logger';
import { MetricsCollector } from './observability/MetricsCollector';
import { YouTubeConnector } from './connectors/youtube/YouTubeConnector';
import { RedditConnector } from './connectors/reddit/RedditConnector';
import { RouteController } from './server/RouteController';
import { validateConfig } from './config/ConfigValidator';

export interface HubOptions {
  clock?: Clock;
}

/**
 * Wires the application once at startup from an explicit configuration.
 */
export class SavedHub {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly metrics: MetricsCollector;
  readonly sessions: SessionStore;
  readonly connectors: SyncConnectors;
  readonly syncGate: SyncGate;
  readonly controller: RouteController;

  /**
   * Build dependencies before anything uses them
   */
  private constructor(config: AppConfig, options: HubOptions) {
    const logger = new Logger(config.logging);
    const metrics = new MetricsCollector();
    const deps: CoreDeps = {
      logger,
      metrics,
      normalizer: new Normalizer(),
      auth: new AuthCore(config.providers, logger),
      http: new HttpCore({ timeout: config.http.timeout }, metrics, logger),
    };

    this.config = config;
    this.logger = logger;
    this.metrics = metrics;
    this.sessions = new SessionStore(
      {
        ttlSeconds: config.session.ttlSeconds,
        syncIntervalSeconds: config.session.syncIntervalSeconds,
        maxSessions: config.session.maxSessions,
      },
      logger
    );
    this.connectors = {
      youtube: new YouTubeConnector(deps),
      reddit: new RedditConnector(deps),
    };
    this.syncGate = new SyncGate(this.connectors, logger, metrics, options.clock ?? systemClock);
    this.controller = new RouteController(this.connectors, this.syncGate, logger, metrics);
  }

  /**
   * @throws {z.ZodError} If the configuration is invalid
   *
   * @example
   * ```typescript
   * const hub = SavedHub.create(loadConfig(process.env));
   * createApp(hub).listen(hub.config.port);
   * ```
   */
  static create(config: AppConfig, options: HubOptions = {}): SavedHub {
    const hub = new SavedHub(validateConfig(config), options);
    hub.logger.info('Saved Hub initialized', {
      baseUrl: config.baseUrl,
      syncIntervalSeconds: config.session.syncIntervalSeconds,
    });
    return hub;
  }
}
