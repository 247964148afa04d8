// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();

  constructor(config: MetricsConfig = {}) {
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.counters.set(
      'http_requests_total',
      new Counter({
        name: 'http_requests_total',
        help: 'Total outbound HTTP requests',
        labelNames: ['provider', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'Outbound HTTP request duration',
        labelNames: ['provider', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    // OAuth metrics
    this.counters.set(
      'oauth_callbacks_total',
      new Counter({
        name: 'oauth_callbacks_total',
        help: 'OAuth callbacks handled',
        labelNames: ['provider', 'status'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'token_refresh_total',
      new Counter({
        name: 'token_refresh_total',
        help: 'Token refresh attempts',
        labelNames: ['provider', 'status'],
        registers: [this.registry],
      })
    );

    // Content sync metrics
    this.counters.set(
      'sync_runs_total',
      new Counter({
        name: 'sync_runs_total',
        help: 'Content syncs that passed the interval gate',
        labelNames: ['forced'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'fetch_total',
      new Counter({
        name: 'fetch_total',
        help: 'Saved-content fetches',
        labelNames: ['provider', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'fetch_duration',
      new Histogram({
        name: 'fetch_duration_seconds',
        help: 'Saved-content fetch duration',
        labelNames: ['provider'],
        buckets: [0.1, 0.5, 1, 2, 5, 10],
        registers: [this.registry],
      })
    );

    this.gauges.set(
      'items_fetched',
      new Gauge({
        name: 'items_fetched',
        help: 'Number of items returned by the last fetch',
        labelNames: ['provider'],
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels): void {
    const counter = this.counters.get(name);
    counter?.inc(labels);
  }

  recordLatency(name: string, durationMs: number, labels: Labels): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  get contentType(): string {
    return this.registry.contentType;
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
