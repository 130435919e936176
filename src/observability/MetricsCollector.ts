// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram } from 'prom-client';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
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
        help: 'Total HTTP requests',
        labelNames: ['endpoint', 'method', 'status'],
        registers: [this.registry],
      })
    );

    this.histograms.set(
      'http_request_duration',
      new Histogram({
        name: 'http_request_duration_seconds',
        help: 'HTTP request duration',
        labelNames: ['endpoint', 'status'],
        buckets: [0.1, 0.5, 1, 2, 5],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'http_errors',
      new Counter({
        name: 'http_errors_total',
        help: 'HTTP errors',
        labelNames: ['endpoint', 'status'],
        registers: [this.registry],
      })
    );

    // Conversion metrics
    this.counters.set(
      'records_converted',
      new Counter({
        name: 'records_converted_total',
        help: 'Source records converted to activity streams documents',
        labelNames: ['kind'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'records_skipped',
      new Counter({
        name: 'records_skipped_total',
        help: 'Source records dropped from a batch',
        labelNames: ['kind', 'reason'],
        registers: [this.registry],
      })
    );

    this.counters.set(
      'share_fetches',
      new Counter({
        name: 'share_fetches_total',
        help: 'Extra retweet lookups issued while resolving shares',
        registers: [this.registry],
      })
    );

    this.logger?.debug('Metrics initialized', { metrics: this.counters.size + this.histograms.size });
  }

  incrementCounter(name: string, labels: Labels = {}): void {
    const counter = this.counters.get(name);
    if (counter) {
      counter.inc(labels);
    }
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    if (histogram) {
      histogram.observe(labels, durationMs / 1000);
    }
  }

  /**
   * Prometheus exposition text for every registered metric
   */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
