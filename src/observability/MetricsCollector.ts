// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  prefix?: string;
}

type Labels = Record<string, string | number>;

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private prefix: string;

  constructor(
    config: MetricsConfig = {},
    private logger?: Logger
  ) {
    this.registry = new Registry();
    this.prefix = config.prefix ?? '';

    if (config.enabled !== false) {
      this.initializeMetrics();
    }
  }

  private initializeMetrics(): void {
    // HTTP metrics
    this.addCounter('http_requests_total', 'Total HTTP requests', ['provider', 'method', 'status']);
    this.addHistogram(
      'http_request_duration',
      'http_request_duration_seconds',
      'HTTP request duration',
      ['provider', 'status'],
      [0.1, 0.5, 1, 2, 5, 10]
    );
    this.addCounter('http_cache_hits', 'HTTP conditional request cache hits', ['provider']);
    this.addCounter('http_errors', 'HTTP errors', ['provider', 'status']);

    // Rate limiting metrics
    this.addGauge('rate_limit_queue_size', 'Current rate limit queue size', ['provider']);
    this.addGauge('rate_limit_remaining', 'Remaining requests reported by the provider', ['provider']);
    this.addCounter('quota_pauses', 'Pauses waiting for a provider quota reset', ['provider']);

    // Pipeline metrics
    this.addCounter('inventory_source_failures', 'Inventory sources that could not be loaded', ['source']);
    this.addCounter('records_dropped', 'Records removed from the inventory', ['stage']);
    this.addCounter('enrichment_gaps', 'Tools annotated with a data gap', ['kind']);
    this.addGauge('enrichment_gap_fraction', 'Fraction of enriched tools carrying a data gap', []);
    this.addCounter('ledger_rows_appended', 'Interaction ledger rows appended', ['interaction']);
    this.addCounter('users_classified', 'Users assigned a category', ['category']);
    this.addCounter('location_lookups', 'Profile locations resolved to a country', ['method', 'result']);
    this.addHistogram(
      'stage_duration',
      'stage_duration_seconds',
      'Pipeline stage duration',
      ['stage'],
      [1, 10, 60, 300, 1800, 3600]
    );
  }

  private addCounter(key: string, help: string, labelNames: string[]): void {
    this.counters.set(
      key,
      new Counter({
        name: `${this.prefix}${key.endsWith('_total') ? key : `${key}_total`}`,
        help,
        labelNames,
        registers: [this.registry],
      })
    );
  }

  private addHistogram(
    key: string,
    name: string,
    help: string,
    labelNames: string[],
    buckets: number[]
  ): void {
    this.histograms.set(
      key,
      new Histogram({
        name: `${this.prefix}${name}`,
        help,
        labelNames,
        buckets,
        registers: [this.registry],
      })
    );
  }

  private addGauge(key: string, help: string, labelNames: string[]): void {
    this.gauges.set(
      key,
      new Gauge({
        name: `${this.prefix}${key}`,
        help,
        labelNames,
        registers: [this.registry],
      })
    );
  }

  incrementCounter(name: string, labels: Labels = {}, value: number = 1): void {
    const counter = this.counters.get(name);
    if (!counter) {
      this.logger?.debug('Unknown counter', { name });
      return;
    }
    counter.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    const histogram = this.histograms.get(name);
    histogram?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    const gauge = this.gauges.get(name);
    gauge?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
