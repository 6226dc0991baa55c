// src/observability/MetricsCollector.ts

import { Registry, Counter, Histogram, Gauge } from 'prom-client';
import * as http from 'http';
import type { Logger } from './Logger';

export interface MetricsConfig {
  enabled?: boolean;
  port?: number;
  path?: string;
}

type Labels = Record<string, string | number>;

interface MetricDefinition {
  key: string;
  name: string;
  help: string;
  labelNames: string[];
  buckets?: number[];
}

const COUNTERS: MetricDefinition[] = [
  { key: 'http_requests_total', name: 'http_requests_total', help: 'Upstream HTTP requests', labelNames: ['host', 'method', 'status'] },
  { key: 'http_retries', name: 'http_retries_total', help: 'Retried upstream requests', labelNames: ['host', 'reason'] },
  { key: 'http_errors', name: 'http_errors_total', help: 'Upstream HTTP errors', labelNames: ['host', 'status'] },
  { key: 'fetch_pages', name: 'fetch_pages_total', help: 'Ticket pages fetched', labelNames: [] },
  { key: 'records_fetched', name: 'records_fetched_total', help: 'Raw ticket records fetched', labelNames: [] },
  { key: 'records_skipped', name: 'records_skipped_total', help: 'Records skipped during normalization', labelNames: ['reason'] },
  { key: 'sink_rows_written', name: 'sink_rows_written_total', help: 'Rows flushed to a destination', labelNames: ['sink'] },
  { key: 'sink_flush_failures', name: 'sink_flush_failures_total', help: 'Failed destination flushes', labelNames: ['sink'] },
  { key: 'merge_rows', name: 'merge_rows_total', help: 'Rows reconciled by the merge engine', labelNames: ['outcome'] },
  { key: 'token_refresh_total', name: 'token_refresh_total', help: 'Credential refresh attempts', labelNames: ['status'] },
  { key: 'token_refresh_dedup_local', name: 'token_refresh_dedup_local_total', help: 'Refreshes joined in-process', labelNames: [] },
  { key: 'token_refresh_dedup_distributed', name: 'token_refresh_dedup_distributed_total', help: 'Refreshes joined via Redis', labelNames: [] },
  { key: 'sync_runs', name: 'sync_runs_total', help: 'Synchronization runs', labelNames: ['trigger', 'status'] },
];

const HISTOGRAMS: MetricDefinition[] = [
  { key: 'http_request_duration', name: 'http_request_duration_seconds', help: 'Upstream request duration', labelNames: ['host', 'status'], buckets: [0.1, 0.5, 1, 2, 5] },
  { key: 'sink_flush_duration', name: 'sink_flush_duration_seconds', help: 'Destination flush duration', labelNames: ['sink', 'status'], buckets: [0.05, 0.1, 0.5, 1, 5] },
  { key: 'token_refresh_duration', name: 'token_refresh_duration_seconds', help: 'Credential refresh duration', labelNames: ['status'], buckets: [0.1, 0.3, 0.5, 1, 2] },
  { key: 'lock_wait_duration', name: 'destination_lock_wait_seconds', help: 'Time spent waiting for a destination lock', labelNames: ['destination'], buckets: [0.01, 0.1, 1, 10, 60] },
  { key: 'sync_run_duration', name: 'sync_run_duration_seconds', help: 'Synchronization run duration', labelNames: ['trigger'], buckets: [1, 5, 30, 120, 600] },
];

const GAUGES: MetricDefinition[] = [
  { key: 'rate_limit_queue_size', name: 'rate_limit_queue_size', help: 'Queued upstream requests', labelNames: ['host'] },
  { key: 'last_run_rows', name: 'sync_last_run_rows', help: 'Rows persisted by the last run', labelNames: ['trigger'] },
];

export class MetricsCollector {
  private registry: Registry;
  private counters: Map<string, Counter> = new Map();
  private histograms: Map<string, Histogram> = new Map();
  private gauges: Map<string, Gauge> = new Map();
  private server?: http.Server;
  private logger?: Logger;

  constructor(config: MetricsConfig = {}, logger?: Logger) {
    this.logger = logger;
    this.registry = new Registry();

    if (config.enabled !== false) {
      this.initializeMetrics();

      if (config.port) {
        this.exposeMetrics(config.port, config.path ?? '/metrics');
      }
    }
  }

  private initializeMetrics(): void {
    for (const def of COUNTERS) {
      this.counters.set(
        def.key,
        new Counter({ name: def.name, help: def.help, labelNames: def.labelNames, registers: [this.registry] })
      );
    }

    for (const def of HISTOGRAMS) {
      this.histograms.set(
        def.key,
        new Histogram({
          name: def.name,
          help: def.help,
          labelNames: def.labelNames,
          buckets: def.buckets,
          registers: [this.registry],
        })
      );
    }

    for (const def of GAUGES) {
      this.gauges.set(
        def.key,
        new Gauge({ name: def.name, help: def.help, labelNames: def.labelNames, registers: [this.registry] })
      );
    }
  }

  incrementCounter(name: string, labels: Labels = {}, value = 1): void {
    this.counters.get(name)?.inc(labels, value);
  }

  recordLatency(name: string, durationMs: number, labels: Labels = {}): void {
    this.histograms.get(name)?.observe(labels, durationMs / 1000);
  }

  recordGauge(name: string, value: number, labels: Labels = {}): void {
    this.gauges.get(name)?.set(labels, value);
  }

  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }

  private exposeMetrics(port: number, path: string): void {
    this.server = http.createServer((req, res) => {
      if (req.url !== path) {
        res.statusCode = 404;
        res.end('Not Found');
        return;
      }
      this.getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', this.registry.contentType);
          res.end(body);
        })
        .catch((error: unknown) => {
          res.statusCode = 500;
          res.end(error instanceof Error ? error.message : 'metrics unavailable');
        });
    });

    this.server.on('error', (error: Error) => {
      this.logger?.error('Metrics server error', { port, error: error.message });
    });

    this.server.listen(port, () => {
      this.logger?.info(`Metrics exposed on http://localhost:${port}${path}`);
    });
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) return;
    await new Promise<void>((resolve) => server.close(() => resolve()));
    this.server = undefined;
  }
}
