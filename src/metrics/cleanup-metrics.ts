/**
 * Cleanup Metrics
 *
 * Prometheus counters for decisions and deletions. A run is short-lived, so
 * instead of serving /metrics the registry is written in text exposition format
 * for the node-exporter textfile collector.
 */

import { rename, writeFile } from 'fs/promises';
import { Counter, Gauge, Registry } from 'prom-client';

export const metricsRegistry = new Registry();

export const decisionsTotal = new Counter({
  name: 'auto_cleanup_decisions_total',
  help: 'Retention decisions by resource kind and action',
  labelNames: ['kind', 'action'] as const,
  registers: [metricsRegistry],
});

export const deletionsTotal = new Counter({
  name: 'auto_cleanup_deletions_total',
  help: 'Deletion calls by resource kind and outcome',
  labelNames: ['kind', 'outcome'] as const,
  registers: [metricsRegistry],
});

export const podBatchesTotal = new Counter({
  name: 'auto_cleanup_pod_batches_total',
  help: 'Pod batch deletion calls by outcome',
  labelNames: ['outcome'] as const,
  registers: [metricsRegistry],
});

export const lastRunTimestamp = new Gauge({
  name: 'auto_cleanup_last_run_timestamp_seconds',
  help: 'Unix time at which the last cleanup run completed',
  registers: [metricsRegistry],
});

/**
 * Write via a temp file and rename so the collector never reads a partial file.
 */
export async function writeMetricsTextfile(filePath: string): Promise<void> {
  const tmpPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tmpPath, await metricsRegistry.metrics(), 'utf8');
  await rename(tmpPath, filePath);
}
