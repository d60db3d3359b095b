/**
 * PodBatchScheduler
 *
 * Collects pod deletion requests during the pod scan and deletes them in
 * per-namespace batches, so one API round trip covers up to batchSize pods.
 *
 * Dispatch modes:
 *   - background: every chunk goes straight to a bounded worker pool and flush()
 *     returns once they are submitted. settle() waits for them later.
 *   - synchronous: chunks of one namespace run back to back, namespaces run in
 *     parallel, and flush() waits (bounded by the drain timeout).
 *
 * Within a namespace chunks are dispatched in enqueue order. A failed chunk is
 * logged and never retried in the same run. The queue is always empty after flush().
 */

import type { ClusterClient, DeletionResult } from '../cluster/cluster-client.interface';
import { DEFAULT_POD_BATCH_SIZE } from '../config';
import { podBatchesTotal, deletionsTotal } from '../metrics/cleanup-metrics';
import { describeError } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../config/logger';
import { WorkerPool } from './worker-pool';

export interface PodDeleteRequest {
  namespace: string;
  podName: string;
}

export interface PodChunk {
  namespace: string;
  pods: string[];
}

export interface FlushOptions {
  batchSize: number;
  maxConcurrency: number;
  forceDelete: boolean;
  background: boolean;
  drainTimeoutMs: number;
  dryRun?: boolean;
}

export interface FlushSummary {
  pods: number;
  chunks: number;
  namespaces: number;
  /** True when every dispatched chunk finished before flush returned. */
  drained: boolean;
}

export interface DispatchStats {
  chunksSucceeded: number;
  chunksFailed: number;
  podsDeleted: number;
  podsFailed: number;
}

/**
 * Ordered namespace -> pod names, insertion order preserved at both levels.
 * Entries without a namespace or pod name are dropped.
 */
export function groupByNamespace(entries: readonly PodDeleteRequest[]): Map<string, string[]> {
  const groups = new Map<string, string[]>();
  for (const { namespace, podName } of entries) {
    if (!namespace.trim() || !podName.trim()) {
      continue;
    }
    const pods = groups.get(namespace);
    if (pods) {
      pods.push(podName);
    } else {
      groups.set(namespace, [podName]);
    }
  }
  return groups;
}

export function partitionPodQueue(entries: readonly PodDeleteRequest[], batchSize: number): PodChunk[] {
  const size = Number.isInteger(batchSize) && batchSize > 0 ? batchSize : DEFAULT_POD_BATCH_SIZE;
  const chunks: PodChunk[] = [];

  for (const [namespace, pods] of groupByNamespace(entries)) {
    for (let start = 0; start < pods.length; start += size) {
      chunks.push({ namespace, pods: pods.slice(start, start + size) });
    }
  }
  return chunks;
}

export class PodBatchScheduler {
  private queue: PodDeleteRequest[] = [];
  private readonly backgroundPools = new Set<WorkerPool>();
  private readonly stats: DispatchStats = {
    chunksSucceeded: 0,
    chunksFailed: 0,
    podsDeleted: 0,
    podsFailed: 0,
  };

  constructor(
    private readonly client: ClusterClient,
    private readonly callTimeoutMs: number
  ) {}

  get size(): number {
    return this.queue.length;
  }

  enqueue(namespace: string, podName: string): void {
    this.queue.push({ namespace, podName });
  }

  getStats(): DispatchStats {
    return { ...this.stats };
  }

  async flush(options: FlushOptions): Promise<FlushSummary> {
    const entries = this.queue;
    this.queue = [];

    const chunks = partitionPodQueue(entries, options.batchSize);
    const pods = chunks.reduce((total, chunk) => total + chunk.pods.length, 0);
    const namespaces = new Set(chunks.map((chunk) => chunk.namespace)).size;

    logger.info(`PodBatchScheduler: Flushing pod deletion queue (${pods} pods)`, {
      pods,
      chunks: chunks.length,
      namespaces,
      dropped: entries.length - pods,
      batchSize: options.batchSize,
      forceDelete: options.forceDelete,
      background: options.background,
    });

    const summary: FlushSummary = { pods, chunks: chunks.length, namespaces, drained: true };

    if (chunks.length === 0) {
      return summary;
    }

    if (options.dryRun) {
      for (const chunk of chunks) {
        logger.info('PodBatchScheduler: DRY RUN - would delete pods in batch', {
          namespace: chunk.namespace,
          pods: chunk.pods,
        });
      }
      return summary;
    }

    const pool = new WorkerPool(options.maxConcurrency);

    if (options.background) {
      for (const chunk of chunks) {
        pool.submit(() => this.dispatchChunk(chunk, options.forceDelete));
      }
      this.backgroundPools.add(pool);
      logger.info('PodBatchScheduler: Batches submitted for background deletion', {
        chunks: chunks.length,
        maxConcurrency: options.maxConcurrency,
      });
      return { ...summary, drained: false };
    }

    const byNamespace = new Map<string, PodChunk[]>();
    for (const chunk of chunks) {
      byNamespace.set(chunk.namespace, [...(byNamespace.get(chunk.namespace) ?? []), chunk]);
    }
    for (const nsChunks of byNamespace.values()) {
      pool.submit(async () => {
        for (const chunk of nsChunks) {
          await this.dispatchChunk(chunk, options.forceDelete);
        }
      });
    }

    const drained = await pool.onIdle(options.drainTimeoutMs);
    if (!drained) {
      // Still running; settle() waits for it with the background pools.
      this.backgroundPools.add(pool);
      logger.error('PodBatchScheduler: Timed out waiting for batch deletions', {
        timeoutMs: options.drainTimeoutMs,
        inFlight: pool.inFlight,
        queued: pool.queued,
      });
    }
    return { ...summary, drained };
  }

  /**
   * Wait for batches earlier flushes left running, background or timed out.
   * @returns false if the deadline passed with batches still outstanding
   */
  async settle(timeoutMs: number): Promise<boolean> {
    const deadline = Date.now() + timeoutMs;
    let drained = true;

    for (const pool of this.backgroundPools) {
      const remaining = Math.max(0, deadline - Date.now());
      if (await pool.onIdle(remaining)) {
        this.backgroundPools.delete(pool);
        continue;
      }
      drained = false;
      logger.error('PodBatchScheduler: Background batch deletions still running at drain deadline', {
        timeoutMs,
        inFlight: pool.inFlight,
        queued: pool.queued,
      });
    }

    return drained;
  }

  private async dispatchChunk(chunk: PodChunk, forceDelete: boolean): Promise<void> {
    logger.info(`PodBatchScheduler: Deleting ${chunk.pods.length} pods in batch`, {
      namespace: chunk.namespace,
      pods: chunk.pods,
      forceDelete,
    });

    let result: DeletionResult;
    try {
      result = await withTimeout(
        this.client.deleteResources('pod', chunk.pods, chunk.namespace, { forceImmediate: forceDelete }),
        this.callTimeoutMs,
        `Batch delete of ${chunk.pods.length} pods in ${chunk.namespace}`
      );
    } catch (error) {
      result = { success: false, error: describeError(error) };
    }

    if (result.success) {
      this.stats.chunksSucceeded++;
      this.stats.podsDeleted += chunk.pods.length;
      podBatchesTotal.inc({ outcome: 'success' });
      deletionsTotal.inc({ kind: 'pod', outcome: 'success' }, chunk.pods.length);
      return;
    }

    this.stats.chunksFailed++;
    this.stats.podsFailed += chunk.pods.length;
    podBatchesTotal.inc({ outcome: 'failure' });
    deletionsTotal.inc({ kind: 'pod', outcome: 'failure' }, chunk.pods.length);
    logger.error('PodBatchScheduler: Batch delete failed', {
      namespace: chunk.namespace,
      pods: chunk.pods,
      error: result.error,
    });
  }
}
