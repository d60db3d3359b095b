/**
 * CleanupOrchestrator
 *
 * Runs one cleanup pass over the cluster.
 *
 * Responsibilities:
 *   - Take an inventory of every enabled kind and resolve tenant policies up front,
 *     so a configuration error aborts the run before anything is deleted
 *   - Run the kind strategies in the fixed order controller -> pod -> service
 *   - Flush the pod queue right after the pod phase, before services are touched
 *   - Wait (bounded) for background pod batches before handing back the summary
 *
 * Disabled kinds are logged and never queried.
 */

import { RESOURCE_KINDS, type ClusterClient, type ResourceKind, type ResourceListing } from '../cluster/cluster-client.interface';
import type { KindPolicy, PodBatchConfig } from '../config';
import type { PolicyResolver } from '../policy/policy-resolver';
import type { CleanupResult, CleanupStrategy, PlannedResource } from '../strategies/cleanup-strategy.interface';
import { ageInMinutes } from '../utils/age';
import { ConfigurationError, describeError } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../config/logger';
import type { DispatchStats, FlushSummary, PodBatchScheduler } from './pod-batch-scheduler';

export interface OrchestratorOptions {
  kinds: Record<ResourceKind, KindPolicy>;
  namespacePattern: RegExp;
  podBatch: PodBatchConfig;
  callTimeoutMs: number;
  drainTimeoutMs: number;
  now?: () => Date;
}

export interface RunSummary {
  dryRun: boolean;
  startedAt: Date;
  completedAt: Date;
  results: CleanupResult[];
  disabledKinds: ResourceKind[];
  /** Kinds whose listing failed; nothing of that kind was touched. */
  failedKinds: ResourceKind[];
  /** Resources in namespaces that belong to no tenant class. */
  unmatched: number;
  flush: FlushSummary;
  dispatch: DispatchStats;
  /** False when pod batches were still running at the drain deadline. */
  drained: boolean;
}

interface RunPlan {
  resources: Map<ResourceKind, PlannedResource[]>;
  failedKinds: ResourceKind[];
  unmatched: number;
}

export class CleanupOrchestrator {
  private readonly now: () => Date;

  constructor(
    private readonly client: ClusterClient,
    private readonly resolver: PolicyResolver,
    private readonly scheduler: PodBatchScheduler,
    private readonly strategies: Map<ResourceKind, CleanupStrategy>,
    private readonly options: OrchestratorOptions
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async executeAll(dryRun: boolean): Promise<RunSummary> {
    const startedAt = this.now();
    const enabledKinds = RESOURCE_KINDS.filter((kind) => this.options.kinds[kind].enabled);
    const disabledKinds = RESOURCE_KINDS.filter((kind) => !this.options.kinds[kind].enabled);

    logger.info('CleanupOrchestrator: Starting cleanup', {
      dryRun,
      kinds: this.options.kinds,
      namespacePattern: this.options.namespacePattern.source,
      podBatch: this.options.podBatch,
    });

    for (const kind of disabledKinds) {
      const policy = this.options.kinds[kind];
      logger.info(`CleanupOrchestrator: Skipping ${kind} cleanup`, {
        reason: policy.hardEnabled || policy.softEnabled ? 'disabled' : 'both hard and soft limits disabled',
      });
    }

    const plan = await this.planRun(enabledKinds, startedAt);
    const results: CleanupResult[] = [];
    let flush: FlushSummary | undefined;

    for (const kind of RESOURCE_KINDS) {
      const strategy = this.strategies.get(kind);
      const resources = plan.resources.get(kind);

      if (strategy && resources) {
        logger.info('CleanupOrchestrator: Executing strategy', {
          strategy: strategy.name,
          candidates: resources.length,
          dryRun,
        });
        const result = await strategy.execute(resources, dryRun);
        logger.info('CleanupOrchestrator: Strategy completed', { strategy: strategy.name, result });
        results.push(result);
      }

      if (kind === 'pod') {
        flush = await this.scheduler.flush({
          ...this.options.podBatch,
          drainTimeoutMs: this.options.drainTimeoutMs,
          dryRun,
        });
      }
    }

    const settled = await this.scheduler.settle(this.options.drainTimeoutMs);
    const flushSummary = flush ?? { pods: 0, chunks: 0, namespaces: 0, drained: true };

    const summary: RunSummary = {
      dryRun,
      startedAt,
      completedAt: this.now(),
      results,
      disabledKinds,
      failedKinds: plan.failedKinds,
      unmatched: plan.unmatched,
      flush: flushSummary,
      dispatch: this.scheduler.getStats(),
      drained: settled,
    };

    logger.info('CleanupOrchestrator: Cleanup complete', {
      results,
      dispatch: summary.dispatch,
      unmatched: summary.unmatched,
      failedKinds: summary.failedKinds,
      drained: summary.drained,
    });

    return summary;
  }

  /**
   * @throws ConfigurationError when a kind has no strategy or a matched tenant class is misconfigured
   */
  private async planRun(kinds: readonly ResourceKind[], now: Date): Promise<RunPlan> {
    const missing = kinds.filter((kind) => !this.strategies.has(kind));
    if (missing.length > 0) {
      throw new ConfigurationError(`No cleanup strategy registered for: ${missing.join(', ')}`);
    }

    const plan: RunPlan = { resources: new Map(), failedKinds: [], unmatched: 0 };

    for (const kind of kinds) {
      let listings: ResourceListing[];
      try {
        listings = await withTimeout(
          this.client.listResources(kind, this.options.namespacePattern),
          this.options.callTimeoutMs,
          `List ${kind} resources`
        );
      } catch (error) {
        logger.error(`CleanupOrchestrator: Failed to list ${kind} resources, skipping kind`, {
          error: describeError(error),
        });
        plan.failedKinds.push(kind);
        continue;
      }

      const planned: PlannedResource[] = [];
      for (const listing of listings) {
        const policy = this.resolver.resolvePolicy(listing.namespace);
        if (!policy) {
          plan.unmatched++;
          continue;
        }
        planned.push({
          record: {
            kind,
            name: listing.name,
            namespace: listing.namespace,
            ageMinutes: ageInMinutes(listing.creationTimestamp, now),
          },
          policy,
        });
      }

      logger.debug(`CleanupOrchestrator: Inventory for ${kind}`, {
        listed: listings.length,
        candidates: planned.length,
      });
      plan.resources.set(kind, planned);
    }

    return plan;
  }
}
