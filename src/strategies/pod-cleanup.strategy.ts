/**
 * PodCleanupStrategy
 *
 * Cleanup for standalone pods. Pods owned by a controller are skipped; they go
 * away with their owner. Pods due for deletion are queued on the
 * PodBatchScheduler rather than deleted here. The orchestrator flushes the queue
 * once this phase finishes.
 *
 * Exclusions are checked before the owner lookup.
 */

import type { ClusterClient } from '../cluster/cluster-client.interface';
import type { ExclusionFilter } from '../exclusions/exclusion-filter';
import { decisionsTotal } from '../metrics/cleanup-metrics';
import { logDecision, type DecisionEngine, type LimitSwitches, type ResourceRecord } from '../services/decision-engine';
import type { PodBatchScheduler } from '../services/pod-batch-scheduler';
import { describeError } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../config/logger';
import { emptyResult, type CleanupResult, type CleanupStrategy, type PlannedResource } from './cleanup-strategy.interface';

export class PodCleanupStrategy implements CleanupStrategy {
  readonly name = 'PodCleanupStrategy';
  readonly kind = 'pod';

  constructor(
    private readonly client: ClusterClient,
    private readonly engine: DecisionEngine,
    private readonly exclusions: ExclusionFilter,
    private readonly scheduler: PodBatchScheduler,
    private readonly limits: LimitSwitches,
    private readonly callTimeoutMs: number
  ) {}

  async execute(resources: PlannedResource[], dryRun: boolean): Promise<CleanupResult> {
    const result = emptyResult(this.kind, dryRun);

    for (const { record, policy } of resources) {
      result.evaluated++;

      if (this.exclusions.isExcluded(this.kind, record.name, record.namespace)) {
        result.preserved++;
        decisionsTotal.inc({ kind: this.kind, action: 'PRESERVE' });
        logger.info('PodCleanupStrategy: Skipping pod -> excluded', {
          name: record.name,
          namespace: record.namespace,
        });
        continue;
      }

      if (!(await this.isStandalone(record))) {
        result.skipped++;
        continue;
      }

      const decision = await this.engine.decide(record, policy, this.limits);
      decisionsTotal.inc({ kind: this.kind, action: decision.action });
      logDecision(record, policy, decision);

      if (decision.action === 'ENQUEUE') {
        this.scheduler.enqueue(record.namespace, record.name);
        result.enqueued++;
      } else {
        result.preserved++;
      }
    }

    logger.info('PodCleanupStrategy: Pod scan completed', {
      evaluated: result.evaluated,
      enqueued: result.enqueued,
      skipped: result.skipped,
    });
    return result;
  }

  /**
   * A pod whose owners cannot be read is treated as managed and left alone.
   */
  private async isStandalone(record: ResourceRecord): Promise<boolean> {
    try {
      const owners = await withTimeout(
        this.client.getOwnerReferences('pod', record.name, record.namespace),
        this.callTimeoutMs,
        `Read owners of pod ${record.namespace}/${record.name}`
      );
      if (owners.length > 0) {
        logger.debug('PodCleanupStrategy: Skipping managed pod', {
          name: record.name,
          namespace: record.namespace,
          owner: `${owners[0].kind}/${owners[0].name}`,
        });
        return false;
      }
      return true;
    } catch (error) {
      logger.warn('PodCleanupStrategy: Could not read pod owners, leaving pod alone', {
        name: record.name,
        namespace: record.namespace,
        error: describeError(error),
      });
      return false;
    }
  }
}
