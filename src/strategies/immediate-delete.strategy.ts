/**
 * ImmediateDeleteStrategy
 *
 * Cleanup for Deployments (controllers) and Services: each resource is decided
 * and, when due, deleted on the spot with one API call. A failed or timed-out
 * delete is logged and the run moves on to the next resource.
 */

import type { ClusterClient, DeletionResult } from '../cluster/cluster-client.interface';
import { decisionsTotal, deletionsTotal } from '../metrics/cleanup-metrics';
import { logDecision, type DecisionEngine, type LimitSwitches, type ResourceRecord } from '../services/decision-engine';
import { describeError } from '../utils/errors';
import { withTimeout } from '../utils/timeout';
import { logger } from '../config/logger';
import { emptyResult, type CleanupResult, type CleanupStrategy, type PlannedResource } from './cleanup-strategy.interface';

export type ImmediateKind = 'controller' | 'service';

const STRATEGY_NAMES: Record<ImmediateKind, string> = {
  controller: 'ControllerCleanupStrategy',
  service: 'ServiceCleanupStrategy',
};

export class ImmediateDeleteStrategy implements CleanupStrategy {
  readonly name: string;

  constructor(
    readonly kind: ImmediateKind,
    private readonly client: ClusterClient,
    private readonly engine: DecisionEngine,
    private readonly limits: LimitSwitches,
    private readonly callTimeoutMs: number
  ) {
    this.name = STRATEGY_NAMES[kind];
  }

  async execute(resources: PlannedResource[], dryRun: boolean): Promise<CleanupResult> {
    const result = emptyResult(this.kind, dryRun);

    for (const { record, policy } of resources) {
      result.evaluated++;

      const decision = await this.engine.decide(record, policy, this.limits);
      decisionsTotal.inc({ kind: this.kind, action: decision.action });
      logDecision(record, policy, decision);

      if (decision.action !== 'DELETE_NOW') {
        result.preserved++;
        continue;
      }

      if (dryRun) {
        logger.info(`${this.name}: DRY RUN - would delete ${this.kind}`, {
          name: record.name,
          namespace: record.namespace,
        });
        result.deleted++;
        continue;
      }

      const deletion = await this.delete(record);
      if (deletion.success) {
        result.deleted++;
        deletionsTotal.inc({ kind: this.kind, outcome: 'success' });
        logger.info(`${this.name}: Deleted ${this.kind}`, { name: record.name, namespace: record.namespace });
      } else {
        result.failed++;
        deletionsTotal.inc({ kind: this.kind, outcome: 'failure' });
        logger.error(`${this.name}: Failed to delete ${this.kind}`, {
          name: record.name,
          namespace: record.namespace,
          ageMinutes: record.ageMinutes,
          error: deletion.error,
        });
      }
    }

    return result;
  }

  private async delete(record: ResourceRecord): Promise<DeletionResult> {
    try {
      return await withTimeout(
        this.client.deleteResource(this.kind, record.name, record.namespace, { forceImmediate: false }),
        this.callTimeoutMs,
        `Delete ${this.kind} ${record.namespace}/${record.name}`
      );
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }
}
