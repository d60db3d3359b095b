/**
 * Cleanup Strategy Interface
 *
 * One strategy per resource kind. The orchestrator hands each strategy the
 * resources of its kind that fall inside a tenant namespace, already paired with
 * the tenant's retention policy, and runs the strategies in the fixed kind order.
 */

import type { ResourceKind } from '../cluster/cluster-client.interface';
import type { RetentionPolicy } from '../policy/policy-resolver';
import type { ResourceRecord } from '../services/decision-engine';

export interface PlannedResource {
  record: ResourceRecord;
  policy: RetentionPolicy;
}

export interface CleanupResult {
  kind: ResourceKind;
  evaluated: number;
  /** Deleted immediately (or would have been, in a dry run). */
  deleted: number;
  /** Pods handed to the batch scheduler. */
  enqueued: number;
  preserved: number;
  /** Pods skipped because a controller owns them. */
  skipped: number;
  failed: number;
  dryRun: boolean;
}

export interface CleanupStrategy {
  readonly name: string;
  readonly kind: ResourceKind;
  execute(resources: PlannedResource[], dryRun: boolean): Promise<CleanupResult>;
}

export function emptyResult(kind: ResourceKind, dryRun: boolean): CleanupResult {
  return { kind, evaluated: 0, deleted: 0, enqueued: 0, preserved: 0, skipped: 0, failed: 0, dryRun };
}
