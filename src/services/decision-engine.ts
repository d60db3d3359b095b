/**
 * DecisionEngine
 *
 * Decides what happens to a single resource. Steps run in a fixed order and the
 * first one that applies wins:
 *
 *   1. excluded by namespace or name          -> PRESERVE
 *   2. hard limit enabled and age >= hard     -> delete (label is never read)
 *   3. soft limit enabled and age >= soft     -> delete unless keep-alive is "true"
 *   4. otherwise                              -> PRESERVE
 *
 * Deletion means ENQUEUE for pods (batched later) and DELETE_NOW for everything else.
 * Thresholds are inclusive. The engine never throws; an unreadable label counts as absent.
 */

import type { ResourceKind } from '../cluster/cluster-client.interface';
import type { KindPolicy } from '../config';
import type { ExclusionFilter } from '../exclusions/exclusion-filter';
import type { RetentionPolicy } from '../policy/policy-resolver';
import { describeError } from '../utils/errors';
import { logger } from '../config/logger';

export const KEEP_ALIVE_LABEL = 'keep-alive';

export type DecisionAction = 'DELETE_NOW' | 'ENQUEUE' | 'PRESERVE';

export type DecisionPath = 'excluded' | 'hard' | 'soft' | 'protected' | 'within-limits';

export interface ResourceRecord {
  kind: ResourceKind;
  name: string;
  namespace: string;
  ageMinutes: number;
}

export interface Decision {
  action: DecisionAction;
  path: DecisionPath;
  reason: string;
}

export type LabelReader = (
  kind: ResourceKind,
  name: string,
  namespace: string,
  key: string
) => Promise<string | undefined>;

export type LimitSwitches = Pick<KindPolicy, 'hardEnabled' | 'softEnabled'>;

export function deletionActionFor(kind: ResourceKind): DecisionAction {
  return kind === 'pod' ? 'ENQUEUE' : 'DELETE_NOW';
}

export class DecisionEngine {
  constructor(
    private readonly exclusions: ExclusionFilter,
    private readonly readLabel: LabelReader
  ) {}

  async decide(record: ResourceRecord, policy: RetentionPolicy, limits: LimitSwitches): Promise<Decision> {
    if (this.exclusions.isExcluded(record.kind, record.name, record.namespace)) {
      return { action: 'PRESERVE', path: 'excluded', reason: 'excluded' };
    }

    if (limits.hardEnabled && record.ageMinutes >= policy.hardMinutes) {
      return { action: deletionActionFor(record.kind), path: 'hard', reason: 'hard limit' };
    }

    if (limits.softEnabled && record.ageMinutes >= policy.softMinutes) {
      const rawLabel = await this.readKeepAlive(record);

      if (rawLabel.trim().toLowerCase() === 'true') {
        return { action: 'PRESERVE', path: 'protected', reason: 'protected' };
      }

      return {
        action: deletionActionFor(record.kind),
        path: 'soft',
        reason: rawLabel === '' ? 'soft, no label' : `soft, ${KEEP_ALIVE_LABEL}='${rawLabel}'`,
      };
    }

    return { action: 'PRESERVE', path: 'within-limits', reason: 'within limits' };
  }

  private async readKeepAlive(record: ResourceRecord): Promise<string> {
    try {
      return (await this.readLabel(record.kind, record.name, record.namespace, KEEP_ALIVE_LABEL)) ?? '';
    } catch (error) {
      logger.warn('DecisionEngine: Could not read keep-alive label, treating as absent', {
        kind: record.kind,
        name: record.name,
        namespace: record.namespace,
        error: describeError(error),
      });
      return '';
    }
  }
}

/**
 * Every decision is logged with its reason. Resources still inside their limits
 * only show up at debug level.
 */
export function logDecision(record: ResourceRecord, policy: RetentionPolicy, decision: Decision): void {
  const meta = {
    kind: record.kind,
    name: record.name,
    namespace: record.namespace,
    tenantClass: policy.tenantClass,
    ageMinutes: record.ageMinutes,
    softMinutes: policy.softMinutes,
    hardMinutes: policy.hardMinutes,
    action: decision.action,
    reason: decision.reason,
  };
  const message = `DecisionEngine: ${record.kind} ${record.namespace}/${record.name} -> ${decision.action} (${decision.reason})`;

  if (decision.path === 'within-limits') {
    logger.debug(message, meta);
  } else {
    logger.info(message, meta);
  }
}
