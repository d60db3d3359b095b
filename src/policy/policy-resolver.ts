/**
 * PolicyResolver
 *
 * Maps a namespace to its tenant class and that class's retention thresholds.
 *
 * Prefixes are tested in declared order and the first match wins. A namespace
 * matching no prefix is simply out of scope (null). A matched class whose soft or
 * hard threshold is missing or unparsable is a fatal ConfigurationError.
 */

import { parseDuration } from '../config/parsers';
import { ConfigurationError } from '../utils/errors';

export const TENANT_CLASSES = ['student', 'faculty', 'industry'] as const;
export type TenantClass = (typeof TENANT_CLASSES)[number];

export interface TenantClassConfig {
  tenantClass: TenantClass;
  prefix: string;
  /** Raw duration strings, e.g. "1D", "36H", "90". */
  soft?: string;
  hard?: string;
}

export interface RetentionPolicy {
  readonly tenantClass: TenantClass;
  readonly softMinutes: number;
  readonly hardMinutes: number;
}

export class PolicyResolver {
  private readonly parsed = new Map<TenantClass, RetentionPolicy | ConfigurationError>();

  constructor(private readonly tenants: readonly TenantClassConfig[]) {}

  /**
   * @returns the policy, or null when the namespace belongs to no tenant class
   * @throws ConfigurationError when the matched class has no usable thresholds
   */
  resolvePolicy(namespace: string): RetentionPolicy | null {
    const tenant = this.matchTenant(namespace);
    if (!tenant) {
      return null;
    }

    let policy = this.parsed.get(tenant.tenantClass);
    if (!policy) {
      policy = this.parse(tenant);
      this.parsed.set(tenant.tenantClass, policy);
    }

    if (policy instanceof ConfigurationError) {
      throw policy;
    }
    return policy;
  }

  private matchTenant(namespace: string): TenantClassConfig | undefined {
    return this.tenants.find((tenant) => namespace.startsWith(tenant.prefix));
  }

  private parse(tenant: TenantClassConfig): RetentionPolicy | ConfigurationError {
    const key = tenant.tenantClass.toUpperCase();
    try {
      return Object.freeze({
        tenantClass: tenant.tenantClass,
        softMinutes: parseDuration(tenant.soft, `${key}_SOFT`),
        hardMinutes: parseDuration(tenant.hard, `${key}_HARD`),
      });
    } catch (error) {
      if (error instanceof ConfigurationError) {
        return new ConfigurationError(`Tenant class '${tenant.tenantClass}': ${error.message}`);
      }
      throw error;
    }
  }
}
