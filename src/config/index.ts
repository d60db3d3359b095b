/**
 * Configuration Loader
 *
 * Reads the KEY=VALUE configuration file (auto-cleanup.conf) and overlays
 * environment variables, producing a typed, frozen configuration for the run.
 * Uses dotenv both for a local .env and for parsing the configuration file.
 *
 * Discovery order: explicit path, AUTO_CLEANUP_CONFIG, /etc/auto-cleanup/auto-cleanup.conf,
 * ./conf/auto-cleanup.conf.
 */

import fs from 'fs';
import path from 'path';
import dotenv from 'dotenv';
import type { ResourceKind } from '../cluster/cluster-client.interface';
import type { ExclusionPaths } from '../exclusions/exclusion-filter';
import type { TenantClass, TenantClassConfig } from '../policy/policy-resolver';
import { ConfigurationError } from '../utils/errors';
import { isLogLevel, type LogLevel } from './logger';
import { parseBool, parsePositiveInt } from './parsers';

dotenv.config();

export const DEFAULT_CONFIG_LOCATIONS = ['/etc/auto-cleanup/auto-cleanup.conf', path.resolve('conf', 'auto-cleanup.conf')];

export const DEFAULT_POD_BATCH_SIZE = 50;
export const DEFAULT_POD_MAX_CONCURRENCY = 4;
export const DEFAULT_DELETE_TIMEOUT_SECONDS = 60;
export const DEFAULT_DRAIN_TIMEOUT_SECONDS = 600;
export const DEFAULT_LOCK_FILE = '/var/run/auto-cleanup.lock';

export interface KindPolicy {
  /** Effective enable: the kind flag AND at least one of hard/soft. */
  enabled: boolean;
  hardEnabled: boolean;
  softEnabled: boolean;
}

export interface PodBatchConfig {
  batchSize: number;
  maxConcurrency: number;
  forceDelete: boolean;
  background: boolean;
}

export interface Config {
  configFile: string;

  kinds: Record<ResourceKind, KindPolicy>;
  tenants: TenantClassConfig[];
  namespacePattern: RegExp;

  podBatch: PodBatchConfig;
  timeouts: {
    callMs: number;
    drainMs: number;
  };

  exclusionFiles: ExclusionPaths;
  dryRun: boolean;
  lockFile: string;

  logging: {
    level: LogLevel;
    dir?: string;
  };
  metricsTextfile?: string;

  kubernetes: {
    kubeconfig?: string;
    context?: string;
  };
}

export type ConfigValues = Record<string, string | undefined>;

const TENANT_KEYS: Array<{ tenantClass: TenantClass; key: string; defaultPrefix: string }> = [
  { tenantClass: 'student', key: 'STUDENT', defaultPrefix: 'tenant-s' },
  { tenantClass: 'faculty', key: 'FACULTY', defaultPrefix: 'tenant-f' },
  { tenantClass: 'industry', key: 'INDUSTRY', defaultPrefix: 'tenant-i' },
];

export function findConfigFile(explicit?: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  if (explicit) {
    return explicit;
  }
  if (env.AUTO_CLEANUP_CONFIG) {
    return env.AUTO_CLEANUP_CONFIG;
  }
  return DEFAULT_CONFIG_LOCATIONS.find((location) => fs.existsSync(location));
}

export function loadConfig(options: { configFile?: string; env?: NodeJS.ProcessEnv } = {}): Config {
  const env = options.env ?? process.env;
  const configFile = findConfigFile(options.configFile, env);

  if (!configFile) {
    throw new ConfigurationError(
      `Configuration file not found in standard locations: ${DEFAULT_CONFIG_LOCATIONS.join(', ')}`
    );
  }

  let contents: string;
  try {
    contents = fs.readFileSync(configFile, 'utf8');
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read config file ${configFile}: ${reason}`);
  }

  // Environment wins over the file
  const values: ConfigValues = { ...dotenv.parse(contents), ...pickDefined(env) };
  return buildConfig(values, path.resolve(configFile));
}

export function buildConfig(values: ConfigValues, configFile: string): Config {
  const kinds: Record<ResourceKind, KindPolicy> = {
    controller: buildKindPolicy(values, 'CONTROLLER'),
    pod: buildKindPolicy(values, 'POD'),
    service: buildKindPolicy(values, 'SERVICE'),
  };

  const tenants: TenantClassConfig[] = TENANT_KEYS.map(({ tenantClass, key, defaultPrefix }) => ({
    tenantClass,
    prefix: nonEmpty(values[`${key}_PREFIX`]) ?? defaultPrefix,
    soft: nonEmpty(values[`${key}_SOFT`]),
    hard: nonEmpty(values[`${key}_HARD`]),
  }));

  const exclusionsDir = nonEmpty(values.EXCLUSIONS_DIR) ?? path.dirname(configFile);
  const level = (nonEmpty(values.LOG_LEVEL) ?? 'info').toLowerCase();
  if (!isLogLevel(level)) {
    throw new ConfigurationError(`Invalid LOG_LEVEL: '${values.LOG_LEVEL}' (expected debug, info, warn or error)`);
  }

  const config: Config = {
    configFile,
    kinds,
    tenants,
    namespacePattern: compilePattern(nonEmpty(values.NAMESPACE_PATTERN) ?? '^tenant-'),
    podBatch: {
      batchSize: parsePositiveInt(values.POD_BATCH_SIZE, DEFAULT_POD_BATCH_SIZE),
      maxConcurrency: parsePositiveInt(values.POD_MAX_CONCURRENCY, DEFAULT_POD_MAX_CONCURRENCY),
      forceDelete: parseBool(values.POD_FORCE_DELETE),
      background: values.POD_BACKGROUND_DELETE === undefined ? true : parseBool(values.POD_BACKGROUND_DELETE),
    },
    timeouts: {
      callMs: parsePositiveInt(values.DELETE_TIMEOUT_SECONDS, DEFAULT_DELETE_TIMEOUT_SECONDS) * 1000,
      drainMs: parsePositiveInt(values.DRAIN_TIMEOUT_SECONDS, DEFAULT_DRAIN_TIMEOUT_SECONDS) * 1000,
    },
    exclusionFiles: {
      namespaces: path.join(exclusionsDir, 'exclude_namespaces.txt'),
      controllers: path.join(exclusionsDir, 'exclude_deployments.txt'),
      pods: path.join(exclusionsDir, 'exclude_pods.txt'),
      services: path.join(exclusionsDir, 'exclude_services.txt'),
    },
    dryRun: parseBool(values.DRY_RUN),
    lockFile: nonEmpty(values.LOCK_FILE) ?? DEFAULT_LOCK_FILE,
    logging: {
      level,
      dir: nonEmpty(values.LOG_DIR),
    },
    metricsTextfile: nonEmpty(values.METRICS_TEXTFILE),
    kubernetes: {
      kubeconfig: nonEmpty(values.KUBECONFIG),
      context: nonEmpty(values.KUBE_CONTEXT),
    },
  };

  return Object.freeze(config);
}

/**
 * Both limits off disables the kind even when its CLEANUP flag is set.
 */
function buildKindPolicy(values: ConfigValues, key: string): KindPolicy {
  const hardEnabled = parseBool(values[`${key}_HARD_LIMIT`]);
  const softEnabled = parseBool(values[`${key}_SOFT_LIMIT`]);
  return {
    enabled: parseBool(values[`${key}_CLEANUP`]) && (hardEnabled || softEnabled),
    hardEnabled,
    softEnabled,
  };
}

function compilePattern(source: string): RegExp {
  try {
    return new RegExp(source);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Invalid NAMESPACE_PATTERN '${source}': ${reason}`);
  }
}

function nonEmpty(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

function pickDefined(env: NodeJS.ProcessEnv): ConfigValues {
  return Object.fromEntries(Object.entries(env).filter(([, value]) => value !== undefined));
}
