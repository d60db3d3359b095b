#!/usr/bin/env node
/**
 * Cluster Auto-Cleanup
 *
 * Main entry point. One invocation performs one cleanup run and exits (cron job mode).
 *
 * Exit status:
 *   0  the run completed, whatever happened to individual deletions
 *   1  lock contention, configuration errors, or any other fatal error
 */

import fs from 'fs';
import path from 'path';
import { parseArgs } from 'util';
import { v4 as uuidv4 } from 'uuid';
import type { ClusterClient, ResourceKind } from './cluster/cluster-client.interface';
import { KubernetesClusterClient } from './cluster/kubernetes-client';
import { loadConfig, type Config } from './config';
import { configureLogger, logger } from './config/logger';
import { ExclusionFilter, loadExclusions } from './exclusions/exclusion-filter';
import { ExecutionLock, withExecutionLock } from './lock/execution-lock';
import { lastRunTimestamp, writeMetricsTextfile } from './metrics/cleanup-metrics';
import { PolicyResolver } from './policy/policy-resolver';
import { CleanupOrchestrator, type RunSummary } from './services/cleanup-orchestrator';
import { DecisionEngine } from './services/decision-engine';
import { PodBatchScheduler } from './services/pod-batch-scheduler';
import type { CleanupStrategy } from './strategies/cleanup-strategy.interface';
import { ImmediateDeleteStrategy } from './strategies/immediate-delete.strategy';
import { PodCleanupStrategy } from './strategies/pod-cleanup.strategy';
import { describeError, LockContentionError } from './utils/errors';
import { withTimeout } from './utils/timeout';

export const USAGE = `Usage: auto-cleanup [options]

Deletes aged Deployments, standalone Pods and Services from tenant namespaces.

Options:
  -c, --config <file>  Configuration file (default: /etc/auto-cleanup/auto-cleanup.conf,
                       then ./conf/auto-cleanup.conf)
      --dry-run        Log decisions without deleting anything
  -q, --quiet          Only print warnings and errors to the console
  -v, --version        Show version
  -h, --help           Show this help message`;

export interface CliOptions {
  help: boolean;
  version: boolean;
  quiet: boolean;
  dryRun: boolean;
  config?: string;
}

export interface MainDependencies {
  env?: NodeJS.ProcessEnv;
  createClient?: (config: Config) => ClusterClient;
}

/**
 * @throws TypeError on unknown options or a missing option value
 */
export function parseCliArgs(argv: string[]): CliOptions {
  const { values } = parseArgs({
    args: argv,
    options: {
      help: { type: 'boolean', short: 'h' },
      version: { type: 'boolean', short: 'v' },
      quiet: { type: 'boolean', short: 'q' },
      config: { type: 'string', short: 'c' },
      'dry-run': { type: 'boolean' },
    },
    strict: true,
    allowPositionals: false,
  });

  return {
    help: values.help ?? false,
    version: values.version ?? false,
    quiet: values.quiet ?? false,
    dryRun: values['dry-run'] ?? false,
    config: values.config,
  };
}

export function readVersion(): string {
  const pkg: unknown = JSON.parse(fs.readFileSync(path.join(__dirname, '..', 'package.json'), 'utf8'));
  if (typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return 'unknown';
}

function createKubernetesClient(config: Config): ClusterClient {
  return new KubernetesClusterClient(config.kubernetes);
}

/**
 * Wires the run from configuration and executes it. The caller holds the lock.
 */
export async function runCleanup(config: Config, client: ClusterClient, dryRun: boolean): Promise<RunSummary> {
  const callTimeoutMs = config.timeouts.callMs;
  const exclusions = new ExclusionFilter(await loadExclusions(config.exclusionFiles));
  const resolver = new PolicyResolver(config.tenants);
  const engine = new DecisionEngine(exclusions, (kind, name, namespace, key) =>
    withTimeout(client.getLabel(kind, name, namespace, key), callTimeoutMs, `Read label ${key} of ${kind} ${namespace}/${name}`)
  );
  const scheduler = new PodBatchScheduler(client, callTimeoutMs);

  const strategies = new Map<ResourceKind, CleanupStrategy>([
    ['controller', new ImmediateDeleteStrategy('controller', client, engine, config.kinds.controller, callTimeoutMs)],
    ['pod', new PodCleanupStrategy(client, engine, exclusions, scheduler, config.kinds.pod, callTimeoutMs)],
    ['service', new ImmediateDeleteStrategy('service', client, engine, config.kinds.service, callTimeoutMs)],
  ]);

  const orchestrator = new CleanupOrchestrator(client, resolver, scheduler, strategies, {
    kinds: config.kinds,
    namespacePattern: config.namespacePattern,
    podBatch: config.podBatch,
    callTimeoutMs,
    drainTimeoutMs: config.timeouts.drainMs,
  });

  return orchestrator.executeAll(dryRun);
}

export async function main(argv: string[] = process.argv.slice(2), deps: MainDependencies = {}): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (error) {
    console.error(`${describeError(error)}\n\n${USAGE}`);
    return 1;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }
  if (options.version) {
    console.log(readVersion());
    return 0;
  }

  let config: Config;
  try {
    config = loadConfig({ configFile: options.config, env: deps.env });
  } catch (error) {
    logger.error('AutoCleanup: Failed to load configuration', { error: describeError(error) });
    return 1;
  }

  const runId = uuidv4();
  configureLogger({ level: config.logging.level, quiet: options.quiet, logDir: config.logging.dir, runId });
  const dryRun = options.dryRun || config.dryRun;

  logger.info('AutoCleanup: Starting cleanup run', {
    configFile: config.configFile,
    dryRun,
    lockFile: config.lockFile,
  });

  let summary: RunSummary;
  try {
    const client = (deps.createClient ?? createKubernetesClient)(config);
    summary = await withExecutionLock(new ExecutionLock(config.lockFile), () => runCleanup(config, client, dryRun));
  } catch (error) {
    if (error instanceof LockContentionError) {
      logger.error(`AutoCleanup: ${error.message}`, { lockFile: error.lockPath, holderPid: error.holderPid });
      return 1;
    }
    logger.error('AutoCleanup: Cleanup run failed', {
      error: describeError(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    return 1;
  }

  lastRunTimestamp.set(summary.completedAt.getTime() / 1000);
  if (config.metricsTextfile) {
    try {
      await writeMetricsTextfile(config.metricsTextfile);
    } catch (error) {
      logger.warn('AutoCleanup: Failed to write metrics textfile', {
        file: config.metricsTextfile,
        error: describeError(error),
      });
    }
  }

  logger.info('AutoCleanup: Cleanup run complete', {
    dryRun: summary.dryRun,
    durationMs: summary.completedAt.getTime() - summary.startedAt.getTime(),
    podsDeleted: summary.dispatch.podsDeleted,
    podsFailed: summary.dispatch.podsFailed,
  });
  return 0;
}

if (require.main === module) {
  void main().then((code) => process.exit(code));
}
