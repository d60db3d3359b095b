/**
 * ExclusionFilter
 *
 * Four exact-match name sets loaded once per run from line-oriented files.
 * A namespace in the namespace list protects every resource in it; the
 * per-kind lists protect individual resources by name. Matching is
 * case-sensitive with no globbing.
 */

import { readFile } from 'fs/promises';
import type { ResourceKind } from '../cluster/cluster-client.interface';
import { ConfigurationError } from '../utils/errors';
import { logger } from '../config/logger';

export interface ExclusionPaths {
  namespaces: string;
  controllers: string;
  pods: string;
  services: string;
}

export interface ExclusionSet {
  namespaces: ReadonlySet<string>;
  controllers: ReadonlySet<string>;
  pods: ReadonlySet<string>;
  services: ReadonlySet<string>;
}

/**
 * One name per line; `#` starts a comment, surrounding whitespace and blank lines are dropped.
 */
export function parseExclusionList(contents: string): string[] {
  const names: string[] = [];
  for (const rawLine of contents.split(/\r?\n/)) {
    const commentStart = rawLine.indexOf('#');
    const line = (commentStart === -1 ? rawLine : rawLine.slice(0, commentStart)).trim();
    if (line) {
      names.push(line);
    }
  }
  return names;
}

async function readList(filePath: string): Promise<Set<string>> {
  try {
    return new Set(parseExclusionList(await readFile(filePath, 'utf8')));
  } catch (error) {
    if (isNotFound(error)) {
      logger.debug('ExclusionFilter: Exclusion file not found, treating as empty', { file: filePath });
      return new Set();
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigurationError(`Failed to read exclusion file ${filePath}: ${reason}`);
  }
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export async function loadExclusions(paths: ExclusionPaths): Promise<ExclusionSet> {
  const [namespaces, controllers, pods, services] = await Promise.all([
    readList(paths.namespaces),
    readList(paths.controllers),
    readList(paths.pods),
    readList(paths.services),
  ]);

  logger.info('ExclusionFilter: Loaded exclusions', {
    namespaces: namespaces.size,
    controllers: controllers.size,
    pods: pods.size,
    services: services.size,
  });

  return { namespaces, controllers, pods, services };
}

export class ExclusionFilter {
  constructor(private readonly exclusions: ExclusionSet) {}

  static empty(): ExclusionFilter {
    return new ExclusionFilter({
      namespaces: new Set(),
      controllers: new Set(),
      pods: new Set(),
      services: new Set(),
    });
  }

  isNamespaceExcluded(namespace: string): boolean {
    return this.exclusions.namespaces.has(namespace);
  }

  isNameExcluded(kind: ResourceKind, name: string): boolean {
    switch (kind) {
      case 'controller':
        return this.exclusions.controllers.has(name);
      case 'pod':
        return this.exclusions.pods.has(name);
      case 'service':
        return this.exclusions.services.has(name);
      default:
        return false;
    }
  }

  isExcluded(kind: ResourceKind, name: string, namespace: string): boolean {
    return this.isNamespaceExcluded(namespace) || this.isNameExcluded(kind, name);
  }
}
