/**
 * Kubernetes Cluster Client
 *
 * ClusterClient backed by @kubernetes/client-node. Listing is cluster-wide and
 * paginated; the namespace pattern is applied client-side.
 *
 * The API has no multi-name pod delete, so a batch is issued as concurrent
 * single-pod deletes and reported as one result.
 */

import * as k8s from '@kubernetes/client-node';
import type {
  ClusterClient,
  DeleteOptions,
  DeletionResult,
  OwnerReference,
  ResourceKind,
  ResourceListing,
} from './cluster-client.interface';
import { describeError } from '../utils/errors';
import { logger } from '../config/logger';

const LIST_PAGE_SIZE = 500;

export interface KubernetesClientOptions {
  kubeconfig?: string;
  context?: string;
}

interface ListPage {
  items: Array<{ metadata?: k8s.V1ObjectMeta }>;
  continueToken?: string;
}

export class KubernetesClusterClient implements ClusterClient {
  private readonly coreApi: k8s.CoreV1Api;
  private readonly appsApi: k8s.AppsV1Api;

  constructor(options: KubernetesClientOptions = {}) {
    const kc = new k8s.KubeConfig();

    if (options.kubeconfig) {
      kc.loadFromFile(options.kubeconfig);
    } else {
      kc.loadFromDefault();
    }

    if (options.context) {
      kc.setCurrentContext(options.context);
    }

    this.coreApi = kc.makeApiClient(k8s.CoreV1Api);
    this.appsApi = kc.makeApiClient(k8s.AppsV1Api);

    logger.debug('KubernetesClusterClient: Initialized', {
      context: kc.getCurrentContext(),
    });
  }

  async listResources(kind: ResourceKind, namespacePattern: RegExp): Promise<ResourceListing[]> {
    const listings: ResourceListing[] = [];
    let continueToken: string | undefined;

    do {
      const page = await this.listPage(kind, continueToken);
      for (const item of page.items) {
        const namespace = item.metadata?.namespace;
        const name = item.metadata?.name;
        if (!namespace || !name || !namespacePattern.test(namespace)) {
          continue;
        }
        listings.push({ namespace, name, creationTimestamp: item.metadata?.creationTimestamp });
      }
      continueToken = page.continueToken;
    } while (continueToken);

    return listings;
  }

  async getLabel(kind: ResourceKind, name: string, namespace: string, key: string): Promise<string | undefined> {
    const metadata = await this.readMetadata(kind, name, namespace);
    return metadata?.labels?.[key];
  }

  async getOwnerReferences(kind: 'pod', name: string, namespace: string): Promise<OwnerReference[]> {
    const metadata = await this.readMetadata(kind, name, namespace);
    return (metadata?.ownerReferences ?? []).map((ref) => ({
      kind: ref.kind,
      name: ref.name,
      uid: ref.uid,
      controller: ref.controller,
    }));
  }

  async deleteResource(
    kind: ResourceKind,
    name: string,
    namespace: string,
    options: DeleteOptions
  ): Promise<DeletionResult> {
    const gracePeriodSeconds = options.forceImmediate ? 0 : undefined;

    try {
      switch (kind) {
        case 'controller':
          // Background propagation removes the ReplicaSets and their pods as well
          await this.appsApi.deleteNamespacedDeployment(
            name,
            namespace,
            undefined,
            undefined,
            gracePeriodSeconds,
            undefined,
            'Background'
          );
          break;
        case 'pod':
          await this.coreApi.deleteNamespacedPod(name, namespace, undefined, undefined, gracePeriodSeconds);
          break;
        case 'service':
          await this.coreApi.deleteNamespacedService(name, namespace, undefined, undefined, gracePeriodSeconds);
          break;
      }
      return { success: true };
    } catch (error) {
      return { success: false, error: this.formatApiError(error) };
    }
  }

  async deleteResources(
    kind: 'pod',
    names: string[],
    namespace: string,
    options: DeleteOptions
  ): Promise<DeletionResult> {
    const results = await Promise.all(
      names.map(async (name) => ({ name, result: await this.deleteResource(kind, name, namespace, options) }))
    );

    const failures = results.flatMap(({ name, result }) => (result.success ? [] : [`${name}: ${result.error}`]));
    if (failures.length > 0) {
      return { success: false, error: failures.join('; ') };
    }
    return { success: true };
  }

  private async listPage(kind: ResourceKind, continueToken: string | undefined): Promise<ListPage> {
    switch (kind) {
      case 'controller': {
        const { body } = await this.appsApi.listDeploymentForAllNamespaces(
          undefined,
          continueToken,
          undefined,
          undefined,
          LIST_PAGE_SIZE
        );
        return { items: body.items, continueToken: body.metadata?._continue };
      }
      case 'pod': {
        const { body } = await this.coreApi.listPodForAllNamespaces(
          undefined,
          continueToken,
          undefined,
          undefined,
          LIST_PAGE_SIZE
        );
        return { items: body.items, continueToken: body.metadata?._continue };
      }
      case 'service': {
        const { body } = await this.coreApi.listServiceForAllNamespaces(
          undefined,
          continueToken,
          undefined,
          undefined,
          LIST_PAGE_SIZE
        );
        return { items: body.items, continueToken: body.metadata?._continue };
      }
    }
  }

  private async readMetadata(
    kind: ResourceKind,
    name: string,
    namespace: string
  ): Promise<k8s.V1ObjectMeta | undefined> {
    switch (kind) {
      case 'controller':
        return (await this.appsApi.readNamespacedDeployment(name, namespace)).body.metadata;
      case 'pod':
        return (await this.coreApi.readNamespacedPod(name, namespace)).body.metadata;
      case 'service':
        return (await this.coreApi.readNamespacedService(name, namespace)).body.metadata;
    }
  }

  private formatApiError(error: unknown): string {
    if (error instanceof k8s.HttpError) {
      return `HTTP ${error.statusCode ?? 'unknown'}: ${error.message}`;
    }
    return describeError(error);
  }
}
