/**
 * Cluster Client Interface
 *
 * The narrow set of read and delete operations the cleanup engine needs from the
 * cluster. The production implementation wraps @kubernetes/client-node; tests
 * provide an in-memory fake.
 */

export const RESOURCE_KINDS = ['controller', 'pod', 'service'] as const;

/**
 * controller = Deployment.
 */
export type ResourceKind = (typeof RESOURCE_KINDS)[number];

export interface ResourceListing {
  namespace: string;
  name: string;
  creationTimestamp?: Date | string;
}

export interface OwnerReference {
  kind: string;
  name: string;
  uid?: string;
  controller?: boolean;
}

export interface DeleteOptions {
  /** Skip graceful termination (grace period 0). */
  forceImmediate: boolean;
}

export type DeletionResult = { success: true } | { success: false; error: string };

export interface ClusterClient {
  listResources(kind: ResourceKind, namespacePattern: RegExp): Promise<ResourceListing[]>;
  getLabel(kind: ResourceKind, name: string, namespace: string, key: string): Promise<string | undefined>;
  getOwnerReferences(kind: 'pod', name: string, namespace: string): Promise<OwnerReference[]>;
  deleteResource(kind: ResourceKind, name: string, namespace: string, options: DeleteOptions): Promise<DeletionResult>;
  deleteResources(kind: 'pod', names: string[], namespace: string, options: DeleteOptions): Promise<DeletionResult>;
}
