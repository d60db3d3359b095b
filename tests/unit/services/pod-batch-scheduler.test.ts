/**
 * PodBatchScheduler unit tests
 *
 * Partitioning, synchronous and background dispatch, failure handling.
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { DeletionResult } from '../../../src/cluster/cluster-client.interface';
import {
  groupByNamespace,
  partitionPodQueue,
  PodBatchScheduler,
  type FlushOptions,
  type PodDeleteRequest,
} from '../../../src/services/pod-batch-scheduler';
import { FakeClusterClient } from '../../helpers/fake-cluster-client';

function pods(namespace: string, count: number): PodDeleteRequest[] {
  return Array.from({ length: count }, (_, index) => ({ namespace, podName: `pod-${index}` }));
}

function deferred(): { promise: Promise<DeletionResult>; resolve: () => void } {
  let resolve: () => void = () => undefined;
  const promise = new Promise<DeletionResult>((r) => {
    resolve = () => r({ success: true });
  });
  return { promise, resolve };
}

const SYNC: FlushOptions = {
  batchSize: 50,
  maxConcurrency: 4,
  forceDelete: false,
  background: false,
  drainTimeoutMs: 1000,
};

describe('partitionPodQueue', () => {
  it('should split 80 + 50 pods into three chunks of at most 50', () => {
    const chunks = partitionPodQueue([...pods('tenant-s-a', 80), ...pods('tenant-s-b', 50)], 50);

    expect(chunks.map((chunk) => [chunk.namespace, chunk.pods.length])).toEqual([
      ['tenant-s-a', 50],
      ['tenant-s-a', 30],
      ['tenant-s-b', 50],
    ]);
    expect(chunks[0].pods[0]).toBe('pod-0');
    expect(chunks[1].pods[0]).toBe('pod-50');
  });

  it('should group interleaved entries by namespace in first-seen order', () => {
    const chunks = partitionPodQueue(
      [
        { namespace: 'tenant-s-b', podName: 'b1' },
        { namespace: 'tenant-s-a', podName: 'a1' },
        { namespace: 'tenant-s-b', podName: 'b2' },
      ],
      50
    );

    expect(chunks).toEqual([
      { namespace: 'tenant-s-b', pods: ['b1', 'b2'] },
      { namespace: 'tenant-s-a', pods: ['a1'] },
    ]);
  });

  it('should fall back to a batch size of 50 when given an invalid one', () => {
    expect(partitionPodQueue(pods('tenant-s-a', 120), 0).map((chunk) => chunk.pods.length)).toEqual([50, 50, 20]);
    expect(partitionPodQueue(pods('tenant-s-a', 60), -1).map((chunk) => chunk.pods.length)).toEqual([50, 10]);
  });
});

describe('groupByNamespace', () => {
  it('should drop entries without a namespace or pod name', () => {
    const groups = groupByNamespace([
      { namespace: '', podName: 'orphan' },
      { namespace: 'tenant-s-a', podName: ' ' },
      { namespace: 'tenant-s-a', podName: 'p1' },
    ]);

    expect([...groups.entries()]).toEqual([['tenant-s-a', ['p1']]]);
  });
});

describe('PodBatchScheduler', () => {
  let client: FakeClusterClient;
  let scheduler: PodBatchScheduler;

  beforeEach(() => {
    client = new FakeClusterClient();
    scheduler = new PodBatchScheduler(client, 1000);
  });

  function enqueueAll(entries: PodDeleteRequest[]): void {
    for (const { namespace, podName } of entries) {
      scheduler.enqueue(namespace, podName);
    }
  }

  it('should issue one delete call per chunk', async () => {
    enqueueAll([...pods('tenant-s-a', 80), ...pods('tenant-s-b', 50)]);

    const summary = await scheduler.flush(SYNC);

    expect(summary).toEqual({ pods: 130, chunks: 3, namespaces: 2, drained: true });
    expect(client.deleteResources).toHaveBeenCalledTimes(3);
    expect(scheduler.getStats()).toEqual({ chunksSucceeded: 3, chunksFailed: 0, podsDeleted: 130, podsFailed: 0 });
  });

  it('should dispatch chunks of one namespace in enqueue order', async () => {
    enqueueAll(pods('tenant-s-a', 120));

    await scheduler.flush(SYNC);

    const sizes = client.deleteResources.mock.calls.map(([, names]) => names.length);
    const firsts = client.deleteResources.mock.calls.map(([, names]) => names[0]);
    expect(sizes).toEqual([50, 50, 20]);
    expect(firsts).toEqual(['pod-0', 'pod-50', 'pod-100']);
  });

  it('should pass the force flag through as an immediate delete', async () => {
    scheduler.enqueue('tenant-s-a', 'p1');

    await scheduler.flush({ ...SYNC, forceDelete: true });

    expect(client.deleteResources).toHaveBeenCalledWith('pod', ['p1'], 'tenant-s-a', { forceImmediate: true });
  });

  it('should empty the queue even when a chunk fails', async () => {
    client.deleteResources.mockResolvedValueOnce({ success: false, error: 'HTTP 500' });
    enqueueAll([...pods('tenant-s-a', 80), ...pods('tenant-s-b', 50)]);

    await scheduler.flush(SYNC);

    expect(scheduler.size).toBe(0);
    expect(scheduler.getStats()).toEqual({ chunksSucceeded: 2, chunksFailed: 1, podsDeleted: 80, podsFailed: 50 });
  });

  it('should count a rejected call as a failed chunk', async () => {
    client.deleteResources.mockRejectedValueOnce(new Error('connection reset'));
    scheduler.enqueue('tenant-s-a', 'p1');

    await scheduler.flush(SYNC);

    expect(scheduler.getStats().chunksFailed).toBe(1);
  });

  it('should count a hung call as failed once the call timeout passes', async () => {
    scheduler = new PodBatchScheduler(client, 20);
    client.deleteResources.mockImplementationOnce(() => new Promise<DeletionResult>(() => undefined));
    scheduler.enqueue('tenant-s-a', 'p1');

    const summary = await scheduler.flush(SYNC);

    expect(summary.drained).toBe(true);
    expect(scheduler.getStats()).toEqual({ chunksSucceeded: 0, chunksFailed: 1, podsDeleted: 0, podsFailed: 1 });
  });

  it('should stop waiting at the drain timeout in synchronous mode', async () => {
    scheduler = new PodBatchScheduler(client, 100);
    client.deleteResources.mockImplementationOnce(() => new Promise<DeletionResult>(() => undefined));
    scheduler.enqueue('tenant-s-a', 'p1');

    const summary = await scheduler.flush({ ...SYNC, drainTimeoutMs: 10 });

    expect(summary.drained).toBe(false);
    expect(scheduler.size).toBe(0);
  });

  it('should wait for each chunk before the next in a namespace while namespaces run in parallel', async () => {
    const finish: Array<() => void> = [];
    client.deleteResources.mockImplementation(
      () =>
        new Promise<DeletionResult>((resolve) => {
          finish.push(() => resolve({ success: true }));
        })
    );
    enqueueAll([...pods('tenant-s-a', 120), ...pods('tenant-s-b', 1)]);

    const flushing = scheduler.flush(SYNC);

    await vi.waitFor(() => expect(client.deleteResources).toHaveBeenCalledTimes(2));
    expect(client.deleteResources.mock.calls.map(([, names, namespace]) => [namespace, names[0]])).toEqual([
      ['tenant-s-a', 'pod-0'],
      ['tenant-s-b', 'pod-0'],
    ]);

    finish[0]();
    await vi.waitFor(() => expect(client.deleteResources).toHaveBeenCalledTimes(3));
    expect(client.deleteResources.mock.calls[2][2]).toBe('tenant-s-a');
    expect(client.deleteResources.mock.calls[2][1][0]).toBe('pod-50');

    finish[1]();
    finish[2]();
    await vi.waitFor(() => expect(client.deleteResources).toHaveBeenCalledTimes(4));
    expect(client.deleteResources.mock.calls[3][1][0]).toBe('pod-100');

    finish[3]();
    await expect(flushing).resolves.toEqual({ pods: 121, chunks: 4, namespaces: 2, drained: true });
  });

  it('should let settle wait for a synchronous flush that outlived the drain timeout', async () => {
    const gate = deferred();
    client.deleteResources.mockImplementation(() => gate.promise);
    scheduler.enqueue('tenant-s-a', 'p1');

    const summary = await scheduler.flush({ ...SYNC, drainTimeoutMs: 10 });

    expect(summary.drained).toBe(false);
    await expect(scheduler.settle(10)).resolves.toBe(false);

    const settling = scheduler.settle(1000);
    gate.resolve();
    await expect(settling).resolves.toBe(true);
    expect(scheduler.getStats().chunksSucceeded).toBe(1);
  });

  it('should return from a background flush before deletions finish', async () => {
    const gate = deferred();
    client.deleteResources.mockImplementation(() => gate.promise);
    scheduler.enqueue('tenant-s-a', 'p1');

    const summary = await scheduler.flush({ ...SYNC, background: true });

    expect(summary.drained).toBe(false);
    expect(scheduler.getStats().chunksSucceeded).toBe(0);

    gate.resolve();
    await expect(scheduler.settle(1000)).resolves.toBe(true);
    expect(scheduler.getStats()).toEqual({ chunksSucceeded: 1, chunksFailed: 0, podsDeleted: 1, podsFailed: 0 });
  });

  it('should keep at most maxConcurrency batches in flight', async () => {
    const gate = deferred();
    client.deleteResources.mockImplementation(() => gate.promise);
    for (const namespace of ['tenant-s-a', 'tenant-s-b', 'tenant-s-c', 'tenant-s-d']) {
      scheduler.enqueue(namespace, 'p1');
    }

    await scheduler.flush({ ...SYNC, background: true, maxConcurrency: 2 });

    expect(client.deleteResources).toHaveBeenCalledTimes(2);

    gate.resolve();
    await vi.waitFor(() => expect(client.deleteResources).toHaveBeenCalledTimes(4));
    await expect(scheduler.settle(1000)).resolves.toBe(true);
  });

  it('should report false from settle when background batches outlive the deadline', async () => {
    scheduler = new PodBatchScheduler(client, 100);
    client.deleteResources.mockImplementationOnce(() => new Promise<DeletionResult>(() => undefined));
    scheduler.enqueue('tenant-s-a', 'p1');

    await scheduler.flush({ ...SYNC, background: true });

    await expect(scheduler.settle(10)).resolves.toBe(false);
  });

  it('should not call the cluster in a dry run', async () => {
    enqueueAll(pods('tenant-s-a', 3));

    const summary = await scheduler.flush({ ...SYNC, dryRun: true });

    expect(summary).toEqual({ pods: 3, chunks: 1, namespaces: 1, drained: true });
    expect(client.deleteResources).not.toHaveBeenCalled();
    expect(scheduler.size).toBe(0);
  });

  it('should do nothing when the queue is empty', async () => {
    const summary = await scheduler.flush(SYNC);

    expect(summary).toEqual({ pods: 0, chunks: 0, namespaces: 0, drained: true });
    expect(client.deleteResources).not.toHaveBeenCalled();
  });
});
