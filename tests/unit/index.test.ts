/**
 * CLI entry point tests
 *
 * main() runs against a temp configuration and the in-memory cluster.
 */

import fs from 'fs';
import os from 'os';
import path from 'path';
import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { main, parseCliArgs, readVersion, USAGE } from '../../src/index';
import { FakeClusterClient } from '../helpers/fake-cluster-client';

const DAY_MS = 24 * 60 * 60 * 1000;

describe('parseCliArgs', () => {
  it('should read short and long flags', () => {
    expect(parseCliArgs(['-q', '--dry-run', '-c', '/tmp/test.conf'])).toEqual({
      help: false,
      version: false,
      quiet: true,
      dryRun: true,
      config: '/tmp/test.conf',
    });
  });

  it('should reject unknown options', () => {
    expect(() => parseCliArgs(['--force'])).toThrow();
  });
});

describe('main', () => {
  let dir: string;
  let configFile: string;
  let client: FakeClusterClient;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'auto-cleanup-cli-'));
    configFile = path.join(dir, 'auto-cleanup.conf');
    fs.writeFileSync(
      configFile,
      [
        'CONTROLLER_CLEANUP=true',
        'CONTROLLER_HARD_LIMIT=true',
        'STUDENT_SOFT=1D',
        'STUDENT_HARD=36H',
        `LOCK_FILE=${path.join(dir, 'auto-cleanup.lock')}`,
        `METRICS_TEXTFILE=${path.join(dir, 'auto_cleanup.prom')}`,
        '',
      ].join('\n')
    );
    fs.writeFileSync(path.join(dir, 'exclude_deployments.txt'), 'keep\n');

    const created = new Date(Date.now() - 3 * DAY_MS);
    client = new FakeClusterClient().add(
      { kind: 'controller', namespace: 'tenant-s-alice', name: 'web', creationTimestamp: created },
      { kind: 'controller', namespace: 'tenant-s-alice', name: 'keep', creationTimestamp: created }
    );
    vi.spyOn(console, 'log').mockImplementation(() => undefined);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('should print usage for --help without running', async () => {
    await expect(main(['--help'], { createClient: () => client })).resolves.toBe(0);

    expect(console.log).toHaveBeenCalledWith(USAGE);
    expect(client.listResources).not.toHaveBeenCalled();
  });

  it('should print the package version for --version', async () => {
    await expect(main(['-v'])).resolves.toBe(0);

    expect(console.log).toHaveBeenCalledWith(readVersion());
    expect(readVersion()).toBe('1.0.0');
  });

  it('should exit 1 on an unknown option', async () => {
    await expect(main(['--everything'])).resolves.toBe(1);
  });

  it('should exit 1 when the configuration cannot be loaded', async () => {
    await expect(main(['--config', path.join(dir, 'missing.conf')], { env: {} })).resolves.toBe(1);
  });

  it('should run a full cleanup and exit 0', async () => {
    const code = await main(['--config', configFile], { env: {}, createClient: () => client });

    expect(code).toBe(0);
    expect(client.deleteResource).toHaveBeenCalledTimes(1);
    expect(client.deleteResource).toHaveBeenCalledWith('controller', 'web', 'tenant-s-alice', {
      forceImmediate: false,
    });
    expect(fs.existsSync(path.join(dir, 'auto-cleanup.lock'))).toBe(false);
    expect(fs.existsSync(path.join(dir, 'auto_cleanup.prom'))).toBe(true);
  });

  it('should exit 0 even when individual deletions fail', async () => {
    client.deleteResource.mockResolvedValue({ success: false, error: 'HTTP 500' });

    await expect(main(['--config', configFile], { env: {}, createClient: () => client })).resolves.toBe(0);
  });

  it('should not delete anything with --dry-run', async () => {
    await expect(main(['--config', configFile, '--dry-run'], { env: {}, createClient: () => client })).resolves.toBe(0);

    expect(client.deleteResource).not.toHaveBeenCalled();
  });

  it('should exit 1 without touching the cluster when another run holds the lock', async () => {
    fs.writeFileSync(path.join(dir, 'auto-cleanup.lock'), `${process.ppid}\n`);

    await expect(main(['--config', configFile], { env: {}, createClient: () => client })).resolves.toBe(1);

    expect(client.listResources).not.toHaveBeenCalled();
    expect(fs.readFileSync(path.join(dir, 'auto-cleanup.lock'), 'utf8')).toBe(`${process.ppid}\n`);
  });

  it('should exit 1 when a matched tenant class is misconfigured', async () => {
    client.add({ kind: 'controller', namespace: 'tenant-f-bob', name: 'api', creationTimestamp: new Date(0) });

    await expect(main(['--config', configFile], { env: {}, createClient: () => client })).resolves.toBe(1);

    expect(client.deleteResource).not.toHaveBeenCalled();
  });
});
