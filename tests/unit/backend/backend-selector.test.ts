import { beforeEach, describe, expect, it } from 'vitest';
import { BackendSelector } from '../../../src/backend/backend-selector.js';
import type { TransportFactories } from '../../../src/backend/backend-selector.js';
import { createDefaultConfig, mergeWithDefaults } from '../../../src/default-config.js';
import { JobTracker } from '../../../src/jobs/job-tracker.js';
import type { AppConfig } from '../../../src/types/index.js';
import { BackendUnavailableError, NoBackendAvailableError } from '../../../src/utils/error-utils.js';
import { FakeTransport } from '../../helpers/fake-transport.js';

describe('BackendSelector', () => {
  let jobs: JobTracker;
  let rpc: FakeTransport;
  let cli: FakeTransport;
  let created: string[];

  function factories(options: { rpcConfigured?: boolean } = {}): TransportFactories {
    return {
      createRpc: () => {
        if (options.rpcConfigured === false) {
          return null;
        }
        created.push('rpc');
        return rpc;
      },
      createCli: () => {
        created.push('cli');
        return cli;
      },
    };
  }

  function selector(config: AppConfig = createDefaultConfig(), options: { rpcConfigured?: boolean } = {}) {
    return new BackendSelector(config, jobs, factories(options));
  }

  beforeEach(() => {
    jobs = new JobTracker();
    rpc = new FakeTransport('rpc', jobs);
    cli = new FakeTransport('cli', jobs, ['list', 'diff', 'restore', 'health']);
    created = [];
  });

  it('should prefer the remote backend when its probe succeeds', async () => {
    const handle = await selector().select();

    expect(handle.kind).toBe('rpc');
    expect(handle.reason).toBe('probe');
    expect(handle.transport).toBe(rpc);
    expect(created).toEqual(['rpc']);
    expect(handle.attempts.map((attempt) => [attempt.backend, attempt.ok])).toEqual([['rpc', true]]);
  });

  it('should fall back to the local tools and dispose the failed transport', async () => {
    rpc.probeError = new BackendUnavailableError('connection refused');

    const handle = await selector().select();

    expect(handle.kind).toBe('cli');
    expect(rpc.disposed).toBe(true);
    expect(handle.attempts).toHaveLength(2);
    expect(handle.attempts[0]).toMatchObject({
      backend: 'rpc',
      ok: false,
      error: { kind: 'BackendUnavailable', message: 'connection refused', retryable: true },
    });
    expect(handle.capabilities.has('jobs')).toBe(false);
  });

  it('should skip an unconfigured remote backend without probing it', async () => {
    const handle = await selector(createDefaultConfig(), { rpcConfigured: false }).select();

    expect(handle.kind).toBe('cli');
    expect(rpc.calls).toEqual([]);
    expect(handle.attempts.map((attempt) => attempt.backend)).toEqual(['cli']);
  });

  it('should use an explicit backend without probing', async () => {
    const handle = await selector(mergeWithDefaults({ backend: 'cli' })).select();

    expect(handle.kind).toBe('cli');
    expect(handle.reason).toBe('override');
    expect(cli.calls).toEqual([]);
    expect(created).toEqual(['cli']);
  });

  it('should fail when the requested backend is not configured', async () => {
    const target = selector(mergeWithDefaults({ backend: 'rpc' }), { rpcConfigured: false });

    await expect(target.select()).rejects.toBeInstanceOf(NoBackendAvailableError);
    expect(target.getBackendInfo().status).toBe('unavailable');
  });

  it('should report every failed attempt when no backend is available', async () => {
    rpc.probeError = new BackendUnavailableError('connection refused');
    cli.probeError = new BackendUnavailableError('zfs was not found on PATH');
    const target = selector();

    const error = await target.select().catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(NoBackendAvailableError);
    expect(error).toMatchObject({ message: 'No backend is available (tried: rpc, cli)' });
    expect(cli.disposed).toBe(true);

    const info = target.getBackendInfo();
    expect(info.status).toBe('unavailable');
    expect(info.backend).toBeNull();
    expect(info.error?.kind).toBe('NoBackendAvailable');
    expect(info.attempts.map((attempt) => attempt.ok)).toEqual([false, false]);
  });

  it('should select once and share the result between callers', async () => {
    const target = selector();

    const [first, second] = await Promise.all([target.select(), target.select()]);

    expect(first).toBe(second);
    expect(rpc.calls).toEqual(['probe']);
  });

  it('should describe the selection', async () => {
    const target = selector();
    expect(target.getBackendInfo().status).toBe('pending');

    await target.select();
    const info = target.getBackendInfo();

    expect(info.status).toBe('selected');
    expect(info.backend).toBe('rpc');
    expect(info.capabilities).toEqual(['list', 'diff', 'restore', 'jobs', 'cancel', 'health']);
    expect(info.reason).toBe('probe');
  });
});
