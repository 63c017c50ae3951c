import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { createDefaultConfig } from '../../../src/default-config.js';
import { JobTracker } from '../../../src/jobs/job-tracker.js';
import { CliTransport } from '../../../src/transports/cli-transport.js';
import { FIND_FORMAT } from '../../../src/transports/zfs-commands.js';
import type { RestoreRequest } from '../../../src/transports/types.js';
import type { CommandResult, CommandRunner } from '../../../src/utils/platform/command-runner.js';
import type { ExecutableManager } from '../../../src/utils/platform/executable-manager.js';
import { BackendError, BackendUnavailableError, TimeoutError } from '../../../src/utils/error-utils.js';
import { makeDataset } from '../../helpers/fixtures.js';

interface RecordedCommand {
  command: string;
  args: readonly string[];
}

interface RecordedOptions {
  command: string;
  timeoutMs: number;
}

function result(overrides: Partial<CommandResult> = {}): CommandResult {
  return { exitCode: 0, signal: null, stdout: '', stderr: '', durationMs: 12, ...overrides };
}

class FakeRunner {
  calls: RecordedCommand[] = [];
  options: RecordedOptions[] = [];
  responses = new Map<string, CommandResult>();
  failure: Error | null = null;

  readonly run: CommandRunner = async (command, args, options) => {
    this.calls.push({ command, args });
    this.options.push({ command, timeoutMs: options.timeoutMs });
    if (this.failure) {
      throw this.failure;
    }
    return this.responses.get(command) ?? result();
  };
}

function fakeExecutables(found: boolean): ExecutableManager {
  return {
    find: async (executable) => ({ path: found ? `/usr/sbin/${executable}` : '', exists: found }),
  };
}

const dataset = makeDataset({ backend: 'cli' });

function restoreRequest(overrides: Partial<RestoreRequest> = {}): RestoreRequest {
  return {
    dataset,
    snapshot: 'daily',
    sourcePath: '/mnt/tank/data/.zfs/snapshot/daily/report.txt',
    destinationPath: '/mnt/tank/data/restored/report.txt',
    overwrite: false,
    ...overrides,
  };
}

describe('CliTransport', () => {
  let runner: FakeRunner;
  let jobs: JobTracker;
  let transport: CliTransport;

  beforeEach(() => {
    runner = new FakeRunner();
    jobs = new JobTracker();
    transport = new CliTransport(createDefaultConfig().cli, jobs, {
      runner: runner.run,
      executables: fakeExecutables(true),
    });
  });

  afterEach(() => {
    jobs.dispose();
  });

  describe('discovery', () => {
    it('should list datasets with the storage tool', async () => {
      runner.responses.set('zfs', result({ stdout: 'tank/data\t/mnt/tank/data\n' }));

      const datasets = await transport.listDatasets();

      expect(runner.calls).toEqual([
        { command: 'zfs', args: ['list', '-H', '-p', '-t', 'filesystem', '-o', 'name,mountpoint'] },
      ]);
      expect(datasets).toEqual([dataset]);
    });

    it('should list direct snapshots of one dataset', async () => {
      runner.responses.set('zfs', result({ stdout: 'tank/data@daily\t1704067200\n' }));

      const snapshots = await transport.listSnapshots(dataset);

      expect(runner.calls[0]?.args).toEqual([
        'list', '-H', '-p', '-t', 'snapshot', '-d', '1', '-o', 'name,creation', 'tank/data',
      ]);
      expect(snapshots.map((snapshot) => snapshot.id)).toEqual(['daily']);
    });

    it('should list a directory inside the snapshot view', async () => {
      runner.responses.set('find', result({ stdout: 'f\t10\t1700000000.0000000000\treport.txt\n' }));

      const entries = await transport.listEntries(dataset, 'daily', 'docs');

      expect(runner.calls).toEqual([
        {
          command: 'find',
          args: ['/mnt/tank/data/.zfs/snapshot/daily/docs', '-mindepth', '1', '-maxdepth', '1', '-printf', FIND_FORMAT],
        },
      ]);
      expect(entries).toEqual([
        { path: 'docs/report.txt', name: 'report.txt', kind: 'file', size: 10, modifiedAt: 1700000000000 },
      ]);
    });

    it('should raise a backend error with the first stderr line on a non-zero exit', async () => {
      runner.responses.set('zfs', result({ exitCode: 1, stderr: 'cannot open pool\nmore detail\n' }));

      const error = await transport.listDatasets().catch((caught: unknown) => caught);

      expect(error).toBeInstanceOf(BackendError);
      expect(error).toMatchObject({ message: 'zfs list: cannot open pool', exitCode: 1 });
    });
  });

  describe('restore', () => {
    it('should copy without overwriting and report a finished job', async () => {
      const job = await transport.submitRestore(restoreRequest());

      expect(runner.calls).toEqual([
        {
          command: 'cp',
          args: ['-a', '-n', '--', '/mnt/tank/data/.zfs/snapshot/daily/report.txt', '/mnt/tank/data/restored/report.txt'],
        },
      ]);
      expect(job.id.startsWith('local-')).toBe(true);
      expect(job.state).toBe('SUCCEEDED');
      expect(job.progress.percent).toBe(100);
      expect(job.result).toEqual({ ok: true, detail: 'copied in 12ms' });
      expect(jobs.getJob(job.id)).toEqual(job);
    });

    it('should force the copy when overwrite is requested', async () => {
      await transport.submitRestore(restoreRequest({ overwrite: true }));
      expect(runner.calls[0]?.args[1]).toBe('-f');
    });

    it('should report a failed job with the copy error output', async () => {
      runner.responses.set('cp', result({ exitCode: 1, stderr: 'cp: cannot create regular file\n' }));

      const job = await transport.submitRestore(restoreRequest());

      expect(job.state).toBe('FAILED');
      expect(job.result).toEqual({ ok: false, error: 'cp: cannot create regular file' });
    });

    it('should let the copy run without the listing timeout', async () => {
      runner.responses.set('zfs', result({ stdout: 'tank/data\t/mnt/tank/data\n' }));

      await transport.listDatasets();
      await transport.submitRestore(restoreRequest());

      expect(runner.options).toEqual([
        { command: 'zfs', timeoutMs: 60000 },
        { command: 'cp', timeoutMs: 0 },
      ]);
    });

    it('should report a killed copy as a failed job instead of throwing', async () => {
      const limited = new CliTransport({ ...createDefaultConfig().cli, restoreTimeout: 500 }, jobs, {
        runner: runner.run,
        executables: fakeExecutables(true),
      });
      runner.failure = new TimeoutError('cp timed out after 500ms', 'cp', 500);

      const job = await limited.submitRestore(restoreRequest());

      expect(runner.options).toEqual([{ command: 'cp', timeoutMs: 500 }]);
      expect(job.state).toBe('FAILED');
      expect(job.result).toEqual({
        ok: false,
        error: 'cp was killed after 500ms; /mnt/tank/data/restored/report.txt may be partially copied',
      });
      expect(jobs.listJobs().map((tracked) => tracked.id)).toEqual([job.id]);
    });

    it('should not register a job when the copy cannot start', async () => {
      runner.failure = new BackendUnavailableError('Cannot run cp: spawn cp ENOENT');

      await expect(transport.submitRestore(restoreRequest())).rejects.toBeInstanceOf(BackendUnavailableError);
      expect(jobs.listJobs()).toEqual([]);
    });
  });

  describe('probe and health', () => {
    it('should pass the probe when the storage tool is installed', async () => {
      await expect(transport.probe(1000)).resolves.toBeUndefined();
    });

    it('should fail the probe when the storage tool is missing', async () => {
      const missing = new CliTransport(createDefaultConfig().cli, jobs, {
        runner: runner.run,
        executables: fakeExecutables(false),
      });

      await expect(missing.probe(1000)).rejects.toBeInstanceOf(BackendUnavailableError);
    });

    it('should report imported pools as healthy', async () => {
      runner.responses.set('zfs', result({ stdout: 'tank\nbackup\n' }));

      const report = await transport.checkHealth();

      expect(runner.calls[0]?.args).toEqual(['list', '-H', '-o', 'name', '-d', '0']);
      expect(report.healthy).toBe(true);
      expect(report.detail).toEqual({ pools: 'tank,backup' });
    });

    it('should report failures without throwing', async () => {
      runner.responses.set('zfs', result({ exitCode: 1, stderr: 'no pools available\n' }));

      const report = await transport.checkHealth();

      expect(report.healthy).toBe(false);
      expect(report.error).toEqual({ kind: 'BackendError', message: 'zfs list: no pools available', retryable: false });
    });
  });

  it('should advertise restore without live job updates or cancellation', () => {
    expect([...transport.capabilities]).toEqual(['list', 'diff', 'restore', 'health']);
  });
});
