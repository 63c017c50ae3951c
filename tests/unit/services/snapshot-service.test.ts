import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { BackendHandle } from '../../../src/backend/backend-selector.js';
import { JobTracker } from '../../../src/jobs/job-tracker.js';
import { SnapshotService } from '../../../src/services/snapshot-service.js';
import type { Capability, Snapshot } from '../../../src/types/index.js';
import {
  JobNotFoundError,
  NotFoundError,
  UnsupportedOperationError,
  ValidationError,
} from '../../../src/utils/error-utils.js';
import { FakeTransport } from '../../helpers/fake-transport.js';
import { directory, file, makeDataset } from '../../helpers/fixtures.js';

function snapshot(id: string, createdAt: number | null): Snapshot {
  return {
    id,
    dataset: 'tank/data',
    fullName: `tank/data@${id}`,
    createdAt: createdAt === null ? null : new Date(createdAt),
  };
}

function handleFor(transport: FakeTransport): BackendHandle {
  return {
    kind: transport.kind,
    transport,
    capabilities: transport.capabilities,
    selectedAt: new Date(),
    reason: 'probe',
    attempts: [],
  };
}

describe('SnapshotService', () => {
  const dataset = makeDataset();
  let jobs: JobTracker;
  let transport: FakeTransport;
  let service: SnapshotService;

  function serviceWith(capabilities: readonly Capability[], snapshotCacheTtl = 30000): SnapshotService {
    transport = new FakeTransport('rpc', jobs, capabilities);
    return new SnapshotService(handleFor(transport), jobs, { snapshotCacheTtl });
  }

  beforeEach(() => {
    jobs = new JobTracker();
    service = serviceWith(['list', 'diff', 'restore', 'jobs', 'cancel', 'health']);
  });

  afterEach(() => {
    service.dispose();
    jobs.dispose();
  });

  describe('discovery', () => {
    it('should list datasets sorted by name', async () => {
      transport.datasets = [makeDataset({ id: 'tank/web' }), dataset, makeDataset({ id: 'backup', pool: 'backup' })];

      const ids = (await service.listDatasets()).map((candidate) => candidate.id);

      expect(ids).toEqual(['backup', 'tank/data', 'tank/web']);
    });

    it('should raise NotFound for an unknown dataset', async () => {
      transport.datasets = [dataset];
      await expect(service.getDataset('tank/missing')).rejects.toBeInstanceOf(NotFoundError);
    });

    it('should return snapshots newest first and serve repeats from the cache', async () => {
      transport.snapshots.set('tank/data', [snapshot('old', 1000), snapshot('new', 2000)]);

      const first = await service.listSnapshots(dataset);
      const second = await service.listSnapshots(dataset);

      expect(first.map((entry) => entry.id)).toEqual(['new', 'old']);
      expect(second).toEqual(first);
      expect(transport.calls).toEqual(['listSnapshots:tank/data']);

      service.invalidateSnapshots('tank/data');
      await service.listSnapshots(dataset);
      expect(transport.calls).toEqual(['listSnapshots:tank/data', 'listSnapshots:tank/data']);
    });

    it('should query the backend every time when caching is disabled', async () => {
      service.dispose();
      service = serviceWith(['list'], 0);

      await service.listSnapshots(dataset);
      await service.listSnapshots(dataset);

      expect(transport.calls).toEqual(['listSnapshots:tank/data', 'listSnapshots:tank/data']);
    });

    it('should summarize pools with their newest snapshot', async () => {
      transport.datasets = [dataset, makeDataset({ id: 'tank/empty', mountRoot: '/mnt/tank/empty' })];
      transport.snapshots.set('tank/data', [snapshot('old', 1000), snapshot('new', 2000)]);

      const pools = await service.listPools();

      expect(pools).toEqual([
        {
          name: 'tank',
          datasets: [
            { dataset, snapshotCount: 2, latestSnapshot: 'new' },
            {
              dataset: makeDataset({ id: 'tank/empty', mountRoot: '/mnt/tank/empty' }),
              snapshotCount: 0,
              latestSnapshot: null,
            },
          ],
        },
      ]);
    });
  });

  describe('listDirectory', () => {
    it('should list the anchored path with directories first', async () => {
      transport.entries.set('daily:docs', [file('docs/b.txt', 1), directory('docs/sub'), file('docs/A.txt', 2)]);

      const entries = await service.listDirectory(dataset, 'daily', '/docs/');

      expect(transport.calls).toEqual(['listEntries:daily:docs']);
      expect(entries.map((entry) => entry.name)).toEqual(['sub', 'A.txt', 'b.txt']);
    });

    it('should reject paths that climb out of the snapshot', async () => {
      await expect(service.listDirectory(dataset, 'daily', 'docs/../../..')).rejects.toBeInstanceOf(ValidationError);
      expect(transport.calls).toEqual([]);
    });

    it('should reject malformed snapshot names', async () => {
      await expect(service.listDirectory(dataset, '../daily')).rejects.toBeInstanceOf(ValidationError);
      expect(transport.calls).toEqual([]);
    });
  });

  describe('diff', () => {
    it('should compare the same directory in both snapshots', async () => {
      transport.entries.set('old:', [file('a.txt', 1), file('gone.txt', 1)]);
      transport.entries.set('new:', [file('a.txt', 2), file('added.txt', 1)]);

      const result = await service.diff(dataset, 'old', 'new');

      expect(result.map((entry) => [entry.path, entry.classification])).toEqual([
        ['a.txt', 'modified'],
        ['added.txt', 'added'],
        ['gone.txt', 'removed'],
      ]);
    });

    it('should be unsupported without the diff capability', async () => {
      service = serviceWith(['list']);
      await expect(service.diff(dataset, 'old', 'new')).rejects.toBeInstanceOf(UnsupportedOperationError);
      expect(transport.calls).toEqual([]);
    });
  });

  describe('restore', () => {
    it('should resolve source and destination against their roots', async () => {
      const job = await service.restore(dataset, 'daily', 'docs/a.txt', 'tank/data/restored/a.txt');

      expect(transport.restores).toEqual([
        {
          dataset,
          snapshot: 'daily',
          sourcePath: '/mnt/tank/data/.zfs/snapshot/daily/docs/a.txt',
          destinationPath: '/mnt/tank/data/tank/data/restored/a.txt',
          overwrite: false,
        },
      ]);
      expect(job.state).toBe('QUEUED');
      expect(service.getJob(job.id)).toBe(job);
    });

    it('should reject a destination outside the dataset before contacting the backend', async () => {
      await expect(service.restore(dataset, 'daily', 'docs/a.txt', '../etc/passwd')).rejects.toBeInstanceOf(
        ValidationError
      );
      expect(transport.calls).toEqual([]);
    });

    it('should reject parent segments in either path before contacting the backend', async () => {
      await expect(service.restore(dataset, 'daily', 'docs/a.txt', 'docs/../a.txt')).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(service.restore(dataset, 'daily', 'docs/../a.txt', 'restored/a.txt')).rejects.toBeInstanceOf(
        ValidationError
      );
      await expect(service.listDirectory(dataset, 'daily', 'docs/..')).rejects.toBeInstanceOf(ValidationError);
      expect(transport.calls).toEqual([]);
    });

    it('should reject a destination inside the snapshot namespace', async () => {
      await expect(
        service.restore(dataset, 'daily', 'docs/a.txt', '.zfs/snapshot/daily/a.txt')
      ).rejects.toBeInstanceOf(ValidationError);
      expect(transport.calls).toEqual([]);
    });

    it('should pass the overwrite flag through', async () => {
      await service.restore(dataset, 'daily', 'a.txt', 'restored/a.txt', { overwrite: true });
      expect(transport.restores[0]?.overwrite).toBe(true);
    });

    it('should be unsupported without the restore capability', async () => {
      service = serviceWith(['list', 'diff']);
      await expect(service.restore(dataset, 'daily', 'a.txt', 'restored/a.txt')).rejects.toBeInstanceOf(
        UnsupportedOperationError
      );
      expect(transport.calls).toEqual([]);
    });
  });

  describe('jobs', () => {
    it('should cancel a running job through the backend', async () => {
      const job = await service.restore(dataset, 'daily', 'a.txt', 'restored/a.txt');

      const cancelled = await service.cancelRestore(job.id);

      expect(transport.calls).toContain(`cancelRestore:${job.id}`);
      expect(cancelled?.state).toBe('CANCELLED');
    });

    it('should return a finished job without contacting the backend', async () => {
      const job = await service.restore(dataset, 'daily', 'a.txt', 'restored/a.txt');
      jobs.ingest({ jobId: job.id, state: 'SUCCEEDED' });

      const result = await service.cancelRestore(job.id);

      expect(result?.state).toBe('SUCCEEDED');
      expect(transport.calls).toEqual(['submitRestore']);
    });

    it('should forward cancellation of jobs submitted elsewhere', async () => {
      await expect(service.cancelRestore('77')).resolves.toBeNull();
      expect(transport.calls).toEqual(['cancelRestore:77']);
    });

    it('should be unsupported without the cancel capability', async () => {
      service = serviceWith(['list', 'restore']);
      await expect(service.cancelRestore('1')).rejects.toBeInstanceOf(UnsupportedOperationError);
    });

    it('should raise JobNotFound for unknown jobs', () => {
      expect(() => service.getJob('missing')).toThrow(JobNotFoundError);
      expect(() => service.subscribe('missing')).toThrow(JobNotFoundError);
    });

    it('should stream job transitions to subscribers', async () => {
      const job = await service.restore(dataset, 'daily', 'a.txt', 'restored/a.txt');
      const subscription = service.subscribe(job.id);

      jobs.ingest({ jobId: job.id, state: 'RUNNING', progress: { percent: 40 } });
      jobs.ingest({ jobId: job.id, state: 'SUCCEEDED' });

      const states: string[] = [];
      for await (const update of subscription) {
        states.push(update.state);
      }
      expect(states).toEqual(['QUEUED', 'RUNNING', 'SUCCEEDED']);
    });
  });
});
