import type { BackendHandle } from '../backend/backend-selector.js';
import { TtlCache } from '../core/cache.js';
import { diffListings } from '../core/diff-engine.js';
import { sortSnapshotsNewestFirst } from '../core/discovery-normalizer.js';
import { sortForDisplay } from '../core/entry-normalizer.js';
import type { JobSubscription } from '../jobs/job-subscription.js';
import type { JobTracker } from '../jobs/job-tracker.js';
import { snapshotRoot, toRelativePath, validatePath } from '../path-validator.js';
import type {
  BackendKind,
  Capability,
  Dataset,
  DiffResult,
  PoolSummary,
  RestoreJob,
  Snapshot,
  SnapshotEntry,
} from '../types/index.js';
import { isTerminalState } from '../types/index.js';
import type { LogContext } from '../utils/structured-logger.js';
import { JobNotFoundError, NotFoundError, UnsupportedOperationError, toErrorPayload } from '../utils/error-utils.js';
import { StructuredLogger, createRequestContext, getLogger } from '../utils/structured-logger.js';

const logger = getLogger('SnapshotService');

export interface SnapshotServiceOptions {
  /** Snapshot list cache lifetime; 0 disables caching */
  snapshotCacheTtl: number;
}

export interface RestoreOptions {
  overwrite?: boolean;
}

/**
 * Capability-aware facade over the selected backend.
 *
 * Each operation checks the capability, then validates every path, and only then
 * contacts the transport. Nothing is retried.
 */
export class SnapshotService {
  private readonly snapshotCache: TtlCache<Snapshot[]>;

  constructor(
    private readonly backend: BackendHandle,
    private readonly jobs: JobTracker,
    options: SnapshotServiceOptions = { snapshotCacheTtl: 30000 }
  ) {
    this.snapshotCache = new TtlCache<Snapshot[]>(options.snapshotCacheTtl);
  }

  get backendKind(): BackendKind {
    return this.backend.kind;
  }

  hasCapability(capability: Capability): boolean {
    return this.backend.capabilities.has(capability);
  }

  private requireCapability(capability: Capability, operation: string): void {
    if (!this.hasCapability(capability)) {
      throw new UnsupportedOperationError(operation, this.backend.kind);
    }
  }

  private async run<T>(operation: string, context: Partial<LogContext>, fn: () => Promise<T>): Promise<T> {
    return StructuredLogger.withContextAsync(
      { ...createRequestContext(operation), backend: this.backend.kind, ...context },
      async () => {
        const started = Date.now();
        try {
          const result = await fn();
          logger.debug('Operation completed', { duration_ms: Date.now() - started });
          return result;
        } catch (error) {
          const payload = toErrorPayload(error);
          logger.warn('Operation failed', {
            duration_ms: Date.now() - started,
            error_code: payload.kind,
            error_message: payload.message,
          });
          throw error;
        }
      }
    );
  }

  async listDatasets(): Promise<Dataset[]> {
    this.requireCapability('list', 'listDatasets');
    return this.run('listDatasets', {}, async () => {
      const datasets = await this.backend.transport.listDatasets();
      return [...datasets].sort((a, b) => a.id.localeCompare(b.id));
    });
  }

  async getDataset(datasetId: string): Promise<Dataset> {
    const datasets = await this.listDatasets();
    const dataset = datasets.find((candidate) => candidate.id === datasetId);
    if (!dataset) {
      throw new NotFoundError(`Dataset not found: ${datasetId}`);
    }
    return dataset;
  }

  /**
   * Datasets grouped by pool, each with its snapshot count and newest snapshot
   */
  async listPools(): Promise<PoolSummary[]> {
    const datasets = await this.listDatasets();
    const rows = await Promise.all(
      datasets.map(async (dataset) => {
        const snapshots = await this.listSnapshots(dataset);
        return { dataset, snapshotCount: snapshots.length, latestSnapshot: snapshots[0]?.id ?? null };
      })
    );

    const pools = new Map<string, PoolSummary>();
    for (const row of rows) {
      const pool = pools.get(row.dataset.pool) ?? { name: row.dataset.pool, datasets: [] };
      pool.datasets.push(row);
      pools.set(pool.name, pool);
    }
    return [...pools.values()].sort((a, b) => a.name.localeCompare(b.name));
  }

  /**
   * Snapshots of `dataset`, newest first
   */
  async listSnapshots(dataset: Dataset): Promise<Snapshot[]> {
    this.requireCapability('list', 'listSnapshots');
    const cached = this.snapshotCache.get(dataset.id);
    if (cached) {
      return [...cached];
    }
    return this.run('listSnapshots', { dataset: dataset.id }, async () => {
      const snapshots = sortSnapshotsNewestFirst(await this.backend.transport.listSnapshots(dataset));
      this.snapshotCache.set(dataset.id, snapshots);
      return [...snapshots];
    });
  }

  invalidateSnapshots(datasetId?: string): void {
    if (datasetId === undefined) {
      this.snapshotCache.clear();
    } else {
      this.snapshotCache.invalidate(datasetId);
    }
  }

  /**
   * One directory level of a snapshot. `path` is relative to the snapshot root.
   */
  async listDirectory(dataset: Dataset, snapshot: string, path = ''): Promise<SnapshotEntry[]> {
    this.requireCapability('list', 'listDirectory');
    const relativePath = this.resolveSnapshotPath(dataset, snapshot, path);
    return this.run('listDirectory', { dataset: dataset.id, snapshot }, async () =>
      sortForDisplay(await this.backend.transport.listEntries(dataset, snapshot, relativePath))
    );
  }

  /**
   * Compare one directory level of `from` (older) against `to`
   */
  async diff(dataset: Dataset, from: string, to: string, path = ''): Promise<DiffResult> {
    this.requireCapability('diff', 'diff');
    const relativePath = this.resolveSnapshotPath(dataset, from, path);
    this.resolveSnapshotPath(dataset, to, path);

    return this.run('diff', { dataset: dataset.id, snapshot: `${from}..${to}` }, async () => {
      const [before, after] = await Promise.all([
        this.backend.transport.listEntries(dataset, from, relativePath),
        this.backend.transport.listEntries(dataset, to, relativePath),
      ]);
      return diffListings(before, after);
    });
  }

  /**
   * Copy `sourcePath` out of `snapshot` to `destinationPath` in the live dataset
   */
  async restore(
    dataset: Dataset,
    snapshot: string,
    sourcePath: string,
    destinationPath: string,
    options: RestoreOptions = {}
  ): Promise<RestoreJob> {
    this.requireCapability('restore', 'restore');
    const source = validatePath(snapshotRoot(dataset, snapshot), sourcePath, 'read');
    const destination = validatePath(dataset.mountRoot, destinationPath, 'write');
    const overwrite = options.overwrite ?? false;

    return this.run('restore', { dataset: dataset.id, snapshot }, async () => {
      const job = await this.backend.transport.submitRestore({
        dataset,
        snapshot,
        sourcePath: source,
        destinationPath: destination,
        overwrite,
      });
      logger.info('Restore submitted', { job_id: job.id, overwrite });
      return job;
    });
  }

  /**
   * Ask the backend to abort `jobId`. Jobs this process does not track (submitted
   * elsewhere) are forwarded as well; the tracked record is returned when there is one.
   */
  async cancelRestore(jobId: string): Promise<RestoreJob | null> {
    this.requireCapability('cancel', 'cancelRestore');
    const job = this.jobs.getJob(jobId);
    if (job && isTerminalState(job.state)) {
      return job;
    }

    const cancel = this.backend.transport.cancelRestore?.bind(this.backend.transport);
    if (!cancel) {
      throw new UnsupportedOperationError('cancelRestore', this.backend.kind);
    }
    return this.run('cancelRestore', { job_id: jobId }, async () => {
      await cancel(jobId);
      return this.jobs.getJob(jobId) ?? null;
    });
  }

  getJob(jobId: string): RestoreJob {
    const job = this.jobs.getJob(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }
    return job;
  }

  listJobs(): RestoreJob[] {
    return this.jobs.listJobs();
  }

  subscribe(jobId: string): JobSubscription {
    return this.jobs.subscribe(jobId);
  }

  dispose(): void {
    this.snapshotCache.dispose();
  }

  /**
   * Validate `path` against the snapshot root and return its root-relative form
   */
  private resolveSnapshotPath(dataset: Dataset, snapshot: string, path: string): string {
    const root = snapshotRoot(dataset, snapshot);
    return toRelativePath(root, validatePath(root, path, 'read'));
  }
}
