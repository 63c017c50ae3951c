/**
 * Composition root: wires the job tracker, backend selection, service and health monitor
 */

import type { TransportFactories } from './backend/backend-selector.js';
import { BackendSelector, defaultTransportFactories } from './backend/backend-selector.js';
import { HealthMonitor } from './backend/health-monitor.js';
import { JobTracker } from './jobs/job-tracker.js';
import { SnapshotService } from './services/snapshot-service.js';
import type { AppConfig, BackendInfo, HealthReport } from './types/index.js';
import { UnsupportedOperationError, logError } from './utils/error-utils.js';
import { getLogger } from './utils/structured-logger.js';

const logger = getLogger('SnapshotPortal');

export interface SnapshotPortal {
  service: SnapshotService;
  jobs: JobTracker;
  selector: BackendSelector;
  backendInfo(): BackendInfo;
  /** Latest cached report, or a fresh check when none exists yet or `refresh` is set */
  backendHealth(options?: { refresh?: boolean }): Promise<HealthReport>;
  dispose(): Promise<void>;
}

export interface CreatePortalOptions {
  factories?: TransportFactories;
}

export async function createSnapshotPortal(
  config: AppConfig,
  options: CreatePortalOptions = {}
): Promise<SnapshotPortal> {
  const jobs = new JobTracker({
    retentionMs: config.jobs.retentionMs,
    subscriberBufferSize: config.jobs.subscriberBufferSize,
  });
  const selector = new BackendSelector(config, jobs, options.factories ?? defaultTransportFactories);

  const handle = await selector.select().catch((error: unknown) => {
    jobs.dispose();
    throw error;
  });

  const service = new SnapshotService(handle, jobs, { snapshotCacheTtl: config.snapshotCacheTtl });
  const monitor = new HealthMonitor(handle.transport, config.healthCheckInterval);
  if (handle.capabilities.has('health')) {
    monitor.start();
  }
  logger.info('Snapshot portal ready', { backend: handle.kind, reason: handle.reason });

  return {
    service,
    jobs,
    selector,
    backendInfo: () => selector.getBackendInfo(),
    backendHealth: async ({ refresh = false } = {}) => {
      if (!handle.capabilities.has('health')) {
        throw new UnsupportedOperationError('backendHealth', handle.kind);
      }
      const latest = monitor.latestReport;
      return latest && !refresh ? latest : monitor.check();
    },
    dispose: async () => {
      monitor.stop();
      service.dispose();
      jobs.dispose();
      await selector.dispose().catch((error: unknown) => logError('SnapshotPortal', 'dispose', error));
    },
  };
}
