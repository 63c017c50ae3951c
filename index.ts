/**
 * Public API of the snapshot portal core
 */

export * from './src/types/index.js';

export { createSnapshotPortal } from './src/portal.js';
export type { CreatePortalOptions, SnapshotPortal } from './src/portal.js';

export { loadConfig, resolveWebSocketUrl } from './src/config-loader.js';
export type { LoadConfigOptions } from './src/config-loader.js';
export { createDefaultConfig, mergeWithDefaults } from './src/default-config.js';

export { SnapshotService } from './src/services/snapshot-service.js';
export type { RestoreOptions, SnapshotServiceOptions } from './src/services/snapshot-service.js';

export { BackendSelector, defaultTransportFactories } from './src/backend/backend-selector.js';
export type { BackendHandle, TransportFactories } from './src/backend/backend-selector.js';
export { HealthMonitor } from './src/backend/health-monitor.js';

export { RpcTransport } from './src/transports/rpc-transport.js';
export { CliTransport } from './src/transports/cli-transport.js';
export type { RestoreRequest, SnapshotTransport } from './src/transports/types.js';

export { JobTracker } from './src/jobs/job-tracker.js';
export type { JobTrackerOptions, JobTrackerStats } from './src/jobs/job-tracker.js';
export { JobSubscription } from './src/jobs/job-subscription.js';

export { diffListings, summarizeDiff } from './src/core/diff-engine.js';
export { assertSnapshotName, snapshotRoot, validatePath } from './src/path-validator.js';
export type { PathAccess } from './src/path-validator.js';

export * from './src/utils/error-utils.js';
export { getLogger, StructuredLogger } from './src/utils/structured-logger.js';
