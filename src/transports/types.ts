import type {
  BackendCapability,
  BackendKind,
  Dataset,
  HealthReport,
  RestoreJob,
  Snapshot,
  SnapshotEntry,
} from '../types/index.js';

export interface RestoreRequest {
  dataset: Dataset;
  snapshot: string;
  /** Absolute, validated path inside the snapshot root */
  sourcePath: string;
  /** Absolute, validated path inside the dataset mount root */
  destinationPath: string;
  overwrite: boolean;
}

/**
 * Common surface of the middleware (RPC) and local command (CLI) backends.
 *
 * Inputs are already validated by the service layer; transports do not re-check paths.
 */
export interface SnapshotTransport {
  readonly kind: BackendKind;
  readonly capabilities: BackendCapability;

  listDatasets(): Promise<Dataset[]>;
  listSnapshots(dataset: Dataset): Promise<Snapshot[]>;
  /** List one directory level; `relativePath` is `''` for the snapshot root */
  listEntries(dataset: Dataset, snapshot: string, relativePath: string): Promise<SnapshotEntry[]>;
  submitRestore(request: RestoreRequest): Promise<RestoreJob>;
  cancelRestore?(jobId: string): Promise<void>;

  /** Throws when the backend cannot serve requests within `timeoutMs` */
  probe(timeoutMs: number): Promise<void>;
  /** Never throws; failures are reported in the returned report */
  checkHealth(): Promise<HealthReport>;
  dispose(): Promise<void>;
}
