/**
 * Storage domain type definitions
 */

import type { BackendKind } from './backend.js';

export interface Dataset {
  /** Full dataset name, e.g. `tank/data` */
  readonly id: string;
  readonly pool: string;
  /** Absolute mount point of the live dataset */
  readonly mountRoot: string;
  readonly backend: BackendKind;
}

export interface Snapshot {
  /** Short snapshot name (the part after `@`) */
  readonly id: string;
  readonly dataset: string;
  /** `dataset@name` */
  readonly fullName: string;
  readonly createdAt: Date | null;
}

export type EntryKind = 'file' | 'directory' | 'symlink';

export interface SnapshotEntry {
  /** Path relative to the snapshot root, `/`-separated, never absolute */
  readonly path: string;
  readonly name: string;
  readonly kind: EntryKind;
  /** Byte size; null for directories and when the backend does not report it */
  readonly size: number | null;
  /** Modification time in epoch milliseconds */
  readonly modifiedAt: number | null;
  readonly checksum?: string;
}

export type DiffClassification = 'added' | 'removed' | 'modified' | 'unchanged';

export interface DiffEntry {
  readonly path: string;
  readonly classification: DiffClassification;
  readonly before?: SnapshotEntry;
  readonly after?: SnapshotEntry;
}

export type DiffResult = readonly DiffEntry[];

export interface DiffSummary {
  added: number;
  removed: number;
  modified: number;
  unchanged: number;
}

export interface PoolSummary {
  name: string;
  datasets: Array<{
    dataset: Dataset;
    snapshotCount: number;
    latestSnapshot: string | null;
  }>;
}
