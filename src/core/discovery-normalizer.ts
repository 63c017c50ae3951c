/**
 * Converts backend dataset/snapshot discovery output into `Dataset` and `Snapshot` values
 */

import path from 'node:path';
import type { BackendKind, Dataset, Snapshot } from '../types/index.js';
import { BackendError } from '../utils/error-utils.js';
import { isRecord, readRecord, readString } from '../utils/type-guards.js';

function makeDataset(name: string, mountpoint: string, backend: BackendKind): Dataset | null {
  if (!name || !path.posix.isAbsolute(mountpoint)) {
    // `none`, `legacy`, `-` and unmounted datasets have no usable root
    return null;
  }
  return {
    id: name,
    pool: name.split('/')[0] ?? name,
    mountRoot: path.posix.normalize(mountpoint),
    backend,
  };
}

function splitSnapshotName(fullName: string): { dataset: string; id: string } | null {
  const at = fullName.lastIndexOf('@');
  if (at <= 0 || at === fullName.length - 1) {
    return null;
  }
  return { dataset: fullName.slice(0, at), id: fullName.slice(at + 1) };
}

/**
 * Parse a middleware creation value: ISO string, epoch number, or `{ $date: ms }`
 */
export function parseCreationTime(value: unknown): Date | null {
  if (typeof value === 'string') {
    const parsed = new Date(value);
    return Number.isNaN(parsed.getTime()) ? null : parsed;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    // Values below 1e11 are seconds, larger ones milliseconds
    return new Date(value < 1e11 ? value * 1000 : value);
  }
  if (isRecord(value) && '$date' in value) {
    return parseCreationTime(value.$date);
  }
  return null;
}

/**
 * Normalize a `zfs.dataset.query` result
 */
export function normalizeMiddlewareDatasets(raw: unknown): Dataset[] {
  if (!Array.isArray(raw)) {
    throw new BackendError(`Unexpected dataset query result: ${JSON.stringify(raw)}`);
  }
  const datasets: Dataset[] = [];
  for (const row of raw) {
    if (!isRecord(row)) {
      continue;
    }
    const name = readString(row, 'name') ?? readString(row, 'id') ?? '';
    const mountpoint =
      readString(row, 'mountpoint') ??
      readString(readRecord(readRecord(row, 'properties') ?? {}, 'mountpoint') ?? {}, 'value') ??
      '';
    const dataset = makeDataset(name, mountpoint, 'rpc');
    if (dataset) {
      datasets.push(dataset);
    }
  }
  return datasets;
}

/**
 * Normalize a `zfs.snapshot.query` result, keeping only snapshots of `dataset`
 */
export function normalizeMiddlewareSnapshots(raw: unknown, dataset: Dataset): Snapshot[] {
  if (!Array.isArray(raw)) {
    throw new BackendError(`Unexpected snapshot query result: ${JSON.stringify(raw)}`);
  }
  const snapshots: Snapshot[] = [];
  for (const row of raw) {
    if (!isRecord(row)) {
      continue;
    }
    const fullName = readString(row, 'name') ?? '';
    const parts = splitSnapshotName(fullName);
    if (!parts || parts.dataset !== dataset.id) {
      continue;
    }
    const creation = readRecord(readRecord(row, 'properties') ?? {}, 'creation');
    snapshots.push({
      id: parts.id,
      dataset: parts.dataset,
      fullName,
      createdAt: parseCreationTime(creation?.parsed ?? creation?.rawvalue ?? null),
    });
  }
  return snapshots;
}

/**
 * Parse `zfs list -H -p -t filesystem -o name,mountpoint`
 */
export function parseDatasetLines(stdout: string): Dataset[] {
  const datasets: Dataset[] = [];
  for (const line of stdout.split('\n')) {
    const [name = '', mountpoint = ''] = line.split('\t');
    const dataset = makeDataset(name.trim(), mountpoint.trim(), 'cli');
    if (dataset) {
      datasets.push(dataset);
    }
  }
  return datasets;
}

/**
 * Parse `zfs list -H -p -t snapshot -o name,creation` (creation in epoch seconds)
 */
export function parseSnapshotLines(stdout: string, dataset: Dataset): Snapshot[] {
  const snapshots: Snapshot[] = [];
  for (const line of stdout.split('\n')) {
    const [fullName = '', creation = ''] = line.split('\t');
    const parts = splitSnapshotName(fullName.trim());
    if (!parts || parts.dataset !== dataset.id) {
      continue;
    }
    const seconds = Number(creation.trim());
    snapshots.push({
      id: parts.id,
      dataset: parts.dataset,
      fullName: fullName.trim(),
      createdAt: creation.trim() !== '' && Number.isFinite(seconds) ? new Date(seconds * 1000) : null,
    });
  }
  return snapshots;
}

/**
 * Creation time descending; snapshots without a creation time go last
 */
export function sortSnapshotsNewestFirst(snapshots: readonly Snapshot[]): Snapshot[] {
  return [...snapshots].sort((a, b) => {
    const aTime = a.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    const bTime = b.createdAt?.getTime() ?? Number.NEGATIVE_INFINITY;
    if (aTime === bTime) {
      return a.id.localeCompare(b.id);
    }
    return bTime - aTime;
  });
}
