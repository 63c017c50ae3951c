import type { Dataset, SnapshotEntry } from '../../src/types/index.js';

export function makeDataset(overrides: Partial<Dataset> = {}): Dataset {
  return {
    id: 'tank/data',
    pool: 'tank',
    mountRoot: '/mnt/tank/data',
    backend: 'rpc',
    ...overrides,
  };
}

export function file(path: string, size: number, modifiedAt: number | null = 1_700_000_000_000): SnapshotEntry {
  return {
    path,
    name: path.split('/').pop() ?? path,
    kind: 'file',
    size,
    modifiedAt,
  };
}

export function directory(path: string): SnapshotEntry {
  return {
    path,
    name: path.split('/').pop() ?? path,
    kind: 'directory',
    size: null,
    modifiedAt: null,
  };
}
