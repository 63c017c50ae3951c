import chalk from 'chalk';
import { summarizeDiff } from '../../core/diff-engine.js';
import type { SnapshotPortal } from '../../portal.js';
import { formatDatasets, formatDiff, formatEntries, formatPools, formatSnapshots } from '../utils/output.js';
import type { GlobalOptions } from '../utils/portal-runner.js';
import { emit } from '../utils/portal-runner.js';

export async function datasetsCommand(portal: SnapshotPortal, options: GlobalOptions): Promise<void> {
  const datasets = await portal.service.listDatasets();
  emit(options, datasets, formatDatasets(datasets));
}

export async function poolsCommand(portal: SnapshotPortal, options: GlobalOptions): Promise<void> {
  const pools = await portal.service.listPools();
  emit(options, pools, formatPools(pools));
}

export async function snapshotsCommand(
  portal: SnapshotPortal,
  options: GlobalOptions,
  datasetId: string
): Promise<void> {
  const dataset = await portal.service.getDataset(datasetId);
  const snapshots = await portal.service.listSnapshots(dataset);
  emit(options, snapshots, formatSnapshots(snapshots));
}

export async function lsCommand(
  portal: SnapshotPortal,
  options: GlobalOptions,
  datasetId: string,
  snapshot: string,
  path = ''
): Promise<void> {
  const dataset = await portal.service.getDataset(datasetId);
  const entries = await portal.service.listDirectory(dataset, snapshot, path);
  emit(options, entries, formatEntries(entries));
}

export async function diffCommand(
  portal: SnapshotPortal,
  options: GlobalOptions & { all?: boolean },
  datasetId: string,
  from: string,
  to: string,
  path = ''
): Promise<void> {
  const dataset = await portal.service.getDataset(datasetId);
  const diff = await portal.service.diff(dataset, from, to, path);
  const summary = summarizeDiff(diff);
  emit(options, { summary, entries: diff }, [
    ...formatDiff(diff, options.all ?? false),
    chalk.gray(
      `${summary.added} added, ${summary.removed} removed, ${summary.modified} modified, ${summary.unchanged} unchanged`
    ),
  ]);
}
