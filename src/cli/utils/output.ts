import chalk from 'chalk';
import type {
  BackendInfo,
  Dataset,
  DiffEntry,
  HealthReport,
  PoolSummary,
  RestoreJob,
  Snapshot,
  SnapshotEntry,
} from '../../types/index.js';
import type { ErrorPayload } from '../../utils/error-utils.js';

const CLASSIFICATION_MARKERS: Record<DiffEntry['classification'], string> = {
  added: '+',
  removed: '-',
  modified: '~',
  unchanged: ' ',
};

export function formatSize(size: number | null): string {
  if (size === null) {
    return '-';
  }
  const units = ['B', 'K', 'M', 'G', 'T'];
  let value = size;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value}B` : `${value.toFixed(1)}${units[unit]}`;
}

export function formatTimestamp(value: Date | number | null): string {
  if (value === null) {
    return '-';
  }
  const date = typeof value === 'number' ? new Date(value) : value;
  return date.toISOString().replace('T', ' ').replace(/\.\d{3}Z$/, 'Z');
}

export function formatDatasets(datasets: readonly Dataset[]): string[] {
  return datasets.map((dataset) => `${chalk.bold(dataset.id)}\t${dataset.mountRoot}`);
}

export function formatPools(pools: readonly PoolSummary[]): string[] {
  const lines: string[] = [];
  for (const pool of pools) {
    lines.push(chalk.bold(pool.name));
    for (const row of pool.datasets) {
      const latest = row.latestSnapshot ? `latest ${row.latestSnapshot}` : 'no snapshots';
      lines.push(`  ${row.dataset.id}  ${row.snapshotCount} snapshot(s), ${latest}`);
    }
  }
  return lines;
}

export function formatSnapshots(snapshots: readonly Snapshot[]): string[] {
  return snapshots.map((snapshot) => `${snapshot.id}\t${formatTimestamp(snapshot.createdAt)}`);
}

export function formatEntries(entries: readonly SnapshotEntry[]): string[] {
  return entries.map((entry) => {
    const name = entry.kind === 'directory' ? chalk.blue(`${entry.name}/`) : entry.name;
    return `${formatSize(entry.size).padStart(8)}  ${formatTimestamp(entry.modifiedAt)}  ${name}`;
  });
}

/**
 * One line per changed path; unchanged paths are only listed when `includeUnchanged` is set
 */
export function formatDiff(entries: readonly DiffEntry[], includeUnchanged = false): string[] {
  return entries
    .filter((entry) => includeUnchanged || entry.classification !== 'unchanged')
    .map((entry) => {
      const line = `${CLASSIFICATION_MARKERS[entry.classification]} ${entry.path}`;
      switch (entry.classification) {
        case 'added':
          return chalk.green(line);
        case 'removed':
          return chalk.red(line);
        case 'modified':
          return chalk.yellow(line);
        default:
          return chalk.gray(line);
      }
    });
}

export function formatJob(job: RestoreJob): string {
  const percent = job.progress.percent === null ? '' : ` ${Math.round(job.progress.percent)}%`;
  const description = job.progress.description ? ` ${job.progress.description}` : '';
  const base = `[${job.id}] ${job.state}${percent}${description}`;

  if (job.result && !job.result.ok) {
    return chalk.red(`${base}: ${job.result.error}`);
  }
  return job.state === 'SUCCEEDED' ? chalk.green(base) : base;
}

export function formatBackendInfo(info: BackendInfo): string[] {
  const lines = [
    `${chalk.bold('Backend:')} ${info.backend ?? 'none'} (${info.status})`,
    `${chalk.bold('Capabilities:')} ${info.capabilities.join(', ') || 'none'}`,
  ];
  if (info.reason) {
    lines.push(`${chalk.bold('Selected by:')} ${info.reason}`);
  }
  for (const attempt of info.attempts) {
    const outcome = attempt.ok ? chalk.green('ok') : chalk.red(attempt.error?.message ?? 'failed');
    lines.push(`  probe ${attempt.backend}: ${outcome} (${attempt.durationMs}ms)`);
  }
  return lines;
}

export function formatHealth(report: HealthReport): string[] {
  const status = report.healthy ? chalk.green('healthy') : chalk.red('unhealthy');
  const lines = [`${report.backend}: ${status} (${report.latencyMs}ms)`];
  for (const [key, value] of Object.entries(report.detail)) {
    lines.push(`  ${key}: ${value}`);
  }
  if (report.error) {
    lines.push(chalk.red(`  ${report.error.kind}: ${report.error.message}`));
  }
  return lines;
}

export function formatError(payload: ErrorPayload): string {
  const retry = payload.retryable ? ' (retryable)' : '';
  return `${chalk.red(`${payload.kind}:`)} ${payload.message}${retry}`;
}
