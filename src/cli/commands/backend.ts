import type { SnapshotPortal } from '../../portal.js';
import { formatBackendInfo, formatHealth } from '../utils/output.js';
import type { GlobalOptions } from '../utils/portal-runner.js';
import { emit } from '../utils/portal-runner.js';

/**
 * Which backend was selected, why, and what it can do
 */
export async function infoCommand(portal: SnapshotPortal, options: GlobalOptions): Promise<void> {
  const info = portal.backendInfo();
  emit(options, info, formatBackendInfo(info));
}

export async function healthCommand(portal: SnapshotPortal, options: GlobalOptions): Promise<void> {
  const report = await portal.backendHealth({ refresh: true });
  emit(options, report, formatHealth(report));
  if (!report.healthy) {
    process.exitCode = 1;
  }
}
