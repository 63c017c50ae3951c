import type { SnapshotPortal } from '../../portal.js';
import type { RestoreJob } from '../../types/index.js';
import { isTerminalState } from '../../types/index.js';
import { formatJob } from '../utils/output.js';
import type { GlobalOptions } from '../utils/portal-runner.js';
import { emit } from '../utils/portal-runner.js';

export interface RestoreCommandOptions extends GlobalOptions {
  overwrite?: boolean;
  follow?: boolean;
}

/**
 * Submit a restore and, unless --no-follow, print each job update until it finishes
 */
export async function restoreCommand(
  portal: SnapshotPortal,
  options: RestoreCommandOptions,
  datasetId: string,
  snapshot: string,
  source: string,
  destination: string
): Promise<void> {
  const dataset = await portal.service.getDataset(datasetId);
  const submitted = await portal.service.restore(dataset, snapshot, source, destination, {
    overwrite: options.overwrite ?? false,
  });

  let final: RestoreJob = submitted;
  if (options.follow !== false && !isTerminalState(submitted.state)) {
    for await (const update of portal.service.subscribe(submitted.id)) {
      final = update;
      if (!options.json) {
        console.log(formatJob(update));
      }
    }
  }

  emit(options, final, [formatJob(final)]);
  if (isTerminalState(final.state) && final.state !== 'SUCCEEDED') {
    process.exitCode = 1;
  }
}

export async function cancelCommand(portal: SnapshotPortal, options: GlobalOptions, jobId: string): Promise<void> {
  const job = await portal.service.cancelRestore(jobId);
  emit(options, job ?? { jobId, abortRequested: true }, [job ? formatJob(job) : `Abort requested for job ${jobId}`]);
}
