#!/usr/bin/env node

import { Command } from 'commander';
import { healthCommand, infoCommand } from './cli/commands/backend.js';
import {
  datasetsCommand,
  diffCommand,
  lsCommand,
  poolsCommand,
  snapshotsCommand,
} from './cli/commands/browse.js';
import { cancelCommand, restoreCommand } from './cli/commands/restore.js';
import type { GlobalOptions } from './cli/utils/portal-runner.js';
import { withPortal } from './cli/utils/portal-runner.js';

const program = new Command();

program
  .name('snapshot-portal')
  .description('Browse, diff and restore filesystem snapshots through the storage middleware or local tools')
  .version('0.1.0');

// Global options
program
  .option('-c, --config <path>', 'JSON configuration file')
  .option('-b, --backend <backend>', 'Force a backend: rpc, cli or auto')
  .option('--json', 'Print machine-readable JSON');

function globals(): GlobalOptions {
  return program.opts<GlobalOptions>();
}

program
  .command('info')
  .description('Show the selected backend and its capabilities')
  .action(() => withPortal(globals(), (portal) => infoCommand(portal, globals())));

program
  .command('health')
  .description('Check backend health now')
  .action(() => withPortal(globals(), (portal) => healthCommand(portal, globals())));

program
  .command('datasets')
  .description('List mounted datasets')
  .action(() => withPortal(globals(), (portal) => datasetsCommand(portal, globals())));

program
  .command('pools')
  .description('List pools with their datasets and snapshot counts')
  .action(() => withPortal(globals(), (portal) => poolsCommand(portal, globals())));

program
  .command('snapshots <dataset>')
  .description('List snapshots of a dataset, newest first')
  .action((dataset: string) => withPortal(globals(), (portal) => snapshotsCommand(portal, globals(), dataset)));

program
  .command('ls <dataset> <snapshot> [path]')
  .description('List a directory inside a snapshot')
  .action((dataset: string, snapshot: string, path?: string) =>
    withPortal(globals(), (portal) => lsCommand(portal, globals(), dataset, snapshot, path))
  );

program
  .command('diff <dataset> <from> <to> [path]')
  .description('Compare a directory between two snapshots')
  .option('-a, --all', 'Include unchanged entries')
  .action((dataset: string, from: string, to: string, path: string | undefined, options: { all?: boolean }) =>
    withPortal(globals(), (portal) => diffCommand(portal, { ...globals(), ...options }, dataset, from, to, path))
  );

program
  .command('restore <dataset> <snapshot> <source> <destination>')
  .description('Copy a file or directory out of a snapshot into the live dataset')
  .option('--overwrite', 'Replace files that already exist at the destination')
  .option('--no-follow', 'Return after submitting instead of waiting for the job')
  .action(
    (
      dataset: string,
      snapshot: string,
      source: string,
      destination: string,
      options: { overwrite?: boolean; follow?: boolean }
    ) =>
      withPortal(globals(), (portal) =>
        restoreCommand(portal, { ...globals(), ...options }, dataset, snapshot, source, destination)
      )
  );

program
  .command('cancel <jobId>')
  .description('Abort a running restore job')
  .action((jobId: string) => withPortal(globals(), (portal) => cancelCommand(portal, globals(), jobId)));

await program.parseAsync(process.argv);
