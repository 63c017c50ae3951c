/**
 * Argument vectors for the local storage, listing and copy tools
 */

import type { CliConfig } from '../types/index.js';

export interface CommandLine {
  command: string;
  args: string[];
}

export const FIND_FORMAT = '%y\\t%s\\t%T@\\t%P\\n';

export interface ZfsCommandSet {
  listDatasets(): CommandLine;
  listSnapshots(datasetId: string): CommandLine;
  listDirectory(absoluteDirectory: string): CommandLine;
  copy(source: string, destination: string, overwrite: boolean): CommandLine;
  health(): CommandLine;
}

export function createZfsCommandSet(config: Pick<CliConfig, 'toolPath' | 'listCommand' | 'copyCommand'>): ZfsCommandSet {
  return {
    listDatasets: () => ({
      command: config.toolPath,
      args: ['list', '-H', '-p', '-t', 'filesystem', '-o', 'name,mountpoint'],
    }),
    listSnapshots: (datasetId) => ({
      command: config.toolPath,
      args: ['list', '-H', '-p', '-t', 'snapshot', '-d', '1', '-o', 'name,creation', datasetId],
    }),
    listDirectory: (absoluteDirectory) => ({
      command: config.listCommand,
      args: [absoluteDirectory, '-mindepth', '1', '-maxdepth', '1', '-printf', FIND_FORMAT],
    }),
    copy: (source, destination, overwrite) => ({
      command: config.copyCommand,
      // -n leaves existing files untouched, -f replaces them
      args: ['-a', overwrite ? '-f' : '-n', '--', source, destination],
    }),
    health: () => ({
      command: config.toolPath,
      args: ['list', '-H', '-o', 'name', '-d', '0'],
    }),
  };
}
