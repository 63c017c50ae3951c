/**
 * Process tree termination
 */

import treeKill from 'tree-kill';

/**
 * Kill a process and all of its children. Resolves once the signal has been delivered.
 */
export function killTree(pid: number, signal: NodeJS.Signals = 'SIGTERM'): Promise<void> {
  return new Promise<void>((resolve, reject) => {
    treeKill(pid, signal, (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}
