/**
 * Spawns a single external command and collects its output
 */

import { spawn } from 'node:child_process';
import { BackendUnavailableError, TimeoutError, getErrorMessage } from '../error-utils.js';
import { getLogger } from '../structured-logger.js';
import { killTree } from './process-manager.js';

const logger = getLogger('CommandRunner');

export interface CommandResult {
  exitCode: number | null;
  signal: NodeJS.Signals | null;
  stdout: string;
  stderr: string;
  durationMs: number;
}

export interface CommandOptions {
  /** 0 disables the limit */
  timeoutMs: number;
  cwd?: string;
}

/**
 * Runs `command` with `args` (no shell). Resolves with the result for any exit status;
 * rejects with `BackendUnavailableError` when the process cannot be spawned and with
 * `TimeoutError` after killing a process tree that outlived `timeoutMs`.
 */
export type CommandRunner = (command: string, args: readonly string[], options: CommandOptions) => Promise<CommandResult>;

export const runCommand: CommandRunner = (command, args, options) => {
  const started = Date.now();

  return new Promise<CommandResult>((resolve, reject) => {
    const child = spawn(command, [...args], {
      cwd: options.cwd,
      stdio: ['ignore', 'pipe', 'pipe'],
      shell: false,
    });

    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];
    let timedOut = false;
    let settled = false;

    child.stdout.on('data', (chunk: Buffer) => stdout.push(chunk));
    child.stderr.on('data', (chunk: Buffer) => stderr.push(chunk));

    const timer =
      options.timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            const pid = child.pid;
            if (pid === undefined) {
              return;
            }
            killTree(pid, 'SIGKILL').catch((error: unknown) => {
              logger.warn('Failed to kill timed out command', { command, error_message: getErrorMessage(error) });
            });
          }, options.timeoutMs)
        : undefined;

    child.once('error', (error) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      reject(new BackendUnavailableError(`Cannot run ${command}: ${error.message}`, { cause: error }));
    });

    child.once('close', (exitCode, signal) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);

      const durationMs = Date.now() - started;
      if (timedOut) {
        reject(
          new TimeoutError(`${command} timed out after ${options.timeoutMs}ms`, command, options.timeoutMs)
        );
        return;
      }

      logger.debug('Command finished', { command, exit_code: exitCode ?? undefined, duration_ms: durationMs });
      resolve({
        exitCode,
        signal,
        stdout: Buffer.concat(stdout).toString('utf8'),
        stderr: Buffer.concat(stderr).toString('utf8'),
        durationMs,
      });
    });
  });
};
