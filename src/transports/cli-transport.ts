import { randomUUID } from 'node:crypto';
import {
  parseDatasetLines,
  parseSnapshotLines,
} from '../core/discovery-normalizer.js';
import { parseFindOutput } from '../core/entry-normalizer.js';
import { snapshotRoot } from '../path-validator.js';
import type {
  BackendCapability,
  Capability,
  CliConfig,
  Dataset,
  HealthReport,
  JobRegistry,
  RestoreJob,
  Snapshot,
  SnapshotEntry,
} from '../types/index.js';
import { BackendError, BackendUnavailableError, TimeoutError, toErrorPayload } from '../utils/error-utils.js';
import { CommandPool } from '../utils/platform/command-pool.js';
import type { CommandResult, CommandRunner } from '../utils/platform/command-runner.js';
import { runCommand } from '../utils/platform/command-runner.js';
import type { ExecutableManager } from '../utils/platform/executable-manager.js';
import { executableManager } from '../utils/platform/executable-manager.js';
import { getLogger } from '../utils/structured-logger.js';
import { withTimeout } from '../utils/with-timeout.js';
import type { RestoreRequest, SnapshotTransport } from './types.js';
import type { CommandLine, ZfsCommandSet } from './zfs-commands.js';
import { createZfsCommandSet } from './zfs-commands.js';

const logger = getLogger('CliTransport');

export const CLI_CAPABILITIES: readonly Capability[] = ['list', 'diff', 'restore', 'health'];

export interface CliTransportDependencies {
  runner?: CommandRunner;
  executables?: ExecutableManager;
}

function firstLine(text: string): string {
  return text.trim().split('\n')[0] ?? '';
}

/**
 * Backend that drives the storage tools on the local host. Every command goes through a
 * fixed-size pool; restores run to completion before the job is reported.
 */
export class CliTransport implements SnapshotTransport {
  readonly kind = 'cli' as const;
  readonly capabilities: BackendCapability = new Set<Capability>(CLI_CAPABILITIES);

  private readonly pool: CommandPool;
  private readonly commands: ZfsCommandSet;
  private readonly runner: CommandRunner;
  private readonly executables: ExecutableManager;

  constructor(
    private readonly config: CliConfig,
    private readonly jobs: JobRegistry,
    dependencies: CliTransportDependencies = {}
  ) {
    this.pool = new CommandPool(config.poolSize);
    this.commands = createZfsCommandSet(config);
    this.runner = dependencies.runner ?? runCommand;
    this.executables = dependencies.executables ?? executableManager;
  }

  /**
   * Run through the pool; spawn failures and timeouts propagate from the runner
   */
  private exec(line: CommandLine, timeoutMs: number = this.config.commandTimeout): Promise<CommandResult> {
    return this.pool.run(() => this.runner(line.command, line.args, { timeoutMs }));
  }

  private async execChecked(line: CommandLine): Promise<string> {
    const result = await this.exec(line);
    if (result.exitCode !== 0) {
      const reason = firstLine(result.stderr) || `exited with ${result.exitCode ?? result.signal}`;
      throw new BackendError(`${line.command} ${line.args[0] ?? ''}: ${reason}`.trim(), {
        exitCode: result.exitCode,
        stderr: result.stderr,
      });
    }
    return result.stdout;
  }

  async listDatasets(): Promise<Dataset[]> {
    return parseDatasetLines(await this.execChecked(this.commands.listDatasets()));
  }

  async listSnapshots(dataset: Dataset): Promise<Snapshot[]> {
    return parseSnapshotLines(await this.execChecked(this.commands.listSnapshots(dataset.id)), dataset);
  }

  async listEntries(dataset: Dataset, snapshot: string, relativePath: string): Promise<SnapshotEntry[]> {
    const root = snapshotRoot(dataset, snapshot);
    const directory = relativePath ? `${root}/${relativePath}` : root;
    return parseFindOutput(await this.execChecked(this.commands.listDirectory(directory)), relativePath);
  }

  async submitRestore(request: RestoreRequest): Promise<RestoreJob> {
    const line = this.commands.copy(request.sourcePath, request.destinationPath, request.overwrite);
    logger.info('Starting local restore', { dataset: request.dataset.id, snapshot: request.snapshot });

    // A copy that cannot be spawned throws here, before anything is registered
    let result: CommandResult | TimeoutError;
    try {
      result = await this.exec(line, this.config.restoreTimeout);
    } catch (error) {
      if (!(error instanceof TimeoutError)) {
        throw error;
      }
      result = error;
    }

    const job = this.jobs.register({
      id: `local-${randomUUID()}`,
      backend: 'cli',
      dataset: request.dataset.id,
      snapshot: request.snapshot,
      sourcePath: request.sourcePath,
      destinationPath: request.destinationPath,
      overwrite: request.overwrite,
    });

    if (result instanceof TimeoutError) {
      logger.warn('Local restore was killed', { job_id: job.id, duration_ms: result.timeoutMs });
      this.jobs.ingest({
        jobId: job.id,
        state: 'FAILED',
        error: `${line.command} was killed after ${result.timeoutMs}ms; ${request.destinationPath} may be partially copied`,
      });
    } else if (result.exitCode === 0) {
      this.jobs.ingest({ jobId: job.id, state: 'SUCCEEDED', detail: `copied in ${result.durationMs}ms` });
    } else {
      const stderr = result.stderr.trim();
      this.jobs.ingest({
        jobId: job.id,
        state: 'FAILED',
        error: stderr || `${line.command} exited with ${result.exitCode ?? result.signal}`,
      });
    }

    return this.jobs.getJob(job.id) ?? job;
  }

  async probe(timeoutMs: number): Promise<void> {
    const info = await withTimeout(this.executables.find(this.config.toolPath), timeoutMs, 'cli probe');
    if (!info.exists) {
      throw new BackendUnavailableError(`${this.config.toolPath} was not found on PATH`);
    }
  }

  async checkHealth(): Promise<HealthReport> {
    const started = Date.now();
    try {
      const stdout = await this.execChecked(this.commands.health());
      const pools = stdout
        .split('\n')
        .map((name) => name.trim())
        .filter((name) => name.length > 0);
      return {
        backend: 'cli',
        healthy: true,
        checkedAt: new Date(),
        latencyMs: Date.now() - started,
        detail: { pools: pools.join(',') },
      };
    } catch (error) {
      return {
        backend: 'cli',
        healthy: false,
        checkedAt: new Date(),
        latencyMs: Date.now() - started,
        detail: {},
        error: toErrorPayload(error),
      };
    }
  }

  async dispose(): Promise<void> {
    // Nothing persistent; running commands finish or time out on their own
  }
}
