/**
 * Chooses the backend for the lifetime of a portal instance
 */

import { CliTransport } from '../transports/cli-transport.js';
import { RpcTransport } from '../transports/rpc-transport.js';
import type { SnapshotTransport } from '../transports/types.js';
import type {
  AppConfig,
  BackendCapability,
  BackendInfo,
  BackendKind,
  JobRegistry,
  ProbeAttempt,
  SelectionReason,
} from '../types/index.js';
import type { ErrorPayload } from '../utils/error-utils.js';
import { NoBackendAvailableError, logError, toErrorPayload } from '../utils/error-utils.js';
import { getLogger } from '../utils/structured-logger.js';

const logger = getLogger('BackendSelector');

export interface BackendHandle {
  kind: BackendKind;
  transport: SnapshotTransport;
  capabilities: BackendCapability;
  selectedAt: Date;
  reason: SelectionReason;
  attempts: ProbeAttempt[];
}

export interface TransportFactories {
  /** Returns null when the remote backend is not configured */
  createRpc(config: AppConfig, jobs: JobRegistry): SnapshotTransport | null;
  createCli(config: AppConfig, jobs: JobRegistry): SnapshotTransport;
}

export const defaultTransportFactories: TransportFactories = {
  createRpc: (config, jobs) =>
    config.rpc.url && config.rpc.apiKey ? new RpcTransport(config.rpc, jobs) : null,
  createCli: (config, jobs) => new CliTransport(config.cli, jobs),
};

export class BackendSelector {
  private selection: Promise<BackendHandle> | null = null;
  private handle: BackendHandle | null = null;
  private attempts: ProbeAttempt[] = [];
  private failure: ErrorPayload | null = null;

  constructor(
    private readonly config: AppConfig,
    private readonly jobs: JobRegistry,
    private readonly factories: TransportFactories = defaultTransportFactories
  ) {}

  /**
   * Resolve the backend once; every caller receives the same handle (or the same failure)
   */
  select(): Promise<BackendHandle> {
    if (!this.selection) {
      this.selection = this.runSelection();
    }
    return this.selection;
  }

  getBackendInfo(): BackendInfo {
    if (this.handle) {
      return {
        status: 'selected',
        backend: this.handle.kind,
        capabilities: [...this.handle.capabilities],
        selectedAt: this.handle.selectedAt,
        reason: this.handle.reason,
        attempts: [...this.attempts],
      };
    }
    return {
      status: this.failure ? 'unavailable' : 'pending',
      backend: null,
      capabilities: [],
      selectedAt: null,
      reason: null,
      attempts: [...this.attempts],
      ...(this.failure ? { error: this.failure } : {}),
    };
  }

  async dispose(): Promise<void> {
    await this.handle?.transport.dispose();
  }

  private async runSelection(): Promise<BackendHandle> {
    try {
      const override = this.config.backend;
      if (override) {
        const transport = this.createTransport(override);
        if (!transport) {
          throw new NoBackendAvailableError(`Backend '${override}' was requested but is not configured`);
        }
        logger.info('Backend selected by configuration', { backend: override });
        return this.commit(transport, 'override');
      }

      for (const kind of ['rpc', 'cli'] as const) {
        const transport = this.createTransport(kind);
        if (!transport) {
          logger.debug('Skipping unconfigured backend', { backend: kind });
          continue;
        }
        if (await this.probe(transport)) {
          logger.info('Backend selected by probe', { backend: kind });
          return this.commit(transport, 'probe');
        }
      }

      throw new NoBackendAvailableError(
        `No backend is available (tried: ${this.attempts.map((attempt) => attempt.backend).join(', ') || 'none'})`,
        this.attempts.map((attempt) => ({ backend: attempt.backend, error: attempt.error }))
      );
    } catch (error) {
      this.failure = toErrorPayload(error);
      logError('BackendSelector', 'select', error);
      throw error;
    }
  }

  private createTransport(kind: BackendKind): SnapshotTransport | null {
    return kind === 'rpc'
      ? this.factories.createRpc(this.config, this.jobs)
      : this.factories.createCli(this.config, this.jobs);
  }

  private async probe(transport: SnapshotTransport): Promise<boolean> {
    const started = Date.now();
    const timeout = transport.kind === 'rpc' ? this.config.rpc.probeTimeout : this.config.cli.commandTimeout;
    try {
      await transport.probe(timeout);
      this.attempts.push({ backend: transport.kind, ok: true, durationMs: Date.now() - started });
      return true;
    } catch (error) {
      const payload = toErrorPayload(error);
      this.attempts.push({ backend: transport.kind, ok: false, durationMs: Date.now() - started, error: payload });
      logger.warn('Backend probe failed', { backend: transport.kind, error_code: payload.kind, error_message: payload.message });
      await transport.dispose().catch((disposeError: unknown) => {
        logError('BackendSelector', 'dispose', disposeError, { backend: transport.kind });
      });
      return false;
    }
  }

  private commit(transport: SnapshotTransport, reason: SelectionReason): BackendHandle {
    const handle: BackendHandle = {
      kind: transport.kind,
      transport,
      capabilities: new Set(transport.capabilities),
      selectedAt: new Date(),
      reason,
      attempts: [...this.attempts],
    };
    this.handle = handle;
    return handle;
  }
}
