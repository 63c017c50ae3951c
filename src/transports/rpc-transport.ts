import { randomUUID } from 'node:crypto';
import { EventEmitter } from 'node:events';
import WebSocket from 'ws';
import { resolveWebSocketUrl } from '../config-loader.js';
import { normalizeMiddlewareDatasets, normalizeMiddlewareSnapshots } from '../core/discovery-normalizer.js';
import { normalizeMiddlewareEntries } from '../core/entry-normalizer.js';
import { snapshotRoot } from '../path-validator.js';
import type {
  BackendCapability,
  Capability,
  Dataset,
  HealthReport,
  JobEvent,
  JobRegistry,
  RestoreJob,
  RpcConfig,
  Snapshot,
  SnapshotEntry,
} from '../types/index.js';
import { isTerminalState } from '../types/index.js';
import {
  AuthError,
  BackendError,
  BackendUnavailableError,
  ConfigurationError,
  TimeoutError,
  TransportError,
  getErrorMessage,
  logError,
  toErrorPayload,
} from '../utils/error-utils.js';
import { getLogger } from '../utils/structured-logger.js';
import { isRecord, readString } from '../utils/type-guards.js';
import { withTimeout } from '../utils/with-timeout.js';
import type { ClientFrame, ServerFrame } from './middleware-protocol.js';
import {
  JOB_COLLECTION,
  PROTOCOL_VERSION,
  formatMiddlewareError,
  jobEventFromRecord,
  parseServerFrame,
  toJobEvent,
} from './middleware-protocol.js';
import type { RestoreRequest, SnapshotTransport } from './types.js';

const logger = getLogger('RpcTransport');

const MAX_RECONNECT_DELAY = 30000;

/**
 * Exponential backoff for reconnect attempt `attempt` (zero-based), capped at 30s
 */
export function reconnectDelay(interval: number, attempt: number): number {
  return Math.min(interval * 2 ** attempt, MAX_RECONNECT_DELAY);
}

export const RPC_CAPABILITIES: readonly Capability[] = ['list', 'diff', 'restore', 'jobs', 'cancel', 'health'];

export type RpcConnectionStatus = 'disconnected' | 'authenticating' | 'connected';

export interface RpcTransportStats {
  status: RpcConnectionStatus;
  healthy: boolean;
  pendingCalls: number;
  /** Frames that could not be decoded or were not part of the protocol */
  discardedFrames: number;
  /** Results whose call had already timed out or been abandoned */
  lateResults: number;
  jobEvents: number;
}

export interface RpcDisconnectEvent {
  code: number;
  reason: string;
}

export interface RpcReconnectEvent {
  attempt: number;
  delay: number;
}

interface PendingCall {
  method: string;
  resolve: (result: unknown) => void;
  reject: (error: Error) => void;
  timeout: NodeJS.Timeout;
}

interface HandshakeWaiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

function rawDataToString(data: WebSocket.RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

/**
 * Middleware job ids are integers; keep anything else as-is
 */
function toMiddlewareJobId(jobId: string): number | string {
  return /^\d+$/.test(jobId) ? Number(jobId) : jobId;
}

function readJobId(result: unknown): string | null {
  if (typeof result === 'number' && Number.isInteger(result)) {
    return String(result);
  }
  if (typeof result === 'string' && /^\d+$/.test(result)) {
    return result;
  }
  if (isRecord(result)) {
    const id = result.id;
    if (typeof id === 'number' || typeof id === 'string') {
      return String(id);
    }
  }
  return null;
}

/**
 * Client for the appliance middleware: a persistent, authenticated WebSocket carrying
 * correlated method calls and pushed job updates.
 *
 * Events:
 * - `status` ({@link RpcConnectionStatus}) on every status change
 * - `connected` once the subscription is in place
 * - `disconnected` ({@link RpcDisconnectEvent}) when an established connection closes
 * - `reconnecting` ({@link RpcReconnectEvent}) before each scheduled attempt
 * - `reconnectFailed` ({ attempts }) when the retry budget is spent
 * - `job` ({@link JobEvent}) for every pushed job update
 */
export class RpcTransport extends EventEmitter implements SnapshotTransport {
  readonly kind = 'rpc' as const;
  readonly capabilities: BackendCapability = new Set<Capability>(RPC_CAPABILITIES);

  private socket?: WebSocket;
  private _status: RpcConnectionStatus = 'disconnected';
  private connecting: Promise<void> | null = null;
  private handshake: HandshakeWaiter | null = null;
  private pendingCalls = new Map<string, PendingCall>();
  private healthy = false;
  private reconnectAttempts = 0;
  private reconnectTimer?: NodeJS.Timeout;
  private isManualClose = false;
  private disposed = false;
  private discardedFrames = 0;
  private lateResults = 0;
  private jobEvents = 0;

  constructor(
    private readonly config: RpcConfig,
    private readonly jobs: JobRegistry
  ) {
    super();
  }

  get status(): RpcConnectionStatus {
    return this._status;
  }

  get isHealthy(): boolean {
    return this.healthy;
  }

  get stats(): RpcTransportStats {
    return {
      status: this._status,
      healthy: this.healthy,
      pendingCalls: this.pendingCalls.size,
      discardedFrames: this.discardedFrames,
      lateResults: this.lateResults,
      jobEvents: this.jobEvents,
    };
  }

  private setStatus(status: RpcConnectionStatus): void {
    if (this._status !== status) {
      this._status = status;
      this.emit('status', status);
    }
  }

  /**
   * Open, handshake and authenticate. Concurrent callers share one attempt.
   */
  async connect(): Promise<void> {
    if (this._status === 'connected' && this.socket?.readyState === WebSocket.OPEN) {
      return;
    }
    let attempt = this.connecting;
    if (!attempt) {
      attempt = this.establish().finally(() => {
        this.connecting = null;
      });
      this.connecting = attempt;
    }
    return attempt;
  }

  private async establish(): Promise<void> {
    if (this.disposed) {
      throw new BackendUnavailableError('RPC transport has been disposed');
    }
    const url = resolveWebSocketUrl(this.config);
    if (!this.config.apiKey) {
      throw new ConfigurationError('Middleware API key is not configured');
    }

    this.isManualClose = false;
    this.setStatus('authenticating');
    const started = Date.now();

    try {
      const socket = await this.openSocket(url);
      this.assertWanted();

      await withTimeout(this.performHandshake(socket), this.config.connectTimeout, 'middleware handshake');
      this.assertWanted();
      await this.authenticate(this.config.apiKey);
      this.assertWanted();
      this.send(socket, { id: randomUUID(), msg: 'sub', name: JOB_COLLECTION });

      this.setStatus('connected');
      this.healthy = true;
      this.reconnectAttempts = 0;
      logger.info('Connected to middleware', { url, duration_ms: Date.now() - started });
      this.emit('connected');

      this.reconcileTrackedJobs().catch((error: unknown) => {
        logError('RpcTransport', 'reconcileTrackedJobs', error);
      });
    } catch (error) {
      this.abandonSocket();
      this.setStatus('disconnected');
      this.healthy = false;

      if (error instanceof AuthError || error instanceof ConfigurationError) {
        throw error;
      }
      throw new TransportError(`Cannot connect to middleware at ${url}: ${getErrorMessage(error)}`, {
        cause: error,
      });
    }
  }

  /**
   * A close or dispose that lands while an attempt is in flight ends the attempt
   */
  private assertWanted(): void {
    if (this.disposed || this.isManualClose) {
      throw new BackendUnavailableError('RPC transport was closed while connecting');
    }
  }

  private openSocket(url: string): Promise<WebSocket> {
    return new Promise((resolve, reject) => {
      const socket = new WebSocket(url, {
        rejectUnauthorized: this.config.verifyTls,
        handshakeTimeout: this.config.connectTimeout,
      });
      // Tracked from the start so close() can abort the upgrade
      this.socket = socket;

      const onOpen = () => {
        cleanup();
        socket.on('message', (data) => this.handleRawMessage(socket, data));
        socket.on('close', (code, reason) => this.handleClose(socket, code, reason.toString()));
        resolve(socket);
      };

      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };

      const cleanup = () => {
        socket.off('open', onOpen);
        socket.off('error', onError);
      };

      // Persistent listener: ws emits 'error' on the socket and an unhandled one would throw
      socket.on('error', (error) => {
        logger.debug('WebSocket error', { url, error_message: error.message });
      });
      socket.once('open', onOpen);
      socket.once('error', onError);
    });
  }

  private performHandshake(socket: WebSocket): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      this.handshake = { resolve, reject };
      this.send(socket, { msg: 'connect', version: PROTOCOL_VERSION, support: [PROTOCOL_VERSION] });
    }).finally(() => {
      this.handshake = null;
    });
  }

  private async authenticate(apiKey: string): Promise<void> {
    let accepted: unknown;
    try {
      accepted = await this.request('auth.login_with_api_key', [apiKey], this.config.connectTimeout);
    } catch (error) {
      if (error instanceof BackendError) {
        throw new AuthError(`API key login failed: ${error.message}`, { cause: error });
      }
      throw error;
    }
    if (accepted !== true) {
      throw new AuthError('Middleware rejected the API key');
    }
  }

  /**
   * Drop a socket that never became usable, without triggering close handling
   */
  private abandonSocket(): void {
    const socket = this.socket;
    this.socket = undefined;
    if (!socket) {
      return;
    }
    socket.removeAllListeners('message');
    socket.removeAllListeners('close');
    this.failPending(new BackendUnavailableError('Connection to middleware was abandoned'));
    socket.terminate();
  }

  private send(socket: WebSocket, frame: ClientFrame, onError?: (error: Error) => void): void {
    socket.send(JSON.stringify(frame), (error) => {
      if (error) {
        logger.debug('Failed to send frame', { msg: frame.msg, error_message: error.message });
        onError?.(error);
      }
    });
  }

  private request(method: string, params: unknown[], timeoutMs: number = this.config.requestTimeout): Promise<unknown> {
    const socket = this.socket;
    if (!socket || socket.readyState !== WebSocket.OPEN) {
      return Promise.reject(new BackendUnavailableError(`Not connected to middleware (calling ${method})`));
    }

    return new Promise<unknown>((resolve, reject) => {
      const id = randomUUID();

      const timeout = setTimeout(() => {
        this.pendingCalls.delete(id);
        reject(new TimeoutError(`Middleware call ${method} timed out after ${timeoutMs}ms`, method, timeoutMs));
      }, timeoutMs);

      this.pendingCalls.set(id, { method, resolve, reject, timeout });

      this.send(socket, { id, msg: 'method', method, params }, (error) => {
        const pending = this.pendingCalls.get(id);
        if (pending) {
          clearTimeout(pending.timeout);
          this.pendingCalls.delete(id);
          reject(new TransportError(`Failed to send ${method}: ${error.message}`, { cause: error }));
        }
      });
    });
  }

  /**
   * Invoke a middleware method, connecting first when needed
   */
  async call(method: string, params: unknown[] = []): Promise<unknown> {
    if (this._status !== 'connected') {
      await this.connect();
    }
    const started = Date.now();
    const result = await this.request(method, params);
    logger.debug('Middleware call completed', { method, duration_ms: Date.now() - started });
    return result;
  }

  private handleRawMessage(socket: WebSocket, data: WebSocket.RawData): void {
    let decoded: unknown;
    try {
      decoded = JSON.parse(rawDataToString(data));
    } catch (error) {
      this.discardedFrames++;
      logger.debug('Discarded undecodable frame', { error_message: getErrorMessage(error) });
      return;
    }

    const frame = parseServerFrame(decoded);
    if (!frame) {
      this.discardedFrames++;
      logger.debug('Discarded unknown frame');
      return;
    }
    this.handleFrame(socket, frame);
  }

  private handleFrame(socket: WebSocket, frame: ServerFrame): void {
    switch (frame.msg) {
      case 'connected':
        this.handshake?.resolve();
        return;
      case 'failed':
        this.handshake?.reject(
          new TransportError(`Middleware does not support protocol version ${PROTOCOL_VERSION}`)
        );
        return;
      case 'ping':
        this.send(socket, frame.id === undefined ? { msg: 'pong' } : { msg: 'pong', id: frame.id });
        return;
      case 'result': {
        const pending = this.pendingCalls.get(frame.id);
        if (!pending) {
          this.lateResults++;
          logger.debug('Discarded result for unknown call', { request_id: frame.id });
          return;
        }
        clearTimeout(pending.timeout);
        this.pendingCalls.delete(frame.id);
        if (frame.error) {
          const code = frame.error.errname ?? frame.error.error;
          pending.reject(
            new BackendError(`${pending.method}: ${formatMiddlewareError(frame.error)}`, {
              ...(code !== undefined ? { code } : {}),
            })
          );
        } else {
          pending.resolve(frame.result);
        }
        return;
      }
      case 'added':
      case 'changed': {
        const event = toJobEvent(frame);
        if (event) {
          this.forwardJobEvent(event);
        }
        return;
      }
      case 'ready':
      case 'nosub':
        logger.debug('Subscription update', { msg: frame.msg });
        return;
    }
  }

  private forwardJobEvent(event: JobEvent): void {
    this.jobEvents++;
    this.jobs.ingest(event);
    this.emit('job', event);
  }

  private failPending(error: Error): void {
    this.handshake?.reject(error);
    for (const pending of this.pendingCalls.values()) {
      clearTimeout(pending.timeout);
      pending.reject(error);
    }
    this.pendingCalls.clear();
  }

  private handleClose(socket: WebSocket, code: number, reason: string): void {
    if (socket !== this.socket) {
      return;
    }
    this.socket = undefined;

    const wasConnected = this._status === 'connected';
    this.healthy = false;
    this.setStatus('disconnected');
    this.failPending(
      new BackendUnavailableError(`Connection to middleware closed (code ${code}${reason ? `: ${reason}` : ''})`)
    );

    logger.warn('Disconnected from middleware', { code, reason });
    const event: RpcDisconnectEvent = { code, reason };
    this.emit('disconnected', event);

    if (wasConnected && this.config.reconnect && !this.isManualClose && !this.disposed) {
      this.scheduleReconnect();
    }
  }

  private scheduleReconnect(): void {
    if (this.disposed || this.isManualClose) {
      return;
    }
    if (this.reconnectAttempts >= this.config.reconnectMaxRetries) {
      logger.warn('Giving up on middleware reconnection', { attempts: this.reconnectAttempts });
      this.emit('reconnectFailed', { attempts: this.reconnectAttempts });
      return;
    }

    const delay = reconnectDelay(this.config.reconnectInterval, this.reconnectAttempts);
    this.reconnectAttempts++;
    const event: RpcReconnectEvent = { attempt: this.reconnectAttempts, delay };
    this.emit('reconnecting', event);

    this.reconnectTimer = setTimeout(() => {
      this.reconnectTimer = undefined;
      this.connect().catch((error: unknown) => {
        logger.warn('Middleware reconnection failed', {
          attempts: this.reconnectAttempts,
          error_message: getErrorMessage(error),
        });
        this.scheduleReconnect();
      });
    }, delay);
    this.reconnectTimer.unref();
  }

  async close(): Promise<void> {
    this.isManualClose = true;
    if (this.reconnectTimer) {
      clearTimeout(this.reconnectTimer);
      this.reconnectTimer = undefined;
    }

    const attempt = this.connecting;
    if (attempt) {
      this.abandonSocket();
      await attempt.catch((error: unknown) => {
        logger.debug('Connection attempt ended by close', { error_message: getErrorMessage(error) });
      });
      this.setStatus('disconnected');
      return;
    }

    const socket = this.socket;
    if (!socket) {
      this.setStatus('disconnected');
      return;
    }

    await new Promise<void>((resolve) => {
      socket.once('close', () => resolve());
      socket.close(1000, 'client closing');
    });
  }

  async dispose(): Promise<void> {
    this.disposed = true;
    await this.close();
  }

  // SnapshotTransport

  async listDatasets(): Promise<Dataset[]> {
    return normalizeMiddlewareDatasets(await this.call('zfs.dataset.query'));
  }

  async listSnapshots(dataset: Dataset): Promise<Snapshot[]> {
    const raw = await this.call('zfs.snapshot.query', [[['dataset', '=', dataset.id]]]);
    return normalizeMiddlewareSnapshots(raw, dataset);
  }

  async listEntries(dataset: Dataset, snapshot: string, relativePath: string): Promise<SnapshotEntry[]> {
    const root = snapshotRoot(dataset, snapshot);
    const directory = relativePath ? `${root}/${relativePath}` : root;
    return normalizeMiddlewareEntries(await this.call('filesystem.listdir', [directory]), relativePath);
  }

  async submitRestore(request: RestoreRequest): Promise<RestoreJob> {
    const result = await this.call('filesystem.copy', [
      request.sourcePath,
      request.destinationPath,
      { recursive: true, preserve: true, overwrite: request.overwrite },
    ]);

    const jobId = readJobId(result);
    if (!jobId) {
      throw new BackendError(`Unexpected filesystem.copy result: ${JSON.stringify(result)}`);
    }

    const job = this.jobs.register({
      id: jobId,
      backend: 'rpc',
      dataset: request.dataset.id,
      snapshot: request.snapshot,
      sourcePath: request.sourcePath,
      destinationPath: request.destinationPath,
      overwrite: request.overwrite,
    });
    logger.info('Restore job submitted', { job_id: jobId, dataset: request.dataset.id, snapshot: request.snapshot });

    await this.reconcileJob(jobId);
    return this.jobs.getJob(jobId) ?? job;
  }

  /**
   * Pull the current job record once; push frames sent before the id was known were dropped
   */
  private async reconcileJob(jobId: string): Promise<void> {
    try {
      const rows = await this.call('core.get_jobs', [[['id', '=', toMiddlewareJobId(jobId)]]]);
      this.ingestJobRows(rows, new Set([jobId]));
    } catch (error) {
      logError('RpcTransport', 'reconcileJob', error, { job_id: jobId });
    }
  }

  /**
   * Catch up on updates pushed while no connection was open
   */
  private async reconcileTrackedJobs(): Promise<void> {
    const active = this.jobs
      .listJobs()
      .filter((job) => job.backend === 'rpc' && !isTerminalState(job.state))
      .map((job) => job.id);
    if (active.length === 0) {
      return;
    }

    const rows = await this.call('core.get_jobs', [[['id', 'in', active.map(toMiddlewareJobId)]]]);
    const applied = this.ingestJobRows(rows, new Set(active));
    logger.info('Reconciled restore jobs after connecting', { tracked: active.length, applied });
  }

  private ingestJobRows(rows: unknown, wanted: ReadonlySet<string>): number {
    if (!Array.isArray(rows)) {
      return 0;
    }
    let applied = 0;
    for (const row of rows) {
      const event = isRecord(row) ? jobEventFromRecord(row) : null;
      if (event && wanted.has(event.jobId) && this.jobs.ingest(event)) {
        applied++;
      }
    }
    return applied;
  }

  async cancelRestore(jobId: string): Promise<void> {
    await this.call('core.job_abort', [toMiddlewareJobId(jobId)]);
    logger.info('Requested restore job abort', { job_id: jobId });
  }

  async probe(timeoutMs: number): Promise<void> {
    await withTimeout(
      (async () => {
        await this.connect();
        await this.request('system.version', [], timeoutMs);
      })(),
      timeoutMs,
      'rpc probe'
    );
  }

  async checkHealth(): Promise<HealthReport> {
    const started = Date.now();
    const detail: Record<string, string> = {};
    try {
      const version = await this.call('system.version');
      detail.version = typeof version === 'string' ? version : JSON.stringify(version);

      const pools = await this.call('pool.query');
      if (Array.isArray(pools)) {
        for (const pool of pools) {
          const name = isRecord(pool) ? readString(pool, 'name') : undefined;
          if (name && isRecord(pool)) {
            detail[`pool:${name}`] = readString(pool, 'status') ?? 'UNKNOWN';
          }
        }
      }

      return {
        backend: 'rpc',
        healthy: this.healthy,
        checkedAt: new Date(),
        latencyMs: Date.now() - started,
        detail,
      };
    } catch (error) {
      return {
        backend: 'rpc',
        healthy: false,
        checkedAt: new Date(),
        latencyMs: Date.now() - started,
        detail,
        error: toErrorPayload(error),
      };
    }
  }
}
