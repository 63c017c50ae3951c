/**
 * Configuration type definitions
 */

import type { BackendKind } from './backend.js';

export interface RpcConfig {
  /** http(s) base URL of the appliance, or a full ws(s) URL */
  url?: string;
  apiKey?: string;
  wsPath: string;
  verifyTls: boolean;
  requestTimeout: number;
  connectTimeout: number;
  probeTimeout: number;
  reconnect: boolean;
  reconnectInterval: number;
  reconnectMaxRetries: number;
}

export interface CliConfig {
  toolPath: string;
  listCommand: string;
  copyCommand: string;
  poolSize: number;
  /** Limit for listing and discovery commands */
  commandTimeout: number;
  /** Limit for restore copies; 0 lets a copy run to completion */
  restoreTimeout: number;
}

export interface JobConfig {
  retentionMs: number;
  subscriberBufferSize: number;
}

export interface AppConfig {
  /** Explicit backend; when set, selection does not probe */
  backend?: BackendKind;
  rpc: RpcConfig;
  cli: CliConfig;
  jobs: JobConfig;
  healthCheckInterval: number;
  snapshotCacheTtl: number;
}

export type PartialAppConfig = {
  backend?: BackendKind;
  rpc?: Partial<RpcConfig>;
  cli?: Partial<CliConfig>;
  jobs?: Partial<JobConfig>;
  healthCheckInterval?: number;
  snapshotCacheTtl?: number;
};
