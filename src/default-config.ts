import type { AppConfig, PartialAppConfig } from './types/index.js';

/**
 * Default configuration. Remote access stays disabled until a URL and API key are supplied.
 */
export function createDefaultConfig(): AppConfig {
  return {
    rpc: {
      wsPath: '/websocket',
      verifyTls: true,
      requestTimeout: 30000,
      connectTimeout: 10000,
      probeTimeout: 5000,
      reconnect: true,
      reconnectInterval: 1000,
      reconnectMaxRetries: 10,
    },
    cli: {
      toolPath: 'zfs',
      listCommand: 'find',
      copyCommand: 'cp',
      poolSize: 2,
      commandTimeout: 60000,
      restoreTimeout: 0,
    },
    jobs: {
      retentionMs: 10 * 60 * 1000,
      subscriberBufferSize: 32,
    },
    healthCheckInterval: 30000,
    snapshotCacheTtl: 30000,
  };
}

/**
 * Merge user config with defaults
 * User config takes precedence, section by section
 */
export function mergeWithDefaults(userConfig: PartialAppConfig = {}, base: AppConfig = createDefaultConfig()): AppConfig {
  return {
    backend: userConfig.backend ?? base.backend,
    rpc: { ...base.rpc, ...userConfig.rpc },
    cli: { ...base.cli, ...userConfig.cli },
    jobs: { ...base.jobs, ...userConfig.jobs },
    healthCheckInterval: userConfig.healthCheckInterval ?? base.healthCheckInterval,
    snapshotCacheTtl: userConfig.snapshotCacheTtl ?? base.snapshotCacheTtl,
  };
}
