/**
 * Configuration loading: defaults, then an optional JSON file, then environment variables
 */

import { existsSync, readFileSync } from 'node:fs';
import { createDefaultConfig, mergeWithDefaults } from './default-config.js';
import type { AppConfig, BackendKind, CliConfig, JobConfig, PartialAppConfig, RpcConfig } from './types/index.js';
import { ConfigurationError, getErrorMessage } from './utils/error-utils.js';
import { getLogger } from './utils/structured-logger.js';
import { isKeyOf, isRecord } from './utils/type-guards.js';

const logger = getLogger('ConfigLoader');

export const CONFIG_PATH_ENV = 'SNAPSHOT_PORTAL_CONFIG';

export interface LoadConfigOptions {
  configPath?: string;
  env?: NodeJS.ProcessEnv;
}

type Source = string;

function parseBackend(value: unknown, source: Source): BackendKind | undefined {
  if (value === undefined || value === '' || value === 'auto') {
    return undefined;
  }
  if (value === 'rpc' || value === 'cli') {
    return value;
  }
  throw new ConfigurationError(`${source}: backend must be 'rpc', 'cli' or 'auto', got ${JSON.stringify(value)}`);
}

function parseInteger(value: unknown, source: Source, min: number): number | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  const parsed = typeof value === 'number' ? value : typeof value === 'string' ? Number(value.trim()) : Number.NaN;
  if (!Number.isInteger(parsed) || parsed < min) {
    throw new ConfigurationError(`${source}: expected an integer >= ${min}, got ${JSON.stringify(value)}`);
  }
  return parsed;
}

function parseBoolean(value: unknown, source: Source): boolean | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'string') {
    const normalized = value.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(normalized)) {
      return true;
    }
    if (['0', 'false', 'no', 'off'].includes(normalized)) {
      return false;
    }
  }
  throw new ConfigurationError(`${source}: expected a boolean, got ${JSON.stringify(value)}`);
}

function parseString(value: unknown, source: Source): string | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (typeof value !== 'string') {
    throw new ConfigurationError(`${source}: expected a string, got ${JSON.stringify(value)}`);
  }
  return value;
}

/**
 * Drop keys whose value is undefined so they do not override lower layers when spread
 */
function defined<T extends object>(values: T): Partial<T> {
  const result: Partial<T> = {};
  for (const key of Object.keys(values)) {
    if (isKeyOf(values, key)) {
      const value = values[key];
      if (value !== undefined) {
        result[key] = value;
      }
    }
  }
  return result;
}

function section(value: unknown, name: string, source: Source): Record<string, unknown> {
  if (value === undefined) {
    return {};
  }
  if (!isRecord(value)) {
    throw new ConfigurationError(`${source}: '${name}' must be an object`);
  }
  return value;
}

/**
 * Validate a parsed JSON config document
 */
export function parseConfigDocument(document: unknown, source: Source): PartialAppConfig {
  if (!isRecord(document)) {
    throw new ConfigurationError(`${source}: configuration must be a JSON object`, source);
  }
  const rpc = section(document.rpc, 'rpc', source);
  const cli = section(document.cli, 'cli', source);
  const jobs = section(document.jobs, 'jobs', source);

  const rpcConfig: Partial<RpcConfig> = defined({
    url: parseString(rpc.url, `${source} rpc.url`),
    apiKey: parseString(rpc.apiKey, `${source} rpc.apiKey`),
    wsPath: parseString(rpc.wsPath, `${source} rpc.wsPath`),
    verifyTls: parseBoolean(rpc.verifyTls, `${source} rpc.verifyTls`),
    requestTimeout: parseInteger(rpc.requestTimeout, `${source} rpc.requestTimeout`, 1),
    connectTimeout: parseInteger(rpc.connectTimeout, `${source} rpc.connectTimeout`, 1),
    probeTimeout: parseInteger(rpc.probeTimeout, `${source} rpc.probeTimeout`, 1),
    reconnect: parseBoolean(rpc.reconnect, `${source} rpc.reconnect`),
    reconnectInterval: parseInteger(rpc.reconnectInterval, `${source} rpc.reconnectInterval`, 1),
    reconnectMaxRetries: parseInteger(rpc.reconnectMaxRetries, `${source} rpc.reconnectMaxRetries`, 0),
  });
  const cliConfig: Partial<CliConfig> = defined({
    toolPath: parseString(cli.toolPath, `${source} cli.toolPath`),
    listCommand: parseString(cli.listCommand, `${source} cli.listCommand`),
    copyCommand: parseString(cli.copyCommand, `${source} cli.copyCommand`),
    poolSize: parseInteger(cli.poolSize, `${source} cli.poolSize`, 1),
    commandTimeout: parseInteger(cli.commandTimeout, `${source} cli.commandTimeout`, 1),
    restoreTimeout: parseInteger(cli.restoreTimeout, `${source} cli.restoreTimeout`, 0),
  });
  const jobConfig: Partial<JobConfig> = defined({
    retentionMs: parseInteger(jobs.retentionMs, `${source} jobs.retentionMs`, 0),
    subscriberBufferSize: parseInteger(jobs.subscriberBufferSize, `${source} jobs.subscriberBufferSize`, 1),
  });

  return {
    backend: parseBackend(document.backend, `${source} backend`),
    rpc: rpcConfig,
    cli: cliConfig,
    jobs: jobConfig,
    healthCheckInterval: parseInteger(document.healthCheckInterval, `${source} healthCheckInterval`, 0),
    snapshotCacheTtl: parseInteger(document.snapshotCacheTtl, `${source} snapshotCacheTtl`, 0),
  };
}

/**
 * Overrides taken from environment variables
 */
export function configFromEnv(env: NodeJS.ProcessEnv): PartialAppConfig {
  return {
    backend: parseBackend(env.SNAPSHOT_BACKEND, 'SNAPSHOT_BACKEND'),
    rpc: defined({
      url: parseString(env.MIDDLEWARE_URL, 'MIDDLEWARE_URL'),
      apiKey: parseString(env.MIDDLEWARE_API_KEY, 'MIDDLEWARE_API_KEY'),
      wsPath: parseString(env.MIDDLEWARE_WS_PATH, 'MIDDLEWARE_WS_PATH'),
      verifyTls: parseBoolean(env.MIDDLEWARE_VERIFY_TLS, 'MIDDLEWARE_VERIFY_TLS'),
      requestTimeout: parseInteger(env.RPC_TIMEOUT_MS, 'RPC_TIMEOUT_MS', 1),
      probeTimeout: parseInteger(env.RPC_PROBE_TIMEOUT_MS, 'RPC_PROBE_TIMEOUT_MS', 1),
    }),
    cli: defined({
      toolPath: parseString(env.STORAGE_TOOL_PATH, 'STORAGE_TOOL_PATH'),
      listCommand: parseString(env.LIST_TOOL_PATH, 'LIST_TOOL_PATH'),
      copyCommand: parseString(env.COPY_TOOL_PATH, 'COPY_TOOL_PATH'),
      poolSize: parseInteger(env.CLI_POOL_SIZE, 'CLI_POOL_SIZE', 1),
      commandTimeout: parseInteger(env.CLI_COMMAND_TIMEOUT_MS, 'CLI_COMMAND_TIMEOUT_MS', 1),
      restoreTimeout: parseInteger(env.CLI_RESTORE_TIMEOUT_MS, 'CLI_RESTORE_TIMEOUT_MS', 0),
    }),
    jobs: defined({
      retentionMs: parseInteger(env.JOB_RETENTION_MS, 'JOB_RETENTION_MS', 0),
    }),
    healthCheckInterval: parseInteger(env.HEALTH_CHECK_INTERVAL_MS, 'HEALTH_CHECK_INTERVAL_MS', 0),
    snapshotCacheTtl: parseInteger(env.SNAPSHOT_CACHE_TTL_MS, 'SNAPSHOT_CACHE_TTL_MS', 0),
  };
}

export function readConfigFile(configPath: string): PartialAppConfig {
  if (!existsSync(configPath)) {
    throw new ConfigurationError(`Config file does not exist: ${configPath}`, configPath);
  }
  let document: unknown;
  try {
    document = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch (error) {
    throw new ConfigurationError(`Cannot read config file ${configPath}: ${getErrorMessage(error)}`, configPath, {
      cause: error,
    });
  }
  return parseConfigDocument(document, configPath);
}

export function loadConfig(options: LoadConfigOptions = {}): AppConfig {
  const env = options.env ?? process.env;
  const configPath = options.configPath ?? parseString(env[CONFIG_PATH_ENV], CONFIG_PATH_ENV);

  let config = createDefaultConfig();
  if (configPath) {
    logger.info('Loading config from file', { config_path: configPath });
    config = mergeWithDefaults(readConfigFile(configPath), config);
  }
  config = mergeWithDefaults(configFromEnv(env), config);

  logger.debug('Configuration loaded', {
    backend: config.backend ?? 'auto',
    rpc_configured: Boolean(config.rpc.url && config.rpc.apiKey),
  });
  return config;
}

/**
 * WebSocket endpoint for the configured middleware URL. `ws(s)://` URLs are used as given;
 * `http(s)://` base URLs get the matching scheme and `wsPath` appended.
 */
export function resolveWebSocketUrl(rpc: Pick<RpcConfig, 'url' | 'wsPath'>): string {
  if (!rpc.url) {
    throw new ConfigurationError('Middleware URL is not configured');
  }

  let parsed: URL;
  try {
    parsed = new URL(rpc.url);
  } catch (error) {
    throw new ConfigurationError(`Invalid middleware URL: ${rpc.url}`, undefined, { cause: error });
  }

  if (parsed.protocol === 'ws:' || parsed.protocol === 'wss:') {
    return parsed.toString();
  }
  if (parsed.protocol !== 'http:' && parsed.protocol !== 'https:') {
    throw new ConfigurationError(`Unsupported middleware URL scheme: ${parsed.protocol}`);
  }

  parsed.protocol = parsed.protocol === 'https:' ? 'wss:' : 'ws:';
  const basePath = parsed.pathname.replace(/\/+$/, '');
  const wsPath = rpc.wsPath.startsWith('/') ? rpc.wsPath : `/${rpc.wsPath}`;
  parsed.pathname = `${basePath}${wsPath}`;
  return parsed.toString();
}
