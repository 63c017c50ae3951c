import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
  CONFIG_PATH_ENV,
  configFromEnv,
  loadConfig,
  parseConfigDocument,
  resolveWebSocketUrl,
} from '../../src/config-loader.js';
import { createDefaultConfig } from '../../src/default-config.js';
import { ConfigurationError } from '../../src/utils/error-utils.js';

describe('config loader', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'snapshot-portal-config-'));
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  function writeConfig(content: unknown): string {
    const configPath = join(tempDir, 'config.json');
    writeFileSync(configPath, typeof content === 'string' ? content : JSON.stringify(content));
    return configPath;
  }

  it('should return the defaults when nothing is configured', () => {
    expect(loadConfig({ env: {} })).toEqual(createDefaultConfig());
  });

  it('should layer the config file under environment variables', () => {
    const configPath = writeConfig({
      backend: 'rpc',
      rpc: { url: 'https://nas.local', apiKey: 'test-secret', requestTimeout: 5000 },
      cli: { poolSize: 4 },
    });

    const config = loadConfig({
      configPath,
      env: { RPC_TIMEOUT_MS: '7000', SNAPSHOT_BACKEND: 'auto', CLI_COMMAND_TIMEOUT_MS: '1000' },
    });

    expect(config.backend).toBe('rpc');
    expect(config.rpc.url).toBe('https://nas.local');
    expect(config.rpc.apiKey).toBe('test-secret');
    expect(config.rpc.requestTimeout).toBe(7000);
    expect(config.rpc.wsPath).toBe('/websocket');
    expect(config.cli.poolSize).toBe(4);
    expect(config.cli.commandTimeout).toBe(1000);
  });

  it('should leave restore copies unlimited unless a restore timeout is set', () => {
    expect(loadConfig({ env: {} }).cli.restoreTimeout).toBe(0);
    expect(loadConfig({ env: { CLI_RESTORE_TIMEOUT_MS: '3600000' } }).cli.restoreTimeout).toBe(3600000);
  });

  it('should find the config file through the environment', () => {
    const configPath = writeConfig({ snapshotCacheTtl: 0 });

    expect(loadConfig({ env: { [CONFIG_PATH_ENV]: configPath } }).snapshotCacheTtl).toBe(0);
  });

  it('should reject a missing config file', () => {
    expect(() => loadConfig({ configPath: join(tempDir, 'absent.json'), env: {} })).toThrow(ConfigurationError);
  });

  it('should reject malformed JSON', () => {
    const configPath = writeConfig('{ "rpc": ');
    expect(() => loadConfig({ configPath, env: {} })).toThrow(/Cannot read config file/);
  });

  it('should validate field types', () => {
    expect(() => parseConfigDocument({ cli: { poolSize: 0 } }, 'config.json')).toThrow(
      'config.json cli.poolSize: expected an integer >= 1, got 0'
    );
    expect(() => parseConfigDocument({ backend: 'ssh' }, 'config.json')).toThrow(ConfigurationError);
    expect(() => parseConfigDocument({ rpc: 'https://nas.local' }, 'config.json')).toThrow(
      "config.json: 'rpc' must be an object"
    );
    expect(() => parseConfigDocument([], 'config.json')).toThrow(ConfigurationError);
  });

  it('should parse boolean environment values', () => {
    expect(configFromEnv({ MIDDLEWARE_VERIFY_TLS: 'no' }).rpc).toEqual({ verifyTls: false });
    expect(configFromEnv({ MIDDLEWARE_VERIFY_TLS: 'ON' }).rpc).toEqual({ verifyTls: true });
    expect(() => configFromEnv({ MIDDLEWARE_VERIFY_TLS: 'maybe' })).toThrow(ConfigurationError);
  });
});

describe('resolveWebSocketUrl', () => {
  it('should derive the endpoint from an http base URL', () => {
    expect(resolveWebSocketUrl({ url: 'https://nas.local', wsPath: '/websocket' })).toBe('wss://nas.local/websocket');
    expect(resolveWebSocketUrl({ url: 'http://nas.local:8080/api/', wsPath: 'websocket' })).toBe(
      'ws://nas.local:8080/api/websocket'
    );
  });

  it('should use WebSocket URLs as given', () => {
    expect(resolveWebSocketUrl({ url: 'ws://127.0.0.1:6000/rpc', wsPath: '/websocket' })).toBe(
      'ws://127.0.0.1:6000/rpc'
    );
  });

  it('should reject missing, malformed and unsupported URLs', () => {
    expect(() => resolveWebSocketUrl({ wsPath: '/websocket' })).toThrow(ConfigurationError);
    expect(() => resolveWebSocketUrl({ url: 'not a url', wsPath: '/websocket' })).toThrow(ConfigurationError);
    expect(() => resolveWebSocketUrl({ url: 'ftp://nas.local', wsPath: '/websocket' })).toThrow(
      'Unsupported middleware URL scheme: ftp:'
    );
  });
});
