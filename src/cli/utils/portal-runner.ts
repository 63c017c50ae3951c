import { loadConfig } from '../../config-loader.js';
import { createSnapshotPortal } from '../../portal.js';
import type { SnapshotPortal } from '../../portal.js';
import type { BackendKind } from '../../types/index.js';
import { ConfigurationError, toErrorPayload } from '../../utils/error-utils.js';
import { formatError } from './output.js';

export interface GlobalOptions {
  config?: string;
  backend?: string;
  json?: boolean;
}

function parseBackendOption(value: string | undefined): BackendKind | undefined {
  if (value === undefined || value === 'auto') {
    return undefined;
  }
  if (value === 'rpc' || value === 'cli') {
    return value;
  }
  throw new ConfigurationError(`--backend must be rpc, cli or auto, got '${value}'`);
}

/**
 * Print `lines`, or `data` as JSON in --json mode
 */
export function emit(options: GlobalOptions, data: unknown, lines: readonly string[]): void {
  if (options.json) {
    console.log(JSON.stringify(data, null, 2));
    return;
  }
  for (const line of lines) {
    console.log(line);
  }
}

export function reportFailure(options: GlobalOptions, error: unknown): void {
  const payload = toErrorPayload(error);
  if (options.json) {
    console.error(JSON.stringify({ error: payload }, null, 2));
  } else {
    console.error(formatError(payload));
  }
  process.exitCode = 1;
}

/**
 * Build a portal for one command, run it, and always release the backend afterwards
 */
export async function withPortal(
  options: GlobalOptions,
  action: (portal: SnapshotPortal) => Promise<void>
): Promise<void> {
  let portal: SnapshotPortal | null = null;
  try {
    const config = loadConfig({ configPath: options.config });
    const backend = parseBackendOption(options.backend);
    portal = await createSnapshotPortal(backend ? { ...config, backend } : config);
    await action(portal);
  } catch (error) {
    reportFailure(options, error);
  } finally {
    await portal?.dispose();
  }
}
