/**
 * Backend selection, capability and health type definitions
 */

import type { ErrorPayload } from '../utils/error-utils.js';

export type BackendKind = 'rpc' | 'cli';

export type Capability = 'list' | 'diff' | 'restore' | 'jobs' | 'cancel' | 'health';

export type BackendCapability = ReadonlySet<Capability>;

export type SelectionReason = 'override' | 'probe';

export interface ProbeAttempt {
  backend: BackendKind;
  ok: boolean;
  durationMs: number;
  error?: ErrorPayload;
}

export interface HealthReport {
  backend: BackendKind;
  healthy: boolean;
  checkedAt: Date;
  latencyMs: number;
  detail: Record<string, string>;
  error?: ErrorPayload;
}

export interface BackendInfo {
  status: 'pending' | 'selected' | 'unavailable';
  backend: BackendKind | null;
  capabilities: Capability[];
  selectedAt: Date | null;
  reason: SelectionReason | null;
  attempts: ProbeAttempt[];
  error?: ErrorPayload;
}
