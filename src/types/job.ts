/**
 * Restore job type definitions
 */

import type { BackendKind } from './backend.js';

export type JobState = 'QUEUED' | 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'CANCELLED';

export type TerminalJobState = Extract<JobState, 'SUCCEEDED' | 'FAILED' | 'CANCELLED'>;

export interface JobProgress {
  percent: number | null;
  description: string | null;
}

export type JobResult = { ok: true; detail: string | null } | { ok: false; error: string };

export interface RestoreJob {
  readonly id: string;
  readonly backend: BackendKind;
  readonly dataset: string;
  readonly snapshot: string;
  readonly sourcePath: string;
  readonly destinationPath: string;
  readonly overwrite: boolean;
  readonly state: JobState;
  readonly progress: JobProgress;
  readonly createdAt: Date;
  readonly updatedAt: Date;
  readonly result?: JobResult;
}

export type RestoreJobInit = Pick<
  RestoreJob,
  'id' | 'backend' | 'dataset' | 'snapshot' | 'sourcePath' | 'destinationPath' | 'overwrite'
>;

/**
 * Transport-sourced update for one job. Fields left out keep their current value.
 */
export interface JobEvent {
  jobId: string;
  state?: JobState;
  progress?: Partial<JobProgress>;
  error?: string | null;
  detail?: string | null;
}

export interface JobEventSink {
  ingest(event: JobEvent): boolean;
}

export interface JobRegistry extends JobEventSink {
  register(init: RestoreJobInit): RestoreJob;
  getJob(jobId: string): RestoreJob | undefined;
  listJobs(): RestoreJob[];
}

export const TERMINAL_JOB_STATES: ReadonlySet<JobState> = new Set<JobState>([
  'SUCCEEDED',
  'FAILED',
  'CANCELLED',
]);

export function isTerminalState(state: JobState): state is TerminalJobState {
  return TERMINAL_JOB_STATES.has(state);
}
