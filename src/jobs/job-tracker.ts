/**
 * Registry of restore jobs and fan-out of their state transitions to subscribers
 */

import type {
  JobEvent,
  JobProgress,
  JobRegistry,
  JobResult,
  JobState,
  RestoreJob,
  RestoreJobInit,
} from '../types/index.js';
import { isTerminalState } from '../types/index.js';
import { JobNotFoundError, logError } from '../utils/error-utils.js';
import { getLogger } from '../utils/structured-logger.js';
import { JobSubscription } from './job-subscription.js';

const logger = getLogger('JobTracker');

export interface JobTrackerOptions {
  /** How long terminal jobs stay queryable */
  retentionMs: number;
  subscriberBufferSize: number;
  now: () => Date;
}

export interface JobTrackerStats {
  tracked: number;
  subscribers: number;
  ingested: number;
  dropped: number;
}

export type DropReason = 'unknown-job' | 'terminal' | 'regression' | 'no-op';

const DEFAULT_OPTIONS: JobTrackerOptions = {
  retentionMs: 10 * 60 * 1000,
  subscriberBufferSize: 32,
  now: () => new Date(),
};

const STATE_RANK: Record<JobState, number> = {
  QUEUED: 0,
  RUNNING: 1,
  SUCCEEDED: 2,
  FAILED: 2,
  CANCELLED: 2,
};

function clampPercent(value: number | null): number | null {
  if (value === null || !Number.isFinite(value)) {
    return null;
  }
  return Math.min(100, Math.max(0, value));
}

function buildResult(state: JobState, event: JobEvent): JobResult | undefined {
  switch (state) {
    case 'SUCCEEDED':
      return { ok: true, detail: event.detail ?? null };
    case 'FAILED':
      return { ok: false, error: event.error || 'Restore failed' };
    case 'CANCELLED':
      return { ok: false, error: event.error || 'Restore was cancelled' };
    default:
      return undefined;
  }
}

export class JobTracker implements JobRegistry {
  private readonly options: JobTrackerOptions;
  private jobs = new Map<string, RestoreJob>();
  private subscribers = new Map<string, Set<JobSubscription>>();
  private expiryTimers = new Map<string, NodeJS.Timeout>();
  private ingestedCount = 0;
  private droppedCount = 0;

  constructor(options: Partial<JobTrackerOptions> = {}) {
    this.options = { ...DEFAULT_OPTIONS, ...options };
  }

  /**
   * Start tracking a job in QUEUED. Registering an id that is still active returns the
   * existing record; a finished record under the same id (backend ids restart) is replaced.
   */
  register(init: RestoreJobInit): RestoreJob {
    const existing = this.jobs.get(init.id);
    if (existing && !isTerminalState(existing.state)) {
      return existing;
    }
    if (existing) {
      logger.debug('Replacing finished job with a reused id', { job_id: init.id, state: existing.state });
      this.release(init.id);
    }

    const now = this.options.now();
    const job: RestoreJob = {
      ...init,
      state: 'QUEUED',
      progress: { percent: null, description: null },
      createdAt: now,
      updatedAt: now,
    };
    this.jobs.set(job.id, job);
    logger.debug('Registered restore job', { job_id: job.id, backend: job.backend, dataset: job.dataset });
    return job;
  }

  /**
   * Apply a transport event. Returns false when the event was dropped; never throws.
   */
  ingest(event: JobEvent): boolean {
    try {
      const job = this.jobs.get(event.jobId);
      const outcome = job ? this.apply(job, event) : 'unknown-job';

      if (typeof outcome === 'string') {
        this.droppedCount++;
        logger.debug('Dropped job event', { job_id: event.jobId, reason: outcome });
        return false;
      }

      this.ingestedCount++;
      this.jobs.set(outcome.id, outcome);
      this.notify(outcome);

      if (isTerminalState(outcome.state)) {
        logger.info('Restore job finished', { job_id: outcome.id, state: outcome.state });
        this.scheduleExpiry(outcome.id);
      }
      return true;
    } catch (error) {
      this.droppedCount++;
      logError('JobTracker', 'ingest', error, { job_id: event.jobId });
      return false;
    }
  }

  getJob(jobId: string): RestoreJob | undefined {
    return this.jobs.get(jobId);
  }

  listJobs(): RestoreJob[] {
    return [...this.jobs.values()].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  /**
   * Stream of job snapshots: the current state first, then each accepted transition
   */
  subscribe(jobId: string): JobSubscription {
    const job = this.jobs.get(jobId);
    if (!job) {
      throw new JobNotFoundError(jobId);
    }

    const subscription = new JobSubscription(jobId, this.options.subscriberBufferSize, (closed) =>
      this.removeSubscriber(closed)
    );
    subscription.push(job);

    if (!isTerminalState(job.state)) {
      const set = this.subscribers.get(jobId) ?? new Set<JobSubscription>();
      set.add(subscription);
      this.subscribers.set(jobId, set);
    }
    return subscription;
  }

  stats(): JobTrackerStats {
    let subscribers = 0;
    for (const set of this.subscribers.values()) {
      subscribers += set.size;
    }
    return {
      tracked: this.jobs.size,
      subscribers,
      ingested: this.ingestedCount,
      dropped: this.droppedCount,
    };
  }

  dispose(): void {
    for (const timer of this.expiryTimers.values()) {
      clearTimeout(timer);
    }
    this.expiryTimers.clear();

    const all = [...this.subscribers.values()].flatMap((set) => [...set]);
    this.subscribers.clear();
    for (const subscription of all) {
      subscription.end();
    }
    this.jobs.clear();
  }

  private apply(job: RestoreJob, event: JobEvent): RestoreJob | DropReason {
    if (isTerminalState(job.state)) {
      return 'terminal';
    }

    const state = event.state ?? job.state;
    if (STATE_RANK[state] < STATE_RANK[job.state]) {
      return 'regression';
    }

    const progress: JobProgress = {
      percent:
        event.progress?.percent !== undefined ? clampPercent(event.progress.percent) : job.progress.percent,
      description:
        event.progress?.description !== undefined ? event.progress.description : job.progress.description,
    };
    if (state === 'SUCCEEDED') {
      progress.percent = 100;
    }

    const terminal = isTerminalState(state);
    if (
      !terminal &&
      state === job.state &&
      progress.percent === job.progress.percent &&
      progress.description === job.progress.description
    ) {
      return 'no-op';
    }

    const result = buildResult(state, event);
    return {
      ...job,
      state,
      progress,
      updatedAt: this.options.now(),
      ...(result ? { result } : {}),
    };
  }

  private notify(job: RestoreJob): void {
    const set = this.subscribers.get(job.id);
    if (!set) {
      return;
    }
    // Terminal subscriptions close themselves after delivery, so iterate over a copy
    for (const subscription of [...set]) {
      subscription.push(job);
    }
  }

  private removeSubscriber(subscription: JobSubscription): void {
    const set = this.subscribers.get(subscription.jobId);
    if (!set) {
      return;
    }
    set.delete(subscription);
    if (set.size === 0) {
      this.subscribers.delete(subscription.jobId);
    }
  }

  private scheduleExpiry(jobId: string): void {
    clearTimeout(this.expiryTimers.get(jobId));
    const timer = setTimeout(() => this.expire(jobId), this.options.retentionMs);
    timer.unref();
    this.expiryTimers.set(jobId, timer);
  }

  private expire(jobId: string): void {
    this.release(jobId);
    logger.debug('Collected finished restore job', { job_id: jobId });
  }

  /**
   * Forget a job: cancel its expiry and end any subscription still attached
   */
  private release(jobId: string): void {
    clearTimeout(this.expiryTimers.get(jobId));
    this.expiryTimers.delete(jobId);
    this.jobs.delete(jobId);

    const set = this.subscribers.get(jobId);
    this.subscribers.delete(jobId);
    for (const subscription of set ?? []) {
      subscription.end();
    }
  }
}
