import type { RestoreJob } from '../types/index.js';
import { isTerminalState } from '../types/index.js';

type Waiter = (result: IteratorResult<RestoreJob>) => void;

/**
 * One subscriber's view of a restore job: an async iterator of job snapshots.
 *
 * The buffer is bounded. When it is full the oldest non-terminal snapshot is dropped; the
 * terminal snapshot is always delivered, after which the iterator completes.
 */
export class JobSubscription implements AsyncIterableIterator<RestoreJob> {
  private buffer: RestoreJob[] = [];
  private waiter: Waiter | null = null;
  private ended = false;
  private closed = false;
  private _droppedCount = 0;

  constructor(
    readonly jobId: string,
    private readonly capacity: number,
    private readonly onClose: (subscription: JobSubscription) => void
  ) {}

  get droppedCount(): number {
    return this._droppedCount;
  }

  /**
   * Deliver a snapshot. Called by the tracker only.
   */
  push(job: RestoreJob): void {
    if (this.ended || this.closed) {
      return;
    }
    if (isTerminalState(job.state)) {
      this.ended = true;
    }

    const waiter = this.waiter;
    if (waiter) {
      this.waiter = null;
      waiter({ value: job, done: false });
      return;
    }

    if (this.buffer.length >= Math.max(1, this.capacity)) {
      const oldest = this.buffer.findIndex((queued) => !isTerminalState(queued.state));
      if (oldest >= 0) {
        this.buffer.splice(oldest, 1);
        this._droppedCount++;
      }
    }
    this.buffer.push(job);
  }

  /**
   * No further snapshots will arrive (job collected or tracker disposed)
   */
  end(): void {
    this.ended = true;
    if (this.buffer.length === 0) {
      this.finish();
    }
  }

  async next(): Promise<IteratorResult<RestoreJob>> {
    const queued = this.buffer.shift();
    if (queued) {
      return { value: queued, done: false };
    }
    if (this.ended || this.closed) {
      this.finish();
      return { value: undefined, done: true };
    }
    return new Promise<IteratorResult<RestoreJob>>((resolve) => {
      this.waiter = resolve;
    });
  }

  async return(): Promise<IteratorResult<RestoreJob>> {
    this.buffer = [];
    this.finish();
    return { value: undefined, done: true };
  }

  close(): void {
    this.buffer = [];
    this.finish();
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<RestoreJob> {
    return this;
  }

  private finish(): void {
    this.ended = true;
    const waiter = this.waiter;
    this.waiter = null;
    waiter?.({ value: undefined, done: true });

    if (!this.closed) {
      this.closed = true;
      this.onClose(this);
    }
  }
}
