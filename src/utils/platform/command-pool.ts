/**
 * Bounds the number of external commands running at once
 */

import { ConfigurationError } from '../error-utils.js';

export interface CommandPoolStats {
  size: number;
  running: number;
  queued: number;
  completed: number;
}

/**
 * Fixed-size pool; tasks start in submission order as slots free up
 */
export class CommandPool {
  private running = 0;
  private completed = 0;
  private queue: Array<() => void> = [];

  constructor(private readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new ConfigurationError(`Command pool size must be a positive integer, got ${size}`);
    }
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  stats(): CommandPoolStats {
    return {
      size: this.size,
      running: this.running,
      queued: this.queue.length,
      completed: this.completed,
    };
  }

  private acquire(): Promise<void> {
    if (this.running < this.size) {
      this.running++;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      // The releasing task hands its slot over, so `running` is unchanged
      this.queue.push(resolve);
    });
  }

  private release(): void {
    this.completed++;
    const next = this.queue.shift();
    if (next) {
      next();
    } else {
      this.running--;
    }
  }
}
