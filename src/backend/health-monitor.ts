import type { SnapshotTransport } from '../transports/types.js';
import type { HealthReport } from '../types/index.js';
import { logError } from '../utils/error-utils.js';
import { getLogger } from '../utils/structured-logger.js';

const logger = getLogger('HealthMonitor');

/**
 * Periodically re-checks the selected transport and keeps the latest report
 */
export class HealthMonitor {
  private timer?: NodeJS.Timeout;
  private inFlight: Promise<HealthReport> | null = null;
  private latest: HealthReport | null = null;

  constructor(
    private readonly transport: SnapshotTransport,
    private readonly intervalMs: number
  ) {}

  get latestReport(): HealthReport | null {
    return this.latest;
  }

  start(): void {
    if (this.timer || this.intervalMs <= 0) {
      return;
    }
    this.timer = setInterval(() => {
      this.check().catch((error: unknown) => logError('HealthMonitor', 'check', error));
    }, this.intervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
  }

  /**
   * Run a check now; a check already in progress is shared rather than overlapped
   */
  check(): Promise<HealthReport> {
    if (!this.inFlight) {
      this.inFlight = this.transport
        .checkHealth()
        .then((report) => {
          if (this.latest?.healthy !== report.healthy) {
            logger.info('Backend health changed', { backend: report.backend, healthy: report.healthy });
          }
          this.latest = report;
          return report;
        })
        .finally(() => {
          this.inFlight = null;
        });
    }
    return this.inFlight;
  }
}
