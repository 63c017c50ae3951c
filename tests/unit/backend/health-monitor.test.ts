import { describe, expect, it } from 'vitest';
import { HealthMonitor } from '../../../src/backend/health-monitor.js';
import { JobTracker } from '../../../src/jobs/job-tracker.js';
import { FakeTransport } from '../../helpers/fake-transport.js';

describe('HealthMonitor', () => {
  it('should keep the latest report', async () => {
    const transport = new FakeTransport('cli', new JobTracker());
    const monitor = new HealthMonitor(transport, 0);

    expect(monitor.latestReport).toBeNull();
    const report = await monitor.check();

    expect(monitor.latestReport).toBe(report);
    expect(report.healthy).toBe(true);
  });

  it('should share a check that is already running', async () => {
    const transport = new FakeTransport('cli', new JobTracker());
    const monitor = new HealthMonitor(transport, 0);

    const [first, second] = await Promise.all([monitor.check(), monitor.check()]);

    expect(first).toBe(second);
    expect(transport.calls).toEqual(['checkHealth']);
  });

  it('should not schedule checks when the interval is disabled', () => {
    const transport = new FakeTransport('cli', new JobTracker());
    const monitor = new HealthMonitor(transport, 0);

    monitor.start();
    monitor.stop();

    expect(transport.calls).toEqual([]);
  });
});
