import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { HealthMonitor, nextInterval, type AssignmentSource } from '../src/orchestrator/health-monitor.js';
import type { AppPortAssignment } from '../src/types.js';

class FakeSource implements AssignmentSource {
  assignments: AppPortAssignment[] = [];
  failing = false;

  async listAssignments(): Promise<AppPortAssignment[]> {
    if (this.failing) throw new Error('registry unreadable');
    return this.assignments;
  }
}

const alpha = { appName: 'alpha', frontendPort: 3001, backendPort: 3002 };
const beta = { appName: 'beta', frontendPort: 3003, backendPort: 3004 };

describe('nextInterval', () => {
  it('doubles on failure up to the ceiling', () => {
    expect(nextInterval(5000, false, 5000, 60000)).toBe(10000);
    expect(nextInterval(40000, false, 5000, 60000)).toBe(60000);
    expect(nextInterval(60000, false, 5000, 60000)).toBe(60000);
  });

  it('resets to the floor after a clean cycle', () => {
    expect(nextInterval(40000, true, 5000, 60000)).toBe(5000);
  });
});

describe('HealthMonitor', () => {
  let source: FakeSource;
  let upPorts: Set<number>;
  let monitor: HealthMonitor;

  beforeEach(() => {
    source = new FakeSource();
    upPorts = new Set();
    monitor = new HealthMonitor(source, { probe: async (port) => upPorts.has(port) });
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await monitor.stop();
    vi.restoreAllMocks();
  });

  it('marks each app up or down by its frontend port', async () => {
    source.assignments = [alpha, beta];
    upPorts.add(3001);

    expect(await monitor.runCycle()).toBe(true);

    const snapshot = monitor.getSnapshot();
    expect(Object.keys(snapshot).sort()).toEqual(['alpha', 'beta']);
    expect(snapshot.alpha?.status).toBe('up');
    expect(snapshot.beta?.status).toBe('down');
    expect(Number.isNaN(Date.parse(snapshot.alpha?.lastCheckedAt ?? ''))).toBe(false);
  });

  it('drops apps that lost their assignment on the next cycle', async () => {
    source.assignments = [alpha, beta];
    await monitor.runCycle();

    source.assignments = [alpha];
    await monitor.runCycle();
    expect(Object.keys(monitor.getSnapshot())).toEqual(['alpha']);
  });

  it('hands out snapshots that later cycles do not mutate', async () => {
    source.assignments = [alpha];
    await monitor.runCycle();
    const before = monitor.getSnapshot();

    upPorts.add(3001);
    await monitor.runCycle();

    expect(before.alpha?.status).toBe('down');
    expect(monitor.getSnapshot().alpha?.status).toBe('up');
  });

  it('backs off while cycles fail and recovers after one succeeds', async () => {
    source.failing = true;
    const intervals: number[] = [];
    for (let i = 0; i < 5; i++) {
      expect(await monitor.runCycle()).toBe(false);
      intervals.push(monitor.getInterval());
    }
    expect(intervals).toEqual([10000, 20000, 40000, 60000, 60000]);

    source.failing = false;
    expect(await monitor.runCycle()).toBe(true);
    expect(monitor.getInterval()).toBe(5000);
  });

  it('keeps the last snapshot when a cycle fails', async () => {
    source.assignments = [alpha];
    upPorts.add(3001);
    await monitor.runCycle();

    source.failing = true;
    await monitor.runCycle();
    expect(monitor.getEntry('alpha')?.status).toBe('up');
  });

  it('refreshes one app without touching the others', async () => {
    source.assignments = [alpha, beta];
    await monitor.runCycle();

    upPorts.add(3001);
    const entries = await monitor.refresh('alpha');

    expect(entries.map((e) => [e.appName, e.status])).toEqual([['alpha', 'up']]);
    expect(monitor.getEntry('alpha')?.status).toBe('up');
    expect(monitor.getEntry('beta')?.status).toBe('down');
  });

  it('forgets an app whose assignment is gone on refresh', async () => {
    source.assignments = [alpha, beta];
    await monitor.runCycle();

    source.assignments = [alpha];
    expect(await monitor.refresh('beta')).toEqual([]);
    expect(monitor.getEntry('beta')).toBeUndefined();
    expect(monitor.getEntry('alpha')).toBeDefined();
  });

  it('rebuilds the whole map on a full refresh', async () => {
    source.assignments = [alpha, beta];
    await monitor.runCycle();

    source.assignments = [beta];
    await monitor.refresh();
    expect(Object.keys(monitor.getSnapshot())).toEqual(['beta']);
  });

  it('leaves the schedule alone on refresh', async () => {
    source.failing = true;
    await monitor.runCycle();
    source.failing = false;

    await monitor.refresh();
    expect(monitor.getInterval()).toBe(10000);
  });

  it('runs cycles in the background until stopped', async () => {
    monitor = new HealthMonitor(source, {
      minIntervalMs: 10,
      maxIntervalMs: 20,
      probe: async (port) => upPorts.has(port),
    });
    source.assignments = [alpha];
    upPorts.add(3001);

    monitor.start();
    monitor.start();
    expect(monitor.isRunning()).toBe(true);

    await vi.waitFor(() => {
      expect(monitor.getEntry('alpha')?.status).toBe('up');
    });

    upPorts.delete(3001);
    await vi.waitFor(() => {
      expect(monitor.getEntry('alpha')?.status).toBe('down');
    });

    await monitor.stop();
    expect(monitor.isRunning()).toBe(false);
  });
});
