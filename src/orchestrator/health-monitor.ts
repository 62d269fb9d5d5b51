import { setTimeout as sleep } from 'timers/promises';
import { canConnect } from './ports.js';
import { describeError } from '../errors.js';
import type { AppPortAssignment, HealthEntry, HealthSnapshot } from '../types.js';

export interface AssignmentSource {
  listAssignments(): Promise<AppPortAssignment[]>;
}

export type ConnectProbe = (port: number) => Promise<boolean>;

export interface HealthMonitorOptions {
  minIntervalMs?: number;
  maxIntervalMs?: number;
  host?: string;
  probeTimeoutMs?: number;
  probe?: ConnectProbe;
}

/** Doubling backoff while cycles fail, back to the floor after a clean one. */
export function nextInterval(current: number, cycleOk: boolean, min: number, max: number): number {
  if (cycleOk) return min;
  return Math.min(current * 2, max);
}

export class HealthMonitor {
  private snapshot: ReadonlyMap<string, HealthEntry> = new Map();
  private minIntervalMs: number;
  private maxIntervalMs: number;
  private interval: number;
  private probe: ConnectProbe;
  private controller?: AbortController;
  private loop?: Promise<void>;

  constructor(
    private source: AssignmentSource,
    options: HealthMonitorOptions = {}
  ) {
    this.minIntervalMs = options.minIntervalMs ?? 5000;
    this.maxIntervalMs = Math.max(options.maxIntervalMs ?? 60000, this.minIntervalMs);
    this.interval = this.minIntervalMs;
    const host = options.host ?? '127.0.0.1';
    const timeoutMs = options.probeTimeoutMs ?? 1000;
    this.probe = options.probe ?? ((port) => canConnect(port, host, timeoutMs));
  }

  getInterval(): number {
    return this.interval;
  }

  isRunning(): boolean {
    return this.loop !== undefined;
  }

  getSnapshot(): HealthSnapshot {
    return Object.fromEntries(this.snapshot);
  }

  getEntry(appName: string): HealthEntry | undefined {
    return this.snapshot.get(appName);
  }

  private async check(assignment: AppPortAssignment): Promise<HealthEntry> {
    const up = await this.probe(assignment.frontendPort);
    return {
      appName: assignment.appName,
      status: up ? 'up' : 'down',
      lastCheckedAt: new Date().toISOString(),
    };
  }

  /**
   * One background cycle. Returns false only when the monitor's own
   * bookkeeping failed; an app being down is a normal result.
   */
  async runCycle(): Promise<boolean> {
    let ok = true;
    try {
      const assignments = await this.source.listAssignments();
      const entries = await Promise.all(assignments.map((a) => this.check(a)));
      // Whole-map swap: readers see the old map or the new one
      this.snapshot = new Map<string, HealthEntry>(entries.map((entry) => [entry.appName, entry]));
    } catch (error) {
      ok = false;
      console.error(`[Health] Probe cycle failed: ${describeError(error)}`);
    }

    this.interval = nextInterval(this.interval, ok, this.minIntervalMs, this.maxIntervalMs);
    return ok;
  }

  /** Inline probe for one app or all of them; leaves the loop's schedule alone. */
  async refresh(appName?: string): Promise<HealthEntry[]> {
    const assignments = await this.source.listAssignments();
    const targets = appName === undefined ? assignments : assignments.filter((a) => a.appName === appName);
    const entries = await Promise.all(targets.map((a) => this.check(a)));

    const next = new Map<string, HealthEntry>(appName === undefined ? [] : this.snapshot);
    if (appName !== undefined && targets.length === 0) {
      next.delete(appName);
    }
    for (const entry of entries) {
      next.set(entry.appName, entry);
    }
    this.snapshot = next;
    return entries;
  }

  start(): void {
    if (this.loop) return;
    this.controller = new AbortController();
    this.loop = this.run(this.controller.signal);
  }

  async stop(): Promise<void> {
    const loop = this.loop;
    if (!loop) return;
    this.controller?.abort();
    await loop;
    this.loop = undefined;
    this.controller = undefined;
  }

  private async run(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      await this.runCycle();
      if (signal.aborted) break;

      try {
        await sleep(this.interval, undefined, { signal });
      } catch (error) {
        if (signal.aborted) break;
        throw error;
      }
    }
  }
}
