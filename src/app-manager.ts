import { EventEmitter } from 'events';
import { setTimeout as delay } from 'timers/promises';
import { AppDirectory, isValidAppName, slugifyAppName } from './apps/directory.js';
import { PortRegistry, type GarbageCollectionReport } from './orchestrator/registry.js';
import { ProcessSupervisor, type StartOutcome, type StopOutcome } from './orchestrator/supervisor.js';
import { HealthMonitor } from './orchestrator/health-monitor.js';
import { LauncherRegistry } from './orchestrator/launchers/index.js';
import { isPortAvailable } from './orchestrator/ports.js';
import { createTerminator, type ProcessTerminator } from './orchestrator/terminator.js';
import { RegistryLockTimeoutError, describeError } from './errors.js';
import type { AppdockConfig } from './config.js';
import type {
  AppListing,
  HealthEntry,
  HealthSnapshot,
  OperationResult,
} from './types.js';

const LOCK_RETRY_ATTEMPTS = 3;
const LOCK_RETRY_BASE_MS = 200;

export interface OpenedApp {
  appName: string;
  url: string;
  frontendPort: number;
  backendPort: number;
  pid: number;
  alreadyRunning: boolean;
}

export interface StoppedApp {
  appName: string;
  wasRunning: boolean;
  forced: boolean;
}

export interface ReleasedApp {
  appName: string;
  released: boolean;
}

export type AppEvent =
  | { type: 'app:starting'; appName: string }
  | { type: 'app:started'; appName: string; url: string; pid: number }
  | { type: 'app:failed'; appName: string; error: string }
  | { type: 'app:stopped'; appName: string; forced: boolean }
  | { type: 'app:released'; appName: string };

export interface AppManagerParts {
  registry: PortRegistry;
  directory: AppDirectory;
  supervisor: ProcessSupervisor;
  monitor: HealthMonitor;
}

/** Wires the registry, supervisor and health monitor from one config. */
export function buildParts(config: AppdockConfig, terminator: ProcessTerminator): AppManagerParts {
  const directory = new AppDirectory(config.appsDir);
  const registry = new PortRegistry({
    registryPath: config.registryPath,
    portRange: config.portRange,
    reservedPorts: config.reservedPorts,
    lockTimeoutMs: config.lockTimeoutMs,
    probe: (port) => isPortAvailable(port, config.bindHost),
    appExists: (appName) => directory.exists(appName),
    appsRootExists: () => directory.rootExists(),
  });
  const supervisor = new ProcessSupervisor(registry, directory, new LauncherRegistry(), terminator, {
    logDir: config.logDir,
    host: config.probeHost,
    startTimeoutMs: config.startTimeoutMs,
    pollIntervalMs: config.startPollMs,
    stopGraceMs: config.stopGraceMs,
    restartSettleMs: config.restartSettleMs,
  });
  const monitor = new HealthMonitor(registry, {
    minIntervalMs: config.healthMinIntervalMs,
    maxIntervalMs: config.healthMaxIntervalMs,
    host: config.probeHost,
  });
  return { registry, directory, supervisor, monitor };
}

function formatSeconds(ms: number): string {
  const seconds = ms / 1000;
  return Number.isInteger(seconds) ? `${seconds}s` : `${seconds.toFixed(1)}s`;
}

export class AppManager extends EventEmitter {
  private registry: PortRegistry;
  private directory: AppDirectory;
  private supervisor: ProcessSupervisor;
  private monitor: HealthMonitor;

  constructor(parts: AppManagerParts) {
    super();
    this.registry = parts.registry;
    this.directory = parts.directory;
    this.supervisor = parts.supervisor;
    this.monitor = parts.monitor;
  }

  static async create(config: AppdockConfig): Promise<AppManager> {
    const terminator = await createTerminator();
    return new AppManager(buildParts(config, terminator));
  }

  private emitEvent(event: AppEvent): void {
    this.emit(event.type, event);
  }

  private normalize(name: string): string | null {
    const appName = slugifyAppName(name);
    return isValidAppName(appName) ? appName : null;
  }

  /** Lock timeouts are transient; back off and retry before giving up. */
  private async withLockRetry<T>(fn: () => Promise<T>): Promise<T> {
    for (let attempt = 1; ; attempt++) {
      try {
        return await fn();
      } catch (error) {
        if (!(error instanceof RegistryLockTimeoutError) || attempt >= LOCK_RETRY_ATTEMPTS) {
          throw error;
        }
        await delay(LOCK_RETRY_BASE_MS * 2 ** (attempt - 1));
      }
    }
  }

  private describeStart(outcome: StartOutcome): OperationResult<OpenedApp> {
    switch (outcome.status) {
      case 'started':
      case 'already-running':
        return {
          success: true,
          data: {
            appName: outcome.appName,
            url: outcome.url,
            frontendPort: outcome.ports.frontendPort,
            backendPort: outcome.ports.backendPort,
            pid: outcome.pid,
            alreadyRunning: outcome.status === 'already-running',
          },
        };
      case 'timeout':
        return { success: false, error: `Timeout: app did not start within ${formatSeconds(outcome.timeoutMs)}` };
      case 'exited':
        return {
          success: false,
          error: `App '${outcome.appName}' exited before answering on port ${outcome.ports.frontendPort} (${
            outcome.exitCode !== null ? `exit code ${outcome.exitCode}` : `signal ${outcome.signal}`
          })`,
        };
      case 'not-found':
        return { success: false, error: outcome.reason };
    }
  }

  private describeStop(outcome: StopOutcome): OperationResult<StoppedApp> {
    switch (outcome.status) {
      case 'stopped':
        return { success: true, data: { appName: outcome.appName, wasRunning: true, forced: outcome.forced } };
      case 'not-running':
        return { success: true, data: { appName: outcome.appName, wasRunning: false, forced: false } };
      case 'failed':
        return { success: false, error: `Stop failed: ${outcome.reason}` };
    }
  }

  private async refreshQuietly(appName: string): Promise<void> {
    try {
      await this.monitor.refresh(appName);
    } catch (error) {
      console.error(`[Health] Refresh of ${appName} failed: ${describeError(error)}`);
    }
  }

  private async afterStart(result: OperationResult<OpenedApp>, appName: string): Promise<void> {
    await this.refreshQuietly(appName);
    if (result.success) {
      this.emitEvent({ type: 'app:started', appName, url: result.data.url, pid: result.data.pid });
    } else {
      this.emitEvent({ type: 'app:failed', appName, error: result.error });
    }
  }

  async openApp(name: string): Promise<OperationResult<OpenedApp>> {
    const appName = this.normalize(name);
    if (!appName) {
      return { success: false, error: `Invalid app name: ${JSON.stringify(name)}` };
    }

    this.emitEvent({ type: 'app:starting', appName });
    let result: OperationResult<OpenedApp>;
    try {
      const outcome = await this.withLockRetry(() => this.supervisor.start(appName));
      result = this.describeStart(outcome);
    } catch (error) {
      result = { success: false, error: describeError(error) };
    }

    await this.afterStart(result, appName);
    return result;
  }

  async stopApp(name: string): Promise<OperationResult<StoppedApp>> {
    const appName = this.normalize(name);
    if (!appName) {
      return { success: false, error: `Invalid app name: ${JSON.stringify(name)}` };
    }

    try {
      const outcome = await this.withLockRetry(() => this.supervisor.stop(appName));
      const result = this.describeStop(outcome);
      await this.refreshQuietly(appName);
      if (outcome.status === 'stopped') {
        this.emitEvent({ type: 'app:stopped', appName, forced: outcome.forced });
      }
      return result;
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async restartApp(name: string): Promise<OperationResult<OpenedApp>> {
    const appName = this.normalize(name);
    if (!appName) {
      return { success: false, error: `Invalid app name: ${JSON.stringify(name)}` };
    }

    let result: OperationResult<OpenedApp>;
    try {
      const { stop, start } = await this.withLockRetry(() => this.supervisor.restart(appName));
      if (stop.status === 'stopped') {
        this.emitEvent({ type: 'app:stopped', appName, forced: stop.forced });
      }
      if (!start) {
        const stopResult = this.describeStop(stop);
        return { success: false, error: stopResult.success ? 'Restart aborted' : stopResult.error };
      }
      result = this.describeStart(start);
    } catch (error) {
      result = { success: false, error: describeError(error) };
    }

    await this.afterStart(result, appName);
    return result;
  }

  /** Stops the app and forgets its ports. */
  async releaseApp(name: string): Promise<OperationResult<ReleasedApp>> {
    const appName = this.normalize(name);
    if (!appName) {
      return { success: false, error: `Invalid app name: ${JSON.stringify(name)}` };
    }

    const stopped = await this.stopApp(appName);
    if (!stopped.success) {
      return stopped;
    }

    try {
      const released = await this.withLockRetry(() => this.registry.release(appName));
      await this.refreshQuietly(appName);
      if (released) {
        this.emitEvent({ type: 'app:released', appName });
      }
      return { success: true, data: { appName, released } };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async refreshHealth(name?: string): Promise<OperationResult<HealthEntry[]>> {
    let appName: string | undefined;
    if (name !== undefined) {
      const normalized = this.normalize(name);
      if (!normalized) {
        return { success: false, error: `Invalid app name: ${JSON.stringify(name)}` };
      }
      appName = normalized;
    }

    try {
      return { success: true, data: await this.monitor.refresh(appName) };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  getHealthSnapshot(): HealthSnapshot {
    return this.monitor.getSnapshot();
  }

  async listApps(): Promise<OperationResult<AppListing[]>> {
    try {
      const records = await this.registry.listRecords();
      const apps = records.map((record): AppListing => {
        const health = this.monitor.getEntry(record.appName);
        return {
          name: record.appName,
          frontendPort: record.frontendPort,
          backendPort: record.backendPort,
          running: record.pid !== null,
          pid: record.pid,
          startedAt: record.startedAt,
          ...(health && { health: health.status }),
        };
      });
      return { success: true, data: apps };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  async getApp(name: string): Promise<OperationResult<AppListing>> {
    const appName = this.normalize(name);
    const listed = await this.listApps();
    if (!listed.success) return listed;

    const app = listed.data.find((a) => a.name === appName);
    if (!app) {
      return { success: false, error: `App '${name}' has no port assignment` };
    }
    return { success: true, data: app };
  }

  async collectGarbage(): Promise<OperationResult<GarbageCollectionReport>> {
    try {
      return { success: true, data: await this.withLockRetry(() => this.registry.garbageCollect()) };
    } catch (error) {
      return { success: false, error: describeError(error) };
    }
  }

  getAppsDir(): string {
    return this.directory.getAppsDir();
  }

  start(): void {
    this.monitor.start();
  }

  /** Apps keep running; their PIDs stay in the registry for the next session. */
  async shutdown(): Promise<void> {
    await this.monitor.stop();
  }
}
