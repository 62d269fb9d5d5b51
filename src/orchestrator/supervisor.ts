import { spawn, type ChildProcess } from 'child_process';
import { mkdir, open } from 'fs/promises';
import { join } from 'path';
import { setTimeout as delay } from 'timers/promises';
import { RecordPidError, RegistryLockTimeoutError, SpawnError, describeError } from '../errors.js';
import type { AppDirectory } from '../apps/directory.js';
import type { PortRegistry } from './registry.js';
import type { LauncherRegistry } from './launchers/index.js';
import { canConnect } from './ports.js';
import { isProcessAlive, type ProcessTerminator } from './terminator.js';
import type { AppPortAssignment, SupervisorState } from '../types.js';

export interface SupervisorOptions {
  logDir: string;
  host?: string; // where the frontend port is polled
  startTimeoutMs?: number;
  pollIntervalMs?: number;
  stopGraceMs?: number;
  restartSettleMs?: number;
}

export type StartOutcome =
  | { status: 'started'; appName: string; pid: number; ports: AppPortAssignment; url: string }
  | { status: 'already-running'; appName: string; pid: number; ports: AppPortAssignment; url: string }
  | { status: 'timeout'; appName: string; pid: number; ports: AppPortAssignment; timeoutMs: number }
  | {
      status: 'exited';
      appName: string;
      ports: AppPortAssignment;
      exitCode: number | null;
      signal: NodeJS.Signals | null;
    }
  | { status: 'not-found'; appName: string; reason: string };

export type StopOutcome =
  | { status: 'stopped'; appName: string; pid: number; forced: boolean }
  | { status: 'not-running'; appName: string }
  | { status: 'failed'; appName: string; pid: number; reason: string };

export interface RestartOutcome {
  stop: StopOutcome;
  start?: StartOutcome; // skipped when stop failed
}

const DEFAULT_START_TIMEOUT_MS = 30000;
const DEFAULT_POLL_INTERVAL_MS = 500;
const DEFAULT_STOP_GRACE_MS = 3000;
const DEFAULT_RESTART_SETTLE_MS = 1000;
const RECORD_PID_ATTEMPTS = 3;
const RECORD_PID_RETRY_BASE_MS = 200;

export class ProcessSupervisor {
  private states = new Map<string, SupervisorState>();
  private pending = new Map<string, Promise<unknown>>();
  private host: string;
  private startTimeoutMs: number;
  private pollIntervalMs: number;
  private stopGraceMs: number;
  private restartSettleMs: number;

  constructor(
    private registry: PortRegistry,
    private directory: AppDirectory,
    private launchers: LauncherRegistry,
    private terminator: ProcessTerminator,
    private options: SupervisorOptions
  ) {
    this.host = options.host ?? '127.0.0.1';
    this.startTimeoutMs = options.startTimeoutMs ?? DEFAULT_START_TIMEOUT_MS;
    this.pollIntervalMs = options.pollIntervalMs ?? DEFAULT_POLL_INTERVAL_MS;
    this.stopGraceMs = options.stopGraceMs ?? DEFAULT_STOP_GRACE_MS;
    this.restartSettleMs = options.restartSettleMs ?? DEFAULT_RESTART_SETTLE_MS;
  }

  getState(appName: string): SupervisorState {
    return this.states.get(appName) ?? 'stopped';
  }

  urlFor(ports: AppPortAssignment): string {
    const host = this.host.includes(':') ? `[${this.host}]` : this.host;
    return `http://${host}:${ports.frontendPort}`;
  }

  /** Operations on one app run one at a time within this process. */
  private async exclusive<T>(appName: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.pending.get(appName) ?? Promise.resolve();
    const current = previous.then(fn, fn);
    const settled = current.then(
      () => undefined,
      () => undefined
    );
    this.pending.set(appName, settled);

    try {
      return await current;
    } finally {
      if (this.pending.get(appName) === settled) {
        this.pending.delete(appName);
      }
    }
  }

  async start(appName: string): Promise<StartOutcome> {
    return this.exclusive(appName, () => this.startUnlocked(appName));
  }

  async stop(appName: string): Promise<StopOutcome> {
    return this.exclusive(appName, () => this.stopUnlocked(appName));
  }

  async restart(appName: string): Promise<RestartOutcome> {
    return this.exclusive(appName, async () => {
      const stop = await this.stopUnlocked(appName);
      if (stop.status === 'failed') {
        return { stop };
      }

      await delay(this.restartSettleMs);
      const start = await this.startUnlocked(appName);
      return { stop, start };
    });
  }

  private async startUnlocked(appName: string): Promise<StartOutcome> {
    const recordedPid = await this.registry.getPid(appName);
    if (recordedPid !== null && isProcessAlive(recordedPid)) {
      const ports = await this.registry.getOrAllocate(appName);
      this.states.set(appName, 'running');
      return { status: 'already-running', appName, pid: recordedPid, ports, url: this.urlFor(ports) };
    }

    if (!(await this.directory.exists(appName))) {
      return {
        status: 'not-found',
        appName,
        reason: `App '${appName}' was not found in ${this.directory.getAppsDir()}`,
      };
    }

    const appDir = this.directory.getAppDir(appName);
    const launcher = await this.launchers.detect(appDir);
    if (!launcher) {
      return {
        status: 'not-found',
        appName,
        reason: `App '${appName}' has no run.sh or package.json start script`,
      };
    }

    this.states.set(appName, 'starting');
    let ports: AppPortAssignment;
    let child: ChildProcess;
    let pid: number;
    try {
      ports = await this.registry.getOrAllocate(appName);
      const { command, args } = await launcher.getCommand(appDir);
      child = await this.spawnDetached(appName, appDir, command, args, launcher.getEnvVars(ports));
      if (child.pid === undefined) {
        throw new SpawnError(appName, command, new Error('no pid assigned'));
      }
      pid = child.pid;
    } catch (error) {
      this.states.set(appName, 'error');
      throw error;
    }

    console.error(
      `[Supervisor] Spawned ${appName} (pid ${pid}) via ${launcher.name}, waiting on port ${ports.frontendPort}`
    );

    const result = await this.waitForPort(child, ports.frontendPort);

    if (result === 'exited') {
      this.states.set(appName, 'error');
      return {
        status: 'exited',
        appName,
        ports,
        exitCode: child.exitCode,
        signal: child.signalCode,
      };
    }

    // A slow app is left running and stays on record, so a later stop can reach it
    await this.keepOnRecord(appName, pid);

    if (result === 'timeout') {
      this.states.set(appName, 'error');
      console.error(`[Supervisor] ${appName} did not answer on port ${ports.frontendPort} within ${this.startTimeoutMs}ms`);
      return { status: 'timeout', appName, pid, ports, timeoutMs: this.startTimeoutMs };
    }

    this.states.set(appName, 'running');
    return { status: 'started', appName, pid, ports, url: this.urlFor(ports) };
  }

  /** Retries lock timeouts; a child that still cannot be recorded is stopped. */
  private async keepOnRecord(appName: string, pid: number): Promise<void> {
    for (let attempt = 1; ; attempt++) {
      try {
        await this.registry.recordPid(appName, pid);
        return;
      } catch (error) {
        if (error instanceof RegistryLockTimeoutError && attempt < RECORD_PID_ATTEMPTS) {
          await delay(RECORD_PID_RETRY_BASE_MS * 2 ** (attempt - 1));
          continue;
        }

        this.states.set(appName, 'error');
        console.error(`[Supervisor] Could not record pid ${pid} for ${appName}: ${describeError(error)}`);
        await this.abandon(appName, pid);
        throw new RecordPidError(appName, pid, error);
      }
    }
  }

  private async abandon(appName: string, pid: number): Promise<void> {
    try {
      await this.terminator.terminate(pid, this.stopGraceMs);
    } catch (error) {
      console.error(`[Supervisor] Could not stop unrecorded ${appName} (pid ${pid}): ${describeError(error)}`);
    }
  }

  private async spawnDetached(
    appName: string,
    appDir: string,
    command: string,
    args: string[],
    envVars: Record<string, string>
  ): Promise<ChildProcess> {
    await mkdir(this.options.logDir, { recursive: true });
    const log = await open(join(this.options.logDir, `${appName}.log`), 'a');

    try {
      const child = spawn(command, args, {
        cwd: appDir,
        env: {
          ...process.env,
          ...envVars,
        },
        stdio: ['ignore', log.fd, log.fd],
        detached: true,
        shell: false,
      });

      await new Promise<void>((resolve, reject) => {
        child.once('spawn', resolve);
        child.once('error', (error) => reject(new SpawnError(appName, command, error)));
      });

      // The app outlives this process; its PID lives in the registry
      child.unref();
      return child;
    } finally {
      await log.close();
    }
  }

  private async waitForPort(child: ChildProcess, port: number): Promise<'ready' | 'timeout' | 'exited'> {
    const deadline = Date.now() + this.startTimeoutMs;

    while (true) {
      if (child.exitCode !== null || child.signalCode !== null) {
        return 'exited';
      }

      const remaining = deadline - Date.now();
      if (remaining <= 0) {
        return 'timeout';
      }

      if (await canConnect(port, this.host, Math.min(remaining, 1000))) {
        return 'ready';
      }

      const pause = Math.min(this.pollIntervalMs, deadline - Date.now());
      if (pause > 0) {
        await delay(pause);
      }
    }
  }

  private async stopUnlocked(appName: string): Promise<StopOutcome> {
    const pid = await this.registry.getPid(appName);
    if (pid === null) {
      this.states.set(appName, 'stopped');
      return { status: 'not-running', appName };
    }

    if (!isProcessAlive(pid)) {
      await this.registry.clearPid(appName);
      this.states.set(appName, 'stopped');
      return { status: 'not-running', appName };
    }

    this.states.set(appName, 'stopping');
    let outcome: StopOutcome;

    try {
      const { forced } = await this.terminator.terminate(pid, this.stopGraceMs);
      if (isProcessAlive(pid)) {
        outcome = { status: 'failed', appName, pid, reason: `process ${pid} is still alive` };
      } else {
        outcome = { status: 'stopped', appName, pid, forced };
      }
    } catch (error) {
      outcome = { status: 'failed', appName, pid, reason: describeError(error) };
    }

    // Cleared even on failure so an unkillable app does not look supervised forever
    await this.registry.clearPid(appName);

    if (outcome.status === 'failed') {
      this.states.set(appName, 'error');
      console.error(`[Supervisor] Stop failed for ${appName} (pid ${pid}): ${outcome.reason}`);
    } else {
      this.states.set(appName, 'stopped');
      console.error(`[Supervisor] Stopped ${appName} (pid ${pid}${outcome.forced ? ', forced' : ''})`);
    }

    return outcome;
  }
}
