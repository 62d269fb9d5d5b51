import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { access, mkdir, mkdtemp, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { AppDirectory } from '../src/apps/directory.js';
import { PortRegistry } from '../src/orchestrator/registry.js';
import { LauncherRegistry } from '../src/orchestrator/launchers/index.js';
import { ProcessSupervisor, type SupervisorOptions } from '../src/orchestrator/supervisor.js';
import { SignalTerminator, isProcessAlive, type ProcessTerminator } from '../src/orchestrator/terminator.js';
import { canConnect } from '../src/orchestrator/ports.js';
import { RecordPidError } from '../src/errors.js';
import { FlakyRegistry, writeCrashingApp, writeServerApp, writeSleeperApp } from './fixtures.js';

describe('ProcessSupervisor', () => {
  let root: string;
  let appsDir: string;
  let logDir: string;
  let registry: PortRegistry;
  let directory: AppDirectory;

  const makeSupervisor = (
    terminator: ProcessTerminator = new SignalTerminator(),
    options: Partial<SupervisorOptions> = {}
  ) =>
    new ProcessSupervisor(registry, directory, new LauncherRegistry(), terminator, {
      logDir,
      startTimeoutMs: 10000,
      pollIntervalMs: 100,
      stopGraceMs: 2000,
      restartSettleMs: 0,
      ...options,
    });

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'appdock-supervisor-'));
    appsDir = join(root, 'apps');
    logDir = join(root, 'logs');
    await mkdir(appsDir);
    registry = new PortRegistry({
      registryPath: join(root, 'port-registry.json'),
      portRange: { min: 21000, max: 29000 },
    });
    directory = new AppDirectory(appsDir);
    vi.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    for (const record of await registry.listRecords()) {
      if (record.pid !== null && record.pid !== process.pid && isProcessAlive(record.pid)) {
        process.kill(-record.pid, 'SIGKILL');
      }
    }
    await rm(root, { recursive: true, force: true });
  });

  it('starts an app, reports its URL and records its PID', async () => {
    await writeServerApp(appsDir, 'web');
    const supervisor = makeSupervisor();

    const outcome = await supervisor.start('web');
    if (outcome.status !== 'started') {
      throw new Error(`expected started, got ${outcome.status}`);
    }

    expect(outcome.url).toBe(`http://127.0.0.1:${outcome.ports.frontendPort}`);
    expect(await registry.getPid('web')).toBe(outcome.pid);
    expect(await canConnect(outcome.ports.frontendPort)).toBe(true);
    expect(supervisor.getState('web')).toBe('running');

    await expect(access(join(logDir, 'web.log'))).resolves.toBeUndefined();
  });

  it('returns the running instance on a second start', async () => {
    await writeServerApp(appsDir, 'web');
    const supervisor = makeSupervisor();

    const first = await supervisor.start('web');
    const second = await supervisor.start('web');

    expect(first.status).toBe('started');
    expect(second.status).toBe('already-running');
    if (first.status === 'started' && second.status === 'already-running') {
      expect(second.pid).toBe(first.pid);
      expect(second.ports).toEqual(first.ports);
    }
  });

  it('serializes concurrent starts of one app', async () => {
    await writeServerApp(appsDir, 'web');
    const supervisor = makeSupervisor();

    const outcomes = await Promise.all([supervisor.start('web'), supervisor.start('web')]);
    expect(outcomes.map((o) => o.status).sort()).toEqual(['already-running', 'started']);
  });

  it('stops an app but keeps its ports', async () => {
    await writeServerApp(appsDir, 'web');
    const supervisor = makeSupervisor();
    const started = await supervisor.start('web');
    if (started.status !== 'started') {
      throw new Error(`expected started, got ${started.status}`);
    }

    const stopped = await supervisor.stop('web');
    expect(stopped).toEqual({ status: 'stopped', appName: 'web', pid: started.pid, forced: false });
    expect(isProcessAlive(started.pid)).toBe(false);
    expect(await registry.getPid('web')).toBeNull();
    expect(await registry.getAssignment('web')).toEqual(started.ports);
    expect(supervisor.getState('web')).toBe('stopped');

    expect(await supervisor.stop('web')).toEqual({ status: 'not-running', appName: 'web' });
  });

  it('restarts on the same ports with a new process', async () => {
    await writeServerApp(appsDir, 'web');
    const supervisor = makeSupervisor();
    const first = await supervisor.start('web');
    if (first.status !== 'started') {
      throw new Error(`expected started, got ${first.status}`);
    }

    const { stop, start } = await supervisor.restart('web');
    expect(stop.status).toBe('stopped');
    if (start?.status !== 'started') {
      throw new Error(`expected started, got ${start?.status}`);
    }
    expect(start.ports).toEqual(first.ports);
    expect(start.pid).not.toBe(first.pid);
  });

  it('retries recording the PID instead of spawning a second process', async () => {
    const flaky = new FlakyRegistry({ registryPath: join(root, 'port-registry.json'), portRange: { min: 21000, max: 29000 } });
    flaky.failures = 1;
    registry = flaky;
    await writeServerApp(appsDir, 'web');

    const outcome = await makeSupervisor().start('web');
    if (outcome.status !== 'started') {
      throw new Error(`expected started, got ${outcome.status}`);
    }
    expect(flaky.recordedPids).toEqual([outcome.pid, outcome.pid]);
    expect(await registry.getPid('web')).toBe(outcome.pid);
    expect(await canConnect(outcome.ports.frontendPort)).toBe(true);
  });

  it('stops a child whose PID cannot be recorded', async () => {
    const flaky = new FlakyRegistry({ registryPath: join(root, 'port-registry.json'), portRange: { min: 21000, max: 29000 } });
    flaky.failures = 3;
    registry = flaky;
    await writeServerApp(appsDir, 'web');
    const supervisor = makeSupervisor();

    const attempt = supervisor.start('web');
    await expect(attempt).rejects.toBeInstanceOf(RecordPidError);

    const [pid] = flaky.recordedPids;
    expect(flaky.recordedPids).toEqual([pid, pid, pid]);
    await expect(attempt).rejects.toThrow(
      `Could not record pid ${pid} for web; the process was stopped: Registry busy: could not acquire lock within 200ms`
    );
    expect(pid !== undefined && isProcessAlive(pid)).toBe(false);
    expect(await registry.getPid('web')).toBeNull();
    expect(supervisor.getState('web')).toBe('error');
  });

  it('builds the URL from the probe host', () => {
    const ports = { appName: 'web', frontendPort: 3100, backendPort: 3101 };
    expect(makeSupervisor().urlFor(ports)).toBe('http://127.0.0.1:3100');
    expect(makeSupervisor(new SignalTerminator(), { host: 'localhost' }).urlFor(ports)).toBe('http://localhost:3100');
    expect(makeSupervisor(new SignalTerminator(), { host: '::1' }).urlFor(ports)).toBe('http://[::1]:3100');
  });

  it('gives up after the start timeout and keeps the process on record', async () => {
    await writeSleeperApp(appsDir, 'slow');
    const supervisor = makeSupervisor(new SignalTerminator(), { startTimeoutMs: 1000 });

    const began = Date.now();
    const outcome = await supervisor.start('slow');
    const elapsed = Date.now() - began;

    if (outcome.status !== 'timeout') {
      throw new Error(`expected timeout, got ${outcome.status}`);
    }
    expect(outcome.timeoutMs).toBe(1000);
    expect(elapsed).toBeGreaterThanOrEqual(1000);
    expect(elapsed).toBeLessThan(4000);
    expect(await registry.getPid('slow')).toBe(outcome.pid);
    expect(supervisor.getState('slow')).toBe('error');

    const stopped = await supervisor.stop('slow');
    expect(stopped.status).toBe('stopped');
  });

  it('reports an app that exits before opening its port', async () => {
    await writeCrashingApp(appsDir, 'crash', 3);
    const supervisor = makeSupervisor();

    const outcome = await supervisor.start('crash');
    expect(outcome).toMatchObject({ status: 'exited', appName: 'crash', exitCode: 3, signal: null });
    expect(await registry.getPid('crash')).toBeNull();
    expect(supervisor.getState('crash')).toBe('error');
  });

  it('reports a missing app', async () => {
    const outcome = await makeSupervisor().start('ghost');
    expect(outcome).toEqual({
      status: 'not-found',
      appName: 'ghost',
      reason: `App 'ghost' was not found in ${appsDir}`,
    });
    expect(await registry.getAssignment('ghost')).toBeNull();
  });

  it('reports an app with nothing to run', async () => {
    await mkdir(join(appsDir, 'empty'));
    const outcome = await makeSupervisor().start('empty');
    expect(outcome).toEqual({
      status: 'not-found',
      appName: 'empty',
      reason: "App 'empty' has no run.sh or package.json start script",
    });
  });

  it('reports a failed stop and still clears the PID', async () => {
    await registry.getOrAllocate('stubborn');
    await registry.recordPid('stubborn', process.pid);
    const inert: ProcessTerminator = {
      name: 'inert',
      terminate: async () => ({ forced: false }),
    };
    const supervisor = makeSupervisor(inert);

    const outcome = await supervisor.stop('stubborn');
    expect(outcome).toEqual({
      status: 'failed',
      appName: 'stubborn',
      pid: process.pid,
      reason: `process ${process.pid} is still alive`,
    });
    expect(await registry.getPid('stubborn')).toBeNull();
    expect(supervisor.getState('stubborn')).toBe('error');
  });

  it('skips the start half of a restart when stop fails', async () => {
    await writeServerApp(appsDir, 'stubborn');
    await registry.getOrAllocate('stubborn');
    await registry.recordPid('stubborn', process.pid);
    const inert: ProcessTerminator = {
      name: 'inert',
      terminate: async () => ({ forced: false }),
    };

    const result = await makeSupervisor(inert).restart('stubborn');
    expect(result.stop.status).toBe('failed');
    expect(result.start).toBeUndefined();
  });

  it('turns a terminator error into a failed stop', async () => {
    await registry.getOrAllocate('stubborn');
    await registry.recordPid('stubborn', process.pid);
    const broken: ProcessTerminator = {
      name: 'broken',
      terminate: async () => {
        throw new Error('permission denied');
      },
    };

    const outcome = await makeSupervisor(broken).stop('stubborn');
    expect(outcome).toEqual({ status: 'failed', appName: 'stubborn', pid: process.pid, reason: 'permission denied' });
  });
});
