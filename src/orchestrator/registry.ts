import { readFile, writeFile, mkdir, rename, unlink } from 'fs/promises';
import { dirname } from 'path';
import { randomBytes } from 'crypto';
import lockfile from 'proper-lockfile';
import { z } from 'zod';
import {
  RegistryCorruptError,
  RegistryLockTimeoutError,
  describeError,
  errnoCode,
} from '../errors.js';
import { inRange, isPortAvailable, pickAvailablePort, type PortProbe } from './ports.js';
import { isProcessAlive } from './terminator.js';
import type {
  AppPortAssignment,
  PortPair,
  PortRange,
  ProcessRecord,
  RegistryRecord,
} from '../types.js';

const LOCK_RETRY_MS = 50;
const LOCK_STALE_MS = 10000;

const RegistryEntrySchema = z.object({
  frontend_port: z.number().int().min(1).max(65535),
  backend_port: z.number().int().min(1).max(65535),
  pid: z.number().int().positive().nullish(),
  started_at: z.string().nullish(),
});

type RegistryFileEntry = z.infer<typeof RegistryEntrySchema>;

interface RegistryEntry extends PortPair {
  pid: number | null;
  startedAt: string | null;
}

type RegistryData = Map<string, RegistryEntry>;

export interface PortRegistryOptions {
  registryPath: string;
  portRange?: PortRange;
  reservedPorts?: Iterable<number>;
  lockTimeoutMs?: number;
  /** Bind probe run on every candidate port. */
  probe?: PortProbe;
  isProcessAlive?: (pid: number) => boolean;
  /** When set, entries for apps that no longer exist are dropped during GC. */
  appExists?: (appName: string) => Promise<boolean>;
  /** Removal is skipped while this reports false (apps root missing or unmounted). */
  appsRootExists?: () => Promise<boolean>;
}

export interface GarbageCollectionReport {
  clearedPids: string[];
  removedApps: string[];
}

export function lockPathFor(registryPath: string): string {
  return `${registryPath}.lock`;
}

export class PortRegistry {
  readonly registryPath: string;
  readonly portRange: PortRange;
  readonly reservedPorts: ReadonlySet<number>;
  private lockTimeoutMs: number;
  private probe: PortProbe;
  private isAlive: (pid: number) => boolean;
  private appExists?: (appName: string) => Promise<boolean>;
  private appsRootExists?: () => Promise<boolean>;
  private warnedMissingRoot = false;
  private queue: Promise<void> = Promise.resolve();

  constructor(options: PortRegistryOptions) {
    this.registryPath = options.registryPath;
    this.portRange = options.portRange ?? { min: 3000, max: 5000 };
    this.reservedPorts = new Set(options.reservedPorts ?? []);
    this.lockTimeoutMs = options.lockTimeoutMs ?? 5000;
    this.probe = options.probe ?? ((port) => isPortAvailable(port));
    this.isAlive = options.isProcessAlive ?? isProcessAlive;
    this.appExists = options.appExists;
    this.appsRootExists = options.appsRootExists;
  }

  private async acquireFileLock(): Promise<() => Promise<void>> {
    try {
      return await lockfile.lock(this.registryPath, {
        realpath: false,
        lockfilePath: lockPathFor(this.registryPath),
        stale: LOCK_STALE_MS,
        retries: {
          retries: Math.max(1, Math.ceil(this.lockTimeoutMs / LOCK_RETRY_MS)),
          factor: 1,
          minTimeout: LOCK_RETRY_MS,
          maxTimeout: LOCK_RETRY_MS,
          randomize: true,
        },
        onCompromised: (error) => {
          console.error(`[Registry] Lock on ${this.registryPath} compromised: ${error.message}`);
        },
      });
    } catch (error) {
      if (errnoCode(error) === 'ELOCKED') {
        throw new RegistryLockTimeoutError(this.registryPath, this.lockTimeoutMs);
      }
      throw error;
    }
  }

  private async withLock<T>(fn: () => Promise<T>): Promise<T> {
    // Queue in-process callers so this process never contends with itself
    const previous = this.queue;
    let releaseInProc: () => void = () => undefined;
    this.queue = new Promise<void>((resolve) => {
      releaseInProc = resolve;
    });
    await previous;

    try {
      await mkdir(dirname(this.registryPath), { recursive: true });
      const releaseFs = await this.acquireFileLock();
      try {
        return await fn();
      } finally {
        await releaseFs();
      }
    } finally {
      releaseInProc();
    }
  }

  private parse(content: string): RegistryData {
    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (error) {
      throw new RegistryCorruptError(this.registryPath, describeError(error));
    }

    if (typeof raw !== 'object' || raw === null || Array.isArray(raw)) {
      throw new RegistryCorruptError(this.registryPath, 'top level is not an object');
    }

    const data: RegistryData = new Map();
    for (const [appName, value] of Object.entries(raw)) {
      const parsed = RegistryEntrySchema.safeParse(value);
      if (!parsed.success) {
        console.warn(`[Registry] Dropping malformed entry for ${appName}: ${parsed.error.message}`);
        continue;
      }
      data.set(appName, {
        frontendPort: parsed.data.frontend_port,
        backendPort: parsed.data.backend_port,
        pid: parsed.data.pid ?? null,
        startedAt: parsed.data.started_at ?? null,
      });
    }
    return data;
  }

  private serialize(data: RegistryData): string {
    const entries = Array.from(data, ([appName, entry]) => {
      const fileEntry: RegistryFileEntry = {
        frontend_port: entry.frontendPort,
        backend_port: entry.backendPort,
      };
      // Absent keys mean "not running"
      if (entry.pid !== null) fileEntry.pid = entry.pid;
      if (entry.startedAt !== null) fileEntry.started_at = entry.startedAt;
      return [appName, fileEntry] as const;
    });
    return JSON.stringify(Object.fromEntries(entries), null, 2);
  }

  private async readData(): Promise<RegistryData> {
    let content: string;
    try {
      content = await readFile(this.registryPath, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return new Map();
      }
      throw error;
    }

    try {
      return this.parse(content);
    } catch (error) {
      if (error instanceof RegistryCorruptError) {
        console.warn(`[Registry] ${error.message}; starting from an empty registry`);
        return new Map();
      }
      throw error;
    }
  }

  private async collect(data: RegistryData, locked: boolean): Promise<GarbageCollectionReport> {
    const report: GarbageCollectionReport = { clearedPids: [], removedApps: [] };
    const checkApps = this.appExists !== undefined && (await this.canRemoveApps());

    for (const [appName, entry] of data) {
      if (checkApps && this.appExists && !(await this.appExists(appName))) {
        if (locked && entry.pid !== null && this.isAlive(entry.pid)) {
          this.signalOrphan(appName, entry.pid);
        }
        data.delete(appName);
        report.removedApps.push(appName);
        continue;
      }

      if (entry.pid !== null && !this.isAlive(entry.pid)) {
        entry.pid = null;
        entry.startedAt = null;
        report.clearedPids.push(appName);
      }
    }

    return report;
  }

  private async canRemoveApps(): Promise<boolean> {
    if (!this.appsRootExists || (await this.appsRootExists())) {
      this.warnedMissingRoot = false;
      return true;
    }
    if (!this.warnedMissingRoot) {
      console.warn('[Registry] Apps directory is missing; keeping entries of apps that look deleted');
      this.warnedMissingRoot = true;
    }
    return false;
  }

  private signalOrphan(appName: string, pid: number): void {
    try {
      process.kill(pid, 'SIGTERM');
      console.error(`[Registry] Sent SIGTERM to ${pid}, left behind by deleted app ${appName}`);
    } catch (error) {
      console.error(`[Registry] Could not signal ${pid} for deleted app ${appName}: ${describeError(error)}`);
    }
  }

  /**
   * Reads and garbage-collects. Lock-free callers only get a collected view;
   * orphans are signalled and the result persisted by locked callers alone.
   */
  private async load(locked = false): Promise<{ data: RegistryData; report: GarbageCollectionReport }> {
    const data = await this.readData();
    const report = await this.collect(data, locked);
    return { data, report };
  }

  private async write(data: RegistryData): Promise<void> {
    const path = this.registryPath;
    const tempPath = `${path}.tmp.${randomBytes(8).toString('hex')}`;

    try {
      await writeFile(tempPath, this.serialize(data), {
        encoding: 'utf-8',
        mode: 0o600,
      });
      await rename(tempPath, path);
    } catch (error) {
      try {
        await unlink(tempPath);
      } catch (cleanupError) {
        if (errnoCode(cleanupError) !== 'ENOENT') {
          console.error(`[Registry] Could not remove ${tempPath}: ${describeError(cleanupError)}`);
        }
      }
      throw error;
    }
  }

  /**
   * The one read-modify-write path. The file is rewritten only when GC or
   * `fn` changed something.
   */
  private async update<T>(fn: (data: RegistryData) => Promise<T> | T): Promise<T> {
    return this.withLock(async () => {
      const { data, report } = await this.load(true);
      const before = this.serialize(data);
      const result = await fn(data);

      const collected = report.clearedPids.length > 0 || report.removedApps.length > 0;
      if (collected || this.serialize(data) !== before) {
        await this.write(data);
      }
      return result;
    });
  }

  private usedPorts(data: RegistryData): Set<number> {
    const used = new Set(this.reservedPorts);
    for (const entry of data.values()) {
      used.add(entry.frontendPort);
      used.add(entry.backendPort);
    }
    return used;
  }

  private async choosePort(forbidden: Set<number>, preferred: number | undefined): Promise<number> {
    if (
      preferred !== undefined &&
      inRange(preferred, this.portRange) &&
      !forbidden.has(preferred) &&
      (await this.probe(preferred))
    ) {
      return preferred;
    }
    return pickAvailablePort(this.portRange, forbidden, this.probe);
  }

  async getOrAllocate(appName: string, preferred: Partial<PortPair> = {}): Promise<AppPortAssignment> {
    return this.update(async (data) => {
      const existing = data.get(appName);
      if (existing) {
        return { appName, frontendPort: existing.frontendPort, backendPort: existing.backendPort };
      }

      const forbidden = this.usedPorts(data);
      const frontendPort = await this.choosePort(forbidden, preferred.frontendPort);
      forbidden.add(frontendPort);
      const backendPort = await this.choosePort(forbidden, preferred.backendPort);

      data.set(appName, { frontendPort, backendPort, pid: null, startedAt: null });
      console.error(`[Registry] Assigned ${appName} frontend=${frontendPort} backend=${backendPort}`);
      return { appName, frontendPort, backendPort };
    });
  }

  async recordPid(appName: string, pid: number): Promise<void> {
    await this.update((data) => {
      const entry = data.get(appName);
      if (!entry) {
        console.error(`[Registry] recordPid(${appName}, ${pid}) ignored: no port assignment`);
        return;
      }
      entry.pid = pid;
      entry.startedAt = new Date().toISOString();
    });
  }

  async getPid(appName: string): Promise<number | null> {
    const { data } = await this.load();
    return data.get(appName)?.pid ?? null;
  }

  async clearPid(appName: string): Promise<void> {
    await this.update((data) => {
      const entry = data.get(appName);
      if (!entry) return;
      entry.pid = null;
      entry.startedAt = null;
    });
  }

  /** Explicit deletion; the ports become available to other apps. */
  async release(appName: string): Promise<boolean> {
    return this.update((data) => data.delete(appName));
  }

  async garbageCollect(): Promise<GarbageCollectionReport> {
    return this.withLock(async () => {
      const { data, report } = await this.load(true);
      if (report.clearedPids.length > 0 || report.removedApps.length > 0) {
        await this.write(data);
        console.error(
          `[Registry] GC cleared ${report.clearedPids.length} stale PID(s), removed ${report.removedApps.length} app(s)`
        );
      }
      return report;
    });
  }

  async getAssignment(appName: string): Promise<AppPortAssignment | null> {
    const record = await this.getRecord(appName);
    if (!record) return null;
    return { appName, frontendPort: record.frontendPort, backendPort: record.backendPort };
  }

  async getRecord(appName: string): Promise<RegistryRecord | null> {
    const { data } = await this.load();
    const entry = data.get(appName);
    return entry ? { appName, ...entry } : null;
  }

  async getProcessRecord(appName: string): Promise<ProcessRecord | null> {
    const record = await this.getRecord(appName);
    if (!record) return null;
    return { appName, pid: record.pid, startedAt: record.startedAt };
  }

  async listRecords(): Promise<RegistryRecord[]> {
    const { data } = await this.load();
    return Array.from(data, ([appName, entry]) => ({ appName, ...entry }));
  }

  async listAssignments(): Promise<AppPortAssignment[]> {
    const records = await this.listRecords();
    return records.map(({ appName, frontendPort, backendPort }) => ({
      appName,
      frontendPort,
      backendPort,
    }));
  }
}
