import { mkdir, writeFile } from 'fs/promises';
import { join } from 'path';
import { PortRegistry } from '../src/orchestrator/registry.js';
import { RegistryLockTimeoutError } from '../src/errors.js';

// Listens on FRONTEND_PORT until killed
const SERVER_SCRIPT = `require('http').createServer((req, res) => res.end('ok')).listen(Number(process.env.FRONTEND_PORT), '127.0.0.1')`;

export async function writeApp(appsDir: string, name: string, script: string): Promise<string> {
  const appDir = join(appsDir, name);
  await mkdir(appDir, { recursive: true });
  await writeFile(join(appDir, 'run.sh'), `#!/bin/sh\n${script}\n`);
  return appDir;
}

export function writeServerApp(appsDir: string, name: string): Promise<string> {
  return writeApp(appsDir, name, `exec "${process.execPath}" -e "${SERVER_SCRIPT}"`);
}

/** Runs but never opens its port. */
export function writeSleeperApp(appsDir: string, name: string): Promise<string> {
  return writeApp(appsDir, name, 'exec sleep 30');
}

export function writeCrashingApp(appsDir: string, name: string, exitCode = 3): Promise<string> {
  return writeApp(appsDir, name, `exit ${exitCode}`);
}

/** Fails the next `failures` recordPid calls with a lock timeout. */
export class FlakyRegistry extends PortRegistry {
  failures = 0;
  readonly recordedPids: number[] = [];

  async recordPid(appName: string, pid: number): Promise<void> {
    this.recordedPids.push(pid);
    if (this.failures > 0) {
      this.failures--;
      throw new RegistryLockTimeoutError(this.registryPath, 200);
    }
    await super.recordPid(appName, pid);
  }
}
