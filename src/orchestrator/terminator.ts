import { setTimeout as delay } from 'timers/promises';
import { describeError, errnoCode } from '../errors.js';

const EXIT_POLL_MS = 100;
const KILL_WAIT_MS = 1000;

export interface TerminationResult {
  forced: boolean; // true when the graceful signal was not enough
}

export interface ProcessTerminator {
  readonly name: string;
  terminate(pid: number, graceMs: number): Promise<TerminationResult>;
}

type TreeKill = (pid: number, signal?: string | number, callback?: (error?: Error) => void) => void;

export function isProcessAlive(pid: number): boolean {
  if (!Number.isInteger(pid) || pid <= 0) return false;
  try {
    process.kill(pid, 0);
    return true;
  } catch (error) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(error) === 'EPERM';
  }
}

export async function waitForExit(pid: number, timeoutMs: number): Promise<boolean> {
  const deadline = Date.now() + timeoutMs;
  while (isProcessAlive(pid)) {
    if (Date.now() >= deadline) return false;
    await delay(EXIT_POLL_MS);
  }
  return true;
}

/** Portable variant: tree-kill also takes down the app's own children. */
export class TreeKillTerminator implements ProcessTerminator {
  readonly name = 'tree-kill';

  constructor(private kill: TreeKill) {}

  private send(pid: number, signal: NodeJS.Signals): Promise<void> {
    return new Promise((resolve, reject) => {
      this.kill(pid, signal, (error?: Error) => {
        if (error) {
          reject(error);
        } else {
          resolve();
        }
      });
    });
  }

  async terminate(pid: number, graceMs: number): Promise<TerminationResult> {
    await this.send(pid, 'SIGTERM');
    if (await waitForExit(pid, graceMs)) {
      return { forced: false };
    }

    await this.send(pid, 'SIGKILL');
    await waitForExit(pid, KILL_WAIT_MS);
    return { forced: true };
  }
}

/**
 * Raw signal variant. Apps are spawned detached, so each one leads its own
 * process group; the group is signalled first and the bare PID second.
 */
export class SignalTerminator implements ProcessTerminator {
  readonly name = 'signal';

  constructor(private platform: NodeJS.Platform = process.platform) {}

  private send(pid: number, signal: NodeJS.Signals): void {
    if (this.platform !== 'win32') {
      try {
        process.kill(-pid, signal);
        return;
      } catch (error) {
        const code = errnoCode(error);
        if (code !== 'ESRCH' && code !== 'EPERM') {
          throw error;
        }
      }
    }

    try {
      process.kill(pid, signal);
    } catch (error) {
      if (errnoCode(error) !== 'ESRCH') {
        throw error;
      }
    }
  }

  async terminate(pid: number, graceMs: number): Promise<TerminationResult> {
    this.send(pid, 'SIGTERM');
    if (await waitForExit(pid, graceMs)) {
      return { forced: false };
    }

    // No SIGKILL equivalent on Windows
    if (this.platform === 'win32') {
      return { forced: false };
    }

    this.send(pid, 'SIGKILL');
    await waitForExit(pid, KILL_WAIT_MS);
    return { forced: true };
  }
}

export async function createTerminator(): Promise<ProcessTerminator> {
  try {
    const { default: kill } = await import('tree-kill');
    return new TreeKillTerminator(kill);
  } catch (error) {
    console.error(`[Supervisor] tree-kill unavailable, using POSIX signals: ${describeError(error)}`);
    return new SignalTerminator();
  }
}
