import type { PortRange } from './types.js';

export class RegistryLockTimeoutError extends Error {
  readonly code = 'REGISTRY_LOCK_TIMEOUT';

  constructor(
    readonly registryPath: string,
    readonly timeoutMs: number
  ) {
    super(`Registry busy: could not acquire lock within ${timeoutMs}ms`);
    this.name = 'RegistryLockTimeoutError';
  }
}

export class RegistryCorruptError extends Error {
  readonly code = 'REGISTRY_CORRUPT';

  constructor(
    readonly registryPath: string,
    detail: string
  ) {
    super(`Registry file ${registryPath} is unreadable: ${detail}`);
    this.name = 'RegistryCorruptError';
  }
}

export class PortExhaustionError extends Error {
  readonly code = 'PORT_EXHAUSTION';

  constructor(
    readonly range: PortRange,
    readonly attempts: number
  ) {
    super(`No free port in ${range.min}-${range.max} after ${attempts} attempts`);
    this.name = 'PortExhaustionError';
  }
}

export class SpawnError extends Error {
  readonly code = 'SPAWN_FAILED';

  constructor(
    readonly appName: string,
    readonly command: string,
    cause: Error
  ) {
    super(`Failed to launch ${appName} (${command}): ${cause.message}`, { cause });
    this.name = 'SpawnError';
  }
}

export class RecordPidError extends Error {
  readonly code = 'RECORD_PID_FAILED';

  constructor(
    readonly appName: string,
    readonly pid: number,
    cause: unknown
  ) {
    super(`Could not record pid ${pid} for ${appName}; the process was stopped: ${describeError(cause)}`, { cause });
    this.name = 'RecordPidError';
  }
}

export class ConfigError extends Error {
  readonly code = 'INVALID_CONFIG';

  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

/** Short display string for anything thrown across the facade boundary. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
