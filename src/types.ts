export interface PortPair {
  frontendPort: number;
  backendPort: number;
}

export interface PortRange {
  min: number;
  max: number;
}

export interface AppPortAssignment extends PortPair {
  appName: string; // slug, stable across regenerations
}

export interface ProcessRecord {
  appName: string;
  pid: number | null; // null when not running
  startedAt: string | null;
}

export type RegistryRecord = AppPortAssignment & ProcessRecord;

export type HealthStatus = 'up' | 'down';

export interface HealthEntry {
  appName: string;
  status: HealthStatus;
  lastCheckedAt: string;
}

export type HealthSnapshot = Record<string, HealthEntry>;

export type SupervisorState = 'stopped' | 'starting' | 'running' | 'stopping' | 'error';

export interface AppListing extends PortPair {
  name: string;
  running: boolean;
  pid: number | null;
  startedAt: string | null;
  health?: HealthStatus;
}

export type OperationResult<T> = { success: true; data: T } | { success: false; error: string };
