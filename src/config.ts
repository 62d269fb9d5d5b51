import { dirname, join, resolve } from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import type { PortRange } from './types.js';

// The orchestrator's own frontend/backend ports; never handed to an app
export const DEFAULT_RESERVED_PORTS = [3416, 4179];

const port = z.coerce.number().int().min(1).max(65535);
const millis = z.coerce.number().int().nonnegative();

const portList = z
  .string()
  .transform((value, ctx) => {
    const ports = value
      .split(',')
      .map((part) => part.trim())
      .filter(Boolean)
      .map(Number);
    if (ports.some((p) => !Number.isInteger(p) || p < 1 || p > 65535)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `invalid port list: ${value}` });
      return z.NEVER;
    }
    return ports;
  });

const EnvSchema = z
  .object({
    APPDOCK_APPS_DIR: z.string().min(1).optional(),
    APPDOCK_REGISTRY_PATH: z.string().min(1).optional(),
    APPDOCK_LOG_DIR: z.string().min(1).optional(),
    APPDOCK_PORT_MIN: port.default(3000),
    APPDOCK_PORT_MAX: port.default(5000),
    APPDOCK_RESERVED_PORTS: portList.optional(),
    APPDOCK_BIND_HOST: z.string().min(1).default('0.0.0.0'),
    APPDOCK_PROBE_HOST: z.string().min(1).default('127.0.0.1'),
    APPDOCK_LOCK_TIMEOUT_MS: millis.default(5000),
    APPDOCK_START_TIMEOUT_MS: millis.default(30000),
    APPDOCK_START_POLL_MS: millis.default(500),
    APPDOCK_STOP_GRACE_MS: millis.default(3000),
    APPDOCK_RESTART_SETTLE_MS: millis.default(1000),
    APPDOCK_HEALTH_MIN_MS: millis.default(5000),
    APPDOCK_HEALTH_MAX_MS: millis.default(60000),
  })
  .refine((env) => env.APPDOCK_PORT_MIN < env.APPDOCK_PORT_MAX, {
    message: 'APPDOCK_PORT_MIN must be below APPDOCK_PORT_MAX',
    path: ['APPDOCK_PORT_MIN'],
  })
  .refine((env) => env.APPDOCK_HEALTH_MIN_MS <= env.APPDOCK_HEALTH_MAX_MS, {
    message: 'APPDOCK_HEALTH_MIN_MS must not exceed APPDOCK_HEALTH_MAX_MS',
    path: ['APPDOCK_HEALTH_MIN_MS'],
  });

export interface AppdockConfig {
  appsDir: string;
  registryPath: string;
  logDir: string;
  portRange: PortRange;
  reservedPorts: number[];
  bindHost: string;
  probeHost: string;
  lockTimeoutMs: number;
  startTimeoutMs: number;
  startPollMs: number;
  stopGraceMs: number;
  restartSettleMs: number;
  healthMinIntervalMs: number;
  healthMaxIntervalMs: number;
}

/**
 * Reads APPDOCK_* variables. Relative paths resolve against `cwd`; by default
 * apps live in <cwd>/generated and state in <cwd>/.appdock.
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
  cwd: string = process.cwd()
): AppdockConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  const values = parsed.data;
  const appsDir = resolve(cwd, values.APPDOCK_APPS_DIR ?? 'generated');
  const registryPath = resolve(cwd, values.APPDOCK_REGISTRY_PATH ?? join('.appdock', 'port-registry.json'));

  return {
    appsDir,
    registryPath,
    logDir: resolve(cwd, values.APPDOCK_LOG_DIR ?? join(dirname(registryPath), 'logs')),
    portRange: { min: values.APPDOCK_PORT_MIN, max: values.APPDOCK_PORT_MAX },
    reservedPorts: values.APPDOCK_RESERVED_PORTS ?? DEFAULT_RESERVED_PORTS,
    bindHost: values.APPDOCK_BIND_HOST,
    probeHost: values.APPDOCK_PROBE_HOST,
    lockTimeoutMs: values.APPDOCK_LOCK_TIMEOUT_MS,
    startTimeoutMs: values.APPDOCK_START_TIMEOUT_MS,
    startPollMs: values.APPDOCK_START_POLL_MS,
    stopGraceMs: values.APPDOCK_STOP_GRACE_MS,
    restartSettleMs: values.APPDOCK_RESTART_SETTLE_MS,
    healthMinIntervalMs: values.APPDOCK_HEALTH_MIN_MS,
    healthMaxIntervalMs: values.APPDOCK_HEALTH_MAX_MS,
  };
}
