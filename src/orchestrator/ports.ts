import { randomInt } from 'crypto';
import { connect, createServer } from 'net';
import { PortExhaustionError } from '../errors.js';
import type { PortRange } from '../types.js';

const RANDOM_ATTEMPTS = 200;

export type PortProbe = (port: number) => Promise<boolean>;

/**
 * Point-in-time bind check. libuv sets SO_REUSEADDR on listening sockets, so
 * ports lingering in TIME_WAIT count as free. Nothing stops another process
 * from taking the port between this probe and the app's own bind.
 */
export function isPortAvailable(port: number, host = '0.0.0.0'): Promise<boolean> {
  return new Promise((resolve) => {
    const server = createServer()
      .once('error', () => {
        resolve(false);
      })
      .once('listening', () => {
        server.close(() => {
          resolve(true);
        });
      })
      .listen(port, host);
  });
}

export function canConnect(port: number, host = '127.0.0.1', timeoutMs = 1000): Promise<boolean> {
  return new Promise((resolve) => {
    const socket = connect({ port, host });

    const finish = (result: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(result);
    };

    socket.setTimeout(timeoutMs);
    socket.once('connect', () => finish(true));
    socket.once('timeout', () => finish(false));
    socket.once('error', () => finish(false));
  });
}

export function inRange(port: number, range: PortRange): boolean {
  return Number.isInteger(port) && port >= range.min && port <= range.max;
}

/**
 * Random draws first, then a sequential sweep so a nearly full range is still
 * found. Ports in `forbidden` are never probed.
 */
export async function pickAvailablePort(
  range: PortRange,
  forbidden: ReadonlySet<number>,
  probe: PortProbe
): Promise<number> {
  let attempts = 0;

  for (let i = 0; i < RANDOM_ATTEMPTS; i++) {
    const candidate = randomInt(range.min, range.max + 1);
    attempts++;
    if (forbidden.has(candidate)) continue;
    if (await probe(candidate)) {
      return candidate;
    }
  }

  for (let candidate = range.min; candidate <= range.max; candidate++) {
    if (forbidden.has(candidate)) continue;
    attempts++;
    if (await probe(candidate)) {
      return candidate;
    }
  }

  throw new PortExhaustionError(range, attempts);
}
