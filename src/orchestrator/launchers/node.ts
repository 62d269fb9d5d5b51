import { readFile } from 'fs/promises';
import { join } from 'path';
import type { AppLauncher, LaunchCommand } from './base.js';
import { portEnv } from './base.js';
import { z } from 'zod';
import { describeError, errnoCode } from '../../errors.js';
import type { PortPair } from '../../types.js';

const PackageJsonSchema = z.object({
  scripts: z.record(z.string()).optional(),
});

async function readScripts(appDir: string): Promise<Record<string, string>> {
  const path = join(appDir, 'package.json');
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') return {};
    throw error;
  }

  try {
    const pkg = PackageJsonSchema.safeParse(JSON.parse(content));
    if (pkg.success) return pkg.data.scripts ?? {};
    console.warn(`[Supervisor] Ignoring ${path}: ${pkg.error.message}`);
  } catch (error) {
    console.warn(`[Supervisor] Ignoring ${path}: ${describeError(error)}`);
  }
  return {};
}

/** Apps with a package.json: `npm run dev`, or `npm run start` without one. */
export class NodeLauncher implements AppLauncher {
  readonly name = 'node';

  async detect(appDir: string): Promise<boolean> {
    const scripts = await readScripts(appDir);
    return Boolean(scripts.dev || scripts.start);
  }

  async getCommand(appDir: string): Promise<LaunchCommand> {
    const scripts = await readScripts(appDir);
    const script = scripts.dev ? 'dev' : 'start';
    return { command: 'npm', args: ['run', script] };
  }

  getEnvVars(ports: PortPair): Record<string, string> {
    return {
      ...portEnv(ports),
      HOSTNAME: '127.0.0.1', // Force IPv4
      BROWSER: 'none',
    };
  }
}
