import { readFile, access } from 'fs/promises';
import { constants } from 'fs';
import { join } from 'path';
import type { AppLauncher, LaunchCommand } from './base.js';
import { portEnv } from './base.js';
import { errnoCode } from '../../errors.js';
import type { PortPair } from '../../types.js';

const SCRIPT_NAME = 'run.sh';

/**
 * Splits a shebang line into command and arguments, e.g.
 * "#!/usr/bin/env bash" -> ["/usr/bin/env", "bash"].
 */
export function parseShebang(firstLine: string): string[] | null {
  if (!firstLine.startsWith('#!')) return null;
  const parts = firstLine.slice(2).trim().split(/\s+/).filter(Boolean);
  return parts.length > 0 ? parts : null;
}

export class ScriptLauncher implements AppLauncher {
  readonly name = 'script';

  async detect(appDir: string): Promise<boolean> {
    try {
      await access(join(appDir, SCRIPT_NAME), constants.R_OK);
      return true;
    } catch (error) {
      const code = errnoCode(error);
      if (code === 'ENOENT' || code === 'EACCES' || code === 'ENOTDIR') return false;
      throw error;
    }
  }

  async getCommand(appDir: string): Promise<LaunchCommand> {
    const content = await readFile(join(appDir, SCRIPT_NAME), 'utf-8');
    const interpreter = parseShebang(content.split('\n', 1)[0] ?? '');

    // The script need not be executable; run it through its interpreter
    if (interpreter) {
      const [command, ...args] = interpreter;
      if (command) {
        return { command, args: [...args, SCRIPT_NAME] };
      }
    }
    return { command: 'sh', args: [SCRIPT_NAME] };
  }

  getEnvVars(ports: PortPair): Record<string, string> {
    return portEnv(ports);
  }
}
