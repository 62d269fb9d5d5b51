import type { AppLauncher } from './base.js';
import { ScriptLauncher } from './script.js';
import { NodeLauncher } from './node.js';

export class LauncherRegistry {
  private launchers: AppLauncher[];

  // An explicit run.sh wins over package.json scripts
  constructor(launchers: AppLauncher[] = [new ScriptLauncher(), new NodeLauncher()]) {
    this.launchers = launchers;
  }

  async detect(appDir: string): Promise<AppLauncher | null> {
    for (const launcher of this.launchers) {
      if (await launcher.detect(appDir)) {
        return launcher;
      }
    }
    return null;
  }
}

export type { AppLauncher, LaunchCommand } from './base.js';
export { portEnv } from './base.js';
export { ScriptLauncher, parseShebang } from './script.js';
export { NodeLauncher } from './node.js';
