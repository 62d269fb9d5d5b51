import type { PortPair } from '../../types.js';

export interface LaunchCommand {
  command: string;
  args: string[];
}

/** Knows how to start one kind of generated app from its directory. */
export interface AppLauncher {
  readonly name: string;

  detect(appDir: string): Promise<boolean>;

  getCommand(appDir: string): Promise<LaunchCommand>;
  getEnvVars(ports: PortPair): Record<string, string>;
}

export function portEnv(ports: PortPair): Record<string, string> {
  return {
    PORT: String(ports.frontendPort),
    FRONTEND_PORT: String(ports.frontendPort),
    BACKEND_PORT: String(ports.backendPort),
  };
}
