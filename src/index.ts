#!/usr/bin/env node
import { MCPServer } from './mcp/server.js';
import { AppManager } from './app-manager.js';
import { loadConfig } from './config.js';

async function main() {
  // Usage: node dist/src/index.js [working-directory]
  const workingDirectory = process.argv[2] || process.cwd();
  const config = loadConfig(process.env, workingDirectory);
  const manager = await AppManager.create(config);
  const server = new MCPServer(manager);

  const shutdown = async (signal: string) => {
    console.error(`\nReceived ${signal}, shutting down...`);
    try {
      await server.shutdown();
      console.error('Shutdown complete; apps keep running');
      process.exit(0);
    } catch (error) {
      console.error('Error during shutdown:', error);
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await server.start();
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
