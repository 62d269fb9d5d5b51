import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  CallToolRequestSchema,
  ListToolsRequestSchema,
  ListResourcesRequestSchema,
  ReadResourceRequestSchema,
  type CallToolResult,
} from '@modelcontextprotocol/sdk/types.js';
import type { AppEvent, AppManager } from '../app-manager.js';
import type { AppListing, HealthSnapshot, OperationResult } from '../types.js';
import {
  OpenAppSchema,
  StopAppSchema,
  RestartAppSchema,
  ReleaseAppSchema,
  RefreshHealthSchema,
  ListAppsSchema,
  HealthSnapshotSchema,
  CollectGarbageSchema,
} from './validation.js';
import { describeError } from '../errors.js';

const nameProperty = {
  type: 'string',
  description: 'App name (slugified, e.g. "My News Website" -> "my_news_website")',
};

function toolResult<T>(summary: string, result: OperationResult<T>): CallToolResult {
  return {
    content: [
      { type: 'text', text: summary },
      { type: 'text', text: JSON.stringify(result, null, 2) },
    ],
    ...(!result.success && { isError: true }),
  };
}

export function formatAppList(apps: AppListing[]): string {
  if (apps.length === 0) {
    return 'No apps have ports assigned';
  }

  let output = `Apps (${apps.length}):\n\n`;
  for (const app of apps) {
    output += `${app.name}: ${app.running ? `running (pid ${app.pid})` : 'stopped'}\n`;
    output += `  Frontend: http://127.0.0.1:${app.frontendPort}\n`;
    output += `  Backend port: ${app.backendPort}\n`;
    if (app.health) {
      output += `  Health: ${app.health}\n`;
    }
    output += '\n';
  }
  return output;
}

export function formatHealth(snapshot: HealthSnapshot): string {
  const entries = Object.values(snapshot);
  if (entries.length === 0) {
    return 'No health data yet';
  }
  return entries
    .map((entry) => `${entry.appName}: ${entry.status} (checked ${entry.lastCheckedAt})`)
    .join('\n');
}

export class MCPServer {
  private server: Server;

  constructor(private manager: AppManager) {
    this.server = new Server(
      {
        name: 'appdock',
        version: '0.1.0',
      },
      {
        capabilities: {
          tools: {},
          resources: {},
        },
      }
    );

    this.setupHandlers();
    this.setupEventListeners();
  }

  private setupEventListeners() {
    this.manager.on('app:starting', (event: AppEvent) => {
      console.error(`[Event] Starting ${event.appName}`);
    });

    this.manager.on('app:started', (event: Extract<AppEvent, { type: 'app:started' }>) => {
      console.error(`[Event] ${event.appName} ready at ${event.url} (pid ${event.pid})`);
    });

    this.manager.on('app:failed', (event: Extract<AppEvent, { type: 'app:failed' }>) => {
      console.error(`[Event] ${event.appName} failed: ${event.error}`);
    });

    this.manager.on('app:stopped', (event: Extract<AppEvent, { type: 'app:stopped' }>) => {
      console.error(`[Event] ${event.appName} stopped${event.forced ? ' (forced)' : ''}`);
    });

    this.manager.on('app:released', (event: AppEvent) => {
      console.error(`[Event] ${event.appName} released its ports`);
    });
  }

  private setupHandlers() {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      return {
        tools: [
          {
            name: 'open_app',
            description: 'Start an app if it is not running and return its URL',
            inputSchema: {
              type: 'object',
              properties: { name: nameProperty },
              required: ['name'],
            },
          },
          {
            name: 'stop_app',
            description: 'Stop a running app; its ports stay assigned',
            inputSchema: {
              type: 'object',
              properties: { name: nameProperty },
              required: ['name'],
            },
          },
          {
            name: 'restart_app',
            description: 'Stop and start an app on the same ports',
            inputSchema: {
              type: 'object',
              properties: { name: nameProperty },
              required: ['name'],
            },
          },
          {
            name: 'release_app',
            description: 'Stop an app and free its port assignment',
            inputSchema: {
              type: 'object',
              properties: { name: nameProperty },
              required: ['name'],
            },
          },
          {
            name: 'list_apps',
            description: 'List apps with their ports and whether they are running',
            inputSchema: { type: 'object', properties: {} },
          },
          {
            name: 'health_snapshot',
            description: 'Latest up/down status per app from the background monitor',
            inputSchema: { type: 'object', properties: {} },
          },
          {
            name: 'refresh_health',
            description: 'Probe one app (or all apps) now and return the result',
            inputSchema: {
              type: 'object',
              properties: { name: nameProperty },
            },
          },
          {
            name: 'collect_garbage',
            description: 'Clear dead PIDs and drop entries for deleted apps',
            inputSchema: { type: 'object', properties: {} },
          },
        ],
      };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const { name, arguments: args } = request.params;

      try {
        switch (name) {
          case 'open_app':
            return await this.handleOpenApp(args);

          case 'stop_app':
            return await this.handleStopApp(args);

          case 'restart_app':
            return await this.handleRestartApp(args);

          case 'release_app':
            return await this.handleReleaseApp(args);

          case 'list_apps':
            return await this.handleListApps(args);

          case 'health_snapshot':
            return this.handleHealthSnapshot(args);

          case 'refresh_health':
            return await this.handleRefreshHealth(args);

          case 'collect_garbage':
            return await this.handleCollectGarbage(args);

          default:
            throw new Error(`Unknown tool: ${name}`);
        }
      } catch (error) {
        return toolResult(`Error: ${describeError(error)}`, {
          success: false,
          error: describeError(error),
        });
      }
    });

    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      const listed = await this.manager.listApps();
      const apps = listed.success ? listed.data : [];

      const resources = [
        {
          uri: 'app://list',
          name: 'Apps',
          description: 'All apps with a port assignment',
          mimeType: 'application/json',
        },
      ];

      for (const app of apps) {
        resources.push({
          uri: `app://${app.name}`,
          name: app.name,
          description: `Frontend ${app.frontendPort}, backend ${app.backendPort}`,
          mimeType: 'application/json',
        });
      }

      return { resources };
    });

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      const { uri } = request.params;

      if (uri === 'app://list') {
        const listed = await this.manager.listApps();
        if (!listed.success) {
          throw new Error(listed.error);
        }
        return {
          contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(listed.data, null, 2) }],
        };
      }

      if (uri.startsWith('app://')) {
        const app = await this.manager.getApp(uri.slice('app://'.length));
        if (!app.success) {
          throw new Error(app.error);
        }
        return {
          contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(app.data, null, 2) }],
        };
      }

      throw new Error(`Unknown resource: ${uri}`);
    });
  }

  private async handleOpenApp(args: unknown): Promise<CallToolResult> {
    const { name } = OpenAppSchema.parse(args);
    const result = await this.manager.openApp(name);

    if (!result.success) {
      return toolResult(`Could not open ${name}: ${result.error}`, result);
    }

    const app = result.data;
    return toolResult(
      `${app.alreadyRunning ? 'Already running' : 'Started'} ${app.appName}:
- URL: ${app.url}
- Frontend port: ${app.frontendPort}
- Backend port: ${app.backendPort}
- PID: ${app.pid}`,
      result
    );
  }

  private async handleStopApp(args: unknown): Promise<CallToolResult> {
    const { name } = StopAppSchema.parse(args);
    const result = await this.manager.stopApp(name);

    if (!result.success) {
      return toolResult(`Could not stop ${name}: ${result.error}`, result);
    }
    const summary = result.data.wasRunning
      ? `Stopped ${result.data.appName}${result.data.forced ? ' (forced)' : ''}`
      : `${result.data.appName} was not running`;
    return toolResult(summary, result);
  }

  private async handleRestartApp(args: unknown): Promise<CallToolResult> {
    const { name } = RestartAppSchema.parse(args);
    const result = await this.manager.restartApp(name);

    if (!result.success) {
      return toolResult(`Could not restart ${name}: ${result.error}`, result);
    }
    return toolResult(`Restarted ${result.data.appName} at ${result.data.url}`, result);
  }

  private async handleReleaseApp(args: unknown): Promise<CallToolResult> {
    const { name } = ReleaseAppSchema.parse(args);
    const result = await this.manager.releaseApp(name);

    if (!result.success) {
      return toolResult(`Could not release ${name}: ${result.error}`, result);
    }
    const summary = result.data.released
      ? `Released the ports of ${result.data.appName}`
      : `${result.data.appName} had no port assignment`;
    return toolResult(summary, result);
  }

  private async handleListApps(args: unknown = {}): Promise<CallToolResult> {
    ListAppsSchema.parse(args);
    const result = await this.manager.listApps();

    if (!result.success) {
      return toolResult(`Could not list apps: ${result.error}`, result);
    }
    return toolResult(formatAppList(result.data), result);
  }

  private handleHealthSnapshot(args: unknown = {}): CallToolResult {
    HealthSnapshotSchema.parse(args);
    const snapshot = this.manager.getHealthSnapshot();
    return toolResult(formatHealth(snapshot), { success: true, data: snapshot });
  }

  private async handleRefreshHealth(args: unknown = {}): Promise<CallToolResult> {
    const { name } = RefreshHealthSchema.parse(args);
    const result = await this.manager.refreshHealth(name);

    if (!result.success) {
      return toolResult(`Health refresh failed: ${result.error}`, result);
    }
    return toolResult(formatHealth(this.manager.getHealthSnapshot()), result);
  }

  private async handleCollectGarbage(args: unknown = {}): Promise<CallToolResult> {
    CollectGarbageSchema.parse(args);
    const result = await this.manager.collectGarbage();

    if (!result.success) {
      return toolResult(`Garbage collection failed: ${result.error}`, result);
    }
    const { clearedPids, removedApps } = result.data;
    return toolResult(
      `Cleared ${clearedPids.length} stale PID(s), removed ${removedApps.length} deleted app(s)`,
      result
    );
  }

  /** Used by tests and embedders; `start` wires stdio. */
  async connect(transport: Transport) {
    await this.server.connect(transport);
  }

  async start() {
    this.manager.start();
    await this.connect(new StdioServerTransport());
    console.error('MCP Server started on stdio');
    console.error(`Apps directory: ${this.manager.getAppsDir()}`);
  }

  async shutdown() {
    await this.manager.shutdown();
    await this.server.close();
  }
}
