/**
 * @taskdeck/mcp-server
 *
 * Exposes the record adapter to AI agents over the Model Context Protocol.
 */

import { McpServer } from './server/mcp_server.js';
import { McpDependencyInjectionService } from './di/mcp_di.js';
import type { McpDiConfig } from './di/mcp_di.types.js';
import { registerAllTools } from './tools/index.js';
import { createResourceHandler } from './resources/index.js';

export { McpServer } from './server/index.js';
export type * from './server/index.js';
export { McpDependencyInjectionService } from './di/index.js';
export type { McpDiConfig, McpDiContainer } from './di/index.js';
export { registerAllTools } from './tools/index.js';
export { successResult, errorResult, failureResult, toWireHeader } from './tools/helpers.js';
export { createResourceHandler, parseResourceUri, recordUri, DAILY_SUMMARY_URI } from './resources/index.js';

export const SERVER_NAME = 'taskdeck';
export const SERVER_VERSION = '0.1.0';

/**
 * Builds a server with every tool and resource registered and the DI set,
 * not yet connected to a transport.
 */
export function createTaskdeckMcpServer(di: McpDependencyInjectionService): McpServer {
  const server = new McpServer({
    name: SERVER_NAME,
    version: SERVER_VERSION,
    description: 'Task, goal and note records for AI agents.',
  });
  registerAllTools(server);
  server.registerResourceHandler(createResourceHandler());
  server.setDI(di);
  return server;
}

export interface StdioServerHandle {
  server: McpServer;
  di: McpDependencyInjectionService;
  /** Flushes pending writes and disconnects. */
  shutdown(): Promise<void>;
}

/**
 * Opens the data directory, then serves requests over stdin/stdout.
 * Rejects before connecting when the data directory is not accessible.
 */
export async function startStdioServer(config: McpDiConfig = {}): Promise<StdioServerHandle> {
  const di = new McpDependencyInjectionService({ watch: true, ...config });
  await di.getContainer();

  const server = createTaskdeckMcpServer(di);
  await server.connectStdio();

  return {
    server,
    di,
    async shutdown() {
      await di.close();
      await server.close();
    },
  };
}
