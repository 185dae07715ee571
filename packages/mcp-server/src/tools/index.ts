import type { McpServer } from '../server/mcp_server.js';
import {
  createTaskTool,
  updateTaskTool,
  completeTaskTool,
  archiveTaskTool,
} from './record/index.js';
import {
  listTasksTool,
  readTaskDetailsTool,
  dailySummaryTool,
} from './read/index.js';
import { syncStatusTool, syncNowTool } from './sync/index.js';

/**
 * Registers all MCP tools on the server.
 * Called during bootstrap, before connecting the transport.
 */
export function registerAllTools(server: McpServer): void {
  // Mutations
  server.registerTool(createTaskTool);
  server.registerTool(updateTaskTool);
  server.registerTool(completeTaskTool);
  server.registerTool(archiveTaskTool);

  // Reads
  server.registerTool(listTasksTool);
  server.registerTool(readTaskDetailsTool);
  server.registerTool(dailySummaryTool);

  // Sync
  server.registerTool(syncStatusTool);
  server.registerTool(syncNowTool);
}
