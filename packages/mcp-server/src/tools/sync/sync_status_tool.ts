import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import { successResult, failureResult } from '../helpers.js';

/**
 * sync_status - reads the sync state. Never pulls or pushes.
 */
export const syncStatusTool: McpToolDefinition<Record<string, never>> = {
  name: 'sync_status',
  description:
    'Report the sync state: phase (Idle, Pulling, Committing, Pushing, PendingRetry, SyncBlocked), mode, pending change count, last error and conflicted files. Has no side effects.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
  handler: async (_input: Record<string, never>, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      return successResult(adapter.syncStatus());
    } catch (error) {
      return failureResult('Failed to read sync status', error);
    }
  },
};
