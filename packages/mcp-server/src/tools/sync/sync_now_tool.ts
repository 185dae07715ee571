import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import { successResult, failureResult } from '../helpers.js';

/**
 * sync_now - runs one pull/commit/push cycle. This is also the manual retry
 * after a conflict has been resolved in the data directory.
 */
export const syncNowTool: McpToolDefinition<Record<string, never>> = {
  name: 'sync_now',
  description:
    'Run a sync cycle now: pull, commit any uncommitted changes, push. Use after resolving a conflict to leave the SyncBlocked state.',
  inputSchema: {
    type: 'object',
    properties: {},
    additionalProperties: false,
  },
  handler: async (_input: Record<string, never>, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      const outcome = await adapter.syncNow();
      return successResult({ outcome, state: adapter.syncStatus() });
    } catch (error) {
      return failureResult('Sync failed', error);
    }
  },
};
