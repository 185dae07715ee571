import { RECORD_STATUSES } from '@taskdeck/core';
import type { ListQuery } from '@taskdeck/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { ListTasksInput } from './read_tools.types.js';
import { successResult, failureResult, toWireHeader } from '../helpers.js';

/**
 * list_tasks - header projections, filtered and sorted. Never returns bodies.
 */
export const listTasksTool: McpToolDefinition<ListTasksInput> = {
  name: 'list_tasks',
  description:
    'List record headers (no bodies). Filter by status, tag and priority; sort by due_date, priority or created_at; limit the count. Archived records are excluded unless include_archived is true.',
  inputSchema: {
    type: 'object',
    properties: {
      status: { type: 'string', enum: [...RECORD_STATUSES], description: 'Filter by status.' },
      tag: { type: 'string', description: 'Only records carrying this tag.' },
      priority: { type: 'string', description: 'Filter by priority.' },
      sort: { type: 'string', enum: ['due_date', 'priority', 'created_at'], description: 'Sort key (default: created_at).' },
      direction: { type: 'string', enum: ['asc', 'desc'], description: 'Sort direction (default: asc).' },
      limit: { type: 'integer', minimum: 1, description: 'Maximum number of results.' },
      include_archived: { type: 'boolean', description: 'Include archived records.' },
    },
    additionalProperties: false,
  },
  handler: async (input: ListTasksInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();

      const query: ListQuery = {};
      if (input.status !== undefined) query.status = input.status;
      if (input.tag !== undefined) query.tag = input.tag;
      if (input.priority !== undefined) query.priority = input.priority;
      if (input.sort !== undefined) query.sort = input.sort;
      if (input.direction !== undefined) query.direction = input.direction;
      if (input.limit !== undefined) query.limit = input.limit;
      if (input.include_archived !== undefined) query.includeArchived = input.include_archived;

      const records = adapter.list(query).map(toWireHeader);
      return successResult({ records, total: records.length });
    } catch (error) {
      return failureResult('Failed to list records', error);
    }
  },
};
