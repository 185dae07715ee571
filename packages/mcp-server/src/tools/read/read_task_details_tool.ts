import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { ReadTaskDetailsInput } from './read_tools.types.js';
import { successResult, failureResult, toWireHeader } from '../helpers.js';

/**
 * read_task_details - full record: header, unknown header keys, body and location.
 */
export const readTaskDetailsTool: McpToolDefinition<ReadTaskDetailsInput> = {
  name: 'read_task_details',
  description: 'Read one record in full: header fields, body, any extra header keys, and whether it is archived.',
  inputSchema: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1, description: 'Record id.' },
    },
    required: ['id'],
    additionalProperties: false,
  },
  handler: async (input: ReadTaskDetailsInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      const detail = await adapter.readDetail(input.id);
      return successResult({
        ...toWireHeader(detail),
        extra: detail.extra,
        body: detail.body,
        location: detail.location,
      });
    } catch (error) {
      return failureResult(`Failed to read ${input.id}`, error);
    }
  },
};
