import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { CompleteTaskInput } from './record_tools.types.js';
import { successResult, failureResult, toWireMutation } from '../helpers.js';

/**
 * complete_task - marks a record done. Completing a done record is a no-op.
 */
export const completeTaskTool: McpToolDefinition<CompleteTaskInput> = {
  name: 'complete_task',
  description: 'Mark a record as done. Set archive to true to also move it to the archive.',
  inputSchema: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1, description: 'Record id.' },
      archive: { type: 'boolean', description: 'Move the record to the archive area.' },
    },
    required: ['id'],
    additionalProperties: false,
  },
  handler: async (input: CompleteTaskInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      const result = await adapter.complete(input.id, { archive: input.archive ?? false });
      return successResult(toWireMutation(result));
    } catch (error) {
      return failureResult(`Failed to complete ${input.id}`, error);
    }
  },
};
