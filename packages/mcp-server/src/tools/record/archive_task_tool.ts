import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { ArchiveTaskInput } from './record_tools.types.js';
import { successResult, failureResult, toWireMutation } from '../helpers.js';

export const archiveTaskTool: McpToolDefinition<ArchiveTaskInput> = {
  name: 'archive_task',
  description: 'Set a record to archived and move it to the archive area. It stays readable by id.',
  inputSchema: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1, description: 'Record id.' },
    },
    required: ['id'],
    additionalProperties: false,
  },
  handler: async (input: ArchiveTaskInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      return successResult(toWireMutation(await adapter.archive(input.id)));
    } catch (error) {
      return failureResult(`Failed to archive ${input.id}`, error);
    }
  },
};
