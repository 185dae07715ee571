import { PATCH_FIELDS } from '@taskdeck/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { UpdateTaskInput } from './record_tools.types.js';
import { successResult, failureResult, toWireMutation } from '../helpers.js';

/**
 * update_task - sets one field of a record.
 */
export const updateTaskTool: McpToolDefinition<UpdateTaskInput> = {
  name: 'update_task',
  description:
    'Update one field of a record. Fields: title, status, priority, tags, due_date, parent_goal_id, body (replace) and notes (append to the body). Use null to clear due_date or parent_goal_id.',
  inputSchema: {
    type: 'object',
    properties: {
      id: { type: 'string', minLength: 1, description: 'Record id.' },
      field: { type: 'string', enum: [...PATCH_FIELDS], description: 'Field to change.' },
      value: {
        type: ['string', 'array', 'null'],
        items: { type: 'string' },
        description: 'New value; an array or comma-separated string for tags.',
      },
    },
    required: ['id', 'field', 'value'],
    additionalProperties: false,
  },
  handler: async (input: UpdateTaskInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      return successResult(toWireMutation(await adapter.patch(input.id, input.field, input.value)));
    } catch (error) {
      return failureResult(`Failed to update ${input.id}`, error);
    }
  },
};
