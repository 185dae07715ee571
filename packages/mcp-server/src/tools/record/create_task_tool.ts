import { RECORD_KINDS, RECORD_STATUSES } from '@taskdeck/core';
import type { CreateRecordInput } from '@taskdeck/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { CreateTaskInput } from './record_tools.types.js';
import { successResult, failureResult, toWireMutation } from '../helpers.js';

/**
 * create_task - creates a task, goal or note. New records start active.
 */
export const createTaskTool: McpToolDefinition<CreateTaskInput> = {
  name: 'create_task',
  description:
    'Create a new record (task by default) with status active. Provide a title and optionally body, due_date (YYYY-MM-DD), priority, tags, type and parent_goal_id.',
  inputSchema: {
    type: 'object',
    properties: {
      title: { type: 'string', minLength: 1, description: 'Record title.' },
      body: { type: 'string', description: 'Free-form body text.' },
      due_date: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$', description: 'Due date, YYYY-MM-DD.' },
      priority: { type: 'string', enum: ['high', 'medium', 'low'], description: 'Priority (default: medium).' },
      tags: { type: 'array', items: { type: 'string' }, description: 'Tags, e.g. a workstream name.' },
      type: { type: 'string', enum: [...RECORD_KINDS], description: 'Record type (default: task).' },
      status: { type: 'string', enum: [...RECORD_STATUSES], description: 'Initial status (default: active).' },
      parent_goal_id: { type: 'string', description: 'Id of the goal this record belongs to.' },
    },
    required: ['title'],
    additionalProperties: false,
  },
  handler: async (input: CreateTaskInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();

      const draft: CreateRecordInput = { title: input.title };
      if (input.body !== undefined) draft.body = input.body;
      if (input.due_date !== undefined) draft.dueDate = input.due_date;
      if (input.priority !== undefined) draft.priority = input.priority;
      if (input.tags !== undefined) draft.tags = input.tags;
      if (input.type !== undefined) draft.kind = input.type;
      if (input.status !== undefined) draft.status = input.status;
      if (input.parent_goal_id !== undefined) draft.parentGoalId = input.parent_goal_id;

      return successResult(toWireMutation(await adapter.create(draft)));
    } catch (error) {
      return failureResult('Failed to create record', error);
    }
  },
};
