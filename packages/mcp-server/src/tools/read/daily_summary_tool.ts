import type { DailySummary } from '@taskdeck/core';
import type { McpToolDefinition } from '../../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../../di/mcp_di.js';
import type { DailySummaryInput } from './read_tools.types.js';
import { successResult, failureResult, toWireHeader } from '../helpers.js';

/** Shared with the taskdeck://daily_summary resource. */
export function toWireSummary(summary: DailySummary) {
  return {
    date: summary.date,
    high_priority: summary.highPriority.map(toWireHeader),
    due_today: summary.dueToday.map(toWireHeader),
    overdue: summary.overdue.map(toWireHeader),
    counts: {
      total_active: summary.totalActive,
      high_priority: summary.highPriorityCount,
      due_today: summary.dueTodayCount,
      overdue: summary.overdueCount,
    },
  };
}

/**
 * daily_summary - today's active and next records: high priority, due today, overdue.
 */
export const dailySummaryTool: McpToolDefinition<DailySummaryInput> = {
  name: 'daily_summary',
  description:
    "Summarize the day over active and next records: high-priority items sorted by due date, items due today, overdue items, and counts.",
  inputSchema: {
    type: 'object',
    properties: {
      date: { type: 'string', pattern: '^\\d{4}-\\d{2}-\\d{2}$', description: 'Day to summarize, YYYY-MM-DD (default: today).' },
    },
    additionalProperties: false,
  },
  handler: async (input: DailySummaryInput, di: McpDependencyInjectionService) => {
    try {
      const { adapter } = await di.getContainer();
      return successResult(toWireSummary(adapter.dailySummary(input.date)));
    } catch (error) {
      return failureResult('Failed to build the daily summary', error);
    }
  },
};
