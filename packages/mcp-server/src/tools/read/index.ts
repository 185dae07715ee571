export { listTasksTool } from './list_tasks_tool.js';
export { readTaskDetailsTool } from './read_task_details_tool.js';
export { dailySummaryTool, toWireSummary } from './daily_summary_tool.js';
export type * from './read_tools.types.js';
