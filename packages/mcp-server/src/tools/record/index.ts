export { createTaskTool } from './create_task_tool.js';
export { updateTaskTool } from './update_task_tool.js';
export { completeTaskTool } from './complete_task_tool.js';
export { archiveTaskTool } from './archive_task_tool.js';
export type * from './record_tools.types.js';
