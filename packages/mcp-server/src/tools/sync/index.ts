export { syncStatusTool } from './sync_status_tool.js';
export { syncNowTool } from './sync_now_tool.js';
