export { createResourceHandler, parseResourceUri, recordUri, DAILY_SUMMARY_URI } from './mcp_resources.js';
export type { ParsedResourceUri } from './mcp_resources.types.js';
