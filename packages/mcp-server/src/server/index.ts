export { McpServer } from './mcp_server.js';
export type {
  McpServerConfig,
  ToolResult,
  ToolHandler,
  ToolInputSchema,
  McpToolDefinition,
  McpResourceEntry,
  McpResourceTemplate,
  McpResourceContent,
  McpResourceHandler,
} from './mcp_server.types.js';
