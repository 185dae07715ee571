export { McpDependencyInjectionService } from './mcp_di.js';
export type { McpDiConfig, McpDiContainer } from './mcp_di.types.js';
