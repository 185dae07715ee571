import type { SchemaObject } from 'ajv';
import type { McpDependencyInjectionService } from '../di/mcp_di.js';

/**
 * MCP server configuration
 */
export interface McpServerConfig {
  /** Server name announced during MCP negotiation */
  name: string;
  /** Semver */
  version: string;
  description?: string;
}

/**
 * Structured result returned by every tool handler.
 * Always JSON text, never free-form prose.
 */
export type ToolResult = {
  content: Array<{
    type: 'text';
    text: string;
  }>;
  /** true when the tool hit a validation or domain error */
  isError?: boolean;
};

/**
 * JSON Schema (draft-07) for a tool's arguments. The server validates
 * incoming arguments against it before the handler runs.
 */
export interface ToolInputSchema extends SchemaObject {
  type: 'object';
  properties: Record<string, SchemaObject>;
  required?: string[];
  additionalProperties?: boolean;
}

/**
 * Handler of a single tool. Receives the already validated input and the DI container.
 */
export type ToolHandler<TInput> = (
  input: TInput,
  di: McpDependencyInjectionService,
) => Promise<ToolResult>;

/**
 * Complete MCP tool definition, ready to register.
 */
export interface McpToolDefinition<TInput> {
  /** snake_case tool name, e.g. create_task */
  name: string;
  /** Description read by the AI client */
  description: string;
  inputSchema: ToolInputSchema;
  handler: ToolHandler<TInput>;
}

// --- Resources ---

/** Entry returned by resources/list */
export interface McpResourceEntry {
  uri: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/** Entry returned by resources/templates/list */
export interface McpResourceTemplate {
  uriTemplate: string;
  name: string;
  description?: string;
  mimeType?: string;
}

/** Content returned by resources/read */
export interface McpResourceContent {
  uri: string;
  mimeType?: string;
  text: string;
}

/** Handler set for the resource operations */
export interface McpResourceHandler {
  templates: McpResourceTemplate[];
  list: (di: McpDependencyInjectionService) => Promise<{ resources: McpResourceEntry[] }>;
  read: (uri: string, di: McpDependencyInjectionService) => Promise<{ contents: McpResourceContent[] }>;
}
