import Ajv from 'ajv';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import type { Transport } from '@modelcontextprotocol/sdk/shared/transport.js';
import {
  ListToolsRequestSchema,
  CallToolRequestSchema,
  ListResourcesRequestSchema,
  ListResourceTemplatesRequestSchema,
  ReadResourceRequestSchema,
} from '@modelcontextprotocol/sdk/types.js';
import { createLogger } from '@taskdeck/core';
import type {
  McpServerConfig,
  McpToolDefinition,
  McpResourceHandler,
  ToolInputSchema,
  ToolResult,
} from './mcp_server.types.js';
import type { McpDependencyInjectionService } from '../di/mcp_di.js';
import { errorResult } from '../tools/helpers.js';

const logger = createLogger('[MCP] ');

/** A tool after registration: its schema compiled and its handler behind a type guard. */
interface RegisteredTool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  invoke: (args: unknown, di: McpDependencyInjectionService) => Promise<ToolResult>;
}

export class McpServer {
  private server: Server;
  private ajv = new Ajv({ allErrors: true, strict: false });
  private tools: Map<string, RegisteredTool> = new Map();
  private resourceHandler: McpResourceHandler | null = null;
  private di: McpDependencyInjectionService | null = null;
  private handlersReady = false;

  constructor(private config: McpServerConfig) {
    this.server = new Server(
      { name: config.name, version: config.version },
      { capabilities: { tools: {}, resources: {} } },
    );
  }

  /** Registers the DI container the handlers use */
  setDI(di: McpDependencyInjectionService): void {
    this.di = di;
  }

  registerTool<TInput>(definition: McpToolDefinition<TInput>): void {
    const validate = this.ajv.compile<TInput>(definition.inputSchema);
    this.tools.set(definition.name, {
      name: definition.name,
      description: definition.description,
      inputSchema: definition.inputSchema,
      invoke: async (args, di) => {
        if (!validate(args)) {
          const issues = (validate.errors ?? []).map((e) => `${e.instancePath || '/'} ${e.message ?? 'is invalid'}`);
          return errorResult(`Invalid arguments for ${definition.name}: ${issues.join('; ')}`, 'VALIDATION_ERROR', {
            issues,
          });
        }
        return definition.handler(args, di);
      },
    });
  }

  registerResourceHandler(handler: McpResourceHandler): void {
    this.resourceHandler = handler;
  }

  getToolCount(): number {
    return this.tools.size;
  }

  getToolNames(): string[] {
    return Array.from(this.tools.keys());
  }

  hasResources(): boolean {
    return this.resourceHandler !== null;
  }

  getConfig(): McpServerConfig {
    return this.config;
  }

  /** Connects the stdio transport and starts listening */
  async connectStdio(): Promise<void> {
    await this.connectTransport(new StdioServerTransport());
  }

  /** Connects any SDK transport, e.g. an in-memory pair in tests */
  async connectTransport(transport: Transport): Promise<void> {
    this.setupHandlers();
    await this.server.connect(transport);
    logger.info(`${this.config.name} ${this.config.version} connected with ${this.tools.size} tools`);
  }

  async close(): Promise<void> {
    await this.server.close();
  }

  private setupHandlers(): void {
    if (this.handlersReady) return;
    this.handlersReady = true;

    // --- Tools ---
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({
      tools: Array.from(this.tools.values()).map((t) => ({
        name: t.name,
        description: t.description,
        inputSchema: t.inputSchema,
      })),
    }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) => {
      const tool = this.tools.get(request.params.name);

      if (!tool) {
        return errorResult(`Unknown tool: ${request.params.name}`, 'UNKNOWN_TOOL');
      }

      if (!this.di) {
        return errorResult('DI container not initialized', 'NOT_INITIALIZED');
      }

      try {
        const result = await tool.invoke(request.params.arguments ?? {}, this.di);
        return {
          content: result.content,
          isError: result.isError,
        };
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        logger.error(`Tool ${tool.name} failed: ${message}`);
        return errorResult(`Tool execution failed: ${message}`, 'INTERNAL_ERROR');
      }
    });

    // --- Resources ---
    this.server.setRequestHandler(ListResourcesRequestSchema, async () => {
      if (!this.resourceHandler || !this.di) {
        return { resources: [] };
      }
      return await this.resourceHandler.list(this.di);
    });

    this.server.setRequestHandler(ListResourceTemplatesRequestSchema, async () => ({
      resourceTemplates: this.resourceHandler?.templates ?? [],
    }));

    this.server.setRequestHandler(ReadResourceRequestSchema, async (request) => {
      if (!this.resourceHandler || !this.di) {
        throw new Error('Resources not available');
      }
      return await this.resourceHandler.read(request.params.uri, this.di);
    });
  }
}
