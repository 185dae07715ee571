import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { McpServer } from './mcp_server.js';
import type { McpToolDefinition, ToolHandler } from './mcp_server.types.js';
import { McpDependencyInjectionService } from '../di/mcp_di.js';
import { successResult } from '../tools/helpers.js';
import { registerAllTools } from '../tools/index.js';
import { parseClientResult } from '../test_helpers.js';

interface EchoInput {
  foo?: string;
}

function createServer() {
  return new McpServer({ name: 'test-server', version: '1.0.0' });
}

function createEchoTool(name: string, handler: ToolHandler<EchoInput>): McpToolDefinition<EchoInput> {
  return {
    name,
    description: `Test tool: ${name}`,
    inputSchema: {
      type: 'object',
      properties: { foo: { type: 'string' } },
      additionalProperties: false,
    },
    handler,
  };
}

async function connect(server: McpServer): Promise<Client> {
  const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
  await server.connectTransport(serverTransport);
  const client = new Client({ name: 'test-client', version: '1.0.0' });
  await client.connect(clientTransport);
  return client;
}

describe('McpServer', () => {
  let server: McpServer;
  let client: Client | null;
  // Never initialized: the echo tools do not touch the container.
  const di = new McpDependencyInjectionService({ dataDir: '/nonexistent/taskdeck-test' });

  beforeEach(() => {
    server = createServer();
    client = null;
  });

  afterEach(async () => {
    await client?.close();
  });

  it('should count registered tools', () => {
    server.registerTool(createEchoTool('echo_a', async () => successResult({})));
    server.registerTool(createEchoTool('echo_b', async () => successResult({})));

    expect(server.getToolCount()).toBe(2);
    expect(server.getToolNames()).toEqual(['echo_a', 'echo_b']);
  });

  it('should dispatch tool calls to the handler with the validated input', async () => {
    const handler = vi.fn<ToolHandler<EchoInput>>(async (input) => successResult({ echoed: input.foo }));
    server.registerTool(createEchoTool('echo', handler));
    server.setDI(di);
    client = await connect(server);

    const result = parseClientResult(await client.callTool({ name: 'echo', arguments: { foo: 'bar' } }));

    expect(handler).toHaveBeenCalledTimes(1);
    expect(handler.mock.calls[0]?.[0]).toEqual({ foo: 'bar' });
    expect(result).toEqual({ isError: false, data: { echoed: 'bar' } });
  });

  it('should reject arguments that do not match the input schema', async () => {
    const handler = vi.fn<ToolHandler<EchoInput>>(async () => successResult({}));
    server.registerTool(createEchoTool('echo', handler));
    server.setDI(di);
    client = await connect(server);

    const result = parseClientResult(await client.callTool({ name: 'echo', arguments: { foo: 1 } }));

    expect(handler).not.toHaveBeenCalled();
    expect(result.isError).toBe(true);
    expect(result.data).toMatchObject({
      error: 'Invalid arguments for echo: /foo must be string',
      code: 'VALIDATION_ERROR',
    });
  });

  it('should answer unknown tool names with an error result', async () => {
    server.setDI(di);
    client = await connect(server);

    const result = parseClientResult(await client.callTool({ name: 'nope', arguments: {} }));

    expect(result).toEqual({ isError: true, data: { error: 'Unknown tool: nope', code: 'UNKNOWN_TOOL' } });
  });

  it('should refuse calls before the DI container is set', async () => {
    server.registerTool(createEchoTool('echo', async () => successResult({})));
    client = await connect(server);

    const result = parseClientResult(await client.callTool({ name: 'echo', arguments: {} }));

    expect(result.data).toMatchObject({ code: 'NOT_INITIALIZED' });
  });

  it('should turn a throwing handler into INTERNAL_ERROR', async () => {
    server.registerTool(
      createEchoTool('boom', async () => {
        throw new Error('boom');
      }),
    );
    server.setDI(di);
    client = await connect(server);

    const result = parseClientResult(await client.callTool({ name: 'boom', arguments: {} }));

    expect(result).toEqual({
      isError: true,
      data: { error: 'Tool execution failed: boom', code: 'INTERNAL_ERROR' },
    });
  });

  it('should list every taskdeck tool with its input schema', async () => {
    registerAllTools(server);
    server.setDI(di);
    client = await connect(server);

    const { tools } = await client.listTools();

    expect(tools.map((t) => t.name)).toEqual([
      'create_task',
      'update_task',
      'complete_task',
      'archive_task',
      'list_tasks',
      'read_task_details',
      'daily_summary',
      'sync_status',
      'sync_now',
    ]);
    expect(tools.find((t) => t.name === 'create_task')?.inputSchema.required).toEqual(['title']);
  });

  it('should report no resources when no handler is registered', async () => {
    server.setDI(di);
    client = await connect(server);

    expect(server.hasResources()).toBe(false);
    expect(await client.listResources()).toMatchObject({ resources: [] });
  });
});
