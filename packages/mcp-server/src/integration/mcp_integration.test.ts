import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { Client } from '@modelcontextprotocol/sdk/client/index.js';
import { InMemoryTransport } from '@modelcontextprotocol/sdk/inMemory.js';
import { createTaskdeckMcpServer } from '../index.js';
import type { McpServer } from '../server/mcp_server.js';
import { createTestEnvironment, parseClientResult } from '../test_helpers.js';
import type { TestEnvironment } from '../test_helpers.js';

/**
 * Full round trips through the protocol: client -> server -> record
 * adapter -> files on disk.
 */
describe('MCP server over an in-memory transport', () => {
  let env: TestEnvironment;
  let server: McpServer;
  let client: Client;

  beforeEach(async () => {
    env = await createTestEnvironment();
    server = createTaskdeckMcpServer(env.di);
    const [clientTransport, serverTransport] = InMemoryTransport.createLinkedPair();
    await server.connectTransport(serverTransport);
    client = new Client({ name: 'test-agent', version: '1.0.0' });
    await client.connect(clientTransport);
  });

  afterEach(async () => {
    await client.close();
    await env.cleanup();
  });

  it('should create, list, complete and read a record', async () => {
    const created = parseClientResult(
      await client.callTool({ name: 'create_task', arguments: { title: 'Review PR', tags: ['work'] } }),
    );
    expect(created).toMatchObject({ isError: false, data: { record: { title: 'Review PR', status: 'active' } } });

    const { adapter } = await env.di.getContainer();
    const [header] = adapter.list();
    const id = header?.id ?? '';

    const listed = parseClientResult(await client.callTool({ name: 'list_tasks', arguments: { tag: 'work' } }));
    expect(listed.data).toMatchObject({ records: [{ id, title: 'Review PR' }], total: 1 });

    await client.callTool({ name: 'complete_task', arguments: { id } });

    const detail = parseClientResult(await client.callTool({ name: 'read_task_details', arguments: { id } }));
    expect(detail.data).toMatchObject({ id, status: 'done', location: 'active' });
    expect(env.git.commits.map((c) => c.message)).toEqual([
      'taskdeck: create task "Review PR"',
      `taskdeck: complete ${id}`,
    ]);
  });

  it('should return a structured error for an unknown id', async () => {
    const result = parseClientResult(
      await client.callTool({ name: 'update_task', arguments: { id: 'missing', field: 'title', value: 'x' } }),
    );

    expect(result).toMatchObject({ isError: true, data: { code: 'NOT_FOUND' } });
  });

  it('should expose records as resources', async () => {
    const { adapter } = await env.di.getContainer();
    const { record } = await adapter.create({ title: 'Essay', body: 'Outline first.' });

    const { resources } = await client.listResources();
    const { resourceTemplates } = await client.listResourceTemplates();
    const read = await client.readResource({ uri: `taskdeck://records/${record.id}` });

    expect(resources.map((r) => r.uri)).toEqual(['taskdeck://daily_summary', `taskdeck://records/${record.id}`]);
    expect(resourceTemplates.map((t) => t.uriTemplate)).toEqual(['taskdeck://records/{id}']);
    const content = read.contents[0];
    expect(content && 'text' in content ? JSON.parse(content.text) : null).toMatchObject({ body: 'Outline first.' });
  });
});
