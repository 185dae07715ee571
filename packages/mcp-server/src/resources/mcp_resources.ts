import type {
  McpResourceHandler,
  McpResourceEntry,
  McpResourceContent,
  McpResourceTemplate,
} from '../server/mcp_server.types.js';
import type { McpDependencyInjectionService } from '../di/mcp_di.js';
import type { ParsedResourceUri } from './mcp_resources.types.js';
import { toWireHeader } from '../tools/helpers.js';
import { toWireSummary } from '../tools/read/daily_summary_tool.js';

const URI_PREFIX = 'taskdeck://';
export const DAILY_SUMMARY_URI = `${URI_PREFIX}daily_summary`;
const RECORD_PREFIX = `${URI_PREFIX}records/`;

export const RESOURCE_TEMPLATES: McpResourceTemplate[] = [
  {
    uriTemplate: `${RECORD_PREFIX}{id}`,
    name: 'Record',
    description: 'A taskdeck record with its body',
    mimeType: 'application/json',
  },
];

/** Parse a taskdeck:// URI */
export function parseResourceUri(uri: string): ParsedResourceUri | null {
  if (uri === DAILY_SUMMARY_URI) return { kind: 'daily_summary' };
  if (!uri.startsWith(RECORD_PREFIX)) return null;
  const id = decodeURIComponent(uri.slice(RECORD_PREFIX.length));
  if (!id || id.includes('/')) return null;
  return { kind: 'record', id };
}

export function recordUri(id: string): string {
  return `${RECORD_PREFIX}${encodeURIComponent(id)}`;
}

/** Lists the daily summary and every non-archived record as MCP resources */
export function createResourceHandler(): McpResourceHandler {
  return { templates: RESOURCE_TEMPLATES, list: listResources, read: readResource };
}

async function listResources(di: McpDependencyInjectionService): Promise<{ resources: McpResourceEntry[] }> {
  const { adapter } = await di.getContainer();
  const resources: McpResourceEntry[] = [
    {
      uri: DAILY_SUMMARY_URI,
      name: 'Daily summary',
      description: 'High-priority, due-today and overdue records',
      mimeType: 'application/json',
    },
  ];

  for (const header of adapter.list()) {
    resources.push({
      uri: recordUri(header.id),
      name: `${header.kind}: ${header.title}`,
      description: `${header.status} ${header.kind}`,
      mimeType: 'application/json',
    });
  }

  return { resources };
}

async function readResource(uri: string, di: McpDependencyInjectionService): Promise<{ contents: McpResourceContent[] }> {
  const parsed = parseResourceUri(uri);
  if (!parsed) {
    throw new Error(`Invalid resource URI: ${uri}. Expected ${DAILY_SUMMARY_URI} or ${RECORD_PREFIX}{id}`);
  }

  const { adapter } = await di.getContainer();

  if (parsed.kind === 'daily_summary') {
    return {
      contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(toWireSummary(adapter.dailySummary()), null, 2) }],
    };
  }

  const detail = await adapter.readDetail(parsed.id);
  const payload = { ...toWireHeader(detail), extra: detail.extra, body: detail.body, location: detail.location };
  return {
    contents: [{ uri, mimeType: 'application/json', text: JSON.stringify(payload, null, 2) }],
  };
}
