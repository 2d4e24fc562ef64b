import { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';

import type { KnowledgeBase } from '../knowledge-base.js';
import { debug } from '../shared/debug.js';
import { registerAddEdge } from './tools/add-edge.js';
import { registerLoadFoundationPack } from './tools/load-foundation-pack.js';
import { registerManageLayers } from './tools/manage-layers.js';
import { registerReasonFrom } from './tools/reason-from.js';
import { registerValidateEdges } from './tools/validate-edges.js';

export const SERVER_NAME = 'hyperlayer';
export const SERVER_VERSION = '0.1.0';

export function createServer(): McpServer {
  return new McpServer(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );
}

/** Registers every hyperlayer tool against one knowledge base. */
export function registerTools(server: McpServer, kb: KnowledgeBase): void {
  registerValidateEdges(server, kb);
  registerReasonFrom(server, kb);
  registerManageLayers(server, kb);
  registerAddEdge(server, kb);
  registerLoadFoundationPack(server, kb);
  debug('mcp', 'Tools registered');
}

export async function startServer(server: McpServer): Promise<void> {
  const transport = new StdioServerTransport();
  await server.connect(transport);
  debug('mcp', 'MCP server started on stdio transport');
}
