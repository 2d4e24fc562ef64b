/**
 * MCP tool: enable, disable or list rule layers for this server session.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { KnowledgeBase } from '../../knowledge-base.js';
import { debug } from '../../shared/debug.js';
import { errorResponse, runTool, textResponse, type ToolResponse } from './response.js';

export const LAYER_ACTIONS = ['enable', 'disable', 'list'] as const;

export type LayerAction = (typeof LAYER_ACTIONS)[number];

export interface ManageLayersInput {
  action: LayerAction;
  layers?: string[];
}

export function formatActiveLayers(active: ReadonlySet<string>): string {
  if (active.size === 0) {
    return 'Active layers: (none)';
  }
  return `Active layers: ${[...active].sort().join(', ')}`;
}

export function handleManageLayers(kb: KnowledgeBase, args: ManageLayersInput): Promise<ToolResponse> {
  return runTool('manage_layers', () => {
    const layers = args.layers ?? [];
    if (args.action !== 'list' && layers.length === 0) {
      return errorResponse(`manage_layers: "${args.action}" needs at least one layer`);
    }

    for (const layer of layers) {
      if (args.action === 'enable') kb.layers.enable(layer);
      if (args.action === 'disable') kb.layers.disable(layer);
    }

    const active = kb.layers.active();
    debug('mcp', 'manage_layers: done', { action: args.action, active: [...active] });
    return textResponse(formatActiveLayers(active));
  });
}

export function registerManageLayers(server: McpServer, kb: KnowledgeBase): void {
  server.registerTool(
    'manage_layers',
    {
      title: 'Manage Layers',
      description:
        'Enable or disable rule layers (e.g. "medical", "user"), or list the enabled ones. Only rules in enabled layers take part in validation.',
      inputSchema: {
        action: z.enum(LAYER_ACTIONS).describe('enable, disable or list'),
        layers: z
          .array(z.string().min(1))
          .optional()
          .describe('Layer names (required for enable and disable)'),
      },
    },
    async (args) => handleManageLayers(kb, args),
  );
}
