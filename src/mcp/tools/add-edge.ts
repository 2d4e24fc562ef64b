/**
 * MCP tool: store one edge, either in edge notation or as connector + args.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { Hyperedge } from '../../hyperedge/hyperedge.js';
import type { KnowledgeBase } from '../../knowledge-base.js';
import { debug } from '../../shared/debug.js';
import { AttributesSchema, type Attributes } from '../../shared/types.js';
import { errorResponse, runTool, textResponse, type ToolResponse } from './response.js';

export interface AddEdgeInput {
  edge?: string;
  connector?: string;
  args?: string[];
  attrs?: Attributes;
}

export function handleAddEdge(kb: KnowledgeBase, input: AddEdgeInput): Promise<ToolResponse> {
  return runTool('add_edge', () => {
    const attrs = input.attrs ?? {};

    let stored: Hyperedge;
    if (input.edge !== undefined) {
      stored = kb.addEdgeFromString(input.edge, attrs);
    } else if (input.connector !== undefined && input.args && input.args.length > 0) {
      stored = kb.addEdge(input.connector, input.args, attrs);
    } else {
      return errorResponse('add_edge: give either "edge" or "connector" with "args"');
    }

    const layer = attrs.layer;
    debug('mcp', 'add_edge: stored', { edge: stored.toString(), layer });
    return textResponse(
      typeof layer === 'string'
        ? `Stored ${stored.toString()} in layer ${layer}`
        : `Stored ${stored.toString()}`,
    );
  });
}

export function registerAddEdge(server: McpServer, kb: KnowledgeBase): void {
  server.registerTool(
    'add_edge',
    {
      title: 'Add Edge',
      description:
        'Store a fact or rule. Give "edge" in edge notation, or "connector" and "args" as plain words (typed automatically). An attrs.layer makes the edge a rule in that layer.',
      inputSchema: {
        edge: z
          .string()
          .min(1)
          .optional()
          .describe('Edge notation, e.g. "(contraindicated/P ibuprofen/C ulcer/C)"'),
        connector: z.string().min(1).optional().describe('Connector word, e.g. "treats"'),
        args: z
          .array(z.string().min(1))
          .optional()
          .describe('Argument words, e.g. ["aspirin", "headache"]'),
        attrs: AttributesSchema.optional().describe(
          'Attributes: layer, mandatory, confidence, source, plus any others',
        ),
      },
    },
    async (args) => handleAddEdge(kb, args),
  );
}
