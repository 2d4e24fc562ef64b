/**
 * MCP tool: multi-hop exploration from an edge or pattern.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { KnowledgeBase } from '../../knowledge-base.js';
import type { ReasoningResult } from '../../reasoning/multi-hop.js';
import { debug } from '../../shared/debug.js';
import { plural, runTool, textResponse, type ToolResponse } from './response.js';

export interface ReasonFromInput {
  start: string;
  hops?: number;
  limit?: number;
}

/**
 * Groups results by distance. Each line shows the edge, then the path that
 * led to it when there is one.
 */
export function formatReasoningResults(start: string, results: ReasoningResult[]): string {
  if (results.length === 0) {
    return `No edges reachable from ${start}.`;
  }

  const lines: string[] = [`${plural(results.length, 'edge')} reachable from ${start}`];
  let distance = -1;

  for (const r of results) {
    if (r.distance !== distance) {
      distance = r.distance;
      lines.push('', `## Distance ${distance}`);
    }
    const layer = typeof r.attrs.layer === 'string' ? ` [${r.attrs.layer}]` : '';
    lines.push(`- ${r.edgeStr}${layer}`);
    if (r.path.length > 0) {
      lines.push(`  via ${r.path.join(' -> ')}`);
    }
  }

  return lines.join('\n');
}

export function handleReasonFrom(kb: KnowledgeBase, args: ReasonFromInput): Promise<ToolResponse> {
  return runTool('reason_from', () => {
    const results = kb.reason(args.start, { hops: args.hops, limit: args.limit });
    debug('mcp', 'reason_from: returning', { start: args.start, results: results.length });
    return textResponse(formatReasoningResults(args.start, results));
  });
}

export function registerReasonFrom(server: McpServer, kb: KnowledgeBase): void {
  server.registerTool(
    'reason_from',
    {
      title: 'Reason From',
      description:
        'Walk outward from an edge (or from every edge matching a pattern) through edges that share an atom, reporting each reachable edge with its hop distance and path.',
      inputSchema: {
        start: z
          .string()
          .min(1)
          .describe('Start edge or pattern, e.g. "(is/P aspirin/C drug/C)" or "(*/P aspirin/C ...)"'),
        hops: z
          .number()
          .int()
          .min(1)
          .max(6)
          .optional()
          .describe('Maximum hops (default from configuration, normally 2)'),
        limit: z
          .number()
          .int()
          .min(1)
          .max(500)
          .optional()
          .describe('Maximum results (default from configuration, normally 100)'),
      },
    },
    async (args) => handleReasonFrom(kb, args),
  );
}
