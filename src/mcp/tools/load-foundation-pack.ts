/**
 * MCP tool: load a foundation pack (prepared rules and facts) from a JSON or
 * YAML file.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import {
  PACK_FORMATS,
  type PackFormat,
  type PackLoadResult,
} from '../../ingestion/foundation-pack.js';
import type { KnowledgeBase } from '../../knowledge-base.js';
import { debug } from '../../shared/debug.js';
import { runTool, textResponse, type ToolResponse } from './response.js';

export interface LoadFoundationPackInput {
  path: string;
  format?: PackFormat;
}

/** At most this many item errors are listed; the rest are counted. */
export const MAX_LISTED_ERRORS = 5;

export function formatPackResult(result: PackLoadResult): string {
  const lines = [
    `Loaded pack "${result.name}": ${result.inserted} inserted, ${result.updated} updated, ${result.skipped} skipped, ${result.errors.length} failed (of ${result.total})`,
  ];
  for (const e of result.errors.slice(0, MAX_LISTED_ERRORS)) {
    lines.push(`- ${e.item.s}: ${e.error}`);
  }
  if (result.errors.length > MAX_LISTED_ERRORS) {
    lines.push(`- ... ${result.errors.length - MAX_LISTED_ERRORS} more`);
  }
  return lines.join('\n');
}

export function handleLoadFoundationPack(
  kb: KnowledgeBase,
  args: LoadFoundationPackInput,
): Promise<ToolResponse> {
  return runTool('load_foundation_pack', async () => {
    const result = await kb.loadFoundationPack(args.path, args.format);
    debug('mcp', 'load_foundation_pack: done', { path: args.path, total: result.total });
    return textResponse(formatPackResult(result));
  });
}

export function registerLoadFoundationPack(server: McpServer, kb: KnowledgeBase): void {
  server.registerTool(
    'load_foundation_pack',
    {
      title: 'Load Foundation Pack',
      description:
        'Load prepared rules, edges and facts from a foundation pack JSON or YAML file. Existing edges get their attributes merged.',
      inputSchema: {
        path: z.string().min(1).describe('Path to the pack file'),
        format: z
          .enum(PACK_FORMATS)
          .optional()
          .describe('File format; "auto" (default) goes by the extension'),
      },
    },
    async (args) => handleLoadFoundationPack(kb, args),
  );
}
