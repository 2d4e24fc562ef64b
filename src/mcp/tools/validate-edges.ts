/**
 * MCP tool: validate proposed edges against the active rule layers.
 */

import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import { z } from 'zod';

import type { KnowledgeBase } from '../../knowledge-base.js';
import { debug } from '../../shared/debug.js';
import type {
  EdgeVerdict,
  RuleSuggestion,
  ValidationReport,
  WhyTraceEntry,
} from '../../validation/types.js';
import { plural, runTool, textResponse, type ToolResponse } from './response.js';

export interface ValidateEdgesInput {
  edges: string[];
  pattern?: string;
  layers?: string[];
  confidence_min?: number;
}

// =============================================================================
// Formatting
// =============================================================================

function formatTraceEntry(t: WhyTraceEntry): string {
  const flags = [t.layer, t.mandatory ? 'mandatory' : 'advisory'];
  if (t.confidence !== 1) flags.push(`confidence ${t.confidence}`);
  if (t.source) flags.push(`source ${t.source}`);
  return `${t.ruleStr} [${flags.join(', ')}]`;
}

function formatSuggestion(s: RuleSuggestion): string {
  const missing = s.missingConcepts.map((c) => c.toString()).join(', ');
  return `${s.ruleStr} [${s.layer}] needs ${missing}`;
}

function formatVerdict(v: EdgeVerdict): string[] {
  const lines: string[] = [];
  switch (v.decision) {
    case 'ALLOW':
      lines.push(`- ${v.edgeStr}`);
      for (const t of v.whyTrace) lines.push(`  supported by ${formatTraceEntry(t)}`);
      break;
    case 'DENY':
      lines.push(`- ${v.edgeStr}: ${v.reason}`);
      for (const t of v.whyTrace) lines.push(`  blocked by ${formatTraceEntry(t)}`);
      break;
    case 'UNKNOWN':
      lines.push(`- ${v.edgeStr}: ${v.reason}`);
      for (const t of v.whyTrace) lines.push(`  considered ${formatTraceEntry(t)}`);
      for (const s of v.suggestions) lines.push(`  suggestion: ${formatSuggestion(s)}`);
      break;
  }
  return lines;
}

/**
 * Renders a report as text: a summary line, then one section per non-empty
 * outcome in the order Rejected, Unknown, Kept.
 */
export function formatValidationReport(report: ValidationReport): string {
  const lines: string[] = [
    `Decision: ${report.decision} (${report.kept.length} kept, ${report.rejected.length} rejected, ${report.unknown.length} unknown; ${plural(report.rulesChecked, 'rule check')})`,
  ];

  const sections: Array<[string, EdgeVerdict[]]> = [
    ['Rejected', report.rejected],
    ['Unknown', report.unknown],
    ['Kept', report.kept],
  ];
  for (const [title, verdicts] of sections) {
    if (verdicts.length === 0) continue;
    lines.push('', `## ${title}`);
    for (const v of verdicts) lines.push(...formatVerdict(v));
  }

  return lines.join('\n');
}

// =============================================================================
// Handler
// =============================================================================

export function handleValidateEdges(kb: KnowledgeBase, args: ValidateEdgesInput): Promise<ToolResponse> {
  return runTool('validate_edges', () => {
    const report = kb.validate(args.edges, {
      pattern: args.pattern,
      layers: args.layers,
      confidenceMin: args.confidence_min,
    });
    debug('mcp', 'validate_edges: returning', {
      decision: report.decision,
      edges: args.edges.length,
    });
    return textResponse(formatValidationReport(report));
  });
}

export function registerValidateEdges(server: McpServer, kb: KnowledgeBase): void {
  server.registerTool(
    'validate_edges',
    {
      title: 'Validate Edges',
      description:
        'Check proposed hyperedges against the rules in the enabled layers. Each edge is ALLOW, DENY or UNKNOWN, with the rules that decided it.',
      inputSchema: {
        edges: z
          .array(z.string().min(1))
          .min(1)
          .describe('Proposed edges in edge notation, e.g. "(eat/P user/C sugar/C)"'),
        pattern: z
          .string()
          .optional()
          .describe('Rule-selection pattern (default: every predicate-headed edge)'),
        layers: z
          .array(z.string().min(1))
          .optional()
          .describe('Layers to use for this call instead of the enabled ones'),
        confidence_min: z
          .number()
          .min(0)
          .max(1)
          .optional()
          .describe('Ignore rules below this confidence (0 to 1)'),
      },
    },
    async (args) => handleValidateEdges(kb, args),
  );
}
