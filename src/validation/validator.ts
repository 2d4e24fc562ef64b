/**
 * Tri-state rule validator.
 *
 * Classifies each proposed edge as ALLOW, DENY or UNKNOWN against the active
 * rules and records which rules decided it (the why-trace):
 *
 *   1. A relevant, mandatory, blocking rule denies the edge. All such rules
 *      go into the trace.
 *   2. Otherwise, relevant supporting rules with no relevant blocking rule
 *      allow it. All relevant supporting rules go into the trace.
 *   3. Anything else is UNKNOWN: no relevant rule at all, or only
 *      non-mandatory blockers. Near-miss rules are offered as suggestions.
 *
 * A rule is relevant when every one of its concepts is known (from the
 * proposed edge or from context-layer facts) and at least one comes from the
 * proposed edge itself. Context-layer facts are never rules themselves. Connectors are ignored, since a rule and a proposal
 * usually phrase the same entities with different predicates.
 *
 * The batch decision is the worst verdict under DENY > UNKNOWN > ALLOW.
 */

import type { Atom } from '../hyperedge/atom.js';
import type { Hyperedge } from '../hyperedge/hyperedge.js';
import { toEdge } from '../hyperedge/parser.js';
import {
  DEFAULT_REASONING_CONFIG,
  type ReasoningConfig,
} from '../config/reasoning-config.js';
import type { LayerRegistry } from '../layers/layer-registry.js';
import { debug } from '../shared/debug.js';
import { InvalidArgumentError } from '../shared/errors.js';
import type { HypergraphStore } from '../storage/store.js';
import { collectActiveRules, collectContextConcepts, ruleLayers } from './rule-index.js';
import {
  DECISION_SEVERITY,
  DENY_REASON,
  UNKNOWN_REASON,
  type ActiveRule,
  type Decision,
  type EdgeVerdict,
  type RuleSuggestion,
  type ValidationReport,
  type WhyTraceEntry,
} from './types.js';

// =============================================================================
// Options
// =============================================================================

export type ValidatorConfig = Pick<
  ReasoningConfig,
  'blockingConnectors' | 'contextLayers' | 'defaultRulePattern' | 'maxSuggestions'
>;

export interface ValidateOptions {
  /** Rule-selection pattern; defaults to `config.defaultRulePattern` */
  pattern?: string | Hyperedge;
  /** Replaces the registry's active layers for this call only */
  layers?: readonly string[] | ReadonlySet<string>;
  /** Minimum rule confidence, in [0, 1]. Default 0. */
  confidenceMin?: number;
  config?: ValidatorConfig;
}

export type Proposal = string | Hyperedge;

// =============================================================================
// Relevance
// =============================================================================

interface Assessment {
  relevant: boolean;
  directMatch: Atom[];
  contextMatch: Atom[];
  missing: Atom[];
}

function assess(
  rule: ActiveRule,
  direct: ReadonlyMap<string, Atom>,
  context: ReadonlyMap<string, Atom>,
): Assessment {
  const directMatch: Atom[] = [];
  const contextMatch: Atom[] = [];
  const missing: Atom[] = [];

  for (const concept of rule.concepts) {
    const key = concept.toString();
    if (direct.has(key)) {
      directMatch.push(concept);
    } else if (context.has(key)) {
      contextMatch.push(concept);
    } else {
      missing.push(concept);
    }
  }

  return {
    relevant: rule.concepts.length > 0 && missing.length === 0 && directMatch.length > 0,
    directMatch,
    contextMatch,
    missing,
  };
}

export function isBlockingRule(connector: Atom, markers: readonly string[]): boolean {
  const label = connector.label.toLowerCase();
  return markers.some((m) => label.includes(m.toLowerCase()));
}

function traceEntry(rule: ActiveRule, a: Assessment): WhyTraceEntry {
  return {
    rule: rule.rule,
    ruleStr: rule.rule.toString(),
    connector: rule.connector,
    layer: rule.layer,
    source: rule.source,
    mandatory: rule.mandatory,
    confidence: rule.confidence,
    matchedConcepts: [...a.directMatch, ...a.contextMatch],
    directMatch: a.directMatch,
    contextMatch: a.contextMatch,
  };
}

// =============================================================================
// Per-edge Evaluation
// =============================================================================

/**
 * Classifies one proposed edge against an already collected rule set.
 */
export function evaluateEdge(
  proposed: Hyperedge,
  rules: readonly ActiveRule[],
  context: ReadonlyMap<string, Atom>,
  config: ValidatorConfig,
): EdgeVerdict {
  const direct = new Map(proposed.concepts().map((c) => [c.toString(), c] as const));

  const mandatoryBlocking: WhyTraceEntry[] = [];
  const advisoryBlocking: WhyTraceEntry[] = [];
  const supporting: WhyTraceEntry[] = [];
  const nearMisses: Array<{ rule: ActiveRule; a: Assessment }> = [];

  for (const rule of rules) {
    const a = assess(rule, direct, context);

    if (!a.relevant) {
      if (a.directMatch.length > 0) {
        nearMisses.push({ rule, a });
      }
      continue;
    }

    if (isBlockingRule(rule.connector, config.blockingConnectors)) {
      (rule.mandatory ? mandatoryBlocking : advisoryBlocking).push(traceEntry(rule, a));
    } else {
      supporting.push(traceEntry(rule, a));
    }
  }

  const edgeStr = proposed.toString();

  if (mandatoryBlocking.length > 0) {
    return { decision: 'DENY', edge: proposed, edgeStr, reason: DENY_REASON, whyTrace: mandatoryBlocking };
  }

  if (supporting.length > 0 && advisoryBlocking.length === 0) {
    return { decision: 'ALLOW', edge: proposed, edgeStr, whyTrace: supporting };
  }

  return {
    decision: 'UNKNOWN',
    edge: proposed,
    edgeStr,
    reason: UNKNOWN_REASON,
    suggestions: rankSuggestions(nearMisses, config.maxSuggestions),
    whyTrace: [...advisoryBlocking, ...supporting],
  };
}

/**
 * Near misses ordered by how many of their concepts are already known, then
 * by how few are missing. Ties keep store order.
 */
function rankSuggestions(
  nearMisses: Array<{ rule: ActiveRule; a: Assessment }>,
  max: number,
): RuleSuggestion[] {
  return nearMisses
    .map(({ rule, a }) => ({
      rule: rule.rule,
      ruleStr: rule.rule.toString(),
      layer: rule.layer,
      sharedConcepts: [...a.directMatch, ...a.contextMatch],
      missingConcepts: a.missing,
    }))
    .sort(
      (x, y) =>
        y.sharedConcepts.length - x.sharedConcepts.length ||
        x.missingConcepts.length - y.missingConcepts.length,
    )
    .slice(0, max);
}

// =============================================================================
// Batch Validation
// =============================================================================

function isProposalList(p: Proposal | readonly Proposal[]): p is readonly Proposal[] {
  return Array.isArray(p);
}

function resolveProposals(proposed: Proposal | readonly Proposal[]): Hyperedge[] {
  const list = isProposalList(proposed) ? proposed : [proposed];
  if (list.length === 0) {
    throw new InvalidArgumentError('proposed', 'at least one edge is required');
  }
  // Parse everything first: one malformed edge aborts the whole call
  const edges = list.map((p) => toEdge(p));
  for (const e of edges) {
    if (e.isPattern()) {
      throw new InvalidArgumentError('proposed', `patterns cannot be validated: ${e.toString()}`);
    }
  }
  return edges;
}

function assertConfidence(value: number): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new InvalidArgumentError('confidenceMin', `must be within [0, 1], got ${value}`);
  }
}

/**
 * Validates proposed edges against the active rules in the store.
 *
 * Throws ParseError for malformed edge text and InvalidArgumentError for bad
 * options, before touching the store. Store failures propagate unchanged.
 * DENY and UNKNOWN are ordinary results.
 */
export function validate(
  store: HypergraphStore,
  registry: LayerRegistry,
  proposed: Proposal | readonly Proposal[],
  options: ValidateOptions = {},
): ValidationReport {
  const confidenceMin = options.confidenceMin ?? 0;
  assertConfidence(confidenceMin);

  const config = options.config ?? DEFAULT_REASONING_CONFIG;
  const edges = resolveProposals(proposed);
  const pattern = toEdge(options.pattern ?? config.defaultRulePattern);
  const layers: ReadonlySet<string> = options.layers
    ? new Set(options.layers)
    : registry.active();

  const rules = collectActiveRules(store, {
    pattern,
    layers: ruleLayers(layers, config.contextLayers),
    confidenceMin,
  });
  const context = collectContextConcepts(
    store,
    toEdge(config.defaultRulePattern),
    layers,
    config.contextLayers,
  );

  const report: ValidationReport = {
    decision: 'ALLOW',
    kept: [],
    rejected: [],
    unknown: [],
    rulesChecked: 0,
  };

  for (const e of edges) {
    const verdict = evaluateEdge(e, rules, context, config);
    report.rulesChecked += rules.length;

    switch (verdict.decision) {
      case 'ALLOW':
        report.kept.push(verdict);
        break;
      case 'DENY':
        report.rejected.push(verdict);
        break;
      case 'UNKNOWN':
        report.unknown.push(verdict);
        break;
    }
    report.decision = worst(report.decision, verdict.decision);

    debug('validate', 'Edge classified', {
      edge: verdict.edgeStr,
      decision: verdict.decision,
      trace: verdict.whyTrace.length,
    });
  }

  debug('validate', 'Validation complete', {
    decision: report.decision,
    proposed: edges.length,
    layers: [...layers],
    rulesChecked: report.rulesChecked,
  });
  return report;
}

function worst(a: Decision, b: Decision): Decision {
  return DECISION_SEVERITY[b] > DECISION_SEVERITY[a] ? b : a;
}
