/**
 * Validation result types.
 *
 * A verdict is a tagged union on `decision`: each state carries only the
 * fields that make sense for it (a rejection reason for DENY, suggestions
 * for UNKNOWN).
 */

import type { Atom } from '../hyperedge/atom.js';
import type { Hyperedge } from '../hyperedge/hyperedge.js';
import type { Attributes } from '../shared/types.js';

export const DECISIONS = ['ALLOW', 'DENY', 'UNKNOWN'] as const;

export type Decision = (typeof DECISIONS)[number];

/** Severity used to fold per-edge verdicts into the batch decision. */
export const DECISION_SEVERITY: Record<Decision, number> = {
  ALLOW: 0,
  UNKNOWN: 1,
  DENY: 2,
};

export const DENY_REASON = 'contraindicated or forbidden by rules';
export const UNKNOWN_REASON = 'insufficient information';

/**
 * A stored edge admitted as a rule for this call, with its reserved
 * attributes already typed.
 */
export interface ActiveRule {
  rule: Hyperedge;
  connector: Atom;
  concepts: Atom[];
  layer: string;
  mandatory: boolean;
  confidence: number;
  source: string | null;
  /** Non-reserved attributes, passed through */
  extra: Attributes;
}

/**
 * Evidence for one rule that took part in a decision.
 *
 * `matchedConcepts` is the rule's full concept set; `directMatch` is the part
 * found in the proposed edge and `contextMatch` the part supplied only by
 * context-layer facts.
 */
export interface WhyTraceEntry {
  rule: Hyperedge;
  ruleStr: string;
  connector: Atom;
  layer: string;
  source: string | null;
  mandatory: boolean;
  confidence: number;
  matchedConcepts: Atom[];
  directMatch: Atom[];
  contextMatch: Atom[];
}

/**
 * A near-miss rule offered with an UNKNOWN verdict: which of its concepts are
 * already present and which would still have to be known.
 */
export interface RuleSuggestion {
  rule: Hyperedge;
  ruleStr: string;
  layer: string;
  sharedConcepts: Atom[];
  missingConcepts: Atom[];
}

interface VerdictBase {
  edge: Hyperedge;
  edgeStr: string;
  whyTrace: WhyTraceEntry[];
}

export interface AllowVerdict extends VerdictBase {
  decision: 'ALLOW';
}

export interface DenyVerdict extends VerdictBase {
  decision: 'DENY';
  reason: string;
}

export interface UnknownVerdict extends VerdictBase {
  decision: 'UNKNOWN';
  reason: string;
  suggestions: RuleSuggestion[];
}

export type EdgeVerdict = AllowVerdict | DenyVerdict | UnknownVerdict;

export interface ValidationReport {
  decision: Decision;
  kept: AllowVerdict[];
  rejected: DenyVerdict[];
  unknown: UnknownVerdict[];
  /** Active rules considered, summed over every proposed edge */
  rulesChecked: number;
}
