/**
 * Validation and reasoning configuration.
 *
 * Loaded from `<data dir>/reasoning.json`, with safe defaults when the file
 * does not exist. Every field is validated on its own: a bad value falls back
 * to its default without discarding the rest of the file.
 */

import { readFileSync } from 'node:fs';
import { join } from 'node:path';

import { parseEdge } from '../hyperedge/parser.js';
import { debug } from '../shared/debug.js';
import { getConfigDir } from '../shared/config.js';

// =============================================================================
// Types
// =============================================================================

export interface ReasoningConfig {
  /**
   * Case-insensitive markers; a rule whose head atom label contains any of
   * them is a blocking rule, every other rule is supporting.
   */
  blockingConnectors: string[];

  /**
   * Layers whose facts describe the current situation. Their concepts join
   * the proposal's own when testing rule relevance. Empty disables context.
   */
  contextLayers: string[];

  /** Rule-selection pattern used when a call does not pass one. */
  defaultRulePattern: string;

  /** Maximum suggestions attached to an UNKNOWN verdict. */
  maxSuggestions: number;

  /** Multi-hop defaults */
  defaultHops: number;
  defaultLimit: number;

  /** Layers enabled when a KnowledgeBase is created. */
  defaultLayers: string[];
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_REASONING_CONFIG: ReasoningConfig = {
  blockingConnectors: ['contraind', 'forbid'],
  contextLayers: ['user'],
  defaultRulePattern: '(*/P ...)',
  maxSuggestions: 3,
  defaultHops: 2,
  defaultLimit: 100,
  defaultLayers: [],
};

// =============================================================================
// Raw JSON Type
// =============================================================================

/** Fields are untrusted until each validator below accepts them. */
type RawConfigJson = Partial<Record<keyof ReasoningConfig, unknown>>;

function isRawConfig(value: unknown): value is RawConfigJson {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

// =============================================================================
// Field Validators
// =============================================================================

function stringList(value: unknown, fallback: string[], allowEmpty: boolean): string[] {
  if (!Array.isArray(value)) return [...fallback];
  const items = value.filter((v): v is string => typeof v === 'string' && v.trim().length > 0);
  if (items.length !== value.length) return [...fallback];
  if (items.length === 0 && !allowEmpty) return [...fallback];
  return items;
}

function positiveInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value > 0 ? value : fallback;
}

function nonNegativeInt(value: unknown, fallback: number): number {
  return typeof value === 'number' && Number.isInteger(value) && value >= 0 ? value : fallback;
}

function rulePattern(value: unknown, fallback: string): string {
  if (typeof value !== 'string') return fallback;
  try {
    return parseEdge(value).toString();
  } catch (err) {
    debug('config', 'Ignoring unparsable defaultRulePattern', {
      value,
      error: err instanceof Error ? err.message : String(err),
    });
    return fallback;
  }
}

/**
 * Merges a raw JSON object over the defaults, field by field.
 */
export function resolveReasoningConfig(raw: RawConfigJson): ReasoningConfig {
  const d = DEFAULT_REASONING_CONFIG;
  return {
    blockingConnectors: stringList(raw.blockingConnectors, d.blockingConnectors, false).map(
      (m) => m.toLowerCase(),
    ),
    contextLayers: stringList(raw.contextLayers, d.contextLayers, true),
    defaultRulePattern: rulePattern(raw.defaultRulePattern, d.defaultRulePattern),
    maxSuggestions: nonNegativeInt(raw.maxSuggestions, d.maxSuggestions),
    defaultHops: positiveInt(raw.defaultHops, d.defaultHops),
    defaultLimit: positiveInt(raw.defaultLimit, d.defaultLimit),
    defaultLayers: stringList(raw.defaultLayers, d.defaultLayers, true),
  };
}

// =============================================================================
// Loader
// =============================================================================

/**
 * Loads reasoning configuration from disk, falling back to defaults when the
 * file is missing or is not a JSON object.
 */
export function loadReasoningConfig(): ReasoningConfig {
  const configPath = join(getConfigDir(), 'reasoning.json');

  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(configPath, 'utf-8'));
  } catch {
    debug('config', 'No reasoning config found, using defaults');
    return resolveReasoningConfig({});
  }

  if (!isRawConfig(parsed)) {
    debug('config', 'Reasoning config is not an object, using defaults', { path: configPath });
    return resolveReasoningConfig({});
  }

  debug('config', 'Loaded reasoning config', { path: configPath });
  return resolveReasoningConfig(parsed);
}
