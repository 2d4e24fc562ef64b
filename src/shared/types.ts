import { z } from 'zod';

import { InvalidArgumentError, StoreError } from './errors.js';

// =============================================================================
// Database
// =============================================================================

export interface DatabaseConfig {
  dbPath: string;
  busyTimeout: number;
}

// =============================================================================
// Attributes
// =============================================================================

/**
 * Attribute values are JSON scalars. Nested structures are not supported.
 */
export const AttributeValueSchema = z.union([
  z.string(),
  z.number(),
  z.boolean(),
  z.null(),
]);

export type AttributeValue = z.infer<typeof AttributeValueSchema>;

/**
 * Ordered key/value bag attached to a stored edge. Not part of edge identity.
 */
export const AttributesSchema = z.record(z.string(), AttributeValueSchema);

export type Attributes = Record<string, AttributeValue>;

/** Keys with a fixed meaning; everything else passes through untouched. */
export const RESERVED_ATTRIBUTE_KEYS = ['layer', 'mandatory', 'confidence', 'source'] as const;

export type ReservedAttributeKey = (typeof RESERVED_ATTRIBUTE_KEYS)[number];

const RESERVED_KEY_SET: ReadonlySet<string> = new Set<string>(RESERVED_ATTRIBUTE_KEYS);

const BooleanLikeSchema = z
  .union([z.boolean(), z.enum(['true', 'false', 'True', 'False'])])
  .transform((v) => (typeof v === 'boolean' ? v : v.toLowerCase() === 'true'));

const ConfidenceSchema = z
  .union([z.number(), z.string().trim().min(1).transform(Number)])
  .pipe(z.number().finite().min(0).max(1));

/**
 * Reserved-key schema. Values written as strings ("true", "0.9") are
 * accepted and coerced; older foundation packs store every value as a string.
 */
export const ReservedAttributesSchema = z.object({
  layer: z.string().min(1).optional(),
  mandatory: BooleanLikeSchema.optional(),
  confidence: ConfidenceSchema.optional(),
  source: z.string().nullable().optional(),
});

/**
 * Typed view of a layered edge's attributes.
 */
export interface RuleAttributes {
  layer: string;
  mandatory: boolean;
  confidence: number;
  source: string | null;
  /** Caller-defined keys, in insertion order */
  extra: Attributes;
}

export const DEFAULT_CONFIDENCE = 1.0;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

/**
 * Checks an attribute bag before it is written.
 * Throws InvalidArgumentError when a value is not a scalar or a reserved
 * key has the wrong type.
 */
export function assertValidAttributes(attrs: unknown): Attributes {
  const bag = AttributesSchema.safeParse(attrs);
  if (!bag.success) {
    throw new InvalidArgumentError('attrs', describeIssues(bag.error));
  }
  const reserved = ReservedAttributesSchema.safeParse(bag.data);
  if (!reserved.success) {
    throw new InvalidArgumentError('attrs', describeIssues(reserved.error));
  }
  return bag.data;
}

/**
 * Reads the reserved keys of a stored attribute bag.
 *
 * Returns null when the edge carries no `layer` (it is then a plain fact, not
 * a rule). Throws StoreError when a stored reserved value is corrupt.
 */
export function readRuleAttributes(attrs: Attributes | undefined): RuleAttributes | null {
  if (!attrs || attrs.layer === undefined || attrs.layer === null) {
    return null;
  }

  const parsed = ReservedAttributesSchema.safeParse(attrs);
  if (!parsed.success) {
    throw new StoreError(`Corrupt rule attributes: ${describeIssues(parsed.error)}`);
  }
  const { layer, mandatory, confidence, source } = parsed.data;
  if (layer === undefined) {
    return null;
  }

  const extra: Attributes = {};
  for (const [key, value] of Object.entries(attrs)) {
    if (!RESERVED_KEY_SET.has(key)) {
      extra[key] = value;
    }
  }

  return {
    layer,
    mandatory: mandatory ?? false,
    confidence: confidence ?? DEFAULT_CONFIDENCE,
    source: source ?? null,
    extra,
  };
}
