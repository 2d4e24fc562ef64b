/**
 * Foundation pack loader.
 *
 * A foundation pack is a JSON or YAML document of prepared rules and facts:
 *
 *   {
 *     "name": "dietary-basics",
 *     "rules": [{ "s": "(contraindicated/P sugar/C diabetes/C)",
 *                 "attrs": { "layer": "medical", "mandatory": true } }],
 *     "edges": [...],
 *     "facts": [...]
 *   }
 *
 * The three lists are loaded in that order through one upserting bulk add.
 * A malformed item lands in the result's `errors`; a malformed document
 * (unparseable, wrong shape) rejects the whole load before anything is written.
 */

import { readFile } from 'node:fs/promises';
import { basename, extname } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import { debug } from '../shared/debug.js';
import { InvalidArgumentError } from '../shared/errors.js';
import { AttributesSchema } from '../shared/types.js';
import type { BulkItem, BulkResult, SqliteHypergraphStore } from '../storage/hypergraph-store.js';

// =============================================================================
// Schema
// =============================================================================

const PackItemSchema = z.object({
  s: z.string().min(1),
  attrs: AttributesSchema.optional(),
});

export const FoundationPackSchema = z.object({
  name: z.string().optional(),
  rules: z.array(PackItemSchema).default([]),
  edges: z.array(PackItemSchema).default([]),
  facts: z.array(PackItemSchema).default([]),
});

export type FoundationPack = z.infer<typeof FoundationPackSchema>;

export const PACK_FORMATS = ['auto', 'json', 'yaml'] as const;
export type PackFormat = (typeof PACK_FORMATS)[number];

const YAML_EXTENSIONS = ['.yaml', '.yml'];

export interface PackLoadResult extends BulkResult {
  name: string;
  total: number;
}

// =============================================================================
// Parsing
// =============================================================================

/**
 * Validates an already-decoded pack document.
 */
export function parseFoundationPack(raw: unknown): FoundationPack {
  const parsed = FoundationPackSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`)
      .join('; ');
    throw new InvalidArgumentError('pack', issues);
  }
  return parsed.data;
}

export function packItems(pack: FoundationPack): BulkItem[] {
  return [...pack.rules, ...pack.edges, ...pack.facts];
}

// =============================================================================
// Loading
// =============================================================================

/**
 * Loads a decoded pack into the store.
 */
export function loadPack(
  store: SqliteHypergraphStore,
  raw: unknown,
  fallbackName = 'pack',
): PackLoadResult {
  const pack = parseFoundationPack(raw);
  const items = packItems(pack);
  const name = pack.name ?? fallbackName;

  const result = store.bulkAdd(items, { upsert: true });

  debug('ingest', 'Foundation pack loaded', {
    name,
    total: items.length,
    inserted: result.inserted,
    updated: result.updated,
    errors: result.errors.length,
  });
  return { ...result, name, total: items.length };
}

/** `auto` picks YAML for `.yaml` / `.yml` files and JSON otherwise. */
export function resolvePackFormat(path: string, format: PackFormat = 'auto'): 'json' | 'yaml' {
  if (format !== 'auto') return format;
  return YAML_EXTENSIONS.includes(extname(path).toLowerCase()) ? 'yaml' : 'json';
}

/**
 * Reads a pack from disk and loads it. The file name (without extension)
 * names the pack when the document has no `name`.
 */
export async function loadFoundationPack(
  store: SqliteHypergraphStore,
  path: string,
  format: PackFormat = 'auto',
): Promise<PackLoadResult> {
  const resolved = resolvePackFormat(path, format);

  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (err) {
    throw new InvalidArgumentError('path', `cannot read foundation pack '${path}'`, {
      cause: err,
    });
  }

  let raw: unknown;
  try {
    raw = resolved === 'yaml' ? parseYaml(text) : JSON.parse(text);
  } catch (err) {
    throw new InvalidArgumentError(
      'path',
      `foundation pack '${path}' is not valid ${resolved.toUpperCase()}`,
      { cause: err },
    );
  }

  return loadPack(store, raw, basename(path, extname(path)));
}
