import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { writeFileSync } from 'node:fs';
import { join } from 'node:path';

import { parseEdge } from '../../hyperedge/parser.js';
import { InvalidArgumentError } from '../../shared/errors.js';
import type { SqliteHypergraphStore } from '../../storage/hypergraph-store.js';
import { openTempStore } from '../../storage/__tests__/test-utils.js';
import {
  loadFoundationPack,
  loadPack,
  parseFoundationPack,
  resolvePackFormat,
} from '../foundation-pack.js';

let store: SqliteHypergraphStore;
let dir: string;
let cleanup: () => void;

beforeEach(() => {
  ({ store, dir, cleanup } = openTempStore());
});

afterEach(() => {
  cleanup();
});

const PACK = {
  name: 'test-pack',
  rules: [
    {
      s: '(contraindicated/P ibuprofen/C diabetes/C)',
      attrs: { layer: 'foundation', mandatory: 'true' },
    },
  ],
  edges: [{ s: '(is/P ibuprofen/C nsaid/C)' }],
  facts: [{ s: '(has/P patient/C diabetes/C)', attrs: { layer: 'user' } }, { s: '(has/P patient/C' }],
};

function writePack(file: string, content: unknown): string {
  const path = join(dir, file);
  writeFileSync(path, typeof content === 'string' ? content : JSON.stringify(content));
  return path;
}

describe('loadFoundationPack', () => {
  it('loads rules, edges and facts and reports bad items', async () => {
    const result = await loadFoundationPack(store, writePack('pack.json', PACK));

    expect(result.name).toBe('test-pack');
    expect(result.total).toBe(4);
    expect(result.inserted).toBe(3);
    expect(result.updated).toBe(0);
    expect(result.errors.map((e) => e.item.s)).toEqual(['(has/P patient/C']);
    expect(store.all().map((s) => s.edge.toString())).toEqual([
      '(contraindicated/P ibuprofen/C diabetes/C)',
      '(is/P ibuprofen/C nsaid/C)',
      '(has/P patient/C diabetes/C)',
    ]);
  });

  it('upserts on reload', async () => {
    const path = writePack('pack.json', PACK);
    await loadFoundationPack(store, path);
    const again = await loadFoundationPack(store, path);

    expect(again.inserted).toBe(0);
    expect(again.updated).toBe(3);
    expect(store.count()).toBe(3);
  });

  it('names an unnamed pack after its file', async () => {
    const result = await loadFoundationPack(
      store,
      writePack('dietary.json', { rules: [{ s: '(forbids/P diet/C sugar/C)', attrs: { layer: 'diet' } }] }),
    );
    expect(result.name).toBe('dietary');
    expect(result.inserted).toBe(1);
  });

  it('loads a YAML pack through the same schema', async () => {
    const yaml = [
      'rules:',
      "  - s: '(contraindicated/P ibuprofen/C diabetes/C)'",
      '    attrs:',
      '      layer: foundation',
      '      mandatory: true',
      'facts:',
      "  - s: '(has/P patient/C diabetes/C)'",
      '    attrs: { layer: user }',
      '',
    ].join('\n');

    const result = await loadFoundationPack(store, writePack('dietary.yaml', yaml));

    expect(result.name).toBe('dietary');
    expect(result.inserted).toBe(2);
    expect(store.getAttrs(parseEdge('(contraindicated/P ibuprofen/C diabetes/C)'))).toEqual({
      layer: 'foundation',
      mandatory: true,
    });
  });

  it('honours an explicit format over the extension', async () => {
    const path = writePack('pack.txt', 'facts:\n  - s: "(is/P a/C)"\n');
    await expect(loadFoundationPack(store, path)).rejects.toThrow(/not valid JSON/);

    const result = await loadFoundationPack(store, path, 'yaml');
    expect(result.name).toBe('pack');
    expect(result.inserted).toBe(1);
  });

  it('rejects a missing file, invalid JSON and a wrong shape without writing', async () => {
    await expect(loadFoundationPack(store, join(dir, 'absent.json'))).rejects.toBeInstanceOf(
      InvalidArgumentError,
    );
    await expect(loadFoundationPack(store, writePack('broken.json', '{ "rules": ['))).rejects.toThrow(
      /not valid JSON/,
    );
    await expect(
      loadFoundationPack(store, writePack('shape.json', { rules: 'nope', edges: [{ s: '(is/P a/C)' }] })),
    ).rejects.toThrow(/rules/);
    expect(store.count()).toBe(0);
  });
});

describe('resolvePackFormat', () => {
  it('goes by the extension in auto mode', () => {
    expect(resolvePackFormat('packs/diet.yml')).toBe('yaml');
    expect(resolvePackFormat('packs/diet.YAML')).toBe('yaml');
    expect(resolvePackFormat('packs/diet.json')).toBe('json');
    expect(resolvePackFormat('packs/diet')).toBe('json');
    expect(resolvePackFormat('packs/diet.json', 'yaml')).toBe('yaml');
  });
});

describe('parseFoundationPack', () => {
  it('defaults every list to empty', () => {
    expect(parseFoundationPack({})).toEqual({ rules: [], edges: [], facts: [] });
  });

  it('rejects non-scalar attribute values', () => {
    expect(() => parseFoundationPack({ rules: [{ s: '(is/P a/C)', attrs: { layer: ['x'] } }] })).toThrow(
      InvalidArgumentError,
    );
  });
});

describe('loadPack', () => {
  it('uses the fallback name for an unnamed document', () => {
    const result = loadPack(store, { facts: [{ s: '(is/P a/C)' }] });
    expect(result).toEqual({ inserted: 1, updated: 0, skipped: 0, errors: [], name: 'pack', total: 1 });
  });
});
