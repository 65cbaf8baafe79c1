/**
 * Dhall Syntax Tests: Leaf Tables and Text Chunks
 */

import { describe, expect, it } from 'vitest';

import {
  BINOPS,
  BINOP_SYMBOLS,
  fromChunks,
  isBuiltin,
  precedenceOf,
  renderImport,
  toChunks,
  type TextChunk,
} from '../../src/index.js';

describe('Dhall Syntax: Leaf Tables', () => {
  it('recognises builtin names', () => {
    expect(isBuiltin('Natural/fold')).toBe(true);
    expect(isBuiltin('None')).toBe(true);
  });

  it('rejects near misses', () => {
    expect(isBuiltin('Natural/foldr')).toBe(false);
    expect(isBuiltin('natural')).toBe(false);
  });

  it('orders operators from loosest to tightest', () => {
    expect(precedenceOf('Equivalence')).toBe(0);
    expect(precedenceOf('ImportAlt')).toBeLessThan(precedenceOf('BoolOr'));
    expect(precedenceOf('NaturalPlus')).toBeLessThan(precedenceOf('NaturalTimes'));
    expect(precedenceOf('BoolNE')).toBe(BINOPS.length - 1);
  });

  it('has a spelling for every operator', () => {
    for (const op of BINOPS) {
      expect(BINOP_SYMBOLS[op]).not.toBe('');
    }
    expect(BINOP_SYMBOLS.RecursiveRecordTypeMerge).toBe('//\\\\');
  });
});

describe('Dhall Syntax: Text Chunks', () => {
  const chunks: TextChunk<string>[] = [
    { type: 'text', text: 'a' },
    { type: 'text', text: 'b' },
    { type: 'interpolation', expr: 'X' },
    { type: 'interpolation', expr: 'Y' },
    { type: 'text', text: 'c' },
    { type: 'text', text: 'd' },
  ];

  it('merges adjacent literal runs', () => {
    expect(fromChunks(chunks)).toEqual({
      head: 'ab',
      tail: [
        ['X', ''],
        ['Y', 'cd'],
      ],
    });
  });

  it('builds empty text from no chunks', () => {
    expect(fromChunks([])).toEqual({ head: '', tail: [] });
  });

  it('splits text back into chunks without empty runs', () => {
    expect(toChunks(fromChunks(chunks))).toEqual([
      { type: 'text', text: 'ab' },
      { type: 'interpolation', expr: 'X' },
      { type: 'interpolation', expr: 'Y' },
      { type: 'text', text: 'cd' },
    ]);
  });
});

describe('Dhall Syntax: Import Rendering', () => {
  it('renders every location kind', () => {
    expect(
      renderImport({
        mode: 'Code',
        location: { type: 'Local', prefix: 'Parent', path: ['lib', 'a.dhall'] },
      })
    ).toBe('../lib/a.dhall');
    expect(
      renderImport({
        mode: 'Code',
        location: { type: 'Local', prefix: 'Absolute', path: ['etc', 'a.dhall'] },
      })
    ).toBe('/etc/a.dhall');
    expect(renderImport({ mode: 'Code', location: { type: 'Env', name: 'HOME' } })).toBe(
      'env:HOME'
    );
    expect(renderImport({ mode: 'Code', location: { type: 'Missing' } })).toBe('missing');
  });

  it('appends the hash and the mode', () => {
    const digest = '0'.repeat(64);
    expect(
      renderImport({
        mode: 'RawText',
        location: { type: 'Remote', url: 'https://example.com/a.txt' },
        hash: { algorithm: 'sha256', digest },
      })
    ).toBe(`https://example.com/a.txt sha256:${digest} as Text`);
  });
});
