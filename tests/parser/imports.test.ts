/**
 * Dhall Parser Tests: Import Syntax
 * Tests for import locations, modes and integrity hashes
 */

import { describe, expect, it } from 'vitest';

import { ParseError, parseExpr, renderImport } from '../../src/index.js';
import { catchError, parsePlain } from '../helpers/syntax.js';

const DIGEST = 'ab'.repeat(32);

describe('Dhall Parser: Imports', () => {
  describe('local paths', () => {
    it('parses paths relative to the importing file', () => {
      expect(parsePlain('./a.dhall')).toEqual({
        type: 'Embed',
        embed: {
          mode: 'Code',
          location: { type: 'Local', prefix: 'Here', path: ['a.dhall'] },
          hash: undefined,
        },
      });
    });

    it('parses parent, home and absolute paths', () => {
      expect(parsePlain('../x/y.dhall')).toMatchObject({
        embed: { location: { type: 'Local', prefix: 'Parent', path: ['x', 'y.dhall'] } },
      });
      expect(parsePlain('~/cfg.dhall')).toMatchObject({
        embed: { location: { type: 'Local', prefix: 'Home', path: ['cfg.dhall'] } },
      });
      expect(parsePlain('/etc/app/cfg.dhall')).toMatchObject({
        embed: {
          location: { type: 'Local', prefix: 'Absolute', path: ['etc', 'app', 'cfg.dhall'] },
        },
      });
    });

    it('unquotes quoted path segments', () => {
      expect(parsePlain('./"my file.dhall"')).toMatchObject({
        embed: { location: { type: 'Local', prefix: 'Here', path: ['my file.dhall'] } },
      });
    });
  });

  describe('other locations', () => {
    it('parses missing', () => {
      expect(parsePlain('missing')).toMatchObject({
        embed: { mode: 'Code', location: { type: 'Missing' } },
      });
    });

    it('parses environment variables', () => {
      expect(parsePlain('env:HOME')).toMatchObject({
        embed: { location: { type: 'Env', name: 'HOME' } },
      });
      expect(parsePlain('env:"MY VAR"')).toMatchObject({
        embed: { location: { type: 'Env', name: 'MY VAR' } },
      });
    });

    it('parses remote URLs', () => {
      expect(parsePlain('https://example.com/pkg/a.dhall')).toMatchObject({
        embed: { location: { type: 'Remote', url: 'https://example.com/pkg/a.dhall' } },
      });
    });
  });

  describe('modes and hashes', () => {
    it('parses as Text', () => {
      expect(parsePlain('./notes.txt as Text')).toMatchObject({
        embed: { mode: 'RawText' },
      });
    });

    it('parses a hash in lowercase', () => {
      expect(parsePlain(`./a.dhall sha256:${DIGEST.toUpperCase()}`)).toMatchObject({
        embed: { mode: 'Code', hash: { algorithm: 'sha256', digest: DIGEST } },
      });
    });

    it('renders a parsed import back to its surface form', () => {
      const { expr } = parseExpr(`../a.dhall sha256:${DIGEST} as Text`);
      expect(expr.type === 'Embed' && renderImport(expr.embed)).toBe(
        `../a.dhall sha256:${DIGEST} as Text`
      );
    });

    it('rejects a truncated hash', () => {
      const error = catchError(() => parseExpr('./a.dhall sha256:abc'), ParseError);
      expect(error.errorId).toBe('DHALL-P003');
      expect(error.message).toBe('Invalid integrity hash: sha256:abc at 1:11');
    });
  });

  it('parses imports as operands', () => {
    expect(parsePlain('./a ? ./b')).toMatchObject({
      type: 'BinOp',
      op: 'ImportAlt',
      left: { type: 'Embed' },
      right: { type: 'Embed' },
    });
    expect(parsePlain('f ./a')).toMatchObject({
      type: 'App',
      fn: { type: 'Var' },
      arg: { type: 'Embed' },
    });
  });
});
