/**
 * Dhall Syntax Tests: Generic Traversal
 * Tests for mapExprF and node-level mapSubexprs
 */

import { describe, expect, it } from 'vitest';

import {
  mapExprF,
  parseExpr,
  type ExprF,
  type ExprFVisitor,
  type Import,
} from '../../src/index.js';

/** Visitor over string children that records each call */
function recordingVisitor(calls: string[]): ExprFVisitor<string, number, string, number> {
  return {
    subexpr: (child) => {
      calls.push(`sub:${child}`);
      return child.toUpperCase();
    },
    underBinder: (label, child) => {
      calls.push(`bind:${label}:${child}`);
      return child.toUpperCase();
    },
    embed: (embed) => {
      calls.push(`embed:${embed}`);
      return embed * 10;
    },
  };
}

describe('Dhall Syntax: Traversal', () => {
  describe('mapExprF', () => {
    it('visits children left to right', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'BoolIf',
        condition: 'c',
        ifTrue: 't',
        ifFalse: 'f',
      };
      expect(mapExprF(expr, recordingVisitor(calls))).toEqual({
        type: 'BoolIf',
        condition: 'C',
        ifTrue: 'T',
        ifFalse: 'F',
      });
      expect(calls).toEqual(['sub:c', 'sub:t', 'sub:f']);
    });

    it('visits a lambda body under its binder', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'Lam',
        label: 'x',
        annotation: 'a',
        body: 'b',
      };
      mapExprF(expr, recordingVisitor(calls));
      expect(calls).toEqual(['sub:a', 'bind:x:b']);
    });

    it('visits a pi body under its binder', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'Pi',
        label: '_',
        annotation: 'a',
        body: 'b',
      };
      mapExprF(expr, recordingVisitor(calls));
      expect(calls).toEqual(['sub:a', 'bind:_:b']);
    });

    it('visits a let value outside and its body under the binder', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'Let',
        label: 'x',
        annotation: 't',
        value: 'v',
        body: 'b',
      };
      expect(mapExprF(expr, recordingVisitor(calls))).toEqual({
        type: 'Let',
        label: 'x',
        annotation: 'T',
        value: 'V',
        body: 'B',
      });
      expect(calls).toEqual(['sub:t', 'sub:v', 'bind:x:b']);
    });

    it('skips absent optional children', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'Merge',
        handlers: 'h',
        union: 'u',
        annotation: undefined,
      };
      const result = mapExprF(expr, recordingVisitor(calls));
      expect(result).toMatchObject({ type: 'Merge', handlers: 'H', union: 'U' });
      expect(calls).toEqual(['sub:h', 'sub:u']);
    });

    it('keeps empty union alternatives empty', () => {
      const expr: ExprF<string, number> = {
        type: 'UnionType',
        alternatives: [
          ['A', undefined],
          ['B', 't'],
        ],
      };
      const result = mapExprF(expr, recordingVisitor([]));
      expect(result.type === 'UnionType' && result.alternatives).toStrictEqual([
        ['A', undefined],
        ['B', 'T'],
      ]);
    });

    it('visits a union literal value before its other alternatives', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'UnionLit',
        label: 'A',
        value: 'v',
        alternatives: [
          ['B', 't'],
          ['C', undefined],
        ],
      };
      expect(mapExprF(expr, recordingVisitor(calls))).toStrictEqual({
        type: 'UnionLit',
        label: 'A',
        value: 'V',
        alternatives: [
          ['B', 'T'],
          ['C', undefined],
        ],
      });
      expect(calls).toEqual(['sub:v', 'sub:t']);
    });

    it('maps interpolations and keeps literal runs', () => {
      const expr: ExprF<string, number> = {
        type: 'TextLit',
        text: { head: 'a', tail: [['x', 'b']] },
      };
      expect(mapExprF(expr, recordingVisitor([]))).toEqual({
        type: 'TextLit',
        text: { head: 'a', tail: [['X', 'b']] },
      });
    });

    it('maps the embedded leaf', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = { type: 'Embed', embed: 4 };
      expect(mapExprF(expr, recordingVisitor(calls))).toEqual({
        type: 'Embed',
        embed: 40,
      });
      expect(calls).toEqual(['embed:4']);
    });

    it('returns leaves without children as they are', () => {
      const expr: ExprF<string, number> = { type: 'NaturalLit', value: 3 };
      expect(mapExprF(expr, recordingVisitor([]))).toBe(expr);
    });

    it('stops at the first child whose callback throws', () => {
      const calls: string[] = [];
      const expr: ExprF<string, number> = {
        type: 'NEListLit',
        items: ['a', 'bad', 'c'],
      };
      expect(() =>
        mapExprF(expr, {
          ...recordingVisitor(calls),
          subexpr: (child) => {
            calls.push(child);
            if (child === 'bad') throw new Error('rejected bad');
            return child;
          },
        })
      ).toThrow('rejected bad');
      expect(calls).toEqual(['a', 'bad']);
    });
  });

  describe('mapSubexprs', () => {
    it('rewraps with the original span', () => {
      const expr = parseExpr('1 + 2');
      const copy = expr.mapSubexprs<Import>({
        subexpr: (child) => child,
        underBinder: (_label, child) => child,
        embed: (_embed, node) => node,
      });
      expect(copy).not.toBe(expr);
      expect(copy.span).toBe(expr.span);
      expect(copy.equals(expr)).toBe(true);
    });

    it('hands an import node to the embed callback whole', () => {
      const expr = parseExpr('./a.dhall');
      const seen: unknown[] = [];
      const result = expr.mapSubexprs<Import>({
        subexpr: (child) => child,
        underBinder: (_label, child) => child,
        embed: (_embed, node) => {
          seen.push(node);
          return node;
        },
      });
      expect(seen).toEqual([expr]);
      expect(result).toBe(expr);
    });
  });
});
