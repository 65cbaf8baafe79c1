/**
 * Dhall Grammar Tests: Concrete Parse Trees
 * Tests for rule visibility, spans and the rule inventory
 */

import { describe, expect, it } from 'vitest';

import {
  grammarRules,
  isVisibleRule,
  ParseError,
  parseConcrete,
  RULES,
} from '../../src/index.js';
import { catchError } from '../helpers/syntax.js';

describe('Dhall Grammar: Concrete Trees', () => {
  it('keeps only visible rules', () => {
    const tree = parseConcrete(
      '1 + 2',
      (rule) => rule === 'plusExpression' || rule === 'naturalLiteral'
    );
    expect(tree.rule).toBe('plusExpression');
    expect(tree.text).toBe('1 + 2');
    expect(tree.children.map((child) => [child.rule, child.text])).toEqual([
      ['naturalLiteral', '1'],
      ['naturalLiteral', '2'],
    ]);
  });

  it('records spans for every node', () => {
    const tree = parseConcrete(
      '1 +\n  22',
      (rule) => rule === 'plusExpression' || rule === 'naturalLiteral'
    );
    expect(tree.children[1]?.span).toEqual({
      start: { line: 2, column: 3, offset: 6 },
      end: { line: 2, column: 5, offset: 8 },
    });
  });

  it('keeps every element of a long list in order', () => {
    const items = Array.from({ length: 3000 }, (_, i) => String(i));
    const tree = parseConcrete(
      `[${items.join(', ')}]`,
      (rule) => rule === 'nonEmptyListLiteral' || rule === 'naturalLiteral'
    );
    expect(tree.rule).toBe('nonEmptyListLiteral');
    expect(tree.children.map((child) => child.text)).toEqual(items);
  });

  it('drops comments and whitespace', () => {
    const tree = parseConcrete('{- note -} x -- done', isVisibleRule);
    expect(tree.rule).toBe('completeExpression');
    expect(tree.text).toBe('{- note -} x -- done');
    const [expression] = tree.children;
    expect(expression?.rule).toBe('expression');
    expect(expression?.text).toBe('x');
  });

  it('starts from another rule on request', () => {
    const tree = parseConcrete('r.x', isVisibleRule, 'selectorExpression');
    expect(tree.rule).toBe('selectorExpression');
    expect(tree.children.map((child) => child.rule)).toEqual(['identifier', 'selector']);
  });

  it('rejects a tree with no visible root', () => {
    const error = catchError(() => parseConcrete('1', () => false), ParseError);
    expect(error.message).toBe('Syntax error: expected a single completeExpression at 1:1');
  });

  it('rejects a tree with several visible roots', () => {
    const error = catchError(
      () => parseConcrete('1 + 2', (rule) => rule === 'naturalLiteral'),
      ParseError
    );
    expect(error.errorId).toBe('DHALL-P001');
  });

  it('reports grammar failures as ParseError', () => {
    const error = catchError(() => parseConcrete('{ a = }', isVisibleRule), ParseError);
    expect(error.errorId).toBe('DHALL-P001');
    expect(error.location.line).toBe(1);
  });
});

describe('Dhall Grammar: Rule Inventory', () => {
  it('defines every rule the parser has a builder for', () => {
    const defined = new Set(grammarRules());
    const missing = [...RULES.keys()].filter((rule) => !defined.has(rule));
    expect(missing).toEqual([]);
  });

  it('leaves out the built-in rules', () => {
    const defined = grammarRules();
    expect(defined).toContain('completeExpression');
    expect(defined).not.toContain('any');
  });
});
