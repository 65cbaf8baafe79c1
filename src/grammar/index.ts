/**
 * Concrete Parse Trees
 * Runs the grammar and converts Ohm's match into a tree that keeps only
 * the rules the caller asks for.
 */

import { readFileSync } from 'node:fs';
import * as ohm from 'ohm-js';
import { ParseError } from '../error-classes.js';
import type { SourceLocation, SourceSpan } from '../source-location.js';

// ============================================================
// TYPES
// ============================================================

/** One visible rule application */
export interface ParseTreeNode {
  readonly rule: string;
  /** Exact source text the rule matched */
  readonly text: string;
  readonly span: SourceSpan;
  readonly children: readonly ParseTreeNode[];
}

export type RuleVisibility = (rule: string) => boolean;

// ============================================================
// GRAMMAR
// ============================================================

let cached: { grammar: ohm.Grammar; semantics: ohm.Semantics } | undefined;

function loadGrammar(): { grammar: ohm.Grammar; semantics: ohm.Semantics } {
  if (cached) return cached;
  const source = readFileSync(new URL('./dhall.ohm', import.meta.url), 'utf-8');
  const grammar = ohm.grammar(source);
  const semantics = grammar.createSemantics();
  // Exposes the raw node wrappers; the tree is walked without recursion below
  semantics.addOperation<ohm.Node>('node', {
    _nonterminal(..._children) {
      return this;
    },
    _terminal() {
      return this;
    },
    _iter(..._children) {
      return this;
    },
  });
  cached = { grammar, semantics };
  return cached;
}

/** Rule names the grammar defines, built-in rules excluded */
export function grammarRules(): string[] {
  const { grammar } = loadGrammar();
  return Object.keys(grammar.rules).filter(
    (name) => !(name in grammar.superGrammar.rules)
  );
}

// ============================================================
// POSITIONS
// ============================================================

/** Offsets of every line start, for offset → line/column lookups */
function lineStarts(source: string): number[] {
  const starts = [0];
  for (let i = 0; i < source.length; i++) {
    if (source.charCodeAt(i) === 10) starts.push(i + 1);
  }
  return starts;
}

function locationAt(starts: readonly number[], offset: number): SourceLocation {
  let low = 0;
  let high = starts.length - 1;
  while (low < high) {
    const mid = (low + high + 1) >> 1;
    if ((starts[mid] ?? 0) <= offset) {
      low = mid;
    } else {
      high = mid - 1;
    }
  }
  return { line: low + 1, column: offset - (starts[low] ?? 0) + 1, offset };
}

const FAILURE_PATTERN = /^Line (\d+), col (\d+): expected (.*)$/s;

function failureError(
  match: ohm.FailedMatchResult,
  starts: readonly number[],
  source: string
): ParseError {
  const message = match.shortMessage ?? '';
  const parts = FAILURE_PATTERN.exec(message);
  if (!parts) {
    return new ParseError(
      'DHALL-P001',
      { expected: message || 'a complete expression' },
      locationAt(starts, source.length)
    );
  }
  const line = Number(parts[1]);
  const column = Number(parts[2]);
  const offset = Math.min((starts[line - 1] ?? 0) + column - 1, source.length);
  return new ParseError(
    'DHALL-P001',
    { expected: parts[3] },
    { line, column, offset }
  );
}

// ============================================================
// PARSING
// ============================================================

/**
 * Match `source` against `startRule` and return the tree of visible rule
 * applications. Invisible rules and iteration nodes are flattened into
 * their parent; literal terminals are dropped.
 *
 * @throws {ParseError} DHALL-P001 when the grammar rejects the input
 */
export function parseConcrete(
  source: string,
  isVisible: RuleVisibility,
  startRule = 'completeExpression'
): ParseTreeNode {
  const { grammar, semantics } = loadGrammar();
  const starts = lineStarts(source);
  const match = grammar.match(source, startRule);
  if (match.failed()) {
    throw failureError(match, starts, source);
  }

  const spanOf = (node: ohm.Node): SourceSpan => ({
    start: locationAt(starts, node.source.startIdx),
    end: locationAt(starts, node.source.endIdx),
  });

  const root: ohm.Node = semantics(match).node();
  const top: ParseTreeNode[] = [];
  const stack: { node: ohm.Node; into: ParseTreeNode[] }[] = [
    { node: root, into: top },
  ];

  for (let frame = stack.pop(); frame; frame = stack.pop()) {
    const { node, into } = frame;
    if (node.isTerminal()) continue;

    let target = into;
    if (!node.isIteration() && isVisible(node.ctorName)) {
      const built: ParseTreeNode[] = [];
      into.push({
        rule: node.ctorName,
        text: node.sourceString,
        span: spanOf(node),
        children: built,
      });
      target = built;
    }

    // Ohm builds the `children` array on every access
    const children = node.children;
    for (let i = children.length - 1; i >= 0; i--) {
      const child = children[i];
      if (child) stack.push({ node: child, into: target });
    }
  }

  const [tree] = top;
  if (!tree || top.length !== 1) {
    throw new ParseError(
      'DHALL-P001',
      { expected: `a single ${startRule}` },
      locationAt(starts, 0)
    );
  }
  return tree;
}
