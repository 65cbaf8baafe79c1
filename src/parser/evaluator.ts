/**
 * Parse Tree Evaluator
 * Builds values bottom-up with an explicit work list, so nesting depth is
 * bounded by memory rather than the call stack.
 */

import { DispatchError } from '../error-classes.js';
import type { ParseTreeNode } from '../grammar/index.js';
import { dumpTree } from './debug.js';
import { RULES, SHORTCUT_RULES } from './rules.js';
import type { ParsedValue, RuleDefinition } from './values.js';

// ============================================================
// TYPES
// ============================================================

export interface RuleTable {
  readonly rules: ReadonlyMap<string, RuleDefinition>;
  /** Rules skipped when they have exactly one child */
  readonly shortcuts: ReadonlySet<string>;
}

export const DEFAULT_RULE_TABLE: RuleTable = {
  rules: RULES,
  shortcuts: SHORTCUT_RULES,
};

type Frame =
  | { readonly state: 'unprocessed'; readonly node: ParseTreeNode }
  | { readonly state: 'processed'; readonly node: ParseTreeNode };

// ============================================================
// DISPATCH
// ============================================================

function dispatch(
  node: ParseTreeNode,
  children: readonly ParsedValue[],
  table: RuleTable
): ParsedValue {
  const definition = table.rules.get(node.rule);
  if (definition) {
    for (const build of definition.cases) {
      const result = build(children, node);
      if (result) {
        return { rule: node.rule, group: definition.group, value: result.value };
      }
    }
  }

  throw new DispatchError(
    'DHALL-X001',
    {
      rule: node.rule,
      children: children.map((child) => child.group).join(', '),
      dump: dumpTree(node),
    },
    node.span.start
  );
}

// ============================================================
// EVALUATION
// ============================================================

/**
 * Evaluate `tree` to a single value.
 *
 * An unprocessed frame schedules its children and then itself as
 * processed; a processed frame pops one value per child off the value
 * stack and pushes the value its rule builds.
 *
 * @throws {DispatchError} DHALL-X001 when no case of a rule matches its children
 * @throws {DispatchError} DHALL-X002 when evaluation does not end with one value
 */
export function evaluateTree(
  tree: ParseTreeNode,
  table: RuleTable = DEFAULT_RULE_TABLE
): ParsedValue {
  const work: Frame[] = [{ state: 'unprocessed', node: tree }];
  const values: ParsedValue[] = [];

  for (let frame = work.pop(); frame; frame = work.pop()) {
    const { node } = frame;

    if (frame.state === 'processed') {
      const children = values.splice(values.length - node.children.length);
      values.push(dispatch(node, children, table));
      continue;
    }

    const [only] = node.children;
    if (only && node.children.length === 1 && table.shortcuts.has(node.rule)) {
      work.push({ state: 'unprocessed', node: only });
      continue;
    }

    work.push({ state: 'processed', node });
    for (let i = node.children.length - 1; i >= 0; i--) {
      const child = node.children[i];
      if (child) work.push({ state: 'unprocessed', node: child });
    }
  }

  const [result] = values;
  if (!result || values.length !== 1) {
    throw new DispatchError('DHALL-X002', {
      reason: `${values.length} values instead of one`,
    });
  }
  return result;
}
