/**
 * Expression Parser
 * Source text → concrete parse tree → AST with unresolved import leaves.
 */

import { DispatchError } from '../error-classes.js';
import { parseConcrete, type ParseTreeNode } from '../grammar/index.js';
import { DEFAULT_RULE_TABLE, evaluateTree, type RuleTable } from './evaluator.js';
import { RULES } from './rules.js';
import { when, type ParsedExpr } from './values.js';

export { dumpTree } from './debug.js';
export {
  DEFAULT_RULE_TABLE,
  evaluateTree,
  type RuleTable,
} from './evaluator.js';
export { RULES, SHORTCUT_RULES } from './rules.js';
export type {
  GroupName,
  ParsedExpr,
  ParsedGroups,
  ParsedValue,
  PatternItem,
  RuleDefinition,
} from './values.js';

const rootExpression = when(['expression'], ([expr]) => expr);

/** A rule becomes a parse tree node exactly when the table has a builder for it */
export function isVisibleRule(rule: string): boolean {
  return RULES.has(rule);
}

/**
 * Build the AST for a parse tree.
 *
 * @throws {DispatchError} When the tree does not evaluate to one expression
 */
export function buildExpr(
  tree: ParseTreeNode,
  table: RuleTable = DEFAULT_RULE_TABLE
): ParsedExpr {
  const value = evaluateTree(tree, table);
  const result = rootExpression([value], tree);
  if (!result) {
    throw new DispatchError('DHALL-X002', {
      reason: `a ${value.group} value instead of an expression`,
    });
  }
  return result.value;
}

/**
 * Parse a complete expression.
 *
 * @throws {ParseError} On syntax errors and malformed literals
 * @throws {DispatchError} On grammar and rule table mismatches
 *
 * @example
 * const expr = parseExpr('let x = 1 in x + 2');
 * expr.expr.type; // 'Let'
 */
export function parseExpr(source: string): ParsedExpr {
  return buildExpr(parseConcrete(source, isVisibleRule));
}
