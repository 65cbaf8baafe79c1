/**
 * Dhall Front End
 * Exports the syntax tree, parser, import resolver, configuration and errors
 */

export * from './syntax/index.js';
export {
  buildExpr,
  DEFAULT_RULE_TABLE,
  dumpTree,
  evaluateTree,
  isVisibleRule,
  parseExpr,
  RULES,
  SHORTCUT_RULES,
  type GroupName,
  type ParsedExpr,
  type ParsedGroups,
  type ParsedValue,
  type PatternItem,
  type RuleDefinition,
  type RuleTable,
} from './parser/index.js';
export {
  grammarRules,
  parseConcrete,
  type ParseTreeNode,
  type RuleVisibility,
} from './grammar/index.js';
export * from './imports/index.js';
export {
  CONFIG_FILE_NAME,
  createDefaultConfig,
  loadConfig,
  type DhallConfig,
} from './config.js';
export {
  ConfigError,
  DhallError,
  DispatchError,
  ImportError,
  ParseError,
  ShiftError,
  type DhallErrorData,
} from './error-classes.js';
export {
  ERROR_REGISTRY,
  renderMessage,
  type ErrorCategory,
  type ErrorDefinition,
  type ErrorRegistry,
} from './error-registry.js';
export { joinSpans, type SourceLocation, type SourceSpan } from './source-location.js';
