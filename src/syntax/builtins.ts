/**
 * Builtins and Binary Operators
 * Closed, context-free leaf tables.
 */

// ============================================================
// BUILTINS
// ============================================================

export const BUILTINS = [
  'Bool',
  'Natural',
  'Integer',
  'Double',
  'Text',
  'List',
  'Optional',
  'None',
  'Natural/build',
  'Natural/fold',
  'Natural/isZero',
  'Natural/even',
  'Natural/odd',
  'Natural/toInteger',
  'Natural/show',
  'Natural/subtract',
  'Integer/toDouble',
  'Integer/show',
  'Integer/negate',
  'Integer/clamp',
  'Double/show',
  'List/build',
  'List/fold',
  'List/length',
  'List/head',
  'List/last',
  'List/indexed',
  'List/reverse',
  'Optional/fold',
  'Optional/build',
  'Text/show',
  'Text/replace',
] as const;

export type Builtin = (typeof BUILTINS)[number];

const BUILTIN_SET: ReadonlySet<string> = new Set(BUILTINS);

export function isBuiltin(name: string): name is Builtin {
  return BUILTIN_SET.has(name);
}

// ============================================================
// BINARY OPERATORS
// ============================================================

/**
 * Binary operators, lowest precedence first.
 * Every operator is left-associative.
 */
export const BINOPS = [
  'Equivalence',
  'ImportAlt',
  'BoolOr',
  'NaturalPlus',
  'TextAppend',
  'ListAppend',
  'BoolAnd',
  'RecursiveRecordMerge',
  'RightBiasedRecordMerge',
  'RecursiveRecordTypeMerge',
  'NaturalTimes',
  'BoolEQ',
  'BoolNE',
] as const;

export type BinOp = (typeof BINOPS)[number];

/** Surface spelling; the ASCII form where the language has two */
export const BINOP_SYMBOLS: Readonly<Record<BinOp, string>> = {
  ImportAlt: '?',
  BoolOr: '||',
  NaturalPlus: '+',
  TextAppend: '++',
  ListAppend: '#',
  BoolAnd: '&&',
  RecursiveRecordMerge: '/\\',
  RightBiasedRecordMerge: '//',
  RecursiveRecordTypeMerge: '//\\\\',
  NaturalTimes: '*',
  BoolEQ: '==',
  BoolNE: '!=',
  Equivalence: '===',
};

/** Position in the precedence order; higher binds tighter */
export function precedenceOf(op: BinOp): number {
  return BINOPS.indexOf(op);
}
