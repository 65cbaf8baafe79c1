/**
 * Rule Table
 * One entry per visible grammar rule: the group of value it produces and
 * the child patterns it accepts.
 */

import type { ParseTreeNode } from '../grammar/index.js';
import { ParseError } from '../error-classes.js';
import { joinSpans } from '../source-location.js';
import { isBuiltin, type BinOp } from '../syntax/builtins.js';
import { v, type Label } from '../syntax/expr.js';
import type {
  FilePrefix,
  Import,
  ImportLocation,
  ImportMode,
} from '../syntax/import.js';
import { SubExpr, type Expr } from '../syntax/sub-expr.js';
import { fromChunks, type TextChunk } from '../syntax/text.js';
import {
  rule,
  when,
  type LetBinding,
  type ParsedExpr,
  type RecordField,
  type RuleDefinition,
  type Selector,
} from './values.js';

// ============================================================
// HELPERS
// ============================================================

function node(tree: ParseTreeNode, expr: Expr<Import>): ParsedExpr {
  return new SubExpr(expr, tree.span);
}

function literalError(kind: string, tree: ParseTreeNode): ParseError {
  return new ParseError(
    'DHALL-P002',
    { kind, text: tree.text.trim() },
    tree.span.start
  );
}

/** Left fold `a op b op c` into `(a op b) op c` */
function binop(op: BinOp): RuleDefinition {
  return rule(
    'expression',
    when(['expression', 'expression..'], ([first, rest]) =>
      rest.reduce(
        (left, right) =>
          new SubExpr<Import>(
            { type: 'BinOp', op, left, right },
            joinSpans(left.span, right.span)
          ),
        first
      )
    )
  );
}

function passThrough(): RuleDefinition {
  return rule(
    'expression',
    when(['expression'], ([expr]) => expr)
  );
}

// ============================================================
// LITERALS
// ============================================================

function naturalValue(text: string, tree: ParseTreeNode): number {
  const value = text.startsWith('0x')
    ? Number.parseInt(text.slice(2), 16)
    : Number(text);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw literalError('Natural', tree);
  }
  return value;
}

function integerValue(tree: ParseTreeNode): number {
  const text = tree.text.trim();
  const magnitude = naturalValue(text.slice(1), tree);
  if (text.startsWith('-')) {
    return magnitude === 0 ? 0 : -magnitude;
  }
  return magnitude;
}

function doubleValue(tree: ParseTreeNode): number {
  const text = tree.text.trim();
  switch (text) {
    case 'NaN':
      return Number.NaN;
    case 'Infinity':
      return Number.POSITIVE_INFINITY;
    case '-Infinity':
      return Number.NEGATIVE_INFINITY;
  }
  const value = Number(text);
  if (!Number.isFinite(value)) {
    throw literalError('Double', tree);
  }
  return value;
}

const SIMPLE_ESCAPES: Record<string, string> = {
  '"': '"',
  $: '$',
  '\\': '\\',
  '/': '/',
  b: '\b',
  f: '\f',
  n: '\n',
  r: '\r',
  t: '\t',
};

function decodeEscape(tree: ParseTreeNode): string {
  const code = tree.text.slice(1);
  const simple = SIMPLE_ESCAPES[code];
  if (simple !== undefined) return simple;

  const hex = code.startsWith('u{') ? code.slice(2, -1) : code.slice(1);
  const point = Number.parseInt(hex, 16);
  if (!(point <= 0x10ffff) || (point >= 0xd800 && point <= 0xdfff)) {
    throw literalError('unicode escape', tree);
  }
  return String.fromCodePoint(point);
}

function textChunk(text: string): TextChunk<ParsedExpr> {
  return { type: 'text', text };
}

// ============================================================
// IDENTIFIERS
// ============================================================

/** Builtins first, then the reserved constants, then variables */
function identifier(tree: ParseTreeNode, name: Label, index: number): ParsedExpr {
  if (isBuiltin(name)) {
    return node(tree, { type: 'Builtin', builtin: name });
  }
  switch (name) {
    case 'True':
      return node(tree, { type: 'BoolLit', value: true });
    case 'False':
      return node(tree, { type: 'BoolLit', value: false });
    case 'Type':
    case 'Kind':
    case 'Sort':
      return node(tree, { type: 'Const', value: name });
  }
  return node(tree, { type: 'Var', variable: v(name, index) });
}

// ============================================================
// COMPOUND FORMS
// ============================================================

function letChain(bindings: LetBinding[], body: ParsedExpr): ParsedExpr {
  return bindings.reduceRight(
    (inner, binding) =>
      new SubExpr<Import>(
        {
          type: 'Let',
          label: binding.label,
          annotation: binding.annotation,
          value: binding.value,
          body: inner,
        },
        joinSpans(binding.span, inner.span)
      ),
    body
  );
}

function select(record: ParsedExpr, selector: Selector): ParsedExpr {
  const span = joinSpans(record.span, selector.span);
  if (selector.type === 'field') {
    return new SubExpr({ type: 'Field', record, label: selector.label }, span);
  }
  return new SubExpr(
    { type: 'Projection', record, labels: selector.labels },
    span
  );
}

/** `a.b.c = v` becomes `a = { b = { c = v } }` */
function nestField(field: RecordField): readonly [Label, ParsedExpr] {
  const value = field.path.reduceRight(
    (inner, label) =>
      new SubExpr<Import>(
        { type: 'RecordLit', fields: [[label, inner]] },
        inner.span
      ),
    field.value
  );
  return [field.label, value];
}

function localPath(prefix: FilePrefix): RuleDefinition {
  return rule(
    'location',
    when(['pathComponent..'], ([path]): ImportLocation => ({
      type: 'Local',
      prefix,
      path,
    }))
  );
}

function importLeaf(
  tree: ParseTreeNode,
  location: ImportLocation,
  hash: Import['hash'],
  mode: ImportMode
): ParsedExpr {
  return node(tree, { type: 'Embed', embed: { mode, location, hash } });
}

// ============================================================
// TABLE
// ============================================================

const RULE_TABLE = {
  completeExpression: passThrough(),
  expression: passThrough(),

  label: rule(
    'label',
    when([], (_, tree) =>
      tree.text.startsWith('`') ? tree.text.slice(1, -1) : tree.text
    )
  ),

  identifier: rule(
    'expression',
    when(['label'], ([name], tree) => identifier(tree, name, 0)),
    when(['label', 'natural'], ([name, index], tree) =>
      identifier(tree, name, index)
    )
  ),

  deBruijnIndex: rule(
    'natural',
    when([], (_, tree) => naturalValue(tree.text.trim(), tree))
  ),

  lambdaExpression: rule(
    'expression',
    when(['label', 'expression', 'expression'], ([label, annotation, body], tree) =>
      node(tree, { type: 'Lam', label, annotation, body })
    )
  ),

  forallExpression: rule(
    'expression',
    when(['label', 'expression', 'expression'], ([label, annotation, body], tree) =>
      node(tree, { type: 'Pi', label, annotation, body })
    )
  ),

  arrowExpression: rule(
    'expression',
    when(['expression', 'expression'], ([annotation, body], tree) =>
      node(tree, { type: 'Pi', label: '_', annotation, body })
    )
  ),

  ifExpression: rule(
    'expression',
    when(['expression', 'expression', 'expression'], ([condition, ifTrue, ifFalse], tree) =>
      node(tree, { type: 'BoolIf', condition, ifTrue, ifFalse })
    )
  ),

  letBinding: rule(
    'letBinding',
    when(['label', 'expression'], ([label, value], tree) => ({
      label,
      annotation: undefined,
      value,
      span: tree.span,
    })),
    when(['label', 'expression', 'expression'], ([label, annotation, value], tree) => ({
      label,
      annotation,
      value,
      span: tree.span,
    }))
  ),

  letExpression: rule(
    'expression',
    when(['letBinding..', 'expression'], ([bindings, body]) =>
      letChain(bindings, body)
    )
  ),

  annotatedMergeExpression: rule(
    'expression',
    when(['expression', 'expression', 'expression'], ([handlers, union, annotation], tree) =>
      node(tree, { type: 'Merge', handlers, union, annotation })
    )
  ),

  mergeExpression: rule(
    'expression',
    when(['expression', 'expression'], ([handlers, union], tree) =>
      node(tree, { type: 'Merge', handlers, union, annotation: undefined })
    )
  ),

  emptyListLiteral: rule(
    'expression',
    when(['expression'], ([annotation], tree) =>
      node(tree, { type: 'EmptyListLit', annotation })
    )
  ),

  assertExpression: rule(
    'expression',
    when(['expression'], ([annotation], tree) =>
      node(tree, { type: 'Assert', annotation })
    )
  ),

  annotatedExpression: rule(
    'expression',
    when(['expression'], ([expr]) => expr),
    when(['expression', 'expression'], ([expr, annotation], tree) =>
      node(tree, { type: 'Annot', expr, annotation })
    )
  ),

  equivalentExpression: binop('Equivalence'),
  importAltExpression: binop('ImportAlt'),
  orExpression: binop('BoolOr'),
  plusExpression: binop('NaturalPlus'),
  textAppendExpression: binop('TextAppend'),
  listAppendExpression: binop('ListAppend'),
  andExpression: binop('BoolAnd'),
  combineExpression: binop('RecursiveRecordMerge'),
  preferExpression: binop('RightBiasedRecordMerge'),
  combineTypesExpression: binop('RecursiveRecordTypeMerge'),
  timesExpression: binop('NaturalTimes'),
  equalExpression: binop('BoolEQ'),
  notEqualExpression: binop('BoolNE'),

  applicationExpression: rule(
    'expression',
    when(['expression', 'expression..'], ([first, rest]) =>
      rest.reduce(
        (fn, arg) =>
          new SubExpr<Import>({ type: 'App', fn, arg }, joinSpans(fn.span, arg.span)),
        first
      )
    )
  ),

  someExpression: rule(
    'expression',
    when(['expression'], ([value], tree) => node(tree, { type: 'SomeLit', value }))
  ),

  selectorExpression: rule(
    'expression',
    when(['expression', 'selector..'], ([record, selectors]) =>
      selectors.reduce(select, record)
    )
  ),

  selector: rule(
    'selector',
    when(['label'], ([label], tree): Selector => ({
      type: 'field',
      label,
      span: tree.span,
    })),
    when(['labels'], ([labels], tree): Selector => ({
      type: 'projection',
      labels,
      span: tree.span,
    }))
  ),

  labels: rule(
    'labels',
    when(['label..'], ([labels]) => labels)
  ),

  // Numbers

  doubleLiteral: rule(
    'expression',
    when([], (_, tree) => node(tree, { type: 'DoubleLit', value: doubleValue(tree) }))
  ),

  naturalLiteral: rule(
    'expression',
    when([], (_, tree) =>
      node(tree, { type: 'NaturalLit', value: naturalValue(tree.text.trim(), tree) })
    )
  ),

  integerLiteral: rule(
    'expression',
    when([], (_, tree) => node(tree, { type: 'IntegerLit', value: integerValue(tree) }))
  ),

  // Text

  doubleQuoteLiteral: rule(
    'expression',
    when(['textChunk..'], ([chunks], tree) =>
      node(tree, { type: 'TextLit', text: fromChunks(chunks) })
    )
  ),

  singleQuoteLiteral: rule(
    'expression',
    when(['textChunk..'], ([chunks], tree) =>
      node(tree, { type: 'TextLit', text: fromChunks(chunks) })
    )
  ),

  doubleQuoteRun: rule(
    'textChunk',
    when([], (_, tree) => textChunk(tree.text))
  ),

  doubleQuoteEscape: rule(
    'textChunk',
    when([], (_, tree) => textChunk(decodeEscape(tree)))
  ),

  singleQuoteRun: rule(
    'textChunk',
    when([], (_, tree) => textChunk(tree.text.replace(/\r\n/g, '\n')))
  ),

  escapedInterpolation: rule(
    'textChunk',
    when([], () => textChunk('${'))
  ),

  escapedQuotePair: rule(
    'textChunk',
    when([], () => textChunk("''"))
  ),

  interpolation: rule(
    'textChunk',
    when(['expression'], ([expr]): TextChunk<ParsedExpr> => ({
      type: 'interpolation',
      expr,
    }))
  ),

  // Records, unions, lists

  emptyRecordLiteral: rule(
    'expression',
    when([], (_, tree) => node(tree, { type: 'RecordLit', fields: [] }))
  ),

  emptyRecordType: rule(
    'expression',
    when([], (_, tree) => node(tree, { type: 'RecordType', fields: [] }))
  ),

  nonEmptyRecordType: rule(
    'expression',
    when(['typeField..'], ([fields], tree) =>
      node(tree, { type: 'RecordType', fields })
    )
  ),

  recordTypeField: rule(
    'typeField',
    when(['label', 'expression'], ([label, type]) => [label, type] as const)
  ),

  nonEmptyRecordLiteral: rule(
    'expression',
    when(['recordField..'], ([fields], tree) =>
      node(tree, { type: 'RecordLit', fields: fields.map(nestField) })
    )
  ),

  recordLiteralField: rule(
    'recordField',
    when(['label', 'label..', 'expression'], ([label, path, value]) => ({
      label,
      path,
      value,
    }))
  ),

  // `{ x }` is `{ x = x }`
  recordPun: rule(
    'recordField',
    when(['label'], ([label], tree) => ({
      label,
      path: [],
      value: node(tree, { type: 'Var', variable: v(label) }),
    }))
  ),

  emptyUnionType: rule(
    'expression',
    when([], (_, tree) => node(tree, { type: 'UnionType', alternatives: [] }))
  ),

  nonEmptyUnionType: rule(
    'expression',
    when(['alternative..'], ([alternatives], tree) =>
      node(tree, { type: 'UnionType', alternatives })
    )
  ),

  unionTypeEntry: rule(
    'alternative',
    when(['label'], ([label]) => [label, undefined] as const),
    when(['label', 'expression'], ([label, type]) => [label, type] as const)
  ),

  unionLiteral: rule(
    'expression',
    when(
      ['alternative..', 'unionLiteralEntry', 'alternative..'],
      ([before, [label, value], after], tree) =>
        node(tree, {
          type: 'UnionLit',
          label,
          value,
          alternatives: [...before, ...after],
        })
    )
  ),

  unionLiteralEntry: rule(
    'unionLiteralEntry',
    when(['label', 'expression'], ([label, value]) => [label, value] as const)
  ),

  nonEmptyListLiteral: rule(
    'expression',
    when(['expression', 'expression..'], ([first, rest], tree) =>
      node(tree, { type: 'NEListLit', items: [first, ...rest] })
    )
  ),

  // Imports

  importLiteral: rule(
    'expression',
    when(['location'], ([location], tree) =>
      importLeaf(tree, location, undefined, 'Code')
    ),
    when(['location', 'importHash'], ([location, hash], tree) =>
      importLeaf(tree, location, hash, 'Code')
    ),
    when(['location', 'importMode'], ([location, mode], tree) =>
      importLeaf(tree, location, undefined, mode)
    ),
    when(['location', 'importHash', 'importMode'], ([location, hash, mode], tree) =>
      importLeaf(tree, location, hash, mode)
    )
  ),

  importHash: rule(
    'importHash',
    when([], (_, tree) => {
      const digest = tree.text.slice('sha256:'.length).toLowerCase();
      if (!/^[0-9a-f]{64}$/.test(digest)) {
        throw new ParseError('DHALL-P003', { hash: tree.text }, tree.span.start);
      }
      return { algorithm: 'sha256' as const, digest };
    })
  ),

  asText: rule(
    'importMode',
    when([], (): ImportMode => 'RawText')
  ),

  missingImport: rule(
    'location',
    when([], (): ImportLocation => ({ type: 'Missing' }))
  ),

  parentPath: localPath('Parent'),
  herePath: localPath('Here'),
  homePath: localPath('Home'),
  absolutePath: localPath('Absolute'),

  pathComponent: rule(
    'pathComponent',
    when([], (_, tree) => {
      const segment = tree.text.slice(1);
      return segment.startsWith('"') ? segment.slice(1, -1) : segment;
    })
  ),

  remoteImport: rule(
    'location',
    when([], (_, tree): ImportLocation => ({ type: 'Remote', url: tree.text }))
  ),

  envImport: rule(
    'location',
    when([], (_, tree): ImportLocation => {
      const name = tree.text.slice('env:'.length);
      return {
        type: 'Env',
        name: name.startsWith('"') ? name.slice(1, -1) : name,
      };
    })
  ),
} satisfies Record<string, RuleDefinition>;

/** Rule name → definition; a rule is visible exactly when it is listed */
export const RULES: ReadonlyMap<string, RuleDefinition> = new Map(
  Object.entries(RULE_TABLE)
);

/**
 * Precedence-chain rules. With a single child they add nothing, so the
 * evaluator goes straight to the child.
 */
export const SHORTCUT_RULES: ReadonlySet<string> = new Set([
  'completeExpression',
  'expression',
  'annotatedExpression',
  'equivalentExpression',
  'importAltExpression',
  'orExpression',
  'plusExpression',
  'textAppendExpression',
  'listAppendExpression',
  'andExpression',
  'combineExpression',
  'preferExpression',
  'combineTypesExpression',
  'timesExpression',
  'equalExpression',
  'notEqualExpression',
  'applicationExpression',
  'selectorExpression',
]);
