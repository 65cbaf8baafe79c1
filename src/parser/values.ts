/**
 * Parsed Values and Child Patterns
 * What each rule produces, and how builders declare the children they
 * accept.
 */

import type { ParseTreeNode } from '../grammar/index.js';
import type { SourceSpan } from '../source-location.js';
import type { Label } from '../syntax/expr.js';
import type {
  Import,
  ImportHash,
  ImportLocation,
  ImportMode,
} from '../syntax/import.js';
import type { SubExpr } from '../syntax/sub-expr.js';
import type { TextChunk } from '../syntax/text.js';

// ============================================================
// VALUE GROUPS
// ============================================================

export type ParsedExpr = SubExpr<Import>;

export interface LetBinding {
  readonly label: Label;
  readonly annotation: ParsedExpr | undefined;
  readonly value: ParsedExpr;
  readonly span: SourceSpan;
}

/** `a.b.c = v` is `{ label: 'a', path: ['b', 'c'], value: v }` */
export interface RecordField {
  readonly label: Label;
  readonly path: readonly Label[];
  readonly value: ParsedExpr;
}

export type Selector =
  | { readonly type: 'field'; readonly label: Label; readonly span: SourceSpan }
  | {
      readonly type: 'projection';
      readonly labels: readonly Label[];
      readonly span: SourceSpan;
    };

/** Value type produced by each group of rules */
export interface ParsedGroups {
  expression: ParsedExpr;
  label: Label;
  natural: number;
  textChunk: TextChunk<ParsedExpr>;
  letBinding: LetBinding;
  typeField: readonly [Label, ParsedExpr];
  recordField: RecordField;
  alternative: readonly [Label, ParsedExpr | undefined];
  unionLiteralEntry: readonly [Label, ParsedExpr];
  selector: Selector;
  labels: readonly Label[];
  location: ImportLocation;
  pathComponent: string;
  importHash: ImportHash;
  importMode: ImportMode;
}

export type GroupName = keyof ParsedGroups;

/** A built child, tagged with the rule and group that made it */
export interface ParsedValue {
  readonly rule: string;
  readonly group: GroupName;
  readonly value: unknown;
}

// ============================================================
// PATTERNS
// ============================================================

/** A group name, or `group..` for a run of zero or more of that group */
export type PatternItem = GroupName | `${GroupName}..`;

type ItemValue<P> = P extends `${infer G}..`
  ? G extends GroupName
    ? ParsedGroups[G][]
    : never
  : P extends GroupName
    ? ParsedGroups[P]
    : never;

export type PatternValues<P extends readonly PatternItem[]> = {
  -readonly [K in keyof P]: ItemValue<P[K]>;
};

export type RuleCase<T> = (
  children: readonly ParsedValue[],
  node: ParseTreeNode
) => { readonly value: T } | undefined;

export interface RuleDefinition {
  readonly group: GroupName;
  readonly cases: readonly RuleCase<unknown>[];
}

function runGroup(item: PatternItem): string | undefined {
  return item.endsWith('..') ? item.slice(0, -2) : undefined;
}

/**
 * Values of `children` laid out as `pattern` describes, or undefined when
 * the groups do not line up.
 */
function matchPattern(
  pattern: readonly PatternItem[],
  children: readonly ParsedValue[]
): unknown[] | undefined {
  const values: unknown[] = [];
  let index = 0;

  for (const item of pattern) {
    const group = runGroup(item);
    if (group !== undefined) {
      const run: unknown[] = [];
      for (let child = children[index]; child?.group === group; child = children[++index]) {
        run.push(child.value);
      }
      values.push(run);
      continue;
    }

    const child = children[index];
    if (child?.group !== item) return undefined;
    values.push(child.value);
    index++;
  }

  return index === children.length ? values : undefined;
}

/** Case that applies `build` when the children match `pattern` */
export function when<const P extends readonly PatternItem[], T>(
  pattern: P,
  build: (values: PatternValues<P>, node: ParseTreeNode) => T
): RuleCase<T> {
  return (children, node) => {
    const matched: unknown = matchPattern(pattern, children);
    if (matched === undefined) return undefined;
    // Every position was checked against its group by matchPattern
    return { value: build(matched as PatternValues<P>, node) };
  };
}

/** Rule producing `group` values; cases are tried in order */
export function rule<G extends GroupName>(
  group: G,
  ...cases: RuleCase<ParsedGroups[G]>[]
): RuleDefinition {
  return { group, cases };
}
