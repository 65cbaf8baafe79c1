/**
 * Generic Traversal
 * Map over one level of an expression with separate callbacks for plain
 * child positions, child positions under a new binder, and the embedded
 * leaf. Shifting, substitution, equality and import splicing are all
 * written against this one function.
 */

import type { ExprF, FieldMap, InterpolatedText, Label } from './expr.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/**
 * One callback per structural role.
 *
 * Callbacks may throw; an exception aborts the traversal at the first
 * failing child, which makes `mapExprF` the fallible traversal as well.
 */
export interface ExprFVisitor<S, E, S2, E2> {
  /** Ordinary child position */
  subexpr(child: S): S2;
  /** Child that sees `label` as a new variable (bodies of λ, ∀ and let) */
  underBinder(label: Label, child: S): S2;
  /** The payload of an `Embed` node */
  embed(embed: E): E2;
}

// ============================================================
// ONE-LEVEL MAP
// ============================================================

/**
 * Rebuild one level of `expr` with each child replaced by the visitor's
 * result. Children are visited left to right in source order.
 */
export function mapExprF<S, E, S2, E2>(
  expr: ExprF<S, E>,
  visitor: ExprFVisitor<S, E, S2, E2>
): ExprF<S2, E2> {
  const sub = (child: S): S2 => visitor.subexpr(child);
  const subOpt = (child: S | undefined): S2 | undefined =>
    child === undefined ? undefined : visitor.subexpr(child);

  switch (expr.type) {
    case 'Const':
    case 'Var':
    case 'Builtin':
    case 'BoolLit':
    case 'NaturalLit':
    case 'IntegerLit':
    case 'DoubleLit':
      return expr;

    case 'Lam':
    case 'Pi': {
      const annotation = sub(expr.annotation);
      const body = visitor.underBinder(expr.label, expr.body);
      return { type: expr.type, label: expr.label, annotation, body };
    }

    case 'App': {
      const fn = sub(expr.fn);
      return { type: 'App', fn, arg: sub(expr.arg) };
    }

    case 'Let': {
      const annotation = subOpt(expr.annotation);
      const value = sub(expr.value);
      const body = visitor.underBinder(expr.label, expr.body);
      return { type: 'Let', label: expr.label, annotation, value, body };
    }

    case 'Annot': {
      const inner = sub(expr.expr);
      return { type: 'Annot', expr: inner, annotation: sub(expr.annotation) };
    }

    case 'Assert':
      return { type: 'Assert', annotation: sub(expr.annotation) };

    case 'BinOp': {
      const left = sub(expr.left);
      return { type: 'BinOp', op: expr.op, left, right: sub(expr.right) };
    }

    case 'BoolIf': {
      const condition = sub(expr.condition);
      const ifTrue = sub(expr.ifTrue);
      return { type: 'BoolIf', condition, ifTrue, ifFalse: sub(expr.ifFalse) };
    }

    case 'TextLit':
      return { type: 'TextLit', text: mapText(expr.text, sub) };

    case 'EmptyListLit':
      return { type: 'EmptyListLit', annotation: sub(expr.annotation) };

    case 'NEListLit':
      return { type: 'NEListLit', items: expr.items.map(sub) };

    case 'SomeLit':
      return { type: 'SomeLit', value: sub(expr.value) };

    case 'RecordType':
      return { type: 'RecordType', fields: mapFields(expr.fields, sub) };

    case 'RecordLit':
      return { type: 'RecordLit', fields: mapFields(expr.fields, sub) };

    case 'UnionType':
      return {
        type: 'UnionType',
        alternatives: mapFields(expr.alternatives, subOpt),
      };

    // The value first, then the other alternatives
    case 'UnionLit': {
      const value = sub(expr.value);
      return {
        type: 'UnionLit',
        label: expr.label,
        value,
        alternatives: mapFields(expr.alternatives, subOpt),
      };
    }

    case 'Merge': {
      const handlers = sub(expr.handlers);
      const union = sub(expr.union);
      return {
        type: 'Merge',
        handlers,
        union,
        annotation: subOpt(expr.annotation),
      };
    }

    case 'Field':
      return { type: 'Field', record: sub(expr.record), label: expr.label };

    case 'Projection':
      return {
        type: 'Projection',
        record: sub(expr.record),
        labels: expr.labels,
      };

    case 'Embed':
      return { type: 'Embed', embed: visitor.embed(expr.embed) };
  }
}

function mapFields<T, U>(
  fields: FieldMap<T>,
  fn: (value: T) => U
): FieldMap<U> {
  return fields.map(([label, value]) => [label, fn(value)] as const);
}

function mapText<S, S2>(
  text: InterpolatedText<S>,
  fn: (child: S) => S2
): InterpolatedText<S2> {
  return {
    head: text.head,
    tail: text.tail.map(([child, after]) => [fn(child), after] as const),
  };
}
