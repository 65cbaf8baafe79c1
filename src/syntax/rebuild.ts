/**
 * Stack-Safe Rebuilding
 * Post-order reconstruction of a whole tree with an explicit work list, so
 * traversals over deep trees are bounded by memory rather than the call
 * stack. Every whole-tree rewrite (embed mapping, import splicing, shifting
 * and substitution) is written against `rebuildTree`.
 */

import { absurd, type ExprF, type Label } from './expr.js';
import type { SubExpr } from './sub-expr.js';
import { mapExprF } from './visitor.js';

// ============================================================
// VISITOR INTERFACE
// ============================================================

/** `left`, unless rebuilding it raises an error `recover` accepts */
export interface Alternative<E> {
  readonly left: SubExpr<E>;
  readonly right: SubExpr<E>;
  /** Called with an error raised under `left`; true continues with `right` */
  recover(error: unknown): boolean;
}

/**
 * Callbacks for `rebuildTree`. `C` is the context a node is visited in,
 * e.g. the variable being shifted as seen from that depth.
 */
export interface RebuildVisitor<E, E2, C> {
  /** Replacement for an `Embed` node */
  embed(embed: E, node: SubExpr<E>, context: C): SubExpr<E2>;
  /** Context for the body of a binder; unchanged when omitted */
  underBinder?(label: Label, context: C): C;
  /** Result for a non-embed node, or undefined to rebuild it from its children */
  replace?(node: SubExpr<E>, context: C): SubExpr<E2> | undefined;
  /** Marks `node` as a choice between two subtrees */
  alternative?(node: SubExpr<E>): Alternative<E> | undefined;
}

type Frame<E, C> =
  | { readonly state: 'unprocessed'; readonly node: SubExpr<E>; readonly context: C }
  | {
      readonly state: 'processed';
      readonly node: SubExpr<E>;
      readonly expr: ExprF<SubExpr<E>, never>;
      readonly count: number;
    }
  | {
      readonly state: 'alternative';
      readonly alternative: Alternative<E>;
      readonly context: C;
      /** Size of the value stack when `left` started */
      readonly depth: number;
    };

function valueAt<T>(values: readonly T[], index: number): T {
  const value = values[index];
  if (value === undefined) {
    throw new RangeError(`Rebuilt value ${index} is missing`);
  }
  return value;
}

// ============================================================
// REBUILDING
// ============================================================

/**
 * Rebuild `root` bottom-up. Children are visited left to right in the
 * order `mapExprF` gives them; each rebuilt node keeps its span.
 *
 * An error thrown by a callback unwinds to the innermost pending
 * alternative whose `recover` accepts it, and rebuilding continues with
 * that alternative's `right`. Otherwise the error propagates.
 */
export function rebuildTree<E, E2, C>(
  root: SubExpr<E>,
  context: C,
  visitor: RebuildVisitor<E, E2, C>
): SubExpr<E2> {
  const work: Frame<E, C>[] = [{ state: 'unprocessed', node: root, context }];
  const values: SubExpr<E2>[] = [];

  for (let frame = work.pop(); frame; frame = work.pop()) {
    try {
      step(frame, work, values, visitor);
    } catch (error) {
      recoverFrom(error, work, values);
    }
  }

  if (values.length !== 1) {
    throw new RangeError(`Rebuilding ended with ${values.length} values`);
  }
  return valueAt(values, 0);
}

function step<E, E2, C>(
  frame: Frame<E, C>,
  work: Frame<E, C>[],
  values: SubExpr<E2>[],
  visitor: RebuildVisitor<E, E2, C>
): void {
  // Left side finished without error
  if (frame.state === 'alternative') return;

  if (frame.state === 'processed') {
    const children = values.splice(values.length - frame.count);
    let next = 0;
    const take = (): SubExpr<E2> => valueAt(children, next++);
    const expr = mapExprF<SubExpr<E>, never, SubExpr<E2>, E2>(frame.expr, {
      subexpr: take,
      underBinder: take,
      embed: absurd,
    });
    values.push(frame.node.rewrap(expr));
    return;
  }

  const { node, context } = frame;
  const alternative = visitor.alternative?.(node);
  if (alternative) {
    work.push({ state: 'alternative', alternative, context, depth: values.length });
    work.push({ state: 'unprocessed', node: alternative.left, context });
    return;
  }

  const expr = node.expr;
  if (expr.type === 'Embed') {
    values.push(visitor.embed(expr.embed, node, context));
    return;
  }

  const replaced = visitor.replace?.(node, context);
  if (replaced) {
    values.push(replaced);
    return;
  }

  const children: Frame<E, C>[] = [];
  mapExprF<SubExpr<E>, never, number, never>(expr, {
    subexpr: (child) => children.push({ state: 'unprocessed', node: child, context }),
    underBinder: (label, child) =>
      children.push({
        state: 'unprocessed',
        node: child,
        context: visitor.underBinder ? visitor.underBinder(label, context) : context,
      }),
    embed: absurd,
  });

  work.push({ state: 'processed', node, expr, count: children.length });
  for (let i = children.length - 1; i >= 0; i--) {
    work.push(valueAt(children, i));
  }
}

function recoverFrom<E, E2, C>(
  error: unknown,
  work: Frame<E, C>[],
  values: SubExpr<E2>[]
): void {
  for (let frame = work.pop(); frame; frame = work.pop()) {
    if (frame.state === 'alternative' && frame.alternative.recover(error)) {
      values.splice(frame.depth);
      work.push({
        state: 'unprocessed',
        node: frame.alternative.right,
        context: frame.context,
      });
      return;
    }
  }
  throw error;
}
