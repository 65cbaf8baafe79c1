/**
 * Embedded Leaf Traversals
 * Rewriting the `Embed` leaves of a tree: relabeling, splicing subtrees in
 * their place, and import-alternative aware resolution.
 */

import { DhallError } from '../error-classes.js';
import { rebuildTree } from './rebuild.js';
import type { SubExpr } from './sub-expr.js';

// ============================================================
// PURE TRAVERSALS
// ============================================================

/** Replace every embedded value with `fn(value)`, keeping the tree shape */
export function mapEmbed<E, E2>(
  expr: SubExpr<E>,
  fn: (embed: E) => E2
): SubExpr<E2> {
  return rebuildTree<E, E2, undefined>(expr, undefined, {
    embed: (embed, node) => node.rewrap({ type: 'Embed', embed: fn(embed) }),
  });
}

/**
 * Replace every `Embed` node with the subtree `fn` returns for it.
 * Throwing from `fn` aborts the traversal.
 */
export function traverseEmbed<E, E2>(
  expr: SubExpr<E>,
  fn: (embed: E, node: SubExpr<E>) => SubExpr<E2>
): SubExpr<E2> {
  return rebuildTree<E, E2, undefined>(expr, undefined, {
    embed: (embed, node) => fn(embed, node),
  });
}

/** Flatten a tree whose leaves are trees */
export function squashEmbed<E>(expr: SubExpr<SubExpr<E>>): SubExpr<E> {
  return traverseEmbed(expr, (inner) => inner);
}

// ============================================================
// ALTERNATIVE-AWARE RESOLUTION
// ============================================================

/**
 * Like `traverseEmbed`, except at `a ? b`: `a` is resolved in full first,
 * and if that raises a `DhallError` the result is the resolution of `b`.
 * When both fail, the error from `b` propagates.
 *
 * `onFallback` is told about each discarded left-hand error.
 */
export function traverseResolve<E, E2>(
  expr: SubExpr<E>,
  resolve: (embed: E, node: SubExpr<E>) => SubExpr<E2>,
  onFallback?: (error: DhallError) => void
): SubExpr<E2> {
  return rebuildTree<E, E2, undefined>(expr, undefined, {
    embed: (embed, node) => resolve(embed, node),
    alternative: (node) => {
      const { expr: inner } = node;
      if (inner.type !== 'BinOp' || inner.op !== 'ImportAlt') return undefined;
      return {
        left: inner.left,
        right: inner.right,
        recover: (error) => {
          if (!(error instanceof DhallError)) return false;
          onFallback?.(error);
          return true;
        },
      };
    },
  });
}
