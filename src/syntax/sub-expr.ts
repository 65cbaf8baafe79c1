/**
 * Shared Expression Nodes
 */

import type { SourceSpan } from '../source-location.js';
import { exprEquals } from './equality.js';
import { absurd, type ExprF, type Label } from './expr.js';
import { mapExprF } from './visitor.js';

/** One level of syntax whose children are shared nodes */
export type Expr<E> = ExprF<SubExpr<E>, E>;

/**
 * Node-level visitor. Unlike `ExprFVisitor`, the embed callback sees the
 * whole node and returns a node, so a leaf can be replaced by a subtree.
 */
export interface SubExprVisitor<E, E2> {
  subexpr(child: SubExpr<E>): SubExpr<E2>;
  underBinder(label: Label, child: SubExpr<E>): SubExpr<E2>;
  embed(embed: E, node: SubExpr<E>): SubExpr<E2>;
}

// ============================================================
// NODE
// ============================================================

/**
 * Immutable AST node: an expression level plus the source span it was
 * parsed from. Children are other nodes held by reference, so one subtree
 * may appear under several parents.
 */
export class SubExpr<E> {
  constructor(
    readonly expr: Expr<E>,
    readonly span?: SourceSpan | undefined
  ) {}

  /** New node around `expr` that keeps this node's span */
  rewrap<E2>(expr: Expr<E2>): SubExpr<E2> {
    return new SubExpr(expr, this.span);
  }

  /** Structural equality; spans are ignored */
  equals(other: SubExpr<E>): boolean {
    return exprEquals(this, other);
  }

  /**
   * Apply the visitor to this node's direct children and rewrap.
   * An `Embed` node is handed to `visitor.embed` whole.
   */
  mapSubexprs<E2>(visitor: SubExprVisitor<E, E2>): SubExpr<E2> {
    const node = this.expr;
    if (node.type === 'Embed') {
      return visitor.embed(node.embed, this);
    }
    return this.rewrap(
      mapExprF<SubExpr<E>, never, SubExpr<E2>, E2>(node, {
        subexpr: (child) => visitor.subexpr(child),
        underBinder: (label, child) => visitor.underBinder(label, child),
        embed: absurd,
      })
    );
  }
}

export function unspanned<E>(expr: Expr<E>): SubExpr<E> {
  return new SubExpr(expr);
}
