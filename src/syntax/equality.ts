/**
 * Structural Equality
 */

import type { ExprF } from './expr.js';
import type { SubExpr } from './sub-expr.js';
import { mapExprF } from './visitor.js';

interface Skeleton<E> {
  /** The node with each child and embed replaced by its position */
  readonly shape: ExprF<number, number>;
  readonly children: SubExpr<E>[];
  readonly embeds: E[];
}

function skeletonOf<E>(node: SubExpr<E>): Skeleton<E> {
  const children: SubExpr<E>[] = [];
  const embeds: E[] = [];
  const shape = mapExprF<SubExpr<E>, E, number, number>(node.expr, {
    subexpr: (child) => children.push(child) - 1,
    underBinder: (_label, child) => children.push(child) - 1,
    embed: (embed) => embeds.push(embed) - 1,
  });
  return { shape, children, embeds };
}

/**
 * Compare two trees ignoring spans. Labels, literal values and field order
 * must match; doubles compare with `Object.is`.
 *
 * Walks both trees with an explicit stack, so depth is bounded by memory
 * rather than the call stack.
 */
export function exprEquals<E>(
  left: SubExpr<E>,
  right: SubExpr<E>,
  embedEquals: (a: E, b: E) => boolean = plainEquals
): boolean {
  const pending: [SubExpr<E>, SubExpr<E>][] = [[left, right]];

  for (let pair = pending.pop(); pair !== undefined; pair = pending.pop()) {
    const [a, b] = pair;
    if (a === b || a.expr === b.expr) continue;

    const sa = skeletonOf(a);
    const sb = skeletonOf(b);
    if (!plainEquals(sa.shape, sb.shape)) return false;

    for (let i = 0; i < sa.embeds.length; i++) {
      const ea = sa.embeds[i];
      const eb = sb.embeds[i];
      if (ea === undefined || eb === undefined || !embedEquals(ea, eb)) {
        return false;
      }
    }

    for (let i = sa.children.length - 1; i >= 0; i--) {
      const ca = sa.children[i];
      const cb = sb.children[i];
      if (ca === undefined || cb === undefined) return false;
      pending.push([ca, cb]);
    }
  }

  return true;
}

/**
 * Deep equality over plain data: primitives by `Object.is`, arrays by
 * element, objects by own enumerable keys. A missing key equals `undefined`.
 */
export function plainEquals(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true;
  if (typeof a !== 'object' || typeof b !== 'object' || a === null || b === null) {
    return false;
  }

  if (Array.isArray(a) || Array.isArray(b)) {
    if (!Array.isArray(a) || !Array.isArray(b) || a.length !== b.length) {
      return false;
    }
    return a.every((item: unknown, i) => plainEquals(item, b[i]));
  }

  const entriesA = new Map(Object.entries(a));
  const entriesB = new Map(Object.entries(b));
  const keys = new Set([...entriesA.keys(), ...entriesB.keys()]);
  for (const key of keys) {
    if (!plainEquals(entriesA.get(key), entriesB.get(key))) return false;
  }
  return true;
}
