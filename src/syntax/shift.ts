/**
 * De Bruijn Index Arithmetic
 * Shifting and capture-avoiding substitution over shared nodes.
 */

import { ShiftError } from '../error-classes.js';
import { v, type Label, type V } from './expr.js';
import { rebuildTree } from './rebuild.js';
import type { SubExpr } from './sub-expr.js';

// ============================================================
// VARIABLES
// ============================================================

/**
 * Shift `variable` by `delta` if it refers at or above `binder`.
 * Returns undefined when the result leaves the non-negative safe integers.
 */
export function shiftVar(delta: number, binder: V, variable: V): V | undefined {
  if (variable.name !== binder.name || variable.index < binder.index) {
    return variable;
  }
  const index = variable.index + delta;
  if (index < 0 || !Number.isSafeInteger(index)) {
    return undefined;
  }
  return { name: variable.name, index };
}

/** The binder `variable` refers to from inside a new binder `label` */
export function overBinder(label: Label, variable: V): V {
  return label === variable.name
    ? { name: variable.name, index: variable.index + 1 }
    : variable;
}

// ============================================================
// EXPRESSIONS
// ============================================================

/**
 * Shift every free occurrence of `binder` (and higher indices of the same
 * name) in `expr` by `delta`. Embedded leaves are left alone.
 *
 * @throws {ShiftError} When an index would leave the representable range
 */
export function shift<E>(delta: number, binder: V, expr: SubExpr<E>): SubExpr<E> {
  return rebuildTree<E, E, V>(expr, binder, {
    embed: (_embed, self) => self,
    underBinder: overBinder,
    replace: (node, target) => {
      const { expr: inner } = node;
      if (inner.type !== 'Var') return undefined;
      const shifted = shiftVar(delta, target, inner.variable);
      if (shifted === undefined) {
        throw new ShiftError(inner.variable.name, inner.variable.index, delta);
      }
      if (shifted === inner.variable) return node;
      return node.rewrap({ type: 'Var', variable: shifted });
    },
  });
}

interface Substitution<E> {
  readonly variable: V;
  readonly value: SubExpr<E>;
}

/**
 * Replace free occurrences of `variable` in `expr` with `value`.
 * `value` is shifted past every binder it is carried under.
 */
export function subst<E>(
  variable: V,
  value: SubExpr<E>,
  expr: SubExpr<E>
): SubExpr<E> {
  return rebuildTree<E, E, Substitution<E>>(expr, { variable, value }, {
    embed: (_embed, self) => self,
    underBinder: (label, outer) => ({
      variable: overBinder(label, outer.variable),
      value: shift(1, v(label), outer.value),
    }),
    replace: (node, { variable: target, value: replacement }) => {
      const { expr: inner } = node;
      if (inner.type !== 'Var') return undefined;
      const { name, index } = inner.variable;
      return name === target.name && index === target.index ? replacement : node;
    },
  });
}
