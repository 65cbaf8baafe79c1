/**
 * Expression Node Shapes
 * One level of the syntax tree, parameterized over the child reference
 * type `S` and the embedded leaf type `E`.
 */

import type { BinOp, Builtin } from './builtins.js';

// ============================================================
// LEAVES
// ============================================================

export type Label = string;

/** Universe levels */
export type Const = 'Type' | 'Kind' | 'Sort';

/**
 * Variable reference: a name plus the number of enclosing binders of the
 * same name to skip. `x@0` is the nearest `x`.
 */
export interface V {
  readonly name: Label;
  readonly index: number;
}

export function v(name: Label, index = 0): V {
  return { name, index };
}

/** Record and union bodies. Order is kept, duplicate labels are allowed. */
export type FieldMap<T> = readonly (readonly [Label, T])[];

/**
 * `"head${e1}text1${e2}text2"` is `{ head: 'head', tail: [[e1, 'text1'], [e2, 'text2']] }`.
 * Two adjacent interpolations are separated by an empty string.
 */
export interface InterpolatedText<S> {
  readonly head: string;
  readonly tail: readonly (readonly [S, string])[];
}

// ============================================================
// NODE SHAPES
// ============================================================

export interface ConstNode {
  readonly type: 'Const';
  readonly value: Const;
}

/** `x`, `x@n` */
export interface VarNode {
  readonly type: 'Var';
  readonly variable: V;
}

/** `λ(x : A) -> b` */
export interface LamNode<S> {
  readonly type: 'Lam';
  readonly label: Label;
  readonly annotation: S;
  readonly body: S;
}

/** `∀(x : A) -> B`, and `A -> B` with the label `_` */
export interface PiNode<S> {
  readonly type: 'Pi';
  readonly label: Label;
  readonly annotation: S;
  readonly body: S;
}

/** `f a` */
export interface AppNode<S> {
  readonly type: 'App';
  readonly fn: S;
  readonly arg: S;
}

/** `let x = r in e`, `let x : t = r in e` */
export interface LetNode<S> {
  readonly type: 'Let';
  readonly label: Label;
  readonly annotation: S | undefined;
  readonly value: S;
  readonly body: S;
}

/** `x : t` */
export interface AnnotNode<S> {
  readonly type: 'Annot';
  readonly expr: S;
  readonly annotation: S;
}

/** `assert : t` */
export interface AssertNode<S> {
  readonly type: 'Assert';
  readonly annotation: S;
}

export interface BuiltinNode {
  readonly type: 'Builtin';
  readonly builtin: Builtin;
}

export interface BinOpNode<S> {
  readonly type: 'BinOp';
  readonly op: BinOp;
  readonly left: S;
  readonly right: S;
}

export interface BoolLitNode {
  readonly type: 'BoolLit';
  readonly value: boolean;
}

/** `if x then y else z` */
export interface BoolIfNode<S> {
  readonly type: 'BoolIf';
  readonly condition: S;
  readonly ifTrue: S;
  readonly ifFalse: S;
}

export interface NaturalLitNode {
  readonly type: 'NaturalLit';
  readonly value: number;
}

/** `+2`, `-2` */
export interface IntegerLitNode {
  readonly type: 'IntegerLit';
  readonly value: number;
}

/** Compared with Object.is, so NaN equals NaN and 0.0 differs from -0.0 */
export interface DoubleLitNode {
  readonly type: 'DoubleLit';
  readonly value: number;
}

export interface TextLitNode<S> {
  readonly type: 'TextLit';
  readonly text: InterpolatedText<S>;
}

/** `[] : t` */
export interface EmptyListLitNode<S> {
  readonly type: 'EmptyListLit';
  readonly annotation: S;
}

/** `[x, y, z]` */
export interface NEListLitNode<S> {
  readonly type: 'NEListLit';
  readonly items: readonly S[];
}

/** `Some e` */
export interface SomeLitNode<S> {
  readonly type: 'SomeLit';
  readonly value: S;
}

/** `{ k1 : t1, k2 : t2 }` */
export interface RecordTypeNode<S> {
  readonly type: 'RecordType';
  readonly fields: FieldMap<S>;
}

/** `{ k1 = v1, k2 = v2 }` */
export interface RecordLitNode<S> {
  readonly type: 'RecordLit';
  readonly fields: FieldMap<S>;
}

/** `< k1 : t1 | k2 >` */
export interface UnionTypeNode<S> {
  readonly type: 'UnionType';
  readonly alternatives: FieldMap<S | undefined>;
}

/**
 * `< k = v | k1 : t1 | k2 >`: the alternative `label` holding `value`,
 * with the other alternatives of its type in source order
 */
export interface UnionLitNode<S> {
  readonly type: 'UnionLit';
  readonly label: Label;
  readonly value: S;
  readonly alternatives: FieldMap<S | undefined>;
}

/** `merge x y`, `merge x y : t` */
export interface MergeNode<S> {
  readonly type: 'Merge';
  readonly handlers: S;
  readonly union: S;
  readonly annotation: S | undefined;
}

/** `e.x` */
export interface FieldNode<S> {
  readonly type: 'Field';
  readonly record: S;
  readonly label: Label;
}

/** `e.{ x, y }` */
export interface ProjectionNode<S> {
  readonly type: 'Projection';
  readonly record: S;
  readonly labels: readonly Label[];
}

/** A leaf from outside the core language, e.g. an unresolved import */
export interface EmbedNode<E> {
  readonly type: 'Embed';
  readonly embed: E;
}

/**
 * Syntax tree for expressions, one level deep.
 * Keeping the recursion out of the union lets every pass share one
 * traversal (see visitor.ts).
 */
export type ExprF<S, E> =
  | ConstNode
  | VarNode
  | LamNode<S>
  | PiNode<S>
  | AppNode<S>
  | LetNode<S>
  | AnnotNode<S>
  | AssertNode<S>
  | BuiltinNode
  | BinOpNode<S>
  | BoolLitNode
  | BoolIfNode<S>
  | NaturalLitNode
  | IntegerLitNode
  | DoubleLitNode
  | TextLitNode<S>
  | EmptyListLitNode<S>
  | NEListLitNode<S>
  | SomeLitNode<S>
  | RecordTypeNode<S>
  | RecordLitNode<S>
  | UnionTypeNode<S>
  | UnionLitNode<S>
  | MergeNode<S>
  | FieldNode<S>
  | ProjectionNode<S>
  | EmbedNode<E>;

/**
 * Uninhabited embed handler: `mapEmbed(expr, absurd)` turns a tree that
 * provably has no leaves into any other embed type.
 */
export function absurd(value: never): never {
  return value;
}
