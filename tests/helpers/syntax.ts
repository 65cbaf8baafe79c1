/**
 * Test utilities for syntax tree assertions
 */

import {
  ImportError,
  mapExprF,
  parseExpr,
  type ExprF,
  type Import,
  type ImportResolvedEvent,
  type ImportFailedEvent,
  type ImportStartEvent,
  type AlternativeFallbackEvent,
  type ResolverObservability,
  type SubExpr,
} from '../../src/index.js';

/** Span-free plain-object view of a tree, for toEqual assertions */
export function plain<E>(node: SubExpr<E>): ExprF<unknown, E> {
  return mapExprF<SubExpr<E>, E, unknown, E>(node.expr, {
    subexpr: (child) => plain(child),
    underBinder: (_label, child) => plain(child),
    embed: (embed) => embed,
  });
}

/** Parse and strip spans */
export function parsePlain(source: string): ExprF<unknown, Import> {
  return plain(parseExpr(source));
}

export function nat(value: number): ExprF<unknown, never> {
  return { type: 'NaturalLit', value };
}

export function variable(name: string, index = 0): ExprF<unknown, never> {
  return { type: 'Var', variable: { name, index } };
}

/** Run `fn` and return the error it throws, which must be a `type` */
export function catchError<T extends Error>(
  fn: () => unknown,
  type: new (...args: never[]) => T
): T {
  try {
    fn();
  } catch (error) {
    if (error instanceof type) return error;
    throw error;
  }
  throw new Error(`Expected ${type.name} to be thrown`);
}

/** Shorthand for the import failures most resolver tests expect */
export function catchImportError(fn: () => unknown): ImportError {
  return catchError(fn, ImportError);
}

/** Collected resolver events */
export interface CollectedEvents {
  start: ImportStartEvent[];
  resolved: ImportResolvedEvent[];
  failed: ImportFailedEvent[];
  fallback: AlternativeFallbackEvent[];
}

/** Observability collector for resolver event testing */
export function createEventCollector(): {
  events: CollectedEvents;
  observability: ResolverObservability;
} {
  const events: CollectedEvents = {
    start: [],
    resolved: [],
    failed: [],
    fallback: [],
  };

  const observability: ResolverObservability = {
    onImportStart: (e) => events.start.push(e),
    onImportResolved: (e) => events.resolved.push(e),
    onImportFailed: (e) => events.failed.push(e),
    onAlternativeFallback: (e) => events.fallback.push(e),
  };

  return { events, observability };
}
