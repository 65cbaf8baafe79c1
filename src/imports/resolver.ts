/**
 * Import Resolver
 *
 * Replaces every import leaf with the resolved contents of the file it
 * names. Resolution is depth-first and left to right; `a ? b` falls back to
 * `b` when anything in `a` fails.
 */

import { readFileSync } from 'node:fs';
import * as path from 'node:path';
import {
  DhallError,
  DispatchError,
  ImportError,
  ParseError,
} from '../error-classes.js';
import { parseExpr } from '../parser/index.js';
import { traverseResolve } from '../syntax/embed.js';
import type { Import, ImportMode } from '../syntax/import.js';
import { unspanned, type SubExpr } from '../syntax/sub-expr.js';
import { plainText } from '../syntax/text.js';
import type { ResolverObservability } from './observability.js';
import { locateImport, localDir, type ImportRoot, type LocateOptions } from './root.js';

// ============================================================
// OPTIONS AND STATE
// ============================================================

export interface ResolveOptions extends LocateOptions {
  /** Reuse the result of a file imported more than once (default: true) */
  readonly cache?: boolean | undefined;
  readonly observability?: ResolverObservability | undefined;
}

/** Mutable state of one resolution call */
interface ResolutionState {
  /** Canonical paths of the files currently being resolved, outermost first */
  readonly chain: Set<string>;
  /** Resolved files keyed by mode and canonical path */
  readonly cache: Map<string, SubExpr<never>>;
  readonly options: ResolveOptions;
}

// ============================================================
// FILE ACCESS
// ============================================================

function reasonOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Contents of the file at `file`.
 *
 * @throws {ImportError} DHALL-I001 when it cannot be read
 */
export function readImport(file: string): string {
  try {
    return readFileSync(file, 'utf-8');
  } catch (error) {
    throw new ImportError('DHALL-I001', { path: file, reason: reasonOf(error) }, error);
  }
}

function parseImport(source: string, file: string): SubExpr<Import> {
  try {
    return parseExpr(source);
  } catch (error) {
    if (error instanceof ParseError || error instanceof DispatchError) {
      throw new ImportError('DHALL-I006', { path: file, reason: error.message }, error);
    }
    throw error;
  }
}

// ============================================================
// RESOLUTION
// ============================================================

function loadImport(
  mode: ImportMode,
  file: string,
  state: ResolutionState
): SubExpr<never> {
  if (mode === 'RawText') {
    return unspanned({ type: 'TextLit', text: plainText(readImport(file)) });
  }

  if (state.chain.has(file)) {
    const cycle = [...state.chain, file].join(' -> ');
    throw new ImportError('DHALL-I003', { cycle });
  }

  const source = readImport(file);
  state.chain.add(file);
  try {
    const parsed = parseImport(source, file);
    return resolveWith(parsed, localDir(path.dirname(file)), state);
  } finally {
    state.chain.delete(file);
  }
}

function resolveLeaf(
  value: Import,
  root: ImportRoot,
  state: ResolutionState
): SubExpr<never> {
  const { observability } = state.options;
  const depth = state.chain.size;
  let file: string | undefined;

  try {
    file = locateImport(value.location, root, state.options);
    observability?.onImportStart?.({ location: value.location, path: file, depth });

    const key = `${value.mode}:${file}`;
    const cached = state.cache.get(key);
    if (cached) {
      observability?.onImportResolved?.({ path: file, cached: true, depth });
      return cached;
    }

    const resolved = loadImport(value.mode, file, state);
    if (state.options.cache !== false) {
      state.cache.set(key, resolved);
    }
    observability?.onImportResolved?.({ path: file, cached: false, depth });
    return resolved;
  } catch (error) {
    if (error instanceof DhallError) {
      observability?.onImportFailed?.({ path: file, error, depth });
    }
    throw error;
  }
}

function resolveWith(
  expr: SubExpr<Import>,
  root: ImportRoot,
  state: ResolutionState
): SubExpr<never> {
  return traverseResolve<Import, never>(
    expr,
    (value) => resolveLeaf(value, root, state),
    (error) => state.options.observability?.onAlternativeFallback?.({ error })
  );
}

/**
 * Resolve every import in `expr`, relative to `root`.
 *
 * `chain` lists files already being resolved by the caller, usually the
 * file `expr` was read from, so that a file importing itself is reported
 * as a cycle.
 *
 * @throws {ImportError} When an import outside any `?` fallback cannot be resolved
 */
export function resolveImports(
  expr: SubExpr<Import>,
  root: ImportRoot,
  options: ResolveOptions = {},
  chain: readonly string[] = []
): SubExpr<never> {
  const state: ResolutionState = {
    chain: new Set(chain.map((file) => path.resolve(file))),
    cache: new Map(),
    options,
  };
  return resolveWith(expr, root, state);
}
