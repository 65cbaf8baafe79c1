/**
 * File Loading
 * Read, parse and resolve a whole file, or refuse its imports.
 */

import * as path from 'node:path';
import { ImportError } from '../error-classes.js';
import { parseExpr } from '../parser/index.js';
import { traverseEmbed } from '../syntax/embed.js';
import { renderImport, type Import } from '../syntax/import.js';
import type { SubExpr } from '../syntax/sub-expr.js';
import { readImport, resolveImports, type ResolveOptions } from './resolver.js';
import { localDir } from './root.js';

export interface LoadOptions extends ResolveOptions {
  /** Resolve imports (default), or fail on the first one when false */
  readonly resolveImports?: boolean | undefined;
}

/**
 * Turn an import-free tree into a resolved one.
 *
 * @throws {ImportError} DHALL-I004 at the first import leaf
 */
export function rejectImports(expr: SubExpr<Import>): SubExpr<never> {
  return traverseEmbed<Import, never>(expr, (value) => {
    throw new ImportError('DHALL-I004', { location: renderImport(value) });
  });
}

/**
 * Parse `source` as if it were a file in `directory`.
 *
 * @throws {ParseError} When the source itself does not parse
 * @throws {ImportError} When an import cannot be resolved
 */
export function loadSource(
  source: string,
  directory: string,
  options: LoadOptions = {}
): SubExpr<never> {
  const parsed = parseExpr(source);
  if (options.resolveImports === false) {
    return rejectImports(parsed);
  }
  return resolveImports(parsed, localDir(directory), options);
}

/**
 * Read, parse and resolve the file at `file`.
 *
 * @throws {ImportError} DHALL-I001 when the file cannot be read
 * @throws {ParseError} When the file does not parse
 * @throws {ImportError} When an import cannot be resolved
 *
 * @example
 * const config = loadFile('./config.dhall', { homeDirectory: '/srv/app' });
 */
export function loadFile(file: string, options: LoadOptions = {}): SubExpr<never> {
  const target = path.resolve(file);

  const source = readImport(target);
  const parsed = parseExpr(source);
  if (options.resolveImports === false) {
    return rejectImports(parsed);
  }
  return resolveImports(parsed, localDir(path.dirname(target)), options, [target]);
}
