/**
 * Resolver Observability
 * Optional callbacks the host passes to follow import resolution.
 */

import type { DhallError } from '../error-classes.js';
import type { ImportLocation } from '../syntax/import.js';

/**
 * Observability callbacks for monitoring import resolution.
 * All callbacks are optional; none may change the result.
 */
export interface ResolverObservability {
  /** Called before an import is located and read */
  onImportStart?: (event: ImportStartEvent) => void;
  /** Called after an import has been parsed and spliced */
  onImportResolved?: (event: ImportResolvedEvent) => void;
  /**
   * Called when an import fails, before the error propagates. An import
   * whose own imports fail is reported too, after them.
   */
  onImportFailed?: (event: ImportFailedEvent) => void;
  /** Called when the left side of `?` fails and the right side is tried */
  onAlternativeFallback?: (event: AlternativeFallbackEvent) => void;
}

/** Event emitted before an import is read */
export interface ImportStartEvent {
  /** Import location as written */
  location: ImportLocation;
  /** Canonical file path */
  path: string;
  /** Number of files whose resolution encloses this one */
  depth: number;
}

/** Event emitted after an import is resolved */
export interface ImportResolvedEvent {
  path: string;
  /** True when the result came from this resolution's cache */
  cached: boolean;
  depth: number;
}

/** Event emitted when an import fails */
export interface ImportFailedEvent {
  /** Canonical file path; undefined when the location could not be mapped to one */
  path: string | undefined;
  error: DhallError;
  depth: number;
}

/** Event emitted when `?` discards its left side */
export interface AlternativeFallbackEvent {
  /** The discarded error */
  error: DhallError;
}
