// ============================================================
// SOURCE LOCATION
// ============================================================

export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  readonly offset: number;
}

export interface SourceSpan {
  readonly start: SourceLocation;
  readonly end: SourceLocation;
}

/**
 * Smallest span covering both inputs.
 * Returns undefined when either side has no span.
 */
export function joinSpans(
  first: SourceSpan | undefined,
  last: SourceSpan | undefined
): SourceSpan | undefined {
  if (!first || !last) return undefined;
  return { start: first.start, end: last.end };
}
