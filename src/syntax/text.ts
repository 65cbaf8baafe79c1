/**
 * Interpolated Text Construction
 */

import type { InterpolatedText } from './expr.js';

export type TextChunk<S> =
  | { readonly type: 'text'; readonly text: string }
  | { readonly type: 'interpolation'; readonly expr: S };

/**
 * Build interpolated text from chunks in source order.
 * Adjacent literal runs are merged.
 */
export function fromChunks<S>(chunks: readonly TextChunk<S>[]): InterpolatedText<S> {
  let head = '';
  const tail: [S, string][] = [];

  for (const chunk of chunks) {
    if (chunk.type === 'interpolation') {
      tail.push([chunk.expr, '']);
      continue;
    }
    const last = tail[tail.length - 1];
    if (last) {
      last[1] += chunk.text;
    } else {
      head += chunk.text;
    }
  }

  return { head, tail };
}

/** Inverse of `fromChunks`, without empty literal runs */
export function toChunks<S>(text: InterpolatedText<S>): TextChunk<S>[] {
  const chunks: TextChunk<S>[] = [];
  if (text.head !== '') chunks.push({ type: 'text', text: text.head });
  for (const [expr, after] of text.tail) {
    chunks.push({ type: 'interpolation', expr });
    if (after !== '') chunks.push({ type: 'text', text: after });
  }
  return chunks;
}

export function plainText<S>(value: string): InterpolatedText<S> {
  return { head: value, tail: [] };
}
