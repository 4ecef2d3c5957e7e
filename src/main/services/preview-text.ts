/**
 * Single-line previews for menu display.
 */

import { ELLIPSIS } from '@shared/constants';

const segmenter = new Intl.Segmenter(undefined, { granularity: 'grapheme' });

/** Collapse every whitespace run (newlines included) to a single space */
export function collapseWhitespace(text: string): string {
  return text.split(/\s+/).filter(Boolean).join(' ');
}

/**
 * Collapse whitespace and cut to `maxLength` user-perceived characters,
 * ending with an ellipsis when cut. Counting grapheme clusters keeps
 * surrogate pairs, combining marks and emoji sequences whole.
 */
export function truncateText(text: string, maxLength: number): string {
  const singleLine = collapseWhitespace(text);
  const graphemes: string[] = [];
  for (const { segment } of segmenter.segment(singleLine)) {
    graphemes.push(segment);
    if (graphemes.length > maxLength) break;
  }
  if (graphemes.length <= maxLength) return singleLine;
  return graphemes.slice(0, Math.max(0, maxLength - 1)).join('') + ELLIPSIS;
}
