import type { SymbolRow } from '../../types/symbol.js';
import type { LayoutOptions } from '../../types/config.js';
import { readingOrder } from './reading-order.js';

export const DEFAULT_MARKER = '+';
export const DEFAULT_LINE_BREAK = '\n';

type AssemblyOptions = Pick<LayoutOptions, 'marker' | 'lineBreak' | 'collapseEmptyParagraphs'>;

export function resolveMarker(options: AssemblyOptions): string {
  const marker = options.marker ?? DEFAULT_MARKER;
  if (marker.length === 0) {
    throw new Error('Paragraph marker must be a non-empty string');
  }
  return marker;
}

/**
 * Turns every marker into a line break and drops the marker glyph.
 *
 * With `collapseEmptyParagraphs` each paragraph is trimmed and empty ones are
 * skipped, so `"a++b "` gives `"a\nb"` instead of `"a\n\nb "`.
 */
export function applyParagraphMarkers(text: string, options: AssemblyOptions = {}): string {
  const marker = resolveMarker(options);
  const lineBreak = options.lineBreak ?? DEFAULT_LINE_BREAK;
  const paragraphs = text.split(marker);

  if (!options.collapseEmptyParagraphs) {
    return paragraphs.join(lineBreak);
  }

  return paragraphs
    .map((p) => p.trim())
    .filter((p) => p.length > 0)
    .join(lineBreak);
}

/**
 * Concatenates characters in reading order. Rows never introduce a break of
 * their own; only the marker does.
 */
export function assembleText(rows: readonly SymbolRow[], options: AssemblyOptions = {}): string {
  const stream = readingOrder(rows)
    .map((symbol) => symbol.character)
    .join('');
  return applyParagraphMarkers(stream, options);
}

/**
 * Text-layer variant: whitespace from the PDF's own line wrapping carries no
 * meaning, so it is removed before markers are applied.
 */
export function normalizeEmbeddedText(text: string, options: AssemblyOptions = {}): string {
  return applyParagraphMarkers(text.replace(/\s+/g, ''), { ...options, collapseEmptyParagraphs: true });
}
