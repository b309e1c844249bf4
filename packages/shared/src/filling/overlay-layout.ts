/**
 * Text layout for overlay drawing: wrapping, truncation and font-safe text.
 */

import type { OverlayLayout } from './field-table';

/**
 * Greedy word wrap. Words longer than the width are split.
 */
export function wrapText(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';

  for (const word of text.split(/\s+/).filter((w) => w !== '')) {
    let remaining = word;
    while (remaining.length > width) {
      if (current !== '') {
        lines.push(current);
        current = '';
      }
      lines.push(remaining.slice(0, width));
      remaining = remaining.slice(width);
    }

    if (current === '') {
      current = remaining;
    } else if (current.length + 1 + remaining.length <= width) {
      current = `${current} ${remaining}`;
    } else {
      lines.push(current);
      current = remaining;
    }
  }

  if (current !== '') lines.push(current);
  return lines;
}

/**
 * Helvetica (WinAnsi) cannot encode every character; replace what it cannot
 * and flatten line breaks.
 */
export function toDrawableText(value: string): string {
  return value
    .replace(/[\r\n\t]+/g, ' ')
    .replace(/[^\x20-\x7e\xa0-\xff]/g, '?')
    .trim();
}

/**
 * Lines to draw for one value. Multiline values over the wrap width are
 * wrapped and capped at maxLines; single-line values over truncateAt are cut
 * with an ellipsis.
 */
export function layoutOverlayText(value: string, multiline: boolean, layout: OverlayLayout): string[] {
  const text = toDrawableText(value);
  if (text === '') return [];

  if (multiline && text.length > layout.wrapWidth) {
    return wrapText(text, layout.wrapWidth).slice(0, layout.maxLines);
  }
  if (text.length > layout.truncateAt) {
    return [`${text.slice(0, layout.truncateAt - 3)}...`];
  }
  return [text];
}
