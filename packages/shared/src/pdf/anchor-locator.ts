/**
 * Anchor phrase search on template pages.
 *
 * Finds label text ("Weight", "Current Pain Level") so overlay values can be
 * drawn beside it. Boxes are in PDF user space (origin bottom-left), which is
 * the space pdf-lib draws in.
 */

import { readPositionedText, type PositionedText } from './text';

export interface AnchorBox {
  pageIndex: number;
  x0: number;
  /** Baseline of the label */
  y0: number;
  x1: number;
  y1: number;
}

export interface AnchorIndex {
  /** First occurrence of the phrase (case-insensitive), in page order */
  find(phrase: string): AnchorBox | undefined;
}

export interface AnchorLocator {
  index(templateBytes: Uint8Array): Promise<AnchorIndex>;
}

/**
 * Box of `phrase` inside a single text item, assuming even glyph widths
 * across the item.
 */
function boxWithinItem(item: PositionedText, start: number, length: number): AnchorBox {
  const charWidth = item.str.length > 0 ? item.width / item.str.length : 0;
  const x0 = item.x + start * charWidth;
  return {
    pageIndex: item.pageIndex,
    x0,
    y0: item.y,
    x1: x0 + length * charWidth,
    y1: item.y + item.height,
  };
}

export class PositionedTextIndex implements AnchorIndex {
  private readonly items: PositionedText[];

  constructor(pages: PositionedText[][]) {
    // Page order, then top-to-bottom, then left-to-right
    this.items = pages.flatMap((items) => [...items].sort((a, b) => b.y - a.y || a.x - b.x));
  }

  find(phrase: string): AnchorBox | undefined {
    const needle = phrase.toLowerCase();
    if (needle === '') return undefined;

    for (const item of this.items) {
      const start = item.str.toLowerCase().indexOf(needle);
      if (start !== -1) {
        return boxWithinItem(item, start, needle.length);
      }
    }
    return undefined;
  }
}

export class PdfjsAnchorLocator implements AnchorLocator {
  async index(templateBytes: Uint8Array): Promise<AnchorIndex> {
    const pages = await readPositionedText(templateBytes);
    return new PositionedTextIndex(pages);
  }
}
