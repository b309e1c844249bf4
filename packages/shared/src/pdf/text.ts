/**
 * PDF Text Extraction
 *
 * Reads the text layer of a PDF with pdfjs-dist, both as positioned items
 * (for anchor search) and as reading-order lines (for pattern parsing).
 */

import * as pdfjsLib from 'pdfjs-dist';
import type { PDFDocumentProxy } from 'pdfjs-dist';
import { logger } from '../logger';

// Configure worker for Node.js environment
pdfjsLib.GlobalWorkerOptions.workerSrc = require.resolve('pdfjs-dist/build/pdf.worker.js');

export interface PositionedText {
  pageIndex: number;
  str: string;
  /** Baseline origin in PDF user space */
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface PageText {
  pageNumber: number;
  text: string;
}

export interface PdfTextResult {
  pages: PageText[];
  totalPages: number;
  combinedText: string;
}

export function loadPdf(bytes: Uint8Array): Promise<PDFDocumentProxy> {
  // pdfjs may take ownership of the buffer it is given
  const data = new Uint8Array(bytes);
  return pdfjsLib.getDocument({ data, isEvalSupported: false }).promise;
}

/**
 * Positioned text items of the first `maxPages` pages (all pages by default).
 */
export async function readPositionedText(bytes: Uint8Array, maxPages?: number): Promise<PositionedText[][]> {
  const pdf = await loadPdf(bytes);

  try {
    const pageCount = maxPages === undefined ? pdf.numPages : Math.min(maxPages, pdf.numPages);
    const pages: PositionedText[][] = [];

    for (let pageNum = 1; pageNum <= pageCount; pageNum++) {
      const page = await pdf.getPage(pageNum);
      const textContent = await page.getTextContent();
      const items: PositionedText[] = [];

      for (const item of textContent.items) {
        if (!('str' in item) || item.str.trim() === '') continue;

        const fontHeight = Math.abs(Number(item.transform[3])) || item.height;
        items.push({
          pageIndex: pageNum - 1,
          str: item.str,
          x: Number(item.transform[4]),
          y: Number(item.transform[5]),
          width: item.width,
          height: item.height || fontHeight,
        });
      }

      pages.push(items);
    }

    return pages;
  } finally {
    await pdf.destroy();
  }
}

/**
 * Join positioned items into lines, top to bottom and left to right.
 *
 * Items are grouped by rounded baseline so text on the same visual line
 * with slight Y variations stays together.
 */
export function itemsToLines(items: PositionedText[]): string[] {
  const itemsByY = new Map<number, PositionedText[]>();

  for (const item of items) {
    const y = Math.round(item.y);
    const line = itemsByY.get(y) ?? [];
    line.push(item);
    itemsByY.set(y, line);
  }

  return Array.from(itemsByY.keys())
    .sort((a, b) => b - a)
    .map((y) =>
      (itemsByY.get(y) ?? [])
        .sort((a, b) => a.x - b.x)
        .map((item) => item.str)
        .join(' ')
        .trim()
    )
    .filter((line) => line !== '');
}

/**
 * Extract text from a PDF, preserving line structure.
 */
export async function extractTextFromPdf(bytes: Uint8Array, maxPages?: number): Promise<PdfTextResult> {
  const positioned = await readPositionedText(bytes, maxPages);

  const pages = positioned.map((items, index) => ({
    pageNumber: index + 1,
    text: itemsToLines(items).join('\n'),
  }));
  const combinedText = pages.map((page) => page.text).join('\n\n');

  logger.debug('PDF text extraction complete', {
    totalPages: pages.length,
    totalChars: combinedText.length,
  });

  return { pages, totalPages: pages.length, combinedText };
}
