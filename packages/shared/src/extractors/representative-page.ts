/**
 * Reduce a document to the single page or frame that strategies read.
 *
 * Images are decoded (first frame only), downscaled when their raw RGB size
 * exceeds the limit, and re-encoded as PNG. PDFs are cut down to page 1.
 */

import sharp from 'sharp';
import { PDFDocument } from 'pdf-lib';
import { config } from '../config';
import { logger } from '../logger';

export interface PreparedImage {
  bytes: Buffer;
  width: number;
  height: number;
  resized: boolean;
}

/**
 * Target size for an image whose raw RGB byte count exceeds maxRawBytes;
 * undefined when it already fits. Aspect ratio is preserved.
 */
export function downscaleDimensions(
  width: number,
  height: number,
  maxRawBytes: number
): { width: number; height: number } | undefined {
  const rawBytes = width * height * 3;
  if (rawBytes <= maxRawBytes) return undefined;

  const ratio = Math.sqrt(maxRawBytes / rawBytes);
  return {
    width: Math.max(1, Math.floor(width * ratio)),
    height: Math.max(1, Math.floor(height * ratio)),
  };
}

export async function prepareImage(
  bytes: Buffer,
  options: { maxRawBytes?: number; grayscale?: boolean } = {}
): Promise<PreparedImage> {
  const maxRawBytes = options.maxRawBytes ?? config.maxImageBytes;
  const image = sharp(bytes, { pages: 1 });
  const metadata = await image.metadata();

  if (!metadata.width || !metadata.height) {
    throw new Error('Unable to read image dimensions');
  }

  const target = downscaleDimensions(metadata.width, metadata.height, maxRawBytes);
  let pipeline = image.rotate();
  if (target) {
    pipeline = pipeline.resize(target.width, target.height, { kernel: 'lanczos3', fit: 'fill' });
    logger.info('Downscaling image', {
      from: `${metadata.width}x${metadata.height}`,
      to: `${target.width}x${target.height}`,
    });
  }
  if (options.grayscale) {
    pipeline = pipeline.grayscale();
  }

  const { data, info } = await pipeline.png().toBuffer({ resolveWithObject: true });
  return { bytes: data, width: info.width, height: info.height, resized: target !== undefined };
}

/**
 * A one-page PDF holding the first page of the input.
 */
export async function firstPdfPage(bytes: Uint8Array): Promise<{ bytes: Uint8Array; pageCount: number }> {
  const source = await PDFDocument.load(bytes, { ignoreEncryption: true });
  const pageCount = source.getPageCount();

  if (pageCount === 0) {
    throw new Error('PDF has no pages');
  }
  if (pageCount === 1) {
    return { bytes, pageCount };
  }

  const single = await PDFDocument.create();
  const [page] = await single.copyPages(source, [0]);
  single.addPage(page);
  return { bytes: await single.save(), pageCount };
}
