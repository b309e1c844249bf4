/**
 * Scanned page images.
 *
 * A scanned or photographed PDF has no text layer: each page paints one large
 * image. pdfjs decodes the images painted on a page into raw pixels, and the
 * largest of them is re-encoded as PNG for recognition.
 */

import sharp from 'sharp';
import { ImageKind, OPS } from 'pdfjs-dist';
import type { PDFPageProxy } from 'pdfjs-dist';
import { logger } from '../logger';
import { loadPdf } from './text';

interface DecodedImage {
  width: number;
  height: number;
  kind: number;
  data: Uint8Array | Uint8ClampedArray;
}

function isDecodedImage(value: unknown): value is DecodedImage {
  if (typeof value !== 'object' || value === null) return false;
  if (!('width' in value && 'height' in value && 'kind' in value && 'data' in value)) return false;
  return (
    typeof value.width === 'number' &&
    typeof value.height === 'number' &&
    typeof value.kind === 'number' &&
    (value.data instanceof Uint8Array || value.data instanceof Uint8ClampedArray)
  );
}

/**
 * Unpack 1-bit rows (MSB first, byte aligned, set bit = white) to 8-bit gray.
 */
export function unpackBitonal(data: Uint8Array | Uint8ClampedArray, width: number, height: number): Buffer {
  const rowBytes = Math.ceil(width / 8);
  const gray = Buffer.alloc(width * height);

  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const byte = data[y * rowBytes + (x >> 3)] ?? 0;
      gray[y * width + x] = byte & (0x80 >> (x & 7)) ? 255 : 0;
    }
  }
  return gray;
}

async function encodePng(image: DecodedImage): Promise<Buffer | undefined> {
  const { width, height } = image;
  let pixels: Buffer;
  let channels: 1 | 3 | 4;

  switch (image.kind) {
    case ImageKind.GRAYSCALE_1BPP:
      pixels = unpackBitonal(image.data, width, height);
      channels = 1;
      break;
    case ImageKind.RGB_24BPP:
      pixels = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
      channels = 3;
      break;
    case ImageKind.RGBA_32BPP:
      pixels = Buffer.from(image.data.buffer, image.data.byteOffset, image.data.byteLength);
      channels = 4;
      break;
    default:
      logger.warn('Unsupported page image format', { kind: image.kind });
      return undefined;
  }

  return sharp(pixels, { raw: { width, height, channels } }).png().toBuffer();
}

function resolveImage(page: PDFPageProxy, objId: string): Promise<unknown> {
  // Images shared across pages live in commonObjs
  const store = objId.startsWith('g_') ? page.commonObjs : page.objs;
  return new Promise((resolve) => {
    store.get(objId, resolve);
  });
}

/**
 * Images painted on the page, decoded.
 */
async function pageImages(page: PDFPageProxy): Promise<DecodedImage[]> {
  const operatorList = await page.getOperatorList();
  const images: DecodedImage[] = [];

  for (let i = 0; i < operatorList.fnArray.length; i++) {
    const fn = operatorList.fnArray[i];
    const args: unknown = operatorList.argsArray[i];
    if (!Array.isArray(args)) continue;
    const first: unknown = args[0];

    let candidate: unknown;
    if (fn === OPS.paintImageXObject && typeof first === 'string') {
      candidate = await resolveImage(page, first);
    } else if (fn === OPS.paintInlineImageXObject) {
      candidate = first;
    }

    if (isDecodedImage(candidate)) {
      images.push(candidate);
    }
  }
  return images;
}

/**
 * PNG of the largest image on a page (1-based), or undefined when the page
 * paints no decodable image.
 */
export async function scannedPageImage(bytes: Uint8Array, pageNumber = 1): Promise<Buffer | undefined> {
  const pdf = await loadPdf(bytes);

  try {
    if (pageNumber > pdf.numPages) return undefined;
    const page = await pdf.getPage(pageNumber);
    const images = await pageImages(page);

    const largest = images.reduce<DecodedImage | undefined>(
      (best, image) => (!best || image.width * image.height > best.width * best.height ? image : best),
      undefined
    );
    if (!largest) return undefined;

    logger.debug('Page image found', {
      page: pageNumber,
      images: images.length,
      width: largest.width,
      height: largest.height,
    });
    return encodePng(largest);
  } finally {
    await pdf.destroy();
  }
}
