/**
 * Document preparation: MIME sniffing and content hashing.
 */

import { createHash } from 'node:crypto';
import { UnsupportedDocumentError } from './errors';
import type { DocumentInput, DocumentMimeType, PreparedDocument } from './types';

const SIGNATURES: Array<{ mime: DocumentMimeType; bytes: number[]; offset?: number }> = [
  { mime: 'application/pdf', bytes: [0x25, 0x50, 0x44, 0x46] }, // %PDF
  { mime: 'image/png', bytes: [0x89, 0x50, 0x4e, 0x47] },
  { mime: 'image/jpeg', bytes: [0xff, 0xd8, 0xff] },
  { mime: 'image/gif', bytes: [0x47, 0x49, 0x46, 0x38] },
  { mime: 'image/tiff', bytes: [0x49, 0x49, 0x2a, 0x00] },
  { mime: 'image/tiff', bytes: [0x4d, 0x4d, 0x00, 0x2a] },
  { mime: 'image/webp', bytes: [0x57, 0x45, 0x42, 0x50], offset: 8 },
];

/**
 * Identify a document type from its leading bytes.
 */
export function sniffMimeType(bytes: Buffer): DocumentMimeType | undefined {
  for (const signature of SIGNATURES) {
    const offset = signature.offset ?? 0;
    if (bytes.length < offset + signature.bytes.length) continue;
    if (signature.bytes.every((byte, i) => bytes[offset + i] === byte)) {
      return signature.mime;
    }
  }
  return undefined;
}

export function hashContent(bytes: Uint8Array): string {
  return createHash('sha256').update(bytes).digest('hex');
}

export function isImage(mimeType: DocumentMimeType): boolean {
  return mimeType.startsWith('image/');
}

/**
 * Resolve the MIME type (declared wins over sniffed) and hash the bytes.
 * Throws when neither yields a supported type.
 */
export function prepareDocument(input: DocumentInput): PreparedDocument {
  const mimeType = input.mime_type ?? sniffMimeType(input.bytes);
  if (!mimeType) {
    throw new UnsupportedDocumentError();
  }

  return {
    bytes: input.bytes,
    mime_type: mimeType,
    filename: input.filename || 'document',
    content_hash: hashContent(input.bytes),
  };
}
