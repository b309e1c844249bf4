/**
 * Legacy OCR Extraction Strategy
 *
 * Text recognition followed by pattern parsing. Images are recognized with
 * tesseract after grayscale conversion. PDFs are read from the text layer of
 * page 1; a page without one (a scan) has its page image recognized instead.
 * No per-call cost.
 */

import { isImage } from '../../document';
import { logger } from '../../logger';
import { scannedPageImage } from '../../pdf/page-image';
import { extractTextFromPdf } from '../../pdf/text';
import type { PreparedDocument } from '../../types';
import { BaseExtractor, type StrategyOutput } from '../base-extractor';
import { prepareImage } from '../representative-page';
import type { StrategyAvailability } from '../types';
import { parseMnrText } from './patterns';
import { TesseractRecognizer, type TextRecognizer } from './recognizer';

const LEGACY_OCR_CONFIDENCE = 0.52;

export interface LegacyOcrExtractorOptions {
  recognizer?: TextRecognizer;
}

export class LegacyOcrExtractor extends BaseExtractor {
  readonly method = 'legacy_ocr' as const;
  readonly description = 'OCR text recognition with pattern parsing';

  private readonly recognizer: TextRecognizer;

  constructor(options: LegacyOcrExtractorOptions = {}) {
    super();
    this.recognizer = options.recognizer ?? new TesseractRecognizer();
  }

  isAvailable(): StrategyAvailability {
    return { available: true };
  }

  private async recognize(imageBytes: Buffer): Promise<string> {
    const image = await prepareImage(imageBytes, { grayscale: true });
    const recognized = await this.recognizer.recognize(image.bytes);
    logger.debug('OCR recognition complete', {
      engine_confidence: recognized.confidence,
      chars: recognized.text.length,
    });
    return recognized.text;
  }

  private async readText(document: PreparedDocument): Promise<string> {
    if (isImage(document.mime_type)) {
      return this.recognize(document.bytes);
    }

    const { combinedText } = await extractTextFromPdf(document.bytes, 1);
    if (combinedText.trim() !== '') {
      return combinedText;
    }

    const pageImage = await scannedPageImage(document.bytes, 1);
    if (!pageImage) {
      return '';
    }
    logger.info('PDF has no text layer, recognizing page image');
    return this.recognize(pageImage);
  }

  protected async extractImpl(document: PreparedDocument): Promise<StrategyOutput> {
    const text = await this.readText(document);
    if (text.trim() === '') {
      throw new Error('No text recognized');
    }

    return {
      data: parseMnrText(text),
      confidence: LEGACY_OCR_CONFIDENCE,
      cost: 0,
      tokens: 0,
    };
  }

  async terminate(): Promise<void> {
    await this.recognizer.terminate?.();
  }
}
