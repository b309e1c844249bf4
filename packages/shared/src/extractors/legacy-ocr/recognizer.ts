/**
 * Text recognition boundary for the legacy OCR strategy.
 */

import path from 'path';
import { createWorker, type Worker, type WorkerOptions } from 'tesseract.js';
import { config } from '../../config';
import { logger } from '../../logger';

export interface RecognizedText {
  text: string;
  /** Engine confidence, 0-100 */
  confidence: number;
}

export interface TextRecognizer {
  recognize(image: Buffer): Promise<RecognizedText>;
  terminate?(): Promise<void>;
}

/**
 * Directory of the English LSTM data shipped in @tesseract.js-data/eng.
 */
export function bundledLangPath(): string {
  return path.join(path.dirname(require.resolve('@tesseract.js-data/eng/package.json')), '4.0.0_best_int');
}

/**
 * Worker options that read trained data from disk. OCR_LANG_PATH overrides
 * the bundled English data; the data is read in place, not cached.
 */
export function tesseractWorkerOptions(
  langPath: string = config.ocrLangPath || bundledLangPath()
): Partial<WorkerOptions> {
  return { langPath, gzip: true, cacheMethod: 'none' };
}

/**
 * tesseract.js recognizer. The worker is created on first use and reused.
 */
export class TesseractRecognizer implements TextRecognizer {
  private worker: Promise<Worker> | undefined;

  constructor(private readonly language: string = config.ocrLanguage) {}

  private getWorker(): Promise<Worker> {
    if (!this.worker) {
      const options = tesseractWorkerOptions();
      logger.info('Initializing tesseract worker', { language: this.language, lang_path: options.langPath });
      this.worker = createWorker(this.language, 1, {
        ...options,
        logger: (message) => {
          if (message.status === 'error' || message.status === 'warning') {
            logger.warn('Tesseract status', { status: message.status });
          }
        },
      });
      // Allow a later call to retry initialization
      this.worker.catch(() => {
        this.worker = undefined;
      });
    }
    return this.worker;
  }

  async recognize(image: Buffer): Promise<RecognizedText> {
    const worker = await this.getWorker();
    const result = await worker.recognize(image);
    return { text: result.data.text || '', confidence: result.data.confidence || 0 };
  }

  async terminate(): Promise<void> {
    if (!this.worker) return;
    const worker = await this.worker;
    this.worker = undefined;
    await worker.terminate();
  }
}
