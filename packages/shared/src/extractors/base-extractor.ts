/**
 * Base Extraction Strategy
 *
 * Shared timing, logging, metrics and failure handling. Subclasses implement
 * extractImpl and may throw; the base converts that into a failure result.
 */

import type { ExtractionMethodName, ExtractionResult, JsonObject, PreparedDocument } from '../types';
import type { ExtractionStrategy, StrategyAvailability } from './types';
import { errorMessage } from '../errors';
import { logger } from '../logger';
import {
  extractionAttemptsCounter,
  extractionCostCounter,
  extractionDurationHistogram,
} from '../metrics';

/**
 * What a subclass reports; the base fills in timing and method.
 */
export interface StrategyOutput {
  data: JsonObject;
  confidence: number;
  cost: number;
  tokens: number;
}

export abstract class BaseExtractor implements ExtractionStrategy {
  abstract readonly method: ExtractionMethodName;
  abstract readonly description: string;

  abstract isAvailable(): StrategyAvailability;

  protected abstract extractImpl(document: PreparedDocument): Promise<StrategyOutput>;

  async extract(document: PreparedDocument): Promise<ExtractionResult> {
    const startTime = Date.now();

    const availability = this.isAvailable();
    if (!availability.available) {
      return this.failure(`${this.method} extraction unavailable: ${availability.reason ?? 'not configured'}`, startTime);
    }

    logger.info('Starting extraction', {
      method: this.method,
      mime_type: document.mime_type,
      size_bytes: document.bytes.length,
    });

    try {
      const output = await this.extractImpl(document);
      const durationSeconds = (Date.now() - startTime) / 1000;

      extractionAttemptsCounter.inc({ method: this.method, status: 'success' });
      extractionDurationHistogram.observe({ method: this.method }, durationSeconds);
      extractionCostCounter.inc({ method: this.method }, output.cost);

      logger.info('Extraction complete', {
        method: this.method,
        field_count: Object.keys(output.data).length,
        tokens: output.tokens,
        cost: output.cost,
        duration_seconds: durationSeconds,
      });

      return {
        success: true,
        data: output.data,
        method_used: this.method,
        confidence: output.confidence,
        cost: output.cost,
        tokens: output.tokens,
        processing_time: durationSeconds,
      };
    } catch (error) {
      logger.error('Extraction failed', error, { method: this.method });
      return this.failure(errorMessage(error), startTime);
    }
  }

  protected failure(message: string, startTime: number): ExtractionResult {
    const durationSeconds = (Date.now() - startTime) / 1000;
    extractionAttemptsCounter.inc({ method: this.method, status: 'failed' });
    extractionDurationHistogram.observe({ method: this.method }, durationSeconds);

    return {
      success: false,
      method_used: this.method,
      confidence: 0,
      cost: 0,
      tokens: 0,
      processing_time: durationSeconds,
      error: message,
    };
  }
}
