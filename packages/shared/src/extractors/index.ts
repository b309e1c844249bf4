/**
 * Extraction Strategies Module
 *
 * Strategies:
 * - 'vision': vision LLM reads the representative page into the MNR tree
 * - 'legacy_ocr': tesseract / PDF text layer followed by pattern parsing
 */

// Core types and interfaces
export type { ExtractionStrategy, StrategyAvailability } from './types';

// Base class
export { BaseExtractor, type StrategyOutput } from './base-extractor';

// Registry & orchestration
export { ExtractionRegistry } from './registry';
export { ExtractionOrchestrator, type ExtractOptions, type OrchestratorStats } from './orchestrator';

// Page preparation
export { downscaleDimensions, prepareImage, firstPdfPage, type PreparedImage } from './representative-page';

// Vision
export {
  VisionExtractor,
  estimateVisionCost,
  mergeOntoSkeleton,
  parseJsonContent,
  type VisionExtractorOptions,
} from './vision';
export {
  OpenAiVisionClient,
  type VisionAttachment,
  type VisionCompletionClient,
  type VisionRequest,
  type VisionResponse,
} from './vision/client';

// Legacy OCR
export { LegacyOcrExtractor, type LegacyOcrExtractorOptions } from './legacy-ocr';
export { parseMnrText, checkboxState, optionLabel } from './legacy-ocr/patterns';
export {
  TesseractRecognizer,
  bundledLangPath,
  tesseractWorkerOptions,
  type RecognizedText,
  type TextRecognizer,
} from './legacy-ocr/recognizer';

import { ExtractionRegistry } from './registry';
import { VisionExtractor } from './vision';
import { LegacyOcrExtractor } from './legacy-ocr';

/**
 * Registry with the built-in strategies, vision first.
 */
export function createDefaultRegistry(): ExtractionRegistry {
  return new ExtractionRegistry([new VisionExtractor(), new LegacyOcrExtractor()]);
}
