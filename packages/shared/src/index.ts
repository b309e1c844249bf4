/**
 * Shared Package - Main Export
 */

// Context
export {
  getContext,
  getCorrelationId,
  runWithContextAsync,
  setDocumentHash,
  type RequestContext,
} from './context';

// Logger
export { logger, type LogContext } from './logger';

// Config
export { config, type Config, type CacheScope } from './config';

// Errors
export {
  ExtractionUnavailableError,
  MappingFailureError,
  TemplateMissingError,
  UnsupportedDocumentError,
  FieldTableError,
  errorMessage,
} from './errors';

// Types
export * from './types';

// Documents
export { sniffMimeType, hashContent, isImage, prepareDocument } from './document';

// Concurrency & caching
export { firstSuccess, type CascadeCandidate, type CascadeFailure, type CascadeOutcome } from './cascade';
export { createWorkPool, type WorkPool } from './work-pool';
export { CacheStore, type CacheStoreOptions, type ExtractionCacheKey, type TemplateEntry } from './cache-store';

// Queues
export {
  QUEUE_NAMES,
  type QueueName,
  type ConvertFormJob,
  type ConvertFormJobResult,
  type ConvertFormProgress,
  getRedisConnection,
  createWorker,
  type WorkerOptions,
} from './queues';

// Metrics
export {
  register,
  jobDurationHistogram,
  jobsProcessedCounter,
  pipelineRunsCounter,
  pipelineDurationHistogram,
  extractionAttemptsCounter,
  extractionDurationHistogram,
  extractionCostCounter,
  llmRequestsCounter,
  llmRequestDurationHistogram,
  fillMethodCounter,
  cacheHitsCounter,
  cacheMissesCounter,
  getMetrics,
  getMetricsContentType,
  serveMetrics,
} from './metrics';

// Schemas
export {
  validateSourceForm,
  compileContract,
  formatAjvErrors,
  resolveDataFile,
  readJsonFile,
  type ValidationResult,
} from './schemas';

// MNR contract, validation & mapping
export * from './schema/mnr-form';
export {
  validateSourceTree,
  processSourceTree,
  missingRequiredFields,
  coerceBoolean,
  coercePainScale,
  coerceInteger,
  type SourceValidation,
  type ProcessedSourceForm,
} from './schema/validator';
export {
  mapToTargetSchema,
  mapToSourceSchema,
  formatHeight,
  formatBloodPressure,
  formatWeight,
  joinFlags,
  formatYesNo,
  formatPregnancy,
  formatActivities,
  selectBucket,
  formatReliefDuration,
} from './schema/mapper';

// Templates
export { MNR_EXTRACTION_TEMPLATE, renderPrompt, type ExtractionTemplate } from './templates';

// Extraction strategies
export * from './extractors';

// PDF text & anchors
export { extractTextFromPdf, readPositionedText, itemsToLines, type PositionedText } from './pdf/text';
export { scannedPageImage, unpackBitonal } from './pdf/page-image';
export {
  PdfjsAnchorLocator,
  PositionedTextIndex,
  type AnchorBox,
  type AnchorIndex,
  type AnchorLocator,
} from './pdf/anchor-locator';

// Filling
export {
  loadFieldTable,
  parseFieldTable,
  buildFieldTable,
  looksLikeMatch,
  normalizeFieldName,
  DEFAULT_OVERLAY_LAYOUT,
  type FieldTable,
  type FieldSpec,
  type FieldTarget,
  type FieldTableFile,
  type OverlayLayout,
  type FieldCoverageReport,
  type BuiltFieldTable,
} from './filling/field-table';
export { PdfFillEngine, isAffirmative, selectTargetValue, type FillRequest, type FillEngineOptions } from './filling/fill-engine';
export { wrapText, layoutOverlayText, toDrawableText } from './filling/overlay-layout';

// Pipeline
export * from './pipeline';
