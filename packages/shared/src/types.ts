/**
 * Shared Types
 *
 * Data model of the form conversion pipeline. Result payloads use snake_case
 * keys since they are written verbatim to intermediate JSON and job results.
 */

// ============================================================================
// JSON trees
// ============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | JsonObject;
export interface JsonObject {
  [key: string]: JsonValue;
}

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Narrow an arbitrary parsed value (e.g. JSON.parse output) to a JsonValue.
 * Returns undefined when something non-serializable is found.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null || typeof value === 'string' || typeof value === 'boolean') {
    return value;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : undefined;
  }
  if (Array.isArray(value)) {
    const items: JsonValue[] = [];
    for (const item of value) {
      const converted = toJsonValue(item);
      if (converted === undefined) return undefined;
      items.push(converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted === undefined) return undefined;
      result[key] = converted;
    }
    return result;
  }
  return undefined;
}

// ============================================================================
// Documents
// ============================================================================

export type DocumentMimeType =
  | 'application/pdf'
  | 'image/png'
  | 'image/jpeg'
  | 'image/gif'
  | 'image/tiff'
  | 'image/webp';

export interface DocumentInput {
  bytes: Buffer;
  mime_type?: DocumentMimeType;
  filename?: string;
}

/**
 * Document after MIME sniffing and hashing; what strategies receive.
 */
export interface PreparedDocument {
  bytes: Buffer;
  mime_type: DocumentMimeType;
  filename: string;
  content_hash: string;
}

// ============================================================================
// Extraction
// ============================================================================

export type ExtractionMethodName = 'vision' | 'legacy_ocr';
export type RequestedExtractionMethod = 'auto' | ExtractionMethodName;
export type ExtractionMethodUsed = ExtractionMethodName | 'cached' | 'all_failed';

export interface ExtractionAttempt {
  method: ExtractionMethodName;
  error: string;
}

export interface ExtractionResult {
  success: boolean;
  data?: JsonObject;
  method_used: ExtractionMethodUsed;
  confidence: number;
  cost: number;
  tokens: number;
  processing_time: number;
  error?: string;
  /** Failures of strategies tried before the one reported in method_used */
  attempts?: ExtractionAttempt[];
  /** Set on cache hits: the strategy that originally produced the data */
  cached_from?: ExtractionMethodUsed;
}

// ============================================================================
// Normalization & mapping
// ============================================================================

export interface Provenance {
  processor: string;
  validation_method: 'json_schema';
  processed_at: string;
  validation_errors: string[];
  coerced_fields: string[];
  mandatory_fields_present: boolean;
}

export interface NormalizedForm {
  fields: JsonObject;
  _provenance: Provenance;
}

export type MappedForm = Record<string, string>;

// ============================================================================
// Filling
// ============================================================================

export type FillMethod = 'structured_fields' | 'basic_fields' | 'overlay';

export interface FillAttempt {
  method: FillMethod;
  error: string;
}

export interface FillingResult {
  success: boolean;
  output_path?: string;
  fields_filled: number;
  total_fields: number;
  method_used: FillMethod;
  warnings: string[];
  error?: string;
  attempts: FillAttempt[];
}

// ============================================================================
// Pipeline
// ============================================================================

export type OutputFormat = 'source_schema' | 'target_schema';
export type RequestedOutputFormat = OutputFormat | 'both';

export type PipelineStage =
  | 'extraction'
  | 'mapping'
  | 'filling'
  | 'finalization'
  | 'completed'
  | 'failed';

export type StageReached = 'extraction' | 'mapping' | 'filling' | 'completed' | 'failed';

export interface PipelineConfig {
  extraction_method: RequestedExtractionMethod;
  extraction_fallback: boolean;
  output_format: RequestedOutputFormat;
  enhanced_filling: boolean;
  save_intermediate: boolean;
  output_directory: string;
  include_metadata: boolean;
}

export interface CallerIdentity {
  user_id?: string;
  session_id?: string;
}

export interface PipelineMetadata {
  pipeline_version: string;
  correlation_id: string;
  executed_at: string;
  stages_completed: PipelineStage[];
  configuration: PipelineConfig;
  identity: CallerIdentity;
  available_extraction_methods: Record<ExtractionMethodName, boolean>;
}

export interface PipelineResult {
  success: boolean;
  stage_reached: StageReached;
  failed_stage?: PipelineStage;
  extraction_result?: ExtractionResult;
  normalized_form?: NormalizedForm;
  mapped_form?: MappedForm;
  filling_result?: FillingResult;
  secondary_mapped_form?: MappedForm;
  secondary_filling_result?: FillingResult;
  total_cost: number;
  total_processing_time: number;
  warnings: string[];
  error?: string;
  intermediate_path?: string;
  metadata?: PipelineMetadata;
}
