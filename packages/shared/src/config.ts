/**
 * Centralized Configuration
 *
 * All configuration values can be tuned via environment variables.
 */

export type CacheScope = 'shared' | 'identity';

export interface Config {
  // Redis
  redisHost: string;
  redisPort: number;
  redisUrl: string;

  // Queue & Worker
  workerConcurrency: number;
  metricsPort: number;

  // LLM
  llmModelVision: string;
  llmRequestTimeoutMs: number;
  llmMaxTokens: number;
  openaiApiKey: string;

  // Extraction
  maxImageBytes: number;
  ocrLanguage: string;
  /** Directory holding <lang>.traineddata.gz; empty means the bundled English data */
  ocrLangPath: string;
  extractionCacheTtlMs: number;
  extractionCacheScope: CacheScope;

  // Pipeline
  workPoolSize: number;
  templateDir: string;
  outputDirectory: string;
}

function parseCacheScope(value: string | undefined): CacheScope {
  return value === 'identity' ? 'identity' : 'shared';
}

export const config: Config = {
  // Redis
  redisHost: process.env.REDIS_HOST || 'redis',
  redisPort: parseInt(process.env.REDIS_PORT || '6379', 10),
  redisUrl: process.env.REDIS_URL || 'redis://redis:6379',

  // Queue & Worker
  workerConcurrency: parseInt(process.env.WORKER_CONCURRENCY || '2', 10),
  metricsPort: parseInt(process.env.METRICS_PORT || '9464', 10),

  // LLM
  llmModelVision: process.env.LLM_MODEL_VISION || 'gpt-4o',
  llmRequestTimeoutMs: parseInt(process.env.LLM_REQUEST_TIMEOUT_MS || '60000', 10),
  llmMaxTokens: parseInt(process.env.LLM_MAX_TOKENS || '4000', 10),
  openaiApiKey: process.env.OPENAI_API_KEY || '',

  // Extraction
  maxImageBytes: parseInt(process.env.MAX_IMAGE_BYTES || '15000000', 10),
  ocrLanguage: process.env.OCR_LANGUAGE || 'eng',
  ocrLangPath: process.env.OCR_LANG_PATH || '',
  extractionCacheTtlMs: parseInt(process.env.EXTRACTION_CACHE_TTL_MS || String(30 * 60 * 1000), 10),
  extractionCacheScope: parseCacheScope(process.env.EXTRACTION_CACHE_SCOPE),

  // Pipeline
  workPoolSize: parseInt(process.env.WORK_POOL_SIZE || '4', 10),
  templateDir: process.env.TEMPLATE_DIR || 'templates',
  outputDirectory: process.env.OUTPUT_DIRECTORY || 'outputs',
};
