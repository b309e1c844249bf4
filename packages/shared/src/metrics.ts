/**
 * Prometheus Metrics
 *
 * Metrics for extraction, filling, caching and the conversion worker.
 */

import http from 'node:http';
import * as promClient from 'prom-client';
import { logger } from './logger';

// Create a Registry for metrics
export const register = new promClient.Registry();

// Default metrics (CPU, memory, etc.) - wrap to avoid crashes on Alpine/restricted environments
try {
  promClient.collectDefaultMetrics({ register });
} catch (err) {
  logger.warn('Default Prometheus metrics collection skipped', {
    error: err instanceof Error ? err.message : String(err),
  });
}

// ============================================================================
// Job Processing Metrics
// ============================================================================

export const jobDurationHistogram = new promClient.Histogram({
  name: 'formbridge_job_duration_seconds',
  help: 'Duration of job processing in seconds',
  labelNames: ['queue', 'status'],
  buckets: [0.5, 1, 2, 5, 10, 30, 60, 120],
  registers: [register],
});

export const jobsProcessedCounter = new promClient.Counter({
  name: 'formbridge_jobs_processed_total',
  help: 'Total number of jobs processed',
  labelNames: ['queue', 'status'],
  registers: [register],
});

// ============================================================================
// Pipeline Metrics
// ============================================================================

export const pipelineRunsCounter = new promClient.Counter({
  name: 'formbridge_pipeline_runs_total',
  help: 'Pipeline runs by output format and final stage',
  labelNames: ['output_format', 'stage_reached'],
  registers: [register],
});

export const pipelineDurationHistogram = new promClient.Histogram({
  name: 'formbridge_pipeline_duration_seconds',
  help: 'End-to-end pipeline duration',
  labelNames: ['output_format'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const extractionAttemptsCounter = new promClient.Counter({
  name: 'formbridge_extraction_attempts_total',
  help: 'Extraction strategy invocations by outcome',
  labelNames: ['method', 'status'],
  registers: [register],
});

export const extractionDurationHistogram = new promClient.Histogram({
  name: 'formbridge_extraction_duration_seconds',
  help: 'Duration of document extraction',
  labelNames: ['method'],
  buckets: [0.5, 1, 2, 5, 10, 20, 30, 60, 120],
  registers: [register],
});

export const extractionCostCounter = new promClient.Counter({
  name: 'formbridge_extraction_cost_usd_total',
  help: 'Estimated extraction spend in USD',
  labelNames: ['method'],
  registers: [register],
});

export const llmRequestsCounter = new promClient.Counter({
  name: 'formbridge_llm_requests_total',
  help: 'Total number of LLM requests',
  labelNames: ['model', 'status'],
  registers: [register],
});

export const llmRequestDurationHistogram = new promClient.Histogram({
  name: 'formbridge_llm_request_duration_seconds',
  help: 'Duration of LLM requests',
  labelNames: ['model'],
  buckets: [1, 2, 5, 10, 20, 30, 60],
  registers: [register],
});

export const fillMethodCounter = new promClient.Counter({
  name: 'formbridge_fill_method_total',
  help: 'Fill attempts by method and outcome',
  labelNames: ['method', 'status'],
  registers: [register],
});

// ============================================================================
// Cache Metrics
// ============================================================================

export const cacheHitsCounter = new promClient.Counter({
  name: 'formbridge_cache_hits_total',
  help: 'Cache hits',
  labelNames: ['cache'],
  registers: [register],
});

export const cacheMissesCounter = new promClient.Counter({
  name: 'formbridge_cache_misses_total',
  help: 'Cache misses (including expired entries)',
  labelNames: ['cache'],
  registers: [register],
});

/**
 * Get Prometheus metrics endpoint handler
 */
export async function getMetrics(): Promise<string> {
  return register.metrics();
}

/**
 * Get content type for Prometheus metrics
 */
export function getMetricsContentType(): string {
  return register.contentType;
}

/**
 * Start a minimal HTTP server for /metrics (for worker processes).
 */
export function serveMetrics(port: number): http.Server {
  const server = http.createServer((req, res) => {
    if (req.url === '/metrics' && req.method === 'GET') {
      getMetrics()
        .then((body) => {
          res.setHeader('Content-Type', getMetricsContentType());
          res.end(body);
        })
        .catch((error: unknown) => {
          logger.error('Metrics collection failed', error);
          res.statusCode = 500;
          res.end();
        });
    } else {
      res.statusCode = 404;
      res.end();
    }
  });
  server.listen(port, () => {
    logger.info('Metrics server listening', { port });
  });
  return server;
}
