/**
 * BullMQ Queue Definitions
 *
 * Queue names, job interfaces, and the worker factory.
 */

import { Worker, Job, ConnectionOptions } from 'bullmq';
import { config } from './config';
import { logger } from './logger';
import type {
  CallerIdentity,
  DocumentMimeType,
  PipelineConfig,
  PipelineStage,
  StageReached,
} from './types';

// ============================================================================
// Queue Names
// ============================================================================

export const QUEUE_NAMES = {
  CONVERT_FORM: 'convert_form',
} as const;

export type QueueName = (typeof QUEUE_NAMES)[keyof typeof QUEUE_NAMES];

// ============================================================================
// Job Payloads
// ============================================================================

/**
 * convert_form - Enqueued by the request layer once the upload is on disk
 */
export interface ConvertFormJob {
  correlation_id: string;
  document_path: string;
  mime_type?: DocumentMimeType;
  filename?: string;
  config?: Partial<PipelineConfig>;
  identity?: CallerIdentity;
}

export interface ConvertFormJobResult {
  success: boolean;
  stage_reached: StageReached;
  failed_stage?: PipelineStage;
  output_paths: string[];
  intermediate_path?: string;
  total_cost: number;
  total_processing_time: number;
  warnings: string[];
  error?: string;
}

/**
 * Progress payload written to job.updateProgress for each pipeline event
 */
export interface ConvertFormProgress {
  stage: PipelineStage;
  message: string;
  completed: boolean;
}

// ============================================================================
// Redis Connection
// ============================================================================

export function getRedisConnection(): ConnectionOptions {
  const redisUrl = config.redisUrl;

  if (redisUrl && redisUrl.startsWith('redis://')) {
    try {
      const url = new URL(redisUrl);
      return {
        host: url.hostname,
        port: parseInt(url.port || '6379', 10),
        maxRetriesPerRequest: null, // Required for BullMQ
      };
    } catch (error) {
      logger.warn('Invalid REDIS_URL, using host/port settings', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  return {
    host: config.redisHost,
    port: config.redisPort,
    maxRetriesPerRequest: null,
  };
}

// ============================================================================
// Worker Factory
// ============================================================================

export interface WorkerOptions {
  concurrency?: number;
}

export function createWorker<TData, TResult>(
  queueName: QueueName,
  processor: (job: Job<TData, TResult>) => Promise<TResult>,
  options: WorkerOptions = {}
): Worker<TData, TResult> {
  const worker = new Worker<TData, TResult>(queueName, processor, {
    connection: getRedisConnection(),
    concurrency: options.concurrency || config.workerConcurrency,
  });

  worker.on('completed', (job) => {
    logger.info('Job completed', {
      queue: queueName,
      jobId: job.id,
    });
  });

  worker.on('failed', (job, err) => {
    logger.error('Job failed', err, {
      queue: queueName,
      jobId: job?.id,
      attempts: job?.attemptsMade,
    });
  });

  worker.on('error', (err) => {
    logger.error('Worker error', err, { queue: queueName });
  });

  logger.info('Worker started', {
    queue: queueName,
    concurrency: options.concurrency || config.workerConcurrency,
  });

  return worker;
}
