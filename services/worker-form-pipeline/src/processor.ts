/**
 * convert_form job processor
 *
 * Reads the uploaded document from disk, runs the conversion pipeline and
 * forwards each progress event to the job. Aborting pipeline errors (missing
 * template, unavailable extraction, malformed tree, unreadable upload) are
 * marked unrecoverable so BullMQ does not retry them.
 */

import fs from 'fs';
import path from 'path';
import { UnrecoverableError, type Job } from 'bullmq';
import {
  logger,
  errorMessage,
  createProgressTracker,
  runWithContextAsync,
  jobsProcessedCounter,
  jobDurationHistogram,
  ExtractionUnavailableError,
  MappingFailureError,
  TemplateMissingError,
  UnsupportedDocumentError,
  QUEUE_NAMES,
  type ConvertFormJob,
  type ConvertFormJobResult,
  type ConvertFormProgress,
  type FormPipeline,
  type PipelineResult,
} from '@formbridge/shared';

export type ConvertFormJobHandle = Pick<
  Job<ConvertFormJob, ConvertFormJobResult>,
  'id' | 'data' | 'attemptsMade' | 'updateProgress'
>;

export function summarizeResult(result: PipelineResult): ConvertFormJobResult {
  const outputPaths = [result.filling_result?.output_path, result.secondary_filling_result?.output_path].filter(
    (outputPath): outputPath is string => outputPath !== undefined
  );

  return {
    success: result.success,
    stage_reached: result.stage_reached,
    failed_stage: result.failed_stage,
    output_paths: outputPaths,
    intermediate_path: result.intermediate_path,
    total_cost: result.total_cost,
    total_processing_time: result.total_processing_time,
    warnings: result.warnings,
    error: result.error,
  };
}

function isUnrecoverable(error: unknown): error is Error {
  return (
    error instanceof TemplateMissingError ||
    error instanceof ExtractionUnavailableError ||
    error instanceof MappingFailureError ||
    error instanceof UnsupportedDocumentError
  );
}

export function createConvertFormProcessor(
  pipeline: FormPipeline
): (job: ConvertFormJobHandle) => Promise<ConvertFormJobResult> {
  return async function processConvertForm(job) {
    const { correlation_id, document_path, mime_type, filename, config, identity } = job.data;

    return runWithContextAsync(
      { correlationId: correlation_id, userId: identity?.user_id, sessionId: identity?.session_id },
      async () => {
        const startTime = Date.now();

        logger.info('Processing convert_form', {
          jobId: job.id,
          attempt: job.attemptsMade + 1,
          output_format: config?.output_format,
        });

        const observer = createProgressTracker((update) => {
          const progress: ConvertFormProgress = {
            stage: update.stage,
            message: update.message,
            completed: update.completed,
          };
          job.updateProgress(progress).catch((error: unknown) => {
            logger.warn('Failed to report job progress', { jobId: job.id, error: errorMessage(error) });
          });
        });

        try {
          const bytes = await fs.promises.readFile(document_path);
          const result = await pipeline.run(
            { bytes, mime_type, filename: filename ?? path.basename(document_path) },
            { config, identity, observer, correlationId: correlation_id }
          );

          const status = result.success ? 'success' : 'failed';
          const duration = (Date.now() - startTime) / 1000;
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONVERT_FORM, status });
          jobDurationHistogram.observe({ queue: QUEUE_NAMES.CONVERT_FORM, status }, duration);

          return summarizeResult(result);
        } catch (error) {
          jobsProcessedCounter.inc({ queue: QUEUE_NAMES.CONVERT_FORM, status: 'error' });
          if (isUnrecoverable(error)) {
            throw new UnrecoverableError(`${error.name}: ${error.message}`);
          }
          throw error;
        }
      }
    );
  };
}
