/**
 * Form Pipeline Worker
 *
 * Consumes convert_form jobs and runs the MNR conversion pipeline for each.
 * Serves Prometheus metrics on METRICS_PORT.
 */

import {
  logger,
  config,
  createWorker,
  createFormPipeline,
  serveMetrics,
  QUEUE_NAMES,
  type ConvertFormJob,
  type ConvertFormJobResult,
} from '@formbridge/shared';
import { createConvertFormProcessor } from './processor';

const pipeline = createFormPipeline({ templateDir: config.templateDir });

const worker = createWorker<ConvertFormJob, ConvertFormJobResult>(
  QUEUE_NAMES.CONVERT_FORM,
  createConvertFormProcessor(pipeline)
);
const metricsServer = serveMetrics(config.metricsPort);

logger.info('Form pipeline worker started', { template_dir: config.templateDir });

// Graceful shutdown
async function shutdown(signal: string) {
  logger.info(`${signal} received, shutting down`);
  await worker.close();
  metricsServer.close();
  process.exit(0);
}

process.on('SIGTERM', () => {
  shutdown('SIGTERM').catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});
process.on('SIGINT', () => {
  shutdown('SIGINT').catch((error: unknown) => {
    logger.error('Shutdown failed', error);
    process.exit(1);
  });
});
