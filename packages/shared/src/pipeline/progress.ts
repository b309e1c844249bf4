/**
 * Pipeline progress observation.
 *
 * The coordinator calls an optional ProgressObserver at the entry and
 * completion of each stage. createProgressTracker adapts a single callback
 * taking ProgressUpdate records, which is what the queue worker forwards to
 * job progress.
 */

import type { OutputFormat, PipelineStage } from '../types';

export interface ProgressUpdate {
  stage: PipelineStage;
  message: string;
  completed: boolean;
  details: Record<string, unknown>;
  timestamp: string;
}

export interface ProgressObserver {
  onExtractionStart?(method: string): void;
  onExtractionComplete?(fieldsExtracted: number, cost: number, timeTaken: number): void;
  onMappingStart?(format: OutputFormat): void;
  onMappingComplete?(format: OutputFormat, fieldsMapped: number): void;
  onFillingStart?(format: OutputFormat): void;
  onFillingComplete?(format: OutputFormat, fieldsFilled: number, outputPath: string): void;
  onFinalizationStart?(): void;
  onFinalizationProgress?(message: string): void;
  onFinalizationComplete?(): void;
  onPipelineComplete?(summary: Record<string, unknown>): void;
  onError?(error: string, stage: PipelineStage): void;
}

function update(
  stage: PipelineStage,
  message: string,
  completed: boolean,
  details: Record<string, unknown> = {}
): ProgressUpdate {
  return { stage, message, completed, details, timestamp: new Date().toISOString() };
}

/**
 * Observer that turns every callback into a ProgressUpdate.
 */
export function createProgressTracker(callback: (update: ProgressUpdate) => void): Required<ProgressObserver> {
  return {
    onExtractionStart: (method) =>
      callback(update('extraction', `Starting data extraction using ${method}`, false, { method })),
    onExtractionComplete: (fieldsExtracted, cost, timeTaken) =>
      callback(
        update('extraction', `Data extraction completed - ${fieldsExtracted} fields extracted`, true, {
          fields_extracted: fieldsExtracted,
          cost,
          time_taken: timeTaken,
        })
      ),
    onMappingStart: (format) =>
      callback(update('mapping', `Mapping data for ${format} format`, false, { output_format: format })),
    onMappingComplete: (format, fieldsMapped) =>
      callback(
        update('mapping', `Mapping completed - ${fieldsMapped} fields mapped`, true, {
          output_format: format,
          fields_mapped: fieldsMapped,
        })
      ),
    onFillingStart: (format) =>
      callback(update('filling', `Generating ${format} PDF`, false, { output_format: format })),
    onFillingComplete: (format, fieldsFilled, outputPath) =>
      callback(
        update('filling', `PDF generation completed - ${fieldsFilled} fields filled`, true, {
          output_format: format,
          fields_filled: fieldsFilled,
          output_path: outputPath,
        })
      ),
    onFinalizationStart: () => callback(update('finalization', 'Finalizing results', false)),
    onFinalizationProgress: (message) => callback(update('finalization', message, false)),
    onFinalizationComplete: () => callback(update('finalization', 'Finalization completed', true)),
    onPipelineComplete: (summary) =>
      callback(update('completed', 'Processing completed successfully', true, summary)),
    onError: (error, stage) =>
      callback(
        update('failed', `Processing failed at ${stage}: ${error}`, true, { error, failed_stage: stage })
      ),
  };
}
