/**
 * convert_form Processor Tests
 *
 * Drives the job processor with a stand-in job handle; no Redis involved.
 */

import { UnrecoverableError } from 'bullmq';
import {
  CacheStore,
  ExtractionOrchestrator,
  ExtractionRegistry,
  FormPipeline,
  PdfFillEngine,
  type ConvertFormJob,
  type PipelineResult,
} from '@formbridge/shared';
import {
  createConvertFormProcessor,
  summarizeResult,
  type ConvertFormJobHandle,
} from '../../services/worker-form-pipeline/src/processor';
import {
  buildAcroFormTemplate,
  buildUploadPdf,
  FakeStrategy,
  makeTempDir,
  removeDir,
  sampleMnrTree,
  writeFile,
} from './helpers';

describe('convert_form processor', () => {
  let workDir: string;
  let documentPath: string;

  beforeEach(async () => {
    workDir = makeTempDir();
    documentPath = writeFile(workDir, 'upload-7.pdf', await buildUploadPdf('worker'));
  });

  afterEach(() => {
    removeDir(workDir);
  });

  function createPipeline(templateDir: string): FormPipeline {
    const cache = new CacheStore();
    return new FormPipeline({
      orchestrator: new ExtractionOrchestrator(
        new ExtractionRegistry([new FakeStrategy('vision', { kind: 'success', data: sampleMnrTree(), cost: 0.01 })])
      ),
      cache,
      fillEngine: new PdfFillEngine({ cache }),
      templateDir,
    });
  }

  function createJob(data: ConvertFormJob) {
    const updateProgress = jest.fn((_progress: unknown) => Promise.resolve());
    const job: ConvertFormJobHandle = { id: 'job-1', data, attemptsMade: 0, updateProgress };
    return { job, updateProgress };
  }

  it('should run the pipeline and summarize the result', async () => {
    writeFile(workDir, 'ash_medical_form.pdf', await buildAcroFormTemplate({ text: ['Weight', 'Height'] }));
    const processJob = createConvertFormProcessor(createPipeline(workDir));
    const { job, updateProgress } = createJob({
      correlation_id: 'corr-job-1',
      document_path: documentPath,
      filename: 'intake.pdf',
      config: { output_directory: workDir },
    });

    const summary = await processJob(job);

    expect(summary.success).toBe(true);
    expect(summary.stage_reached).toBe('completed');
    expect(summary.output_paths).toHaveLength(1);
    expect(summary.output_paths[0]).toMatch(/intake_target_schema_filled_[0-9A-Z]{26}\.pdf$/);
    expect(summary.total_cost).toBe(0.01);

    expect(updateProgress).toHaveBeenCalledTimes(9);
    expect(updateProgress).toHaveBeenNthCalledWith(1, {
      stage: 'extraction',
      message: 'Starting data extraction using auto',
      completed: false,
    });
    expect(updateProgress).toHaveBeenLastCalledWith({
      stage: 'completed',
      message: 'Processing completed successfully',
      completed: true,
    });
  });

  it('should name outputs after the stored file when no filename is given', async () => {
    writeFile(workDir, 'ash_medical_form.pdf', await buildAcroFormTemplate({ text: ['Weight'] }));
    const processJob = createConvertFormProcessor(createPipeline(workDir));
    const { job } = createJob({
      correlation_id: 'corr-job-2',
      document_path: documentPath,
      config: { output_directory: workDir },
    });

    const summary = await processJob(job);

    expect(summary.output_paths[0]).toMatch(/upload-7_target_schema_filled_[0-9A-Z]{26}\.pdf$/);
  });

  it('should mark a missing template as unrecoverable', async () => {
    const processJob = createConvertFormProcessor(createPipeline(workDir));
    const { job } = createJob({ correlation_id: 'corr-job-3', document_path: documentPath });

    const outcome = processJob(job);

    await expect(outcome).rejects.toThrow(UnrecoverableError);
    await expect(outcome).rejects.toThrow(/^TemplateMissingError: Template for target_schema not found/);
  });

  it('should mark an unreadable upload as unrecoverable', async () => {
    writeFile(workDir, 'ash_medical_form.pdf', await buildAcroFormTemplate({ text: ['Weight'] }));
    const notesPath = writeFile(workDir, 'notes.txt', Buffer.from('plain text'));
    const processJob = createConvertFormProcessor(createPipeline(workDir));
    const { job } = createJob({ correlation_id: 'corr-job-5', document_path: notesPath });

    const outcome = processJob(job);

    await expect(outcome).rejects.toThrow(UnrecoverableError);
    await expect(outcome).rejects.toThrow(
      'UnsupportedDocumentError: Unsupported document type: expected a PDF or a raster image'
    );
  });

  it('should let other errors through for retry', async () => {
    const processJob = createConvertFormProcessor(createPipeline(workDir));
    const { job } = createJob({ correlation_id: 'corr-job-4', document_path: `${workDir}/missing.pdf` });

    const outcome = processJob(job);

    await expect(outcome).rejects.toThrow(/ENOENT/);
    await expect(outcome).rejects.not.toBeInstanceOf(UnrecoverableError);
  });
});

describe('summarizeResult', () => {
  it('should collect output paths of both fills', () => {
    const result: PipelineResult = {
      success: true,
      stage_reached: 'completed',
      total_cost: 0.03,
      total_processing_time: 1.5,
      warnings: ['No anchor found for Employer'],
      filling_result: {
        success: true,
        output_path: '/out/a_source_schema_filled.pdf',
        fields_filled: 3,
        total_fields: 19,
        method_used: 'overlay',
        warnings: [],
        attempts: [],
      },
      secondary_filling_result: {
        success: true,
        output_path: '/out/a_target_schema_filled.pdf',
        fields_filled: 4,
        total_fields: 19,
        method_used: 'structured_fields',
        warnings: [],
        attempts: [],
      },
    };

    expect(summarizeResult(result)).toEqual({
      success: true,
      stage_reached: 'completed',
      failed_stage: undefined,
      output_paths: ['/out/a_source_schema_filled.pdf', '/out/a_target_schema_filled.pdf'],
      intermediate_path: undefined,
      total_cost: 0.03,
      total_processing_time: 1.5,
      warnings: ['No anchor found for Employer'],
      error: undefined,
    });
  });

  it('should carry the failure of a partial result', () => {
    const result: PipelineResult = {
      success: false,
      stage_reached: 'failed',
      failed_stage: 'extraction',
      total_cost: 0,
      total_processing_time: 0.2,
      warnings: [],
      error: 'All extraction methods failed',
    };

    expect(summarizeResult(result)).toMatchObject({
      success: false,
      failed_stage: 'extraction',
      output_paths: [],
      error: 'All extraction methods failed',
    });
  });
});
