/**
 * Pipeline Coordinator Tests
 *
 * End-to-end runs over scripted extraction, in-memory templates written to a
 * temporary template directory, and the real mapping and fill stages.
 */

import fs from 'node:fs';
import path from 'node:path';
import {
  CacheStore,
  createProgressTracker,
  emptyMnrForm,
  ExtractionOrchestrator,
  ExtractionRegistry,
  ExtractionUnavailableError,
  FormPipeline,
  mapToTargetSchema,
  PdfFillEngine,
  PIPELINE_VERSION,
  TemplateMissingError,
  UnsupportedDocumentError,
  type JsonObject,
  type ProgressUpdate,
} from '@formbridge/shared';
import {
  buildAcroFormTemplate,
  buildLabelTemplate,
  buildUploadPdf,
  FakeStrategy,
  makeTempDir,
  normalizedForm,
  removeDir,
  sampleMnrTree,
  writeFile,
} from './helpers';

const ASH_TEMPLATE_FIELDS = ['PCP Name', 'Weight', 'Height', 'Pain Level'];
const MNR_TEMPLATE_LABELS = ['Primary Care Physician', 'Current Pain Level', 'Weight'];

describe('FormPipeline', () => {
  let templateDir: string;
  let outputDir: string;
  let upload: Buffer;

  beforeAll(async () => {
    upload = await buildUploadPdf('pipeline');
  });

  beforeEach(async () => {
    templateDir = makeTempDir('formbridge-templates-');
    outputDir = makeTempDir('formbridge-output-');
    writeFile(templateDir, 'ash_medical_form.pdf', await buildAcroFormTemplate({ text: ASH_TEMPLATE_FIELDS }));
    writeFile(templateDir, 'mnr_form.pdf', await buildLabelTemplate(MNR_TEMPLATE_LABELS));
  });

  afterEach(() => {
    removeDir(templateDir);
    removeDir(outputDir);
  });

  function createPipeline(vision: FakeStrategy, dir = templateDir, cache = new CacheStore()): FormPipeline {
    return new FormPipeline({
      orchestrator: new ExtractionOrchestrator(new ExtractionRegistry([vision])),
      cache,
      fillEngine: new PdfFillEngine({ cache }),
      templateDir: dir,
    });
  }

  function visionReturning(data: JsonObject = sampleMnrTree(), cost = 0.02): FakeStrategy {
    return new FakeStrategy('vision', { kind: 'success', data, cost });
  }

  it('should convert a document to a filled ASH form', async () => {
    const vision = visionReturning();
    const pipeline = createPipeline(vision);

    const result = await pipeline.run(
      { bytes: upload, filename: 'intake.pdf' },
      { config: { output_directory: outputDir }, correlationId: 'corr-test-1' }
    );

    expect(result.success).toBe(true);
    expect(result.stage_reached).toBe('completed');
    expect(result.failed_stage).toBeUndefined();
    expect(result.extraction_result?.method_used).toBe('vision');
    expect(result.mapped_form).toEqual(mapToTargetSchema(normalizedForm()));
    expect(result.secondary_mapped_form).toBeUndefined();
    expect(result.total_cost).toBe(0.02);
    expect(result.warnings).toEqual([]);

    expect(result.filling_result?.method_used).toBe('structured_fields');
    expect(result.filling_result?.fields_filled).toBe(4);
    const outputPath = result.filling_result?.output_path ?? '';
    expect(path.dirname(outputPath)).toBe(outputDir);
    expect(path.basename(outputPath)).toMatch(/^intake_target_schema_filled_[0-9A-HJKMNP-TV-Z]{26}\.pdf$/);
    expect(fs.existsSync(outputPath)).toBe(true);

    expect(result.metadata).toMatchObject({
      pipeline_version: PIPELINE_VERSION,
      correlation_id: 'corr-test-1',
      stages_completed: ['extraction', 'mapping', 'filling', 'finalization', 'completed'],
      identity: {},
      available_extraction_methods: { vision: true, legacy_ocr: false },
    });
    expect(result.metadata?.configuration.output_directory).toBe(outputDir);
  });

  it('should extract once and fill both formats in dual mode', async () => {
    const vision = visionReturning();
    const pipeline = createPipeline(vision);

    const result = await pipeline.run(
      { bytes: upload, filename: 'intake.pdf' },
      { config: { output_directory: outputDir, output_format: 'both' } }
    );

    expect(result.success).toBe(true);
    expect(vision.calls).toBe(1);
    expect(result.mapped_form?.['Pain_Level.Current']).toBe('9/10');
    expect(result.secondary_mapped_form?.current_pain).toBe('9/10');

    expect(result.filling_result?.method_used).toBe('overlay');
    expect(result.filling_result?.fields_filled).toBe(3);
    expect(path.basename(result.filling_result?.output_path ?? '')).toMatch(/^intake_source_schema_filled_/);
    expect(result.secondary_filling_result?.method_used).toBe('structured_fields');
    expect(path.basename(result.secondary_filling_result?.output_path ?? '')).toMatch(/^intake_target_schema_filled_/);
    expect(result.warnings).toContain('No anchor found for Employer');
  });

  it('should stop at extraction when every method fails', async () => {
    const vision = new FakeStrategy('vision', { kind: 'failure', error: 'model refused', cost: 0.004 });
    const pipeline = createPipeline(vision);

    const result = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, { config: { output_directory: outputDir } });

    expect(result.success).toBe(false);
    expect(result.stage_reached).toBe('failed');
    expect(result.failed_stage).toBe('extraction');
    expect(result.error).toBe('All extraction methods failed');
    expect(result.extraction_result?.attempts).toEqual([{ method: 'vision', error: 'model refused' }]);
    expect(result.total_cost).toBe(0.004);
    expect(result.mapped_form).toBeUndefined();
    expect(result.metadata?.stages_completed).toEqual([]);
    expect(fs.readdirSync(outputDir)).toEqual([]);
  });

  it('should fail mapping when nothing in the form maps', async () => {
    const pipeline = createPipeline(visionReturning(emptyMnrForm()));

    const result = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, { config: { output_directory: outputDir } });

    expect(result.success).toBe(false);
    expect(result.failed_stage).toBe('mapping');
    expect(result.error).toBe('No fields could be mapped for target_schema');
    expect(result.warnings).toContain('Validation: Missing required field: Primary_Care_Physician');
    expect(result.warnings).toContain('Mandatory fields are missing from the extracted form');
    expect(result.metadata?.stages_completed).toEqual(['extraction']);
  });

  it('should carry on with warnings when mandatory fields are missing', async () => {
    const tree = sampleMnrTree();
    tree.Current_Health_Problems = null;
    const pipeline = createPipeline(visionReturning(tree));

    const result = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, { config: { output_directory: outputDir } });

    expect(result.success).toBe(true);
    expect(result.warnings).toEqual([
      'Validation: Missing required field: Current_Health_Problems',
      'Mandatory fields are missing from the extracted form',
    ]);
    expect(result.mapped_form).not.toHaveProperty('health_problems');
  });

  it('should report a fill failure with every attempted method', async () => {
    writeFile(templateDir, 'ash_medical_form.pdf', await buildLabelTemplate(['Unrelated heading']));
    const pipeline = createPipeline(visionReturning());

    const result = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, { config: { output_directory: outputDir } });

    expect(result.success).toBe(false);
    expect(result.failed_stage).toBe('filling');
    expect(result.error).toBe(
      'All fill methods failed: structured_fields: No fillable form fields found; ' +
        'basic_fields: No fillable form fields found; overlay: No anchors found for any field'
    );
    expect(result.mapped_form).toBeDefined();
    expect(result.metadata?.stages_completed).toEqual(['extraction', 'mapping']);
  });

  it('should serve a repeated document from the extraction cache', async () => {
    const vision = visionReturning();
    const pipeline = createPipeline(vision);
    const options = { config: { output_directory: outputDir } };

    await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);
    const second = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);

    expect(vision.calls).toBe(1);
    expect(second.success).toBe(true);
    expect(second.extraction_result).toMatchObject({ method_used: 'cached', cached_from: 'vision', cost: 0 });
    expect(second.total_cost).toBe(0);
  });

  it('should extract again once the cached result expires', async () => {
    let now = 1_000_000;
    const vision = visionReturning();
    const cache = new CacheStore({ ttlMs: 60_000, scope: 'shared', now: () => now });
    const pipeline = createPipeline(vision, templateDir, cache);
    const options = { config: { output_directory: outputDir } };

    await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);
    now += 60_001;
    const second = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);

    expect(vision.calls).toBe(2);
    expect(second.extraction_result?.method_used).toBe('vision');
    expect(second.total_cost).toBe(0.02);
  });

  it('should build each field table once across runs', async () => {
    const readSpy = jest.spyOn(fs, 'readFileSync');
    const pipeline = createPipeline(visionReturning());
    const options = { config: { output_directory: outputDir } };

    try {
      for (let run = 0; run < 3; run++) {
        const result = await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);
        expect(result.success).toBe(true);
      }
      const tableReads = readSpy.mock.calls.filter(([file]) => String(file).endsWith('ash.fields.json'));
      expect(tableReads).toHaveLength(1);
    } finally {
      readSpy.mockRestore();
    }
  });

  it('should still require the template on later runs', async () => {
    const vision = visionReturning();
    const pipeline = createPipeline(vision);
    const options = { config: { output_directory: outputDir } };

    await pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);
    fs.unlinkSync(path.join(templateDir, 'ash_medical_form.pdf'));

    const second = pipeline.run({ bytes: upload, filename: 'intake.pdf' }, options);

    await expect(second).rejects.toThrow(TemplateMissingError);
    expect(vision.calls).toBe(1);
  });

  it('should reject before extraction when a template is missing', async () => {
    const vision = visionReturning();
    const emptyDir = makeTempDir('formbridge-empty-');

    try {
      const pipeline = createPipeline(vision, emptyDir);
      await expect(
        pipeline.run({ bytes: upload, filename: 'intake.pdf' }, { config: { output_directory: outputDir } })
      ).rejects.toThrow(TemplateMissingError);
      expect(vision.calls).toBe(0);
    } finally {
      removeDir(emptyDir);
    }
  });

  it('should reject when the requested method is unavailable without fallback', async () => {
    const pipeline = createPipeline(visionReturning());

    await expect(
      pipeline.run(
        { bytes: upload, filename: 'intake.pdf' },
        { config: { output_directory: outputDir, extraction_method: 'legacy_ocr', extraction_fallback: false } }
      )
    ).rejects.toThrow(ExtractionUnavailableError);
  });

  it('should reject a document that is neither a PDF nor an image', async () => {
    const pipeline = createPipeline(visionReturning());

    await expect(
      pipeline.run({ bytes: Buffer.from('plain text'), filename: 'notes.txt' }, { config: { output_directory: outputDir } })
    ).rejects.toThrow(new UnsupportedDocumentError('Unsupported document type: expected a PDF or a raster image'));
  });

  it('should save intermediate data when asked', async () => {
    const pipeline = createPipeline(visionReturning());

    const result = await pipeline.run(
      { bytes: upload, filename: 'intake.pdf' },
      { config: { output_directory: outputDir, save_intermediate: true } }
    );

    const intermediatePath = result.intermediate_path ?? '';
    expect(path.basename(intermediatePath)).toMatch(/^intake_processed_[0-9A-HJKMNP-TV-Z]{26}\.json$/);

    const saved: unknown = JSON.parse(fs.readFileSync(intermediatePath, 'utf-8'));
    expect(saved).toMatchObject({
      normalized_form: { fields: { Employer: 'Harbor Freight Lines' } },
      mapped_forms: { target_schema: mapToTargetSchema(normalizedForm()) },
      extraction: { method_used: 'vision', cost: 0.02 },
    });
  });

  it('should report progress for each stage in order', async () => {
    const updates: ProgressUpdate[] = [];
    const pipeline = createPipeline(visionReturning());

    await pipeline.run(
      { bytes: upload, filename: 'intake.pdf' },
      {
        config: { output_directory: outputDir },
        observer: createProgressTracker((update) => updates.push(update)),
      }
    );

    expect(updates.map((update) => [update.stage, update.message, update.completed])).toEqual([
      ['extraction', 'Starting data extraction using auto', false],
      ['extraction', 'Data extraction completed - 28 fields extracted', true],
      ['mapping', 'Mapping data for target_schema format', false],
      ['mapping', 'Mapping completed - 19 fields mapped', true],
      ['filling', 'Generating target_schema PDF', false],
      ['filling', 'PDF generation completed - 4 fields filled', true],
      ['finalization', 'Finalizing results', false],
      ['finalization', 'Finalization completed', true],
      ['completed', 'Processing completed successfully', true],
    ]);
  });

  it('should report the failing stage to the observer', async () => {
    const updates: ProgressUpdate[] = [];
    const pipeline = createPipeline(new FakeStrategy('vision', { kind: 'failure', error: 'model refused' }));

    await pipeline.run(
      { bytes: upload, filename: 'intake.pdf' },
      {
        config: { output_directory: outputDir },
        observer: createProgressTracker((update) => updates.push(update)),
      }
    );

    expect(updates[updates.length - 1]).toMatchObject({
      stage: 'failed',
      message: 'Processing failed at extraction: All extraction methods failed',
      details: { failed_stage: 'extraction' },
    });
  });

  it('should keep running when an observer throws', async () => {
    const pipeline = createPipeline(visionReturning());

    const result = await pipeline.run(
      { bytes: upload, filename: 'intake.pdf' },
      {
        config: { output_directory: outputDir },
        observer: {
          onExtractionStart: () => {
            throw new Error('observer broke');
          },
        },
      }
    );

    expect(result.success).toBe(true);
  });

  it('should leave out metadata when not requested and record the caller otherwise', async () => {
    const pipeline = createPipeline(visionReturning());
    const input = { bytes: upload, filename: 'intake.pdf' };

    const bare = await pipeline.run(input, { config: { output_directory: outputDir, include_metadata: false } });
    const withIdentity = await pipeline.run(input, {
      config: { output_directory: outputDir },
      identity: { user_id: 'user-1', session_id: 'session-1' },
    });

    expect(bare.metadata).toBeUndefined();
    expect(withIdentity.metadata?.identity).toEqual({ user_id: 'user-1', session_id: 'session-1' });
  });
});
