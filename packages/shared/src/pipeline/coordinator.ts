/**
 * Pipeline Coordinator
 *
 * Runs extraction → mapping → filling → completed for one document. A stage
 * only starts when the previous one succeeded; on failure the partial result
 * is returned with failed_stage and the error. With output_format "both" the
 * document is extracted once and mapped and filled per format concurrently.
 */

import fs from 'fs';
import path from 'path';
import { ulid } from 'ulid';
import type { CacheStore } from '../cache-store';
import { config } from '../config';
import { getContext, runWithContextAsync, setDocumentHash } from '../context';
import { prepareDocument } from '../document';
import {
  errorMessage,
  ExtractionUnavailableError,
  MappingFailureError,
  TemplateMissingError,
} from '../errors';
import type { ExtractionOrchestrator } from '../extractors/orchestrator';
import type { PdfFillEngine } from '../filling/fill-engine';
import { logger } from '../logger';
import { pipelineDurationHistogram, pipelineRunsCounter } from '../metrics';
import { processSourceTree } from '../schema/validator';
import type {
  CallerIdentity,
  DocumentInput,
  ExtractionResult,
  FillingResult,
  MappedForm,
  OutputFormat,
  PipelineConfig,
  PipelineResult,
  PipelineStage,
  PreparedDocument,
} from '../types';
import { createWorkPool, type WorkPool } from '../work-pool';
import {
  loadFormatProfile,
  locateTemplate,
  type FormatProfile,
  type FormatProfileOptions,
} from './format-profile';
import type { ProgressObserver } from './progress';

export const PIPELINE_VERSION = '1.0.0';

export function defaultPipelineConfig(): PipelineConfig {
  return {
    extraction_method: 'auto',
    extraction_fallback: true,
    output_format: 'target_schema',
    enhanced_filling: true,
    save_intermediate: false,
    output_directory: config.outputDirectory,
    include_metadata: true,
  };
}

export interface FormPipelineDeps {
  orchestrator: ExtractionOrchestrator;
  cache: CacheStore;
  fillEngine: PdfFillEngine;
  pool?: WorkPool;
  observer?: ProgressObserver;
  templateDir?: string;
  /** Per-format template and field-table overrides */
  profiles?: Partial<Record<OutputFormat, FormatProfileOptions>>;
}

export interface RunOptions {
  config?: Partial<PipelineConfig>;
  identity?: CallerIdentity;
  /** Replaces the pipeline-level observer for this run */
  observer?: ProgressObserver;
  /** Defaults to the active context's id, or a new ulid */
  correlationId?: string;
}

/** Thrown conditions that abort a run instead of becoming a failed result */
function isAbortingError(error: unknown): boolean {
  return (
    error instanceof ExtractionUnavailableError ||
    error instanceof MappingFailureError ||
    error instanceof TemplateMissingError
  );
}

/**
 * Mutable state of one run.
 */
interface RunState {
  result: PipelineResult;
  current: PipelineStage;
  stagesCompleted: PipelineStage[];
  observer?: ProgressObserver;
}

export class FormPipeline {
  private readonly orchestrator: ExtractionOrchestrator;
  private readonly cache: CacheStore;
  private readonly fillEngine: PdfFillEngine;
  private readonly pool: WorkPool;
  private readonly observer?: ProgressObserver;
  private readonly templateDir?: string;
  private readonly profileOptions: Partial<Record<OutputFormat, FormatProfileOptions>>;
  /** Built profiles by format and template path */
  private readonly profiles = new Map<string, Promise<FormatProfile>>();

  constructor(deps: FormPipelineDeps) {
    this.orchestrator = deps.orchestrator;
    this.cache = deps.cache;
    this.fillEngine = deps.fillEngine;
    this.pool = deps.pool ?? createWorkPool();
    this.observer = deps.observer;
    this.templateDir = deps.templateDir;
    this.profileOptions = deps.profiles ?? {};
  }

  async run(input: DocumentInput, options: RunOptions = {}): Promise<PipelineResult> {
    const identity = options.identity ?? {};
    const correlationId = options.correlationId ?? getContext()?.correlationId ?? ulid();

    const pipelineConfig = { ...defaultPipelineConfig(), ...options.config };
    const observer = options.observer ?? this.observer;

    return runWithContextAsync(
      { correlationId, userId: identity.user_id, sessionId: identity.session_id },
      () => this.execute(input, pipelineConfig, identity, correlationId, observer)
    );
  }

  private async execute(
    input: DocumentInput,
    pipelineConfig: PipelineConfig,
    identity: CallerIdentity,
    correlationId: string,
    observer: ProgressObserver | undefined
  ): Promise<PipelineResult> {
    const startTime = Date.now();
    const formats: OutputFormat[] =
      pipelineConfig.output_format === 'both' ? ['source_schema', 'target_schema'] : [pipelineConfig.output_format];

    logger.info('Pipeline run started', {
      output_format: pipelineConfig.output_format,
      extraction_method: pipelineConfig.extraction_method,
    });

    // Templates are resolved before any stage runs
    const profiles = await Promise.all(formats.map((format) => this.profileFor(format)));

    const document = prepareDocument(input);
    setDocumentHash(document.content_hash);

    const state: RunState = {
      result: { success: false, stage_reached: 'extraction', total_cost: 0, total_processing_time: 0, warnings: [] },
      current: 'extraction',
      stagesCompleted: [],
      observer,
    };

    try {
      await this.runStages(state, document, profiles, pipelineConfig, identity);
    } catch (error) {
      if (isAbortingError(error)) {
        logger.error('Pipeline run aborted', error);
        throw error;
      }
      logger.error('Pipeline stage threw', error, { stage: state.current });
      this.fail(state, state.current, errorMessage(error));
    }

    const { result } = state;
    result.total_processing_time = (Date.now() - startTime) / 1000;

    if (pipelineConfig.include_metadata) {
      result.metadata = {
        pipeline_version: PIPELINE_VERSION,
        correlation_id: correlationId,
        executed_at: new Date().toISOString(),
        stages_completed: state.stagesCompleted,
        configuration: pipelineConfig,
        identity,
        available_extraction_methods: this.orchestrator.getStats().available_methods,
      };
    }

    pipelineRunsCounter.inc({ output_format: pipelineConfig.output_format, stage_reached: result.stage_reached });
    pipelineDurationHistogram.observe({ output_format: pipelineConfig.output_format }, result.total_processing_time);

    logger.info('Pipeline run finished', {
      success: result.success,
      stage_reached: result.stage_reached,
      failed_stage: result.failed_stage,
      total_cost: result.total_cost,
      duration_seconds: result.total_processing_time,
    });

    return result;
  }

  /**
   * The profile of a format, built on first use. The template must still
   * exist on every call; a profile whose build failed is built again.
   */
  private profileFor(format: OutputFormat): Promise<FormatProfile> {
    const options: FormatProfileOptions = { templateDir: this.templateDir, ...this.profileOptions[format] };
    const templatePath = locateTemplate(format, options);
    const key = `${format}:${templatePath}`;

    const existing = this.profiles.get(key);
    if (existing) return existing;

    const pending = loadFormatProfile(format, this.fillEngine, { ...options, templatePath }).catch(
      (error: unknown) => {
        this.profiles.delete(key);
        throw error;
      }
    );
    this.profiles.set(key, pending);
    return pending;
  }

  private async runStages(
    state: RunState,
    document: PreparedDocument,
    profiles: FormatProfile[],
    pipelineConfig: PipelineConfig,
    identity: CallerIdentity
  ): Promise<void> {
    const { result } = state;

    // Extraction
    const extraction = await this.extract(state, document, pipelineConfig, identity);
    result.extraction_result = extraction;
    result.total_cost += extraction.cost;
    if (!extraction.success) {
      this.fail(state, 'extraction', extraction.error || 'Extraction failed');
      return;
    }
    this.notify(state, (o) =>
      o.onExtractionComplete?.(Object.keys(extraction.data ?? {}).length, extraction.cost, extraction.processing_time)
    );
    state.stagesCompleted.push('extraction');

    // Mapping
    state.current = 'mapping';
    result.stage_reached = 'mapping';
    const processed = processSourceTree(extraction.data);
    result.normalized_form = processed.form;
    result.warnings.push(...processed.errors.map((error) => `Validation: ${error}`));
    if (!processed.success) {
      result.warnings.push('Mandatory fields are missing from the extracted form');
    }

    const mapped: MappedForm[] = [];
    for (const profile of profiles) {
      this.notify(state, (o) => o.onMappingStart?.(profile.format));
      const projection = profile.project(processed.form);
      const fieldCount = Object.keys(projection).length;
      if (fieldCount === 0) {
        this.fail(state, 'mapping', `No fields could be mapped for ${profile.format}`);
        return;
      }
      mapped.push(projection);
      this.notify(state, (o) => o.onMappingComplete?.(profile.format, fieldCount));
    }
    result.mapped_form = mapped[0];
    if (mapped.length > 1) result.secondary_mapped_form = mapped[1];
    state.stagesCompleted.push('mapping');

    // Filling
    state.current = 'filling';
    result.stage_reached = 'filling';
    const baseName = path.parse(document.filename).name || 'document';
    const fills = await Promise.all(
      profiles.map((profile, index) => this.fillFormat(state, profile, mapped[index], baseName, pipelineConfig))
    );
    result.filling_result = fills[0];
    if (fills.length > 1) result.secondary_filling_result = fills[1];
    for (const fill of fills) {
      result.warnings.push(...fill.warnings);
    }

    const failedFill = fills.find((fill) => !fill.success);
    if (failedFill) {
      this.fail(state, 'filling', failedFill.error || 'PDF filling failed');
      return;
    }
    state.stagesCompleted.push('filling');

    // Finalization
    state.current = 'finalization';
    this.notify(state, (o) => o.onFinalizationStart?.());
    if (pipelineConfig.save_intermediate) {
      result.intermediate_path = await this.saveIntermediate(result, profiles, baseName, pipelineConfig);
      this.notify(state, (o) => o.onFinalizationProgress?.('Intermediate data saved'));
    }
    state.stagesCompleted.push('finalization');
    this.notify(state, (o) => o.onFinalizationComplete?.());

    result.success = true;
    result.stage_reached = 'completed';
    state.stagesCompleted.push('completed');
    this.notify(state, (o) =>
      o.onPipelineComplete?.({
        output_paths: fills.map((fill) => fill.output_path),
        total_cost: result.total_cost,
        warnings: result.warnings.length,
      })
    );
  }

  private async extract(
    state: RunState,
    document: PreparedDocument,
    pipelineConfig: PipelineConfig,
    identity: CallerIdentity
  ): Promise<ExtractionResult> {
    const method = pipelineConfig.extraction_method;
    this.notify(state, (o) => o.onExtractionStart?.(method));

    const cacheKey = { contentHash: document.content_hash, method, userId: identity.user_id };
    const cached = this.cache.getExtraction(cacheKey);
    if (cached) {
      logger.info('Extraction cache hit', { cached_from: cached.cached_from });
      return cached;
    }

    const extraction = await this.pool.run(() =>
      this.orchestrator.extract(document, method, { fallback: pipelineConfig.extraction_fallback })
    );
    if (extraction.success) {
      this.cache.setExtraction(cacheKey, extraction);
    }
    return extraction;
  }

  private async fillFormat(
    state: RunState,
    profile: FormatProfile,
    mapped: MappedForm,
    baseName: string,
    pipelineConfig: PipelineConfig
  ): Promise<FillingResult> {
    this.notify(state, (o) => o.onFillingStart?.(profile.format));

    const outputPath = path.join(pipelineConfig.output_directory, `${baseName}_${profile.format}_filled_${ulid()}.pdf`);
    const filling = await this.pool.run(() =>
      this.fillEngine.fill({
        mapped,
        templatePath: profile.templatePath,
        table: profile.table,
        outputPath,
        enhanced: pipelineConfig.enhanced_filling,
      })
    );

    if (filling.success && filling.output_path) {
      const written = filling.output_path;
      this.notify(state, (o) => o.onFillingComplete?.(profile.format, filling.fields_filled, written));
    }
    return filling;
  }

  private async saveIntermediate(
    result: PipelineResult,
    profiles: FormatProfile[],
    baseName: string,
    pipelineConfig: PipelineConfig
  ): Promise<string> {
    const mappedForms: Partial<Record<OutputFormat, MappedForm>> = {};
    const [primary, secondary] = profiles;
    if (primary && result.mapped_form) mappedForms[primary.format] = result.mapped_form;
    if (secondary && result.secondary_mapped_form) mappedForms[secondary.format] = result.secondary_mapped_form;

    const extraction = result.extraction_result;
    const payload = {
      normalized_form: result.normalized_form,
      mapped_forms: mappedForms,
      extraction: extraction && {
        method_used: extraction.method_used,
        cached_from: extraction.cached_from,
        confidence: extraction.confidence,
        cost: extraction.cost,
        processing_time: extraction.processing_time,
      },
    };

    const filePath = path.join(pipelineConfig.output_directory, `${baseName}_processed_${ulid()}.json`);
    await fs.promises.mkdir(pipelineConfig.output_directory, { recursive: true });
    await fs.promises.writeFile(filePath, JSON.stringify(payload, null, 2));
    logger.debug('Intermediate data saved', { file: path.basename(filePath) });
    return filePath;
  }

  private fail(state: RunState, stage: PipelineStage, error: string): void {
    state.result.success = false;
    state.result.stage_reached = 'failed';
    state.result.failed_stage = stage;
    state.result.error = error;

    logger.warn('Pipeline stage failed', { stage, error });
    this.notify(state, (o) => o.onError?.(error, stage));
  }

  /**
   * Observer callbacks never affect the run; a throwing observer is logged.
   */
  private notify(state: RunState, call: (observer: ProgressObserver) => void): void {
    if (!state.observer) return;
    try {
      call(state.observer);
    } catch (error) {
      logger.error('Progress observer threw', error);
    }
  }
}
