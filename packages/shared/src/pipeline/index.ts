/**
 * Form conversion pipeline.
 */

export {
  FormPipeline,
  PIPELINE_VERSION,
  defaultPipelineConfig,
  type FormPipelineDeps,
  type RunOptions,
} from './coordinator';
export {
  loadFormatProfile,
  resolveTemplatePath,
  TEMPLATE_FILES,
  FIELD_TABLE_FILES,
  type FormatProfile,
  type FormatProfileOptions,
} from './format-profile';
export { createProgressTracker, type ProgressObserver, type ProgressUpdate } from './progress';

import { CacheStore } from '../cache-store';
import { ExtractionOrchestrator } from '../extractors/orchestrator';
import { createDefaultRegistry } from '../extractors';
import { PdfFillEngine } from '../filling/fill-engine';
import { createWorkPool } from '../work-pool';
import { FormPipeline } from './coordinator';
import type { ProgressObserver } from './progress';

/**
 * Pipeline wired with the built-in strategies, a fresh cache and the default pool.
 */
export function createFormPipeline(options: { templateDir?: string; observer?: ProgressObserver } = {}): FormPipeline {
  const cache = new CacheStore();
  return new FormPipeline({
    orchestrator: new ExtractionOrchestrator(createDefaultRegistry()),
    cache,
    fillEngine: new PdfFillEngine({ cache }),
    pool: createWorkPool(),
    templateDir: options.templateDir,
    observer: options.observer,
  });
}
