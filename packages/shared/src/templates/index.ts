/**
 * Extraction Templates
 */

export type { ExtractionTemplate } from './types';
export { renderPrompt } from './types';
export { MNR_EXTRACTION_TEMPLATE } from './mnr-extraction.template';
