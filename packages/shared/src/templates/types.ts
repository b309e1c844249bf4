/**
 * Extraction Template Types
 *
 * A template fixes the instructions and the key set a vision request asks
 * for, so the returned tree has a predictable shape.
 */

import type { JsonObject } from '../types';

export interface ExtractionTemplate {
  /** Source form this template extracts */
  formName: string;

  /** System prompt with the extraction rules */
  systemPrompt: string;

  /**
   * User prompt template with placeholders:
   * - {{source_filename}}: The original filename
   * - {{json_structure}}: The exact JSON skeleton to return
   */
  userPromptTemplate: string;

  /** Skeleton with every key present and null leaves */
  skeleton: () => JsonObject;

  /** Human-readable description of what this template extracts */
  description: string;
}

/**
 * Fill {{placeholders}} in a prompt template. Unknown placeholders are left as-is.
 */
export function renderPrompt(template: string, values: Record<string, string>): string {
  return template.replace(/\{\{(\w+)\}\}/g, (match, key: string) => values[key] ?? match);
}
