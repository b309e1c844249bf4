/**
 * Vision LLM Extraction Strategy
 *
 * One request per document: the representative page (a one-page PDF, or a
 * PNG of the first image frame) plus the fixed MNR key structure. The
 * response is merged onto the empty skeleton so the tree shape never depends
 * on what the model chose to return.
 */

import { config } from '../../config';
import { logger } from '../../logger';
import { MNR_EXTRACTION_TEMPLATE } from '../../templates/mnr-extraction.template';
import { renderPrompt, type ExtractionTemplate } from '../../templates/types';
import { isImage } from '../../document';
import { isJsonObject, toJsonValue, type JsonObject, type PreparedDocument } from '../../types';
import { BaseExtractor, type StrategyOutput } from '../base-extractor';
import type { StrategyAvailability } from '../types';
import { firstPdfPage, prepareImage } from '../representative-page';
import { OpenAiVisionClient, type VisionAttachment, type VisionCompletionClient } from './client';

const VISION_CONFIDENCE = 0.92;

/**
 * Estimated USD cost of a request. gpt-4o splits tokens 80/20 between input
 * and output pricing; other models use a flat rate.
 */
export function estimateVisionCost(model: string, totalTokens: number): number {
  if (model === 'gpt-4o') {
    const inputTokens = totalTokens * 0.8;
    const outputTokens = totalTokens * 0.2;
    return (inputTokens / 1000) * 0.005 + (outputTokens / 1000) * 0.015;
  }
  return (totalTokens / 1000) * 0.002;
}

/**
 * Overlay the model's answer onto the skeleton: skeleton keys are kept, nested
 * groups are merged one level deep, unknown keys are dropped.
 */
export function mergeOntoSkeleton(skeleton: JsonObject, answer: JsonObject): JsonObject {
  const merged: JsonObject = {};

  for (const [key, template] of Object.entries(skeleton)) {
    const value = answer[key];
    if (value === undefined) {
      merged[key] = template;
    } else if (isJsonObject(template) && isJsonObject(value)) {
      const group: JsonObject = { ...template };
      for (const subKey of Object.keys(template)) {
        const subValue = value[subKey];
        if (subValue !== undefined) group[subKey] = subValue;
      }
      merged[key] = group;
    } else {
      merged[key] = value;
    }
  }

  return merged;
}

export interface VisionExtractorOptions {
  client?: VisionCompletionClient;
  apiKey?: string;
  model?: string;
  maxTokens?: number;
  maxImageBytes?: number;
  template?: ExtractionTemplate;
}

export class VisionExtractor extends BaseExtractor {
  readonly method = 'vision' as const;
  readonly description = 'Vision LLM extraction of the MNR form';

  private readonly model: string;
  private readonly maxTokens: number;
  private readonly maxImageBytes: number;
  private readonly template: ExtractionTemplate;
  private readonly apiKey: string;
  private client: VisionCompletionClient | undefined;

  constructor(options: VisionExtractorOptions = {}) {
    super();
    this.client = options.client;
    this.apiKey = options.apiKey ?? config.openaiApiKey;
    this.model = options.model ?? config.llmModelVision;
    this.maxTokens = options.maxTokens ?? config.llmMaxTokens;
    this.maxImageBytes = options.maxImageBytes ?? config.maxImageBytes;
    this.template = options.template ?? MNR_EXTRACTION_TEMPLATE;
  }

  isAvailable(): StrategyAvailability {
    if (this.client || this.apiKey) {
      return { available: true };
    }
    return { available: false, reason: 'OPENAI_API_KEY is not set' };
  }

  private getClient(): VisionCompletionClient {
    if (!this.client) {
      this.client = new OpenAiVisionClient({ apiKey: this.apiKey });
    }
    return this.client;
  }

  private async buildAttachment(document: PreparedDocument): Promise<VisionAttachment> {
    if (isImage(document.mime_type)) {
      const image = await prepareImage(document.bytes, { maxRawBytes: this.maxImageBytes });
      return { kind: 'image', mimeType: 'image/png', base64: image.bytes.toString('base64') };
    }

    const { bytes, pageCount } = await firstPdfPage(document.bytes);
    if (pageCount > 1) {
      logger.debug('Sending first page of multi-page PDF', { page_count: pageCount });
    }
    return { kind: 'pdf', filename: document.filename, base64: Buffer.from(bytes).toString('base64') };
  }

  protected async extractImpl(document: PreparedDocument): Promise<StrategyOutput> {
    const attachment = await this.buildAttachment(document);
    const skeleton = this.template.skeleton();

    const response = await this.getClient().complete({
      model: this.model,
      systemPrompt: this.template.systemPrompt,
      userPrompt: renderPrompt(this.template.userPromptTemplate, {
        source_filename: document.filename,
        json_structure: JSON.stringify(skeleton, null, 2),
      }),
      attachment,
      maxTokens: this.maxTokens,
    });

    if (!response.content) {
      throw new Error('Empty response from vision model');
    }

    const parsed = toJsonValue(parseJsonContent(response.content));
    if (!isJsonObject(parsed)) {
      throw new Error('Vision model did not return a JSON object');
    }

    logger.debug('Vision response parsed', {
      request_id: response.requestId,
      returned_keys: Object.keys(parsed).length,
    });

    return {
      data: mergeOntoSkeleton(skeleton, parsed),
      confidence: VISION_CONFIDENCE,
      cost: estimateVisionCost(this.model, response.totalTokens),
      tokens: response.totalTokens,
    };
  }
}

/**
 * Parse the model output, tolerating a ```json fence around it.
 */
export function parseJsonContent(content: string): unknown {
  const fenced = content.match(/```(?:json)?\s*([\s\S]*?)```/);
  const body = fenced ? fenced[1] : content;
  try {
    const parsed: unknown = JSON.parse(body.trim());
    return parsed;
  } catch (error) {
    throw new Error(`Vision response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`);
  }
}
