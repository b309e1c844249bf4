/**
 * Vision LLM client boundary.
 *
 * VisionExtractor talks to this interface; OpenAiVisionClient is the
 * production implementation and tests substitute a fake.
 */

import OpenAI from 'openai';
import { config } from '../../config';
import { logger } from '../../logger';
import { llmRequestDurationHistogram, llmRequestsCounter } from '../../metrics';

export type VisionAttachment =
  | { kind: 'image'; mimeType: string; base64: string }
  | { kind: 'pdf'; filename: string; base64: string };

export interface VisionRequest {
  model: string;
  systemPrompt: string;
  userPrompt: string;
  attachment: VisionAttachment;
  maxTokens: number;
}

export interface VisionResponse {
  content: string | null;
  totalTokens: number;
  requestId: string;
}

export interface VisionCompletionClient {
  complete(request: VisionRequest): Promise<VisionResponse>;
}

export interface OpenAiVisionClientOptions {
  apiKey?: string;
  timeoutMs?: number;
}

export class OpenAiVisionClient implements VisionCompletionClient {
  private readonly openai: OpenAI;

  constructor(options: OpenAiVisionClientOptions = {}) {
    this.openai = new OpenAI({
      apiKey: options.apiKey || config.openaiApiKey,
      timeout: options.timeoutMs ?? config.llmRequestTimeoutMs,
      maxRetries: 0,
    });
  }

  async complete(request: VisionRequest): Promise<VisionResponse> {
    const startTime = Date.now();

    const attachmentPart: OpenAI.Chat.Completions.ChatCompletionContentPart =
      request.attachment.kind === 'pdf'
        ? {
            type: 'file',
            file: {
              filename: request.attachment.filename,
              file_data: `data:application/pdf;base64,${request.attachment.base64}`,
            },
          }
        : {
            type: 'image_url',
            image_url: {
              url: `data:${request.attachment.mimeType};base64,${request.attachment.base64}`,
              detail: 'high',
            },
          };

    try {
      const response = await this.openai.chat.completions.create({
        model: request.model,
        messages: [
          { role: 'system', content: request.systemPrompt },
          {
            role: 'user',
            content: [{ type: 'text', text: request.userPrompt }, attachmentPart],
          },
        ],
        response_format: { type: 'json_object' },
        max_tokens: request.maxTokens,
        temperature: 0,
      });

      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status: 'success' });

      return {
        content: response.choices[0]?.message?.content ?? null,
        totalTokens: response.usage?.total_tokens ?? 0,
        requestId: response.id || `req_${Date.now()}`,
      };
    } catch (error) {
      const duration = (Date.now() - startTime) / 1000;
      llmRequestDurationHistogram.observe({ model: request.model }, duration);
      llmRequestsCounter.inc({ model: request.model, status: 'error' });

      logger.error('OpenAI vision request failed', error, { model: request.model });
      throw error;
    }
  }
}
