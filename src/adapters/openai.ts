/**
 * OpenAI Model Adapter
 *
 * Also works against compatible APIs (Azure, local proxies) through baseUrl.
 */

import { z } from 'zod';
import type {
  ModelAdapter,
  CompletionRequest,
  CompletionResponse,
  OpenAIConfig,
  FetchLike,
} from './types.js';
import { failedResponse, readJson } from './http.js';
import { ModelError } from '../errors.js';

const OpenAIChatResponseSchema = z.object({
  choices: z.array(
    z.object({
      message: z.object({ content: z.string().nullable() }),
      finish_reason: z.string().nullable(),
    })
  ),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number(),
    })
    .optional(),
});

export class OpenAIAdapter implements ModelAdapter {
  readonly name: string;
  readonly provider = 'openai';

  private apiKey: string;
  private model: string;
  private baseUrl: string;

  constructor(config: OpenAIConfig, private fetchImpl: FetchLike = fetch) {
    this.apiKey = config.apiKey;
    this.model = config.model;
    this.baseUrl = (config.baseUrl ?? 'https://api.openai.com/v1').replace(/\/$/, '');
    this.name = `openai:${config.model}`;
  }

  async complete(request: CompletionRequest): Promise<CompletionResponse> {
    const response = await this.fetchImpl(`${this.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        'Authorization': `Bearer ${this.apiKey}`,
      },
      body: JSON.stringify({
        model: this.model,
        messages: request.messages,
        temperature: request.temperature ?? 0.7,
        max_tokens: request.maxTokens ?? 1024,
        response_format: request.responseFormat === 'json' ? { type: 'json_object' } : undefined,
        stream: false,
      }),
    });

    if (!response.ok) {
      throw await failedResponse(response, this.provider);
    }

    const data = await readJson(response, OpenAIChatResponseSchema, this.provider);
    const choice = data.choices[0];
    if (!choice) {
      throw new ModelError(this.provider, 'response had no choices');
    }

    return {
      content: choice.message.content ?? '',
      usage: {
        promptTokens: data.usage?.prompt_tokens ?? 0,
        completionTokens: data.usage?.completion_tokens ?? 0,
        totalTokens: data.usage?.total_tokens ?? 0,
      },
      finishReason: this.mapFinishReason(choice.finish_reason),
    };
  }

  async healthCheck(): Promise<boolean> {
    try {
      const response = await this.fetchImpl(`${this.baseUrl}/models`, {
        headers: {
          'Authorization': `Bearer ${this.apiKey}`,
        },
        signal: AbortSignal.timeout(5000),
      });
      return response.ok;
    } catch {
      return false;
    }
  }

  private mapFinishReason(reason: string | null): CompletionResponse['finishReason'] {
    switch (reason) {
      case 'length':
        return 'length';
      case 'content_filter':
        return 'content_filter';
      default:
        return 'stop';
    }
  }
}
